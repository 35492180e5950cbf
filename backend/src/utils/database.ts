import { Pool, PoolClient, QueryResult, QueryResultRow } from 'pg';
import { throwIfCancelled } from './cancellation';

/**
 * Anything that runs a parameterized query: the pool or a checked-out client
 */
export interface Queryable {
  query<R extends QueryResultRow>(text: string, values?: unknown[]): Promise<QueryResult<R>>;
}

export const createPool = (connectionString: string): Pool => {
  return new Pool({
    connectionString,
    ssl: process.env.NODE_ENV === 'production' ? { rejectUnauthorized: false } : false,
  });
};

/**
 * Run a query, rejecting early when the signal has already fired
 */
export const query = async <R extends QueryResultRow>(
  db: Queryable,
  text: string,
  params: unknown[] = [],
  signal?: AbortSignal
): Promise<QueryResult<R>> => {
  throwIfCancelled(signal);
  return db.query<R>(text, params);
};

/**
 * Run `fn` inside a transaction on a dedicated client
 */
export const withTransaction = async <T>(pool: Pool, fn: (client: PoolClient) => Promise<T>): Promise<T> => {
  const client = await pool.connect();
  try {
    await client.query('BEGIN');
    const result = await fn(client);
    await client.query('COMMIT');
    return result;
  } catch (error) {
    await client.query('ROLLBACK');
    throw error;
  } finally {
    client.release();
  }
};
