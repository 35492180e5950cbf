import { Pool } from 'pg';
import { Environment, RepositoryNotFoundError } from '../types/content';
import { EnvironmentRepository } from '../repositories/interfaces';
import { query } from '../utils/database';
import { rethrowConflict } from './mappers';

interface EnvironmentRow {
  id: string;
  key: string;
  name: string;
  description: string | null;
  is_active: boolean;
  is_default: boolean;
  created_at: Date;
  updated_at: Date;
}

const COLUMNS = 'id, key, name, description, is_active, is_default, created_at, updated_at';

const toEnvironment = (row: EnvironmentRow): Environment => ({ ...row });

export class PgEnvironmentRepository implements EnvironmentRepository {
  constructor(private pool: Pool) {}

  async getById(id: string, signal?: AbortSignal): Promise<Environment> {
    const result = await query<EnvironmentRow>(this.pool, `SELECT ${COLUMNS} FROM environments WHERE id = $1`, [id], signal);
    if (result.rows.length === 0) throw new RepositoryNotFoundError('environment', id);
    return toEnvironment(result.rows[0]);
  }

  async getByKey(key: string, signal?: AbortSignal): Promise<Environment> {
    const result = await query<EnvironmentRow>(this.pool, `SELECT ${COLUMNS} FROM environments WHERE key = $1`, [key], signal);
    if (result.rows.length === 0) throw new RepositoryNotFoundError('environment', key);
    return toEnvironment(result.rows[0]);
  }

  async list(signal?: AbortSignal): Promise<Environment[]> {
    const result = await query<EnvironmentRow>(this.pool, `SELECT ${COLUMNS} FROM environments ORDER BY key`, [], signal);
    return result.rows.map(toEnvironment);
  }

  async create(record: Environment, signal?: AbortSignal): Promise<Environment> {
    try {
      const result = await query<EnvironmentRow>(
        this.pool,
        `INSERT INTO environments (id, key, name, description, is_active, is_default)
         VALUES ($1, $2, $3, $4, $5, $6)
         RETURNING ${COLUMNS}`,
        [record.id, record.key, record.name, record.description ?? null, record.is_active, record.is_default],
        signal
      );
      return toEnvironment(result.rows[0]);
    } catch (error) {
      return rethrowConflict(error, 'environment', record.key);
    }
  }

  async update(record: Environment, signal?: AbortSignal): Promise<Environment> {
    try {
      const result = await query<EnvironmentRow>(
        this.pool,
        `UPDATE environments
         SET key = $2, name = $3, description = $4, is_active = $5, is_default = $6, updated_at = NOW()
         WHERE id = $1
         RETURNING ${COLUMNS}`,
        [record.id, record.key, record.name, record.description ?? null, record.is_active, record.is_default],
        signal
      );
      if (result.rows.length === 0) throw new RepositoryNotFoundError('environment', record.id);
      return toEnvironment(result.rows[0]);
    } catch (error) {
      return rethrowConflict(error, 'environment', record.key);
    }
  }
}
