import { Pool } from 'pg';
import { ActivityEvent } from '../types/content';
import { ActivitySink } from '../repositories/interfaces';
import { query } from '../utils/database';

/**
 * Activity sink writing to the activity_events table
 */
export class PgActivitySink implements ActivitySink {
  constructor(private pool: Pool) {}

  async record(event: ActivityEvent): Promise<void> {
    await query(
      this.pool,
      `INSERT INTO activity_events (verb, object_type, object_id, metadata, occurred_at)
       VALUES ($1, $2, $3, $4, $5)`,
      [event.verb, event.object_type, event.object_id, JSON.stringify(event.metadata), event.occurred_at ?? new Date()]
    );
  }
}
