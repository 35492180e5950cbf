import dotenv from 'dotenv';
import * as fs from 'fs';
import * as path from 'path';
import { loadPromotionConfig } from '../config/promotion';
import { createPool } from '../utils/database';
import { createLogger } from '../utils/logger';

dotenv.config();

const log = createLogger('Migration');
const MIGRATION_FILE = '001_content_promotion.sql';

async function runMigration(): Promise<void> {
  const config = loadPromotionConfig();
  if (!config.databaseUrl) {
    throw new Error('DATABASE_URL is required to run migrations');
  }

  const migrationPath = path.resolve(process.cwd(), 'backend/src/migrations', MIGRATION_FILE);
  const pool = createPool(config.databaseUrl);

  try {
    log.info(`Running migration: ${MIGRATION_FILE}`);
    await pool.query(fs.readFileSync(migrationPath, 'utf-8'));

    const result = await pool.query<{ table_name: string }>(
      `SELECT table_name FROM information_schema.tables
       WHERE table_schema = 'public'
         AND table_name IN ('environments', 'content_types', 'contents', 'content_versions', 'block_definitions')
       ORDER BY table_name`
    );
    log.info(`Tables present: ${result.rows.map((row) => row.table_name).join(', ')}`);
  } finally {
    await pool.end();
  }
}

runMigration().catch((error: unknown) => {
  log.error('Migration failed:', error);
  process.exit(1);
});
