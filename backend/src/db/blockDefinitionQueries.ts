import { randomUUID } from 'crypto';
import { Pool } from 'pg';
import {
  BlockDefinition,
  RegisterBlockDefinitionInput,
  RepositoryNotFoundError,
  UpdateBlockDefinitionInput
} from '../types/content';
import { BlockDefinitionService } from '../repositories/interfaces';
import { ensureSchemaVersion } from '../utils/schemaMetadata';
import { query } from '../utils/database';
import { rethrowConflict, serializeJson, toJsonObject, toOptionalJsonObject } from './mappers';

interface BlockDefinitionRow {
  id: string;
  slug: string;
  name: string;
  description: string | null;
  icon: string | null;
  category: string | null;
  status: string;
  schema: unknown;
  schema_version: string | null;
  ui_schema: unknown;
  defaults: unknown;
  environment_id: string;
}

const COLUMNS = `id, slug, name, description, icon, category, status, schema, schema_version, ui_schema,
  defaults, environment_id`;

function toBlockDefinition(row: BlockDefinitionRow): BlockDefinition {
  return {
    ...row,
    schema: toJsonObject(row.schema),
    ui_schema: toOptionalJsonObject(row.ui_schema),
    defaults: toOptionalJsonObject(row.defaults)
  };
}

export class PgBlockDefinitionService implements BlockDefinitionService {
  constructor(private pool: Pool) {}

  async listDefinitions(environmentKey: string, signal?: AbortSignal): Promise<BlockDefinition[]> {
    const result = await query<BlockDefinitionRow>(
      this.pool,
      `SELECT ${COLUMNS.split(',').map((column) => `bd.${column.trim()}`).join(', ')}
       FROM block_definitions bd
       JOIN environments e ON e.id = bd.environment_id
       WHERE e.key = $1
       ORDER BY bd.slug`,
      [environmentKey],
      signal
    );
    return result.rows.map(toBlockDefinition);
  }

  async registerDefinition(input: RegisterBlockDefinitionInput, signal?: AbortSignal): Promise<BlockDefinition> {
    const slug = input.slug.trim();
    const { schema, version } = ensureSchemaVersion(input.schema, slug);
    try {
      const result = await query<BlockDefinitionRow>(
        this.pool,
        `INSERT INTO block_definitions (${COLUMNS})
         SELECT $1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, e.id
         FROM environments e WHERE e.key = $12
         RETURNING ${COLUMNS}`,
        [
          randomUUID(),
          slug,
          input.name,
          input.description ?? null,
          input.icon ?? null,
          input.category ?? null,
          input.status,
          serializeJson(schema),
          version.toString(),
          serializeJson(input.ui_schema),
          serializeJson(input.defaults),
          input.environment_key
        ],
        signal
      );
      if (result.rows.length === 0) throw new RepositoryNotFoundError('environment', input.environment_key);
      return toBlockDefinition(result.rows[0]);
    } catch (error) {
      return rethrowConflict(error, 'block_definition', `${input.environment_key}/${slug}`);
    }
  }

  async updateDefinition(input: UpdateBlockDefinitionInput, signal?: AbortSignal): Promise<BlockDefinition> {
    const current = await query<BlockDefinitionRow>(this.pool, `SELECT ${COLUMNS} FROM block_definitions WHERE id = $1`, [input.id], signal);
    if (current.rows.length === 0) throw new RepositoryNotFoundError('block_definition', input.id);
    const existing = toBlockDefinition(current.rows[0]);

    const slug = input.slug?.trim() || existing.slug;
    const prepared = input.schema ? ensureSchemaVersion(input.schema, slug) : null;
    try {
      const result = await query<BlockDefinitionRow>(
        this.pool,
        `UPDATE block_definitions
         SET slug = $2, name = $3, description = $4, icon = $5, category = $6, status = $7,
             schema = $8, schema_version = $9, ui_schema = $10, defaults = $11, updated_at = NOW()
         WHERE id = $1
         RETURNING ${COLUMNS}`,
        [
          input.id,
          slug,
          input.name ?? existing.name,
          input.description !== undefined ? input.description : existing.description ?? null,
          input.icon !== undefined ? input.icon : existing.icon ?? null,
          input.category !== undefined ? input.category : existing.category ?? null,
          input.status ?? existing.status,
          serializeJson(prepared ? prepared.schema : existing.schema),
          prepared ? prepared.version.toString() : existing.schema_version ?? null,
          serializeJson(input.ui_schema !== undefined ? input.ui_schema : existing.ui_schema),
          serializeJson(input.defaults !== undefined ? input.defaults : existing.defaults)
        ],
        signal
      );
      return toBlockDefinition(result.rows[0]);
    } catch (error) {
      return rethrowConflict(error, 'block_definition', slug);
    }
  }
}
