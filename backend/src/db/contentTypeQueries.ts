import { Pool } from 'pg';
import { ContentType, RepositoryNotFoundError } from '../types/content';
import { ContentTypeRepository } from '../repositories/interfaces';
import { query } from '../utils/database';
import {
  parseSchemaHistory,
  rethrowConflict,
  serializeJson,
  serializeSchemaHistory,
  toContentTypeStatus,
  toJsonObject,
  toOptionalJsonObject
} from './mappers';

interface ContentTypeRow {
  id: string;
  slug: string;
  name: string;
  description: string | null;
  schema: unknown;
  ui_schema: unknown;
  capabilities: unknown;
  icon: string | null;
  schema_version: string;
  schema_history: unknown;
  status: string;
  environment_id: string;
  created_at: Date;
  updated_at: Date;
}

const COLUMNS = `id, slug, name, description, schema, ui_schema, capabilities, icon,
  schema_version, schema_history, status, environment_id, created_at, updated_at`;

function toContentType(row: ContentTypeRow): ContentType {
  return {
    id: row.id,
    slug: row.slug,
    name: row.name,
    description: row.description,
    schema: toJsonObject(row.schema),
    ui_schema: toOptionalJsonObject(row.ui_schema),
    capabilities: toOptionalJsonObject(row.capabilities),
    icon: row.icon,
    schema_version: row.schema_version,
    schema_history: parseSchemaHistory(row.schema_history),
    status: toContentTypeStatus(row.status),
    environment_id: row.environment_id,
    created_at: row.created_at,
    updated_at: row.updated_at
  };
}

export class PgContentTypeRepository implements ContentTypeRepository {
  constructor(private pool: Pool) {}

  async getById(id: string, signal?: AbortSignal): Promise<ContentType> {
    const result = await query<ContentTypeRow>(this.pool, `SELECT ${COLUMNS} FROM content_types WHERE id = $1`, [id], signal);
    if (result.rows.length === 0) throw new RepositoryNotFoundError('content_type', id);
    return toContentType(result.rows[0]);
  }

  async getBySlug(slug: string, environmentId: string, signal?: AbortSignal): Promise<ContentType> {
    const result = await query<ContentTypeRow>(
      this.pool,
      `SELECT ${COLUMNS} FROM content_types WHERE environment_id = $1 AND lower(slug) = lower($2)`,
      [environmentId, slug],
      signal
    );
    if (result.rows.length === 0) throw new RepositoryNotFoundError('content_type', `${environmentId}/${slug}`);
    return toContentType(result.rows[0]);
  }

  async list(environmentId: string, signal?: AbortSignal): Promise<ContentType[]> {
    const result = await query<ContentTypeRow>(
      this.pool,
      `SELECT ${COLUMNS} FROM content_types WHERE environment_id = $1 ORDER BY slug`,
      [environmentId],
      signal
    );
    return result.rows.map(toContentType);
  }

  async create(record: ContentType, signal?: AbortSignal): Promise<ContentType> {
    try {
      const result = await query<ContentTypeRow>(
        this.pool,
        `INSERT INTO content_types (${COLUMNS})
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14)
         RETURNING ${COLUMNS}`,
        [
          record.id,
          record.slug,
          record.name,
          record.description ?? null,
          serializeJson(record.schema),
          serializeJson(record.ui_schema),
          serializeJson(record.capabilities),
          record.icon ?? null,
          record.schema_version,
          serializeSchemaHistory(record.schema_history),
          record.status,
          record.environment_id,
          record.created_at,
          record.updated_at
        ],
        signal
      );
      return toContentType(result.rows[0]);
    } catch (error) {
      return rethrowConflict(error, 'content_type', `${record.environment_id}/${record.slug}`);
    }
  }

  async update(record: ContentType, signal?: AbortSignal): Promise<ContentType> {
    try {
      const result = await query<ContentTypeRow>(
        this.pool,
        `UPDATE content_types
         SET slug = $2, name = $3, description = $4, schema = $5, ui_schema = $6, capabilities = $7,
             icon = $8, schema_version = $9, schema_history = $10, status = $11, environment_id = $12,
             updated_at = $13
         WHERE id = $1
         RETURNING ${COLUMNS}`,
        [
          record.id,
          record.slug,
          record.name,
          record.description ?? null,
          serializeJson(record.schema),
          serializeJson(record.ui_schema),
          serializeJson(record.capabilities),
          record.icon ?? null,
          record.schema_version,
          serializeSchemaHistory(record.schema_history),
          record.status,
          record.environment_id,
          record.updated_at
        ],
        signal
      );
      if (result.rows.length === 0) throw new RepositoryNotFoundError('content_type', record.id);
      return toContentType(result.rows[0]);
    } catch (error) {
      return rethrowConflict(error, 'content_type', `${record.environment_id}/${record.slug}`);
    }
  }
}
