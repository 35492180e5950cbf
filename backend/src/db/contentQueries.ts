import { Pool } from 'pg';
import {
  ContentEntry,
  ContentEntryStatus,
  ContentTranslation,
  ContentVersion,
  RepositoryNotFoundError,
  VersionStatus
} from '../types/content';
import { ContentRepository, EntryPromotionWrite } from '../repositories/interfaces';
import { Queryable, query, withTransaction } from '../utils/database';
import { throwIfCancelled } from '../utils/cancellation';
import { parseSnapshot, rethrowConflict, serializeJson, toJsonObject, toOptionalJsonObject } from './mappers';

interface ContentRow {
  id: string;
  content_type_id: string;
  slug: string;
  status: string;
  current_version: number;
  published_version: number | null;
  environment_id: string;
  metadata: unknown;
  created_by: string;
  updated_by: string;
  published_at: Date | null;
  published_by: string | null;
  created_at: Date;
  updated_at: Date;
}

interface TranslationRow {
  id: string;
  content_id: string;
  locale_id: string;
  locale_code: string;
  translation_group_id: string | null;
  title: string;
  summary: string | null;
  content: unknown;
  created_at: Date;
  updated_at: Date;
}

interface VersionRow {
  id: string;
  content_id: string;
  version: number;
  status: string;
  snapshot: unknown;
  created_by: string;
  created_at: Date;
  published_at: Date | null;
  published_by: string | null;
}

const CONTENT_COLUMNS = `id, content_type_id, slug, status, current_version, published_version, environment_id,
  metadata, created_by, updated_by, published_at, published_by, created_at, updated_at`;

const VERSION_COLUMNS = 'id, content_id, version, status, snapshot, created_by, created_at, published_at, published_by';

function toEntryStatus(value: string): ContentEntryStatus {
  const match = Object.values(ContentEntryStatus).find((status) => status === value);
  return match ?? ContentEntryStatus.DRAFT;
}

function toVersionStatus(value: string): VersionStatus {
  const match = Object.values(VersionStatus).find((status) => status === value);
  return match ?? VersionStatus.DRAFT;
}

function toContentEntry(row: ContentRow, translations: ContentTranslation[]): ContentEntry {
  return {
    id: row.id,
    content_type_id: row.content_type_id,
    slug: row.slug,
    status: toEntryStatus(row.status),
    current_version: row.current_version,
    published_version: row.published_version,
    environment_id: row.environment_id,
    metadata: toOptionalJsonObject(row.metadata),
    created_by: row.created_by,
    updated_by: row.updated_by,
    published_at: row.published_at,
    published_by: row.published_by,
    created_at: row.created_at,
    updated_at: row.updated_at,
    translations
  };
}

function toTranslation(row: TranslationRow): ContentTranslation {
  return {
    id: row.id,
    content_id: row.content_id,
    locale_id: row.locale_id,
    locale: row.locale_code,
    translation_group_id: row.translation_group_id,
    title: row.title,
    summary: row.summary,
    content: toJsonObject(row.content),
    created_at: row.created_at,
    updated_at: row.updated_at
  };
}

function toContentVersion(row: VersionRow): ContentVersion {
  return {
    id: row.id,
    content_id: row.content_id,
    version: row.version,
    status: toVersionStatus(row.status),
    snapshot: parseSnapshot(row.snapshot),
    created_by: row.created_by,
    created_at: row.created_at,
    published_at: row.published_at,
    published_by: row.published_by
  };
}

async function insertTranslations(db: Queryable, contentId: string, translations: ContentTranslation[]): Promise<void> {
  for (const tr of translations) {
    await db.query(
      `INSERT INTO content_translations
         (id, content_id, locale_id, translation_group_id, title, summary, content, created_at, updated_at)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)`,
      [
        tr.id,
        contentId,
        tr.locale_id,
        tr.translation_group_id ?? null,
        tr.title,
        tr.summary ?? null,
        serializeJson(tr.content),
        tr.created_at,
        tr.updated_at
      ]
    );
  }
}

async function insertContent(db: Queryable, record: ContentEntry): Promise<void> {
  await db.query(
    `INSERT INTO contents (${CONTENT_COLUMNS})
     VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14)`,
    [
      record.id,
      record.content_type_id,
      record.slug,
      record.status,
      record.current_version,
      record.published_version ?? null,
      record.environment_id,
      serializeJson(record.metadata),
      record.created_by,
      record.updated_by,
      record.published_at ?? null,
      record.published_by ?? null,
      record.created_at,
      record.updated_at
    ]
  );
}

async function updateContent(db: Queryable, record: ContentEntry): Promise<ContentRow> {
  const result = await db.query<ContentRow>(
    `UPDATE contents
     SET content_type_id = $2, slug = $3, status = $4, current_version = $5, published_version = $6,
         environment_id = $7, metadata = $8, updated_by = $9, published_at = $10, published_by = $11,
         updated_at = $12
     WHERE id = $1
     RETURNING ${CONTENT_COLUMNS}`,
    [
      record.id,
      record.content_type_id,
      record.slug,
      record.status,
      record.current_version,
      record.published_version ?? null,
      record.environment_id,
      serializeJson(record.metadata),
      record.updated_by,
      record.published_at ?? null,
      record.published_by ?? null,
      record.updated_at
    ]
  );
  if (result.rows.length === 0) throw new RepositoryNotFoundError('content', record.id);
  return result.rows[0];
}

async function insertVersion(db: Queryable, record: ContentVersion): Promise<VersionRow> {
  const result = await db.query<VersionRow>(
    `INSERT INTO content_versions (${VERSION_COLUMNS})
     VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)
     RETURNING ${VERSION_COLUMNS}`,
    [
      record.id,
      record.content_id,
      record.version,
      record.status,
      JSON.stringify(record.snapshot),
      record.created_by,
      record.created_at,
      record.published_at ?? null,
      record.published_by ?? null
    ]
  );
  return result.rows[0];
}

async function updateVersion(db: Queryable, record: ContentVersion): Promise<VersionRow> {
  const result = await db.query<VersionRow>(
    `UPDATE content_versions
     SET status = $3, snapshot = $4, published_at = $5, published_by = $6
     WHERE content_id = $1 AND version = $2
     RETURNING ${VERSION_COLUMNS}`,
    [
      record.content_id,
      record.version,
      record.status,
      JSON.stringify(record.snapshot),
      record.published_at ?? null,
      record.published_by ?? null
    ]
  );
  if (result.rows.length === 0) throw new RepositoryNotFoundError('content_version', `${record.content_id}@${record.version}`);
  return result.rows[0];
}

export class PgContentRepository implements ContentRepository {
  constructor(private pool: Pool) {}

  async getById(id: string, signal?: AbortSignal): Promise<ContentEntry> {
    const result = await query<ContentRow>(this.pool, `SELECT ${CONTENT_COLUMNS} FROM contents WHERE id = $1`, [id], signal);
    if (result.rows.length === 0) throw new RepositoryNotFoundError('content', id);
    return toContentEntry(result.rows[0], await this.loadTranslations(id, signal));
  }

  async getBySlug(slug: string, contentTypeId: string, environmentId: string, signal?: AbortSignal): Promise<ContentEntry> {
    const result = await query<ContentRow>(
      this.pool,
      `SELECT ${CONTENT_COLUMNS} FROM contents
       WHERE environment_id = $1 AND content_type_id = $2 AND lower(slug) = lower($3)`,
      [environmentId, contentTypeId, slug],
      signal
    );
    if (result.rows.length === 0) throw new RepositoryNotFoundError('content', `${environmentId}/${slug}`);
    const row = result.rows[0];
    return toContentEntry(row, await this.loadTranslations(row.id, signal));
  }

  async list(environmentId: string, signal?: AbortSignal): Promise<ContentEntry[]> {
    const result = await query<ContentRow>(
      this.pool,
      `SELECT ${CONTENT_COLUMNS} FROM contents WHERE environment_id = $1 ORDER BY slug, id`,
      [environmentId],
      signal
    );
    return result.rows.map((row) => toContentEntry(row, []));
  }

  async create(record: ContentEntry, signal?: AbortSignal): Promise<ContentEntry> {
    throwIfCancelled(signal);
    try {
      await withTransaction(this.pool, async (client) => {
        await insertContent(client, record);
        await insertTranslations(client, record.id, record.translations ?? []);
      });
    } catch (error) {
      return rethrowConflict(error, 'content', `${record.environment_id}/${record.slug}`);
    }
    return this.getById(record.id, signal);
  }

  async update(record: ContentEntry, signal?: AbortSignal): Promise<ContentEntry> {
    try {
      throwIfCancelled(signal);
      const row = await updateContent(this.pool, record);
      return toContentEntry(row, await this.loadTranslations(record.id, signal));
    } catch (error) {
      return rethrowConflict(error, 'content', `${record.environment_id}/${record.slug}`);
    }
  }

  async listVersions(contentId: string, signal?: AbortSignal): Promise<ContentVersion[]> {
    const result = await query<VersionRow>(
      this.pool,
      `SELECT ${VERSION_COLUMNS} FROM content_versions WHERE content_id = $1 ORDER BY version ASC`,
      [contentId],
      signal
    );
    return result.rows.map(toContentVersion);
  }

  async getVersion(contentId: string, version: number, signal?: AbortSignal): Promise<ContentVersion> {
    const result = await query<VersionRow>(
      this.pool,
      `SELECT ${VERSION_COLUMNS} FROM content_versions WHERE content_id = $1 AND version = $2`,
      [contentId, version],
      signal
    );
    if (result.rows.length === 0) throw new RepositoryNotFoundError('content_version', `${contentId}@${version}`);
    return toContentVersion(result.rows[0]);
  }

  async getLatestVersion(contentId: string, signal?: AbortSignal): Promise<ContentVersion> {
    const result = await query<VersionRow>(
      this.pool,
      `SELECT ${VERSION_COLUMNS} FROM content_versions WHERE content_id = $1 ORDER BY version DESC LIMIT 1`,
      [contentId],
      signal
    );
    if (result.rows.length === 0) throw new RepositoryNotFoundError('content_version', `${contentId}@latest`);
    return toContentVersion(result.rows[0]);
  }

  async createVersion(record: ContentVersion, signal?: AbortSignal): Promise<ContentVersion> {
    try {
      throwIfCancelled(signal);
      return toContentVersion(await insertVersion(this.pool, record));
    } catch (error) {
      return rethrowConflict(error, 'content_version', `${record.content_id}@${record.version}`);
    }
  }

  async updateVersion(record: ContentVersion, signal?: AbortSignal): Promise<ContentVersion> {
    throwIfCancelled(signal);
    return toContentVersion(await updateVersion(this.pool, record));
  }

  async applyPromotion(write: EntryPromotionWrite, signal?: AbortSignal): Promise<ContentEntry> {
    const { entry } = write;
    throwIfCancelled(signal);
    try {
      await withTransaction(this.pool, async (client) => {
        if (write.create) {
          await insertContent(client, entry);
        } else {
          await updateContent(client, entry);
          await client.query('DELETE FROM content_translations WHERE content_id = $1', [entry.id]);
        }
        await insertTranslations(client, entry.id, entry.translations ?? []);
        for (const version of write.versions) {
          await insertVersion(client, version);
        }
        for (const version of write.archive) {
          await updateVersion(client, version);
        }
      });
    } catch (error) {
      return rethrowConflict(error, 'content', `${entry.environment_id}/${entry.slug}`);
    }
    // committed: the read-back no longer observes the signal
    return this.getById(entry.id);
  }

  private async loadTranslations(contentId: string, signal?: AbortSignal): Promise<ContentTranslation[]> {
    const result = await query<TranslationRow>(
      this.pool,
      `SELECT ct.id, ct.content_id, ct.locale_id, l.code AS locale_code, ct.translation_group_id,
              ct.title, ct.summary, ct.content, ct.created_at, ct.updated_at
       FROM content_translations ct
       JOIN locales l ON l.id = ct.locale_id
       WHERE ct.content_id = $1
       ORDER BY l.code`,
      [contentId],
      signal
    );
    return result.rows.map(toTranslation);
  }
}
