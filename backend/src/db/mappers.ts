/**
 * Row <-> record conversion for the PostgreSQL repositories
 *
 * JSONB columns arrive already parsed; they are checked against the JSON
 * document type before they reach domain code.
 */

import {
  ContentSnapshot,
  ContentTypeStatus,
  JsonObject,
  JsonValue,
  RepositoryConflictError,
  SchemaSnapshot,
  TranslationSnapshot,
  getArray,
  getString,
  isJsonObject,
  isJsonValue
} from '../types/content';

const UNIQUE_VIOLATION = '23505';

export function toJsonObject(value: unknown): JsonObject {
  return isJsonValue(value) && isJsonObject(value) ? value : {};
}

export function toOptionalJsonObject(value: unknown): JsonObject | null {
  return isJsonValue(value) && isJsonObject(value) ? value : null;
}

export function toContentTypeStatus(value: string): ContentTypeStatus {
  return value === ContentTypeStatus.ACTIVE ? ContentTypeStatus.ACTIVE : ContentTypeStatus.DRAFT;
}

function toDate(value: JsonValue | undefined): Date {
  return typeof value === 'string' ? new Date(value) : new Date(0);
}

export function parseSchemaHistory(value: unknown): SchemaSnapshot[] {
  if (!isJsonValue(value) || !Array.isArray(value)) return [];
  return value.filter(isJsonObject).map((entry) => ({
    version: getString(entry, 'version') ?? '',
    schema: toJsonObject(entry.schema),
    ui_schema: toOptionalJsonObject(entry.ui_schema),
    capabilities: toOptionalJsonObject(entry.capabilities),
    status: toContentTypeStatus(getString(entry, 'status') ?? ''),
    updated_at: toDate(entry.updated_at),
    updated_by: getString(entry, 'updated_by') ?? null
  }));
}

export function serializeSchemaHistory(history: SchemaSnapshot[]): string {
  return JSON.stringify(
    history.map((entry) => ({
      ...entry,
      updated_at: entry.updated_at.toISOString()
    }))
  );
}

export function parseSnapshot(value: unknown): ContentSnapshot {
  const doc = toJsonObject(value);
  const translations: TranslationSnapshot[] = (getArray(doc, 'translations') ?? [])
    .filter(isJsonObject)
    .map((entry) => ({
      locale: getString(entry, 'locale') ?? '',
      title: getString(entry, 'title') ?? '',
      summary: getString(entry, 'summary') ?? null,
      content: toJsonObject(entry.content)
    }));

  const snapshot: ContentSnapshot = { translations };
  const fields = toOptionalJsonObject(doc.fields);
  if (fields) snapshot.fields = fields;
  const metadata = toOptionalJsonObject(doc.metadata);
  if (metadata) snapshot.metadata = metadata;
  return snapshot;
}

export function serializeJson(value: JsonObject | null | undefined): string | null {
  return value ? JSON.stringify(value) : null;
}

export function isUniqueViolation(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === UNIQUE_VIOLATION;
}

/**
 * Rethrow a unique violation as a repository conflict
 */
export function rethrowConflict(error: unknown, resource: string, key: string): never {
  if (isUniqueViolation(error)) {
    throw new RepositoryConflictError(resource, key);
  }
  throw error;
}
