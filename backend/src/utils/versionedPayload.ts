/**
 * Boundary between stored payloads and domain payloads
 *
 * Stored translation payloads embed their schema-version tag under the
 * reserved `_schema` key. Domain code works on `VersionedPayload` instead, so
 * the tag never mixes with user fields: `payload` is always tag-free and the
 * tag is only written back by `flattenPayload`.
 */

import {
  ContentSnapshot,
  JsonObject,
  SCHEMA_TAG_KEY,
  TranslationSnapshot,
  cloneJson
} from '../types/content';
import { SchemaVersion } from './schemaVersion';

export interface VersionedPayload {
  schemaVersion: SchemaVersion | null;
  payload: JsonObject;
}

/**
 * Copy of a payload without the version tag
 */
export function stripSchemaTag(payload: JsonObject | null | undefined): JsonObject {
  if (!payload) return {};
  const clean = cloneJson(payload);
  delete clean[SCHEMA_TAG_KEY];
  return clean;
}

/**
 * Read the version tag of a stored payload. Unparsable tags read as absent.
 */
export function readSchemaTag(payload: JsonObject | null | undefined): SchemaVersion | null {
  if (!payload) return null;
  const tag = payload[SCHEMA_TAG_KEY];
  return typeof tag === 'string' ? SchemaVersion.tryParse(tag) : null;
}

/**
 * Split a stored payload into its tag and its tag-free content
 */
export function unflattenPayload(stored: JsonObject | null | undefined): VersionedPayload {
  return {
    schemaVersion: readSchemaTag(stored),
    payload: stripSchemaTag(stored)
  };
}

/**
 * Serialize a domain payload, embedding its tag
 */
export function flattenPayload(value: VersionedPayload): JsonObject {
  const out = stripSchemaTag(value.payload);
  if (value.schemaVersion) {
    out[SCHEMA_TAG_KEY] = value.schemaVersion.toString();
  }
  return out;
}

/**
 * Re-tag a stored payload with a version
 */
export function applySchemaTag(stored: JsonObject | null | undefined, version: SchemaVersion): JsonObject {
  return flattenPayload({ schemaVersion: version, payload: stripSchemaTag(stored) });
}

export function cloneSnapshot(snapshot: ContentSnapshot): ContentSnapshot {
  const cloned: ContentSnapshot = {
    translations: snapshot.translations.map((tr: TranslationSnapshot) => ({
      locale: tr.locale,
      title: tr.title,
      summary: tr.summary ?? null,
      content: cloneJson(tr.content ?? {})
    }))
  };
  if (snapshot.fields) cloned.fields = cloneJson(snapshot.fields);
  if (snapshot.metadata) cloned.metadata = cloneJson(snapshot.metadata);
  return cloned;
}

/**
 * Version a snapshot was authored against: the first tagged translation,
 * then the `fields` document
 */
export function snapshotSchemaVersion(snapshot: ContentSnapshot): SchemaVersion | null {
  for (const tr of snapshot.translations) {
    const version = readSchemaTag(tr.content);
    if (version) return version;
  }
  return readSchemaTag(snapshot.fields);
}

/**
 * Copy of a snapshot with every translation tagged with `version`
 */
export function applySnapshotSchemaVersion(snapshot: ContentSnapshot, version: SchemaVersion): ContentSnapshot {
  const updated = cloneSnapshot(snapshot);
  updated.translations = updated.translations.map((tr) => ({
    ...tr,
    content: applySchemaTag(tr.content, version)
  }));
  return updated;
}
