/**
 * Schema-level metadata stored under the `metadata` key of a schema document
 *
 * Holds the schema slug, its version tag, UI overlay references and the
 * block availability lists. Reading and writing it never touches the other
 * keys of the schema.
 */

import {
  JsonObject,
  JsonValue,
  SchemaVersionError,
  cloneJson,
  getObject,
  isJsonObject
} from '../types/content';
import { SchemaVersion } from './schemaVersion';

const METADATA_KEY = 'metadata';
const SLUG_KEY = 'slug';
const VERSION_KEY = 'schema_version';
const UI_OVERLAYS_KEY = 'ui_overlays';
const BLOCK_AVAILABILITY_KEY = 'block_availability';

export interface BlockAvailability {
  allow: string[];
  deny: string[];
}

export interface SchemaMetadata {
  slug: string;
  schema_version: string;
  ui_overlays: string[];
  block_availability: BlockAvailability;
}

export function emptyBlockAvailability(): BlockAvailability {
  return { allow: [], deny: [] };
}

export function isBlockAvailabilityEmpty(availability: BlockAvailability): boolean {
  return availability.allow.length === 0 && availability.deny.length === 0;
}

const normalizeToken = (value: string): string => value.trim().toLowerCase();

/**
 * Whether a block slug may be used under the availability rules.
 * Deny wins; an empty allow list allows everything not denied.
 */
export function blockAvailabilityAllows(availability: BlockAvailability, slug: string): boolean {
  const candidate = normalizeToken(slug);
  if (candidate === '') return false;
  if (availability.deny.some((entry) => normalizeToken(entry) === candidate)) return false;
  if (availability.allow.length === 0) return true;
  return availability.allow.some((entry) => normalizeToken(entry) === candidate);
}

function readStringList(value: JsonValue | undefined): string[] {
  if (!Array.isArray(value)) return [];

  const out: string[] = [];
  for (const entry of value) {
    if (typeof entry === 'string') {
      const trimmed = entry.trim();
      if (trimmed !== '') out.push(trimmed);
      continue;
    }
    if (isJsonObject(entry)) {
      for (const key of ['ref', 'path']) {
        const ref = entry[key];
        if (typeof ref === 'string' && ref.trim() !== '') {
          out.push(ref.trim());
        }
      }
    }
  }
  return out;
}

function dedupe(values: string[]): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const value of values) {
    const key = normalizeToken(value);
    if (key === '' || seen.has(key)) continue;
    seen.add(key);
    out.push(value.trim());
  }
  return out;
}

function readBlockAvailability(value: JsonValue | undefined): BlockAvailability {
  if (value === undefined || value === null) return emptyBlockAvailability();

  // a bare list is an allow list
  const list = readStringList(value);
  if (list.length > 0) {
    return { allow: dedupe(list), deny: [] };
  }

  if (!isJsonObject(value)) return emptyBlockAvailability();

  let allow = readStringList(value.allow);
  if (allow.length === 0) allow = readStringList(value.allowed);
  let deny = readStringList(value.deny);
  if (deny.length === 0) deny = readStringList(value.denied);

  return { allow: dedupe(allow), deny: dedupe(deny) };
}

/**
 * Read the metadata object of a schema document
 */
export function extractMetadata(schema: JsonObject | null | undefined): SchemaMetadata {
  const meta: SchemaMetadata = {
    slug: '',
    schema_version: '',
    ui_overlays: [],
    block_availability: emptyBlockAvailability()
  };

  const raw = getObject(schema, METADATA_KEY);
  if (!raw) return meta;

  const slug = raw[SLUG_KEY];
  if (typeof slug === 'string') meta.slug = slug.trim();

  const version = raw[VERSION_KEY];
  if (typeof version === 'string') meta.schema_version = version.trim();

  meta.ui_overlays = readStringList(raw[UI_OVERLAYS_KEY]);
  meta.block_availability = readBlockAvailability(raw[BLOCK_AVAILABILITY_KEY]);
  return meta;
}

/**
 * Write metadata fields onto a copy of the schema. Empty fields leave the
 * existing values in place; unrelated schema and metadata keys are kept.
 */
export function applyMetadata(schema: JsonObject, meta: Partial<SchemaMetadata>): JsonObject {
  const out = cloneJson(schema);
  const existing = getObject(out, METADATA_KEY);
  const target: JsonObject = existing ? existing : {};

  const slug = meta.slug?.trim();
  if (slug) target[SLUG_KEY] = slug;

  const version = meta.schema_version?.trim();
  if (version) target[VERSION_KEY] = version;

  if (meta.ui_overlays && meta.ui_overlays.length > 0) {
    target[UI_OVERLAYS_KEY] = [...meta.ui_overlays];
  }

  const availability = meta.block_availability;
  if (availability && !isBlockAvailabilityEmpty(availability)) {
    const value: JsonObject = {};
    if (availability.allow.length > 0) value.allow = [...availability.allow];
    if (availability.deny.length > 0) value.deny = [...availability.deny];
    target[BLOCK_AVAILABILITY_KEY] = value;
  }

  out[METADATA_KEY] = target;
  return out;
}

export interface EnsuredSchema {
  schema: JsonObject;
  version: SchemaVersion;
}

/**
 * Make sure a schema carries a version tag.
 *
 * Untagged schemas get `slug@v1.0.0`. A tagged schema must parse and, when a
 * slug is given, name the same slug. Calling it again on the result returns
 * an equal document.
 */
export function ensureSchemaVersion(schema: JsonObject, slug: string): EnsuredSchema {
  const meta = extractMetadata(schema);
  let normalizedSlug = slug.trim();

  if (meta.slug === '' && normalizedSlug !== '') {
    meta.slug = normalizedSlug;
  }

  if (meta.schema_version !== '') {
    let version = SchemaVersion.parse(meta.schema_version);
    if (version.slug === '') {
      if (normalizedSlug === '') {
        throw new SchemaVersionError('invalid schema version: slug required', { schema_version: meta.schema_version });
      }
      version = version.withSlug(normalizedSlug);
    }
    if (normalizedSlug !== '' && version.slug !== normalizedSlug) {
      throw new SchemaVersionError('invalid schema version: slug mismatch', {
        expected: normalizedSlug,
        actual: version.slug
      });
    }
    if (normalizedSlug === '') {
      normalizedSlug = version.slug;
    }
    return {
      schema: applyMetadata(schema, { ...meta, slug: meta.slug || normalizedSlug, schema_version: version.toString() }),
      version
    };
  }

  if (normalizedSlug === '') {
    throw new SchemaVersionError('invalid schema version: slug required');
  }

  const version = SchemaVersion.initial(normalizedSlug);
  return {
    schema: applyMetadata(schema, { ...meta, schema_version: version.toString() }),
    version
  };
}

/**
 * Schema copy with the version tag overwritten, used when a record's own
 * `schema_version` column is authoritative
 */
export function stampSchemaVersion(schema: JsonObject, slug: string, version: string): JsonObject {
  const meta = extractMetadata(schema);
  return applyMetadata(schema, { ...meta, slug, schema_version: version });
}

/**
 * Block slugs named by a schema's availability rules: the allow list, or the
 * deny list when nothing is allowed explicitly
 */
export function extractBlockSlugs(schema: JsonObject): string[] {
  const { block_availability: availability } = extractMetadata(schema);
  if (availability.allow.length > 0) return [...availability.allow];
  if (availability.deny.length > 0) return [...availability.deny];
  return [];
}

/**
 * Versioned schema of a content type. A parsable `schema_version` column wins
 * over the tag inside the schema document.
 */
export function normalizeContentTypeSchema(type: { slug: string; schema: JsonObject; schema_version?: string | null }): EnsuredSchema {
  const column = SchemaVersion.tryParse(type.schema_version);
  const schema = column
    ? stampSchemaVersion(type.schema, type.slug, column.withSlug(type.slug).toString())
    : type.schema;
  return ensureSchemaVersion(schema, type.slug);
}
