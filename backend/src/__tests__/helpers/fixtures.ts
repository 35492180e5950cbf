/**
 * Test fixtures: an in-memory world with two environments and a few locales
 */

import {
  ContentEntry,
  ContentEntryStatus,
  ContentType,
  ContentTypeStatus,
  Environment,
  JsonObject,
  SCHEMA_TAG_KEY,
  SchemaSnapshot,
  TranslationSnapshot,
  VersionStatus
} from '../../types/content';
import { MemoryStores, createMemoryStores } from '../../engine';
import { EnvironmentService } from '../../services/EnvironmentService';
import { IdGenerator } from '../../utils/ids';
import { stampSchemaVersion } from '../../utils/schemaMetadata';
import { unwrap } from '../../utils/serviceResponse';

export const FIXED_NOW = new Date('2026-03-01T12:00:00.000Z');
export const fixedClock = (): Date => new Date(FIXED_NOW);

export const EDITOR = 'editor-1';

/**
 * UUID-shaped ids in creation order: ...-000000000001, ...-000000000002
 */
export function sequentialIds(): IdGenerator {
  let counter = 0;
  return () => {
    counter += 1;
    return `00000000-0000-4000-8000-${counter.toString().padStart(12, '0')}`;
  };
}

export interface World {
  stores: MemoryStores;
  environments: EnvironmentService;
  ids: IdGenerator;
  staging: Environment;
  production: Environment;
}

export async function createWorld(): Promise<World> {
  const ids = sequentialIds();
  const stores = createMemoryStores([
    { id: 'locale-en', code: 'en', display_name: 'English', is_active: true },
    { id: 'locale-fr', code: 'fr', display_name: 'French', is_active: true },
    { id: 'locale-de', code: 'de', display_name: 'German', is_active: false }
  ]);
  const environments = new EnvironmentService(stores.environments, { now: fixedClock, idGenerator: ids });
  const staging = unwrap(await environments.createEnvironment({ key: 'staging', is_default: true }));
  const production = unwrap(await environments.createEnvironment({ key: 'production' }));
  return { stores, environments, ids, staging, production };
}

/**
 * Payload carrying a schema-version tag
 */
export function tagged(version: string, payload: JsonObject): JsonObject {
  return { ...payload, [SCHEMA_TAG_KEY]: version };
}

export function translation(locale: string, content: JsonObject, title = 'Untitled'): TranslationSnapshot {
  return { locale, title, summary: null, content };
}

export interface SeedContentTypeInput {
  slug: string;
  schema: JsonObject;
  version?: string;
  status?: ContentTypeStatus;
  history?: SchemaSnapshot[];
}

export async function seedContentType(world: World, env: Environment, input: SeedContentTypeInput): Promise<ContentType> {
  const version = input.version ?? `${input.slug}@v1.0.0`;
  return world.stores.contentTypes.create({
    id: world.ids(),
    slug: input.slug,
    name: input.slug,
    description: null,
    schema: stampSchemaVersion(input.schema, input.slug, version),
    ui_schema: null,
    capabilities: null,
    icon: null,
    schema_version: version,
    schema_history: input.history ?? [],
    status: input.status ?? ContentTypeStatus.ACTIVE,
    environment_id: env.id,
    created_at: FIXED_NOW,
    updated_at: FIXED_NOW
  });
}

export interface SeedVersionInput {
  status: VersionStatus;
  translations: TranslationSnapshot[];
  metadata?: JsonObject;
}

/**
 * Entry with versions numbered 1..n in the given order
 */
export async function seedEntry(
  world: World,
  type: ContentType,
  slug: string,
  versions: SeedVersionInput[]
): Promise<ContentEntry> {
  const publishedIndex = versions.findIndex((version) => version.status === VersionStatus.PUBLISHED);
  const entry = await world.stores.contents.create({
    id: world.ids(),
    content_type_id: type.id,
    slug,
    current_version: versions.length,
    published_version: publishedIndex === -1 ? null : publishedIndex + 1,
    status: publishedIndex === -1 ? ContentEntryStatus.DRAFT : ContentEntryStatus.PUBLISHED,
    environment_id: type.environment_id,
    metadata: null,
    created_by: EDITOR,
    updated_by: EDITOR,
    created_at: FIXED_NOW,
    updated_at: FIXED_NOW,
    translations: []
  });

  for (const [index, version] of versions.entries()) {
    const published = version.status === VersionStatus.PUBLISHED;
    await world.stores.contents.createVersion({
      id: world.ids(),
      content_id: entry.id,
      version: index + 1,
      status: version.status,
      snapshot: version.metadata
        ? { translations: version.translations, metadata: version.metadata }
        : { translations: version.translations },
      created_by: EDITOR,
      created_at: FIXED_NOW,
      published_at: published ? FIXED_NOW : null,
      published_by: published ? EDITOR : null
    });
  }
  return world.stores.contents.getById(entry.id);
}

/**
 * Error thrown by a synchronous call
 */
export function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('expected the call to throw');
}
