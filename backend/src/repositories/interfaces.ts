/**
 * Storage contracts consumed by the promotion services
 *
 * Lookups throw RepositoryNotFoundError when the record is absent. Creates
 * are atomic per (environment_id, slug) and throw RepositoryConflictError on
 * a duplicate. Every method honours an optional AbortSignal.
 */

import {
  ActivityEvent,
  BlockDefinition,
  ContentEntry,
  ContentType,
  ContentVersion,
  Environment,
  Locale,
  RegisterBlockDefinitionInput,
  UpdateBlockDefinitionInput
} from '../types/content';

export interface ContentTypeRepository {
  getById(id: string, signal?: AbortSignal): Promise<ContentType>;
  getBySlug(slug: string, environmentId: string, signal?: AbortSignal): Promise<ContentType>;
  list(environmentId: string, signal?: AbortSignal): Promise<ContentType[]>;
  create(record: ContentType, signal?: AbortSignal): Promise<ContentType>;
  update(record: ContentType, signal?: AbortSignal): Promise<ContentType>;
}

/**
 * Everything a single entry promotion persists. `entry` carries the target
 * translations; `versions` are inserted in order and `archive` rewrites
 * existing versions.
 */
export interface EntryPromotionWrite {
  entry: ContentEntry;
  create: boolean;
  versions: ContentVersion[];
  archive: ContentVersion[];
}

export interface ContentRepository {
  getById(id: string, signal?: AbortSignal): Promise<ContentEntry>;
  getBySlug(slug: string, contentTypeId: string, environmentId: string, signal?: AbortSignal): Promise<ContentEntry>;
  list(environmentId: string, signal?: AbortSignal): Promise<ContentEntry[]>;
  create(record: ContentEntry, signal?: AbortSignal): Promise<ContentEntry>;
  update(record: ContentEntry, signal?: AbortSignal): Promise<ContentEntry>;
  listVersions(contentId: string, signal?: AbortSignal): Promise<ContentVersion[]>;
  getVersion(contentId: string, version: number, signal?: AbortSignal): Promise<ContentVersion>;
  getLatestVersion(contentId: string, signal?: AbortSignal): Promise<ContentVersion>;
  createVersion(record: ContentVersion, signal?: AbortSignal): Promise<ContentVersion>;
  updateVersion(record: ContentVersion, signal?: AbortSignal): Promise<ContentVersion>;
  /**
   * Apply a promotion write as one unit. The signal is checked before the
   * first write only; a failure leaves nothing behind.
   */
  applyPromotion(write: EntryPromotionWrite, signal?: AbortSignal): Promise<ContentEntry>;
}

export interface LocaleRepository {
  getByCode(code: string, signal?: AbortSignal): Promise<Locale>;
}

export interface EnvironmentRepository {
  getById(id: string, signal?: AbortSignal): Promise<Environment>;
  getByKey(key: string, signal?: AbortSignal): Promise<Environment>;
  list(signal?: AbortSignal): Promise<Environment[]>;
  create(record: Environment, signal?: AbortSignal): Promise<Environment>;
  update(record: Environment, signal?: AbortSignal): Promise<Environment>;
}

/**
 * Block definition store, keyed by environment key
 */
export interface BlockDefinitionService {
  listDefinitions(environmentKey: string, signal?: AbortSignal): Promise<BlockDefinition[]>;
  registerDefinition(input: RegisterBlockDefinitionInput, signal?: AbortSignal): Promise<BlockDefinition>;
  updateDefinition(input: UpdateBlockDefinitionInput, signal?: AbortSignal): Promise<BlockDefinition>;
}

/**
 * Destination of activity events (audit log, feed, queue)
 */
export interface ActivitySink {
  record(event: ActivityEvent): Promise<void>;
}
