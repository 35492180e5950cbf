/**
 * Enums and Constants for Content Promotion
 */

/**
 * Lifecycle of a content type definition
 */
export enum ContentTypeStatus {
  DRAFT = 'draft',
  ACTIVE = 'active'
}

/**
 * Status of a single content version
 */
export enum VersionStatus {
  DRAFT = 'draft',
  PUBLISHED = 'published',
  ARCHIVED = 'archived'
}

/**
 * Status of a content entry, derived from its versions
 */
export enum ContentEntryStatus {
  DRAFT = 'draft',
  PUBLISHED = 'published',
  ARCHIVED = 'archived'
}

/**
 * Outcome of promoting one item
 */
export enum PromotionStatus {
  CREATED = 'created',
  UPDATED = 'updated',
  SKIPPED = 'skipped',
  FAILED = 'failed'
}

/**
 * Conflict handling for content entry promotion
 */
export enum PromotionMode {
  STRICT = 'strict',
  UPSERT = 'upsert'
}

/**
 * Scope of a whole-environment promotion
 */
export enum PromotionScope {
  CONTENT_TYPES = 'content_types',
  CONTENT_ENTRIES = 'content_entries',
  ALL = 'all'
}

export enum PromotionKind {
  CONTENT_TYPE = 'content_type',
  CONTENT_ENTRY = 'content_entry'
}

/**
 * Semantic impact of a schema change
 */
export enum ChangeLevel {
  NONE = 'none',
  PATCH = 'patch',
  MINOR = 'minor',
  MAJOR = 'major'
}

/**
 * Error codes for standardized error handling
 */
export enum PromotionErrorCode {
  INVALID_FORMAT = 'INVALID_FORMAT',
  DUPLICATE_MIGRATION = 'DUPLICATE_MIGRATION',
  NO_MIGRATION_PATH = 'NO_MIGRATION_PATH',
  MIGRATION_FAILED = 'MIGRATION_FAILED',
  ENVIRONMENT_NOT_FOUND = 'ENVIRONMENT_NOT_FOUND',
  CONTENT_TYPE_REQUIRED = 'CONTENT_TYPE_REQUIRED',
  CONTENT_TYPE_ENVIRONMENT_MISMATCH = 'CONTENT_TYPE_ENVIRONMENT_MISMATCH',
  CONTENT_ENVIRONMENT_MISMATCH = 'CONTENT_ENVIRONMENT_MISMATCH',
  CONTENT_TYPE_REQUIRED_FOR_SLUGS = 'CONTENT_TYPE_REQUIRED_FOR_SLUGS',
  CONTENT_TYPE_FILTER_MISMATCH = 'CONTENT_TYPE_FILTER_MISMATCH',
  CONTENT_TYPE_INACTIVE = 'CONTENT_TYPE_INACTIVE',
  TARGET_AHEAD_OF_SOURCE = 'TARGET_AHEAD_OF_SOURCE',
  BREAKING_SCHEMA_CHANGE = 'BREAKING_SCHEMA_CHANGE',
  SCHEMA_MIGRATION_REQUIRED = 'SCHEMA_MIGRATION_REQUIRED',
  SCHEMA_INVALID = 'SCHEMA_INVALID',
  SLUG_EXISTS = 'SLUG_EXISTS',
  UNKNOWN_LOCALE = 'UNKNOWN_LOCALE',
  CONTENT_VERSION_REQUIRED = 'CONTENT_VERSION_REQUIRED',
  VERSION_CONFLICT = 'VERSION_CONFLICT',
  VERSIONING_DISABLED = 'VERSIONING_DISABLED',
  BLOCK_DEFINITION_NOT_FOUND = 'BLOCK_DEFINITION_NOT_FOUND',
  BLOCK_SERVICE_REQUIRED = 'BLOCK_SERVICE_REQUIRED',
  NOT_FOUND = 'NOT_FOUND',
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  CANCELLED = 'CANCELLED',
  INTERNAL_ERROR = 'INTERNAL_ERROR'
}

/**
 * Reserved key carrying the schema-version tag inside serialized payloads
 */
export const SCHEMA_TAG_KEY = '_schema';

/**
 * Key holding embedded block instances inside a translation payload
 */
export const EMBEDDED_BLOCKS_KEY = 'blocks';

export const DEFAULT_ENVIRONMENT_KEY = 'default';
