// Public entry point of the content promotion engine

export * from './types/content';
export {
  PromotionEngine,
  PromotionEngineOptions,
  PromotionStores,
  MemoryStores,
  bootstrapPromotionEngine,
  createMemoryStores,
  createPgStores,
  createPromotionEngine
} from './engine';
export * from './repositories/interfaces';
export * from './repositories/memory';
export * from './db';
export { PromotionConfig, PromotionFeatures, DEFAULT_FEATURES, loadPromotionConfig } from './config/promotion';
export { ActivityEmitter, ActivityEmitterOptions, ACTIVITY_EVENT } from './services/ActivityEmitter';
export { ContentVersionService, ArchiveVersionInput } from './services/ContentVersionService';
export { EnvironmentService } from './services/EnvironmentService';
export { MigrationRegistry, MigrationEntry, MigrationTransform, SchemaMigrator } from './services/MigrationRegistry';
export { PromotionService, appendSchemaHistory } from './services/PromotionService';
export { SchemaVersion, bumpVersion, compareVersionStrings, normalizeVersionString } from './utils/schemaVersion';
export {
  SchemaMetadata,
  BlockAvailability,
  applyMetadata,
  blockAvailabilityAllows,
  ensureSchemaVersion,
  extractBlockSlugs,
  extractMetadata,
  normalizeContentTypeSchema
} from './utils/schemaMetadata';
export { CompatibilityResult, BreakingChange, checkSchemaCompatibility } from './utils/schemaCompatibility';
export { VersionedPayload, flattenPayload, unflattenPayload } from './utils/versionedPayload';
export { validatePayload, assertValidPayload } from './validation/contentSchema';
export { setLogLevel, LogLevel } from './utils/logger';
