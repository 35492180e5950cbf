/**
 * PromotionService - copies content types and content entries between
 * environments
 *
 * Content types are matched across environments by slug. Promoting a type
 * carries its schema, appends to its schema history and promotes the block
 * definitions its schema allow-lists. Promoting an entry picks a source
 * version, brings its payloads to the target type's schema version and
 * writes it as a new version of the target entry.
 *
 * The service keeps no state between calls. Each public operation returns a
 * ServiceResponse; per-item failures of an environment promotion are
 * collected in the result instead of failing the call.
 */

import {
  BlockDefinition,
  ContentEntry,
  ContentEntryStatus,
  ContentSnapshot,
  ContentTranslation,
  ContentType,
  ContentTypeStatus,
  ContentVersion,
  Environment,
  JsonObject,
  MigrationError,
  PromoteContentEntryRequest,
  PromoteContentTypeRequest,
  PromoteEnvironmentRequest,
  PromoteEnvironmentResult,
  PromoteItem,
  PromoteSummaryCounts,
  PromotionContext,
  PromotionError,
  PromotionErrorCode,
  PromotionKind,
  PromotionMode,
  PromotionScope,
  PromotionStatus,
  RepositoryConflictError,
  RepositoryNotFoundError,
  ResolvedPromoteOptions,
  SchemaSnapshot,
  ServiceResponse,
  VersionStatus,
  cloneJson,
  errorCodeOf,
  errorMessage
} from '../types/content';
import {
  BlockDefinitionService,
  ContentRepository,
  ContentTypeRepository,
  EntryPromotionWrite,
  LocaleRepository
} from '../repositories/interfaces';
import { DEFAULT_FEATURES, PromotionFeatures } from '../config/promotion';
import { withSpan } from '../config/telemetry';
import { throwIfCancelled } from '../utils/cancellation';
import { Clock, IdGenerator, isUuid, newId, systemClock } from '../utils/ids';
import { checkSchemaCompatibility } from '../utils/schemaCompatibility';
import { ensureSchemaVersion, extractBlockSlugs, normalizeContentTypeSchema } from '../utils/schemaMetadata';
import { SchemaVersion, compareVersionStrings } from '../utils/schemaVersion';
import { normalizeKey } from '../utils/slug';
import { fail, ok, unwrap } from '../utils/serviceResponse';
import { applySnapshotSchemaVersion, cloneSnapshot, snapshotSchemaVersion } from '../utils/versionedPayload';
import { createLogger } from '../utils/logger';
import { promotionSchemas, resolveOptions, validateRequest } from '../validation/promotions';
import { ActivityEmitter } from './ActivityEmitter';
import { EnvironmentService } from './EnvironmentService';
import { SchemaMigrator } from './MigrationRegistry';
import { migrateSnapshot } from './snapshotMigration';

const log = createLogger('PromotionService');

export interface PromotionServiceDeps {
  contentTypes: ContentTypeRepository;
  contents: ContentRepository;
  locales: LocaleRepository;
  environments: EnvironmentService;
  blocks?: BlockDefinitionService;
  migrator?: SchemaMigrator;
  activity?: ActivityEmitter;
}

export interface PromotionServiceOptions {
  defaultEnvironmentKey?: string;
  features?: Partial<PromotionFeatures>;
  now?: Clock;
  idGenerator?: IdGenerator;
}

interface BlockPromotion {
  created: string[];
  updated: string[];
}

const emptyCounts = (): PromoteSummaryCounts => ({ created: 0, updated: 0, skipped: 0, failed: 0 });

/**
 * Resolve a lookup, mapping a missing record to null
 */
async function orNull<T>(pending: Promise<T>): Promise<T | null> {
  try {
    return await pending;
  } catch (error) {
    if (RepositoryNotFoundError.isNotFound(error)) return null;
    throw error;
  }
}

function chooseContentTypeStatus(promoteAsActive: boolean): ContentTypeStatus {
  return promoteAsActive ? ContentTypeStatus.ACTIVE : ContentTypeStatus.DRAFT;
}

function cloneSchemaHistory(history: SchemaSnapshot[]): SchemaSnapshot[] {
  return history.map((entry) => ({
    ...entry,
    schema: cloneJson(entry.schema),
    ui_schema: entry.ui_schema ? cloneJson(entry.ui_schema) : null,
    capabilities: entry.capabilities ? cloneJson(entry.capabilities) : null,
    updated_at: new Date(entry.updated_at)
  }));
}

/**
 * Append a snapshot to a schema history. An empty version is ignored and a
 * snapshot with the same version as the last entry replaces it.
 */
export function appendSchemaHistory(history: SchemaSnapshot[], snapshot: SchemaSnapshot): SchemaSnapshot[] {
  if (snapshot.version.trim() === '') return history;
  const out = [...history];
  if (out.length > 0 && out[out.length - 1].version === snapshot.version) {
    out[out.length - 1] = snapshot;
    return out;
  }
  out.push(snapshot);
  return out;
}

function cloneContentTypeForEnv(source: ContentType, environmentId: string, id: string): ContentType {
  return {
    ...source,
    id,
    environment_id: environmentId,
    schema: cloneJson(source.schema),
    ui_schema: source.ui_schema ? cloneJson(source.ui_schema) : null,
    capabilities: source.capabilities ? cloneJson(source.capabilities) : null,
    schema_history: cloneSchemaHistory(source.schema_history)
  };
}

function withoutTranslations(entry: ContentEntry): ContentEntry {
  const record = { ...entry };
  delete record.translations;
  return record;
}

function maxVersion(versions: ContentVersion[]): number {
  return versions.reduce((max, version) => Math.max(max, version.version), 0);
}

export class PromotionService {
  private readonly contentTypes: ContentTypeRepository;
  private readonly contents: ContentRepository;
  private readonly locales: LocaleRepository;
  private readonly environments: EnvironmentService;
  private readonly blocks: BlockDefinitionService | null;
  private readonly migrator: SchemaMigrator | null;
  private readonly activity: ActivityEmitter | null;
  private readonly defaultEnvironmentKey: string;
  private readonly features: PromotionFeatures;
  private readonly now: Clock;
  private readonly id: IdGenerator;

  constructor(deps: PromotionServiceDeps, options: PromotionServiceOptions = {}) {
    this.contentTypes = deps.contentTypes;
    this.contents = deps.contents;
    this.locales = deps.locales;
    this.environments = deps.environments;
    this.blocks = deps.blocks ?? null;
    this.migrator = deps.migrator ?? null;
    this.activity = deps.activity ?? null;
    this.defaultEnvironmentKey = normalizeKey(options.defaultEnvironmentKey);
    this.features = { ...DEFAULT_FEATURES, ...options.features };
    this.now = options.now ?? systemClock;
    this.id = options.idGenerator ?? newId;

    if (this.features.requireBlockService && !this.blocks) {
      throw new PromotionError(PromotionErrorCode.BLOCK_SERVICE_REQUIRED, 'block definition service is required');
    }
  }

  // ============================================
  // Public operations
  // ============================================

  async promoteContentType(
    request: PromoteContentTypeRequest,
    context: PromotionContext = {}
  ): Promise<ServiceResponse<PromoteItem>> {
    try {
      const input = validateRequest(promotionSchemas.promoteContentType, request);
      const options = resolveOptions(input.options);
      const target = await this.resolveEnvironment(input.target_environment, input.target_environment_id, context.signal);
      return ok(await this.promoteType(input.content_type_id, target, options, context));
    } catch (error) {
      log.warn(`Content type promotion failed for ${request.content_type_id}: ${errorMessage(error)}`);
      return fail(error, 'Failed to promote content type');
    }
  }

  async promoteContentEntry(
    request: PromoteContentEntryRequest,
    context: PromotionContext = {}
  ): Promise<ServiceResponse<PromoteItem>> {
    try {
      const input = validateRequest(promotionSchemas.promoteContentEntry, request);
      const options = resolveOptions(input.options);
      const target = await this.resolveEnvironment(input.target_environment, input.target_environment_id, context.signal);
      return ok(await this.promoteEntry(input.content_id, target, options, context));
    } catch (error) {
      log.warn(`Content entry promotion failed for ${request.content_id}: ${errorMessage(error)}`);
      return fail(error, 'Failed to promote content entry');
    }
  }

  /**
   * Promote every selected content type, then every selected entry, from one
   * environment to another
   */
  async promoteEnvironment(
    request: PromoteEnvironmentRequest,
    context: PromotionContext = {}
  ): Promise<ServiceResponse<PromoteEnvironmentResult>> {
    try {
      const input = validateRequest(promotionSchemas.promoteEnvironment, request);
      const options = resolveOptions(input.options);
      const signal = context.signal;
      const scope = input.scope ?? PromotionScope.ALL;

      const source = await this.resolveEnvironment(input.source_environment, undefined, signal);
      const target = await this.resolveEnvironment(input.target_environment, undefined, signal);

      const result = await withSpan(
        'promotion.environment',
        { 'promotion.source_environment': source.key, 'promotion.target_environment': target.key, 'promotion.scope': scope },
        async (span) => {
          const includeTypes = scope === PromotionScope.ALL || scope === PromotionScope.CONTENT_TYPES;
          const includeEntries = scope === PromotionScope.ALL || scope === PromotionScope.CONTENT_ENTRIES;

          // selections are made up front so a cancelled run still reports every item
          const typeIds = includeTypes
            ? await this.collectContentTypeIds(source.id, input.content_type_ids ?? [], input.content_type_slugs ?? [], signal)
            : [];
          let entryIds: string[] = [];
          if (includeEntries) {
            const typeFilter = await this.resolveContentEntryTypeFilter(source, input, signal);
            entryIds = await this.collectContentEntryIds(source.id, input.content_ids ?? [], input.content_slugs ?? [], typeFilter, signal);
          }

          const outcome: PromoteEnvironmentResult = {
            source_env: { id: source.id, key: source.key },
            target_env: { id: target.id, key: target.key },
            summary: { content_types: emptyCounts(), content_entries: emptyCounts() },
            items: [],
            errors: []
          };

          for (const id of typeIds) {
            await this.runBatchItem(outcome, PromotionKind.CONTENT_TYPE, id, signal, () =>
              this.promoteType(id, target, options, context, source)
            );
          }
          for (const id of entryIds) {
            await this.runBatchItem(outcome, PromotionKind.CONTENT_ENTRY, id, signal, () =>
              this.promoteEntry(id, target, options, context, source)
            );
          }

          span.setAttribute('promotion.failed', outcome.errors.length);
          return outcome;
        }
      );

      log.info(
        `Promoted ${source.key} -> ${target.key}: ${result.items.length} item(s), ${result.errors.length} failure(s)`
      );
      return ok(result);
    } catch (error) {
      log.warn(`Environment promotion failed: ${errorMessage(error)}`);
      return fail(error, 'Failed to promote environment');
    }
  }

  // ============================================
  // Content types
  // ============================================

  private async promoteType(
    contentTypeId: string,
    target: Environment,
    options: ResolvedPromoteOptions,
    context: PromotionContext,
    batchSource?: Environment
  ): Promise<PromoteItem> {
    const signal = context.signal;
    return withSpan(
      'promotion.content_type',
      { 'promotion.source_id': contentTypeId, 'promotion.target_environment': target.key, 'promotion.dry_run': options.dry_run },
      async (span) => {
        throwIfCancelled(signal);
        const source = await this.contentTypes.getById(contentTypeId, signal);
        if (batchSource && source.environment_id !== batchSource.id) {
          throw new PromotionError(
            PromotionErrorCode.CONTENT_TYPE_ENVIRONMENT_MISMATCH,
            `content type ${source.slug} does not belong to ${batchSource.key}`,
            { content_type_id: source.id, environment: batchSource.key }
          );
        }
        const sourceEnv = await this.environmentById(source.environment_id, signal);

        if (sourceEnv.id === target.id) {
          return this.typeItem(PromotionStatus.SKIPPED, source.id, source.id, source.schema_version, options.dry_run, {
            message: 'source and target environments match'
          });
        }
        if (source.status !== ContentTypeStatus.ACTIVE && !options.allow_draft) {
          throw new PromotionError(
            PromotionErrorCode.CONTENT_TYPE_INACTIVE,
            `content type ${source.slug} is ${source.status}; set allow_draft to promote it`,
            { content_type_id: source.id }
          );
        }

        const { schema, version } = normalizeContentTypeSchema(source);
        const blocks = await this.promoteBlockDefinitions(schema, sourceEnv, target, options, signal);

        const now = this.now();
        const snapshot: SchemaSnapshot = {
          version: version.toString(),
          schema: cloneJson(schema),
          ui_schema: source.ui_schema ? cloneJson(source.ui_schema) : null,
          capabilities: source.capabilities ? cloneJson(source.capabilities) : null,
          status: source.status,
          updated_at: now
        };

        throwIfCancelled(signal);
        const existing = await orNull(this.contentTypes.getBySlug(source.slug, target.id, signal));
        let item: PromoteItem;

        if (!existing) {
          const record: ContentType = {
            ...cloneContentTypeForEnv(source, target.id, this.id()),
            schema,
            schema_version: version.toString(),
            schema_history: appendSchemaHistory(cloneSchemaHistory(source.schema_history), snapshot),
            status: chooseContentTypeStatus(options.promote_as_active),
            created_at: now,
            updated_at: now
          };

          if (options.dry_run) {
            item = this.typeItem(PromotionStatus.CREATED, source.id, record.id, record.schema_version, true, { blocks });
          } else {
            try {
              const created = await this.contentTypes.create(record, signal);
              item = this.typeItem(PromotionStatus.CREATED, source.id, created.id, created.schema_version, false, { blocks });
            } catch (error) {
              if (!RepositoryConflictError.isConflict(error)) throw error;
              log.debug(`Content type ${source.slug} appeared in ${target.key} during promotion; updating instead`);
              const raced = await this.contentTypes.getBySlug(source.slug, target.id, signal);
              item = await this.updateType(raced, source, schema, snapshot, options, signal, blocks);
            }
          }
        } else {
          item = await this.updateType(existing, source, schema, snapshot, options, signal, blocks);
        }

        if (!options.dry_run) {
          await this.emitPromotion(PromotionKind.CONTENT_TYPE, item.target_id, sourceEnv, target, options);
          log.info(`Content type ${source.slug} ${item.status} in ${target.key} at ${snapshot.version}`);
        }
        span.setAttribute('promotion.status', item.status);
        return item;
      }
    );
  }

  private async updateType(
    existing: ContentType,
    source: ContentType,
    schema: JsonObject,
    snapshot: SchemaSnapshot,
    options: ResolvedPromoteOptions,
    signal: AbortSignal | undefined,
    blocks: BlockPromotion | null
  ): Promise<PromoteItem> {
    if (compareVersionStrings(existing.schema_version, snapshot.version) > 0 && !options.force) {
      throw new PromotionError(
        PromotionErrorCode.TARGET_AHEAD_OF_SOURCE,
        `target ${existing.schema_version} is ahead of source ${snapshot.version}`,
        { content_type_id: source.id, target_version: existing.schema_version, source_version: snapshot.version }
      );
    }

    const compatibility = checkSchemaCompatibility(existing.schema, schema);
    if (!compatibility.compatible && !options.allow_breaking_changes) {
      throw new PromotionError(
        PromotionErrorCode.BREAKING_SCHEMA_CHANGE,
        `breaking schema change: ${compatibility.breakingChanges.map((change) => `${change.field} ${change.description}`).join('; ')}`,
        { content_type_id: source.id, breaking_changes: compatibility.breakingChanges }
      );
    }

    // force keeps the history and appends the older version after the newer one
    const record: ContentType = {
      ...existing,
      name: source.name,
      description: source.description ?? null,
      icon: source.icon ?? null,
      schema,
      ui_schema: source.ui_schema ? cloneJson(source.ui_schema) : null,
      capabilities: source.capabilities ? cloneJson(source.capabilities) : null,
      schema_version: snapshot.version,
      schema_history: appendSchemaHistory(cloneSchemaHistory(existing.schema_history), snapshot),
      status: chooseContentTypeStatus(options.promote_as_active),
      updated_at: snapshot.updated_at
    };

    const details: JsonObject = {
      compatibility: { compatible: compatibility.compatible, change_level: compatibility.changeLevel }
    };
    if (options.dry_run) {
      return this.typeItem(PromotionStatus.UPDATED, source.id, existing.id, record.schema_version, true, { blocks, details });
    }

    throwIfCancelled(signal);
    const updated = await this.contentTypes.update(record, signal);
    return this.typeItem(PromotionStatus.UPDATED, source.id, updated.id, updated.schema_version, false, { blocks, details });
  }

  private typeItem(
    status: PromotionStatus,
    sourceId: string,
    targetId: string,
    schemaVersion: string,
    dryRun: boolean,
    extra: { message?: string; blocks?: BlockPromotion | null; details?: JsonObject } = {}
  ): PromoteItem {
    const details: JsonObject = { schema_version: schemaVersion, ...extra.details };
    if (dryRun) details.dry_run = true;
    if (extra.blocks) {
      details.block_definitions = { created: [...extra.blocks.created], updated: [...extra.blocks.updated] };
    }
    const item: PromoteItem = { kind: PromotionKind.CONTENT_TYPE, source_id: sourceId, target_id: targetId, status, details };
    if (extra.message) item.message = extra.message;
    return item;
  }

  /**
   * Copy the block definitions a schema names into the target environment.
   * Under dry_run every lookup runs and nothing is written.
   */
  private async promoteBlockDefinitions(
    schema: JsonObject,
    source: Environment,
    target: Environment,
    options: ResolvedPromoteOptions,
    signal?: AbortSignal
  ): Promise<BlockPromotion | null> {
    const slugs = extractBlockSlugs(schema);
    if (slugs.length === 0) return null;
    if (!this.blocks) {
      throw new PromotionError(
        PromotionErrorCode.BLOCK_SERVICE_REQUIRED,
        'block definition service is required to promote block definitions',
        { block_slugs: slugs }
      );
    }

    const index = (definitions: BlockDefinition[]): Map<string, BlockDefinition> =>
      new Map(definitions.map((definition) => [normalizeKey(definition.slug), definition]));
    const sourceDefinitions = index(await this.blocks.listDefinitions(source.key, signal));
    const targetDefinitions = index(await this.blocks.listDefinitions(target.key, signal));

    // every definition is resolved before anything is written
    const resolved = slugs.map((slug) => {
      const definition = sourceDefinitions.get(normalizeKey(slug));
      if (!definition) {
        throw new PromotionError(
          PromotionErrorCode.BLOCK_DEFINITION_NOT_FOUND,
          `block definition ${slug} not found in ${source.key}`,
          { slug, environment: source.key }
        );
      }
      return definition;
    });

    const outcome: BlockPromotion = { created: [], updated: [] };
    for (const definition of resolved) {
      const { schema: blockSchema } = ensureSchemaVersion(definition.schema, definition.slug);
      const fields = {
        name: definition.name,
        description: definition.description ?? null,
        icon: definition.icon ?? null,
        category: definition.category ?? null,
        status: definition.status,
        schema: blockSchema,
        ui_schema: definition.ui_schema ? cloneJson(definition.ui_schema) : null,
        defaults: definition.defaults ? cloneJson(definition.defaults) : null
      };

      throwIfCancelled(signal);
      const existing = targetDefinitions.get(normalizeKey(definition.slug));
      if (existing) {
        if (!options.dry_run) {
          await this.blocks.updateDefinition({ id: existing.id, ...fields }, signal);
        }
        outcome.updated.push(definition.slug);
      } else {
        if (!options.dry_run) {
          await this.blocks.registerDefinition({ slug: definition.slug, environment_key: target.key, ...fields }, signal);
        }
        outcome.created.push(definition.slug);
      }
    }

    if (!options.dry_run) {
      log.debug(`Block definitions for ${target.key}: ${outcome.created.length} created, ${outcome.updated.length} updated`);
    }
    return outcome;
  }

  // ============================================
  // Content entries
  // ============================================

  private async promoteEntry(
    contentId: string,
    target: Environment,
    options: ResolvedPromoteOptions,
    context: PromotionContext,
    batchSource?: Environment
  ): Promise<PromoteItem> {
    const signal = context.signal;
    return withSpan(
      'promotion.content_entry',
      { 'promotion.source_id': contentId, 'promotion.target_environment': target.key, 'promotion.dry_run': options.dry_run },
      async (span) => {
        throwIfCancelled(signal);
        const source = await this.contents.getById(contentId, signal);
        if (batchSource && source.environment_id !== batchSource.id) {
          throw new PromotionError(
            PromotionErrorCode.CONTENT_ENVIRONMENT_MISMATCH,
            `content ${source.slug} does not belong to ${batchSource.key}`,
            { content_id: source.id, environment: batchSource.key }
          );
        }
        const sourceType = await this.contentTypes.getById(source.content_type_id, signal);
        const sourceEnv = await this.environmentById(source.environment_id, signal);

        if (sourceEnv.id === target.id) {
          const item = this.entryItem(PromotionStatus.SKIPPED, source.id, source.id, null, options.dry_run);
          item.message = 'source and target environments match';
          return item;
        }

        const targetType = await this.resolveTargetType(sourceType, target, options, context);
        const selected = await this.selectSourceVersion(source, options, signal);
        const { schema: targetSchema, version: targetVersion } = normalizeContentTypeSchema(targetType);
        const snapshot = this.migrateEntrySnapshot(selected.snapshot, sourceType, targetSchema, targetVersion, options);

        throwIfCancelled(signal);
        const existing = await orNull(this.contents.getBySlug(source.slug, targetType.id, target.id, signal));
        if (existing && options.mode === PromotionMode.STRICT) {
          throw this.slugExists(source.slug, target);
        }

        const actor = context.actor_id || source.updated_by || source.created_by;
        const targetId = existing ? existing.id : this.id();
        const translations = await this.buildTranslations(snapshot, targetId, signal);
        const schemaVersion = targetVersion.toString();

        if (options.dry_run) {
          const status = existing ? PromotionStatus.UPDATED : PromotionStatus.CREATED;
          span.setAttribute('promotion.status', status);
          return this.entryItem(status, source.id, targetId, schemaVersion, true);
        }

        const history = options.include_versions ? await this.contents.listVersions(source.id, signal) : [];
        const targetVersions = existing ? await this.contents.listVersions(existing.id, signal) : [];
        const createdAt = this.now();
        const base: ContentEntry = existing ?? {
          id: targetId,
          content_type_id: targetType.id,
          slug: source.slug,
          current_version: 0,
          published_version: null,
          status: ContentEntryStatus.DRAFT,
          environment_id: target.id,
          metadata: source.metadata ? cloneJson(source.metadata) : null,
          created_by: actor,
          updated_by: actor,
          created_at: createdAt,
          updated_at: createdAt
        };
        const planned = this.planEntryWrite(base, !existing, translations, targetVersions, history, selected, snapshot, options, actor);

        // last check before the write; nothing below observes the signal
        throwIfCancelled(signal);
        let record: ContentEntry;
        let isNew = !existing;
        let written = planned;
        try {
          record = await this.contents.applyPromotion(planned.write);
        } catch (error) {
          if (!isNew || !RepositoryConflictError.isConflict(error)) throw error;
          if (options.mode === PromotionMode.STRICT) throw this.slugExists(source.slug, target);
          const raced = await this.contents.getBySlug(source.slug, targetType.id, target.id);
          log.debug(`Content ${source.slug} appeared in ${target.key} during promotion; updating instead`);
          written = this.planEntryWrite(
            raced,
            false,
            translations.map((translation) => ({ ...translation, content_id: raced.id, translation_group_id: raced.id })),
            await this.contents.listVersions(raced.id),
            history,
            selected,
            snapshot,
            options,
            actor
          );
          record = await this.contents.applyPromotion(written.write);
          isNew = false;
        }

        await this.emitPromotion(PromotionKind.CONTENT_ENTRY, record.id, sourceEnv, target, options);

        const status = isNew ? PromotionStatus.CREATED : PromotionStatus.UPDATED;
        log.info(`Content ${source.slug} ${status} in ${target.key} as v${written.version}`);
        span.setAttribute('promotion.status', status);

        const item = this.entryItem(status, source.id, record.id, schemaVersion, false);
        item.details.version = written.version;
        if (written.copied > 0) item.details.copied_versions = written.copied;
        return item;
      }
    );
  }

  private async resolveTargetType(
    sourceType: ContentType,
    target: Environment,
    options: ResolvedPromoteOptions,
    context: PromotionContext
  ): Promise<ContentType> {
    const existing = await orNull(this.contentTypes.getBySlug(sourceType.slug, target.id, context.signal));
    if (existing) return existing;

    if (!options.auto_promote_type) {
      throw new PromotionError(
        PromotionErrorCode.CONTENT_TYPE_REQUIRED,
        `content type ${sourceType.slug} does not exist in ${target.key}`,
        { content_type_slug: sourceType.slug, environment: target.key }
      );
    }
    if (options.dry_run) {
      return cloneContentTypeForEnv(sourceType, target.id, this.id());
    }

    await this.promoteType(sourceType.id, target, options, context);
    return this.contentTypes.getBySlug(sourceType.slug, target.id, context.signal);
  }

  /**
   * Published version when preferred (or when drafts are not allowed),
   * otherwise the latest
   */
  private async selectSourceVersion(
    source: ContentEntry,
    options: ResolvedPromoteOptions,
    signal?: AbortSignal
  ): Promise<ContentVersion> {
    const published = source.published_version;
    if (published && (options.prefer_published || !options.allow_draft)) {
      return this.contents.getVersion(source.id, published, signal);
    }
    if (!options.allow_draft) {
      throw new PromotionError(
        PromotionErrorCode.CONTENT_VERSION_REQUIRED,
        `content ${source.slug} has no published version; set allow_draft to promote a draft`,
        { content_id: source.id }
      );
    }

    const latest = await orNull(this.contents.getLatestVersion(source.id, signal));
    if (!latest) {
      throw new PromotionError(
        PromotionErrorCode.CONTENT_VERSION_REQUIRED,
        `content ${source.slug} has no versions`,
        { content_id: source.id }
      );
    }
    return latest;
  }

  private migrateEntrySnapshot(
    snapshot: ContentSnapshot,
    sourceType: ContentType,
    targetSchema: JsonObject,
    targetVersion: SchemaVersion,
    options: ResolvedPromoteOptions
  ): ContentSnapshot {
    const current = snapshotSchemaVersion(snapshot) ?? normalizeContentTypeSchema(sourceType).version;
    if (SchemaVersion.compare(current, targetVersion) === 0) {
      return applySnapshotSchemaVersion(snapshot, targetVersion);
    }

    const context = { content_type_slug: sourceType.slug, from: current.toString(), target: targetVersion.toString() };
    if (!options.migrate_on_promote || !this.migrator) {
      throw new PromotionError(
        PromotionErrorCode.SCHEMA_MIGRATION_REQUIRED,
        `schema migration required: ${current.toString()} -> ${targetVersion.toString()}`,
        context
      );
    }

    try {
      return migrateSnapshot({
        snapshot,
        typeSlug: sourceType.slug,
        targetSchema,
        targetVersion,
        migrator: this.migrator,
        sourceVersionOf: () => current
      }).snapshot;
    } catch (error) {
      if (error instanceof MigrationError) {
        throw new PromotionError(
          PromotionErrorCode.SCHEMA_MIGRATION_REQUIRED,
          `schema migration required: ${error.message}`,
          { ...context, migration_error: error.code },
          { cause: error }
        );
      }
      throw error;
    }
  }

  private async buildTranslations(snapshot: ContentSnapshot, contentId: string, signal?: AbortSignal): Promise<ContentTranslation[]> {
    const now = this.now();
    const out: ContentTranslation[] = [];
    for (const translation of snapshot.translations) {
      const code = translation.locale.trim();
      const locale = code === '' ? null : await orNull(this.locales.getByCode(code, signal));
      if (!locale) {
        throw new PromotionError(
          PromotionErrorCode.UNKNOWN_LOCALE,
          `unknown locale: ${code === '' ? '<empty>' : code}`,
          { locale: code }
        );
      }
      out.push({
        id: this.id(),
        content_id: contentId,
        locale_id: locale.id,
        locale: locale.code,
        translation_group_id: contentId,
        title: translation.title,
        summary: translation.summary ?? null,
        content: cloneJson(translation.content),
        created_at: now,
        updated_at: now
      });
    }
    return out;
  }

  /**
   * Lay out the copied history, the promoted version and the entry's new
   * version pointers as one repository write
   */
  private planEntryWrite(
    base: ContentEntry,
    create: boolean,
    translations: ContentTranslation[],
    targetVersions: ContentVersion[],
    history: ContentVersion[],
    selected: ContentVersion,
    snapshot: ContentSnapshot,
    options: ResolvedPromoteOptions,
    actor: string
  ): { write: EntryPromotionWrite; version: number; copied: number } {
    const versions: ContentVersion[] = [];
    let next = maxVersion(targetVersions) + 1;

    for (const version of [...history].sort((a, b) => a.version - b.version)) {
      if (version.version === selected.version) continue;
      versions.push({
        id: this.id(),
        content_id: base.id,
        version: next,
        status: VersionStatus.DRAFT,
        snapshot: cloneSnapshot(version.snapshot),
        created_by: version.created_by,
        created_at: version.created_at
      });
      next += 1;
    }
    const copied = versions.length;

    const now = this.now();
    const publish = options.promote_as_published;
    versions.push({
      id: this.id(),
      content_id: base.id,
      version: next,
      status: publish ? VersionStatus.PUBLISHED : VersionStatus.DRAFT,
      snapshot,
      created_by: actor,
      created_at: now,
      published_at: publish ? now : null,
      published_by: publish ? actor : null
    });

    const entry: ContentEntry = {
      ...withoutTranslations(base),
      current_version: Math.max(base.current_version, next),
      updated_by: actor,
      updated_at: now,
      translations
    };
    const archive: ContentVersion[] = [];
    if (publish) {
      const previous = base.published_version;
      entry.status = ContentEntryStatus.PUBLISHED;
      entry.published_version = next;
      entry.published_at = now;
      entry.published_by = actor;
      const prior = previous ? targetVersions.find((version) => version.version === previous) : undefined;
      if (prior && prior.status === VersionStatus.PUBLISHED) {
        archive.push({ ...prior, status: VersionStatus.ARCHIVED });
      }
    } else if (!entry.published_version) {
      entry.status = ContentEntryStatus.DRAFT;
    }
    if (snapshot.metadata) {
      entry.metadata = cloneJson(snapshot.metadata);
    }

    return { write: { entry, create, versions, archive }, version: next, copied };
  }

  private entryItem(
    status: PromotionStatus,
    sourceId: string,
    targetId: string,
    schemaVersion: string | null,
    dryRun: boolean
  ): PromoteItem {
    const details: JsonObject = {};
    if (schemaVersion) details.schema_version = schemaVersion;
    if (dryRun) details.dry_run = true;
    return { kind: PromotionKind.CONTENT_ENTRY, source_id: sourceId, target_id: targetId, status, details };
  }

  private slugExists(slug: string, target: Environment): PromotionError {
    return new PromotionError(
      PromotionErrorCode.SLUG_EXISTS,
      `content ${slug} already exists in ${target.key}; use mode upsert to update it`,
      { slug, environment: target.key }
    );
  }

  // ============================================
  // Environment promotion helpers
  // ============================================

  private async runBatchItem(
    result: PromoteEnvironmentResult,
    kind: PromotionKind,
    sourceId: string,
    signal: AbortSignal | undefined,
    run: () => Promise<PromoteItem>
  ): Promise<void> {
    const counts = kind === PromotionKind.CONTENT_TYPE ? result.summary.content_types : result.summary.content_entries;
    try {
      throwIfCancelled(signal, { source_id: sourceId });
      const item = await run();
      result.items.push(item);
      switch (item.status) {
        case PromotionStatus.CREATED:
          counts.created += 1;
          break;
        case PromotionStatus.UPDATED:
          counts.updated += 1;
          break;
        case PromotionStatus.SKIPPED:
          counts.skipped += 1;
          break;
        case PromotionStatus.FAILED:
          counts.failed += 1;
          break;
      }
    } catch (error) {
      counts.failed += 1;
      result.errors.push({ kind, source_id: sourceId, error: errorMessage(error), error_code: errorCodeOf(error) });
      log.warn(`Failed to promote ${kind} ${sourceId}: ${errorMessage(error)}`);
    }
  }

  private async collectContentTypeIds(
    environmentId: string,
    ids: string[],
    slugs: string[],
    signal?: AbortSignal
  ): Promise<string[]> {
    if (ids.length === 0 && slugs.length === 0) {
      return (await this.contentTypes.list(environmentId, signal)).map((record) => record.id);
    }
    const out = [...ids];
    if (slugs.length > 0) {
      const records = await this.contentTypes.list(environmentId, signal);
      const index = new Map(records.map((record) => [normalizeKey(record.slug), record.id]));
      for (const slug of slugs) {
        const id = index.get(normalizeKey(slug));
        if (id) out.push(id);
      }
    }
    return [...new Set(out)];
  }

  private async collectContentEntryIds(
    environmentId: string,
    ids: string[],
    slugs: string[],
    typeId: string | null,
    signal?: AbortSignal
  ): Promise<string[]> {
    const matchesType = (record: ContentEntry): boolean => typeId === null || record.content_type_id === typeId;

    if (ids.length === 0 && slugs.length === 0) {
      return (await this.contents.list(environmentId, signal)).filter(matchesType).map((record) => record.id);
    }
    const out = [...ids];
    if (slugs.length > 0) {
      const index = new Map<string, string[]>();
      for (const record of await this.contents.list(environmentId, signal)) {
        const key = normalizeKey(record.slug);
        if (key === '' || !matchesType(record)) continue;
        index.set(key, [...(index.get(key) ?? []), record.id]);
      }
      for (const slug of slugs) {
        out.push(...(index.get(normalizeKey(slug)) ?? []));
      }
    }
    return [...new Set(out)];
  }

  /**
   * Content type an entry selection is restricted to, or null for all types
   */
  private async resolveContentEntryTypeFilter(
    source: Environment,
    request: PromoteEnvironmentRequest,
    signal?: AbortSignal
  ): Promise<string | null> {
    const typeId = (request.content_entry_type_id ?? '').trim();
    const typeSlug = (request.content_entry_type_slug ?? '').trim();

    if ((request.content_slugs ?? []).length > 0 && typeId === '' && typeSlug === '') {
      throw new PromotionError(
        PromotionErrorCode.CONTENT_TYPE_REQUIRED_FOR_SLUGS,
        'content slugs require content_entry_type_id or content_entry_type_slug'
      );
    }

    let byId: ContentType | null = null;
    if (typeId !== '') {
      byId = await this.contentTypes.getById(typeId, signal);
      if (byId.environment_id !== source.id) {
        throw new PromotionError(
          PromotionErrorCode.CONTENT_TYPE_ENVIRONMENT_MISMATCH,
          `content type ${byId.slug} does not belong to ${source.key}`,
          { content_type_id: typeId, environment: source.key }
        );
      }
    }
    const bySlug = typeSlug !== '' ? await this.contentTypes.getBySlug(typeSlug, source.id, signal) : null;

    if (byId && bySlug && byId.id !== bySlug.id) {
      throw new PromotionError(
        PromotionErrorCode.CONTENT_TYPE_FILTER_MISMATCH,
        `content_entry_type_id and content_entry_type_slug name different content types`,
        { content_type_id: typeId, content_type_slug: typeSlug }
      );
    }
    return byId?.id ?? bySlug?.id ?? null;
  }

  // ============================================
  // Shared
  // ============================================

  /**
   * Environment by id, by a UUID-shaped key, or by key. An empty key means
   * the configured default.
   */
  private async resolveEnvironment(key: string | undefined, id: string | undefined, signal?: AbortSignal): Promise<Environment> {
    const explicitId = (id ?? '').trim();
    if (explicitId !== '') return this.environmentById(explicitId, signal);

    const raw = (key ?? '').trim();
    if (raw !== '' && isUuid(raw)) return this.environmentById(raw, signal);

    const normalized = normalizeKey(raw) || this.defaultEnvironmentKey;
    if (normalized === '') {
      throw new PromotionError(PromotionErrorCode.ENVIRONMENT_NOT_FOUND, 'environment key required and no default is configured');
    }
    return unwrap(await this.environments.getEnvironmentByKey(normalized, signal));
  }

  private async environmentById(id: string, signal?: AbortSignal): Promise<Environment> {
    return unwrap(await this.environments.getEnvironment(id, signal));
  }

  private async emitPromotion(
    kind: PromotionKind,
    objectId: string,
    source: Environment,
    target: Environment,
    options: ResolvedPromoteOptions
  ): Promise<void> {
    if (!this.features.activity || !this.activity) return;
    await this.activity.publish({
      verb: 'promote',
      object_type: kind,
      object_id: objectId,
      metadata: {
        source_environment_id: source.id,
        source_environment_key: source.key,
        target_environment_id: target.id,
        target_environment_key: target.key,
        promotion_mode: options.mode,
        promote_as_active: options.promote_as_active,
        promote_as_published: options.promote_as_published
      }
    });
  }
}
