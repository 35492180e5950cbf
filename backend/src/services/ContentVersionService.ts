/**
 * ContentVersionService - draft, publish and history operations on the
 * versions of a content entry
 *
 * Versions are numbered from 1 without gaps and are immutable once written,
 * apart from the published -> archived transition. Publishing brings every
 * translation payload to the owning type's current schema version first; a
 * failed migration or validation leaves the store untouched.
 */

import {
  ContentEntry,
  ContentEntryStatus,
  ContentSnapshot,
  ContentType,
  ContentVersion,
  CreateDraftInput,
  PromotionError,
  PromotionErrorCode,
  PublishDraftInput,
  RepositoryConflictError,
  RestoreVersionInput,
  ServiceResponse,
  VersionStatus
} from '../types/content';
import { ContentRepository, ContentTypeRepository } from '../repositories/interfaces';
import { Clock, IdGenerator, newId, systemClock } from '../utils/ids';
import { normalizeContentTypeSchema } from '../utils/schemaMetadata';
import { applySchemaTag, cloneSnapshot, readSchemaTag } from '../utils/versionedPayload';
import { fail, ok } from '../utils/serviceResponse';
import { createLogger } from '../utils/logger';
import { ActivityEmitter } from './ActivityEmitter';
import { SchemaMigrator } from './MigrationRegistry';
import { migrateSnapshot } from './snapshotMigration';

const log = createLogger('ContentVersionService');

export interface ContentVersionServiceDeps {
  contentTypes: ContentTypeRepository;
  contents: ContentRepository;
  migrator?: SchemaMigrator;
  activity?: ActivityEmitter;
}

export interface ContentVersionServiceOptions {
  versioningEnabled?: boolean;
  now?: Clock;
  idGenerator?: IdGenerator;
}

export interface ArchiveVersionInput {
  content_id: string;
  version: number;
  archived_by: string;
}

export class ContentVersionService {
  private readonly contentTypes: ContentTypeRepository;
  private readonly contents: ContentRepository;
  private readonly migrator: SchemaMigrator | null;
  private readonly activity: ActivityEmitter | null;
  private readonly versioningEnabled: boolean;
  private readonly now: Clock;
  private readonly id: IdGenerator;

  constructor(deps: ContentVersionServiceDeps, options: ContentVersionServiceOptions = {}) {
    this.contentTypes = deps.contentTypes;
    this.contents = deps.contents;
    this.migrator = deps.migrator ?? null;
    this.activity = deps.activity ?? null;
    this.versioningEnabled = options.versioningEnabled ?? true;
    this.now = options.now ?? systemClock;
    this.id = options.idGenerator ?? newId;
  }

  /**
   * Append a draft numbered after the highest existing version
   */
  async createDraft(input: CreateDraftInput, signal?: AbortSignal): Promise<ServiceResponse<ContentVersion>> {
    try {
      this.requireVersioning();
      return ok(await this.writeDraft(input, signal));
    } catch (error) {
      return fail(error, 'Failed to create draft');
    }
  }

  /**
   * Migrate, validate and publish a draft, archiving the previous published version
   */
  async publishDraft(input: PublishDraftInput, signal?: AbortSignal): Promise<ServiceResponse<ContentVersion>> {
    try {
      this.requireVersioning();
      const entry = await this.contents.getById(input.content_id, signal);
      const draft = await this.contents.getVersion(entry.id, input.version, signal);
      if (draft.status !== VersionStatus.DRAFT) {
        throw new PromotionError(
          PromotionErrorCode.VERSION_CONFLICT,
          `version ${draft.version} is ${draft.status}, only drafts can be published`,
          { content_id: entry.id, version: draft.version }
        );
      }

      const type = await this.contentTypes.getById(entry.content_type_id, signal);
      const { schema, version: targetVersion } = normalizeContentTypeSchema(type);
      const fallback = readSchemaTag(draft.snapshot.fields);

      // untagged payloads are taken to be at the current version
      const { snapshot, migrated } = migrateSnapshot({
        snapshot: draft.snapshot,
        typeSlug: type.slug,
        targetSchema: schema,
        targetVersion,
        migrator: this.migrator,
        sourceVersionOf: (translation) => readSchemaTag(translation.content) ?? fallback ?? targetVersion
      });

      const now = this.now();
      const published = await this.contents.updateVersion(
        {
          ...draft,
          snapshot,
          status: VersionStatus.PUBLISHED,
          published_at: now,
          published_by: input.published_by
        },
        signal
      );

      const previous = entry.published_version;
      if (previous !== null && previous !== undefined && previous !== published.version) {
        const prior = await this.contents.getVersion(entry.id, previous, signal);
        if (prior.status === VersionStatus.PUBLISHED) {
          await this.contents.updateVersion({ ...prior, status: VersionStatus.ARCHIVED }, signal);
        }
      }

      await this.contents.update(
        {
          ...this.withoutTranslations(entry),
          published_version: published.version,
          status: ContentEntryStatus.PUBLISHED,
          published_at: now,
          published_by: input.published_by,
          current_version: Math.max(entry.current_version, published.version),
          updated_by: input.published_by,
          updated_at: now
        },
        signal
      );

      log.info(`Published ${entry.slug} v${published.version} at ${targetVersion.toString()}${migrated ? ' (migrated)' : ''}`);
      await this.activity?.publish({
        verb: 'publish',
        object_type: 'content_entry',
        object_id: entry.id,
        metadata: {
          version: published.version,
          schema_version: targetVersion.toString(),
          migrated,
          environment_id: entry.environment_id
        }
      });

      return ok(published);
    } catch (error) {
      return fail(error, 'Failed to publish draft');
    }
  }

  async listVersions(contentId: string, signal?: AbortSignal): Promise<ServiceResponse<ContentVersion[]>> {
    try {
      this.requireVersioning();
      await this.contents.getById(contentId, signal);
      return ok(await this.contents.listVersions(contentId, signal));
    } catch (error) {
      return fail(error, 'Failed to list versions');
    }
  }

  async getVersion(contentId: string, version: number, signal?: AbortSignal): Promise<ServiceResponse<ContentVersion>> {
    try {
      this.requireVersioning();
      return ok(await this.contents.getVersion(contentId, version, signal));
    } catch (error) {
      return fail(error, 'Failed to get version');
    }
  }

  /**
   * Copy an earlier version into a new draft
   */
  async restoreVersion(input: RestoreVersionInput, signal?: AbortSignal): Promise<ServiceResponse<ContentVersion>> {
    try {
      this.requireVersioning();
      const source = await this.contents.getVersion(input.content_id, input.version, signal);
      const draft = await this.writeDraft(
        { content_id: input.content_id, snapshot: cloneSnapshot(source.snapshot), created_by: input.restored_by },
        signal
      );
      log.info(`Restored version ${source.version} of ${input.content_id} as v${draft.version}`);
      return ok(draft, { restored_from: source.version });
    } catch (error) {
      return fail(error, 'Failed to restore version');
    }
  }

  /**
   * Retire the published version. The entry is left without a published version.
   */
  async archiveVersion(input: ArchiveVersionInput, signal?: AbortSignal): Promise<ServiceResponse<ContentVersion>> {
    try {
      this.requireVersioning();
      const entry = await this.contents.getById(input.content_id, signal);
      const archived = await this.archivePublished(entry.id, input.version, signal);

      if (entry.published_version === archived.version) {
        await this.contents.update(
          {
            ...this.withoutTranslations(entry),
            published_version: null,
            status: ContentEntryStatus.ARCHIVED,
            updated_by: input.archived_by,
            updated_at: this.now()
          },
          signal
        );
      }
      return ok(archived);
    } catch (error) {
      return fail(error, 'Failed to archive version');
    }
  }

  private async writeDraft(input: CreateDraftInput, signal?: AbortSignal): Promise<ContentVersion> {
    const entry = await this.contents.getById(input.content_id, signal);
    const type = await this.contentTypes.getById(entry.content_type_id, signal);
    const existing = await this.contents.listVersions(entry.id, signal);
    const next = existing.reduce((max, version) => Math.max(max, version.version), 0) + 1;

    if (input.base_version !== undefined && input.base_version !== next - 1) {
      throw new PromotionError(
        PromotionErrorCode.VERSION_CONFLICT,
        `version conflict: base ${input.base_version}, latest ${next - 1}`,
        { content_id: entry.id, base_version: input.base_version, latest_version: next - 1 }
      );
    }

    const now = this.now();
    let created: ContentVersion;
    try {
      created = await this.contents.createVersion(
        {
          id: this.id(),
          content_id: entry.id,
          version: next,
          status: VersionStatus.DRAFT,
          snapshot: this.stampUntagged(input.snapshot, type),
          created_by: input.created_by,
          created_at: now
        },
        signal
      );
    } catch (error) {
      if (RepositoryConflictError.isConflict(error)) {
        throw new PromotionError(
          PromotionErrorCode.VERSION_CONFLICT,
          `version ${next} of ${entry.id} was written concurrently`,
          { content_id: entry.id, version: next },
          { cause: error }
        );
      }
      throw error;
    }

    await this.contents.update(
      {
        ...this.withoutTranslations(entry),
        current_version: Math.max(entry.current_version, created.version),
        updated_by: input.created_by,
        updated_at: now
      },
      signal
    );
    return created;
  }

  private async archivePublished(contentId: string, version: number, signal?: AbortSignal): Promise<ContentVersion> {
    const record = await this.contents.getVersion(contentId, version, signal);
    if (record.status !== VersionStatus.PUBLISHED) {
      throw new PromotionError(
        PromotionErrorCode.VERSION_CONFLICT,
        `version ${version} is ${record.status}, only published versions can be archived`,
        { content_id: contentId, version }
      );
    }
    return this.contents.updateVersion({ ...record, status: VersionStatus.ARCHIVED }, signal);
  }

  private stampUntagged(snapshot: ContentSnapshot, type: ContentType): ContentSnapshot {
    const { version } = normalizeContentTypeSchema(type);
    const stamped = cloneSnapshot(snapshot);
    stamped.translations = stamped.translations.map((translation) =>
      readSchemaTag(translation.content) ? translation : { ...translation, content: applySchemaTag(translation.content, version) }
    );
    return stamped;
  }

  private withoutTranslations(entry: ContentEntry): ContentEntry {
    const record = { ...entry };
    delete record.translations;
    return record;
  }

  private requireVersioning(): void {
    if (!this.versioningEnabled) {
      throw new PromotionError(PromotionErrorCode.VERSIONING_DISABLED, 'content versioning is disabled');
    }
  }
}
