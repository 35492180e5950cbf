import { describe, it, expect, beforeEach } from '@jest/globals';
import {
  ActivityEvent,
  ContentEntryStatus,
  ContentType,
  JsonObject,
  PromotionErrorCode,
  VersionStatus
} from '../../types/content';
import { ContentVersionService } from '../../services/ContentVersionService';
import { MigrationRegistry, MigrationTransform } from '../../services/MigrationRegistry';
import { ACTIVITY_EVENT, ActivityEmitter } from '../../services/ActivityEmitter';
import { unwrap } from '../../utils/serviceResponse';
import {
  EDITOR,
  FIXED_NOW,
  World,
  createWorld,
  fixedClock,
  seedContentType,
  seedEntry,
  tagged,
  translation
} from '../helpers/fixtures';

const articleSchema: JsonObject = {
  type: 'object',
  properties: {
    headline: { type: 'string' },
    body: { type: 'string' }
  },
  required: ['headline']
};

const renameTitle: MigrationTransform = ({ title, ...rest }) => ({ ...rest, headline: title });

describe('ContentVersionService', () => {
  let world: World;
  let article: ContentType;
  let registry: MigrationRegistry;
  let activity: ActivityEmitter;
  let events: ActivityEvent[];
  let service: ContentVersionService;

  beforeEach(async () => {
    world = await createWorld();
    article = await seedContentType(world, world.staging, {
      slug: 'article',
      schema: articleSchema,
      version: 'article@v2.0.0'
    });
    registry = new MigrationRegistry();
    activity = new ActivityEmitter({ now: fixedClock });
    events = [];
    activity.on(ACTIVITY_EVENT, (event: ActivityEvent) => events.push(event));
    service = new ContentVersionService(
      { contentTypes: world.stores.contentTypes, contents: world.stores.contents, migrator: registry, activity },
      { now: fixedClock, idGenerator: world.ids }
    );
  });

  const v1Draft = () =>
    seedEntry(world, article, 'hello', [
      { status: VersionStatus.DRAFT, translations: [translation('en', tagged('article@v1.0.0', { title: 'Hello', body: 'World' }))] }
    ]);

  describe('publishDraft', () => {
    it('should migrate an older draft to the current schema before publishing', async () => {
      registry.register('article', 'v1.0.0', 'v2.0.0', renameTitle);
      const entry = await v1Draft();

      const published = unwrap(await service.publishDraft({ content_id: entry.id, version: 1, published_by: EDITOR }));

      expect(published.status).toBe(VersionStatus.PUBLISHED);
      expect(published.published_at).toEqual(FIXED_NOW);
      expect(published.snapshot.translations[0].content).toEqual({
        headline: 'Hello',
        body: 'World',
        _schema: 'article@v2.0.0'
      });

      const stored = await world.stores.contents.getById(entry.id);
      expect(stored.published_version).toBe(1);
      expect(stored.status).toBe(ContentEntryStatus.PUBLISHED);
      expect(stored.published_by).toBe(EDITOR);
    });

    it('should leave the draft untouched when the migrated payload fails validation', async () => {
      const dropTitle: MigrationTransform = ({ title: _title, ...rest }) => rest;
      registry.register('article', 'v1.0.0', 'v2.0.0', dropTitle);
      const entry = await v1Draft();

      const result = await service.publishDraft({ content_id: entry.id, version: 1, published_by: EDITOR });

      expect(result.success).toBe(false);
      expect(result.errorCode).toBe(PromotionErrorCode.SCHEMA_INVALID);
      const draft = await world.stores.contents.getVersion(entry.id, 1);
      expect(draft.status).toBe(VersionStatus.DRAFT);
      expect(draft.snapshot.translations[0].content._schema).toBe('article@v1.0.0');
      expect((await world.stores.contents.getById(entry.id)).published_version).toBeNull();
    });

    it('should require a migrator for older payloads', async () => {
      const entry = await v1Draft();
      const bare = new ContentVersionService(
        { contentTypes: world.stores.contentTypes, contents: world.stores.contents },
        { now: fixedClock, idGenerator: world.ids }
      );

      const result = await bare.publishDraft({ content_id: entry.id, version: 1, published_by: EDITOR });

      expect(result.errorCode).toBe(PromotionErrorCode.SCHEMA_MIGRATION_REQUIRED);
    });

    it('should report a missing migration edge', async () => {
      const entry = await v1Draft();
      const result = await service.publishDraft({ content_id: entry.id, version: 1, published_by: EDITOR });
      expect(result.errorCode).toBe(PromotionErrorCode.NO_MIGRATION_PATH);
    });

    it('should only publish drafts', async () => {
      registry.register('article', 'v1.0.0', 'v2.0.0', renameTitle);
      const entry = await v1Draft();
      await service.publishDraft({ content_id: entry.id, version: 1, published_by: EDITOR });

      const again = await service.publishDraft({ content_id: entry.id, version: 1, published_by: EDITOR });

      expect(again.errorCode).toBe(PromotionErrorCode.VERSION_CONFLICT);
    });

    it('should archive the previously published version', async () => {
      const entry = await seedEntry(world, article, 'hello', [
        { status: VersionStatus.PUBLISHED, translations: [translation('en', tagged('article@v2.0.0', { headline: 'One' }))] },
        { status: VersionStatus.DRAFT, translations: [translation('en', tagged('article@v2.0.0', { headline: 'Two' }))] }
      ]);

      unwrap(await service.publishDraft({ content_id: entry.id, version: 2, published_by: EDITOR }));

      const versions = unwrap(await service.listVersions(entry.id));
      expect(versions.map((version) => version.status)).toEqual([VersionStatus.ARCHIVED, VersionStatus.PUBLISHED]);
      expect((await world.stores.contents.getById(entry.id)).published_version).toBe(2);
    });

    it('should emit a publish activity event', async () => {
      registry.register('article', 'v1.0.0', 'v2.0.0', renameTitle);
      const entry = await v1Draft();

      await service.publishDraft({ content_id: entry.id, version: 1, published_by: EDITOR });

      expect(events).toEqual([
        {
          verb: 'publish',
          object_type: 'content_entry',
          object_id: entry.id,
          metadata: {
            version: 1,
            schema_version: 'article@v2.0.0',
            migrated: true,
            environment_id: world.staging.id
          },
          occurred_at: FIXED_NOW
        }
      ]);
    });
  });

  describe('createDraft', () => {
    it('should number the draft after the latest version and tag untagged payloads', async () => {
      const entry = await v1Draft();

      const draft = unwrap(
        await service.createDraft({
          content_id: entry.id,
          snapshot: { translations: [translation('en', { headline: 'Hi' })] },
          created_by: 'editor-2',
          base_version: 1
        })
      );

      expect(draft.version).toBe(2);
      expect(draft.status).toBe(VersionStatus.DRAFT);
      expect(draft.snapshot.translations[0].content).toEqual({ headline: 'Hi', _schema: 'article@v2.0.0' });
      const stored = await world.stores.contents.getById(entry.id);
      expect(stored.current_version).toBe(2);
      expect(stored.updated_by).toBe('editor-2');
    });

    it('should reject a stale base version', async () => {
      const entry = await v1Draft();

      const result = await service.createDraft({
        content_id: entry.id,
        snapshot: { translations: [] },
        created_by: EDITOR,
        base_version: 0
      });

      expect(result.errorCode).toBe(PromotionErrorCode.VERSION_CONFLICT);
    });
  });

  describe('history', () => {
    it('should restore an earlier version as a new draft', async () => {
      const entry = await seedEntry(world, article, 'hello', [
        { status: VersionStatus.PUBLISHED, translations: [translation('en', tagged('article@v2.0.0', { headline: 'One' }))] },
        { status: VersionStatus.DRAFT, translations: [translation('en', tagged('article@v2.0.0', { headline: 'Two' }))] }
      ]);

      const result = await service.restoreVersion({ content_id: entry.id, version: 1, restored_by: EDITOR });

      const restored = unwrap(result);
      expect(restored.version).toBe(3);
      expect(restored.snapshot.translations[0].content).toEqual({ headline: 'One', _schema: 'article@v2.0.0' });
      expect(result.metadata).toEqual({ restored_from: 1 });
    });

    it('should archive the published version and clear it from the entry', async () => {
      const entry = await seedEntry(world, article, 'hello', [
        { status: VersionStatus.PUBLISHED, translations: [translation('en', tagged('article@v2.0.0', { headline: 'One' }))] }
      ]);

      const archived = unwrap(await service.archiveVersion({ content_id: entry.id, version: 1, archived_by: EDITOR }));

      expect(archived.status).toBe(VersionStatus.ARCHIVED);
      const stored = await world.stores.contents.getById(entry.id);
      expect(stored.published_version).toBeNull();
      expect(stored.status).toBe(ContentEntryStatus.ARCHIVED);
    });

    it('should refuse to archive a draft', async () => {
      const entry = await v1Draft();
      const result = await service.archiveVersion({ content_id: entry.id, version: 1, archived_by: EDITOR });
      expect(result.errorCode).toBe(PromotionErrorCode.VERSION_CONFLICT);
    });

    it('should report an unknown entry as not found', async () => {
      const result = await service.listVersions('missing');
      expect(result.errorCode).toBe(PromotionErrorCode.NOT_FOUND);
    });
  });

  it('should refuse every operation when versioning is disabled', async () => {
    const entry = await v1Draft();
    const disabled = new ContentVersionService(
      { contentTypes: world.stores.contentTypes, contents: world.stores.contents },
      { versioningEnabled: false }
    );

    expect((await disabled.createDraft({ content_id: entry.id, snapshot: { translations: [] }, created_by: EDITOR })).errorCode).toBe(
      PromotionErrorCode.VERSIONING_DISABLED
    );
    expect((await disabled.getVersion(entry.id, 1)).errorCode).toBe(PromotionErrorCode.VERSIONING_DISABLED);
  });
});
