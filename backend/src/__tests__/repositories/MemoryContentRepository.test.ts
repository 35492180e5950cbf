import { describe, it, expect, beforeEach } from '@jest/globals';
import {
  ContentEntry,
  ContentEntryStatus,
  ContentVersion,
  PromotionErrorCode,
  RepositoryConflictError,
  VersionStatus
} from '../../types/content';
import { MemoryContentRepository } from '../../repositories/memory';
import { FIXED_NOW, tagged } from '../helpers/fixtures';

const entry = (overrides: Partial<ContentEntry> = {}): ContentEntry => ({
  id: 'entry-1',
  content_type_id: 'type-1',
  slug: 'hello',
  current_version: 1,
  published_version: null,
  status: ContentEntryStatus.DRAFT,
  environment_id: 'env-production',
  metadata: null,
  created_by: 'editor-1',
  updated_by: 'editor-1',
  created_at: FIXED_NOW,
  updated_at: FIXED_NOW,
  translations: [
    {
      id: 'tr-1',
      content_id: 'entry-1',
      locale_id: 'locale-en',
      locale: 'en',
      translation_group_id: 'entry-1',
      title: 'Hello',
      summary: null,
      content: tagged('article@v1.0.0', { title: 'Hello' }),
      created_at: FIXED_NOW,
      updated_at: FIXED_NOW
    }
  ],
  ...overrides
});

const version = (number: number, status: VersionStatus): ContentVersion => ({
  id: `version-${number}`,
  content_id: 'entry-1',
  version: number,
  status,
  snapshot: { translations: [] },
  created_by: 'editor-1',
  created_at: FIXED_NOW
});

describe('MemoryContentRepository', () => {
  let repo: MemoryContentRepository;

  beforeEach(() => {
    repo = new MemoryContentRepository();
  });

  describe('applyPromotion', () => {
    it('should create the entry with its translations and versions', async () => {
      const created = await repo.applyPromotion({
        entry: entry(),
        create: true,
        versions: [version(1, VersionStatus.DRAFT)],
        archive: []
      });

      expect(created.translations?.map((tr) => tr.title)).toEqual(['Hello']);
      expect((await repo.listVersions('entry-1')).map((v) => v.version)).toEqual([1]);
    });

    it('should archive, append and replace translations together', async () => {
      await repo.applyPromotion({ entry: entry(), create: true, versions: [version(1, VersionStatus.PUBLISHED)], archive: [] });

      await repo.applyPromotion({
        entry: entry({ current_version: 2, published_version: 2, status: ContentEntryStatus.PUBLISHED, translations: [] }),
        create: false,
        versions: [version(2, VersionStatus.PUBLISHED)],
        archive: [{ ...version(1, VersionStatus.PUBLISHED), status: VersionStatus.ARCHIVED }]
      });

      const stored = await repo.getById('entry-1');
      expect(stored.published_version).toBe(2);
      expect(stored.translations).toEqual([]);
      expect((await repo.listVersions('entry-1')).map((v) => [v.version, v.status])).toEqual([
        [1, VersionStatus.ARCHIVED],
        [2, VersionStatus.PUBLISHED]
      ]);
    });

    it('should write nothing when a version number is taken', async () => {
      await repo.applyPromotion({ entry: entry(), create: true, versions: [version(1, VersionStatus.DRAFT)], archive: [] });

      await expect(
        repo.applyPromotion({
          entry: entry({ current_version: 3, translations: [] }),
          create: false,
          versions: [version(2, VersionStatus.DRAFT), version(1, VersionStatus.DRAFT)],
          archive: []
        })
      ).rejects.toBeInstanceOf(RepositoryConflictError);

      const stored = await repo.getById('entry-1');
      expect(stored.current_version).toBe(1);
      expect(stored.translations?.map((tr) => tr.title)).toEqual(['Hello']);
      expect((await repo.listVersions('entry-1')).map((v) => v.version)).toEqual([1]);
    });

    it('should reject a create over an existing slug', async () => {
      await repo.applyPromotion({ entry: entry(), create: true, versions: [], archive: [] });

      await expect(
        repo.applyPromotion({ entry: entry({ id: 'entry-2' }), create: true, versions: [], archive: [] })
      ).rejects.toBeInstanceOf(RepositoryConflictError);
      expect((await repo.list('env-production')).map((e) => e.id)).toEqual(['entry-1']);
    });

    it('should honour a signal that fired before the write', async () => {
      const controller = new AbortController();
      controller.abort();

      await expect(
        repo.applyPromotion({ entry: entry(), create: true, versions: [], archive: [] }, controller.signal)
      ).rejects.toMatchObject({ code: PromotionErrorCode.CANCELLED });
      expect(await repo.list('env-production')).toEqual([]);
    });
  });
});
