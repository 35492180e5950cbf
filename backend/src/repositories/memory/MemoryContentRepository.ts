import {
  ContentEntry,
  ContentTranslation,
  ContentVersion,
  RepositoryConflictError,
  RepositoryNotFoundError
} from '../../types/content';
import { ContentRepository, EntryPromotionWrite } from '../interfaces';
import { copy, slugKey, tick } from './store';

export class MemoryContentRepository implements ContentRepository {
  private records: Map<string, ContentEntry> = new Map();
  private bySlug: Map<string, string> = new Map();
  private translations: Map<string, ContentTranslation[]> = new Map();
  private versions: Map<string, ContentVersion[]> = new Map();

  async getById(id: string, signal?: AbortSignal): Promise<ContentEntry> {
    await tick(signal);
    return this.hydrate(id);
  }

  async getBySlug(slug: string, contentTypeId: string, environmentId: string, signal?: AbortSignal): Promise<ContentEntry> {
    await tick(signal);
    const id = this.bySlug.get(slugKey(environmentId, contentTypeId, slug));
    if (!id) throw new RepositoryNotFoundError('content', `${environmentId}/${slug}`);
    return this.hydrate(id);
  }

  async list(environmentId: string, signal?: AbortSignal): Promise<ContentEntry[]> {
    await tick(signal);
    return [...this.records.values()]
      .filter((record) => record.environment_id === environmentId)
      .sort((a, b) => a.slug.localeCompare(b.slug) || a.id.localeCompare(b.id))
      .map((record) => this.hydrate(record.id));
  }

  async create(record: ContentEntry, signal?: AbortSignal): Promise<ContentEntry> {
    await tick(signal);
    const key = slugKey(record.environment_id, record.content_type_id, record.slug);
    if (this.records.has(record.id) || this.bySlug.has(key)) {
      throw new RepositoryConflictError('content', `${record.environment_id}/${record.slug}`);
    }
    const entry = copy(record);
    delete entry.translations;
    this.records.set(record.id, entry);
    this.bySlug.set(key, record.id);
    this.translations.set(record.id, copy(record.translations ?? []));
    return this.hydrate(record.id);
  }

  async update(record: ContentEntry, signal?: AbortSignal): Promise<ContentEntry> {
    await tick(signal);
    const existing = this.records.get(record.id);
    if (!existing) throw new RepositoryNotFoundError('content', record.id);

    const key = slugKey(record.environment_id, record.content_type_id, record.slug);
    const owner = this.bySlug.get(key);
    if (owner !== undefined && owner !== record.id) {
      throw new RepositoryConflictError('content', `${record.environment_id}/${record.slug}`);
    }
    this.bySlug.delete(slugKey(existing.environment_id, existing.content_type_id, existing.slug));
    this.bySlug.set(key, record.id);

    // translations change only through applyPromotion
    const entry = copy(record);
    delete entry.translations;
    this.records.set(record.id, entry);
    return this.hydrate(record.id);
  }

  async listVersions(contentId: string, signal?: AbortSignal): Promise<ContentVersion[]> {
    await tick(signal);
    return [...(this.versions.get(contentId) ?? [])].sort((a, b) => a.version - b.version).map(copy);
  }

  async getVersion(contentId: string, version: number, signal?: AbortSignal): Promise<ContentVersion> {
    await tick(signal);
    const record = (this.versions.get(contentId) ?? []).find((entry) => entry.version === version);
    if (!record) throw new RepositoryNotFoundError('content_version', `${contentId}@${version}`);
    return copy(record);
  }

  async getLatestVersion(contentId: string, signal?: AbortSignal): Promise<ContentVersion> {
    await tick(signal);
    const list = this.versions.get(contentId) ?? [];
    if (list.length === 0) throw new RepositoryNotFoundError('content_version', `${contentId}@latest`);
    return copy(list.reduce((latest, entry) => (entry.version > latest.version ? entry : latest)));
  }

  async createVersion(record: ContentVersion, signal?: AbortSignal): Promise<ContentVersion> {
    await tick(signal);
    if (!this.records.has(record.content_id)) throw new RepositoryNotFoundError('content', record.content_id);
    const list = this.versions.get(record.content_id) ?? [];
    if (list.some((entry) => entry.version === record.version)) {
      throw new RepositoryConflictError('content_version', `${record.content_id}@${record.version}`);
    }
    list.push(copy(record));
    this.versions.set(record.content_id, list);
    return copy(record);
  }

  async updateVersion(record: ContentVersion, signal?: AbortSignal): Promise<ContentVersion> {
    await tick(signal);
    const list = this.versions.get(record.content_id) ?? [];
    const index = list.findIndex((entry) => entry.version === record.version);
    if (index === -1) throw new RepositoryNotFoundError('content_version', `${record.content_id}@${record.version}`);
    list[index] = copy(record);
    return copy(record);
  }

  async applyPromotion(write: EntryPromotionWrite, signal?: AbortSignal): Promise<ContentEntry> {
    await tick(signal);
    const { entry } = write;
    const key = slugKey(entry.environment_id, entry.content_type_id, entry.slug);
    const owner = this.bySlug.get(key);

    // every check runs before the first mutation
    if (write.create) {
      if (this.records.has(entry.id) || owner !== undefined) {
        throw new RepositoryConflictError('content', `${entry.environment_id}/${entry.slug}`);
      }
    } else {
      if (!this.records.has(entry.id)) throw new RepositoryNotFoundError('content', entry.id);
      if (owner !== undefined && owner !== entry.id) {
        throw new RepositoryConflictError('content', `${entry.environment_id}/${entry.slug}`);
      }
    }
    const current = write.create ? [] : this.versions.get(entry.id) ?? [];
    const taken = new Set(current.map((version) => version.version));
    for (const version of write.versions) {
      if (version.content_id !== entry.id || taken.has(version.version)) {
        throw new RepositoryConflictError('content_version', `${version.content_id}@${version.version}`);
      }
      taken.add(version.version);
    }
    for (const version of write.archive) {
      if (version.content_id !== entry.id || !current.some((existing) => existing.version === version.version)) {
        throw new RepositoryNotFoundError('content_version', `${version.content_id}@${version.version}`);
      }
    }

    if (!write.create) {
      const previous = this.records.get(entry.id);
      if (previous) this.bySlug.delete(slugKey(previous.environment_id, previous.content_type_id, previous.slug));
    }
    const record = copy(entry);
    delete record.translations;
    this.records.set(entry.id, record);
    this.bySlug.set(key, entry.id);
    this.translations.set(entry.id, copy(entry.translations ?? []));

    const list = current.map((version) => {
      const replacement = write.archive.find((archived) => archived.version === version.version);
      return replacement ? copy(replacement) : version;
    });
    list.push(...write.versions.map(copy));
    this.versions.set(entry.id, list);
    return this.hydrate(entry.id);
  }

  private hydrate(id: string): ContentEntry {
    const record = this.records.get(id);
    if (!record) throw new RepositoryNotFoundError('content', id);
    return { ...copy(record), translations: copy(this.translations.get(id) ?? []) };
  }
}
