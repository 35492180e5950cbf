import { ContentType, RepositoryConflictError, RepositoryNotFoundError } from '../../types/content';
import { ContentTypeRepository } from '../interfaces';
import { copy, slugKey, tick } from './store';

export class MemoryContentTypeRepository implements ContentTypeRepository {
  private records: Map<string, ContentType> = new Map();
  private bySlug: Map<string, string> = new Map();

  async getById(id: string, signal?: AbortSignal): Promise<ContentType> {
    await tick(signal);
    const record = this.records.get(id);
    if (!record) throw new RepositoryNotFoundError('content_type', id);
    return copy(record);
  }

  async getBySlug(slug: string, environmentId: string, signal?: AbortSignal): Promise<ContentType> {
    await tick(signal);
    const id = this.bySlug.get(slugKey(environmentId, slug));
    const record = id ? this.records.get(id) : undefined;
    if (!record) throw new RepositoryNotFoundError('content_type', `${environmentId}/${slug}`);
    return copy(record);
  }

  async list(environmentId: string, signal?: AbortSignal): Promise<ContentType[]> {
    await tick(signal);
    return [...this.records.values()]
      .filter((record) => record.environment_id === environmentId)
      .sort((a, b) => a.slug.localeCompare(b.slug))
      .map(copy);
  }

  async create(record: ContentType, signal?: AbortSignal): Promise<ContentType> {
    await tick(signal);
    const key = slugKey(record.environment_id, record.slug);
    if (this.records.has(record.id) || this.bySlug.has(key)) {
      throw new RepositoryConflictError('content_type', `${record.environment_id}/${record.slug}`);
    }
    this.records.set(record.id, copy(record));
    this.bySlug.set(key, record.id);
    return copy(record);
  }

  async update(record: ContentType, signal?: AbortSignal): Promise<ContentType> {
    await tick(signal);
    const existing = this.records.get(record.id);
    if (!existing) throw new RepositoryNotFoundError('content_type', record.id);

    const key = slugKey(record.environment_id, record.slug);
    const owner = this.bySlug.get(key);
    if (owner !== undefined && owner !== record.id) {
      throw new RepositoryConflictError('content_type', `${record.environment_id}/${record.slug}`);
    }
    this.bySlug.delete(slugKey(existing.environment_id, existing.slug));
    this.bySlug.set(key, record.id);
    this.records.set(record.id, copy(record));
    return copy(record);
  }
}
