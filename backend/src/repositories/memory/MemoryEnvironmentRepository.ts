import { Environment, RepositoryConflictError, RepositoryNotFoundError } from '../../types/content';
import { EnvironmentRepository } from '../interfaces';
import { copy, tick } from './store';

export class MemoryEnvironmentRepository implements EnvironmentRepository {
  private records: Map<string, Environment> = new Map();

  async getById(id: string, signal?: AbortSignal): Promise<Environment> {
    await tick(signal);
    const record = this.records.get(id);
    if (!record) throw new RepositoryNotFoundError('environment', id);
    return copy(record);
  }

  async getByKey(key: string, signal?: AbortSignal): Promise<Environment> {
    await tick(signal);
    const record = [...this.records.values()].find((env) => env.key === key);
    if (!record) throw new RepositoryNotFoundError('environment', key);
    return copy(record);
  }

  async list(signal?: AbortSignal): Promise<Environment[]> {
    await tick(signal);
    return [...this.records.values()].sort((a, b) => a.key.localeCompare(b.key)).map(copy);
  }

  async create(record: Environment, signal?: AbortSignal): Promise<Environment> {
    await tick(signal);
    if (this.records.has(record.id) || [...this.records.values()].some((env) => env.key === record.key)) {
      throw new RepositoryConflictError('environment', record.key);
    }
    this.records.set(record.id, copy(record));
    return copy(record);
  }

  async update(record: Environment, signal?: AbortSignal): Promise<Environment> {
    await tick(signal);
    if (!this.records.has(record.id)) throw new RepositoryNotFoundError('environment', record.id);
    const clash = [...this.records.values()].find((env) => env.key === record.key && env.id !== record.id);
    if (clash) throw new RepositoryConflictError('environment', record.key);
    this.records.set(record.id, copy(record));
    return copy(record);
  }
}
