/**
 * EnvironmentService - isolated workspaces that content is promoted between
 *
 * Lookups only return active environments. Keys are lowercase
 * `[a-z0-9_-]+`; a key derived from a name goes through slugify.
 */

import {
  CreateEnvironmentInput,
  Environment,
  PromotionError,
  PromotionErrorCode,
  RepositoryNotFoundError,
  ServiceResponse,
  UpdateEnvironmentInput
} from '../types/content';
import { EnvironmentRepository } from '../repositories/interfaces';
import { Clock, IdGenerator, newId, systemClock } from '../utils/ids';
import { deriveName, generateSlug, isValidEnvironmentKey, normalizeKey } from '../utils/slug';
import { fail, ok } from '../utils/serviceResponse';
import { createLogger } from '../utils/logger';

const log = createLogger('EnvironmentService');

export interface EnvironmentServiceOptions {
  now?: Clock;
  idGenerator?: IdGenerator;
}

export class EnvironmentService {
  private readonly now: Clock;
  private readonly id: IdGenerator;

  constructor(private readonly repo: EnvironmentRepository, options: EnvironmentServiceOptions = {}) {
    this.now = options.now ?? systemClock;
    this.id = options.idGenerator ?? newId;
  }

  async createEnvironment(input: CreateEnvironmentInput, signal?: AbortSignal): Promise<ServiceResponse<Environment>> {
    try {
      const key = normalizeKey(input.key) || generateSlug(input.name ?? '');
      if (key === '') {
        throw new PromotionError(PromotionErrorCode.VALIDATION_ERROR, 'Environment key is required');
      }
      if (!isValidEnvironmentKey(key)) {
        throw new PromotionError(PromotionErrorCode.VALIDATION_ERROR, `Environment key is invalid: ${key}`, { key });
      }
      const name = input.name?.trim() || deriveName(key);

      const existing = await this.findByKey(key, signal);
      if (existing) {
        throw new PromotionError(PromotionErrorCode.SLUG_EXISTS, `Environment key already exists: ${key}`, { key });
      }

      const now = this.now();
      const created = await this.repo.create(
        {
          id: this.id(),
          key,
          name,
          description: input.description?.trim() || null,
          is_active: input.is_active ?? true,
          is_default: false,
          created_at: now,
          updated_at: now
        },
        signal
      );

      if (input.is_default) {
        await this.setDefault(created.id, signal);
        return ok(await this.repo.getById(created.id, signal));
      }

      log.info(`Created environment ${key}`);
      return ok(created);
    } catch (error) {
      return fail(error, 'Failed to create environment');
    }
  }

  async updateEnvironment(input: UpdateEnvironmentInput, signal?: AbortSignal): Promise<ServiceResponse<Environment>> {
    try {
      const env = await this.repo.getById(input.id, signal).catch((error: unknown) => {
        throw this.translateNotFound(error, input.id);
      });

      if (input.name !== undefined) {
        const name = input.name.trim();
        if (name === '') {
          throw new PromotionError(PromotionErrorCode.VALIDATION_ERROR, 'Environment name is required');
        }
        env.name = name;
      }
      if (input.description !== undefined) {
        env.description = input.description?.trim() || null;
      }
      if (input.is_active !== undefined) env.is_active = input.is_active;
      if (input.is_default === false) env.is_default = false;
      env.updated_at = this.now();

      const updated = await this.repo.update(env, signal);
      if (input.is_default === true) {
        await this.setDefault(updated.id, signal);
        return ok(await this.repo.getById(updated.id, signal));
      }
      return ok(updated);
    } catch (error) {
      return fail(error, 'Failed to update environment');
    }
  }

  /**
   * Active environment by id
   */
  async getEnvironment(id: string, signal?: AbortSignal): Promise<ServiceResponse<Environment>> {
    try {
      const env = await this.repo.getById(id, signal).catch((error: unknown) => {
        throw this.translateNotFound(error, id);
      });
      return ok(this.requireActive(env, id));
    } catch (error) {
      return fail(error, 'Failed to get environment');
    }
  }

  /**
   * Active environment by key (case-insensitive)
   */
  async getEnvironmentByKey(key: string, signal?: AbortSignal): Promise<ServiceResponse<Environment>> {
    try {
      const normalized = normalizeKey(key);
      if (normalized === '') {
        throw new PromotionError(PromotionErrorCode.ENVIRONMENT_NOT_FOUND, 'Environment not found: <empty key>');
      }
      const env = await this.findByKey(normalized, signal);
      if (!env) {
        throw new PromotionError(PromotionErrorCode.ENVIRONMENT_NOT_FOUND, `Environment not found: ${normalized}`, { key: normalized });
      }
      return ok(this.requireActive(env, normalized));
    } catch (error) {
      return fail(error, 'Failed to get environment');
    }
  }

  async listEnvironments(options: { active_only?: boolean } = {}, signal?: AbortSignal): Promise<ServiceResponse<Environment[]>> {
    try {
      const records = await this.repo.list(signal);
      return ok(options.active_only ? records.filter((env) => env.is_active) : records);
    } catch (error) {
      return fail(error, 'Failed to list environments');
    }
  }

  async getDefaultEnvironment(signal?: AbortSignal): Promise<ServiceResponse<Environment>> {
    try {
      const records = await this.repo.list(signal);
      const env = records.find((record) => record.is_default && record.is_active);
      if (!env) {
        throw new PromotionError(PromotionErrorCode.ENVIRONMENT_NOT_FOUND, 'No default environment configured');
      }
      return ok(env);
    } catch (error) {
      return fail(error, 'Failed to get default environment');
    }
  }

  private async setDefault(id: string, signal?: AbortSignal): Promise<void> {
    const records = await this.repo.list(signal);
    for (const env of records) {
      if (env.is_default && env.id !== id) {
        await this.repo.update({ ...env, is_default: false, updated_at: this.now() }, signal);
      }
    }
    const target = await this.repo.getById(id, signal);
    if (!target.is_default) {
      await this.repo.update({ ...target, is_default: true, updated_at: this.now() }, signal);
    }
  }

  private async findByKey(key: string, signal?: AbortSignal): Promise<Environment | null> {
    try {
      return await this.repo.getByKey(key, signal);
    } catch (error) {
      if (RepositoryNotFoundError.isNotFound(error)) return null;
      throw error;
    }
  }

  private requireActive(env: Environment, ref: string): Environment {
    if (!env.is_active) {
      throw new PromotionError(PromotionErrorCode.ENVIRONMENT_NOT_FOUND, `Environment not found: ${ref}`, { environment: ref });
    }
    return env;
  }

  private translateNotFound(error: unknown, ref: string): unknown {
    if (RepositoryNotFoundError.isNotFound(error)) {
      return new PromotionError(PromotionErrorCode.ENVIRONMENT_NOT_FOUND, `Environment not found: ${ref}`, { environment: ref });
    }
    return error;
  }
}
