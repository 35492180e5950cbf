import { randomUUID } from 'crypto';
import {
  BlockDefinition,
  RegisterBlockDefinitionInput,
  RepositoryConflictError,
  RepositoryNotFoundError,
  UpdateBlockDefinitionInput
} from '../../types/content';
import { ensureSchemaVersion } from '../../utils/schemaMetadata';
import { BlockDefinitionService, EnvironmentRepository } from '../interfaces';
import { copy, tick } from './store';

/**
 * Block definitions held in process, scoped by environment
 */
export class MemoryBlockDefinitionService implements BlockDefinitionService {
  private definitions: Map<string, BlockDefinition> = new Map();

  constructor(private readonly environments: EnvironmentRepository) {}

  async listDefinitions(environmentKey: string, signal?: AbortSignal): Promise<BlockDefinition[]> {
    await tick(signal);
    const env = await this.environments.getByKey(environmentKey, signal);
    return [...this.definitions.values()]
      .filter((definition) => definition.environment_id === env.id)
      .sort((a, b) => a.slug.localeCompare(b.slug))
      .map(copy);
  }

  async registerDefinition(input: RegisterBlockDefinitionInput, signal?: AbortSignal): Promise<BlockDefinition> {
    await tick(signal);
    const env = await this.environments.getByKey(input.environment_key, signal);
    const slug = input.slug.trim();
    if (this.findBySlug(env.id, slug)) {
      throw new RepositoryConflictError('block_definition', `${env.key}/${slug}`);
    }

    const { schema, version } = ensureSchemaVersion(input.schema, slug);
    const definition: BlockDefinition = {
      id: randomUUID(),
      slug,
      name: input.name,
      description: input.description ?? null,
      icon: input.icon ?? null,
      category: input.category ?? null,
      status: input.status,
      schema,
      schema_version: version.toString(),
      ui_schema: input.ui_schema ?? null,
      defaults: input.defaults ?? null,
      environment_id: env.id
    };
    this.definitions.set(definition.id, copy(definition));
    return copy(definition);
  }

  async updateDefinition(input: UpdateBlockDefinitionInput, signal?: AbortSignal): Promise<BlockDefinition> {
    await tick(signal);
    const existing = this.definitions.get(input.id);
    if (!existing) throw new RepositoryNotFoundError('block_definition', input.id);

    const slug = input.slug?.trim() || existing.slug;
    const clash = this.findBySlug(existing.environment_id, slug);
    if (clash && clash.id !== existing.id) {
      throw new RepositoryConflictError('block_definition', slug);
    }

    const updated: BlockDefinition = { ...copy(existing), slug };
    if (input.name !== undefined) updated.name = input.name;
    if (input.description !== undefined) updated.description = input.description;
    if (input.icon !== undefined) updated.icon = input.icon;
    if (input.category !== undefined) updated.category = input.category;
    if (input.status !== undefined) updated.status = input.status;
    if (input.ui_schema !== undefined) updated.ui_schema = input.ui_schema;
    if (input.defaults !== undefined) updated.defaults = input.defaults;
    if (input.schema !== undefined) {
      const { schema, version } = ensureSchemaVersion(input.schema, slug);
      updated.schema = schema;
      updated.schema_version = version.toString();
    }

    this.definitions.set(updated.id, copy(updated));
    return copy(updated);
  }

  private findBySlug(environmentId: string, slug: string): BlockDefinition | undefined {
    const key = slug.trim().toLowerCase();
    return [...this.definitions.values()].find(
      (definition) => definition.environment_id === environmentId && definition.slug.toLowerCase() === key
    );
  }
}
