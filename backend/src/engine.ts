/**
 * Composition root: wires repositories, the migration registry and the
 * promotion services from a PromotionConfig
 */

import dotenv from 'dotenv';
import { Pool } from 'pg';
import { Locale } from './types/content';
import {
  ActivitySink,
  BlockDefinitionService,
  ContentRepository,
  ContentTypeRepository,
  EnvironmentRepository,
  LocaleRepository
} from './repositories/interfaces';
import {
  MemoryBlockDefinitionService,
  MemoryContentRepository,
  MemoryContentTypeRepository,
  MemoryEnvironmentRepository,
  MemoryLocaleRepository
} from './repositories/memory';
import {
  PgActivitySink,
  PgBlockDefinitionService,
  PgContentRepository,
  PgContentTypeRepository,
  PgEnvironmentRepository,
  PgLocaleRepository
} from './db';
import { PromotionConfig, loadPromotionConfig } from './config/promotion';
import { ActivityEmitter } from './services/ActivityEmitter';
import { ContentVersionService } from './services/ContentVersionService';
import { EnvironmentService } from './services/EnvironmentService';
import { MigrationRegistry } from './services/MigrationRegistry';
import { PromotionService } from './services/PromotionService';
import { createPool } from './utils/database';
import { Clock, IdGenerator } from './utils/ids';
import { createLogger, setLogLevel } from './utils/logger';

const log = createLogger('PromotionEngine');

export interface PromotionStores {
  contentTypes: ContentTypeRepository;
  contents: ContentRepository;
  locales: LocaleRepository;
  environments: EnvironmentRepository;
  blocks?: BlockDefinitionService;
  activitySink?: ActivitySink;
}

export interface MemoryStores extends PromotionStores {
  contentTypes: MemoryContentTypeRepository;
  contents: MemoryContentRepository;
  locales: MemoryLocaleRepository;
  environments: MemoryEnvironmentRepository;
  blocks: MemoryBlockDefinitionService;
}

export interface PromotionEngine {
  config: PromotionConfig;
  migrations: MigrationRegistry;
  activity: ActivityEmitter;
  environments: EnvironmentService;
  versions: ContentVersionService;
  promotions: PromotionService;
  close(): Promise<void>;
}

export interface PromotionEngineOptions {
  migrations?: MigrationRegistry;
  now?: Clock;
  idGenerator?: IdGenerator;
  onClose?: () => Promise<void>;
}

export function createMemoryStores(locales: Locale[] = []): MemoryStores {
  const environments = new MemoryEnvironmentRepository();
  return {
    contentTypes: new MemoryContentTypeRepository(),
    contents: new MemoryContentRepository(),
    locales: new MemoryLocaleRepository(locales),
    environments,
    blocks: new MemoryBlockDefinitionService(environments)
  };
}

export function createPgStores(pool: Pool): PromotionStores {
  return {
    contentTypes: new PgContentTypeRepository(pool),
    contents: new PgContentRepository(pool),
    locales: new PgLocaleRepository(pool),
    environments: new PgEnvironmentRepository(pool),
    blocks: new PgBlockDefinitionService(pool),
    activitySink: new PgActivitySink(pool)
  };
}

export function createPromotionEngine(
  stores: PromotionStores,
  config: PromotionConfig,
  options: PromotionEngineOptions = {}
): PromotionEngine {
  const { features } = config;
  const migrations = options.migrations ?? new MigrationRegistry();
  const clock = { now: options.now, idGenerator: options.idGenerator };

  const activity = new ActivityEmitter({ enabled: features.activity, sink: stores.activitySink, now: options.now });
  const environments = new EnvironmentService(stores.environments, clock);
  const versions = new ContentVersionService(
    { contentTypes: stores.contentTypes, contents: stores.contents, migrator: migrations, activity },
    { ...clock, versioningEnabled: features.versioning }
  );
  const promotions = new PromotionService(
    {
      contentTypes: stores.contentTypes,
      contents: stores.contents,
      locales: stores.locales,
      environments,
      blocks: stores.blocks,
      migrator: migrations,
      activity
    },
    { ...clock, defaultEnvironmentKey: config.defaultEnvironmentKey, features }
  );

  return {
    config,
    migrations,
    activity,
    environments,
    versions,
    promotions,
    close: async () => {
      activity.removeAllListeners();
      if (options.onClose) await options.onClose();
    }
  };
}

/**
 * Build an engine from environment variables. With DATABASE_URL the pg
 * repositories are used, otherwise everything is held in memory.
 */
export function bootstrapPromotionEngine(
  env: NodeJS.ProcessEnv = process.env,
  options: Omit<PromotionEngineOptions, 'onClose'> = {}
): PromotionEngine {
  dotenv.config();
  const config = loadPromotionConfig(env);
  setLogLevel(config.logLevel);

  if (!config.databaseUrl) {
    log.info('DATABASE_URL not set, using in-memory repositories');
    return createPromotionEngine(createMemoryStores(), config, options);
  }

  const pool = createPool(config.databaseUrl);
  pool.on('error', (error) => {
    log.error('Unexpected database pool error', error);
  });
  log.info(`Promotion engine ready (default environment: ${config.defaultEnvironmentKey})`);
  return createPromotionEngine(createPgStores(pool), config, { ...options, onClose: () => pool.end() });
}
