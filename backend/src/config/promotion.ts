import Joi from 'joi';
import { DEFAULT_ENVIRONMENT_KEY, PromotionError, PromotionErrorCode } from '../types/content';
import { LogLevel } from '../utils/logger';

/**
 * Capabilities of the promotion engine, fixed at construction time
 */
export interface PromotionFeatures {
  // emit activity events after each persisted promotion
  activity: boolean;
  // publishDraft and version history operations
  versioning: boolean;
  // fail at startup when no block definition service is wired
  requireBlockService: boolean;
}

export interface PromotionConfig {
  databaseUrl: string | null;
  defaultEnvironmentKey: string;
  logLevel: LogLevel;
  features: PromotionFeatures;
}

interface RawPromotionEnv {
  DATABASE_URL?: string;
  PROMOTION_DEFAULT_ENVIRONMENT: string;
  PROMOTION_ACTIVITY_ENABLED: boolean;
  PROMOTION_VERSIONING_ENABLED: boolean;
  PROMOTION_REQUIRE_BLOCK_SERVICE: boolean;
  PROMOTION_LOG_LEVEL: LogLevel;
}

const envSchema = Joi.object<RawPromotionEnv>({
  DATABASE_URL: Joi.string().uri({ scheme: ['postgres', 'postgresql'] }).optional(),
  PROMOTION_DEFAULT_ENVIRONMENT: Joi.string().trim().lowercase().min(1).max(100).default(DEFAULT_ENVIRONMENT_KEY),
  PROMOTION_ACTIVITY_ENABLED: Joi.boolean().truthy('1').falsy('0').default(true),
  PROMOTION_VERSIONING_ENABLED: Joi.boolean().truthy('1').falsy('0').default(true),
  PROMOTION_REQUIRE_BLOCK_SERVICE: Joi.boolean().truthy('1').falsy('0').default(false),
  PROMOTION_LOG_LEVEL: Joi.string().valid('debug', 'info', 'warn', 'error', 'silent').default('info')
}).unknown(true);

export const DEFAULT_FEATURES: PromotionFeatures = {
  activity: true,
  versioning: true,
  requireBlockService: false
};

/**
 * Read promotion settings from environment variables.
 * Throws VALIDATION_ERROR naming every invalid variable.
 */
export function loadPromotionConfig(env: NodeJS.ProcessEnv = process.env): PromotionConfig {
  const { error, value } = envSchema.validate(env, { abortEarly: false });
  if (error) {
    throw new PromotionError(
      PromotionErrorCode.VALIDATION_ERROR,
      `Invalid promotion configuration: ${error.details.map((detail) => detail.message).join('; ')}`
    );
  }

  return {
    databaseUrl: value.DATABASE_URL ?? null,
    defaultEnvironmentKey: value.PROMOTION_DEFAULT_ENVIRONMENT,
    logLevel: value.PROMOTION_LOG_LEVEL,
    features: {
      activity: value.PROMOTION_ACTIVITY_ENABLED,
      versioning: value.PROMOTION_VERSIONING_ENABLED,
      requireBlockService: value.PROMOTION_REQUIRE_BLOCK_SERVICE
    }
  };
}
