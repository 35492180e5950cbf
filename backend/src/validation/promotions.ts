import Joi from 'joi';
import {
  PromoteContentEntryRequest,
  PromoteContentTypeRequest,
  PromoteEnvironmentRequest,
  PromoteOptions,
  PromotionError,
  PromotionErrorCode,
  PromotionMode,
  PromotionScope,
  ResolvedPromoteOptions
} from '../types/content';

// Promotion request validation schemas
const promoteOptions = Joi.object<PromoteOptions>({
  dry_run: Joi.boolean().default(false),
  force: Joi.boolean().default(false),
  allow_breaking_changes: Joi.boolean().default(false),
  allow_draft: Joi.boolean().default(false),
  promote_as_active: Joi.boolean().default(false),
  promote_as_published: Joi.boolean().default(false),
  prefer_published: Joi.boolean().default(true),
  migrate_on_promote: Joi.boolean().default(true),
  include_versions: Joi.boolean().default(false),
  auto_promote_type: Joi.boolean().default(false),
  // merge is the older name of upsert
  mode: Joi.string()
    .trim()
    .lowercase()
    .valid(PromotionMode.STRICT, PromotionMode.UPSERT, 'merge')
    .default(PromotionMode.STRICT)
});

const environmentKey = Joi.string().trim().max(100).allow('');
const ids = Joi.array().items(Joi.string().trim().min(1)).default([]);

export const promotionSchemas = {
  options: promoteOptions,

  promoteContentType: Joi.object<PromoteContentTypeRequest>({
    content_type_id: Joi.string().trim().min(1).required(),
    target_environment: environmentKey.optional(),
    target_environment_id: Joi.string().trim().optional(),
    options: promoteOptions.optional()
  }),

  promoteContentEntry: Joi.object<PromoteContentEntryRequest>({
    content_id: Joi.string().trim().min(1).required(),
    target_environment: environmentKey.optional(),
    target_environment_id: Joi.string().trim().optional(),
    options: promoteOptions.optional()
  }),

  promoteEnvironment: Joi.object<PromoteEnvironmentRequest>({
    source_environment: environmentKey.required(),
    target_environment: environmentKey.required(),
    scope: Joi.string()
      .valid(PromotionScope.CONTENT_TYPES, PromotionScope.CONTENT_ENTRIES, PromotionScope.ALL)
      .default(PromotionScope.ALL),
    content_type_ids: ids,
    content_type_slugs: ids,
    content_ids: ids,
    content_slugs: ids,
    content_entry_type_id: Joi.string().trim().allow('').optional(),
    content_entry_type_slug: Joi.string().trim().allow('').optional(),
    options: promoteOptions.optional()
  })
};

/**
 * Validate a request against one of the promotion schemas, applying defaults.
 * Throws VALIDATION_ERROR listing every failing field.
 */
export function validateRequest<T>(schema: Joi.ObjectSchema<T>, value: unknown): T {
  const { error, value: validated } = schema.validate(value, { abortEarly: false, stripUnknown: true });
  if (error) {
    throw new PromotionError(
      PromotionErrorCode.VALIDATION_ERROR,
      error.details.map((detail) => detail.message).join('; '),
      { fields: error.details.map((detail) => detail.path.join('.')) }
    );
  }
  return validated;
}

/**
 * Apply option defaults: strict mode, prefer published, migrate on promote
 */
export function resolveOptions(options: PromoteOptions | undefined): ResolvedPromoteOptions {
  const input = options ?? {};
  return {
    dry_run: input.dry_run ?? false,
    force: input.force ?? false,
    allow_breaking_changes: input.allow_breaking_changes ?? false,
    allow_draft: input.allow_draft ?? false,
    promote_as_active: input.promote_as_active ?? false,
    promote_as_published: input.promote_as_published ?? false,
    prefer_published: input.prefer_published ?? true,
    migrate_on_promote: input.migrate_on_promote ?? true,
    include_versions: input.include_versions ?? false,
    auto_promote_type: input.auto_promote_type ?? false,
    mode: normalizeMode(input.mode)
  };
}

export function normalizeMode(mode: string | undefined): PromotionMode {
  const value = (mode ?? '').trim().toLowerCase();
  if (value === PromotionMode.UPSERT || value === 'merge') return PromotionMode.UPSERT;
  return PromotionMode.STRICT;
}
