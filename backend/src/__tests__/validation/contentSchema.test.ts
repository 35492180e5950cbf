import { describe, it, expect } from '@jest/globals';
import { JsonObject, PromotionError, PromotionErrorCode } from '../../types/content';
import { assertValidPayload, validatePayload } from '../../validation/contentSchema';
import { thrownBy } from '../helpers/fixtures';

const articleSchema: JsonObject = {
  type: 'object',
  additionalProperties: false,
  metadata: { slug: 'article', schema_version: 'article@v2.0.0' },
  properties: {
    headline: { type: 'string', minLength: 3 },
    body: { type: 'string' },
    rating: { type: 'integer', minimum: 1, maximum: 5 },
    layout: { enum: ['wide', 'narrow'] },
    tags: { type: 'array', items: { type: 'string' } }
  },
  required: ['headline']
};

describe('Content payload validation', () => {
  it('should accept a payload that satisfies the schema', () => {
    const result = validatePayload(articleSchema, {
      headline: 'Hello',
      body: '',
      rating: 4,
      layout: 'wide',
      tags: ['news']
    });
    expect(result).toEqual({ valid: true, issues: [] });
  });

  it('should report a missing required field', () => {
    const result = validatePayload(articleSchema, { body: 'World' });
    expect(result.valid).toBe(false);
    expect(result.issues).toEqual([{ path: 'headline', message: '"headline" is required' }]);
  });

  it('should reject unknown keys on a closed schema but allow embedded blocks', () => {
    expect(validatePayload(articleSchema, { headline: 'Hello', extra: true }).issues.map((issue) => issue.path)).toEqual([
      'extra'
    ]);
    expect(validatePayload(articleSchema, { headline: 'Hello', blocks: [{ type: 'hero' }] }).valid).toBe(true);
  });

  it('should allow unknown keys when the schema is open', () => {
    const open: JsonObject = { type: 'object', properties: { headline: { type: 'string' } } };
    expect(validatePayload(open, { headline: 'Hello', extra: true }).valid).toBe(true);
  });

  it('should enforce enums and bounds', () => {
    const result = validatePayload(articleSchema, { headline: 'Hi', rating: 9, layout: 'tall' });
    expect(result.issues.map((issue) => issue.path)).toEqual(['headline', 'rating', 'layout']);
  });

  it('should not coerce values', () => {
    const result = validatePayload(articleSchema, { headline: 'Hello', rating: '4' });
    expect(result.issues.map((issue) => issue.path)).toEqual(['rating']);
  });

  it('should validate array items', () => {
    const result = validatePayload(articleSchema, { headline: 'Hello', tags: ['news', 3] });
    expect(result.issues.map((issue) => issue.path)).toEqual(['tags.1']);
  });

  describe('assertValidPayload', () => {
    it('should throw SCHEMA_INVALID listing the issues', () => {
      const error = thrownBy(() => assertValidPayload(articleSchema, { body: 'World' }, { locale: 'en' }));

      expect(error).toBeInstanceOf(PromotionError);
      expect(error).toMatchObject({
        code: PromotionErrorCode.SCHEMA_INVALID,
        context: { locale: 'en', issues: [{ path: 'headline', message: '"headline" is required' }] }
      });
    });

    it('should pass a valid payload through silently', () => {
      expect(() => assertValidPayload(articleSchema, { headline: 'Hello' })).not.toThrow();
    });
  });
});
