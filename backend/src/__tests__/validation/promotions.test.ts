import { describe, it, expect } from '@jest/globals';
import { PromotionErrorCode, PromotionMode, PromotionScope } from '../../types/content';
import { normalizeMode, promotionSchemas, resolveOptions, validateRequest } from '../../validation/promotions';
import { thrownBy } from '../helpers/fixtures';

describe('Promotion request validation', () => {
  describe('resolveOptions', () => {
    it('should apply defaults', () => {
      expect(resolveOptions(undefined)).toEqual({
        dry_run: false,
        force: false,
        allow_breaking_changes: false,
        allow_draft: false,
        promote_as_active: false,
        promote_as_published: false,
        prefer_published: true,
        migrate_on_promote: true,
        include_versions: false,
        auto_promote_type: false,
        mode: PromotionMode.STRICT
      });
    });

    it('should keep explicit values', () => {
      const options = resolveOptions({ prefer_published: false, mode: 'merge', dry_run: true });
      expect(options.prefer_published).toBe(false);
      expect(options.dry_run).toBe(true);
      expect(options.mode).toBe(PromotionMode.UPSERT);
    });
  });

  describe('normalizeMode', () => {
    it('should map merge to upsert and anything unknown to strict', () => {
      expect(normalizeMode(' Upsert ')).toBe(PromotionMode.UPSERT);
      expect(normalizeMode('merge')).toBe(PromotionMode.UPSERT);
      expect(normalizeMode('')).toBe(PromotionMode.STRICT);
      expect(normalizeMode(undefined)).toBe(PromotionMode.STRICT);
    });
  });

  describe('validateRequest', () => {
    it('should fill environment promotion defaults', () => {
      const request = validateRequest(promotionSchemas.promoteEnvironment, {
        source_environment: 'staging',
        target_environment: 'production'
      });

      expect(request).toEqual({
        source_environment: 'staging',
        target_environment: 'production',
        scope: PromotionScope.ALL,
        content_type_ids: [],
        content_type_slugs: [],
        content_ids: [],
        content_slugs: []
      });
    });

    it('should list every failing field', () => {
      const error = thrownBy(() => validateRequest(promotionSchemas.promoteContentType, { target_environment: 'production' }));

      expect(error).toMatchObject({
        code: PromotionErrorCode.VALIDATION_ERROR,
        context: { fields: ['content_type_id'] }
      });
    });

    it('should reject an unknown promotion mode', () => {
      const error = thrownBy(() =>
        validateRequest(promotionSchemas.promoteContentEntry, { content_id: 'entry-1', options: { mode: 'replace' } })
      );

      expect(error).toMatchObject({
        code: PromotionErrorCode.VALIDATION_ERROR,
        context: { fields: ['options.mode'] }
      });
    });

    it('should accept the merge alias in any case', () => {
      const request = validateRequest(promotionSchemas.promoteContentEntry, { content_id: 'entry-1', options: { mode: 'MERGE' } });
      expect(resolveOptions(request.options).mode).toBe(PromotionMode.UPSERT);
    });
  });
});
