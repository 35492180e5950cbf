import { describe, it, expect } from '@jest/globals';
import { deriveName, generateSlug, isValidEnvironmentKey, normalizeKey } from '../../utils/slug';

describe('Slug Utilities', () => {
  describe('generateSlug', () => {
    it('should generate slug from title', () => {
      const slug = generateSlug('This is a Test Title');
      expect(slug).toBe('this-is-a-test-title');
    });

    it('should handle special characters', () => {
      const slug = generateSlug('Special & Characters! @#$%');
      expect(slug).toBe('special-and-characters-dollarpercent');
    });

    it('should handle multiple spaces', () => {
      const slug = generateSlug('Title   with    multiple    spaces');
      expect(slug).toBe('title-with-multiple-spaces');
    });

    it('should handle empty string', () => {
      expect(generateSlug('')).toBe('');
    });

    it('should handle unicode characters', () => {
      const slug = generateSlug('Café & Résumé');
      expect(slug).toBe('cafe-and-resume');
    });
  });

  describe('normalizeKey', () => {
    it('should trim and lowercase', () => {
      expect(normalizeKey('  Production ')).toBe('production');
    });

    it('should treat missing keys as empty', () => {
      expect(normalizeKey(undefined)).toBe('');
      expect(normalizeKey(null)).toBe('');
    });
  });

  describe('isValidEnvironmentKey', () => {
    it('should accept lowercase letters, digits, dashes and underscores', () => {
      expect(isValidEnvironmentKey('staging-2')).toBe(true);
      expect(isValidEnvironmentKey('qa_eu')).toBe(true);
    });

    it('should reject anything else', () => {
      expect(isValidEnvironmentKey('Staging')).toBe(false);
      expect(isValidEnvironmentKey('stage one')).toBe(false);
      expect(isValidEnvironmentKey('')).toBe(false);
    });
  });

  describe('deriveName', () => {
    it('should capitalize the key', () => {
      expect(deriveName('staging')).toBe('Staging');
      expect(deriveName('  ')).toBe('');
    });
  });
});
