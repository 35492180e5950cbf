import { describe, it, expect, jest, beforeEach } from '@jest/globals';
import { JsonObject, MigrationError, PromotionErrorCode } from '../../types/content';
import { MigrationRegistry, MigrationTransform } from '../../services/MigrationRegistry';
import { tagged, thrownBy } from '../helpers/fixtures';

const renameTitle: MigrationTransform = ({ title, ...rest }) => ({ ...rest, headline: title });
const addSummary: MigrationTransform = (payload) => ({ ...payload, summary: '' });

describe('MigrationRegistry', () => {
  let registry: MigrationRegistry;

  beforeEach(() => {
    registry = new MigrationRegistry();
  });

  describe('migrate', () => {
    it('should apply a registered transform', () => {
      registry.register('article', 'article@v1.0.0', 'article@v2.0.0', renameTitle);

      const result = registry.migrate('article', 'article@v1.0.0', 'article@v2.0.0', { title: 'Hello', body: 'World' });

      expect(result).toEqual({ headline: 'Hello', body: 'World' });
    });

    it('should return the payload untouched when versions match', () => {
      const payload: JsonObject = { title: 'Hello' };
      expect(registry.migrate('article', 'v1.0.0', 'article@v1.0.0', payload)).toBe(payload);
    });

    it('should be deterministic and leave its input alone', () => {
      registry.register('article', 'v1.0.0', 'v2.0.0', renameTitle);
      const stored = tagged('article@v1.0.0', { title: 'Hello', tags: ['news'] });

      const first = registry.migrate('article', 'v1.0.0', 'v2.0.0', stored);
      const second = registry.migrate('article', 'v1.0.0', 'v2.0.0', stored);

      expect(first).toEqual(second);
      expect(stored).toEqual({ title: 'Hello', tags: ['news'], _schema: 'article@v1.0.0' });
    });

    it('should hand the transform a payload without the version tag', () => {
      const transform = jest.fn((payload: JsonObject) => ({ ...payload }));
      registry.register('article', 'v1.0.0', 'v2.0.0', transform);

      registry.migrate('article', 'v1.0.0', 'v2.0.0', tagged('article@v1.0.0', { title: 'Hello' }));

      expect(transform).toHaveBeenCalledTimes(1);
      expect(transform.mock.calls[0][0]).toEqual({ title: 'Hello' });
    });

    it('should not chain edges implicitly', () => {
      registry.register('article', 'v1.0.0', 'v2.0.0', renameTitle);
      registry.register('article', 'v2.0.0', 'v3.0.0', addSummary);

      const error = thrownBy(() => registry.migrate('article', 'v1.0.0', 'v3.0.0', { title: 'Hello' }));

      expect(error).toBeInstanceOf(MigrationError);
      expect(error).toMatchObject({ code: PromotionErrorCode.NO_MIGRATION_PATH });
    });

    it('should wrap a throwing transform as MIGRATION_FAILED', () => {
      registry.register('article', 'v1.0.0', 'v2.0.0', () => {
        throw new Error('boom');
      });

      const error = thrownBy(() => registry.migrate('article', 'v1.0.0', 'v2.0.0', { title: 'Hello' }));

      expect(error).toMatchObject({ code: PromotionErrorCode.MIGRATION_FAILED });
      expect(error).toHaveProperty('cause', new Error('boom'));
    });

    it('should reject a transform that returns a non-object', () => {
      registry.register('article', 'v1.0.0', 'v2.0.0', () => JSON.parse('[1]'));

      const error = thrownBy(() => registry.migrate('article', 'v1.0.0', 'v2.0.0', { title: 'Hello' }));

      expect(error).toMatchObject({ code: PromotionErrorCode.MIGRATION_FAILED });
    });
  });

  describe('register', () => {
    it('should reject a duplicate key', () => {
      registry.register('article', 'v1.0.0', 'v2.0.0', renameTitle);

      const error = thrownBy(() => registry.register('article', 'article@v1.0.0', 'article@v2.0.0', addSummary));

      expect(error).toMatchObject({ code: PromotionErrorCode.DUPLICATE_MIGRATION });
    });

    it('should reject malformed versions', () => {
      const error = thrownBy(() => registry.register('article', 'v1', 'v2.0.0', renameTitle));
      expect(error).toMatchObject({ code: PromotionErrorCode.INVALID_FORMAT });
    });

    it('should reject versions belonging to another type', () => {
      const error = thrownBy(() => registry.register('article', 'page@v1.0.0', 'v2.0.0', renameTitle));
      expect(error).toMatchObject({ code: PromotionErrorCode.INVALID_FORMAT });
    });

    it('should key slug-less versions by the type slug', () => {
      registry.register('article', 'v1.0.0', 'v2.0.0', renameTitle);
      expect(registry.has('article', 'article@v1.0.0', 'article@v2.0.0')).toBe(true);
      expect(registry.has('page', 'v1.0.0', 'v2.0.0')).toBe(false);
    });
  });

  describe('list', () => {
    it('should order entries by type then version', () => {
      registry.register('page', 'v1.0.0', 'v2.0.0', addSummary);
      registry.register('article', 'v2.0.0', 'v3.0.0', addSummary);
      registry.register('article', 'v1.0.0', 'v2.0.0', renameTitle);

      expect(registry.list().map((entry) => `${entry.fromVersion} -> ${entry.toVersion}`)).toEqual([
        'article@v1.0.0 -> article@v2.0.0',
        'article@v2.0.0 -> article@v3.0.0',
        'page@v1.0.0 -> page@v2.0.0'
      ]);
      expect(registry.list('page')).toHaveLength(1);
    });
  });

  describe('findPath', () => {
    it('should find the chain of registered edges', () => {
      registry.register('article', 'v1.0.0', 'v2.0.0', renameTitle);
      registry.register('article', 'v2.0.0', 'v3.0.0', addSummary);

      expect(registry.findPath('article', 'v1.0.0', 'v3.0.0')).toEqual([
        'article@v1.0.0',
        'article@v2.0.0',
        'article@v3.0.0'
      ]);
      expect(registry.migrateAlongPath('article', 'v1.0.0', 'v3.0.0', { title: 'Hello' })).toEqual({
        headline: 'Hello',
        summary: ''
      });
    });

    it('should forget cached misses after a registration', () => {
      registry.register('article', 'v1.0.0', 'v2.0.0', renameTitle);
      expect(registry.findPath('article', 'v1.0.0', 'v3.0.0')).toBeNull();

      registry.register('article', 'v2.0.0', 'v3.0.0', addSummary);

      expect(registry.findPath('article', 'v1.0.0', 'v3.0.0')).toHaveLength(3);
    });

    it('should fail migrateAlongPath when no path exists', () => {
      const error = thrownBy(() => registry.migrateAlongPath('article', 'v1.0.0', 'v2.0.0', { title: 'Hello' }));
      expect(error).toMatchObject({ code: PromotionErrorCode.NO_MIGRATION_PATH });
    });
  });
});
