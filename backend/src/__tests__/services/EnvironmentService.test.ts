import { describe, it, expect, beforeEach } from '@jest/globals';
import { PromotionErrorCode } from '../../types/content';
import { EnvironmentService } from '../../services/EnvironmentService';
import { createMemoryStores } from '../../engine';
import { unwrap } from '../../utils/serviceResponse';
import { fixedClock, sequentialIds } from '../helpers/fixtures';

describe('EnvironmentService', () => {
  let service: EnvironmentService;

  beforeEach(() => {
    service = new EnvironmentService(createMemoryStores().environments, { now: fixedClock, idGenerator: sequentialIds() });
  });

  describe('createEnvironment', () => {
    it('should derive the key from the name', async () => {
      const env = unwrap(await service.createEnvironment({ name: 'Staging Area' }));

      expect(env).toMatchObject({
        id: '00000000-0000-4000-8000-000000000001',
        key: 'staging-area',
        name: 'Staging Area',
        description: null,
        is_active: true,
        is_default: false
      });
    });

    it('should normalize the key and derive the name', async () => {
      const env = unwrap(await service.createEnvironment({ key: ' QA ' }));
      expect(env.key).toBe('qa');
      expect(env.name).toBe('Qa');
    });

    it('should reject an invalid key', async () => {
      const result = await service.createEnvironment({ key: 'qa env' });
      expect(result.success).toBe(false);
      expect(result.errorCode).toBe(PromotionErrorCode.VALIDATION_ERROR);
    });

    it('should reject a duplicate key', async () => {
      await service.createEnvironment({ key: 'qa' });

      const result = await service.createEnvironment({ key: 'QA' });

      expect(result.success).toBe(false);
      expect(result.errorCode).toBe(PromotionErrorCode.SLUG_EXISTS);
    });
  });

  describe('default environment', () => {
    it('should fail when none is configured', async () => {
      const result = await service.getDefaultEnvironment();
      expect(result.errorCode).toBe(PromotionErrorCode.ENVIRONMENT_NOT_FOUND);
    });

    it('should move the default flag', async () => {
      const staging = unwrap(await service.createEnvironment({ key: 'staging', is_default: true }));
      expect(staging.is_default).toBe(true);

      const production = unwrap(await service.createEnvironment({ key: 'production', is_default: true }));

      expect(unwrap(await service.getDefaultEnvironment()).id).toBe(production.id);
      expect(unwrap(await service.getEnvironment(staging.id)).is_default).toBe(false);
    });
  });

  describe('lookups', () => {
    it('should find environments by key regardless of case', async () => {
      const created = unwrap(await service.createEnvironment({ key: 'production' }));
      expect(unwrap(await service.getEnvironmentByKey(' Production ')).id).toBe(created.id);
    });

    it('should hide inactive environments', async () => {
      const archived = unwrap(await service.createEnvironment({ key: 'legacy', is_active: false }));

      expect((await service.getEnvironmentByKey('legacy')).errorCode).toBe(PromotionErrorCode.ENVIRONMENT_NOT_FOUND);
      expect((await service.getEnvironment(archived.id)).errorCode).toBe(PromotionErrorCode.ENVIRONMENT_NOT_FOUND);
    });

    it('should report unknown ids and empty keys as not found', async () => {
      expect((await service.getEnvironment('missing')).errorCode).toBe(PromotionErrorCode.ENVIRONMENT_NOT_FOUND);
      expect((await service.getEnvironmentByKey('  ')).errorCode).toBe(PromotionErrorCode.ENVIRONMENT_NOT_FOUND);
    });

    it('should list environments by key and filter inactive ones on request', async () => {
      await service.createEnvironment({ key: 'staging' });
      await service.createEnvironment({ key: 'legacy', is_active: false });
      await service.createEnvironment({ key: 'production' });

      expect(unwrap(await service.listEnvironments()).map((env) => env.key)).toEqual(['legacy', 'production', 'staging']);
      expect(unwrap(await service.listEnvironments({ active_only: true })).map((env) => env.key)).toEqual([
        'production',
        'staging'
      ]);
    });
  });

  describe('updateEnvironment', () => {
    it('should update the name and deactivate', async () => {
      const env = unwrap(await service.createEnvironment({ key: 'qa' }));

      const updated = unwrap(await service.updateEnvironment({ id: env.id, name: ' Quality ', is_active: false }));

      expect(updated.name).toBe('Quality');
      expect(updated.is_active).toBe(false);
    });

    it('should reject an empty name', async () => {
      const env = unwrap(await service.createEnvironment({ key: 'qa' }));
      const result = await service.updateEnvironment({ id: env.id, name: ' ' });
      expect(result.errorCode).toBe(PromotionErrorCode.VALIDATION_ERROR);
    });
  });
});
