import { describe, it, expect } from 'vitest';
import { applyConfigValue, maskConfig } from '../../src/commands/config.js';

describe('Config Command', () => {
  describe('maskConfig', () => {
    it('should mask the client secret', () => {
      expect(maskConfig({ clientId: 'test-client-id', clientSecret: 'test-secret', format: 'table' })).toEqual({
        clientId: 'test-client-id',
        clientSecret: '********',
        format: 'table',
      });
    });

    it('should omit unset keys', () => {
      expect(maskConfig({})).toEqual({});
    });
  });

  describe('applyConfigValue', () => {
    it('should set string settings', () => {
      expect(applyConfigValue({ clientId: 'old' }, 'subdomain', 'test')).toEqual({
        clientId: 'old',
        subdomain: 'test',
      });
    });

    it('should validate the format', () => {
      expect(applyConfigValue({}, 'format', 'table')).toEqual({ format: 'table' });
      expect(() => applyConfigValue({}, 'format', 'csv')).toThrow('Invalid format: csv (expected json or table)');
    });

    it('should not mutate the input', () => {
      const config = { subdomain: 'old' };

      applyConfigValue(config, 'subdomain', 'new');

      expect(config.subdomain).toBe('old');
    });
  });
});
