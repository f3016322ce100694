import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { ConfigService, isConfigKey } from '../../src/services/config.js';
import { ConfigurationError } from '../../src/lib/errors.js';
import fs from 'node:fs';
import path from 'node:path';
import os from 'node:os';

describe('ConfigService', () => {
  let configService: ConfigService;
  let testConfigDir: string;
  let testConfigPath: string;

  beforeEach(() => {
    // 清除環境變數以隔離測試
    for (const name of [
      'AMOCRM_CLIENT_ID',
      'AMOCRM_CLIENT_SECRET',
      'AMOCRM_REDIRECT_URI',
      'AMOCRM_SUBDOMAIN',
      'AMOCRM_ACCESS_TOKEN',
      'AMOCRM_REFRESH_TOKEN',
      'AMOCRM_LONGLIVE_TOKEN',
    ]) {
      vi.stubEnv(name, '');
    }

    testConfigDir = fs.mkdtempSync(path.join(os.tmpdir(), 'amocrm-oauth-test-'));
    testConfigPath = path.join(testConfigDir, 'nested', 'config.json');
    configService = new ConfigService(testConfigPath);
  });

  afterEach(() => {
    fs.rmSync(testConfigDir, { recursive: true, force: true });
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
  });

  describe('get/set', () => {
    it('should return undefined for non-existent key', () => {
      expect(configService.get('clientId')).toBeUndefined();
    });

    it('should persist values to file', () => {
      configService.set('clientId', 'persistent-id');

      const newService = new ConfigService(testConfigPath);
      expect(newService.get('clientId')).toBe('persistent-id');
    });

    it('should write the file readable by the owner only', () => {
      configService.set('clientSecret', 'test-secret');

      expect(fs.statSync(testConfigPath).mode & 0o777).toBe(0o600);
    });

    it('should delete and clear values', () => {
      configService.set('clientId', 'id');
      configService.set('subdomain', 'test');

      configService.delete('clientId');
      expect(configService.getAll()).toEqual({ subdomain: 'test' });

      configService.clear();
      expect(new ConfigService(testConfigPath).getAll()).toEqual({});
    });

    it('should return a copy from getAll', () => {
      configService.set('subdomain', 'test');
      const all = configService.getAll();
      all.subdomain = 'changed';

      expect(configService.get('subdomain')).toBe('test');
    });
  });

  describe('load', () => {
    it('should ignore an invalid JSON file', () => {
      fs.mkdirSync(path.dirname(testConfigPath), { recursive: true });
      fs.writeFileSync(testConfigPath, '{ not json');
      vi.spyOn(process.stderr, 'write').mockImplementation(() => true);

      expect(new ConfigService(testConfigPath).getAll()).toEqual({});
    });

    it('should drop unknown keys and invalid values', () => {
      fs.mkdirSync(path.dirname(testConfigPath), { recursive: true });
      fs.writeFileSync(
        testConfigPath,
        JSON.stringify({ clientId: 'file-id', accessToken: 'should-not-load', format: 'csv', subdomain: 42 })
      );

      expect(new ConfigService(testConfigPath).getAll()).toEqual({ clientId: 'file-id' });
    });
  });

  describe('environment variables', () => {
    it('should prefer environment variables over the file', () => {
      configService.set('clientId', 'file-id');
      vi.stubEnv('AMOCRM_CLIENT_ID', 'env-id');

      expect(configService.resolve('clientId')).toBe('env-id');
    });

    it('should fall back to the file when the variable is empty', () => {
      configService.set('subdomain', 'file-sub');

      expect(configService.getSubdomain()).toBe('file-sub');
    });

    it('should read tokens from the environment only', () => {
      vi.stubEnv('AMOCRM_ACCESS_TOKEN', 'access-1');
      vi.stubEnv('AMOCRM_REFRESH_TOKEN', 'refresh-1');

      expect(configService.getTokens()).toEqual({
        accessToken: 'access-1',
        refreshToken: 'refresh-1',
        longliveToken: undefined,
      });
    });
  });

  describe('getOAuthConfig', () => {
    it('should combine env and file values', () => {
      configService.set('redirectUri', 'https://example.com/callback');
      vi.stubEnv('AMOCRM_CLIENT_ID', 'env-id');
      vi.stubEnv('AMOCRM_CLIENT_SECRET', 'test-secret');

      expect(configService.getOAuthConfig()).toEqual({
        clientId: 'env-id',
        clientSecret: 'test-secret',
        redirectUri: 'https://example.com/callback',
      });
      expect(configService.hasCredentials()).toBe(true);
    });

    it('should throw ConfigurationError listing missing fields', () => {
      configService.set('clientId', 'id');

      expect(() => configService.getOAuthConfig()).toThrow(ConfigurationError);
      expect(() => configService.getOAuthConfig()).toThrow(
        'Missing required configuration: clientSecret, redirectUri'
      );
      expect(configService.hasCredentials()).toBe(false);
    });
  });

  describe('isConfigKey', () => {
    it('should accept known keys only', () => {
      expect(isConfigKey('subdomain')).toBe(true);
      expect(isConfigKey('accessToken')).toBe(false);
    });
  });
});
