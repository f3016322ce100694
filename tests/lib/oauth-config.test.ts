import { describe, it, expect } from 'vitest';
import { createOAuthConfig } from '../../src/lib/oauth-config.js';
import { ConfigurationError } from '../../src/lib/errors.js';
import { testConfig } from '../helpers/tokens.js';

describe('createOAuthConfig', () => {
  it('should return the three fields unchanged', () => {
    expect(createOAuthConfig(testConfig)).toEqual(testConfig);
  });

  it('should return a frozen object', () => {
    const config = createOAuthConfig(testConfig);

    expect(Object.isFrozen(config)).toBe(true);
  });

  it('should name every missing field', () => {
    try {
      createOAuthConfig({ clientSecret: 'test-secret' });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      expect((error as ConfigurationError).missing).toEqual(['clientId', 'redirectUri']);
      expect((error as ConfigurationError).message).toBe(
        'Missing required configuration: clientId, redirectUri'
      );
    }
  });

  it('should treat empty strings as missing', () => {
    expect(() => createOAuthConfig({ ...testConfig, clientSecret: '' })).toThrow(
      'Missing required configuration: clientSecret'
    );
  });
});
