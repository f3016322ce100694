import { describe, it, expect } from 'vitest';
import { decodeJwt, getJwtExpiry, isTimestampExpired, maskToken } from '../../src/lib/jwt.js';
import { OAuthError } from '../../src/lib/errors.js';
import { makeJwt, NOW, NOW_SECONDS } from '../helpers/tokens.js';

describe('decodeJwt', () => {
  it('should return the payload claims', () => {
    const token = makeJwt({ exp: 1767225600, account_id: 42, base_domain: 'amocrm.ru' });

    expect(decodeJwt(token)).toEqual({ exp: 1767225600, account_id: 42, base_domain: 'amocrm.ru' });
  });

  it('should throw INVALID_JWT when segments are missing', () => {
    expect(() => decodeJwt('not-a-jwt')).toThrow(OAuthError);
    expect(() => decodeJwt('not-a-jwt')).toThrow('Invalid JWT: expected 3 segments');
  });

  it('should throw when the payload is not JSON', () => {
    const token = `header.${Buffer.from('plain text').toString('base64url')}.sig`;

    try {
      decodeJwt(token);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(OAuthError);
      expect((error as OAuthError).code).toBe('INVALID_JWT');
    }
  });

  it('should reject a non-object payload', () => {
    const token = `header.${Buffer.from('[1,2]').toString('base64url')}.sig`;

    expect(() => decodeJwt(token)).toThrow('Invalid JWT: payload is not an object');
  });

  it('should reject a non-numeric exp', () => {
    expect(() => decodeJwt(makeJwt({ exp: 'tomorrow' }))).toThrow('Invalid JWT: exp is not a number');
  });
});

describe('isTimestampExpired', () => {
  it('should be expired when the timestamp is in the past', () => {
    expect(isTimestampExpired(NOW_SECONDS - 1, NOW)).toBe(true);
  });

  it('should not be expired within the current second', () => {
    expect(isTimestampExpired(NOW_SECONDS, NOW + 999)).toBe(false);
  });

  it('should not be expired in the future', () => {
    expect(isTimestampExpired(NOW_SECONDS + 3600, NOW)).toBe(false);
  });
});

describe('getJwtExpiry', () => {
  it('should convert exp to milliseconds', () => {
    expect(getJwtExpiry(makeJwt({ exp: NOW_SECONDS }))).toBe(NOW);
  });

  it('should return undefined for opaque tokens', () => {
    expect(getJwtExpiry('def50200opaque')).toBeUndefined();
  });

  it('should return undefined when exp is absent', () => {
    expect(getJwtExpiry(makeJwt({ sub: 'user' }))).toBeUndefined();
  });
});

describe('maskToken', () => {
  it('should keep the first 8 characters', () => {
    expect(maskToken('abcdefghijklmnop')).toBe('abcdefgh…');
  });

  it('should fully mask short tokens', () => {
    expect(maskToken('short')).toBe('***');
  });
});
