import { describe, it, expect } from 'vitest';
import {
  AccessTokenExpiredError,
  LongTermTokenExpiredError,
  OAuthError,
  TokenExchangeError,
  getStatusCode,
} from '../../src/lib/errors.js';

describe('OAuth errors', () => {
  it('should carry distinct codes and names', () => {
    const access = new AccessTokenExpiredError();
    const longTerm = new LongTermTokenExpiredError();

    expect(access).toBeInstanceOf(OAuthError);
    expect(access.code).toBe('ACCESS_TOKEN_EXPIRED');
    expect(access.name).toBe('AccessTokenExpiredError');
    expect(access.message).toBe('Access token has expired');
    expect(longTerm).toBeInstanceOf(OAuthError);
    expect(longTerm).not.toBeInstanceOf(AccessTokenExpiredError);
    expect(longTerm.code).toBe('LONG_TERM_TOKEN_EXPIRED');
  });

  it('should keep statusCode and cause', () => {
    const cause = new Error('400 Bad Request');
    const error = new TokenExchangeError('exchange failed', { statusCode: 400, cause });

    expect(error.code).toBe('TOKEN_EXCHANGE_FAILED');
    expect(error.statusCode).toBe(400);
    expect(error.cause).toBe(cause);
  });

  it('should default the code to OAUTH_ERROR', () => {
    expect(new OAuthError('boom').code).toBe('OAUTH_ERROR');
  });
});

describe('getStatusCode', () => {
  it('should read statusCode, then status', () => {
    expect(getStatusCode({ statusCode: 401 })).toBe(401);
    expect(getStatusCode({ status: 503 })).toBe(503);
  });

  it('should return undefined for other values', () => {
    expect(getStatusCode(new Error('network'))).toBeUndefined();
    expect(getStatusCode('oops')).toBeUndefined();
    expect(getStatusCode(null)).toBeUndefined();
  });
});
