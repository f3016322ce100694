/**
 * OAuth Errors
 * 錯誤型別 - token 過期與設定錯誤交由呼叫端處理（不重試）
 */

export type OAuthErrorCode =
  | 'OAUTH_ERROR'
  | 'CONFIG_MISSING'
  | 'INVALID_JWT'
  | 'NO_REFRESH_TOKEN'
  | 'NO_CREDENTIALS'
  | 'NO_SUBDOMAIN'
  | 'UNSUPPORTED_METHOD'
  | 'REQUEST_FAILED'
  | 'TOKEN_EXCHANGE_FAILED'
  | 'ACCESS_TOKEN_EXPIRED'
  | 'LONG_TERM_TOKEN_EXPIRED';

export interface OAuthErrorOptions {
  code?: OAuthErrorCode;
  statusCode?: number;
  cause?: unknown;
}

export class OAuthError extends Error {
  public readonly code: OAuthErrorCode;
  public readonly statusCode?: number;

  constructor(message: string, options: OAuthErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'OAuthError';
    this.code = options.code ?? 'OAUTH_ERROR';
    this.statusCode = options.statusCode;
  }
}

/**
 * 缺少必要設定欄位
 */
export class ConfigurationError extends OAuthError {
  public readonly missing: string[];

  constructor(missing: string[]) {
    super(`Missing required configuration: ${missing.join(', ')}`, { code: 'CONFIG_MISSING' });
    this.name = 'ConfigurationError';
    this.missing = missing;
  }
}

/**
 * Token endpoint 拒絕交換（authorization code 或 refresh）
 */
export class TokenExchangeError extends OAuthError {
  constructor(message: string, options: Omit<OAuthErrorOptions, 'code'> = {}) {
    super(message, { ...options, code: 'TOKEN_EXCHANGE_FAILED' });
    this.name = 'TokenExchangeError';
  }
}

/**
 * Access token 已過期，呼叫端可用 refresh token 換新
 */
export class AccessTokenExpiredError extends OAuthError {
  constructor(message = 'Access token has expired', options: Omit<OAuthErrorOptions, 'code'> = {}) {
    super(message, { ...options, code: 'ACCESS_TOKEN_EXPIRED' });
    this.name = 'AccessTokenExpiredError';
  }
}

/**
 * Refresh token 或 long-lived token 已過期，需要重新授權
 */
export class LongTermTokenExpiredError extends OAuthError {
  constructor(message = 'Long-term token has expired', options: Omit<OAuthErrorOptions, 'code'> = {}) {
    super(message, { ...options, code: 'LONG_TERM_TOKEN_EXPIRED' });
    this.name = 'LongTermTokenExpiredError';
  }
}

/**
 * 從 ofetch 的 FetchError（或其他錯誤）取出 HTTP 狀態碼
 */
export function getStatusCode(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null) {
    return undefined;
  }
  if ('statusCode' in error && typeof error.statusCode === 'number') {
    return error.statusCode;
  }
  if ('status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return undefined;
}

export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
