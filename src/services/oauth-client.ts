/**
 * OAuth Client
 * amoCRM OAuth2 客戶端 - 交換/更新 token，並以 Bearer token 發送 API 請求
 *
 * Token 過期時拋出 AccessTokenExpiredError / LongTermTokenExpiredError，
 * 更新與重新授權由呼叫端決定（不自動重試）。
 */

import { ofetch } from 'ofetch';
import { loggers } from '../lib/logger.js';
import { decodeJwt, getJwtExpiry, isTimestampExpired, maskToken } from '../lib/jwt.js';
import {
  AccessTokenExpiredError,
  LongTermTokenExpiredError,
  OAuthError,
  TokenExchangeError,
  getErrorMessage,
  getStatusCode,
} from '../lib/errors.js';
import { VERSION } from '../version.js';
import type { OAuthConfig } from '../types/config.js';
import type {
  AuthorizationUrlOptions,
  HttpMethod,
  JwtPayload,
  RequestOptions,
  TokenPair,
  TokenResponse,
} from '../types/auth.js';

export const AUTHORIZE_URL = 'https://www.amocrm.ru/oauth';

// amoCRM 的 refresh token 有效期 3 個月，且每次使用後即失效
export const REFRESH_TOKEN_TTL_MS = 90 * 24 * 60 * 60 * 1000;

const SUPPORTED_METHODS: readonly HttpMethod[] = ['GET', 'POST', 'PATCH', 'PUT'];

function isSupportedMethod(method: string): method is HttpMethod {
  return SUPPORTED_METHODS.some((supported) => supported === method);
}

export function buildBaseUrl(subdomain: string): string {
  return `https://${subdomain}.amocrm.ru`;
}

export interface AccountInfo {
  id: number;
  name: string;
  subdomain: string;
  [field: string]: unknown;
}

export class OAuthClient {
  readonly config: Readonly<OAuthConfig>;
  private tokens: TokenPair | null = null;
  private longliveToken: string | null = null;
  private baseUrl: string | null = null;

  constructor(config: Readonly<OAuthConfig>) {
    this.config = config;
  }

  /**
   * 產生取得 authorization code 的網址
   */
  getAuthorizationUrl(options: AuthorizationUrlOptions = {}): string {
    const params = new URLSearchParams({ client_id: this.config.clientId });
    if (options.state !== undefined) params.set('state', options.state);
    if (options.mode !== undefined) params.set('mode', options.mode);
    return `${AUTHORIZE_URL}?${params.toString()}`;
  }

  /**
   * 綁定既有的 access/refresh token
   * access token 是 JWT 時從 exp 取得過期時間；空字串視為已過期（只剩 refresh token）
   */
  setOAuthCredentials(accessToken: string, refreshToken: string | undefined, subdomain: string): void {
    this.baseUrl = buildBaseUrl(subdomain);
    this.tokens = {
      accessToken,
      refreshToken,
      expiresAt: accessToken ? getJwtExpiry(accessToken) : 0,
    };
  }

  /**
   * 綁定 long-lived token；設定後所有請求優先使用它
   */
  setLongliveToken(longliveToken: string, subdomain: string): void {
    this.baseUrl = buildBaseUrl(subdomain);
    this.longliveToken = longliveToken;
  }

  /**
   * 以 authorization code 交換 token
   * @throws TokenExchangeError token endpoint 拒絕時
   */
  async getAccessToken(authorizationCode: string, subdomain: string): Promise<TokenResponse> {
    this.baseUrl = buildBaseUrl(subdomain);

    const response = await this.postToken(
      {
        client_id: this.config.clientId,
        client_secret: this.config.clientSecret,
        redirect_uri: this.config.redirectUri,
        code: authorizationCode,
        grant_type: 'authorization_code',
      },
      'Authorization code exchange'
    );

    this.storeTokens(response);
    return response;
  }

  /**
   * 以 refresh token 換新的 access token（refresh token 也會一併更換）
   * @throws LongTermTokenExpiredError refresh token 已過期或被拒絕
   */
  async refreshAccessToken(): Promise<TokenResponse> {
    const refreshToken = this.tokens?.refreshToken;
    if (!refreshToken) {
      throw new OAuthError('No refresh token available', { code: 'NO_REFRESH_TOKEN' });
    }
    if (this.isRefreshTokenExpired()) {
      throw new LongTermTokenExpiredError('Refresh token has expired, re-authorization required');
    }

    let response: TokenResponse;
    try {
      response = await this.postToken(
        {
          client_id: this.config.clientId,
          client_secret: this.config.clientSecret,
          redirect_uri: this.config.redirectUri,
          grant_type: 'refresh_token',
          refresh_token: refreshToken,
        },
        'Token refresh'
      );
    } catch (error) {
      const statusCode = error instanceof OAuthError ? error.statusCode : undefined;
      if (statusCode === 400 || statusCode === 401) {
        throw new LongTermTokenExpiredError('Refresh token was rejected, re-authorization required', {
          statusCode,
          cause: error,
        });
      }
      throw error;
    }

    this.storeTokens(response);
    return response;
  }

  /**
   * 發送帶認證的 API 請求
   * @param endpoint 相對於帳號網址的路徑，例如 api/v4/leads
   */
  async request<T>(endpoint: string, options: RequestOptions = {}): Promise<T> {
    const method = (options.method ?? 'GET').toUpperCase();
    if (!isSupportedMethod(method)) {
      throw new OAuthError(`Unsupported HTTP method: ${method}`, { code: 'UNSUPPORTED_METHOD' });
    }

    const baseUrl = this.requireBaseUrl();
    const { token, longTerm } = this.currentBearer();
    const url = `${baseUrl}/${endpoint.replace(/^\/+/, '')}`;
    const startTime = Date.now();

    loggers.http.debug('API request started', { method, url, token: maskToken(token) });

    try {
      const result = await ofetch<T>(url, {
        method,
        headers: {
          Authorization: `Bearer ${token}`,
          'Content-Type': 'application/json',
          'User-Agent': `amocrm-oauth/${VERSION}`,
        },
        body: method === 'GET' ? undefined : options.data,
        retry: 0,
      });

      loggers.http.info('API request completed', { method, url, duration: Date.now() - startTime });
      return result;
    } catch (error) {
      const statusCode = getStatusCode(error);
      loggers.http.error(
        'API request failed',
        error instanceof Error ? error : new Error(String(error)),
        { method, url, statusCode, duration: Date.now() - startTime }
      );

      if (statusCode === 401) {
        throw longTerm
          ? new LongTermTokenExpiredError('Long-lived token was rejected by the API', { statusCode, cause: error })
          : new AccessTokenExpiredError('Access token was rejected by the API', { statusCode, cause: error });
      }
      throw new OAuthError(`Request to ${url} failed: ${getErrorMessage(error)}`, {
        code: 'REQUEST_FAILED',
        statusCode,
        cause: error,
      });
    }
  }

  /**
   * 取得帳號資訊（可用來確認 token 是否有效）
   */
  getAccount(): Promise<AccountInfo> {
    return this.request<AccountInfo>('api/v4/account');
  }

  decodeJwt(token: string): JwtPayload {
    return decodeJwt(token);
  }

  /**
   * 檢查 JWT 是否過期；沒有 token 時回傳 null，沒有 exp 時視為未過期
   */
  isTokenExpired(token?: string | null): boolean | null {
    if (!token) {
      return null;
    }
    const { exp } = decodeJwt(token);
    if (exp === undefined) {
      return false;
    }
    return isTimestampExpired(exp);
  }

  getTokenPair(): TokenPair | null {
    return this.tokens ? { ...this.tokens } : null;
  }

  getLongliveToken(): string | null {
    return this.longliveToken;
  }

  getBaseUrl(): string | null {
    return this.baseUrl;
  }

  private requireBaseUrl(): string {
    if (!this.baseUrl) {
      throw new OAuthError('Client is not bound to an account subdomain', { code: 'NO_SUBDOMAIN' });
    }
    return this.baseUrl;
  }

  private isRefreshTokenExpired(): boolean {
    const refreshExpiresAt = this.tokens?.refreshExpiresAt;
    return refreshExpiresAt !== undefined && isTimestampExpired(refreshExpiresAt / 1000);
  }

  /**
   * 選出本次請求要用的 token，並依序檢查過期：
   * long-lived token → refresh token → access token
   */
  private currentBearer(): { token: string; longTerm: boolean } {
    if (this.longliveToken) {
      const expiresAt = getJwtExpiry(this.longliveToken);
      if (expiresAt !== undefined && isTimestampExpired(expiresAt / 1000)) {
        throw new LongTermTokenExpiredError('Long-lived token has expired');
      }
      return { token: this.longliveToken, longTerm: true };
    }

    if (!this.tokens) {
      throw new OAuthError('No credentials set: exchange a code or set tokens first', {
        code: 'NO_CREDENTIALS',
      });
    }

    if (this.isRefreshTokenExpired()) {
      throw new LongTermTokenExpiredError('Refresh token has expired, re-authorization required');
    }

    const { expiresAt } = this.tokens;
    if (expiresAt !== undefined && isTimestampExpired(expiresAt / 1000)) {
      throw new AccessTokenExpiredError();
    }

    return { token: this.tokens.accessToken, longTerm: false };
  }

  private storeTokens(response: TokenResponse): void {
    const now = Date.now();
    const expiresAt =
      typeof response.expires_in === 'number'
        ? now + response.expires_in * 1000
        : getJwtExpiry(response.access_token);

    this.tokens = {
      accessToken: response.access_token,
      refreshToken: response.refresh_token,
      expiresAt,
      refreshExpiresAt: response.refresh_token ? now + REFRESH_TOKEN_TTL_MS : undefined,
    };
    loggers.oauth.debug('Token pair stored', {
      accessToken: maskToken(response.access_token),
      expiresAt: expiresAt === undefined ? undefined : new Date(expiresAt).toISOString(),
    });
  }

  /**
   * POST 到 token endpoint
   */
  private async postToken(body: Record<string, string>, operation: string): Promise<TokenResponse> {
    const url = `${this.requireBaseUrl()}/oauth2/access_token`;

    return loggers.oauth.trackAsync(
      operation,
      async () => {
        let response: TokenResponse;
        try {
          response = await ofetch<TokenResponse>(url, { method: 'POST', body, retry: 0 });
        } catch (error) {
          const statusCode = getStatusCode(error);
          throw new TokenExchangeError(`${operation} failed: ${getErrorMessage(error)}`, {
            statusCode,
            cause: error,
          });
        }
        if (!response || typeof response.access_token !== 'string' || !response.access_token) {
          throw new TokenExchangeError(`${operation} failed: response has no access_token`);
        }
        return response;
      },
      { url, grantType: body.grant_type }
    );
  }
}
