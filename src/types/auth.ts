/**
 * OAuth2 Token Response
 * amoCRM /oauth2/access_token 的回應
 */
export interface TokenResponse {
  token_type: string;
  expires_in: number;
  access_token: string;
  refresh_token?: string;
}

/**
 * 目前使用中的 token 組
 * 時間皆為 Unix timestamp (ms)，未知時為 undefined
 */
export interface TokenPair {
  accessToken: string;
  refreshToken?: string;
  expiresAt?: number;
  refreshExpiresAt?: number;
}

/**
 * JWT payload（只列出會用到的欄位）
 */
export interface JwtPayload {
  exp?: number;
  [claim: string]: unknown;
}

export type AuthorizationMode = 'popup' | 'post_message';

export interface AuthorizationUrlOptions {
  state?: string;
  mode?: AuthorizationMode;
}

export type HttpMethod = 'GET' | 'POST' | 'PATCH' | 'PUT';

export interface RequestOptions {
  method?: string;
  data?: Record<string, unknown> | unknown[];
}
