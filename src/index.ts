/**
 * amocrm-oauth
 * OAuth2 token lifecycle wrapper for the amoCRM REST API
 */

export { OAuthClient, buildBaseUrl, AUTHORIZE_URL, REFRESH_TOKEN_TTL_MS } from './services/oauth-client.js';
export type { AccountInfo } from './services/oauth-client.js';
export { createOAuthClient, createOAuthClientFromSettings } from './services/factory.js';
export type { AuthorizationGrant } from './services/factory.js';
export { ConfigService, getConfigService } from './services/config.js';
export { createOAuthConfig } from './lib/oauth-config.js';
export { decodeJwt, isTimestampExpired, getJwtExpiry } from './lib/jwt.js';
export {
  OAuthError,
  ConfigurationError,
  TokenExchangeError,
  AccessTokenExpiredError,
  LongTermTokenExpiredError,
} from './lib/errors.js';
export type { OAuthErrorCode } from './lib/errors.js';
export { StructuredLogger, loggers } from './lib/logger.js';
export type { LogLevel, LogContext, LogEntry } from './lib/logger.js';
export type { OAuthConfig, AppConfig, EnvTokens } from './types/config.js';
export type {
  TokenResponse,
  TokenPair,
  JwtPayload,
  AuthorizationUrlOptions,
  AuthorizationMode,
  RequestOptions,
} from './types/auth.js';
