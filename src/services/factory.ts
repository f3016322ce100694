/**
 * Client Factory
 * 建立 OAuthClient：以 authorization code 完成初次交換，或從環境變數綁定既有 token
 */

import { OAuthClient } from './oauth-client.js';
import { ConfigurationError } from '../lib/errors.js';
import { createOAuthConfig } from '../lib/oauth-config.js';
import { loggers } from '../lib/logger.js';
import type { ConfigService } from './config.js';
import type { OAuthConfig } from '../types/config.js';

export interface AuthorizationGrant {
  authorizationCode: string;
  subdomain: string;
}

/**
 * 建立 client 並以 authorization code 取得初始 token
 * @throws ConfigurationError 設定缺欄位
 * @throws TokenExchangeError 交換失敗
 */
export async function createOAuthClient(
  config: Partial<OAuthConfig>,
  grant: AuthorizationGrant
): Promise<OAuthClient> {
  const client = new OAuthClient(createOAuthConfig(config));
  await client.getAccessToken(grant.authorizationCode, grant.subdomain);
  return client;
}

/**
 * 從設定與環境變數建立 client，不發送網路請求
 * 請求時 long-lived token 優先；AMOCRM_ACCESS_TOKEN / AMOCRM_REFRESH_TOKEN 一併綁定
 * 只有 refresh token 時，access token 視為已過期，等待呼叫端 refresh
 * @throws ConfigurationError 缺少設定或 token
 */
export function createOAuthClientFromSettings(settings: ConfigService): OAuthClient {
  const client = new OAuthClient(settings.getOAuthConfig());

  const subdomain = settings.getSubdomain();
  if (!subdomain) {
    throw new ConfigurationError(['subdomain']);
  }

  const { accessToken, refreshToken, longliveToken } = settings.getTokens();
  // long-lived token 存在時仍綁定 refresh token，`auth refresh` 才能使用
  if (accessToken || refreshToken) {
    client.setOAuthCredentials(accessToken ?? '', refreshToken, subdomain);
    loggers.oauth.debug('Using access token from environment', { subdomain, hasRefreshToken: Boolean(refreshToken) });
  }
  if (longliveToken) {
    client.setLongliveToken(longliveToken, subdomain);
    loggers.oauth.debug('Using long-lived token', { subdomain });
  }
  if (accessToken || refreshToken || longliveToken) {
    return client;
  }

  throw new ConfigurationError(['AMOCRM_ACCESS_TOKEN, AMOCRM_REFRESH_TOKEN or AMOCRM_LONGLIVE_TOKEN']);
}
