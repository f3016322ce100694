/**
 * OAuth Config
 * 驗證必要欄位並建立不可變的 OAuthConfig
 */

import { ConfigurationError } from './errors.js';
import type { OAuthConfig } from '../types/config.js';

const REQUIRED_FIELDS = ['clientId', 'clientSecret', 'redirectUri'] as const;

/**
 * @throws ConfigurationError 列出所有缺少的欄位
 */
export function createOAuthConfig(input: Partial<OAuthConfig>): Readonly<OAuthConfig> {
  const missing = REQUIRED_FIELDS.filter((key) => !input[key]);
  if (missing.length > 0) {
    throw new ConfigurationError([...missing]);
  }

  const { clientId = '', clientSecret = '', redirectUri = '' } = input;
  return Object.freeze({ clientId, clientSecret, redirectUri });
}
