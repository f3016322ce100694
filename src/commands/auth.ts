/**
 * Auth Command
 * OAuth 指令 - 產生授權網址、交換/更新 token、檢查 token 狀態
 * token 只輸出到 stdout，由使用者自行 export 為環境變數
 */

import { Command } from 'commander';
import { OAuthClient } from '../services/oauth-client.js';
import { createOAuthClientFromSettings } from '../services/factory.js';
import { getConfigService } from '../services/config.js';
import { ConfigurationError } from '../lib/errors.js';
import { getJwtExpiry, isTimestampExpired } from '../lib/jwt.js';
import { formatJSON, formatRowsTable, reportError, resolveFormat } from '../utils/output.js';
import type { AuthorizationMode, TokenResponse } from '../types/auth.js';

export const authCommand = new Command('auth')
  .description('OAuth2 token management');

function isAuthorizationMode(value: string): value is AuthorizationMode {
  return value === 'popup' || value === 'post_message';
}

/**
 * 轉成可直接 export 的環境變數
 */
export function toEnvExports(response: TokenResponse): Record<string, string> {
  const exports: Record<string, string> = { AMOCRM_ACCESS_TOKEN: response.access_token };
  if (response.refresh_token) {
    exports.AMOCRM_REFRESH_TOKEN = response.refresh_token;
  }
  return exports;
}

export type TokenStatus = {
  name: string;
  present: boolean;
  expiresAt: string | null;
  expired: boolean | null;
};

/**
 * 檢查單一 token；非 JWT（例如 refresh token）時無法得知過期時間
 */
export function describeToken(name: string, token: string | undefined, now: number = Date.now()): TokenStatus {
  if (!token) {
    return { name, present: false, expiresAt: null, expired: null };
  }
  const expiresAt = getJwtExpiry(token);
  if (expiresAt === undefined) {
    return { name, present: true, expiresAt: null, expired: null };
  }
  return {
    name,
    present: true,
    expiresAt: new Date(expiresAt).toISOString(),
    expired: isTimestampExpired(expiresAt / 1000, now),
  };
}

/**
 * amocrm auth url
 */
authCommand
  .command('url')
  .description('Print the URL where the account owner grants access')
  .option('--state <state>', 'opaque value echoed back to the redirect URI')
  .option('--mode <mode>', 'popup | post_message')
  .action((options: { state?: string; mode?: string }) => {
    try {
      const mode = options.mode;
      if (mode !== undefined && !isAuthorizationMode(mode)) {
        throw new Error(`Invalid mode: ${mode} (expected popup or post_message)`);
      }
      const client = new OAuthClient(getConfigService().getOAuthConfig());
      console.log(client.getAuthorizationUrl({ state: options.state, mode }));
    } catch (error) {
      reportError(error);
    }
  });

/**
 * amocrm auth exchange <code>
 */
authCommand
  .command('exchange')
  .description('Exchange an authorization code for an access/refresh token pair')
  .argument('<code>', 'authorization code from the redirect')
  .option('-s, --subdomain <subdomain>', 'account subdomain (default: AMOCRM_SUBDOMAIN)')
  .action(async (code: string, options: { subdomain?: string }) => {
    try {
      const settings = getConfigService();
      const subdomain = options.subdomain ?? settings.getSubdomain();
      if (!subdomain) {
        throw new ConfigurationError(['subdomain']);
      }
      const client = new OAuthClient(settings.getOAuthConfig());
      const response = await client.getAccessToken(code, subdomain);
      console.log(formatJSON({ ...response, env: toEnvExports(response) }));
    } catch (error) {
      reportError(error);
    }
  });

/**
 * amocrm auth refresh
 */
authCommand
  .command('refresh')
  .description('Exchange AMOCRM_REFRESH_TOKEN for a new token pair')
  .action(async () => {
    try {
      const client = createOAuthClientFromSettings(getConfigService());
      const response = await client.refreshAccessToken();
      console.log(formatJSON({ ...response, env: toEnvExports(response) }));
    } catch (error) {
      reportError(error);
    }
  });

/**
 * amocrm auth status
 */
authCommand
  .command('status')
  .description('Show expiry of the tokens found in the environment')
  .action((_options: unknown, cmd: Command) => {
    try {
      const settings = getConfigService();
      const format = resolveFormat(cmd.optsWithGlobals().format, settings.get('format'));
      const tokens = settings.getTokens();
      const statuses = [
        describeToken('access', tokens.accessToken),
        describeToken('refresh', tokens.refreshToken),
        describeToken('longlive', tokens.longliveToken),
      ];

      if (format === 'table') {
        console.log(
          formatRowsTable(
            statuses,
            [
              { key: 'name', label: 'Token' },
              { key: 'present', label: 'Present' },
              { key: 'expiresAt', label: 'Expires at' },
              { key: 'expired', label: 'Expired' },
            ]
          )
        );
      } else {
        console.log(formatJSON(statuses));
      }
    } catch (error) {
      reportError(error);
    }
  });
