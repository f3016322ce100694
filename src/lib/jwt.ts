/**
 * JWT Utilities
 * 解析 amoCRM token 的 payload（不驗證簽章）與過期判斷
 */

import { OAuthError } from './errors.js';
import type { JwtPayload } from '../types/auth.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * 解碼 JWT payload
 * @throws OAuthError (INVALID_JWT) 格式錯誤時
 */
export function decodeJwt(token: string): JwtPayload {
  const parts = token.split('.');
  if (parts.length !== 3) {
    throw new OAuthError('Invalid JWT: expected 3 segments', { code: 'INVALID_JWT' });
  }

  let payload: unknown;
  try {
    const json = Buffer.from(parts[1], 'base64url').toString('utf-8');
    payload = JSON.parse(json);
  } catch (error) {
    throw new OAuthError('Invalid JWT: payload is not valid JSON', {
      code: 'INVALID_JWT',
      cause: error,
    });
  }

  if (!isRecord(payload)) {
    throw new OAuthError('Invalid JWT: payload is not an object', { code: 'INVALID_JWT' });
  }
  const { exp } = payload;
  if (exp !== undefined && typeof exp !== 'number') {
    throw new OAuthError('Invalid JWT: exp is not a number', { code: 'INVALID_JWT' });
  }

  return { ...payload, exp };
}

/**
 * Unix timestamp（秒）是否早於目前的整秒
 * 同一秒內視為尚未過期
 */
export function isTimestampExpired(timestamp: number, now: number = Date.now()): boolean {
  return timestamp < Math.floor(now / 1000);
}

/**
 * 取得 JWT 的過期時間 (ms)，無法解析或沒有 exp 時回傳 undefined
 */
export function getJwtExpiry(token: string): number | undefined {
  try {
    const { exp } = decodeJwt(token);
    return exp === undefined ? undefined : exp * 1000;
  } catch {
    // amoCRM 的 refresh token 不是 JWT
    return undefined;
  }
}

/**
 * 遮蔽 token，只保留前 8 個字元供日誌使用
 */
export function maskToken(token: string): string {
  if (token.length <= 8) {
    return '***';
  }
  return `${token.slice(0, 8)}…`;
}
