/**
 * Request Command
 * 以目前的 token 發送 API 請求並輸出 JSON 回應
 */

import { Command } from 'commander';
import { createOAuthClientFromSettings } from '../services/factory.js';
import { getConfigService } from '../services/config.js';
import { formatJSON, reportError } from '../utils/output.js';
import type { RequestOptions } from '../types/auth.js';

export const requestCommand = new Command('request')
  .description('Send an authenticated request to the account API')
  .argument('<endpoint>', 'path relative to the account URL, e.g. api/v4/leads')
  .option('-X, --method <method>', 'GET | POST | PATCH | PUT', 'GET')
  .option('-d, --data <json>', 'JSON request body');

/**
 * 解析 --data；只接受 JSON 物件或陣列
 */
export function parseRequestBody(raw: string | undefined): RequestOptions['data'] {
  if (raw === undefined) {
    return undefined;
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new Error('--data must be valid JSON');
  }
  if (Array.isArray(parsed)) {
    return parsed;
  }
  if (typeof parsed === 'object' && parsed !== null) {
    return Object.fromEntries(Object.entries(parsed));
  }
  throw new Error('--data must be a JSON object or array');
}

requestCommand.action(async (endpoint: string, options: { method: string; data?: string }) => {
  try {
    const data = parseRequestBody(options.data);
    const client = createOAuthClientFromSettings(getConfigService());
    const result = await client.request<unknown>(endpoint, { method: options.method, data });
    console.log(formatJSON(result));
  } catch (error) {
    reportError(error);
  }
});
