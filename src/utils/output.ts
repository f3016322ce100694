/**
 * Output Module
 * 輸出格式化與錯誤→退出碼對應
 */

import Table from 'cli-table3';
import {
  AccessTokenExpiredError,
  ConfigurationError,
  LongTermTokenExpiredError,
  OAuthError,
  getErrorMessage,
} from '../lib/errors.js';

export type OutputFormat = 'json' | 'table';

export const EXIT_CODES = {
  OK: 0,
  USAGE: 1,
  API_ERROR: 2,
  CONFIG_MISSING: 3,
  ACCESS_TOKEN_EXPIRED: 4,
  LONG_TERM_TOKEN_EXPIRED: 5,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

export function resolveFormat(value: unknown, fallback: OutputFormat = 'json'): OutputFormat {
  return value === 'table' || value === 'json' ? value : fallback;
}

export function formatJSON<T>(data: T, pretty: boolean = true): string {
  return pretty ? JSON.stringify(data, null, 2) : JSON.stringify(data);
}

/**
 * 將 key/value 列表畫成兩欄表格
 */
export function formatKeyValueTable(rows: Array<[string, string]>, head: [string, string] = ['Key', 'Value']): string {
  const table = new Table({
    head,
    style: { head: ['cyan'] },
  });
  for (const row of rows) {
    table.push(row);
  }
  return table.toString();
}

/**
 * 將物件列表畫成表格，欄位依 columns 順序
 */
export function formatRowsTable<T extends Record<string, unknown>>(
  rows: T[],
  columns: Array<{ key: keyof T & string; label: string }>
): string {
  const table = new Table({
    head: columns.map((col) => col.label),
    style: { head: ['cyan'] },
  });
  for (const row of rows) {
    table.push(columns.map((col) => formatCell(row[col.key])));
  }
  return table.toString();
}

export function formatCell(value: unknown): string {
  if (value === undefined || value === null) return '-';
  if (typeof value === 'object') return JSON.stringify(value);
  return String(value);
}

export function exitCodeFor(error: unknown): ExitCode {
  if (error instanceof LongTermTokenExpiredError) return EXIT_CODES.LONG_TERM_TOKEN_EXPIRED;
  if (error instanceof AccessTokenExpiredError) return EXIT_CODES.ACCESS_TOKEN_EXPIRED;
  if (error instanceof ConfigurationError) return EXIT_CODES.CONFIG_MISSING;
  if (error instanceof OAuthError) return EXIT_CODES.API_ERROR;
  return EXIT_CODES.USAGE;
}

const HINTS: Partial<Record<ExitCode, string>> = {
  [EXIT_CODES.CONFIG_MISSING]: 'Run `amocrm config set <key> <value>` or set AMOCRM_* environment variables',
  [EXIT_CODES.ACCESS_TOKEN_EXPIRED]: 'Run `amocrm auth refresh` and export the new tokens',
  [EXIT_CODES.LONG_TERM_TOKEN_EXPIRED]: 'Re-authorize: `amocrm auth url`, then `amocrm auth exchange <code>`',
};

/**
 * 輸出錯誤到 stderr 並設定退出碼
 */
export function reportError(error: unknown): ExitCode {
  const code = exitCodeFor(error);
  console.error(`Error: ${getErrorMessage(error)}`);
  const hint = HINTS[code];
  if (hint) {
    console.error(hint);
  }
  process.exitCode = code;
  return code;
}
