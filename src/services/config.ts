/**
 * Config Service
 * 設定管理服務 - 處理設定檔讀寫與環境變數
 * 環境變數優先於設定檔；token 只從環境變數讀取
 */

import fs from 'node:fs';
import path from 'node:path';
import os from 'node:os';
import { createOAuthConfig } from '../lib/oauth-config.js';
import { loggers } from '../lib/logger.js';
import type { AppConfig, ConfigKey, EnvTokens, OAuthConfig } from '../types/config.js';

const DEFAULT_CONFIG_DIR = path.join(os.homedir(), '.config', 'amocrm-oauth');
const DEFAULT_CONFIG_FILE = 'config.json';

/** 設定鍵對應的環境變數 */
const ENV_KEYS = {
  clientId: 'AMOCRM_CLIENT_ID',
  clientSecret: 'AMOCRM_CLIENT_SECRET',
  redirectUri: 'AMOCRM_REDIRECT_URI',
  subdomain: 'AMOCRM_SUBDOMAIN',
} as const;

type EnvBackedKey = keyof typeof ENV_KEYS;

export const CONFIG_KEYS: readonly ConfigKey[] = [
  'clientId',
  'clientSecret',
  'redirectUri',
  'subdomain',
  'format',
];

export function isConfigKey(value: string): value is ConfigKey {
  return CONFIG_KEYS.some((key) => key === value);
}

function readEnv(name: string): string | undefined {
  const value = process.env[name];
  return value && value.length > 0 ? value : undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * 只保留已知且型別正確的設定值
 */
function sanitize(raw: unknown): AppConfig {
  if (!isRecord(raw)) {
    return {};
  }
  const config: AppConfig = {};
  for (const key of ['clientId', 'clientSecret', 'redirectUri', 'subdomain'] as const) {
    const value = raw[key];
    if (typeof value === 'string') {
      config[key] = value;
    }
  }
  if (raw.format === 'json' || raw.format === 'table') {
    config.format = raw.format;
  }
  return config;
}

export class ConfigService {
  private configPath: string;
  private config: AppConfig;

  constructor(configPath?: string) {
    this.configPath =
      configPath || process.env.AMOCRM_CONFIG_PATH || path.join(DEFAULT_CONFIG_DIR, DEFAULT_CONFIG_FILE);
    this.config = this.load();
  }

  /**
   * 載入設定檔，不存在或格式錯誤時使用空設定
   */
  private load(): AppConfig {
    if (!fs.existsSync(this.configPath)) {
      return {};
    }
    try {
      const content = fs.readFileSync(this.configPath, 'utf-8');
      return sanitize(JSON.parse(content));
    } catch (error) {
      loggers.config.warn('Ignoring unreadable config file', {
        path: this.configPath,
        reason: error instanceof Error ? error.message : String(error),
      });
      return {};
    }
  }

  private save(): void {
    const dir = path.dirname(this.configPath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
    // 含 client secret，限制為使用者可讀寫
    fs.writeFileSync(this.configPath, JSON.stringify(this.config, null, 2), {
      encoding: 'utf-8',
      mode: 0o600,
    });
  }

  get<K extends ConfigKey>(key: K): AppConfig[K] {
    return this.config[key];
  }

  set<K extends ConfigKey>(key: K, value: AppConfig[K]): void {
    this.config[key] = value;
    this.save();
  }

  getAll(): AppConfig {
    return { ...this.config };
  }

  delete(key: ConfigKey): void {
    delete this.config[key];
    this.save();
  }

  clear(): void {
    this.config = {};
    this.save();
  }

  getConfigPath(): string {
    return this.configPath;
  }

  /**
   * 取得設定值（優先環境變數）
   */
  resolve(key: EnvBackedKey): string | undefined {
    return readEnv(ENV_KEYS[key]) ?? this.config[key];
  }

  getSubdomain(): string | undefined {
    return this.resolve('subdomain');
  }

  /**
   * 取得已驗證的 OAuth 設定
   * @throws ConfigurationError 缺少任何欄位時
   */
  getOAuthConfig(): Readonly<OAuthConfig> {
    return createOAuthConfig({
      clientId: this.resolve('clientId'),
      clientSecret: this.resolve('clientSecret'),
      redirectUri: this.resolve('redirectUri'),
    });
  }

  hasCredentials(): boolean {
    return Boolean(this.resolve('clientId') && this.resolve('clientSecret') && this.resolve('redirectUri'));
  }

  getTokens(): EnvTokens {
    return {
      accessToken: readEnv('AMOCRM_ACCESS_TOKEN'),
      refreshToken: readEnv('AMOCRM_REFRESH_TOKEN'),
      longliveToken: readEnv('AMOCRM_LONGLIVE_TOKEN'),
    };
  }
}

let defaultInstance: ConfigService | null = null;

export function getConfigService(): ConfigService {
  if (!defaultInstance) {
    defaultInstance = new ConfigService();
  }
  return defaultInstance;
}
