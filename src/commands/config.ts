/**
 * Config Command
 * 設定檔管理指令（不儲存 token）
 */

import { Command } from 'commander';
import { getConfigService, isConfigKey, CONFIG_KEYS } from '../services/config.js';
import { formatJSON, formatKeyValueTable, reportError, resolveFormat } from '../utils/output.js';
import type { AppConfig, ConfigKey } from '../types/config.js';

export const configCommand = new Command('config')
  .description('Manage stored settings (tokens are read from the environment only)');

const SECRET_KEYS: ReadonlySet<ConfigKey> = new Set<ConfigKey>(['clientSecret']);

function requireKey(key: string): ConfigKey {
  if (!isConfigKey(key)) {
    throw new Error(`Unknown config key: ${key} (expected one of ${CONFIG_KEYS.join(', ')})`);
  }
  return key;
}

/**
 * 遮蔽敏感設定值
 */
export function maskConfig(config: AppConfig): Record<string, string> {
  const masked: Record<string, string> = {};
  for (const key of CONFIG_KEYS) {
    const value = config[key];
    if (value === undefined) continue;
    masked[key] = SECRET_KEYS.has(key) ? '********' : value;
  }
  return masked;
}

/**
 * 套用一筆設定；format 只接受 json 或 table
 */
export function applyConfigValue(config: AppConfig, key: ConfigKey, value: string): AppConfig {
  if (key === 'format') {
    if (value !== 'json' && value !== 'table') {
      throw new Error(`Invalid format: ${value} (expected json or table)`);
    }
    return { ...config, format: value };
  }
  const next: AppConfig = { ...config };
  next[key] = value;
  return next;
}

configCommand
  .command('set')
  .description('Store a setting')
  .argument('<key>', CONFIG_KEYS.join(' | '))
  .argument('<value>')
  .action((key: string, value: string) => {
    try {
      const service = getConfigService();
      const configKey = requireKey(key);
      const next = applyConfigValue(service.getAll(), configKey, value);
      service.set(configKey, next[configKey]);
    } catch (error) {
      reportError(error);
    }
  });

configCommand
  .command('get')
  .description('Print a stored setting')
  .argument('<key>')
  .action((key: string) => {
    try {
      const configKey = requireKey(key);
      const value = getConfigService().get(configKey);
      if (value !== undefined) {
        console.log(value);
      }
    } catch (error) {
      reportError(error);
    }
  });

configCommand
  .command('unset')
  .description('Remove a stored setting')
  .argument('<key>')
  .action((key: string) => {
    try {
      getConfigService().delete(requireKey(key));
    } catch (error) {
      reportError(error);
    }
  });

configCommand
  .command('list')
  .description('List stored settings (secrets masked)')
  .action((_options: unknown, cmd: Command) => {
    const service = getConfigService();
    const masked = maskConfig(service.getAll());
    const format = resolveFormat(cmd.optsWithGlobals().format, service.get('format'));
    if (format === 'table') {
      console.log(formatKeyValueTable(Object.entries(masked)));
    } else {
      console.log(formatJSON(masked));
    }
  });

configCommand
  .command('path')
  .description('Print the settings file path')
  .action(() => {
    console.log(getConfigService().getConfigPath());
  });
