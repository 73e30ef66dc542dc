/**
 * Config Command
 * 設定檔管理指令
 */

import { Command } from 'commander';
import { getConfigService, isConfigKey, CONFIG_KEYS } from '../services/config.js';
import type { AppConfig } from '../types/config.js';
import { exitWithError, printJson, renderKeyValueTable, resolveFormat } from '../utils/output.js';

export const configCommand = new Command('config').description('Manage the configuration file');

/**
 * client secret 不顯示原文
 */
function mask(config: AppConfig): Record<string, unknown> {
  return {
    ...config,
    clientSecret: config.clientSecret ? '********' : undefined,
  };
}

configCommand
  .command('get')
  .description('Show a configuration value (environment variables applied)')
  .argument('<key>', `One of: ${CONFIG_KEYS.join(', ')}`)
  .action((key: string, _options: object, cmd: Command) => {
    const format = resolveFormat(cmd);

    try {
      if (!isConfigKey(key)) {
        throw new Error(`Unknown config key: ${key}`);
      }
      const value = mask(getConfigService().resolve())[key];

      if (format === 'json') {
        printJson({ success: true, data: { key, value: value ?? null } });
      } else {
        console.log(renderKeyValueTable({ [key]: value }));
      }
    } catch (error) {
      exitWithError(format, error);
    }
  });

configCommand
  .command('set')
  .description('Write a value to the configuration file')
  .argument('<key>', `One of: ${CONFIG_KEYS.join(', ')}`)
  .argument('<value>', 'Value (comma separated for scopes)')
  .action((key: string, value: string, _options: object, cmd: Command) => {
    const format = resolveFormat(cmd);

    try {
      if (!isConfigKey(key)) {
        throw new Error(`Unknown config key: ${key}`);
      }
      const config = getConfigService();
      config.setFromString(key, value);

      if (format === 'json') {
        printJson({ success: true, data: { key, value: mask(config.getAll())[key] } });
      } else {
        console.log(`${key} saved to ${config.getConfigPath()}`);
      }
    } catch (error) {
      exitWithError(format, error);
    }
  });

configCommand
  .command('list')
  .description('Show the effective configuration')
  .action((_options: object, cmd: Command) => {
    const format = resolveFormat(cmd);

    try {
      const resolved = mask(getConfigService().resolve());

      if (format === 'json') {
        printJson({ success: true, data: resolved });
      } else {
        console.log(renderKeyValueTable(resolved));
      }
    } catch (error) {
      exitWithError(format, error);
    }
  });

configCommand
  .command('path')
  .description('Show the configuration file path')
  .action((_options: object, cmd: Command) => {
    const format = resolveFormat(cmd);
    const configPath = getConfigService().getConfigPath();

    if (format === 'json') {
      printJson({ success: true, data: { path: configPath } });
    } else {
      console.log(configPath);
    }
  });
