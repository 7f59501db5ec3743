/**
 * Config Command
 * Shows and edits the config file. Secrets are masked in output.
 */

import { Command } from 'commander';
import { CONFIG_KEYS, getConfigService, isConfigKey } from '../services/config.js';
import type { AppConfig } from '../types/config.js';
import { ConfigurationError } from '../lib/errors.js';
import { failCommand, getFormat, printJson } from '../utils/output.js';

export function maskSecret(secret: string | undefined): string | undefined {
  if (!secret) {
    return secret;
  }
  return secret.length <= 4 ? '****' : `${secret.slice(0, 2)}****${secret.slice(-2)}`;
}

/**
 * Effective settings, environment included, with the client secret masked
 */
function effectiveConfig(): AppConfig {
  const config = getConfigService();
  return {
    vtnBaseUrl: config.getVtnBaseUrl(),
    tokenUrl: config.getTokenUrl(),
    clientId: config.getClientId(),
    clientSecret: maskSecret(config.getClientSecret()),
    scopes: config.getScopes(),
    clientAuthMethod: config.getClientAuthMethod(),
    leewaySeconds: config.getLeewaySeconds(),
    format: config.get('format'),
  };
}

export const configCommand = new Command('config').description('Show or edit client settings');

/**
 * oadr3 config show
 */
configCommand
  .command('show')
  .description('Show effective settings (environment overrides the config file)')
  .action((_options: object, cmd: Command) => {
    const format = getFormat(cmd);
    try {
      const settings = effectiveConfig();
      if (format === 'json') {
        printJson({ success: true, config: settings });
      } else {
        for (const key of CONFIG_KEYS) {
          const value = settings[key];
          console.log(`${key}: ${value === undefined ? '(not set)' : Array.isArray(value) ? value.join(',') : value}`);
        }
      }
    } catch (error) {
      failCommand(error, format);
    }
  });

/**
 * oadr3 config set <key> <value>
 */
configCommand
  .command('set <key> <value>')
  .description(`Set a value in the config file (${CONFIG_KEYS.join(', ')})`)
  .action((key: string, value: string, _options: object, cmd: Command) => {
    const format = getFormat(cmd);
    try {
      if (!isConfigKey(key)) {
        throw new ConfigurationError(`Unknown config key: ${key}. Valid keys: ${CONFIG_KEYS.join(', ')}`);
      }
      const config = getConfigService();
      config.setFromString(key, value);
      if (format === 'json') {
        printJson({ success: true, key, path: config.getConfigPath() });
      } else {
        console.log(`Saved ${key} to ${config.getConfigPath()}`);
      }
    } catch (error) {
      failCommand(error, format);
    }
  });

/**
 * oadr3 config path
 */
configCommand
  .command('path')
  .description('Print the config file location')
  .action(() => {
    console.log(getConfigService().getConfigPath());
  });
