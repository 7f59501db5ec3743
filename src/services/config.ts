/**
 * Config Service
 * Reads client settings from the environment first, then from a JSON config file.
 */

import fs from 'node:fs';
import path from 'node:path';
import os from 'node:os';
import { z } from 'zod';
import type { AppConfig, ConfigKey } from '../types/config.js';
import type { ClientAuthMethod, TokenProviderConfig } from '../types/auth.js';
import { ConfigurationError } from '../lib/errors.js';
import { loggers } from '../lib/logger.js';

const DEFAULT_CONFIG_DIR = path.join(os.homedir(), '.config', 'oadr3');
const DEFAULT_CONFIG_FILE = 'config.json';

export const ENV_KEYS = {
  vtnBaseUrl: 'VTN_BASE_URL',
  tokenUrl: 'OAUTH_TOKEN_ENDPOINT',
  clientId: 'OAUTH_CLIENT_ID',
  clientSecret: 'OAUTH_CLIENT_SECRET',
  scopes: 'OAUTH_SCOPES',
  clientAuthMethod: 'OAUTH_CLIENT_AUTH_METHOD',
  leewaySeconds: 'OAUTH_TOKEN_LEEWAY_SECONDS',
} as const;

const ClientAuthMethodSchema = z.enum(['client_secret_basic', 'client_secret_post']);

const AppConfigSchema = z.object({
  vtnBaseUrl: z.string().optional(),
  tokenUrl: z.string().optional(),
  clientId: z.string().optional(),
  clientSecret: z.string().optional(),
  scopes: z.array(z.string()).optional(),
  clientAuthMethod: ClientAuthMethodSchema.optional(),
  leewaySeconds: z.number().nonnegative().optional(),
  format: z.enum(['json', 'table']).optional(),
});

export const CONFIG_KEYS = AppConfigSchema.keyof().options;

/**
 * Splits a comma-delimited scope list, dropping blanks
 */
export function parseScopes(raw: string): string[] {
  return raw
    .split(',')
    .map((scope) => scope.trim())
    .filter((scope) => scope.length > 0);
}

export function isConfigKey(key: string): key is ConfigKey {
  return CONFIG_KEYS.some((candidate) => candidate === key);
}

export class ConfigService {
  private configPath: string;
  private config: AppConfig;

  constructor(configPath?: string) {
    this.configPath = configPath || path.join(DEFAULT_CONFIG_DIR, DEFAULT_CONFIG_FILE);
    this.config = this.load();
  }

  private load(): AppConfig {
    if (!fs.existsSync(this.configPath)) {
      return {};
    }
    try {
      const content = fs.readFileSync(this.configPath, 'utf-8');
      const parsed = AppConfigSchema.safeParse(JSON.parse(content));
      if (parsed.success) {
        return parsed.data;
      }
      loggers.cli.warn('Ignoring invalid config file', { path: this.configPath });
    } catch (error) {
      loggers.cli.warn('Ignoring unreadable config file', {
        path: this.configPath,
        reason: error instanceof Error ? error.message : String(error),
      });
    }
    return {};
  }

  private save(): void {
    const dir = path.dirname(this.configPath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
    fs.writeFileSync(this.configPath, JSON.stringify(this.config, null, 2), { encoding: 'utf-8', mode: 0o600 });
  }

  get<K extends ConfigKey>(key: K): AppConfig[K] {
    return this.config[key];
  }

  set<K extends ConfigKey>(key: K, value: AppConfig[K]): void {
    this.config[key] = value;
    this.save();
  }

  /**
   * Sets a value given as text, as typed on the command line
   */
  setFromString(key: ConfigKey, raw: string): void {
    const candidate: Record<string, unknown> = {
      [key]: key === 'scopes' ? parseScopes(raw) : key === 'leewaySeconds' ? Number(raw) : raw,
    };
    const parsed = AppConfigSchema.safeParse(candidate);
    if (!parsed.success) {
      throw new ConfigurationError(`Invalid value for ${key}: ${raw}`, [], parsed.error);
    }
    this.config = { ...this.config, ...parsed.data };
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

  getVtnBaseUrl(): string | undefined {
    return this.fromEnv(ENV_KEYS.vtnBaseUrl) ?? this.config.vtnBaseUrl;
  }

  getTokenUrl(): string | undefined {
    return this.fromEnv(ENV_KEYS.tokenUrl) ?? this.config.tokenUrl;
  }

  getClientId(): string | undefined {
    return this.fromEnv(ENV_KEYS.clientId) ?? this.config.clientId;
  }

  getClientSecret(): string | undefined {
    return this.fromEnv(ENV_KEYS.clientSecret) ?? this.config.clientSecret;
  }

  getScopes(): string[] | undefined {
    const envValue = this.fromEnv(ENV_KEYS.scopes);
    if (envValue !== undefined) {
      return parseScopes(envValue);
    }
    return this.config.scopes;
  }

  getClientAuthMethod(): ClientAuthMethod | undefined {
    const envValue = this.fromEnv(ENV_KEYS.clientAuthMethod);
    if (envValue === undefined) {
      return this.config.clientAuthMethod;
    }
    const parsed = ClientAuthMethodSchema.safeParse(envValue);
    if (!parsed.success) {
      throw new ConfigurationError(
        `${ENV_KEYS.clientAuthMethod} must be client_secret_basic or client_secret_post, got ${envValue}`
      );
    }
    return parsed.data;
  }

  getLeewaySeconds(): number | undefined {
    const envValue = this.fromEnv(ENV_KEYS.leewaySeconds);
    if (envValue === undefined) {
      return this.config.leewaySeconds;
    }
    const seconds = Number(envValue);
    if (!Number.isFinite(seconds) || seconds < 0) {
      throw new ConfigurationError(`${ENV_KEYS.leewaySeconds} must be a non-negative number, got ${envValue}`);
    }
    return seconds;
  }

  /**
   * Complete token provider configuration
   * @throws ConfigurationError naming every missing setting
   */
  getTokenProviderConfig(): TokenProviderConfig {
    const tokenUrl = this.getTokenUrl();
    const clientId = this.getClientId();
    const clientSecret = this.getClientSecret();

    const missing: string[] = [];
    if (!tokenUrl) missing.push(ENV_KEYS.tokenUrl);
    if (!clientId) missing.push(ENV_KEYS.clientId);
    if (!clientSecret) missing.push(ENV_KEYS.clientSecret);

    if (!tokenUrl || !clientId || !clientSecret) {
      throw new ConfigurationError(`Missing configuration: ${missing.join(', ')}`, missing);
    }

    return {
      tokenUrl,
      clientId,
      clientSecret,
      scopes: this.getScopes(),
      clientAuthMethod: this.getClientAuthMethod(),
      leewaySeconds: this.getLeewaySeconds(),
    };
  }

  private fromEnv(name: string): string | undefined {
    const value = process.env[name];
    return value && value.length > 0 ? value : undefined;
  }
}

let defaultInstance: ConfigService | null = null;

export function getConfigService(): ConfigService {
  if (!defaultInstance) {
    defaultInstance = new ConfigService(process.env.OADR3_CONFIG_PATH || undefined);
  }
  return defaultInstance;
}
