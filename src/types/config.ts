import type { ClientAuthMethod } from './auth.js';

/**
 * Config file structure
 */
export interface AppConfig {
  /** Base URL of the VTN HTTP API */
  vtnBaseUrl?: string;
  /** OAuth token endpoint; discovered from the VTN when absent */
  tokenUrl?: string;
  /** OAuth client id */
  clientId?: string;
  /** OAuth client secret */
  clientSecret?: string;
  /** Requested scopes */
  scopes?: string[];
  clientAuthMethod?: ClientAuthMethod;
  /** Token refresh margin in seconds */
  leewaySeconds?: number;
  /** Default CLI output format */
  format?: 'json' | 'table';
}

export type ConfigKey = keyof AppConfig;
