/**
 * OAuth2 client-credentials types
 */

/**
 * How the client authenticates to the token endpoint (RFC 6749 §2.3.1)
 */
export type ClientAuthMethod = 'client_secret_basic' | 'client_secret_post';

export interface TokenProviderConfig {
  /** Absolute URL of the token endpoint */
  tokenUrl: string;
  clientId: string;
  clientSecret: string;
  /** Requested scopes, sent space-delimited; nothing is sent when empty */
  scopes?: string[];
  /** Requested audience, sent as `audience` when present */
  audience?: string;
  /** Default: client_secret_post */
  clientAuthMethod?: ClientAuthMethod;
  /** Refresh this many seconds before the server-declared expiry. Default: 30 */
  leewaySeconds?: number;
  /** Timeout of the grant request in milliseconds. Default: 10000 */
  timeoutMs?: number;
  /** Clock in epoch milliseconds. Default: Date.now */
  now?: () => number;
}

/**
 * OAuth2 Token Response
 */
export interface TokenResponse {
  access_token: string;
  expires_in?: number;
  token_type?: string;
  scope?: string;
}

/**
 * Cached token. Replaced as a whole on refresh, never mutated.
 */
export interface AccessToken {
  readonly value: string;
  readonly issuedAt: number; // Unix timestamp (ms)
  readonly expiresAt: number; // Unix timestamp (ms)
  readonly scopes: readonly string[];
}

/**
 * Snapshot of the provider state without the token value
 */
export interface TokenStatus {
  state: 'absent' | 'valid' | 'expired';
  expiresAt?: string;
  refreshAt?: string;
  scopes: string[];
}

/**
 * What the VTN interfaces need from a token provider
 */
export interface AccessTokenSource {
  getAuthorizationHeader(): Promise<string>;
  clearCache(): void;
}
