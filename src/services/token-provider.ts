/**
 * Token Provider
 * OAuth2 client-credentials token acquisition and caching for VTN requests.
 */

import { ofetch, FetchError } from 'ofetch';
import { z } from 'zod';
import type {
  AccessToken,
  AccessTokenSource,
  ClientAuthMethod,
  TokenProviderConfig,
  TokenResponse,
  TokenStatus,
} from '../types/auth.js';
import { AuthenticationError, ConfigurationError, TokenTransportError } from '../lib/errors.js';
import { loggers } from '../lib/logger.js';
import { authCacheHitsTotal, authCacheMissesTotal, authTokenRequestsTotal } from '../lib/metrics.js';

export const DEFAULT_LEEWAY_SECONDS = 30;
export const DEFAULT_TOKEN_TIMEOUT_MS = 10_000;
// Lifetime assumed when the endpoint omits expires_in
export const DEFAULT_EXPIRES_IN_SECONDS = 3600;
// Granted lifetimes longer than a year are cut to a year
export const MAX_EXPIRES_IN_SECONDS = 365 * 24 * 3600;

const ExpiresInSchema = z
  .union([z.number(), z.string().regex(/^\d+(\.\d+)?$/).transform(Number)])
  .pipe(z.number().finite().nonnegative())
  .transform((seconds) => Math.min(seconds, MAX_EXPIRES_IN_SECONDS));

const TokenResponseSchema = z.object({
  access_token: z.string().min(1),
  // null is read as absent
  expires_in: ExpiresInSchema.nullish().transform((seconds) => seconds ?? undefined),
  token_type: z.string().optional(),
  scope: z.string().optional(),
});

const OAuthErrorSchema = z.object({
  error: z.string(),
  error_description: z.string().optional(),
});

function isAbsoluteHttpUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol === 'https:' || url.protocol === 'http:';
  } catch {
    return false;
  }
}

export class TokenProvider implements AccessTokenSource {
  private readonly tokenUrl: string;
  private readonly clientId: string;
  private readonly clientSecret: string;
  private readonly scopes: string[];
  private readonly audience?: string;
  private readonly clientAuthMethod: ClientAuthMethod;
  private readonly leewayMs: number;
  private readonly timeoutMs: number;
  private readonly now: () => number;

  private cachedToken: AccessToken | null = null;

  // Single-flight: concurrent callers on a cache miss share one grant request
  private inFlightTokenPromise: Promise<string> | null = null;

  constructor(config: TokenProviderConfig) {
    const missing: string[] = [];
    if (!config.tokenUrl) missing.push('tokenUrl');
    if (!config.clientId) missing.push('clientId');
    if (!config.clientSecret) missing.push('clientSecret');
    if (missing.length > 0) {
      throw new ConfigurationError(`Missing OAuth configuration: ${missing.join(', ')}`, missing);
    }
    if (!isAbsoluteHttpUrl(config.tokenUrl)) {
      throw new ConfigurationError(`Token URL is not an absolute http(s) URL: ${config.tokenUrl}`);
    }

    const leewaySeconds = config.leewaySeconds ?? DEFAULT_LEEWAY_SECONDS;
    if (!Number.isFinite(leewaySeconds) || leewaySeconds < 0) {
      throw new ConfigurationError(`Token leeway must be a non-negative number of seconds, got ${leewaySeconds}`);
    }

    this.tokenUrl = config.tokenUrl;
    this.clientId = config.clientId;
    this.clientSecret = config.clientSecret;
    this.scopes = (config.scopes ?? []).filter((scope) => scope.length > 0);
    this.audience = config.audience || undefined;
    this.clientAuthMethod = config.clientAuthMethod ?? 'client_secret_post';
    this.leewayMs = leewaySeconds * 1000;
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TOKEN_TIMEOUT_MS;
    this.now = config.now ?? Date.now;
  }

  /**
   * Returns a valid access token
   * - valid cached token: returned as is
   * - grant in flight: waits for it
   * - otherwise: requests a new token and caches it
   */
  async getToken(): Promise<string> {
    const cached = this.validToken();
    if (cached) {
      authCacheHitsTotal.inc();
      loggers.auth.debug('Returning cached access token');
      return cached.value;
    }

    if (this.inFlightTokenPromise) {
      return this.inFlightTokenPromise;
    }

    authCacheMissesTotal.inc();
    this.inFlightTokenPromise = this.refreshToken();

    try {
      return await this.inFlightTokenPromise;
    } finally {
      this.inFlightTokenPromise = null;
    }
  }

  /**
   * Value for the Authorization header of a resource request
   */
  async getAuthorizationHeader(): Promise<string> {
    return `Bearer ${await this.getToken()}`;
  }

  /**
   * Whether the cached token is still usable: now < expiresAt - leeway
   */
  isTokenValid(): boolean {
    return this.validToken() !== null;
  }

  /**
   * Drops the cached token. A grant already in flight is left to finish.
   */
  clearCache(): void {
    this.cachedToken = null;
  }

  hasInflightRequest(): boolean {
    return this.inFlightTokenPromise !== null;
  }

  getStatus(): TokenStatus {
    const token = this.cachedToken;
    if (!token) {
      return { state: 'absent', scopes: [] };
    }
    return {
      state: this.isTokenValid() ? 'valid' : 'expired',
      expiresAt: new Date(token.expiresAt).toISOString(),
      refreshAt: new Date(token.expiresAt - this.leewayMs).toISOString(),
      scopes: [...token.scopes],
    };
  }

  private validToken(): AccessToken | null {
    const token = this.cachedToken;
    if (!token) {
      return null;
    }
    return this.now() < token.expiresAt - this.leewayMs ? token : null;
  }

  private async refreshToken(): Promise<string> {
    loggers.auth.debug('Requesting new access token', { url: this.tokenUrl });

    let response: TokenResponse;
    try {
      response = await this.requestToken();
    } catch (error) {
      authTokenRequestsTotal.inc({ status: 'failed' });
      const authError = this.toAuthenticationError(error);
      loggers.auth.error('Token request failed', authError, {
        url: this.tokenUrl,
        statusCode: authError.status,
      });
      throw authError;
    }

    authTokenRequestsTotal.inc({ status: 'success' });

    const issuedAt = this.now();
    const expiresIn = response.expires_in ?? DEFAULT_EXPIRES_IN_SECONDS;
    // Built completely before it is published, so readers never see a partial token
    const token: AccessToken = Object.freeze({
      value: response.access_token,
      issuedAt,
      expiresAt: issuedAt + expiresIn * 1000,
      scopes: Object.freeze(response.scope ? response.scope.split(' ').filter(Boolean) : [...this.scopes]),
    });
    this.cachedToken = token;

    loggers.auth.info('Access token acquired', {
      url: this.tokenUrl,
      expiresIn,
    });

    return token.value;
  }

  private async requestToken(): Promise<TokenResponse> {
    const params = new URLSearchParams({ grant_type: 'client_credentials' });
    if (this.scopes.length > 0) {
      params.set('scope', this.scopes.join(' '));
    }
    if (this.audience) {
      params.set('audience', this.audience);
    }

    const headers: Record<string, string> = {
      'Content-Type': 'application/x-www-form-urlencoded',
      Accept: 'application/json',
    };

    if (this.clientAuthMethod === 'client_secret_basic') {
      const credentials = `${encodeURIComponent(this.clientId)}:${encodeURIComponent(this.clientSecret)}`;
      headers.Authorization = `Basic ${Buffer.from(credentials).toString('base64')}`;
    } else {
      params.set('client_id', this.clientId);
      params.set('client_secret', this.clientSecret);
    }

    const body = await ofetch<unknown>(this.tokenUrl, {
      method: 'POST',
      headers,
      body: params.toString(),
      timeout: this.timeoutMs,
      retry: 0,
    });

    const parsed = TokenResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new AuthenticationError('Token endpoint returned a malformed token response', {}, parsed.error);
    }
    return parsed.data;
  }

  private toAuthenticationError(error: unknown): AuthenticationError {
    if (error instanceof AuthenticationError) {
      return error;
    }

    if (error instanceof FetchError) {
      const status = error.statusCode ?? error.status;
      if (status !== undefined) {
        const oauth = OAuthErrorSchema.safeParse(error.data);
        const detail = oauth.success
          ? `: ${oauth.data.error}${oauth.data.error_description ? ` (${oauth.data.error_description})` : ''}`
          : '';
        return new AuthenticationError(
          `Token endpoint rejected the client-credentials grant with status ${status}${detail}`,
          {
            status,
            oauthError: oauth.success ? oauth.data.error : undefined,
            oauthErrorDescription: oauth.success ? oauth.data.error_description : undefined,
          },
          error
        );
      }
    }

    const message = error instanceof Error ? error.message : String(error);
    return new TokenTransportError(`Token endpoint could not be reached: ${message}`, error);
  }
}
