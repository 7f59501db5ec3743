/**
 * VTN HTTP interface
 * Base of every resource interface: URL handling, bearer authentication, retry of transient
 * failures and mapping of failures to VtnRequestError.
 */

import { ofetch, FetchError } from 'ofetch';
import type { AccessTokenSource } from '../../types/auth.js';
import { ConfigurationError, ModelValidationError, OpenADRError, VtnRequestError } from '../../lib/errors.js';
import { loggers } from '../../lib/logger.js';
import { recordVtnRequest } from '../../lib/metrics.js';
import { withRetry, isConnectionFailure, isTransientStatus, RetryExhaustedError, type RetryPolicy } from '../retry.js';
import type { PaginationFilter, TargetFilter } from '../../models/common.js';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

export type QueryValue = string | number | readonly string[] | null | undefined;
export type QueryParams = Record<string, QueryValue>;

export const DEFAULT_VTN_TIMEOUT_MS = 30000;

export interface HttpInterfaceOptions {
  /** Base URL of the VTN API, e.g. https://vtn.example.com/openadr3/3.0.1 */
  baseUrl: string;
  /** Source of bearer tokens; omitted only for anonymous endpoints */
  tokenSource?: AccessTokenSource;
  /** Reject base URLs that are not https */
  requireHttps?: boolean;
  timeoutMs?: number;
  retry?: Partial<RetryPolicy>;
}

interface RequestOptions<T> {
  query?: QueryParams;
  body?: unknown;
  parse: (data: unknown) => T;
}

/**
 * Strips trailing slashes so paths can be appended with a leading slash
 */
export function normalizeBaseUrl(baseUrl: string): string {
  return baseUrl.replace(/\/+$/, '');
}

/**
 * Builds a query string. Array values repeat the key; null and undefined are skipped.
 */
export function buildQuery(params: QueryParams = {}): string {
  const search = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    if (value === undefined || value === null) {
      continue;
    }
    if (typeof value === 'string' || typeof value === 'number') {
      search.append(key, String(value));
    } else {
      for (const item of value) {
        search.append(key, item);
      }
    }
  }
  const query = search.toString();
  return query ? `?${query}` : '';
}

export function targetQuery(target?: TargetFilter): QueryParams {
  if (!target) {
    return {};
  }
  return { targetType: target.targetType, targetValues: target.targetValues };
}

export function paginationQuery(pagination?: PaginationFilter): QueryParams {
  if (!pagination) {
    return {};
  }
  return { skip: pagination.skip, limit: pagination.limit };
}

/**
 * Parses every element of a list response
 */
export function parseList<T>(parse: (item: unknown) => T): (data: unknown) => T[] {
  return (data) => {
    if (!Array.isArray(data)) {
      throw new ModelValidationError('response', [{ path: '', message: 'Expected an array' }]);
    }
    return data.map((item) => parse(item));
  };
}

/**
 * Rejects an update whose path id disagrees with the object's own id
 */
export function assertMatchingId(model: string, field: string, pathId: string, objectId: string): void {
  if (pathId !== objectId) {
    throw new ModelValidationError(model, [
      { path: field, message: `Object ${field} ${objectId} does not match ${pathId}` },
    ]);
  }
}

function statusOf(error: unknown): number | undefined {
  if (error instanceof FetchError) {
    return error.statusCode ?? error.status;
  }
  return undefined;
}

export class HttpInterface {
  readonly baseUrl: string;
  protected readonly tokenSource?: AccessTokenSource;
  protected readonly timeoutMs: number;
  private readonly retryPolicy: Partial<RetryPolicy>;

  constructor(options: HttpInterfaceOptions) {
    const baseUrl = normalizeBaseUrl(options.baseUrl);

    let protocol: string;
    try {
      protocol = new URL(baseUrl).protocol;
    } catch (error) {
      throw new ConfigurationError(`VTN base URL is not a valid URL: ${options.baseUrl}`, ['vtnBaseUrl'], error);
    }
    if (protocol !== 'https:' && protocol !== 'http:') {
      throw new ConfigurationError(`VTN base URL must use http or https: ${options.baseUrl}`, ['vtnBaseUrl']);
    }
    if (options.requireHttps && protocol !== 'https:') {
      throw new ConfigurationError(`VTN base URL must use https: ${options.baseUrl}`, ['vtnBaseUrl']);
    }

    this.baseUrl = baseUrl;
    this.tokenSource = options.tokenSource;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_VTN_TIMEOUT_MS;
    this.retryPolicy = { ...options.retry };
  }

  protected url(path: string, query?: QueryParams): string {
    return `${this.baseUrl}${path}${buildQuery(query)}`;
  }

  protected async request<T>(method: HttpMethod, path: string, options: RequestOptions<T>): Promise<T> {
    const url = this.url(path, options.query);
    const resource = path.split('/').find((segment) => segment.length > 0) ?? '';
    const tokenSource = this.tokenSource;
    const startTime = Date.now();
    let reauthenticated = false;

    loggers.vtn.debug('VTN request started', { method, url });

    let data: unknown;
    try {
      data = await withRetry(
        async () => {
          const headers: Record<string, string> = { Accept: 'application/json' };
          if (options.body !== undefined) {
            headers['Content-Type'] = 'application/json';
          }
          if (tokenSource) {
            headers.Authorization = await tokenSource.getAuthorizationHeader();
          }
          return ofetch<unknown>(url, {
            method,
            headers,
            body: options.body === undefined ? undefined : JSON.stringify(options.body),
            timeout: this.timeoutMs,
            retry: 0,
          });
        },
        {
          ...this.retryPolicy,
          shouldRetry: (error: unknown) => {
            if (error instanceof OpenADRError) {
              return false;
            }
            const status = statusOf(error);
            if (status !== undefined) {
              // Expired or revoked token: fetch a new one and try once more
              if (status === 401 && tokenSource && !reauthenticated) {
                reauthenticated = true;
                tokenSource.clearCache();
                return true;
              }
              return isTransientStatus(status);
            }
            return isConnectionFailure(error);
          },
          onRetry: (error: unknown, attempt: number) => {
            loggers.vtn.warn('Retrying VTN request', { method, url, attempt, status: statusOf(error) });
          },
        }
      );
    } catch (error) {
      throw this.toRequestError(error, method, path, url, resource, Date.now() - startTime);
    }

    const duration = Date.now() - startTime;
    recordVtnRequest(method, resource, 'ok', duration);
    loggers.vtn.info('VTN request completed', { method, url, duration });

    return options.parse(data);
  }

  private toRequestError(
    error: unknown,
    method: HttpMethod,
    path: string,
    url: string,
    resource: string,
    duration: number
  ): Error {
    const cause = error instanceof RetryExhaustedError ? error.lastError : error;

    // Token provider failures keep their own type
    if (cause instanceof OpenADRError) {
      return cause;
    }

    const status = statusOf(cause);
    recordVtnRequest(method, resource, status === undefined ? 'network' : String(status), duration);

    const reason = cause instanceof Error ? cause.message : String(cause);
    const requestError = new VtnRequestError(
      status === undefined
        ? `VTN request ${method} ${path} failed: ${reason}`
        : `VTN request ${method} ${path} failed with status ${status}`,
      {
        method,
        url,
        status,
        body: cause instanceof FetchError ? cause.data : undefined,
      },
      error
    );

    loggers.vtn.error('VTN request failed', requestError, { method, url, status, duration });
    return requestError;
  }
}
