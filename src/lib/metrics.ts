/**
 * Prometheus metrics
 * Token provisioning and VTN request counters, kept in a library-owned registry so a
 * host application's default registry is left alone.
 */

import { Registry, Counter, Histogram } from 'prom-client';

export const metricsRegistry = new Registry();

/**
 * Token provider
 */
export const authTokenRequestsTotal = new Counter({
  name: 'oadr3_auth_token_requests_total',
  help: 'Client-credentials grant requests sent to the token endpoint',
  labelNames: ['status'] as const, // 'success' | 'failed'
  registers: [metricsRegistry],
});

export const authCacheHitsTotal = new Counter({
  name: 'oadr3_auth_cache_hits_total',
  help: 'Token requests served from the cache',
  registers: [metricsRegistry],
});

export const authCacheMissesTotal = new Counter({
  name: 'oadr3_auth_cache_misses_total',
  help: 'Token requests that found no valid cached token',
  registers: [metricsRegistry],
});

/**
 * VTN resource requests
 */
export const vtnRequestsTotal = new Counter({
  name: 'oadr3_vtn_requests_total',
  help: 'Requests sent to the VTN',
  labelNames: ['method', 'resource', 'status'] as const,
  registers: [metricsRegistry],
});

export const vtnRequestDurationSeconds = new Histogram({
  name: 'oadr3_vtn_request_duration_seconds',
  help: 'VTN request latency in seconds',
  labelNames: ['method', 'resource'] as const,
  buckets: [0.01, 0.05, 0.1, 0.5, 1.0, 2.0, 5.0],
  registers: [metricsRegistry],
});

/**
 * Records one VTN request. `status` is 'ok', the HTTP status of a failure, or 'network'
 * when no response arrived.
 */
export function recordVtnRequest(
  method: string,
  resource: string,
  status: string,
  durationMs: number
): void {
  vtnRequestsTotal.inc({ method, resource, status });
  vtnRequestDurationSeconds.observe({ method, resource }, durationMs / 1000);
}

/**
 * All metrics in the Prometheus text format
 */
export async function getMetricsSnapshot(): Promise<string> {
  return metricsRegistry.metrics();
}

export function getMetricsContentType(): string {
  return metricsRegistry.contentType;
}

export function resetMetrics(): void {
  metricsRegistry.resetMetrics();
}
