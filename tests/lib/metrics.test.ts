import { describe, it, expect, beforeEach } from 'vitest';
import { register } from 'prom-client';
import {
  authCacheHitsTotal,
  authTokenRequestsTotal,
  getMetricsContentType,
  getMetricsSnapshot,
  metricsRegistry,
  recordVtnRequest,
  resetMetrics,
} from '../../src/lib/metrics.js';

describe('metrics', () => {
  beforeEach(() => {
    resetMetrics();
  });

  it('should count VTN requests by method, resource and status', async () => {
    recordVtnRequest('GET', 'events', 'ok', 120);
    recordVtnRequest('GET', 'events', 'ok', 80);
    recordVtnRequest('POST', 'reports', '503', 40);

    const snapshot = await getMetricsSnapshot();

    expect(snapshot).toContain('oadr3_vtn_requests_total{method="GET",resource="events",status="ok"} 2');
    expect(snapshot).toContain('oadr3_vtn_requests_total{method="POST",resource="reports",status="503"} 1');
    expect(snapshot).toContain('oadr3_vtn_request_duration_seconds_count{method="GET",resource="events"} 2');
  });

  it('should count token requests', async () => {
    authTokenRequestsTotal.inc({ status: 'success' });
    authCacheHitsTotal.inc(3);

    const snapshot = await getMetricsSnapshot();

    expect(snapshot).toContain('oadr3_auth_token_requests_total{status="success"} 1');
    expect(snapshot).toContain('oadr3_auth_cache_hits_total 3');
  });

  it('should reset every counter', async () => {
    authCacheHitsTotal.inc();
    resetMetrics();

    expect(await getMetricsSnapshot()).toContain('oadr3_auth_cache_hits_total 0');
  });

  it('should keep its metrics out of the default registry', () => {
    expect(metricsRegistry).not.toBe(register);
    expect(register.getSingleMetric('oadr3_vtn_requests_total')).toBeUndefined();
  });

  it('should expose the Prometheus text content type', () => {
    expect(getMetricsContentType()).toMatch(/^text\/plain/);
  });
});
