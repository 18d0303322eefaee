/**
 * Prometheus 指標收集
 * 追蹤日曆請求、上游 API、快取命中等指標，由 GET /metrics 暴露
 */

import { Registry, Counter, Histogram } from 'prom-client';

export const metricsRegistry = new Registry();

/**
 * HTTP 端點指標
 */
export const httpRequestsTotal = new Counter({
  name: 'tide_http_requests_total',
  help: 'HTTP 請求總數',
  labelNames: ['route', 'status'],
  registers: [metricsRegistry],
});

export const httpRequestDurationSeconds = new Histogram({
  name: 'tide_http_request_duration_seconds',
  help: 'HTTP 請求處理時間（秒）',
  labelNames: ['route'],
  buckets: [0.01, 0.05, 0.1, 0.5, 1.0, 2.0, 5.0],
  registers: [metricsRegistry],
});

/**
 * 上游（氣象署 API）指標
 */
export const upstreamRequestsTotal = new Counter({
  name: 'tide_upstream_requests_total',
  help: '氣象署 API 請求總數',
  labelNames: ['outcome', 'status'], // outcome: 'success' | 'error'
  registers: [metricsRegistry],
});

export const upstreamRequestDurationSeconds = new Histogram({
  name: 'tide_upstream_request_duration_seconds',
  help: '氣象署 API 請求延遲（秒）',
  buckets: [0.1, 0.5, 1.0, 2.0, 5.0, 10.0, 30.0],
  registers: [metricsRegistry],
});

export const upstreamRetriesTotal = new Counter({
  name: 'tide_upstream_retries_total',
  help: '氣象署 API 重試次數',
  registers: [metricsRegistry],
});

/**
 * 快取指標
 */
export const cacheLookupsTotal = new Counter({
  name: 'tide_cache_lookups_total',
  help: '預報快取查詢次數',
  labelNames: ['result'], // 'hit' | 'miss' | 'shared'
  registers: [metricsRegistry],
});

export const tideEventsRenderedTotal = new Counter({
  name: 'tide_events_rendered_total',
  help: '輸出到日曆的潮汐事件總數',
  registers: [metricsRegistry],
});

export type CacheLookupResult = 'hit' | 'miss' | 'shared';

export function recordHttpRequest(route: string, statusCode: number, durationMs: number): void {
  httpRequestsTotal.inc({ route, status: String(statusCode) });
  httpRequestDurationSeconds.observe({ route }, durationMs / 1000);
}

export function recordUpstreamRequest(success: boolean, statusCode: number | undefined, durationMs: number): void {
  upstreamRequestsTotal.inc({
    outcome: success ? 'success' : 'error',
    status: statusCode !== undefined ? String(statusCode) : 'none',
  });
  upstreamRequestDurationSeconds.observe(durationMs / 1000);
}

export function recordUpstreamRetry(): void {
  upstreamRetriesTotal.inc();
}

export function recordCacheLookup(result: CacheLookupResult): void {
  cacheLookupsTotal.inc({ result });
}

export function recordEventsRendered(count: number): void {
  tideEventsRenderedTotal.inc(count);
}

/**
 * 收集所有指標的 Prometheus 格式
 */
export async function getMetricsSnapshot(): Promise<string> {
  return metricsRegistry.metrics();
}

export function getMetricsContentType(): string {
  return metricsRegistry.contentType;
}

/**
 * 重置所有指標（用於測試）
 */
export function resetMetrics(): void {
  metricsRegistry.resetMetrics();
}
