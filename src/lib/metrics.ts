/**
 * Prometheus 指標收集
 * 追蹤認證、discovery、gRPC 連線與分頁串流
 */

import { Counter, Histogram, Registry } from 'prom-client';

/**
 * SDK 專用 registry，不污染呼叫端的 global registry
 */
export const registry = new Registry();

/**
 * 認證服務指標
 */
export const authTokenRequestsTotal = new Counter({
  name: 'kessel_auth_token_requests_total',
  help: 'Token endpoint requests',
  labelNames: ['status'] as const, // 'success' | 'failed'
  registers: [registry],
});

export const authTokenRequestDurationSeconds = new Histogram({
  name: 'kessel_auth_token_request_duration_seconds',
  help: 'Token endpoint latency in seconds',
  buckets: [0.01, 0.05, 0.1, 0.5, 1.0, 2.0, 5.0],
  registers: [registry],
});

export const authCacheHitsTotal = new Counter({
  name: 'kessel_auth_cache_hits_total',
  help: 'getToken calls served from the in-memory cache',
  registers: [registry],
});

export const authCacheMissesTotal = new Counter({
  name: 'kessel_auth_cache_misses_total',
  help: 'getToken calls that needed a refresh',
  registers: [registry],
});

/**
 * Discovery 指標
 */
export const discoveryRequestsTotal = new Counter({
  name: 'kessel_discovery_requests_total',
  help: 'OpenID Connect discovery requests',
  labelNames: ['status'] as const,
  registers: [registry],
});

/**
 * 連線指標
 */
export const connectionsBuiltTotal = new Counter({
  name: 'kessel_connections_built_total',
  help: 'Clients built by the connection builders',
  labelNames: ['transport', 'security'] as const, // transport: grpc | http
  registers: [registry],
});

export const connectionsClosedTotal = new Counter({
  name: 'kessel_connections_closed_total',
  help: 'Connections closed',
  labelNames: ['transport'] as const,
  registers: [registry],
});

/**
 * 分頁串流指標
 */
export const listObjectsCallsTotal = new Counter({
  name: 'kessel_list_objects_calls_total',
  help: 'StreamedListObjects RPC calls issued by the pager',
  registers: [registry],
});

export const listObjectsResponsesTotal = new Counter({
  name: 'kessel_list_objects_responses_total',
  help: 'StreamedListObjects responses delivered to consumers',
  registers: [registry],
});

export const listObjectsErrorsTotal = new Counter({
  name: 'kessel_list_objects_errors_total',
  help: 'StreamedListObjects sequences that ended with an error',
  labelNames: ['stage'] as const, // 'start' | 'receive' | 'aborted'
  registers: [registry],
});

/**
 * 取得 Prometheus 文字格式
 */
export async function getMetricsText(): Promise<string> {
  return registry.metrics();
}

/**
 * 重設所有指標（測試用）
 */
export function resetMetrics(): void {
  registry.resetMetrics();
}
