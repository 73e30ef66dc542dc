export * from './types/auth.js';
export * from './types/discovery.js';
export * from './types/inventory.js';
export * from './types/rbac.js';
export type { AppConfig, ConfigKey } from './types/config.js';

export * from './lib/errors.js';
export { StructuredLogger, loggers, setGlobalLogLevel, type LogLevel, type LoggerConfig } from './lib/logger.js';
export { registry as metricsRegistry, getMetricsText, resetMetrics } from './lib/metrics.js';
export { createHttpClient, type HttpClient, type HttpRequestOptions } from './lib/http-client.js';
export * from './lib/call-credentials.js';
export * from './lib/rbac.js';
export * from './lib/streaming-pager.js';

export * from './services/auth.js';
export * from './services/token-store.js';
export * from './services/discovery.js';
export * from './services/connection-builder.js';
export * from './services/grpc-client-builder.js';
export * from './services/http-client-builder.js';
export * from './services/inventory-grpc.js';
export * from './services/inventory-http.js';
export * from './services/workspace.js';
export { ConfigService, type ResolvedConfig } from './services/config.js';
