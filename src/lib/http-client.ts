/**
 * HTTP Client
 * 可注入的 HTTP 傳輸層 - 以 ofetch 實作，錯誤轉為 SdkError
 */

import { ofetch, FetchError } from 'ofetch';
import { connectionError, statusError } from './errors.js';
import { loggers, generateRequestId } from './logger.js';

export type HttpMethod = 'GET' | 'POST' | 'DELETE';

export interface HttpRequestOptions {
  method?: HttpMethod;
  headers?: Record<string, string>;
  query?: Record<string, string>;
  /** 字串原樣送出；物件以 JSON 送出 */
  body?: string | Record<string, unknown>;
  signal?: AbortSignal;
}

/**
 * 回傳解析後的回應內容（JSON 物件或文字）
 * 非 2xx 以 UNEXPECTED_STATUS 拒絕，網路錯誤以 CONNECTION_FAILED 拒絕
 */
export type HttpClient = (url: string, options?: HttpRequestOptions) => Promise<unknown>;

export interface HttpClientConfig {
  /** 請求逾時（毫秒，default: 30000） */
  timeout?: number;
  userAgent?: string;
}

export const DEFAULT_HTTP_TIMEOUT_MS = 30 * 1000;
export const DEFAULT_USER_AGENT = 'kessel-node-sdk/0.1.0';

export function createHttpClient(config: HttpClientConfig = {}): HttpClient {
  const timeout = config.timeout ?? DEFAULT_HTTP_TIMEOUT_MS;
  const userAgent = config.userAgent ?? DEFAULT_USER_AGENT;

  return async (url, options = {}) => {
    const method = options.method ?? 'GET';
    const requestId = generateRequestId();
    const startTime = Date.now();

    try {
      const result = await ofetch<unknown>(url, {
        method,
        headers: {
          'User-Agent': userAgent,
          Accept: 'application/json',
          ...options.headers,
        },
        query: options.query,
        body: options.body,
        signal: options.signal,
        timeout,
        // 重試策略由呼叫端決定
        retry: 0,
      });

      loggers.http.debug('HTTP request completed', {
        requestId,
        method,
        url,
        duration: Date.now() - startTime,
      });

      return result;
    } catch (error) {
      throw toSdkError(error, method, url);
    }
  };
}

function toSdkError(error: unknown, method: HttpMethod, url: string) {
  if (error instanceof FetchError && typeof error.status === 'number') {
    return statusError(error.status, `${method} ${url} failed`, error);
  }
  return connectionError(`${method} ${url} failed`, error);
}

let defaultClient: HttpClient | null = null;

/**
 * 預設 HTTP client（僅在最外層建構時使用）
 */
export function getDefaultHttpClient(): HttpClient {
  if (!defaultClient) {
    defaultClient = createHttpClient();
  }
  return defaultClient;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
