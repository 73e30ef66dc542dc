/**
 * HTTP Client Builder
 * 建立附帶認證 header 的 REST 傳輸層與型別化 stub
 */

import { ConnectionBuilder } from './connection-builder.js';
import { callCredentialsAuthRequest, type AuthRequest } from '../lib/call-credentials.js';
import { clientCreationError, connectionError } from '../lib/errors.js';
import {
  createHttpClient,
  DEFAULT_HTTP_TIMEOUT_MS,
  DEFAULT_USER_AGENT,
  type HttpClient,
  type HttpRequestOptions,
} from '../lib/http-client.js';
import { loggers } from '../lib/logger.js';
import { connectionsBuiltTotal, connectionsClosedTotal } from '../lib/metrics.js';

/**
 * 綁定 base URL 的 HTTP 傳輸層
 */
export interface HttpTransport {
  readonly baseUrl: string;
  request(path: string, options?: HttpRequestOptions): Promise<unknown>;
}

/**
 * HTTP 連線狀態；關閉後的請求直接失敗
 */
export class HttpConnection {
  private closed = false;

  constructor(readonly target: string) {}

  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;

    connectionsClosedTotal.inc({ transport: 'http' });
    loggers.http.debug('Connection closed', { target: this.target });
  }

  isClosed(): boolean {
    return this.closed;
  }
}

export interface BuiltHttpClient<C> {
  stub: C;
  connection: HttpConnection;
}

export class HttpClientBuilder<C> extends ConnectionBuilder<BuiltHttpClient<C>> {
  private readonly createStub: (transport: HttpTransport) => C;
  private timeoutMs = DEFAULT_HTTP_TIMEOUT_MS;
  private userAgentValue = DEFAULT_USER_AGENT;
  private headers: Record<string, string> = {};
  private httpClient?: HttpClient;

  constructor(endpoint: string, createStub: (transport: HttpTransport) => C) {
    super(endpoint);
    this.createStub = createStub;
  }

  timeout(ms: number): this {
    this.timeoutMs = ms;
    return this;
  }

  userAgent(userAgent: string): this {
    this.userAgentValue = userAgent;
    return this;
  }

  header(name: string, value: string): this {
    this.headers[name] = value;
    return this;
  }

  /**
   * 替換底層 HTTP client（測試或自訂傳輸時使用）
   */
  withHttpClient(httpClient: HttpClient): this {
    this.httpClient = httpClient;
    return this;
  }

  // http:// 端點一律視為不加密
  override isInsecure(): boolean {
    return super.isInsecure() || this.target.toLowerCase().startsWith('http://');
  }

  protected create(): BuiltHttpClient<C> {
    if (!URL.canParse(this.target)) {
      throw clientCreationError(`invalid endpoint URL: ${this.target}`);
    }

    const httpClient =
      this.httpClient ?? createHttpClient({ timeout: this.timeoutMs, userAgent: this.userAgentValue });
    const auth = this.callCredentials ? callCredentialsAuthRequest(this.callCredentials) : null;
    const connection = new HttpConnection(this.target);
    const transport = createTransport(connection, httpClient, { ...this.headers }, auth);

    const security = this.isInsecure() ? 'insecure' : 'tls';
    connectionsBuiltTotal.inc({ transport: 'http', security });
    loggers.http.debug('Client built', {
      target: this.target,
      security,
      authenticated: auth !== null,
    });

    return { stub: this.createStub(transport), connection };
  }
}

function createTransport(
  connection: HttpConnection,
  httpClient: HttpClient,
  headers: Record<string, string>,
  auth: AuthRequest | null
): HttpTransport {
  const baseUrl = connection.target.replace(/\/+$/, '');

  return {
    baseUrl,
    async request(path, options = {}) {
      if (connection.isClosed()) {
        throw connectionError(`connection to ${connection.target} is closed`);
      }
      let request: HttpRequestOptions = {
        ...options,
        headers: { ...headers, ...options.headers },
      };
      if (auth) {
        request = await auth.configureRequest(request);
      }
      return httpClient(`${baseUrl}${path}`, request);
    },
  };
}
