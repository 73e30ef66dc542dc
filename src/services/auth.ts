/**
 * Auth Service
 * OAuth2 client credentials - 取得並快取 access token
 */

import type {
  CachedToken,
  ClientCredentials,
  GetTokenOptions,
  OAuth2Config,
  RefreshTokenResponse,
  TokenResponse,
} from '../types/auth.js';
import { isTokenCacheError, tokenError } from '../lib/errors.js';
import { getDefaultHttpClient, isRecord, type HttpClient } from '../lib/http-client.js';
import { loggers } from '../lib/logger.js';
import {
  authCacheHitsTotal,
  authCacheMissesTotal,
  authTokenRequestDurationSeconds,
  authTokenRequestsTotal,
} from '../lib/metrics.js';
import { discoverTokenEndpoint } from './discovery.js';
import { tokenStoreKey, type TokenStore } from './token-store.js';

// 距過期不足 300 秒的 token 視為無效
export const EXPIRATION_WINDOW_MS = 300 * 1000;

// expires_in 缺少或為 0 時的預設秒數
export const DEFAULT_EXPIRES_IN_SECONDS = 3600;

export interface TokenManagerOptions {
  httpClient?: HttpClient;
  /** 跨程序共用的持久快取 */
  store?: TokenStore;
  /** 時鐘（毫秒），測試時注入 */
  now?: () => number;
}

/**
 * 單一身分的記憶體快取
 */
class TokenCache {
  private token: RefreshTokenResponse | null = null;

  get(): RefreshTokenResponse | null {
    return this.token;
  }

  set(token: RefreshTokenResponse): void {
    this.token = token;
  }

  clear(): void {
    this.token = null;
  }

  isValid(now: number): boolean {
    return this.token !== null && isUsable(this.token, now);
  }
}

function isUsable(token: CachedToken, now: number): boolean {
  return token.accessToken !== '' && now + EXPIRATION_WINDOW_MS < token.expiresAt;
}

export class TokenManager {
  private credentials: ClientCredentials;
  private httpClient: HttpClient;
  private store?: TokenStore;
  private now: () => number;
  private cache = new TokenCache();

  // 單一飛行請求：進行中的 refresh 由所有同時呼叫者共用
  private inFlightTokenPromise: Promise<RefreshTokenResponse> | null = null;

  constructor(credentials: ClientCredentials, options: TokenManagerOptions = {}) {
    this.credentials = { ...credentials };
    this.httpClient = options.httpClient ?? getDefaultHttpClient();
    this.store = options.store;
    this.now = options.now ?? Date.now;
  }

  /**
   * 由設定建立，只有 issuer 時透過 discovery 解析 token endpoint
   */
  static async fromConfig(
    config: OAuth2Config,
    options: TokenManagerOptions & { signal?: AbortSignal } = {}
  ): Promise<TokenManager> {
    const { clientId, clientSecret } = config;
    if (!clientId || !clientSecret) {
      throw tokenError('OAuth2 configuration incomplete: client_id and client_secret are required');
    }

    let tokenEndpoint = config.tokenEndpoint;
    if (!tokenEndpoint) {
      if (!config.issuerUrl) {
        throw tokenError(
          'OAuth2 configuration incomplete: either token_url or issuer_url must be provided'
        );
      }

      try {
        tokenEndpoint = await discoverTokenEndpoint(config.issuerUrl, {
          httpClient: options.httpClient,
          signal: options.signal,
        });
      } catch (error) {
        throw tokenError(`failed to discover token endpoint from issuer ${config.issuerUrl}`, error);
      }
    }

    const scope = config.scopes && config.scopes.length > 0 ? config.scopes.join(' ') : undefined;

    return new TokenManager({ clientId, clientSecret, tokenEndpoint, scope }, options);
  }

  /**
   * 取得有效的 access token
   * - 快取有效且非強制：直接返回，不發請求
   * - 有請求進行中：加入進行中的請求
   * - 強制更新：排在進行中的請求之後，清除快取再重新取得
   *
   * signal 只中止自己的等待，共用的 refresh 繼續替其他呼叫者執行
   */
  async getToken(options: GetTokenOptions = {}): Promise<RefreshTokenResponse> {
    if (!options.forceRefresh) {
      const cached = this.cache.get();
      if (cached && this.cache.isValid(this.now())) {
        authCacheHitsTotal.inc();
        return cached;
      }

      if (this.inFlightTokenPromise) {
        return waitForToken(this.inFlightTokenPromise, options.signal);
      }

      const stored = this.loadFromStore();
      if (stored) {
        authCacheHitsTotal.inc();
        this.cache.set(stored);
        return stored;
      }
    }

    if (options.signal?.aborted) {
      throw tokenError('failed to retrieve token', options.signal.reason);
    }

    authCacheMissesTotal.inc();
    return waitForToken(this.startRefresh(Boolean(options.forceRefresh)), options.signal);
  }

  private startRefresh(forceRefresh: boolean): Promise<RefreshTokenResponse> {
    const previous = this.inFlightTokenPromise;
    const run = (): Promise<RefreshTokenResponse> => {
      if (forceRefresh) {
        this.clearCache();
      }
      return this.refresh();
    };

    const promise = previous ? previous.then(run, run) : run();
    this.inFlightTokenPromise = promise;

    // 只有自己仍是最新的請求時才清除標記；錯誤交給各呼叫者
    const settle = (): void => {
      if (this.inFlightTokenPromise === promise) {
        this.inFlightTokenPromise = null;
      }
    };
    void promise.then(settle, settle);

    return promise;
  }

  /**
   * 檢查快取的 token 是否有效
   */
  isTokenValid(): boolean {
    return this.cache.isValid(this.now());
  }

  /**
   * 清除記憶體與持久快取
   * 不中斷進行中的請求
   */
  clearCache(): void {
    this.cache.clear();
    if (this.store) {
      try {
        this.store.delete(this.storeKey());
      } catch (error) {
        loggers.auth.warn('Failed to delete stored token', {
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }
  }

  hasInflightRequest(): boolean {
    return this.inFlightTokenPromise !== null;
  }

  async getAuthorizationHeader(options: GetTokenOptions = {}): Promise<string> {
    const token = await this.getToken(options);
    return `Bearer ${token.accessToken}`;
  }

  getTokenEndpoint(): string {
    return this.credentials.tokenEndpoint;
  }

  getClientId(): string {
    return this.credentials.clientId;
  }

  private storeKey(): string {
    return tokenStoreKey(this.credentials);
  }

  private loadFromStore(): RefreshTokenResponse | null {
    if (!this.store) {
      return null;
    }

    let stored: CachedToken;
    try {
      stored = this.store.load(this.storeKey());
    } catch (error) {
      if (!isTokenCacheError(error)) {
        loggers.auth.warn('Failed to read stored token', {
          error: error instanceof Error ? error.message : String(error),
        });
      }
      return null;
    }

    if (!isUsable(stored, this.now())) {
      return null;
    }

    return { accessToken: stored.accessToken, tokenType: 'Bearer', expiresAt: stored.expiresAt };
  }

  private saveToStore(token: RefreshTokenResponse): void {
    if (!this.store) {
      return;
    }

    try {
      this.store.save(this.storeKey(), {
        accessToken: token.accessToken,
        expiresAt: token.expiresAt,
      });
    } catch (error) {
      loggers.auth.warn('Failed to persist token', {
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  /**
   * 向 token endpoint 請求新的 token，失敗不重試，快取維持原狀
   */
  private async refresh(): Promise<RefreshTokenResponse> {
    const form = new URLSearchParams({
      client_id: this.credentials.clientId,
      client_secret: this.credentials.clientSecret,
      grant_type: 'client_credentials',
    });
    if (this.credentials.scope) {
      form.set('scope', this.credentials.scope);
    }

    const endTimer = authTokenRequestDurationSeconds.startTimer();
    let body: unknown;
    try {
      body = await loggers.auth.trackAsync(
        'Token request',
        () =>
          this.httpClient(this.credentials.tokenEndpoint, {
            method: 'POST',
            headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
            body: form.toString(),
          }),
        { url: this.credentials.tokenEndpoint }
      );
    } catch (error) {
      endTimer();
      authTokenRequestsTotal.inc({ status: 'failed' });
      throw tokenError('failed to retrieve token', error);
    }
    endTimer();

    const response = toTokenResponse(body);
    if (!response) {
      authTokenRequestsTotal.inc({ status: 'failed' });
      throw tokenError('failed to decode token response');
    }
    const token = this.toRefreshTokenResponse(response);

    authTokenRequestsTotal.inc({ status: 'success' });
    loggers.auth.debug('Token refreshed', {
      url: this.credentials.tokenEndpoint,
      expiresAt: new Date(token.expiresAt).toISOString(),
    });

    this.cache.set(token);
    this.saveToStore(token);
    return token;
  }

  private toRefreshTokenResponse(response: TokenResponse): RefreshTokenResponse {
    const expiresIn = response.expires_in ?? DEFAULT_EXPIRES_IN_SECONDS;
    return {
      accessToken: response.access_token,
      tokenType: response.token_type || 'Bearer',
      expiresAt: this.now() + expiresIn * 1000,
    };
  }
}

/**
 * 驗證 token endpoint 的回應，access_token 必須存在
 */
function toTokenResponse(body: unknown): TokenResponse | null {
  if (!isRecord(body) || typeof body.access_token !== 'string' || body.access_token === '') {
    return null;
  }

  return {
    access_token: body.access_token,
    token_type: typeof body.token_type === 'string' ? body.token_type : '',
    expires_in: parseExpiresIn(body.expires_in),
    scope: typeof body.scope === 'string' ? body.scope : undefined,
  };
}

/**
 * 只中止呼叫者自己的等待
 */
function waitForToken(
  promise: Promise<RefreshTokenResponse>,
  signal?: AbortSignal
): Promise<RefreshTokenResponse> {
  if (!signal) {
    return promise;
  }

  return new Promise((resolve, reject) => {
    const onAbort = (): void => {
      reject(tokenError('failed to retrieve token', signal.reason));
    };
    if (signal.aborted) {
      onAbort();
      return;
    }

    signal.addEventListener('abort', onAbort, { once: true });
    void promise.then(
      (token) => {
        signal.removeEventListener('abort', onAbort);
        resolve(token);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

function parseExpiresIn(value: unknown): number {
  const seconds = typeof value === 'string' ? Number(value) : value;
  if (typeof seconds !== 'number' || !Number.isFinite(seconds) || seconds <= 0) {
    return DEFAULT_EXPIRES_IN_SECONDS;
  }
  return seconds;
}
