import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'node:fs';
import path from 'node:path';
import os from 'node:os';

// Mock ofetch（保留真正的 FetchError）
vi.mock('ofetch', async (importOriginal) => {
  const actual = await importOriginal<typeof import('ofetch')>();
  return { ...actual, ofetch: vi.fn() };
});

import { ofetch, FetchError } from 'ofetch';
import {
  TokenManager,
  DEFAULT_EXPIRES_IN_SECONDS,
  EXPIRATION_WINDOW_MS,
} from '../../src/services/auth.js';
import { FileTokenStore } from '../../src/services/token-store.js';
import {
  findStatusCode,
  isConnectionError,
  isStatusError,
  isTokenError,
} from '../../src/lib/errors.js';
import { getMetricsText, resetMetrics } from '../../src/lib/metrics.js';

const TOKEN_ENDPOINT = 'https://sso.example.com/token';
const ISSUER = 'https://sso.example.com/realms/test';

const credentials = {
  clientId: 'test-client',
  clientSecret: 'test-secret',
  tokenEndpoint: TOKEN_ENDPOINT,
};

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe('TokenManager', () => {
  let clock: number;
  let manager: TokenManager;

  beforeEach(() => {
    vi.clearAllMocks();
    resetMetrics();
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    clock = 1_700_000_000_000;
    manager = new TokenManager(credentials, { now: () => clock });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('getToken', () => {
    it('should request new token when no cached token', async () => {
      vi.mocked(ofetch).mockResolvedValueOnce({
        access_token: 'token-1',
        token_type: 'Bearer',
        expires_in: 3600,
      });

      const token = await manager.getToken();

      expect(token).toEqual({
        accessToken: 'token-1',
        tokenType: 'Bearer',
        expiresAt: clock + 3600 * 1000,
      });
      expect(ofetch).toHaveBeenCalledTimes(1);
    });

    it('should send the client credentials form', async () => {
      vi.mocked(ofetch).mockResolvedValueOnce({ access_token: 'token-1', expires_in: 3600 });

      await manager.getToken();

      expect(ofetch).toHaveBeenCalledWith(
        TOKEN_ENDPOINT,
        expect.objectContaining({
          method: 'POST',
          body: 'client_id=test-client&client_secret=test-secret&grant_type=client_credentials',
          headers: expect.objectContaining({
            'Content-Type': 'application/x-www-form-urlencoded',
          }),
        })
      );
    });

    it('should include the scope when configured', async () => {
      vi.mocked(ofetch).mockResolvedValueOnce({ access_token: 'token-1', expires_in: 3600 });
      const scoped = new TokenManager({ ...credentials, scope: 'api.read api.write' });

      await scoped.getToken();

      expect(ofetch).toHaveBeenCalledWith(
        TOKEN_ENDPOINT,
        expect.objectContaining({
          body: 'client_id=test-client&client_secret=test-secret&grant_type=client_credentials&scope=api.read+api.write',
        })
      );
    });

    it('should return cached token when valid', async () => {
      vi.mocked(ofetch).mockResolvedValueOnce({ access_token: 'token-1', expires_in: 3600 });

      const first = await manager.getToken();
      const second = await manager.getToken();

      expect(second).toEqual(first);
      // ofetch 只應該被呼叫一次
      expect(ofetch).toHaveBeenCalledTimes(1);
    });

    it('should treat tokens inside the expiration window as expired', async () => {
      vi.mocked(ofetch)
        .mockResolvedValueOnce({ access_token: 'token-1', expires_in: 3600 })
        .mockResolvedValueOnce({ access_token: 'token-2', expires_in: 3600 });

      await manager.getToken();

      // 剩餘時間剛好超過 300 秒：仍有效
      clock += 3600 * 1000 - EXPIRATION_WINDOW_MS - 1;
      expect(manager.isTokenValid()).toBe(true);
      expect((await manager.getToken()).accessToken).toBe('token-1');

      // 剩餘時間等於 300 秒：視為過期
      clock += 1;
      expect(manager.isTokenValid()).toBe(false);
      expect((await manager.getToken()).accessToken).toBe('token-2');
      expect(ofetch).toHaveBeenCalledTimes(2);
    });

    it('should default expires_in to 3600 seconds when absent or zero', async () => {
      vi.mocked(ofetch)
        .mockResolvedValueOnce({ access_token: 'token-1' })
        .mockResolvedValueOnce({ access_token: 'token-2', expires_in: 0 });

      const first = await manager.getToken();
      const second = await manager.getToken({ forceRefresh: true });

      expect(first.expiresAt).toBe(clock + DEFAULT_EXPIRES_IN_SECONDS * 1000);
      expect(second.expiresAt).toBe(clock + DEFAULT_EXPIRES_IN_SECONDS * 1000);
    });

    it('should default token_type to Bearer', async () => {
      vi.mocked(ofetch).mockResolvedValueOnce({ access_token: 'token-1', expires_in: 3600 });

      expect((await manager.getToken()).tokenType).toBe('Bearer');
    });

    it('should refresh when forced even if the cache is valid', async () => {
      vi.mocked(ofetch)
        .mockResolvedValueOnce({ access_token: 'token-1', expires_in: 3600 })
        .mockResolvedValueOnce({ access_token: 'token-2', expires_in: 3600 });

      await manager.getToken();
      const forced = await manager.getToken({ forceRefresh: true });

      expect(forced.accessToken).toBe('token-2');
      expect(ofetch).toHaveBeenCalledTimes(2);
      expect((await manager.getToken()).accessToken).toBe('token-2');
    });

    it('should leave the cache empty when a forced refresh fails', async () => {
      vi.mocked(ofetch)
        .mockResolvedValueOnce({ access_token: 'token-1', expires_in: 3600 })
        .mockRejectedValueOnce(new Error('connect ECONNREFUSED'));

      await manager.getToken();
      await expect(manager.getToken({ forceRefresh: true })).rejects.toThrow(
        'failed to retrieve token'
      );

      expect(manager.isTokenValid()).toBe(false);
    });

    it('should wrap HTTP failures as token retrieval errors', async () => {
      vi.mocked(ofetch).mockRejectedValueOnce(
        Object.assign(new FetchError('Unauthorized'), { status: 401 })
      );

      const error: unknown = await manager.getToken().catch((e: unknown) => e);

      expect(isTokenError(error)).toBe(true);
      expect(isStatusError(error)).toBe(true);
      expect(findStatusCode(error)).toBe(401);
      expect(error).toHaveProperty(
        'message',
        `failed to retrieve token: POST ${TOKEN_ENDPOINT} failed: status code 401`
      );
    });

    it('should not retry failures', async () => {
      vi.mocked(ofetch).mockRejectedValueOnce(new Error('connect ECONNREFUSED'));

      await expect(manager.getToken()).rejects.toThrow();

      expect(ofetch).toHaveBeenCalledTimes(1);
      expect(manager.hasInflightRequest()).toBe(false);
    });

    it('should reject malformed token responses', async () => {
      vi.mocked(ofetch).mockResolvedValueOnce({ error: 'invalid_client' });

      const error: unknown = await manager.getToken().catch((e: unknown) => e);

      expect(isTokenError(error)).toBe(true);
      expect(error).toHaveProperty('message', 'failed to decode token response');
    });

    it('should never include the client secret in errors', async () => {
      vi.mocked(ofetch).mockRejectedValueOnce(new Error('bad request client_secret=test-secret'));

      const error: unknown = await manager.getToken().catch((e: unknown) => e);

      expect(error).toHaveProperty('message');
      expect(String(error instanceof Error ? error.message : '')).not.toContain('test-secret');
    });
  });

  describe('logging', () => {
    it('should log a failed token request with its endpoint', async () => {
      const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
      vi.mocked(ofetch).mockRejectedValueOnce(new Error('connect ECONNREFUSED'));

      await expect(manager.getToken()).rejects.toThrow('failed to retrieve token');

      const line: unknown = errorSpy.mock.calls[errorSpy.mock.calls.length - 1][0];
      const entry: unknown = JSON.parse(String(line));
      expect(entry).toMatchObject({
        level: 'error',
        component: 'Auth',
        message: 'Token request failed',
        context: { url: TOKEN_ENDPOINT },
      });
    });
  });

  describe('single flight', () => {
    it('should share one refresh between concurrent callers', async () => {
      vi.mocked(ofetch).mockImplementation(async () => {
        await sleep(50);
        return { access_token: 'shared-token', expires_in: 3600 };
      });

      const pending = Array.from({ length: 5 }, () => manager.getToken());
      expect(manager.hasInflightRequest()).toBe(true);

      const tokens = await Promise.all(pending);

      expect(ofetch).toHaveBeenCalledTimes(1);
      expect(tokens.map((t) => t.accessToken)).toEqual(Array(5).fill('shared-token'));
      expect(manager.hasInflightRequest()).toBe(false);
    });

    it('should keep serving joined callers when the first caller aborts', async () => {
      vi.mocked(ofetch).mockImplementation(async () => {
        await sleep(30);
        return { access_token: 'shared-token', expires_in: 3600 };
      });
      const controller = new AbortController();

      const first = manager.getToken({ signal: controller.signal });
      const second = manager.getToken();
      controller.abort();

      const error: unknown = await first.catch((e: unknown) => e);
      expect(isTokenError(error)).toBe(true);
      expect((await second).accessToken).toBe('shared-token');
      expect(ofetch).toHaveBeenCalledTimes(1);
      expect(manager.isTokenValid()).toBe(true);
    });

    it('should reject an already aborted caller without a request', async () => {
      const error: unknown = await manager.getToken({ signal: AbortSignal.abort() }).catch((e: unknown) => e);

      expect(isTokenError(error)).toBe(true);
      expect(ofetch).not.toHaveBeenCalled();
    });

    it('should run a forced refresh after the refresh in flight', async () => {
      vi.mocked(ofetch)
        .mockImplementationOnce(async () => {
          await sleep(20);
          return { access_token: 'token-1', expires_in: 3600 };
        })
        .mockResolvedValueOnce({ access_token: 'token-2', expires_in: 3600 });

      const first = manager.getToken();
      const forced = manager.getToken({ forceRefresh: true });

      // 強制更新在第一個請求完成前不會發出
      expect(ofetch).toHaveBeenCalledTimes(1);

      expect((await first).accessToken).toBe('token-1');
      expect((await forced).accessToken).toBe('token-2');
      expect(ofetch).toHaveBeenCalledTimes(2);
      expect((await manager.getToken()).accessToken).toBe('token-2');
    });

    it('should let the next caller start a new refresh after a failure', async () => {
      vi.mocked(ofetch)
        .mockRejectedValueOnce(new Error('connect ECONNREFUSED'))
        .mockResolvedValueOnce({ access_token: 'token-2', expires_in: 3600 });

      await expect(manager.getToken()).rejects.toThrow();
      const token = await manager.getToken();

      expect(token.accessToken).toBe('token-2');
    });
  });

  describe('getAuthorizationHeader', () => {
    it('should return a bearer header', async () => {
      vi.mocked(ofetch).mockResolvedValueOnce({ access_token: 'token-1', expires_in: 3600 });

      await expect(manager.getAuthorizationHeader()).resolves.toBe('Bearer token-1');
    });
  });

  describe('clearCache', () => {
    it('should force the next call to refresh', async () => {
      vi.mocked(ofetch)
        .mockResolvedValueOnce({ access_token: 'token-1', expires_in: 3600 })
        .mockResolvedValueOnce({ access_token: 'token-2', expires_in: 3600 });

      await manager.getToken();
      manager.clearCache();

      expect(manager.isTokenValid()).toBe(false);
      expect((await manager.getToken()).accessToken).toBe('token-2');
    });
  });

  describe('metrics', () => {
    it('should count token requests and cache hits', async () => {
      vi.mocked(ofetch).mockResolvedValueOnce({ access_token: 'token-1', expires_in: 3600 });

      await manager.getToken();
      await manager.getToken();

      const text = await getMetricsText();
      expect(text).toContain('kessel_auth_token_requests_total{status="success"} 1');
      expect(text).toContain('kessel_auth_cache_hits_total 1');
      expect(text).toContain('kessel_auth_cache_misses_total 1');
    });
  });

  describe('fromConfig', () => {
    it('should require client id and secret', async () => {
      const error: unknown = await TokenManager.fromConfig({
        clientId: 'test-client',
        tokenEndpoint: TOKEN_ENDPOINT,
      }).catch((e: unknown) => e);

      expect(isTokenError(error)).toBe(true);
      expect(error).toHaveProperty(
        'message',
        'OAuth2 configuration incomplete: client_id and client_secret are required'
      );
    });

    it('should require a token endpoint or an issuer', async () => {
      await expect(
        TokenManager.fromConfig({ clientId: 'test-client', clientSecret: 'test-secret' })
      ).rejects.toThrow('OAuth2 configuration incomplete: either token_url or issuer_url must be provided');
    });

    it('should use the token endpoint without discovery', async () => {
      const fromConfig = await TokenManager.fromConfig({
        clientId: 'test-client',
        clientSecret: 'test-secret',
        tokenEndpoint: TOKEN_ENDPOINT,
        issuerUrl: ISSUER,
      });

      expect(fromConfig.getTokenEndpoint()).toBe(TOKEN_ENDPOINT);
      expect(fromConfig.getClientId()).toBe('test-client');
      expect(ofetch).not.toHaveBeenCalled();
    });

    it('should discover the token endpoint from the issuer', async () => {
      vi.mocked(ofetch)
        .mockResolvedValueOnce({ token_endpoint: `${ISSUER}/protocol/openid-connect/token` })
        .mockResolvedValueOnce({ access_token: 'token-1', expires_in: 3600 });

      const fromConfig = await TokenManager.fromConfig({
        clientId: 'test-client',
        clientSecret: 'test-secret',
        issuerUrl: ISSUER,
        scopes: ['openid', 'api.read'],
      });
      await fromConfig.getToken();

      expect(fromConfig.getTokenEndpoint()).toBe(`${ISSUER}/protocol/openid-connect/token`);
      expect(vi.mocked(ofetch).mock.calls[0][0]).toBe(`${ISSUER}/.well-known/openid-configuration`);
      expect(ofetch).toHaveBeenLastCalledWith(
        `${ISSUER}/protocol/openid-connect/token`,
        expect.objectContaining({
          body: 'client_id=test-client&client_secret=test-secret&grant_type=client_credentials&scope=openid+api.read',
        })
      );
    });

    it('should report discovery failures as token errors', async () => {
      vi.mocked(ofetch).mockRejectedValueOnce(Object.assign(new FetchError('Not Found'), { status: 404 }));

      const error: unknown = await TokenManager.fromConfig({
        clientId: 'test-client',
        clientSecret: 'test-secret',
        issuerUrl: ISSUER,
      }).catch((e: unknown) => e);

      expect(isTokenError(error)).toBe(true);
      expect(isConnectionError(error)).toBe(true);
      expect(findStatusCode(error)).toBe(404);
      expect(error).toHaveProperty(
        'message',
        expect.stringMatching(/^failed to discover token endpoint from issuer https:\/\/sso\.example\.com\/realms\/test: /)
      );
    });
  });

  describe('with a token store', () => {
    let cacheDir: string;

    beforeEach(() => {
      cacheDir = fs.mkdtempSync(path.join(os.tmpdir(), 'kessel-auth-test-'));
    });

    afterEach(() => {
      fs.rmSync(cacheDir, { recursive: true, force: true });
    });

    it('should reuse a stored token across instances', async () => {
      vi.mocked(ofetch).mockResolvedValueOnce({ access_token: 'stored-token', expires_in: 3600 });
      const store = new FileTokenStore(cacheDir);

      await new TokenManager(credentials, { store }).getToken();
      const token = await new TokenManager(credentials, { store }).getToken();

      expect(token.accessToken).toBe('stored-token');
      expect(ofetch).toHaveBeenCalledTimes(1);
    });

    it('should bypass the store when forced', async () => {
      vi.mocked(ofetch)
        .mockResolvedValueOnce({ access_token: 'token-1', expires_in: 3600 })
        .mockResolvedValueOnce({ access_token: 'token-2', expires_in: 3600 });
      const store = new FileTokenStore(cacheDir);

      await new TokenManager(credentials, { store }).getToken();
      const forced = await new TokenManager(credentials, { store }).getToken({ forceRefresh: true });
      const reused = await new TokenManager(credentials, { store }).getToken();

      expect(forced.accessToken).toBe('token-2');
      expect(reused.accessToken).toBe('token-2');
      expect(ofetch).toHaveBeenCalledTimes(2);
    });

    it('should ignore stored tokens inside the expiration window', async () => {
      vi.mocked(ofetch)
        .mockResolvedValueOnce({ access_token: 'short-token', expires_in: 120 })
        .mockResolvedValueOnce({ access_token: 'token-2', expires_in: 3600 });
      const store = new FileTokenStore(cacheDir);

      await new TokenManager(credentials, { store }).getToken();
      const token = await new TokenManager(credentials, { store }).getToken();

      expect(token.accessToken).toBe('token-2');
    });
  });
});
