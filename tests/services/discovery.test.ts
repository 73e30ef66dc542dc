import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from 'vitest';
import {
  buildDiscoveryUrl,
  discoverTokenEndpoint,
  fetchDiscovery,
} from '../../src/services/discovery.js';
import type { HttpClient } from '../../src/lib/http-client.js';
import {
  findStatusCode,
  isConnectionError,
  isStatusError,
  statusError,
} from '../../src/lib/errors.js';
import { getMetricsText, resetMetrics } from '../../src/lib/metrics.js';

const ISSUER = 'https://sso.example.com/auth/realms/test';

describe('Discovery', () => {
  let httpClient: Mock<HttpClient>;

  beforeEach(() => {
    resetMetrics();
    httpClient = vi.fn<HttpClient>();
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('buildDiscoveryUrl', () => {
    it('should append the hyphen path by default', () => {
      expect(buildDiscoveryUrl(ISSUER)).toBe(`${ISSUER}/.well-known/openid-configuration`);
    });

    it('should trim a trailing slash', () => {
      expect(buildDiscoveryUrl(`${ISSUER}/`)).toBe(`${ISSUER}/.well-known/openid-configuration`);
    });

    it('should support the underscore path', () => {
      expect(buildDiscoveryUrl(ISSUER, 'underscore')).toBe(`${ISSUER}/.well-known/openid_configuration`);
    });
  });

  describe('fetchDiscovery', () => {
    it('should return the token endpoint and issuer', async () => {
      httpClient.mockResolvedValueOnce({
        issuer: ISSUER,
        token_endpoint: `${ISSUER}/protocol/openid-connect/token`,
        jwks_uri: `${ISSUER}/protocol/openid-connect/certs`,
      });

      const document = await fetchDiscovery(`${ISSUER}/`, { httpClient });

      expect(document).toEqual({
        issuer: ISSUER,
        tokenEndpoint: `${ISSUER}/protocol/openid-connect/token`,
      });
      expect(httpClient).toHaveBeenCalledWith(`${ISSUER}/.well-known/openid-configuration`, {
        method: 'GET',
        signal: undefined,
      });
    });

    it('should request the underscore path when asked', async () => {
      httpClient.mockResolvedValueOnce({ token_endpoint: 'https://sso.example.com/token' });

      await fetchDiscovery(ISSUER, { httpClient, pathStyle: 'underscore' });

      expect(httpClient.mock.calls[0][0]).toBe(`${ISSUER}/.well-known/openid_configuration`);
    });

    it('should default the issuer to an empty string', async () => {
      httpClient.mockResolvedValueOnce({ token_endpoint: 'https://sso.example.com/token' });

      const document = await fetchDiscovery(ISSUER, { httpClient });

      expect(document.issuer).toBe('');
    });

    it('should fail with a connection error wrapping the status on 404', async () => {
      httpClient.mockRejectedValueOnce(statusError(404, 'GET discovery failed'));

      const error: unknown = await fetchDiscovery(ISSUER, { httpClient }).catch((e: unknown) => e);

      expect(isConnectionError(error)).toBe(true);
      expect(isStatusError(error)).toBe(true);
      expect(findStatusCode(error)).toBe(404);
    });

    it('should fail when token_endpoint is missing', async () => {
      httpClient.mockResolvedValueOnce({ issuer: ISSUER });

      await expect(fetchDiscovery(ISSUER, { httpClient })).rejects.toThrow(
        'token_endpoint not found in discovery document'
      );
    });

    it('should fail when the body is not an object', async () => {
      httpClient.mockResolvedValueOnce('<html>maintenance</html>');

      const error: unknown = await fetchDiscovery(ISSUER, { httpClient }).catch((e: unknown) => e);

      expect(isConnectionError(error)).toBe(true);
      expect(error).toHaveProperty(
        'message',
        'failed to decode discovery document: expected a JSON object'
      );
    });

    it('should fail when token_endpoint is not an absolute URL', async () => {
      httpClient.mockResolvedValueOnce({ token_endpoint: '/protocol/token' });

      await expect(fetchDiscovery(ISSUER, { httpClient })).rejects.toThrow(
        'invalid token_endpoint URL: /protocol/token'
      );
    });

    it('should reject an issuer that is not a URL without a request', async () => {
      const error: unknown = await fetchDiscovery('not a url', { httpClient }).catch((e: unknown) => e);

      expect(isConnectionError(error)).toBe(true);
      expect(httpClient).not.toHaveBeenCalled();
    });

    it('should count successes and failures', async () => {
      httpClient
        .mockResolvedValueOnce({ token_endpoint: 'https://sso.example.com/token' })
        .mockRejectedValueOnce(new Error('ECONNRESET'));

      await fetchDiscovery(ISSUER, { httpClient });
      await fetchDiscovery(ISSUER, { httpClient }).catch(() => undefined);

      const text = await getMetricsText();
      expect(text).toContain('kessel_discovery_requests_total{status="success"} 1');
      expect(text).toContain('kessel_discovery_requests_total{status="failed"} 1');
    });
  });

  describe('discoverTokenEndpoint', () => {
    it('should return only the token endpoint', async () => {
      httpClient.mockResolvedValueOnce({ token_endpoint: 'https://sso.example.com/token' });

      await expect(discoverTokenEndpoint(ISSUER, { httpClient })).resolves.toBe(
        'https://sso.example.com/token'
      );
    });
  });
});
