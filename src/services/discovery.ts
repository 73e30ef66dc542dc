/**
 * Discovery Service
 * OpenID Connect discovery - 由 issuer URL 解析 token endpoint
 */

import type { DiscoveryDocument, DiscoveryPathStyle } from '../types/discovery.js';
import { connectionError } from '../lib/errors.js';
import { getDefaultHttpClient, isRecord, type HttpClient } from '../lib/http-client.js';
import { loggers } from '../lib/logger.js';
import { discoveryRequestsTotal } from '../lib/metrics.js';

const WELL_KNOWN_PATHS: Record<DiscoveryPathStyle, string> = {
  hyphen: '/.well-known/openid-configuration',
  underscore: '/.well-known/openid_configuration',
};

export interface FetchDiscoveryOptions {
  httpClient?: HttpClient;
  /** default: 'hyphen' */
  pathStyle?: DiscoveryPathStyle;
  signal?: AbortSignal;
}

export function buildDiscoveryUrl(issuerUrl: string, pathStyle: DiscoveryPathStyle = 'hyphen'): string {
  return issuerUrl.replace(/\/$/, '') + WELL_KNOWN_PATHS[pathStyle];
}

/**
 * 取得 discovery document
 * 結果不快取，由呼叫端保存解析出的 token endpoint
 */
export async function fetchDiscovery(
  issuerUrl: string,
  options: FetchDiscoveryOptions = {}
): Promise<DiscoveryDocument> {
  const httpClient = options.httpClient ?? getDefaultHttpClient();
  const discoveryUrl = buildDiscoveryUrl(issuerUrl, options.pathStyle);

  if (!URL.canParse(discoveryUrl)) {
    throw connectionError(`failed to create discovery request for issuer ${issuerUrl}`);
  }

  let body: unknown;
  try {
    body = await httpClient(discoveryUrl, { method: 'GET', signal: options.signal });
  } catch (error) {
    discoveryRequestsTotal.inc({ status: 'failed' });
    loggers.discovery.warn('Discovery request failed', { url: discoveryUrl });
    throw connectionError('failed to fetch discovery document', error);
  }

  try {
    const document = parseDiscoveryDocument(body);
    discoveryRequestsTotal.inc({ status: 'success' });
    loggers.discovery.debug('Discovered token endpoint', {
      url: discoveryUrl,
      tokenEndpoint: document.tokenEndpoint,
    });
    return document;
  } catch (error) {
    discoveryRequestsTotal.inc({ status: 'failed' });
    throw error;
  }
}

/**
 * 只解析 token endpoint 的捷徑
 */
export async function discoverTokenEndpoint(
  issuerUrl: string,
  options: FetchDiscoveryOptions = {}
): Promise<string> {
  const document = await fetchDiscovery(issuerUrl, options);
  return document.tokenEndpoint;
}

function parseDiscoveryDocument(body: unknown): DiscoveryDocument {
  if (!isRecord(body)) {
    throw connectionError('failed to decode discovery document: expected a JSON object');
  }

  const tokenEndpoint = body.token_endpoint;
  if (typeof tokenEndpoint !== 'string' || tokenEndpoint === '') {
    throw connectionError('token_endpoint not found in discovery document');
  }

  if (!URL.canParse(tokenEndpoint)) {
    throw connectionError(`invalid token_endpoint URL: ${tokenEndpoint}`);
  }

  return {
    tokenEndpoint,
    issuer: typeof body.issuer === 'string' ? body.issuer : '',
  };
}
