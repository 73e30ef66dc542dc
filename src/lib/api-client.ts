/**
 * API Client Helper
 * 依設定建立 CLI 共用的 TokenManager 與 inventory client
 */

import { TokenManager } from '../services/auth.js';
import { getConfigService, type ConfigService } from '../services/config.js';
import { FileTokenStore } from '../services/token-store.js';
import { inventoryGrpcClientBuilder, type InventoryGrpcClient } from '../services/inventory-grpc.js';
import type { GrpcConnection } from '../services/grpc-client-builder.js';
import { oauth2AuthRequest, type AuthRequest } from './call-credentials.js';

/**
 * 缺少必要設定
 */
export class MissingConfigError extends Error {
  readonly code = 'CONFIG_MISSING';

  constructor(message: string) {
    super(message);
    this.name = 'MissingConfigError';
  }
}

/**
 * 建立 TokenManager，token 快取於 ~/.cache/kessel/tokens
 * @throws MissingConfigError 如果未設定 client 憑證
 */
export async function getTokenManager(config: ConfigService = getConfigService()): Promise<TokenManager> {
  if (!config.hasCredentials()) {
    throw new MissingConfigError(
      'OAuth2 credentials are not configured: set KESSEL_OAUTH2_CLIENT_ID and KESSEL_OAUTH2_CLIENT_SECRET'
    );
  }

  return TokenManager.fromConfig(config.getOAuth2Config(), { store: new FileTokenStore() });
}

/**
 * 有設定憑證時回傳 HTTP 認證裝飾，否則 undefined
 */
export async function getAuthRequest(config: ConfigService = getConfigService()): Promise<AuthRequest | undefined> {
  if (!config.hasCredentials()) {
    return undefined;
  }
  return oauth2AuthRequest(await getTokenManager(config));
}

export interface InventoryConnection {
  client: InventoryGrpcClient;
  connection: GrpcConnection;
}

/**
 * 依設定建立 inventory gRPC client；不加密時 token 不要求 TLS
 * @throws MissingConfigError 如果未設定 endpoint
 */
export async function getInventoryClient(config: ConfigService = getConfigService()): Promise<InventoryConnection> {
  const resolved = config.resolve();
  if (!resolved.endpoint) {
    throw new MissingConfigError('Inventory endpoint is not configured: set KESSEL_ENDPOINT');
  }

  const builder = inventoryGrpcClientBuilder(resolved.endpoint)
    .maxReceiveMessageSize(resolved.maxReceiveMessageSize)
    .maxSendMessageSize(resolved.maxSendMessageSize);

  if (resolved.insecure) {
    builder.insecure();
  }

  if (config.hasCredentials()) {
    builder.oauth2ClientAuthenticated(await getTokenManager(config), {
      requireTransportSecurity: !resolved.insecure,
    });
  } else {
    builder.unauthenticated();
  }

  const { stub, connection } = builder.build();
  return { client: stub, connection };
}
