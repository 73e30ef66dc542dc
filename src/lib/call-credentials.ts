/**
 * Call Credentials
 * 每次呼叫附加的認證 metadata（gRPC）與 header（HTTP）
 */

import * as grpc from '@grpc/grpc-js';
import type { TokenManager } from '../services/auth.js';
import type { HttpRequestOptions } from './http-client.js';
import { loggers } from './logger.js';

export interface RequestMetadataOptions {
  signal?: AbortSignal;
}

/**
 * 每次 RPC 前提供 metadata 的來源
 */
export interface CallCredentialSource {
  getRequestMetadata(options?: RequestMetadataOptions): Promise<Record<string, string>>;
  /** true 時不得搭配不加密的連線 */
  requireTransportSecurity(): boolean;
}

export interface OAuth2CallCredentialsOptions {
  /** default: true */
  requireTransportSecurity?: boolean;
}

/**
 * 以 TokenManager 產生 `authorization: Bearer <token>`
 */
export function oauth2CallCredentials(
  tokenManager: TokenManager,
  options: OAuth2CallCredentialsOptions = {}
): CallCredentialSource {
  const requireTls = options.requireTransportSecurity ?? true;

  return {
    async getRequestMetadata(metadataOptions = {}) {
      const authorization = await tokenManager.getAuthorizationHeader({
        signal: metadataOptions.signal,
      });
      return { authorization };
    },
    requireTransportSecurity: () => requireTls,
  };
}

export function toMetadata(headers: Record<string, string>, metadata = new grpc.Metadata()): grpc.Metadata {
  for (const [key, value] of Object.entries(headers)) {
    metadata.set(key.toLowerCase(), value);
  }
  return metadata;
}

function asError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * 轉為 grpc-js CallCredentials（只能與 TLS channel credentials 組合）
 */
export function toGrpcCallCredentials(source: CallCredentialSource): grpc.CallCredentials {
  return grpc.credentials.createFromMetadataGenerator((_params, callback) => {
    void source.getRequestMetadata().then(
      (headers) => callback(null, toMetadata(headers)),
      (error: unknown) => {
        loggers.grpc.warn('Failed to obtain call credentials', { error: asError(error).message });
        callback(asError(error));
      }
    );
  });
}

/**
 * 不加密連線下附加 metadata 的 interceptor
 * 取得 metadata 失敗時以 UNAUTHENTICATED 結束呼叫
 */
export function metadataInterceptor(source: CallCredentialSource): grpc.Interceptor {
  return (options, nextCall) =>
    new grpc.InterceptingCall(nextCall(options), {
      start(metadata, listener, next) {
        void source.getRequestMetadata().then(
          (headers) => next(toMetadata(headers, metadata), listener),
          (error: unknown) => {
            loggers.grpc.warn('Failed to obtain call credentials', { error: asError(error).message });
            listener.onReceiveStatus({
              code: grpc.status.UNAUTHENTICATED,
              details: asError(error).message,
              metadata: new grpc.Metadata(),
            });
          }
        );
      },
    });
}

/**
 * HTTP 請求的認證裝飾
 */
export interface AuthRequest {
  configureRequest(request: HttpRequestOptions): Promise<HttpRequestOptions>;
}

/**
 * 在請求 header 加上 `authorization: Bearer <token>`
 */
export function oauth2AuthRequest(tokenManager: TokenManager): AuthRequest {
  return {
    async configureRequest(request) {
      const authorization = await tokenManager.getAuthorizationHeader({ signal: request.signal });
      return {
        ...request,
        headers: { ...request.headers, authorization },
      };
    },
  };
}

/**
 * 以任意 CallCredentialSource 裝飾 HTTP 請求
 */
export function callCredentialsAuthRequest(source: CallCredentialSource): AuthRequest {
  return {
    async configureRequest(request) {
      const headers = await source.getRequestMetadata({ signal: request.signal });
      return {
        ...request,
        headers: { ...request.headers, ...headers },
      };
    },
  };
}
