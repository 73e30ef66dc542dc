/**
 * Connection Builder
 * gRPC 與 HTTP builder 共用的傳輸安全與認證政策
 */

import type { TokenManager } from './auth.js';
import {
  oauth2CallCredentials,
  type CallCredentialSource,
  type OAuth2CallCredentialsOptions,
} from '../lib/call-credentials.js';
import { clientCreationError } from '../lib/errors.js';

export interface TlsOptions {
  rootCerts?: Buffer;
  privateKey?: Buffer;
  certChain?: Buffer;
}

export type TransportSecurity = ({ kind: 'tls' } & TlsOptions) | { kind: 'insecure' };

export abstract class ConnectionBuilder<TResult> {
  protected readonly target: string;
  protected transport: TransportSecurity = { kind: 'tls' };
  protected callCredentials: CallCredentialSource | null = null;

  constructor(target: string) {
    this.target = target.trim();
  }

  /**
   * 使用 TLS（預設）
   */
  secure(options: TlsOptions = {}): this {
    this.transport = { kind: 'tls', ...options };
    return this;
  }

  /**
   * 不加密連線，僅供本機開發
   */
  insecure(): this {
    this.transport = { kind: 'insecure' };
    return this;
  }

  unauthenticated(): this {
    this.callCredentials = null;
    return this;
  }

  authenticated(source: CallCredentialSource): this {
    this.callCredentials = source;
    return this;
  }

  oauth2ClientAuthenticated(
    tokenManager: TokenManager,
    options: OAuth2CallCredentialsOptions = {}
  ): this {
    this.callCredentials = oauth2CallCredentials(tokenManager, options);
    return this;
  }

  isInsecure(): boolean {
    return this.transport.kind === 'insecure';
  }

  /**
   * 驗證設定後建立 client，不驗證可連線
   */
  build(): TResult {
    if (this.target === '') {
      throw clientCreationError('target URI is required');
    }

    if (this.isInsecure() && this.callCredentials?.requireTransportSecurity()) {
      throw clientCreationError('cannot authenticate with insecure channel');
    }

    return this.create();
  }

  protected abstract create(): TResult;
}
