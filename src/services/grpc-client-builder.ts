/**
 * gRPC Client Builder
 * 建立 grpc-js Client 與型別化 stub
 */

import * as grpc from '@grpc/grpc-js';
import { ConnectionBuilder } from './connection-builder.js';
import { metadataInterceptor, toGrpcCallCredentials } from '../lib/call-credentials.js';
import { clientCreationError, resourceCloseError } from '../lib/errors.js';
import { loggers } from '../lib/logger.js';
import { connectionsBuiltTotal, connectionsClosedTotal } from '../lib/metrics.js';

// 4 MiB
export const DEFAULT_MAX_RECEIVE_MESSAGE_SIZE = 4 * 1024 * 1024;
export const DEFAULT_MAX_SEND_MESSAGE_SIZE = 4 * 1024 * 1024;

export type ChannelOptionValue = string | number;

/**
 * build() 產生的連線，close() 只生效一次
 */
export class GrpcConnection {
  private closed = false;

  constructor(
    readonly client: grpc.Client,
    readonly target: string
  ) {}

  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;

    try {
      this.client.close();
    } catch (error) {
      throw resourceCloseError(`failed to close connection to ${this.target}`, error);
    }

    connectionsClosedTotal.inc({ transport: 'grpc' });
    loggers.grpc.debug('Connection closed', { target: this.target });
  }

  isClosed(): boolean {
    return this.closed;
  }
}

export interface BuiltGrpcClient<C> {
  stub: C;
  connection: GrpcConnection;
}

export class GrpcClientBuilder<C> extends ConnectionBuilder<BuiltGrpcClient<C>> {
  private readonly createStub: (client: grpc.Client) => C;
  private receiveSize = DEFAULT_MAX_RECEIVE_MESSAGE_SIZE;
  private sendSize = DEFAULT_MAX_SEND_MESSAGE_SIZE;
  private channelOptions: Record<string, ChannelOptionValue> = {};
  private interceptors: grpc.Interceptor[] = [];

  constructor(target: string, createStub: (client: grpc.Client) => C) {
    super(target);
    this.createStub = createStub;
  }

  maxReceiveMessageSize(bytes: number): this {
    this.receiveSize = bytes;
    return this;
  }

  maxSendMessageSize(bytes: number): this {
    this.sendSize = bytes;
    return this;
  }

  /**
   * 任意 channel option，例如 grpc.keepalive_time_ms
   */
  withOption(name: string, value: ChannelOptionValue): this {
    this.channelOptions[name] = value;
    return this;
  }

  withInterceptor(interceptor: grpc.Interceptor): this {
    this.interceptors.push(interceptor);
    return this;
  }

  private channelCredentials(): grpc.ChannelCredentials {
    if (this.transport.kind === 'insecure') {
      return grpc.credentials.createInsecure();
    }

    const ssl = grpc.credentials.createSsl(
      this.transport.rootCerts ?? null,
      this.transport.privateKey ?? null,
      this.transport.certChain ?? null
    );

    if (!this.callCredentials) {
      return ssl;
    }

    return grpc.credentials.combineChannelCredentials(ssl, toGrpcCallCredentials(this.callCredentials));
  }

  protected create(): BuiltGrpcClient<C> {
    const interceptors = [...this.interceptors];
    // 不加密連線無法組合 CallCredentials，改由 interceptor 附加 metadata
    if (this.isInsecure() && this.callCredentials) {
      interceptors.push(metadataInterceptor(this.callCredentials));
    }

    let client: grpc.Client;
    try {
      client = new grpc.Client(this.target, this.channelCredentials(), {
        ...this.channelOptions,
        'grpc.max_receive_message_length': this.receiveSize,
        'grpc.max_send_message_length': this.sendSize,
        interceptors,
      });
    } catch (error) {
      throw clientCreationError('failed to create gRPC client', error);
    }

    const security = this.isInsecure() ? 'insecure' : 'tls';
    connectionsBuiltTotal.inc({ transport: 'grpc', security });
    loggers.grpc.debug('Client built', {
      target: this.target,
      security,
      authenticated: this.callCredentials !== null,
    });

    return {
      stub: this.createStub(client),
      connection: new GrpcConnection(client, this.target),
    };
  }
}
