/**
 * Inventory gRPC Client
 * KesselInventoryService 的型別化 stub
 */

import * as grpc from '@grpc/grpc-js';
import type {
  CheckBulkRequest,
  CheckBulkResponse,
  CheckForUpdateRequest,
  CheckForUpdateResponse,
  CheckRequest,
  CheckResponse,
  DeleteResourceRequest,
  DeleteResourceResponse,
  StreamedListObjectsRequest,
  StreamedListObjectsResponse,
} from '../types/inventory.js';
import {
  parseCheckBulkResponse,
  parseCheckResponse,
  parseDeleteResourceResponse,
  parseStreamedListObjectsResponse,
} from '../lib/inventory-messages.js';
import { getInventoryMethod, type InventoryMethodName } from '../lib/proto.js';
import { loggers } from '../lib/logger.js';
import { GrpcClientBuilder } from './grpc-client-builder.js';

export interface CallOptions {
  signal?: AbortSignal;
  /** 截止時間（毫秒） */
  timeout?: number;
  metadata?: Record<string, string>;
}

/**
 * 伺服器串流：可非同步迭代，cancel() 中止底層呼叫
 */
export type ResponseStream<T> = AsyncIterable<T> & { cancel(): void };

/**
 * StreamingPager 只需要這個方法
 */
export interface ListObjectsStub {
  streamedListObjects(
    request: StreamedListObjectsRequest,
    options?: CallOptions
  ): ResponseStream<StreamedListObjectsResponse>;
}

export class InventoryGrpcClient implements ListObjectsStub {
  constructor(private readonly client: grpc.Client) {}

  check(request: CheckRequest, options?: CallOptions): Promise<CheckResponse> {
    return this.unary('Check', request, parseCheckResponse, options);
  }

  checkForUpdate(request: CheckForUpdateRequest, options?: CallOptions): Promise<CheckForUpdateResponse> {
    return this.unary('CheckForUpdate', request, parseCheckResponse, options);
  }

  checkBulk(request: CheckBulkRequest, options?: CallOptions): Promise<CheckBulkResponse> {
    return this.unary('CheckBulk', request, parseCheckBulkResponse, options);
  }

  deleteResource(request: DeleteResourceRequest, options?: CallOptions): Promise<DeleteResourceResponse> {
    return this.unary('DeleteResource', request, parseDeleteResourceResponse, options);
  }

  streamedListObjects(
    request: StreamedListObjectsRequest,
    options: CallOptions = {}
  ): ResponseStream<StreamedListObjectsResponse> {
    const method = getInventoryMethod('StreamedListObjects');
    const call = this.client.makeServerStreamRequest(
      method.path,
      method.requestSerialize,
      method.responseDeserialize,
      request,
      buildMetadata(options),
      buildCallOptions(options)
    );

    const cancel = (): void => {
      // 取消後底層會再送出 CANCELLED 錯誤，此時已無讀取端
      call.on('error', (error: Error) => {
        loggers.grpc.debug('Stream ended after cancel', { error: error.message });
      });
      call.cancel();
    };

    if (options.signal?.aborted) {
      cancel();
    } else {
      options.signal?.addEventListener('abort', cancel, { once: true });
    }

    return {
      async *[Symbol.asyncIterator]() {
        try {
          for await (const message of call) {
            yield parseStreamedListObjectsResponse(message);
          }
        } finally {
          options.signal?.removeEventListener('abort', cancel);
        }
      },
      cancel,
    };
  }

  private unary<TResponse>(
    methodName: InventoryMethodName,
    request: object,
    parse: (value: unknown) => TResponse,
    options: CallOptions = {}
  ): Promise<TResponse> {
    const method = getInventoryMethod(methodName);

    return new Promise((resolve, reject) => {
      const call = this.client.makeUnaryRequest(
        method.path,
        method.requestSerialize,
        (bytes: Buffer) => parse(method.responseDeserialize(bytes)),
        request,
        buildMetadata(options),
        buildCallOptions(options),
        (error, response) => {
          options.signal?.removeEventListener('abort', onAbort);
          if (error) {
            reject(error);
          } else if (response === undefined) {
            reject(new Error(`${methodName} returned no response`));
          } else {
            resolve(response);
          }
        }
      );

      const onAbort = (): void => call.cancel();
      if (options.signal?.aborted) {
        onAbort();
      } else {
        options.signal?.addEventListener('abort', onAbort, { once: true });
      }
    });
  }
}

function buildMetadata(options: CallOptions): grpc.Metadata {
  const metadata = new grpc.Metadata();
  for (const [key, value] of Object.entries(options.metadata ?? {})) {
    metadata.set(key.toLowerCase(), value);
  }
  return metadata;
}

function buildCallOptions(options: CallOptions): grpc.CallOptions {
  return options.timeout === undefined ? {} : { deadline: Date.now() + options.timeout };
}

/**
 * Inventory gRPC builder 的捷徑
 */
export function inventoryGrpcClientBuilder(target: string): GrpcClientBuilder<InventoryGrpcClient> {
  return new GrpcClientBuilder(target, (client) => new InventoryGrpcClient(client));
}
