/**
 * Streaming Pager
 * 將分頁的 StreamedListObjects 串流接成單一的非同步序列
 *
 * 每頁結束時取最後一筆回應的 continuation token：
 * 非空則以它發出下一次 RPC，空字串則結束。
 */

import type {
  Consistency,
  RepresentationType,
  StreamedListObjectsRequest,
  StreamedListObjectsResponse,
  SubjectReference,
} from '../types/inventory.js';
import type { ListObjectsStub, ResponseStream } from '../services/inventory-grpc.js';
import { connectionError } from './errors.js';
import { loggers } from './logger.js';
import { listObjectsCallsTotal, listObjectsErrorsTotal, listObjectsResponsesTotal } from './metrics.js';

export const DEFAULT_PAGE_LIMIT = 1000;

export interface ListObjectsOptions {
  objectType: RepresentationType;
  relation: string;
  subject: SubjectReference;
  /** 從這個 token 開始（空字串或省略代表第一頁） */
  continuationToken?: string;
  /** 每頁筆數 (default: 1000) */
  limit?: number;
  consistency?: Consistency;
  signal?: AbortSignal;
}

export type ListObjectsResult =
  | { response: StreamedListObjectsResponse; error?: undefined }
  | { error: Error; response?: undefined };

export function buildListObjectsRequest(
  options: ListObjectsOptions,
  continuationToken: string
): StreamedListObjectsRequest {
  const request: StreamedListObjectsRequest = {
    objectType: options.objectType,
    relation: options.relation,
    subject: options.subject,
    pagination: { limit: options.limit ?? DEFAULT_PAGE_LIMIT },
  };

  if (continuationToken !== '' && request.pagination) {
    request.pagination.continuationToken = continuationToken;
  }
  if (options.consistency) {
    request.consistency = options.consistency;
  }

  return request;
}

/**
 * 逐筆產出回應；錯誤以一筆 { error } 產出後結束
 * 中途 break 會取消進行中的串流
 */
export async function* listObjects(
  stub: ListObjectsStub,
  options: ListObjectsOptions
): AsyncGenerator<ListObjectsResult, void, undefined> {
  const { signal } = options;
  let continuationToken = options.continuationToken ?? '';
  let page = 0;

  while (true) {
    if (signal?.aborted) {
      yield aborted();
      return;
    }

    page++;
    const request = buildListObjectsRequest(options, continuationToken);

    let stream: ResponseStream<StreamedListObjectsResponse>;
    try {
      stream = stub.streamedListObjects(request, { signal });
    } catch (error) {
      listObjectsErrorsTotal.inc({ stage: 'start' });
      loggers.pager.warn('Failed to start stream', { page });
      yield { error: connectionError('failed to start stream', error) };
      return;
    }
    listObjectsCallsTotal.inc();
    loggers.pager.debug('Page started', { page, hasToken: continuationToken !== '' });

    const activeStream = stream;
    const onAbort = (): void => activeStream.cancel();
    signal?.addEventListener('abort', onAbort, { once: true });

    let lastToken = '';
    let ended = false;
    let failed = false;
    let failure: unknown;

    try {
      for await (const response of activeStream) {
        if (signal?.aborted) {
          break;
        }
        // 沒有分頁資訊的回應不覆寫先前的 token
        if (response.pagination) {
          lastToken = response.pagination.continuationToken;
        }
        listObjectsResponsesTotal.inc();
        yield { response };
      }
      ended = true;
    } catch (error) {
      ended = true;
      failed = true;
      failure = error;
    } finally {
      signal?.removeEventListener('abort', onAbort);
      // 呼叫端提前離開迴圈
      if (!ended) {
        activeStream.cancel();
      }
    }

    if (signal?.aborted) {
      yield aborted();
      return;
    }

    if (failed) {
      listObjectsErrorsTotal.inc({ stage: 'receive' });
      loggers.pager.warn('Stream failed', { page });
      yield { error: connectionError('error receiving from stream', failure) };
      return;
    }

    if (lastToken === '') {
      loggers.pager.debug('Listing complete', { pages: page });
      return;
    }

    continuationToken = lastToken;
  }
}

function aborted(): ListObjectsResult {
  listObjectsErrorsTotal.inc({ stage: 'aborted' });
  return { error: connectionError('list objects aborted') };
}
