/**
 * Inventory message decoding
 * 將 proto-loader 或 JSON 回應轉為型別化物件
 */

import type {
  Allowed,
  CheckBulkError,
  CheckBulkRequestItem,
  CheckBulkResponse,
  CheckBulkResponsePair,
  CheckResponse,
  ConsistencyToken,
  DeleteResourceResponse,
  ReporterReference,
  ResourceReference,
  ResponsePagination,
  StreamedListObjectsResponse,
  SubjectReference,
} from '../types/inventory.js';
import { isRecord } from './http-client.js';

const ALLOWED_VALUES: readonly Allowed[] = ['ALLOWED_UNSPECIFIED', 'ALLOWED_TRUE', 'ALLOWED_FALSE'];

function asString(value: unknown): string {
  return typeof value === 'string' ? value : '';
}

function parseReporter(value: unknown): ReporterReference | undefined {
  if (!isRecord(value)) {
    return undefined;
  }
  const reporter: ReporterReference = { type: asString(value.type) };
  if (typeof value.instanceId === 'string' && value.instanceId !== '') {
    reporter.instanceId = value.instanceId;
  }
  return reporter;
}

export function parseResourceReference(value: unknown): ResourceReference | undefined {
  if (!isRecord(value)) {
    return undefined;
  }
  const reference: ResourceReference = {
    resourceType: asString(value.resourceType),
    resourceId: asString(value.resourceId),
  };
  const reporter = parseReporter(value.reporter);
  if (reporter) {
    reference.reporter = reporter;
  }
  return reference;
}

function parseSubjectReference(value: unknown): SubjectReference | undefined {
  if (!isRecord(value)) {
    return undefined;
  }
  const resource = parseResourceReference(value.resource);
  if (!resource) {
    return undefined;
  }
  const subject: SubjectReference = { resource };
  if (typeof value.relation === 'string' && value.relation !== '') {
    subject.relation = value.relation;
  }
  return subject;
}

function parseConsistencyToken(value: unknown): ConsistencyToken | undefined {
  if (!isRecord(value) || typeof value.token !== 'string') {
    return undefined;
  }
  return { token: value.token };
}

function parsePagination(value: unknown): ResponsePagination | undefined {
  if (!isRecord(value)) {
    return undefined;
  }
  return { continuationToken: asString(value.continuationToken) };
}

/**
 * 數字列舉值（JSON 可能送出 0/1/2）也接受
 */
export function parseAllowed(value: unknown): Allowed {
  if (typeof value === 'number') {
    return ALLOWED_VALUES[value] ?? 'ALLOWED_UNSPECIFIED';
  }
  return ALLOWED_VALUES.find((allowed) => allowed === value) ?? 'ALLOWED_UNSPECIFIED';
}

export function parseCheckResponse(value: unknown): CheckResponse {
  const body = isRecord(value) ? value : {};
  const response: CheckResponse = { allowed: parseAllowed(body.allowed) };
  const consistencyToken = parseConsistencyToken(body.consistencyToken);
  if (consistencyToken) {
    response.consistencyToken = consistencyToken;
  }
  return response;
}

export function parseDeleteResourceResponse(_value: unknown): DeleteResourceResponse {
  return {};
}

export function parseStreamedListObjectsResponse(value: unknown): StreamedListObjectsResponse {
  const body = isRecord(value) ? value : {};
  const response: StreamedListObjectsResponse = {};

  const object = parseResourceReference(body.object);
  if (object) {
    response.object = object;
  }

  const pagination = parsePagination(body.pagination);
  if (pagination) {
    response.pagination = pagination;
  }

  const consistencyToken = parseConsistencyToken(body.consistencyToken);
  if (consistencyToken) {
    response.consistencyToken = consistencyToken;
  }

  return response;
}

function parseCheckBulkRequestItem(value: unknown): CheckBulkRequestItem | undefined {
  if (!isRecord(value)) {
    return undefined;
  }
  const object = parseResourceReference(value.object);
  const subject = parseSubjectReference(value.subject);
  if (!object || !subject) {
    return undefined;
  }
  return { object, relation: asString(value.relation), subject };
}

function parseCheckBulkError(value: unknown): CheckBulkError | undefined {
  if (!isRecord(value)) {
    return undefined;
  }
  return {
    code: typeof value.code === 'number' ? value.code : 0,
    message: asString(value.message),
  };
}

function parseCheckBulkPair(value: unknown): CheckBulkResponsePair {
  const body = isRecord(value) ? value : {};
  const pair: CheckBulkResponsePair = {};

  const request = parseCheckBulkRequestItem(body.request);
  if (request) {
    pair.request = request;
  }

  // 錯誤優先：兩者皆有時視為失敗
  const error = parseCheckBulkError(body.error);
  if (error) {
    pair.error = error;
  } else if (isRecord(body.item)) {
    pair.item = { allowed: parseAllowed(body.item.allowed) };
  }

  return pair;
}

export function parseCheckBulkResponse(value: unknown): CheckBulkResponse {
  const body = isRecord(value) ? value : {};
  const response: CheckBulkResponse = {
    pairs: Array.isArray(body.pairs) ? body.pairs.map(parseCheckBulkPair) : [],
  };
  const consistencyToken = parseConsistencyToken(body.consistencyToken);
  if (consistencyToken) {
    response.consistencyToken = consistencyToken;
  }
  return response;
}
