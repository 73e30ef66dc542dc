/**
 * Inventory API message types
 * 對應 proto/kessel/inventory/v1beta2/inventory_service.proto（camelCase 欄位）
 */

export interface ReporterReference {
  type: string;
  instanceId?: string;
}

export interface ResourceReference {
  resourceType: string;
  resourceId: string;
  reporter?: ReporterReference;
}

export interface SubjectReference {
  relation?: string;
  resource: ResourceReference;
}

export interface RepresentationType {
  resourceType: string;
  reporterType?: string;
}

export interface ConsistencyToken {
  token: string;
}

/**
 * minimizeLatency 與 atLeastAsFresh 擇一
 */
export type Consistency =
  | { minimizeLatency: true; atLeastAsFresh?: undefined }
  | { atLeastAsFresh: ConsistencyToken; minimizeLatency?: undefined };

export interface RequestPagination {
  limit: number;
  continuationToken?: string;
}

export interface ResponsePagination {
  continuationToken: string;
}

export type Allowed = 'ALLOWED_UNSPECIFIED' | 'ALLOWED_TRUE' | 'ALLOWED_FALSE';

export interface CheckRequest {
  object: ResourceReference;
  relation: string;
  subject: SubjectReference;
  consistency?: Consistency;
}

export interface CheckResponse {
  allowed: Allowed;
  consistencyToken?: ConsistencyToken;
}

export interface CheckForUpdateRequest {
  object: ResourceReference;
  relation: string;
  subject: SubjectReference;
}

export type CheckForUpdateResponse = CheckResponse;

export interface CheckBulkRequestItem {
  object: ResourceReference;
  relation: string;
  subject: SubjectReference;
}

export interface CheckBulkRequest {
  items: CheckBulkRequestItem[];
  consistency?: Consistency;
}

export interface CheckBulkResponseItem {
  allowed: Allowed;
}

/**
 * 單一項目的錯誤（google.rpc.Status 的 code 與 message）
 */
export interface CheckBulkError {
  code: number;
  message: string;
}

/**
 * 依請求順序回傳；item 與 error 擇一
 */
export interface CheckBulkResponsePair {
  request?: CheckBulkRequestItem;
  item?: CheckBulkResponseItem;
  error?: CheckBulkError;
}

export interface CheckBulkResponse {
  pairs: CheckBulkResponsePair[];
  consistencyToken?: ConsistencyToken;
}

export interface DeleteResourceRequest {
  reference: ResourceReference;
}

export type DeleteResourceResponse = Record<string, never>;

export interface StreamedListObjectsRequest {
  objectType: RepresentationType;
  relation: string;
  subject: SubjectReference;
  pagination?: RequestPagination;
  consistency?: Consistency;
}

export interface StreamedListObjectsResponse {
  object?: ResourceReference;
  pagination?: ResponsePagination;
  consistencyToken?: ConsistencyToken;
}
