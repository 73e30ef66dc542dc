/**
 * Inventory HTTP Client
 * KesselInventoryService 的 REST 介面（/api/inventory/v1beta2）
 */

import type {
  CheckBulkRequest,
  CheckBulkResponse,
  CheckForUpdateRequest,
  CheckForUpdateResponse,
  CheckRequest,
  CheckResponse,
  DeleteResourceRequest,
  DeleteResourceResponse,
} from '../types/inventory.js';
import {
  parseCheckBulkResponse,
  parseCheckResponse,
  parseDeleteResourceResponse,
} from '../lib/inventory-messages.js';
import { HttpClientBuilder, type HttpTransport } from './http-client-builder.js';

const API_PREFIX = '/api/inventory/v1beta2';

export interface HttpCallOptions {
  signal?: AbortSignal;
}

export class InventoryHttpClient {
  constructor(private readonly transport: HttpTransport) {}

  async check(request: CheckRequest, options: HttpCallOptions = {}): Promise<CheckResponse> {
    const body = await this.transport.request(`${API_PREFIX}/check`, {
      method: 'POST',
      body: { ...request },
      signal: options.signal,
    });
    return parseCheckResponse(body);
  }

  async checkForUpdate(
    request: CheckForUpdateRequest,
    options: HttpCallOptions = {}
  ): Promise<CheckForUpdateResponse> {
    const body = await this.transport.request(`${API_PREFIX}/checkforupdate`, {
      method: 'POST',
      body: { ...request },
      signal: options.signal,
    });
    return parseCheckResponse(body);
  }

  async checkBulk(request: CheckBulkRequest, options: HttpCallOptions = {}): Promise<CheckBulkResponse> {
    const body = await this.transport.request(`${API_PREFIX}/checkbulk`, {
      method: 'POST',
      body: { ...request },
      signal: options.signal,
    });
    return parseCheckBulkResponse(body);
  }

  async deleteResource(
    request: DeleteResourceRequest,
    options: HttpCallOptions = {}
  ): Promise<DeleteResourceResponse> {
    const body = await this.transport.request(`${API_PREFIX}/resources`, {
      method: 'DELETE',
      body: { ...request },
      signal: options.signal,
    });
    return parseDeleteResourceResponse(body);
  }
}

/**
 * Inventory HTTP builder 的捷徑
 */
export function inventoryHttpClientBuilder(endpoint: string): HttpClientBuilder<InventoryHttpClient> {
  return new HttpClientBuilder(endpoint, (transport) => new InventoryHttpClient(transport));
}
