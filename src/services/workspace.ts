/**
 * Workspace Service
 * RBAC v2 workspace 查詢與 workspace 清單分頁
 */

import type { Workspace, WorkspaceKind } from '../types/rbac.js';
import type { SubjectReference } from '../types/inventory.js';
import type { AuthRequest } from '../lib/call-credentials.js';
import { connectionError } from '../lib/errors.js';
import {
  getDefaultHttpClient,
  isRecord,
  type HttpClient,
  type HttpRequestOptions,
} from '../lib/http-client.js';
import { loggers } from '../lib/logger.js';
import { workspaceType } from '../lib/rbac.js';
import { listObjects, type ListObjectsResult } from '../lib/streaming-pager.js';
import type { ListObjectsStub } from './inventory-grpc.js';

export const WORKSPACE_ENDPOINT = '/api/rbac/v2/workspaces/';
export const ORG_ID_HEADER = 'x-rh-rbac-org-id';

export interface FetchWorkspaceOptions {
  httpClient?: HttpClient;
  auth?: AuthRequest;
  signal?: AbortSignal;
}

async function fetchWorkspace(
  rbacBaseEndpoint: string,
  orgId: string,
  kind: WorkspaceKind,
  options: FetchWorkspaceOptions
): Promise<Workspace> {
  const httpClient = options.httpClient ?? getDefaultHttpClient();
  const url = rbacBaseEndpoint.replace(/\/+$/, '') + WORKSPACE_ENDPOINT;

  let request: HttpRequestOptions = {
    method: 'GET',
    query: { type: kind },
    headers: { [ORG_ID_HEADER]: orgId },
    signal: options.signal,
  };
  if (options.auth) {
    request = await options.auth.configureRequest(request);
  }

  let body: unknown;
  try {
    body = await httpClient(url, request);
  } catch (error) {
    loggers.rbac.warn('Workspace request failed', { url, kind });
    throw connectionError(`error fetching ${kind} workspace`, error);
  }

  const workspaces = parseWorkspaceList(body);
  if (!workspaces) {
    throw new Error(`error decoding ${kind} workspace response`);
  }

  if (workspaces.length !== 1) {
    throw new Error(`unexpected number of ${kind} workspaces: ${workspaces.length}`);
  }

  loggers.rbac.debug('Workspace resolved', { kind, id: workspaces[0].id });
  return workspaces[0];
}

export function fetchRootWorkspace(
  rbacBaseEndpoint: string,
  orgId: string,
  options: FetchWorkspaceOptions = {}
): Promise<Workspace> {
  return fetchWorkspace(rbacBaseEndpoint, orgId, 'root', options);
}

export function fetchDefaultWorkspace(
  rbacBaseEndpoint: string,
  orgId: string,
  options: FetchWorkspaceOptions = {}
): Promise<Workspace> {
  return fetchWorkspace(rbacBaseEndpoint, orgId, 'default', options);
}

/**
 * subject 在 relation 下可見的所有 workspace
 */
export function listWorkspaces(
  stub: ListObjectsStub,
  subjectRef: SubjectReference,
  relation: string,
  continuationToken = '',
  signal?: AbortSignal
): AsyncGenerator<ListObjectsResult, void, undefined> {
  return listObjects(stub, {
    objectType: workspaceType(),
    relation,
    subject: subjectRef,
    continuationToken,
    signal,
  });
}

function parseWorkspaceList(body: unknown): Workspace[] | null {
  if (!isRecord(body) || !Array.isArray(body.data)) {
    return null;
  }

  const workspaces: Workspace[] = [];
  for (const item of body.data) {
    if (!isRecord(item) || typeof item.id !== 'string') {
      return null;
    }
    workspaces.push({
      id: item.id,
      name: typeof item.name === 'string' ? item.name : '',
      type: typeof item.type === 'string' ? item.type : '',
      description: typeof item.description === 'string' ? item.description : '',
    });
  }
  return workspaces;
}
