import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from 'vitest';
import {
  fetchDefaultWorkspace,
  fetchRootWorkspace,
  listWorkspaces,
  ORG_ID_HEADER,
} from '../../src/services/workspace.js';
import type { AuthRequest } from '../../src/lib/call-credentials.js';
import type { HttpClient } from '../../src/lib/http-client.js';
import type { ListObjectsStub } from '../../src/services/inventory-grpc.js';
import type { StreamedListObjectsRequest } from '../../src/types/inventory.js';
import { findStatusCode, isConnectionError, statusError } from '../../src/lib/errors.js';
import { principalSubject } from '../../src/lib/rbac.js';

const RBAC = 'https://rbac.example.com';

const ROOT = {
  id: 'ws-root',
  name: 'Root Workspace',
  type: 'root',
  description: 'Root workspace for org 12345',
};

describe('Workspace', () => {
  let httpClient: Mock<HttpClient>;

  beforeEach(() => {
    httpClient = vi.fn<HttpClient>();
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('fetchRootWorkspace', () => {
    it('should request the root type with the org id header', async () => {
      httpClient.mockResolvedValueOnce({ data: [ROOT] });

      const workspace = await fetchRootWorkspace(`${RBAC}/`, '12345', { httpClient });

      expect(workspace).toEqual(ROOT);
      expect(httpClient).toHaveBeenCalledWith('https://rbac.example.com/api/rbac/v2/workspaces/', {
        method: 'GET',
        query: { type: 'root' },
        headers: { 'x-rh-rbac-org-id': '12345' },
        signal: undefined,
      });
      expect(ORG_ID_HEADER).toBe('x-rh-rbac-org-id');
    });

    it('should let the auth request add headers', async () => {
      httpClient.mockResolvedValueOnce({ data: [ROOT] });
      const auth: AuthRequest = {
        configureRequest: async (request) => ({
          ...request,
          headers: { ...request.headers, authorization: 'Bearer test-token' },
        }),
      };

      await fetchRootWorkspace(RBAC, '12345', { httpClient, auth });

      expect(httpClient.mock.calls[0][1]?.headers).toEqual({
        'x-rh-rbac-org-id': '12345',
        authorization: 'Bearer test-token',
      });
    });

    it('should default missing text fields to empty strings', async () => {
      httpClient.mockResolvedValueOnce({ data: [{ id: 'ws-root' }] });

      await expect(fetchRootWorkspace(RBAC, '12345', { httpClient })).resolves.toEqual({
        id: 'ws-root',
        name: '',
        type: '',
        description: '',
      });
    });
  });

  describe('fetchDefaultWorkspace', () => {
    it('should request the default type', async () => {
      httpClient.mockResolvedValueOnce({ data: [{ ...ROOT, id: 'ws-default', type: 'default' }] });

      const workspace = await fetchDefaultWorkspace(RBAC, '12345', { httpClient });

      expect(workspace.id).toBe('ws-default');
      expect(httpClient.mock.calls[0][1]?.query).toEqual({ type: 'default' });
    });

    it('should fail when no workspace is returned', async () => {
      httpClient.mockResolvedValueOnce({ data: [] });

      await expect(fetchDefaultWorkspace(RBAC, '12345', { httpClient })).rejects.toThrow(
        'unexpected number of default workspaces: 0'
      );
    });

    it('should fail when several workspaces are returned', async () => {
      httpClient.mockResolvedValueOnce({ data: [ROOT, ROOT] });

      await expect(fetchRootWorkspace(RBAC, '12345', { httpClient })).rejects.toThrow(
        'unexpected number of root workspaces: 2'
      );
    });

    it('should fail on an undecodable body', async () => {
      httpClient.mockResolvedValueOnce({ data: [{ name: 'no id' }] });

      await expect(fetchDefaultWorkspace(RBAC, '12345', { httpClient })).rejects.toThrow(
        'error decoding default workspace response'
      );
    });

    it('should wrap HTTP failures as connection errors', async () => {
      httpClient.mockRejectedValueOnce(statusError(403, 'GET https://rbac.example.com failed'));

      const error: unknown = await fetchDefaultWorkspace(RBAC, '12345', { httpClient }).catch(
        (e: unknown) => e
      );

      expect(isConnectionError(error)).toBe(true);
      expect(findStatusCode(error)).toBe(403);
      expect(error).toHaveProperty(
        'message',
        'error fetching default workspace: GET https://rbac.example.com failed: status code 403'
      );
    });
  });

  describe('listWorkspaces', () => {
    it('should list workspace objects for the subject', async () => {
      const requests: StreamedListObjectsRequest[] = [];
      const stub: ListObjectsStub = {
        streamedListObjects(request) {
          requests.push(request);
          return {
            async *[Symbol.asyncIterator]() {
              yield {
                object: { resourceType: 'workspace', resourceId: 'ws-1', reporter: { type: 'rbac' } },
                pagination: { continuationToken: '' },
              };
            },
            cancel: () => undefined,
          };
        },
      };

      const ids: string[] = [];
      for await (const result of listWorkspaces(stub, principalSubject('alice', 'redhat'), 'view', 'resume-token')) {
        if (result.response?.object) {
          ids.push(result.response.object.resourceId);
        }
      }

      expect(ids).toEqual(['ws-1']);
      expect(requests[0].objectType).toEqual({ resourceType: 'workspace', reporterType: 'rbac' });
      expect(requests[0].relation).toBe('view');
      expect(requests[0].pagination).toEqual({ limit: 1000, continuationToken: 'resume-token' });
    });
  });
});
