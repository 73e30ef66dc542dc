/**
 * RBAC workspace（/api/rbac/v2/workspaces/）
 */
export interface Workspace {
  id: string;
  name: string;
  type: string;
  description: string;
}

export type WorkspaceKind = 'root' | 'default';
