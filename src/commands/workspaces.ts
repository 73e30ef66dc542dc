/**
 * Workspaces Command
 * 查詢組織的 root / default workspace
 */

import { Command } from 'commander';
import type { WorkspaceKind } from '../types/rbac.js';
import { getConfigService } from '../services/config.js';
import { fetchDefaultWorkspace, fetchRootWorkspace } from '../services/workspace.js';
import { getAuthRequest, MissingConfigError } from '../lib/api-client.js';
import { exitWithError, printJson, renderKeyValueTable, resolveFormat } from '../utils/output.js';

export const workspacesCommand = new Command('workspaces').description(
  'Look up RBAC workspaces (requires KESSEL_RBAC_ENDPOINT and KESSEL_ORG_ID)'
);

async function showWorkspace(kind: WorkspaceKind, cmd: Command): Promise<void> {
  const format = resolveFormat(cmd);

  try {
    const config = getConfigService();
    const { rbacEndpoint, orgId } = config.resolve();
    if (!rbacEndpoint || !orgId) {
      throw new MissingConfigError('RBAC endpoint and org id are required: set KESSEL_RBAC_ENDPOINT and KESSEL_ORG_ID');
    }

    const auth = await getAuthRequest(config);
    const fetchWorkspace = kind === 'root' ? fetchRootWorkspace : fetchDefaultWorkspace;
    const workspace = await fetchWorkspace(rbacEndpoint, orgId, { auth });

    if (format === 'json') {
      printJson({ success: true, data: workspace });
    } else {
      console.log(renderKeyValueTable({ ...workspace }));
    }
  } catch (error) {
    exitWithError(format, error);
  }
}

workspacesCommand
  .command('root')
  .description('Show the root workspace of the organization')
  .action(async (_options: object, cmd: Command) => {
    await showWorkspace('root', cmd);
  });

workspacesCommand
  .command('default')
  .description('Show the default workspace of the organization')
  .action(async (_options: object, cmd: Command) => {
    await showWorkspace('default', cmd);
  });
