/**
 * Token Command
 * 取得 OAuth2 access token
 */

import { Command } from 'commander';
import { getTokenManager } from '../lib/api-client.js';
import { exitWithError, printJson, renderKeyValueTable, resolveFormat } from '../utils/output.js';

export const tokenCommand = new Command('token')
  .description('Fetch an OAuth2 access token with the configured client credentials')
  .option('--force', 'Ignore cached tokens and request a new one')
  .action(async (options: { force?: boolean }, cmd: Command) => {
    const format = resolveFormat(cmd);

    try {
      const tokenManager = await getTokenManager();
      const token = await tokenManager.getToken({ forceRefresh: Boolean(options.force) });

      const data = {
        clientId: tokenManager.getClientId(),
        tokenType: token.tokenType,
        expiresAt: new Date(token.expiresAt).toISOString(),
        accessToken: token.accessToken,
      };

      if (format === 'json') {
        printJson({ success: true, data });
      } else {
        console.log(renderKeyValueTable(data));
      }
    } catch (error) {
      exitWithError(format, error);
    }
  });
