/**
 * Discover Command
 * 由 issuer 解析 OpenID Connect token endpoint
 */

import { Command } from 'commander';
import { fetchDiscovery } from '../services/discovery.js';
import { exitWithError, printJson, renderKeyValueTable, resolveFormat } from '../utils/output.js';

export const discoverCommand = new Command('discover')
  .description('Resolve the token endpoint of an OpenID Connect issuer')
  .argument('<issuer>', 'Issuer URL, e.g. https://sso.example.com/auth/realms/example')
  .option('--underscore', 'Use /.well-known/openid_configuration instead of openid-configuration')
  .action(async (issuer: string, options: { underscore?: boolean }, cmd: Command) => {
    const format = resolveFormat(cmd);

    try {
      const document = await fetchDiscovery(issuer, {
        pathStyle: options.underscore ? 'underscore' : 'hyphen',
      });

      if (format === 'json') {
        printJson({ success: true, data: document });
      } else {
        console.log(renderKeyValueTable({ ...document }));
      }
    } catch (error) {
      exitWithError(format, error);
    }
  });
