/**
 * Check Command
 * 檢查 subject 是否對物件具有 relation
 */

import { Command } from 'commander';
import { getInventoryClient } from '../lib/api-client.js';
import { parseResourceRef, subject } from '../lib/rbac.js';
import { exitWithError, printJson, renderKeyValueTable, resolveFormat } from '../utils/output.js';

interface CheckOptions {
  object: string;
  relation: string;
  subject: string;
  reporter: string;
  forUpdate?: boolean;
}

export const checkCommand = new Command('check')
  .description('Check whether a subject holds a relation on an object')
  .requiredOption('--object <type:id>', 'Object reference, e.g. workspace:1234')
  .requiredOption('--relation <relation>', 'Relation, e.g. inventory_host_view')
  .requiredOption('--subject <type:id>', 'Subject reference, e.g. principal:redhat/alice')
  .option('--reporter <reporterType>', 'Object reporter type', 'rbac')
  .option('--for-update', 'Use CheckForUpdate (strongly consistent)')
  .action(async (options: CheckOptions, cmd: Command) => {
    const format = resolveFormat(cmd);

    try {
      const request = {
        object: parseResourceRef(options.object, options.reporter),
        relation: options.relation,
        subject: subject(parseResourceRef(options.subject)),
      };

      const { client, connection } = await getInventoryClient();
      const call = options.forUpdate ? client.checkForUpdate(request) : client.check(request);
      const response = await call.finally(() => connection.close());

      const data = {
        allowed: response.allowed === 'ALLOWED_TRUE',
        result: response.allowed,
        consistencyToken: response.consistencyToken?.token ?? null,
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
