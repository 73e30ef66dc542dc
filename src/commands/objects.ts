/**
 * Objects Command
 * 列出 subject 在 relation 下可存取的物件（自動翻頁）
 */

import { Command } from 'commander';
import type { StreamedListObjectsResponse } from '../types/inventory.js';
import { getInventoryClient } from '../lib/api-client.js';
import { parseResourceRef, subject } from '../lib/rbac.js';
import { DEFAULT_PAGE_LIMIT, listObjects } from '../lib/streaming-pager.js';
import { exitWithError, printJson, renderTable, resolveFormat } from '../utils/output.js';

interface ListOptions {
  type: string;
  reporter: string;
  relation: string;
  subject: string;
  subjectRelation?: string;
  token?: string;
  limit: string;
}

export const objectsCommand = new Command('objects').description('Query inventory objects');

objectsCommand
  .command('list')
  .description('Stream every object the subject holds the relation on')
  .requiredOption('--type <resourceType>', 'Object resource type, e.g. workspace')
  .option('--reporter <reporterType>', 'Object reporter type', 'rbac')
  .requiredOption('--relation <relation>', 'Relation, e.g. inventory_host_view')
  .requiredOption('--subject <type:id>', 'Subject reference, e.g. principal:redhat/alice')
  .option('--subject-relation <relation>', 'Relation on the subject (for subject sets)')
  .option('--token <continuationToken>', 'Resume from a continuation token')
  .option('--limit <n>', 'Page size', String(DEFAULT_PAGE_LIMIT))
  .action(async (options: ListOptions, cmd: Command) => {
    const format = resolveFormat(cmd);
    const limit = parseInt(options.limit, 10);

    try {
      if (isNaN(limit) || limit <= 0) {
        throw new Error(`Invalid page size: ${options.limit}`);
      }

      const subjectRef = subject(parseResourceRef(options.subject), options.subjectRelation);
      const { client, connection } = await getInventoryClient();

      const responses: StreamedListObjectsResponse[] = [];
      let failure: Error | undefined;
      try {
        for await (const result of listObjects(client, {
          objectType: { resourceType: options.type, reporterType: options.reporter },
          relation: options.relation,
          subject: subjectRef,
          continuationToken: options.token,
          limit,
        })) {
          if (result.error) {
            failure = result.error;
            break;
          }
          responses.push(result.response);
        }
      } finally {
        connection.close();
      }

      if (failure) {
        throw failure;
      }

      const objects = responses.flatMap((response) => (response.object ? [response.object] : []));

      if (format === 'json') {
        printJson({ success: true, data: { count: objects.length, objects } });
      } else {
        console.log(
          renderTable(
            ['Type', 'ID', 'Reporter'],
            objects.map((object) => [object.resourceType, object.resourceId, object.reporter?.type ?? ''])
          )
        );
        console.log(`${objects.length} object(s)`);
      }
    } catch (error) {
      exitWithError(format, error);
    }
  });
