/**
 * Metrics Command
 * 以 Prometheus 文字格式輸出本程序的指標
 */

import { Command } from 'commander';
import { getMetricsText, registry } from '../lib/metrics.js';
import { exitWithError, resolveFormat } from '../utils/output.js';

export const metricsCommand = new Command('metrics')
  .description('Print SDK metrics in Prometheus text format')
  .option('--content-type', 'Print the Content-Type header line first')
  .action(async (options: { contentType?: boolean }, cmd: Command) => {
    try {
      if (options.contentType) {
        console.log(`Content-Type: ${registry.contentType}\n`);
      }
      console.log(await getMetricsText());
    } catch (error) {
      exitWithError(resolveFormat(cmd), error);
    }
  });
