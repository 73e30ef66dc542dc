import { Command } from 'commander';
import { tokenCommand } from './commands/token.js';
import { discoverCommand } from './commands/discover.js';
import { workspacesCommand } from './commands/workspaces.js';
import { objectsCommand } from './commands/objects.js';
import { checkCommand } from './commands/check.js';
import { configCommand } from './commands/config.js';
import { metricsCommand } from './commands/metrics.js';
import { setGlobalLogLevel } from './lib/logger.js';

export const cli = new Command();

cli
  .name('kessel')
  .description('Inventory and RBAC client with OAuth2 client-credentials authentication')
  .version('0.1.0');

// 全域選項
cli
  .option('-f, --format <format>', 'Output format: json (default) | table', 'json')
  .option('-v, --verbose', 'Write debug logs to stderr');

cli.hook('preAction', (thisCommand) => {
  if (thisCommand.opts().verbose) {
    setGlobalLogLevel('debug');
  }
});

// 註冊指令
cli.addCommand(tokenCommand);
cli.addCommand(discoverCommand);
cli.addCommand(workspacesCommand);
cli.addCommand(objectsCommand);
cli.addCommand(checkCommand);
cli.addCommand(configCommand);
cli.addCommand(metricsCommand);
