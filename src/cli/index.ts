#!/usr/bin/env node
import { Command } from 'commander';
import { loadEnvFile } from '../config.js';
import { createServer } from '../web/server.js';
import { registerBulkCommand } from './bulk.js';
import { registerConfigCommands } from './config_cmd.js';
import { action, openContext } from './context.js';
import { registerListCommands } from './list.js';
import { registerMaintenanceCommands } from './maintenance.js';
import { registerSendCommands } from './send.js';
import { registerWorkerCommand } from './worker_cmd.js';

loadEnvFile();

const program = new Command();

program
  .name('mailctl')
  .description('Schedule and send emails with rate limiting, retries and bulk campaigns')
  .version('0.3.0');

registerSendCommands(program);
registerBulkCommand(program);
registerListCommands(program);
registerWorkerCommand(program);
registerConfigCommands(program);
registerMaintenanceCommands(program);

program
  .command('dashboard')
  .description('Serve the job dashboard')
  .option('--port <n>', 'port to listen on', '3000')
  .action(
    action((opts: { port: string }) => {
      const { queue } = openContext();
      const port = Number(opts.port);
      createServer(queue).listen(port, () => {
        console.log(`🚀 Mail dashboard running at http://localhost:${port}`);
      });
    })
  );

await program.parseAsync(process.argv);
