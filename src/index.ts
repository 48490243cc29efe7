#!/usr/bin/env node

import { Command } from 'commander';
import { sendCommand } from './commands/send.js';
import { serveCommand } from './commands/serve.js';
import { statsCommand } from './commands/stats.js';
import { ledgerCommand } from './commands/ledger.js';

const program = new Command();

program
  .name('backup-relay')
  .description('Deliver backup archives to a central store with per-stream retention')
  .version('1.0.0');

// ─── Producer Side ───
program
  .command('send')
  .description('Run one delivery cycle: reconcile, wait for stable files, upload unsent backups')
  .requiredOption('-c, --config <path>', 'Path to agent config file')
  .action(sendCommand);

program
  .command('ledger')
  .description('Show which backups have been delivered')
  .requiredOption('-c, --config <path>', 'Path to agent config file')
  .action(ledgerCommand);

// ─── Store Side ───
program
  .command('serve')
  .description('Start the backup receiver')
  .requiredOption('-c, --config <path>', 'Path to store config file')
  .option('--host <host>', 'Host to bind to (overrides config)')
  .option('-p, --port <port>', 'Port to bind to (overrides config)')
  .action(serveCommand);

program
  .command('stats')
  .description('Show archive statistics from a running receiver')
  .requiredOption('-u, --url <url>', 'Receiver base URL (e.g., http://localhost:8080)')
  .option('-s, --stream <name>', 'Limit to one stream')
  .action(statsCommand);

program.parse(process.argv);

if (!process.argv.slice(2).length) {
  program.outputHelp();
}
