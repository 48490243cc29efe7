import chalk from 'chalk';
import { loadAgentConfig, ledgerPathFor } from '../core/config.js';
import { errorMessage } from '../core/errors.js';
import { DeliveryLedger } from '../core/ledger.js';

export const ledgerCommand = async (options: { config: string }) => {
  try {
    const config = await loadAgentConfig(options.config);
    const ledger = await DeliveryLedger.load(ledgerPathFor(config));
    const entries = ledger.entries();

    console.log(chalk.bold.blue(`\n[${config.stream}] Delivery ledger: ${ledger.filePath}`));
    if (entries.length === 0) {
      console.log(chalk.dim('  No artifacts tracked.'));
      return;
    }
    for (const entry of entries) {
      const mark = entry.sent ? chalk.green('  ✓') : chalk.yellow('  ~');
      console.log(`${mark} ${entry.filename}${entry.sent ? '' : chalk.dim(' (pending)')}`);
    }
    const pending = ledger.unsentNames().length;
    console.log(chalk.dim(`\n  ${entries.length - pending} sent, ${pending} pending`));
  } catch (err) {
    console.error(chalk.red(`\n[x] Ledger read failed: ${errorMessage(err)}`));
    process.exitCode = 1;
  }
};
