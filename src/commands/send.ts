import fs from 'fs/promises';
import chalk from 'chalk';
import { loadAgentConfig, ledgerPathFor } from '../core/config.js';
import { DeliveryAgent } from '../core/delivery-agent.js';
import { errorMessage } from '../core/errors.js';
import { DeliveryLedger } from '../core/ledger.js';
import { StabilityDetector } from '../core/stability.js';
import { UploadClient } from '../core/upload-client.js';
import type { CycleReport, UploadOutcome } from '../types/index.js';

const BYTES_PER_MB = 1024 ** 2;

export function describeOutcome(outcome: UploadOutcome): string {
  switch (outcome.kind) {
    case 'success': return outcome.message;
    case 'rejected': return `server error ${outcome.status} - ${outcome.body}`;
    case 'timeout': return 'upload timeout';
    case 'unreachable': return `connection error (${outcome.detail}) - is the receiver running?`;
    case 'transport-error': return outcome.detail;
  }
}

function printSummary(report: CycleReport): void {
  const parts = [
    `${report.sent.length} sent`,
    `${report.skipped.length} not ready`,
    `${report.failed.length} failed`,
  ];
  const mb = (report.bytesSent / BYTES_PER_MB).toFixed(2);
  console.log(chalk.bold(`\n[${report.stream}] Cycle complete: ${parts.join(', ')} (${mb} MB)`));
}

export const sendCommand = async (options: { config: string }) => {
  try {
    const config = await loadAgentConfig(options.config);
    const stream = config.stream;
    await fs.mkdir(config.watch_directory, { recursive: true });

    const ledger = await DeliveryLedger.load(ledgerPathFor(config));
    const agent = new DeliveryAgent({
      stream,
      watchDir: config.watch_directory,
      endpoint: config.receiver_url,
      extensions: config.backup_extensions,
      ledger,
      detector: new StabilityDetector({
        intervalMs: config.stability.interval_seconds * 1000,
        requiredMatches: config.stability.required_matches,
        timeoutMs: config.stability.timeout_seconds * 1000,
      }),
      uploader: new UploadClient({ timeoutMs: config.upload_timeout_seconds * 1000 }),
    });

    // Progress is printed in quarter steps of the artifact size
    let expected = 0;
    let nextMark = 0;
    agent.events
      .on('artifact:discovered', ({ filename }) => console.log(chalk.dim(`[${stream}] New backup detected: ${filename}`)))
      .on('artifact:forgotten', ({ filename }) => console.log(chalk.dim(`[${stream}] No longer on disk: ${filename}`)))
      .on('artifact:unstable', ({ filename, reason }) => {
        const why = reason === 'timeout' ? 'still being written' : 'disappeared';
        console.log(chalk.yellow(`[${stream}] ~ Skipping ${filename} (${why})`));
      })
      .on('artifact:uploading', ({ filename, size }) => {
        expected = size;
        nextMark = 0.25;
        console.log(chalk.blue(`[${stream}] Sending ${filename} (${(size / BYTES_PER_MB).toFixed(2)} MB)...`));
      })
      .on('artifact:progress', ({ bytesSent }) => {
        if (expected <= 0 || nextMark > 1) return;
        const fraction = bytesSent / expected;
        if (fraction < nextMark) return;
        console.log(chalk.dim(`[${stream}]   ${Math.min(100, Math.floor(fraction * 100))}%`));
        while (nextMark <= fraction) nextMark += 0.25;
      })
      .on('artifact:sent', ({ message }) => console.log(chalk.green(`[${stream}] ✓ Server response: ${message}`)))
      .on('artifact:failed', ({ filename, outcome }) => {
        console.log(chalk.red(`[${stream}] ✗ Failed to send ${filename}: ${describeOutcome(outcome)}`));
      });

    printSummary(await agent.runCycle());
  } catch (err) {
    console.error(chalk.red(`\n[x] Send failed: ${errorMessage(err)}`));
    process.exitCode = 1;
  }
};
