import path from 'path';
import { RelayEvents } from './events.js';
import { listDirectory, reconcile } from './reconciler.js';
import type { DeliveryLedger } from './ledger.js';
import type { StabilityDetector } from './stability.js';
import type { Uploader } from './upload-client.js';
import type { CycleReport } from '../types/index.js';

export type { CycleReport } from '../types/index.js';

export interface DeliveryAgentOptions {
  stream: string;
  watchDir: string;
  endpoint: string;
  extensions: readonly string[];
  ledger: DeliveryLedger;
  detector: Pick<StabilityDetector, 'check'>;
  uploader: Uploader;
  events?: RelayEvents;
}

/**
 * Runs delivery cycles for one stream. A cycle reconciles the ledger with the
 * watched directory, then handles every unsent artifact in name order, one at
 * a time. Only the store's acknowledgement marks an artifact sent.
 */
export class DeliveryAgent {
  readonly events: RelayEvents;

  constructor(private options: DeliveryAgentOptions) {
    this.events = options.events ?? new RelayEvents();
  }

  async runCycle(): Promise<CycleReport> {
    const { stream, watchDir, endpoint, extensions, ledger, detector, uploader } = this.options;

    const listing = await listDirectory(watchDir);
    const { added, removed } = await reconcile(listing, ledger, extensions);
    for (const filename of added) this.events.emit('artifact:discovered', { stream, filename });
    for (const filename of removed) this.events.emit('artifact:forgotten', { stream, filename });

    const report: CycleReport = {
      stream,
      discovered: added,
      removed,
      sent: [],
      skipped: [],
      failed: [],
      bytesSent: 0,
    };

    for (const filename of ledger.unsentNames()) {
      const artifactPath = path.join(watchDir, filename);

      const stability = await detector.check(artifactPath);
      if (!stability.stable) {
        report.skipped.push({ filename, reason: stability.reason });
        this.events.emit('artifact:unstable', { stream, filename, reason: stability.reason });
        continue;
      }

      this.events.emit('artifact:uploading', { stream, filename, size: stability.size });
      const outcome = await uploader.upload(artifactPath, stream, endpoint, {
        onProgress: bytesSent => this.events.emit('artifact:progress', { stream, filename, bytesSent }),
      });

      if (outcome.kind !== 'success') {
        report.failed.push({ filename, outcome });
        this.events.emit('artifact:failed', { stream, filename, outcome });
        continue;
      }

      await ledger.markSent(filename);
      report.sent.push({ filename, size: stability.size, message: outcome.message });
      report.bytesSent += stability.size;
      this.events.emit('artifact:sent', { stream, filename, size: stability.size, message: outcome.message });
    }

    return report;
  }
}
