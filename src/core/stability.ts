import fs from 'fs/promises';
import { setTimeout as sleep } from 'timers/promises';
import { errorCode } from './errors.js';
import type { StabilityResult } from '../types/index.js';

export type { StabilityResult } from '../types/index.js';

export interface StabilityOptions {
  intervalMs?: number;
  requiredMatches?: number;
  timeoutMs?: number;
  /** Injectable for tests. */
  sleep?: (ms: number) => Promise<unknown>;
  now?: () => number;
}

const DEFAULT_INTERVAL_MS = 2_000;
const DEFAULT_REQUIRED_MATCHES = 3;
const DEFAULT_TIMEOUT_MS = 60_000;

/**
 * Decides whether a producer has finished writing a file by polling its size.
 * A file is stable once `requiredMatches` consecutive samples repeat the
 * previous size; the first sample only sets the baseline.
 */
export class StabilityDetector {
  private intervalMs: number;
  private requiredMatches: number;
  private timeoutMs: number;
  private sleep: (ms: number) => Promise<unknown>;
  private now: () => number;

  constructor(options: StabilityOptions = {}) {
    this.intervalMs = options.intervalMs ?? DEFAULT_INTERVAL_MS;
    this.requiredMatches = options.requiredMatches ?? DEFAULT_REQUIRED_MATCHES;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.sleep = options.sleep ?? sleep;
    this.now = options.now ?? Date.now;
  }

  async check(filePath: string): Promise<StabilityResult> {
    const startedAt = this.now();
    let previousSize = -1;
    let matches = 0;

    for (;;) {
      let size: number | undefined;
      try {
        size = (await fs.stat(filePath)).size;
      } catch (err) {
        if (errorCode(err) === 'ENOENT') return { stable: false, reason: 'missing' };
        // Transient stat failure counts as a broken streak
        matches = 0;
        previousSize = -1;
      }

      if (size !== undefined) {
        if (size === previousSize) {
          matches++;
          if (matches >= this.requiredMatches) return { stable: true, size };
        } else {
          matches = 0;
        }
        previousSize = size;
      }

      await this.sleep(this.intervalMs);

      if (this.now() - startedAt > this.timeoutMs) {
        return { stable: false, reason: 'timeout' };
      }
    }
  }
}
