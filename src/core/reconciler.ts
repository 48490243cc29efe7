import fs from 'fs/promises';
import { DiskError } from './errors.js';
import type { DeliveryLedger } from './ledger.js';
import type { ReconcileResult } from '../types/index.js';

export type { ReconcileResult } from '../types/index.js';

/**
 * Hidden files (the ledger itself, temp files) are never artifacts.
 */
export function isArtifactName(filename: string, extensions: readonly string[]): boolean {
  return !filename.startsWith('.') && extensions.some(ext => filename.endsWith(ext));
}

/**
 * Names of the regular files directly inside `dir`.
 */
export async function listDirectory(dir: string): Promise<string[]> {
  try {
    const entries = await fs.readdir(dir, { withFileTypes: true });
    return entries.filter(e => e.isFile()).map(e => e.name).sort();
  } catch (err) {
    throw new DiskError(`Failed to list ${dir}`, err);
  }
}

/**
 * Bring the ledger in line with the directory: forget artifacts that were
 * deleted externally and start tracking new ones as unsent. Entries that are
 * still present keep their sent flag.
 */
export async function reconcile(
  listing: readonly string[],
  ledger: DeliveryLedger,
  extensions: readonly string[],
): Promise<ReconcileResult> {
  const current = new Set(listing.filter(name => isArtifactName(name, extensions)));
  const tracked = new Set(ledger.names());

  const removed = [...tracked].filter(name => !current.has(name)).sort();
  const added = [...current].filter(name => !tracked.has(name)).sort();

  for (const name of removed) await ledger.remove(name);
  for (const name of added) await ledger.record(name);

  return { added, removed };
}
