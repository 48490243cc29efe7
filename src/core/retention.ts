import fs from 'fs/promises';
import path from 'path';
import { DiskError, errorCode } from './errors.js';
import type { ResidentArtifact, RetentionPolicy, RetentionResult } from '../types/index.js';

export type { ResidentArtifact, RetentionResult } from '../types/index.js';

/**
 * Regular, non-hidden files of an archive directory, oldest first.
 * Equal modification times fall back to name order.
 */
export async function listResident(archiveDir: string): Promise<ResidentArtifact[]> {
  let names: string[];
  try {
    const entries = await fs.readdir(archiveDir, { withFileTypes: true });
    names = entries.filter(e => e.isFile() && !e.name.startsWith('.')).map(e => e.name);
  } catch (err) {
    throw new DiskError(`Failed to list archive ${archiveDir}`, err);
  }

  const resident: ResidentArtifact[] = [];
  for (const filename of names) {
    const filePath = path.join(archiveDir, filename);
    try {
      const stat = await fs.stat(filePath);
      resident.push({ filename, path: filePath, size: stat.size, mtimeMs: stat.mtimeMs });
    } catch (err) {
      if (errorCode(err) === 'ENOENT') continue; // removed since readdir
      throw new DiskError(`Failed to stat ${filePath}`, err);
    }
  }

  return resident.sort((a, b) =>
    a.mtimeMs - b.mtimeMs || (a.filename < b.filename ? -1 : a.filename > b.filename ? 1 : 0));
}

/**
 * Evict the oldest artifacts until the directory fits `budgetBytes`.
 *
 * A budget of zero or less disables retention. Under `oldest-first` nothing is
 * protected, so an artifact larger than the whole budget is evicted even when
 * it was just written. `keep-newest` never evicts the most recent artifact.
 */
export async function enforceRetention(
  archiveDir: string,
  budgetBytes: number,
  policy: RetentionPolicy = 'oldest-first',
): Promise<RetentionResult> {
  const resident = await listResident(archiveDir);
  let total = resident.reduce((sum, a) => sum + a.size, 0);

  if (budgetBytes <= 0) {
    return { evicted: [], remainingCount: resident.length, remainingBytes: total };
  }

  const floor = policy === 'keep-newest' ? 1 : 0;
  const evicted: ResidentArtifact[] = [];

  while (total > budgetBytes && resident.length > floor) {
    const oldest = resident.shift();
    if (!oldest) break;
    try {
      await fs.unlink(oldest.path);
    } catch (err) {
      if (errorCode(err) !== 'ENOENT') throw new DiskError(`Failed to evict ${oldest.path}`, err);
    }
    total -= oldest.size;
    evicted.push(oldest);
  }

  return { evicted, remainingCount: resident.length, remainingBytes: total };
}
