import fsp from 'fs/promises';
import path from 'path';
import type { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import { tempPathFor, withLock } from './atomic-fs.js';
import { DiskError, InvalidFilenameError, UnknownStreamError } from './errors.js';
import { RelayEvents } from './events.js';
import { enforceRetention, listResident } from './retention.js';
import type {
  IngestResult,
  StoreConfig,
  StreamDefinition,
  StreamStats,
} from '../types/index.js';

export type { IngestResult, StreamDefinition, StreamStats } from '../types/index.js';

export const BYTES_PER_GB = 1024 ** 3;
const RECENT_LIMIT = 10;

export function streamsFromConfig(config: StoreConfig): StreamDefinition[] {
  return Object.entries(config.streams).map(([name, stream]) => ({
    name,
    archivePath: stream.archive_path,
    budgetBytes: Math.floor(stream.max_size_gb * BYTES_PER_GB),
    retention: stream.retention,
  }));
}

export function isValidFilename(filename: string): boolean {
  return filename.length > 0
    && !filename.startsWith('.')
    && !/[\\/\0]/.test(filename);
}

/**
 * Per-stream archive directories. Constructed once at startup and handed to
 * whatever serves requests.
 */
export class ArchiveStore {
  readonly events: RelayEvents;
  private streams: Map<string, StreamDefinition>;

  constructor(streams: StreamDefinition[], events: RelayEvents = new RelayEvents()) {
    this.streams = new Map(streams.map(s => [s.name, s]));
    this.events = events;
  }

  async init(): Promise<void> {
    for (const stream of this.streams.values()) {
      try {
        await fsp.mkdir(stream.archivePath, { recursive: true });
      } catch (err) {
        throw new DiskError(`Failed to create archive ${stream.archivePath}`, err);
      }
    }
  }

  getStream(name: string): StreamDefinition {
    const stream = this.streams.get(name);
    if (!stream) throw new UnknownStreamError(name);
    return stream;
  }

  /**
   * Store `source` as `<archive>/<filename>`, replacing any artifact of that
   * name, then enforce the stream's budget. Write and enforcement hold the
   * stream's lock, so concurrent ingests into one stream never see stale
   * totals. The bytes land in a hidden partial file first and only become a
   * resident artifact once fully received.
   */
  async ingest(streamName: string, filename: string, source: Readable): Promise<IngestResult> {
    const stream = this.getStream(streamName);
    if (!isValidFilename(filename)) throw new InvalidFilenameError(filename);

    const target = path.join(stream.archivePath, filename);

    return withLock(stream.archivePath, async () => {
      const partial = tempPathFor(target, 'partial');
      let size: number;
      try {
        await fsp.mkdir(stream.archivePath, { recursive: true });
        const handle = await fsp.open(partial, 'w');
        await pipeline(source, handle.createWriteStream());
        await fsp.rename(partial, target);
        size = (await fsp.stat(target)).size;
      } catch (err) {
        await fsp.rm(partial, { force: true });
        throw new DiskError(`Failed to store ${streamName}/${filename}`, err);
      }
      this.events.emit('artifact:ingested', { stream: streamName, filename, size });

      const retention = await enforceRetention(stream.archivePath, stream.budgetBytes, stream.retention);
      for (const evicted of retention.evicted) {
        this.events.emit('artifact:evicted', { stream: streamName, filename: evicted.filename, size: evicted.size });
      }

      return {
        stream: streamName,
        filename,
        path: target,
        size,
        evicted: retention.evicted.map(a => a.filename),
      };
    });
  }

  /**
   * Scan one stream (or all) for resident count, total bytes and the newest
   * artifacts. Always derived from the directory itself.
   */
  async streamStats(streamName?: string): Promise<Record<string, StreamStats>> {
    const targets = streamName ? [this.getStream(streamName)] : [...this.streams.values()];
    const stats: Record<string, StreamStats> = {};

    for (const stream of targets) {
      const resident = await listResident(stream.archivePath);
      stats[stream.name] = {
        residentCount: resident.length,
        totalBytes: resident.reduce((sum, a) => sum + a.size, 0),
        budgetBytes: stream.budgetBytes,
        recent: resident
          .slice()
          .reverse()
          .slice(0, RECENT_LIMIT)
          .map(a => ({ filename: a.filename, size: a.size, modified: new Date(a.mtimeMs) })),
      };
    }

    return stats;
  }
}
