import express, { type NextFunction, type Request, type Response } from 'express';
import { createServer, type Server } from 'http';
import type { AddressInfo } from 'net';
import cors from 'cors';
import multer from 'multer';
import fs from 'fs';
import fsp from 'fs/promises';
import chalk from 'chalk';
import { z } from 'zod';
import { ArchiveStore, BYTES_PER_GB, isValidFilename } from './archive-store.js';
import { InvalidFilenameError, UnknownStreamError, errorMessage } from './errors.js';
import type { StreamStats } from '../types/index.js';

const BYTES_PER_MB = 1024 ** 2;

const IngestFieldsSchema = z.object({
  stream: z.string().min(1),
});

export interface WireStreamStats {
  backup_count: number;
  total_size_gb: number;
  max_size_gb: number;
  backups: Array<{ filename: string; size_mb: number; modified: string }>;
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

export function toWireStats(stats: Record<string, StreamStats>): Record<string, WireStreamStats> {
  const wire: Record<string, WireStreamStats> = {};
  for (const [stream, s] of Object.entries(stats)) {
    wire[stream] = {
      backup_count: s.residentCount,
      total_size_gb: round2(s.totalBytes / BYTES_PER_GB),
      max_size_gb: s.budgetBytes / BYTES_PER_GB,
      backups: s.recent.map(a => ({
        filename: a.filename,
        size_mb: round2(a.size / BYTES_PER_MB),
        modified: a.modified.toISOString(),
      })),
    };
  }
  return wire;
}

function isClientError(err: unknown): boolean {
  return err instanceof UnknownStreamError || err instanceof InvalidFilenameError;
}

/**
 * Express app exposing the ingest, stats and health endpoints over `store`.
 * Uploads are staged by multer in `stagingDir` and removed after each request.
 */
export function createReceiverApp(store: ArchiveStore, options: { stagingDir: string }) {
  const app = express();
  // Filenames arrive as raw UTF-8 in the part headers
  const upload = multer({ dest: options.stagingDir, defParamCharset: 'utf8' });

  app.use(cors());

  app.post('/backup', upload.single('file'), async (req, res) => {
    const file = req.file;
    try {
      const fields = IngestFieldsSchema.safeParse(req.body);
      if (!fields.success) {
        res.status(400).json({ detail: 'stream field is required' });
        return;
      }
      if (!file) {
        res.status(400).json({ detail: 'file part is required' });
        return;
      }

      const stream = fields.data.stream;
      const filename = file.originalname;
      store.getStream(stream);
      if (!isValidFilename(filename)) throw new InvalidFilenameError(filename);

      console.log(chalk.dim(`[${stream}] Receiving: ${filename}`));
      const result = await store.ingest(stream, filename, fs.createReadStream(file.path));
      console.log(chalk.green(`[${stream}] ✓ Saved: ${filename} (${(result.size / BYTES_PER_MB).toFixed(2)} MB)`));

      res.json({
        status: 'success',
        message: `Backup received: ${filename}`,
        stream,
        filename,
      });
    } catch (err) {
      if (isClientError(err)) {
        res.status(400).json({ detail: errorMessage(err) });
        return;
      }
      console.error(chalk.red(`[receiver] ✗ ${errorMessage(err)}`));
      res.status(500).json({ detail: `Failed to save backup: ${errorMessage(err)}` });
    } finally {
      if (file) {
        await fsp.rm(file.path, { force: true }).catch((err: unknown) => {
          console.error(chalk.yellow(`[receiver] Could not remove staged upload ${file.path}: ${errorMessage(err)}`));
        });
      }
    }
  });

  app.get('/stats', async (req, res) => {
    const stream = typeof req.query.stream === 'string' ? req.query.stream : undefined;
    try {
      res.json(toWireStats(await store.streamStats(stream)));
    } catch (err) {
      res.status(isClientError(err) ? 400 : 500).json({ detail: errorMessage(err) });
    }
  });

  app.get('/health', (_req, res) => {
    res.json({ status: 'healthy', timestamp: new Date().toISOString() });
  });

  // multer rejects malformed uploads before the route runs
  app.use((err: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(err);
      return;
    }
    if (err instanceof multer.MulterError) {
      res.status(400).json({ detail: err.message });
      return;
    }
    res.status(500).json({ detail: errorMessage(err) });
  });

  return app;
}

export class ReceiverServer {
  private httpServer: Server;

  constructor(
    private store: ArchiveStore,
    private options: { host: string; port: number; stagingDir: string },
  ) {
    this.httpServer = createServer(createReceiverApp(store, { stagingDir: options.stagingDir }));
    store.events.on('artifact:evicted', ({ stream, filename }) => {
      console.log(chalk.yellow(`[${stream}] Removed old backup: ${filename} (size limit)`));
    });
  }

  async start(): Promise<AddressInfo> {
    await this.store.init();
    await new Promise<void>((resolve, reject) => {
      this.httpServer.once('error', reject);
      this.httpServer.listen(this.options.port, this.options.host, () => {
        this.httpServer.off('error', reject);
        resolve();
      });
    });

    const address = this.httpServer.address();
    if (!address || typeof address === 'string') {
      throw new Error('Receiver is not listening on a TCP port');
    }

    console.log(chalk.bold.green(`\n  Backup receiver running at http://${address.address}:${address.port}`));
    console.log(chalk.dim('  POST /backup  - receive backup'));
    console.log(chalk.dim('  GET  /stats   - view statistics'));
    console.log(chalk.dim('  GET  /health  - health check\n'));
    return address;
  }

  async stop(): Promise<void> {
    await new Promise<void>((resolve, reject) => {
      this.httpServer.close(err => (err ? reject(err) : resolve()));
    });
  }
}
