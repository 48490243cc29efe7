import fs from 'fs';
import fsp from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import { errorMessage } from './errors.js';
import type { ProgressObserver, UploadOutcome } from '../types/index.js';

export type { UploadOutcome, ProgressObserver } from '../types/index.js';

const DEFAULT_TIMEOUT_MS = 600_000;

// Connection could not be established at all
const UNREACHABLE_CODES = new Set([
  'ECONNREFUSED',
  'ENOTFOUND',
  'EAI_AGAIN',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'UND_ERR_CONNECT_TIMEOUT',
]);

const SuccessBodySchema = z.object({
  message: z.string().optional(),
}).passthrough();

export interface UploadOptions {
  onProgress?: ProgressObserver;
}

/** Anything able to deliver one artifact; the agent depends on this, not on HTTP. */
export interface Uploader {
  upload(artifactPath: string, stream: string, endpoint: string, options?: UploadOptions): Promise<UploadOutcome>;
}

function causeOf(err: unknown): unknown {
  if (err && typeof err === 'object' && 'cause' in err) return err.cause;
  return undefined;
}

function codeOf(value: unknown): string | undefined {
  if (value && typeof value === 'object' && 'code' in value && typeof value.code === 'string') {
    return value.code;
  }
  return undefined;
}

function isTimeout(err: unknown): boolean {
  // DOMException from AbortSignal.timeout, possibly wrapped by the transport
  for (let current: unknown = err, depth = 0; current && depth < 5; current = causeOf(current), depth++) {
    if (current && typeof current === 'object' && 'name' in current && current.name === 'TimeoutError') return true;
  }
  return false;
}

/**
 * Map a rejected fetch onto an upload outcome.
 */
export function classifyFailure(err: unknown): UploadOutcome {
  if (isTimeout(err)) return { kind: 'timeout' };

  const code = codeOf(causeOf(err)) ?? codeOf(err);
  if (code && UNREACHABLE_CODES.has(code)) {
    return { kind: 'unreachable', detail: code };
  }

  const cause = causeOf(err);
  const detail = cause ? `${errorMessage(err)}: ${errorMessage(cause)}` : errorMessage(err);
  return { kind: 'transport-error', detail };
}

/**
 * Sends one artifact to the store's ingest endpoint as multipart/form-data.
 * Single attempt: retries happen through the ledger on the next cycle.
 */
export class UploadClient implements Uploader {
  private timeoutMs: number;

  constructor(options: { timeoutMs?: number } = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  async upload(
    artifactPath: string,
    stream: string,
    endpoint: string,
    options: UploadOptions = {},
  ): Promise<UploadOutcome> {
    let response: Response;
    try {
      // openAsBlob reads lazily; check up front that the file is there to read
      await fsp.access(artifactPath, fs.constants.R_OK);
      const form = new FormData();
      form.append('stream', stream);
      form.append('file', await fs.openAsBlob(artifactPath), path.basename(artifactPath));

      // Encode once so the body can be observed as it is consumed
      const encoded = new Response(form);
      const contentType = encoded.headers.get('content-type');
      const body = encoded.body;
      if (!contentType || !body) {
        return { kind: 'transport-error', detail: 'failed to encode multipart body' };
      }

      let bytesSent = 0;
      const observed = body.pipeThrough(new TransformStream<Uint8Array, Uint8Array>({
        transform(chunk, controller) {
          bytesSent += chunk.byteLength;
          options.onProgress?.(bytesSent);
          controller.enqueue(chunk);
        },
      }));

      response = await fetch(endpoint, {
        method: 'POST',
        headers: { 'content-type': contentType },
        body: observed,
        duplex: 'half',
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      return classifyFailure(err);
    }

    let text: string;
    try {
      text = await response.text();
    } catch (err) {
      return classifyFailure(err);
    }

    if (!response.ok) {
      return { kind: 'rejected', status: response.status, body: text };
    }

    return { kind: 'success', message: parseMessage(text) };
  }
}

function parseMessage(text: string): string {
  try {
    const parsed = SuccessBodySchema.safeParse(JSON.parse(text));
    return parsed.success && parsed.data.message ? parsed.data.message : 'OK';
  } catch {
    return 'OK';
  }
}
