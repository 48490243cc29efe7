import fs from 'fs/promises';
import { atomicWrite } from './atomic-fs.js';
import { DiskError, NotTrackedError, errorCode } from './errors.js';
import type { LedgerEntry } from '../types/index.js';

export type { LedgerEntry } from '../types/index.js';

const HEADER = ['filename', 'is_sent'];

// ─── CSV Encoding ───

function encodeField(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

/**
 * Parse CSV text into rows of fields. Handles quoted fields with doubled
 * quotes and embedded separators or line breaks.
 */
export function parseCsv(text: string): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let field = '';
  let quoted = false;
  let i = 0;

  while (i < text.length) {
    const ch = text[i];
    if (quoted) {
      if (ch === '"') {
        if (text[i + 1] === '"') {
          field += '"';
          i += 2;
          continue;
        }
        quoted = false;
      } else {
        field += ch;
      }
      i++;
      continue;
    }

    if (ch === '"' && field === '') {
      quoted = true;
    } else if (ch === ',') {
      row.push(field);
      field = '';
    } else if (ch === '\n' || ch === '\r') {
      if (ch === '\r' && text[i + 1] === '\n') i++;
      row.push(field);
      rows.push(row);
      row = [];
      field = '';
    } else {
      field += ch;
    }
    i++;
  }

  if (field !== '' || row.length > 0) {
    row.push(field);
    rows.push(row);
  }

  return rows;
}

export function serializeLedger(entries: LedgerEntry[]): string {
  const lines = [HEADER.join(',')];
  for (const entry of entries) {
    lines.push(`${encodeField(entry.filename)},${entry.sent ? 'true' : 'false'}`);
  }
  return lines.join('\n') + '\n';
}

function parseLedger(filePath: string, text: string): Map<string, boolean> {
  const entries = new Map<string, boolean>();
  const rows = parseCsv(text).filter(r => !(r.length === 1 && r[0] === ''));
  if (rows.length === 0) return entries;

  const [header, ...body] = rows;
  if (header.length !== 2 || header[0] !== HEADER[0] || header[1] !== HEADER[1]) {
    throw new DiskError(`Malformed ledger ${filePath}`, new Error(`unexpected header '${header.join(',')}'`));
  }

  for (const [index, fields] of body.entries()) {
    const flag = fields[1]?.toLowerCase();
    if (fields.length !== 2 || (flag !== 'true' && flag !== 'false')) {
      throw new DiskError(`Malformed ledger ${filePath}`, new Error(`bad row ${index + 2}`));
    }
    entries.set(fields[0], flag === 'true');
  }
  return entries;
}

/**
 * Durable record of which artifacts have been handed to the store.
 * Every mutation rewrites the whole file before returning.
 */
export class DeliveryLedger {
  private constructor(
    public readonly filePath: string,
    private entriesByName: Map<string, boolean>,
  ) {}

  static async load(filePath: string): Promise<DeliveryLedger> {
    let text: string;
    try {
      text = await fs.readFile(filePath, 'utf8');
    } catch (err) {
      if (errorCode(err) === 'ENOENT') return new DeliveryLedger(filePath, new Map());
      throw new DiskError(`Failed to read ledger ${filePath}`, err);
    }
    return new DeliveryLedger(filePath, parseLedger(filePath, text));
  }

  names(): string[] {
    return [...this.entriesByName.keys()].sort();
  }

  unsentNames(): string[] {
    return this.names().filter(name => this.entriesByName.get(name) === false);
  }

  isSent(name: string): boolean | undefined {
    return this.entriesByName.get(name);
  }

  entries(): LedgerEntry[] {
    return this.names().map(filename => ({ filename, sent: this.entriesByName.get(filename) === true }));
  }

  async record(name: string): Promise<void> {
    if (this.entriesByName.has(name)) return;
    await this.commit(next => next.set(name, false));
  }

  async markSent(name: string): Promise<void> {
    const sent = this.entriesByName.get(name);
    if (sent === undefined) throw new NotTrackedError(name);
    if (sent) return;
    await this.commit(next => next.set(name, true));
  }

  async remove(name: string): Promise<void> {
    if (!this.entriesByName.has(name)) return;
    await this.commit(next => next.delete(name));
  }

  /**
   * Apply a change to a copy, persist it, then adopt it. A failed write
   * leaves the in-memory state matching what is on disk.
   */
  private async commit(change: (next: Map<string, boolean>) => void): Promise<void> {
    const next = new Map(this.entriesByName);
    change(next);
    const entries = [...next.keys()].sort().map(filename => ({ filename, sent: next.get(filename) === true }));
    try {
      await atomicWrite(this.filePath, serializeLedger(entries));
    } catch (err) {
      throw new DiskError(`Failed to write ledger ${this.filePath}`, err);
    }
    this.entriesByName = next;
  }
}
