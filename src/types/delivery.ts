// ─── Delivery Types ───

export type StabilityResult =
  | { stable: true; size: number }
  | { stable: false; reason: 'missing' | 'timeout' };

export type UploadOutcome =
  | { kind: 'success'; message: string }
  | { kind: 'rejected'; status: number; body: string }
  | { kind: 'timeout' }
  | { kind: 'unreachable'; detail: string }
  | { kind: 'transport-error'; detail: string };

export type ProgressObserver = (bytesSent: number) => void;

export interface LedgerEntry {
  filename: string;
  sent: boolean;
}

export interface ReconcileResult {
  added: string[];
  removed: string[];
}

export interface CycleReport {
  stream: string;
  discovered: string[];
  removed: string[];
  sent: Array<{ filename: string; size: number; message: string }>;
  skipped: Array<{ filename: string; reason: 'missing' | 'timeout' }>;
  failed: Array<{ filename: string; outcome: UploadOutcome }>;
  bytesSent: number;
}
