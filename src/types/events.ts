import type { UploadOutcome } from './delivery.js';

// ─── Relay Events ───

export interface RelayEventMap {
  'artifact:discovered': { stream: string; filename: string };
  'artifact:forgotten': { stream: string; filename: string };
  'artifact:unstable': { stream: string; filename: string; reason: 'missing' | 'timeout' };
  'artifact:uploading': { stream: string; filename: string; size: number };
  'artifact:progress': { stream: string; filename: string; bytesSent: number };
  'artifact:sent': { stream: string; filename: string; size: number; message: string };
  'artifact:failed': { stream: string; filename: string; outcome: UploadOutcome };
  'artifact:ingested': { stream: string; filename: string; size: number };
  'artifact:evicted': { stream: string; filename: string; size: number };
}

export type RelayEvent = keyof RelayEventMap;
