import type { RetentionPolicy } from './config.js';

// ─── Archive Store Types ───

export interface StreamDefinition {
  name: string;
  archivePath: string;
  /** Zero or negative disables retention. */
  budgetBytes: number;
  retention: RetentionPolicy;
}

export interface ResidentArtifact {
  filename: string;
  path: string;
  size: number;
  mtimeMs: number;
}

export interface RetentionResult {
  evicted: ResidentArtifact[];
  remainingCount: number;
  remainingBytes: number;
}

export interface IngestResult {
  stream: string;
  filename: string;
  path: string;
  size: number;
  evicted: string[];
}

export interface ArtifactSummary {
  filename: string;
  size: number;
  modified: Date;
}

export interface StreamStats {
  residentCount: number;
  totalBytes: number;
  budgetBytes: number;
  recent: ArtifactSummary[];
}
