/**
 * Extract error message from unknown catch value.
 */
export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

/**
 * Read the `code` of a Node.js system error (ENOENT, ECONNREFUSED, ...).
 */
export function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

export type RelayErrorCode =
  | 'NOT_TRACKED'
  | 'UNKNOWN_STREAM'
  | 'INVALID_FILENAME'
  | 'DISK_ERROR'
  | 'CONFIG_ERROR';

export class RelayError extends Error {
  constructor(public readonly code: RelayErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Ledger operation on a name the ledger does not track. */
export class NotTrackedError extends RelayError {
  constructor(public readonly filename: string) {
    super('NOT_TRACKED', `Artifact '${filename}' is not tracked by the ledger`);
  }
}

export class UnknownStreamError extends RelayError {
  constructor(public readonly stream: string) {
    super('UNKNOWN_STREAM', `Unknown stream: ${stream}`);
  }
}

export class InvalidFilenameError extends RelayError {
  constructor(public readonly filename: string) {
    super('INVALID_FILENAME', `Invalid artifact filename: '${filename}'`);
  }
}

/**
 * Any failure to read or write delivery state or archived artifacts.
 * Always propagated: swallowing it risks losing track of what was delivered.
 */
export class DiskError extends RelayError {
  constructor(message: string, cause: unknown) {
    super('DISK_ERROR', `${message}: ${errorMessage(cause)}`, { cause });
  }
}

export class ConfigError extends RelayError {
  constructor(public readonly configPath: string, detail: string) {
    super('CONFIG_ERROR', `Invalid config ${configPath}: ${detail}`);
  }
}
