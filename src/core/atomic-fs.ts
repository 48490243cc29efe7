import fs from 'fs/promises';
import path from 'path';
import { randomBytes } from 'crypto';

/**
 * Hidden sibling path used while a file is being written.
 */
export function tempPathFor(filePath: string, suffix: string = 'tmp'): string {
  const dir = path.dirname(filePath);
  return path.join(dir, `.${path.basename(filePath)}.${randomBytes(4).toString('hex')}.${suffix}`);
}

/**
 * Write a file atomically using write-to-temp + rename.
 * Prevents corrupted state from partial writes (e.g., process killed mid-write).
 */
export async function atomicWrite(filePath: string, content: string): Promise<void> {
  const tmpFile = tempPathFor(filePath);

  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(tmpFile, content, 'utf8');

  try {
    await fs.rename(tmpFile, filePath);
  } catch (err) {
    await fs.rm(tmpFile, { force: true });
    throw err;
  }
}

const activeLocks = new Map<string, Promise<void>>();

/**
 * Run `fn` while holding an in-process lock on `key`.
 * Callers sharing a key run one at a time, in arrival order of the wakeups.
 */
export async function withLock<T>(key: string, fn: () => Promise<T>): Promise<T> {
  const lockKey = path.resolve(key);

  // Wait for any pending operation on this key
  while (activeLocks.has(lockKey)) {
    await activeLocks.get(lockKey);
  }

  let release: () => void = () => {};
  const lock = new Promise<void>(r => { release = r; });
  activeLocks.set(lockKey, lock);

  try {
    return await fn();
  } finally {
    activeLocks.delete(lockKey);
    release();
  }
}
