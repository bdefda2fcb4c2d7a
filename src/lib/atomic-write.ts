/**
 * Atomic file output
 *
 * - Writes to a temp file beside the target, then renames over it
 * - Retries transient failures with exponential backoff
 * - Removes the temp file on every failure path
 */
import fs from 'fs/promises';
import path from 'path';
import { randomBytes } from 'crypto';
import { SerializationError, logErrorDetails } from './errors';
import { sleep } from './map-utils';

export type AtomicWriteIO = {
  mkdir: (dir: string) => Promise<unknown>;
  writeFile: (file: string, contents: string | Uint8Array) => Promise<void>;
  rename: (from: string, to: string) => Promise<void>;
  rm: (file: string) => Promise<void>;
};

export type AtomicWriteOptions = {
  /** Retry attempts after the first failure (default: 3) */
  maxRetries?: number;
  /** Base delay for retries in ms (default: 100) */
  baseDelayMs?: number;
  io?: AtomicWriteIO;
  /** Called before each retry */
  onRetry?: (attempt: number, delayMs: number, error: unknown) => void;
};

const nodeIO: AtomicWriteIO = {
  mkdir: (dir) => fs.mkdir(dir, { recursive: true }),
  writeFile: (file, contents) => fs.writeFile(file, contents, 'utf-8'),
  rename: (from, to) => fs.rename(from, to),
  rm: (file) => fs.rm(file, { force: true }),
};

const TRANSIENT_CODES = new Set(['EAGAIN', 'EBUSY', 'EMFILE', 'ENFILE', 'ETIMEDOUT']);

export function isTransientWriteError(error: unknown): boolean {
  if (!(error instanceof Error)) return false;
  return 'code' in error && typeof error.code === 'string' && TRANSIENT_CODES.has(error.code);
}

function tempPathFor(target: string): string {
  const suffix = `${process.pid}.${randomBytes(4).toString('hex')}.tmp`;
  return path.join(path.dirname(target), `.${path.basename(target)}.${suffix}`);
}

export async function writeFileAtomic(target: string, contents: string | Uint8Array, options: AtomicWriteOptions = {}): Promise<void> {
  const io = options.io ?? nodeIO;
  const maxRetries = options.maxRetries ?? 3;
  const baseDelayMs = options.baseDelayMs ?? 100;

  let lastError: unknown;
  let attempts = 0;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    attempts = attempt + 1;
    const temp = tempPathFor(target);
    try {
      await io.mkdir(path.dirname(target));
      await io.writeFile(temp, contents);
      await io.rename(temp, target);
      return;
    } catch (error) {
      lastError = error;
      await io.rm(temp).catch((cleanupError: unknown) => logErrorDetails(`⚠️ Could not remove ${temp}. `, cleanupError));

      if (!isTransientWriteError(error) || attempt === maxRetries) break;

      const delay = baseDelayMs * Math.pow(2, attempt);
      options.onRetry?.(attempt + 1, delay, error);
      await sleep(delay);
    }
  }

  throw new SerializationError(target, attempts, lastError);
}

export async function writeJsonAtomic(target: string, value: unknown, options?: AtomicWriteOptions): Promise<void> {
  await writeFileAtomic(target, JSON.stringify(value, null, 2), options);
}
