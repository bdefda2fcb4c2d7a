import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { SerializationError } from './errors';
import { isTransientWriteError, writeFileAtomic, writeJsonAtomic, type AtomicWriteIO } from './atomic-write';

function codeError(code: string): Error {
  return Object.assign(new Error(`${code} while writing`), { code });
}

function makeIO(failures: Error[]) {
  const pending = [...failures];
  const io = {
    mkdir: vi.fn(async (_dir: string) => undefined),
    writeFile: vi.fn(async (_file: string, _contents: string | Uint8Array) => {
      const failure = pending.shift();
      if (failure) throw failure;
    }),
    rename: vi.fn(async (_from: string, _to: string) => undefined),
    rm: vi.fn(async (_file: string) => undefined),
  } satisfies AtomicWriteIO;
  return io;
}

describe('isTransientWriteError', () => {
  it('recognises retryable error codes', () => {
    expect(isTransientWriteError(codeError('EBUSY'))).toBe(true);
    expect(isTransientWriteError(codeError('EMFILE'))).toBe(true);
    expect(isTransientWriteError(codeError('EACCES'))).toBe(false);
    expect(isTransientWriteError(new Error('plain'))).toBe(false);
    expect(isTransientWriteError('EBUSY')).toBe(false);
  });
});

describe('writeFileAtomic with injected io', () => {
  it('retries transient failures with exponential backoff', async () => {
    const io = makeIO([codeError('EBUSY'), codeError('EAGAIN')]);
    const onRetry = vi.fn();

    await writeFileAtomic('/out/grid_64.json', '{}', { io, baseDelayMs: 1, onRetry });

    expect(onRetry.mock.calls.map(([attempt, delay]) => [attempt, delay])).toEqual([
      [1, 1],
      [2, 2],
    ]);
    expect(io.writeFile).toHaveBeenCalledTimes(3);
    expect(io.rm).toHaveBeenCalledTimes(2);
    expect(io.rename).toHaveBeenCalledTimes(1);

    const [temp, target] = io.rename.mock.calls[0];
    expect(target).toBe('/out/grid_64.json');
    expect(path.dirname(temp)).toBe('/out');
    expect(path.basename(temp)).toMatch(/^\.grid_64\.json\.\d+\.[0-9a-f]{8}\.tmp$/);
  });

  it('gives up at once on a permanent failure', async () => {
    const failure = codeError('EACCES');
    const io = makeIO([failure]);

    const error = await writeFileAtomic('/out/a.json', '{}', { io, baseDelayMs: 1 }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(SerializationError);
    if (!(error instanceof SerializationError)) return;
    expect(error.attempts).toBe(1);
    expect(error.path).toBe('/out/a.json');
    expect(error.cause).toBe(failure);
    expect(error.message).toBe('Failed to write /out/a.json after 1 attempt(s)');
    expect(io.rm).toHaveBeenCalledTimes(1);
    expect(io.rename).not.toHaveBeenCalled();
  });

  it('stops after the configured number of retries', async () => {
    const io = makeIO([codeError('EBUSY'), codeError('EBUSY'), codeError('EBUSY'), codeError('EBUSY')]);
    const onRetry = vi.fn();

    const error = await writeFileAtomic('/out/a.json', '{}', { io, maxRetries: 2, baseDelayMs: 1, onRetry }).catch(
      (e: unknown) => e
    );

    expect(error).toBeInstanceOf(SerializationError);
    if (!(error instanceof SerializationError)) return;
    expect(error.attempts).toBe(3);
    expect(onRetry).toHaveBeenCalledTimes(2);
    expect(io.writeFile).toHaveBeenCalledTimes(3);
  });

  it('logs a temp file it could not remove and still reports the write failure', async () => {
    const io = makeIO([codeError('EACCES')]);
    io.rm.mockRejectedValueOnce(codeError('EPERM'));
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    const error = await writeFileAtomic('/out/a.json', '{}', { io }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(SerializationError);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(String(warn.mock.calls[0][0])).toContain('code=EPERM');
    warn.mockRestore();
  });
});

describe('writeFileAtomic on disk', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'grid-map-write-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('creates parent directories and leaves no temp files', async () => {
    const target = path.join(dir, 'nested', 'grid_2.json');
    await writeFileAtomic(target, '{"0,0":{}}');
    await writeFileAtomic(target, '{}');

    expect(fs.readFileSync(target, 'utf-8')).toBe('{}');
    expect(fs.readdirSync(path.join(dir, 'nested'))).toEqual(['grid_2.json']);
  });

  it('pretty-prints JSON values', async () => {
    const target = path.join(dir, 'manifest.json');
    await writeJsonAtomic(target, { items: 2, levels: [] });

    expect(fs.readFileSync(target, 'utf-8')).toBe('{\n  "items": 2,\n  "levels": []\n}');
  });
});
