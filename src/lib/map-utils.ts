/**
 * Shared helpers for the grid, layout and export stages
 */
import type { CellKey } from './types';

// ==========================================
// GEOMETRY HELPERS
// ==========================================

export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

export function squaredDistance(ax: number, ay: number, bx: number, by: number): number {
  const dx = ax - bx;
  const dy = ay - by;
  return dx * dx + dy * dy;
}

// ==========================================
// CELL KEYS
// ==========================================

export function toCellKey(row: number, col: number): CellKey {
  return `${col},${row}`;
}

export function parseCellKey(key: CellKey): { row: number; col: number } {
  const [colPart, rowPart] = key.split(',');
  const col = Number(colPart);
  const row = Number(rowPart);
  if (!Number.isInteger(col) || !Number.isInteger(row)) {
    throw new Error(`Malformed cell key: ${key}`);
  }
  return { row, col };
}

/** Row-major order: lowest row first, then lowest col */
export function compareCellKeys(a: CellKey, b: CellKey): number {
  const left = parseCellKey(a);
  const right = parseCellKey(b);
  return left.row - right.row || left.col - right.col;
}

// ==========================================
// ORDERING
// ==========================================

/** Code-unit order, independent of locale */
export function compareIds(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

// ==========================================
// FILE/PATH HELPERS
// ==========================================

export function sanitizeFilePart(value: string): string {
  const trimmed = value.trim().toLowerCase();
  return trimmed
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/-+/g, '-')
    .replace(/^-|-$/g, '')
    .slice(0, 80);
}

// ==========================================
// CONCURRENCY HELPERS
// ==========================================

export const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export async function runWithConcurrency<T, R>(
  items: readonly T[],
  concurrency: number,
  fn: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const results: R[] = new Array(items.length);
  let nextIndex = 0;

  async function worker() {
    while (true) {
      const i = nextIndex;
      nextIndex += 1;
      if (i >= items.length) return;
      results[i] = await fn(items[i], i);
    }
  }

  const workers = Array.from({ length: Math.min(Math.max(1, concurrency), items.length) }, () =>
    worker()
  );
  await Promise.all(workers);
  return results;
}
