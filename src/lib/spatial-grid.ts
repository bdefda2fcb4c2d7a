import type { Bounds, CellKey, GridIndex, GridLevel, MapItem } from './types';
import { ConfigurationError, DegenerateInputWarning, InputValidationError, type InputIssue } from './errors';
import { compareCellKeys, compareIds, parseCellKey, toCellKey } from './map-utils';

// ==========================================
// RESOLUTIONS
// ==========================================

/**
 * Resolutions must be strictly increasing positive integers, each dividing the
 * finest one, so every coarse cell covers an exact block of finer cells.
 */
export function validateResolutions(resolutions: readonly number[]): string[] {
  const issues: string[] = [];
  if (resolutions.length === 0) {
    issues.push('at least one resolution is required');
    return issues;
  }
  for (const r of resolutions) {
    if (!Number.isInteger(r) || r < 1) {
      issues.push(`resolution ${r} must be a positive integer`);
    }
  }
  for (let i = 1; i < resolutions.length; i++) {
    if (resolutions[i] <= resolutions[i - 1]) {
      issues.push(`resolutions must be strictly increasing (${resolutions[i - 1]} before ${resolutions[i]})`);
    }
  }
  const finest = resolutions[resolutions.length - 1];
  for (const r of resolutions) {
    if (Number.isInteger(r) && r >= 1 && finest % r !== 0) {
      issues.push(`resolution ${r} does not divide the finest resolution ${finest}`);
    }
  }
  return issues;
}

// ==========================================
// BOUNDS
// ==========================================

/** Bounding box padded by `margin` times each axis' extent */
export function computeBounds(items: readonly MapItem[], margin = 0): Bounds | null {
  if (items.length === 0) return null;

  let minX = Infinity;
  let maxX = -Infinity;
  let minY = Infinity;
  let maxY = -Infinity;
  for (const item of items) {
    if (item.x < minX) minX = item.x;
    if (item.x > maxX) maxX = item.x;
    if (item.y < minY) minY = item.y;
    if (item.y > maxY) maxY = item.y;
  }

  const padX = (maxX - minX) * margin;
  const padY = (maxY - minY) * margin;
  const bounds = { minX: minX - padX, maxX: maxX + padX, minY: minY - padY, maxY: maxY + padY };

  const issues: InputIssue[] = [];
  if (!Number.isFinite(bounds.maxX - bounds.minX)) {
    issues.push({ row: 0, reason: `x range [${minX}, ${maxX}] with margin ${margin} is too wide to bin` });
  }
  if (!Number.isFinite(bounds.maxY - bounds.minY)) {
    issues.push({ row: 0, reason: `y range [${minY}, ${maxY}] with margin ${margin} is too wide to bin` });
  }
  if (issues.length > 0) throw new InputValidationError(issues, { stage: 'bounds' });
  return bounds;
}

export function detectDegenerateInput(
  items: readonly MapItem[],
  bounds: Bounds | null
): DegenerateInputWarning[] {
  if (items.length === 0 || !bounds) {
    return [new DegenerateInputWarning('empty', 'No items to map; every level will be empty')];
  }

  const zeroX = bounds.maxX - bounds.minX <= 0;
  const zeroY = bounds.maxY - bounds.minY <= 0;
  if (zeroX && zeroY) {
    return [
      new DegenerateInputWarning('single-point', 'All items share one coordinate; each level has a single cell', {
        items: items.length,
        x: bounds.minX,
        y: bounds.minY,
      }),
    ];
  }
  if (zeroX || zeroY) {
    const axis = zeroX ? 'x' : 'y';
    return [
      new DegenerateInputWarning('zero-extent-axis', `All items share one ${axis} value; that axis has a single cell`, {
        axis,
      }),
    ];
  }
  return [];
}

// ==========================================
// BINNING
// ==========================================

/** Half-open [min, max) bins; values at or past max land in the last bin */
export function axisIndex(value: number, min: number, max: number, cells: number): number {
  const extent = max - min;
  if (!(extent > 0)) return 0;
  const index = Math.floor(((value - min) / extent) * cells);
  if (index < 0) return 0;
  if (index >= cells) return cells - 1;
  return index;
}

export function buildGridIndex(
  items: readonly MapItem[],
  resolutions: readonly number[],
  bounds: Bounds | null = computeBounds(items)
): GridIndex {
  const issues = validateResolutions(resolutions);
  if (issues.length > 0) throw new ConfigurationError(issues, { resolutions: [...resolutions] });

  if (items.length === 0 || !bounds) {
    return {
      bounds: null,
      levels: resolutions.map((resolution) => ({ resolution, cells: new Map() })),
    };
  }

  // Coarser indices are derived from the finest by integer division, which
  // keeps parent/child membership exact under floating point.
  const finest = resolutions[resolutions.length - 1];
  const finestRows = new Int32Array(items.length);
  const finestCols = new Int32Array(items.length);
  for (let i = 0; i < items.length; i++) {
    const item = items[i];
    finestCols[i] = axisIndex(item.x, bounds.minX, bounds.maxX, finest);
    finestRows[i] = axisIndex(item.y, bounds.minY, bounds.maxY, finest);
  }

  const levels: GridLevel[] = resolutions.map((resolution) => {
    const ratio = finest / resolution;
    const buckets = new Map<CellKey, string[]>();
    for (let i = 0; i < items.length; i++) {
      const key = toCellKey(Math.floor(finestRows[i] / ratio), Math.floor(finestCols[i] / ratio));
      const bucket = buckets.get(key);
      if (bucket) {
        bucket.push(items[i].id);
      } else {
        buckets.set(key, [items[i].id]);
      }
    }

    const keys = Array.from(buckets.keys()).sort(compareCellKeys);
    const cells = new Map<CellKey, readonly string[]>();
    for (const key of keys) {
      const members = buckets.get(key) ?? [];
      cells.set(key, members.sort(compareIds));
    }
    return { resolution, cells };
  });

  return { bounds, levels };
}

// ==========================================
// CELL GEOMETRY
// ==========================================

export function cellBounds(bounds: Bounds, resolution: number, row: number, col: number): Bounds {
  const cellWidth = (bounds.maxX - bounds.minX) / resolution;
  const cellHeight = (bounds.maxY - bounds.minY) / resolution;
  return {
    minX: bounds.minX + col * cellWidth,
    maxX: bounds.minX + (col + 1) * cellWidth,
    minY: bounds.minY + row * cellHeight,
    maxY: bounds.minY + (row + 1) * cellHeight,
  };
}

export function cellCenter(bounds: Bounds, resolution: number, row: number, col: number): { x: number; y: number } {
  const cell = cellBounds(bounds, resolution, row, col);
  return { x: (cell.minX + cell.maxX) / 2, y: (cell.minY + cell.maxY) / 2 };
}

export function childCellKeys(key: CellKey, ratio: number): CellKey[] {
  const { row, col } = parseCellKey(key);
  const children: CellKey[] = [];
  for (let dr = 0; dr < ratio; dr++) {
    for (let dc = 0; dc < ratio; dc++) {
      children.push(toCellKey(row * ratio + dr, col * ratio + dc));
    }
  }
  return children;
}

export function getLevel(index: GridIndex, resolution: number): GridLevel | undefined {
  return index.levels.find((level) => level.resolution === resolution);
}

/** Inverse of a level's cell map: item id → cell key */
export function buildCellLookup(level: GridLevel): Map<string, CellKey> {
  const lookup = new Map<string, CellKey>();
  for (const [key, members] of level.cells) {
    for (const id of members) lookup.set(id, key);
  }
  return lookup;
}
