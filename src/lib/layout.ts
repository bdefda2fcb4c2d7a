import type { CellKey, DensityScores, GridIndex, Placement, RepresentativeLevels } from './types';
import { ConfigurationError, InputValidationError, type InputIssue } from './errors';
import { getLevel } from './spatial-grid';
import { clamp, compareCellKeys, compareIds, parseCellKey, toCellKey } from './map-utils';

// ==========================================
// TYPES
// ==========================================

export type LayoutOptions = {
  /** Grid resolution the placements snap to */
  resolution: number;
  /** Size of the densest item, in board units */
  baseSize: number;
  /** Floor so sparse items stay visible */
  minSize: number;
  /** Minimum gap between neighbouring boxes */
  spacing: number;
  /** Board units per grid cell */
  cellSize: number;
  /** Distance from an item's bottom edge to its caption */
  captionOffset: number;
};

export const DEFAULT_LAYOUT_OPTIONS: Omit<LayoutOptions, 'resolution'> = {
  baseSize: 400,
  minSize: 100,
  spacing: 50,
  cellSize: 450,
  captionOffset: 20,
};

export type LayoutCandidate = {
  id: string;
  row: number;
  col: number;
  /** Density score in [0, 1] */
  density: number;
};

export const LAYOUT_EPSILON = 1e-9;

// ==========================================
// VALIDATION
// ==========================================

export function validateLayoutOptions(options: LayoutOptions): string[] {
  const issues: string[] = [];
  const { resolution, baseSize, minSize, spacing, cellSize } = options;
  if (!Number.isInteger(resolution) || resolution < 1) issues.push(`layout resolution ${resolution} must be a positive integer`);
  if (!(minSize > 0)) issues.push(`minSize ${minSize} must be positive`);
  if (!(cellSize > 0)) issues.push(`cellSize ${cellSize} must be positive`);
  if (!(spacing >= 0)) issues.push(`spacing ${spacing} must not be negative`);
  if (minSize > baseSize) issues.push(`minSize ${minSize} exceeds baseSize ${baseSize}`);
  if (baseSize > cellSize) issues.push(`baseSize ${baseSize} exceeds cellSize ${cellSize}`);
  if (minSize + spacing > cellSize) {
    issues.push(`minSize ${minSize} plus spacing ${spacing} does not fit in cellSize ${cellSize}`);
  }
  return issues;
}

// ==========================================
// GEOMETRY
// ==========================================

/** Cell centre on a board centred on the origin */
export function boardPosition(row: number, col: number, resolution: number, cellSize: number): { x: number; y: number } {
  const half = (resolution * cellSize) / 2;
  return {
    x: (col + 0.5) * cellSize - half,
    y: (row + 0.5) * cellSize - half,
  };
}

export function scaleSize(density: number, baseSize: number, minSize: number): number {
  return minSize + clamp(density, 0, 1) * (baseSize - minSize);
}

/**
 * Cells on each side that could hold a box colliding at `baseSize`. Never
 * wider than the board itself.
 */
export function neighbourReach(options: Pick<LayoutOptions, 'resolution' | 'baseSize' | 'spacing' | 'cellSize'>): number {
  const reach = Math.max(1, Math.ceil((options.baseSize + options.spacing) / options.cellSize));
  return Math.min(reach, Math.max(0, options.resolution - 1));
}

/**
 * Gap between two square boxes: Chebyshev centre distance minus the sum of
 * half-sizes. Negative means overlap.
 */
export function boxGap(a: Pick<Placement, 'x' | 'y' | 'size'>, b: Pick<Placement, 'x' | 'y' | 'size'>): number {
  const distance = Math.max(Math.abs(a.x - b.x), Math.abs(a.y - b.y));
  return distance - (a.size + b.size) / 2;
}

// ==========================================
// LAYOUT
// ==========================================

/**
 * Places every candidate at its cell centre and shrinks (never moves) items
 * whose scaled size would crowd a neighbour.
 *
 * Each item is capped at `D - spacing` for every neighbour at Chebyshev
 * distance D, so any pair satisfies `s1/2 + s2/2 <= D - spacing`. Only the
 * window of cells that could collide at `baseSize` is inspected.
 */
export function buildLayout(candidates: readonly LayoutCandidate[], options: LayoutOptions): Placement[] {
  const issues = validateLayoutOptions(options);
  if (issues.length > 0) throw new ConfigurationError(issues, { stage: 'layout' });

  const { resolution, baseSize, minSize, spacing, cellSize, captionOffset } = options;

  const inputIssues: InputIssue[] = [];
  const byCell = new Map<CellKey, LayoutCandidate>();
  candidates.forEach((candidate, index) => {
    const { row, col } = candidate;
    if (!Number.isInteger(row) || !Number.isInteger(col) || row < 0 || col < 0 || row >= resolution || col >= resolution) {
      inputIssues.push({ row: index + 1, id: candidate.id, reason: `cell (${row}, ${col}) outside a ${resolution}x${resolution} grid` });
      return;
    }
    const key = toCellKey(row, col);
    const existing = byCell.get(key);
    if (existing) {
      inputIssues.push({ row: index + 1, id: candidate.id, reason: `cell ${key} already holds ${existing.id}` });
      return;
    }
    byCell.set(key, candidate);
  });
  if (inputIssues.length > 0) throw new InputValidationError(inputIssues, { stage: 'layout', resolution });

  const half = (resolution * cellSize) / 2;
  const reach = neighbourReach(options);
  const keys = Array.from(byCell.keys()).sort(compareCellKeys);

  return keys.map((key) => {
    const candidate = byCell.get(key);
    if (!candidate) throw new Error(`Missing layout candidate for ${key}`);
    const { row, col, id } = candidate;
    const { x, y } = boardPosition(row, col, resolution, cellSize);

    // Stay inside the board
    let cap = 2 * Math.min(x + half, half - x, y + half, half - y);

    for (let dr = -reach; dr <= reach; dr++) {
      for (let dc = -reach; dc <= reach; dc++) {
        if (dr === 0 && dc === 0) continue;
        if (!byCell.has(toCellKey(row + dr, col + dc))) continue;
        const distance = Math.max(Math.abs(dr), Math.abs(dc)) * cellSize;
        cap = Math.min(cap, distance - spacing);
      }
    }

    if (cap + LAYOUT_EPSILON < minSize) {
      throw new ConfigurationError(
        [`item ${id} in cell ${key} can be at most ${cap} units, below minSize ${minSize}`],
        { stage: 'layout', resolution, cellKey: key, id }
      );
    }

    const size = Math.min(scaleSize(candidate.density, baseSize, minSize), cap);
    return { id, cellKey: key, x, y, size, captionY: y + size / 2 + captionOffset };
  });
}

/**
 * Representatives of one level as layout candidates, optionally dropping cells
 * whose representative scores below `minDensity`.
 */
export function selectLayoutCandidates(
  index: GridIndex,
  representatives: RepresentativeLevels,
  density: DensityScores,
  options: { resolution: number; minDensity?: number }
): LayoutCandidate[] {
  const level = getLevel(index, options.resolution);
  if (!level) {
    throw new ConfigurationError([`layout resolution ${options.resolution} is not a configured resolution`], {
      resolutions: index.levels.map((l) => l.resolution),
    });
  }

  const minDensity = options.minDensity ?? 0;
  const reps = representatives.get(options.resolution) ?? new Map<CellKey, string>();
  const candidates: LayoutCandidate[] = [];
  for (const [key, id] of reps) {
    const score = density.get(id) ?? 0;
    if (score < minDensity) continue;
    const { row, col } = parseCellKey(key);
    candidates.push({ id, row, col, density: score });
  }
  return candidates.sort((a, b) => a.row - b.row || a.col - b.col || compareIds(a.id, b.id));
}
