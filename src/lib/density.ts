import type { DensityMethod, DensityScores, GridIndex, GridLevel } from './types';

export type DensityOptions = {
  method: DensityMethod;
  /** `percentile` only: counts above this quantile of populated cells saturate at 1 */
  percentile: number;
};

export const DEFAULT_DENSITY_OPTIONS: DensityOptions = {
  method: 'linear',
  percentile: 0.95,
};

/** Nearest-rank quantile of an ascending list */
export function nearestRank(sortedAscending: readonly number[], quantile: number): number {
  if (sortedAscending.length === 0) return 0;
  const rank = Math.ceil(quantile * sortedAscending.length);
  const index = Math.min(sortedAscending.length - 1, Math.max(0, rank - 1));
  return sortedAscending[index];
}

/**
 * Maps an occupancy count to [0, 1] given the scale's reference count.
 * Each formula is non-decreasing in `count`.
 */
export function normalizeCount(count: number, reference: number, method: DensityMethod): number {
  if (reference <= 0) return 0;
  switch (method) {
    case 'linear':
      return Math.min(1, count / reference);
    case 'log':
      return Math.min(1, Math.log1p(count) / Math.log1p(reference));
    case 'percentile':
      return Math.min(count, reference) / reference;
  }
}

export function densityReference(counts: readonly number[], options: DensityOptions): number {
  if (counts.length === 0) return 0;
  if (options.method === 'percentile') {
    const sorted = [...counts].sort((a, b) => a - b);
    return nearestRank(sorted, options.percentile);
  }
  return counts.reduce((max, count) => (count > max ? count : max), 0);
}

/** Score per populated cell of one level */
export function scoreCells(level: GridLevel, options: Partial<DensityOptions> = {}): Map<string, number> {
  const resolved: DensityOptions = { ...DEFAULT_DENSITY_OPTIONS, ...options };
  const counts = Array.from(level.cells.values(), (members) => members.length);
  const reference = densityReference(counts, resolved);

  const scores = new Map<string, number>();
  for (const [key, members] of level.cells) {
    scores.set(key, normalizeCount(members.length, reference, resolved.method));
  }
  return scores;
}

/**
 * Per-item density from occupancy at the finest level. Items that share a
 * cell share a score.
 */
export function estimateDensity(index: GridIndex, options: Partial<DensityOptions> = {}): DensityScores {
  const scores = new Map<string, number>();
  const reference = index.levels[index.levels.length - 1];
  if (!reference) return scores;

  const cellScores = scoreCells(reference, options);
  for (const [key, members] of reference.cells) {
    const score = cellScores.get(key) ?? 0;
    for (const id of members) scores.set(id, score);
  }
  return scores;
}
