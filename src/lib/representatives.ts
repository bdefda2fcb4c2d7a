import type {
  Bounds,
  CellKey,
  GridIndex,
  GridLevel,
  HierarchyMode,
  MapItem,
  RepresentativeLevels,
  RepresentativeMap,
  RepresentativeStrategy,
} from './types';
import { axisIndex, buildCellLookup, cellBounds, cellCenter, childCellKeys } from './spatial-grid';
import { parseCellKey, squaredDistance } from './map-utils';

export type RepresentativeOptions = {
  strategy: RepresentativeStrategy;
  hierarchy: HierarchyMode;
  /** `densest` only: cells up to this size fall back to closest-to-center */
  denseThreshold: number;
  /** `densest` only: sub-grid size used to find the crowded part of a cell */
  miniGrid: number;
};

export const DEFAULT_REPRESENTATIVE_OPTIONS: RepresentativeOptions = {
  strategy: 'center',
  hierarchy: 'independent',
  denseThreshold: 50,
  miniGrid: 10,
};

export type HierarchyViolation = {
  resolution: number;
  cellKey: CellKey;
  id: string | null;
  reason: string;
};

function compareColumnMajor(a: CellKey, b: CellKey): number {
  const left = parseCellKey(a);
  const right = parseCellKey(b);
  return left.col - right.col || left.row - right.row;
}

// ==========================================
// SELECTION CRITERIA
// ==========================================

/**
 * Closest member to (cx, cy). Members arrive sorted by id and only a strictly
 * smaller distance replaces the current best, so ties keep the lowest id.
 */
function closestTo(
  members: readonly string[],
  itemsById: ReadonlyMap<string, MapItem>,
  cx: number,
  cy: number
): string | null {
  let bestId: string | null = null;
  let bestDistance = Infinity;
  for (const id of members) {
    const item = itemsById.get(id);
    if (!item) continue;
    const distance = squaredDistance(item.x, item.y, cx, cy);
    if (distance < bestDistance) {
      bestDistance = distance;
      bestId = id;
    }
  }
  return bestId;
}

function pickDensest(
  members: readonly string[],
  itemsById: ReadonlyMap<string, MapItem>,
  cell: Bounds,
  miniGrid: number
): string | null {
  const buckets = new Map<number, string[]>();
  for (const id of members) {
    const item = itemsById.get(id);
    if (!item) continue;
    const col = axisIndex(item.x, cell.minX, cell.maxX, miniGrid);
    const row = axisIndex(item.y, cell.minY, cell.maxY, miniGrid);
    const slot = row * miniGrid + col;
    const bucket = buckets.get(slot);
    if (bucket) bucket.push(id);
    else buckets.set(slot, [id]);
  }

  // Row-major scan with strict comparison: ties go to the lowest row, then col
  let bestSlot = -1;
  let bestCount = 0;
  for (let slot = 0; slot < miniGrid * miniGrid; slot++) {
    const count = buckets.get(slot)?.length ?? 0;
    if (count > bestCount) {
      bestCount = count;
      bestSlot = slot;
    }
  }
  if (bestSlot < 0) return null;

  const row = Math.floor(bestSlot / miniGrid);
  const col = bestSlot % miniGrid;
  const center = cellCenter(cell, miniGrid, row, col);
  return closestTo(buckets.get(bestSlot) ?? [], itemsById, center.x, center.y);
}

function selectForLevel(
  level: GridLevel,
  bounds: Bounds,
  itemsById: ReadonlyMap<string, MapItem>,
  options: RepresentativeOptions
): Map<CellKey, string> {
  const representatives = new Map<CellKey, string>();
  for (const [key, members] of level.cells) {
    const { row, col } = parseCellKey(key);
    let chosen: string | null;
    if (options.strategy === 'densest' && members.length > options.denseThreshold) {
      chosen = pickDensest(members, itemsById, cellBounds(bounds, level.resolution, row, col), options.miniGrid);
    } else {
      const center = cellCenter(bounds, level.resolution, row, col);
      chosen = closestTo(members, itemsById, center.x, center.y);
    }
    if (chosen !== null) representatives.set(key, chosen);
  }
  return representatives;
}

/**
 * Coarse cells adopt the representative of their most populated child.
 * Children are visited column by column (lowest col, then lowest row), so a
 * tie goes to the leftmost child.
 */
function propagateFromFiner(
  level: GridLevel,
  finer: GridLevel,
  finerRepresentatives: RepresentativeMap
): Map<CellKey, string> {
  const ratio = finer.resolution / level.resolution;
  const representatives = new Map<CellKey, string>();
  for (const key of level.cells.keys()) {
    let bestChild: CellKey | null = null;
    let bestCount = 0;
    for (const child of childCellKeys(key, ratio).sort(compareColumnMajor)) {
      const count = finer.cells.get(child)?.length ?? 0;
      if (count > bestCount) {
        bestCount = count;
        bestChild = child;
      }
    }
    const adopted = bestChild === null ? undefined : finerRepresentatives.get(bestChild);
    if (adopted !== undefined) representatives.set(key, adopted);
  }
  return representatives;
}

// ==========================================
// PUBLIC API
// ==========================================

export function selectRepresentatives(
  index: GridIndex,
  itemsById: ReadonlyMap<string, MapItem>,
  options: Partial<RepresentativeOptions> = {}
): RepresentativeLevels {
  const resolved: RepresentativeOptions = { ...DEFAULT_REPRESENTATIVE_OPTIONS, ...options };
  const result = new Map<number, RepresentativeMap>();
  const bounds = index.bounds;

  if (!bounds) {
    for (const level of index.levels) result.set(level.resolution, new Map());
    return result;
  }

  if (resolved.hierarchy === 'independent') {
    for (const level of index.levels) {
      result.set(level.resolution, selectForLevel(level, bounds, itemsById, resolved));
    }
    return result;
  }

  // propagate: finest level decides, coarser levels inherit
  const levels = index.levels;
  let finer = levels[levels.length - 1];
  let finerRepresentatives: RepresentativeMap = selectForLevel(finer, bounds, itemsById, resolved);
  result.set(finer.resolution, finerRepresentatives);
  for (let i = levels.length - 2; i >= 0; i--) {
    const level = levels[i];
    const representatives = propagateFromFiner(level, finer, finerRepresentatives);
    result.set(level.resolution, representatives);
    finer = level;
    finerRepresentatives = representatives;
  }

  // Restore ascending resolution order for consumers that iterate the map
  return new Map(levels.map((level) => [level.resolution, result.get(level.resolution) ?? new Map()]));
}

/**
 * Checks membership (the representative belongs to its cell) and hierarchy
 * consistency (it also belongs to one of the cell's children at the next finer
 * level). Returns every violation found; an empty list means the map is sound.
 */
export function verifyHierarchy(index: GridIndex, representatives: RepresentativeLevels): HierarchyViolation[] {
  const violations: HierarchyViolation[] = [];

  index.levels.forEach((level, levelIndex) => {
    const reps = representatives.get(level.resolution) ?? new Map<CellKey, string>();

    for (const key of reps.keys()) {
      if (!level.cells.has(key)) {
        violations.push({ resolution: level.resolution, cellKey: key, id: reps.get(key) ?? null, reason: 'representative for an empty cell' });
      }
    }

    const finer = index.levels[levelIndex + 1];
    const finerLookup = finer ? buildCellLookup(finer) : null;

    for (const [key, members] of level.cells) {
      const id = reps.get(key);
      if (id === undefined) {
        violations.push({ resolution: level.resolution, cellKey: key, id: null, reason: 'populated cell without representative' });
        continue;
      }
      if (!members.includes(id)) {
        violations.push({ resolution: level.resolution, cellKey: key, id, reason: 'representative is not a member of its cell' });
      }
      if (finer && finerLookup) {
        const ratio = finer.resolution / level.resolution;
        const childKey = finerLookup.get(id);
        if (childKey === undefined || !childCellKeys(key, ratio).includes(childKey)) {
          violations.push({ resolution: level.resolution, cellKey: key, id, reason: `representative lies outside the cell's children at ${finer.resolution}` });
        }
      }
    }
  });

  return violations;
}
