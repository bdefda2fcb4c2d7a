import { describe, expect, it } from 'vitest';
import type { MapItem, Placement } from './types';
import { ConfigurationError, InputValidationError } from './errors';
import { buildGridIndex } from './spatial-grid';
import { selectRepresentatives } from './representatives';
import { estimateDensity } from './density';
import {
  DEFAULT_LAYOUT_OPTIONS,
  LAYOUT_EPSILON,
  boardPosition,
  boxGap,
  buildLayout,
  neighbourReach,
  scaleSize,
  selectLayoutCandidates,
  type LayoutCandidate,
  type LayoutOptions,
} from './layout';

function makeOptions(overrides: Partial<LayoutOptions> = {}): LayoutOptions {
  return { resolution: 4, ...DEFAULT_LAYOUT_OPTIONS, ...overrides };
}

function makeCandidate(id: string, row: number, col: number, density = 1): LayoutCandidate {
  return { id, row, col, density };
}

function expectNoOverlap(placements: Placement[], spacing: number) {
  for (let i = 0; i < placements.length; i++) {
    for (let j = i + 1; j < placements.length; j++) {
      expect(boxGap(placements[i], placements[j])).toBeGreaterThanOrEqual(spacing - LAYOUT_EPSILON);
    }
  }
}

describe('layout geometry', () => {
  it('centres the board on the origin', () => {
    expect(boardPosition(0, 0, 1, 450)).toEqual({ x: 0, y: 0 });
    expect(boardPosition(0, 0, 4, 450)).toEqual({ x: -675, y: -675 });
    expect(boardPosition(2, 3, 4, 450)).toEqual({ x: 675, y: 225 });
  });

  it('scales size linearly between min and base', () => {
    expect(scaleSize(0, 400, 100)).toBe(100);
    expect(scaleSize(0.5, 400, 100)).toBe(250);
    expect(scaleSize(1, 400, 100)).toBe(400);
    expect(scaleSize(3, 400, 100)).toBe(400);
  });

  it('measures gaps with the Chebyshev distance', () => {
    expect(boxGap({ x: 0, y: 0, size: 100 }, { x: 300, y: 40, size: 200 })).toBe(150);
    expect(boxGap({ x: 0, y: 0, size: 100 }, { x: 50, y: 50, size: 100 })).toBe(-50);
  });
});

describe('neighbour window', () => {
  it('covers the cells a base-size box could reach', () => {
    expect(neighbourReach(makeOptions())).toBe(1);
    expect(neighbourReach(makeOptions({ spacing: 100 }))).toBe(2);
    expect(neighbourReach(makeOptions({ baseSize: 450, spacing: 449 }))).toBe(2);
  });

  it('never extends past the board', () => {
    expect(neighbourReach(makeOptions({ resolution: 1 }))).toBe(0);
    expect(neighbourReach(makeOptions({ resolution: 2, spacing: 100 }))).toBe(1);
    expect(neighbourReach(makeOptions({ resolution: 16, baseSize: 200000 }))).toBe(15);
  });
});

describe('buildLayout', () => {
  it('gives a lone densest item the base size', () => {
    const [placement] = buildLayout([makeCandidate('solo', 0, 0)], makeOptions({ resolution: 256 }));

    expect(placement).toEqual({ id: 'solo', cellKey: '0,0', x: -57375, y: -57375, size: 400, captionY: -57155 });
  });

  it('sizes sparse items between min and base', () => {
    const placements = buildLayout(
      [makeCandidate('a', 0, 0, 0), makeCandidate('b', 3, 3, 0.5)],
      makeOptions()
    );

    expect(placements.map((p) => [p.id, p.size, p.captionY])).toEqual([
      ['a', 100, -675 + 50 + 20],
      ['b', 250, 675 + 125 + 20],
    ]);
  });

  it('shrinks neighbours to keep the spacing without moving them', () => {
    const options = makeOptions({ spacing: 100 });
    const placements = buildLayout(
      [makeCandidate('a', 0, 0), makeCandidate('b', 0, 1), makeCandidate('c', 1, 1), makeCandidate('d', 3, 3)],
      options
    );

    expect(placements.map((p) => [p.id, p.x, p.y, p.size])).toEqual([
      ['a', -675, -675, 350],
      ['b', -225, -675, 350],
      ['c', -225, -225, 350],
      ['d', 675, 675, 400],
    ]);
    expectNoOverlap(placements, options.spacing);
  });

  it('keeps every pair apart on a crowded board', () => {
    const options = makeOptions({ resolution: 16, baseSize: 200, cellSize: 200, spacing: 50 });
    let state = 9;
    const next = () => {
      state = (state * 1664525 + 1013904223) % 4294967296;
      return state / 4294967296;
    };
    const candidates: LayoutCandidate[] = [];
    for (let row = 0; row < 16; row++) {
      for (let col = 0; col < 16; col++) {
        if (next() < 0.6) candidates.push(makeCandidate(`c${row}-${col}`, row, col, next()));
      }
    }

    const placements = buildLayout(candidates, options);

    expect(placements).toHaveLength(candidates.length);
    expectNoOverlap(placements, options.spacing);
    for (const p of placements) {
      expect(p.size).toBeGreaterThanOrEqual(options.minSize);
      expect(p.size).toBeLessThanOrEqual(options.baseSize);
    }
  });

  it('orders placements row-major', () => {
    const placements = buildLayout(
      [makeCandidate('late', 2, 0), makeCandidate('early', 0, 3), makeCandidate('mid', 1, 1)],
      makeOptions()
    );
    expect(placements.map((p) => p.cellKey)).toEqual(['3,0', '1,1', '0,2']);
  });

  it('rejects settings that cannot hold the minimum size', () => {
    expect(() => buildLayout([], makeOptions({ minSize: 500 }))).toThrow(ConfigurationError);
    expect(() => buildLayout([], makeOptions({ spacing: 400 }))).toThrow(
      'Invalid configuration: minSize 100 plus spacing 400 does not fit in cellSize 450'
    );
  });

  it('rejects a base size wider than a cell', () => {
    expect(() => buildLayout([makeCandidate('solo', 0, 0)], makeOptions({ baseSize: 600 }))).toThrow(
      'Invalid configuration: baseSize 600 exceeds cellSize 450'
    );
  });

  it('rejects two items in one cell and cells off the grid', () => {
    let caught: unknown;
    try {
      buildLayout([makeCandidate('a', 0, 0), makeCandidate('b', 0, 0), makeCandidate('c', 4, 0)], makeOptions());
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(InputValidationError);
    if (!(caught instanceof InputValidationError)) return;
    expect(caught.issues).toEqual([
      { row: 2, id: 'b', reason: 'cell 0,0 already holds a' },
      { row: 3, id: 'c', reason: 'cell (4, 0) outside a 4x4 grid' },
    ]);
  });
});

describe('selectLayoutCandidates', () => {
  const items: MapItem[] = [
    { id: 'o', x: 0, y: 0, metadata: {} },
    { id: 'q', x: 0.1, y: 0.1, metadata: {} },
    { id: 'r', x: 0.2, y: 0.2, metadata: {} },
    { id: 'p', x: 0.5, y: 0.5, metadata: {} },
    { id: 't', x: 1, y: 1, metadata: {} },
  ];
  const index = buildGridIndex(items, [1, 2]);
  const reps = selectRepresentatives(index, new Map(items.map((item) => [item.id, item])));
  const density = estimateDensity(index);

  it('turns one level of representatives into candidates', () => {
    expect(selectLayoutCandidates(index, reps, density, { resolution: 2 })).toEqual([
      { id: 'r', row: 0, col: 0, density: 1 },
      { id: 'p', row: 1, col: 1, density: 2 / 3 },
    ]);
  });

  it('drops representatives below the density floor', () => {
    expect(selectLayoutCandidates(index, reps, density, { resolution: 2, minDensity: 0.9 }).map((c) => c.id)).toEqual(['r']);
  });

  it('rejects a resolution the index does not have', () => {
    expect(() => selectLayoutCandidates(index, reps, density, { resolution: 3 })).toThrow(ConfigurationError);
  });
});
