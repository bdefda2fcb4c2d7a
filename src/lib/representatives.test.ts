import { describe, expect, it } from 'vitest';
import type { MapItem } from './types';
import { buildGridIndex } from './spatial-grid';
import { selectRepresentatives, verifyHierarchy } from './representatives';

function makeItem(id: string, x: number, y: number): MapItem {
  return { id, x, y, metadata: {} };
}

function byId(items: MapItem[]): Map<string, MapItem> {
  return new Map(items.map((item) => [item.id, item]));
}

function scatter(count: number, seed: number): MapItem[] {
  let state = seed;
  const next = () => {
    state = (state * 1664525 + 1013904223) % 4294967296;
    return state / 4294967296;
  };
  // Squared to crowd one corner, so some cells are much fuller than others
  return Array.from({ length: count }, (_, i) => makeItem(`p${i}`, next() ** 2, next() ** 2));
}

// Three points crowd the top-left quadrant, two share the bottom-right one
const clustered = [
  makeItem('o', 0, 0),
  makeItem('q', 0.1, 0.1),
  makeItem('r', 0.2, 0.2),
  makeItem('p', 0.5, 0.5),
  makeItem('t', 1, 1),
];

describe('representative selection', () => {
  it('picks the member closest to each cell centre', () => {
    const items = [makeItem('a', 0, 0), makeItem('b', 0.1, 0.1), makeItem('c', 0.9, 0.9), makeItem('d', 0.95, 0.95)];
    const index = buildGridIndex(items, [2]);
    const reps = selectRepresentatives(index, byId(items));

    expect(Array.from(reps.get(2) ?? [])).toEqual([
      ['0,0', 'b'],
      ['1,1', 'c'],
    ]);
  });

  it('breaks distance ties by lowest id', () => {
    const items = [makeItem('b', 0, 0), makeItem('a', 1, 1)];
    const index = buildGridIndex(items, [1]);
    const reps = selectRepresentatives(index, byId(items));

    expect(reps.get(1)?.get('0,0')).toBe('a');
  });

  it('selects each level independently by default', () => {
    const index = buildGridIndex(clustered, [1, 2]);
    const reps = selectRepresentatives(index, byId(clustered));

    expect(Array.from(reps.keys())).toEqual([1, 2]);
    expect(reps.get(1)?.get('0,0')).toBe('p');
    expect(Array.from(reps.get(2) ?? [])).toEqual([
      ['0,0', 'r'],
      ['1,1', 'p'],
    ]);
  });

  it('propagates the most populated child upwards', () => {
    const index = buildGridIndex(clustered, [1, 2]);
    const reps = selectRepresentatives(index, byId(clustered), { hierarchy: 'propagate' });

    expect(Array.from(reps.keys())).toEqual([1, 2]);
    expect(reps.get(1)?.get('0,0')).toBe('r');
    expect(reps.get(2)?.get('0,0')).toBe('r');
  });

  it('breaks ties between children by column, then row', () => {
    const items = [
      makeItem('a1', 1, 0),
      makeItem('a2', 0.75, 0.25),
      makeItem('b1', 0, 1),
      makeItem('b2', 0.25, 0.75),
    ];
    const index = buildGridIndex(items, [1, 2]);
    const reps = selectRepresentatives(index, byId(items), { hierarchy: 'propagate' });

    expect(Array.from(reps.get(2) ?? [])).toEqual([
      ['1,0', 'a2'],
      ['0,1', 'b2'],
    ]);
    expect(reps.get(1)?.get('0,0')).toBe('b2');
  });

  it('uses the densest sub-cell for crowded cells', () => {
    const items = [
      makeItem('o', 0, 0),
      makeItem('u', 0.45, 0.45),
      makeItem('k1', 0.8, 0.8),
      makeItem('k2', 0.9, 0.9),
      makeItem('k3', 0.7, 0.95),
      makeItem('t', 1, 1),
    ];
    const index = buildGridIndex(items, [1]);

    const densest = selectRepresentatives(index, byId(items), { strategy: 'densest', denseThreshold: 3, miniGrid: 2 });
    expect(densest.get(1)?.get('0,0')).toBe('k1');

    const sparse = selectRepresentatives(index, byId(items), { strategy: 'densest' });
    expect(sparse.get(1)?.get('0,0')).toBe('u');
  });

  it('returns empty maps for every level when there are no items', () => {
    const index = buildGridIndex([], [2, 4]);
    const reps = selectRepresentatives(index, new Map());

    expect(Array.from(reps.keys())).toEqual([2, 4]);
    expect(Array.from(reps.values(), (level) => level.size)).toEqual([0, 0]);
  });
});

describe('representative hierarchy', () => {
  it.each(['independent', 'propagate'] as const)('holds membership and nesting in %s mode', (hierarchy) => {
    const items = scatter(400, 3);
    const index = buildGridIndex(items, [2, 4, 8, 16]);
    const reps = selectRepresentatives(index, byId(items), { hierarchy });

    for (const level of index.levels) {
      expect(reps.get(level.resolution)?.size).toBe(level.cells.size);
    }
    expect(verifyHierarchy(index, reps)).toEqual([]);
  });

  it('reports every kind of violation', () => {
    const index = buildGridIndex(clustered, [1, 2]);
    const reps = new Map([
      [1, new Map([['0,0', 'zzz']])],
      [
        2,
        new Map([
          ['0,0', 'r'],
          ['1,0', 'p'],
        ]),
      ],
    ]);

    expect(verifyHierarchy(index, reps)).toEqual([
      { resolution: 1, cellKey: '0,0', id: 'zzz', reason: 'representative is not a member of its cell' },
      { resolution: 1, cellKey: '0,0', id: 'zzz', reason: "representative lies outside the cell's children at 2" },
      { resolution: 2, cellKey: '1,0', id: 'p', reason: 'representative for an empty cell' },
      { resolution: 2, cellKey: '1,1', id: null, reason: 'populated cell without representative' },
    ]);
  });
});
