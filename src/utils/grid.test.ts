/**
 * Tests for grid utilities
 */
import { describe, it, expect } from 'vitest';
import {
  createEmptyGrid,
  cloneGrid,
  wrapIndex,
  countCars,
  distanceToNextCar,
  gridsEqual,
  gridToHeatmapCells,
} from './grid';

describe('createEmptyGrid', () => {
  it('creates lanes × length empty cells', () => {
    expect(createEmptyGrid(2, 3)).toEqual([
      [-1, -1, -1],
      [-1, -1, -1],
    ]);
  });
});

describe('cloneGrid', () => {
  it('returns a deep copy', () => {
    const original = [
      [0, -1],
      [-1, 2],
    ];
    const copy = cloneGrid(original);
    copy[1][1] = 5;
    expect(original[1][1]).toBe(2);
    expect(copy[0]).not.toBe(original[0]);
  });
});

describe('wrapIndex', () => {
  it('wraps past the end of the lane', () => {
    expect(wrapIndex(12, 10)).toBe(2);
    expect(wrapIndex(10, 10)).toBe(0);
  });

  it('wraps negative indices', () => {
    expect(wrapIndex(-1, 10)).toBe(9);
  });

  it('leaves in-range indices alone', () => {
    expect(wrapIndex(4, 10)).toBe(4);
  });
});

describe('countCars', () => {
  it('counts occupied cells, including stopped cars', () => {
    expect(
      countCars([
        [0, -1, 3],
        [-1, -1, 5],
      ])
    ).toBe(3);
  });

  it('returns 0 for an empty grid', () => {
    expect(countCars(createEmptyGrid(3, 4))).toBe(0);
  });
});

describe('distanceToNextCar', () => {
  it('finds the nearest car within the window', () => {
    expect(distanceToNextCar([2, -1, -1, 0, -1], 0, 5)).toBe(3);
  });

  it('returns null when the window is clear', () => {
    expect(distanceToNextCar([2, -1, -1, 0, -1], 0, 2)).toBeNull();
  });

  it('scans across the end of the lane', () => {
    expect(distanceToNextCar([-1, 0, -1, -1, 3], 4, 3)).toBe(2);
  });
});

describe('gridsEqual', () => {
  it('compares cells', () => {
    expect(gridsEqual([[1, -1]], [[1, -1]])).toBe(true);
    expect(gridsEqual([[1, -1]], [[2, -1]])).toBe(false);
  });

  it('compares shapes', () => {
    expect(gridsEqual([[1, -1]], [[1, -1, -1]])).toBe(false);
    expect(gridsEqual([[1]], [[1], [1]])).toBe(false);
  });
});

describe('gridToHeatmapCells', () => {
  const grid = [
    [-1, 2],
    [3, -1],
  ];

  it('projects cells onto meters, 4 m per cell', () => {
    expect(gridToHeatmapCells(grid)).toEqual([
      { lane: 0, meter: 0, speed: -1 },
      { lane: 0, meter: 4, speed: 2 },
      { lane: 1, meter: 0, speed: 3 },
      { lane: 1, meter: 4, speed: -1 },
    ]);
  });

  it('emits every cell as empty when asked to', () => {
    expect(gridToHeatmapCells(grid, true).map((cell) => cell.speed)).toEqual([-1, -1, -1, -1]);
  });
});
