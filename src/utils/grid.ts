/**
 * Grid Utilities
 *
 * Pure helpers over lanes × length cell matrices. None of these mutate their
 * input; every function that returns a grid returns a freshly owned one.
 */
import type { Grid, ReadonlyGrid, HeatmapCell } from '../data/types';
import { EMPTY_CELL } from '../data/types';
import { METERS_PER_CELL } from '../constants/simulation';

/**
 * Create a lanes × length grid with every cell empty.
 */
export function createEmptyGrid(lanes: number, length: number): Grid {
  const grid: Grid = [];
  for (let lane = 0; lane < lanes; lane++) {
    grid.push(new Array<number>(length).fill(EMPTY_CELL));
  }
  return grid;
}

/**
 * Deep copy of a grid.
 */
export function cloneGrid(grid: ReadonlyGrid): Grid {
  return grid.map((lane) => lane.slice());
}

/**
 * Map an index onto the toroidal cell axis.
 *
 * @example
 * wrapIndex(12, 10) // 2
 * wrapIndex(-1, 10) // 9
 */
export function wrapIndex(index: number, length: number): number {
  return ((index % length) + length) % length;
}

export function isOccupied(cell: number): boolean {
  return cell >= 0;
}

/**
 * Number of occupied cells in a grid.
 */
export function countCars(grid: ReadonlyGrid): number {
  let count = 0;
  for (const lane of grid) {
    for (const cell of lane) {
      if (isOccupied(cell)) count++;
    }
  }
  return count;
}

/**
 * Distance to the next occupied cell ahead of `index`, scanning at most
 * `maxDistance` cells with wrap-around. Returns null when the window is clear.
 */
export function distanceToNextCar(
  lane: ReadonlyArray<number>,
  index: number,
  maxDistance: number
): number | null {
  for (let d = 1; d <= maxDistance; d++) {
    if (isOccupied(lane[wrapIndex(index + d, lane.length)])) {
      return d;
    }
  }
  return null;
}

/**
 * Cell-by-cell equality of two grids (shape included).
 */
export function gridsEqual(a: ReadonlyGrid, b: ReadonlyGrid): boolean {
  if (a.length !== b.length) return false;
  for (let lane = 0; lane < a.length; lane++) {
    const rowA = a[lane];
    const rowB = b[lane];
    if (rowA.length !== rowB.length) return false;
    for (let i = 0; i < rowA.length; i++) {
      if (rowA[i] !== rowB[i]) return false;
    }
  }
  return true;
}

/**
 * Flatten a snapshot into heatmap points, one per cell, with the cell axis
 * projected onto meters.
 *
 * @param grid - Snapshot to project
 * @param empty - Emit every cell as empty (placeholder before a run exists)
 */
export function gridToHeatmapCells(grid: ReadonlyGrid, empty = false): HeatmapCell[] {
  const cells: HeatmapCell[] = [];
  grid.forEach((row, lane) => {
    row.forEach((cell, index) => {
      cells.push({
        lane,
        meter: index * METERS_PER_CELL,
        speed: empty ? EMPTY_CELL : cell,
      });
    });
  });
  return cells;
}
