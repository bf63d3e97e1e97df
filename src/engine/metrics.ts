/**
 * Flow metrics derived from a run's history.
 *
 * Pure functions: one value per snapshot, in history order. An empty history
 * yields a zero-filled sequence of the runner's configured length so callers
 * can plot before a run exists.
 */
import type { History, ReadonlyGrid } from '../data/types';
import { THROUGHPUT_STRETCH } from '../constants/simulation';
import { isOccupied } from '../utils/grid';

/**
 * Mean velocity of the cars in one snapshot divided by vMax, in [0, 1].
 * A snapshot without cars scores 0.
 */
export function relativeSpeed(grid: ReadonlyGrid, vMax: number): number {
  let sum = 0;
  let cars = 0;
  for (const lane of grid) {
    for (const cell of lane) {
      if (isOccupied(cell)) {
        sum += cell;
        cars++;
      }
    }
  }
  return cars === 0 ? 0 : sum / cars / vMax;
}

/**
 * Number of cars in the last stretch of every lane (the final
 * floor(length × THROUGHPUT_STRETCH) cells). Lanes shorter than
 * 1 / THROUGHPUT_STRETCH cells have an empty stretch.
 */
export function throughput(grid: ReadonlyGrid): number {
  let count = 0;
  for (const lane of grid) {
    const stretch = Math.floor(lane.length * THROUGHPUT_STRETCH);
    for (let index = lane.length - stretch; index < lane.length; index++) {
      if (isOccupied(lane[index])) count++;
    }
  }
  return count;
}

export function metricAverageRelativeSpeed(history: History, vMax: number, emptyLength: number): number[] {
  if (history.length === 0) {
    return new Array<number>(emptyLength).fill(0);
  }
  return history.map((grid) => relativeSpeed(grid, vMax));
}

export function metricCarThroughput(history: History, emptyLength: number): number[] {
  if (history.length === 0) {
    return new Array<number>(emptyLength).fill(0);
  }
  return history.map(throughput);
}
