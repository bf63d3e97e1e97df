/**
 * Street - Grid state of the cellular automaton.
 *
 * Owns the lanes × length cell matrix and its topology. Cars are placed once
 * at construction from a seeded stream; afterwards the grid is only ever
 * replaced wholesale, and every replacement is checked against the
 * configured shape and car count.
 *
 * Key behaviors:
 * - Placement: carCount distinct cells drawn uniformly without replacement
 * - Initial velocities drawn uniformly from [0, vMax)
 * - Same config (seed included) always yields the same initial grid
 * - replace() rejects wrong shapes, out-of-range cells and lost/added cars
 */
import type { Grid, ReadonlyGrid, StreetConfig } from '../data/types';
import { EMPTY_CELL } from '../data/types';
import { SeededRandom } from '../utils/random';
import { cloneGrid, countCars } from '../utils/grid';
import { ConfigurationError, ShapeOrCountMismatch } from './errors';

// =============================================================================
// Validation
// =============================================================================

function requirePositiveInteger(name: string, value: number): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigurationError(`${name} must be a positive integer, got ${value}`);
  }
}

/**
 * Fail fast on a street config that cannot describe a valid grid.
 *
 * @throws ConfigurationError
 */
export function validateStreetConfig(config: StreetConfig): void {
  requirePositiveInteger('lanes', config.lanes);
  requirePositiveInteger('length', config.length);
  requirePositiveInteger('carCount', config.carCount);
  requirePositiveInteger('vMax', config.vMax);

  if (!Number.isInteger(config.seed)) {
    throw new ConfigurationError(`seed must be an integer, got ${config.seed}`);
  }

  const capacity = config.lanes * config.length;
  if (config.carCount > capacity) {
    throw new ConfigurationError(
      `carCount ${config.carCount} exceeds street capacity ${capacity} (${config.lanes} lanes × ${config.length} cells)`
    );
  }
}

/**
 * Build the initial grid for a config.
 * Velocities are drawn first, then the cell indices are shuffled, both from
 * the same seeded stream.
 */
export function initializeGrid(config: StreetConfig): Grid {
  const { lanes, length, carCount, vMax, seed } = config;
  const random = new SeededRandom(seed);

  const velocities: number[] = [];
  for (let i = 0; i < carCount; i++) {
    velocities.push(random.nextInt(vMax));
  }

  const indices = Array.from({ length: lanes * length }, (_, i) => i);
  random.shuffle(indices);

  const flat = new Array<number>(lanes * length).fill(EMPTY_CELL);
  for (let i = 0; i < carCount; i++) {
    flat[indices[i]] = velocities[i];
  }

  const grid: Grid = [];
  for (let lane = 0; lane < lanes; lane++) {
    grid.push(flat.slice(lane * length, (lane + 1) * length));
  }
  return grid;
}

// =============================================================================
// Street Class
// =============================================================================

/**
 * Usage:
 * ```ts
 * const street = new Street({ lanes: 2, length: 100, carCount: 20, vMax: 5, seed: 7 });
 * const next = pipeline.apply(street.read());
 * street.replace(next);
 * ```
 */
export class Street {
  readonly config: Readonly<StreetConfig>;
  private grid: Grid;

  /**
   * @throws ConfigurationError if the config is invalid
   */
  constructor(config: StreetConfig) {
    validateStreetConfig(config);
    this.config = Object.freeze({ ...config });
    this.grid = initializeGrid(this.config);
  }

  get lanes(): number {
    return this.config.lanes;
  }

  get length(): number {
    return this.config.length;
  }

  get carCount(): number {
    return this.config.carCount;
  }

  get vMax(): number {
    return this.config.vMax;
  }

  get seed(): number {
    return this.config.seed;
  }

  /**
   * Current grid. The returned value is the live state: callers that want
   * to mutate it must copy it first.
   */
  read(): ReadonlyGrid {
    return this.grid;
  }

  /**
   * Replace the whole grid. The street keeps its own copy, so the caller's
   * grid never aliases the live state.
   *
   * @throws ShapeOrCountMismatch if the shape, a cell value or the number of
   * cars does not match the config
   */
  replace(next: ReadonlyGrid): ReadonlyGrid {
    this.assertCompatible(next);
    this.grid = cloneGrid(next);
    return this.grid;
  }

  private assertCompatible(next: ReadonlyGrid): void {
    const { lanes, length, carCount, vMax } = this.config;

    if (next.length !== lanes) {
      throw new ShapeOrCountMismatch(`expected ${lanes} lanes, got ${next.length}`);
    }

    next.forEach((row, lane) => {
      if (row.length !== length) {
        throw new ShapeOrCountMismatch(`lane ${lane}: expected ${length} cells, got ${row.length}`);
      }
      row.forEach((cell, index) => {
        if (!Number.isInteger(cell) || cell < EMPTY_CELL || cell > vMax) {
          throw new ShapeOrCountMismatch(
            `cell [${lane}, ${index}] = ${cell} is outside [${EMPTY_CELL}, ${vMax}]`
          );
        }
      });
    });

    const cars = countCars(next);
    if (cars !== carCount) {
      throw new ShapeOrCountMismatch(`number of cars is inconsistent: expected ${carCount}, got ${cars}`);
    }
  }
}
