/**
 * Simulation Configuration Constants
 *
 * Defaults match the original control panel:
 * - 1 lane of 250 cells with 20 cars
 * - vMax = 8 cells per timestep
 * - 20% dawdling probability
 * - 250 recorded timesteps, seed 42
 */

/**
 * Default street, rule and run parameters.
 */
export const SIMULATION_DEFAULTS = {
  LANES: 1,
  LENGTH: 250,
  CAR_COUNT: 20,
  V_MAX: 8,
  /** Probability that a moving car slows down by one in a timestep */
  DAWDLING_PROBABILITY: 0.2,
  /** Number of snapshots a run records, initial grid included */
  MAX_STEPS: 250,
  SEED: 42,
} as const;

/** Fraction of the lane, measured from its end, counted by the throughput metric */
export const THROUGHPUT_STRETCH = 0.1;

/** Physical length of one cell, used when projecting grids onto meters */
export const METERS_PER_CELL = 4;

/**
 * Persisted artifact identification.
 */
export const ARTIFACT_FORMAT = 'ca-traffic-run';
export const ARTIFACT_VERSION = 1;
