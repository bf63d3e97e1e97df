/**
 * Data Contract Types for the Cellular-Automaton Traffic Simulation
 *
 * These types define the grid state, the street configuration, rule
 * descriptors and the persisted run artifact. Everything that crosses a
 * module boundary or leaves the process is described here.
 */

// =============================================================================
// Grid
// =============================================================================

/**
 * A single cell value.
 * -1 means empty, any value v >= 0 is a car moving v cells per timestep.
 */
export type Cell = number;

/** Value stored in an empty cell */
export const EMPTY_CELL: Cell = -1;

/**
 * A lanes × length matrix of cells.
 * grid[lane][cell]. Lane 0 is the preferred ("rightmost") lane; the cell axis
 * wraps at `length`.
 */
export type Grid = Cell[][];

/** Read-only view of a grid, handed to rules and metric functions */
export type ReadonlyGrid = ReadonlyArray<ReadonlyArray<Cell>>;

/** Append-only sequence of grid snapshots, index 0 = initial grid */
export type History = ReadonlyArray<ReadonlyGrid>;

// =============================================================================
// Street configuration
// =============================================================================

/**
 * Parameters that fully determine the initial grid.
 */
export interface StreetConfig {
  /** Number of lanes (rows) */
  lanes: number;

  /** Number of cells per lane */
  length: number;

  /** Number of cars on the street; conserved across timesteps */
  carCount: number;

  /** Maximum velocity in cells per timestep */
  vMax: number;

  /** Seed of the placement/initial-velocity stream */
  seed: number;
}

// =============================================================================
// Rules
// =============================================================================

/** Every rule variant the pipeline knows how to build */
export type RuleKind =
  | 'accelerate'
  | 'dawdling'
  | 'avoid-collision'
  | 'break-or-take-over'
  | 'move-forward'
  | 'merge-back'
  | 'dummy-shuffle';

/**
 * Serializable description of a rule instance.
 * Rebuilding a rule from its descriptor yields a fresh instance with the
 * same parameters (and, for stochastic rules, a freshly seeded stream).
 */
export interface RuleDescriptor {
  kind: RuleKind;
  params: Record<string, number>;
}

// =============================================================================
// Persisted run (artifact)
// =============================================================================

/** Shape of a packed history: [timesteps, lanes, length] */
export type HistoryShape = [number, number, number];

/**
 * Compressed 3-D history block inside an artifact.
 */
export interface PackedHistory {
  shape: HistoryShape;

  /** Element type of the packed cells (little-endian) */
  dtype: 'int16';

  /** How `data` was produced from the packed cells */
  encoding: 'deflate-base64';

  data: string;
}

/**
 * Root structure of a serialized run.
 */
export interface RunArtifact {
  format: string;
  version: number;
  street: StreetConfig;
  maxSteps: number;
  rules: RuleDescriptor[];
  history: PackedHistory;
}

/**
 * One heatmap point: a cell projected onto meters along the lane.
 */
export interface HeatmapCell {
  lane: number;
  meter: number;
  /** -1 for empty, otherwise the car's velocity */
  speed: Cell;
}
