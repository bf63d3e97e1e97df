/**
 * RulePipeline - ordered sequence of rules applied once per timestep.
 *
 * Order is part of the model: each rule consumes the previous rule's output.
 * The canonical physical order is
 *   accelerate → brake/overtake → dawdle → move forward → merge back.
 */
import type { Grid, ReadonlyGrid, RuleDescriptor } from '../data/types';
import { cloneGrid } from '../utils/grid';
import { SIMULATION_DEFAULTS } from '../constants/simulation';
import type { Rule } from './rules';
import { Accelerate, BreakOrTakeOver, Dawdling, MergeBack, MoveForward, createRule } from './rules';

export class RulePipeline {
  readonly rules: readonly Rule[];

  constructor(rules: readonly Rule[]) {
    this.rules = [...rules];
  }

  /**
   * Rebuild a pipeline from descriptors, e.g. after loading an artifact.
   *
   * @throws ConfigurationError for an unknown kind or invalid params
   */
  static fromDescriptors(descriptors: readonly RuleDescriptor[]): RulePipeline {
    return new RulePipeline(descriptors.map(createRule));
  }

  get size(): number {
    return this.rules.length;
  }

  /**
   * Run one timestep. The result never aliases the input, even when the
   * pipeline is empty.
   */
  apply(grid: ReadonlyGrid): Grid {
    let state: Grid = cloneGrid(grid);
    for (const rule of this.rules) {
      state = rule.apply(state);
    }
    return state;
  }

  describe(): RuleDescriptor[] {
    return this.rules.map((rule) => rule.describe());
  }
}

// =============================================================================
// Canonical pipeline
// =============================================================================

/**
 * Rule toggles and parameters, one entry per control-panel checkbox.
 */
export interface PipelineOptions {
  vMax: number;
  seed: number;
  accelerate?: boolean;
  /** Brake for the car ahead, overtaking through the next lane when it is clear */
  avoidCollision?: boolean;
  dawdling?: boolean;
  dawdlingProbability?: number;
  moveForward?: boolean;
  mergeBack?: boolean;
}

/** Mixed into the street seed so dawdling draws differ from car placement */
const DAWDLING_SEED_SALT = 0x9e3779b9;

/**
 * Seed of the canonical Dawdling rule for a street seed. A stream seeded with
 * the street seed itself would replay the placement draws.
 */
export function dawdlingSeed(streetSeed: number): number {
  return streetSeed ^ DAWDLING_SEED_SALT;
}

/**
 * Assemble the enabled rules in canonical order. Every toggle defaults to on.
 *
 * @example
 * buildPipeline({ vMax: 5, seed: 1, mergeBack: false })
 * // Accelerate(5) → BreakOrTakeOver → Dawdling(0.2, dawdlingSeed(1)) → MoveForward
 */
export function buildPipeline(options: PipelineOptions): RulePipeline {
  const {
    vMax,
    seed,
    accelerate = true,
    avoidCollision = true,
    dawdling = true,
    dawdlingProbability = SIMULATION_DEFAULTS.DAWDLING_PROBABILITY,
    moveForward = true,
    mergeBack = true,
  } = options;

  const rules: Rule[] = [];
  if (accelerate) rules.push(new Accelerate(vMax));
  if (avoidCollision) rules.push(new BreakOrTakeOver());
  if (dawdling) rules.push(new Dawdling(dawdlingProbability, dawdlingSeed(seed)));
  if (moveForward) rules.push(new MoveForward());
  if (mergeBack) rules.push(new MergeBack());
  return new RulePipeline(rules);
}
