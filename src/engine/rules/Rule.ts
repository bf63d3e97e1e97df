/**
 * Rule - one state transformation of the cellular automaton.
 *
 * Contract for every implementation:
 * - apply() never mutates its input and returns a freshly owned grid
 * - the output has the same shape as the input
 * - the number of occupied cells is unchanged
 * - given the same input and the same owned random state, the output is the same
 */
import type { Grid, ReadonlyGrid, RuleDescriptor, RuleKind } from '../../data/types';
import { ConfigurationError } from '../errors';

export interface Rule {
  readonly kind: RuleKind;

  /** Transform one timestep's grid */
  apply(grid: ReadonlyGrid): Grid;

  /** Parameters needed to rebuild an equivalent fresh instance */
  describe(): RuleDescriptor;
}

/**
 * @throws ConfigurationError
 */
export function requireRuleInteger(kind: RuleKind, name: string, value: number, min: number): void {
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigurationError(`${kind}: ${name} must be an integer >= ${min}, got ${value}`);
  }
}
