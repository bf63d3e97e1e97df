/**
 * Dawdling - random slow-down modelling driver hesitation.
 *
 * Each moving car loses one unit of velocity with probability p. The random
 * stream is created once from the seed and advances across timesteps; it is
 * never reseeded between calls. Stationary cars do not consume a draw.
 */
import type { Grid, ReadonlyGrid, RuleDescriptor } from '../../data/types';
import { SeededRandom } from '../../utils/random';
import type { RandomSource } from '../../utils/random';
import { ConfigurationError } from '../errors';
import type { Rule } from './Rule';

export class Dawdling implements Rule {
  readonly kind = 'dawdling';
  readonly probability: number;
  readonly seed: number;
  private random: RandomSource;

  /**
   * @param probability - Chance in [0, 1] that a moving car slows down
   * @param seed - Seed of this rule's private stream
   * @param random - Stream to draw from instead of one seeded from `seed`
   */
  constructor(probability: number, seed: number, random?: RandomSource) {
    if (!Number.isFinite(probability) || probability < 0 || probability > 1) {
      throw new ConfigurationError(`dawdling: probability must be in [0, 1], got ${probability}`);
    }
    if (!Number.isInteger(seed)) {
      throw new ConfigurationError(`dawdling: seed must be an integer, got ${seed}`);
    }
    this.probability = probability;
    this.seed = seed;
    this.random = random ?? new SeededRandom(seed);
  }

  apply(grid: ReadonlyGrid): Grid {
    return grid.map((lane) =>
      lane.map((cell) => {
        if (cell > 0 && this.random.next() < this.probability) {
          return cell - 1;
        }
        return cell;
      })
    );
  }

  describe(): RuleDescriptor {
    return { kind: this.kind, params: { probability: this.probability, seed: this.seed } };
  }
}
