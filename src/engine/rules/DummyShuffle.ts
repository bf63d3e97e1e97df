/**
 * DummyShuffle - non-physical rule for tests and demos.
 * Rotates every lane by `shift` cells, so cars move without any traffic logic.
 */
import type { Grid, ReadonlyGrid, RuleDescriptor } from '../../data/types';
import { wrapIndex } from '../../utils/grid';
import type { Rule } from './Rule';
import { requireRuleInteger } from './Rule';

export class DummyShuffle implements Rule {
  readonly kind = 'dummy-shuffle';
  readonly shift: number;

  constructor(shift = 1) {
    requireRuleInteger(this.kind, 'shift', shift, 0);
    this.shift = shift;
  }

  apply(grid: ReadonlyGrid): Grid {
    return grid.map((row) => {
      const rotated = new Array<number>(row.length);
      row.forEach((cell, index) => {
        rotated[wrapIndex(index + this.shift, row.length)] = cell;
      });
      return rotated;
    });
  }

  describe(): RuleDescriptor {
    return { kind: this.kind, params: { shift: this.shift } };
  }
}
