/**
 * Accelerate - every car below vMax speeds up by one.
 * No gap awareness; braking is left to a later rule in the pipeline.
 */
import type { Grid, ReadonlyGrid, RuleDescriptor } from '../../data/types';
import { isOccupied } from '../../utils/grid';
import type { Rule } from './Rule';
import { requireRuleInteger } from './Rule';

export class Accelerate implements Rule {
  readonly kind = 'accelerate';
  readonly vMax: number;

  constructor(vMax: number) {
    requireRuleInteger(this.kind, 'vMax', vMax, 1);
    this.vMax = vMax;
  }

  apply(grid: ReadonlyGrid): Grid {
    return grid.map((lane) =>
      lane.map((cell) => (isOccupied(cell) && cell < this.vMax ? cell + 1 : cell))
    );
  }

  describe(): RuleDescriptor {
    return { kind: this.kind, params: { vMax: this.vMax } };
  }
}
