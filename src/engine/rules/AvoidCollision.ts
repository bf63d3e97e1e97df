/**
 * AvoidCollision - brake to stop one cell short of the car ahead.
 *
 * A car with velocity v looks v cells ahead (wrapping around the lane). If the
 * nearest car is d cells away with d <= v, its velocity becomes d - 1.
 */
import type { Grid, ReadonlyGrid, RuleDescriptor } from '../../data/types';
import { distanceToNextCar } from '../../utils/grid';
import type { Rule } from './Rule';

export class AvoidCollision implements Rule {
  readonly kind = 'avoid-collision';

  apply(grid: ReadonlyGrid): Grid {
    return grid.map((lane) =>
      lane.map((cell, index) => {
        if (cell <= 0) return cell;
        const gap = distanceToNextCar(lane, index, cell);
        return gap === null ? cell : gap - 1;
      })
    );
  }

  describe(): RuleDescriptor {
    return { kind: this.kind, params: {} };
  }
}
