/**
 * MoveForward - advance every car by its velocity, wrapping at the lane end.
 *
 * Expects a braking rule earlier in the pipeline: if two cars still target
 * the same cell, the step is rejected rather than silently losing a car.
 */
import type { Grid, ReadonlyGrid, RuleDescriptor } from '../../data/types';
import { createEmptyGrid, isOccupied, wrapIndex } from '../../utils/grid';
import { ShapeOrCountMismatch } from '../errors';
import type { Rule } from './Rule';

export class MoveForward implements Rule {
  readonly kind = 'move-forward';

  apply(grid: ReadonlyGrid): Grid {
    const lanes = grid.length;
    const length = lanes > 0 ? grid[0].length : 0;
    const next = createEmptyGrid(lanes, length);

    grid.forEach((row, lane) => {
      row.forEach((velocity, index) => {
        if (!isOccupied(velocity)) return;

        const destination = wrapIndex(index + velocity, length);
        if (isOccupied(next[lane][destination])) {
          throw new ShapeOrCountMismatch(
            `two cars collide at lane ${lane}, cell ${destination}; is a braking rule missing before move-forward?`
          );
        }
        next[lane][destination] = velocity;
      });
    });

    return next;
  }

  describe(): RuleDescriptor {
    return { kind: this.kind, params: {} };
  }
}
