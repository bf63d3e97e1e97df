/**
 * MergeBack - return to the preferred lane when there is room.
 *
 * Lanes are processed from 0 upward (the last lane has nothing above it).
 * An empty cell whose same-index neighbour in the next lane is occupied pulls
 * that car down. A cell takes part in at most one swap per timestep, so a
 * cell vacated by a pull is not refilled from the lane above in the same step.
 */
import type { Grid, ReadonlyGrid, RuleDescriptor } from '../../data/types';
import { EMPTY_CELL } from '../../data/types';
import { cloneGrid, isOccupied } from '../../utils/grid';
import type { Rule } from './Rule';

export class MergeBack implements Rule {
  readonly kind = 'merge-back';

  apply(grid: ReadonlyGrid): Grid {
    const next = cloneGrid(grid);
    const swapped = next.map(() => new Set<number>());

    for (let lane = 0; lane < next.length - 1; lane++) {
      const row = next[lane];
      const above = next[lane + 1];

      for (let index = 0; index < row.length; index++) {
        if (isOccupied(row[index]) || swapped[lane].has(index)) continue;
        if (!isOccupied(above[index])) continue;

        row[index] = above[index];
        above[index] = EMPTY_CELL;
        swapped[lane].add(index);
        swapped[lane + 1].add(index);
      }
    }

    return next;
  }

  describe(): RuleDescriptor {
    return { kind: this.kind, params: {} };
  }
}
