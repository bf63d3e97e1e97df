/**
 * BreakOrTakeOver - collision avoidance with overtaking.
 *
 * Behaves like AvoidCollision, except that a blocked car first tries the
 * next lane up (lane + 1, the "left" lane). If that lane is empty at the
 * car's cell and over its whole forward window, the car changes lane at the
 * same cell index and keeps its full velocity instead of braking.
 *
 * Lanes are processed from 0 upward, so every car that arrives in a lane does
 * so before that lane's cars are braked. Arrivals are remembered per lane:
 * they are still braked against the lane's final occupancy, but they never
 * change lane a second time in the same timestep.
 */
import type { Grid, ReadonlyGrid, RuleDescriptor } from '../../data/types';
import { EMPTY_CELL } from '../../data/types';
import { cloneGrid, distanceToNextCar, isOccupied, wrapIndex } from '../../utils/grid';
import type { Rule } from './Rule';

/**
 * True when offsets 0..velocity from `index` are all empty.
 */
function isWindowClear(lane: ReadonlyArray<number>, index: number, velocity: number): boolean {
  for (let offset = 0; offset <= velocity; offset++) {
    if (isOccupied(lane[wrapIndex(index + offset, lane.length)])) {
      return false;
    }
  }
  return true;
}

export class BreakOrTakeOver implements Rule {
  readonly kind = 'break-or-take-over';

  apply(grid: ReadonlyGrid): Grid {
    const next = cloneGrid(grid);
    const arrived = next.map(() => new Set<number>());

    for (let lane = 0; lane < next.length; lane++) {
      const row = next[lane];
      const target = lane + 1 < next.length ? next[lane + 1] : null;

      for (let index = 0; index < row.length; index++) {
        const velocity = row[index];
        if (velocity <= 0) continue;

        const gap = distanceToNextCar(row, index, velocity);
        if (gap === null) continue;

        const canOvertake = !arrived[lane].has(index);
        if (canOvertake && target !== null && isWindowClear(target, index, velocity)) {
          target[index] = velocity;
          row[index] = EMPTY_CELL;
          arrived[lane + 1].add(index);
          continue;
        }

        row[index] = gap - 1;
      }
    }

    return next;
  }

  describe(): RuleDescriptor {
    return { kind: this.kind, params: {} };
  }
}
