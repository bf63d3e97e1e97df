import { describe, it, expect } from 'vitest';
import { MergeBack } from './MergeBack';

const E = -1;

describe('MergeBack', () => {
  it('pulls a car down into an empty cell of the lane below', () => {
    const grid = [
      [E, 3, E],
      [2, 4, E],
    ];
    expect(new MergeBack().apply(grid)).toEqual([
      [2, 3, E],
      [E, 4, E],
    ]);
  });

  it('leaves a single lane unchanged', () => {
    const grid = [[E, 3, E, 0]];
    expect(new MergeBack().apply(grid)).toEqual(grid);
  });

  it('swaps each cell at most once per timestep', () => {
    const grid = [[E], [5], [6]];
    expect(new MergeBack().apply(grid)).toEqual([[5], [E], [6]]);
  });

  it('processes lanes from the bottom up', () => {
    const grid = [
      [E, E],
      [1, E],
      [2, 3],
    ];
    expect(new MergeBack().apply(grid)).toEqual([
      [1, E],
      [E, 3],
      [2, E],
    ]);
  });

  it('does not mutate its input', () => {
    const grid = [[E], [5]];
    new MergeBack().apply(grid);
    expect(grid).toEqual([[E], [5]]);
  });

  it('describes itself', () => {
    expect(new MergeBack().describe()).toEqual({ kind: 'merge-back', params: {} });
  });
});
