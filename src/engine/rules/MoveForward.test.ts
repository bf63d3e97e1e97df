import { describe, it, expect } from 'vitest';
import { MoveForward } from './MoveForward';
import { ShapeOrCountMismatch } from '../errors';

const E = -1;

describe('MoveForward', () => {
  it('advances each car by its velocity', () => {
    expect(new MoveForward().apply([[2, E, E, 0, E, E]])).toEqual([[E, E, 2, 0, E, E]]);
  });

  it('wraps at the end of the lane', () => {
    const grid = [[E, E, E, E, E, E, E, E, E, 3]];
    expect(new MoveForward().apply(grid)).toEqual([[E, E, 3, E, E, E, E, E, E, E]]);
  });

  it('moves every lane independently', () => {
    const grid = [
      [1, E, E],
      [E, 2, E],
    ];
    expect(new MoveForward().apply(grid)).toEqual([
      [E, 1, E],
      [2, E, E],
    ]);
  });

  it('rejects two cars landing on the same cell', () => {
    expect(() => new MoveForward().apply([[2, E, 0]])).toThrow(ShapeOrCountMismatch);
  });

  it('does not mutate its input', () => {
    const grid = [[1, E, E]];
    new MoveForward().apply(grid);
    expect(grid).toEqual([[1, E, E]]);
  });

  it('describes itself', () => {
    expect(new MoveForward().describe()).toEqual({ kind: 'move-forward', params: {} });
  });
});
