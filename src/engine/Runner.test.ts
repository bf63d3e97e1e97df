/**
 * Tests for Runner
 *
 * Key behaviors:
 * - history[0] is the initial grid, each later entry one pipeline pass
 * - run() records exactly `steps` snapshots and may only be called once
 * - a failing step leaves history at the last committed snapshot
 * - snapshots never alias the live grid
 */
import { describe, it, expect } from 'vitest';
import { Runner } from './Runner';
import { RulePipeline } from './RulePipeline';
import { Street } from './Street';
import { DummyShuffle } from './rules';
import type { Rule } from './rules';
import { ConfigurationError, RunnerStateError, ShapeOrCountMismatch } from './errors';
import type { Grid, ReadonlyGrid, RuleDescriptor, StreetConfig } from '../data/types';
import { cloneGrid } from '../utils/grid';

// =============================================================================
// Test Data
// =============================================================================

const config: StreetConfig = { lanes: 2, length: 30, carCount: 8, vMax: 5, seed: 42 };

const shuffle = () => new RulePipeline([new DummyShuffle()]);

/**
 * Broken rule that removes the first car it finds.
 */
class DropFirstCar implements Rule {
  readonly kind = 'dummy-shuffle';

  apply(grid: ReadonlyGrid): Grid {
    const next = cloneGrid(grid);
    for (const lane of next) {
      const index = lane.findIndex((cell) => cell >= 0);
      if (index >= 0) {
        lane[index] = -1;
        break;
      }
    }
    return next;
  }

  describe(): RuleDescriptor {
    return { kind: this.kind, params: {} };
  }
}

// =============================================================================
// Tests
// =============================================================================

describe('Runner', () => {
  describe('constructor', () => {
    it('starts uninitialized with an empty history', () => {
      const runner = new Runner(config, shuffle(), 10);
      expect(runner.state).toBe('uninitialized');
      expect(runner.history).toEqual([]);
      expect(runner.maxSteps).toBe(10);
    });

    it('validates the street config', () => {
      expect(() => new Runner({ ...config, carCount: 61 }, shuffle(), 10)).toThrow(ConfigurationError);
    });

    it('validates the step count', () => {
      expect(() => new Runner(config, shuffle(), -1)).toThrow(ConfigurationError);
      expect(() => new Runner(config, shuffle(), 2.5)).toThrow(ConfigurationError);
    });

    it('defaults to 250 steps', () => {
      expect(new Runner(config, shuffle()).maxSteps).toBe(250);
    });
  });

  describe('run', () => {
    it('records maxSteps snapshots', () => {
      const runner = new Runner(config, shuffle(), 10);
      runner.run();
      expect(runner.history).toHaveLength(10);
      expect(runner.state).toBe('completed');
    });

    it('records the unmodified initial grid first', () => {
      const runner = new Runner(config, shuffle(), 3);
      runner.run();
      expect(runner.history[0]).toEqual(new Street(config).read());
    });

    it('records one pipeline pass per later snapshot', () => {
      const runner = new Runner(config, shuffle(), 4);
      runner.run();
      const rule = new DummyShuffle();
      for (let t = 1; t < 4; t++) {
        expect(runner.history[t]).toEqual(rule.apply(runner.history[t - 1]));
      }
    });

    it('commits the last snapshot to the street without aliasing it', () => {
      const runner = new Runner(config, shuffle(), 5);
      runner.run();
      expect(runner.street.read()).toEqual(runner.history[4]);
      expect(runner.street.read()).not.toBe(runner.history[4]);
      expect(runner.history[0]).not.toBe(runner.history[1]);
    });

    it('records nothing for zero steps', () => {
      const runner = new Runner(config, shuffle(), 0);
      runner.run();
      expect(runner.history).toEqual([]);
      expect(runner.state).toBe('completed');
    });

    it('lets a call override the step count', () => {
      const runner = new Runner(config, shuffle(), 10);
      runner.run({ steps: 3 });
      expect(runner.history).toHaveLength(3);
    });

    it('rejects a second call', () => {
      const runner = new Runner(config, shuffle(), 3);
      runner.run();
      expect(() => runner.run()).toThrow(RunnerStateError);
      expect(runner.history).toHaveLength(3);
    });

    it('reports every committed step', () => {
      const runner = new Runner(config, shuffle(), 4);
      const seen: Array<[number, number]> = [];
      const states: string[] = [];
      runner.run({
        onStep: (step, _snapshot, total) => {
          seen.push([step, total]);
          states.push(runner.state);
        },
      });
      expect(seen).toEqual([
        [0, 4],
        [1, 4],
        [2, 4],
        [3, 4],
      ]);
      expect(states).toEqual(['running', 'running', 'running', 'running']);
    });

    it('keeps every committed snapshot in order across reads', () => {
      const runner = new Runner(config, shuffle(), 4);
      const committed: ReadonlyGrid[] = [];
      runner.run({ onStep: (_step, snapshot) => committed.push(snapshot) });

      const first = runner.history;
      runner.metricCarThroughput();
      runner.describe();
      const second = runner.history;

      expect(first).toHaveLength(4);
      first.forEach((snapshot, t) => expect(snapshot).toBe(committed[t]));
      expect(second).toEqual(first);
      expect(second.map((grid) => grid[0][0])).toEqual(committed.map((grid) => grid[0][0]));
    });

    it('stops between steps when aborted and keeps committed history', () => {
      const runner = new Runner(config, shuffle(), 10);
      const controller = new AbortController();
      runner.run({
        signal: controller.signal,
        onStep: (step) => {
          if (step === 2) controller.abort();
        },
      });
      expect(runner.history).toHaveLength(3);
      expect(runner.state).toBe('completed');
    });

    it('fails stop when a step breaks the car count', () => {
      const runner = new Runner(config, new RulePipeline([new DropFirstCar()]), 5);
      expect(() => runner.run()).toThrow(ShapeOrCountMismatch);
      expect(runner.history).toHaveLength(1);
      expect(runner.state).toBe('failed');
      expect(runner.street.read()).toEqual(runner.history[0]);
      expect(() => runner.run()).toThrow(RunnerStateError);
    });
  });

  describe('metrics', () => {
    it('are zero-filled before a run', () => {
      const runner = new Runner(config, shuffle(), 3);
      expect(runner.metricAverageRelativeSpeed()).toEqual([0, 0, 0]);
      expect(runner.metricCarThroughput()).toEqual([0, 0, 0]);
    });

    it('have one value per snapshot after a run', () => {
      const runner = new Runner(config, shuffle(), 6);
      runner.run();
      expect(runner.metricAverageRelativeSpeed()).toHaveLength(6);
      expect(runner.metricCarThroughput()).toHaveLength(6);
    });

    it('see constant speed under a pure rotation', () => {
      const runner = new Runner(config, shuffle(), 6);
      runner.run();
      const speeds = runner.metricAverageRelativeSpeed();
      for (const speed of speeds) {
        expect(speed).toBe(speeds[0]);
      }
    });
  });

  describe('describe', () => {
    it('summarizes parameters and progress', () => {
      const runner = new Runner(config, shuffle(), 4);
      runner.run();
      expect(runner.describe()).toEqual({
        street: config,
        rules: [{ kind: 'dummy-shuffle', params: { shift: 1 } }],
        maxSteps: 4,
        timesteps: 4,
        state: 'completed',
      });
    });
  });
});
