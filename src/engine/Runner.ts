/**
 * Runner - drives the cellular automaton through time.
 *
 * Owns the street, the rule pipeline and the history. Each timestep reads
 * the current grid, feeds it through the pipeline, commits the result to the
 * street and appends it to the history.
 *
 * Conventions (enforced by tests):
 * - history[0] is the unmodified initial grid; every later entry is one
 *   pipeline pass, so a run records exactly `steps` snapshots
 * - run() may be called once; a second call throws RunnerStateError
 * - a failing step leaves the history at the last committed snapshot
 * - history entries never alias the live grid or each other
 *
 * Usage:
 * ```ts
 * const runner = new Runner(config, buildPipeline({ vMax: 5, seed: 1 }), 250);
 * runner.run();
 * const speeds = runner.metricAverageRelativeSpeed();
 * const bytes = runner.serialize();
 * const restored = Runner.deserialize(bytes);
 * ```
 */
import type { History, ReadonlyGrid, RuleDescriptor, RunArtifact, StreetConfig } from '../data/types';
import { ARTIFACT_FORMAT, ARTIFACT_VERSION, SIMULATION_DEFAULTS } from '../constants/simulation';
import { cloneGrid } from '../utils/grid';
import { Street } from './Street';
import { RulePipeline } from './RulePipeline';
import { ConfigurationError, CorruptArtifact, RunnerStateError } from './errors';
import { metricAverageRelativeSpeed, metricCarThroughput } from './metrics';
import { assertHistoryMatchesStreet, decodeArtifact, encodeArtifact, packHistory, unpackHistory } from './persistence';

// =============================================================================
// Types
// =============================================================================

export type RunnerState = 'uninitialized' | 'running' | 'completed' | 'failed';

export interface RunOptions {
  /** Number of snapshots to record, initial grid included (defaults to maxSteps) */
  steps?: number;

  /**
   * Called after every committed snapshot. Useful for progress reporting or
   * for streaming snapshots elsewhere while the run is in progress.
   */
  onStep?: (step: number, snapshot: ReadonlyGrid, total: number) => void;

  /** Checked between timesteps; an aborted run keeps its committed history */
  signal?: AbortSignal;
}

/**
 * Parameter summary of a run, for display next to its results.
 */
export interface RunSummary {
  street: StreetConfig;
  rules: RuleDescriptor[];
  maxSteps: number;
  timesteps: number;
  state: RunnerState;
}

// =============================================================================
// Runner Class
// =============================================================================

export class Runner {
  readonly street: Street;
  readonly pipeline: RulePipeline;
  readonly maxSteps: number;

  private snapshots: ReadonlyGrid[];
  private currentState: RunnerState;

  /**
   * @param config - Street parameters; validated immediately
   * @param pipeline - Rules applied in order each timestep
   * @param maxSteps - Snapshots recorded by run(), initial grid included
   * @throws ConfigurationError for an invalid config or step count
   */
  constructor(
    config: StreetConfig,
    pipeline: RulePipeline,
    maxSteps: number = SIMULATION_DEFAULTS.MAX_STEPS
  ) {
    if (!Number.isInteger(maxSteps) || maxSteps < 0) {
      throw new ConfigurationError(`maxSteps must be a non-negative integer, got ${maxSteps}`);
    }
    this.street = new Street(config);
    this.pipeline = pipeline;
    this.maxSteps = maxSteps;
    this.snapshots = [];
    this.currentState = 'uninitialized';
  }

  get state(): RunnerState {
    return this.currentState;
  }

  /** Recorded snapshots, oldest first */
  get history(): History {
    return this.snapshots;
  }

  /**
   * Run the simulation.
   *
   * @throws RunnerStateError if this runner has already run or was restored
   * @throws ShapeOrCountMismatch if a step breaks the grid invariants
   */
  run(options: RunOptions = {}): void {
    if (this.currentState !== 'uninitialized') {
      throw new RunnerStateError(`run() called on a runner in state "${this.currentState}"`);
    }

    const total = options.steps ?? this.maxSteps;
    if (!Number.isInteger(total) || total < 0) {
      throw new ConfigurationError(`steps must be a non-negative integer, got ${total}`);
    }

    this.currentState = 'running';
    try {
      for (let step = 0; step < total; step++) {
        if (options.signal?.aborted) break;

        const snapshot = step === 0 ? cloneGrid(this.street.read()) : this.advance();
        this.snapshots.push(snapshot);
        options.onStep?.(step, snapshot, total);
      }
    } catch (error) {
      this.currentState = 'failed';
      throw error;
    }
    this.currentState = 'completed';
  }

  metricAverageRelativeSpeed(): number[] {
    return metricAverageRelativeSpeed(this.snapshots, this.street.vMax, this.maxSteps);
  }

  metricCarThroughput(): number[] {
    return metricCarThroughput(this.snapshots, this.maxSteps);
  }

  describe(): RunSummary {
    return {
      street: { ...this.street.config },
      rules: this.pipeline.describe(),
      maxSteps: this.maxSteps,
      timesteps: this.snapshots.length,
      state: this.currentState,
    };
  }

  // ===========================================================================
  // Persistence
  // ===========================================================================

  serialize(): Uint8Array {
    const artifact: RunArtifact = {
      format: ARTIFACT_FORMAT,
      version: ARTIFACT_VERSION,
      street: { ...this.street.config },
      maxSteps: this.maxSteps,
      rules: this.pipeline.describe(),
      history: packHistory(this.snapshots, this.street.lanes, this.street.length),
    };
    return encodeArtifact(artifact);
  }

  /**
   * Rebuild a completed runner from serialize() output. The street gets a
   * freshly derived initial grid and the rules fresh instances; the history
   * is restored verbatim.
   *
   * @throws CorruptArtifact
   * @throws VersionMismatch
   */
  static deserialize(bytes: Uint8Array): Runner {
    const artifact = decodeArtifact(bytes);

    let runner: Runner;
    try {
      runner = new Runner(artifact.street, RulePipeline.fromDescriptors(artifact.rules), artifact.maxSteps);
    } catch (error) {
      if (error instanceof ConfigurationError) {
        throw new CorruptArtifact(`artifact configuration is invalid: ${error.message}`, { cause: error });
      }
      throw error;
    }

    const history = unpackHistory(artifact.history);
    assertHistoryMatchesStreet(history, artifact.street);
    runner.snapshots = history;
    runner.currentState = 'completed';
    return runner;
  }

  /**
   * One pipeline pass over the live grid, committed to the street.
   */
  private advance(): ReadonlyGrid {
    const next = this.pipeline.apply(this.street.read());
    this.street.replace(next);
    return next;
  }
}
