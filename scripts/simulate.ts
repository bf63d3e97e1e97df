/**
 * Run a traffic simulation from the command line.
 *
 * Builds a street and the canonical rule pipeline from flags, runs it,
 * prints the flow metrics and optionally exports the run artifact.
 *
 * Usage:
 *   npm run simulate -- --lanes 2 --length 250 --cars 40 --vmax 8 --steps 250
 *   npm run simulate -- --without merge-back --without dawdling --out run.bin
 *   npm run simulate -- --export
 *   npm run simulate -- --load run.bin
 *   npm run simulate -- --demo
 */

import * as fs from 'fs';
import * as path from 'path';
import { parseArgs } from 'util';
import {
  DummyShuffle,
  RulePipeline,
  Runner,
  SIMULATION_DEFAULTS,
  SimulationError,
  buildPipeline,
} from '../src';
import type { PipelineOptions, StreetConfig } from '../src';

// =============================================================================
// Configuration
// =============================================================================

const TOGGLES = ['accelerate', 'avoid-collision', 'dawdling', 'move-forward', 'merge-back'] as const;
type Toggle = (typeof TOGGLES)[number];

function isToggle(value: string): value is Toggle {
  return TOGGLES.some((toggle) => toggle === value);
}

const { values } = parseArgs({
  options: {
    lanes: { type: 'string' },
    length: { type: 'string' },
    cars: { type: 'string' },
    vmax: { type: 'string' },
    seed: { type: 'string' },
    steps: { type: 'string' },
    dawdling: { type: 'string' },
    without: { type: 'string', multiple: true },
    out: { type: 'string' },
    export: { type: 'boolean', default: false },
    load: { type: 'string' },
    demo: { type: 'boolean', default: false },
  },
});

function intFlag(name: string, raw: string | undefined, fallback: number): number {
  if (raw === undefined) return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value)) {
    throw new Error(`--${name} expects an integer, got "${raw}"`);
  }
  return value;
}

function floatFlag(name: string, raw: string | undefined, fallback: number): number {
  if (raw === undefined) return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new Error(`--${name} expects a number, got "${raw}"`);
  }
  return value;
}

/** traffic_jam_simulation_YYYYMMDD_HHMMSS.bin */
function defaultArtifactName(now: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  const date = `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}`;
  const time = `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;
  return `traffic_jam_simulation_${date}_${time}.bin`;
}

// =============================================================================
// Main
// =============================================================================

function mean(series: number[]): number {
  return series.length === 0 ? 0 : series.reduce((sum, x) => sum + x, 0) / series.length;
}

function report(runner: Runner): void {
  const summary = runner.describe();
  const speeds = runner.metricAverageRelativeSpeed();
  const throughput = runner.metricCarThroughput();

  console.log('\n' + '='.repeat(50));
  console.log('SIMULATION SUMMARY');
  console.log('='.repeat(50));
  console.log(`Street: ${summary.street.lanes} lanes × ${summary.street.length} cells, ${summary.street.carCount} cars`);
  console.log(`vMax: ${summary.street.vMax}, seed: ${summary.street.seed}`);
  console.log('Rules:');
  for (const rule of summary.rules) {
    console.log(`  - ${rule.kind} ${JSON.stringify(rule.params)}`);
  }
  console.log(`Timesteps: ${summary.timesteps}`);
  console.log(`Average relative speed: ${mean(speeds).toFixed(3)}`);
  console.log(`Average throughput: ${mean(throughput).toFixed(2)} cars`);
}

function main(): void {
  if (values.load) {
    const file = path.resolve(values.load);
    console.log(`[simulate] Loading ${file}`);
    const runner = Runner.deserialize(fs.readFileSync(file));
    report(runner);
    return;
  }

  const config: StreetConfig = {
    lanes: intFlag('lanes', values.lanes, SIMULATION_DEFAULTS.LANES),
    length: intFlag('length', values.length, SIMULATION_DEFAULTS.LENGTH),
    carCount: intFlag('cars', values.cars, SIMULATION_DEFAULTS.CAR_COUNT),
    vMax: intFlag('vmax', values.vmax, SIMULATION_DEFAULTS.V_MAX),
    seed: intFlag('seed', values.seed, SIMULATION_DEFAULTS.SEED),
  };
  const steps = intFlag('steps', values.steps, SIMULATION_DEFAULTS.MAX_STEPS);

  const disabled = new Set<Toggle>();
  for (const name of values.without ?? []) {
    if (!isToggle(name)) {
      throw new Error(`--without expects one of ${TOGGLES.join(', ')}, got "${name}"`);
    }
    disabled.add(name);
  }

  const options: PipelineOptions = {
    vMax: config.vMax,
    seed: config.seed,
    accelerate: !disabled.has('accelerate'),
    avoidCollision: !disabled.has('avoid-collision'),
    dawdling: !disabled.has('dawdling'),
    dawdlingProbability: floatFlag('dawdling', values.dawdling, SIMULATION_DEFAULTS.DAWDLING_PROBABILITY),
    moveForward: !disabled.has('move-forward'),
    mergeBack: !disabled.has('merge-back'),
  };
  const pipeline = values.demo ? new RulePipeline([new DummyShuffle()]) : buildPipeline(options);

  const runner = new Runner(config, pipeline, steps);
  const tick = Math.max(1, Math.floor(steps / 10));

  console.log('[simulate] Starting simulation');
  runner.run({
    onStep: (step, _snapshot, total) => {
      if ((step + 1) % tick === 0 || step + 1 === total) {
        console.log(`[simulate] ${step + 1}/${total} timesteps`);
      }
    },
  });
  console.log(`[simulate] Ended simulation after ${runner.history.length} steps`);

  report(runner);

  if (values.out !== undefined || values.export) {
    const file = path.resolve(values.out ?? defaultArtifactName(new Date()));
    fs.writeFileSync(file, runner.serialize());
    console.log(`\n[simulate] Wrote ${file}`);
  }
}

try {
  main();
} catch (error) {
  if (error instanceof SimulationError) {
    console.error(`[simulate] ${error.name}: ${error.message}`);
  } else {
    console.error('[simulate] Error:', error);
  }
  process.exit(1);
}
