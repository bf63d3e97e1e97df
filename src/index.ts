/**
 * Public surface of the traffic simulation engine.
 */
export type {
  Cell,
  Grid,
  ReadonlyGrid,
  History,
  StreetConfig,
  RuleKind,
  RuleDescriptor,
  RunArtifact,
  PackedHistory,
  HistoryShape,
  HeatmapCell,
} from './data/types';
export { EMPTY_CELL } from './data/types';
export * from './constants/simulation';
export * from './engine/errors';
export { Street, validateStreetConfig, initializeGrid } from './engine/Street';
export * from './engine/rules';
export { RulePipeline, buildPipeline, dawdlingSeed } from './engine/RulePipeline';
export type { PipelineOptions } from './engine/RulePipeline';
export { Runner } from './engine/Runner';
export type { RunnerState, RunOptions, RunSummary } from './engine/Runner';
export { relativeSpeed, throughput, metricAverageRelativeSpeed, metricCarThroughput } from './engine/metrics';
export { countCars, cloneGrid, gridsEqual, gridToHeatmapCells } from './utils/grid';
export { SeededRandom } from './utils/random';
export type { RandomSource } from './utils/random';
