/**
 * Error kinds raised by the simulation engine.
 *
 * Every failure is synchronous and final: the engine is deterministic, so an
 * error signals a configuration or logic bug rather than a transient fault.
 */

export type SimulationErrorCode =
  | 'CONFIGURATION'
  | 'SHAPE_OR_COUNT_MISMATCH'
  | 'CORRUPT_ARTIFACT'
  | 'VERSION_MISMATCH'
  | 'RUNNER_STATE';

export abstract class SimulationError extends Error {
  abstract readonly code: SimulationErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Invalid street parameters or rule descriptors */
export class ConfigurationError extends SimulationError {
  readonly code = 'CONFIGURATION';
}

/** A grid replacement with the wrong shape, cell values or car count */
export class ShapeOrCountMismatch extends SimulationError {
  readonly code = 'SHAPE_OR_COUNT_MISMATCH';
}

/** Artifact bytes that cannot be parsed into a run */
export class CorruptArtifact extends SimulationError {
  readonly code = 'CORRUPT_ARTIFACT';
}

/** Artifact that parses but contradicts its own declared configuration */
export class VersionMismatch extends SimulationError {
  readonly code = 'VERSION_MISMATCH';
}

/** Runner lifecycle violation, e.g. calling run() twice */
export class RunnerStateError extends SimulationError {
  readonly code = 'RUNNER_STATE';
}
