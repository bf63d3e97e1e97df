/**
 * Persistence codec for simulation runs.
 *
 * An artifact is a UTF-8 JSON document holding the street config, the rule
 * descriptors and the history. The history is packed as little-endian int16
 * cells in time → lane → cell order, deflated and base64 encoded.
 *
 * The initial grid is not stored: it is re-derived from the street seed.
 *
 * Failures:
 * - CorruptArtifact: bytes that do not parse into the documented layout
 * - VersionMismatch: an unsupported version, or a history that contradicts
 *   the declared street (shape, payload size, cell range, car count)
 */
import { deflateSync, inflateSync } from 'zlib';
import type {
  History,
  HistoryShape,
  PackedHistory,
  ReadonlyGrid,
  RuleDescriptor,
  RunArtifact,
  StreetConfig,
} from '../data/types';
import { EMPTY_CELL } from '../data/types';
import { countCars } from '../utils/grid';
import { ARTIFACT_FORMAT, ARTIFACT_VERSION } from '../constants/simulation';
import { CorruptArtifact, VersionMismatch } from './errors';
import { isRuleKind } from './rules';

const BYTES_PER_CELL = 2;

// =============================================================================
// History packing
// =============================================================================

/**
 * Pack a history into a compressed 3-D int16 block.
 */
export function packHistory(history: History, lanes: number, length: number): PackedHistory {
  const shape: HistoryShape = [history.length, lanes, length];
  const view = new DataView(new ArrayBuffer(history.length * lanes * length * BYTES_PER_CELL));

  let offset = 0;
  for (const grid of history) {
    for (const row of grid) {
      for (const cell of row) {
        view.setInt16(offset, cell, true);
        offset += BYTES_PER_CELL;
      }
    }
  }

  const compressed = deflateSync(new Uint8Array(view.buffer));
  return {
    shape,
    dtype: 'int16',
    encoding: 'deflate-base64',
    data: compressed.toString('base64'),
  };
}

/**
 * Inverse of packHistory.
 *
 * @throws CorruptArtifact if the payload cannot be inflated
 * @throws VersionMismatch if the payload size does not match the shape
 */
export function unpackHistory(packed: PackedHistory): ReadonlyGrid[] {
  const [steps, lanes, length] = packed.shape;

  let raw: Buffer;
  try {
    raw = inflateSync(Buffer.from(packed.data, 'base64'));
  } catch (error) {
    throw new CorruptArtifact('history payload could not be inflated', { cause: error });
  }

  const expectedBytes = steps * lanes * length * BYTES_PER_CELL;
  if (raw.length !== expectedBytes) {
    throw new VersionMismatch(
      `history payload holds ${raw.length} bytes, shape [${packed.shape.join(', ')}] needs ${expectedBytes}`
    );
  }

  const view = new DataView(raw.buffer, raw.byteOffset, raw.byteLength);
  const history: ReadonlyGrid[] = [];
  let offset = 0;
  for (let t = 0; t < steps; t++) {
    const grid: number[][] = [];
    for (let lane = 0; lane < lanes; lane++) {
      const row: number[] = [];
      for (let index = 0; index < length; index++) {
        row.push(view.getInt16(offset, true));
        offset += BYTES_PER_CELL;
      }
      grid.push(row);
    }
    history.push(grid);
  }
  return history;
}

// =============================================================================
// Artifact encode / decode
// =============================================================================

export function encodeArtifact(artifact: RunArtifact): Uint8Array {
  return new TextEncoder().encode(JSON.stringify(artifact));
}

/**
 * Parse and structurally validate artifact bytes.
 *
 * @throws CorruptArtifact
 * @throws VersionMismatch
 */
export function decodeArtifact(bytes: Uint8Array): RunArtifact {
  let parsed: unknown;
  try {
    parsed = JSON.parse(new TextDecoder('utf-8', { fatal: true }).decode(bytes));
  } catch (error) {
    throw new CorruptArtifact('artifact is not UTF-8 JSON', { cause: error });
  }

  if (!isRecord(parsed)) {
    throw new CorruptArtifact('artifact root must be an object');
  }
  if (parsed.format !== ARTIFACT_FORMAT) {
    throw new CorruptArtifact(`unexpected artifact format ${JSON.stringify(parsed.format)}`);
  }
  const version = readInteger(parsed, 'version');
  if (version !== ARTIFACT_VERSION) {
    throw new VersionMismatch(`unsupported artifact version ${version}, expected ${ARTIFACT_VERSION}`);
  }

  const street = readStreet(parsed.street);
  const artifact: RunArtifact = {
    format: ARTIFACT_FORMAT,
    version,
    street,
    maxSteps: readInteger(parsed, 'maxSteps'),
    rules: readRules(parsed.rules),
    history: readPackedHistory(parsed.history),
  };

  const [, lanes, length] = artifact.history.shape;
  if (lanes !== street.lanes || length !== street.length) {
    throw new VersionMismatch(
      `history shape [${artifact.history.shape.join(', ')}] contradicts street ${street.lanes} × ${street.length}`
    );
  }
  return artifact;
}

/**
 * Check every restored snapshot against the declared street: each cell in
 * the velocity range and exactly `carCount` cars per snapshot.
 *
 * @throws VersionMismatch
 */
export function assertHistoryMatchesStreet(history: History, street: StreetConfig): void {
  history.forEach((grid, t) => {
    for (const row of grid) {
      for (const cell of row) {
        if (cell < EMPTY_CELL || cell > street.vMax) {
          throw new VersionMismatch(`history[${t}] holds cell value ${cell} outside [${EMPTY_CELL}, ${street.vMax}]`);
        }
      }
    }
    const cars = countCars(grid);
    if (cars !== street.carCount) {
      throw new VersionMismatch(`history[${t}] holds ${cars} cars, street declares ${street.carCount}`);
    }
  });
}

// =============================================================================
// Field readers
// =============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isDimension(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0;
}

function readInteger(record: Record<string, unknown>, key: string): number {
  const value = record[key];
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    throw new CorruptArtifact(`field "${key}" must be an integer`);
  }
  return value;
}

function readStreet(value: unknown): StreetConfig {
  if (!isRecord(value)) {
    throw new CorruptArtifact('field "street" must be an object');
  }
  return {
    lanes: readInteger(value, 'lanes'),
    length: readInteger(value, 'length'),
    carCount: readInteger(value, 'carCount'),
    vMax: readInteger(value, 'vMax'),
    seed: readInteger(value, 'seed'),
  };
}

function readRules(value: unknown): RuleDescriptor[] {
  if (!Array.isArray(value)) {
    throw new CorruptArtifact('field "rules" must be an array');
  }
  return value.map((entry: unknown, i) => {
    if (!isRecord(entry) || typeof entry.kind !== 'string' || !isRecord(entry.params)) {
      throw new CorruptArtifact(`rules[${i}] must be { kind, params }`);
    }
    const kind = entry.kind;
    if (!isRuleKind(kind)) {
      throw new CorruptArtifact(`rules[${i}] has unknown kind "${kind}"`);
    }
    const params: Record<string, number> = {};
    for (const [name, param] of Object.entries(entry.params)) {
      if (typeof param !== 'number') {
        throw new CorruptArtifact(`rules[${i}].params.${name} must be a number`);
      }
      params[name] = param;
    }
    return { kind, params };
  });
}

function readPackedHistory(value: unknown): PackedHistory {
  if (!isRecord(value)) {
    throw new CorruptArtifact('field "history" must be an object');
  }
  const { shape, dtype, encoding, data } = value;
  if (dtype !== 'int16' || encoding !== 'deflate-base64') {
    throw new CorruptArtifact(`unsupported history encoding ${String(dtype)}/${String(encoding)}`);
  }
  if (typeof data !== 'string') {
    throw new CorruptArtifact('field "history.data" must be a string');
  }
  if (!Array.isArray(shape) || shape.length !== 3) {
    throw new CorruptArtifact('field "history.shape" must be [steps, lanes, length]');
  }
  const dims: unknown[] = shape;
  const [steps, lanes, length] = dims;
  if (!isDimension(steps) || !isDimension(lanes) || !isDimension(length)) {
    throw new CorruptArtifact('field "history.shape" must hold non-negative integers');
  }
  return { shape: [steps, lanes, length], dtype, encoding, data };
}
