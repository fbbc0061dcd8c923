/**
 * Input Normalizer
 *
 * Turns every accepted call shape into one NormalizedBatch:
 *
 * - scalar target + flat results/similarities      -> batch of one
 * - boxed scalar target + flat results/similarities -> batch of one
 * - array of targets + one row per target           -> batch of N
 *
 * All shape checks happen here, once, so the ranker and composer only ever
 * see equal-length rows of labels and finite numbers. Any mismatch throws a
 * TsrrError; nothing is truncated, padded or coerced.
 */

import type {
  BoxedLabel,
  Label,
  NormalizedBatch,
  ResultsInput,
  ScoringRow,
  SimilaritiesInput,
  TargetInput,
} from './types.js';
import { TsrrError, type InputName } from './errors.js';

// ============================================================================
// GUARDS (Internal)
// ============================================================================

/**
 * True for arrays and numeric typed arrays, the two sequence kinds a row can be.
 */
function isSequence(value: unknown): value is ArrayLike<unknown> {
  return Array.isArray(value) || (ArrayBuffer.isView(value) && !(value instanceof DataView));
}

function isBoxedLabel(value: unknown): value is BoxedLabel {
  return value instanceof String || value instanceof Number || value instanceof Boolean;
}

/**
 * A sequence is flat when none of its elements is itself a sequence.
 */
function isFlat(value: ArrayLike<unknown>): boolean {
  return !Array.from(value).some(isSequence);
}

/**
 * Unwrap a boxed primitive and confirm the value is a usable label.
 *
 * Returns undefined for anything that is not a string, number or boolean.
 */
function toLabel(value: unknown): Label | undefined {
  const unwrapped = isBoxedLabel(value) ? value.valueOf() : value;
  switch (typeof unwrapped) {
    case 'string':
    case 'number':
    case 'boolean':
      return unwrapped;
    default:
      return undefined;
  }
}

function labelRow(row: ArrayLike<unknown>, fail: (reason: string) => TsrrError): Label[] {
  return Array.from(row, (value) => {
    const label = toLabel(value);
    if (label === undefined) {
      throw fail(`labels must be strings, numbers or booleans, got ${typeof value}`);
    }
    return label;
  });
}

/**
 * Copy a similarity row into a plain array, rejecting non-finite entries.
 */
function similarityRow(row: ArrayLike<unknown>, rowIndex: number): number[] {
  return Array.from(row, (value, column) => {
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      throw TsrrError.invalidSimilarity(rowIndex, column, value);
    }
    return value;
  });
}

/**
 * Validate that an input is a sequence of flat rows and return the rows.
 */
function twoDimensional(value: unknown, name: InputName): ArrayLike<unknown>[] {
  if (!isSequence(value)) {
    throw TsrrError.dimension(`'${name}' must be a two-dimensional sequence`);
  }
  const rows = Array.from(value);
  for (const row of rows) {
    if (!isSequence(row) || !isFlat(row)) {
      throw TsrrError.dimension(`'${name}' must be a two-dimensional sequence`);
    }
  }
  return rows.filter(isSequence);
}

// ============================================================================
// NORMALIZERS
// ============================================================================

function normalizeSingle(target: Label, results: unknown, similarities: unknown): NormalizedBatch {
  if (!isSequence(results) || !isSequence(similarities) || !isFlat(results) || !isFlat(similarities)) {
    throw TsrrError.shape("both 'results' and 'similarities' must be one-dimensional sequences");
  }
  if (results.length !== similarities.length) {
    throw TsrrError.shape(
      `'results' and 'similarities' must have equal lengths (${results.length} vs ${similarities.length})`
    );
  }

  return {
    kind: 'single',
    rows: [
      {
        target,
        labels: labelRow(results, TsrrError.shape),
        similarities: similarityRow(similarities, 0),
      },
    ],
  };
}

function normalizeMany(
  targets: ArrayLike<unknown>,
  results: unknown,
  similarities: unknown
): NormalizedBatch {
  if (!isFlat(targets)) {
    throw TsrrError.dimension("'target' must be a one-dimensional sequence");
  }
  const targetLabels = labelRow(targets, TsrrError.dimension);

  const resultRows = twoDimensional(results, 'results');
  const similarityRows = twoDimensional(similarities, 'similarities');

  if (resultRows.length !== targetLabels.length) {
    throw TsrrError.rowCount('results', resultRows.length, targetLabels.length);
  }
  if (similarityRows.length !== targetLabels.length) {
    throw TsrrError.rowCount('similarities', similarityRows.length, targetLabels.length);
  }

  const rows: ScoringRow[] = targetLabels.map((target, index) => {
    const labels = resultRows[index];
    const scores = similarityRows[index];
    if (labels.length !== scores.length) {
      throw TsrrError.rowLength(index, labels.length, scores.length);
    }
    return {
      target,
      labels: labelRow(labels, TsrrError.dimension),
      similarities: similarityRow(scores, index),
    };
  });

  return { kind: 'batch', rows };
}

/**
 * Normalize any accepted tsrr() call shape into a batch of scoring rows.
 *
 * Inputs are typed for TypeScript callers but checked at runtime as well,
 * since rows often arrive from JSON or untyped code.
 *
 * @throws TsrrError for any shape, dimension, length or value problem
 *
 * @example
 * normalizeInput('a', ['b', 'a'], [0.9, 0.8])
 * // => { kind: 'single', rows: [{ target: 'a', labels: ['b', 'a'], similarities: [0.9, 0.8] }] }
 */
export function normalizeInput(
  target: TargetInput,
  results: ResultsInput,
  similarities: SimilaritiesInput
): NormalizedBatch {
  const candidate: unknown = target;

  if (isSequence(candidate)) {
    return normalizeMany(candidate, results, similarities);
  }

  const label = toLabel(candidate);
  if (label === undefined) {
    throw TsrrError.shape(`'target' must be a string, number or boolean, got ${typeof candidate}`);
  }
  return normalizeSingle(label, results, similarities);
}
