/**
 * Scoring Errors
 *
 * Every input the scorer cannot interpret is rejected synchronously with a
 * TsrrError. Nothing is coerced, truncated or padded, and no partial score
 * is returned.
 */

/**
 * Error codes for scoring and dataset failures.
 */
export const TsrrErrorCodes = {
  /** Single-target inputs are not both flat, or their lengths differ */
  SHAPE_MISMATCH: 'SHAPE_MISMATCH',
  /** Batch inputs are not two-dimensional, or the target list is nested */
  DIMENSION_MISMATCH: 'DIMENSION_MISMATCH',
  /** Number of result/similarity rows differs from the number of targets */
  ROW_COUNT_MISMATCH: 'ROW_COUNT_MISMATCH',
  /** A results row and its similarities row differ in length */
  ROW_LENGTH_MISMATCH: 'ROW_LENGTH_MISMATCH',
  /** A similarity is not a finite number */
  INVALID_SIMILARITY: 'INVALID_SIMILARITY',
  /** The expected-rank estimator received an impossible tie group */
  INVALID_TIE_COMPOSITION: 'INVALID_TIE_COMPOSITION',
  /** Unknown reduction or malformed options object */
  INVALID_OPTIONS: 'INVALID_OPTIONS',
  /** Evaluation dataset file has invalid JSON or schema */
  DATASET_INVALID: 'DATASET_INVALID',
} as const;

export type TsrrErrorCode = (typeof TsrrErrorCodes)[keyof typeof TsrrErrorCodes];

/** Which side of the input a row-level error refers to. */
export type InputName = 'results' | 'similarities';

/**
 * Error thrown by the scoring library.
 *
 * Use the static factories rather than the constructor so messages stay
 * consistent across call sites.
 */
export class TsrrError extends Error {
  public readonly code: TsrrErrorCode;

  constructor(code: TsrrErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TsrrError';
    this.code = code;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, TsrrError);
    }
  }

  /** Factory: single-target inputs are nested or of unequal length */
  static shape(reason: string): TsrrError {
    return new TsrrError(
      TsrrErrorCodes.SHAPE_MISMATCH,
      `For a single target, ${reason}`
    );
  }

  /** Factory: batch inputs have the wrong number of dimensions */
  static dimension(reason: string): TsrrError {
    return new TsrrError(
      TsrrErrorCodes.DIMENSION_MISMATCH,
      `For multiple targets, ${reason}`
    );
  }

  /** Factory: row count differs from target count */
  static rowCount(input: InputName, rows: number, targets: number): TsrrError {
    return new TsrrError(
      TsrrErrorCodes.ROW_COUNT_MISMATCH,
      `For multiple targets, '${input}' has ${rows} rows but there are ${targets} targets`
    );
  }

  /** Factory: a specific row pair differs in length */
  static rowLength(index: number, resultsLength: number, similaritiesLength: number): TsrrError {
    return new TsrrError(
      TsrrErrorCodes.ROW_LENGTH_MISMATCH,
      `Mismatch in lengths of rows at index ${index} between 'results' (${resultsLength}) and 'similarities' (${similaritiesLength})`
    );
  }

  /** Factory: NaN, an infinity or a non-number in a similarity row */
  static invalidSimilarity(row: number, column: number, value: unknown): TsrrError {
    return new TsrrError(
      TsrrErrorCodes.INVALID_SIMILARITY,
      `Similarity at row ${row}, column ${column} must be a finite number, got ${String(value)}`
    );
  }

  /** Factory: estimator preconditions violated */
  static tieComposition(irrelevant: number, relevant: number): TsrrError {
    return new TsrrError(
      TsrrErrorCodes.INVALID_TIE_COMPOSITION,
      `Invalid tie group composition: ${irrelevant} irrelevant and ${relevant} relevant items`
    );
  }

  /** Factory: options object failed validation */
  static invalidOptions(reason: string): TsrrError {
    return new TsrrError(TsrrErrorCodes.INVALID_OPTIONS, `Invalid options: ${reason}`);
  }

  /** Factory: dataset file failed to parse or validate */
  static datasetInvalid(reason: string, cause?: unknown): TsrrError {
    return new TsrrError(
      TsrrErrorCodes.DATASET_INVALID,
      `Invalid dataset: ${reason}`,
      { cause }
    );
  }
}
