/**
 * Input Normalizer Tests
 *
 * Covers every accepted call shape and every rejection path. Each error
 * test checks the TsrrError code and the exact message so callers can rely
 * on both.
 */

import { describe, it, expect } from 'vitest';
import { normalizeInput } from '../normalize.js';
import { TsrrError, TsrrErrorCodes } from '../errors.js';
import type { Label, ResultsInput, SimilaritiesInput, TargetInput } from '../types.js';

function captureError(fn: () => unknown): TsrrError {
  try {
    fn();
  } catch (error) {
    if (error instanceof TsrrError) return error;
    throw error;
  }
  throw new Error('Expected a TsrrError to be thrown');
}

// ============================================================================
// ACCEPTED SHAPES
// ============================================================================

describe('normalizeInput - single target', () => {
  it('wraps a scalar target into a batch of one', () => {
    expect(normalizeInput('a', ['b', 'a'], [0.9, 0.8])).toEqual({
      kind: 'single',
      rows: [{ target: 'a', labels: ['b', 'a'], similarities: [0.9, 0.8] }],
    });
  });

  it('unwraps a boxed string target', () => {
    const batch = normalizeInput(new String('a'), ['a'], [0.5]);

    expect(batch.rows[0]?.target).toBe('a');
    expect(typeof batch.rows[0]?.target).toBe('string');
  });

  it('unwraps a boxed number target', () => {
    const batch = normalizeInput(new Number(7), [7, 8], [0.5, 0.4]);

    expect(batch.rows[0]?.target).toBe(7);
  });

  it('copies typed-array similarities into a plain array', () => {
    const batch = normalizeInput('a', ['a', 'b'], new Float64Array([0.5, 0.25]));

    expect(batch.rows[0]?.similarities).toEqual([0.5, 0.25]);
    expect(Array.isArray(batch.rows[0]?.similarities)).toBe(true);
  });

  it('accepts numeric labels from a typed array', () => {
    const batch = normalizeInput(3, new Int32Array([1, 3]), [0.2, 0.1]);

    expect(batch.rows[0]?.labels).toEqual([1, 3]);
  });

  it('accepts empty rows', () => {
    expect(normalizeInput('a', [], [])).toEqual({
      kind: 'single',
      rows: [{ target: 'a', labels: [], similarities: [] }],
    });
  });
});

describe('normalizeInput - multiple targets', () => {
  it('pairs each target with its row', () => {
    expect(normalizeInput(['a', 'b'], [['a'], ['b', 'c']], [[1], [0.2, 0.3]])).toEqual({
      kind: 'batch',
      rows: [
        { target: 'a', labels: ['a'], similarities: [1] },
        { target: 'b', labels: ['b', 'c'], similarities: [0.2, 0.3] },
      ],
    });
  });

  it('accepts typed-array similarity rows', () => {
    const batch = normalizeInput(['a'], [['a', 'b']], [new Float32Array([0.5, 0.25])]);

    expect(batch.rows[0]?.similarities).toEqual([0.5, 0.25]);
  });

  it('treats an empty target list as an empty batch', () => {
    expect(normalizeInput([], [], [])).toEqual({ kind: 'batch', rows: [] });
  });

  it('allows rows of different lengths across targets', () => {
    const batch = normalizeInput(['a', 'b'], [['a'], ['x', 'y', 'b']], [[0.1], [0.3, 0.2, 0.1]]);

    expect(batch.rows.map((row) => row.labels.length)).toEqual([1, 3]);
  });
});

// ============================================================================
// REJECTIONS
// ============================================================================

describe('normalizeInput - shape errors', () => {
  it('rejects nested results for a single target', () => {
    const error = captureError(() => normalizeInput('a', [['a']], [0.5]));

    expect(error.code).toBe(TsrrErrorCodes.SHAPE_MISMATCH);
    expect(error.message).toBe(
      "For a single target, both 'results' and 'similarities' must be one-dimensional sequences"
    );
  });

  it('rejects nested similarities for a single target', () => {
    const error = captureError(() => normalizeInput('a', ['a'], [[0.5]]));

    expect(error.code).toBe(TsrrErrorCodes.SHAPE_MISMATCH);
  });

  it('rejects unequal lengths for a single target', () => {
    const error = captureError(() => normalizeInput('a', ['a', 'b'], [0.1]));

    expect(error.code).toBe(TsrrErrorCodes.SHAPE_MISMATCH);
    expect(error.message).toBe(
      "For a single target, 'results' and 'similarities' must have equal lengths (2 vs 1)"
    );
  });

  it('rejects a target that is not a label', () => {
    const target = { id: 1 } as unknown as TargetInput;
    const error = captureError(() => normalizeInput(target, ['a'], [0.1]));

    expect(error.code).toBe(TsrrErrorCodes.SHAPE_MISMATCH);
    expect(error.message).toBe("For a single target, 'target' must be a string, number or boolean, got object");
  });

  it('rejects a null candidate label', () => {
    const results = [null] as unknown as Label[];
    const error = captureError(() => normalizeInput('a', results, [0.1]));

    expect(error.code).toBe(TsrrErrorCodes.SHAPE_MISMATCH);
  });
});

describe('normalizeInput - dimension errors', () => {
  it('rejects a nested target list', () => {
    const target = [['a']] as unknown as TargetInput;
    const error = captureError(() => normalizeInput(target, [['a']], [[0.1]]));

    expect(error.code).toBe(TsrrErrorCodes.DIMENSION_MISMATCH);
    expect(error.message).toBe("For multiple targets, 'target' must be a one-dimensional sequence");
  });

  it('rejects one-dimensional results for a target list', () => {
    const error = captureError(() => normalizeInput(['a'], ['a'], [[0.1]]));

    expect(error.code).toBe(TsrrErrorCodes.DIMENSION_MISMATCH);
    expect(error.message).toBe("For multiple targets, 'results' must be a two-dimensional sequence");
  });

  it('rejects three-dimensional similarities', () => {
    const similarities = [[[0.1]]] as unknown as SimilaritiesInput;
    const error = captureError(() => normalizeInput(['a'], [['a']], similarities));

    expect(error.code).toBe(TsrrErrorCodes.DIMENSION_MISMATCH);
    expect(error.message).toBe("For multiple targets, 'similarities' must be a two-dimensional sequence");
  });

  it('rejects results that are not a sequence at all', () => {
    const results = 'abc' as unknown as ResultsInput;
    const error = captureError(() => normalizeInput(['a'], results, [[0.1]]));

    expect(error.code).toBe(TsrrErrorCodes.DIMENSION_MISMATCH);
  });
});

describe('normalizeInput - row errors', () => {
  it('rejects fewer results rows than targets', () => {
    const error = captureError(() => normalizeInput(['a', 'b'], [['a']], [[0.1], [0.2]]));

    expect(error.code).toBe(TsrrErrorCodes.ROW_COUNT_MISMATCH);
    expect(error.message).toBe("For multiple targets, 'results' has 1 rows but there are 2 targets");
  });

  it('rejects more similarities rows than targets', () => {
    const error = captureError(() => normalizeInput(['a'], [['a']], [[0.1], [0.2]]));

    expect(error.code).toBe(TsrrErrorCodes.ROW_COUNT_MISMATCH);
    expect(error.message).toBe("For multiple targets, 'similarities' has 2 rows but there are 1 targets");
  });

  it('names the index of a mismatched row pair', () => {
    const error = captureError(() =>
      normalizeInput(['a', 'b'], [['a'], ['b', 'c']], [[0.1], [0.2]])
    );

    expect(error.code).toBe(TsrrErrorCodes.ROW_LENGTH_MISMATCH);
    expect(error.message).toBe(
      "Mismatch in lengths of rows at index 1 between 'results' (2) and 'similarities' (1)"
    );
  });
});

describe('normalizeInput - similarity values', () => {
  it('rejects NaN', () => {
    const error = captureError(() => normalizeInput('a', ['a', 'b'], [0.5, NaN]));

    expect(error.code).toBe(TsrrErrorCodes.INVALID_SIMILARITY);
    expect(error.message).toBe('Similarity at row 0, column 1 must be a finite number, got NaN');
  });

  it('rejects infinities and reports the batch row', () => {
    const error = captureError(() =>
      normalizeInput(['a', 'b'], [['a'], ['b']], [[0.5], [Infinity]])
    );

    expect(error.code).toBe(TsrrErrorCodes.INVALID_SIMILARITY);
    expect(error.message).toBe('Similarity at row 1, column 0 must be a finite number, got Infinity');
  });

  it('rejects numeric strings', () => {
    const similarities = ['0.5'] as unknown as number[];
    const error = captureError(() => normalizeInput('a', ['a'], similarities));

    expect(error.code).toBe(TsrrErrorCodes.INVALID_SIMILARITY);
  });
});
