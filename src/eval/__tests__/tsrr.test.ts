/**
 * TsRR Tests
 *
 * Worked scores are traced by hand from the formula in tsrr.ts; the
 * generated-row tests check properties that must hold for any input.
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { ALPHA_DEPRECATION_WARNING, explainTsrr, meanScore, tsrr } from '../tsrr.js';
import { TsrrError, TsrrErrorCodes } from '../errors.js';
import { createRng, randomRow, shuffleRow } from '../../test-utils/index.js';
import { silentLogger } from '../../utils/logger.js';
import type { TsrrOptions } from '../types.js';

afterEach(() => {
  vi.restoreAllMocks();
});

// ============================================================================
// WORKED SCORES
// ============================================================================

describe('tsrr - single target', () => {
  it('scores an untied first place as 1', () => {
    expect(tsrr('label1', ['label2', 'label1', 'label3'], [0.8, 0.9, 0.7])).toBe(1);
  });

  it('scores a fully contaminated two-way tie as 0.5', () => {
    expect(tsrr('A', ['A', 'B'], [0.9, 0.9])).toBe(0.5);
  });

  it('scores an absent target as 0', () => {
    expect(tsrr('X', ['label2', 'label1'], [0.8, 0.9])).toBe(0);
  });

  it('scores an empty row as 0', () => {
    expect(tsrr('a', [], [])).toBe(0);
  });

  it('blends expected and worst in-tie positions by tau', () => {
    // r_pre = 1, tie {a, b}, tau = 1/3: E_tau = 2/3 * 1.5 + 1/3 * 2 = 5/3
    expect(tsrr('a', ['x', 'a', 'b', 'c'], [0.9, 0.5, 0.5, 0.1])).toBeCloseTo(0.375, 12);
  });

  it('accounts for several relevant items in the tie', () => {
    // tie {a, a, b}, k = 2, ns = 1, tau = 1/2: E_tau = 1/2 * 4/3 + 1/2 * 2 = 5/3
    expect(tsrr('a', ['a', 'a', 'b', 'c'], [0.7, 0.7, 0.7, 0.2])).toBeCloseTo(0.6, 12);
  });

  it('equals the reciprocal rank when there are no ties', () => {
    expect(tsrr('c', ['a', 'b', 'c', 'd'], [0.9, 0.8, 0.7, 0.6])).toBeCloseTo(1 / 3, 12);
  });

  it('accepts typed arrays and numeric labels', () => {
    // tie {1, 3} at 0.5 holds every irrelevant item, so tau = 1
    expect(tsrr(3, new Int32Array([1, 3, 3]), new Float32Array([0.5, 0.5, 0.25]))).toBe(0.5);
  });

  it('accepts a boxed target', () => {
    expect(tsrr(new String('A'), ['A', 'B'], [0.9, 0.9])).toBe(0.5);
  });

  it('does not match labels of different types', () => {
    expect(tsrr(1, ['1'], [0.9])).toBe(0);
  });
});

describe('tsrr - multiple targets', () => {
  const targets = ['label1', 'A', 'X'];
  const results = [
    ['label2', 'label1', 'label3'],
    ['A', 'B'],
    ['label2', 'label1'],
  ];
  const similarities = [
    [0.8, 0.9, 0.7],
    [0.9, 0.9],
    [0.8, 0.9],
  ];

  it('returns one score per target with reduction none', () => {
    expect(tsrr(targets, results, similarities, { reduction: 'none' })).toEqual([1, 0.5, 0]);
  });

  it('averages scores by default', () => {
    expect(tsrr(targets, results, similarities)).toBe(0.5);
    expect(tsrr(targets, results, similarities, { reduction: 'mean' })).toBe(0.5);
  });

  it('returns 0 and an empty list for an empty batch', () => {
    expect(tsrr([], [], [])).toBe(0);
    expect(tsrr([], [], [], { reduction: 'none' })).toEqual([]);
  });

  it('scores each row independently of the others', () => {
    const alone = tsrr(['A'], [['A', 'B']], [[0.9, 0.9]], { reduction: 'none' });
    const together = tsrr(targets, results, similarities, { reduction: 'none' });

    expect(together[1]).toBe(alone[0]);
  });

  it('returns a one-element list for a batch of one', () => {
    expect(tsrr(['A'], [['A', 'B']], [[0.9, 0.9]], { reduction: 'none' })).toEqual([0.5]);
  });
});

// ============================================================================
// PROPERTIES OVER GENERATED ROWS
// ============================================================================

describe('tsrr - properties', () => {
  const rng = createRng(20240611);
  const rows = Array.from({ length: 60 }, () => randomRow(rng));

  it('stays within [0, 1] and is 0 exactly when the target is absent', () => {
    for (const row of rows) {
      const score = tsrr(row.target, row.labels, row.similarities);
      expect(score).toBeGreaterThanOrEqual(0);
      expect(score).toBeLessThanOrEqual(1);
      expect(score === 0).toBe(!row.labels.includes(row.target));
    }
  });

  it('does not depend on the order candidates are supplied in', () => {
    for (const row of rows) {
      const shuffled = shuffleRow(row, rng);
      expect(tsrr(shuffled.target, shuffled.labels, shuffled.similarities)).toBe(
        tsrr(row.target, row.labels, row.similarities)
      );
    }
  });

  it('averages the per-target scores under reduction mean', () => {
    const targets = rows.map((row) => row.target);
    const labels = rows.map((row) => row.labels);
    const sims = rows.map((row) => row.similarities);
    const scores = tsrr(targets, labels, sims, { reduction: 'none' });

    expect(tsrr(targets, labels, sims)).toBeCloseTo(meanScore(scores), 12);
  });

  it('reduces to 1 / (r_pre + 1) when every similarity is distinct', () => {
    const distinctRng = createRng(7);
    for (let n = 0; n < 20; n++) {
      const row = randomRow(distinctRng, { length: 6, levels: 1 });
      const similarities = row.labels.map((_, index) => 1 - index / 10);
      const [breakdown] = explainTsrr(row.target, row.labels, similarities);

      if (breakdown?.found) {
        expect(breakdown.score).toBeCloseTo(1 / (breakdown.rPre + 1), 12);
      }
    }
  });
});

// ============================================================================
// BREAKDOWN
// ============================================================================

describe('explainTsrr', () => {
  it('reports every intermediate quantity', () => {
    expect(explainTsrr('A', ['A', 'B'], [0.9, 0.9])).toEqual([
      {
        target: 'A',
        found: true,
        rPre: 0,
        tieSize: 2,
        relevantInTie: 1,
        irrelevantInTie: 1,
        total: 2,
        relevantTotal: 1,
        irrelevantTotal: 1,
        tau: 1,
        expectedInTie: 1.5,
        worstInTie: 2,
        blendedInTie: 2,
        score: 0.5,
      },
    ]);
  });

  it('reports an absent target with zero counts', () => {
    expect(explainTsrr('X', ['label2', 'label1'], [0.8, 0.9])).toEqual([
      {
        target: 'X',
        found: false,
        rPre: 0,
        tieSize: 0,
        relevantInTie: 0,
        irrelevantInTie: 0,
        total: 2,
        relevantTotal: 0,
        irrelevantTotal: 2,
        tau: 0,
        expectedInTie: 0,
        worstInTie: 0,
        blendedInTie: 0,
        score: 0,
      },
    ]);
  });
});

// ============================================================================
// OPTIONS
// ============================================================================

describe('tsrr - options', () => {
  it('warns once through the injected logger when alpha is given', () => {
    const logger = { warn: vi.fn() };

    const score = tsrr('A', ['A', 'B'], [0.9, 0.9], { alpha: 0.5, logger });

    expect(score).toBe(0.5);
    expect(logger.warn).toHaveBeenCalledTimes(1);
    expect(logger.warn).toHaveBeenCalledWith(ALPHA_DEPRECATION_WARNING);
  });

  it('ignores the value of alpha', () => {
    const withAlpha = tsrr('a', ['x', 'a', 'b', 'c'], [0.9, 0.5, 0.5, 0.1], {
      alpha: 0.9,
      logger: silentLogger,
    });

    expect(withAlpha).toBe(tsrr('a', ['x', 'a', 'b', 'c'], [0.9, 0.5, 0.5, 0.1]));
  });

  it('accepts NaN as alpha', () => {
    const logger = { warn: vi.fn() };

    const score = tsrr('A', ['A', 'B'], [0.9, 0.9], { alpha: Number.NaN, logger });

    expect(score).toBe(0.5);
    expect(logger.warn).toHaveBeenCalledTimes(1);
    expect(logger.warn).toHaveBeenCalledWith(ALPHA_DEPRECATION_WARNING);
  });

  it('does not warn without alpha', () => {
    const logger = { warn: vi.fn() };

    tsrr('A', ['A', 'B'], [0.9, 0.9], { logger });

    expect(logger.warn).not.toHaveBeenCalled();
  });

  it('falls back to console.warn when no logger is given', () => {
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});

    tsrr('A', ['A', 'B'], [0.9, 0.9], { alpha: 1 });

    expect(warnSpy).toHaveBeenCalledWith(ALPHA_DEPRECATION_WARNING);
  });

  it('rejects an unknown reduction', () => {
    const options = { reduction: 'sum' } as unknown as TsrrOptions;

    expect(() => tsrr('a', ['a'], [1], options)).toThrow(TsrrError);
    expect(() => tsrr('a', ['a'], [1], options)).toThrow(/^Invalid options: reduction/);
  });

  it('rejects a non-numeric alpha', () => {
    const options = { alpha: 'high' } as unknown as TsrrOptions;

    let caught: unknown;
    try {
      tsrr('a', ['a'], [1], options);
    } catch (error) {
      caught = error;
    }

    expect(caught).toMatchObject({ code: TsrrErrorCodes.INVALID_OPTIONS });
  });

  it('propagates shape errors', () => {
    expect(() => tsrr('a', ['a', 'b'], [0.1])).toThrow(TsrrError);
  });
});
