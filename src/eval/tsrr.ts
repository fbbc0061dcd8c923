/**
 * Tie-Sensitive Reciprocal Rank
 *
 * Reciprocal rank that does not trust the order of tied similarity scores.
 * For the tie group holding a target's first match:
 *
 *   E_L   = expected in-tie position of the first relevant item
 *   L_max = ns + 1, the in-tie position if every irrelevant member comes first
 *   tau   = ns / N_irr, the share of the row's irrelevant items inside the tie
 *   E_tau = (1 - tau) * E_L + tau * L_max
 *   TsRR  = 1 / (r_pre + E_tau)
 *
 * With no ties E_tau is 1 and TsRR equals the classic reciprocal rank
 * 1 / (r_pre + 1). An absent target scores 0.
 */

import { expectedRank } from './expected-rank.js';
import { normalizeInput } from './normalize.js';
import { locateTieGroup } from './ranker.js';
import { TsrrError } from './errors.js';
import { consoleLogger, type Logger } from '../utils/logger.js';
import {
  TsrrOptionsSchema,
  type Reduction,
  type ResultsInput,
  type ScoringRow,
  type SimilaritiesInput,
  type TargetInput,
  type TsrrBreakdown,
  type TsrrOptions,
} from './types.js';

export const ALPHA_DEPRECATION_WARNING =
  "The 'alpha' option of tsrr() is deprecated and ignored; scores no longer depend on it";

// ============================================================================
// PER-ROW SCORING
// ============================================================================

/**
 * Score one normalized row and keep every intermediate quantity.
 */
export function scoreRow(row: ScoringRow): TsrrBreakdown {
  const stats = locateTieGroup(row);

  if (stats === null) {
    return {
      target: row.target,
      found: false,
      rPre: 0,
      tieSize: 0,
      relevantInTie: 0,
      irrelevantInTie: 0,
      total: row.labels.length,
      relevantTotal: 0,
      irrelevantTotal: row.labels.length,
      tau: 0,
      expectedInTie: 0,
      worstInTie: 0,
      blendedInTie: 0,
      score: 0,
    };
  }

  const expectedInTie = expectedRank(0, stats.irrelevantInTie, stats.relevantInTie);
  const worstInTie = stats.irrelevantInTie + 1;
  const blendedInTie = (1 - stats.tau) * expectedInTie + stats.tau * worstInTie;

  return {
    target: row.target,
    found: true,
    rPre: stats.rPre,
    tieSize: stats.tieSize,
    relevantInTie: stats.relevantInTie,
    irrelevantInTie: stats.irrelevantInTie,
    total: stats.total,
    relevantTotal: stats.relevantTotal,
    irrelevantTotal: stats.irrelevantTotal,
    tau: stats.tau,
    expectedInTie,
    worstInTie,
    blendedInTie,
    score: 1 / (stats.rPre + blendedInTie),
  };
}

// ============================================================================
// REDUCTION
// ============================================================================

/**
 * Arithmetic mean of per-target scores. An empty batch averages to 0.
 */
export function meanScore(scores: readonly number[]): number {
  if (scores.length === 0) return 0;
  let total = 0;
  for (const score of scores) {
    total += score;
  }
  return total / scores.length;
}

function parseOptions(options: TsrrOptions): { reduction: Reduction; alpha?: number; logger: Logger } {
  const result = TsrrOptionsSchema.safeParse({
    reduction: options.reduction,
    alpha: options.alpha,
  });

  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw TsrrError.invalidOptions(issues);
  }

  return { ...result.data, logger: options.logger ?? consoleLogger };
}

// ============================================================================
// PUBLIC API
// ============================================================================

/**
 * Per-target breakdown of TsRR for a single target or a batch.
 *
 * Accepts the same shapes as tsrr().
 *
 * @example
 * explainTsrr('A', ['A', 'B'], [0.9, 0.9])[0]
 * // => { found: true, rPre: 0, tieSize: 2, tau: 1, expectedInTie: 1.5,
 * //      worstInTie: 2, blendedInTie: 2, score: 0.5, ... }
 */
export function explainTsrr(
  target: TargetInput,
  results: ResultsInput,
  similarities: SimilaritiesInput
): TsrrBreakdown[] {
  return normalizeInput(target, results, similarities).rows.map(scoreRow);
}

/**
 * Compute Tie-Sensitive Reciprocal Rank.
 *
 * @param target - One label, or one label per row
 * @param results - Candidate labels for the target, or one row per target
 * @param similarities - Scores index-aligned with `results`
 * @param options - `reduction` ('mean' by default) and the deprecated `alpha`
 * @returns The mean score, or one score per target with `reduction: 'none'`
 * @throws TsrrError when the inputs have mismatched shapes, non-finite
 *   similarities, or the options are invalid
 *
 * @example
 * tsrr('label1', ['label2', 'label1', 'label3'], [0.8, 0.9, 0.7]) // => 1
 * tsrr('A', ['A', 'B'], [0.9, 0.9])                              // => 0.5
 * tsrr(['a', 'b'], [['a', 'x'], ['x', 'b']], [[0.9, 0.1], [0.9, 0.1]], { reduction: 'none' })
 * // => [1, 0.5]
 */
export function tsrr(
  target: TargetInput,
  results: ResultsInput,
  similarities: SimilaritiesInput,
  options?: TsrrOptions & { reduction?: 'mean' }
): number;
export function tsrr(
  target: TargetInput,
  results: ResultsInput,
  similarities: SimilaritiesInput,
  options: TsrrOptions & { reduction: 'none' }
): number[];
export function tsrr(
  target: TargetInput,
  results: ResultsInput,
  similarities: SimilaritiesInput,
  options?: TsrrOptions
): number | number[];
export function tsrr(
  target: TargetInput,
  results: ResultsInput,
  similarities: SimilaritiesInput,
  options: TsrrOptions = {}
): number | number[] {
  const { reduction, alpha, logger } = parseOptions(options);

  if (alpha !== undefined) {
    logger.warn(ALPHA_DEPRECATION_WARNING);
  }

  const scores = explainTsrr(target, results, similarities).map((breakdown) => breakdown.score);

  return reduction === 'mean' ? meanScore(scores) : scores;
}
