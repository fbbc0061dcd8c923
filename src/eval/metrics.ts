/**
 * Companion Ranking Metrics
 *
 * Classic reciprocal-rank variants reported next to TsRR, so an evaluation
 * can show how much a score depends on how ties happen to be ordered:
 *
 * - reciprocalRank: ties kept in the order the caller supplied them
 * - optimisticReciprocalRank: target first within its tie group
 * - pessimisticReciprocalRank: target after every irrelevant tie member
 *
 * TsRR always lies between the pessimistic and optimistic values.
 */

import { normalizeInput } from './normalize.js';
import { locateTieGroup, sortBySimilarity } from './ranker.js';
import { meanScore, scoreRow } from './tsrr.js';
import type {
  ResultsInput,
  ScoringRow,
  SimilaritiesInput,
  TargetInput,
} from './types.js';

// ============================================================================
// PER-ROW METRIC FUNCTIONS
// ============================================================================

/**
 * Reciprocal rank with ties broken by input order.
 *
 * The sort is stable, so among equal similarities the candidate supplied
 * first ranks first. Returns 0 when the target is absent.
 *
 * @example
 * reciprocalRank({ target: 'b', labels: ['a', 'b'], similarities: [0.5, 0.5] }) // => 0.5
 * reciprocalRank({ target: 'b', labels: ['b', 'a'], similarities: [0.5, 0.5] }) // => 1
 */
export function reciprocalRank(row: ScoringRow): number {
  const index = sortBySimilarity(row).findIndex((candidate) => candidate.label === row.target);
  return index === -1 ? 0 : 1 / (index + 1);
}

/**
 * Reciprocal rank with the target placed first in its tie group.
 */
export function optimisticReciprocalRank(row: ScoringRow): number {
  const stats = locateTieGroup(row);
  return stats === null ? 0 : 1 / (stats.rPre + 1);
}

/**
 * Reciprocal rank with every irrelevant tie member placed ahead of the target.
 */
export function pessimisticReciprocalRank(row: ScoringRow): number {
  const stats = locateTieGroup(row);
  return stats === null ? 0 : 1 / (stats.rPre + stats.irrelevantInTie + 1);
}

// ============================================================================
// SUMMARIES
// ============================================================================

/**
 * Descriptive statistics over a score vector.
 */
export interface ScoreSummary {
  count: number;
  mean: number;
  min: number;
  max: number;
  /** Scores above zero, i.e. targets present in their row */
  found: number;
}

/**
 * Summarize a score vector. Returns all zeros for empty input.
 */
export function summarizeScores(scores: readonly number[]): ScoreSummary {
  if (scores.length === 0) {
    return { count: 0, mean: 0, min: 0, max: 0, found: 0 };
  }

  return {
    count: scores.length,
    mean: meanScore(scores),
    min: scores.reduce((low, score) => Math.min(low, score), Infinity),
    max: scores.reduce((high, score) => Math.max(high, score), -Infinity),
    found: scores.filter((score) => score > 0).length,
  };
}

/**
 * Macro-averaged metrics over a batch.
 */
export interface AggregateMetrics {
  tsrr: number;
  mrr: number;
  optimistic_mrr: number;
  pessimistic_mrr: number;
  /** Fraction of targets present in their row */
  found_rate: number;
}

/**
 * Compute every metric for each row and macro-average them.
 *
 * Accepts the same input shapes as tsrr(). Returns all zeros for an empty batch.
 */
export function computeAggregateMetrics(
  target: TargetInput,
  results: ResultsInput,
  similarities: SimilaritiesInput
): AggregateMetrics {
  const { rows } = normalizeInput(target, results, similarities);

  return {
    tsrr: meanScore(rows.map((row) => scoreRow(row).score)),
    mrr: meanScore(rows.map(reciprocalRank)),
    optimistic_mrr: meanScore(rows.map(optimisticReciprocalRank)),
    pessimistic_mrr: meanScore(rows.map(pessimisticReciprocalRank)),
    found_rate: meanScore(rows.map((row) => (row.labels.some((label) => label === row.target) ? 1 : 0))),
  };
}
