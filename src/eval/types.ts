/**
 * Scoring Types
 *
 * Shared type definitions for the TsRR scorer:
 * - Input shapes accepted by tsrr() and explainTsrr()
 * - The normalized always-batch representation the scorer works on
 * - Tie-group statistics and per-target score breakdowns
 * - Zod schemas for reductions and scoring options
 */

import { z } from 'zod';
import type { Logger } from '../utils/logger.js';

// ============================================================================
// INPUT SHAPES
// ============================================================================

/**
 * A candidate or target label. Labels match by strict equality.
 */
export type Label = string | number | boolean;

/**
 * Boxed primitive wrapping a label (`new String('a')`, `Object(3)`).
 *
 * Accepted as a single target and unwrapped with valueOf().
 */
// eslint-disable-next-line @typescript-eslint/ban-types
export type BoxedLabel = String | Number | Boolean;

/** Numeric typed arrays accepted in place of a number[] row. */
export type NumericArray = Float64Array | Float32Array | Int32Array | Int16Array | Int8Array | Uint32Array | Uint16Array | Uint8Array;

/** One row of similarity scores. */
export type SimilarityRow = readonly number[] | NumericArray;

/** One row of candidate labels. */
export type LabelRow = readonly Label[] | NumericArray;

/** A single target, or one target per batch row. */
export type TargetInput = Label | BoxedLabel | readonly Label[];

/** Candidates for a single target, or one row per target. */
export type ResultsInput = LabelRow | readonly LabelRow[];

/** Similarities for a single target, or one row per target. */
export type SimilaritiesInput = SimilarityRow | readonly SimilarityRow[];

// ============================================================================
// NORMALIZED REPRESENTATION
// ============================================================================

/**
 * One target with its candidates, index-aligned with their similarities.
 */
export interface ScoringRow {
  target: Label;
  labels: readonly Label[];
  similarities: readonly number[];
}

/**
 * Uniform batch produced by the input normalizer.
 *
 * A single-target call becomes a batch of one; `kind` records which form
 * the caller used.
 */
export interface NormalizedBatch {
  kind: 'single' | 'batch';
  rows: ScoringRow[];
}

// ============================================================================
// TIE GROUPS AND SCORES
// ============================================================================

/**
 * Aggregates describing the tie group of a target's first match.
 */
export interface TieGroupStats {
  /** Similarity shared by every member of the tie group */
  similarity: number;
  /** Candidates with a strictly higher similarity */
  rPre: number;
  /** Size of the tie group */
  tieSize: number;
  /** Members of the tie group equal to the target (k) */
  relevantInTie: number;
  /** Members of the tie group not equal to the target (ns) */
  irrelevantInTie: number;
  /** Candidates in the row (N) */
  total: number;
  /** Candidates in the row equal to the target */
  relevantTotal: number;
  /** Candidates in the row not equal to the target */
  irrelevantTotal: number;
  /** Share of the row's irrelevant candidates that fall inside the tie group */
  tau: number;
}

/**
 * Per-target breakdown of a TsRR score.
 *
 * Rows whose target is absent report `found: false` and zeros for every
 * tie-group field.
 */
export interface TsrrBreakdown {
  target: Label;
  found: boolean;
  rPre: number;
  tieSize: number;
  relevantInTie: number;
  irrelevantInTie: number;
  total: number;
  relevantTotal: number;
  irrelevantTotal: number;
  tau: number;
  /** Expected in-tie position of the first relevant item (E_L) */
  expectedInTie: number;
  /** Worst-case in-tie position of the first relevant item (L_max) */
  worstInTie: number;
  /** Contamination-weighted blend of the two (E_tau) */
  blendedInTie: number;
  score: number;
}

// ============================================================================
// OPTIONS
// ============================================================================

/**
 * How per-target scores are combined.
 *
 * - mean: arithmetic mean as a single number
 * - none: one score per target, in target order
 */
export const ReductionSchema = z.enum(['mean', 'none']);

export type Reduction = z.infer<typeof ReductionSchema>;

/**
 * Runtime validation for the serializable part of TsrrOptions.
 */
export const TsrrOptionsSchema = z.object({
  reduction: ReductionSchema.default('mean'),
  /** Deprecated tie-sensitivity parameter. Accepted and ignored. */
  alpha: z.union([z.number(), z.nan()]).optional(),
});

export interface TsrrOptions {
  reduction?: Reduction;
  /**
   * @deprecated TsRR no longer takes a tie-sensitivity parameter. Passing it
   * logs a warning and has no effect on the score.
   */
  alpha?: number;
  /** Receives the deprecation warning (default: consoleLogger) */
  logger?: Logger;
}
