/**
 * tsrr - Library Entry Point
 *
 * Tie-Sensitive Reciprocal Rank for evaluating ranked candidate lists whose
 * similarity scores contain ties.
 *
 * @example Single target
 * ```typescript
 * import { tsrr } from 'tsrr-eval';
 *
 * tsrr('label1', ['label2', 'label1', 'label3'], [0.8, 0.9, 0.7]); // => 1
 * tsrr('A', ['A', 'B'], [0.9, 0.9]);                              // => 0.5
 * ```
 *
 * @example Batch with per-target scores
 * ```typescript
 * tsrr(
 *   ['label1', 'label2'],
 *   [['label1', 'labelA'], ['labelB', 'label2']],
 *   [[0.9, 0.8], [0.85, 0.95]],
 *   { reduction: 'none' }
 * ); // => [1, 1]
 * ```
 *
 * @packageDocumentation
 */

// Scoring
export { tsrr, explainTsrr, scoreRow, meanScore, ALPHA_DEPRECATION_WARNING } from './eval/tsrr.js';
export { normalizeInput } from './eval/normalize.js';
export { locateTieGroup, sortBySimilarity } from './eval/ranker.js';
export { expectedRank, firstRelevantDistribution, binomial } from './eval/expected-rank.js';

// Companion metrics
export {
  reciprocalRank,
  optimisticReciprocalRank,
  pessimisticReciprocalRank,
  summarizeScores,
  computeAggregateMetrics,
  type ScoreSummary,
  type AggregateMetrics,
} from './eval/metrics.js';

// Datasets
export {
  loadDataset,
  datasetToBatch,
  resolveDatasetPath,
  DatasetSchema,
  DatasetEntrySchema,
  type Dataset,
  type DatasetEntry,
  type DatasetBatch,
} from './eval/dataset.js';

// Types
export { ReductionSchema, TsrrOptionsSchema } from './eval/types.js';
export type {
  Label,
  BoxedLabel,
  NumericArray,
  LabelRow,
  SimilarityRow,
  TargetInput,
  ResultsInput,
  SimilaritiesInput,
  ScoringRow,
  NormalizedBatch,
  TieGroupStats,
  TsrrBreakdown,
  TsrrOptions,
  Reduction,
} from './eval/types.js';

// Errors
export { TsrrError, TsrrErrorCodes, type TsrrErrorCode } from './eval/errors.js';

// Logging
export { consoleLogger, silentLogger, type Logger } from './utils/index.js';
