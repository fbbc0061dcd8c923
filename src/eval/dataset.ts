/**
 * Evaluation Datasets
 *
 * Loads JSON files of ranked candidate lists for `tsrr score`:
 *
 * ```json
 * {
 *   "version": "1.0",
 *   "name": "faq-retrieval",
 *   "entries": [
 *     { "id": "q1", "target": "doc-7", "results": ["doc-2", "doc-7"], "similarities": [0.91, 0.88] }
 *   ]
 * }
 * ```
 *
 * Row lengths are not checked here; the normalizer reports mismatches with
 * the offending row index when the batch is scored.
 */

import * as fs from 'node:fs';
import { join, resolve } from 'node:path';
import { homedir } from 'node:os';
import { z } from 'zod';

import { TsrrError } from './errors.js';
import { FileNotFoundError } from '../errors/index.js';
import type { Label } from './types.js';

// ============================================================================
// VALIDATION SCHEMA
// ============================================================================

const LabelSchema = z.union([z.string(), z.number(), z.boolean()]);

export const DatasetEntrySchema = z.object({
  id: z.string().min(1).optional(),
  target: LabelSchema,
  results: z.array(LabelSchema),
  similarities: z.array(z.number()),
});

export const DatasetSchema = z.object({
  version: z.literal('1.0'),
  name: z.string().min(1),
  entries: z.array(DatasetEntrySchema),
});

export type DatasetEntry = z.infer<typeof DatasetEntrySchema>;
export type Dataset = z.infer<typeof DatasetSchema>;

/**
 * Batched arguments for tsrr(), plus an id per row for reporting.
 */
export interface DatasetBatch {
  ids: string[];
  targets: Label[];
  results: Label[][];
  similarities: number[][];
}

// ============================================================================
// LOADING
// ============================================================================

/**
 * Resolve a dataset path, expanding a leading `~` to the home directory.
 */
export function resolveDatasetPath(filePath: string): string {
  if (filePath === '~') return homedir();
  if (filePath.startsWith('~/')) return join(homedir(), filePath.slice(2));
  return resolve(filePath);
}

/**
 * Load and validate a dataset file.
 *
 * @throws FileNotFoundError if the file doesn't exist
 * @throws TsrrError with code DATASET_INVALID for malformed JSON or schema violations
 */
export function loadDataset(filePath: string): Dataset {
  const resolved = resolveDatasetPath(filePath);

  if (!fs.existsSync(resolved)) {
    throw new FileNotFoundError(resolved);
  }

  try {
    const content = fs.readFileSync(resolved, 'utf-8');
    return DatasetSchema.parse(JSON.parse(content));
  } catch (error) {
    if (error instanceof z.ZodError) {
      const issues = error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
      throw TsrrError.datasetInvalid(`schema validation failed: ${issues}`, error);
    }
    if (error instanceof SyntaxError) {
      throw TsrrError.datasetInvalid('file contains invalid JSON', error);
    }
    throw error;
  }
}

/**
 * Convert dataset entries into the batched form tsrr() accepts.
 *
 * Entries without an id are numbered from 1 in file order.
 */
export function datasetToBatch(dataset: Dataset): DatasetBatch {
  return {
    ids: dataset.entries.map((entry, index) => entry.id ?? `#${index + 1}`),
    targets: dataset.entries.map((entry) => entry.target),
    results: dataset.entries.map((entry) => entry.results),
    similarities: dataset.entries.map((entry) => entry.similarities),
  };
}
