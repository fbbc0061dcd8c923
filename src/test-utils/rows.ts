/**
 * Test Utilities - Generated Rows
 *
 * Deterministic candidate rows for property-style tests. Similarities are
 * drawn from a handful of values so ties are common.
 */

import type { ScoringRow } from '../eval/types.js';

/**
 * Seeded linear congruential generator returning values in [0, 1).
 */
export function createRng(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state * 1664525 + 1013904223) >>> 0;
    return state / 2 ** 32;
  };
}

export interface RandomRowOptions {
  /** Candidates in the row (default: 8) */
  length?: number;
  /** Distinct labels to draw from (default: 5) */
  labels?: number;
  /** Distinct similarity levels to draw from (default: 4) */
  levels?: number;
}

/**
 * Build a row with target 'L0' and labels 'L0'..'L{labels-1}'.
 */
export function randomRow(rng: () => number, options: RandomRowOptions = {}): ScoringRow {
  const length = options.length ?? 8;
  const labelCount = options.labels ?? 5;
  const levels = options.levels ?? 4;

  const labels: string[] = [];
  const similarities: number[] = [];
  for (let i = 0; i < length; i++) {
    labels.push(`L${Math.floor(rng() * labelCount)}`);
    similarities.push((Math.floor(rng() * levels) + 1) / levels);
  }

  return { target: 'L0', labels, similarities };
}

/**
 * Fisher-Yates shuffle of a row's candidates, keeping label/similarity pairs together.
 */
export function shuffleRow(row: ScoringRow, rng: () => number): ScoringRow {
  const order = row.labels.map((_, index) => index);
  for (let i = order.length - 1; i > 0; i--) {
    const j = Math.floor(rng() * (i + 1));
    [order[i], order[j]] = [order[j], order[i]];
  }

  return {
    target: row.target,
    labels: order.map((index) => row.labels[index]),
    similarities: order.map((index) => row.similarities[index]),
  };
}
