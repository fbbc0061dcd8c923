/**
 * Tie-Aware Ranker
 *
 * Sorts a row by similarity and describes the tie group holding the
 * target's first match. Only tie-group aggregates leave this module, so the
 * order the sort leaves equal similarities in never reaches the score.
 */

import type { ScoringRow, TieGroupStats } from './types.js';

interface Candidate {
  label: ScoringRow['target'];
  similarity: number;
}

/**
 * Sort candidates by similarity, highest first.
 */
export function sortBySimilarity(row: ScoringRow): Candidate[] {
  const candidates = row.labels.map((label, index) => ({
    label,
    similarity: row.similarities[index],
  }));
  return candidates.sort((a, b) => b.similarity - a.similarity);
}

/**
 * Locate the target's first match and measure its tie group.
 *
 * Similarities are compared with strict equality, no tolerance.
 *
 * @returns Tie-group statistics, or null when the target is not in the row
 *
 * @example
 * locateTieGroup({ target: 'a', labels: ['b', 'a', 'c'], similarities: [0.9, 0.9, 0.5] })
 * // => { similarity: 0.9, rPre: 0, tieSize: 2, relevantInTie: 1, irrelevantInTie: 1,
 * //      total: 3, relevantTotal: 1, irrelevantTotal: 2, tau: 0.5 }
 */
export function locateTieGroup(row: ScoringRow): TieGroupStats | null {
  const sorted = sortBySimilarity(row);
  const match = sorted.find((candidate) => candidate.label === row.target);
  if (match === undefined) return null;

  const similarity = match.similarity;
  let rPre = 0;
  let tieSize = 0;
  let relevantInTie = 0;
  let relevantTotal = 0;

  for (const candidate of sorted) {
    const relevant = candidate.label === row.target;
    if (relevant) relevantTotal++;

    if (candidate.similarity > similarity) {
      rPre++;
    } else if (candidate.similarity === similarity) {
      tieSize++;
      if (relevant) relevantInTie++;
    }
  }

  const total = sorted.length;
  const irrelevantInTie = tieSize - relevantInTie;
  const irrelevantTotal = total - relevantTotal;

  return {
    similarity,
    rPre,
    tieSize,
    relevantInTie,
    irrelevantInTie,
    total,
    relevantTotal,
    irrelevantTotal,
    tau: irrelevantTotal > 0 ? irrelevantInTie / irrelevantTotal : 0,
  };
}
