/**
 * Expected-Rank Estimator
 *
 * Exact expected position of the first relevant item when `nt` relevant and
 * `ns` irrelevant items are shuffled uniformly at random. With M = ns + nt:
 *
 *   P(r) = C(M - r, nt - 1) / C(M, nt)        r = 1..M
 *   E    = offset + sum of r * P(r)
 *
 * This is a closed-form expectation, not a simulation: the same inputs
 * always produce the same value.
 */

import { TsrrError } from './errors.js';

/**
 * Binomial coefficient C(n, k) by the multiplicative formula.
 *
 * Returns 0 when k is outside [0, n]. Exact while the result stays below
 * Number.MAX_SAFE_INTEGER.
 *
 * @example
 * binomial(5, 2) // => 10
 * binomial(3, 4) // => 0
 */
export function binomial(n: number, k: number): number {
  if (k < 0 || k > n) return 0;
  const m = Math.min(k, n - k);
  let result = 1;
  for (let i = 1; i <= m; i++) {
    result = (result * (n - m + i)) / i;
  }
  return Math.round(result);
}

function assertComposition(irrelevant: number, relevant: number): void {
  const valid =
    Number.isInteger(irrelevant) &&
    Number.isInteger(relevant) &&
    irrelevant >= 0 &&
    relevant > 0 &&
    relevant <= irrelevant + relevant;
  if (!valid) {
    throw TsrrError.tieComposition(irrelevant, relevant);
  }
}

/**
 * Probability that the first relevant item sits at each rank 1..M.
 *
 * Walks the quotient C(M - r, nt - 1) / C(M, nt) with the ratio between
 * consecutive ranks, (M - r - nt + 1) / (M - r), so tie groups too large for
 * the binomials themselves still produce finite probabilities.
 *
 * @param irrelevant - Irrelevant items in the group (ns)
 * @param relevant - Relevant items in the group (nt)
 * @returns Array of length M; entry r - 1 holds P(r)
 */
export function firstRelevantDistribution(irrelevant: number, relevant: number): number[] {
  assertComposition(irrelevant, relevant);

  const size = irrelevant + relevant;
  const probabilities: number[] = [];
  let p = relevant / size;

  for (let rank = 1; rank <= size; rank++) {
    probabilities.push(p);
    const remaining = size - rank;
    p = remaining >= relevant ? (p * (remaining - relevant + 1)) / remaining : 0;
  }

  return probabilities;
}

/**
 * Expected 1-based position of the first relevant item, shifted by `offset`.
 *
 * @param offset - Added to the in-group position (0 for a position within the tie)
 * @param irrelevant - Irrelevant items in the group (ns)
 * @param relevant - Relevant items in the group (nt)
 * @throws TsrrError when the group is empty, has no relevant item, or the
 *   counts are not non-negative integers
 *
 * @example
 * expectedRank(0, 0, 1) // => 1
 * expectedRank(0, 1, 1) // => 1.5
 * expectedRank(3, 2, 1) // => 5
 */
export function expectedRank(offset: number, irrelevant: number, relevant: number): number {
  if (!Number.isFinite(offset)) {
    throw TsrrError.tieComposition(irrelevant, relevant);
  }

  const distribution = firstRelevantDistribution(irrelevant, relevant);
  let expectation = 0;
  distribution.forEach((probability, index) => {
    expectation += (index + 1) * probability;
  });

  return offset + expectation;
}
