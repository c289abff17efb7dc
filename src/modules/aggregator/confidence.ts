/**
 * ConfidenceEstimator — share of decoded attempts that agree with the winner.
 *
 * A pure function of the vote distribution, so a stored distribution always
 * reproduces the confidence recorded with it.
 */

import type { DecisionValue, VoteDistribution } from '../../core/types.js'
import { compareValues, valueKey } from '../output-spec/output-spec.js'

/** How the winning value is chosen from a distribution */
export type AggregationMethod = 'mode' | 'median'

/**
 * Highest-voted value. Ties resolve to the smallest value, which keeps the
 * result independent of input order; the aggregator applies its own
 * tie-break policy before calling this.
 */
export function modeOf(distribution: VoteDistribution): DecisionValue | undefined {
  let best: { value: DecisionValue; votes: number } | undefined
  for (const entry of distribution) {
    if (
      best === undefined ||
      entry.votes > best.votes ||
      (entry.votes === best.votes && compareValues(entry.value, best.value) < 0)
    ) {
      best = entry
    }
  }
  return best?.value
}

/**
 * Median of integer values, expanding the distribution by its vote counts.
 * An even count takes the mean of the two middle values, rounded half up.
 */
export function medianOf(values: readonly number[]): number | undefined {
  if (values.length === 0) return undefined
  const sorted = [...values].sort((a, b) => a - b)
  const mid = Math.floor(sorted.length / 2)
  const upper = sorted[mid]
  if (upper === undefined) return undefined
  if (sorted.length % 2 === 1) return upper
  const lower = sorted[mid - 1] ?? upper
  return Math.floor((lower + upper) / 2 + 0.5)
}

function expandIntegers(distribution: VoteDistribution): number[] {
  const values: number[] = []
  for (const { value, votes } of distribution) {
    if (typeof value !== 'number') continue
    for (let i = 0; i < votes; i++) values.push(value)
  }
  return values
}

/**
 * Votes for the winning value divided by the number of decoded attempts.
 *
 * For 'median' the winner is the median of the expanded distribution; when an
 * even count yields a median no attempt produced, nothing agrees with it and
 * the confidence is 0.
 *
 * @returns a number in [0, 1]; 0 when nothing decoded
 */
export function estimateConfidence(
  distribution: VoteDistribution,
  totalDecoded: number,
  method: AggregationMethod,
): number {
  if (totalDecoded <= 0) return 0

  const winner = method === 'median' ? medianOf(expandIntegers(distribution)) : modeOf(distribution)
  if (winner === undefined) return 0

  const key = valueKey(winner)
  const votes = distribution.find((entry) => valueKey(entry.value) === key)?.votes ?? 0
  return Math.min(1, votes / totalDecoded)
}
