/**
 * Aggregator — reduces settled attempts to a single value or an unresolved
 * outcome.
 *
 * Only decoded attempts vote. A quorum of ceil(votingRounds / 2) decoded
 * attempts is required before any value is trusted. Booleans and enum
 * strings take the mode; bounded integers take the median.
 *
 * Every step is order independent: the distribution is canonically sorted and
 * ties are broken on (temperature, attempt index), never on arrival order.
 */

import type {
  DecisionValue,
  ReasoningAttempt,
  UnresolvedReason,
  VoteCount,
  VoteDistribution,
} from '../../core/types.js'
import { compareValues, valueKey } from '../output-spec/output-spec.js'
import type { TypedOutputSpec } from '../output-spec/schemas.js'
import { medianOf, type AggregationMethod } from './confidence.js'

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface AggregationPolicy {
  votingRounds: number
  allowUnresolved: boolean
}

interface AggregationBase {
  distribution: VoteDistribution
  method: AggregationMethod
  /** Attempts that voted */
  decodedCount: number
  /** Attempts that answered with the undetermined sentinel */
  unknownCount: number
}

export interface AggregationWinner extends AggregationBase {
  kind: 'winner'
  value: DecisionValue
  /** The top count was tied and the lowest-temperature attempt decided it */
  tieBroken: boolean
}

export interface AggregationUnresolved extends AggregationBase {
  kind: 'unresolved'
  reason: Exclude<UnresolvedReason, 'low-confidence'>
}

export type AggregationResult = AggregationWinner | AggregationUnresolved

interface Vote {
  value: DecisionValue
  attempt: ReasoningAttempt
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

export function quorumFor(votingRounds: number): number {
  return Math.ceil(votingRounds / 2)
}

export function methodFor(spec: TypedOutputSpec): AggregationMethod {
  return spec.kind === 'bounded-integer' ? 'median' : 'mode'
}

function collectVotes(attempts: readonly ReasoningAttempt[]): Vote[] {
  const votes: Vote[] = []
  for (const attempt of attempts) {
    if (attempt.outcome.kind === 'decoded') {
      votes.push({ value: attempt.outcome.value, attempt })
    }
  }
  return votes
}

/** Canonical distribution: votes descending, then value ascending */
export function buildDistribution(values: readonly DecisionValue[]): VoteDistribution {
  const counts = new Map<string, VoteCount>()
  for (const value of values) {
    const key = valueKey(value)
    const existing = counts.get(key)
    counts.set(key, { value, votes: (existing?.votes ?? 0) + 1 })
  }
  const entries = [...counts.values()].sort(
    (a, b) => b.votes - a.votes || compareValues(a.value, b.value),
  )
  return Object.freeze(entries.map((entry) => Object.freeze(entry)))
}

/** Lowest temperature first, then lowest attempt index */
function compareForTieBreak(a: ReasoningAttempt, b: ReasoningAttempt): number {
  return a.temperature - b.temperature || a.index - b.index
}

// ---------------------------------------------------------------------------
// aggregate
// ---------------------------------------------------------------------------

export function aggregate(
  attempts: readonly ReasoningAttempt[],
  spec: TypedOutputSpec,
  policy: AggregationPolicy,
): AggregationResult {
  const votes = collectVotes(attempts)
  const distribution = buildDistribution(votes.map((vote) => vote.value))
  const method = methodFor(spec)
  const unknownCount = attempts.filter((attempt) => attempt.outcome.kind === 'unknown').length
  const base = { distribution, method, decodedCount: votes.length, unknownCount }

  if (votes.length < quorumFor(policy.votingRounds)) {
    const allUnknown = attempts.length > 0 && unknownCount === attempts.length
    return { ...base, kind: 'unresolved', reason: allUnknown ? 'all-unknown' : 'quorum-not-met' }
  }

  if (method === 'median') {
    const value = medianOf(votes.flatMap((vote) => (typeof vote.value === 'number' ? [vote.value] : [])))
    if (value === undefined) {
      return { ...base, kind: 'unresolved', reason: 'quorum-not-met' }
    }
    return { ...base, kind: 'winner', value, tieBroken: false }
  }

  const top = distribution[0]
  if (top === undefined) {
    return { ...base, kind: 'unresolved', reason: 'quorum-not-met' }
  }
  const tied = distribution.filter((entry) => entry.votes === top.votes)
  if (tied.length === 1) {
    return { ...base, kind: 'winner', value: top.value, tieBroken: false }
  }

  if (policy.allowUnresolved) {
    return { ...base, kind: 'unresolved', reason: 'tie' }
  }

  const tiedKeys = new Set(tied.map((entry) => valueKey(entry.value)))
  const [decider] = votes
    .filter((vote) => tiedKeys.has(valueKey(vote.value)))
    .sort((a, b) => compareForTieBreak(a.attempt, b.attempt))
  if (decider === undefined) {
    return { ...base, kind: 'unresolved', reason: 'tie' }
  }
  return { ...base, kind: 'winner', value: decider.value, tieBroken: true }
}
