/**
 * resolveDecision — the pure part of decide().
 *
 * Given the resolved request and the settled attempts of one batch, computes
 * everything in a DecisionResult except the identity and timing fields. The
 * result depends only on the set of attempts, never on their order.
 */

import type {
  AttemptOutcomeKind,
  DecisionStatus,
  FailureCode,
  ReasoningAttempt,
  VoteDistribution,
} from '../../core/types.js'
import { aggregate } from '../aggregator/aggregator.js'
import { estimateConfidence } from '../aggregator/confidence.js'
import { valueKey } from '../output-spec/output-spec.js'
import type {
  DecisionResult,
  OutcomeCounts,
  ReasoningTraceSample,
  ResolvedDecisionRequest,
} from './types.js'

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ResolveOptions {
  /** Whether the batch deadline fired before every attempt settled */
  timedOut: boolean
  maxReasoningTraces: number
}

/** A DecisionResult without its id, state history and duration */
export type DecisionVerdict = Omit<DecisionResult, 'decisionId' | 'stateHistory' | 'durationMs'>

const EMPTY_DISTRIBUTION: VoteDistribution = Object.freeze([])
const NO_TRACES: readonly ReasoningTraceSample[] = Object.freeze([])

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

export function countOutcomes(attempts: readonly ReasoningAttempt[]): OutcomeCounts {
  const counts: Record<AttemptOutcomeKind, number> = {
    decoded: 0,
    unknown: 0,
    'parse-rejected': 0,
    'transport-failed': 0,
    cancelled: 0,
  }
  for (const attempt of attempts) {
    counts[attempt.outcome.kind]++
  }
  return Object.freeze(counts)
}

function sortByIndex(attempts: readonly ReasoningAttempt[]): readonly ReasoningAttempt[] {
  return Object.freeze([...attempts].sort((a, b) => a.index - b.index))
}

/**
 * Sample reasoning traces: attempts that voted for the winner first, then the
 * remaining decoded attempts, then unknown ones; each group by attempt index.
 */
function sampleTraces(
  attempts: readonly ReasoningAttempt[],
  winnerKey: string | undefined,
  max: number,
): readonly ReasoningTraceSample[] {
  const rank = (attempt: ReasoningAttempt): number => {
    const { outcome } = attempt
    if (outcome.kind === 'decoded') return valueKey(outcome.value) === winnerKey ? 0 : 1
    return 2
  }
  const samples: ReasoningTraceSample[] = []
  const candidates = attempts
    .filter((attempt) => attempt.outcome.kind === 'decoded' || attempt.outcome.kind === 'unknown')
    .sort((a, b) => rank(a) - rank(b) || a.index - b.index)
  for (const attempt of candidates.slice(0, max)) {
    const { outcome } = attempt
    if (outcome.kind !== 'decoded' && outcome.kind !== 'unknown') continue
    samples.push(
      Object.freeze({
        attemptIndex: attempt.index,
        temperature: attempt.temperature,
        trace: outcome.reasoningTrace,
      }),
    )
  }
  return Object.freeze(samples)
}

/** Verdict for a decision that failed outright */
export function failedVerdict(
  attempts: readonly ReasoningAttempt[],
  code: FailureCode,
  message: string,
  timedOut = false,
): DecisionVerdict {
  const sorted = sortByIndex(attempts)
  return {
    status: 'failed',
    confidence: 0,
    voteDistribution: EMPTY_DISTRIBUTION,
    reasoningTraces: NO_TRACES,
    attemptsUsed: 0,
    attemptsRejected: sorted.length,
    outcomeCounts: countOutcomes(sorted),
    attempts: sorted,
    timedOut,
    tieBroken: false,
    failure: { code, message },
  }
}

// ---------------------------------------------------------------------------
// resolveDecision
// ---------------------------------------------------------------------------

export function resolveDecision(
  request: ResolvedDecisionRequest,
  attempts: readonly ReasoningAttempt[],
  options: ResolveOptions,
): DecisionVerdict {
  const sorted = sortByIndex(attempts)
  const outcomeCounts = countOutcomes(sorted)
  const { timedOut, maxReasoningTraces } = options

  if (timedOut && outcomeCounts.decoded + outcomeCounts.unknown === 0) {
    return failedVerdict(
      sorted,
      'TIMEOUT',
      `No attempt produced an answer within the ${String(request.timeBudgetMs)}ms time budget`,
      true,
    )
  }
  if (sorted.every((attempt) => attempt.rawText === null)) {
    return failedVerdict(
      sorted,
      'ALL_ATTEMPTS_FAILED',
      `All ${String(sorted.length)} attempts failed without a response`,
      timedOut,
    )
  }

  const aggregation = aggregate(sorted, request.outputSpec, {
    votingRounds: request.votingRounds,
    allowUnresolved: request.allowUnresolved,
  })

  const common = {
    voteDistribution: aggregation.distribution,
    attemptsUsed: aggregation.decodedCount,
    attemptsRejected: sorted.length - aggregation.decodedCount,
    outcomeCounts,
    attempts: sorted,
    timedOut,
  }

  if (aggregation.kind === 'unresolved') {
    return {
      ...common,
      status: 'unresolved',
      confidence: 0,
      reasoningTraces: sampleTraces(sorted, undefined, maxReasoningTraces),
      tieBroken: false,
      unresolvedReason: aggregation.reason,
    }
  }

  const confidence = estimateConfidence(
    aggregation.distribution,
    aggregation.decodedCount,
    aggregation.method,
  )
  const reasoningTraces = sampleTraces(sorted, valueKey(aggregation.value), maxReasoningTraces)

  if (confidence < request.confidenceThreshold && request.allowUnresolved) {
    return {
      ...common,
      status: 'unresolved',
      confidence,
      reasoningTraces,
      tieBroken: aggregation.tieBroken,
      unresolvedReason: 'low-confidence',
    }
  }

  const status: DecisionStatus =
    confidence >= request.confidenceThreshold ? 'resolved' : 'low-confidence-resolved'
  return {
    ...common,
    status,
    value: aggregation.value,
    confidence,
    reasoningTraces,
    tieBroken: aggregation.tieBroken,
  }
}
