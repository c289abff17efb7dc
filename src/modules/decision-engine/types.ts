/**
 * Request and result types for the decision engine.
 */

import type {
  AttemptIndex,
  AttemptOutcomeKind,
  DecisionId,
  DecisionState,
  DecisionStatus,
  DecisionValue,
  FailureCode,
  ReasoningAttempt,
  UnresolvedReason,
  VoteDistribution,
} from '../../core/types.js'
import type { TypedOutputSpec } from '../output-spec/schemas.js'

// ---------------------------------------------------------------------------
// Request
// ---------------------------------------------------------------------------

/** Pure mapping from (attempt index, batch size) to a sampling temperature */
export type TemperatureSchedule = (attemptIndex: AttemptIndex, votingRounds: number) => number

export interface DecisionRequest {
  /** The question the model reasons about */
  instructions: string
  outputSpec: TypedOutputSpec
  /** Appended to every prompt when present */
  context?: string
  /** Number of attempts N; defaults to engine.default_voting_rounds */
  votingRounds?: number
  temperatureSchedule?: TemperatureSchedule
  /** Minimum confidence for a resolved status, in [0, 1] */
  confidenceThreshold?: number
  /** Deadline for the whole batch */
  timeBudgetMs?: number
  /** Prefer an unresolved result over a low-confidence or tie-broken answer */
  allowUnresolved?: boolean
}

/** A validated request with every default applied and temperatures computed */
export interface ResolvedDecisionRequest {
  instructions: string
  outputSpec: TypedOutputSpec
  context?: string
  votingRounds: number
  confidenceThreshold: number
  timeBudgetMs: number
  allowUnresolved: boolean
  /** temperatures[i] is the temperature of attempt i */
  temperatures: readonly number[]
}

// ---------------------------------------------------------------------------
// Result
// ---------------------------------------------------------------------------

export interface ReasoningTraceSample {
  attemptIndex: AttemptIndex
  temperature: number
  trace: string
}

export interface DecisionFailure {
  code: FailureCode
  message: string
}

export type OutcomeCounts = Readonly<Record<AttemptOutcomeKind, number>>

export interface DecisionResult {
  readonly decisionId: DecisionId
  readonly status: DecisionStatus
  /** Present only for resolved and low-confidence-resolved */
  readonly value?: DecisionValue
  readonly confidence: number
  readonly voteDistribution: VoteDistribution
  readonly reasoningTraces: readonly ReasoningTraceSample[]
  /** Decoded attempts that voted */
  readonly attemptsUsed: number
  /** Every other attempt: unknown, rejected, failed or cancelled */
  readonly attemptsRejected: number
  readonly outcomeCounts: OutcomeCounts
  readonly attempts: readonly ReasoningAttempt[]
  readonly timedOut: boolean
  readonly tieBroken: boolean
  readonly unresolvedReason?: UnresolvedReason
  readonly failure?: DecisionFailure
  readonly stateHistory: readonly DecisionState[]
  readonly durationMs: number
}

// ---------------------------------------------------------------------------
// Decision log
// ---------------------------------------------------------------------------

/** Optional audit sink for completed decisions */
export interface DecisionLog {
  record(result: DecisionResult, request: ResolvedDecisionRequest | null): void
}
