/**
 * Core types for quorate
 * Shared type definitions used across all modules
 */

/** Unique identifier for one decide() call */
export type DecisionId = string

/** Zero-based index of a reasoning attempt within its batch */
export type AttemptIndex = number

/** Severity level for log messages */
export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal'

/** A decoded, normalized answer value */
export type DecisionValue = boolean | number | string

// ---------------------------------------------------------------------------
// Attempt outcomes
// ---------------------------------------------------------------------------

/** Why a response could not be decoded into a typed value */
export type ParseRejectionReason =
  | 'EmptyResponse'
  | 'AmbiguousBoolean'
  | 'NoIntegerFound'
  | 'OutOfBounds'
  | 'NotInAllowedSet'

export interface DecodedOutcome {
  kind: 'decoded'
  value: DecisionValue
  reasoningTrace: string
}

/** The model explicitly signalled that the answer cannot be determined */
export interface UnknownOutcome {
  kind: 'unknown'
  reasoningTrace: string
}

export interface ParseRejectedOutcome {
  kind: 'parse-rejected'
  reason: ParseRejectionReason
  detail: string
}

export interface TransportFailedOutcome {
  kind: 'transport-failed'
  reason: string
}

export interface CancelledOutcome {
  kind: 'cancelled'
}

export type AttemptOutcome =
  | DecodedOutcome
  | UnknownOutcome
  | ParseRejectedOutcome
  | TransportFailedOutcome
  | CancelledOutcome

export type AttemptOutcomeKind = AttemptOutcome['kind']

export const ATTEMPT_OUTCOME_KINDS: readonly AttemptOutcomeKind[] = [
  'decoded',
  'unknown',
  'parse-rejected',
  'transport-failed',
  'cancelled',
]

/** One independent invocation of the generation collaborator and its outcome */
export interface ReasoningAttempt {
  readonly index: AttemptIndex
  readonly temperature: number
  /** Text received from the collaborator; null when nothing was received */
  readonly rawText: string | null
  /** Number of generate() calls made, retries included */
  readonly transportAttempts: number
  readonly outcome: AttemptOutcome
}

// ---------------------------------------------------------------------------
// Votes
// ---------------------------------------------------------------------------

export interface VoteCount {
  readonly value: DecisionValue
  readonly votes: number
}

/**
 * Distinct decoded values with their supporting attempt counts.
 * Sorted by votes descending, then by value, so equal distributions compare equal.
 */
export type VoteDistribution = readonly VoteCount[]

// ---------------------------------------------------------------------------
// Decision lifecycle
// ---------------------------------------------------------------------------

export type DecisionStatus = 'resolved' | 'low-confidence-resolved' | 'unresolved' | 'failed'

export type DecisionState =
  | 'Pending'
  | 'Dispatching'
  | 'Collecting'
  | 'Aggregating'
  | 'Resolved'
  | 'LowConfidenceResolved'
  | 'Unresolved'
  | 'Failed'

export type UnresolvedReason = 'quorum-not-met' | 'all-unknown' | 'tie' | 'low-confidence'

export type FailureCode = 'VALIDATION_ERROR' | 'TIMEOUT' | 'ALL_ATTEMPTS_FAILED' | 'INTERNAL_ERROR'
