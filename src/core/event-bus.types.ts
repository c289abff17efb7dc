/**
 * DecisionEvents interface — defines all typed events for the event bus.
 *
 * Event naming convention: {subject}:{action} (e.g., "attempt:settled")
 */

import type {
  AttemptIndex,
  AttemptOutcome,
  DecisionId,
  DecisionState,
  DecisionStatus,
  DecisionValue,
} from './types.js'

// ---------------------------------------------------------------------------
// Payloads
// ---------------------------------------------------------------------------

/** A reasoning attempt reached its final outcome */
export interface AttemptSettledEvent {
  decisionId: DecisionId
  attemptIndex: AttemptIndex
  temperature: number
  outcome: AttemptOutcome
}

/** The decision state machine moved to a new state */
export interface DecisionTransitionEvent {
  decisionId: DecisionId
  from: DecisionState
  to: DecisionState
}

/** A decide() call produced its result */
export interface DecisionCompleteEvent {
  decisionId: DecisionId
  status: DecisionStatus
  value?: DecisionValue
  confidence: number
  durationMs: number
}

// ---------------------------------------------------------------------------
// DecisionEvents
// ---------------------------------------------------------------------------

/**
 * Complete typed map of all events emitted on the decision event bus.
 * Use `keyof DecisionEvents` to constrain event keys.
 */
export interface DecisionEvents {
  'attempt:settled': AttemptSettledEvent

  'decision:transition': DecisionTransitionEvent

  'decision:complete': DecisionCompleteEvent
}
