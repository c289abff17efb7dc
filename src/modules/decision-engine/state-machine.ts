/**
 * DecisionStateMachine — lifecycle of one decide() call.
 *
 *   Pending → Dispatching → Collecting → Aggregating → terminal
 *
 * Any non-terminal state may move to Failed. Terminal states accept no
 * further transitions.
 */

import type pino from 'pino'
import type { DecisionId, DecisionState } from '../../core/types.js'
import { notifySinks, type ObservabilitySink } from '../observability/sinks.js'

export const VALID_TRANSITIONS: Readonly<Record<DecisionState, readonly DecisionState[]>> = {
  Pending: ['Dispatching', 'Failed'],
  Dispatching: ['Collecting', 'Failed'],
  Collecting: ['Aggregating', 'Failed'],
  Aggregating: ['Resolved', 'LowConfidenceResolved', 'Unresolved', 'Failed'],
  Resolved: [],
  LowConfidenceResolved: [],
  Unresolved: [],
  Failed: [],
}

export function isTerminalState(state: DecisionState): boolean {
  return VALID_TRANSITIONS[state].length === 0
}

export class DecisionStateMachine {
  private readonly _decisionId: DecisionId
  private readonly _sinks: readonly ObservabilitySink[]
  private readonly _logger: pino.Logger
  private readonly _history: DecisionState[] = ['Pending']
  private _state: DecisionState = 'Pending'

  constructor(decisionId: DecisionId, sinks: readonly ObservabilitySink[], logger: pino.Logger) {
    this._decisionId = decisionId
    this._sinks = sinks
    this._logger = logger
  }

  get state(): DecisionState {
    return this._state
  }

  /** States visited so far, starting with Pending */
  get history(): readonly DecisionState[] {
    return [...this._history]
  }

  /**
   * @throws {Error} when `to` is not reachable from the current state
   */
  transition(to: DecisionState): void {
    const from = this._state
    const allowed = VALID_TRANSITIONS[from]
    if (!allowed.includes(to)) {
      throw new Error(
        `Invalid state transition: ${from} → ${to}. Allowed from ${from}: [${allowed.join(', ')}]`,
      )
    }
    this._logger.debug({ decisionId: this._decisionId, from, to }, 'State transition')
    this._state = to
    this._history.push(to)
    const event = { decisionId: this._decisionId, from, to }
    notifySinks(this._sinks, 'onTransition', (sink) => sink.onTransition?.(event))
  }
}
