/**
 * Observability sinks — side-effecting listeners for decision progress.
 *
 * Sinks see every finalized attempt, every state transition and the final
 * result. They never influence aggregation: a sink that throws is logged and
 * skipped.
 */

import type pino from 'pino'
import type { TypedEventBus } from '../../core/event-bus.js'
import type {
  AttemptSettledEvent,
  DecisionCompleteEvent,
  DecisionTransitionEvent,
} from '../../core/event-bus.types.js'
import { createLogger } from '../../utils/logger.js'

const logger = createLogger('observability')

// ---------------------------------------------------------------------------
// ObservabilitySink interface
// ---------------------------------------------------------------------------

export interface ObservabilitySink {
  onAttempt?(event: AttemptSettledEvent): void
  onTransition?(event: DecisionTransitionEvent): void
  onComplete?(event: DecisionCompleteEvent): void
}

export type SinkHook = keyof ObservabilitySink

/**
 * Run `deliver` against every sink. Errors thrown by a sink are logged and
 * do not reach the caller or the remaining sinks.
 *
 * @example
 * notifySinks(sinks, 'onAttempt', (sink) => sink.onAttempt?.(event))
 */
export function notifySinks(
  sinks: readonly ObservabilitySink[],
  hook: SinkHook,
  deliver: (sink: ObservabilitySink) => void,
): void {
  for (const sink of sinks) {
    try {
      deliver(sink)
    } catch (err) {
      logger.warn({ err, hook }, 'Observability sink threw; event dropped for this sink')
    }
  }
}

// ---------------------------------------------------------------------------
// Built-in sinks
// ---------------------------------------------------------------------------

/**
 * Sink that writes structured pino records: attempts and transitions at
 * debug, completions at info.
 */
export function createLoggingSink(target: pino.Logger = logger): ObservabilitySink {
  return {
    onAttempt(event) {
      const { outcome } = event
      const detail =
        outcome.kind === 'parse-rejected'
          ? { reason: outcome.reason, detail: outcome.detail }
          : outcome.kind === 'transport-failed'
            ? { reason: outcome.reason }
            : outcome.kind === 'decoded'
              ? { value: outcome.value }
              : {}
      target.debug(
        {
          decisionId: event.decisionId,
          attemptIndex: event.attemptIndex,
          temperature: event.temperature,
          outcome: outcome.kind,
          ...detail,
        },
        'Attempt settled',
      )
    },
    onTransition(event) {
      target.debug(event, 'Decision state transition')
    },
    onComplete(event) {
      target.info(event, 'Decision complete')
    },
  }
}

/**
 * Sink that republishes events on a TypedEventBus.
 */
export function createEventBusSink(bus: TypedEventBus): ObservabilitySink {
  return {
    onAttempt(event) {
      bus.emit('attempt:settled', event)
    },
    onTransition(event) {
      bus.emit('decision:transition', event)
    },
    onComplete(event) {
      bus.emit('decision:complete', event)
    },
  }
}
