/**
 * ReasoningRunnerImpl — bounded fan-out with a shared deadline.
 *
 * Every run gets its own pool and AbortController, so concurrent runs share
 * nothing. When the deadline fires the controller aborts with a TimeoutError:
 * in-flight calls stop being awaited, queued attempts start as cancelled, and
 * attempts that already settled are kept.
 */

import { TimeoutError, TransportError, toTransportError } from '../../core/errors.js'
import type { AttemptOutcome, ReasoningAttempt } from '../../core/types.js'
import { raceAbort, withRetry } from '../../utils/helpers.js'
import { createLogger } from '../../utils/logger.js'
import { maskSecrets } from '../../utils/masking.js'
import { decodeAttempt } from '../attempt-decoder/attempt-decoder.js'
import { notifySinks, type ObservabilitySink } from '../observability/sinks.js'
import type { TypedOutputSpec } from '../output-spec/schemas.js'
import type { ComposedPrompt } from '../prompt-composer/prompt-composer.js'
import type {
  ReasoningBatch,
  ReasoningRunner,
  ReasoningRunnerOptions,
  RunOptions,
} from './reasoning-runner.js'
import { createWorkerPool } from './worker-pool.js'

const logger = createLogger('reasoning-runner')

function toAttempt(
  prompt: ComposedPrompt,
  rawText: string | null,
  transportAttempts: number,
  outcome: AttemptOutcome,
): ReasoningAttempt {
  return Object.freeze({
    index: prompt.attemptIndex,
    temperature: prompt.temperature,
    rawText,
    transportAttempts,
    outcome: Object.freeze(outcome),
  })
}

// ---------------------------------------------------------------------------
// ReasoningRunnerImpl
// ---------------------------------------------------------------------------

export class ReasoningRunnerImpl implements ReasoningRunner {
  private readonly _options: ReasoningRunnerOptions

  constructor(options: ReasoningRunnerOptions) {
    this._options = options
  }

  async run(prompts: readonly ComposedPrompt[], options: RunOptions): Promise<ReasoningBatch> {
    const { decisionId, outputSpec, timeBudgetMs, sinks = [] } = options
    const controller = new AbortController()
    const { signal } = controller
    const pool = createWorkerPool(this._options.maxConcurrency)

    let timedOut = false
    let closed = false
    const timer = setTimeout(() => {
      timedOut = true
      logger.warn(
        { decisionId, timeBudgetMs, running: pool.getRunning(), pending: pool.getPending() },
        'Time budget exceeded; cancelling outstanding attempts',
      )
      controller.abort(new TimeoutError(timeBudgetMs, { decisionId }))
    }, timeBudgetMs)

    const settle = (attempt: ReasoningAttempt): ReasoningAttempt => {
      if (!closed) {
        notifySinks(sinks, 'onAttempt', (sink: ObservabilitySink) =>
          sink.onAttempt?.({
            decisionId,
            attemptIndex: attempt.index,
            temperature: attempt.temperature,
            outcome: attempt.outcome,
          }),
        )
      }
      return attempt
    }

    logger.debug(
      { decisionId, attempts: prompts.length, maxConcurrency: this._options.maxConcurrency, timeBudgetMs },
      'Dispatching reasoning attempts',
    )

    try {
      const attempts = await Promise.all(
        prompts.map((prompt) =>
          pool.submit(() => this._runAttempt(prompt, outputSpec, signal)).then(settle),
        ),
      )
      attempts.sort((a, b) => a.index - b.index)
      return { attempts: Object.freeze(attempts), timedOut }
    } finally {
      closed = true
      clearTimeout(timer)
      // Releases anything still waiting when a decode error ends the batch early
      controller.abort()
    }
  }

  // ---------------------------------------------------------------------------
  // Single attempt
  // ---------------------------------------------------------------------------

  private async _runAttempt(
    prompt: ComposedPrompt,
    outputSpec: TypedOutputSpec,
    signal: AbortSignal,
  ): Promise<ReasoningAttempt> {
    if (signal.aborted) {
      return toAttempt(prompt, null, 0, { kind: 'cancelled' })
    }

    const { client, maxTransportRetries, retryBaseDelayMs, undeterminedSentinel } = this._options
    let transportAttempts = 0
    let rawText: string

    try {
      rawText = await withRetry(
        async () => {
          transportAttempts++
          const result = await raceAbort(
            client.generate(prompt.text, prompt.temperature, { signal }),
            signal,
          )
          if (!result.ok) throw result.error
          return result.text
        },
        {
          maxRetries: maxTransportRetries,
          baseDelayMs: retryBaseDelayMs,
          signal,
          shouldRetry: (error) => !(error instanceof TransportError) || error.retryable,
          onRetry: (retry, error) => {
            logger.debug(
              { attemptIndex: prompt.attemptIndex, retry, error: maskSecrets(error.message) },
              'Retrying attempt after transport failure',
            )
          },
        },
      )
    } catch (err) {
      if (signal.aborted) {
        return toAttempt(prompt, null, transportAttempts, { kind: 'cancelled' })
      }
      const reason = maskSecrets(toTransportError(err).message)
      logger.warn(
        { attemptIndex: prompt.attemptIndex, transportAttempts, reason },
        'Attempt failed after transport retries',
      )
      return toAttempt(prompt, null, transportAttempts, { kind: 'transport-failed', reason })
    }

    const outcome = decodeAttempt(rawText, outputSpec, { undeterminedSentinel })
    return toAttempt(prompt, rawText, transportAttempts, outcome)
  }
}

// ---------------------------------------------------------------------------
// Factory function
// ---------------------------------------------------------------------------

export function createReasoningRunner(options: ReasoningRunnerOptions): ReasoningRunner {
  return new ReasoningRunnerImpl(options)
}
