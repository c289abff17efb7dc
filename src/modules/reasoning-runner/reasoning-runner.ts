/**
 * ReasoningRunner — fans one batch of prompts out to the generation client.
 */

import type { DecisionId, ReasoningAttempt } from '../../core/types.js'
import type { GenerationClient } from '../generation/generation-client.js'
import type { ObservabilitySink } from '../observability/sinks.js'
import type { TypedOutputSpec } from '../output-spec/schemas.js'
import type { ComposedPrompt } from '../prompt-composer/prompt-composer.js'

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ReasoningRunnerOptions {
  client: GenerationClient
  /** Concurrent generate() calls; further attempts queue */
  maxConcurrency: number
  /** Retries after a transport failure, per attempt */
  maxTransportRetries: number
  /** First backoff delay; doubles on each retry */
  retryBaseDelayMs: number
  undeterminedSentinel: string
}

export interface RunOptions {
  decisionId: DecisionId
  outputSpec: TypedOutputSpec
  /** Deadline for the whole batch */
  timeBudgetMs: number
  sinks?: readonly ObservabilitySink[]
}

export interface ReasoningBatch {
  /** One attempt per prompt, ordered by attempt index */
  attempts: readonly ReasoningAttempt[]
  /** True when the deadline fired before every attempt settled */
  timedOut: boolean
}

export interface ReasoningRunner {
  /**
   * Run every prompt once and wait until all attempts settle or the deadline
   * passes. Attempt-level failures are recorded in the returned attempts.
   *
   * @throws when decoding a response fails unexpectedly
   */
  run(prompts: readonly ComposedPrompt[], options: RunOptions): Promise<ReasoningBatch>
}
