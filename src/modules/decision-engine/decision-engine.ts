/**
 * DecisionEngine interface definition.
 *
 * A decision engine asks the generation client the same question several
 * times at different temperatures, decodes each answer into a typed value and
 * votes the attempts into one answer with a confidence score.
 */

import type pino from 'pino'
import type { QuorateConfig } from '../config/config-schema.js'
import type { GenerationClient } from '../generation/generation-client.js'
import type { ObservabilitySink } from '../observability/sinks.js'
import type { DecisionLog, DecisionRequest, DecisionResult } from './types.js'

export interface DecisionEngineOptions {
  /** The text-generation capability; the engine never creates one */
  client: GenerationClient
  /** Validated on construction; defaults to DEFAULT_CONFIG */
  config?: QuorateConfig
  sinks?: readonly ObservabilitySink[]
  /** Receives every completed result; takes precedence over persistence.database_path */
  decisionLog?: DecisionLog
  logger?: pino.Logger
}

export interface DecisionEngine {
  /**
   * Make one decision.
   *
   * Never rejects: malformed requests, deadlines with nothing to show, batches
   * where every attempt failed and unexpected internal errors all resolve to a
   * result with status `failed`. Uncertain answers resolve to `unresolved` or
   * `low-confidence-resolved`.
   */
  decide(request: DecisionRequest): Promise<DecisionResult>

  /**
   * Release the decision log database the engine opened from its config.
   * A log passed in `options.decisionLog` is left open for its owner.
   */
  close(): void
}
