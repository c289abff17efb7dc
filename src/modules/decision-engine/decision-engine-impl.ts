/**
 * DecisionEngineImpl — drives one decide() call through its state machine.
 *
 * Components are built once per engine and hold no per-decision state; each
 * call gets its own state machine, worker pool and deadline.
 */

import type pino from 'pino'
import { ConfigError, ValidationError } from '../../core/errors.js'
import type { DecisionState, DecisionStatus } from '../../core/types.js'
import { generateId } from '../../utils/helpers.js'
import { createLogger } from '../../utils/logger.js'
import { QuorateConfigSchema, type QuorateConfig } from '../config/config-schema.js'
import { DEFAULT_CONFIG } from '../config/defaults.js'
import { notifySinks, type ObservabilitySink } from '../observability/sinks.js'
import { openDecisionLog } from '../../persistence/decision-log.js'
import type { DatabaseService } from '../../persistence/database.js'
import { formatIssues } from '../output-spec/output-spec.js'
import { createPromptComposer, type PromptComposer } from '../prompt-composer/prompt-composer.js'
import { createReasoningRunner } from '../reasoning-runner/reasoning-runner-impl.js'
import type { ReasoningRunner } from '../reasoning-runner/reasoning-runner.js'
import type { DecisionEngine, DecisionEngineOptions } from './decision-engine.js'
import { resolveRequest } from './request-validator.js'
import { failedVerdict, resolveDecision, type DecisionVerdict } from './resolve-decision.js'
import { DecisionStateMachine } from './state-machine.js'
import type { DecisionLog, DecisionRequest, DecisionResult, ResolvedDecisionRequest } from './types.js'

const TERMINAL_STATE: Record<DecisionStatus, DecisionState> = {
  resolved: 'Resolved',
  'low-confidence-resolved': 'LowConfidenceResolved',
  unresolved: 'Unresolved',
  failed: 'Failed',
}

// ---------------------------------------------------------------------------
// DecisionEngineImpl
// ---------------------------------------------------------------------------

export class DecisionEngineImpl implements DecisionEngine {
  private readonly _config: QuorateConfig
  private readonly _sinks: readonly ObservabilitySink[]
  private readonly _decisionLog: DecisionLog | undefined
  /** Set when the engine opened the decision log itself from persistence.database_path */
  private readonly _ownedDatabase: DatabaseService | undefined
  private readonly _logger: pino.Logger
  private readonly _composer: PromptComposer
  private readonly _runner: ReasoningRunner

  constructor(options: DecisionEngineOptions) {
    const parsed = QuorateConfigSchema.safeParse(options.config ?? DEFAULT_CONFIG)
    if (!parsed.success) {
      throw new ConfigError('Invalid engine configuration', {
        issues: formatIssues(parsed.error, 'config'),
      })
    }
    this._config = parsed.data
    this._sinks = options.sinks ?? []
    this._logger =
      options.logger ?? createLogger('decision-engine', { level: this._config.global.log_level })

    const databasePath = this._config.persistence?.database_path
    if (options.decisionLog === undefined && databasePath !== undefined) {
      const opened = openDecisionLog(databasePath)
      this._decisionLog = opened.log
      this._ownedDatabase = opened.service
      this._logger.debug({ databasePath }, 'Decision log opened from configuration')
    } else {
      this._decisionLog = options.decisionLog
      this._ownedDatabase = undefined
    }

    const { engine, prompt } = this._config
    this._composer = createPromptComposer({
      reasoningSteps: prompt.reasoning_steps,
      conclusionSentences: prompt.conclusion_sentences,
      undeterminedSentinel: prompt.undetermined_sentinel,
      tokenCeiling: prompt.token_ceiling,
    })
    this._runner = createReasoningRunner({
      client: options.client,
      maxConcurrency: engine.max_concurrency,
      maxTransportRetries: engine.max_transport_retries,
      retryBaseDelayMs: engine.retry_base_delay_ms,
      undeterminedSentinel: prompt.undetermined_sentinel,
    })
  }

  async decide(request: DecisionRequest): Promise<DecisionResult> {
    const decisionId = generateId('dec')
    const startedAt = Date.now()
    const log = this._logger.child({ decisionId })
    const machine = new DecisionStateMachine(decisionId, this._sinks, log)

    let resolved: ResolvedDecisionRequest | null = null
    let verdict: DecisionVerdict
    try {
      const validated = resolveRequest(request, this._config.engine)
      resolved = validated
      verdict = await this._execute(decisionId, validated, machine)
    } catch (err) {
      verdict = this._failureVerdict(err, log)
    }

    machine.transition(TERMINAL_STATE[verdict.status])
    const result: DecisionResult = Object.freeze({
      decisionId,
      ...verdict,
      stateHistory: machine.history,
      durationMs: Date.now() - startedAt,
    })

    log.info(
      {
        status: result.status,
        value: result.value,
        confidence: result.confidence,
        attemptsUsed: result.attemptsUsed,
        attemptsRejected: result.attemptsRejected,
        durationMs: result.durationMs,
      },
      'Decision complete',
    )
    this._report(result, resolved, log)
    return result
  }

  close(): void {
    this._ownedDatabase?.shutdown()
  }

  // ---------------------------------------------------------------------------
  // Private helpers
  // ---------------------------------------------------------------------------

  private async _execute(
    decisionId: string,
    request: ResolvedDecisionRequest,
    machine: DecisionStateMachine,
  ): Promise<DecisionVerdict> {
    machine.transition('Dispatching')
    const prompts = request.temperatures.map((temperature, index) =>
      this._composer.compose(request, temperature, index),
    )

    machine.transition('Collecting')
    const batch = await this._runner.run(prompts, {
      decisionId,
      outputSpec: request.outputSpec,
      timeBudgetMs: request.timeBudgetMs,
      sinks: this._sinks,
    })

    machine.transition('Aggregating')
    return resolveDecision(request, batch.attempts, {
      timedOut: batch.timedOut,
      maxReasoningTraces: this._config.engine.max_reasoning_traces,
    })
  }

  private _failureVerdict(err: unknown, log: pino.Logger): DecisionVerdict {
    if (err instanceof ValidationError) {
      log.warn({ issues: err.issues }, 'Decision request rejected')
      const detail = err.issues.length > 0 ? `: ${err.issues.join('; ')}` : ''
      return failedVerdict([], 'VALIDATION_ERROR', `${err.message}${detail}`)
    }
    log.error({ err }, 'Decision failed with an internal error')
    const message = err instanceof Error ? err.message : String(err)
    return failedVerdict([], 'INTERNAL_ERROR', message)
  }

  private _report(
    result: DecisionResult,
    request: ResolvedDecisionRequest | null,
    log: pino.Logger,
  ): void {
    const event = {
      decisionId: result.decisionId,
      status: result.status,
      ...(result.value !== undefined ? { value: result.value } : {}),
      confidence: result.confidence,
      durationMs: result.durationMs,
    }
    notifySinks(this._sinks, 'onComplete', (sink) => sink.onComplete?.(event))

    if (this._decisionLog === undefined) return
    try {
      this._decisionLog.record(result, request)
    } catch (err) {
      log.error({ err }, 'Failed to record decision in the decision log')
    }
  }
}

// ---------------------------------------------------------------------------
// Factory function
// ---------------------------------------------------------------------------

/**
 * Create a DecisionEngine.
 *
 * When `options.decisionLog` is omitted and the config names
 * `persistence.database_path`, the engine opens that database itself; call
 * `close()` to release it.
 *
 * @throws {ConfigError} when `options.config` fails validation
 */
export function createDecisionEngine(options: DecisionEngineOptions): DecisionEngine {
  return new DecisionEngineImpl(options)
}
