/**
 * Decision log query functions for the SQLite persistence layer.
 *
 * Provides record/read operations for the `decisions` and
 * `decision_attempts` tables, and confidence replay from a stored
 * vote distribution.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import type { z } from 'zod'
import type {
  AttemptOutcome,
  DecisionId,
  DecisionState,
  DecisionStatus,
  DecisionValue,
  ReasoningAttempt,
  UnresolvedReason,
  VoteDistribution,
} from '../../core/types.js'
import { estimateConfidence, type AggregationMethod } from '../../modules/aggregator/confidence.js'
import { methodFor } from '../../modules/aggregator/aggregator.js'
import type {
  DecisionFailure,
  DecisionResult,
  ResolvedDecisionRequest,
} from '../../modules/decision-engine/types.js'
import { parseOutputSpec } from '../../modules/output-spec/output-spec.js'
import type { OutputKind } from '../../modules/output-spec/schemas.js'
import {
  DecisionAttemptRowSchema,
  DecisionRowSchema,
  DecisionValueSchema,
  ListDecisionsOptionsSchema,
  StateHistorySchema,
  StoredRequestSchema,
  VoteDistributionSchema,
  type DecisionAttemptRow,
  type DecisionRow,
  type ListDecisionsOptions,
} from '../schemas/decisions.js'

export type { ListDecisionsOptions }

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** A decision as read back from the log */
export interface StoredDecision {
  id: DecisionId
  status: DecisionStatus
  /** Null when the request never passed validation */
  outputKind: OutputKind | null
  confidenceMethod: AggregationMethod | null
  value?: DecisionValue
  confidence: number
  voteDistribution: VoteDistribution
  attemptsUsed: number
  attemptsRejected: number
  timedOut: boolean
  tieBroken: boolean
  unresolvedReason?: UnresolvedReason
  failure?: DecisionFailure
  request: ResolvedDecisionRequest | null
  stateHistory: DecisionState[]
  durationMs: number
  createdAt: string
}

const InsertDecisionRowSchema = DecisionRowSchema.omit({ created_at: true })

// ---------------------------------------------------------------------------
// Row mapping
// ---------------------------------------------------------------------------

function parseJsonColumn<S extends z.ZodTypeAny>(
  text: string | null,
  schema: S,
  column: string,
): z.infer<S> {
  if (text === null) {
    throw new Error(`Decision log row is missing ${column}`)
  }
  const raw: unknown = JSON.parse(text)
  return schema.parse(raw)
}

function attemptToRow(decisionId: DecisionId, attempt: ReasoningAttempt): DecisionAttemptRow {
  const base: DecisionAttemptRow = {
    decision_id: decisionId,
    attempt_index: attempt.index,
    temperature: attempt.temperature,
    outcome: attempt.outcome.kind,
    value_json: null,
    reasoning_trace: null,
    rejection_reason: null,
    detail: null,
    raw_text: attempt.rawText,
    transport_attempts: attempt.transportAttempts,
  }
  const { outcome } = attempt
  switch (outcome.kind) {
    case 'decoded':
      return { ...base, value_json: JSON.stringify(outcome.value), reasoning_trace: outcome.reasoningTrace }
    case 'unknown':
      return { ...base, reasoning_trace: outcome.reasoningTrace }
    case 'parse-rejected':
      return { ...base, rejection_reason: outcome.reason, detail: outcome.detail }
    case 'transport-failed':
      return { ...base, detail: outcome.reason }
    case 'cancelled':
      return base
  }
}

function rowToOutcome(row: DecisionAttemptRow): AttemptOutcome {
  switch (row.outcome) {
    case 'decoded':
      return {
        kind: 'decoded',
        value: parseJsonColumn(row.value_json, DecisionValueSchema, 'value_json'),
        reasoningTrace: row.reasoning_trace ?? '',
      }
    case 'unknown':
      return { kind: 'unknown', reasoningTrace: row.reasoning_trace ?? '' }
    case 'parse-rejected':
      if (row.rejection_reason === null) {
        throw new Error('Decision log row is missing rejection_reason')
      }
      return { kind: 'parse-rejected', reason: row.rejection_reason, detail: row.detail ?? '' }
    case 'transport-failed':
      return { kind: 'transport-failed', reason: row.detail ?? '' }
    case 'cancelled':
      return { kind: 'cancelled' }
  }
}

function rowToAttempt(row: DecisionAttemptRow): ReasoningAttempt {
  return {
    index: row.attempt_index,
    temperature: row.temperature,
    rawText: row.raw_text,
    transportAttempts: row.transport_attempts,
    outcome: rowToOutcome(row),
  }
}

function rowToDecision(row: DecisionRow): StoredDecision {
  let request: ResolvedDecisionRequest | null = null
  if (row.request_json !== null) {
    const stored = parseJsonColumn(row.request_json, StoredRequestSchema, 'request_json')
    request = { ...stored, outputSpec: parseOutputSpec(stored.outputSpec) }
  }

  return {
    id: row.id,
    status: row.status,
    outputKind: row.output_kind,
    confidenceMethod: row.confidence_method,
    ...(row.value_json !== null
      ? { value: parseJsonColumn(row.value_json, DecisionValueSchema, 'value_json') }
      : {}),
    confidence: row.confidence,
    voteDistribution: parseJsonColumn(row.vote_distribution_json, VoteDistributionSchema, 'vote_distribution_json'),
    attemptsUsed: row.attempts_used,
    attemptsRejected: row.attempts_rejected,
    timedOut: row.timed_out === 1,
    tieBroken: row.tie_broken === 1,
    ...(row.unresolved_reason !== null ? { unresolvedReason: row.unresolved_reason } : {}),
    ...(row.failure_code !== null
      ? { failure: { code: row.failure_code, message: row.failure_message ?? '' } }
      : {}),
    request,
    stateHistory: parseJsonColumn(row.state_history_json, StateHistorySchema, 'state_history_json'),
    durationMs: row.duration_ms,
    createdAt: row.created_at ?? '',
  }
}

// ---------------------------------------------------------------------------
// Decision queries
// ---------------------------------------------------------------------------

/**
 * Insert a completed decision and all of its attempts in one transaction.
 *
 * @param request - The resolved request, or null when validation failed
 */
export function recordDecision(
  db: BetterSqlite3Database,
  result: DecisionResult,
  request: ResolvedDecisionRequest | null,
): void {
  const row = InsertDecisionRowSchema.parse({
    id: result.decisionId,
    status: result.status,
    output_kind: request?.outputSpec.kind ?? null,
    confidence_method: request !== null ? methodFor(request.outputSpec) : null,
    value_json: result.value !== undefined ? JSON.stringify(result.value) : null,
    confidence: result.confidence,
    vote_distribution_json: JSON.stringify(result.voteDistribution),
    attempts_used: result.attemptsUsed,
    attempts_rejected: result.attemptsRejected,
    timed_out: result.timedOut ? 1 : 0,
    tie_broken: result.tieBroken ? 1 : 0,
    unresolved_reason: result.unresolvedReason ?? null,
    failure_code: result.failure?.code ?? null,
    failure_message: result.failure?.message ?? null,
    request_json: request !== null ? JSON.stringify(request) : null,
    state_history_json: JSON.stringify(result.stateHistory),
    duration_ms: result.durationMs,
  })
  const attemptRows = result.attempts.map((attempt) =>
    DecisionAttemptRowSchema.parse(attemptToRow(result.decisionId, attempt)),
  )

  const insertDecision = db.prepare(`
    INSERT INTO decisions (
      id, status, output_kind, confidence_method, value_json, confidence,
      vote_distribution_json, attempts_used, attempts_rejected, timed_out, tie_broken,
      unresolved_reason, failure_code, failure_message, request_json,
      state_history_json, duration_ms
    ) VALUES (
      @id, @status, @output_kind, @confidence_method, @value_json, @confidence,
      @vote_distribution_json, @attempts_used, @attempts_rejected, @timed_out, @tie_broken,
      @unresolved_reason, @failure_code, @failure_message, @request_json,
      @state_history_json, @duration_ms
    )
  `)
  const insertAttempt = db.prepare(`
    INSERT INTO decision_attempts (
      decision_id, attempt_index, temperature, outcome, value_json, reasoning_trace,
      rejection_reason, detail, raw_text, transport_attempts
    ) VALUES (
      @decision_id, @attempt_index, @temperature, @outcome, @value_json, @reasoning_trace,
      @rejection_reason, @detail, @raw_text, @transport_attempts
    )
  `)

  db.transaction(() => {
    insertDecision.run(row)
    for (const attemptRow of attemptRows) {
      insertAttempt.run(attemptRow)
    }
  })()
}

/** Fetch one decision by id */
export function getDecision(db: BetterSqlite3Database, id: DecisionId): StoredDecision | undefined {
  const raw = db.prepare('SELECT * FROM decisions WHERE id = ?').get(id)
  if (raw === undefined) return undefined
  return rowToDecision(DecisionRowSchema.parse(raw))
}

/** Most recent decisions first, optionally filtered by status */
export function listDecisions(
  db: BetterSqlite3Database,
  options: ListDecisionsOptions = {},
): StoredDecision[] {
  const { status, limit } = ListDecisionsOptionsSchema.parse(options)
  const rows =
    status !== undefined
      ? db
          .prepare('SELECT * FROM decisions WHERE status = ? ORDER BY created_at DESC, rowid DESC LIMIT ?')
          .all(status, limit)
      : db.prepare('SELECT * FROM decisions ORDER BY created_at DESC, rowid DESC LIMIT ?').all(limit)
  return rows.map((raw) => rowToDecision(DecisionRowSchema.parse(raw)))
}

/** Attempts of one decision, ordered by attempt index */
export function getDecisionAttempts(db: BetterSqlite3Database, id: DecisionId): ReasoningAttempt[] {
  return db
    .prepare('SELECT * FROM decision_attempts WHERE decision_id = ? ORDER BY attempt_index ASC')
    .all(id)
    .map((raw) => rowToAttempt(DecisionAttemptRowSchema.parse(raw)))
}

/**
 * Recompute a stored decision's confidence from its vote distribution.
 *
 * Decisions without a winning value (failed, or unresolved for any reason
 * other than low confidence) carry confidence 0.
 *
 * @returns undefined when no decision has this id
 */
export function replayConfidence(db: BetterSqlite3Database, id: DecisionId): number | undefined {
  const decision = getDecision(db, id)
  if (decision === undefined) return undefined
  if (decision.confidenceMethod === null || decision.status === 'failed') return 0
  if (decision.status === 'unresolved' && decision.unresolvedReason !== 'low-confidence') return 0
  return estimateConfidence(decision.voteDistribution, decision.attemptsUsed, decision.confidenceMethod)
}
