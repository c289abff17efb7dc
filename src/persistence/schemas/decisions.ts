/**
 * Zod schemas for the decision audit log.
 *
 * Row schemas mirror the SQLite columns exactly; rows are parsed on the way
 * out and the rows built from a DecisionResult are parsed on the way in.
 */

import { z } from 'zod'
import { ATTEMPT_OUTCOME_KINDS } from '../../core/types.js'

// ---------------------------------------------------------------------------
// Enums
// ---------------------------------------------------------------------------

export const DecisionStatusEnum = z.enum(['resolved', 'low-confidence-resolved', 'unresolved', 'failed'])

export const DecisionStateEnum = z.enum([
  'Pending',
  'Dispatching',
  'Collecting',
  'Aggregating',
  'Resolved',
  'LowConfidenceResolved',
  'Unresolved',
  'Failed',
])

export const UnresolvedReasonEnum = z.enum(['quorum-not-met', 'all-unknown', 'tie', 'low-confidence'])

export const FailureCodeEnum = z.enum([
  'VALIDATION_ERROR',
  'TIMEOUT',
  'ALL_ATTEMPTS_FAILED',
  'INTERNAL_ERROR',
])

export const OutputKindEnum = z.enum(['boolean', 'bounded-integer', 'enum-string'])

export const AggregationMethodEnum = z.enum(['mode', 'median'])

export const AttemptOutcomeKindEnum = z.enum(['decoded', 'unknown', 'parse-rejected', 'transport-failed', 'cancelled'])

export const ParseRejectionReasonEnum = z.enum([
  'EmptyResponse',
  'AmbiguousBoolean',
  'NoIntegerFound',
  'OutOfBounds',
  'NotInAllowedSet',
])

// Keeps the SQL CHECK constraint and the outcome union in step
export const OUTCOME_KINDS_SQL = ATTEMPT_OUTCOME_KINDS.map((kind) => `'${kind}'`).join(',')

// ---------------------------------------------------------------------------
// JSON payloads
// ---------------------------------------------------------------------------

export const DecisionValueSchema = z.union([z.boolean(), z.number(), z.string()])

export const VoteDistributionSchema = z.array(
  z.object({
    value: DecisionValueSchema,
    votes: z.number().int().positive(),
  }),
)

export const StateHistorySchema = z.array(DecisionStateEnum).min(1)

/** The resolved request as stored; the schedule is kept as its temperatures */
export const StoredRequestSchema = z.object({
  instructions: z.string(),
  outputSpec: z.record(z.unknown()),
  context: z.string().optional(),
  votingRounds: z.number().int().positive(),
  confidenceThreshold: z.number().min(0).max(1),
  timeBudgetMs: z.number().int().positive(),
  allowUnresolved: z.boolean(),
  temperatures: z.array(z.number()),
})
export type StoredRequest = z.infer<typeof StoredRequestSchema>

// ---------------------------------------------------------------------------
// decisions
// ---------------------------------------------------------------------------

export const DecisionRowSchema = z.object({
  id: z.string().min(1),
  status: DecisionStatusEnum,
  output_kind: OutputKindEnum.nullable(),
  confidence_method: AggregationMethodEnum.nullable(),
  value_json: z.string().nullable(),
  confidence: z.number().min(0).max(1),
  vote_distribution_json: z.string(),
  attempts_used: z.number().int().nonnegative(),
  attempts_rejected: z.number().int().nonnegative(),
  timed_out: z.union([z.literal(0), z.literal(1)]),
  tie_broken: z.union([z.literal(0), z.literal(1)]),
  unresolved_reason: UnresolvedReasonEnum.nullable(),
  failure_code: FailureCodeEnum.nullable(),
  failure_message: z.string().nullable(),
  request_json: z.string().nullable(),
  state_history_json: z.string(),
  duration_ms: z.number().int().nonnegative(),
  created_at: z.string().optional(),
})
export type DecisionRow = z.infer<typeof DecisionRowSchema>

// ---------------------------------------------------------------------------
// decision_attempts
// ---------------------------------------------------------------------------

export const DecisionAttemptRowSchema = z.object({
  decision_id: z.string().min(1),
  attempt_index: z.number().int().nonnegative(),
  temperature: z.number(),
  outcome: AttemptOutcomeKindEnum,
  value_json: z.string().nullable(),
  reasoning_trace: z.string().nullable(),
  rejection_reason: ParseRejectionReasonEnum.nullable(),
  detail: z.string().nullable(),
  raw_text: z.string().nullable(),
  transport_attempts: z.number().int().nonnegative(),
})
export type DecisionAttemptRow = z.infer<typeof DecisionAttemptRowSchema>

// ---------------------------------------------------------------------------
// Query options
// ---------------------------------------------------------------------------

export const ListDecisionsOptionsSchema = z
  .object({
    status: DecisionStatusEnum.optional(),
    limit: z.number().int().positive().max(1000).default(50),
  })
  .strict()
export type ListDecisionsOptions = z.input<typeof ListDecisionsOptionsSchema>
