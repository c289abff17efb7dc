/**
 * Request validation — turns an untrusted DecisionRequest into a
 * ResolvedDecisionRequest with defaults applied and temperatures computed.
 *
 * Every problem found is reported at once in ValidationError.issues.
 */

import { z } from 'zod'
import { ValidationError } from '../../core/errors.js'
import { MAX_TEMPERATURE, MAX_TIME_BUDGET_MS, type EngineSettings } from '../config/config-schema.js'
import { isPlainObject } from '../../utils/helpers.js'
import { formatIssues, parseOutputSpec } from '../output-spec/output-spec.js'
import type { TypedOutputSpec } from '../output-spec/schemas.js'
import { scheduleFromConfig } from './temperature-schedule.js'
import type { ResolvedDecisionRequest, TemperatureSchedule } from './types.js'

export { MAX_TIME_BUDGET_MS }

export const MAX_VOTING_ROUNDS = 100

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

const DecisionRequestSchema = z
  .object({
    instructions: z
      .string({ required_error: 'is required' })
      .refine((value) => value.trim().length > 0, 'must not be blank'),
    outputSpec: z.unknown(),
    context: z.string().optional(),
    votingRounds: z.number().int().min(1).max(MAX_VOTING_ROUNDS).optional(),
    temperatureSchedule: z
      .custom<TemperatureSchedule>((value) => typeof value === 'function', 'must be a function')
      .optional(),
    confidenceThreshold: z.number().min(0).max(1).optional(),
    timeBudgetMs: z.number().int().positive().max(MAX_TIME_BUDGET_MS).optional(),
    allowUnresolved: z.boolean().optional(),
  })
  .strict()

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function computeTemperatures(
  schedule: TemperatureSchedule,
  votingRounds: number,
  issues: string[],
): number[] {
  const temperatures: number[] = []
  for (let index = 0; index < votingRounds; index++) {
    let temperature: number
    try {
      temperature = schedule(index, votingRounds)
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err)
      issues.push(`temperatureSchedule: threw for attempt ${String(index)}: ${message}`)
      continue
    }
    if (
      typeof temperature !== 'number' ||
      !Number.isFinite(temperature) ||
      temperature < 0 ||
      temperature > MAX_TEMPERATURE
    ) {
      issues.push(
        `temperatureSchedule: attempt ${String(index)} produced ${String(temperature)}, ` +
          `expected a number in [0, ${String(MAX_TEMPERATURE)}]`,
      )
      continue
    }
    temperatures.push(temperature)
  }
  return temperatures
}

// ---------------------------------------------------------------------------
// resolveRequest
// ---------------------------------------------------------------------------

/**
 * Validate `input` and fill omitted fields from the engine settings.
 *
 * @throws {ValidationError} listing every issue found; nothing should be
 *   dispatched for the request
 */
export function resolveRequest(input: unknown, engine: EngineSettings): ResolvedDecisionRequest {
  const parsed = DecisionRequestSchema.safeParse(input)
  const issues: string[] = parsed.success ? [] : formatIssues(parsed.error, 'request')

  let outputSpec: TypedOutputSpec | undefined
  try {
    outputSpec = parseOutputSpec(isPlainObject(input) ? input.outputSpec : undefined, 'request.outputSpec')
  } catch (err) {
    if (!(err instanceof ValidationError)) throw err
    issues.push(...err.issues)
  }

  if (!parsed.success) {
    throw new ValidationError('Invalid decision request', issues)
  }
  const request = parsed.data

  const votingRounds = request.votingRounds ?? engine.default_voting_rounds
  const schedule = request.temperatureSchedule ?? scheduleFromConfig(engine.default_temperature)
  const temperatures = computeTemperatures(schedule, votingRounds, issues)

  if (outputSpec === undefined || issues.length > 0) {
    throw new ValidationError('Invalid decision request', issues)
  }

  const context = request.context?.trim()
  return {
    instructions: request.instructions,
    outputSpec,
    ...(context !== undefined && context.length > 0 ? { context } : {}),
    votingRounds,
    confidenceThreshold: request.confidenceThreshold ?? engine.default_confidence_threshold,
    timeBudgetMs: request.timeBudgetMs ?? engine.default_time_budget_ms,
    allowUnresolved: request.allowUnresolved ?? engine.default_allow_unresolved,
    temperatures: Object.freeze(temperatures),
  }
}
