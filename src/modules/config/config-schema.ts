/**
 * Zod validation schemas for the quorate configuration system.
 *
 * Defines schemas for all config sections:
 *  - global settings
 *  - engine defaults and resource limits
 *  - prompt composition
 *  - decision log persistence
 *  - full config document
 */

import { z } from 'zod'

/** Highest temperature a schedule may produce */
export const MAX_TEMPERATURE = 2

/** Largest delay setTimeout honours */
export const MAX_TIME_BUDGET_MS = 2_147_483_647

/** Doubled once per retry, up to five times, it stays under MAX_TIME_BUDGET_MS */
export const MAX_RETRY_BASE_DELAY_MS = 60_000

// ---------------------------------------------------------------------------
// Global settings
// ---------------------------------------------------------------------------

export const LogLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal'])
export type LogLevelValue = z.infer<typeof LogLevelSchema>

export const GlobalSettingsSchema = z
  .object({
    log_level: LogLevelSchema,
  })
  .strict()

export type GlobalSettings = z.infer<typeof GlobalSettingsSchema>

// ---------------------------------------------------------------------------
// Temperature schedule (declarative form)
// ---------------------------------------------------------------------------

const TemperatureSchema = z.number().min(0).max(MAX_TEMPERATURE)

export const TemperatureScheduleConfigSchema = z.discriminatedUnion('kind', [
  z
    .object({
      kind: z.literal('fixed'),
      value: TemperatureSchema,
    })
    .strict(),
  z
    .object({
      kind: z.literal('linear'),
      min: TemperatureSchema,
      max: TemperatureSchema,
    })
    .strict(),
])

export type TemperatureScheduleConfig = z.infer<typeof TemperatureScheduleConfigSchema>

// ---------------------------------------------------------------------------
// Engine settings
// ---------------------------------------------------------------------------

export const EngineSettingsSchema = z
  .object({
    /** Worker pool size: concurrent generate() calls per decision */
    max_concurrency: z.number().int().min(1).max(64),
    /** Retries after a transport failure, per attempt */
    max_transport_retries: z.number().int().min(0).max(5),
    /** Base backoff delay between retries (doubles each retry) */
    retry_base_delay_ms: z.number().int().min(0).max(MAX_RETRY_BASE_DELAY_MS),
    /** Number of reasoning traces sampled into a DecisionResult */
    max_reasoning_traces: z.number().int().min(0).max(50),
    default_voting_rounds: z.number().int().min(1).max(100),
    default_confidence_threshold: z.number().min(0).max(1),
    default_time_budget_ms: z.number().int().positive().max(MAX_TIME_BUDGET_MS),
    default_allow_unresolved: z.boolean(),
    default_temperature: TemperatureScheduleConfigSchema,
  })
  .strict()

export type EngineSettings = z.infer<typeof EngineSettingsSchema>

// ---------------------------------------------------------------------------
// Prompt settings
// ---------------------------------------------------------------------------

export const PromptSettingsSchema = z
  .object({
    /** Upper bound on numbered reasoning steps requested from the model */
    reasoning_steps: z.number().int().min(1).max(20),
    /** Number of conclusion sentences requested before the final answer line */
    conclusion_sentences: z.number().int().min(1).max(10),
    /** Final-line token meaning "cannot be determined" */
    undetermined_sentinel: z
      .string()
      .regex(/^[A-Z][A-Z0-9_]{2,}$/, 'sentinel must be an upper-case token such as CANNOT_DETERMINE'),
    /** Approximate token ceiling for a composed prompt (chars / 4) */
    token_ceiling: z.number().int().min(64),
  })
  .strict()

export type PromptSettings = z.infer<typeof PromptSettingsSchema>

// ---------------------------------------------------------------------------
// Persistence settings
// ---------------------------------------------------------------------------

export const PersistenceSettingsSchema = z
  .object({
    /** SQLite file for the decision audit log (":memory:" allowed) */
    database_path: z.string().min(1),
  })
  .strict()

export type PersistenceSettings = z.infer<typeof PersistenceSettingsSchema>

// ---------------------------------------------------------------------------
// Top-level configuration document
// ---------------------------------------------------------------------------

/** Current supported config format version */
export const CURRENT_CONFIG_FORMAT_VERSION = '1'

export const QuorateConfigSchema = z
  .object({
    /** Schema version for forward compatibility */
    config_format_version: z.literal('1'),
    global: GlobalSettingsSchema,
    engine: EngineSettingsSchema,
    prompt: PromptSettingsSchema,
    /** Optional decision audit log */
    persistence: PersistenceSettingsSchema.optional(),
  })
  .strict()

export type QuorateConfig = z.infer<typeof QuorateConfigSchema>

// ---------------------------------------------------------------------------
// Partial config (config files and overrides before merging)
// ---------------------------------------------------------------------------

export const PartialQuorateConfigSchema = z
  .object({
    config_format_version: z.literal('1').optional(),
    global: GlobalSettingsSchema.partial().optional(),
    engine: EngineSettingsSchema.partial().optional(),
    prompt: PromptSettingsSchema.partial().optional(),
    persistence: PersistenceSettingsSchema.partial().optional(),
  })
  .strict()

export type PartialQuorateConfig = z.infer<typeof PartialQuorateConfigSchema>
