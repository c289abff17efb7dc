/**
 * Built-in default values for the quorate configuration system.
 *
 * These are the lowest-priority defaults; they are overridden by:
 *   global config → project config → environment variables → explicit overrides
 */

import type {
  QuorateConfig,
  GlobalSettings,
  EngineSettings,
  PromptSettings,
} from './config-schema.js'

export const DEFAULT_GLOBAL_SETTINGS: GlobalSettings = {
  log_level: 'info',
}

export const DEFAULT_ENGINE_SETTINGS: EngineSettings = {
  max_concurrency: 4,
  max_transport_retries: 1,
  retry_base_delay_ms: 250,
  max_reasoning_traces: 3,
  default_voting_rounds: 5,
  default_confidence_threshold: 0.6,
  default_time_budget_ms: 60_000,
  default_allow_unresolved: true,
  default_temperature: { kind: 'linear', min: 0.2, max: 1.0 },
}

export const DEFAULT_PROMPT_SETTINGS: PromptSettings = {
  reasoning_steps: 5,
  conclusion_sentences: 2,
  undetermined_sentinel: 'CANNOT_DETERMINE',
  token_ceiling: 4000,
}

export const DEFAULT_CONFIG: QuorateConfig = {
  config_format_version: '1',
  global: DEFAULT_GLOBAL_SETTINGS,
  engine: DEFAULT_ENGINE_SETTINGS,
  prompt: DEFAULT_PROMPT_SETTINGS,
}
