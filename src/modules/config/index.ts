/**
 * Barrel exports for the config module.
 */

export { createConfigSystem, ConfigSystemImpl, loadConfig } from './config-system-impl.js'
export type { ConfigSystem, ConfigSystemOptions } from './config-system.js'
export {
  QuorateConfigSchema,
  PartialQuorateConfigSchema,
  TemperatureScheduleConfigSchema,
  CURRENT_CONFIG_FORMAT_VERSION,
  MAX_TEMPERATURE,
  MAX_RETRY_BASE_DELAY_MS,
} from './config-schema.js'
export type {
  QuorateConfig,
  PartialQuorateConfig,
  EngineSettings,
  PromptSettings,
  PersistenceSettings,
  TemperatureScheduleConfig,
} from './config-schema.js'
export { DEFAULT_CONFIG } from './defaults.js'
