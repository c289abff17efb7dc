/**
 * ConfigSystem implementation — loads configuration in hierarchy order and
 * exposes get operations.
 *
 * Hierarchy (lowest → highest priority):
 *   built-in defaults
 *     → global user config  (~/.quorate/config.yaml)
 *     → project config      (./.quorate/config.yaml)
 *     → environment vars    (QUORATE_* prefixed)
 *     → explicit overrides  (ConfigSystemOptions.overrides)
 */

import { readFile, access } from 'fs/promises'
import { join, resolve } from 'path'
import { homedir } from 'os'
import yaml from 'js-yaml'
import { createLogger } from '../../utils/logger.js'
import { isPlainObject } from '../../utils/helpers.js'
import { ConfigError } from '../../core/errors.js'
import {
  QuorateConfigSchema,
  PartialQuorateConfigSchema,
  type QuorateConfig,
  type PartialQuorateConfig,
} from './config-schema.js'
import { DEFAULT_CONFIG } from './defaults.js'
import type { ConfigSystem, ConfigSystemOptions } from './config-system.js'

const logger = createLogger('config')

// ---------------------------------------------------------------------------
// Deep merge utility
// ---------------------------------------------------------------------------

/**
 * Merge `override` into `base`. Nested plain objects merge key by key, except
 * tagged objects (those with a string `kind`), which replace the base value
 * wholesale so variants never mix fields.
 */
export function deepMerge(
  base: Record<string, unknown>,
  override: Record<string, unknown>
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base }
  for (const [key, val] of Object.entries(override)) {
    if (val === undefined) continue
    const current = result[key]
    if (
      isPlainObject(val) &&
      isPlainObject(current) &&
      typeof val.kind !== 'string'
    ) {
      result[key] = deepMerge(current, val)
    } else {
      result[key] = val
    }
  }
  return result
}

// ---------------------------------------------------------------------------
// Environment variable resolution
// ---------------------------------------------------------------------------

/**
 * Map of QUORATE_ environment variable names to config paths.
 * Only overrides scalar values; does not support nested structures via env.
 */
const ENV_VAR_MAP: Record<string, string> = {
  QUORATE_LOG_LEVEL: 'global.log_level',
  QUORATE_MAX_CONCURRENCY: 'engine.max_concurrency',
  QUORATE_MAX_TRANSPORT_RETRIES: 'engine.max_transport_retries',
  QUORATE_RETRY_BASE_DELAY_MS: 'engine.retry_base_delay_ms',
  QUORATE_DEFAULT_VOTING_ROUNDS: 'engine.default_voting_rounds',
  QUORATE_DEFAULT_CONFIDENCE_THRESHOLD: 'engine.default_confidence_threshold',
  QUORATE_DEFAULT_TIME_BUDGET_MS: 'engine.default_time_budget_ms',
  QUORATE_DEFAULT_ALLOW_UNRESOLVED: 'engine.default_allow_unresolved',
  QUORATE_DATABASE_PATH: 'persistence.database_path',
}

function coerceEnvValue(rawValue: string): unknown {
  if (rawValue === 'true') return true
  if (rawValue === 'false') return false
  if (/^\d+$/.test(rawValue)) return parseInt(rawValue, 10)
  if (/^\d*\.\d+$/.test(rawValue)) return parseFloat(rawValue)
  return rawValue
}

/**
 * Read relevant environment variables and return a partial config overlay.
 */
export function readEnvOverrides(env: NodeJS.ProcessEnv): PartialQuorateConfig {
  const overrides: Record<string, unknown> = {}

  for (const [envKey, configPath] of Object.entries(ENV_VAR_MAP)) {
    const rawValue = env[envKey]
    if (rawValue === undefined) continue

    const parts = configPath.split('.')
    let cursor: Record<string, unknown> = overrides
    for (let i = 0; i < parts.length - 1; i++) {
      const part = parts[i] ?? ''
      const next = cursor[part]
      if (isPlainObject(next)) {
        cursor = next
      } else {
        const created: Record<string, unknown> = {}
        cursor[part] = created
        cursor = created
      }
    }
    const lastKey = parts[parts.length - 1] ?? ''
    cursor[lastKey] = coerceEnvValue(rawValue)
  }

  // Validate the env overrides as partial config
  const parsed = PartialQuorateConfigSchema.safeParse(overrides)
  if (!parsed.success) {
    logger.warn({ errors: parsed.error.issues }, 'Invalid environment variable overrides ignored')
    return {}
  }
  return parsed.data
}

// ---------------------------------------------------------------------------
// Dot-notation key accessor
// ---------------------------------------------------------------------------

/**
 * Get a value from a nested object using dot-notation key.
 */
function getByPath(obj: unknown, path: string): unknown {
  const parts = path.split('.')
  let cursor: unknown = obj
  for (const part of parts) {
    if (!isPlainObject(cursor)) return undefined
    cursor = cursor[part]
  }
  return cursor
}

function formatZodIssues(issues: { path: (string | number)[]; message: string }[]): string {
  return issues.map((issue) => `  • ${issue.path.join('.')}: ${issue.message}`).join('\n')
}

// ---------------------------------------------------------------------------
// ConfigSystemImpl
// ---------------------------------------------------------------------------

export class ConfigSystemImpl implements ConfigSystem {
  private _config: QuorateConfig | null = null
  private readonly _projectConfigDir: string
  private readonly _globalConfigDir: string
  private readonly _env: NodeJS.ProcessEnv
  private readonly _overrides: PartialQuorateConfig

  constructor(options: ConfigSystemOptions = {}) {
    this._projectConfigDir = options.projectConfigDir
      ? resolve(options.projectConfigDir)
      : resolve(process.cwd(), '.quorate')
    this._globalConfigDir = options.globalConfigDir
      ? resolve(options.globalConfigDir)
      : resolve(homedir(), '.quorate')
    this._env = options.env ?? process.env
    this._overrides = options.overrides ?? {}
  }

  get isLoaded(): boolean {
    return this._config !== null
  }

  async load(): Promise<void> {
    // 1. Start with built-in defaults
    let merged: Record<string, unknown> = structuredClone(DEFAULT_CONFIG)

    // 2. Apply global user config if present
    const globalConfig = await this._loadYamlFile(join(this._globalConfigDir, 'config.yaml'))
    if (globalConfig !== null) {
      merged = deepMerge(merged, globalConfig)
    }

    // 3. Apply project config if present
    const projectConfig = await this._loadYamlFile(join(this._projectConfigDir, 'config.yaml'))
    if (projectConfig !== null) {
      merged = deepMerge(merged, projectConfig)
    }

    // 4. Apply environment variable overrides
    const envOverrides = readEnvOverrides(this._env)
    if (Object.keys(envOverrides).length > 0) {
      merged = deepMerge(merged, envOverrides)
    }

    // 5. Apply explicit overrides
    if (Object.keys(this._overrides).length > 0) {
      merged = deepMerge(merged, this._overrides)
    }

    // 6. Validate the merged config
    const result = QuorateConfigSchema.safeParse(merged)
    if (!result.success) {
      throw new ConfigError(
        `Configuration validation failed:\n${formatZodIssues(result.error.issues)}`,
        { issues: result.error.issues }
      )
    }

    this._config = result.data
    logger.debug('Configuration loaded successfully')
  }

  getConfig(): QuorateConfig {
    if (this._config === null) {
      throw new ConfigError('Configuration has not been loaded. Call load() before getConfig().')
    }
    return this._config
  }

  get(key: string): unknown {
    return getByPath(this.getConfig(), key)
  }

  // ---------------------------------------------------------------------------
  // Private helpers
  // ---------------------------------------------------------------------------

  private async _fileExists(filePath: string): Promise<boolean> {
    try {
      await access(filePath)
      return true
    } catch {
      return false
    }
  }

  private async _loadYamlFile(filePath: string): Promise<PartialQuorateConfig | null> {
    if (!(await this._fileExists(filePath))) return null

    let parsed: unknown
    try {
      const raw = await readFile(filePath, 'utf-8')
      parsed = yaml.load(raw)
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err)
      throw new ConfigError(`Failed to read config file at ${filePath}: ${message}`, { filePath })
    }

    // An empty file is an empty overlay
    if (parsed === undefined || parsed === null) return {}

    const result = PartialQuorateConfigSchema.safeParse(parsed)
    if (!result.success) {
      throw new ConfigError(
        `Invalid config file at ${filePath}:\n${formatZodIssues(result.error.issues)}`,
        { filePath, issues: result.error.issues }
      )
    }

    logger.debug({ filePath }, 'Config file loaded')
    return result.data
  }
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export function createConfigSystem(options: ConfigSystemOptions = {}): ConfigSystem {
  return new ConfigSystemImpl(options)
}

/**
 * Convenience: load configuration from every source and return it.
 */
export async function loadConfig(options: ConfigSystemOptions = {}): Promise<QuorateConfig> {
  const system = createConfigSystem(options)
  await system.load()
  return system.getConfig()
}
