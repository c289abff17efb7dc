/**
 * ConfigSystem interface — public contract for the configuration subsystem.
 *
 * All callers should depend on this interface, not the concrete implementation.
 * Create an instance via `createConfigSystem()` from config-system-impl.ts.
 */

import type { QuorateConfig, PartialQuorateConfig } from './config-schema.js'

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

/**
 * Options for initializing the config system.
 */
export interface ConfigSystemOptions {
  /** Path to the project-level .quorate/ directory (default: <cwd>/.quorate) */
  projectConfigDir?: string
  /** Path to the global user-level .quorate/ directory (default: ~/.quorate) */
  globalConfigDir?: string
  /** Environment to read QUORATE_* overrides from (default: process.env) */
  env?: NodeJS.ProcessEnv
  /** Values that override every other source */
  overrides?: PartialQuorateConfig
}

// ---------------------------------------------------------------------------
// ConfigSystem interface
// ---------------------------------------------------------------------------

/**
 * Provides access to fully-merged, validated quorate configuration.
 *
 * Hierarchy (lowest → highest priority):
 *   built-in defaults < global config < project config < env vars < overrides
 */
export interface ConfigSystem {
  /**
   * Load and validate configuration from all sources in hierarchy order.
   * Must be called before `getConfig()`.
   */
  load(): Promise<void>

  /**
   * Return the fully-merged, validated configuration.
   * @throws {ConfigError} if `load()` has not been called.
   */
  getConfig(): QuorateConfig

  /**
   * Return a single value by dot-notation key (e.g. "engine.max_concurrency").
   * @returns the value, or undefined if the key does not exist.
   */
  get(key: string): unknown

  /**
   * Whether load() has been called and succeeded.
   */
  readonly isLoaded: boolean
}
