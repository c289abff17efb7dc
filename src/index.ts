/**
 * quorate - Main module exports
 * Public API surface for the library
 */

// Core types
export * from './core/types.js'
// Core errors
export * from './core/errors.js'
// Utilities
export { createLogger, childLogger, logger } from './utils/logger.js'
export type { LoggerOptions } from './utils/logger.js'
export { maskSecrets } from './utils/masking.js'

// Event Bus
export type { TypedEventBus } from './core/event-bus.js'
export type {
  DecisionEvents,
  AttemptSettledEvent,
  DecisionTransitionEvent,
  DecisionCompleteEvent,
} from './core/event-bus.types.js'
export { createEventBus } from './core/event-bus.js'

// Decision engine
export * from './modules/decision-engine/index.js'

// Building blocks
export * from './modules/output-spec/index.js'
export * from './modules/attempt-decoder/index.js'
export * from './modules/prompt-composer/index.js'
export * from './modules/generation/index.js'
export * from './modules/reasoning-runner/index.js'
export * from './modules/aggregator/index.js'
export * from './modules/observability/index.js'

// Configuration
export * from './modules/config/index.js'

// Decision log
export * from './persistence/index.js'
