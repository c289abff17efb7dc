/**
 * TypedEventBus — typed internal pub/sub for decision observability.
 *
 * Built on top of Node.js EventEmitter.
 *
 * Key design constraints:
 *  - Event dispatch is SYNCHRONOUS — handlers run immediately when emit() is called.
 *  - TypeScript `keyof` constraint enforces handler type safety at compile time.
 *  - The bus depends on no module.
 */

import { EventEmitter } from 'node:events'
import type { DecisionEvents } from './event-bus.types.js'

// ---------------------------------------------------------------------------
// TypedEventBus interface
// ---------------------------------------------------------------------------

/**
 * A typed publish-subscribe bus.
 *
 * All event names and payload types are enforced by the `DecisionEvents` map.
 */
export interface TypedEventBus {
  /**
   * Emit an event with a strongly-typed payload.
   * Dispatch is synchronous — all registered handlers run before emit() returns.
   */
  emit<K extends keyof DecisionEvents>(event: K, payload: DecisionEvents[K]): void

  /**
   * Subscribe to an event. The handler is called synchronously on each emit.
   */
  on<K extends keyof DecisionEvents>(
    event: K,
    handler: (payload: DecisionEvents[K]) => void
  ): void

  /**
   * Unsubscribe a previously registered handler.
   * If the handler was not registered, this is a no-op.
   */
  off<K extends keyof DecisionEvents>(
    event: K,
    handler: (payload: DecisionEvents[K]) => void
  ): void
}

// ---------------------------------------------------------------------------
// TypedEventBusImpl
// ---------------------------------------------------------------------------

/**
 * Concrete implementation of TypedEventBus backed by Node.js EventEmitter.
 *
 * @example
 * const bus = new TypedEventBusImpl()
 * bus.on('decision:complete', ({ decisionId, status }) => {
 *   console.log(`${decisionId} finished as ${status}`)
 * })
 */
export class TypedEventBusImpl implements TypedEventBus {
  private readonly _emitter: EventEmitter

  constructor() {
    this._emitter = new EventEmitter()
    // Many concurrent decisions may subscribe to the same bus
    this._emitter.setMaxListeners(100)
  }

  emit<K extends keyof DecisionEvents>(event: K, payload: DecisionEvents[K]): void {
    this._emitter.emit(event, payload)
  }

  on<K extends keyof DecisionEvents>(
    event: K,
    handler: (payload: DecisionEvents[K]) => void
  ): void {
    this._emitter.on(event, handler)
  }

  off<K extends keyof DecisionEvents>(
    event: K,
    handler: (payload: DecisionEvents[K]) => void
  ): void {
    this._emitter.off(event, handler)
  }
}

// ---------------------------------------------------------------------------
// Factory function
// ---------------------------------------------------------------------------

/**
 * Create a new TypedEventBus instance.
 */
export function createEventBus(): TypedEventBus {
  return new TypedEventBusImpl()
}
