/**
 * Unit tests for TypedEventBus.
 *
 * Covers:
 *  - Emit/subscribe with correct payload type
 *  - Unsubscribe removes handler
 *  - Multiple handlers for same event all invoked
 *  - Event dispatch is synchronous
 */

import { describe, it, expect, vi, beforeEach } from 'vitest'
import { TypedEventBusImpl, createEventBus } from '../event-bus.js'
import type { TypedEventBus } from '../event-bus.js'
import type { DecisionEvents } from '../event-bus.types.js'

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function makeHandler<K extends keyof DecisionEvents>(
  _event: K
): (payload: DecisionEvents[K]) => void {
  return vi.fn()
}

const complete: DecisionEvents['decision:complete'] = {
  decisionId: 'dec-1',
  status: 'resolved',
  value: true,
  confidence: 0.8,
  durationMs: 12,
}

// ---------------------------------------------------------------------------
// TypedEventBusImpl unit tests
// ---------------------------------------------------------------------------

describe('TypedEventBusImpl', () => {
  let bus: TypedEventBus

  beforeEach(() => {
    bus = new TypedEventBusImpl()
  })

  it('invokes handler when matching event is emitted', () => {
    const handler = makeHandler('decision:complete')
    bus.on('decision:complete', handler)

    bus.emit('decision:complete', complete)

    expect(handler).toHaveBeenCalledOnce()
    expect(handler).toHaveBeenCalledWith(complete)
  })

  it('does NOT invoke handler for a different event', () => {
    const handler = makeHandler('decision:complete')
    bus.on('decision:complete', handler)

    bus.emit('decision:transition', { decisionId: 'dec-1', from: 'Pending', to: 'Dispatching' })

    expect(handler).not.toHaveBeenCalled()
  })

  it('invokes every handler registered for an event', () => {
    const first = makeHandler('attempt:settled')
    const second = makeHandler('attempt:settled')
    bus.on('attempt:settled', first)
    bus.on('attempt:settled', second)

    const payload: DecisionEvents['attempt:settled'] = {
      decisionId: 'dec-1',
      attemptIndex: 2,
      temperature: 0.6,
      outcome: { kind: 'cancelled' },
    }
    bus.emit('attempt:settled', payload)

    expect(first).toHaveBeenCalledWith(payload)
    expect(second).toHaveBeenCalledWith(payload)
  })

  it('stops invoking a handler after off()', () => {
    const handler = makeHandler('decision:complete')
    bus.on('decision:complete', handler)
    bus.off('decision:complete', handler)

    bus.emit('decision:complete', complete)

    expect(handler).not.toHaveBeenCalled()
  })

  it('treats off() for an unknown handler as a no-op', () => {
    expect(() => bus.off('decision:complete', makeHandler('decision:complete'))).not.toThrow()
  })

  it('dispatches synchronously', () => {
    const order: string[] = []
    bus.on('decision:complete', () => order.push('handler'))
    bus.emit('decision:complete', complete)
    order.push('after emit')
    expect(order).toEqual(['handler', 'after emit'])
  })
})

describe('createEventBus', () => {
  it('returns a fresh bus each time', () => {
    expect(createEventBus()).toBeInstanceOf(TypedEventBusImpl)
    expect(createEventBus()).not.toBe(createEventBus())
  })
})
