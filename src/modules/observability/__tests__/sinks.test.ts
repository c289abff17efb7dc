/**
 * Tests for observability sinks.
 */

import { describe, it, expect, vi } from 'vitest'
import pino from 'pino'
import { createEventBusSink, createLoggingSink, notifySinks, type ObservabilitySink } from '../sinks.js'
import { createEventBus } from '../../../core/event-bus.js'
import type { AttemptSettledEvent } from '../../../core/event-bus.types.js'
import { isPlainObject } from '../../../utils/helpers.js'

function captureLogger(): { logger: pino.Logger; records: Array<Record<string, unknown>> } {
  const records: Array<Record<string, unknown>> = []
  const logger = pino(
    { level: 'debug', base: null, timestamp: false },
    {
      write(line: string) {
        const parsed: unknown = JSON.parse(line)
        if (isPlainObject(parsed)) records.push(parsed)
      },
    },
  )
  return { logger, records }
}

const rejectedAttempt: AttemptSettledEvent = {
  decisionId: 'dec-1',
  attemptIndex: 3,
  temperature: 0.4,
  outcome: { kind: 'parse-rejected', reason: 'OutOfBounds', detail: '150 is outside [0, 100]' },
}

describe('notifySinks', () => {
  it('delivers to every sink even when one throws', () => {
    const received: number[] = []
    const sinks: ObservabilitySink[] = [
      {
        onAttempt() {
          throw new Error('sink failure')
        },
      },
      { onAttempt: (event) => received.push(event.attemptIndex) },
    ]

    expect(() =>
      notifySinks(sinks, 'onAttempt', (sink) => sink.onAttempt?.(rejectedAttempt)),
    ).not.toThrow()
    expect(received).toEqual([3])
  })

  it('hands every sink to the delivery callback', () => {
    const deliver = vi.fn()
    notifySinks([{}, {}], 'onComplete', deliver)
    expect(deliver).toHaveBeenCalledTimes(2)
  })
})

describe('createLoggingSink', () => {
  it('logs attempts at debug with their outcome details', () => {
    const { logger, records } = captureLogger()
    createLoggingSink(logger).onAttempt?.(rejectedAttempt)
    expect(records).toEqual([
      {
        level: 20,
        decisionId: 'dec-1',
        attemptIndex: 3,
        temperature: 0.4,
        outcome: 'parse-rejected',
        reason: 'OutOfBounds',
        detail: '150 is outside [0, 100]',
        msg: 'Attempt settled',
      },
    ])
  })

  it('logs decoded values', () => {
    const { logger, records } = captureLogger()
    createLoggingSink(logger).onAttempt?.({
      ...rejectedAttempt,
      outcome: { kind: 'decoded', value: 42, reasoningTrace: 'counted' },
    })
    expect(records[0]?.value).toBe(42)
    expect(records[0]?.outcome).toBe('decoded')
  })

  it('logs completions at info', () => {
    const { logger, records } = captureLogger()
    createLoggingSink(logger).onComplete?.({
      decisionId: 'dec-1',
      status: 'unresolved',
      confidence: 0,
      durationMs: 5,
    })
    expect(records).toEqual([
      {
        level: 30,
        decisionId: 'dec-1',
        status: 'unresolved',
        confidence: 0,
        durationMs: 5,
        msg: 'Decision complete',
      },
    ])
  })
})

describe('createEventBusSink', () => {
  it('republishes events on the bus', () => {
    const bus = createEventBus()
    const settled = vi.fn()
    const transitions = vi.fn()
    bus.on('attempt:settled', settled)
    bus.on('decision:transition', transitions)

    const sink = createEventBusSink(bus)
    sink.onAttempt?.(rejectedAttempt)
    sink.onTransition?.({ decisionId: 'dec-1', from: 'Collecting', to: 'Aggregating' })

    expect(settled).toHaveBeenCalledWith(rejectedAttempt)
    expect(transitions).toHaveBeenCalledWith({ decisionId: 'dec-1', from: 'Collecting', to: 'Aggregating' })
  })
})
