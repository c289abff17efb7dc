/**
 * Tests for resolveDecision: statuses, confidence, failures and order independence.
 */

import { describe, it, expect } from 'vitest'
import { countOutcomes, failedVerdict, resolveDecision } from '../resolve-decision.js'
import type { ResolvedDecisionRequest } from '../types.js'
import type { ReasoningAttempt } from '../../../core/types.js'
import {
  cancelled,
  decoded,
  failed,
  permutations,
  rejected,
  unknown,
} from '../../../../test/helpers/attempts.js'

function makeRequest(overrides: Partial<ResolvedDecisionRequest> = {}): ResolvedDecisionRequest {
  return {
    instructions: 'Is the sky blue?',
    outputSpec: { kind: 'boolean' },
    votingRounds: 5,
    confidenceThreshold: 0.6,
    timeBudgetMs: 1_000,
    allowUnresolved: true,
    temperatures: [0.5, 0.5, 0.5, 0.5, 0.5],
    ...overrides,
  }
}

const options = { timedOut: false, maxReasoningTraces: 3 }

const threeToTwo: ReasoningAttempt[] = [
  decoded(0, true),
  decoded(1, false),
  decoded(2, true),
  decoded(3, false),
  decoded(4, true),
]

describe('resolveDecision - resolved', () => {
  it('resolves at the confidence threshold', () => {
    const verdict = resolveDecision(makeRequest(), threeToTwo, options)
    expect(verdict).toMatchObject({
      status: 'resolved',
      value: true,
      confidence: 0.6,
      attemptsUsed: 5,
      attemptsRejected: 0,
      tieBroken: false,
      timedOut: false,
      voteDistribution: [
        { value: true, votes: 3 },
        { value: false, votes: 2 },
      ],
    })
    expect(verdict.unresolvedReason).toBeUndefined()
    expect(verdict.failure).toBeUndefined()
  })

  it('samples traces from the winning attempts first', () => {
    const verdict = resolveDecision(makeRequest(), threeToTwo, options)
    expect(verdict.reasoningTraces).toEqual([
      { attemptIndex: 0, temperature: 0.5, trace: 'trace 0' },
      { attemptIndex: 2, temperature: 0.5, trace: 'trace 2' },
      { attemptIndex: 4, temperature: 0.5, trace: 'trace 4' },
    ])
    expect(Object.isFrozen(verdict.reasoningTraces)).toBe(true)
    expect(verdict.reasoningTraces.every((sample) => Object.isFrozen(sample))).toBe(true)
  })

  it('returns frozen traces for failed verdicts', () => {
    const verdict = failedVerdict([], 'TIMEOUT', 'no attempt finished', true)
    expect(verdict.reasoningTraces).toEqual([])
    expect(Object.isFrozen(verdict.reasoningTraces)).toBe(true)
  })

  it('fills remaining trace slots with dissenting and unknown attempts', () => {
    const attempts = [unknown(0), decoded(1, false), decoded(2, true), decoded(3, true), rejected(4)]
    const verdict = resolveDecision(makeRequest({ votingRounds: 5 }), attempts, {
      ...options,
      maxReasoningTraces: 4,
    })
    expect(verdict.reasoningTraces.map((t) => t.attemptIndex)).toEqual([2, 3, 1, 0])
  })

  it('counts every non-voting attempt as rejected', () => {
    const attempts = [decoded(0, true), decoded(1, true), decoded(2, true), rejected(3), unknown(4)]
    const verdict = resolveDecision(makeRequest(), attempts, options)
    expect(verdict).toMatchObject({ status: 'resolved', confidence: 1, attemptsUsed: 3, attemptsRejected: 2 })
    expect(verdict.outcomeCounts).toEqual({
      decoded: 3,
      unknown: 1,
      'parse-rejected': 1,
      'transport-failed': 0,
      cancelled: 0,
    })
  })
})

describe('resolveDecision - low confidence', () => {
  it('is unresolved with its confidence when unresolved outcomes are allowed', () => {
    const verdict = resolveDecision(makeRequest({ confidenceThreshold: 0.8 }), threeToTwo, options)
    expect(verdict).toMatchObject({ status: 'unresolved', unresolvedReason: 'low-confidence', confidence: 0.6 })
    expect('value' in verdict).toBe(false)
  })

  it('keeps the value as low-confidence-resolved otherwise', () => {
    const verdict = resolveDecision(
      makeRequest({ confidenceThreshold: 0.8, allowUnresolved: false }),
      threeToTwo,
      options,
    )
    expect(verdict).toMatchObject({ status: 'low-confidence-resolved', value: true, confidence: 0.6 })
  })
})

describe('resolveDecision - unresolved', () => {
  it('reports quorum-not-met with zero confidence', () => {
    const attempts = [decoded(0, true), decoded(1, true), failed(2), failed(3), rejected(4)]
    const verdict = resolveDecision(makeRequest(), attempts, options)
    expect(verdict).toMatchObject({
      status: 'unresolved',
      unresolvedReason: 'quorum-not-met',
      confidence: 0,
      attemptsUsed: 2,
      attemptsRejected: 3,
    })
    expect('value' in verdict).toBe(false)
  })

  it('reports all-unknown', () => {
    const attempts = [unknown(0), unknown(1), unknown(2)]
    const verdict = resolveDecision(makeRequest({ votingRounds: 3 }), attempts, options)
    expect(verdict).toMatchObject({ status: 'unresolved', unresolvedReason: 'all-unknown', confidence: 0 })
    expect(verdict.reasoningTraces.map((t) => t.trace)).toEqual(['trace 0', 'trace 1', 'trace 2'])
  })

  it('reports a tie', () => {
    const attempts = [decoded(0, true), decoded(1, false), decoded(2, true), decoded(3, false)]
    const verdict = resolveDecision(makeRequest({ votingRounds: 4 }), attempts, options)
    expect(verdict).toMatchObject({ status: 'unresolved', unresolvedReason: 'tie', confidence: 0 })
  })
})

describe('resolveDecision - failures', () => {
  it('fails with TIMEOUT when the deadline left nothing to aggregate', () => {
    const attempts = [cancelled(0), cancelled(1), failed(2), cancelled(3), cancelled(4)]
    const verdict = resolveDecision(makeRequest(), attempts, { ...options, timedOut: true })
    expect(verdict).toMatchObject({
      status: 'failed',
      confidence: 0,
      timedOut: true,
      attemptsUsed: 0,
      attemptsRejected: 5,
      failure: { code: 'TIMEOUT', message: 'No attempt produced an answer within the 1000ms time budget' },
    })
  })

  it('fails with ALL_ATTEMPTS_FAILED when no attempt received text', () => {
    const attempts = [failed(0), failed(1), failed(2)]
    const verdict = resolveDecision(makeRequest({ votingRounds: 3 }), attempts, options)
    expect(verdict.failure).toEqual({
      code: 'ALL_ATTEMPTS_FAILED',
      message: 'All 3 attempts failed without a response',
    })
    expect(verdict.voteDistribution).toEqual([])
  })

  it('aggregates what settled before the deadline', () => {
    const attempts = [
      ...[0, 1, 2, 3, 4, 5, 6].map((i) => decoded(i, true)),
      cancelled(7),
      cancelled(8),
      cancelled(9),
    ]
    const verdict = resolveDecision(makeRequest({ votingRounds: 10 }), attempts, { ...options, timedOut: true })
    expect(verdict).toMatchObject({
      status: 'resolved',
      value: true,
      confidence: 1,
      timedOut: true,
      attemptsUsed: 7,
      attemptsRejected: 3,
    })
    expect(verdict.outcomeCounts.cancelled).toBe(3)
  })
})

describe('resolveDecision - order independence', () => {
  it('produces the same verdict for every ordering of the attempts', () => {
    const attempts = [decoded(0, true, 0.2), decoded(1, false, 0.4), unknown(2, 0.6), decoded(3, true, 0.8), rejected(4, 1.0)]
    const expected = resolveDecision(makeRequest(), attempts, options)
    for (const ordering of permutations(attempts)) {
      expect(resolveDecision(makeRequest(), ordering, options)).toEqual(expected)
    }
  })

  it('returns attempts sorted by index', () => {
    const verdict = resolveDecision(makeRequest(), [...threeToTwo].reverse(), options)
    expect(verdict.attempts.map((a) => a.index)).toEqual([0, 1, 2, 3, 4])
  })
})

describe('failedVerdict', () => {
  it('builds a failed verdict over the given attempts', () => {
    const verdict = failedVerdict([failed(1), failed(0)], 'INTERNAL_ERROR', 'boom')
    expect(verdict).toMatchObject({
      status: 'failed',
      confidence: 0,
      attemptsUsed: 0,
      attemptsRejected: 2,
      timedOut: false,
      tieBroken: false,
      failure: { code: 'INTERNAL_ERROR', message: 'boom' },
    })
    expect(verdict.attempts.map((a) => a.index)).toEqual([0, 1])
  })
})

describe('countOutcomes', () => {
  it('counts each outcome kind', () => {
    expect(countOutcomes([decoded(0, 1), cancelled(1), cancelled(2), failed(3)])).toEqual({
      decoded: 1,
      unknown: 0,
      'parse-rejected': 0,
      'transport-failed': 1,
      cancelled: 2,
    })
  })
})
