import { describe, it, expect } from 'vitest'
import { estimateConfidence, medianOf, modeOf } from '../confidence.js'

describe('modeOf', () => {
  it('returns the highest-voted value', () => {
    expect(modeOf([{ value: true, votes: 3 }, { value: false, votes: 2 }])).toBe(true)
  })

  it('breaks equal counts toward the smallest value', () => {
    expect(modeOf([{ value: 'b', votes: 1 }, { value: 'a', votes: 1 }])).toBe('a')
  })

  it('returns undefined for an empty distribution', () => {
    expect(modeOf([])).toBeUndefined()
  })
})

describe('medianOf', () => {
  it('takes the middle of an odd count', () => {
    expect(medianOf([10, 12, 14, 100, 11])).toBe(12)
  })

  it('rounds the mean of the two middle values half up', () => {
    expect(medianOf([10, 13])).toBe(12)
    expect(medianOf([-3, -2])).toBe(-2)
    expect(medianOf([4, 6])).toBe(5)
  })

  it('returns undefined for no values', () => {
    expect(medianOf([])).toBeUndefined()
  })
})

describe('estimateConfidence', () => {
  it('is the winner share of decoded attempts', () => {
    expect(estimateConfidence([{ value: true, votes: 3 }, { value: false, votes: 2 }], 5, 'mode')).toBe(0.6)
  })

  it('is 0 when nothing decoded', () => {
    expect(estimateConfidence([], 0, 'mode')).toBe(0)
    expect(estimateConfidence([], 4, 'mode')).toBe(0)
  })

  it('counts the votes for the median value', () => {
    const distribution = [10, 11, 12, 14, 100].map((value) => ({ value, votes: 1 }))
    expect(estimateConfidence(distribution, 5, 'median')).toBe(0.2)
  })

  it('expands vote counts before taking the median', () => {
    const distribution = [
      { value: 12, votes: 2 },
      { value: 10, votes: 1 },
      { value: 14, votes: 1 },
    ]
    expect(estimateConfidence(distribution, 4, 'median')).toBe(0.5)
  })

  it('is 0 when an even-count median was produced by no attempt', () => {
    expect(estimateConfidence([{ value: 10, votes: 1 }, { value: 13, votes: 1 }], 2, 'median')).toBe(0)
  })

  it('never exceeds 1', () => {
    expect(estimateConfidence([{ value: 'red', votes: 3 }], 2, 'mode')).toBe(1)
  })
})
