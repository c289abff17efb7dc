import { describe, it, expect } from 'vitest'
import { ValidationError } from '../../../core/errors.js'
import {
  compareValues,
  describeOutputSpec,
  matchAllowedValue,
  parseOutputSpec,
  valueKey,
} from '../output-spec.js'
import type { EnumStringOutputSpec } from '../schemas.js'

function issuesOf(input: unknown): string[] {
  try {
    parseOutputSpec(input)
  } catch (err) {
    if (err instanceof ValidationError) return err.issues
    throw err
  }
  throw new Error('expected parseOutputSpec to throw')
}

describe('parseOutputSpec', () => {
  it('accepts each variant', () => {
    expect(parseOutputSpec({ kind: 'boolean' })).toEqual({ kind: 'boolean' })
    expect(parseOutputSpec({ kind: 'bounded-integer', low: 0, high: 100 })).toEqual({
      kind: 'bounded-integer',
      low: 0,
      high: 100,
    })
    expect(
      parseOutputSpec({ kind: 'enum-string', allowedValues: ['buy', 'sell'], caseSensitive: false }),
    ).toEqual({ kind: 'enum-string', allowedValues: ['buy', 'sell'], caseSensitive: false })
  })

  it('accepts a single-value integer range', () => {
    expect(parseOutputSpec({ kind: 'bounded-integer', low: 7, high: 7 })).toEqual({
      kind: 'bounded-integer',
      low: 7,
      high: 7,
    })
  })

  it('rejects low > high', () => {
    expect(issuesOf({ kind: 'bounded-integer', low: 10, high: 1 })).toEqual([
      'outputSpec.low: low must be less than or equal to high',
    ])
  })

  it('rejects non-objects and unknown kinds', () => {
    expect(issuesOf('boolean')).toEqual(['outputSpec: must be an object'])
    expect(issuesOf({ kind: 'float' })).toEqual([
      'outputSpec.kind: must be one of boolean, bounded-integer, enum-string',
    ])
  })

  it('rejects an empty allowed set', () => {
    expect(issuesOf({ kind: 'enum-string', allowedValues: [], caseSensitive: true })).toEqual([
      'outputSpec.allowedValues: allowedValues must not be empty',
    ])
  })

  it('rejects values that collide after normalization', () => {
    expect(
      issuesOf({ kind: 'enum-string', allowedValues: ['Buy', 'buy'], caseSensitive: false }),
    ).toEqual(['outputSpec.allowedValues: allowed value "buy" is duplicated after normalization'])
  })

  it('allows values differing only by case when case sensitive', () => {
    const spec = parseOutputSpec({ kind: 'enum-string', allowedValues: ['Buy', 'buy'], caseSensitive: true })
    expect(spec.kind).toBe('enum-string')
  })

  it('throws ValidationError with the VALIDATION_ERROR code', () => {
    expect(() => parseOutputSpec({ kind: 'bounded-integer', low: 5, high: 1 })).toThrow(ValidationError)
    try {
      parseOutputSpec({ kind: 'bounded-integer', low: 5, high: 1 })
    } catch (err) {
      expect(err).toBeInstanceOf(ValidationError)
      if (err instanceof ValidationError) expect(err.code).toBe('VALIDATION_ERROR')
    }
  })
})

describe('matchAllowedValue', () => {
  const insensitive: EnumStringOutputSpec = {
    kind: 'enum-string',
    allowedValues: ['Buy', 'Sell'],
    caseSensitive: false,
  }
  const sensitive: EnumStringOutputSpec = { ...insensitive, caseSensitive: true }

  it('returns the declared spelling', () => {
    expect(matchAllowedValue(insensitive, '  sell ')).toBe('Sell')
  })

  it('respects case sensitivity', () => {
    expect(matchAllowedValue(sensitive, 'sell')).toBeUndefined()
    expect(matchAllowedValue(sensitive, 'Sell')).toBe('Sell')
  })

  it('never matches partially', () => {
    expect(matchAllowedValue(insensitive, 'Buy now')).toBeUndefined()
  })
})

describe('value helpers', () => {
  it('keys values by type', () => {
    expect(valueKey(1)).toBe('number:1')
    expect(valueKey('1')).toBe('string:1')
    expect(valueKey(true)).toBe('boolean:true')
  })

  it('orders values totally', () => {
    expect(compareValues(false, true)).toBeLessThan(0)
    expect(compareValues(2, 10)).toBeLessThan(0)
    expect(compareValues('b', 'a')).toBe(1)
    expect(compareValues('a', 'a')).toBe(0)
    expect(compareValues(true, 1)).toBe(-1)
  })

  it('describes specs', () => {
    expect(describeOutputSpec({ kind: 'boolean' })).toBe('boolean')
    expect(describeOutputSpec({ kind: 'bounded-integer', low: 0, high: 100 })).toBe('integer in [0, 100]')
    expect(
      describeOutputSpec({ kind: 'enum-string', allowedValues: ['buy', 'sell'], caseSensitive: true }),
    ).toBe('one of {buy, sell} (case sensitive)')
  })
})
