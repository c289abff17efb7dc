import { describe, it, expect } from 'vitest'
import { fixedTemperature, linearTemperatureSpread, scheduleFromConfig } from '../temperature-schedule.js'

describe('fixedTemperature', () => {
  it('returns the same temperature for every attempt', () => {
    const schedule = fixedTemperature(0.7)
    expect([0, 1, 2].map((i) => schedule(i, 3))).toEqual([0.7, 0.7, 0.7])
  })
})

describe('linearTemperatureSpread', () => {
  it('spreads temperatures from min to max', () => {
    const schedule = linearTemperatureSpread(0, 1)
    expect([0, 1, 2, 3, 4].map((i) => schedule(i, 5))).toEqual([0, 0.25, 0.5, 0.75, 1])
  })

  it('uses min for a single attempt', () => {
    expect(linearTemperatureSpread(0.3, 0.9)(0, 1)).toBe(0.3)
  })

  it('supports descending spreads', () => {
    expect(linearTemperatureSpread(1, 0)(1, 3)).toBe(0.5)
  })
})

describe('scheduleFromConfig', () => {
  it('builds fixed and linear schedules', () => {
    expect(scheduleFromConfig({ kind: 'fixed', value: 0.4 })(3, 5)).toBe(0.4)
    expect(scheduleFromConfig({ kind: 'linear', min: 0, max: 2 })(2, 3)).toBe(2)
  })
})
