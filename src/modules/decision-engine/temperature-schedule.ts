/**
 * Built-in temperature schedules.
 *
 * Schedules are pure: the same (attemptIndex, votingRounds) always yields the
 * same temperature, which keeps a batch reproducible under a scripted client.
 */

import type { TemperatureScheduleConfig } from '../config/config-schema.js'
import type { TemperatureSchedule } from './types.js'

/** Every attempt uses `temperature` */
export function fixedTemperature(temperature: number): TemperatureSchedule {
  return () => temperature
}

/**
 * Spread temperatures evenly from `min` (attempt 0) to `max` (attempt N-1).
 * A single attempt uses `min`.
 *
 * @example
 * linearTemperatureSpread(0, 1)(1, 5) // 0.25
 */
export function linearTemperatureSpread(min: number, max: number): TemperatureSchedule {
  return (attemptIndex, votingRounds) => {
    if (votingRounds <= 1) return min
    return min + ((max - min) * attemptIndex) / (votingRounds - 1)
  }
}

/** Build a schedule from its declarative config form */
export function scheduleFromConfig(config: TemperatureScheduleConfig): TemperatureSchedule {
  switch (config.kind) {
    case 'fixed':
      return fixedTemperature(config.value)
    case 'linear':
      return linearTemperatureSpread(config.min, config.max)
  }
}
