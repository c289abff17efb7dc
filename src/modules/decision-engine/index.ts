/**
 * decision-engine module — ensemble decisions over the reasoning runner.
 */

export type { DecisionEngine, DecisionEngineOptions } from './decision-engine.js'
export { DecisionEngineImpl, createDecisionEngine } from './decision-engine-impl.js'
export type {
  DecisionRequest,
  ResolvedDecisionRequest,
  DecisionResult,
  DecisionFailure,
  DecisionLog,
  OutcomeCounts,
  ReasoningTraceSample,
  TemperatureSchedule,
} from './types.js'
export { fixedTemperature, linearTemperatureSpread, scheduleFromConfig } from './temperature-schedule.js'
export { resolveRequest, MAX_TIME_BUDGET_MS, MAX_VOTING_ROUNDS } from './request-validator.js'
export { resolveDecision, failedVerdict, countOutcomes } from './resolve-decision.js'
export type { DecisionVerdict, ResolveOptions } from './resolve-decision.js'
export { DecisionStateMachine, VALID_TRANSITIONS, isTerminalState } from './state-machine.js'
