export type {
  AggregationPolicy,
  AggregationResult,
  AggregationWinner,
  AggregationUnresolved,
} from './aggregator.js'
export { aggregate, buildDistribution, quorumFor, methodFor } from './aggregator.js'
export type { AggregationMethod } from './confidence.js'
export { estimateConfidence, medianOf, modeOf } from './confidence.js'
