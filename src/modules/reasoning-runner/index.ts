/**
 * reasoning-runner module — concurrent attempt execution.
 */

export type {
  ReasoningRunner,
  ReasoningRunnerOptions,
  RunOptions,
  ReasoningBatch,
} from './reasoning-runner.js'
export { ReasoningRunnerImpl, createReasoningRunner } from './reasoning-runner-impl.js'
export type { WorkerPool } from './worker-pool.js'
export { WorkerPoolImpl, createWorkerPool } from './worker-pool.js'
