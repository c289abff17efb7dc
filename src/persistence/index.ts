/**
 * Decision log persistence.
 */

export { DatabaseWrapper, DatabaseServiceImpl, createDatabaseService } from './database.js'
export type { DatabaseService } from './database.js'
export { runMigrations, MIGRATIONS } from './migrations/index.js'
export type { Migration } from './migrations/index.js'
export {
  recordDecision,
  getDecision,
  listDecisions,
  getDecisionAttempts,
  replayConfidence,
} from './queries/decisions.js'
export type { StoredDecision, ListDecisionsOptions } from './queries/decisions.js'
export { SqliteDecisionLog, openDecisionLog } from './decision-log.js'
export type { OpenedDecisionLog } from './decision-log.js'
