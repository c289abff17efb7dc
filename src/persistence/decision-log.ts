/**
 * SqliteDecisionLog — DecisionLog backed by the SQLite decision tables.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import type { DecisionId, ReasoningAttempt } from '../core/types.js'
import type {
  DecisionLog,
  DecisionResult,
  ResolvedDecisionRequest,
} from '../modules/decision-engine/types.js'
import { createLogger } from '../utils/logger.js'
import { createDatabaseService, type DatabaseService } from './database.js'
import {
  getDecision,
  getDecisionAttempts,
  listDecisions,
  recordDecision,
  replayConfidence,
  type ListDecisionsOptions,
  type StoredDecision,
} from './queries/decisions.js'

const logger = createLogger('persistence:decision-log')

export class SqliteDecisionLog implements DecisionLog {
  private readonly _db: BetterSqlite3Database

  /** `db` must already be migrated */
  constructor(db: BetterSqlite3Database) {
    this._db = db
  }

  record(result: DecisionResult, request: ResolvedDecisionRequest | null): void {
    recordDecision(this._db, result, request)
    logger.debug({ decisionId: result.decisionId, status: result.status }, 'Decision recorded')
  }

  get(id: DecisionId): StoredDecision | undefined {
    return getDecision(this._db, id)
  }

  list(options?: ListDecisionsOptions): StoredDecision[] {
    return listDecisions(this._db, options)
  }

  attempts(id: DecisionId): ReasoningAttempt[] {
    return getDecisionAttempts(this._db, id)
  }

  replayConfidence(id: DecisionId): number | undefined {
    return replayConfidence(this._db, id)
  }
}

export interface OpenedDecisionLog {
  log: SqliteDecisionLog
  service: DatabaseService
}

/**
 * Open (and migrate) the database at `databasePath` and wrap it as a decision
 * log. Call `service.shutdown()` when done.
 *
 * @example
 * const { log, service } = openDecisionLog(config.persistence.database_path)
 * const engine = createDecisionEngine({ client, config, decisionLog: log })
 */
export function openDecisionLog(databasePath: string): OpenedDecisionLog {
  const service = createDatabaseService(databasePath)
  service.initialize()
  return { log: new SqliteDecisionLog(service.db), service }
}
