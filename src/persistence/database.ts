/**
 * DatabaseWrapper — thin wrapper around better-sqlite3.
 *
 * Responsibilities:
 *  - Open a SQLite database with the required PRAGMAs (WAL mode, etc.)
 *  - Expose the raw BetterSqlite3.Database instance for use by query modules
 *  - Implement the DatabaseService lifecycle (initialize / shutdown)
 */

import BetterSqlite3 from 'better-sqlite3'
import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import { z } from 'zod'
import { runMigrations } from './migrations/index.js'
import { createLogger } from '../utils/logger.js'

const logger = createLogger('persistence:database')

const JournalModeRowsSchema = z.array(z.object({ journal_mode: z.string() }))

// ---------------------------------------------------------------------------
// DatabaseWrapper
// ---------------------------------------------------------------------------

export class DatabaseWrapper {
  private _db: BetterSqlite3Database | null = null
  private readonly _path: string

  constructor(databasePath: string) {
    this._path = databasePath
  }

  /**
   * Open the database and apply the PRAGMAs. Calling open() when already open
   * is a no-op.
   */
  open(): void {
    if (this._db !== null) {
      return
    }

    logger.debug({ path: this._path }, 'Opening SQLite database')
    const db = new BetterSqlite3(this._path)

    const walResult = JournalModeRowsSchema.safeParse(db.pragma('journal_mode = WAL'))
    const journalMode = walResult.success ? walResult.data[0]?.journal_mode : undefined
    if (journalMode !== 'wal') {
      // In-memory databases report "memory"
      logger.debug({ journalMode }, 'WAL journal mode not available')
    }
    db.pragma('busy_timeout = 5000')
    db.pragma('synchronous = NORMAL')
    db.pragma('foreign_keys = ON')

    this._db = db
    logger.info({ path: this._path, journalMode }, 'SQLite database opened')
  }

  /** Close the database. Calling close() when already closed is a no-op. */
  close(): void {
    if (this._db === null) {
      return
    }
    this._db.close()
    this._db = null
    logger.info({ path: this._path }, 'SQLite database closed')
  }

  /**
   * The raw BetterSqlite3 instance.
   * @throws {Error} if the database has not been opened yet
   */
  get db(): BetterSqlite3Database {
    if (this._db === null) {
      throw new Error('DatabaseWrapper: database is not open. Call open() first.')
    }
    return this._db
  }

  get isOpen(): boolean {
    return this._db !== null
  }
}

// ---------------------------------------------------------------------------
// DatabaseService
// ---------------------------------------------------------------------------

export interface DatabaseService {
  readonly isOpen: boolean
  /** Raw BetterSqlite3 database instance — use for prepared statements */
  readonly db: BetterSqlite3Database
  /** Open the database and apply pending migrations */
  initialize(): void
  shutdown(): void
}

export class DatabaseServiceImpl implements DatabaseService {
  private readonly _wrapper: DatabaseWrapper

  constructor(databasePath: string) {
    this._wrapper = new DatabaseWrapper(databasePath)
  }

  get isOpen(): boolean {
    return this._wrapper.isOpen
  }

  get db(): BetterSqlite3Database {
    return this._wrapper.db
  }

  initialize(): void {
    this._wrapper.open()
    runMigrations(this._wrapper.db)
  }

  shutdown(): void {
    this._wrapper.close()
  }
}

export function createDatabaseService(databasePath: string): DatabaseService {
  return new DatabaseServiceImpl(databasePath)
}
