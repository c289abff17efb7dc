/**
 * Migration 001: decision audit log.
 *
 * One row per decide() call in `decisions`, one row per attempt in
 * `decision_attempts`. Decoded values are stored as JSON so booleans, numbers
 * and strings keep their type.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import { OUTCOME_KINDS_SQL } from '../schemas/decisions.js'
import type { Migration } from './index.js'

export const migration001DecisionLog: Migration = {
  version: 1,
  name: '001-decision-log',
  up(db: BetterSqlite3Database): void {
    db.exec(`
      CREATE TABLE IF NOT EXISTS decisions (
        id                     TEXT PRIMARY KEY,
        status                 TEXT NOT NULL CHECK(status IN ('resolved','low-confidence-resolved','unresolved','failed')),
        output_kind            TEXT CHECK(output_kind IN ('boolean','bounded-integer','enum-string')),
        confidence_method      TEXT CHECK(confidence_method IN ('mode','median')),
        value_json             TEXT,
        confidence             REAL NOT NULL,
        vote_distribution_json TEXT NOT NULL,
        attempts_used          INTEGER NOT NULL,
        attempts_rejected      INTEGER NOT NULL,
        timed_out              INTEGER NOT NULL DEFAULT 0,
        tie_broken             INTEGER NOT NULL DEFAULT 0,
        unresolved_reason      TEXT,
        failure_code           TEXT,
        failure_message        TEXT,
        request_json           TEXT,
        state_history_json     TEXT NOT NULL,
        duration_ms            INTEGER NOT NULL,
        created_at             TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now'))
      );

      CREATE INDEX IF NOT EXISTS idx_decisions_status ON decisions(status);
      CREATE INDEX IF NOT EXISTS idx_decisions_created_at ON decisions(created_at);

      CREATE TABLE IF NOT EXISTS decision_attempts (
        decision_id        TEXT NOT NULL REFERENCES decisions(id) ON DELETE CASCADE,
        attempt_index      INTEGER NOT NULL,
        temperature        REAL NOT NULL,
        outcome            TEXT NOT NULL CHECK(outcome IN (${OUTCOME_KINDS_SQL})),
        value_json         TEXT,
        reasoning_trace    TEXT,
        rejection_reason   TEXT,
        detail             TEXT,
        raw_text           TEXT,
        transport_attempts INTEGER NOT NULL DEFAULT 0,
        PRIMARY KEY (decision_id, attempt_index)
      );
    `)
  },
}
