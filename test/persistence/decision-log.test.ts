/**
 * SqliteDecisionLog wired into a DecisionEngine.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdtemp, rm } from 'fs/promises'
import { join } from 'path'
import { tmpdir } from 'os'
import { openDecisionLog, type OpenedDecisionLog } from '../../src/persistence/decision-log.js'
import { createDecisionEngine } from '../../src/modules/decision-engine/decision-engine-impl.js'
import { DEFAULT_CONFIG, DEFAULT_ENGINE_SETTINGS } from '../../src/modules/config/defaults.js'
import { createLogger } from '../../src/utils/logger.js'
import { answer, createScriptedClient } from '../helpers/scripted-client.js'

const config = { ...DEFAULT_CONFIG, engine: { ...DEFAULT_ENGINE_SETTINGS, retry_base_delay_ms: 0 } }
const logger = createLogger('test', { level: 'silent' })

describe('SqliteDecisionLog', () => {
  let opened: OpenedDecisionLog

  beforeEach(() => {
    opened = openDecisionLog(':memory:')
  })

  afterEach(() => {
    opened.service.shutdown()
  })

  it('stores every decision the engine makes', async () => {
    const client = createScriptedClient(({ callIndex }) => answer(callIndex === 0 ? 'NO' : 'YES'))
    const engine = createDecisionEngine({ client, config, logger, decisionLog: opened.log })

    const result = await engine.decide({
      instructions: 'Is the service healthy?',
      outputSpec: { kind: 'boolean' },
      context: 'All probes pass.',
    })

    const stored = opened.log.get(result.decisionId)
    expect(stored).toMatchObject({
      id: result.decisionId,
      status: 'resolved',
      value: true,
      confidence: 0.8,
      attemptsUsed: 5,
      stateHistory: ['Pending', 'Dispatching', 'Collecting', 'Aggregating', 'Resolved'],
    })
    expect(stored?.request?.context).toBe('All probes pass.')
    expect(stored?.request?.temperatures).toHaveLength(5)
    expect(opened.log.attempts(result.decisionId)).toEqual(result.attempts)
    expect(opened.log.list().map((d) => d.id)).toEqual([result.decisionId])
    expect(opened.log.replayConfidence(result.decisionId)).toBe(0.8)
  })

  it('stores rejected requests without a request body', async () => {
    const client = createScriptedClient(() => answer('YES'))
    const engine = createDecisionEngine({ client, config, logger, decisionLog: opened.log })

    const result = await engine.decide({ instructions: '', outputSpec: { kind: 'boolean' } })

    expect(opened.log.get(result.decisionId)).toMatchObject({
      status: 'failed',
      request: null,
      failure: { code: 'VALIDATION_ERROR' },
    })
  })

  it('does not fail decisions when the log cannot write', async () => {
    opened.service.shutdown()
    const client = createScriptedClient(() => answer('YES'))
    const engine = createDecisionEngine({ client, config, logger, decisionLog: opened.log })

    const result = await engine.decide({ instructions: 'Is it up?', outputSpec: { kind: 'boolean' } })

    expect(result.status).toBe('resolved')
  })
})

describe('DecisionEngine with persistence.database_path', () => {
  let testDir: string

  beforeEach(async () => {
    testDir = await mkdtemp(join(tmpdir(), 'quorate-log-test-'))
  })

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true })
  })

  it('opens the configured database and records decisions in it', async () => {
    const databasePath = join(testDir, 'decisions.db')
    const client = createScriptedClient(() => answer('YES'))
    const engine = createDecisionEngine({
      client,
      logger,
      config: { ...config, persistence: { database_path: databasePath } },
    })

    const result = await engine.decide({ instructions: 'Is it up?', outputSpec: { kind: 'boolean' } })
    engine.close()

    const reopened = openDecisionLog(databasePath)
    try {
      expect(reopened.log.get(result.decisionId)).toMatchObject({ status: 'resolved', value: true, confidence: 1 })
    } finally {
      reopened.service.shutdown()
    }
  })

  it('prefers an explicit decision log over the configured path', async () => {
    const databasePath = join(testDir, 'unused.db')
    const opened = openDecisionLog(':memory:')
    const client = createScriptedClient(() => answer('YES'))
    const engine = createDecisionEngine({
      client,
      logger,
      decisionLog: opened.log,
      config: { ...config, persistence: { database_path: databasePath } },
    })

    const result = await engine.decide({ instructions: 'Is it up?', outputSpec: { kind: 'boolean' } })
    engine.close()

    expect(opened.log.get(result.decisionId)?.status).toBe('resolved')
    expect(opened.service.isOpen).toBe(true)
    opened.service.shutdown()
  })
})
