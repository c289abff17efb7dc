import { describe, it, expect } from 'vitest'
import pino from 'pino'
import { MASKED_VALUE, PINO_REDACT_PATHS, maskSecrets } from '../src/utils/masking.js'

describe('maskSecrets', () => {
  it('masks bearer tokens', () => {
    expect(maskSecrets('401: Bearer test-token-abcdefghijklmnop rejected')).toBe(`401: ${MASKED_VALUE} rejected`)
  })

  it('masks sk- style keys', () => {
    expect(maskSecrets('key sk-test-secret-placeholder-value was revoked')).toBe('key *** was revoked')
  })

  it('leaves ordinary text alone', () => {
    expect(maskSecrets('connection reset by peer')).toBe('connection reset by peer')
  })

  it('masks every occurrence on repeated calls', () => {
    const message = 'Bearer test-token-abcdefghijklmnop and Bearer test-token-qrstuvwxyzabcdef'
    expect(maskSecrets(message)).toBe('*** and ***')
    expect(maskSecrets(message)).toBe('*** and ***')
  })
})

describe('PINO_REDACT_PATHS', () => {
  it('redacts credential fields in log records', () => {
    const lines: string[] = []
    const logger = pino({ redact: PINO_REDACT_PATHS, base: null, timestamp: false }, {
      write(line: string) {
        lines.push(line.trim())
      },
    })

    logger.info({ apiKey: 'test-secret', client: { headers: { authorization: 'Bearer test-secret' } } }, 'calling')

    expect(lines).toEqual([
      '{"level":30,"apiKey":"[Redacted]","client":{"headers":{"authorization":"[Redacted]"}},"msg":"calling"}',
    ])
  })
})
