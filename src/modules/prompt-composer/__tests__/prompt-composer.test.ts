import { describe, it, expect } from 'vitest'
import { createPromptComposer, formatInstructions } from '../prompt-composer.js'
import { countTokens } from '../token-counter.js'

const OPTIONS = {
  reasoningSteps: 5,
  conclusionSentences: 2,
  undeterminedSentinel: 'CANNOT_DETERMINE',
  tokenCeiling: 4000,
}

const REASONING =
  'Reason step by step before answering. Use at most 5 numbered reasoning steps, ' +
  'then state your conclusion in 2 sentences.'
const SENTINEL =
  'If the answer cannot be determined from the information given, write CANNOT_DETERMINE alone ' +
  'on the final line instead. Do not write anything after the final line.'

describe('PromptComposer', () => {
  const composer = createPromptComposer(OPTIONS)

  it('assembles instructions, reasoning hints, format and sentinel rule in order', () => {
    const prompt = composer.compose({ instructions: 'Is the sky blue?', outputSpec: { kind: 'boolean' } }, 0.2, 0)

    expect(prompt.text).toBe(
      [
        'Is the sky blue?',
        REASONING,
        'After your conclusion, write the answer alone on the final line: YES or NO.',
        SENTINEL,
      ].join('\n\n'),
    )
    expect(prompt.attemptIndex).toBe(0)
    expect(prompt.temperature).toBe(0.2)
    expect(prompt.tokenCount).toBe(countTokens(prompt.text))
    expect(prompt.truncated).toBe(false)
  })

  it('adds a context block when context is supplied', () => {
    const prompt = composer.compose(
      { instructions: 'Is the sky blue?', outputSpec: { kind: 'boolean' }, context: '  The sky at noon.  ' },
      0.2,
      0,
    )
    expect(prompt.text.startsWith('Is the sky blue?\n\nContext:\nThe sky at noon.\n\nReason step by step')).toBe(
      true,
    )
  })

  it('is deterministic and identical across attempts', () => {
    const input = { instructions: 'Pick one.', outputSpec: { kind: 'boolean' as const } }
    const first = composer.compose(input, 0.2, 0)
    expect(composer.compose(input, 0.2, 0)).toEqual(first)
    expect(composer.compose(input, 1.0, 4).text).toBe(first.text)
  })

  it('uses the singular for one conclusion sentence', () => {
    const single = createPromptComposer({ ...OPTIONS, conclusionSentences: 1, reasoningSteps: 3 })
    const prompt = single.compose({ instructions: 'Q', outputSpec: { kind: 'boolean' } }, 0, 0)
    expect(prompt.text).toContain(
      'Use at most 3 numbered reasoning steps, then state your conclusion in 1 sentence.',
    )
  })

  it('uses the configured sentinel', () => {
    const custom = createPromptComposer({ ...OPTIONS, undeterminedSentinel: 'UNDECIDABLE' })
    const prompt = custom.compose({ instructions: 'Q', outputSpec: { kind: 'boolean' } }, 0, 0)
    expect(prompt.text).toContain('write UNDECIDABLE alone on the final line instead.')
  })

  it('truncates the context, never the required sections, when over the ceiling', () => {
    const tight = createPromptComposer({ ...OPTIONS, tokenCeiling: 200 })
    const context = 'word '.repeat(400)
    const prompt = tight.compose({ instructions: 'Q', outputSpec: { kind: 'boolean' }, context }, 0, 0)

    expect(prompt.truncated).toBe(true)
    expect(prompt.text).toContain('Context:\nword word')
    expect(prompt.text).toContain('…\n\nReason step by step')
    expect(prompt.text.endsWith(SENTINEL)).toBe(true)
    expect(prompt.tokenCount).toBeLessThan(countTokens(context))
  })
})

describe('formatInstructions', () => {
  it('describes integer bounds', () => {
    expect(formatInstructions({ kind: 'bounded-integer', low: 0, high: 100 })).toBe(
      'After your conclusion, write the answer alone on the final line as a single whole number ' +
        'between 0 and 100 inclusive, using digits only.',
    )
  })

  it('lists enum values and flags case sensitivity', () => {
    expect(formatInstructions({ kind: 'enum-string', allowedValues: ['buy', 'sell'], caseSensitive: true })).toBe(
      'After your conclusion, write the answer alone on the final line as exactly one of these values, ' +
        'written exactly as shown:\n- buy\n- sell\nCapitalization matters.',
    )
    expect(
      formatInstructions({ kind: 'enum-string', allowedValues: ['buy'], caseSensitive: false }),
    ).not.toContain('Capitalization')
  })
})
