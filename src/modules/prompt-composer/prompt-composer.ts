/**
 * PromptComposer — builds the reasoning prompt for one attempt.
 *
 * Composition is deterministic: the same request, temperature and index
 * always produce the same text. Each prompt is built from the request alone,
 * never from another attempt's output.
 *
 * Contract with the attempt decoder: the model reasons first, then writes the
 * answer alone on the final line, or the undetermined sentinel instead.
 */

import type { TypedOutputSpec } from '../output-spec/schemas.js'
import { assemblePrompt, type PromptSection } from './prompt-assembler.js'

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** The parts of a decision request a prompt is built from */
export interface PromptInput {
  instructions: string
  outputSpec: TypedOutputSpec
  context?: string
}

/** A prompt bound to the attempt that will send it */
export interface ComposedPrompt {
  attemptIndex: number
  temperature: number
  text: string
  tokenCount: number
  /** Whether the context section was cut to fit the token ceiling */
  truncated: boolean
}

export interface PromptComposerOptions {
  reasoningSteps: number
  conclusionSentences: number
  undeterminedSentinel: string
  tokenCeiling: number
}

export interface PromptComposer {
  compose(input: PromptInput, temperature: number, attemptIndex: number): ComposedPrompt
}

// ---------------------------------------------------------------------------
// Template
// ---------------------------------------------------------------------------

const PROMPT_TEMPLATE = `{{instructions}}

{{context}}

{{reasoning}}

{{format}}

{{sentinel}}`

/** Output-format section; must stay in step with the attempt decoder's grammar */
export function formatInstructions(spec: TypedOutputSpec): string {
  switch (spec.kind) {
    case 'boolean':
      return 'After your conclusion, write the answer alone on the final line: YES or NO.'
    case 'bounded-integer':
      return (
        'After your conclusion, write the answer alone on the final line as a single whole number ' +
        `between ${String(spec.low)} and ${String(spec.high)} inclusive, using digits only.`
      )
    case 'enum-string': {
      const lines = [
        'After your conclusion, write the answer alone on the final line as exactly one of these values, written exactly as shown:',
        ...spec.allowedValues.map((value) => `- ${value}`),
      ]
      if (spec.caseSensitive) lines.push('Capitalization matters.')
      return lines.join('\n')
    }
  }
}

function reasoningInstructions(steps: number, sentences: number): string {
  const sentenceWord = sentences === 1 ? 'sentence' : 'sentences'
  return (
    `Reason step by step before answering. Use at most ${String(steps)} numbered reasoning steps, ` +
    `then state your conclusion in ${String(sentences)} ${sentenceWord}.`
  )
}

function sentinelInstructions(sentinel: string): string {
  return (
    `If the answer cannot be determined from the information given, write ${sentinel} alone on the final line instead. ` +
    'Do not write anything after the final line.'
  )
}

// ---------------------------------------------------------------------------
// PromptComposerImpl
// ---------------------------------------------------------------------------

export class PromptComposerImpl implements PromptComposer {
  private readonly _options: PromptComposerOptions

  constructor(options: PromptComposerOptions) {
    this._options = options
  }

  compose(input: PromptInput, temperature: number, attemptIndex: number): ComposedPrompt {
    const context = input.context?.trim() ?? ''
    const sections: PromptSection[] = [
      { name: 'instructions', content: input.instructions.trim(), priority: 'required' },
      { name: 'context', content: context.length > 0 ? `Context:\n${context}` : '', priority: 'optional' },
      {
        name: 'reasoning',
        content: reasoningInstructions(this._options.reasoningSteps, this._options.conclusionSentences),
        priority: 'required',
      },
      { name: 'format', content: formatInstructions(input.outputSpec), priority: 'required' },
      { name: 'sentinel', content: sentinelInstructions(this._options.undeterminedSentinel), priority: 'required' },
    ]

    const { prompt, tokenCount, truncated } = assemblePrompt(
      PROMPT_TEMPLATE,
      sections,
      this._options.tokenCeiling,
    )

    return { attemptIndex, temperature, text: prompt, tokenCount, truncated }
  }
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export function createPromptComposer(options: PromptComposerOptions): PromptComposer {
  return new PromptComposerImpl(options)
}
