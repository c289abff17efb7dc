/**
 * AttemptDecoder — turns raw generated text into a typed value, an explicit
 * "cannot be determined" signal, or a structured parse rejection.
 *
 * Response grammar (taught by the prompt composer):
 *   <reasoning, any number of lines>
 *   <final line: the answer alone, or the undetermined sentinel>
 *
 * The final line is the last non-blank line; everything before it is the
 * reasoning trace. Values are never corrected: an integer outside the bounds
 * is rejected, not clamped.
 */

import type {
  DecodedOutcome,
  ParseRejectedOutcome,
  ParseRejectionReason,
  UnknownOutcome,
} from '../../core/types.js'
import type {
  BoundedIntegerOutputSpec,
  EnumStringOutputSpec,
  TypedOutputSpec,
} from '../output-spec/schemas.js'
import { matchAllowedValue } from '../output-spec/output-spec.js'

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** Final-line token meaning "the answer cannot be determined" */
export const DEFAULT_UNDETERMINED_SENTINEL = 'CANNOT_DETERMINE'

const AFFIRMATIVE_WORDS = new Set(['yes', 'true', 'affirmative', 'correct'])
const NEGATIVE_WORDS = new Set(['no', 'false', 'negative', 'incorrect', 'not'])

/**
 * A standalone integer literal: optional minus and digits, not glued to a
 * word, a decimal point, a thousands separator or a hyphen on the left, and
 * not continued by a word character or a decimal/thousands part on the right.
 */
const STANDALONE_INTEGER = /(?<![\w.,-])-?\d+(?!\w|[.,]\d)/g

const MAX_QUOTED_CHARS = 80

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type DecodeResult = DecodedOutcome | UnknownOutcome | ParseRejectedOutcome

export interface DecodeOptions {
  /** Final-line sentinel for "cannot be determined" (default CANNOT_DETERMINE) */
  undeterminedSentinel?: string
}

interface SplitResponse {
  finalLine: string
  trace: string
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function splitResponse(rawText: string): SplitResponse | null {
  const lines = rawText.split(/\r?\n/)
  let last = lines.length - 1
  while (last >= 0 && (lines[last] ?? '').trim() === '') last--
  if (last < 0) return null
  return {
    finalLine: (lines[last] ?? '').trim(),
    trace: lines.slice(0, last).join('\n').trim(),
  }
}

function isSentinel(finalLine: string, sentinel: string): boolean {
  const stripped = finalLine.endsWith('.') ? finalLine.slice(0, -1).trimEnd() : finalLine
  return stripped.toUpperCase() === sentinel.toUpperCase()
}

function quote(text: string): string {
  const clipped = text.length > MAX_QUOTED_CHARS ? `${text.slice(0, MAX_QUOTED_CHARS)}…` : text
  return `"${clipped}"`
}

function reject(reason: ParseRejectionReason, detail: string): ParseRejectedOutcome {
  return { kind: 'parse-rejected', reason, detail }
}

// ---------------------------------------------------------------------------
// Per-variant decoders
// ---------------------------------------------------------------------------

function decodeBoolean({ finalLine, trace }: SplitResponse): DecodeResult {
  const words = finalLine.toLowerCase().match(/[a-z]+/g) ?? []
  const affirmative = words.some((w) => AFFIRMATIVE_WORDS.has(w))
  const negative = words.some((w) => NEGATIVE_WORDS.has(w))

  if (affirmative === negative) {
    const problem = affirmative ? 'both affirmative and negative signals' : 'no affirmative or negative signal'
    return reject('AmbiguousBoolean', `final line has ${problem}: ${quote(finalLine)}`)
  }
  return { kind: 'decoded', value: affirmative, reasoningTrace: trace }
}

function decodeBoundedInteger(
  rawText: string,
  { trace }: SplitResponse,
  spec: BoundedIntegerOutputSpec,
): DecodeResult {
  let literal: string | undefined
  for (const match of rawText.matchAll(STANDALONE_INTEGER)) {
    literal = match[0]
  }
  if (literal === undefined) {
    return reject('NoIntegerFound', 'no standalone integer literal in the response')
  }

  const parsed = Number(literal)
  // Normalize -0 so equal answers share one vote key
  const value = parsed === 0 ? 0 : parsed
  if (!Number.isSafeInteger(value) || value < spec.low || value > spec.high) {
    return reject(
      'OutOfBounds',
      `${literal} is outside [${String(spec.low)}, ${String(spec.high)}]`,
    )
  }
  return { kind: 'decoded', value, reasoningTrace: trace }
}

function decodeEnumString(
  { finalLine, trace }: SplitResponse,
  spec: EnumStringOutputSpec,
): DecodeResult {
  const matched = matchAllowedValue(spec, finalLine)
  if (matched === undefined) {
    return reject(
      'NotInAllowedSet',
      `${quote(finalLine)} is not one of: ${spec.allowedValues.join(', ')}`,
    )
  }
  return { kind: 'decoded', value: matched, reasoningTrace: trace }
}

// ---------------------------------------------------------------------------
// decodeAttempt
// ---------------------------------------------------------------------------

/**
 * Decode one generated response against an output spec.
 *
 * The undetermined sentinel counts only when it is the whole final line
 * (case-insensitive, one trailing period allowed).
 */
export function decodeAttempt(
  rawText: string,
  spec: TypedOutputSpec,
  options: DecodeOptions = {},
): DecodeResult {
  const sentinel = options.undeterminedSentinel ?? DEFAULT_UNDETERMINED_SENTINEL
  const split = splitResponse(rawText)
  if (split === null) {
    return reject('EmptyResponse', 'response contained no text')
  }

  if (isSentinel(split.finalLine, sentinel)) {
    return { kind: 'unknown', reasoningTrace: split.trace }
  }

  switch (spec.kind) {
    case 'boolean':
      return decodeBoolean(split)
    case 'bounded-integer':
      return decodeBoundedInteger(rawText, split, spec)
    case 'enum-string':
      return decodeEnumString(split, spec)
    default: {
      const exhaustive: never = spec
      throw new Error(`Unknown output spec: ${JSON.stringify(exhaustive)}`)
    }
  }
}
