/**
 * Token counter for prompt budgeting.
 *
 * Uses a simple heuristic: chars/4, with a 10% upward adjustment for text
 * containing fenced code blocks (triple backticks).
 */

const CHARS_PER_TOKEN = 4
const CODE_BLOCK_ADJUSTMENT = 1.1
const CODE_BLOCK_MARKER = '```'

/**
 * Approximate the number of tokens in `text`.
 *
 * - Base heuristic: `Math.ceil(text.length / 4)`
 * - Text with fenced code blocks gets a 10% upward multiplier.
 */
export function countTokens(text: string): number {
  if (text.length === 0) return 0

  const base = text.length / CHARS_PER_TOKEN
  const hasCodeBlock = text.includes(CODE_BLOCK_MARKER)
  const adjusted = hasCodeBlock ? base * CODE_BLOCK_ADJUSTMENT : base
  return Math.ceil(adjusted)
}

/**
 * Truncate `text` to approximately `maxTokens` tokens.
 *
 * Returns the original text if it already fits. Cuts at a word boundary when
 * one is within 50 characters of the target and appends `…`.
 */
export function truncateToTokens(text: string, maxTokens: number): string {
  if (maxTokens <= 0) return ''
  if (countTokens(text) <= maxTokens) return text

  const hasCodeBlock = text.includes(CODE_BLOCK_MARKER)
  const multiplier = hasCodeBlock ? CODE_BLOCK_ADJUSTMENT : 1
  const targetChars = Math.floor((maxTokens * CHARS_PER_TOKEN) / multiplier)

  if (targetChars <= 0) return ''

  const roughTrunc = text.slice(0, targetChars)
  const lastSpace = roughTrunc.lastIndexOf(' ', roughTrunc.length - 1)

  const truncated =
    lastSpace > targetChars - 50 && lastSpace > 0 ? roughTrunc.slice(0, lastSpace) : roughTrunc

  return truncated + '…'
}
