/**
 * GenerationClient — the boundary to the external text-generation service.
 *
 * quorate never implements a backend; callers pass an object satisfying this
 * interface to the engine. The engine treats it purely as a capability: no
 * caching, no state carried between calls beyond a single attempt.
 */

import type { TransportError } from '../../core/errors.js'

// ---------------------------------------------------------------------------
// Result type
// ---------------------------------------------------------------------------

export interface GenerationSuccess {
  ok: true
  text: string
}

export interface GenerationFailure {
  ok: false
  error: TransportError
}

export type GenerationResult = GenerationSuccess | GenerationFailure

// ---------------------------------------------------------------------------
// Call options
// ---------------------------------------------------------------------------

export interface GenerateOptions {
  /**
   * Aborted when the batch deadline passes. Clients should stop work when it
   * fires; the engine stops waiting either way.
   */
  signal: AbortSignal
}

// ---------------------------------------------------------------------------
// GenerationClient interface
// ---------------------------------------------------------------------------

export interface GenerationClient {
  /**
   * Generate a completion for `prompt` at the given sampling temperature.
   *
   * Transport problems should be returned as `{ ok: false }`; a rejected
   * promise is treated the same way.
   */
  generate(prompt: string, temperature: number, options: GenerateOptions): Promise<GenerationResult>
}

// ---------------------------------------------------------------------------
// Adapters
// ---------------------------------------------------------------------------

/** Signature of a plain completion function that throws on transport failure */
export type CompletionFn = (
  prompt: string,
  temperature: number,
  signal: AbortSignal,
) => Promise<string>

/**
 * Wrap a throwing completion function as a GenerationClient.
 *
 * Thrown errors surface as rejections; the runner records them as transport
 * failures and retries them like returned failures.
 *
 * @example
 * const client = fromCompletionFn(async (prompt, temperature, signal) => {
 *   const res = await sdk.complete({ prompt, temperature }, { signal })
 *   return res.text
 * })
 */
export function fromCompletionFn(fn: CompletionFn): GenerationClient {
  return {
    async generate(prompt, temperature, options): Promise<GenerationResult> {
      const text = await fn(prompt, temperature, options.signal)
      return { ok: true, text }
    },
  }
}
