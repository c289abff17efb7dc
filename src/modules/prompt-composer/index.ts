/**
 * prompt-composer module — per-attempt reasoning prompts.
 */

export type {
  PromptComposer,
  PromptComposerOptions,
  PromptInput,
  ComposedPrompt,
} from './prompt-composer.js'
export { PromptComposerImpl, createPromptComposer, formatInstructions } from './prompt-composer.js'
export { countTokens, truncateToTokens } from './token-counter.js'
