export type {
  GenerationClient,
  GenerationResult,
  GenerationSuccess,
  GenerationFailure,
  GenerateOptions,
  CompletionFn,
} from './generation-client.js'
export { fromCompletionFn } from './generation-client.js'
