export { decodeAttempt, DEFAULT_UNDETERMINED_SENTINEL } from './attempt-decoder.js'
export type { DecodeResult, DecodeOptions } from './attempt-decoder.js'
