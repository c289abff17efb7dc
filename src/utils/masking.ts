/**
 * Credential masking for log output and recorded transport failures.
 *
 * Generation backends sometimes echo request headers or keys inside their
 * error messages; those messages end up in attempt records and logs.
 */

/** Placeholder shown instead of a real credential */
export const MASKED_VALUE = '***'

/**
 * Regex patterns that identify API key values.
 */
export const API_KEY_PATTERNS: RegExp[] = [
  // Anthropic: sk-ant-...
  /sk-ant-[A-Za-z0-9_-]{20,}/g,
  // OpenAI: sk-...
  /sk-[A-Za-z0-9_-]{20,}/g,
  // Google / Gemini: AIza...
  /AIza[A-Za-z0-9_-]{35,}/g,
  // Bearer tokens in echoed headers
  /Bearer\s+[A-Za-z0-9._~+/-]{16,}=*/g,
  // Generic 40-char hex tokens
  /\b[A-Fa-f0-9]{40}\b/g,
]

/**
 * Pino redaction paths for credential fields.
 * Pass this array to the `pino({ redact: ... })` option.
 */
export const PINO_REDACT_PATHS: string[] = [
  'apiKey',
  'api_key',
  '*.apiKey',
  '*.api_key',
  'headers.authorization',
  '*.headers.authorization',
]

/**
 * Replace any known API key patterns in a string with `***`.
 *
 * Best-effort: only the formats listed in API_KEY_PATTERNS are recognized.
 */
export function maskSecrets(input: string): string {
  let result = input
  for (const pattern of API_KEY_PATTERNS) {
    // Reset lastIndex in case the regex is reused (global flag)
    pattern.lastIndex = 0
    result = result.replace(pattern, MASKED_VALUE)
  }
  return result
}
