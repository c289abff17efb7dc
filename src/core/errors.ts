/**
 * Error definitions for quorate
 * Structured error hierarchy shared by the engine and its collaborators
 */

/** Base error class for all quorate errors */
export class QuorateError extends Error {
  public readonly code: string
  public readonly context: Record<string, unknown>

  constructor(
    message: string,
    code: string,
    context: Record<string, unknown> = {}
  ) {
    super(message)
    this.name = 'QuorateError'
    this.code = code
    this.context = context
    // Maintains proper stack trace for V8 (not available in all environments)
    // eslint-disable-next-line @typescript-eslint/no-unnecessary-condition
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, QuorateError)
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
      stack: this.stack,
    }
  }
}

/** Error thrown when a decision request is malformed. Fatal, never retried. */
export class ValidationError extends QuorateError {
  public readonly issues: string[]

  constructor(message: string, issues: string[] = [], context: Record<string, unknown> = {}) {
    super(message, 'VALIDATION_ERROR', { issues, ...context })
    this.name = 'ValidationError'
    this.issues = issues
  }
}

/** Error reported by a generation client for a single call */
export class TransportError extends QuorateError {
  /** Whether the collaborator considers the failure worth retrying */
  public readonly retryable: boolean

  constructor(message: string, context: Record<string, unknown> = {}, retryable = true) {
    super(message, 'TRANSPORT_ERROR', context)
    this.name = 'TransportError'
    this.retryable = retryable
  }
}

/** Abort reason used when a batch exceeds its time budget */
export class TimeoutError extends QuorateError {
  constructor(budgetMs: number, context: Record<string, unknown> = {}) {
    super(`Time budget of ${String(budgetMs)}ms exceeded`, 'TIMEOUT', { budgetMs, ...context })
    this.name = 'TimeoutError'
  }
}

/** Error thrown when configuration is invalid or missing */
export class ConfigError extends QuorateError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'CONFIG_ERROR', context)
    this.name = 'ConfigError'
  }
}

/**
 * Normalize any thrown value into a TransportError.
 * Errors that already are TransportErrors are returned unchanged.
 */
export function toTransportError(err: unknown): TransportError {
  if (err instanceof TransportError) return err
  if (err instanceof Error) {
    return new TransportError(err.message, { cause: err.name })
  }
  return new TransportError(String(err))
}
