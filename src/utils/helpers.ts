/**
 * General utility helpers for quorate
 */

import { randomUUID } from 'crypto'

/**
 * Sleep for a given number of milliseconds.
 * When `signal` aborts, the returned promise rejects with the signal's reason.
 * @param ms - Milliseconds to sleep
 * @param signal - Optional abort signal
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason)
      return
    }
    const onAbort = (): void => {
      clearTimeout(timer)
      reject(signal?.reason)
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort)
      resolve()
    }, ms)
    signal?.addEventListener('abort', onAbort, { once: true })
  })
}

/**
 * Settle with `promise`, or reject with the signal's reason as soon as `signal`
 * aborts, whichever happens first. The original promise keeps a handler
 * attached, so a late rejection is never reported as unhandled.
 */
export function raceAbort<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => {
      reject(signal.reason)
    }
    if (signal.aborted) {
      onAbort()
    } else {
      signal.addEventListener('abort', onAbort, { once: true })
    }
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort)
        resolve(value)
      },
      (err: unknown) => {
        signal.removeEventListener('abort', onAbort)
        reject(err)
      },
    )
  })
}

/**
 * Generate a unique identifier using crypto.randomUUID()
 * @param prefix - Optional prefix for the ID
 */
export function generateId(prefix = ''): string {
  const uuid = randomUUID()
  return prefix ? `${prefix}-${uuid}` : uuid
}

/**
 * Check if a value is a plain object (not an array, Date, or other special object)
 * @param value - Value to check
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false
  }
  const proto = Object.getPrototypeOf(value) as unknown
  return proto === Object.prototype || proto === null
}

/** Options for withRetry() */
export interface RetryOptions {
  /** Maximum number of retries after the first call */
  maxRetries?: number
  /** Base delay in milliseconds (doubles each retry) */
  baseDelayMs?: number
  /** Abort signal; aborting stops retrying and rejects with its reason */
  signal?: AbortSignal
  /** Called before each retry with the 1-based retry number and the failure */
  onRetry?: (retry: number, error: Error) => void
  /** Return false to stop retrying for a given failure */
  shouldRetry?: (error: Error) => boolean
}

/**
 * Retry an async operation with exponential backoff
 * @param fn - Async function to retry
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const { maxRetries = 3, baseDelayMs = 100, signal, onRetry, shouldRetry } = options
  let lastError: Error | undefined
  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    if (signal?.aborted) throw signal.reason
    try {
      return await fn()
    } catch (error) {
      if (signal?.aborted) throw signal.reason
      lastError = error instanceof Error ? error : new Error(String(error))
      if (attempt >= maxRetries || (shouldRetry !== undefined && !shouldRetry(lastError))) {
        break
      }
      onRetry?.(attempt + 1, lastError)
      if (baseDelayMs > 0) {
        await sleep(baseDelayMs * Math.pow(2, attempt), signal)
      }
    }
  }
  throw lastError ?? new Error('Operation failed after retries')
}
