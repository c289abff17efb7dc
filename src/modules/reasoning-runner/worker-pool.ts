/**
 * WorkerPool — bounded FIFO pool for async tasks.
 *
 * At most `maxConcurrency` tasks run at once; the rest wait in submission
 * order. A slot is reserved synchronously on submit, so getRunning() is
 * accurate before the task's first await.
 */

import { createLogger } from '../../utils/logger.js'

const logger = createLogger('reasoning-runner:pool')

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface WorkerPool {
  /** Run `task` as soon as a slot is free; settles with the task's result */
  submit<T>(task: () => Promise<T>): Promise<T>
  /** Number of tasks waiting for a slot */
  getPending(): number
  /** Number of tasks currently holding a slot */
  getRunning(): number
}

interface QueuedTask {
  id: number
  start: () => Promise<void>
}

// ---------------------------------------------------------------------------
// WorkerPoolImpl
// ---------------------------------------------------------------------------

export class WorkerPoolImpl implements WorkerPool {
  private readonly _maxConcurrency: number
  private readonly _running: Set<number> = new Set()
  private readonly _queue: QueuedTask[] = []
  private _nextId = 0

  constructor(maxConcurrency: number) {
    if (!Number.isInteger(maxConcurrency) || maxConcurrency < 1) {
      throw new RangeError(`maxConcurrency must be a positive integer, got ${String(maxConcurrency)}`)
    }
    this._maxConcurrency = maxConcurrency
  }

  submit<T>(task: () => Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      const id = this._nextId++
      // Promise.resolve().then() turns a synchronous throw into a rejection
      const start = (): Promise<void> => Promise.resolve().then(task).then(resolve, reject)

      if (this._running.size < this._maxConcurrency) {
        this._start({ id, start })
      } else {
        this._queue.push({ id, start })
        logger.trace({ id, queueLength: this._queue.length }, 'Task queued')
      }
    })
  }

  getPending(): number {
    return this._queue.length
  }

  getRunning(): number {
    return this._running.size
  }

  // ---------------------------------------------------------------------------
  // Queue management
  // ---------------------------------------------------------------------------

  private _start(entry: QueuedTask): void {
    this._running.add(entry.id)
    entry
      .start()
      .finally(() => {
        this._running.delete(entry.id)
        this._drainQueue()
      })
      .catch((err: unknown) => {
        logger.error({ err, id: entry.id }, 'Worker pool failed to release a slot')
      })
  }

  private _drainQueue(): void {
    if (this._running.size >= this._maxConcurrency) {
      return
    }
    const next = this._queue.shift()
    if (next === undefined) {
      return
    }
    logger.trace({ id: next.id, queueLength: this._queue.length }, 'Dequeued task')
    this._start(next)
  }
}

// ---------------------------------------------------------------------------
// Factory function
// ---------------------------------------------------------------------------

export function createWorkerPool(maxConcurrency: number): WorkerPool {
  return new WorkerPoolImpl(maxConcurrency)
}
