import { setTimeout as sleep } from 'node:timers/promises'
import { PersistenceFailureError, TransientPersistenceError, errorMessage } from './errors.js'
import { createLogger } from './logger.js'

const logger = createLogger('store')

export type RetryOptions = {
  /** Total attempts including the first one. */
  attempts: number
  /** Delay before the second attempt; doubles after each failure. */
  baseDelayMs: number
  /** Upper bound for a single delay. */
  maxDelayMs?: number
  /** Label used in log lines. */
  operation?: string
  sleep?: (ms: number) => Promise<unknown>
}

export function backoffDelay(attempt: number, baseDelayMs: number, maxDelayMs = 2_000) {
  return Math.min(maxDelayMs, baseDelayMs * 2 ** (attempt - 1))
}

/**
 * Runs `work`, retrying only on TransientPersistenceError with exponential
 * backoff. Any other error is rethrown untouched. Exhaustion surfaces as
 * PersistenceFailureError.
 */
export async function withRetry<T>(work: () => Promise<T>, options: RetryOptions): Promise<T> {
  const attempts = Math.max(1, Math.floor(options.attempts))
  const wait = options.sleep ?? sleep
  const operation = options.operation ?? 'store operation'

  for (let attempt = 1; ; attempt += 1) {
    try {
      return await work()
    } catch (error) {
      if (!(error instanceof TransientPersistenceError)) throw error

      if (attempt >= attempts) {
        logger.error(`${operation} failed after ${attempt} attempt(s): ${errorMessage(error)}`)
        throw new PersistenceFailureError(`${operation} failed after ${attempt} attempt(s).`, { cause: error })
      }

      const delay = backoffDelay(attempt, options.baseDelayMs, options.maxDelayMs)
      logger.warn(`${operation} hit a transient error (attempt ${attempt}/${attempts}), retrying in ${delay}ms`)
      await wait(delay)
    }
  }
}
