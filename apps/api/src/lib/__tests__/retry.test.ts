import { describe, it, expect, vi } from 'vitest'
import { ConflictError, PersistenceFailureError, TransientPersistenceError } from '../errors.js'
import { backoffDelay, withRetry } from '../retry.js'

describe('retry.ts', () => {
  describe('withRetry', () => {
    it('should retry transient failures with doubling delays', async () => {
      const sleep = vi.fn(async (_ms: number) => undefined)
      let calls = 0
      const result = await withRetry(
        async () => {
          calls += 1
          if (calls < 3) throw new TransientPersistenceError('serialization failure')
          return 'committed'
        },
        { attempts: 3, baseDelayMs: 10, sleep },
      )

      expect(result).toBe('committed')
      expect(calls).toBe(3)
      expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([10, 20])
    })

    it('should surface exhaustion as PersistenceFailureError', async () => {
      const sleep = vi.fn(async (_ms: number) => undefined)
      const work = vi.fn(async () => {
        throw new TransientPersistenceError('connection reset')
      })

      const attempt = withRetry(work, { attempts: 3, baseDelayMs: 10, sleep })

      await expect(attempt).rejects.toBeInstanceOf(PersistenceFailureError)
      await expect(attempt).rejects.toMatchObject({ code: 'PERSISTENCE_FAILURE', status: 500 })
      expect(work).toHaveBeenCalledTimes(3)
      expect(sleep).toHaveBeenCalledTimes(2)
    })

    it('should rethrow other errors without retrying', async () => {
      const conflict = new ConflictError('duplicate vote')
      const work = vi.fn(async () => {
        throw conflict
      })

      await expect(withRetry(work, { attempts: 5, baseDelayMs: 0 })).rejects.toBe(conflict)
      expect(work).toHaveBeenCalledTimes(1)
    })
  })

  describe('backoffDelay', () => {
    it('should cap the delay', () => {
      expect(backoffDelay(1, 50, 400)).toBe(50)
      expect(backoffDelay(3, 50, 400)).toBe(200)
      expect(backoffDelay(5, 50, 400)).toBe(400)
    })
  })
})
