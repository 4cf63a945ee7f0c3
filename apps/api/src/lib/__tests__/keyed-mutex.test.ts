import { describe, it, expect } from 'vitest'
import { KeyedMutex } from '../keyed-mutex.js'

function deferred() {
  let resolve: () => void = () => {}
  const promise = new Promise<void>((done) => {
    resolve = done
  })
  return { promise, resolve }
}

describe('KeyedMutex', () => {
  it('should run tasks on one key in arrival order', async () => {
    const mutex = new KeyedMutex()
    const gate = deferred()
    const order: string[] = []

    const first = mutex.runExclusive('c1', async () => {
      await gate.promise
      order.push('first')
    })
    const second = mutex.runExclusive('c1', async () => {
      order.push('second')
    })

    expect(mutex.isLocked('c1')).toBe(true)
    gate.resolve()
    await Promise.all([first, second])

    expect(order).toEqual(['first', 'second'])
    expect(mutex.isLocked('c1')).toBe(false)
    expect(mutex.size).toBe(0)
  })

  it('should not block other keys', async () => {
    const mutex = new KeyedMutex()
    const gate = deferred()
    const order: string[] = []

    const blocked = mutex.runExclusive('c1', async () => {
      await gate.promise
      order.push('c1')
    })
    await mutex.runExclusive('c2', async () => {
      order.push('c2')
    })

    expect(order).toEqual(['c2'])
    gate.resolve()
    await blocked
    expect(order).toEqual(['c2', 'c1'])
  })

  it('should release the key when a task throws', async () => {
    const mutex = new KeyedMutex()

    await expect(
      mutex.runExclusive('c1', async () => {
        throw new Error('boom')
      }),
    ).rejects.toThrow('boom')

    await expect(mutex.runExclusive('c1', async () => 'next')).resolves.toBe('next')
    expect(mutex.size).toBe(0)
  })
})
