/**
 * Per-key async mutex.
 *
 * Tasks sharing a key run one after another in arrival order; tasks on
 * different keys never wait on each other. A key's entry is dropped once its
 * queue drains.
 */
export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>()

  async runExclusive<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve()
    let release: () => void = () => {}
    const current = new Promise<void>((resolve) => {
      release = resolve
    })
    const tail = previous.then(() => current)
    this.tails.set(key, tail)

    await previous
    try {
      return await task()
    } finally {
      release()
      if (this.tails.get(key) === tail) {
        this.tails.delete(key)
      }
    }
  }

  isLocked(key: string) {
    return this.tails.has(key)
  }

  /** Number of keys with a running or queued task. */
  get size() {
    return this.tails.size
  }
}
