export interface KeyedQueue<K> {
  run<T>(key: K, task: () => Promise<T>): Promise<T>
  pending(): number
}

const noop = () => {}

/**
 * Runs tasks for the same key one after another, in arrival order. Tasks for
 * different keys never wait on each other. A rejected task does not block the
 * ones queued behind it.
 */
export function createKeyedQueue<K>(): KeyedQueue<K> {
  const tails = new Map<K, Promise<void>>()

  function run<T>(key: K, task: () => Promise<T>): Promise<T> {
    const previous = tails.get(key) ?? Promise.resolve()
    const result = previous.then(task)
    const settled: Promise<void> = result.then(noop, noop).then(() => {
      if (tails.get(key) === settled) {
        tails.delete(key)
      }
    })
    tails.set(key, settled)
    return result
  }

  return {
    run,
    pending: () => tails.size
  }
}
