/**
 * Single-flight coalescing: concurrent callers asking for the same key share
 * one execution of the underlying task and all observe its single result.
 *
 * Useful for:
 * - Building a derived artifact exactly once under concurrent requests
 * - Collapsing duplicate lookups against a slow backend
 */

export type SingleFlight<T> = {
  /**
   * Join the in-flight task for `key`, or start `task` if none is running.
   * Every caller of one flight receives the same promise, so resolution and
   * rejection are observed identically by all of them.
   */
  run: (key: string, task: () => Promise<T>) => Promise<T>
  /** Whether a task for `key` is currently in flight */
  has: (key: string) => boolean
  /** Number of callers attached to the in-flight task for `key` (0 when idle) */
  waiters: (key: string) => number
  /** Number of keys with a task in flight */
  size: () => number
}

type Flight<T> = {
  promise: Promise<T>
  waiters: number
}

/**
 * Create a single-flight group.
 *
 * The registry entry for a key is removed as soon as its task settles and
 * before any caller resumes, so a caller arriving afterwards always starts a
 * fresh task. A failed task is therefore retried by the next caller.
 *
 * @example Coalesce concurrent thumbnail builds
 * ```ts
 * const builds = createSingleFlight<void>()
 *
 * async function ensureThumbnail(path: string) {
 *   await builds.run(path, () => renderThumbnail(path))
 * }
 * ```
 */
export function createSingleFlight<T>(): SingleFlight<T> {
  const inflight = new Map<string, Flight<T>>()

  return {
    run: (key, task) => {
      const existing = inflight.get(key)
      if (existing) {
        existing.waiters++
        return existing.promise
      }

      const flight: Flight<T> = {
        waiters: 1,
        // Deferred a tick so a synchronous throw in `task` becomes a rejection
        promise: Promise.resolve()
          .then(task)
          .finally(() => {
            if (inflight.get(key) === flight) {
              inflight.delete(key)
            }
          }),
      }
      inflight.set(key, flight)
      return flight.promise
    },
    has: key => inflight.has(key),
    waiters: key => inflight.get(key)?.waiters ?? 0,
    size: () => inflight.size,
  }
}
