// @tokensmith/core - Per-spec TTL cache slot guarded by a lock

/**
 * Non-blocking lock guarding a cache slot's critical section.
 *
 * `tryAcquire` never waits: a lock that cannot be taken is reported as
 * `false` and the caller carries on without the cache.
 */
export interface CacheLock {
  tryAcquire(): boolean
  release(): void
}

/** Produces the lock for a new cache slot. May throw if no lock can be created. */
export type CacheLockFactory = () => CacheLock

/**
 * Result of a cache read.
 *
 * - `hit`: a value written less than `ttl` seconds ago
 * - `miss`: nothing cached yet
 * - `expired`: the cached value is `ttl` seconds old or older
 * - `clock_skew`: the clock moved backward since the last write; the entry was dropped
 * - `unavailable`: the lock could not be taken; treat as a miss and do not cache
 */
export type CacheReadResult =
  | { readonly status: 'hit'; readonly value: string }
  | { readonly status: 'miss' }
  | { readonly status: 'expired' }
  | { readonly status: 'clock_skew' }
  | { readonly status: 'unavailable' }

/**
 * A single token spec's cache slot: the last value and when it was written.
 *
 * The slot is the only mutable state shared between concurrent units of work.
 * Reads and writes copy whole strings in or out under the lock; generation
 * and encoding always happen outside it.
 */
export interface TokenCache {
  /**
   * Returns the cached value if it was written less than `ttlSeconds` ago.
   *
   * @param ttlSeconds - TTL in seconds; must be > 0
   * @param now - Current instant in milliseconds
   */
  read(ttlSeconds: number, now: number): CacheReadResult

  /**
   * Stores a freshly generated value. Concurrent writers race; the last one wins.
   *
   * @returns false if the lock could not be taken (nothing was stored)
   */
  write(value: string, now: number): boolean

  /** Drops the cached value */
  clear(): void

  /** Whether a value is currently stored (regardless of age) */
  readonly hasValue: boolean
}

/** Internal cache entry */
interface CacheEntry {
  readonly value: string
  /** Instant of the write, milliseconds */
  readonly writtenAt: number
}

/**
 * Default lock: a held flag. The critical sections are synchronous, so the
 * flag can only be observed held if a read or write re-enters the slot.
 */
export function createCacheLock(): CacheLock {
  let held = false
  return {
    tryAcquire(): boolean {
      if (held) return false
      held = true
      return true
    },
    release(): void {
      held = false
    },
  }
}

/**
 * Creates an empty cache slot.
 *
 * If the lock cannot be created, returns `undefined`: the owning spec then
 * simply has no cache, and every generation is fresh.
 *
 * @param lockFactory - Lock factory (default: `createCacheLock`)
 */
export function createTokenCache(
  lockFactory: CacheLockFactory = createCacheLock,
): TokenCache | undefined {
  let lock: CacheLock
  try {
    lock = lockFactory()
  } catch {
    return undefined
  }

  let entry: CacheEntry | null = null

  return {
    read(ttlSeconds: number, now: number): CacheReadResult {
      if (!lock.tryAcquire()) {
        return { status: 'unavailable' }
      }
      try {
        if (entry === null) {
          return { status: 'miss' }
        }

        const elapsedMs = now - entry.writtenAt
        if (elapsedMs < 0) {
          // Clock moved backward: the stored instant can no longer be trusted
          entry = null
          return { status: 'clock_skew' }
        }

        if (elapsedMs < ttlSeconds * 1000) {
          return { status: 'hit', value: entry.value }
        }

        return { status: 'expired' }
      } finally {
        lock.release()
      }
    },

    write(value: string, now: number): boolean {
      if (!lock.tryAcquire()) {
        return false
      }
      try {
        entry = { value, writtenAt: now }
        return true
      } finally {
        lock.release()
      }
    },

    clear(): void {
      if (!lock.tryAcquire()) {
        return
      }
      try {
        entry = null
      } finally {
        lock.release()
      }
    },

    get hasValue(): boolean {
      return entry !== null
    },
  }
}
