// @session-relay/core - Bounded LRU memoizing cache (single flight, optional TTL)

import { DEFAULT_CACHE_MAX_SIZE } from './types.js'

/**
 * Producer wrapped by the cache. May be sync or async, and may fail.
 */
export type Producer<TArgs extends readonly unknown[], TValue> = (
  ...args: TArgs
) => TValue | Promise<TValue>

/**
 * Bounded memoizing cache keyed by the producer's argument tuple.
 *
 * - Map-backed LRU (insertion order = recency order, MRU last)
 * - A hit moves the key to MRU and never calls the producer
 * - Producer failures propagate and are NOT cached
 * - Single flight: concurrent misses on one key share one producer call
 * - Lookup/reorder/insert/evict never await, so they cannot interleave
 */
export interface LruCache<TArgs extends readonly unknown[], TValue> {
  /**
   * Returns the cached value for `args`, computing it on a miss.
   */
  get(...args: TArgs): Promise<TValue>

  /** Returns the cached value without touching recency, or undefined */
  peek(...args: TArgs): TValue | undefined

  /** Whether a live (unexpired) entry exists for `args` */
  has(...args: TArgs): boolean

  /**
   * Stores `value` under `args` as the most recently used entry.
   * Evicts the LRU entry if this pushes the cache over capacity.
   */
  set(args: TArgs, value: TValue): void

  /** Removes the entry (and any in-flight computation) for `args` */
  delete(...args: TArgs): boolean

  /** Removes every entry and forgets in-flight computations */
  clear(): void

  /** Stored argument tuples, least recently used first */
  keys(): TArgs[]

  /** Current number of live entries (expired and in-flight ones excluded) */
  readonly size: number

  /** Configured capacity */
  readonly maxSize: number
}

/**
 * Configuration for the LRU cache.
 */
export interface LruCacheConfig<TArgs extends readonly unknown[]> {
  /** Maximum number of entries, at least 1 (default: 128) */
  readonly maxSize?: number | undefined
  /** Entry lifetime in milliseconds (default: none, entries live until evicted) */
  readonly ttlMs?: number | undefined
  /**
   * Maps an argument tuple to its cache key (default: `JSON.stringify(args)`,
   * with `undefined`, `NaN`, `Infinity` and bigints tagged so they do not
   * collide with `null`). Equal tuples MUST map to equal strings. Supply one
   * for arguments JSON cannot tell apart (class instances, Maps, functions).
   */
  readonly keyOf?: ((args: TArgs) => string) | undefined
}

/** Internal cache entry */
interface CacheEntry<TArgs, TValue> {
  readonly args: TArgs
  readonly value: TValue
  /** Expiration timestamp, or Infinity without TTL */
  readonly expiresAt: number
}

/** Values JSON would collapse to `null` get a tag of their own */
function tagUnserializable(_key: string, value: unknown): unknown {
  if (value === undefined) return '\u0000undefined'
  if (typeof value === 'number' && !Number.isFinite(value)) return `\u0000${String(value)}`
  if (typeof value === 'bigint') return `\u0000${value.toString()}n`
  return value
}

function defaultKeyOf(args: readonly unknown[]): string {
  return JSON.stringify(args, tagUnserializable)
}

/**
 * Creates a bounded LRU cache around `producer`.
 *
 * @param producer - Computes the value for an argument tuple on a miss
 * @param config - Optional capacity / TTL / key configuration
 * @throws {RangeError} If `maxSize` is not a positive integer or `ttlMs` is not positive
 *
 * @example
 * ```typescript
 * const cache = createLruCache((sessionId: string) => client.fetchAuthData(sessionId), {
 *   maxSize: 256,
 * })
 * const result = await cache.get('abc123')
 * ```
 */
export function createLruCache<TArgs extends readonly unknown[], TValue>(
  producer: Producer<TArgs, TValue>,
  config?: LruCacheConfig<TArgs>,
): LruCache<TArgs, TValue> {
  const maxSize = config?.maxSize ?? DEFAULT_CACHE_MAX_SIZE
  const ttlMs = config?.ttlMs
  const keyOf = config?.keyOf ?? defaultKeyOf

  if (!Number.isInteger(maxSize) || maxSize < 1) {
    throw new RangeError(`maxSize must be a positive integer, got ${String(maxSize)}`)
  }
  if (ttlMs !== undefined && !(ttlMs > 0)) {
    throw new RangeError(`ttlMs must be positive, got ${String(ttlMs)}`)
  }

  // Map preserves insertion order: first key is the least recently used
  const entries = new Map<string, CacheEntry<TArgs, TValue>>()
  const pending = new Map<string, Promise<TValue>>()

  function expiryFromNow(): number {
    return ttlMs === undefined ? Number.POSITIVE_INFINITY : Date.now() + ttlMs
  }

  /**
   * Returns the live entry for `key`, dropping it if expired.
   */
  function lookup(key: string): CacheEntry<TArgs, TValue> | undefined {
    const entry = entries.get(key)
    if (entry === undefined) return undefined
    if (entry.expiresAt <= Date.now()) {
      entries.delete(key)
      return undefined
    }
    return entry
  }

  /**
   * Drops every expired entry. Hits reorder entries without touching
   * `expiresAt`, so expired entries can sit anywhere in recency order.
   */
  function pruneExpired(): void {
    if (ttlMs === undefined) return
    const now = Date.now()
    for (const [key, entry] of entries) {
      if (entry.expiresAt <= now) entries.delete(key)
    }
  }

  /**
   * Inserts as MRU, then evicts from the LRU end until within capacity.
   * Expired entries go first, so a live entry is never evicted for a dead one.
   */
  function store(key: string, args: TArgs, value: TValue): void {
    entries.delete(key)
    entries.set(key, { args, value, expiresAt: expiryFromNow() })
    if (entries.size > maxSize) pruneExpired()
    while (entries.size > maxSize) {
      const oldest = entries.keys().next()
      if (oldest.done === true) break
      entries.delete(oldest.value)
    }
  }

  return {
    get(...args: TArgs): Promise<TValue> {
      const key = keyOf(args)

      const entry = lookup(key)
      if (entry !== undefined) {
        // Re-insert to mark as most recently used
        entries.delete(key)
        entries.set(key, entry)
        return Promise.resolve(entry.value)
      }

      const inFlight = pending.get(key)
      if (inFlight !== undefined) return inFlight

      // Sync throws inside the producer become rejections here
      const computation = Promise.resolve()
        .then(() => producer(...args))
        .then(
          (value) => {
            // Only store if not invalidated (delete/clear/set) while in flight
            if (pending.get(key) === computation) {
              pending.delete(key)
              store(key, args, value)
            }
            return value
          },
          (error: unknown) => {
            if (pending.get(key) === computation) {
              pending.delete(key)
            }
            throw error
          },
        )

      pending.set(key, computation)
      return computation
    },

    peek(...args: TArgs): TValue | undefined {
      return lookup(keyOf(args))?.value
    },

    has(...args: TArgs): boolean {
      return lookup(keyOf(args)) !== undefined
    },

    set(args: TArgs, value: TValue): void {
      const key = keyOf(args)
      pending.delete(key)
      store(key, args, value)
    },

    delete(...args: TArgs): boolean {
      const key = keyOf(args)
      const hadPending = pending.delete(key)
      return entries.delete(key) || hadPending
    },

    clear(): void {
      entries.clear()
      pending.clear()
    },

    keys(): TArgs[] {
      const now = Date.now()
      const live: TArgs[] = []
      for (const entry of entries.values()) {
        if (entry.expiresAt > now) live.push(entry.args)
      }
      return live
    },

    get size(): number {
      pruneExpired()
      return entries.size
    },

    maxSize,
  }
}
