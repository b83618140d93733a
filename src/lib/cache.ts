// Process-wide in-memory cache with per-key expiry
// Concurrent misses on the same key share a single load

type CacheEntry = {
  value: Promise<unknown>
  expiresAt: number
}

const store = new Map<string, CacheEntry>()

/**
 * Return the cached value for `key`, or run `load` and keep its result for `ttlMs`.
 * A rejected load is not cached.
 */
export function cached<T>(key: string, ttlMs: number, load: () => Promise<T>): Promise<T> {
  const entry = store.get(key)
  if (entry && Date.now() < entry.expiresAt) {
    return entry.value as Promise<T>
  }

  const value = load()
  store.set(key, { value, expiresAt: Date.now() + ttlMs })

  value.catch(() => {
    if (store.get(key)?.value === value) store.delete(key)
  })

  return value
}

export function invalidateKey(key: string) {
  store.delete(key)
}

export function clearCache() {
  store.clear()
}
