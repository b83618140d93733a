// In-memory sliding window rate limiter
// Stores: endpoint:key -> array of request timestamps
const windows = new Map<string, number[]>()

export type RateLimitedEndpoint = 'sign' | 'petition' | 'login'

const LIMITS: Record<RateLimitedEndpoint, { maxRequests: number; windowMs: number }> = {
  sign: { maxRequests: 10, windowMs: 60_000 },
  petition: { maxRequests: 3, windowMs: 3_600_000 },
  login: { maxRequests: 10, windowMs: 60_000 },
}

const MAX_WINDOW_MS = 3_600_000

/**
 * Check rate limit for a given endpoint and key.
 * Returns true if rate limited (should block), false if allowed.
 */
export function checkRateLimit(endpoint: RateLimitedEndpoint, key: string, now = Date.now()): boolean {
  const { maxRequests, windowMs } = LIMITS[endpoint]
  const rateKey = `${endpoint}:${key}`

  const timestamps = (windows.get(rateKey) || []).filter(t => now - t < windowMs)

  if (timestamps.length >= maxRequests) {
    windows.set(rateKey, timestamps)
    return true
  }

  timestamps.push(now)
  windows.set(rateKey, timestamps)
  return false
}

export function resetRateLimits() {
  windows.clear()
}

// Periodic cleanup of stale windows
setInterval(() => {
  const now = Date.now()
  for (const [key, timestamps] of windows) {
    const valid = timestamps.filter(t => now - t < MAX_WINDOW_MS)
    if (valid.length === 0) {
      windows.delete(key)
    } else {
      windows.set(key, valid)
    }
  }
}, 5 * 60_000)
