/**
 * In-memory fixed-window rate limiter middleware for Hono.
 *
 * Guards the render endpoint: a single request can occupy the event loop
 * for seconds, so each client gets a small budget per window. Every
 * limiter keeps its own counters.
 */

import type { Context, MiddlewareHandler } from 'hono'

export interface RateLimitConfig {
  /** Time window in milliseconds. */
  windowMs: number
  /** Maximum requests per window per key. */
  max: number
  /** Custom key extractor. Defaults to the first x-forwarded-for address. */
  keyFn?: (c: Context) => string
  /** Clock override for tests. */
  now?: () => number
}

interface Window {
  count: number
  resetAt: number
}

function clientKey(c: Context): string {
  return c.req.header('x-forwarded-for')?.split(',')[0]?.trim() || 'unknown'
}

export function rateLimit(config: RateLimitConfig): MiddlewareHandler {
  const windows = new Map<string, Window>()
  const now = config.now ?? Date.now
  let nextSweep = 0

  function sweep(at: number): void {
    if (at < nextSweep) return
    for (const [key, w] of windows) {
      if (at >= w.resetAt) windows.delete(key)
    }
    nextSweep = at + config.windowMs
  }

  return async (c, next) => {
    const at = now()
    sweep(at)

    const key = config.keyFn?.(c) ?? clientKey(c)
    const current = windows.get(key)

    if (!current || at >= current.resetAt) {
      windows.set(key, { count: 1, resetAt: at + config.windowMs })
      return next()
    }

    if (current.count >= config.max) {
      process.stdout.write(JSON.stringify({
        ts: new Date().toISOString(),
        level: 'warn',
        event: 'rate_limited',
        key,
        path: c.req.path,
      }) + '\n')
      c.header('Retry-After', String(Math.max(1, Math.ceil((current.resetAt - at) / 1000))))
      return c.json({ error: 'Too many requests. Please try again later.' }, 429)
    }

    current.count++
    return next()
  }
}
