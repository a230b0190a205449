/**
 * Structured request logging middleware.
 *
 * One JSON line per request on stdout: timestamp, method, path, status and
 * duration, plus the sample count for render responses so slow frames can
 * be told apart from slow clients.
 */

import type { MiddlewareHandler } from 'hono'

export interface RequestLogEntry {
  ts: string
  level: 'info' | 'warn' | 'error'
  method: string
  path: string
  status: number
  ms: number
  samples?: number
}

export function requestLogger(
  write: (line: string) => void = (line) => process.stdout.write(line),
): MiddlewareHandler {
  return async (c, next) => {
    const start = performance.now()
    await next()

    const status = c.res.status
    const entry: RequestLogEntry = {
      ts: new Date().toISOString(),
      level: status >= 500 ? 'error' : status >= 400 ? 'warn' : 'info',
      method: c.req.method,
      path: c.req.path,
      status,
      ms: Number((performance.now() - start).toFixed(1)),
    }
    const samples = c.res.headers.get('X-Render-Samples')
    if (samples !== null) entry.samples = Number(samples)

    write(JSON.stringify(entry) + '\n')
  }
}
