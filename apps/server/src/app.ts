import { Hono } from 'hono'
import { HTTPException } from 'hono/http-exception'
import { requestLogger } from './lib/request-logger.js'
import { rateLimit } from './lib/rate-limit.js'
import { renderRoutes } from './routes/render.js'
import { sceneRoutes } from './routes/scenes.js'

export interface AppOptions {
  nodeEnv: string
  /** Renders allowed per client per minute */
  renderRateLimit: number
  /** Disable per-request log lines (tests) */
  logRequests?: boolean
}

export function createApp(options: AppOptions): Hono {
  const app = new Hono()

  // ---------------------------------------------------------------------------
  // Global error handling
  // ---------------------------------------------------------------------------

  app.onError((err, c) => {
    if (err instanceof HTTPException) return err.getResponse()

    process.stderr.write(JSON.stringify({
      ts: new Date().toISOString(),
      level: 'error',
      method: c.req.method,
      path: c.req.path,
      error: err.message,
      stack: options.nodeEnv !== 'production' ? err.stack : undefined,
    }) + '\n')
    return c.json({ error: 'Internal server error.' }, 500)
  })

  app.notFound((c) => c.json({ error: 'Not found.' }, 404))

  // ---------------------------------------------------------------------------
  // Middleware stack (order matters)
  // ---------------------------------------------------------------------------

  if (options.logRequests !== false) {
    app.use('*', requestLogger())
  }
  app.use('/render', rateLimit({ windowMs: 60_000, max: options.renderRateLimit }))

  // ---------------------------------------------------------------------------
  // Routes
  // ---------------------------------------------------------------------------

  app.get('/health', (c) => c.json({ status: 'healthy' }))
  app.route('/render', renderRoutes)
  app.route('/scenes', sceneRoutes)
  app.get('/', (c) => c.json({ name: 'spheretrace', version: '0.1.0' }))

  return app
}
