import { serve } from '@hono/node-server'
import { renderConfig } from '@spheretrace/config'
import { env } from './lib/env.js'
import { createApp } from './app.js'

const app = createApp({ nodeEnv: env.NODE_ENV, renderRateLimit: env.RENDER_RATE_LIMIT })

// ---------------------------------------------------------------------------
// Server start + graceful shutdown
// ---------------------------------------------------------------------------

const server = serve({ fetch: app.fetch, port: env.PORT }, (info) => {
  process.stdout.write(JSON.stringify({
    ts: new Date().toISOString(),
    event: 'server_started',
    port: info.port,
    env: env.NODE_ENV,
    render: renderConfig,
  }) + '\n')
})

function shutdown(signal: string) {
  process.stdout.write(JSON.stringify({
    ts: new Date().toISOString(),
    event: 'shutdown',
    signal,
  }) + '\n')

  server.close(() => process.exit(0))
  setTimeout(() => process.exit(1), 10_000).unref()
}

process.on('SIGTERM', () => shutdown('SIGTERM'))
process.on('SIGINT', () => shutdown('SIGINT'))
