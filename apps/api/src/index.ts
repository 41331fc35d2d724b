// Load environment variables first - this MUST be the first import
import './env.js'

import type { Server } from 'node:http'
import { createCollector, loadSettings } from '@campuswatch/collector'
import { createApp } from './app.js'
import { loggers } from './config/logger.js'

const log = loggers.server

async function main(): Promise<void> {
  const settings = loadSettings(process.env)
  const runtime = await createCollector(settings)

  const app = createApp({
    store: runtime.store,
    pipeline: runtime.pipeline,
    sources: runtime.sources,
  })

  const server: Server = app.listen(settings.port, () => {
    log.info('API server listening', { port: settings.port, sources: runtime.sources.length })
  })

  let shuttingDown = false
  const shutdown = (signal: string): void => {
    if (shuttingDown) return
    shuttingDown = true
    log.info('Shutting down API server', { signal })

    server.close((closeError) => {
      if (closeError) {
        log.error('Error closing HTTP server', {}, closeError)
      }
      runtime
        .close()
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          log.error('Error closing store', {}, error)
          process.exit(1)
        })
    })
  }

  process.on('SIGINT', () => shutdown('SIGINT'))
  process.on('SIGTERM', () => shutdown('SIGTERM'))
}

main().catch((error: unknown) => {
  log.fatal('API server failed to start', {}, error)
  process.exit(1)
})
