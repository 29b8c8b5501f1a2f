// Load environment variables first, before any other imports
import './env'

import { ZodError } from 'zod'
import { loggers } from './config/logger'
import { type Settings, loadSettings } from './config/settings'
import { createSearchServices } from './services/container'
import { createApp } from './app'

const log = loggers.server

function readSettings(): Settings {
  try {
    return loadSettings()
  } catch (error) {
    if (error instanceof ZodError) {
      log.fatal('Invalid configuration', { issues: error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`) })
    } else {
      log.fatal('Failed to load configuration', {}, error)
    }
    process.exit(1)
  }
}

const settings = readSettings()
const app = createApp(createSearchServices(settings), { frontendUrl: settings.FRONTEND_URL })

const server = app.listen(settings.PORT, () => {
  log.info('API server started', { port: settings.PORT })
})

// Track if shutdown is in progress
let isShuttingDown = false

// Graceful shutdown
const shutdown = async (signal: string) => {
  if (isShuttingDown) {
    log.warn('Shutdown already in progress')
    return
  }
  isShuttingDown = true

  const shutdownStart = Date.now()
  log.info('Starting graceful shutdown', { signal })

  try {
    await new Promise<void>((resolve, reject) => {
      server.close((err) => {
        if (err) reject(err)
        else resolve()
      })
    })

    log.info('Graceful shutdown complete', { durationMs: Date.now() - shutdownStart })
    process.exit(0)
  } catch (error) {
    log.error('Error during shutdown', {}, error)
    process.exit(1)
  }
}

process.on('SIGTERM', () => void shutdown('SIGTERM'))
process.on('SIGINT', () => void shutdown('SIGINT'))
