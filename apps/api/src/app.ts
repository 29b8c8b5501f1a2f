/**
 * Express App Configuration (without server startup)
 *
 * createApp() is used by:
 * - route tests (via supertest, with fake collaborators)
 * - index.ts (actual server startup)
 */

import express, { type Express, type Request, type Response, type NextFunction } from 'express'
import cors from 'cors'
import helmet from 'helmet'
import { getRequestContext } from '@partsense/logger'
import { loggers } from './config/logger'
import { requestContextMiddleware } from './middleware/request-context'
import { requestLoggerMiddleware, errorLoggerMiddleware } from './middleware/request-logger'
import { classifyError, getSafeMessage } from './lib/errors'
import type { SearchServices } from './services/container'
import { createSearchRouter } from './routes/search'
import { createPartsRouter } from './routes/parts'
import { createRecommendationsRouter } from './routes/recommendations'

const log = loggers.server

export interface AppOptions {
  frontendUrl?: string
}

export function createApp(services: SearchServices, options: AppOptions = {}): Express {
  const app: Express = express()

  app.use(helmet())

  // Request context first so every later log entry carries the requestId
  app.use(requestContextMiddleware)
  app.use(requestLoggerMiddleware)

  const allowedOrigins = [...new Set(['http://localhost:3000', options.frontendUrl].filter(Boolean))]
  log.debug('CORS allowed origins configured', { origins: allowedOrigins })

  app.use(cors({
    origin: (origin, callback) => {
      // Allow requests with no origin (like curl or server-to-server)
      if (!origin) return callback(null, true)

      if (allowedOrigins.includes(origin)) {
        callback(null, true)
      } else {
        log.warn('CORS blocked request from unknown origin', { origin })
        callback(new Error('Not allowed by CORS'))
      }
    },
    credentials: true,
  }))

  app.use(express.json())

  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      activeUsers: services.session.userCount,
    })
  })

  app.use('/api/search', createSearchRouter(services))
  app.use('/api/parts', createPartsRouter(services))
  app.use('/api/recommendations', createRecommendationsRouter(services))

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: 'Not found', code: 'NOT_FOUND' })
  })

  app.use(errorLoggerMiddleware)

  // Final error handler - safe response only, details are in the log entry above
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const classified = classifyError(err)

    res.status(classified.statusCode).json({
      error: getSafeMessage(classified),
      code: classified.code,
      requestId: getRequestContext()?.requestId ?? 'unknown',
    })
  })

  return app
}
