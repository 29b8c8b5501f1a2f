import { Router, type Request, type Response } from 'express'
import type { Router as RouterType } from 'express'
import { loggers } from '../config/logger'
import type { SearchServices } from '../services/container'
import { resolveUserId, sendError } from './respond'

const log = loggers.server.child('recommendations')

export function createRecommendationsRouter(services: SearchServices): RouterType {
  const router: RouterType = Router()

  /**
   * Personalized recommendations from the caller's search history
   */
  router.get('/', async (req: Request, res: Response) => {
    try {
      const userId = resolveUserId(req)
      const recommendations = await services.orchestrator.personalizedRecommendations(userId)
      return res.json({ userId, recommendations })
    } catch (error) {
      return sendError(res, error, log)
    }
  })

  return router
}
