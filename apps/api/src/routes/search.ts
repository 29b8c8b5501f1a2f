import { Router, type Request, type Response } from 'express'
import type { Router as RouterType } from 'express'
import { z } from 'zod'
import { loggers } from '../config/logger'
import type { SearchServices } from '../services/container'
import { resolveUserId, sendError } from './respond'

const log = loggers.server.child('search')

// Blank queries pass here and are rejected by the orchestrator as INVALID_INPUT
const searchRequestSchema = z.object({
  query: z.string().max(500),
  context: z.string().max(1000).optional().default(''),
})

const projectRequestSchema = z.object({
  description: z.string().trim().min(1).max(1000),
})

export function createSearchRouter(services: SearchServices): RouterType {
  const router: RouterType = Router()

  /**
   * Fuzzy-ranked part search with recommendations
   */
  router.post('/', async (req: Request, res: Response) => {
    try {
      const userId = resolveUserId(req)
      const { query, context } = searchRequestSchema.parse(req.body)

      const result = await services.orchestrator.search(query, userId, context)
      return res.json(result)
    } catch (error) {
      return sendError(res, error, log)
    }
  })

  /**
   * Break a project idea into component types and search each
   */
  router.post('/project', async (req: Request, res: Response) => {
    try {
      const { description } = projectRequestSchema.parse(req.body)

      const plan = await services.projectPlanner.plan(description)
      return res.json(plan)
    } catch (error) {
      return sendError(res, error, log)
    }
  })

  return router
}
