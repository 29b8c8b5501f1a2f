import { Router, type Request, type Response } from 'express'
import type { Router as RouterType } from 'express'
import { z } from 'zod'
import { loggers } from '../config/logger'
import { ERROR_CODES } from '../lib/errors'
import type { SearchServices } from '../services/container'
import { DEFAULT_SIMILAR_LIMIT } from '../services/parts-search'
import { sendError } from './respond'

const log = loggers.server.child('parts')

const partNumberSchema = z.string().trim().min(1).max(100)

const similarQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(50).default(DEFAULT_SIMILAR_LIMIT),
})

const compatibilityRequestSchema = z.object({
  partNumberA: partNumberSchema,
  partNumberB: partNumberSchema,
})

function partNotFound(res: Response, partNumber: string): Response {
  return res.status(404).json({
    error: 'Part not found',
    code: ERROR_CODES.PART_NOT_FOUND,
    partNumber,
  })
}

export function createPartsRouter(services: SearchServices): RouterType {
  const router: RouterType = Router()

  /**
   * Compatibility notes for two parts
   */
  router.post('/compatibility', async (req: Request, res: Response) => {
    try {
      const { partNumberA, partNumberB } = compatibilityRequestSchema.parse(req.body)

      const partA = await services.orchestrator.getPart(partNumberA)
      if (!partA) return partNotFound(res, partNumberA)

      const partB = await services.orchestrator.getPart(partNumberB)
      if (!partB) return partNotFound(res, partNumberB)

      const analysis = await services.compatibility.analyze(partA, partB)
      return res.json({ partA, partB, analysis })
    } catch (error) {
      return sendError(res, error, log)
    }
  })

  /**
   * Single part lookup
   */
  router.get('/:partNumber', async (req: Request, res: Response) => {
    try {
      const partNumber = partNumberSchema.parse(req.params.partNumber)

      const part = await services.orchestrator.getPart(partNumber)
      if (!part) return partNotFound(res, partNumber)

      return res.json(part)
    } catch (error) {
      return sendError(res, error, log)
    }
  })

  /**
   * Parts with descriptions similar to the reference part
   */
  router.get('/:partNumber/similar', async (req: Request, res: Response) => {
    try {
      const partNumber = partNumberSchema.parse(req.params.partNumber)
      const { limit } = similarQuerySchema.parse(req.query)

      const parts = await services.orchestrator.findSimilar(partNumber, limit)
      return res.json({ partNumber, parts })
    } catch (error) {
      return sendError(res, error, log)
    }
  })

  return router
}
