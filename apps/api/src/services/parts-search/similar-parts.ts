/**
 * Similar Parts Finder
 *
 * Finds parts related to a reference part number:
 * 1. Resolve the reference with a single-record catalog lookup
 * 2. Search "<manufacturer> <category>" for up to 2 x limit candidates
 * 3. Drop the reference itself
 * 4. Keep candidates whose description ratio against the reference's
 *    description is above the similarity threshold
 * 5. Sort descending (stable) and truncate to limit
 *
 * Whole-string ratio is used instead of partialRatio: two catalog
 * descriptions of different length should not score as near-identical.
 */

import type { ILogger } from '@partsense/logger'
import type { PartRecord } from '../../types/part'
import { InvalidInputError } from '../../lib/errors'
import { type CatalogProvider, lookupPart, searchCatalogSafely } from './collaborators'
import { sortByScore } from './fuzzy-ranker'
import { ratio } from './text-similarity'

export const DEFAULT_SIMILARITY_THRESHOLD = 60
export const DEFAULT_SIMILAR_LIMIT = 5

export interface SimilarPartsFinderOptions {
  catalog: CatalogProvider
  logger: ILogger
  similarityThreshold?: number
}

export class SimilarPartsFinder {
  private readonly catalog: CatalogProvider
  private readonly log: ILogger
  private readonly similarityThreshold: number

  constructor(options: SimilarPartsFinderOptions) {
    this.catalog = options.catalog
    this.log = options.logger
    this.similarityThreshold = options.similarityThreshold ?? DEFAULT_SIMILARITY_THRESHOLD
  }

  async findSimilar(
    referencePartNumber: string,
    limit: number = DEFAULT_SIMILAR_LIMIT
  ): Promise<PartRecord[]> {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new InvalidInputError(`Limit must be a positive integer, got ${limit}`)
    }
    if (referencePartNumber.trim().length === 0) {
      throw new InvalidInputError('Part number is required')
    }

    const reference = await lookupPart(this.catalog, referencePartNumber, this.log)
    if (!reference) {
      this.log.debug('Reference part not found', { partNumber: referencePartNumber })
      return []
    }

    const similarQuery = `${reference.manufacturer} ${reference.category}`
    const candidates = await searchCatalogSafely(this.catalog, similarQuery, limit * 2, this.log)

    const scored = candidates
      .filter((part) => part.partNumber !== reference.partNumber)
      .map((part) => ({ part, score: ratio(reference.description, part.description) }))
      .filter((entry) => entry.score > this.similarityThreshold)

    const similar = sortByScore(scored).slice(0, limit).map((entry) => entry.part)

    this.log.debug('Similar parts resolved', {
      partNumber: reference.partNumber,
      candidates: candidates.length,
      returned: similar.length,
    })

    return similar
  }
}
