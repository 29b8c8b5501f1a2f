/**
 * Search Orchestrator
 *
 * Top-level coordinator for a parts search:
 *
 *   record history -> enhance query -> catalog search -> fuzzy re-rank
 *     -> recommendation text -> personalized recommendations
 *
 * History is recorded before enhancement so it reflects what the user asked.
 * Ranking always compares against the original query, not the enhanced one.
 * Every collaborator step degrades on its own:
 * - enhancer failure or blank output -> original query
 * - catalog failure -> no results
 * - recommendation failure or empty output -> templated lines
 * - personalization lookups -> skipped lines
 * Only a blank query is rejected, before any side effect.
 */

import type { ILogger } from '@partsense/logger'
import type { PartRecord, SearchResult } from '../../types/part'
import { InvalidInputError, errorMessage } from '../../lib/errors'
import {
  type CatalogProvider,
  type QueryEnhancer,
  type RecommendationGenerator,
  lookupPart,
  searchCatalogSafely,
} from './collaborators'
import { DEFAULT_FUZZY_THRESHOLD, assertThreshold, rankParts } from './fuzzy-ranker'
import type { PersonalizationEngine } from './personalization'
import type { SearchHistoryStore } from './search-session'
import type { SimilarPartsFinder } from './similar-parts'

export const DEFAULT_CATALOG_LIMIT = 50
const MAX_FALLBACK_RECOMMENDATIONS = 3

export interface SearchOrchestratorOptions {
  catalog: CatalogProvider
  enhancer: QueryEnhancer
  recommender: RecommendationGenerator
  session: SearchHistoryStore
  personalization: PersonalizationEngine
  similarParts: SimilarPartsFinder
  logger: ILogger
  fuzzyThreshold?: number
  catalogLimit?: number
  now?: () => Date
}

/**
 * Deterministic recommendations used when the generator fails or has nothing to say
 */
export function buildFallbackRecommendations(results: readonly PartRecord[]): string[] {
  const recommendations: string[] = []

  const manufacturer = results.find((part) => part.manufacturer.trim())?.manufacturer
  if (manufacturer) {
    recommendations.push(`Consider other products from ${manufacturer} for similar quality`)
  }

  const category = results.find((part) => part.category.trim())?.category
  if (category) {
    recommendations.push(`Explore more ${category} for your project needs`)
  }

  recommendations.push('Check datasheets for detailed specifications and compatibility')
  recommendations.push('Consider bulk pricing for multiple units')

  return recommendations.slice(0, MAX_FALLBACK_RECOMMENDATIONS)
}

export class SearchOrchestrator {
  private readonly catalog: CatalogProvider
  private readonly enhancer: QueryEnhancer
  private readonly recommender: RecommendationGenerator
  private readonly session: SearchHistoryStore
  private readonly personalization: PersonalizationEngine
  private readonly similarParts: SimilarPartsFinder
  private readonly log: ILogger
  private readonly fuzzyThreshold: number
  private readonly catalogLimit: number
  private readonly now: () => Date

  constructor(options: SearchOrchestratorOptions) {
    this.catalog = options.catalog
    this.enhancer = options.enhancer
    this.recommender = options.recommender
    this.session = options.session
    this.personalization = options.personalization
    this.similarParts = options.similarParts
    this.log = options.logger
    this.fuzzyThreshold = options.fuzzyThreshold ?? DEFAULT_FUZZY_THRESHOLD
    this.catalogLimit = options.catalogLimit ?? DEFAULT_CATALOG_LIMIT
    this.now = options.now ?? (() => new Date())

    assertThreshold(this.fuzzyThreshold)
  }

  async search(query: string, userId: string, context: string = ''): Promise<SearchResult> {
    if (query.trim().length === 0) {
      throw new InvalidInputError('Search query is required')
    }

    this.session.append(userId, { query, context, timestamp: this.now() })

    const enhancedQuery = await this.enhanceQuery(query, context)
    const rawResults = await searchCatalogSafely(this.catalog, enhancedQuery, this.catalogLimit, this.log)
    const results = rankParts(rawResults, query, this.fuzzyThreshold)
    const recommendations = await this.recommend(results, query)
    const personalizedRecommendations = await this.personalization.recommendationsFor(userId)

    this.log.info('Search completed', {
      userId,
      enhanced: enhancedQuery !== query,
      rawCount: rawResults.length,
      totalFound: results.length,
    })

    return {
      originalQuery: query,
      enhancedQuery,
      results,
      recommendations,
      personalizedRecommendations,
      totalFound: results.length,
      searchContext: context,
    }
  }

  async getPart(partNumber: string): Promise<PartRecord | null> {
    if (partNumber.trim().length === 0) {
      throw new InvalidInputError('Part number is required')
    }
    return lookupPart(this.catalog, partNumber, this.log)
  }

  findSimilar(partNumber: string, limit?: number): Promise<PartRecord[]> {
    return this.similarParts.findSimilar(partNumber, limit)
  }

  personalizedRecommendations(userId: string): Promise<string[]> {
    return this.personalization.recommendationsFor(userId)
  }

  private async enhanceQuery(query: string, context: string): Promise<string> {
    try {
      const enhanced = (await this.enhancer.enhance(query, context)).trim()
      if (enhanced.length > 0) return enhanced

      this.log.warn('Empty query enhancement, using original query', { query })
    } catch (error) {
      this.log.warn('Query enhancement failed, using original query', { query, error: errorMessage(error) })
    }
    return query
  }

  private async recommend(results: readonly PartRecord[], query: string): Promise<string[]> {
    try {
      const generated = await this.recommender.generate(results, query)
      if (generated.length > 0) return generated

      this.log.debug('No generated recommendations, using templates', { query })
    } catch (error) {
      this.log.warn('Recommendation generation failed, using templates', { query, error: errorMessage(error) })
    }
    return buildFallbackRecommendations(results)
  }
}
