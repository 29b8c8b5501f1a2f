/**
 * Service wiring
 *
 * assembleSearchServices() builds the search core around whatever
 * collaborators it is handed; tests pass fakes. createSearchServices()
 * picks the real adapters from settings, falling back to the sample catalog
 * and keyword enhancer when API keys are missing.
 */

import type { Settings } from '../config/settings'
import { loggers } from '../config/logger'
import {
  type CatalogProvider,
  type QueryEnhancer,
  type RecommendationGenerator,
  PersonalizationEngine,
  SearchOrchestrator,
  SearchSession,
  SimilarPartsFinder,
} from './parts-search'
import { createCatalogProvider } from './catalog'
import {
  type ClaudeTextClient,
  ClaudeQueryEnhancer,
  ClaudeRecommendationGenerator,
  CompatibilityAnalyzer,
  KeywordQueryEnhancer,
  ProjectPlanner,
  SilentRecommendationGenerator,
  createClaudeTextClient,
} from './ai'

export interface SearchServices {
  orchestrator: SearchOrchestrator
  session: SearchSession
  projectPlanner: ProjectPlanner
  compatibility: CompatibilityAnalyzer
}

export interface SearchServiceDependencies {
  catalog: CatalogProvider
  enhancer: QueryEnhancer
  recommender: RecommendationGenerator
  aiClient: ClaudeTextClient | null
  fuzzyThreshold?: number
  similarityThreshold?: number
  catalogLimit?: number
  personalizationLimit?: number
  historyLimit?: number
  now?: () => Date
}

export function assembleSearchServices(deps: SearchServiceDependencies): SearchServices {
  const session = new SearchSession({ maxRecordsPerUser: deps.historyLimit })

  const personalization = new PersonalizationEngine({
    catalog: deps.catalog,
    session,
    logger: loggers.personalization,
    fuzzyThreshold: deps.fuzzyThreshold,
    catalogLimit: deps.personalizationLimit,
  })

  const similarParts = new SimilarPartsFinder({
    catalog: deps.catalog,
    logger: loggers.search.child('similar'),
    similarityThreshold: deps.similarityThreshold,
  })

  const orchestrator = new SearchOrchestrator({
    catalog: deps.catalog,
    enhancer: deps.enhancer,
    recommender: deps.recommender,
    session,
    personalization,
    similarParts,
    logger: loggers.search,
    fuzzyThreshold: deps.fuzzyThreshold,
    catalogLimit: deps.catalogLimit,
    now: deps.now,
  })

  return {
    orchestrator,
    session,
    projectPlanner: new ProjectPlanner({
      client: deps.aiClient,
      catalog: deps.catalog,
      logger: loggers.ai.child('project'),
    }),
    compatibility: new CompatibilityAnalyzer(deps.aiClient, loggers.ai.child('compatibility')),
  }
}

export function createSearchServices(settings: Settings): SearchServices {
  const aiClient = createClaudeTextClient(settings)
  if (!aiClient) {
    loggers.ai.warn('ANTHROPIC_API_KEY not configured, using keyword query enhancement')
  }

  return assembleSearchServices({
    catalog: createCatalogProvider(settings),
    enhancer: aiClient ? new ClaudeQueryEnhancer(aiClient) : new KeywordQueryEnhancer(),
    recommender: aiClient ? new ClaudeRecommendationGenerator(aiClient) : new SilentRecommendationGenerator(),
    aiClient,
    fuzzyThreshold: settings.FUZZY_THRESHOLD,
    similarityThreshold: settings.SIMILARITY_THRESHOLD,
    catalogLimit: settings.CATALOG_RESULT_LIMIT,
    personalizationLimit: settings.PERSONALIZATION_RESULT_LIMIT,
    historyLimit: settings.SEARCH_HISTORY_LIMIT,
  })
}
