// Parts search core: ranking, similarity, history and personalization

export { partialRatio, ratio } from './text-similarity'

export { rankParts, scoreParts, buildSearchableText, DEFAULT_FUZZY_THRESHOLD } from './fuzzy-ranker'
export type { ScoredPart } from './fuzzy-ranker'

export { SimilarPartsFinder, DEFAULT_SIMILARITY_THRESHOLD, DEFAULT_SIMILAR_LIMIT } from './similar-parts'

export { SearchSession, DEFAULT_HISTORY_LIMIT } from './search-session'
export type { SearchHistoryStore, SearchSessionOptions } from './search-session'

export { PersonalizationEngine, buildUserProfile, DEFAULT_PERSONALIZATION_LIMIT } from './personalization'

export { SearchOrchestrator, buildFallbackRecommendations, DEFAULT_CATALOG_LIMIT } from './search-orchestrator'

export { searchCatalogSafely, lookupPart } from './collaborators'
export type { CatalogProvider, QueryEnhancer, RecommendationGenerator } from './collaborators'
