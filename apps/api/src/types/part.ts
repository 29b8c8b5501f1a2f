/**
 * Part Types
 *
 * Shared vocabulary for the parts search pipeline. Catalog adapters create
 * PartRecords; nothing downstream mutates them.
 */

export interface PartRecord {
  readonly partNumber: string
  readonly manufacturer: string
  readonly description: string
  readonly category: string
  readonly price?: number
  readonly stock?: number
  readonly datasheetUrl?: string
  readonly imageUrl?: string
  readonly specifications: Readonly<Record<string, string>>
}

/**
 * One entry in a user's search history.
 * Records what the user asked, not what the enhancer inferred.
 */
export interface SearchRecord {
  readonly query: string
  readonly context: string
  readonly timestamp: Date
}

/**
 * Affinity signals derived from a history snapshot.
 * Both lists are most-frequent first, ties in first-seen order, top 5.
 */
export interface UserProfile {
  favoriteCategories: string[]
  preferredManufacturers: string[]
}

export interface SearchResult {
  originalQuery: string
  enhancedQuery: string
  results: PartRecord[]
  recommendations: string[]
  personalizedRecommendations: string[]
  /** Count after fuzzy filtering, not the catalog's raw count */
  totalFound: number
  searchContext: string
}
