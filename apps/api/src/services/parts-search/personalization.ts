/**
 * Personalization Engine
 *
 * Learns category and manufacturer affinity from a user's search history and
 * turns it into recommendation lines backed by live catalog lookups.
 *
 * Output order: up to 3 "Popular in <category>" lines, then up to 2
 * "From <manufacturer>" lines, capped at 5. A lookup that fails or finds
 * nothing skips its own line only. Lookups are not recorded as searches.
 */

import type { ILogger } from '@partsense/logger'
import type { PartRecord, SearchRecord, UserProfile } from '../../types/part'
import {
  CATEGORY_TRIGGERS,
  MANUFACTURER_TRIGGERS,
  allMatchingLabels,
  firstMatchingLabel,
} from './affinity-vocabulary'
import { type CatalogProvider, searchCatalogSafely } from './collaborators'
import { DEFAULT_FUZZY_THRESHOLD, rankParts } from './fuzzy-ranker'
import type { SearchHistoryStore } from './search-session'

const PROFILE_SIZE = 5
const CATEGORY_RECOMMENDATIONS = 3
const MANUFACTURER_RECOMMENDATIONS = 2
const MAX_RECOMMENDATIONS = 5

// Catalog results fetched per affinity label
export const DEFAULT_PERSONALIZATION_LIMIT = 20

/**
 * Most frequent labels first; ties keep first-seen order
 */
export function mostCommon(labels: readonly string[], size: number = PROFILE_SIZE): string[] {
  const counts = new Map<string, number>()
  for (const label of labels) {
    counts.set(label, (counts.get(label) ?? 0) + 1)
  }

  return [...counts.entries()]
    .sort((a, b) => b[1] - a[1])
    .slice(0, size)
    .map(([label]) => label)
}

/**
 * Derive affinity signals from a history snapshot.
 * A query contributes at most one category but every manufacturer it names.
 */
export function buildUserProfile(history: readonly SearchRecord[]): UserProfile {
  const categories: string[] = []
  const manufacturers: string[] = []

  for (const { query } of history) {
    const category = firstMatchingLabel(query, CATEGORY_TRIGGERS)
    if (category) categories.push(category)
    manufacturers.push(...allMatchingLabels(query, MANUFACTURER_TRIGGERS))
  }

  return {
    favoriteCategories: mostCommon(categories),
    preferredManufacturers: mostCommon(manufacturers),
  }
}

export interface PersonalizationEngineOptions {
  catalog: CatalogProvider
  session: SearchHistoryStore
  logger: ILogger
  fuzzyThreshold?: number
  catalogLimit?: number
}

export class PersonalizationEngine {
  private readonly catalog: CatalogProvider
  private readonly session: SearchHistoryStore
  private readonly log: ILogger
  private readonly fuzzyThreshold: number
  private readonly catalogLimit: number

  constructor(options: PersonalizationEngineOptions) {
    this.catalog = options.catalog
    this.session = options.session
    this.log = options.logger
    this.fuzzyThreshold = options.fuzzyThreshold ?? DEFAULT_FUZZY_THRESHOLD
    this.catalogLimit = options.catalogLimit ?? DEFAULT_PERSONALIZATION_LIMIT
  }

  profileFor(userId: string): UserProfile {
    return buildUserProfile(this.session.history(userId))
  }

  async recommendationsFor(userId: string): Promise<string[]> {
    const history = this.session.history(userId)
    if (history.length === 0) return []

    const profile = buildUserProfile(history)
    const lines: string[] = []

    for (const category of profile.favoriteCategories.slice(0, CATEGORY_RECOMMENDATIONS)) {
      const top = await this.topMatch(category)
      if (top) {
        lines.push(`Popular in ${category}: ${top.partNumber} - ${top.description}`)
      }
    }

    for (const manufacturer of profile.preferredManufacturers.slice(0, MANUFACTURER_RECOMMENDATIONS)) {
      const top = await this.topMatch(manufacturer)
      if (top) {
        lines.push(`From ${manufacturer}: ${top.partNumber} - ${top.description}`)
      }
    }

    this.log.debug('Personalized recommendations built', {
      userId,
      historySize: history.length,
      favoriteCategories: profile.favoriteCategories,
      preferredManufacturers: profile.preferredManufacturers,
      lines: lines.length,
    })

    return lines.slice(0, MAX_RECOMMENDATIONS)
  }

  private async topMatch(term: string): Promise<PartRecord | undefined> {
    const candidates = await searchCatalogSafely(this.catalog, term, this.catalogLimit, this.log)
    return rankParts(candidates, term, this.fuzzyThreshold)[0]
  }
}
