/**
 * Fuzzy Ranker
 *
 * Re-ranks raw catalog results against the user's original query.
 *
 * Each candidate is scored by partialRatio(query, searchable text), both
 * lowercased. Candidates below the threshold are dropped; survivors are sorted
 * by descending score. Ties keep catalog order (Array.prototype.sort is
 * stable), so output is a deterministic function of (query, candidates,
 * threshold).
 */

import type { PartRecord } from '../../types/part'
import { InvalidInputError } from '../../lib/errors'
import { partialRatio } from './text-similarity'

export const DEFAULT_FUZZY_THRESHOLD = 80

export interface ScoredPart {
  part: PartRecord
  score: number
}

/**
 * Text a part is matched on: part number, manufacturer, description, category
 */
export function buildSearchableText(part: PartRecord): string {
  return `${part.partNumber} ${part.manufacturer} ${part.description} ${part.category}`
}

export function assertThreshold(threshold: number): void {
  if (!Number.isInteger(threshold) || threshold < 0 || threshold > 100) {
    throw new InvalidInputError(`Threshold must be an integer between 0 and 100, got ${threshold}`)
  }
}

/**
 * Score every candidate against the query without filtering
 */
export function scoreParts(candidates: readonly PartRecord[], query: string): ScoredPart[] {
  const normalizedQuery = query.toLowerCase()
  return candidates.map((part) => ({
    part,
    score: partialRatio(normalizedQuery, buildSearchableText(part).toLowerCase()),
  }))
}

/**
 * Sort scored entries by descending score, keeping input order on ties
 */
export function sortByScore<T extends { score: number }>(entries: T[]): T[] {
  return [...entries].sort((a, b) => b.score - a.score)
}

/**
 * Filter and order candidates by fuzzy relevance to the query
 */
export function rankParts(
  candidates: readonly PartRecord[],
  query: string,
  threshold: number = DEFAULT_FUZZY_THRESHOLD
): PartRecord[] {
  assertThreshold(threshold)
  if (candidates.length === 0) return []

  const survivors = scoreParts(candidates, query).filter((entry) => entry.score >= threshold)
  return sortByScore(survivors).map((entry) => entry.part)
}
