/**
 * Collaborator seams for the parts search core.
 *
 * Adapters (Mouser, Claude, offline fallbacks) implement these interfaces and
 * may throw CollaboratorUnavailableError. The core never lets those errors
 * escape: every call site degrades to its own fallback.
 */

import type { ILogger } from '@partsense/logger'
import type { PartRecord } from '../../types/part'
import { errorMessage } from '../../lib/errors'

export interface CatalogProvider {
  /** Up to `limit` parts matching the term */
  search(term: string, limit: number): Promise<PartRecord[]>
}

export interface QueryEnhancer {
  /** A single improved search string; blank means "no enhancement" */
  enhance(query: string, context: string): Promise<string>
}

export interface RecommendationGenerator {
  generate(results: readonly PartRecord[], query: string): Promise<string[]>
}

/**
 * Catalog search that turns any provider failure into an empty result
 */
export async function searchCatalogSafely(
  catalog: CatalogProvider,
  term: string,
  limit: number,
  log: ILogger
): Promise<PartRecord[]> {
  try {
    return await catalog.search(term, limit)
  } catch (error) {
    log.warn('CATALOG_SEARCH_FAILED', { term, limit, error: errorMessage(error) })
    return []
  }
}

/**
 * Single-record catalog lookup; absent when nothing matches or the catalog fails
 */
export async function lookupPart(
  catalog: CatalogProvider,
  partNumber: string,
  log: ILogger
): Promise<PartRecord | null> {
  const [part] = await searchCatalogSafely(catalog, partNumber, 1, log)
  return part ?? null
}
