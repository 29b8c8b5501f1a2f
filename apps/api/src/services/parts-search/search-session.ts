/**
 * Search Session Store
 *
 * Per-user search history for the process lifetime. Nothing is persisted.
 *
 * Retention: each user keeps at most `maxRecordsPerUser` records; appending
 * beyond the cap evicts the oldest. Retained records stay in arrival order
 * and are never reordered or deduplicated.
 *
 * append() and history() are synchronous, so on Node's event loop an append
 * cannot interleave with another request's append or snapshot. history()
 * returns a frozen copy; profile derivation never iterates the live array.
 */

import type { SearchRecord } from '../../types/part'

export const DEFAULT_HISTORY_LIMIT = 100

/**
 * Storage seam for search history, injected into the orchestrator and
 * personalization engine so a bounded or shared store can replace it.
 */
export interface SearchHistoryStore {
  append(userId: string, record: SearchRecord): void
  history(userId: string): readonly SearchRecord[]
}

export interface SearchSessionOptions {
  maxRecordsPerUser?: number
}

export class SearchSession implements SearchHistoryStore {
  private readonly records = new Map<string, SearchRecord[]>()
  private readonly maxRecordsPerUser: number

  constructor(options: SearchSessionOptions = {}) {
    const limit = options.maxRecordsPerUser ?? DEFAULT_HISTORY_LIMIT
    if (!Number.isInteger(limit) || limit < 1) {
      throw new RangeError(`maxRecordsPerUser must be a positive integer, got ${limit}`)
    }
    this.maxRecordsPerUser = limit
  }

  append(userId: string, record: SearchRecord): void {
    const existing = this.records.get(userId)
    if (!existing) {
      this.records.set(userId, [record])
      return
    }

    existing.push(record)
    if (existing.length > this.maxRecordsPerUser) {
      existing.splice(0, existing.length - this.maxRecordsPerUser)
    }
  }

  history(userId: string): readonly SearchRecord[] {
    const existing = this.records.get(userId)
    return Object.freeze(existing ? [...existing] : [])
  }

  get userCount(): number {
    return this.records.size
  }
}
