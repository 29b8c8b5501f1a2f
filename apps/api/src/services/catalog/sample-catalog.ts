/**
 * Sample Catalog Provider
 *
 * Offline catalog used when no Mouser API key is configured. Parts are read
 * once from data/sample-parts.json and validated.
 *
 * A term matches a part when the lowercased term is a substring of its part
 * number, manufacturer, description or category. Unmatched terms find
 * nothing, so unknown part numbers stay unresolved.
 */

import { readFileSync } from 'fs'
import { fileURLToPath } from 'url'
import { dirname, resolve } from 'path'
import { z } from 'zod'
import type { PartRecord } from '../../types/part'
import type { CatalogProvider } from '../parts-search/collaborators'

const __dirname = dirname(fileURLToPath(import.meta.url))
export const SAMPLE_PARTS_PATH = resolve(__dirname, '..', '..', '..', 'data', 'sample-parts.json')

const samplePartSchema = z.object({
  partNumber: z.string().min(1),
  manufacturer: z.string(),
  description: z.string(),
  category: z.string(),
  price: z.number().nonnegative().optional(),
  stock: z.number().int().nonnegative().optional(),
  datasheetUrl: z.string().url().optional(),
  imageUrl: z.string().url().optional(),
  specifications: z.record(z.string()).default({}),
})

const samplePartsSchema = z.array(samplePartSchema)

export function loadSampleParts(path: string = SAMPLE_PARTS_PATH): PartRecord[] {
  return samplePartsSchema.parse(JSON.parse(readFileSync(path, 'utf-8')))
}

function matches(part: PartRecord, lowerTerm: string): boolean {
  return [part.partNumber, part.manufacturer, part.description, part.category].some((field) =>
    field.toLowerCase().includes(lowerTerm)
  )
}

export class SampleCatalogProvider implements CatalogProvider {
  private readonly parts: readonly PartRecord[]

  constructor(parts: readonly PartRecord[] = loadSampleParts()) {
    this.parts = parts
  }

  async search(term: string, limit: number): Promise<PartRecord[]> {
    const lowerTerm = term.trim().toLowerCase()
    if (!lowerTerm) return []

    return this.parts.filter((part) => matches(part, lowerTerm)).slice(0, limit)
  }
}
