/**
 * Mouser Catalog Provider
 *
 * Keyword search against the Mouser Search API:
 *   POST {baseUrl}/search/keyword?apiKey=...
 *   { SearchByKeywordRequest: { keyword, records, startingRecord: 0 } }
 *
 * Every failure mode (network, timeout, non-2xx, API error array, unexpected
 * body) surfaces as CollaboratorUnavailableError. No retries here; callers
 * decide the fallback.
 */

import { z } from 'zod'
import type { ILogger } from '@partsense/logger'
import type { PartRecord } from '../../types/part'
import type { CatalogProvider } from '../parts-search/collaborators'
import { CollaboratorUnavailableError } from '../../lib/errors'

const mouserPartSchema = z.object({
  MouserPartNumber: z.string().nullish(),
  ManufacturerPartNumber: z.string().nullish(),
  Manufacturer: z.string().nullish(),
  Description: z.string().nullish(),
  Category: z.string().nullish(),
  DataSheetUrl: z.string().nullish(),
  ImagePath: z.string().nullish(),
  Availability: z.string().nullish(),
  AvailabilityInStock: z.union([z.string(), z.number()]).nullish(),
  PriceBreaks: z
    .array(z.object({ Price: z.union([z.string(), z.number()]).nullish() }))
    .nullish(),
  ProductAttributes: z
    .array(
      z.object({
        AttributeName: z.string().nullish(),
        AttributeValue: z.string().nullish(),
      })
    )
    .nullish(),
})

const mouserResponseSchema = z.object({
  Errors: z.array(z.object({ Message: z.string().nullish() })).nullish(),
  SearchResults: z
    .object({
      NumberOfResult: z.number().nullish(),
      Parts: z.array(mouserPartSchema).nullish(),
    })
    .nullish(),
})

export type MouserPart = z.infer<typeof mouserPartSchema>

/**
 * Lowest parseable price among price breaks ("$0.10", "1,234.50 €", 0.5)
 */
export function extractLowestPrice(priceBreaks: MouserPart['PriceBreaks']): number | undefined {
  const prices = (priceBreaks ?? [])
    .map(({ Price }) => {
      if (typeof Price === 'number') return Price
      if (!Price) return NaN
      return parseFloat(Price.replace(/[^\d.]/g, ''))
    })
    .filter((price) => Number.isFinite(price) && price >= 0)

  return prices.length > 0 ? Math.min(...prices) : undefined
}

/**
 * In-stock quantity from AvailabilityInStock, else the leading digits of
 * Availability ("1,234 In Stock")
 */
export function extractStock(part: MouserPart): number | undefined {
  const raw = part.AvailabilityInStock ?? part.Availability?.match(/^[\d,]+/)?.[0]
  if (raw === undefined || raw === null) return undefined

  const stock = typeof raw === 'number' ? raw : parseInt(raw.replace(/,/g, ''), 10)
  return Number.isInteger(stock) && stock >= 0 ? stock : undefined
}

export function extractSpecifications(attributes: MouserPart['ProductAttributes']): Record<string, string> {
  const specifications: Record<string, string> = {}
  for (const attribute of attributes ?? []) {
    if (attribute.AttributeName) {
      specifications[attribute.AttributeName] = attribute.AttributeValue ?? ''
    }
  }
  return specifications
}

function optionalText(value: string | null | undefined): string | undefined {
  return value && value.trim() ? value : undefined
}

export function toPartRecord(part: MouserPart): PartRecord | null {
  const partNumber = part.MouserPartNumber || part.ManufacturerPartNumber
  if (!partNumber) return null

  return {
    partNumber,
    manufacturer: part.Manufacturer ?? '',
    description: part.Description ?? '',
    category: part.Category ?? '',
    price: extractLowestPrice(part.PriceBreaks),
    stock: extractStock(part),
    datasheetUrl: optionalText(part.DataSheetUrl),
    imageUrl: optionalText(part.ImagePath),
    specifications: extractSpecifications(part.ProductAttributes),
  }
}

export interface MouserCatalogOptions {
  apiKey: string
  baseUrl: string
  timeoutMs: number
  logger: ILogger
}

export class MouserCatalogProvider implements CatalogProvider {
  private readonly apiKey: string
  private readonly baseUrl: string
  private readonly timeoutMs: number
  private readonly log: ILogger

  constructor(options: MouserCatalogOptions) {
    this.apiKey = options.apiKey
    this.baseUrl = options.baseUrl.replace(/\/+$/, '')
    this.timeoutMs = options.timeoutMs
    this.log = options.logger
  }

  async search(term: string, limit: number): Promise<PartRecord[]> {
    const url = `${this.baseUrl}/search/keyword?apiKey=${encodeURIComponent(this.apiKey)}`
    const body = await this.post(url, {
      SearchByKeywordRequest: {
        keyword: term,
        records: limit,
        startingRecord: 0,
      },
    })

    const parsed = mouserResponseSchema.safeParse(body)
    if (!parsed.success) {
      throw new CollaboratorUnavailableError('catalog', 'Unexpected Mouser API response structure', {
        status: 502,
        cause: parsed.error,
      })
    }

    const apiError = parsed.data.Errors?.find((error) => error.Message)
    if (apiError) {
      throw new CollaboratorUnavailableError('catalog', `Mouser API error: ${apiError.Message}`, {
        status: 502,
      })
    }

    const parts = (parsed.data.SearchResults?.Parts ?? [])
      .map(toPartRecord)
      .filter((part): part is PartRecord => part !== null)
      .slice(0, limit)

    this.log.debug('Mouser search completed', {
      term,
      limit,
      reported: parsed.data.SearchResults?.NumberOfResult ?? 0,
      returned: parts.length,
    })

    return parts
  }

  private async post(url: string, payload: unknown): Promise<unknown> {
    const controller = new AbortController()
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs)

    try {
      const response = await fetch(url, {
        method: 'POST',
        headers: {
          Accept: 'application/json',
          'Content-Type': 'application/json',
        },
        body: JSON.stringify(payload),
        signal: controller.signal,
      })

      if (!response.ok) {
        throw new CollaboratorUnavailableError(
          'catalog',
          `Mouser API responded with HTTP ${response.status}: ${response.statusText}`,
          { status: response.status }
        )
      }

      return await response.json()
    } catch (error) {
      if (error instanceof CollaboratorUnavailableError) throw error

      const timedOut = controller.signal.aborted
      throw new CollaboratorUnavailableError(
        'catalog',
        timedOut
          ? `Mouser API timed out after ${this.timeoutMs}ms`
          : `Mouser API request failed: ${error instanceof Error ? error.message : String(error)}`,
        { timedOut, cause: error }
      )
    } finally {
      clearTimeout(timeoutId)
    }
  }
}
