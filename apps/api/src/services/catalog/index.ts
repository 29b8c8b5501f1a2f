// Catalog adapters

import type { Settings } from '../../config/settings'
import { loggers } from '../../config/logger'
import type { CatalogProvider } from '../parts-search/collaborators'
import { MouserCatalogProvider } from './mouser-catalog'
import { SampleCatalogProvider } from './sample-catalog'

export { MouserCatalogProvider, toPartRecord, extractLowestPrice, extractStock } from './mouser-catalog'
export type { MouserCatalogOptions, MouserPart } from './mouser-catalog'
export { SampleCatalogProvider, loadSampleParts } from './sample-catalog'

export function createCatalogProvider(settings: Settings): CatalogProvider {
  if (!settings.MOUSER_API_KEY) {
    loggers.catalog.warn('MOUSER_API_KEY not configured, using sample catalog')
    return new SampleCatalogProvider()
  }

  return new MouserCatalogProvider({
    apiKey: settings.MOUSER_API_KEY,
    baseUrl: settings.MOUSER_API_URL,
    timeoutMs: settings.CATALOG_TIMEOUT_MS,
    logger: loggers.catalog,
  })
}
