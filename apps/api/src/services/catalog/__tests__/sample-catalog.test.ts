import { describe, expect, it } from 'vitest'
import { createTestLogger } from '../../../__tests__/fakes'
import { lookupPart } from '../../parts-search'
import { SampleCatalogProvider, loadSampleParts } from '../sample-catalog'

describe('loadSampleParts', () => {
  it('reads and validates the bundled parts', () => {
    const parts = loadSampleParts()

    expect(parts.map((part) => part.partNumber)).toEqual([
      'A000066',
      'LM358N',
      'CF14JT10K0',
      'ESP32-WROOM-32',
      '2N3904',
    ])
    expect(parts[2].specifications).toEqual({ Resistance: '10 kOhms', Power: '0.25W', Tolerance: '5%' })
  })
})

describe('SampleCatalogProvider', () => {
  const catalog = new SampleCatalogProvider()

  it('matches the term against any text field, case-insensitively', async () => {
    expect((await catalog.search('ESP32', 10)).map((part) => part.partNumber)).toEqual(['ESP32-WROOM-32'])
    expect((await catalog.search('texas instruments', 10)).map((part) => part.partNumber)).toEqual(['LM358N'])
    expect((await catalog.search('resistor', 10)).map((part) => part.partNumber)).toEqual(['CF14JT10K0'])
  })

  it('returns nothing when nothing matches', async () => {
    expect(await catalog.search('flux capacitor 1.21GW', 2)).toEqual([])
    expect(await catalog.search('   ', 5)).toEqual([])
  })

  it('resolves known part numbers and leaves unknown ones absent', async () => {
    const log = createTestLogger()

    expect((await lookupPart(catalog, 'lm358n', log))?.manufacturer).toBe('Texas Instruments')
    expect(await lookupPart(catalog, 'UNKNOWN-PART', log)).toBeNull()
  })

  it('respects the limit', async () => {
    expect(await catalog.search('a', 1)).toHaveLength(1)
  })
})
