import { describe, it, expect } from 'vitest'
import { InvalidInputError } from '../../../lib/errors'
import { makePart } from '../../../__tests__/fakes'
import { buildSearchableText, rankParts, scoreParts, sortByScore } from '../fuzzy-ranker'

const acmeResistor = makePart({
  partNumber: 'A1',
  manufacturer: 'Acme',
  description: '10k resistor',
  category: 'Resistors',
})
const resistorPack = makePart({ partNumber: 'B2', description: 'resistor pack' })
const misspelled = makePart({ partNumber: 'R2', description: 'resistr' })
const capacitor = makePart({
  partNumber: 'C7',
  manufacturer: 'Acme',
  description: 'ceramic capacitor',
  category: 'Capacitors',
})

describe('buildSearchableText', () => {
  it('joins part number, manufacturer, description and category', () => {
    expect(buildSearchableText(acmeResistor)).toBe('A1 Acme 10k resistor Resistors')
  })
})

describe('scoreParts', () => {
  it('compares lowercased query and text', () => {
    const [scored] = scoreParts([acmeResistor], 'RESISTOR')
    expect(scored.score).toBe(100)
  })

  it('scores near misses below containment', () => {
    const [scored] = scoreParts([misspelled], 'resistor')
    expect(scored.score).toBe(88)
  })
})

describe('sortByScore', () => {
  it('sorts descending and keeps input order on ties', () => {
    const entries = [
      { id: 'a', score: 85 },
      { id: 'b', score: 100 },
      { id: 'c', score: 85 },
      { id: 'd', score: 100 },
    ]
    expect(sortByScore(entries).map((entry) => entry.id)).toEqual(['b', 'd', 'a', 'c'])
    expect(entries.map((entry) => entry.id)).toEqual(['a', 'b', 'c', 'd'])
  })
})

describe('rankParts', () => {
  it('keeps a part whose description contains the query', () => {
    expect(rankParts([acmeResistor], 'resistor', 80)).toEqual([acmeResistor])
  })

  it('drops candidates below the threshold', () => {
    expect(rankParts([capacitor, acmeResistor], 'resistor')).toEqual([acmeResistor])
  })

  it('orders by score and is stable among equal scores', () => {
    const ranked = rankParts([misspelled, acmeResistor, resistorPack, capacitor], 'resistor')
    expect(ranked).toEqual([acmeResistor, resistorPack, misspelled])
  })

  it('honours a stricter threshold', () => {
    expect(rankParts([misspelled, acmeResistor], 'resistor', 90)).toEqual([acmeResistor])
  })

  it('keeps every candidate at threshold 0', () => {
    // capacitor scores 50, acmeResistor 100
    expect(rankParts([capacitor, acmeResistor], 'resistor', 0)).toEqual([acmeResistor, capacitor])
  })

  it('returns an empty list for no candidates', () => {
    expect(rankParts([], 'resistor')).toEqual([])
  })

  it('rejects thresholds outside 0..100', () => {
    expect(() => rankParts([acmeResistor], 'resistor', 101)).toThrow(InvalidInputError)
    expect(() => rankParts([acmeResistor], 'resistor', -1)).toThrow(InvalidInputError)
    expect(() => rankParts([acmeResistor], 'resistor', 50.5)).toThrow(InvalidInputError)
  })
})
