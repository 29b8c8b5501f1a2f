import { describe, it, expect } from 'vitest'
import { makePart } from '../../../__tests__/fakes'
import { rankParts } from '../fuzzy-ranker'
import {
  longestCommonSubsequence,
  partialRatio,
  ratio,
  roundHalfEven,
  windowedLcs,
} from '../text-similarity'

describe('longestCommonSubsequence', () => {
  it('finds the longest ordered common subsequence', () => {
    expect(longestCommonSubsequence('ABCBDAB', 'BDCABA')).toBe(4)
    expect(longestCommonSubsequence('resister', 'resistor')).toBe(7)
  })

  it('is zero for empty input', () => {
    expect(longestCommonSubsequence('', 'abc')).toBe(0)
    expect(longestCommonSubsequence('abc', '')).toBe(0)
  })
})

describe('roundHalfEven', () => {
  it('rounds halves to the even neighbour', () => {
    expect(roundHalfEven(12.5)).toBe(12)
    expect(roundHalfEven(87.5)).toBe(88)
    expect(roundHalfEven(60.5)).toBe(60)
    expect(roundHalfEven(66.67)).toBe(67)
    expect(roundHalfEven(57.4)).toBe(57)
  })
})

describe('windowedLcs', () => {
  it('matches a per-window LCS', () => {
    const pattern = 'resister'
    const text = '10k ohm resistor'
    const expected = Array.from({ length: text.length - pattern.length + 1 }, (_, k) =>
      longestCommonSubsequence(pattern, text.slice(k, k + pattern.length))
    )

    expect(windowedLcs(pattern, text)).toEqual(expected)
    expect(windowedLcs(pattern, text)).toEqual([0, 1, 2, 3, 4, 5, 6, 6, 7])
  })

  it('handles repeated characters', () => {
    expect(windowedLcs('lm358', 'dual op amp lm358n')).toEqual([1, 1, 1, 1, 0, 1, 1, 1, 1, 2, 3, 4, 5, 4])
  })

  it('returns nothing when the pattern is longer than the text', () => {
    expect(windowedLcs('resistor', 'ohm')).toEqual([])
  })
})

describe('ratio', () => {
  it('scores identical strings 100', () => {
    expect(ratio('LM358N', 'LM358N')).toBe(100)
  })

  it('rounds to the nearest integer', () => {
    expect(ratio('abc', 'abd')).toBe(67)
  })

  it('rounds exact halves to even', () => {
    // 100 * 2 / 16 = 12.5
    expect(ratio('a', 'abcdefghijklmno')).toBe(12)
    // 100 * 10 / 16 = 62.5
    expect(ratio('abcde', 'abcdexxxxxx')).toBe(62)
  })

  it('rounds the floating-point score', () => {
    // 100 * (46 / 80) evaluates just below 57.5
    expect(ratio('x'.repeat(23), 'x'.repeat(23) + 'y'.repeat(34))).toBe(57)
  })

  it('penalises length mismatch even on containment', () => {
    expect(ratio('resistor', '10k ohm resistor')).toBe(67)
  })

  it('is case-sensitive', () => {
    expect(ratio('ABC', 'abc')).toBe(0)
  })

  it('scores empty input 0', () => {
    expect(ratio('', 'resistor')).toBe(0)
    expect(ratio('', '')).toBe(0)
  })
})

describe('partialRatio', () => {
  it('scores containment 100 regardless of argument order', () => {
    expect(partialRatio('resistor', '10k ohm resistor')).toBe(100)
    expect(partialRatio('10k ohm resistor', 'resistor')).toBe(100)
  })

  it('scores the best same-length window', () => {
    // Best window "resistor": LCS 7 of 8, 100 * (1 - 2/16) = 87.5
    expect(partialRatio('resister', '10k ohm resistor')).toBe(88)
  })

  it('falls back to ratio for equal lengths', () => {
    expect(partialRatio('abc', 'abd')).toBe(ratio('abc', 'abd'))
  })

  it('scores empty input 0', () => {
    expect(partialRatio('', 'resistor')).toBe(0)
  })

  it('ranks long queries against long descriptions quickly', () => {
    const description = 'Precision low noise dual operational amplifier with rail to rail output, '.repeat(6)
    const parts = Array.from({ length: 50 }, (_, index) =>
      makePart({
        partNumber: `OPA-${index}`,
        manufacturer: 'Acme',
        description: `${description}variant ${index}`,
        category: 'Amplifiers',
      })
    )
    const query = 'rail to rail low noise amplifier for audio preamp stage, '.repeat(9).slice(0, 500)

    const started = performance.now()
    rankParts(parts, query, 80)
    const elapsedMs = performance.now() - started

    expect(query).toHaveLength(500)
    expect(elapsedMs).toBeLessThan(1000)
  })
})
