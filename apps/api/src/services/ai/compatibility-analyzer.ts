/**
 * Compatibility Analyzer
 *
 * Asks Claude for a short note on using two parts together.
 */

import type { ILogger } from '@partsense/logger'
import type { PartRecord } from '../../types/part'
import { errorMessage } from '../../lib/errors'
import type { ClaudeTextClient } from './claude-client'

export const COMPATIBILITY_UNAVAILABLE = 'Unable to analyze compatibility at this time.'
const COMPATIBILITY_MAX_TOKENS = 600

function describePart(part: PartRecord): string {
  return `${part.partNumber} (${part.manufacturer}) - ${part.description}`
}

export function buildCompatibilityPrompt(partA: PartRecord, partB: PartRecord): string {
  return [
    'Analyze the compatibility between these two electronic parts:',
    '',
    `Part 1: ${describePart(partA)}`,
    `Part 2: ${describePart(partB)}`,
    '',
    'Provide a brief analysis of their compatibility and any considerations for using them together.',
  ].join('\n')
}

export class CompatibilityAnalyzer {
  constructor(
    private readonly client: ClaudeTextClient | null,
    private readonly log: ILogger
  ) {}

  async analyze(partA: PartRecord, partB: PartRecord): Promise<string> {
    if (!this.client) return COMPATIBILITY_UNAVAILABLE

    try {
      const analysis = await this.client.complete('compatibility', {
        prompt: buildCompatibilityPrompt(partA, partB),
        maxTokens: COMPATIBILITY_MAX_TOKENS,
      })
      return analysis || COMPATIBILITY_UNAVAILABLE
    } catch (error) {
      this.log.warn('Compatibility analysis failed', {
        partA: partA.partNumber,
        partB: partB.partNumber,
        error: errorMessage(error),
      })
      return COMPATIBILITY_UNAVAILABLE
    }
  }
}
