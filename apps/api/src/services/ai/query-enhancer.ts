/**
 * Query Enhancers
 *
 * ClaudeQueryEnhancer rewrites free text into a catalog search string.
 * KeywordQueryEnhancer is the offline stand-in: a trigger table mapping known
 * phrases to search terms, first trigger found wins.
 */

import type { QueryEnhancer } from '../parts-search/collaborators'
import type { ClaudeTextClient } from './claude-client'

const ENHANCE_MAX_TOKENS = 100

export function buildEnhancePrompt(query: string, context: string): string {
  return [
    `You are an expert in electronic components and engineering. A user is searching for electronic parts with this query: "${query}"`,
    '',
    `Context: ${context}`,
    '',
    'Rewrite the query into a more specific, effective search string for an electronic components distributor.',
    'Consider implied technical specifications, common part number patterns, manufacturer names and component categories.',
    '',
    'Return only the enhanced search query, nothing else.',
  ].join('\n')
}

export class ClaudeQueryEnhancer implements QueryEnhancer {
  constructor(private readonly client: ClaudeTextClient) {}

  enhance(query: string, context: string): Promise<string> {
    return this.client.complete('query-enhancer', {
      prompt: buildEnhancePrompt(query, context),
      maxTokens: ENHANCE_MAX_TOKENS,
    })
  }
}

export interface KeywordRule {
  trigger: string
  term: string
}

export const KEYWORD_RULES: readonly KeywordRule[] = [
  { trigger: 'arduino uno', term: 'Arduino Uno' },
  { trigger: 'lm358', term: 'LM358' },
  { trigger: 'esp32', term: 'ESP32' },
  { trigger: 'resistor', term: 'resistor' },
  { trigger: 'capacitor', term: 'capacitor' },
  { trigger: 'transistor', term: 'transistor' },
  { trigger: 'microcontroller', term: 'microcontroller' },
  { trigger: 'amplifier', term: 'amplifier' },
  { trigger: 'wifi', term: 'WiFi' },
  { trigger: 'bluetooth', term: 'Bluetooth' },
  { trigger: '10k', term: '10k' },
  { trigger: 'ohm', term: 'ohm' },
]

export class KeywordQueryEnhancer implements QueryEnhancer {
  constructor(private readonly rules: readonly KeywordRule[] = KEYWORD_RULES) {}

  async enhance(query: string): Promise<string> {
    const lowerQuery = query.toLowerCase()
    return this.rules.find(({ trigger }) => lowerQuery.includes(trigger))?.term ?? query
  }
}
