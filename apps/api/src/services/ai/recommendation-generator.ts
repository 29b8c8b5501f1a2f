/**
 * Recommendation Generators
 *
 * Claude summarises the top results and suggests alternatives or
 * complementary parts. Without an API key the generator stays silent and the
 * orchestrator's templated lines apply.
 */

import type { PartRecord } from '../../types/part'
import type { RecommendationGenerator } from '../parts-search/collaborators'
import type { ClaudeTextClient } from './claude-client'

const SUMMARY_LIMIT = 10
const MAX_RECOMMENDATIONS = 5
const RECOMMEND_MAX_TOKENS = 500

// "- ", "* ", "• ", "1. ", "2) "
const LIST_MARKER = /^(?:[-*•]|\d+[.)])\s+/

export function summarizeResults(results: readonly PartRecord[]): string {
  return results
    .slice(0, SUMMARY_LIMIT)
    .map((part) => `- ${part.partNumber} (${part.manufacturer}): ${part.description}`)
    .join('\n')
}

export function buildRecommendationPrompt(results: readonly PartRecord[], query: string): string {
  return [
    `Based on the user's search query "${query}" and these search results:`,
    '',
    summarizeResults(results),
    '',
    'Provide 3-5 personalized recommendations for the user. Consider alternative parts that might be better suited, complementary components, cost-effective alternatives and higher quality options.',
    '',
    'Format each recommendation as a brief sentence on its own line explaining why it is recommended.',
  ].join('\n')
}

/**
 * Non-empty lines with list markers stripped, at most 5
 */
export function parseRecommendations(text: string): string[] {
  return text
    .split('\n')
    .map((line) => line.trim().replace(LIST_MARKER, '').trim())
    .filter((line) => line.length > 0)
    .slice(0, MAX_RECOMMENDATIONS)
}

export class ClaudeRecommendationGenerator implements RecommendationGenerator {
  constructor(private readonly client: ClaudeTextClient) {}

  async generate(results: readonly PartRecord[], query: string): Promise<string[]> {
    if (results.length === 0) return []

    const text = await this.client.complete('recommendation-generator', {
      prompt: buildRecommendationPrompt(results, query),
      maxTokens: RECOMMEND_MAX_TOKENS,
    })
    return parseRecommendations(text)
  }
}

export class SilentRecommendationGenerator implements RecommendationGenerator {
  async generate(): Promise<string[]> {
    return []
  }
}
