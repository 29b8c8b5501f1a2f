/**
 * Claude Text Client
 *
 * Thin wrapper over the Anthropic Messages API shared by every AI adapter:
 * one user prompt in, the trimmed text of the first text block out.
 * SDK failures (auth, rate limit, timeout, connection) are rethrown as
 * CollaboratorUnavailableError tagged with the calling collaborator.
 */

import Anthropic from '@anthropic-ai/sdk'
import type { Settings } from '../../config/settings'
import {
  type Collaborator,
  CollaboratorUnavailableError,
  classifyError,
  errorMessage,
} from '../../lib/errors'

export interface CompletionRequest {
  prompt: string
  system?: string
  maxTokens: number
}

export class ClaudeTextClient {
  constructor(
    private readonly anthropic: Anthropic,
    private readonly model: string
  ) {}

  async complete(collaborator: Collaborator, request: CompletionRequest): Promise<string> {
    const response = await this.anthropic.messages
      .create({
        model: this.model,
        max_tokens: request.maxTokens,
        ...(request.system ? { system: request.system } : {}),
        messages: [{ role: 'user', content: request.prompt }],
      })
      .catch((error: unknown) => {
        const classified = classifyError(error)
        throw new CollaboratorUnavailableError(collaborator, `Claude request failed: ${errorMessage(error)}`, {
          status: classified.statusCode,
          timedOut: classified.category === 'timeout',
          cause: error,
        })
      })

    const textContent = response.content.find((block) => block.type === 'text')
    if (!textContent || textContent.type !== 'text') {
      throw new CollaboratorUnavailableError(collaborator, 'No text response from Claude', { status: 502 })
    }

    return textContent.text.trim()
  }
}

/**
 * Client for the configured model, or null when no API key is set
 */
export function createClaudeTextClient(settings: Settings): ClaudeTextClient | null {
  if (!settings.ANTHROPIC_API_KEY) return null

  const anthropic = new Anthropic({
    apiKey: settings.ANTHROPIC_API_KEY,
    timeout: settings.AI_TIMEOUT_MS,
    maxRetries: 0,
  })
  return new ClaudeTextClient(anthropic, settings.ANTHROPIC_MODEL)
}
