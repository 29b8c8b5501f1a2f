/**
 * Project Planner
 *
 * Breaks a project idea ("a smart watch") into generic component types, then
 * searches the catalog for each one. Types come from Claude as a JSON array
 * of strings; code fences around the array are tolerated.
 *
 * Degrades to no components when Claude is unavailable, not configured, or
 * answers with something that is not a string array. A catalog failure for
 * one component type leaves that type with no parts.
 */

import { z } from 'zod'
import type { ILogger } from '@partsense/logger'
import type { PartRecord } from '../../types/part'
import { errorMessage } from '../../lib/errors'
import { type CatalogProvider, searchCatalogSafely } from '../parts-search/collaborators'
import type { ClaudeTextClient } from './claude-client'

export const PARTS_PER_COMPONENT = 3
const PLAN_MAX_TOKENS = 500
const MAX_COMPONENT_TYPES = 10

const componentTypesSchema = z.array(z.string().trim().min(1)).max(MAX_COMPONENT_TYPES * 2)

export interface ProjectComponent {
  componentType: string
  parts: PartRecord[]
}

export interface ProjectPlan {
  description: string
  components: ProjectComponent[]
}

export function buildProjectPrompt(description: string): string {
  return [
    'You are an expert electronics system designer. A user wants to build a project.',
    'List the essential electronic component types they would need, as generic but specific search terms for an electronics distributor.',
    '',
    'Return your answer as a JSON array of strings ONLY. Do not include any other text or explanations.',
    '',
    'For example, for "I want to make a smart watch" a good response would be:',
    '["microcontroller with bluetooth", "small OLED display", "accelerometer and gyroscope sensor", "lithium battery charger IC", "vibration motor", "3.7V LiPo battery"]',
    '',
    `User Request: "${description}"`,
  ].join('\n')
}

/**
 * Component types from a model reply; null when the reply is not a string array
 */
export function parseComponentTypes(text: string): string[] | null {
  const unfenced = text
    .trim()
    .replace(/^```(?:json)?\s*/i, '')
    .replace(/\s*```$/, '')

  let json: unknown
  try {
    json = JSON.parse(unfenced)
  } catch {
    return null
  }

  const parsed = componentTypesSchema.safeParse(json)
  if (!parsed.success) return null

  return [...new Set(parsed.data)].slice(0, MAX_COMPONENT_TYPES)
}

export interface ProjectPlannerOptions {
  client: ClaudeTextClient | null
  catalog: CatalogProvider
  logger: ILogger
}

export class ProjectPlanner {
  private readonly client: ClaudeTextClient | null
  private readonly catalog: CatalogProvider
  private readonly log: ILogger

  constructor(options: ProjectPlannerOptions) {
    this.client = options.client
    this.catalog = options.catalog
    this.log = options.logger
  }

  async componentTypes(description: string): Promise<string[]> {
    if (!this.client) {
      this.log.debug('Project planning skipped, no AI client configured')
      return []
    }

    try {
      const text = await this.client.complete('project-planner', {
        prompt: buildProjectPrompt(description),
        maxTokens: PLAN_MAX_TOKENS,
      })
      const types = parseComponentTypes(text)
      if (!types) {
        this.log.warn('Project plan reply was not a JSON string array', { reply: text.slice(0, 200) })
        return []
      }
      return types
    } catch (error) {
      this.log.warn('Project planning failed', { error: errorMessage(error) })
      return []
    }
  }

  async plan(description: string): Promise<ProjectPlan> {
    const types = await this.componentTypes(description)
    const components: ProjectComponent[] = []

    for (const componentType of types) {
      const parts = await searchCatalogSafely(this.catalog, componentType, PARTS_PER_COMPONENT, this.log)
      components.push({ componentType, parts: parts.slice(0, PARTS_PER_COMPONENT) })
    }

    this.log.info('Project plan built', { componentTypes: types.length })
    return { description, components }
  }
}
