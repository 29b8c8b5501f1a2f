/**
 * API Settings
 *
 * Parsed once from process.env. Invalid values fail fast at startup.
 * Unset MOUSER_API_KEY / ANTHROPIC_API_KEY switch the API to its offline
 * catalog and keyword enhancer instead of failing.
 */

import { z } from 'zod'

const blankToUndefined = (value: unknown) =>
  typeof value === 'string' && value.trim() === '' ? undefined : value

const optionalString = z.preprocess(blankToUndefined, z.string().optional())

const score = (fallback: number) =>
  z.preprocess(blankToUndefined, z.coerce.number().int().min(0).max(100).default(fallback))

const positiveInt = (fallback: number) =>
  z.preprocess(blankToUndefined, z.coerce.number().int().positive().default(fallback))

export const settingsSchema = z.object({
  PORT: positiveInt(8000),
  FRONTEND_URL: optionalString,

  MOUSER_API_KEY: optionalString,
  MOUSER_API_URL: z.preprocess(
    blankToUndefined,
    z.string().url().default('https://api.mouser.com/api/v1')
  ),
  CATALOG_TIMEOUT_MS: positiveInt(10_000),
  CATALOG_RESULT_LIMIT: positiveInt(50),
  PERSONALIZATION_RESULT_LIMIT: positiveInt(20),

  ANTHROPIC_API_KEY: optionalString,
  ANTHROPIC_MODEL: z.preprocess(blankToUndefined, z.string().default('claude-sonnet-4-20250514')),
  AI_TIMEOUT_MS: positiveInt(30_000),

  FUZZY_THRESHOLD: score(80),
  SIMILARITY_THRESHOLD: score(60),
  SEARCH_HISTORY_LIMIT: positiveInt(100),
})

export type Settings = z.infer<typeof settingsSchema>

export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  return settingsSchema.parse(env)
}
