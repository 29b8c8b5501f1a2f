// AI adapters backed by Claude, with offline stand-ins

export { ClaudeTextClient, createClaudeTextClient } from './claude-client'
export type { CompletionRequest } from './claude-client'

export { ClaudeQueryEnhancer, KeywordQueryEnhancer, KEYWORD_RULES } from './query-enhancer'
export type { KeywordRule } from './query-enhancer'

export {
  ClaudeRecommendationGenerator,
  SilentRecommendationGenerator,
  parseRecommendations,
} from './recommendation-generator'

export { ProjectPlanner, parseComponentTypes, PARTS_PER_COMPONENT } from './project-planner'
export type { ProjectPlan, ProjectComponent } from './project-planner'

export { CompatibilityAnalyzer, COMPATIBILITY_UNAVAILABLE } from './compatibility-analyzer'
