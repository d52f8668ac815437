import type { JsonValue } from '../workflows/types'

export const DEFAULT_MAX_ITERATIONS = 10

export interface AgentTask {
  goal: string
  context?: string
  /** Defaults to 10 */
  max_iterations?: number
}

export interface AgentResponse {
  success: boolean
  result: string
  iterations: number
  error?: string
}

/** One parsed model turn */
export interface AgentStep {
  thought: string
  action?: string
  action_input?: JsonValue
}
