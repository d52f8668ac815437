export type JsonValue = null | boolean | number | string | JsonValue[] | { [key: string]: JsonValue }

export type Variables = Record<string, JsonValue>

/** A tool call as written in a definition. `id` is generated per attempt when absent. */
export interface StepToolCall {
  id?: string
  name: string
  arguments: Record<string, JsonValue>
}

export type Condition =
  | { type: 'equals'; variable: string; value: JsonValue }
  | { type: 'contains'; variable: string; substring: string }
  | { type: 'exists'; variable: string }
  | { type: 'element_exists'; selector: string }
  | { type: 'javascript'; expression: string }
  | { type: 'http_status'; expected: number }

export interface ToolInvocationStep {
  type: 'tool_invocation'
  name: string
  call: StepToolCall
  timeout_ms?: number
  /** Variable that receives the tool output */
  output_variable?: string
}

export interface ConditionalBranchStep {
  type: 'conditional_branch'
  name: string
  condition: Condition
  then_steps: WorkflowStep[]
  else_steps: WorkflowStep[]
}

export interface LoopStep {
  type: 'loop'
  name: string
  iteration_variable: string
  items: JsonValue[]
  /** Only tool_invocation and set_variable bodies run */
  body_steps: WorkflowStep[]
  max_iterations?: number
}

export interface SetVariableStep {
  type: 'set_variable'
  name: string
  variable: string
  value: JsonValue
}

export interface WaitStep {
  type: 'wait'
  name: string
  condition?: Condition
  timeout_ms: number
}

export interface ParallelStep {
  type: 'parallel'
  name: string
  branches: WorkflowStep[][]
  max_concurrency?: number
}

export interface ErrorHandlerStep {
  type: 'error_handler'
  name: string
  error_variable: string
  handler_steps: WorkflowStep[]
  retry_count?: number
}

export type WorkflowStep =
  | ToolInvocationStep
  | ConditionalBranchStep
  | LoopStep
  | SetVariableStep
  | WaitStep
  | ParallelStep
  | ErrorHandlerStep

export type StepType = WorkflowStep['type']

export interface WorkflowDefinition {
  id: string
  name: string
  description: string
  steps: WorkflowStep[]
  variables: Variables
  timeout_ms?: number
  max_retries: number
  created_at: string
}

export type WorkflowStatus = 'pending' | 'running' | 'paused' | 'completed' | 'failed' | 'cancelled'

export interface StepResult {
  step_name: string
  success: boolean
  output: JsonValue
  error?: string
  execution_time_ms: number
  /** ISO-8601 */
  timestamp: string
}

export interface WorkflowState {
  workflow_id: string
  current_step: number
  variables: Variables
  step_results: StepResult[]
  start_time: string
  last_update: string
  status: WorkflowStatus
  /** Why the run stopped between steps (cancellation, deadline) */
  error?: string
}

export interface RetryPolicy {
  max_attempts: number
  backoff_ms: number
  exponential: boolean
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  max_attempts: 3,
  backoff_ms: 1000,
  exponential: true,
}

export function stepName(step: WorkflowStep): string {
  return step.name
}
