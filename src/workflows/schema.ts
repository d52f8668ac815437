import { type TSchema, Type } from '@sinclair/typebox'
import { Value } from '@sinclair/typebox/value'
import type { Condition, WorkflowDefinition, WorkflowState, WorkflowStep } from './types'

const Name = Type.String({ minLength: 1 })
const Positive = Type.Integer({ minimum: 1 })
const Json = Type.Unknown()

export const ConditionSchema = Type.Union([
  Type.Object({ type: Type.Literal('equals'), variable: Name, value: Json }),
  Type.Object({ type: Type.Literal('contains'), variable: Name, substring: Type.String() }),
  Type.Object({ type: Type.Literal('exists'), variable: Name }),
  Type.Object({ type: Type.Literal('element_exists'), selector: Name }),
  Type.Object({ type: Type.Literal('javascript'), expression: Name }),
  Type.Object({ type: Type.Literal('http_status'), expected: Type.Integer({ minimum: 100, maximum: 599 }) }),
])

export const StepToolCallSchema = Type.Object({
  id: Type.Optional(Type.String()),
  name: Name,
  arguments: Type.Record(Type.String(), Json),
})

export const WorkflowStepSchema = Type.Recursive((Step) =>
  Type.Union([
    Type.Object({
      type: Type.Literal('tool_invocation'),
      name: Name,
      call: StepToolCallSchema,
      timeout_ms: Type.Optional(Positive),
      output_variable: Type.Optional(Name),
    }),
    Type.Object({
      type: Type.Literal('conditional_branch'),
      name: Name,
      condition: ConditionSchema,
      then_steps: Type.Array(Step),
      else_steps: Type.Array(Step),
    }),
    Type.Object({
      type: Type.Literal('loop'),
      name: Name,
      iteration_variable: Name,
      items: Type.Array(Json),
      body_steps: Type.Array(Step),
      max_iterations: Type.Optional(Type.Integer({ minimum: 0 })),
    }),
    Type.Object({
      type: Type.Literal('set_variable'),
      name: Name,
      variable: Name,
      value: Json,
    }),
    Type.Object({
      type: Type.Literal('wait'),
      name: Name,
      condition: Type.Optional(ConditionSchema),
      timeout_ms: Positive,
    }),
    Type.Object({
      type: Type.Literal('parallel'),
      name: Name,
      branches: Type.Array(Type.Array(Step)),
      max_concurrency: Type.Optional(Positive),
    }),
    Type.Object({
      type: Type.Literal('error_handler'),
      name: Name,
      error_variable: Name,
      handler_steps: Type.Array(Step),
      retry_count: Type.Optional(Positive),
    }),
  ]),
  { $id: 'WorkflowStep' },
)

export const WorkflowDefinitionSchema = Type.Object({
  id: Name,
  name: Name,
  description: Type.String(),
  steps: Type.Array(WorkflowStepSchema),
  variables: Type.Record(Type.String(), Json),
  timeout_ms: Type.Optional(Positive),
  max_retries: Positive,
  created_at: Type.String(),
})

const StepResultSchema = Type.Object({
  step_name: Type.String(),
  success: Type.Boolean(),
  output: Json,
  error: Type.Optional(Type.String()),
  execution_time_ms: Type.Number({ minimum: 0 }),
  timestamp: Type.String(),
})

export const WorkflowStateSchema = Type.Object({
  workflow_id: Name,
  current_step: Type.Integer({ minimum: 0 }),
  variables: Type.Record(Type.String(), Json),
  step_results: Type.Array(StepResultSchema),
  start_time: Type.String(),
  last_update: Type.String(),
  status: Type.Union([
    Type.Literal('pending'),
    Type.Literal('running'),
    Type.Literal('paused'),
    Type.Literal('completed'),
    Type.Literal('failed'),
    Type.Literal('cancelled'),
  ]),
  error: Type.Optional(Type.String()),
})

export function isCondition(value: unknown): value is Condition {
  return Value.Check(ConditionSchema, value)
}

export function isWorkflowStep(value: unknown): value is WorkflowStep {
  return Value.Check(WorkflowStepSchema, value)
}

export function isWorkflowDefinition(value: unknown): value is WorkflowDefinition {
  return Value.Check(WorkflowDefinitionSchema, value)
}

export function isWorkflowState(value: unknown): value is WorkflowState {
  return Value.Check(WorkflowStateSchema, value)
}

/** Schema errors as `path: message` lines, the first `limit` of them */
export function schemaErrors(schema: TSchema, value: unknown, limit = 5): string[] {
  const errors: string[] = []
  for (const error of Value.Errors(schema, value)) {
    errors.push(`${error.path || '/'}: ${error.message}`)
    if (errors.length >= limit) break
  }
  return errors
}
