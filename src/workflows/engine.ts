import { Value } from '@sinclair/typebox/value'
import type { ToolCall } from '../providers/types'
import type { ToolRunner } from '../tools/types'
import { delay, retry, timeout } from '../util/async'
import { log } from '../util/logger'
import { describeCondition, evaluateCondition, lookupVariable } from './conditions'
import {
  browserNotAvailable,
  errorMessage,
  isWorkflowError,
  maxRetriesExceeded,
  stepFailed,
  validationError,
} from './errors'
import { interpolateRecord } from './interpolate'
import { createState, validateDefinition } from './state'
import type {
  ConditionalBranchStep,
  ErrorHandlerStep,
  JsonValue,
  LoopStep,
  ParallelStep,
  RetryPolicy,
  StepResult,
  ToolInvocationStep,
  Variables,
  WaitStep,
  WorkflowDefinition,
  WorkflowState,
  WorkflowStep,
} from './types'

const WAIT_POLL_MS = 100
const DEFAULT_MAX_ITERATIONS = 100
const DEFAULT_MAX_CONCURRENCY = 5
const DEFAULT_HANDLER_RETRIES = 3
const DEFAULT_BACKOFF_MS = 1000

export interface ExecutorOptions {
  /** Tool surface; without one every tool step fails with browser_not_available */
  tools?: ToolRunner
  /** Applied to every step. Defaults to the definition's max_retries with 1s exponential backoff */
  retry?: RetryPolicy
  sleep?: (ms: number) => Promise<void>
  clock?: () => number
}

export type StepCompleteHandler = (
  state: WorkflowState,
  result: StepResult,
) => void | 'pause' | Promise<void | 'pause'>

export interface RunOptions {
  /** Checked between top-level steps */
  signal?: AbortSignal
  /** Called after every recorded top-level step; return 'pause' to stop with status paused */
  onStepComplete?: StepCompleteHandler
}

interface Scope {
  variables: Variables
  results: Map<string, StepResult>
  policy: RetryPolicy
  /** Status of the latest tool response seen by this scope */
  httpStatus?: number
  /** True once a sibling parallel branch has failed */
  aborted: () => boolean
}

interface StepOutcome {
  result: StepResult
  error?: unknown
}

/** Failures of nested steps that already went through the retry policy */
function isTerminal(error: unknown): boolean {
  return isWorkflowError(error, 'max_retries_exceeded')
}

export function resultToJson(result: StepResult): JsonValue {
  return {
    step_name: result.step_name,
    success: result.success,
    output: result.output,
    ...(result.error !== undefined ? { error: result.error } : {}),
    execution_time_ms: result.execution_time_ms,
    timestamp: result.timestamp,
  }
}

export class WorkflowExecutor {
  private readonly tools?: ToolRunner
  private readonly policy?: RetryPolicy
  private readonly sleep: (ms: number) => Promise<void>
  private readonly clock: () => number

  constructor(options: ExecutorOptions = {}) {
    this.tools = options.tools
    this.policy = options.retry
    this.sleep = options.sleep ?? delay
    this.clock = options.clock ?? Date.now
  }

  policyFor(definition: WorkflowDefinition): RetryPolicy {
    return this.policy ?? {
      max_attempts: definition.max_retries,
      backoff_ms: DEFAULT_BACKOFF_MS,
      exponential: true,
    }
  }

  async execute(definition: WorkflowDefinition, options: RunOptions = {}): Promise<WorkflowState> {
    validateDefinition(definition)
    const state = createState(definition, this.clock)

    log.info('workflow', `Starting workflow: ${definition.name}`, {
      id: definition.id,
      steps: definition.steps.length,
    })

    return this.run(definition, state, 0, options)
  }

  /**
   * Continue a paused, failed or interrupted run. A trailing failed result is
   * dropped so that step is attempted again.
   */
  async resume(
    definition: WorkflowDefinition,
    state: WorkflowState,
    options: RunOptions = {},
  ): Promise<WorkflowState> {
    if (state.workflow_id !== definition.id) {
      throw validationError(`state belongs to workflow "${state.workflow_id}", not "${definition.id}"`)
    }
    if (state.step_results.length > definition.steps.length) {
      throw validationError(
        `state has ${state.step_results.length} results but the workflow has ${definition.steps.length} steps`,
      )
    }
    if (state.status === 'completed') {
      return state
    }
    validateDefinition(definition)

    const resumed = structuredClone(state)
    const last = resumed.step_results[resumed.step_results.length - 1]
    if (last && !last.success) {
      resumed.step_results.pop()
    }
    delete resumed.error
    resumed.status = 'running'
    resumed.last_update = this.now()

    log.info('workflow', `Resuming workflow: ${definition.name} at step ${resumed.step_results.length}`)
    return this.run(definition, resumed, resumed.step_results.length, options)
  }

  private now(): string {
    return new Date(this.clock()).toISOString()
  }

  private async run(
    definition: WorkflowDefinition,
    state: WorkflowState,
    startIndex: number,
    options: RunOptions,
  ): Promise<WorkflowState> {
    const scope: Scope = {
      variables: state.variables,
      results: new Map(state.step_results.map((r) => [r.step_name, r])),
      policy: this.policyFor(definition),
      aborted: () => false,
    }
    const deadline = definition.timeout_ms !== undefined ? this.clock() + definition.timeout_ms : undefined
    const remaining = definition.steps.slice(startIndex)

    for (const [offset, step] of remaining.entries()) {
      if (options.signal?.aborted) {
        return this.stop(state, 'cancelled', 'Workflow cancelled')
      }
      if (deadline !== undefined && this.clock() >= deadline) {
        return this.stop(state, 'failed', `Workflow timed out after ${definition.timeout_ms}ms`)
      }

      state.current_step = startIndex + offset
      const { result } = await this.runStep(step, scope)
      state.step_results.push(result)
      state.last_update = this.now()

      if (!result.success) {
        state.status = 'failed'
        log.error('workflow', `Workflow ${definition.name} failed at step ${result.step_name}: ${result.error}`)
      }

      const decision = await options.onStepComplete?.(state, result)
      if (state.status === 'failed') {
        return state
      }
      if (decision === 'pause' && offset < remaining.length - 1) {
        state.status = 'paused'
        log.info('workflow', `Workflow ${definition.name} paused after step ${result.step_name}`)
        return state
      }
    }

    state.status = 'completed'
    state.last_update = this.now()
    log.info('workflow', `Workflow ${definition.name} completed`)
    return state
  }

  private stop(state: WorkflowState, status: 'cancelled' | 'failed', reason: string): WorkflowState {
    state.status = status
    state.error = reason
    state.last_update = this.now()
    log.warn('workflow', `${reason} (workflow ${state.workflow_id})`)
    return state
  }

  /** One step through the retry policy, recorded as a StepResult */
  private async runStep(step: WorkflowStep, scope: Scope): Promise<StepOutcome> {
    const started = this.clock()
    let outcome: StepOutcome

    try {
      const output = await this.attempt(step, scope)
      outcome = {
        result: {
          step_name: step.name,
          success: true,
          output,
          execution_time_ms: this.clock() - started,
          timestamp: this.now(),
        },
      }
    } catch (error) {
      outcome = {
        result: {
          step_name: step.name,
          success: false,
          output: null,
          error: errorMessage(error),
          execution_time_ms: this.clock() - started,
          timestamp: this.now(),
        },
        error,
      }
    }

    scope.results.set(step.name, outcome.result)
    return outcome
  }

  private async attempt(step: WorkflowStep, scope: Scope): Promise<JsonValue> {
    const { max_attempts, backoff_ms, exponential } = scope.policy

    try {
      return await retry(() => this.executeStep(step, scope), {
        maxAttempts: max_attempts,
        delayMs: backoff_ms,
        exponential,
        sleep: this.sleep,
        shouldRetry: (error) => !isTerminal(error) && !scope.aborted(),
        onError: (error, attempt) => {
          log.warn('workflow', `Step ${step.name} attempt ${attempt}/${max_attempts} failed: ${errorMessage(error)}`)
        },
      })
    } catch (error) {
      if (isTerminal(error)) throw error
      throw maxRetriesExceeded(step.name, error)
    }
  }

  /** Steps in order until one fails; the failure is rethrown after recording */
  private async runSequence(steps: WorkflowStep[], scope: Scope): Promise<StepResult[]> {
    const results: StepResult[] = []
    for (const step of steps) {
      if (scope.aborted()) break
      const { result, error } = await this.runStep(step, scope)
      results.push(result)
      if (!result.success) throw error
    }
    return results
  }

  private async executeStep(step: WorkflowStep, scope: Scope): Promise<JsonValue> {
    log.debug('workflow', `Executing ${step.type} step: ${step.name}`)

    switch (step.type) {
      case 'tool_invocation':
        return this.invokeTool(step, scope)
      case 'conditional_branch':
        return this.branch(step, scope)
      case 'loop':
        return this.loop(step, scope)
      case 'set_variable':
        scope.variables[step.variable] = structuredClone(step.value)
        return `Set ${step.variable} = ${JSON.stringify(step.value)}`
      case 'wait':
        return this.wait(step, scope)
      case 'parallel':
        return this.parallel(step, scope)
      case 'error_handler':
        return this.handleError(step, scope)
    }
  }

  private async invokeTool(step: ToolInvocationStep, scope: Scope): Promise<string> {
    if (!this.tools) {
      throw browserNotAvailable()
    }

    const call: ToolCall = {
      id: step.call.id ?? `call_${step.name}`,
      name: step.call.name,
      arguments: interpolateRecord(step.call.arguments, scope),
    }

    let output: string
    try {
      const pending = this.tools.execute(call)
      const result = step.timeout_ms !== undefined
        ? await timeout(pending, step.timeout_ms, `timed out after ${step.timeout_ms}ms`)
        : await pending
      if (result.http_status !== undefined) {
        scope.httpStatus = result.http_status
      }
      if (!result.success) {
        throw stepFailed(step.name, result.output)
      }
      output = result.output
    } catch (error) {
      if (isWorkflowError(error)) throw error
      throw stepFailed(step.name, errorMessage(error))
    }

    if (step.output_variable !== undefined) {
      scope.variables[step.output_variable] = output
    }
    return output
  }

  private async branch(step: ConditionalBranchStep, scope: Scope): Promise<JsonValue> {
    const taken = await evaluateCondition(step.condition, scope.variables, this.tools, () => scope.httpStatus)
    const body = taken ? step.then_steps : step.else_steps
    log.debug('workflow', `Branch ${step.name}: ${describeCondition(step.condition)} is ${taken}`)

    const results = await this.runSequence(body, scope)
    return {
      condition: describeCondition(step.condition),
      branch: taken ? 'then' : 'else',
      steps: results.map(resultToJson),
    }
  }

  /** Loop and error-handler bodies run tool calls and assignments only */
  private async runRestricted(steps: WorkflowStep[], scope: Scope, placeholder: string): Promise<JsonValue[]> {
    const outputs: JsonValue[] = []
    for (const step of steps) {
      if (step.type === 'tool_invocation') {
        outputs.push(await this.invokeTool(step, scope))
      } else if (step.type === 'set_variable') {
        scope.variables[step.variable] = structuredClone(step.value)
        outputs.push(`Set ${step.variable}`)
      } else {
        outputs.push(placeholder)
      }
    }
    return outputs
  }

  private async loop(step: LoopStep, scope: Scope): Promise<JsonValue> {
    const limit = Math.min(step.items.length, step.max_iterations ?? DEFAULT_MAX_ITERATIONS)
    const iterations: JsonValue[] = []

    for (const item of step.items.slice(0, limit)) {
      scope.variables[step.iteration_variable] = item
      iterations.push(await this.runRestricted(step.body_steps, scope, 'Step skipped in loop'))
    }

    return iterations
  }

  private async wait(step: WaitStep, scope: Scope): Promise<JsonValue> {
    const started = this.clock()
    const status = () => scope.httpStatus

    while (this.clock() - started < step.timeout_ms && !scope.aborted()) {
      if (step.condition && (await evaluateCondition(step.condition, scope.variables, this.tools, status))) {
        return 'Condition met'
      }
      await this.sleep(WAIT_POLL_MS)
    }

    return 'Timeout reached'
  }

  /**
   * Branches run in batches of `max_concurrency`, each against a private copy
   * of the variables and HTTP status. After a batch succeeds, keys the
   * branches added or changed are merged back in branch order, and so is the
   * status. The first failure stops sibling
   * branches between their steps and fails the step once the batch settles.
   */
  private async parallel(step: ParallelStep, scope: Scope): Promise<JsonValue> {
    const size = step.max_concurrency ?? DEFAULT_MAX_CONCURRENCY
    const records: JsonValue[] = []

    for (let start = 0; start < step.branches.length; start += size) {
      const batch = step.branches.slice(start, start + size)
      const failure: { failed: boolean; error?: unknown } = { failed: false }

      log.debug('workflow', `Parallel ${step.name}: batch of ${batch.length} from branch ${start}`)

      const settled = await Promise.allSettled(
        batch.map(async (steps, offset) => {
          const fork: Scope = {
            variables: structuredClone(scope.variables),
            results: new Map(scope.results),
            policy: scope.policy,
            httpStatus: scope.httpStatus,
            aborted: () => failure.failed || scope.aborted(),
          }
          try {
            const results = await this.runSequence(steps, fork)
            records.push({ branch: start + offset, steps: results.map(resultToJson) })
            return fork
          } catch (error) {
            if (!failure.failed) {
              failure.failed = true
              failure.error = error
            }
            throw error
          }
        }),
      )

      if (failure.failed) {
        throw failure.error
      }

      const base = structuredClone(scope.variables)
      const baseStatus = scope.httpStatus
      for (const outcome of settled) {
        if (outcome.status !== 'fulfilled') continue
        if (outcome.value.httpStatus !== baseStatus) {
          scope.httpStatus = outcome.value.httpStatus
        }
        for (const [key, value] of Object.entries(outcome.value.variables)) {
          const before = lookupVariable(base, key)
          if (before === undefined || !Value.Equal(before, value)) {
            scope.variables[key] = value
          }
        }
      }
    }

    return records
  }

  private async handleError(step: ErrorHandlerStep, scope: Scope): Promise<JsonValue> {
    const pending = lookupVariable(scope.variables, step.error_variable)
    if (pending === undefined || pending === null) {
      return 'No error to handle'
    }

    const attempts = step.retry_count ?? DEFAULT_HANDLER_RETRIES
    let lastError: unknown

    for (let attempt = 1; attempt <= attempts; attempt++) {
      try {
        return await this.runRestricted(step.handler_steps, scope, 'Handler step executed')
      } catch (error) {
        lastError = error
        log.warn('workflow', `Error handler ${step.name} attempt ${attempt}/${attempts} failed: ${errorMessage(error)}`)
      }
    }

    throw lastError ?? stepFailed(step.name, 'All retry attempts failed')
  }
}
