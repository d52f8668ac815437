import type {
  Condition,
  ConditionalBranchStep,
  ErrorHandlerStep,
  JsonValue,
  LoopStep,
  ParallelStep,
  SetVariableStep,
  ToolInvocationStep,
  Variables,
  WaitStep,
  WorkflowDefinition,
  WorkflowStep,
} from './types'

/** Step constructors, for bodies of branches, loops and handlers */
export const steps = {
  tool(
    name: string,
    tool: string,
    args: Record<string, JsonValue> = {},
    options: { timeoutMs?: number; outputVariable?: string } = {},
  ): ToolInvocationStep {
    return {
      type: 'tool_invocation',
      name,
      call: { name: tool, arguments: args },
      ...(options.timeoutMs !== undefined ? { timeout_ms: options.timeoutMs } : {}),
      ...(options.outputVariable !== undefined ? { output_variable: options.outputVariable } : {}),
    }
  },

  setVariable(name: string, variable: string, value: JsonValue): SetVariableStep {
    return { type: 'set_variable', name, variable, value }
  },

  wait(name: string, timeoutMs: number, condition?: Condition): WaitStep {
    return condition
      ? { type: 'wait', name, timeout_ms: timeoutMs, condition }
      : { type: 'wait', name, timeout_ms: timeoutMs }
  },

  conditionalBranch(
    name: string,
    condition: Condition,
    thenSteps: WorkflowStep[],
    elseSteps: WorkflowStep[] = [],
  ): ConditionalBranchStep {
    return { type: 'conditional_branch', name, condition, then_steps: thenSteps, else_steps: elseSteps }
  },

  loop(
    name: string,
    iterationVariable: string,
    items: JsonValue[],
    bodySteps: WorkflowStep[],
    maxIterations?: number,
  ): LoopStep {
    return {
      type: 'loop',
      name,
      iteration_variable: iterationVariable,
      items,
      body_steps: bodySteps,
      ...(maxIterations !== undefined ? { max_iterations: maxIterations } : {}),
    }
  },

  parallel(name: string, branches: WorkflowStep[][], maxConcurrency?: number): ParallelStep {
    return {
      type: 'parallel',
      name,
      branches,
      ...(maxConcurrency !== undefined ? { max_concurrency: maxConcurrency } : {}),
    }
  },

  errorHandler(
    name: string,
    errorVariable: string,
    handlerSteps: WorkflowStep[],
    retryCount?: number,
  ): ErrorHandlerStep {
    return {
      type: 'error_handler',
      name,
      error_variable: errorVariable,
      handler_steps: handlerSteps,
      ...(retryCount !== undefined ? { retry_count: retryCount } : {}),
    }
  },
}

export class WorkflowBuilder {
  private workflowId?: string
  private text = ''
  private readonly stepList: WorkflowStep[] = []
  private readonly bindings: Variables = {}
  private timeout?: number
  private retries = 3

  constructor(
    private readonly name: string,
    private readonly clock: () => number = Date.now,
  ) {}

  id(id: string): this {
    this.workflowId = id
    return this
  }

  description(text: string): this {
    this.text = text
    return this
  }

  variable(key: string, value: JsonValue): this {
    this.bindings[key] = value
    return this
  }

  timeoutMs(ms: number): this {
    this.timeout = ms
    return this
  }

  maxRetries(count: number): this {
    this.retries = count
    return this
  }

  step(step: WorkflowStep): this {
    this.stepList.push(step)
    return this
  }

  toolCall(...args: Parameters<typeof steps.tool>): this {
    return this.step(steps.tool(...args))
  }

  setVariable(...args: Parameters<typeof steps.setVariable>): this {
    return this.step(steps.setVariable(...args))
  }

  wait(...args: Parameters<typeof steps.wait>): this {
    return this.step(steps.wait(...args))
  }

  conditionalBranch(...args: Parameters<typeof steps.conditionalBranch>): this {
    return this.step(steps.conditionalBranch(...args))
  }

  loop(...args: Parameters<typeof steps.loop>): this {
    return this.step(steps.loop(...args))
  }

  parallel(...args: Parameters<typeof steps.parallel>): this {
    return this.step(steps.parallel(...args))
  }

  errorHandler(...args: Parameters<typeof steps.errorHandler>): this {
    return this.step(steps.errorHandler(...args))
  }

  build(): WorkflowDefinition {
    const now = this.clock()
    return {
      id: this.workflowId ?? `workflow_${now}`,
      name: this.name,
      description: this.text,
      steps: structuredClone(this.stepList),
      variables: structuredClone(this.bindings),
      ...(this.timeout !== undefined ? { timeout_ms: this.timeout } : {}),
      max_retries: this.retries,
      created_at: new Date(now).toISOString(),
    }
  }
}

export function workflow(name: string): WorkflowBuilder {
  return new WorkflowBuilder(name)
}
