import {
  type ChatMessage,
  type ChatOptions,
  type ChatResponse,
  type LLMProvider,
  type ToolCall,
  type ToolDefinition,
  toArgumentRecord,
  toProviderError,
} from '../providers/types'
import type { ToolResult, ToolRunner } from '../tools/types'
import { log } from '../util/logger'
import type { AgentEventHandler } from './events'
import { finishResult, isFinish, parseAgentStep } from './parser'
import { buildSystemPrompt, formatTask } from './prompt'
import { type AgentResponse, type AgentStep, type AgentTask, DEFAULT_MAX_ITERATIONS } from './types'

export interface AgentLoopDeps {
  provider: LLMProvider
  tools: ToolRunner
  /** Tool schemas sent with every chat call and listed in the system prompt */
  catalog?: ToolDefinition[]
  /** Replaces the default ReAct primer */
  systemPrompt?: string
  chat?: ChatOptions
  events?: AgentEventHandler
}

export interface AgentRunOptions {
  /** Checked before every iteration */
  signal?: AbortSignal
}

const CANCELLED = 'Cancelled'

/**
 * Plan, act, observe until the model answers FINISH or the iteration cap.
 * Tool failures go back to the model as observations; a failing provider
 * call ends the run with a ProviderError.
 */
export class AgentLoop {
  private readonly provider: LLMProvider
  private readonly tools: ToolRunner
  private readonly catalog: ToolDefinition[]
  private readonly systemPrompt: string
  private readonly chat: ChatOptions
  private readonly events?: AgentEventHandler

  constructor(deps: AgentLoopDeps) {
    this.provider = deps.provider
    this.tools = deps.tools
    this.catalog = deps.catalog ?? []
    this.systemPrompt = buildSystemPrompt(this.catalog, deps.systemPrompt)
    this.chat = deps.chat ?? {}
    this.events = deps.events
  }

  async execute(task: AgentTask, options: AgentRunOptions = {}): Promise<AgentResponse> {
    const maxIterations = task.max_iterations ?? DEFAULT_MAX_ITERATIONS
    const messages: ChatMessage[] = [
      { role: 'system', content: this.systemPrompt },
      { role: 'user', content: formatTask(task) },
    ]

    log.info('agent', `Starting task: ${task.goal}`)

    for (let iteration = 1; iteration <= maxIterations; iteration++) {
      if (options.signal?.aborted) {
        log.warn('agent', `Task cancelled before iteration ${iteration}`)
        return { success: false, result: CANCELLED, iterations: iteration - 1, error: CANCELLED }
      }

      log.debug('agent', `Iteration ${iteration}/${maxIterations}`)
      const response = await this.complete(messages)
      const step = this.interpret(response)
      this.events?.onThought?.(step.thought, iteration)

      if (!step.action) {
        messages.push({ role: 'assistant', content: response.content })
        continue
      }

      if (isFinish(step.action)) {
        const result = finishResult(step)
        log.info('agent', `Finished after ${iteration} iteration(s)`)
        return { success: true, result, iterations: iteration }
      }

      const call: ToolCall = {
        id: response.tool_calls?.[0]?.id ?? `agent_${iteration}`,
        name: step.action,
        arguments: toArgumentRecord(step.action_input),
      }
      this.events?.onAction?.(call.name, step.action_input)

      const result = await this.dispatch(call)
      this.events?.onObservation?.(call.name, result)

      const observation = result.success ? result.output : `Error: ${result.output}`
      messages.push({ role: 'assistant', content: response.content })
      messages.push({ role: 'user', content: `OBSERVATION: ${observation}` })
    }

    log.warn('agent', `Reached max iterations (${maxIterations})`)
    return {
      success: false,
      result: 'Maximum iterations reached',
      iterations: maxIterations,
      error: 'Max iterations exceeded',
    }
  }

  private async complete(messages: ChatMessage[]): Promise<ChatResponse> {
    try {
      return await this.provider.chat({
        messages: [...messages],
        ...(this.catalog.length > 0 ? { tools: this.catalog } : {}),
        ...(this.chat.temperature !== undefined ? { temperature: this.chat.temperature } : {}),
        ...(this.chat.max_tokens !== undefined ? { max_tokens: this.chat.max_tokens } : {}),
        ...(this.events?.onToken ? { onToken: (token: string) => this.events?.onToken?.(token) } : {}),
      })
    } catch (error) {
      const failure = toProviderError(this.provider.name, error)
      log.error('agent', `Provider ${this.provider.name} failed: ${failure.message}`)
      throw failure
    }
  }

  /** Text protocol first; a native tool call stands in when the text names no action */
  private interpret(response: ChatResponse): AgentStep {
    const step = parseAgentStep(response.content)
    const native = response.tool_calls?.[0]

    if (!step.action && native) {
      return { thought: step.thought, action: native.name, action_input: toJsonInput(native.arguments) }
    }
    return step
  }

  private async dispatch(call: ToolCall): Promise<ToolResult> {
    log.info('agent', `Action: ${call.name}`)
    try {
      return await this.tools.execute(call)
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error)
      return { success: false, output: message }
    }
  }
}

/** Native tool-call arguments as a JSON value */
function toJsonInput(args: Record<string, unknown>): AgentStep['action_input'] {
  const parsed: AgentStep['action_input'] = JSON.parse(JSON.stringify(args))
  return parsed
}

export function createAgentLoop(deps: AgentLoopDeps): AgentLoop {
  return new AgentLoop(deps)
}
