import type { ToolCall } from '../../src/providers/types'
import type { PageProbe, ToolResult, ToolRunner } from '../../src/tools/types'
import { WorkflowBuilder } from '../../src/workflows/builder'
import type { RetryPolicy, WorkflowDefinition, WorkflowStep } from '../../src/workflows/types'

export const SINGLE_ATTEMPT: RetryPolicy = { max_attempts: 1, backoff_ms: 0, exponential: false }

export interface FakeTools extends ToolRunner {
  calls: ToolCall[]
}

export function fakeTools(
  handler: (call: ToolCall) => ToolResult | Promise<ToolResult> = () => ({ success: true, output: 'ok' }),
  probe?: PageProbe,
): FakeTools {
  const calls: ToolCall[] = []
  let status: number | undefined

  return {
    calls,
    async execute(call) {
      calls.push(call)
      const result = await handler(call)
      if (result.http_status !== undefined) status = result.http_status
      return result
    },
    getProbe: () => probe,
    lastHttpStatus: () => status,
  }
}

/** Time that only moves when the engine sleeps */
export class FakeTime {
  now = 0
  readonly sleeps: number[] = []

  readonly clock = (): number => this.now

  readonly sleep = async (ms: number): Promise<void> => {
    this.sleeps.push(ms)
    this.now += ms
  }
}

export function define(
  stepList: WorkflowStep[],
  configure: (builder: WorkflowBuilder) => WorkflowBuilder = (b) => b,
): WorkflowDefinition {
  const builder = new WorkflowBuilder('demo', () => 0).id('demo')
  for (const step of stepList) builder.step(step)
  return configure(builder).build()
}
