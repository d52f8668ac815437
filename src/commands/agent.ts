import { type AgentEventHandler, createAgentLoop } from '../agent'
import type { AppServices } from '../bootstrap'
import { createProvider } from '../providers'
import { flagValue, positionals } from '../util/args'

const DIM = '\x1b[2m'
const RESET = '\x1b[0m'

/** Progress goes to stderr so stdout carries only the answer */
function progressPrinter(): AgentEventHandler {
  return {
    onThought(thought, iteration) {
      process.stderr.write(`${DIM}[${iteration}] ${thought}${RESET}\n`)
    },
    onAction(action, input) {
      process.stderr.write(`${DIM}  -> ${action} ${input === undefined ? '' : JSON.stringify(input)}${RESET}\n`)
    },
    onObservation(_action, result) {
      const preview = result.output.split('\n')[0] ?? ''
      process.stderr.write(`${DIM}  <- ${result.success ? 'ok' : 'error'}: ${preview.slice(0, 120)}${RESET}\n`)
    },
  }
}

export function parseMaxIterations(value: string | undefined, fallback: number): number {
  if (value === undefined) return fallback
  const parsed = Number(value)
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new Error(`--max-iterations must be a positive integer, got "${value}"`)
  }
  return parsed
}

export async function runAgentCommand(services: AppServices, args: string[]): Promise<number> {
  const goal = positionals(args).join(' ')
  if (!goal) {
    console.error('Usage: taskloom agent <goal> [--context <text>] [--max-iterations <n>]')
    return 1
  }

  const { config, toolExecutor } = services
  const agent = createAgentLoop({
    provider: createProvider(config.provider),
    tools: toolExecutor,
    catalog: toolExecutor.getDefinitions(),
    systemPrompt: config.agent.systemPrompt,
    chat: { temperature: config.provider.temperature, max_tokens: config.provider.maxTokens },
    events: progressPrinter(),
  })

  const context = flagValue(args, '--context')
  const response = await agent.execute({
    goal,
    ...(context !== undefined ? { context } : {}),
    max_iterations: parseMaxIterations(flagValue(args, '--max-iterations'), config.agent.maxIterations),
  })

  console.log(response.result)
  if (!response.success) {
    console.error(`Agent stopped after ${response.iterations} iteration(s): ${response.error ?? 'unknown error'}`)
    return 1
  }
  return 0
}
