import type { AppServices } from '../bootstrap'
import { createProvider } from '../providers'

const BOLD = '\x1b[1m'
const DIM = '\x1b[2m'
const RESET = '\x1b[0m'

export async function showStatus(services: AppServices): Promise<number> {
  const { config } = services

  console.log(`\n${BOLD}taskloom${RESET} ${DIM}Status${RESET}\n`)

  console.log(`${BOLD}Configuration${RESET}`)
  console.log(`  ${DIM}Provider${RESET}    ${config.provider.type} (${config.provider.model})`)
  if (config.provider.type === 'ollama') {
    console.log(`  ${DIM}Endpoint${RESET}    ${config.provider.endpoint}`)
  }
  console.log(`  ${DIM}Browser${RESET}     ${config.browser.headless ? 'headless' : 'headed'}, ${config.browser.defaultTimeoutMs}ms timeout`)
  console.log(
    `  ${DIM}Retries${RESET}     ${config.workflow.maxAttempts} attempts, ${config.workflow.backoffMs}ms ${config.workflow.exponential ? 'exponential' : 'fixed'} backoff`,
  )
  console.log(`  ${DIM}State dir${RESET}   ${config.workflow.stateDir}`)
  console.log(`  ${DIM}Agent${RESET}       ${config.agent.maxIterations} iterations max`)
  console.log(`  ${DIM}Tools${RESET}       ${services.toolExecutor.listTools().join(', ')}`)

  console.log(`\n${BOLD}Provider Status${RESET}`)
  try {
    const provider = createProvider(config.provider)
    const healthy = await provider.healthCheck()
    console.log(`  ${provider.name}: ${healthy ? 'reachable' : 'unreachable'}`)
    return healthy ? 0 : 1
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    console.log(`  Error - ${message}`)
    return 1
  }
}
