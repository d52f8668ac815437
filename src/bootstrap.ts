import { join } from 'path'
import { BrowserManager } from './browser'
import type { RuntimeConfig } from './config'
import { createDefaultToolExecutor, type ToolExecutor } from './tools'
import { log } from './util/logger'
import type { RetryPolicy } from './workflows'

/**
 * Shared services created during app bootstrap.
 * Each command runner picks what it needs from this bag.
 */
export interface AppServices {
  config: RuntimeConfig
  browser: BrowserManager
  toolExecutor: ToolExecutor
  retry: RetryPolicy
}

export function retryPolicyFrom(config: RuntimeConfig): RetryPolicy {
  return {
    max_attempts: config.workflow.maxAttempts,
    backoff_ms: config.workflow.backoffMs,
    exponential: config.workflow.exponential,
  }
}

/** Checkpoint file for a workflow id under the configured state directory */
export function statePathFor(config: RuntimeConfig, workflowId: string): string {
  return join(config.workflow.stateDir, `${workflowId}.json`)
}

/** The browser is only launched by the first tool or condition that needs a page. */
export function createAppServices(config: RuntimeConfig): AppServices {
  const browser = new BrowserManager({
    headless: config.browser.headless,
    defaultTimeoutMs: config.browser.defaultTimeoutMs,
  })
  const retry = retryPolicyFrom(config)
  const toolExecutor = createDefaultToolExecutor({ browser, retry })

  log.debug('main', `Registered tools: ${toolExecutor.listTools().join(', ')}`)
  return { config, browser, toolExecutor, retry }
}

export async function shutdownServices(services: AppServices): Promise<void> {
  await services.browser.close()
}
