export { type BrowserSession, createBrowserTools, formatSnapshot, htmlToText, httpRequestTool } from './builtin'
export { createToolExecutor, ToolExecutor } from './executor'
export * from './types'

import type { BrowserManager } from '../browser'
import { builtinWorkflows, createWorkflowTool, type RetryPolicy } from '../workflows'
import { createBrowserTools, httpRequestTool } from './builtin'
import { createToolExecutor, type ToolExecutor } from './executor'

export interface DefaultToolOptions {
  /** Registers the browser tools and makes the page the condition probe */
  browser?: BrowserManager
  /** Retry policy for workflows started through run_workflow */
  retry?: RetryPolicy
}

export function createDefaultToolExecutor(options: DefaultToolOptions = {}): ToolExecutor {
  const executor = createToolExecutor()

  executor.register(httpRequestTool)

  if (options.browser) {
    executor.registerAll(createBrowserTools(options.browser))
    executor.setProbe(options.browser)
  }

  // Last: run_workflow dispatches to the tools registered above
  executor.register(createWorkflowTool(executor, builtinWorkflows, { retry: options.retry }))

  return executor
}
