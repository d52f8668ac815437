import type { ToolCall } from '../providers/types'

export type { ToolCall, ToolDefinition } from '../providers/types'

export interface ToolParameters {
  type: 'object'
  properties: Record<string, {
    type: string
    description: string
    enum?: string[]
    items?: object
    default?: unknown
  }>
  required?: string[]
}

export interface ToolResult {
  success: boolean
  output: string
  /** Status code of the HTTP response this tool produced, if any */
  http_status?: number
}

export interface Tool {
  definition: {
    name: string
    description: string
    parameters: ToolParameters
  }
  execute(params: Record<string, unknown>): Promise<ToolResult>
}

/**
 * Read-only view of the page the tools act on.
 * Backs the element_exists and javascript workflow conditions.
 */
export interface PageProbe {
  elementExists(selector: string): Promise<boolean>
  evaluate(expression: string): Promise<unknown>
}

/**
 * The tool surface consumed by the workflow engine and the agent loop.
 * `execute` never throws for a failing tool; failures are `success: false`.
 */
export interface ToolRunner {
  execute(call: ToolCall): Promise<ToolResult>
  getProbe(): PageProbe | undefined
  lastHttpStatus(): number | undefined
}

/** String parameter or undefined; tools report missing ones as failed results. */
export function stringParam(params: Record<string, unknown>, key: string): string | undefined {
  const value = params[key]
  return typeof value === 'string' ? value : undefined
}

export function numberParam(params: Record<string, unknown>, key: string): number | undefined {
  const value = params[key]
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined
}
