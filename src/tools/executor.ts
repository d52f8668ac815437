import type { ToolCall, ToolDefinition } from '../providers/types'
import { log } from '../util/logger'
import type { PageProbe, Tool, ToolResult, ToolRunner } from './types'

export class ToolExecutor implements ToolRunner {
  private tools: Map<string, Tool> = new Map()
  private probe?: PageProbe
  private httpStatus?: number

  register(tool: Tool): void {
    this.tools.set(tool.definition.name, tool)
    log.debug('tools', `Registered tool: ${tool.definition.name}`)
  }

  registerAll(tools: Tool[]): void {
    for (const tool of tools) {
      this.register(tool)
    }
  }

  setProbe(probe: PageProbe): void {
    this.probe = probe
  }

  getProbe(): PageProbe | undefined {
    return this.probe
  }

  lastHttpStatus(): number | undefined {
    return this.httpStatus
  }

  get(name: string): Tool | undefined {
    return this.tools.get(name)
  }

  /** The tool catalog. Callers get copies, so the registry cannot be mutated through it. */
  getDefinitions(): ToolDefinition[] {
    return Array.from(this.tools.values()).map((t) => ({
      name: t.definition.name,
      description: t.definition.description,
      parameters: structuredClone({ ...t.definition.parameters }),
    }))
  }

  async execute(call: ToolCall): Promise<ToolResult> {
    const tool = this.tools.get(call.name)

    if (!tool) {
      return {
        success: false,
        output: `Unknown tool: ${call.name}`,
      }
    }

    log.debug('tools', `Executing tool: ${call.name}`, call.arguments)

    try {
      const result = await tool.execute(call.arguments)
      log.debug('tools', `Tool ${call.name} completed:`, {
        success: result.success,
        outputLength: result.output.length,
      })

      if (result.http_status !== undefined) {
        this.httpStatus = result.http_status
      }
      return result
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error)
      log.error('tools', `Tool ${call.name} failed:`, error)

      return {
        success: false,
        output: `Tool execution error: ${message}`,
      }
    }
  }

  listTools(): string[] {
    return Array.from(this.tools.keys())
  }
}

export function createToolExecutor(): ToolExecutor {
  return new ToolExecutor()
}
