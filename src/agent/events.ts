import type { ToolResult } from '../tools/types'
import type { JsonValue } from '../workflows/types'

/**
 * Hooks for following a run as it happens. The CLI prints them;
 * tests record them.
 */
export interface AgentEventHandler {
  /** Parsed thought of each model turn */
  onThought?(thought: string, iteration: number): void
  /** A tool is about to be dispatched */
  onAction?(action: string, input: JsonValue | undefined): void
  /** Tool result as it will be shown to the model */
  onObservation?(action: string, result: ToolResult): void
  /** Streamed response tokens, where the provider streams */
  onToken?(token: string): void
}
