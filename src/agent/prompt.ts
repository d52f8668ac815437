import type { ToolDefinition } from '../providers/types'
import type { AgentTask } from './types'

export const DEFAULT_SYSTEM_PROMPT = `You are an autonomous agent that completes tasks by using tools.

Work in a loop:
1. THOUGHT: reason about the current situation and decide what to do next
2. ACTION: the tool to use, or FINISH when the task is complete
3. ACTION INPUT: the tool arguments as a JSON object, or your final answer
4. OBSERVATION: the tool result, which you will receive in the next message

Always answer in exactly this format:

THOUGHT: <your reasoning>
ACTION: <tool name or FINISH>
ACTION INPUT: <JSON arguments or final answer>

When you have completed the task, use ACTION: FINISH with your final answer in ACTION INPUT.`

/** Base prompt followed by a one-line entry per tool */
export function buildSystemPrompt(catalog: ToolDefinition[] = [], base: string = DEFAULT_SYSTEM_PROMPT): string {
  if (catalog.length === 0) return base
  const tools = catalog.map((t) => `- ${t.name}: ${t.description}`).join('\n')
  return `${base}\n\nAvailable tools:\n${tools}`
}

export function formatTask(task: AgentTask): string {
  return task.context !== undefined ? `TASK: ${task.goal}\n\nCONTEXT: ${task.context}` : `TASK: ${task.goal}`
}
