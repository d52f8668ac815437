import type { JsonValue } from '../workflows/types'
import type { AgentStep } from './types'

const THOUGHT = 'THOUGHT:'
const ACTION = 'ACTION:'
const ACTION_INPUT = 'ACTION INPUT:'

function parseInput(raw: string): JsonValue {
  try {
    const parsed: JsonValue = JSON.parse(raw)
    return parsed
  } catch {
    return raw
  }
}

/**
 * Read a reply written as `THOUGHT:` / `ACTION:` / `ACTION INPUT:` lines.
 * Prefixes are case-sensitive and the first line carrying each one wins.
 * A reply without a thought is the thought.
 */
export function parseAgentStep(content: string): AgentStep {
  let thought: string | undefined
  let action: string | undefined
  let input: string | undefined

  for (const rawLine of content.split('\n')) {
    const line = rawLine.trim()

    if (thought === undefined && line.startsWith(THOUGHT)) {
      thought = line.slice(THOUGHT.length).trim()
    } else if (action === undefined && line.startsWith(ACTION)) {
      action = line.slice(ACTION.length).trim()
    } else if (input === undefined && line.startsWith(ACTION_INPUT)) {
      input = line.slice(ACTION_INPUT.length).trim()
    }
  }

  const step: AgentStep = { thought: thought || content }
  if (action) {
    step.action = action
  }
  if (input !== undefined) {
    step.action_input = parseInput(input)
  }
  return step
}

export function isFinish(action: string): boolean {
  return action.toUpperCase() === 'FINISH'
}

/** The final answer: string input as-is, other input as JSON, else the thought */
export function finishResult(step: AgentStep): string {
  if (step.action_input === undefined) return step.thought
  return typeof step.action_input === 'string' ? step.action_input : JSON.stringify(step.action_input)
}
