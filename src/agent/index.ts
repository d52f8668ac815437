export type { AgentEventHandler } from './events'
export { AgentLoop, type AgentLoopDeps, type AgentRunOptions, createAgentLoop } from './loop'
export { finishResult, isFinish, parseAgentStep } from './parser'
export { buildSystemPrompt, DEFAULT_SYSTEM_PROMPT, formatTask } from './prompt'
export { type AgentResponse, type AgentStep, type AgentTask, DEFAULT_MAX_ITERATIONS } from './types'
