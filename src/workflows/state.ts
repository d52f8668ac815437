import { mkdir, readFile, writeFile } from 'fs/promises'
import { dirname, extname } from 'path'
import { parse as parseYaml, stringify as stringifyYaml } from 'yaml'
import { errorMessage, ioError, serializationError, validationError } from './errors'
import {
  isWorkflowDefinition,
  isWorkflowState,
  schemaErrors,
  WorkflowDefinitionSchema,
  WorkflowStateSchema,
} from './schema'
import type { WorkflowDefinition, WorkflowState } from './types'

export type DefinitionFormat = 'json' | 'yaml'

export function createState(definition: WorkflowDefinition, clock: () => number = Date.now): WorkflowState {
  const now = new Date(clock()).toISOString()
  return {
    workflow_id: definition.id,
    current_step: 0,
    variables: structuredClone(definition.variables),
    step_results: [],
    start_time: now,
    last_update: now,
    status: 'running',
  }
}

/** Step names may repeat; `{{steps.X.output}}` then reads the latest one */
export function validateDefinition(value: unknown): asserts value is WorkflowDefinition {
  if (!isWorkflowDefinition(value)) {
    throw validationError(schemaErrors(WorkflowDefinitionSchema, value).join('; '))
  }
}

function parseText(text: string, format: DefinitionFormat): unknown {
  try {
    return format === 'yaml' ? parseYaml(text) : JSON.parse(text)
  } catch (error) {
    throw serializationError(errorMessage(error), error)
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value)
}

/** `Login Flow!` becomes `login-flow`, so reparsing a file keeps its id */
export function idFromName(name: string): string {
  const slug = name
    .toLowerCase()
    .replace(/[^a-z0-9_]+/g, '-')
    .replace(/^-+|-+$/g, '')
  return slug || 'workflow'
}

/**
 * Hand-written definitions may leave out everything but `name` and `steps`.
 * Missing fields get an id derived from the name, an empty description and
 * variables, three retries and the current time.
 */
function withDefaults(raw: unknown, clock: () => number): unknown {
  if (!isRecord(raw)) return raw
  return {
    ...(typeof raw.name === 'string' ? { id: idFromName(raw.name) } : {}),
    description: '',
    variables: {},
    max_retries: 3,
    created_at: new Date(clock()).toISOString(),
    ...raw,
  }
}

export function parseDefinition(
  text: string,
  format: DefinitionFormat = 'json',
  clock: () => number = Date.now,
): WorkflowDefinition {
  const definition = withDefaults(parseText(text, format), clock)
  validateDefinition(definition)
  return definition
}

export function serializeDefinition(definition: WorkflowDefinition, format: DefinitionFormat = 'json'): string {
  return format === 'yaml' ? stringifyYaml(definition) : JSON.stringify(definition, null, 2)
}

export function serializeState(state: WorkflowState): string {
  return JSON.stringify(state, null, 2)
}

export function deserializeState(text: string): WorkflowState {
  const parsed = parseText(text, 'json')
  if (!isWorkflowState(parsed)) {
    throw serializationError(`invalid workflow state: ${schemaErrors(WorkflowStateSchema, parsed).join('; ')}`)
  }
  return parsed
}

export function formatFor(path: string): DefinitionFormat {
  const ext = extname(path).toLowerCase()
  return ext === '.yaml' || ext === '.yml' ? 'yaml' : 'json'
}

async function readText(path: string): Promise<string> {
  try {
    return await readFile(path, 'utf-8')
  } catch (error) {
    throw ioError(`${path}: ${errorMessage(error)}`, error)
  }
}

async function writeText(path: string, text: string): Promise<void> {
  try {
    await mkdir(dirname(path), { recursive: true })
    await writeFile(path, text, 'utf-8')
  } catch (error) {
    throw ioError(`${path}: ${errorMessage(error)}`, error)
  }
}

export async function saveState(path: string, state: WorkflowState): Promise<void> {
  await writeText(path, serializeState(state))
}

export async function loadState(path: string): Promise<WorkflowState> {
  return deserializeState(await readText(path))
}

export async function saveDefinition(path: string, definition: WorkflowDefinition): Promise<void> {
  await writeText(path, serializeDefinition(definition, formatFor(path)))
}

export async function loadDefinition(path: string): Promise<WorkflowDefinition> {
  return parseDefinition(await readText(path), formatFor(path))
}

export interface ProgressSummary {
  workflow_id: string
  status: WorkflowState['status']
  current_step: number
  total_steps_executed: number
  successful_steps: number
  failed_steps: number
  success_rate: number
  start_time: string
  last_update: string
  duration_seconds: number
  variables_count: number
}

export function progressSummary(state: WorkflowState): ProgressSummary {
  const total = state.step_results.length
  const successful = state.step_results.filter((r) => r.success).length

  return {
    workflow_id: state.workflow_id,
    status: state.status,
    current_step: state.current_step,
    total_steps_executed: total,
    successful_steps: successful,
    failed_steps: total - successful,
    success_rate: total > 0 ? successful / total : 0,
    start_time: state.start_time,
    last_update: state.last_update,
    duration_seconds: Math.floor((Date.parse(state.last_update) - Date.parse(state.start_time)) / 1000),
    variables_count: Object.keys(state.variables).length,
  }
}

export function formatStateReport(name: string, state: WorkflowState): string {
  const summary = progressSummary(state)
  const lines: string[] = [
    `Workflow: ${name} (${state.workflow_id})`,
    `Status: ${state.status}`,
    `Steps: ${summary.successful_steps} succeeded, ${summary.failed_steps} failed`,
  ]

  if (state.error !== undefined) {
    lines.push(`Error: ${state.error}`)
  }
  lines.push('')

  for (const result of state.step_results) {
    const marker = result.success ? '●' : '✗'
    const failure = result.error !== undefined ? `: ${result.error}` : ''
    lines.push(`${marker} ${result.step_name} (${result.execution_time_ms}ms)${failure}`)
  }

  return lines.join('\n').trimEnd()
}

