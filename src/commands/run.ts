import type { AppServices } from '../bootstrap'
import { statePathFor } from '../bootstrap'
import { flagValue, positionals } from '../util/args'
import { log } from '../util/logger'
import {
  builtinWorkflows,
  formatStateReport,
  loadDefinition,
  saveState,
  type StepCompleteHandler,
  type WorkflowDefinition,
  WorkflowExecutor,
} from '../workflows'

/** A built-in workflow by name, otherwise a JSON or YAML definition file */
export async function resolveDefinition(ref: string): Promise<WorkflowDefinition> {
  const builtin = builtinWorkflows.find((w) => w.name === ref)
  return builtin ?? loadDefinition(ref)
}

export function checkpointTo(path: string): StepCompleteHandler {
  return async (state) => {
    await saveState(path, state)
    log.debug('workflow', `Checkpoint written to ${path}`)
  }
}

export async function runWorkflowCommand(services: AppServices, args: string[]): Promise<number> {
  const [ref] = positionals(args)
  if (!ref) {
    console.error('Usage: taskloom run <definition> [--state <file>]')
    return 1
  }

  const definition = await resolveDefinition(ref)
  const statePath = flagValue(args, '--state') ?? statePathFor(services.config, definition.id)
  const executor = new WorkflowExecutor({ tools: services.toolExecutor, retry: services.retry })

  const state = await executor.execute(definition, { onStepComplete: checkpointTo(statePath) })
  await saveState(statePath, state)

  console.log(formatStateReport(definition.name, state))
  console.log(`\nState: ${statePath}`)
  return state.status === 'completed' ? 0 : 1
}
