import type { AppServices } from '../bootstrap'
import { positionals } from '../util/args'
import { formatStateReport, loadState, saveState, WorkflowExecutor } from '../workflows'
import { checkpointTo, resolveDefinition } from './run'

export async function resumeWorkflowCommand(services: AppServices, args: string[]): Promise<number> {
  const [ref, statePath] = positionals(args)
  if (!ref || !statePath) {
    console.error('Usage: taskloom resume <definition> <state-file>')
    return 1
  }

  const definition = await resolveDefinition(ref)
  const saved = await loadState(statePath)
  const executor = new WorkflowExecutor({ tools: services.toolExecutor, retry: services.retry })

  const state = await executor.resume(definition, saved, { onStepComplete: checkpointTo(statePath) })
  await saveState(statePath, state)

  console.log(formatStateReport(definition.name, state))
  return state.status === 'completed' ? 0 : 1
}
