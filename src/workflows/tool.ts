import { Type } from '@sinclair/typebox'
import { Value } from '@sinclair/typebox/value'
import type { Tool, ToolResult, ToolRunner } from '../tools/types'
import { WorkflowBuilder } from './builder'
import { WorkflowExecutor } from './engine'
import { errorMessage } from './errors'
import { isWorkflowStep, schemaErrors, WorkflowStepSchema } from './schema'
import { formatStateReport } from './state'
import type { RetryPolicy, Variables, WorkflowDefinition, WorkflowStep } from './types'

const VariablesSchema = Type.Record(Type.String(), Type.Unknown())

function isVariables(value: unknown): value is Variables {
  return Value.Check(VariablesSchema, value)
}

export interface WorkflowToolOptions {
  retry?: RetryPolicy
}

/**
 * The run_workflow tool: list the known workflows, or run one by name
 * (with variable overrides) or from inline steps.
 */
export function createWorkflowTool(
  runner: ToolRunner,
  workflows: WorkflowDefinition[],
  options: WorkflowToolOptions = {},
): Tool {
  const byName = new Map(workflows.map((w) => [w.name, w]))
  const executor = new WorkflowExecutor({ tools: runner, retry: options.retry })

  return {
    definition: {
      name: 'run_workflow',
      description:
        'Run a multi-step workflow of tool calls. Use action "list" to see the available workflows, ' +
        'or "run" with a workflow name or inline steps. ' +
        `Available: ${workflows.map((w) => w.name).join(', ') || 'none'}. ` +
        'Tool arguments can reference {{variable}} and {{steps.<name>.output}}.',
      parameters: {
        type: 'object',
        properties: {
          action: { type: 'string', enum: ['list', 'run'], description: '"list" or "run"' },
          workflow: { type: 'string', description: 'Name of a known workflow to run' },
          variables: { type: 'object', description: 'Variables overriding the workflow defaults' },
          steps: {
            type: 'array',
            description: 'Inline steps, instead of a named workflow',
            items: { type: 'object' },
          },
        },
        required: ['action'],
      },
    },

    async execute(params: Record<string, unknown>): Promise<ToolResult> {
      const action = params.action

      if (action === 'list') {
        return listWorkflows(workflows)
      }
      if (action !== 'run') {
        return { success: false, output: `Unknown action: ${String(action)}. Use "list" or "run".` }
      }

      const overrides = params.variables ?? {}
      if (!isVariables(overrides)) {
        return { success: false, output: '"variables" must be an object' }
      }

      let definition: WorkflowDefinition
      if (typeof params.workflow === 'string') {
        const found = byName.get(params.workflow)
        if (!found) {
          return {
            success: false,
            output: `Unknown workflow: "${params.workflow}". Available: ${Array.from(byName.keys()).join(', ')}`,
          }
        }
        definition = { ...found, variables: { ...found.variables, ...overrides } }
      } else if (Array.isArray(params.steps) && params.steps.length > 0) {
        const inline = inlineWorkflow(params.steps, overrides)
        if (typeof inline === 'string') {
          return { success: false, output: inline }
        }
        definition = inline
      } else {
        return { success: false, output: 'Provide "workflow" (a workflow name) or "steps" (inline steps) to run.' }
      }

      try {
        const state = await executor.execute(definition)
        return {
          success: state.status === 'completed',
          output: formatStateReport(definition.name, state),
        }
      } catch (error) {
        return { success: false, output: errorMessage(error) }
      }
    },
  }
}

function inlineWorkflow(items: unknown[], variables: Variables): WorkflowDefinition | string {
  const builder = new WorkflowBuilder('inline').description('Inline workflow')

  for (const [index, item] of items.entries()) {
    if (!isWorkflowStep(item)) {
      return `Invalid step ${index}: ${schemaErrors(WorkflowStepSchema, item, 3).join('; ')}`
    }
    builder.step(item)
  }
  for (const [key, value] of Object.entries(variables)) {
    builder.variable(key, value)
  }

  return builder.build()
}

function describeStep(step: WorkflowStep): string {
  return step.type === 'tool_invocation' ? `${step.name} (${step.call.name})` : `${step.name} (${step.type})`
}

function listWorkflows(workflows: WorkflowDefinition[]): ToolResult {
  if (workflows.length === 0) {
    return { success: true, output: 'No workflows available.' }
  }

  const lines: string[] = ['Available workflows:', '']
  for (const wf of workflows) {
    lines.push(`${wf.name}: ${wf.description}`)
    const vars = Object.entries(wf.variables).map(([key, value]) => `${key}=${JSON.stringify(value)}`)
    if (vars.length > 0) {
      lines.push(`  Variables: ${vars.join(', ')}`)
    }
    lines.push(`  Steps: ${wf.steps.map(describeStep).join(' -> ')}`)
    lines.push('')
  }

  return { success: true, output: lines.join('\n').trimEnd() }
}
