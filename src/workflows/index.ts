export * from './types'
export * from './errors'
export {
  ConditionSchema,
  isCondition,
  isWorkflowDefinition,
  isWorkflowState,
  isWorkflowStep,
  schemaErrors,
  WorkflowDefinitionSchema,
  WorkflowStateSchema,
  WorkflowStepSchema,
} from './schema'
export { describeCondition, evaluateCondition, lookupVariable } from './conditions'
export { type InterpolationContext, interpolate, interpolateRecord, resolveReference } from './interpolate'
export {
  createState,
  type DefinitionFormat,
  deserializeState,
  formatFor,
  formatStateReport,
  loadDefinition,
  loadState,
  parseDefinition,
  type ProgressSummary,
  progressSummary,
  saveDefinition,
  saveState,
  serializeDefinition,
  serializeState,
  validateDefinition,
} from './state'
export { steps, workflow, WorkflowBuilder } from './builder'
export {
  type ExecutorOptions,
  resultToJson,
  type RunOptions,
  type StepCompleteHandler,
  WorkflowExecutor,
} from './engine'
export { builtinWorkflows, endpointCheckWorkflow, pageSnapshotWorkflow } from './builtin'
export { createWorkflowTool, type WorkflowToolOptions } from './tool'
