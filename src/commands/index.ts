export { parseMaxIterations, runAgentCommand } from './agent'
export { resumeWorkflowCommand } from './resume'
export { checkpointTo, resolveDefinition, runWorkflowCommand } from './run'
export { showStatus } from './status'
export { formatCatalog, listToolsCommand } from './tools'
