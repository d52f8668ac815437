import { steps, WorkflowBuilder } from './builder'
import type { WorkflowDefinition } from './types'

/** Fixed ids and timestamps keep built-in definitions identical across processes */
const BUILTIN_EPOCH = Date.parse('2025-01-01T00:00:00.000Z')

export const pageSnapshotWorkflow: WorkflowDefinition = new WorkflowBuilder('page-snapshot', () => BUILTIN_EPOCH)
  .id('page-snapshot')
  .description('Open a page in the browser, wait for it to render and capture a text snapshot.')
  .variable('url', 'https://example.com')
  .toolCall('navigate', 'browser_navigate', { url: '{{url}}' }, { outputVariable: 'page' })
  .wait('await_body', 5000, { type: 'element_exists', selector: 'body' })
  .toolCall('snapshot', 'browser_snapshot', {}, { outputVariable: 'snapshot' })
  .build()

export const endpointCheckWorkflow: WorkflowDefinition = new WorkflowBuilder('endpoint-check', () => BUILTIN_EPOCH)
  .id('endpoint-check')
  .description('Request a URL and record in `healthy` whether it answered 200.')
  .variable('url', 'https://example.com/health')
  .toolCall('request', 'http_request', { url: '{{url}}', method: 'GET' }, { outputVariable: 'response' })
  .conditionalBranch(
    'check_status',
    { type: 'http_status', expected: 200 },
    [steps.setVariable('mark_healthy', 'healthy', true)],
    [steps.setVariable('mark_unhealthy', 'healthy', false)],
  )
  .build()

export const builtinWorkflows: WorkflowDefinition[] = [pageSnapshotWorkflow, endpointCheckWorkflow]
