import { describe, expect, test } from 'vitest'
import { steps, WorkflowBuilder } from '../../src/workflows/builder'
import { builtinWorkflows } from '../../src/workflows/builtin'
import { validateDefinition } from '../../src/workflows/state'

describe('steps', () => {
  test('tool steps carry optional timeout and output variable', () => {
    expect(steps.tool('fetch', 'http_request', { url: 'http://localhost' }, { timeoutMs: 500, outputVariable: 'body' })).toEqual({
      type: 'tool_invocation',
      name: 'fetch',
      call: { name: 'http_request', arguments: { url: 'http://localhost' } },
      timeout_ms: 500,
      output_variable: 'body',
    })
    expect(Object.keys(steps.tool('snap', 'browser_snapshot'))).toEqual(['type', 'name', 'call'])
  })

  test('conditional branch defaults to an empty else', () => {
    expect(steps.conditionalBranch('b', { type: 'exists', variable: 'x' }, [])).toEqual({
      type: 'conditional_branch',
      name: 'b',
      condition: { type: 'exists', variable: 'x' },
      then_steps: [],
      else_steps: [],
    })
  })

  test('optional limits are omitted unless given', () => {
    expect(steps.loop('l', 'i', [1], [])).not.toHaveProperty('max_iterations')
    expect(steps.parallel('p', [[]], 3)).toHaveProperty('max_concurrency', 3)
    expect(steps.errorHandler('h', 'err', [])).not.toHaveProperty('retry_count')
    expect(steps.wait('w', 100)).not.toHaveProperty('condition')
  })
})

describe('WorkflowBuilder', () => {
  test('builds a definition with generated id and timestamp', () => {
    const definition = new WorkflowBuilder('nightly', () => 1000)
      .description('Nightly checks')
      .variable('url', 'http://localhost:8080')
      .timeoutMs(60000)
      .setVariable('init', 'count', 0)
      .wait('settle', 250)
      .build()

    expect(definition).toEqual({
      id: 'workflow_1000',
      name: 'nightly',
      description: 'Nightly checks',
      steps: [
        { type: 'set_variable', name: 'init', variable: 'count', value: 0 },
        { type: 'wait', name: 'settle', timeout_ms: 250 },
      ],
      variables: { url: 'http://localhost:8080' },
      timeout_ms: 60000,
      max_retries: 3,
      created_at: '1970-01-01T00:00:01.000Z',
    })
  })

  test('each build is an independent copy', () => {
    const builder = new WorkflowBuilder('copy', () => 0).id('copy').variable('list', [1])
    const first = builder.build()
    first.variables.list = [2]

    expect(builder.build().variables).toEqual({ list: [1] })
  })

  test('built definitions validate', () => {
    const definition = new WorkflowBuilder('full', () => 0)
      .maxRetries(2)
      .toolCall('fetch', 'http_request', { url: 'http://localhost' })
      .conditionalBranch('check', { type: 'http_status', expected: 200 }, [steps.setVariable('ok', 'ok', true)])
      .loop('each', 'item', ['a'], [steps.tool('use', 'http_request', { q: '{{item}}' })], 1)
      .parallel('fan', [[steps.setVariable('p1', 'a', 1)], [steps.setVariable('p2', 'b', 2)]], 2)
      .errorHandler('recover', 'err', [steps.setVariable('h', 'handled', true)], 1)
      .build()

    expect(() => validateDefinition(definition)).not.toThrow()
  })
})

describe('built-in workflows', () => {
  test('are valid and stable', () => {
    for (const definition of builtinWorkflows) {
      expect(() => validateDefinition(definition)).not.toThrow()
      expect(definition.created_at).toBe('2025-01-01T00:00:00.000Z')
    }
    expect(builtinWorkflows.map((w) => w.id)).toEqual(['page-snapshot', 'endpoint-check'])
  })
})
