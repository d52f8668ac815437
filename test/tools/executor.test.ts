import { describe, expect, test } from 'vitest'
import { createToolExecutor } from '../../src/tools/executor'
import type { PageProbe, Tool, ToolResult } from '../../src/tools/types'

function fakeTool(name: string, run: (params: Record<string, unknown>) => Promise<ToolResult>): Tool {
  return {
    definition: {
      name,
      description: `${name} tool`,
      parameters: { type: 'object', properties: { value: { type: 'string', description: 'Value' } } },
    },
    execute: run,
  }
}

describe('ToolExecutor', () => {
  test('dispatches to the registered tool', async () => {
    const executor = createToolExecutor()
    executor.register(fakeTool('echo', async (params) => ({ success: true, output: String(params.value) })))

    const result = await executor.execute({ id: 'call_1', name: 'echo', arguments: { value: 'hi' } })

    expect(result).toEqual({ success: true, output: 'hi' })
  })

  test('unknown tools fail without throwing', async () => {
    const result = await createToolExecutor().execute({ id: 'c', name: 'missing', arguments: {} })
    expect(result).toEqual({ success: false, output: 'Unknown tool: missing' })
  })

  test('a throwing tool becomes a failed result', async () => {
    const executor = createToolExecutor()
    executor.register(
      fakeTool('broken', async () => {
        throw new Error('disk on fire')
      }),
    )

    const result = await executor.execute({ id: 'c', name: 'broken', arguments: {} })

    expect(result).toEqual({ success: false, output: 'Tool execution error: disk on fire' })
  })

  test('remembers the last reported HTTP status', async () => {
    const executor = createToolExecutor()
    executor.registerAll([
      fakeTool('fetch', async () => ({ success: true, output: 'HTTP 404 Not Found', http_status: 404 })),
      fakeTool('plain', async () => ({ success: true, output: 'ok' })),
    ])

    expect(executor.lastHttpStatus()).toBeUndefined()
    await executor.execute({ id: '1', name: 'fetch', arguments: {} })
    await executor.execute({ id: '2', name: 'plain', arguments: {} })
    expect(executor.lastHttpStatus()).toBe(404)
  })

  test('definitions are copies of the registry', () => {
    const executor = createToolExecutor()
    executor.register(fakeTool('echo', async () => ({ success: true, output: '' })))

    const [definition] = executor.getDefinitions()
    expect(definition?.name).toBe('echo')
    if (definition) definition.parameters['properties'] = {}

    expect(executor.get('echo')?.definition.parameters.properties).toEqual({
      value: { type: 'string', description: 'Value' },
    })
    expect(executor.listTools()).toEqual(['echo'])
  })

  test('exposes the page probe once set', () => {
    const executor = createToolExecutor()
    const probe: PageProbe = {
      elementExists: async () => true,
      evaluate: async () => null,
    }
    expect(executor.getProbe()).toBeUndefined()
    executor.setProbe(probe)
    expect(executor.getProbe()).toBe(probe)
  })
})
