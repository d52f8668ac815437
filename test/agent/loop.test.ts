import { describe, expect, test, vi } from 'vitest'
import { AgentLoop } from '../../src/agent/loop'
import { DEFAULT_SYSTEM_PROMPT } from '../../src/agent/prompt'
import type { ChatRequest, ChatResponse, LLMProvider, ToolCall } from '../../src/providers/types'
import { ProviderError } from '../../src/providers/types'
import type { ToolRunner } from '../../src/tools/types'
import { fakeTools } from '../workflows/helpers'

type Reply = string | Pick<ChatResponse, 'content' | 'tool_calls'> | Error

interface ScriptedProvider extends LLMProvider {
  requests: ChatRequest[]
}

/** Plays the replies in order, repeating the last one */
function scriptedProvider(...replies: Reply[]): ScriptedProvider {
  const requests: ChatRequest[] = []
  return {
    name: 'scripted/test',
    requests,
    async chat(req) {
      requests.push(req)
      const reply = replies[Math.min(requests.length, replies.length) - 1] ?? ''
      if (reply instanceof Error) throw reply
      const { content, tool_calls } = typeof reply === 'string' ? { content: reply, tool_calls: undefined } : reply
      return { content, tool_calls, usage: { input_tokens: 1, output_tokens: 1 }, model: 'test-model' }
    },
    healthCheck: async () => true,
  }
}

const CHECK =
  'THOUGHT: check the endpoint\nACTION: http_request\nACTION INPUT: {"url": "http://localhost:8080/health"}'

describe('AgentLoop', () => {
  test('finishes on the first FINISH', async () => {
    const agent = new AgentLoop({
      provider: scriptedProvider('THOUGHT: nothing to do\nACTION: FINISH\nACTION INPUT: ok'),
      tools: fakeTools(),
    })

    expect(await agent.execute({ goal: 'Say ok' })).toEqual({ success: true, result: 'ok', iterations: 1 })
  })

  test('gives up at max_iterations', async () => {
    const provider = scriptedProvider('THOUGHT: still thinking')
    const agent = new AgentLoop({ provider, tools: fakeTools() })

    expect(await agent.execute({ goal: 'Ponder', max_iterations: 3 })).toEqual({
      success: false,
      result: 'Maximum iterations reached',
      iterations: 3,
      error: 'Max iterations exceeded',
    })
    expect(provider.requests).toHaveLength(3)
  })

  test('dispatches actions and feeds back observations', async () => {
    const provider = scriptedProvider(CHECK, 'THOUGHT: it is up\nACTION: FINISH\nACTION INPUT: {"healthy": true}')
    const tools = fakeTools(() => ({ success: true, output: 'HTTP 200 OK' }))
    const agent = new AgentLoop({ provider, tools })

    const response = await agent.execute({ goal: 'Is it up?', context: 'Local dev server' })

    expect(response).toEqual({ success: true, result: '{"healthy":true}', iterations: 2 })
    expect(tools.calls).toEqual([
      { id: 'agent_1', name: 'http_request', arguments: { url: 'http://localhost:8080/health' } },
    ])
    expect(provider.requests[1]?.messages).toEqual([
      { role: 'system', content: DEFAULT_SYSTEM_PROMPT },
      { role: 'user', content: 'TASK: Is it up?\n\nCONTEXT: Local dev server' },
      { role: 'assistant', content: CHECK },
      { role: 'user', content: 'OBSERVATION: HTTP 200 OK' },
    ])
  })

  test('each request gets its own copy of the conversation', async () => {
    const provider = scriptedProvider('THOUGHT: hmm', 'ACTION: FINISH')
    await new AgentLoop({ provider, tools: fakeTools() }).execute({ goal: 'g' })

    expect(provider.requests[0]?.messages).toHaveLength(2)
    expect(provider.requests[1]?.messages).toHaveLength(3)
  })

  test('tool failures become error observations', async () => {
    const provider = scriptedProvider('THOUGHT: try\nACTION: teleport', 'ACTION: FINISH\nACTION INPUT: gave up')
    const tools = fakeTools(() => ({ success: false, output: 'Unknown tool: teleport' }))

    const response = await new AgentLoop({ provider, tools }).execute({ goal: 'g' })

    expect(response.success).toBe(true)
    expect(provider.requests[1]?.messages[3]).toEqual({ role: 'user', content: 'OBSERVATION: Error: Unknown tool: teleport' })
    expect(tools.calls[0]?.arguments).toEqual({})
  })

  test('a throwing tool runner does not end the run', async () => {
    const provider = scriptedProvider(CHECK, 'ACTION: FINISH')
    const tools: ToolRunner = {
      execute: async () => {
        throw new Error('socket closed')
      },
      getProbe: () => undefined,
      lastHttpStatus: () => undefined,
    }

    const response = await new AgentLoop({ provider, tools }).execute({ goal: 'g' })

    expect(response).toEqual({ success: true, result: 'ACTION: FINISH', iterations: 2 })
    expect(provider.requests[1]?.messages[3]?.content).toBe('OBSERVATION: Error: socket closed')
  })

  test('uses a native tool call when the text names no action', async () => {
    const native: ToolCall = { id: 'call_0', name: 'http_request', arguments: { url: 'http://localhost/' } }
    const provider = scriptedProvider({ content: '', tool_calls: [native] }, 'ACTION: FINISH\nACTION INPUT: done')
    const tools = fakeTools()

    await new AgentLoop({ provider, tools }).execute({ goal: 'g' })

    expect(tools.calls).toEqual([native])
  })

  test('scalar action input is wrapped', async () => {
    const provider = scriptedProvider('ACTION: browser_extract\nACTION INPUT: main', 'ACTION: FINISH')
    const tools = fakeTools()

    await new AgentLoop({ provider, tools }).execute({ goal: 'g' })

    expect(tools.calls[0]?.arguments).toEqual({ input: 'main' })
  })

  test('provider failures end the run', async () => {
    const agent = new AgentLoop({ provider: scriptedProvider(new Error('ECONNREFUSED')), tools: fakeTools() })

    const error = await agent.execute({ goal: 'g' }).catch((e: unknown) => e)

    expect(error).toBeInstanceOf(ProviderError)
    expect(error instanceof ProviderError && error.message).toBe('LLM provider error: ECONNREFUSED')
  })

  test('a cancelled signal stops before calling the model', async () => {
    const provider = scriptedProvider('ACTION: FINISH')
    const controller = new AbortController()
    controller.abort()

    const response = await new AgentLoop({ provider, tools: fakeTools() }).execute(
      { goal: 'g' },
      { signal: controller.signal },
    )

    expect(response).toEqual({ success: false, result: 'Cancelled', iterations: 0, error: 'Cancelled' })
    expect(provider.requests).toEqual([])
  })

  test('sends the catalog and chat settings', async () => {
    const provider = scriptedProvider('ACTION: FINISH')
    const catalog = [{ name: 'http_request', description: 'Send a request', parameters: { type: 'object' } }]

    await new AgentLoop({
      provider,
      tools: fakeTools(),
      catalog,
      systemPrompt: 'Be brief.',
      chat: { temperature: 0.2, max_tokens: 256 },
    }).execute({ goal: 'g' })

    const request = provider.requests[0]
    expect(request?.tools).toEqual(catalog)
    expect(request?.temperature).toBe(0.2)
    expect(request?.max_tokens).toBe(256)
    expect(request?.messages[0]?.content).toBe('Be brief.\n\nAvailable tools:\n- http_request: Send a request')
  })

  test('reports progress through events', async () => {
    const onThought = vi.fn()
    const onAction = vi.fn()
    const onObservation = vi.fn()
    const provider = scriptedProvider(CHECK, 'THOUGHT: done\nACTION: FINISH')

    await new AgentLoop({
      provider,
      tools: fakeTools(() => ({ success: true, output: 'HTTP 200 OK' })),
      events: { onThought, onAction, onObservation },
    }).execute({ goal: 'g' })

    expect(onThought.mock.calls).toEqual([
      ['check the endpoint', 1],
      ['done', 2],
    ])
    expect(onAction).toHaveBeenCalledWith('http_request', { url: 'http://localhost:8080/health' })
    expect(onObservation).toHaveBeenCalledWith('http_request', { success: true, output: 'HTTP 200 OK' })
    expect(provider.requests[0]).not.toHaveProperty('onToken')
  })
})
