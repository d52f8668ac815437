import type { ChatRequest, ChatResponse, LLMProvider, ToolCall } from '../types'
import { toArgumentRecord, toProviderError } from '../types'

interface OllamaMessage {
  role: 'system' | 'user' | 'assistant'
  content: string
}

interface OllamaToolCall {
  function: {
    name: string
    arguments: Record<string, unknown>
  }
}

interface OllamaTool {
  type: 'function'
  function: {
    name: string
    description: string
    parameters: Record<string, unknown>
  }
}

interface OllamaChatRequest {
  model: string
  messages: OllamaMessage[]
  tools?: OllamaTool[]
  stream: boolean
  options?: {
    temperature?: number
    num_predict?: number
  }
}

interface OllamaChatResponse {
  model: string
  message?: {
    role: 'assistant'
    content: string
    tool_calls?: OllamaToolCall[]
  }
  done: boolean
  eval_count?: number
  prompt_eval_count?: number
}

export class OllamaProvider implements LLMProvider {
  readonly name: string
  private endpoint: string
  private model: string

  constructor(endpoint: string, model: string) {
    this.endpoint = endpoint.replace(/\/$/, '')
    this.model = model
    this.name = `ollama/${model}`
  }

  async chat(request: ChatRequest): Promise<ChatResponse> {
    const streaming = request.onToken !== undefined
    const ollamaRequest: OllamaChatRequest = {
      model: this.model,
      messages: request.messages.map(m => ({ role: m.role, content: m.content })),
      stream: streaming,
      options: {
        temperature: request.temperature,
        num_predict: request.max_tokens,
      },
    }

    if (request.tools && request.tools.length > 0) {
      ollamaRequest.tools = request.tools.map(t => ({
        type: 'function',
        function: {
          name: t.name,
          description: t.description,
          parameters: t.parameters,
        },
      }))
    }

    try {
      const response = await fetch(`${this.endpoint}/api/chat`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(ollamaRequest),
      })

      if (!response.ok) {
        const error = await response.text()
        throw new Error(`Ollama error: ${response.status} - ${error}`)
      }

      if (request.onToken) {
        return await this.readStream(response, request.onToken)
      }

      const data = (await response.json()) as OllamaChatResponse
      return {
        content: data.message?.content ?? '',
        tool_calls: toToolCalls(data.message?.tool_calls),
        usage: {
          input_tokens: data.prompt_eval_count ?? 0,
          output_tokens: data.eval_count ?? 0,
        },
        model: data.model,
      }
    } catch (error) {
      throw toProviderError(this.name, error)
    }
  }

  async healthCheck(): Promise<boolean> {
    try {
      const response = await fetch(`${this.endpoint}/api/tags`)
      return response.ok
    } catch (error) {
      throw toProviderError(this.name, error)
    }
  }

  /** Ollama streams one JSON object per line until a chunk with `done: true`. */
  private async readStream(response: Response, onToken: (token: string) => void): Promise<ChatResponse> {
    const reader = response.body?.getReader()
    if (!reader) throw new Error('No response body')

    const decoder = new TextDecoder()
    let buffer = ''
    let content = ''
    let model = this.model
    const toolCalls: OllamaToolCall[] = []
    const usage = { input_tokens: 0, output_tokens: 0 }

    const consume = (line: string): void => {
      if (!line.trim()) return
      const data = JSON.parse(line) as OllamaChatResponse
      model = data.model ?? model

      if (data.message?.content) {
        content += data.message.content
        onToken(data.message.content)
      }

      if (data.message?.tool_calls) {
        toolCalls.push(...data.message.tool_calls)
      }

      if (data.done) {
        usage.input_tokens = data.prompt_eval_count ?? 0
        usage.output_tokens = data.eval_count ?? 0
      }
    }

    while (true) {
      const { done, value } = await reader.read()
      if (done) break

      buffer += decoder.decode(value, { stream: true })
      const lines = buffer.split('\n')
      buffer = lines.pop() ?? ''
      lines.forEach(consume)
    }
    consume(buffer)

    return { content, tool_calls: toToolCalls(toolCalls), usage, model }
  }
}

function toToolCalls(calls: OllamaToolCall[] | undefined): ToolCall[] | undefined {
  if (!calls || calls.length === 0) return undefined
  return calls.map((tc, i) => ({
    id: `call_${i}`,
    name: tc.function.name,
    arguments: toArgumentRecord(tc.function.arguments),
  }))
}

export function createOllamaProvider(endpoint: string, model: string): LLMProvider {
  return new OllamaProvider(endpoint, model)
}
