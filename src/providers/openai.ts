import OpenAI from 'openai'
import type { ChatMessage, ChatRequest, ChatResponse, LLMProvider, ToolCall } from './types'
import { parseToolArguments, toProviderError } from './types'

export class OpenAIProvider implements LLMProvider {
  readonly name: string
  private client: OpenAI
  private model: string

  constructor(apiKey: string, model: string, baseUrl?: string) {
    this.client = new OpenAI({ apiKey, ...(baseUrl !== undefined && { baseURL: baseUrl }) })
    this.model = model
    this.name = `openai/${model}`
  }

  async chat(req: ChatRequest): Promise<ChatResponse> {
    const params: OpenAI.Chat.ChatCompletionCreateParamsNonStreaming = {
      model: this.model,
      messages: this.prepareMessages(req.messages),
      ...(req.max_tokens !== undefined && { max_tokens: req.max_tokens }),
      ...(req.temperature !== undefined && { temperature: req.temperature }),
    }

    if (req.tools && req.tools.length > 0) {
      params.tools = req.tools.map((t) => ({
        type: 'function',
        function: {
          name: t.name,
          description: t.description,
          parameters: t.parameters,
        },
      }))
    }

    try {
      if (req.onToken) {
        return await this.chatStream(params, req.onToken)
      }

      const response = await this.client.chat.completions.create(params)

      const choice = response.choices[0]
      const tool_calls: ToolCall[] | undefined = choice?.message?.tool_calls?.map((tc) => ({
        id: tc.id,
        name: tc.function.name,
        arguments: parseToolArguments(tc.function.arguments),
      }))

      return {
        content: choice?.message?.content ?? '',
        tool_calls,
        usage: {
          input_tokens: response.usage?.prompt_tokens ?? 0,
          output_tokens: response.usage?.completion_tokens ?? 0,
        },
        model: response.model,
      }
    } catch (error) {
      throw toProviderError(this.name, error)
    }
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.client.models.retrieve(this.model)
      return true
    } catch (error) {
      throw toProviderError(this.name, error)
    }
  }

  private async chatStream(
    params: OpenAI.Chat.ChatCompletionCreateParamsNonStreaming,
    onToken: (token: string) => void,
  ): Promise<ChatResponse> {
    const stream = await this.client.chat.completions.create({
      ...params,
      stream: true,
      stream_options: { include_usage: true },
    })

    let content = ''
    const toolCallAccumulator = new Map<number, { id: string; name: string; arguments: string }>()
    let usage = { prompt_tokens: 0, completion_tokens: 0 }
    let model = this.model

    for await (const chunk of stream) {
      model = chunk.model ?? model

      if (chunk.usage) {
        usage = {
          prompt_tokens: chunk.usage.prompt_tokens ?? 0,
          completion_tokens: chunk.usage.completion_tokens ?? 0,
        }
      }

      const delta = chunk.choices?.[0]?.delta
      if (!delta) continue

      if (delta.content) {
        content += delta.content
        onToken(delta.content)
      }

      if (delta.tool_calls) {
        for (const tc of delta.tool_calls) {
          const existing = toolCallAccumulator.get(tc.index)
          if (existing) {
            existing.arguments += tc.function?.arguments ?? ''
          } else {
            toolCallAccumulator.set(tc.index, {
              id: tc.id ?? '',
              name: tc.function?.name ?? '',
              arguments: tc.function?.arguments ?? '',
            })
          }
        }
      }
    }

    const tool_calls: ToolCall[] | undefined =
      toolCallAccumulator.size > 0
        ? Array.from(toolCallAccumulator.values()).map((tc) => ({
            id: tc.id,
            name: tc.name,
            arguments: parseToolArguments(tc.arguments),
          }))
        : undefined

    return {
      content,
      tool_calls,
      usage: {
        input_tokens: usage.prompt_tokens,
        output_tokens: usage.completion_tokens,
      },
      model,
    }
  }

  private prepareMessages(messages: ChatMessage[]): OpenAI.Chat.ChatCompletionMessageParam[] {
    return messages.map((msg): OpenAI.Chat.ChatCompletionMessageParam => {
      switch (msg.role) {
        case 'system':
          return { role: 'system', content: msg.content }
        case 'user':
          return { role: 'user', content: msg.content }
        case 'assistant':
          return { role: 'assistant', content: msg.content }
      }
    })
  }
}

export function createOpenAIProvider(apiKey: string, model: string, baseUrl?: string): LLMProvider {
  return new OpenAIProvider(apiKey, model, baseUrl)
}
