import Anthropic from '@anthropic-ai/sdk'
import type { ChatMessage, ChatRequest, ChatResponse, LLMProvider, ToolCall } from './types'
import { toArgumentRecord, toProviderError } from './types'

export class AnthropicProvider implements LLMProvider {
  readonly name: string
  private client: Anthropic
  private model: string

  constructor(apiKey: string, model: string) {
    this.client = new Anthropic({ apiKey })
    this.model = model
    this.name = `anthropic/${model}`
  }

  async chat(req: ChatRequest): Promise<ChatResponse> {
    const { systemPrompt, messages } = prepareAnthropicMessages(req.messages)

    const params: Anthropic.Messages.MessageCreateParamsNonStreaming = {
      model: this.model,
      max_tokens: req.max_tokens ?? 4096,
      messages,
      ...(systemPrompt !== undefined && { system: systemPrompt }),
      ...(req.temperature !== undefined && { temperature: req.temperature }),
    }

    if (req.tools && req.tools.length > 0) {
      params.tools = req.tools.map(t => ({
        name: t.name,
        description: t.description,
        input_schema: { ...t.parameters, type: 'object' as const },
      }))
    }

    try {
      if (req.onToken) {
        return await this.chatStream(params, req.onToken)
      }

      const response = await this.client.messages.create(params)
      return this.parseResponse(response)
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
    params: Anthropic.Messages.MessageCreateParamsNonStreaming,
    onToken: (token: string) => void
  ): Promise<ChatResponse> {
    const stream = this.client.messages.stream(params)

    stream.on('text', (text) => {
      onToken(text)
    })

    const response = await stream.finalMessage()
    return this.parseResponse(response)
  }

  private parseResponse(response: Anthropic.Messages.Message): ChatResponse {
    let content = ''
    const tool_calls: ToolCall[] = []

    for (const block of response.content) {
      if (block.type === 'text') {
        content += block.text
      } else if (block.type === 'tool_use') {
        tool_calls.push({
          id: block.id,
          name: block.name,
          arguments: toArgumentRecord(block.input),
        })
      }
    }

    return {
      content,
      tool_calls: tool_calls.length > 0 ? tool_calls : undefined,
      usage: {
        input_tokens: response.usage.input_tokens,
        output_tokens: response.usage.output_tokens,
      },
      model: response.model,
    }
  }
}

/**
 * Convert the conversation to Anthropic's shape: system turns are lifted into
 * the system prompt and consecutive same-role turns are merged, since the API
 * requires user and assistant turns to alternate.
 */
export function prepareAnthropicMessages(messages: ChatMessage[]): {
  systemPrompt: string | undefined
  messages: Anthropic.Messages.MessageParam[]
} {
  let systemPrompt: string | undefined
  const anthropicMessages: Anthropic.Messages.MessageParam[] = []

  for (const msg of messages) {
    if (msg.role === 'system') {
      systemPrompt = (systemPrompt ? systemPrompt + '\n\n' : '') + msg.content
      continue
    }

    const previous = anthropicMessages[anthropicMessages.length - 1]
    if (previous && previous.role === msg.role && typeof previous.content === 'string') {
      previous.content = `${previous.content}\n\n${msg.content}`
    } else {
      anthropicMessages.push({ role: msg.role, content: msg.content })
    }
  }

  return { systemPrompt, messages: anthropicMessages }
}

export function createAnthropicProvider(apiKey: string, model: string): LLMProvider {
  return new AnthropicProvider(apiKey, model)
}
