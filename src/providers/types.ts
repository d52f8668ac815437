import { classifyProviderError, isRetryable, type ProviderErrorKind } from './error-classify'

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant'
  content: string
}

export interface ToolCall {
  id: string
  name: string
  arguments: Record<string, unknown>
}

export interface ToolDefinition {
  name: string
  description: string
  parameters: Record<string, unknown> // JSON Schema
}

export interface ChatRequest {
  messages: ChatMessage[]
  tools?: ToolDefinition[]
  temperature?: number
  max_tokens?: number
  /** If provided, the provider streams tokens via this callback */
  onToken?: (token: string) => void
}

export interface ChatResponse {
  content: string
  tool_calls?: ToolCall[]
  usage: { input_tokens: number; output_tokens: number }
  model: string
}

export interface LLMProvider {
  readonly name: string
  chat(req: ChatRequest): Promise<ChatResponse>
  /** Resolves false (or rejects) when the backing service is unreachable */
  healthCheck(): Promise<boolean>
}

/** Sampling settings applied to every chat call of a run */
export interface ChatOptions {
  temperature?: number
  max_tokens?: number
}

/**
 * A language-model call failed (network, API, malformed response).
 * Tool failures never surface as this error.
 */
export class ProviderError extends Error {
  readonly kind: ProviderErrorKind
  readonly provider: string

  constructor(provider: string, message: string, options?: { cause?: unknown }) {
    super(`LLM provider error: ${message}`, options)
    this.name = 'ProviderError'
    this.provider = provider
    this.kind = classifyProviderError(message)
  }

  get retryable(): boolean {
    return isRetryable(this.kind)
  }
}

export function toProviderError(provider: string, error: unknown): ProviderError {
  if (error instanceof ProviderError) return error
  const message = error instanceof Error ? error.message : String(error)
  return new ProviderError(provider, message, { cause: error })
}

/** Parse tool-call arguments sent as a JSON string; non-object payloads become `{ input }`. */
export function parseToolArguments(raw: string): Record<string, unknown> {
  if (!raw.trim()) return {}
  const parsed: unknown = JSON.parse(raw)
  return toArgumentRecord(parsed)
}

export function toArgumentRecord(value: unknown): Record<string, unknown> {
  if (value !== null && typeof value === 'object' && !Array.isArray(value)) {
    return Object.fromEntries(Object.entries(value))
  }
  return value === undefined ? {} : { input: value }
}
