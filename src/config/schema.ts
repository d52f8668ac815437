import { Type, type Static } from '@sinclair/typebox'

const LogLevelSchema = Type.Union([
  Type.Literal('debug'),
  Type.Literal('info'),
  Type.Literal('warn'),
  Type.Literal('error'),
])

export const TaskloomConfigSchema = Type.Object({
  provider: Type.Optional(Type.Object({
    type: Type.Optional(Type.Union([
      Type.Literal('ollama'),
      Type.Literal('openai'),
      Type.Literal('anthropic'),
    ], { default: 'ollama' })),
    endpoint: Type.Optional(Type.String({ default: 'http://localhost:11434' })),
    model: Type.Optional(Type.String({ default: 'llama3:70b' })),
    temperature: Type.Optional(Type.Number({ default: 0.7, minimum: 0, maximum: 2 })),
    max_tokens: Type.Optional(Type.Integer({ default: 2048, minimum: 1 })),
  })),

  browser: Type.Optional(Type.Object({
    headless: Type.Optional(Type.Boolean({ default: true })),
    default_timeout_ms: Type.Optional(Type.Integer({ default: 30000, minimum: 1 })),
  })),

  workflow: Type.Optional(Type.Object({
    max_attempts: Type.Optional(Type.Integer({ default: 3, minimum: 1 })),
    backoff_ms: Type.Optional(Type.Integer({ default: 1000, minimum: 0 })),
    exponential: Type.Optional(Type.Boolean({ default: true })),
    state_dir: Type.Optional(Type.String({ default: '~/.taskloom/state' })),
  })),

  agent: Type.Optional(Type.Object({
    max_iterations: Type.Optional(Type.Integer({ default: 10, minimum: 1 })),
    system_prompt: Type.Optional(Type.String()),
  })),

  logging: Type.Optional(Type.Object({
    level: Type.Optional(LogLevelSchema),
  })),
})

export type TaskloomConfig = Static<typeof TaskloomConfigSchema>

export type ProviderType = 'ollama' | 'openai' | 'anthropic'

// Runtime config with resolved paths and secrets from the environment
export interface RuntimeConfig {
  provider: {
    type: ProviderType
    endpoint: string
    model: string
    temperature: number
    maxTokens: number
    apiKey?: string
    baseUrl?: string
  }
  browser: {
    headless: boolean
    defaultTimeoutMs: number
  }
  workflow: {
    maxAttempts: number
    backoffMs: number
    exponential: boolean
    stateDir: string
  }
  agent: {
    maxIterations: number
    systemPrompt?: string
  }
  logging: {
    level: 'debug' | 'info' | 'warn' | 'error'
  }
}
