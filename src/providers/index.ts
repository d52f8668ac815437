import type { RuntimeConfig } from '../config'
import { log } from '../util/logger'
import { createAnthropicProvider } from './anthropic'
import { createOllamaProvider } from './local/ollama'
import { createOpenAIProvider } from './openai'
import type { LLMProvider } from './types'

export { AnthropicProvider, createAnthropicProvider, prepareAnthropicMessages } from './anthropic'
export { classifyProviderError, isRetryable, type ProviderErrorKind } from './error-classify'
export { createOllamaProvider, OllamaProvider } from './local/ollama'
export { createOpenAIProvider, OpenAIProvider } from './openai'
export * from './types'

/**
 * Build the provider named by `[provider] type`.
 * Remote providers take their API key from the environment-derived config.
 */
export function createProvider(config: RuntimeConfig['provider']): LLMProvider {
  switch (config.type) {
    case 'ollama': {
      const provider = createOllamaProvider(config.endpoint, config.model)
      log.info('provider', `Using ${provider.name} @ ${config.endpoint}`)
      return provider
    }
    case 'openai': {
      if (!config.apiKey) {
        throw new Error('OPENAI_API_KEY is required for provider type "openai"')
      }
      const provider = createOpenAIProvider(config.apiKey, config.model, config.baseUrl)
      log.info('provider', `Using ${provider.name}`)
      return provider
    }
    case 'anthropic': {
      if (!config.apiKey) {
        throw new Error('ANTHROPIC_API_KEY is required for provider type "anthropic"')
      }
      const provider = createAnthropicProvider(config.apiKey, config.model)
      log.info('provider', `Using ${provider.name}`)
      return provider
    }
  }
}
