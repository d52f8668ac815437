import { describe, expect, test } from 'vitest'
import { classifyProviderError, isRetryable } from '../../src/providers/error-classify'
import { ProviderError, parseToolArguments, toArgumentRecord, toProviderError } from '../../src/providers/types'

describe('classifyProviderError', () => {
  test('classifies rate limit errors', () => {
    expect(classifyProviderError('429 Too Many Requests')).toBe('rate_limit')
    expect(classifyProviderError('rate_limit: exceeded quota')).toBe('rate_limit')
    expect(classifyProviderError('Server overloaded')).toBe('rate_limit')
  })

  test('classifies auth errors', () => {
    expect(classifyProviderError('401 Unauthorized')).toBe('auth')
    expect(classifyProviderError('Invalid API key provided')).toBe('auth')
    expect(classifyProviderError('403 Forbidden')).toBe('auth')
  })

  test('classifies context overflow errors', () => {
    expect(classifyProviderError('context_length_exceeded')).toBe('context_overflow')
    expect(classifyProviderError('Too many tokens: 50000 > 32768')).toBe('context_overflow')
  })

  test('classifies non-retryable errors', () => {
    expect(classifyProviderError('Billing error: payment declined')).toBe('non_retryable')
    expect(classifyProviderError("model 'mystery' not found")).toBe('non_retryable')
    expect(classifyProviderError('Unexpected token < in JSON at position 0')).toBe('non_retryable')
  })

  test('anything else is transient', () => {
    expect(classifyProviderError('502 Bad Gateway')).toBe('transient')
    expect(classifyProviderError('ECONNREFUSED localhost:11434')).toBe('transient')
    expect(classifyProviderError('fetch failed')).toBe('transient')
  })

  test('rate limit takes precedence over auth', () => {
    expect(classifyProviderError('429 Unauthorized burst')).toBe('rate_limit')
  })
})

describe('isRetryable', () => {
  test('rate limits and transient failures are retryable', () => {
    expect(isRetryable('rate_limit')).toBe(true)
    expect(isRetryable('transient')).toBe(true)
    expect(isRetryable('auth')).toBe(false)
    expect(isRetryable('context_overflow')).toBe(false)
    expect(isRetryable('non_retryable')).toBe(false)
  })
})

describe('ProviderError', () => {
  test('prefixes the message and classifies it', () => {
    const error = new ProviderError('ollama/test', '503 Service Unavailable')
    expect(error.message).toBe('LLM provider error: 503 Service Unavailable')
    expect(error.kind).toBe('transient')
    expect(error.retryable).toBe(true)
    expect(error.provider).toBe('ollama/test')
  })

  test('toProviderError wraps plain errors once', () => {
    const cause = new Error('401 Unauthorized')
    const wrapped = toProviderError('openai/test', cause)
    expect(wrapped.message).toBe('LLM provider error: 401 Unauthorized')
    expect(wrapped.cause).toBe(cause)
    expect(wrapped.retryable).toBe(false)
    expect(toProviderError('other', wrapped)).toBe(wrapped)
  })

  test('toProviderError stringifies non-errors', () => {
    expect(toProviderError('p', 'socket hang up').message).toBe('LLM provider error: socket hang up')
  })
})

describe('tool arguments', () => {
  test('objects pass through', () => {
    expect(parseToolArguments('{"url":"http://localhost"}')).toEqual({ url: 'http://localhost' })
  })

  test('blank strings give no arguments', () => {
    expect(parseToolArguments('  ')).toEqual({})
  })

  test('scalars and arrays are wrapped as input', () => {
    expect(parseToolArguments('"hello"')).toEqual({ input: 'hello' })
    expect(toArgumentRecord([1, 2])).toEqual({ input: [1, 2] })
    expect(toArgumentRecord(null)).toEqual({ input: null })
    expect(toArgumentRecord(undefined)).toEqual({})
  })

  test('malformed JSON throws', () => {
    expect(() => parseToolArguments('{oops')).toThrow()
  })
})
