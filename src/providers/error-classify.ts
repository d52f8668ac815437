/**
 * Error classification for LLM provider failures.
 * Attached to every ProviderError so callers can decide whether a rerun makes sense.
 */

export type ProviderErrorKind =
  | 'rate_limit' // 429, quota exceeded
  | 'auth' // 401/403, invalid key
  | 'context_overflow' // too many tokens
  | 'transient' // 5xx, network errors
  | 'non_retryable' // billing, format errors

const RATE_LIMIT_PATTERNS = [
  /rate[_ ]limit/i,
  /too many requests/i,
  /\b429\b/,
  /exceeded.*quota/i,
  /resource[_ ]exhausted/i,
  /overloaded/i,
]

const AUTH_PATTERNS = [
  /invalid[_ ]?api[_ ]?key/i,
  /incorrect api key/i,
  /authentication/i,
  /unauthorized/i,
  /\b401\b/,
  /\b403\b/,
  /access denied/i,
  /forbidden/i,
]

const CONTEXT_PATTERNS = [
  /context[_ ]?(?:length|window|limit)/i,
  /too many tokens/i,
  /maximum.*tokens/i,
  /token limit/i,
  /context_length_exceeded/i,
]

const NON_RETRYABLE_PATTERNS = [
  /billing/i,
  /payment/i,
  /insufficient.*funds/i,
  /model .*not found/i,
  /unexpected token/i,
]

export function classifyProviderError(errorMessage: string): ProviderErrorKind {
  for (const p of RATE_LIMIT_PATTERNS) {
    if (p.test(errorMessage)) return 'rate_limit'
  }
  for (const p of AUTH_PATTERNS) {
    if (p.test(errorMessage)) return 'auth'
  }
  for (const p of CONTEXT_PATTERNS) {
    if (p.test(errorMessage)) return 'context_overflow'
  }
  for (const p of NON_RETRYABLE_PATTERNS) {
    if (p.test(errorMessage)) return 'non_retryable'
  }
  // 5xx, ECONNREFUSED, "fetch failed" and anything unrecognised
  return 'transient'
}

export function isRetryable(kind: ProviderErrorKind): boolean {
  return kind === 'rate_limit' || kind === 'transient'
}
