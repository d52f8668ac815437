export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}

/**
 * Backoff before the attempt following `attempt` (1-based).
 * Exponential doubles from `baseMs`: base, 2*base, 4*base...
 */
export function backoffDelay(baseMs: number, attempt: number, exponential: boolean): number {
  return exponential ? baseMs * 2 ** (attempt - 1) : baseMs
}

export async function retry<T>(
  fn: () => Promise<T>,
  options: {
    maxAttempts?: number
    delayMs?: number
    exponential?: boolean
    sleep?: (ms: number) => Promise<void>
    /** Return false to give up immediately on this error */
    shouldRetry?: (error: unknown) => boolean
    onError?: (error: unknown, attempt: number) => void
  } = {},
): Promise<T> {
  const {
    maxAttempts = 3,
    delayMs = 1000,
    exponential = true,
    sleep = delay,
    shouldRetry,
    onError,
  } = options

  let lastError: unknown

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await fn()
    } catch (error) {
      lastError = error
      onError?.(error, attempt)

      if (shouldRetry && !shouldRetry(error)) break

      if (attempt < maxAttempts) {
        await sleep(backoffDelay(delayMs, attempt, exponential))
      }
    }
  }

  throw lastError
}

export function timeout<T>(promise: Promise<T>, ms: number, message?: string): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined

  const expiry = new Promise<T>((_, reject) => {
    timer = setTimeout(() => reject(new Error(message ?? `Operation timed out after ${ms}ms`)), ms)
  })

  return Promise.race([promise, expiry]).finally(() => clearTimeout(timer))
}
