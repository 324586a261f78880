import { setTimeout as sleep } from 'timers/promises'

/**
 * Retry configuration
 */
export interface RetryOptions {
  /** Retries after the first attempt */
  retries: number
  /** Delay before the first retry in milliseconds, doubled on each retry */
  baseDelay: number
  /** Upper bound for a single delay */
  maxDelay: number
  /** Decides whether a failure is worth another attempt */
  shouldRetry: (error: unknown) => boolean
}

export const DEFAULT_RETRY_OPTIONS: Omit<RetryOptions, 'shouldRetry'> = {
  retries: 3,
  baseDelay: 500,
  maxDelay: 10_000
}

/**
 * Exponential backoff delay for a zero-based retry attempt
 */
export function backoffDelay(attempt: number, baseDelay: number, maxDelay: number): number {
  return Math.min(baseDelay * 2 ** attempt, maxDelay)
}

/**
 * Run `fn`, retrying failures accepted by `shouldRetry`
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions): Promise<T> {
  for (let attempt = 0; ; attempt++) {
    try {
      return await fn()
    } catch (error) {
      if (attempt >= options.retries || !options.shouldRetry(error)) {
        throw error
      }
      await sleep(backoffDelay(attempt, options.baseDelay, options.maxDelay))
    }
  }
}
