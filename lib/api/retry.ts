import { setTimeout as sleep } from 'node:timers/promises'
import {
  ApiError,
  ConnectError,
  Result,
  err,
  handleApiError,
  isTransient,
  ok,
} from './errors'

export interface RetryPolicy {
  // total attempts, including the first
  attempts: number
  delayMs: number
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  attempts: 3,
  delayMs: 500,
}

/**
 * Runs `operation`, retrying transient failures (network errors, rate limits,
 * server errors) up to the policy's attempt budget. Any other failure is
 * returned at once. The caller decides what a failed Result means.
 */
export async function withRetry<T>(
  description: string,
  operation: () => Promise<T>,
  policy: RetryPolicy = DEFAULT_RETRY_POLICY
): Promise<Result<T, ConnectError>> {
  const attempts = Math.max(1, policy.attempts)
  let lastError: ApiError | undefined

  for (let attempt = 1; attempt <= attempts; attempt += 1) {
    try {
      return ok(await operation())
    } catch (error) {
      lastError = handleApiError(error)
      if (!isTransient(lastError)) break
      if (attempt < attempts && policy.delayMs > 0) {
        await sleep(policy.delayMs)
      }
    }
  }

  return err(new ConnectError(`${description} failed`, lastError))
}

/** {@link withRetry} for callers that propagate the ConnectError. */
export async function retryOrThrow<T>(
  description: string,
  operation: () => Promise<T>,
  policy: RetryPolicy = DEFAULT_RETRY_POLICY
): Promise<T> {
  const result = await withRetry(description, operation, policy)
  if (!result.ok) throw result.error
  return result.value
}
