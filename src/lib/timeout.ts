/**
 * Timeout and retry utilities
 *
 * Readiness polling for services that take an unknown amount of time to
 * accept queries, plus a timeout wrapper for single probe attempts.
 */

import type { RetryPolicy } from '../types.js'
import { ReadinessTimeoutError, toError } from './errors.js'

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  initialDelayMs: 1000,
  backoffMultiplier: 2,
  maxDelayMs: 30000,
  maxDurationMs: 300000
}

export interface PollOptions {
  /** Name used in the timeout error */
  label: string
  /** Called after every failed attempt, before sleeping */
  onRetry?: (attempt: number, error: Error, delayMs: number) => void
  sleep?: (ms: number) => Promise<void>
  now?: () => number
}

export interface PollResult<T> {
  value: T
  attempts: number
  elapsedMs: number
}

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms))
}

/**
 * Delay before the attempt following `attempt` (1-based):
 * initialDelayMs * multiplier^(attempt-1), capped at maxDelayMs
 */
export function delayFor(policy: RetryPolicy, attempt: number): number {
  const delay = policy.initialDelayMs * Math.pow(policy.backoffMultiplier, attempt - 1)
  return Math.min(delay, policy.maxDelayMs)
}

/**
 * Merge a partial per-service policy over a base policy
 */
export function resolvePolicy(base: RetryPolicy, override?: Partial<RetryPolicy>): RetryPolicy {
  return { ...base, ...override }
}

/**
 * Call fn until it resolves or the policy's budget runs out
 *
 * @throws ReadinessTimeoutError with the last failure as cause when either
 *   maxAttempts or maxDurationMs is exhausted
 *
 * @example
 * ```ts
 * await pollUntilReady(() => probe.check(), policy, {
 *   label: 'neo4j',
 *   onRetry: (attempt, error) => ui.verbose(`attempt ${attempt}: ${error.message}`)
 * })
 * ```
 */
export async function pollUntilReady<T>(
  fn: () => Promise<T>,
  policy: RetryPolicy,
  options: PollOptions
): Promise<PollResult<T>> {
  const {
    label,
    onRetry,
    sleep: wait = sleep,
    now = Date.now
  } = options

  const startedAt = now()
  let lastError: Error | undefined

  for (let attempt = 1; ; attempt++) {
    try {
      const value = await fn()
      return { value, attempts: attempt, elapsedMs: now() - startedAt }
    } catch (error) {
      lastError = toError(error)
    }

    const elapsedMs = now() - startedAt
    if (policy.maxAttempts !== undefined && attempt >= policy.maxAttempts) {
      throw new ReadinessTimeoutError(label, attempt, elapsedMs, lastError)
    }

    let delay = delayFor(policy, attempt)
    if (policy.maxDurationMs !== undefined) {
      const remaining = policy.maxDurationMs - elapsedMs
      if (remaining <= 0) {
        throw new ReadinessTimeoutError(label, attempt, elapsedMs, lastError)
      }
      // One last attempt right at the deadline
      delay = Math.min(delay, remaining)
    }

    onRetry?.(attempt, lastError, delay)
    await wait(delay)
  }
}

/**
 * Wrap a promise with a timeout
 *
 * @example
 * ```ts
 * await withTimeout(client.send(new ListBucketsCommand({})), 5000, 'list buckets')
 * ```
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  operation: string
): Promise<T> {
  let timeoutHandle: NodeJS.Timeout | undefined

  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutHandle = setTimeout(() => {
      reject(new Error(`Operation timed out after ${timeoutMs}ms: ${operation}`))
    }, timeoutMs)
  })

  try {
    return await Promise.race([promise, timeoutPromise])
  } finally {
    clearTimeout(timeoutHandle)
  }
}
