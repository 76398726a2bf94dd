import pRetry, { AbortError } from "p-retry"
import type { RetryConfig } from "@/config/config"
import { StratumError, errorMessage } from "@/error"
import type { Logger } from "@/util/log"

class AttemptTimeoutError extends Error {
  constructor(operation: string, timeoutMs: number) {
    super(`${operation} timed out after ${timeoutMs}ms`)
    this.name = "AttemptTimeoutError"
  }
}

async function withAttemptTimeout<T>(
  operation: string,
  timeoutMs: number,
  outer: AbortSignal | undefined,
  task: (signal: AbortSignal) => Promise<T>,
): Promise<T> {
  const controller = new AbortController()
  const onAbort = () => controller.abort(outer?.reason)
  outer?.addEventListener("abort", onAbort, { once: true })
  let timer: ReturnType<typeof setTimeout> | undefined
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const error = new AttemptTimeoutError(operation, timeoutMs)
      // Settle the race before the task sees the abort.
      reject(error)
      controller.abort(error)
    }, timeoutMs)
  })
  try {
    return await Promise.race([task(controller.signal), timeout])
  } finally {
    clearTimeout(timer)
    outer?.removeEventListener("abort", onAbort)
  }
}

/**
 * Runs a call to an external service with a per-attempt timeout and bounded
 * exponential backoff. Errors of our own taxonomy are not retried; anything
 * else that survives every attempt is wrapped by `unavailable`.
 */
export async function withRetry<T>(
  input: {
    operation: string
    retry: Readonly<RetryConfig>
    log: Logger
    signal?: AbortSignal
    unavailable: (message: string, cause: unknown) => StratumError
  },
  task: (signal: AbortSignal) => Promise<T>,
): Promise<T> {
  try {
    return await pRetry(
      async () => {
        if (input.signal?.aborted) {
          throw new AbortError(errorMessage(input.signal.reason ?? "aborted"))
        }
        try {
          return await withAttemptTimeout(input.operation, input.retry.attempt_timeout_ms, input.signal, task)
        } catch (error) {
          if (error instanceof StratumError) throw new AbortError(error)
          throw error
        }
      },
      {
        retries: input.retry.retries,
        minTimeout: input.retry.min_timeout_ms,
        maxTimeout: input.retry.max_timeout_ms,
        factor: 2,
        randomize: true,
        onFailedAttempt(error) {
          input.log.warn(`${input.operation} attempt failed`, {
            attempt: error.attemptNumber,
            retriesLeft: error.retriesLeft,
            error: error.message,
          })
        },
      },
    )
  } catch (error) {
    if (error instanceof StratumError) throw error
    throw input.unavailable(`${input.operation} failed: ${errorMessage(error)}`, error)
  }
}
