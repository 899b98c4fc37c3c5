/**
 * Retrying LLM Client
 *
 * Wraps any LlmClient with bounded retries and exponential backoff.
 * Attempts run strictly one after another; a non-retryable failure or an
 * exhausted budget returns the last failure with `attempts` filled in.
 */

import { err } from '../types/common'
import { type BackoffPolicy, computeBackoffDelay, type SleepFn, sleep } from './backoff'
import { classifyError, createLlmError, isRetryable, type LlmError } from './errors'
import type { InvokeOptions, LlmClient, LlmRequest, LlmResult } from './types'

export const DEFAULT_RETRY_BASE_DELAY_MS = 1000
export const DEFAULT_BACKOFF_MULTIPLIER = 2

export interface RetryInfo {
  /** 1-based number of the attempt that just failed */
  readonly attempt: number
  readonly maxAttempts: number
  readonly delayMs: number
  readonly error: LlmError
}

export interface RetryOptions {
  readonly maxRetries: number
  readonly baseDelayMs?: number | undefined
  readonly backoffMultiplier?: number | undefined
  readonly jitterRatio?: number | undefined
  readonly sleep?: SleepFn | undefined
  readonly random?: (() => number) | undefined
  readonly onRetry?: ((info: RetryInfo) => void) | undefined
  readonly onGiveUp?: ((error: LlmError) => void) | undefined
}

export class RetryingLlmClient implements LlmClient {
  private readonly maxRetries: number
  private readonly policy: BackoffPolicy
  private readonly sleepFn: SleepFn
  private readonly random: () => number

  constructor(
    private readonly delegate: LlmClient,
    private readonly options: RetryOptions
  ) {
    const { maxRetries } = options
    if (!Number.isInteger(maxRetries) || maxRetries < 0) {
      throw new RangeError(`maxRetries must be a non-negative integer, got ${maxRetries}`)
    }
    const baseDelayMs = options.baseDelayMs ?? DEFAULT_RETRY_BASE_DELAY_MS
    const multiplier = options.backoffMultiplier ?? DEFAULT_BACKOFF_MULTIPLIER
    const jitterRatio = options.jitterRatio ?? 0
    if (baseDelayMs < 0) throw new RangeError('baseDelayMs must be >= 0')
    if (multiplier < 1) throw new RangeError('backoffMultiplier must be >= 1')
    if (jitterRatio < 0 || jitterRatio > 1) throw new RangeError('jitterRatio must be within 0..1')

    this.maxRetries = maxRetries
    this.policy = { baseDelayMs, multiplier, jitterRatio }
    this.sleepFn = options.sleep ?? sleep
    this.random = options.random ?? Math.random
  }

  get providerName(): string {
    return this.delegate.providerName
  }

  get modelName(): string {
    return this.delegate.modelName
  }

  isAvailable(): Promise<boolean> {
    return this.delegate.isAvailable()
  }

  async invoke(request: LlmRequest, options: InvokeOptions = {}): Promise<LlmResult> {
    const { signal } = options
    const maxAttempts = this.maxRetries + 1

    for (let attempt = 1; ; attempt++) {
      if (signal?.aborted) {
        return err(cancelled(attempt - 1))
      }

      const result = await this.attemptOnce(request, options)
      if (result.ok) return result

      const error: LlmError = { ...result.error, attempts: attempt }
      if (error.kind === 'cancelled' || signal?.aborted) {
        return err(cancelled(attempt, result.error.cause))
      }

      if (!isRetryable(error.kind) || attempt >= maxAttempts) {
        this.options.onGiveUp?.(error)
        return err(error)
      }

      const delayMs = Math.max(
        computeBackoffDelay(attempt - 1, this.policy, this.random),
        error.retryAfterMs ?? 0
      )
      this.options.onRetry?.({ attempt, maxAttempts, delayMs, error })

      const completed = await this.sleepFn(delayMs, signal)
      if (!completed) {
        return err(cancelled(attempt))
      }
    }
  }

  private async attemptOnce(request: LlmRequest, options: InvokeOptions): Promise<LlmResult> {
    try {
      return await this.delegate.invoke(request, options)
    } catch (error) {
      return err(classifyError(error))
    }
  }
}

function cancelled(attempts: number, cause?: unknown): LlmError {
  return createLlmError('cancelled', 'Request was cancelled', {
    attempts,
    ...(cause !== undefined && { cause })
  })
}
