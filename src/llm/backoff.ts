/**
 * Backoff Helpers
 */

export interface BackoffPolicy {
  readonly baseDelayMs: number
  readonly multiplier: number
  /** Upper bound of random jitter as a fraction of the delay (0 disables) */
  readonly jitterRatio: number
}

/**
 * Delay before the retry that follows attempt `attemptIndex` (0-based):
 * baseDelayMs × multiplier^attemptIndex, plus up to jitterRatio of that.
 */
export function computeBackoffDelay(
  attemptIndex: number,
  policy: BackoffPolicy,
  random: () => number = Math.random
): number {
  const delay = policy.baseDelayMs * policy.multiplier ** attemptIndex
  const jitter = policy.jitterRatio > 0 ? delay * policy.jitterRatio * random() : 0
  return Math.round(delay + jitter)
}

/**
 * Resolves true after `ms`, or false as soon as `signal` aborts.
 */
export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<boolean>

export const sleep: SleepFn = (ms, signal) =>
  new Promise<boolean>((resolve) => {
    if (signal?.aborted) {
      resolve(false)
      return
    }

    const onAbort = (): void => {
      clearTimeout(timer)
      resolve(false)
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort)
      resolve(true)
    }, ms)
    signal?.addEventListener('abort', onAbort, { once: true })
  })
