import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { computeBackoffDelay, sleep } from './backoff'

const policy = { baseDelayMs: 1000, multiplier: 2, jitterRatio: 0 }

describe('computeBackoffDelay', () => {
  it('grows exponentially from the base delay', () => {
    expect([0, 1, 2, 3].map((i) => computeBackoffDelay(i, policy))).toEqual([
      1000, 2000, 4000, 8000
    ])
  })

  it('adds at most jitterRatio of the delay', () => {
    const jittered = { ...policy, jitterRatio: 0.5 }
    expect(computeBackoffDelay(1, jittered, () => 0)).toBe(2000)
    expect(computeBackoffDelay(1, jittered, () => 0.5)).toBe(2500)
    expect(computeBackoffDelay(1, jittered, () => 0.999)).toBe(2999)
  })
})

describe('sleep', () => {
  beforeEach(() => {
    vi.useFakeTimers()
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  it('resolves true once the delay has passed', async () => {
    const pending = sleep(1000)
    await vi.advanceTimersByTimeAsync(1000)
    await expect(pending).resolves.toBe(true)
  })

  it('resolves false as soon as the signal aborts', async () => {
    const controller = new AbortController()
    const pending = sleep(10_000, controller.signal)
    await vi.advanceTimersByTimeAsync(100)
    controller.abort()
    await expect(pending).resolves.toBe(false)
    expect(vi.getTimerCount()).toBe(0)
  })

  it('resolves false immediately for an already aborted signal', async () => {
    await expect(sleep(10_000, AbortSignal.abort())).resolves.toBe(false)
  })
})
