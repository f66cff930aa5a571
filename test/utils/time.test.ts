import { describe, it, expect, vi, afterEach } from 'vitest'
import { sleep, toUnixSeconds } from '../../src/utils/time.js'

describe('toUnixSeconds', () => {
  it('drops milliseconds', () => {
    expect(toUnixSeconds(new Date(1_700_000_000_999))).toBe(1_700_000_000)
  })
})

describe('sleep', () => {
  afterEach(() => {
    vi.useRealTimers()
  })

  it('resolves after the given delay', async () => {
    vi.useFakeTimers()
    let done = false
    const pending = sleep(1000).then(() => {
      done = true
    })

    await vi.advanceTimersByTimeAsync(999)
    expect(done).toBe(false)
    await vi.advanceTimersByTimeAsync(1)
    await pending
    expect(done).toBe(true)
  })

  it('resolves early when the signal aborts', async () => {
    vi.useFakeTimers()
    const controller = new AbortController()
    const pending = sleep(600_000, controller.signal)

    controller.abort()

    await expect(pending).resolves.toBeUndefined()
    expect(vi.getTimerCount()).toBe(0)
  })

  it('resolves immediately for an aborted signal', async () => {
    const controller = new AbortController()
    controller.abort()

    await expect(sleep(600_000, controller.signal)).resolves.toBeUndefined()
  })
})
