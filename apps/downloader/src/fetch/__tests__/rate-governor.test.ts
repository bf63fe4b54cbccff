import { describe, expect, it, vi } from 'vitest'
import { CancelledError } from '../../errors.js'
import { RateGovernor } from '../rate-governor.js'

function createGovernor() {
  let clock = 10_000
  const sleep = vi.fn(async (ms: number) => {
    clock += ms
  })
  const governor = new RateGovernor({
    config: { baseDelayMs: 1000, backoffFactor: 2, maxDelayMs: 8000, cooldownMs: 500, serverErrorThreshold: 2 },
    now: () => clock,
    sleep,
  })
  return {
    governor,
    sleep,
    advance: (ms: number) => {
      clock += ms
    },
  }
}

describe('RateGovernor', () => {
  it('lets the first request through and paces the next one at the floor', async () => {
    const { governor, sleep } = createGovernor()

    await expect(governor.acquire()).resolves.toBe(0)
    await expect(governor.acquire()).resolves.toBe(1000)
    expect(sleep).toHaveBeenCalledTimes(1)
    expect(sleep).toHaveBeenCalledWith(1000, undefined)
  })

  it('does not wait when the pacing interval has already passed', async () => {
    const { governor, advance, sleep } = createGovernor()

    await governor.acquire()
    advance(1500)

    await expect(governor.acquire()).resolves.toBe(0)
    expect(sleep).not.toHaveBeenCalled()
  })

  it('backs off exponentially on throttling up to the ceiling', () => {
    const { governor } = createGovernor()
    const delays: number[] = []

    for (let i = 0; i < 4; i++) {
      governor.recordOutcome('rate_limited')
      delays.push(governor.snapshot().currentDelayMs)
    }

    expect(delays).toEqual([2000, 4000, 8000, 8000])
    expect(governor.snapshot().consecutiveFailures).toBe(4)
  })

  it('decays one step per success back to the floor', () => {
    const { governor } = createGovernor()
    governor.recordOutcome('rate_limited')
    governor.recordOutcome('rate_limited')
    governor.recordOutcome('rate_limited')

    const delays: number[] = []
    for (let i = 0; i < 4; i++) {
      governor.recordOutcome('ok')
      delays.push(governor.snapshot().currentDelayMs)
    }

    expect(delays).toEqual([4000, 2000, 1000, 1000])
    expect(governor.snapshot().consecutiveFailures).toBe(0)
  })

  it('sets a cooldown that holds back even the first request', () => {
    const { governor } = createGovernor()

    governor.recordOutcome('rate_limited')

    expect(governor.snapshot().cooldownUntil).toBe(10_500)
    expect(governor.delayBeforeNextRequest()).toBe(500)
  })

  it('counts server errors as a throttle only after the threshold', () => {
    const { governor } = createGovernor()

    governor.recordOutcome('server_error')
    expect(governor.snapshot()).toMatchObject({ consecutiveFailures: 0, currentDelayMs: 1000 })

    governor.recordOutcome('server_error')
    expect(governor.snapshot()).toMatchObject({ consecutiveFailures: 1, currentDelayMs: 2000 })
  })

  it('leaves pacing alone on client errors and breaks a server error streak', () => {
    const { governor } = createGovernor()

    governor.recordOutcome('server_error')
    governor.recordOutcome('client_error')
    governor.recordOutcome('server_error')

    expect(governor.snapshot()).toMatchObject({
      consecutiveFailures: 0,
      consecutiveServerErrors: 1,
      currentDelayMs: 1000,
    })
  })

  it('serves concurrent callers one at a time', async () => {
    const { governor } = createGovernor()

    const waits = await Promise.all([governor.acquire(), governor.acquire(), governor.acquire()])

    expect(waits).toEqual([0, 1000, 1000])
  })

  it('rejects with CancelledError once the signal is aborted', async () => {
    const { governor } = createGovernor()
    const controller = new AbortController()
    controller.abort()

    await expect(governor.acquire(controller.signal)).rejects.toBeInstanceOf(CancelledError)
  })

  it('reset returns to the initial state', () => {
    const { governor } = createGovernor()
    governor.recordOutcome('rate_limited')

    governor.reset()

    expect(governor.snapshot()).toEqual({
      consecutiveFailures: 0,
      consecutiveServerErrors: 0,
      currentDelayMs: 1000,
      cooldownUntil: 0,
      lastRequestAt: null,
    })
  })
})
