import { CancelledError } from '../errors.js'

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>

/**
 * Wait `ms` milliseconds. Rejects with CancelledError as soon as `signal` aborts.
 */
export const sleep: Sleep = (ms, signal) =>
  new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CancelledError())
      return
    }

    const onAbort = () => {
      clearTimeout(timer)
      reject(new CancelledError())
    }

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort)
      resolve()
    }, Math.max(0, ms))

    signal?.addEventListener('abort', onAbort, { once: true })
  })

export function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new CancelledError()
  }
}
