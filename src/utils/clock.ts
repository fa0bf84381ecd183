import { throwIfAborted, toCancellationError } from "./cancel.js"

export const sleep = async (ms: number, signal?: AbortSignal): Promise<void> => {
  if (ms <= 0) {
    throwIfAborted(signal)
    return
  }
  throwIfAborted(signal)
  if (!signal) {
    await new Promise<void>((resolve) => {
      setTimeout(resolve, ms)
    })
    return
  }
  await new Promise<void>((resolve, reject) => {
    const timer = setTimeout(() => {
      signal.removeEventListener("abort", onAbort)
      resolve()
    }, ms)
    const onAbort = () => {
      clearTimeout(timer)
      signal.removeEventListener("abort", onAbort)
      reject(toCancellationError(signal))
    }
    signal.addEventListener("abort", onAbort, { once: true })
  })
}

/** Time source for everything that waits, so tests can run it without real timers. */
export interface Clock {
  now(): number
  sleep(ms: number, signal?: AbortSignal): Promise<void>
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep,
}
