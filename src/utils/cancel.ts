export class CancellationError extends Error {
  readonly code = "CANCELLED"

  constructor(message = "Operation cancelled") {
    super(message)
    this.name = "CancellationError"
  }
}

export const toCancellationError = (signal: AbortSignal): CancellationError => {
  const reason: unknown = signal.reason
  if (reason instanceof CancellationError) {
    return reason
  }
  if (reason instanceof Error) {
    return new CancellationError(reason.message)
  }
  if (typeof reason === "string" && reason.trim()) {
    return new CancellationError(reason)
  }
  return new CancellationError()
}

export const throwIfAborted = (signal: AbortSignal | undefined): void => {
  if (!signal?.aborted) {
    return
  }
  throw toCancellationError(signal)
}

export const isCancellationError = (value: unknown): boolean => {
  if (value instanceof CancellationError) {
    return true
  }
  if (!(value instanceof Error)) {
    return false
  }
  return value.name === "AbortError" || value.name === "CancellationError"
}

export interface SigintCancellationHandle {
  signal: AbortSignal
  dispose: () => void
}

/**
 * First CTRL+C aborts the returned signal; a second one exits immediately with 130.
 * Remote runs are not aborted: only the local wait stops.
 */
export const setupSigintCancellation = (callbacks: {
  onFirst: () => void
  onForce: () => void
}): SigintCancellationHandle => {
  const controller = new AbortController()
  let sigintCount = 0
  const onSigint = () => {
    sigintCount += 1
    if (sigintCount === 1) {
      callbacks.onFirst()
      controller.abort(new CancellationError("Interrupted by user (SIGINT)"))
      return
    }
    callbacks.onForce()
    process.exit(130)
  }
  process.on("SIGINT", onSigint)
  return {
    signal: controller.signal,
    dispose: () => process.off("SIGINT", onSigint),
  }
}
