import { JobFailedError } from "../errors.js"
import { isCancellationError, throwIfAborted } from "../utils/cancel.js"
import { type Clock, systemClock } from "../utils/clock.js"
import { isTransientHttpError } from "../utils/http.js"
import { retry, type RetryContext } from "../utils/retry.js"
import { getErrorMessage, sanitizeForError } from "../utils/sanitize.js"
import { eventFor, isTerminalStatus, mapRemoteStatus, transition } from "./state-machine.js"
import type { Job, RemoteRunSnapshot, RunStatusSource } from "./types.js"

export const DEFAULT_POLL_INTERVAL_MS = 5_000
export const DEFAULT_WAIT_TIMEOUT_MS = 300_000
export const DEFAULT_POLL_RETRIES = 4

export interface PollDeps {
  statusSource: RunStatusSource
  clock?: Clock
  intervalMs?: number
  timeoutMs?: number
  /** Extra attempts for one status read that fails transiently. */
  retries?: number
  signal?: AbortSignal
  onStatus?: (job: Job) => void
  onRetry?: (ctx: RetryContext) => void
}

/** Applies one observation; returns the same job when nothing changed. */
export const applySnapshot = (job: Job, snapshot: RemoteRunSnapshot): Job => {
  const event = eventFor(job.status, mapRemoteStatus(snapshot.remoteStatus))
  const status = event ? transition(job.status, event) : job.status
  if (
    status === job.status &&
    snapshot.remoteStatus === job.remoteStatus &&
    snapshot.statusMessage === job.statusMessage &&
    (snapshot.datasetId ?? job.datasetId) === job.datasetId
  ) {
    return job
  }
  return {
    ...job,
    status,
    remoteStatus: snapshot.remoteStatus,
    statusMessage: snapshot.statusMessage,
    datasetId: snapshot.datasetId ?? job.datasetId,
  }
}

const describeRemote = (job: Job): string =>
  `${job.remoteStatus ?? "unknown"}${job.statusMessage ? ` (${sanitizeForError(job.statusMessage)})` : ""}`

/**
 * Polls until the job reaches a terminal state. Resolves with the succeeded job;
 * rejects with `JobFailedError` on remote failure, deadline or exhausted poll retries,
 * and with `CancellationError` when `signal` aborts (the remote run keeps going).
 */
export const pollJob = async (job: Job, deps: PollDeps): Promise<Job> => {
  const clock = deps.clock ?? systemClock
  const intervalMs = deps.intervalMs ?? DEFAULT_POLL_INTERVAL_MS
  const timeoutMs = deps.timeoutMs ?? DEFAULT_WAIT_TIMEOUT_MS
  const deadline = clock.now() + timeoutMs
  const timedOut = (current: Job) =>
    new JobFailedError({
      status: "timed-out",
      message: `Run ${current.remoteRunId} did not finish within ${Math.round(timeoutMs / 1000)}s (last status: ${describeRemote(current)})`,
      remoteStatus: current.remoteStatus,
      statusMessage: current.statusMessage,
    })

  let current = job
  for (;;) {
    throwIfAborted(deps.signal)

    let snapshot: RemoteRunSnapshot
    try {
      snapshot = await retry(() => deps.statusSource.getRun(current.remoteRunId, deps.signal), {
        retries: deps.retries ?? DEFAULT_POLL_RETRIES,
        minDelayMs: Math.min(1_000, intervalMs),
        maxDelayMs: Math.max(intervalMs, 1_000) * 4,
        shouldRetry: (error) => !isCancellationError(error) && isTransientHttpError(error),
        delayBudgetMs: () => deadline - clock.now(),
        onRetry: deps.onRetry,
        clock,
        signal: deps.signal,
      })
    } catch (error) {
      if (isCancellationError(error)) {
        throw error
      }
      if (clock.now() >= deadline) {
        throw timedOut(current)
      }
      throw new JobFailedError({
        status: "failed",
        message: `Could not read the status of run ${current.remoteRunId}: ${sanitizeForError(getErrorMessage(error))}`,
        remoteStatus: current.remoteStatus,
        statusMessage: current.statusMessage,
        cause: error,
      })
    }

    const next = applySnapshot(current, snapshot)
    if (next !== current) {
      current = next
      deps.onStatus?.(current)
    }

    if (isTerminalStatus(current.status)) {
      if (current.status === "succeeded") {
        return current
      }
      throw new JobFailedError({
        status: current.status,
        message: `Run ${current.remoteRunId} ended with ${describeRemote(current)}`,
        remoteStatus: current.remoteStatus,
        statusMessage: current.statusMessage,
      })
    }

    const remainingMs = deadline - clock.now()
    if (remainingMs <= 0) {
      throw timedOut(current)
    }
    await clock.sleep(Math.min(intervalMs, remainingMs), deps.signal)
  }
}
