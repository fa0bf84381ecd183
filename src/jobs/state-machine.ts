import type { JobStatus, TerminalJobStatus } from "./types.js"

export type JobEvent =
  | { type: "started" }
  | { type: "completed" }
  | { type: "failed" }
  | { type: "timed-out" }

export class InvalidTransitionError extends Error {
  readonly code = "INVALID_TRANSITION"

  constructor(
    readonly from: JobStatus,
    readonly event: JobEvent["type"],
  ) {
    super(`Invalid job transition: ${from} --${event}-->`)
    this.name = "InvalidTransitionError"
  }
}

export const isTerminalStatus = (status: JobStatus): status is TerminalJobStatus =>
  status === "succeeded" || status === "failed" || status === "timed-out"

/**
 * queued → running → {succeeded, failed, timed-out}. A queued job may also finish
 * directly (the remote run completed between two polls). Terminal states accept no event.
 */
export const transition = (status: JobStatus, event: JobEvent): JobStatus => {
  if (isTerminalStatus(status)) {
    throw new InvalidTransitionError(status, event.type)
  }
  switch (event.type) {
    case "started":
      return "running"
    case "completed":
      return "succeeded"
    case "failed":
      return "failed"
    case "timed-out":
      return "timed-out"
  }
}

const REMOTE_STATUS_MAP: Partial<Record<string, JobStatus>> = {
  READY: "queued",
  RUNNING: "running",
  ABORTING: "running",
  "TIMING-OUT": "running",
  SUCCEEDED: "succeeded",
  FAILED: "failed",
  ABORTED: "failed",
  "TIMED-OUT": "timed-out",
}

/** Unknown remote statuses are treated as still running so the deadline decides. */
export const mapRemoteStatus = (remoteStatus: string): JobStatus =>
  REMOTE_STATUS_MAP[remoteStatus.toUpperCase()] ?? "running"

/** Event that moves `current` towards `observed`, or null when nothing changed. */
export const eventFor = (current: JobStatus, observed: JobStatus): JobEvent | null => {
  if (observed === current) {
    return null
  }
  switch (observed) {
    case "queued":
      return null
    case "running":
      return { type: "started" }
    case "succeeded":
      return { type: "completed" }
    case "failed":
      return { type: "failed" }
    case "timed-out":
      return { type: "timed-out" }
  }
}
