import type { BackendName } from "../backends/types.js"
import type { ExportOutcome } from "../export/index.js"
import type { CanonicalRecord } from "../schema/canonical.js"
import type { Platform, TargetDescriptor } from "../schema/targets.js"

export type TargetFailureCode =
  | "SUBMISSION_FAILED"
  | "JOB_FAILED"
  | "FETCH_FAILED"
  | "CANCELLED"
  | "UNEXPECTED"

export type TargetStep = "submit" | "poll" | "fetch" | "collect" | "normalize"

export interface TargetFailure {
  code: TargetFailureCode
  platform: Platform
  step: TargetStep
  /** Identifier of the failing target. Never contains secrets. */
  target: string
  /** Human-readable message. Never contains auth tokens or API keys. */
  message: string
  /** Last characters of the remote run log, in verbose mode. */
  logTail?: string
}

export type TargetOutcome =
  | {
      key: string
      target: TargetDescriptor
      status: "succeeded"
      jobId: string | null
      recordCount: number
      /** Records taken from the run history instead of a new scrape. */
      resumed: boolean
    }
  | {
      key: string
      target: TargetDescriptor
      status: "failed"
      jobId: string | null
      failure: TargetFailure
    }

export interface SkippedCounts {
  /** Items without id or source. */
  invalid: number
  /** Empty-result markers. */
  placeholders: number
  /** Second copies of an `(id, source)` pair. */
  duplicates: number
  /** Records dropped by keyword, view or date filters. */
  filtered: number
}

export type RunStatus = "completed" | "partial" | "cancelled"

export interface RunResult {
  runId: string
  platform: Platform
  actorKey: string
  backend: BackendName
  collection: CanonicalRecord[]
  targets: TargetOutcome[]
  exports: ExportOutcome[]
  skipped: SkippedCounts
  /** First messages of invalid items, for the summary. */
  invalidSamples: string[]
}
