import type { JobStatus } from "./jobs/types.js"
import type { ExportFormat, Platform } from "./schema/targets.js"

export type SubmissionErrorReason = "auth" | "invalid-target" | "rejected"

export class SubmissionError extends Error {
  readonly code = "SUBMISSION_FAILED"
  readonly reason: SubmissionErrorReason

  constructor(reason: SubmissionErrorReason, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = "SubmissionError"
    this.reason = reason
  }
}

export class JobFailedError extends Error {
  readonly code = "JOB_FAILED"
  readonly status: Extract<JobStatus, "failed" | "timed-out">
  readonly remoteStatus: string | null
  readonly statusMessage: string | null
  /** Tail of the remote run log, when it was fetched. */
  logTail: string | null = null

  constructor(args: {
    status: Extract<JobStatus, "failed" | "timed-out">
    message: string
    remoteStatus?: string | null
    statusMessage?: string | null
    cause?: unknown
  }) {
    super(args.message, { cause: args.cause })
    this.name = "JobFailedError"
    this.status = args.status
    this.remoteStatus = args.remoteStatus ?? null
    this.statusMessage = args.statusMessage ?? null
  }
}

export class FetchError extends Error {
  readonly code = "FETCH_FAILED"
  readonly offset: number | null

  constructor(message: string, options?: { offset?: number; cause?: unknown }) {
    super(message, { cause: options?.cause })
    this.name = "FetchError"
    this.offset = options?.offset ?? null
  }
}

export class ExportError extends Error {
  readonly code = "EXPORT_FAILED"
  readonly format: ExportFormat
  readonly path: string

  constructor(format: ExportFormat, path: string, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = "ExportError"
    this.format = format
    this.path = path
  }
}

export class InvalidRecordError extends Error {
  readonly code = "INVALID_RECORD"
  readonly platform: Platform

  constructor(platform: Platform, message: string) {
    super(message)
    this.name = "InvalidRecordError"
    this.platform = platform
  }
}
