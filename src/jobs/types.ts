import type { Platform, TargetDescriptor } from "../schema/targets.js"

export const JOB_STATUSES = ["queued", "running", "succeeded", "failed", "timed-out"] as const
export type JobStatus = (typeof JOB_STATUSES)[number]

export type TerminalJobStatus = Extract<JobStatus, "succeeded" | "failed" | "timed-out">

/** A remote run of one actor over one batch of targets. Never mutated: transitions produce a new value. */
export interface Job {
  readonly id: string
  readonly platform: Platform
  readonly actorKey: string
  readonly targets: readonly TargetDescriptor[]
  readonly remoteRunId: string
  readonly status: JobStatus
  readonly submittedAt: Date
  readonly datasetId: string | null
  readonly remoteStatus: string | null
  readonly statusMessage: string | null
}

/** What one status poll learned about the remote run. */
export interface RemoteRunSnapshot {
  remoteStatus: string
  statusMessage: string | null
  datasetId: string | null
}

export interface RunStatusSource {
  getRun(remoteRunId: string, signal?: AbortSignal): Promise<RemoteRunSnapshot>
}

export interface DatasetSource {
  getDatasetItemCount(datasetId: string, signal?: AbortSignal): Promise<number | null>
  listDatasetItems(datasetId: string, offset: number, limit: number, signal?: AbortSignal): Promise<unknown[]>
}

export interface RunStarter {
  startRun(actorId: string, input: Record<string, unknown>, options: { memoryMb?: number; signal?: AbortSignal }): Promise<{
    remoteRunId: string | null
    datasetId: string | null
    remoteStatus: string | null
  }>
}
