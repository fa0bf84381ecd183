import type { Job, RemoteRunSnapshot, RunStatusSource } from "../../src/jobs/types.js"
import type { TargetDescriptor } from "../../src/schema/targets.js"

export const alphaTarget: TargetDescriptor = { platform: "telegram", kind: "channel", value: "alpha", limit: 10 }

export const makeJob = (overrides: Partial<Job> = {}): Job => ({
  id: "telegram:media:run-1",
  platform: "telegram",
  actorKey: "media",
  targets: [alphaTarget],
  remoteRunId: "run-1",
  status: "queued",
  submittedAt: new Date("2024-03-05T10:00:00Z"),
  datasetId: "d1",
  remoteStatus: "READY",
  statusMessage: null,
  ...overrides,
})

export const snapshot = (remoteStatus: string, extra: Partial<RemoteRunSnapshot> = {}): RemoteRunSnapshot => ({
  remoteStatus,
  statusMessage: null,
  datasetId: "d1",
  ...extra,
})

/** Answers each poll with the next scripted step; the last one repeats. */
export class ScriptedRunStatus implements RunStatusSource {
  calls = 0

  constructor(private readonly script: ReadonlyArray<RemoteRunSnapshot | Error>) {}

  getRun(): Promise<RemoteRunSnapshot> {
    const step = this.script[Math.min(this.calls, this.script.length - 1)]
    this.calls += 1
    return step instanceof Error ? Promise.reject(step) : Promise.resolve(step)
  }
}
