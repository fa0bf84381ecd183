import type { Job } from "../jobs/types.js"
import type { SchemaVariant } from "../normalize/types.js"
import type { ActorDefinition, ActorInputOptions } from "../platforms/types.js"
import type { TargetDescriptor } from "../schema/targets.js"

export const BACKEND_CHOICES = ["auto", "apify", "session"] as const
export type BackendChoice = (typeof BACKEND_CHOICES)[number]
export type BackendName = Exclude<BackendChoice, "auto">

export type BatchStep = "submit" | "poll" | "fetch" | "collect"

export interface BatchHooks {
  onStep?: (step: BatchStep, detail: string) => void
  onJob?: (job: Job) => void
}

export interface BatchRequest {
  actor: ActorDefinition
  targets: readonly TargetDescriptor[]
  input: ActorInputOptions
  signal?: AbortSignal
  hooks?: BatchHooks
}

/** Raw items of one batch, tagged with the schema they follow. */
export interface RawBatch {
  items: unknown[]
  variant: SchemaVariant
  job: Job | null
}

export interface ScrapeBackend {
  readonly name: BackendName
  /** Whether one `collect` call may carry several targets. */
  acceptsMultipleTargets(actor: ActorDefinition): boolean
  collect(request: BatchRequest): Promise<RawBatch>
  close(): Promise<void>
}
