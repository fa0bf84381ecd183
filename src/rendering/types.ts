import type { BackendName } from "../backends/types.js"
import type { ExportOutcome } from "../export/index.js"
import type { RunResult, TargetOutcome } from "../pipeline/types.js"
import type { Platform } from "../schema/targets.js"

export type VerboseLog = (scope: string, message: string) => void

export interface ServiceStatus {
  name: string
  ready: boolean
  required?: boolean
}

export interface RunHeader {
  runId: string
  platform: Platform
  actorName: string
  backend: BackendName
  targetCount: number
  outputs: string[]
  resumed: boolean
}

export interface SpinnerHandle {
  update(text: string): void
  succeed(text?: string): void
  fail(text?: string): void
  warn(text?: string): void
}

export interface CliRenderer {
  // --- Setup ---
  header(info: RunHeader): void
  envTable(services: ServiceStatus[]): void

  // --- Batches ---
  createSpinner(text: string): SpinnerHandle
  targetDone(outcome: TargetOutcome): void
  exportDone(outcome: ExportOutcome): void

  // --- General ---
  logVerbose(scope: string, message: string, elapsedSec: number): void
  runSummary(result: RunResult, elapsedSeconds: number): void
  warn(message: string): void
  error(message: string): void
}
