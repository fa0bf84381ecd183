import type { ExportOutcome } from "../export/index.js"
import type { RunResult, TargetOutcome } from "../pipeline/types.js"
import { describeTarget } from "../schema/targets.js"

export const targetStatusLabel = (outcome: TargetOutcome): string => {
  if (outcome.status === "failed") {
    return "failed"
  }
  return outcome.resumed ? "resumed" : "ok"
}

export const targetRow = (outcome: TargetOutcome): [string, string, string, string, string] => [
  describeTarget(outcome.target),
  targetStatusLabel(outcome),
  outcome.jobId ?? "-",
  outcome.status === "succeeded" ? String(outcome.recordCount) : "-",
  outcome.status === "failed" ? `${outcome.failure.code}: ${outcome.failure.message}` : "",
]

export const exportRow = (outcome: ExportOutcome): [string, string, string] => [
  outcome.format,
  outcome.path,
  outcome.status === "written" ? `${outcome.count} records` : `failed: ${outcome.error.message}`,
]

export const skippedLine = (result: RunResult): string | null => {
  const { invalid, placeholders, duplicates, filtered } = result.skipped
  const parts = [
    invalid > 0 ? `${invalid} invalid` : null,
    placeholders > 0 ? `${placeholders} empty-result markers` : null,
    duplicates > 0 ? `${duplicates} duplicates` : null,
    filtered > 0 ? `${filtered} filtered out` : null,
  ].filter((part): part is string => part !== null)
  return parts.length > 0 ? `Skipped: ${parts.join(", ")}` : null
}
