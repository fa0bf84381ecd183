import { ExportError } from "../errors.js"
import type { CanonicalRecord } from "../schema/canonical.js"
import type { ExportFormat } from "../schema/targets.js"
import { isCancellationError, throwIfAborted } from "../utils/cancel.js"
import { getErrorMessage, sanitizeForError } from "../utils/sanitize.js"
import { writeFileAtomic } from "./atomic-write.js"
import { renderCsv } from "./csv.js"
import { renderJson } from "./json.js"
import { renderXlsx } from "./xlsx.js"

export interface ExportDestination {
  format: ExportFormat
  path: string
}

export type ExportOutcome =
  | { format: ExportFormat; path: string; status: "written"; count: number }
  | { format: ExportFormat; path: string; status: "failed"; error: ExportError }

const RENDERERS: Record<ExportFormat, (records: readonly CanonicalRecord[]) => string | Promise<Uint8Array>> = {
  csv: renderCsv,
  json: renderJson,
  xlsx: renderXlsx,
}

export const exportRecords = async (
  records: readonly CanonicalRecord[],
  destination: ExportDestination,
  signal?: AbortSignal,
): Promise<void> => {
  try {
    const data = await RENDERERS[destination.format](records)
    await writeFileAtomic(destination.path, data, signal)
  } catch (error) {
    if (isCancellationError(error)) {
      throw error
    }
    throw new ExportError(
      destination.format,
      destination.path,
      `Could not write ${destination.format.toUpperCase()} to ${destination.path}: ${sanitizeForError(getErrorMessage(error))}`,
      { cause: error },
    )
  }
}

/** Writes every destination; a failing format never prevents the others. */
export const exportCollection = async (
  records: readonly CanonicalRecord[],
  destinations: readonly ExportDestination[],
  signal?: AbortSignal,
): Promise<ExportOutcome[]> => {
  const outcomes: ExportOutcome[] = []
  for (const destination of destinations) {
    throwIfAborted(signal)
    try {
      await exportRecords(records, destination, signal)
      outcomes.push({ ...destination, status: "written", count: records.length })
    } catch (error) {
      if (!(error instanceof ExportError)) {
        throw error
      }
      outcomes.push({ ...destination, status: "failed", error })
    }
  }
  return outcomes
}
