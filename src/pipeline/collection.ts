import type { CanonicalRecord } from "../schema/canonical.js"
import type { DateRange } from "../schema/targets.js"

export interface RecordFilters {
  /** Case-insensitive substrings; a record matches when its text contains any. */
  keywords: readonly string[]
  minViews: number
  dateRange?: DateRange
}

export const NO_FILTERS: RecordFilters = { keywords: [], minViews: 0 }

export const recordKey = (record: Pick<CanonicalRecord, "id" | "source">): string =>
  JSON.stringify([record.source, record.id])

/** Keeps the first occurrence of every `(id, source)`, in order of first appearance. */
export const buildOutputCollection = (records: Iterable<CanonicalRecord>): CanonicalRecord[] => {
  const seen = new Set<string>()
  const collection: CanonicalRecord[] = []
  for (const record of records) {
    const key = recordKey(record)
    if (seen.has(key)) {
      continue
    }
    seen.add(key)
    collection.push(record)
  }
  return collection
}

const matchesDateRange = (record: CanonicalRecord, range: DateRange | undefined): boolean => {
  if (!range || (!range.from && !range.to)) {
    return true
  }
  if (record.timestamp === null) {
    return false
  }
  const time = Date.parse(record.timestamp)
  if (range.from && time < range.from.getTime()) {
    return false
  }
  return !(range.to && time > range.to.getTime())
}

export const applyFilters = (records: readonly CanonicalRecord[], filters: RecordFilters): CanonicalRecord[] => {
  const keywords = filters.keywords.map((keyword) => keyword.toLowerCase()).filter(Boolean)
  return records.filter((record) => {
    if (keywords.length > 0) {
      const text = record.text.toLowerCase()
      if (!keywords.some((keyword) => text.includes(keyword))) {
        return false
      }
    }
    if (filters.minViews > 0 && record.views < filters.minViews) {
      return false
    }
    return matchesDateRange(record, filters.dateRange)
  })
}
