import { stringify } from "csv-stringify/sync"

import { CANONICAL_COLUMNS, type CanonicalRecord } from "../schema/canonical.js"

export const MEDIA_URL_SEPARATOR = " | "

export const toCsvRow = (record: CanonicalRecord): string[] => [
  record.id,
  record.source,
  record.timestamp ?? "",
  record.text,
  String(record.views),
  String(record.forwards),
  String(record.replies),
  record.url ?? "",
  record.has_media ? "true" : "false",
  record.media_urls.join(MEDIA_URL_SEPARATOR),
]

/** UTF-8 with a BOM so spreadsheet apps pick the right encoding. */
export const renderCsv = (records: readonly CanonicalRecord[]): string =>
  stringify(records.map(toCsvRow), {
    header: true,
    columns: [...CANONICAL_COLUMNS],
    bom: true,
  })
