import ExcelJS from "exceljs"
import JSZip from "jszip"

import { CANONICAL_COLUMNS, type CanonicalColumn, type CanonicalRecord } from "../schema/canonical.js"
import { MEDIA_URL_SEPARATOR } from "./csv.js"

export const XLSX_SHEET_NAME = "records"

// Excel refuses longer cell text.
const MAX_CELL_LENGTH = 32_767

// Workbook properties and zip entry times, so repeated exports are byte-identical.
const WORKBOOK_DATE = new Date(Date.UTC(2000, 0, 1))

const COLUMN_WIDTHS: Record<CanonicalColumn, number> = {
  id: 16,
  source: 20,
  timestamp: 26,
  text: 80,
  views: 10,
  forwards: 10,
  replies: 10,
  url: 40,
  has_media: 10,
  media_urls: 60,
}

const cellText = (value: string): string => (value.length > MAX_CELL_LENGTH ? value.slice(0, MAX_CELL_LENGTH) : value)

export const renderXlsx = async (records: readonly CanonicalRecord[]): Promise<Uint8Array> => {
  const workbook = new ExcelJS.Workbook()
  workbook.creator = "social-scrape"
  workbook.created = WORKBOOK_DATE
  workbook.modified = WORKBOOK_DATE

  const sheet = workbook.addWorksheet(XLSX_SHEET_NAME)
  sheet.columns = CANONICAL_COLUMNS.map((column) => ({ header: column, key: column, width: COLUMN_WIDTHS[column] }))
  sheet.getRow(1).font = { bold: true }
  for (const record of records) {
    sheet.addRow({
      id: record.id,
      source: record.source,
      timestamp: record.timestamp,
      text: cellText(record.text),
      views: record.views,
      forwards: record.forwards,
      replies: record.replies,
      url: record.url,
      has_media: record.has_media,
      media_urls: cellText(record.media_urls.join(MEDIA_URL_SEPARATOR)),
    })
  }

  const buffer = await workbook.xlsx.writeBuffer()
  return restampEntries(new Uint8Array(buffer))
}

/** ExcelJS stamps every zip entry with the current time; pin them to `WORKBOOK_DATE`. */
const restampEntries = async (archive: Uint8Array): Promise<Uint8Array> => {
  const zip = await JSZip.loadAsync(archive)
  zip.forEach((_path, entry) => {
    entry.date = WORKBOOK_DATE
  })
  return zip.generateAsync({ type: "uint8array", compression: "DEFLATE", compressionOptions: { level: 6 } })
}
