import ExcelJS from "exceljs"
import { describe, expect, it } from "vitest"

import { renderXlsx, XLSX_SHEET_NAME } from "../../src/export/xlsx.js"
import { CANONICAL_COLUMNS } from "../../src/schema/canonical.js"
import { record } from "../helpers/records.js"

const readBack = async (bytes: Uint8Array): Promise<ExcelJS.Worksheet> => {
  const workbook = new ExcelJS.Workbook()
  await workbook.xlsx.load(Buffer.from(bytes))
  const sheet = workbook.getWorksheet(XLSX_SHEET_NAME)
  if (!sheet) {
    throw new Error(`missing sheet ${XLSX_SHEET_NAME}`)
  }
  return sheet
}

describe("renderXlsx", () => {
  it("writes one sheet with a header row and typed cells", async () => {
    const sheet = await readBack(
      await renderXlsx([
        record("1", { views: 42, mediaUrls: ["https://cdn.test/a.jpg", "https://cdn.test/b.jpg"] }),
        record("2", { text: "second" }),
      ]),
    )

    expect(sheet.rowCount).toBe(3)
    expect(CANONICAL_COLUMNS.map((_, index) => sheet.getRow(1).getCell(index + 1).value)).toEqual([
      ...CANONICAL_COLUMNS,
    ])
    const first = sheet.getRow(2)
    expect(first.getCell(1).value).toBe("1")
    expect(first.getCell(3).value).toBe("2024-03-05T10:20:30.000Z")
    expect(first.getCell(5).value).toBe(42)
    expect(first.getCell(9).value).toBe(true)
    expect(first.getCell(10).value).toBe("https://cdn.test/a.jpg | https://cdn.test/b.jpg")
    expect(sheet.getRow(3).getCell(4).value).toBe("second")
  })

  it("cuts text to the cell limit", async () => {
    const sheet = await readBack(await renderXlsx([record("1", { text: "a".repeat(40_000) })]))
    const text = sheet.getRow(2).getCell(4).value
    expect(typeof text === "string" ? text.length : 0).toBe(32_767)
  })
})
