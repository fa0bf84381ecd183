import { describe, expect, it } from "vitest"

import { renderCsv, toCsvRow } from "../../src/export/csv.js"
import { makeCanonicalRecord } from "../../src/schema/canonical.js"
import { record } from "../helpers/records.js"

const HEADER = "id,source,timestamp,text,views,forwards,replies,url,has_media,media_urls"

describe("renderCsv", () => {
  it("writes a BOM, the header and one line per record", () => {
    const csv = renderCsv([
      record("1", {
        text: "hello, world",
        replies: 2,
        mediaUrls: ["https://cdn.test/a.jpg", "https://cdn.test/b.jpg"],
      }),
      makeCanonicalRecord({ id: "2", source: "alpha" }),
    ])

    expect(csv).toBe(
      [
        `\ufeff${HEADER}`,
        '1,alpha,2024-03-05T10:20:30.000Z,"hello, world",10,0,2,https://t.me/alpha/1,true,https://cdn.test/a.jpg | https://cdn.test/b.jpg',
        "2,alpha,,,0,0,0,,false,",
        "",
      ].join("\n"),
    )
  })

  it("escapes quotes inside text", () => {
    const lines = renderCsv([record("3", { text: 'say "hi"' })]).split("\n")
    expect(lines[1]).toBe('3,alpha,2024-03-05T10:20:30.000Z,"say ""hi""",10,0,0,https://t.me/alpha/3,false,')
  })

  it("renders the same bytes for the same records", () => {
    const records = [record("1"), record("2", { hasMedia: true })]
    expect(renderCsv(records)).toBe(renderCsv(records))
  })
})

describe("toCsvRow", () => {
  it("writes booleans and empty values as text", () => {
    expect(toCsvRow(makeCanonicalRecord({ id: "9", source: "beta", hasMedia: true }))).toEqual([
      "9",
      "beta",
      "",
      "",
      "0",
      "0",
      "0",
      "",
      "true",
      "",
    ])
  })
})
