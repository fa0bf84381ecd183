import { describe, expect, it } from "vitest"

import { normalizeItems } from "../../src/normalize/registry.js"

describe("normalizeItems", () => {
  it("separates records, invalid items and placeholders", () => {
    const result = normalizeItems(
      [{ id: 1, channel: "alpha", text: "first" }, { noResults: true }, { text: "no id" }, "not an item"],
      "telegram-actor",
      { platform: "telegram", fallbackSource: null },
    )

    expect(result.records.map((record) => record.id)).toEqual(["1"])
    expect(result.placeholders).toBe(1)
    expect(result.invalid.map((error) => error.message)).toEqual([
      "Telegram item has no message id",
      "Expected an object item, got string",
    ])
  })

  it("dispatches on the schema variant", () => {
    const tweet = { id: "9", author: { userName: "nasa" }, text: "launch" }
    const result = normalizeItems([tweet], "x-tweet", { platform: "x", fallbackSource: null })

    expect(result.records[0]).toMatchObject({ id: "9", source: "nasa", url: "https://x.com/nasa/status/9" })
  })

  it("returns empty results for an empty batch", () => {
    expect(normalizeItems([], "linkedin-post", { platform: "linkedin", fallbackSource: null })).toEqual({
      records: [],
      invalid: [],
      placeholders: 0,
    })
  })
})
