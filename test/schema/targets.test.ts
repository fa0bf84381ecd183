import { describe, expect, it } from "vitest"

import { SubmissionError } from "../../src/errors.js"
import { describeTarget, type TargetDescriptor, targetKey, validateTarget } from "../../src/schema/targets.js"

const target = (extra: Partial<TargetDescriptor> = {}): TargetDescriptor => ({
  platform: "telegram",
  kind: "channel",
  value: "alpha",
  limit: 10,
  ...extra,
})

describe("validateTarget", () => {
  it("accepts a well-formed target", () => {
    const valid = target({ dateRange: { from: new Date("2024-01-01"), to: new Date("2024-02-01") } })
    expect(validateTarget(valid)).toBe(valid)
  })

  it.each([
    ["empty value", target({ value: "  " }), "target value must not be empty (path: value)"],
    ["zero limit", target({ limit: 0 }), "limit must be a positive integer (path: limit)"],
    [
      "reversed dates",
      target({ dateRange: { from: new Date("2024-02-01"), to: new Date("2024-01-01") } }),
      "date range start is after its end (path: dateRange)",
    ],
    ["reversed posts", target({ postRange: { from: 9, to: 3 } }), "post range start is after its end (path: postRange)"],
  ])("rejects %s", (_label, invalid, message) => {
    let caught: unknown
    try {
      validateTarget(invalid)
    } catch (error) {
      caught = error
    }
    expect(caught).toBeInstanceOf(SubmissionError)
    expect(caught).toMatchObject({ reason: "invalid-target", message: `Invalid target "${invalid.value}": ${message}` })
  })
})

describe("target identity", () => {
  it("keys targets by platform, kind and value", () => {
    expect(targetKey(target())).toBe("telegram:channel:alpha")
  })

  it("quotes search terms in messages", () => {
    expect(describeTarget({ kind: "search", value: "mars rover" })).toBe('"mars rover"')
    expect(describeTarget({ kind: "handle", value: "nasa" })).toBe("nasa")
  })
})
