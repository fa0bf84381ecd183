import { describe, expect, it } from "vitest"

import { parseDateOption, toIsoTimestamp } from "../../src/normalize/dates.js"

const EXPECTED = "2024-03-05T10:20:30.000Z"

describe("toIsoTimestamp", () => {
  it.each([
    ["ISO 8601 with Z", "2024-03-05T10:20:30Z"],
    ["ISO 8601 with offset", "2024-03-05T12:20:30+02:00"],
    ["ISO 8601 with compact offset", "2024-03-05T04:50:30-0530"],
    ["ISO 8601 without offset", "2024-03-05T10:20:30"],
    ["space separated", "2024-03-05 10:20:30"],
    ["X created_at", "Tue Mar 05 10:20:30 +0000 2024"],
    ["RFC 2822", "Tue, 5 Mar 2024 12:20:30 +0200"],
    ["RFC 2822 GMT", "05 Mar 2024 10:20:30 GMT"],
    ["unix seconds", 1_709_634_030],
    ["unix milliseconds", 1_709_634_030_000],
    ["unix seconds as text", "1709634030"],
    ["Date", new Date(Date.UTC(2024, 2, 5, 10, 20, 30))],
  ])("reads %s", (_label, value) => {
    expect(toIsoTimestamp(value)).toBe(EXPECTED)
  })

  it("keeps millisecond precision and drops finer digits", () => {
    expect(toIsoTimestamp("2024-03-05T10:20:30.123456Z")).toBe("2024-03-05T10:20:30.123Z")
    expect(toIsoTimestamp("2024-03-05T10:20:30.5Z")).toBe("2024-03-05T10:20:30.500Z")
  })

  it("reads bare dates and minutes-only times as UTC", () => {
    expect(toIsoTimestamp("2024-03-05")).toBe("2024-03-05T00:00:00.000Z")
    expect(toIsoTimestamp("2024-03-05 10:20")).toBe("2024-03-05T10:20:00.000Z")
    expect(toIsoTimestamp("05 Mar 2024 10:20 GMT")).toBe("2024-03-05T10:20:00.000Z")
  })

  it("checks calendar days", () => {
    expect(toIsoTimestamp("2024-02-29")).toBe("2024-02-29T00:00:00.000Z")
    expect(toIsoTimestamp("2023-02-29")).toBeNull()
    expect(toIsoTimestamp("2024-04-31")).toBeNull()
    expect(toIsoTimestamp("2024-13-01")).toBeNull()
    expect(toIsoTimestamp("2024-03-05T24:00:00Z")).toBeNull()
  })

  it("keeps years below 100 as written", () => {
    expect(toIsoTimestamp("0050-01-01")).toBe("0050-01-01T00:00:00.000Z")
    expect(toIsoTimestamp("0004-02-29T12:00:00Z")).toBe("0004-02-29T12:00:00.000Z")
    expect(toIsoTimestamp("0001-02-29")).toBeNull()
  })

  it("returns null for anything unreadable", () => {
    expect(toIsoTimestamp("yesterday")).toBeNull()
    expect(toIsoTimestamp("")).toBeNull()
    expect(toIsoTimestamp(-5)).toBeNull()
    expect(toIsoTimestamp(null)).toBeNull()
    expect(toIsoTimestamp({ date: "2024-03-05" })).toBeNull()
    expect(toIsoTimestamp(new Date("not a date"))).toBeNull()
    expect(toIsoTimestamp("Xyz Foo 05 10:20:30 +0000 2024")).toBeNull()
  })
})

describe("parseDateOption", () => {
  it("reads a bare date as the start of the day", () => {
    expect(parseDateOption("2024-01-31")?.toISOString()).toBe("2024-01-31T00:00:00.000Z")
  })

  it("moves a bare end date to the last millisecond of the day", () => {
    expect(parseDateOption("2024-01-31", { endOfDay: true })?.toISOString()).toBe("2024-01-31T23:59:59.999Z")
    expect(parseDateOption("2024-01-31T10:00:00Z", { endOfDay: true })?.toISOString()).toBe(
      "2024-01-31T10:00:00.000Z",
    )
  })

  it("returns null for unreadable input", () => {
    expect(parseDateOption("31/01/2024")).toBeNull()
  })
})
