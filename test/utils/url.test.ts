import { describe, expect, it } from "vitest"

import { buildUrl, joinUrl } from "../../src/utils/url.js"

describe("buildUrl", () => {
  it("encodes query params", () => {
    const url = buildUrl("https://example.com", {
      a: 1,
      b: "hello world",
      c: ["x", "y"],
      empty: null,
    })
    expect(url).toBe("https://example.com?a=1&b=hello+world&c=x&c=y")
  })

  it("returns the base when no param is set", () => {
    expect(buildUrl("https://example.com/x", { skip: undefined })).toBe("https://example.com/x")
  })
})

describe("joinUrl", () => {
  it("joins and encodes path segments", () => {
    expect(joinUrl("https://api.apify.com/v2/", "acts", "user~actor", "runs")).toBe(
      "https://api.apify.com/v2/acts/user~actor/runs",
    )
    expect(joinUrl("https://h.test", "a b")).toBe("https://h.test/a%20b")
  })
})
