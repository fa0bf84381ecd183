import { join } from "node:path"

import { describe, expect, it } from "vitest"

import { type CliOptions, nowRunId, parseCliOptions, resolveSettings } from "../src/cli-options.js"
import type { ScrapeConfig } from "../src/scrape-config.js"

const NOW = new Date(2024, 2, 5, 10, 20, 30)
const RUN_ID = "20240305_102030"

const cli = (raw: Record<string, unknown> = {}): CliOptions => parseCliOptions(raw)

describe("parseCliOptions", () => {
  it("coerces numeric strings and fills flag defaults", () => {
    expect(parseCliOptions({ maxPosts: "25", concurrency: 3 })).toMatchObject({
      maxPosts: 25,
      concurrency: 3,
      history: true,
      plain: false,
      verbose: false,
    })
  })

  it("names the offending option", () => {
    expect(() => parseCliOptions({ maxPosts: "0" })).toThrow(/^Invalid option \(maxPosts\): /)
    expect(() => parseCliOptions({ concurrency: "abc" })).toThrow(/^Invalid option \(concurrency\): /)
    expect(() => parseCliOptions({ runId: "my run" })).toThrow(
      "Invalid option (runId): use letters, digits, dot, dash or underscore",
    )
    expect(() => parseCliOptions({ formats: ["pdf"] })).toThrow(/^Invalid option \(formats\.0\): /)
  })
})

describe("nowRunId", () => {
  it("formats the local time", () => {
    expect(nowRunId(new Date(2026, 1, 15, 14, 30, 22))).toBe("20260215_143022")
  })
})

describe("resolveSettings", () => {
  it("applies defaults for a Telegram run", () => {
    const settings = resolveSettings("telegram", cli({ channels: ["@alpha", "https://t.me/beta/5"] }), {}, NOW)

    expect(settings).toMatchObject({
      platform: "telegram",
      runId: RUN_ID,
      resume: false,
      backend: "auto",
      input: { downloadMedia: false, sort: "Latest", lang: null },
      filters: { keywords: [], minViews: 0 },
      exports: [{ format: "csv", path: join("output", `telegram_${RUN_ID}.csv`) }],
      waitTimeoutMs: 300_000,
      pollIntervalMs: 5_000,
      memoryMb: undefined,
      concurrency: 1,
      history: { dbPath: undefined },
    })
    expect(settings.actor.key).toBe("media")
    expect(settings.targets).toEqual([
      { platform: "telegram", kind: "channel", value: "alpha", limit: 50, days: 7 },
      { platform: "telegram", kind: "channel", value: "beta", limit: 50, days: 7 },
    ])
  })

  it("takes config values the command line leaves out", () => {
    const config: ScrapeConfig = {
      telegram: { channels: ["gamma"], maxPosts: 30, actor: "messages" },
      output: { dir: "exports", formats: ["json", "csv"] },
      filters: { keywords: ["launch", " "], minViews: 5 },
      polling: { waitTimeoutSec: 60, concurrency: 2 },
    }

    const settings = resolveSettings("telegram", cli({ concurrency: "4" }), config, NOW)

    expect(settings.actor.key).toBe("messages")
    expect(settings.targets.map((target) => [target.value, target.limit])).toEqual([["gamma", 30]])
    expect(settings.exports).toEqual([
      { format: "csv", path: join("exports", `telegram_${RUN_ID}.csv`) },
      { format: "json", path: join("exports", `telegram_${RUN_ID}.json`) },
    ])
    expect(settings.filters).toEqual({ keywords: ["launch"], minViews: 5 })
    expect(settings.waitTimeoutMs).toBe(60_000)
    expect(settings.concurrency).toBe(4)
  })

  it("adds the format of an explicit output path", () => {
    const settings = resolveSettings("telegram", cli({ channels: ["alpha"], outExcel: "report.xlsx" }), {}, NOW)

    expect(settings.exports).toEqual([
      { format: "csv", path: join("output", `telegram_${RUN_ID}.csv`) },
      { format: "xlsx", path: "report.xlsx" },
    ])
  })

  it("lets X targets on the command line replace the config lists", () => {
    const config: ScrapeConfig = { x: { handles: ["esa"], searchTerms: ["ai"] } }

    const settings = resolveSettings("x", cli({ handles: ["@nasa"] }), config, NOW)

    expect(settings.actor.key).toBe("ppr")
    expect(settings.targets).toEqual([{ platform: "x", kind: "handle", value: "nasa", limit: 20 }])
  })

  it("uses every X list of the config when the command line names none", () => {
    const config: ScrapeConfig = { x: { handles: ["esa"], searchTerms: ["ai news"], actor: "full", urls: ["https://x.com/a/status/1"] } }

    const settings = resolveSettings("x", cli({ maxTweets: "5" }), config, NOW)

    expect(settings.targets.map((target) => [target.kind, target.value, target.limit])).toEqual([
      ["handle", "esa", 5],
      ["search", "ai news", 5],
      ["url", "https://x.com/a/status/1", 5],
    ])
  })

  it("refuses targets the actor cannot take", () => {
    expect(() => resolveSettings("x", cli({ urls: ["https://x.com/a/status/1"] }), {}, NOW)).toThrow(
      "The ppr actor does not take url targets (accepts: handle, search)",
    )
  })

  it("needs at least one target", () => {
    expect(() => resolveSettings("linkedin", cli(), {}, NOW)).toThrow(
      "No targets: pass --profiles or list them in the config file",
    )
    expect(() => resolveSettings("x", cli(), {}, NOW)).toThrow(
      "No targets: pass --handles, --search or --urls or list them in the config file",
    )
  })

  it("names valid actors for an unknown one", () => {
    expect(() => resolveSettings("telegram", cli({ channels: ["alpha"], actor: "nope" }), {}, NOW)).toThrow(
      `Unknown Telegram actor "nope". Choose one of: media, posts, messages, channel`,
    )
  })

  it("makes a bare end date inclusive", () => {
    const settings = resolveSettings(
      "linkedin",
      cli({ profiles: ["jane-doe"], dateFrom: "2024-03-01", dateTo: "2024-03-05" }),
      {},
      NOW,
    )

    expect(settings.targets[0]?.dateRange?.from?.toISOString()).toBe("2024-03-01T00:00:00.000Z")
    expect(settings.targets[0]?.dateRange?.to?.toISOString()).toBe("2024-03-05T23:59:59.999Z")
    expect(settings.filters.dateRange).toBe(settings.targets[0]?.dateRange)
  })

  it("rejects unusable dates", () => {
    expect(() => resolveSettings("telegram", cli({ channels: ["a"], dateFrom: "soon" }), {}, NOW)).toThrow(
      `Invalid option (dateFrom): unrecognized date "soon"`,
    )
    expect(() =>
      resolveSettings("telegram", cli({ channels: ["a"], dateFrom: "2024-03-05", dateTo: "2024-03-01" }), {}, NOW),
    ).toThrow("Invalid option (dateFrom): date range start is after its end")
  })

  it("fills in a Telegram post range", () => {
    const from = resolveSettings("telegram", cli({ channels: ["a"], postsFrom: "5" }), {}, NOW)
    const to = resolveSettings("telegram", cli({ channels: ["a"], postsTo: "3" }), {}, NOW)

    expect(from.targets[0]?.postRange).toEqual({ from: 5, to: 5 })
    expect(to.targets[0]?.postRange).toEqual({ from: 1, to: 3 })
    expect(() => resolveSettings("telegram", cli({ channels: ["a"], postsFrom: "9", postsTo: "3" }), {}, NOW)).toThrow(
      "Invalid option (postsFrom): post range start is after its end",
    )
  })

  it("reuses the run id on resume", () => {
    const settings = resolveSettings("telegram", cli({ channels: ["a"], resume: "20240101_000000" }), {}, NOW)

    expect(settings).toMatchObject({ runId: "20240101_000000", resume: true })
    expect(() =>
      resolveSettings("telegram", cli({ channels: ["a"], resume: "r1", runId: "r2" }), {}, NOW),
    ).toThrow("Invalid option (resume): --resume and --run-id name different runs")
    expect(() =>
      resolveSettings("telegram", cli({ channels: ["a"], resume: "r1", history: false }), {}, NOW),
    ).toThrow("Invalid option (resume): --resume needs the run history; drop --no-history")
  })

  it("turns history off", () => {
    expect(resolveSettings("telegram", cli({ channels: ["a"], history: false }), {}, NOW).history).toBeNull()
  })
})
