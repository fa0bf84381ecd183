import { describe, expect, it } from "vitest"

import { actorKeysFor, getActor } from "../../src/platforms/registry.js"
import type { ActorInputOptions } from "../../src/platforms/types.js"
import type { TargetDescriptor } from "../../src/schema/targets.js"

const options: ActorInputOptions = { downloadMedia: false, sort: "Latest", lang: null }

const channel = (value: string, extra: Partial<TargetDescriptor> = {}): TargetDescriptor => ({
  platform: "telegram",
  kind: "channel",
  value,
  limit: 50,
  ...extra,
})

describe("platform registry", () => {
  it("lists actor keys per platform", () => {
    expect(actorKeysFor("telegram")).toEqual(["media", "posts", "messages", "channel"])
    expect(actorKeysFor("x")).toEqual(["ppr", "search", "full"])
    expect(actorKeysFor("linkedin")).toEqual(["profile_posts"])
  })

  it("picks the default actor and names the choices on a typo", () => {
    expect(getActor("telegram").key).toBe("media")
    expect(getActor("x").key).toBe("ppr")
    expect(() => getActor("x", "fast")).toThrow('Unknown X actor "fast". Choose one of: ppr, search, full')
  })
})

describe("Telegram actor inputs", () => {
  it("caps the media actor's posts and days", () => {
    const input = getActor("telegram", "media").buildInput(
      [channel("alpha", { limit: 500, days: 90 }), channel("beta", { days: 90 })],
      { ...options, downloadMedia: true },
    )

    expect(input).toEqual({
      channels: "alpha, beta",
      maxPosts: 200,
      daysRange: 30,
      includeText: true,
      mediaOnly: false,
      downloadMedia: true,
    })
  })

  it("passes post ranges to the posts actor", () => {
    const input = getActor("telegram", "posts").buildInput([channel("alpha", { postRange: { from: 10, to: 40 } })], options)

    expect(input).toEqual({
      channels: ["alpha"],
      postsFrom: 10,
      postsTo: 40,
      proxy: { useApifyProxy: true, apifyProxyGroups: ["RESIDENTIAL"] },
    })
  })

  it("defaults the posts range to the limit", () => {
    const input = getActor("telegram", "posts").buildInput([channel("alpha", { limit: 25 })], options)
    expect(input).toMatchObject({ postsFrom: 1, postsTo: 25 })
  })

  it("builds the single-channel messages input", () => {
    const input = getActor("telegram", "messages").buildInput([channel("alpha", { days: 3 })], options)

    expect(input).toEqual({
      telegram_url: "https://t.me/alpha",
      max_results: 50,
      download_medias: "text",
      start_date: "3 days",
    })
  })

  it("asks the channel actor for messages", () => {
    const actor = getActor("telegram", "channel")
    expect(actor.variant).toBe("telegram-channel")
    expect(actor.buildInput([channel("alpha")], options)).toEqual({
      profiles: ["alpha"],
      collectMessages: true,
      proxyConfigurationOptions: { useApifyProxy: true },
    })
  })
})

describe("X actor inputs", () => {
  const handle: TargetDescriptor = { platform: "x", kind: "handle", value: "nasa", limit: 20 }
  const search: TargetDescriptor = { platform: "x", kind: "search", value: "mars rover", limit: 30 }

  it("sends a username or a query to the ppr actor", () => {
    const actor = getActor("x", "ppr")
    expect(actor.buildInput([handle], options)).toEqual({ max_posts: 20, username: "nasa" })
    expect(actor.buildInput([search], { ...options, sort: "Top" })).toEqual({
      max_posts: 30,
      query: "mars rover",
      search_type: "top",
    })
  })

  it("turns handles into from: queries for the search actor", () => {
    expect(getActor("x", "search").buildInput([handle], { ...options, lang: "en" })).toEqual({
      maxItems: 20,
      queryType: "Latest",
      twitterContent: "from:nasa",
      lang: "en",
    })
  })

  it("packs every target into one full actor run", () => {
    const url: TargetDescriptor = { platform: "x", kind: "url", value: "https://x.com/i/lists/1", limit: 20 }
    const esa: TargetDescriptor = { ...handle, value: "esa" }

    expect(getActor("x", "full").buildInput([handle, esa, search, url], { ...options, lang: "fr" })).toEqual({
      maxItems: 60,
      sort: "Latest",
      twitterHandles: ["nasa", "esa"],
      startUrls: ["https://x.com/nasa", "https://x.com/esa", "https://x.com/i/lists/1"],
      searchTerms: ["mars rover"],
      tweetLanguage: "fr",
    })
  })
})

describe("LinkedIn actor input", () => {
  it("caps the page size but asks for every post", () => {
    const input = getActor("linkedin").buildInput(
      [{ platform: "linkedin", kind: "profile", value: "jane-doe", limit: 250 }],
      options,
    )
    expect(input).toEqual({ username: "jane-doe", limit: 100, total_posts: 250 })
  })
})
