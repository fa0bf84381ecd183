import type { TargetDescriptor, TargetKind } from "../../schema/targets.js"
import type { ActorDefinition } from "../types.js"

const X_MEMORY_MB = 256

const valuesOf = (targets: readonly TargetDescriptor[], kind: TargetKind): string[] =>
  targets.filter((target) => target.kind === kind).map((target) => target.value)

const limitOf = (targets: readonly TargetDescriptor[]): number => Math.max(...targets.map((target) => target.limit))

const pprActor: ActorDefinition = {
  key: "ppr",
  platform: "x",
  actorId: "ghSpYIW3L1RvT57NT",
  actorName: "danek/twitter-scraper-ppr",
  description: "One handle or query per run",
  multiTarget: false,
  targetKinds: ["handle", "search"],
  variant: "x-tweet",
  defaultMemoryMb: X_MEMORY_MB,
  buildInput: (targets, options) => {
    const target = targets[0]
    const input: Record<string, unknown> = { max_posts: limitOf(targets) }
    if (target.kind === "handle") {
      input.username = target.value
    } else {
      input.query = target.value
      input.search_type = options.sort.toLowerCase()
    }
    return input
  },
}

const searchActor: ActorDefinition = {
  key: "search",
  platform: "x",
  actorId: "CJdippxWmn9uRfooo",
  actorName: "kaitoeasyapi/tweet-scraper",
  description: "Search based, handles become from:handle queries",
  multiTarget: false,
  targetKinds: ["handle", "search"],
  variant: "x-tweet",
  defaultMemoryMb: X_MEMORY_MB,
  buildInput: (targets, options) => {
    const target = targets[0]
    const input: Record<string, unknown> = {
      maxItems: limitOf(targets),
      queryType: options.sort,
      twitterContent: target.kind === "handle" ? `from:${target.value}` : target.value,
    }
    if (options.lang) {
      input.lang = options.lang
    }
    return input
  },
}

const fullActor: ActorDefinition = {
  key: "full",
  platform: "x",
  actorId: "61RPP7dywgiy0JPD0",
  actorName: "apidojo/tweet-scraper",
  description: "Several handles, search terms and start URLs per run",
  multiTarget: true,
  targetKinds: ["handle", "search", "url"],
  variant: "x-tweet",
  defaultMemoryMb: X_MEMORY_MB,
  buildInput: (targets, options) => {
    const handles = valuesOf(targets, "handle")
    const searchTerms = valuesOf(targets, "search")
    const urls = valuesOf(targets, "url")
    const input: Record<string, unknown> = {
      maxItems: limitOf(targets) * Math.max(handles.length, searchTerms.length, 1),
      sort: options.sort,
    }
    const startUrls = [...handles.map((handle) => `https://x.com/${handle}`), ...urls]
    if (handles.length > 0) {
      input.twitterHandles = handles
    }
    if (startUrls.length > 0) {
      input.startUrls = startUrls
    }
    if (searchTerms.length > 0) {
      input.searchTerms = searchTerms
    }
    if (options.lang) {
      input.tweetLanguage = options.lang
    }
    return input
  },
}

export const X_ACTORS = [pprActor, searchActor, fullActor] as const
