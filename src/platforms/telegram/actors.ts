import type { TargetDescriptor } from "../../schema/targets.js"
import type { ActorDefinition } from "../types.js"

const TELEGRAM_MEMORY_MB = 4096
const DEFAULT_DAYS = 7

/** Per-channel post cap of the media actor. */
export const MEDIA_ACTOR_MAX_POSTS = 200
/** Look-back cap (days) of the media actor. */
export const MEDIA_ACTOR_MAX_DAYS = 30

const channelsOf = (targets: readonly TargetDescriptor[]): string[] => targets.map((target) => target.value)

const limitOf = (targets: readonly TargetDescriptor[]): number => Math.max(...targets.map((target) => target.limit))

const daysOf = (targets: readonly TargetDescriptor[]): number => targets[0]?.days ?? DEFAULT_DAYS

const mediaActor: ActorDefinition = {
  key: "media",
  platform: "telegram",
  actorId: "f9ah2tzQwzhF8OyfK",
  actorName: "webfinity/telegram-channel-content-media-scraper-v2",
  description: "Up to 200 posts per channel with media, look-back in days",
  multiTarget: true,
  targetKinds: ["channel"],
  variant: "telegram-actor",
  defaultMemoryMb: TELEGRAM_MEMORY_MB,
  buildInput: (targets, options) => ({
    channels: channelsOf(targets).join(", "),
    maxPosts: Math.min(limitOf(targets), MEDIA_ACTOR_MAX_POSTS),
    daysRange: Math.min(daysOf(targets), MEDIA_ACTOR_MAX_DAYS),
    includeText: true,
    mediaOnly: false,
    downloadMedia: options.downloadMedia,
  }),
}

const postsActor: ActorDefinition = {
  key: "posts",
  platform: "telegram",
  actorId: "73JZk4CeKcDsWoJQu",
  actorName: "danielmilevski9/telegram-channel-scraper",
  description: "Post-number range, needs a residential proxy",
  multiTarget: true,
  targetKinds: ["channel"],
  variant: "telegram-actor",
  defaultMemoryMb: TELEGRAM_MEMORY_MB,
  buildInput: (targets) => {
    const postRange = targets[0]?.postRange
    return {
      channels: channelsOf(targets),
      postsFrom: postRange?.from ?? 1,
      postsTo: postRange?.to ?? limitOf(targets),
      proxy: {
        useApifyProxy: true,
        apifyProxyGroups: ["RESIDENTIAL"],
      },
    }
  },
}

const messagesActor: ActorDefinition = {
  key: "messages",
  platform: "telegram",
  actorId: "TpLqaxMYSJzwVnXoj",
  actorName: "cheapget/telegram-channel-message",
  description: "One channel per run, filtered by date",
  multiTarget: false,
  targetKinds: ["channel"],
  variant: "telegram-actor",
  defaultMemoryMb: TELEGRAM_MEMORY_MB,
  buildInput: (targets) => ({
    telegram_url: `https://t.me/${channelsOf(targets)[0]}`,
    max_results: limitOf(targets),
    download_medias: "text",
    start_date: `${daysOf(targets)} days`,
  }),
}

const channelActor: ActorDefinition = {
  key: "channel",
  platform: "telegram",
  actorId: "GEHKCq8O4orlPjLFf",
  actorName: "tri_angle/telegram-scraper",
  description: "Channel profiles with their messages",
  multiTarget: true,
  targetKinds: ["channel"],
  variant: "telegram-channel",
  defaultMemoryMb: TELEGRAM_MEMORY_MB,
  buildInput: (targets) => ({
    profiles: channelsOf(targets),
    collectMessages: true,
    proxyConfigurationOptions: {
      useApifyProxy: true,
    },
  }),
}

export const TELEGRAM_ACTORS = [mediaActor, postsActor, messagesActor, channelActor] as const
