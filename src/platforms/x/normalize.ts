import { InvalidRecordError } from "../../errors.js"
import {
  flattenMediaUrls,
  isPlaceholderItem,
  pickCount,
  pickString,
  pickText,
  pickTimestamp,
  requireItem,
} from "../../normalize/fields.js"
import type { RecordNormalizer } from "../../normalize/types.js"
import { makeCanonicalRecord } from "../../schema/canonical.js"
import { isRecord } from "../../utils/type-guards.js"
import { normalizeHandle, tweetUrl } from "./targets.js"

const MEDIA_KINDS = ["photo", "video", "animated_gif"] as const

/** X media comes either as `{ photo: [...], video: [...] }` or as a flat list. */
export const extractTweetMediaUrls = (media: unknown): string[] => {
  if (isRecord(media)) {
    return MEDIA_KINDS.flatMap((kind) => flattenMediaUrls(media[kind]))
  }
  return flattenMediaUrls(media)
}

export const normalizeTweet: RecordNormalizer = (raw, context) => {
  const item = requireItem(raw, "x")
  if (isPlaceholderItem(item)) {
    return null
  }

  const id = pickString(item, ["tweet_id", "id", "id_str", "rest_id"])
  if (id === null) {
    throw new InvalidRecordError("x", "Tweet has no id")
  }
  const handle = pickString(item, [
    "author.screen_name",
    "author.userName",
    "user.screen_name",
    "twitterHandle",
    "handle",
  ])
  const source = handle ? normalizeHandle(handle) : context.fallbackSource
  if (!source) {
    throw new InvalidRecordError("x", `Tweet ${id} names no author`)
  }

  return makeCanonicalRecord({
    id,
    source,
    timestamp: pickTimestamp(item, ["created_at", "createdAt", "date", "timestamp"]),
    text: pickText(item, ["text", "full_text", "tweetText", "content"]),
    views: pickCount(item, ["views", "viewCount", "view_count"]),
    forwards: pickCount(item, ["retweets", "retweetCount", "retweet_count"]),
    replies: pickCount(item, ["replies", "replyCount", "reply_count"]),
    url: pickString(item, ["url", "twitterUrl", "tweetUrl"]) ?? tweetUrl(source, id),
    mediaUrls: extractTweetMediaUrls(item.media),
  })
}
