import { InvalidRecordError } from "../../errors.js"
import {
  collectMediaUrls,
  hasAnyPresent,
  isPlaceholderItem,
  pickCount,
  pickString,
  pickText,
  pickTimestamp,
  requireItem,
} from "../../normalize/fields.js"
import type { NormalizeContext, RecordNormalizer } from "../../normalize/types.js"
import { type CanonicalRecord, makeCanonicalRecord } from "../../schema/canonical.js"
import { channelFromPostUrl, normalizeChannel, telegramPostUrl } from "./targets.js"

interface TelegramFieldMap {
  id: readonly string[]
  source: readonly string[]
  timestamp: readonly string[]
  text: readonly string[]
  views: readonly string[]
  forwards: readonly string[]
  replies: readonly string[]
  url: readonly string[]
  mediaUrls: readonly string[]
  /** Fields whose mere presence means the post carries media. */
  mediaFlags: readonly string[]
}

// webfinity, danielmilevski9 and cheapget actors: one loose shape, many aliases.
const ACTOR_FIELDS: TelegramFieldMap = {
  id: ["id", "messageId", "postId", "post_id"],
  source: ["channel.username", "channel", "channelUsername", "channelName", "source", "profileName"],
  timestamp: ["date", "timestamp", "datetime", "postDate", "created_at"],
  text: ["text", "message", "content", "postText"],
  views: ["views", "viewCount", "view_count"],
  forwards: ["forwards", "forwardCount", "share_count"],
  replies: ["replies", "replyCount", "comment_count"],
  url: ["url", "postUrl", "link", "post_url"],
  mediaUrls: ["mediaUrl", "imageUrl", "media_urls", "photo", "images"],
  mediaFlags: ["media", "mediaUrl", "imageUrl", "media_urls", "photo", "images"],
}

// tri_angle: message items only; channel profile items carry no message id.
const CHANNEL_FIELDS: TelegramFieldMap = {
  id: ["id", "messageId"],
  source: ["channel.username", "channel", "channelUsername"],
  timestamp: ["date", "timestamp"],
  text: ["text", "message"],
  views: ["views"],
  forwards: ["forwards"],
  replies: ["replies"],
  url: ["url", "link"],
  mediaUrls: ["media", "image", "images"],
  mediaFlags: ["media", "image", "images"],
}

const SESSION_FIELDS: TelegramFieldMap = {
  id: ["id"],
  source: ["channel"],
  timestamp: ["date"],
  text: ["text"],
  views: ["views"],
  forwards: ["forwards"],
  replies: ["replies"],
  url: [],
  mediaUrls: [],
  mediaFlags: ["hasMedia"],
}

const toTelegramRecord = (
  item: Record<string, unknown>,
  fields: TelegramFieldMap,
  context: NormalizeContext,
): CanonicalRecord => {
  const id = pickString(item, fields.id)
  if (id === null) {
    throw new InvalidRecordError("telegram", "Telegram item has no message id")
  }
  const url = pickString(item, fields.url)
  const namedSource = pickString(item, fields.source)
  const source = namedSource
    ? normalizeChannel(namedSource)
    : ((url ? channelFromPostUrl(url) : null) ?? context.fallbackSource)
  if (!source) {
    throw new InvalidRecordError("telegram", `Telegram message ${id} names no channel`)
  }

  return makeCanonicalRecord({
    id,
    source,
    timestamp: pickTimestamp(item, fields.timestamp),
    text: pickText(item, fields.text),
    views: pickCount(item, fields.views),
    forwards: pickCount(item, fields.forwards),
    replies: pickCount(item, fields.replies),
    url: url ?? telegramPostUrl(source, id),
    hasMedia: hasAnyPresent(item, fields.mediaFlags),
    mediaUrls: collectMediaUrls(item, fields.mediaUrls),
  })
}

export const normalizeTelegramActorItem: RecordNormalizer = (raw, context) => {
  const item = requireItem(raw, "telegram")
  return isPlaceholderItem(item) ? null : toTelegramRecord(item, ACTOR_FIELDS, context)
}

export const normalizeTelegramChannelItem: RecordNormalizer = (raw, context) => {
  const item = requireItem(raw, "telegram")
  if (isPlaceholderItem(item) || item.type === "profile" || item.type === "channel") {
    return null
  }
  return toTelegramRecord(item, CHANNEL_FIELDS, context)
}

export const normalizeTelegramSessionMessage: RecordNormalizer = (raw, context) =>
  toTelegramRecord(requireItem(raw, "telegram"), SESSION_FIELDS, context)
