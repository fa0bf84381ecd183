import { InvalidRecordError } from "../../errors.js"
import {
  collectMediaUrls,
  isPlaceholderItem,
  pickCount,
  pickString,
  pickText,
  pickTimestamp,
  requireItem,
} from "../../normalize/fields.js"
import type { RecordNormalizer } from "../../normalize/types.js"
import { makeCanonicalRecord } from "../../schema/canonical.js"
import { activityFeedUrl, normalizeProfile } from "./targets.js"

// LinkedIn exposes no view counter: views stay 0, reposts count as forwards.
export const normalizeLinkedinPost: RecordNormalizer = (raw, context) => {
  const item = requireItem(raw, "linkedin")
  if (isPlaceholderItem(item)) {
    return null
  }

  const id = pickString(item, ["urn.activity_urn", "urn", "activity_urn", "activity_id", "id"])
  if (id === null) {
    throw new InvalidRecordError("linkedin", "LinkedIn post has no activity urn")
  }
  const username = pickString(item, ["author.username", "author.public_identifier"])
  const source = username ? normalizeProfile(username) : context.fallbackSource
  if (!source) {
    throw new InvalidRecordError("linkedin", `LinkedIn post ${id} names no author`)
  }

  return makeCanonicalRecord({
    id,
    source,
    timestamp: pickTimestamp(item, ["posted_at.timestamp", "posted_at.date", "postedAt", "date"]),
    text: pickText(item, ["text", "commentary"]),
    views: 0,
    forwards: pickCount(item, ["stats.reposts", "reposts"]),
    replies: pickCount(item, ["stats.comments", "comments"]),
    url: pickString(item, ["url", "post_url"]) ?? activityFeedUrl(id),
    mediaUrls: collectMediaUrls(item, ["media.url", "media.images"]),
  })
}
