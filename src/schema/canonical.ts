import { z } from "zod"

export const CANONICAL_COLUMNS = [
  "id",
  "source",
  "timestamp",
  "text",
  "views",
  "forwards",
  "replies",
  "url",
  "has_media",
  "media_urls",
] as const

export type CanonicalColumn = (typeof CANONICAL_COLUMNS)[number]

export interface CanonicalRecord {
  readonly id: string
  readonly source: string
  /** ISO 8601 UTC, or null when the item carried no readable date. */
  readonly timestamp: string | null
  readonly text: string
  readonly views: number
  readonly forwards: number
  readonly replies: number
  readonly url: string | null
  readonly has_media: boolean
  readonly media_urls: readonly string[]
}

export interface CanonicalRecordInput {
  id: string
  source: string
  timestamp?: string | null
  text?: string | null
  views?: number | null
  forwards?: number | null
  replies?: number | null
  url?: string | null
  /** Only needed when media exists without URLs; otherwise derived from `mediaUrls`. */
  hasMedia?: boolean
  mediaUrls?: readonly string[]
}

const counter = (value: number | null | undefined): number =>
  value !== null && value !== undefined && Number.isFinite(value) && value > 0 ? Math.round(value) : 0

export const makeCanonicalRecord = (input: CanonicalRecordInput): CanonicalRecord => {
  const mediaUrls = [...new Set(input.mediaUrls ?? [])]
  const record: CanonicalRecord = {
    id: input.id,
    source: input.source,
    timestamp: input.timestamp ?? null,
    text: input.text ?? "",
    views: counter(input.views),
    forwards: counter(input.forwards),
    replies: counter(input.replies),
    url: input.url ?? null,
    has_media: mediaUrls.length > 0 || (input.hasMedia ?? false),
    media_urls: Object.freeze(mediaUrls),
  }
  return Object.freeze(record)
}

export const canonicalRecordSchema = z.object({
  id: z.string().min(1),
  source: z.string().min(1),
  timestamp: z.iso.datetime().nullable(),
  text: z.string(),
  views: z.number().int().nonnegative(),
  forwards: z.number().int().nonnegative(),
  replies: z.number().int().nonnegative(),
  url: z.string().nullable(),
  has_media: z.boolean(),
  media_urls: z.array(z.string()),
})

/** Rebuilds a record from stored or exported JSON. */
export const parseCanonicalRecord = (value: unknown): CanonicalRecord => {
  const parsed = canonicalRecordSchema.safeParse(value)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    const path = issue?.path.length ? issue.path.join(".") : "$"
    throw new Error(`Invalid canonical record: ${issue?.message ?? "unknown error"} (path: ${path})`)
  }
  const data = parsed.data
  return makeCanonicalRecord({
    id: data.id,
    source: data.source,
    timestamp: data.timestamp,
    text: data.text,
    views: data.views,
    forwards: data.forwards,
    replies: data.replies,
    url: data.url,
    hasMedia: data.has_media,
    mediaUrls: data.media_urls,
  })
}
