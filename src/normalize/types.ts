import type { CanonicalRecord } from "../schema/canonical.js"
import type { Platform } from "../schema/targets.js"

export const SCHEMA_VARIANTS = [
  "telegram-actor",
  "telegram-channel",
  "telegram-session",
  "x-tweet",
  "linkedin-post",
] as const

/** One tag per distinct shape of raw item a source emits. */
export type SchemaVariant = (typeof SCHEMA_VARIANTS)[number]

export interface NormalizeContext {
  platform: Platform
  /** Source to use when the item does not name one (single-target jobs). */
  fallbackSource: string | null
}

/**
 * Maps one raw item to a canonical record. Returns `null` for placeholder items
 * that carry no content; throws `InvalidRecordError` for items missing an id.
 */
export type RecordNormalizer = (raw: unknown, context: NormalizeContext) => CanonicalRecord | null
