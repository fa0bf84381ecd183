import { InvalidRecordError } from "../errors.js"
import { normalizeLinkedinPost } from "../platforms/linkedin/normalize.js"
import {
  normalizeTelegramActorItem,
  normalizeTelegramChannelItem,
  normalizeTelegramSessionMessage,
} from "../platforms/telegram/normalize.js"
import { normalizeTweet } from "../platforms/x/normalize.js"
import type { CanonicalRecord } from "../schema/canonical.js"
import type { NormalizeContext, RecordNormalizer, SchemaVariant } from "./types.js"

export const NORMALIZERS: Record<SchemaVariant, RecordNormalizer> = {
  "telegram-actor": normalizeTelegramActorItem,
  "telegram-channel": normalizeTelegramChannelItem,
  "telegram-session": normalizeTelegramSessionMessage,
  "x-tweet": normalizeTweet,
  "linkedin-post": normalizeLinkedinPost,
}

export interface NormalizeBatchResult {
  records: CanonicalRecord[]
  /** Items rejected for a missing id or source. */
  invalid: InvalidRecordError[]
  /** Placeholder items dropped without a record. */
  placeholders: number
}

/** Normalizes every item; invalid items are collected instead of aborting the batch. */
export const normalizeItems = (
  items: readonly unknown[],
  variant: SchemaVariant,
  context: NormalizeContext,
): NormalizeBatchResult => {
  const normalizer = NORMALIZERS[variant]
  const records: CanonicalRecord[] = []
  const invalid: InvalidRecordError[] = []
  let placeholders = 0

  for (const item of items) {
    try {
      const record = normalizer(item, context)
      if (record === null) {
        placeholders += 1
      } else {
        records.push(record)
      }
    } catch (error) {
      if (error instanceof InvalidRecordError) {
        invalid.push(error)
        continue
      }
      throw error
    }
  }
  return { records, invalid, placeholders }
}
