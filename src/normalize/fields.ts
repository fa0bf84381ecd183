import { InvalidRecordError } from "../errors.js"
import type { Platform } from "../schema/targets.js"
import { coerceCount } from "../utils/coerce.js"
import { getPath, isRecord } from "../utils/type-guards.js"
import { toIsoTimestamp } from "./dates.js"

/** Empty strings, zero, false and empty arrays count as absent, like the actors' own "or" chains. */
export const isPresent = (value: unknown): boolean => {
  if (value === undefined || value === null || value === false || value === 0 || value === "") {
    return false
  }
  if (Array.isArray(value)) {
    return value.length > 0
  }
  if (typeof value === "string") {
    return value.trim() !== ""
  }
  return true
}

/** First value usable as a string: strings are trimmed, integers (zero included) stringified. */
export const pickString = (item: Record<string, unknown>, paths: readonly string[]): string | null => {
  for (const path of paths) {
    const value = getPath(item, path)
    if (typeof value === "string" && value.trim()) {
      return value.trim()
    }
    if (typeof value === "number" && Number.isSafeInteger(value)) {
      return String(value)
    }
    if (typeof value === "bigint") {
      return value.toString()
    }
  }
  return null
}

export const pickCount = (item: Record<string, unknown>, paths: readonly string[]): number => {
  for (const path of paths) {
    const count = coerceCount(getPath(item, path))
    if (count !== null && count > 0) {
      return count
    }
  }
  return 0
}

const MEDIA_URL_KEYS = ["media_url_https", "url", "src", "link", "fileUrl"] as const

/**
 * Flattens whatever a media field holds into URLs: a string, a list of strings
 * or objects, or an object with one of the usual URL keys.
 */
export const flattenMediaUrls = (value: unknown): string[] => {
  if (typeof value === "string") {
    const trimmed = value.trim()
    return /^https?:\/\//i.test(trimmed) ? [trimmed] : []
  }
  if (Array.isArray(value)) {
    return value.flatMap((entry) => flattenMediaUrls(entry))
  }
  if (isRecord(value)) {
    for (const key of MEDIA_URL_KEYS) {
      const urls = flattenMediaUrls(value[key])
      if (urls.length > 0) {
        return urls
      }
    }
  }
  return []
}

/** Message body as sent: only blank strings are skipped, nothing is trimmed. */
export const pickText = (item: Record<string, unknown>, paths: readonly string[]): string => {
  for (const path of paths) {
    const value = getPath(item, path)
    if (typeof value === "string" && value.trim()) {
      return value
    }
  }
  return ""
}

/** First value among `paths` that parses as a date. */
export const pickTimestamp = (item: Record<string, unknown>, paths: readonly string[]): string | null => {
  for (const path of paths) {
    const timestamp = toIsoTimestamp(getPath(item, path))
    if (timestamp !== null) {
      return timestamp
    }
  }
  return null
}

export const collectMediaUrls = (item: Record<string, unknown>, paths: readonly string[]): string[] =>
  paths.flatMap((path) => flattenMediaUrls(getPath(item, path)))

export const hasAnyPresent = (item: Record<string, unknown>, paths: readonly string[]): boolean =>
  paths.some((path) => isPresent(getPath(item, path)))

/** Empty result markers some actors push instead of an empty dataset. */
export const isPlaceholderItem = (item: Record<string, unknown>): boolean =>
  isPresent(item.noResults) || isPresent(item.demo)

export const requireItem = (raw: unknown, platform: Platform): Record<string, unknown> => {
  if (!isRecord(raw)) {
    throw new InvalidRecordError(platform, `Expected an object item, got ${Array.isArray(raw) ? "array" : typeof raw}`)
  }
  return raw
}
