const MONTHS = ["jan", "feb", "mar", "apr", "may", "jun", "jul", "aug", "sep", "oct", "nov", "dec"] as const

/** Values below this are Unix seconds, above it milliseconds (year 5138 in seconds). */
const UNIX_MS_THRESHOLD = 100_000_000_000

const ISO_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:[.,](\d+))?)?)?\s*(Z|[+-]\d{2}(?::?\d{2})?)?$/i

// "Wed Oct 10 20:19:24 +0000 2018"
const TWITTER_PATTERN = /^[a-z]{3} ([a-z]{3}) (\d{1,2}) (\d{2}):(\d{2}):(\d{2}) ([+-]\d{4}) (\d{4})$/i

// "Tue, 1 Jul 2003 10:52:37 +0200", "01 Jul 2003 10:52 GMT"
const RFC2822_PATTERN =
  /^(?:[a-z]{3},\s*)?(\d{1,2})\s+([a-z]{3})\s+(\d{4})\s+(\d{2}):(\d{2})(?::(\d{2}))?\s+([+-]\d{4}|gmt|ut|utc|z)$/i

interface DateParts {
  year: number
  month: number
  day: number
  hour: number
  minute: number
  second: number
  millisecond: number
  offsetMinutes: number
}

// Date.UTC reads years 0-99 as 1900-1999; setUTCFullYear takes them literally.
const utcEpochMs = (year: number, monthIndex: number, day: number, hour = 0, minute = 0, second = 0, ms = 0): number => {
  const date = new Date(Date.UTC(2000, 0, 1, hour, minute, second, ms))
  return date.setUTCFullYear(year, monthIndex, day)
}

const daysInMonth = (year: number, month: number): number => new Date(utcEpochMs(year, month, 0)).getUTCDate()

const toIsoUtc = (parts: DateParts): string | null => {
  const { year, month, day, hour, minute, second, millisecond } = parts
  if (month < 1 || month > 12 || day < 1 || day > daysInMonth(year, month)) {
    return null
  }
  if (hour > 23 || minute > 59 || second > 59) {
    return null
  }
  const epochMs = utcEpochMs(year, month - 1, day, hour, minute, second, millisecond) - parts.offsetMinutes * 60_000
  return fromEpochMs(epochMs)
}

const fromEpochMs = (epochMs: number): string | null => {
  const date = new Date(epochMs)
  return Number.isNaN(date.getTime()) ? null : date.toISOString()
}

const parseOffsetMinutes = (raw: string | undefined): number | null => {
  if (!raw || /^(z|gmt|ut|utc)$/i.test(raw)) {
    return 0
  }
  const match = /^([+-])(\d{2}):?(\d{2})?$/.exec(raw)
  if (!match) {
    return null
  }
  const hours = Number(match[2])
  const minutes = Number(match[3] ?? "0")
  if (hours > 23 || minutes > 59) {
    return null
  }
  const sign = match[1] === "-" ? -1 : 1
  return sign * (hours * 60 + minutes)
}

const monthNumber = (name: string): number | null => {
  const index = MONTHS.findIndex((month) => month === name.toLowerCase())
  return index === -1 ? null : index + 1
}

const fromUnix = (value: number): string | null => {
  if (!Number.isFinite(value) || value < 0) {
    return null
  }
  const epochMs = value >= UNIX_MS_THRESHOLD ? value : value * 1000
  return fromEpochMs(Math.round(epochMs))
}

const parseIso = (input: string): string | null => {
  const match = ISO_PATTERN.exec(input)
  if (!match) {
    return null
  }
  const offsetMinutes = parseOffsetMinutes(match[8])
  if (offsetMinutes === null) {
    return null
  }
  const fraction = (match[7] ?? "").slice(0, 3).padEnd(3, "0")
  return toIsoUtc({
    year: Number(match[1]),
    month: Number(match[2]),
    day: Number(match[3]),
    hour: Number(match[4] ?? "0"),
    minute: Number(match[5] ?? "0"),
    second: Number(match[6] ?? "0"),
    millisecond: Number(fraction),
    offsetMinutes,
  })
}

const parseTwitter = (input: string): string | null => {
  const match = TWITTER_PATTERN.exec(input)
  if (!match) {
    return null
  }
  const month = monthNumber(match[1])
  const offsetMinutes = parseOffsetMinutes(match[6])
  if (month === null || offsetMinutes === null) {
    return null
  }
  return toIsoUtc({
    year: Number(match[7]),
    month,
    day: Number(match[2]),
    hour: Number(match[3]),
    minute: Number(match[4]),
    second: Number(match[5]),
    millisecond: 0,
    offsetMinutes,
  })
}

const parseRfc2822 = (input: string): string | null => {
  const match = RFC2822_PATTERN.exec(input)
  if (!match) {
    return null
  }
  const month = monthNumber(match[2])
  const offsetMinutes = parseOffsetMinutes(match[7])
  if (month === null || offsetMinutes === null) {
    return null
  }
  return toIsoUtc({
    year: Number(match[3]),
    month,
    day: Number(match[1]),
    hour: Number(match[4]),
    minute: Number(match[5]),
    second: Number(match[6] ?? "0"),
    millisecond: 0,
    offsetMinutes,
  })
}

/**
 * Reduces every date shape the actors emit to `YYYY-MM-DDTHH:mm:ss.sssZ`.
 *
 * Accepted: ISO 8601 (a missing offset means UTC), `YYYY-MM-DD`,
 * `YYYY-MM-DD HH:mm[:ss]`, the X/Twitter `created_at` form, RFC 2822,
 * Unix seconds or milliseconds as numbers or digit strings, and `Date`.
 * Anything else yields `null`.
 */
export const toIsoTimestamp = (value: unknown): string | null => {
  if (value instanceof Date) {
    return fromEpochMs(value.getTime())
  }
  if (typeof value === "number") {
    return fromUnix(value)
  }
  if (typeof value !== "string") {
    return null
  }
  const input = value.trim()
  if (!input) {
    return null
  }
  if (/^\d+(?:\.\d+)?$/.test(input)) {
    return fromUnix(Number(input))
  }
  return parseIso(input) ?? parseTwitter(input) ?? parseRfc2822(input)
}

const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/
const DAY_MS = 24 * 60 * 60 * 1000

/**
 * Parses a user-supplied date (CLI or config) as an exact instant. A bare
 * `YYYY-MM-DD` is the start of that UTC day, or its last millisecond with
 * `endOfDay`, so that `--date-to 2024-01-31` keeps posts of the 31st.
 */
export const parseDateOption = (value: string, options: { endOfDay?: boolean } = {}): Date | null => {
  const iso = toIsoTimestamp(value.trim())
  if (iso === null) {
    return null
  }
  const date = new Date(iso)
  return options.endOfDay && DATE_ONLY.test(value.trim()) ? new Date(date.getTime() + DAY_MS - 1) : date
}
