export const coerceInt = (value: unknown): number | null => {
  if (typeof value === "number" && Number.isInteger(value)) {
    return value
  }
  if (typeof value === "string" && /^[0-9]+$/.test(value)) {
    return Number.parseInt(value, 10)
  }
  return null
}

const SUFFIX_MULTIPLIERS: Record<string, number> = {
  k: 1_000,
  m: 1_000_000,
  b: 1_000_000_000,
}

/**
 * Engagement counter from whatever the source emits: integers, floats,
 * digit strings with thousands separators ("12,345", "12 345") or
 * abbreviated strings ("1.2K", "3M"). Negative or unreadable values give null.
 */
export const coerceCount = (value: unknown): number | null => {
  if (typeof value === "number") {
    if (!Number.isFinite(value) || value < 0) {
      return null
    }
    return Math.round(value)
  }
  if (typeof value !== "string") {
    return null
  }
  const compact = value.replaceAll(/[\s\u00a0\u202f]/g, "").toLowerCase()
  if (!compact) {
    return null
  }
  const abbreviated = /^([0-9]+(?:[.,][0-9]+)?)([kmb])$/.exec(compact)
  if (abbreviated) {
    const base = Number.parseFloat(abbreviated[1].replace(",", "."))
    return Math.round(base * SUFFIX_MULTIPLIERS[abbreviated[2]])
  }
  if (/^[0-9]{1,3}(?:[,.][0-9]{3})+$/.test(compact)) {
    return Number.parseInt(compact.replaceAll(/[,.]/g, ""), 10)
  }
  return coerceInt(compact)
}
