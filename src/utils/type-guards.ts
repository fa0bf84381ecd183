/**
 * Runtime type guard: checks that `value` is a non-null, non-array plain object.
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value)
}

/**
 * Reads a dotted path (`author.screen_name`) through nested plain objects.
 * Returns `undefined` as soon as a segment is missing or not an object.
 */
export function getPath(value: unknown, path: string): unknown {
  let current: unknown = value
  for (const segment of path.split(".")) {
    if (!isRecord(current)) {
      return undefined
    }
    current = current[segment]
  }
  return current
}
