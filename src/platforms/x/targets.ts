const HANDLE_URL_PREFIXES = [
  "https://x.com/",
  "https://twitter.com/",
  "https://www.x.com/",
  "https://www.twitter.com/",
  "http://x.com/",
  "http://twitter.com/",
  "x.com/",
  "twitter.com/",
] as const

/** `https://x.com/name/status/1`, `twitter.com/name`, `@name` and `name` all give `name`. */
export const normalizeHandle = (input: string): string => {
  let handle = input.trim()
  const prefix = HANDLE_URL_PREFIXES.find((candidate) => handle.toLowerCase().startsWith(candidate))
  if (prefix) {
    handle = handle.slice(prefix.length).split("/")[0].split("?")[0]
  }
  if (handle.startsWith("@")) {
    handle = handle.slice(1)
  }
  return handle
}

export const tweetUrl = (handle: string, id: string): string => `https://x.com/${handle}/status/${id}`
