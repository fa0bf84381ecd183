const PROFILE_URL_PREFIXES = [
  "https://www.linkedin.com/in/",
  "https://linkedin.com/in/",
  "http://www.linkedin.com/in/",
  "http://linkedin.com/in/",
  "www.linkedin.com/in/",
  "linkedin.com/in/",
] as const

/** `https://www.linkedin.com/in/name/` and `name` both give `name`. */
export const normalizeProfile = (input: string): string => {
  let profile = input.trim().replace(/\/+$/, "")
  const prefix = PROFILE_URL_PREFIXES.find((candidate) => profile.toLowerCase().startsWith(candidate))
  if (prefix) {
    profile = profile.slice(prefix.length).split("/")[0].split("?")[0]
  }
  return profile
}

/** Bare activity ids become `urn:li:activity:{id}`. */
export const activityFeedUrl = (urn: string): string => {
  const fullUrn = /^\d+$/.test(urn) ? `urn:li:activity:${urn}` : urn
  return `https://www.linkedin.com/feed/update/${fullUrn}`
}
