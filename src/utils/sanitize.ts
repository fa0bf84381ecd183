const SENSITIVE_PARAM_NAMES = new Set([
  "apikey",
  "api_key",
  "token",
  "auth",
  "key",
  "secret",
  "password",
  "access_token",
  "bearer",
  "session",
])

const MAX_MESSAGE_LENGTH = 200

/**
 * Strip sensitive query parameters and auth tokens from a URL or message
 * before it is shown to the user or stored in the run history.
 */
export const sanitizeForError = (input: string): string => {
  let cleaned = input.replaceAll(/\b(Bearer|Basic)\s+[A-Za-z0-9\-._~+/]+=*/gi, "$1 [REDACTED]")

  try {
    const url = new URL(cleaned)
    let hasSensitive = false
    for (const key of url.searchParams.keys()) {
      if (SENSITIVE_PARAM_NAMES.has(key.toLowerCase())) {
        url.searchParams.set(key, "[REDACTED]")
        hasSensitive = true
      }
    }
    if (hasSensitive) {
      cleaned = url.toString()
    }
  } catch {
    cleaned = cleaned.replaceAll(
      /([?&])(apikey|api_key|token|auth|key|secret|password|access_token|bearer|session)=[^&\s]*/gi,
      "$1$2=[REDACTED]",
    )
  }

  if (cleaned.length > MAX_MESSAGE_LENGTH) {
    return `${cleaned.slice(0, MAX_MESSAGE_LENGTH - 3)}...`
  }
  return cleaned
}

export const getErrorMessage = (error: unknown): string => {
  if (error instanceof Error) {
    return error.message
  }
  return String(error)
}
