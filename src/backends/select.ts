import type { EnvConfig } from "../config.js"
import { SubmissionError } from "../errors.js"
import type { Platform } from "../schema/targets.js"
import type { BackendChoice, BackendName } from "./types.js"

type Credentials = Pick<EnvConfig, "apifyToken" | "telegramApiId" | "telegramApiHash">

const hasSessionCredentials = (env: Credentials): boolean => env.telegramApiId !== null && env.telegramApiHash !== null

/**
 * `auto` prefers Apify when a token is set, then the Telegram session backend.
 * X and LinkedIn only run on Apify.
 */
export const resolveBackend = (platform: Platform, choice: BackendChoice, env: Credentials): BackendName => {
  if (choice === "session" || (choice === "auto" && platform === "telegram" && !env.apifyToken)) {
    if (platform !== "telegram") {
      throw new SubmissionError("invalid-target", `The session backend only scrapes Telegram, not ${platform}`)
    }
    if (!hasSessionCredentials(env)) {
      throw new SubmissionError(
        "auth",
        choice === "session"
          ? "Session backend needs TELEGRAM_API_ID and TELEGRAM_API_HASH"
          : "No scraping backend available: set APIFY_API_TOKEN for Apify, or TELEGRAM_API_ID and TELEGRAM_API_HASH for the session backend",
      )
    }
    return "session"
  }
  if (!env.apifyToken) {
    throw new SubmissionError("auth", "APIFY_API_TOKEN is not set")
  }
  return "apify"
}
