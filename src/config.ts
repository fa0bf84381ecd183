import { config as loadDotEnv } from "dotenv"

loadDotEnv()

export interface EnvConfig {
  apifyToken: string | null
  apifyBaseUrl: string | null
  telegramApiId: number | null
  telegramApiHash: string | null
  telegramSession: string | null
}

const readString = (env: NodeJS.ProcessEnv, name: string): string | null => {
  const value = env[name]?.trim()
  return value ? value : null
}

export const readEnvConfig = (env: NodeJS.ProcessEnv = process.env): EnvConfig => {
  const apiId = readString(env, "TELEGRAM_API_ID")
  return {
    apifyToken: readString(env, "APIFY_API_TOKEN"),
    apifyBaseUrl: readString(env, "APIFY_BASE_URL"),
    telegramApiId: apiId && /^\d+$/.test(apiId) ? Number(apiId) : null,
    telegramApiHash: readString(env, "TELEGRAM_API_HASH"),
    telegramSession: readString(env, "TELEGRAM_SESSION"),
  }
}
