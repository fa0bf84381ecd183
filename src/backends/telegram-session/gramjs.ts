import readline from "node:readline/promises"

import type { Api } from "telegram"

import { SubmissionError } from "../../errors.js"
import type { SessionMessage, SessionMessageSource } from "./source.js"

export interface GramjsSourceOptions {
  apiId: number
  apiHash: string
  /** Saved `StringSession`; empty means a fresh login. */
  session: string | null
  /** Ask for phone, code and 2FA password on stdin when the session is not authorized. */
  interactive: boolean
  /** Receives the new session string after an interactive login. */
  onSessionCreated?: (session: string) => void
}

const ask = async (question: string): Promise<string> => {
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout })
  try {
    return (await rl.question(question)).trim()
  } finally {
    rl.close()
  }
}

export const toSessionMessage = (channel: string, message: Api.Message): SessionMessage => ({
  id: message.id,
  channel,
  date: message.date,
  text: message.message,
  views: message.views ?? null,
  forwards: message.forwards ?? null,
  replies: message.replies?.replies ?? null,
  hasMedia: message.media !== undefined,
})

/**
 * Connects with the saved session, logging in interactively when allowed.
 * GramJS is loaded only here, so the Apify path never pays for it.
 */
export const openGramjsSource = async (options: GramjsSourceOptions): Promise<SessionMessageSource> => {
  const [{ TelegramClient }, { StringSession }, { LogLevel }] = await Promise.all([
    import("telegram"),
    import("telegram/sessions/index.js"),
    import("telegram/extensions/Logger.js"),
  ])
  const session = new StringSession(options.session ?? "")
  const client = new TelegramClient(session, options.apiId, options.apiHash, { connectionRetries: 3 })
  client.setLogLevel(LogLevel.ERROR)

  await client.connect()
  if (!(await client.checkAuthorization())) {
    if (!options.interactive) {
      await client.disconnect()
      throw new SubmissionError(
        "auth",
        "TELEGRAM_SESSION is missing or expired; run once in a terminal to log in and save the printed session",
      )
    }
    await client.start({
      phoneNumber: () => ask("Phone number (international format): "),
      phoneCode: () => ask("Login code: "),
      password: () => ask("Two-factor password: "),
      onError: (error) => {
        throw new SubmissionError("auth", `Telegram login failed: ${error.message}`, { cause: error })
      },
    })
    options.onSessionCreated?.(session.save())
  }

  return {
    iterMessages: async function* (channel, { before, signal }) {
      const iterator = client.iterMessages(channel, {
        offsetDate: before ? Math.floor(before.getTime() / 1000) : undefined,
      })
      for await (const message of iterator) {
        if (signal?.aborted) {
          return
        }
        yield toSessionMessage(channel, message)
      }
    },
    disconnect: async () => {
      await client.disconnect()
    },
  }
}
