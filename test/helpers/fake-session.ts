import type { SessionMessage, SessionMessageSource } from "../../src/backends/telegram-session/source.js"

export const sessionMessage = (id: number, isoDate: string, extra: Partial<SessionMessage> = {}): SessionMessage => ({
  id,
  channel: "alpha",
  date: Date.parse(isoDate) / 1000,
  text: `message ${id}`,
  views: 100 * id,
  forwards: null,
  replies: null,
  hasMedia: false,
  ...extra,
})

/** Serves fixed messages newest first, honouring `before`. */
export class FakeSessionSource implements SessionMessageSource {
  readonly requests: Array<{ channel: string; before?: Date }> = []
  read = 0
  disconnected = 0

  constructor(private readonly messages: SessionMessage[]) {}

  async *iterMessages(channel: string, options: { before?: Date }): AsyncIterable<SessionMessage> {
    this.requests.push({ channel, before: options.before })
    const sorted = [...this.messages].sort((a, b) => b.date - a.date)
    for (const message of sorted) {
      if (options.before && message.date * 1000 >= options.before.getTime()) {
        continue
      }
      this.read += 1
      yield message
    }
  }

  disconnect(): Promise<void> {
    this.disconnected += 1
    return Promise.resolve()
  }
}
