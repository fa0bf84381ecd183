import { SubmissionError } from "../../errors.js"
import type { BatchRequest, RawBatch, ScrapeBackend } from "../types.js"
import { collectChannelMessages, type SessionMessageSource } from "./source.js"

/**
 * Telegram through a personal account. Bypasses submit/poll/fetch and feeds the
 * same normalizer. The source is opened on first use and shared by all batches.
 */
export class TelegramSessionBackend implements ScrapeBackend {
  readonly name = "session" as const
  private source: Promise<SessionMessageSource> | null = null

  constructor(private readonly openSource: () => Promise<SessionMessageSource>) {}

  acceptsMultipleTargets(): boolean {
    return false
  }

  async collect(request: BatchRequest): Promise<RawBatch> {
    const { targets, signal, hooks } = request
    const target = targets[0]
    if (targets.length !== 1 || target.platform !== "telegram") {
      throw new SubmissionError("invalid-target", "The session backend reads one Telegram channel at a time")
    }
    this.source ??= this.openSource()
    const source = await this.source
    hooks?.onStep?.("collect", `reading messages of ${target.value}`)
    const messages = await collectChannelMessages(source, target, signal)
    return { items: messages, variant: "telegram-session", job: null }
  }

  async close(): Promise<void> {
    if (!this.source) {
      return
    }
    const pending = this.source
    this.source = null
    // A source that never opened has nothing to disconnect.
    const source = await pending.catch(() => null)
    await source?.disconnect()
  }
}
