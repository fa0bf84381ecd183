import type { DateRange, TargetDescriptor } from "../../schema/targets.js"
import { throwIfAborted } from "../../utils/cancel.js"

/** What the pipeline keeps of one channel message read through a personal session. */
export interface SessionMessage {
  id: number
  channel: string
  /** Unix seconds. */
  date: number
  text: string
  views: number | null
  forwards: number | null
  replies: number | null
  hasMedia: boolean
}

export interface SessionMessageSource {
  /** Messages of `channel`, newest first, strictly older than `before` when given. */
  iterMessages(channel: string, options: { before?: Date; signal?: AbortSignal }): AsyncIterable<SessionMessage>
  disconnect(): Promise<void>
}

const inRange = (message: SessionMessage, range: DateRange | undefined): "keep" | "skip" | "stop" => {
  const dateMs = message.date * 1000
  if (range?.from && dateMs < range.from.getTime()) {
    return "stop"
  }
  if (range?.to && dateMs > range.to.getTime()) {
    return "skip"
  }
  return "keep"
}

/**
 * Reads newest → oldest until `limit` messages are kept or the history passes
 * `dateRange.from`. Messages newer than `dateRange.to` are skipped.
 */
export const collectChannelMessages = async (
  source: SessionMessageSource,
  target: TargetDescriptor,
  signal?: AbortSignal,
): Promise<SessionMessage[]> => {
  const kept: SessionMessage[] = []
  if (target.limit <= 0) {
    return kept
  }
  const before = target.dateRange?.to ? new Date(target.dateRange.to.getTime() + 1000) : undefined
  for await (const message of source.iterMessages(target.value, { before, signal })) {
    throwIfAborted(signal)
    const verdict = inRange(message, target.dateRange)
    if (verdict === "stop") {
      break
    }
    if (verdict === "skip") {
      continue
    }
    kept.push(message)
    if (kept.length >= target.limit) {
      break
    }
  }
  return kept
}
