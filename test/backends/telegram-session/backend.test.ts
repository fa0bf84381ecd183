import { describe, expect, it } from "vitest"

import { TelegramSessionBackend } from "../../../src/backends/telegram-session/backend.js"
import type { SessionMessageSource } from "../../../src/backends/telegram-session/source.js"
import { SubmissionError } from "../../../src/errors.js"
import { getActor } from "../../../src/platforms/registry.js"
import { FakeSessionSource, sessionMessage } from "../../helpers/fake-session.js"
import { alphaTarget } from "../../helpers/jobs.js"

const input = { downloadMedia: false, sort: "Latest", lang: null } as const
const actor = getActor("telegram", "media")

const opener = (source: SessionMessageSource) => {
  let opened = 0
  return {
    open: () => {
      opened += 1
      return Promise.resolve(source)
    },
    opened: () => opened,
  }
}

describe("TelegramSessionBackend", () => {
  it("returns session messages for the session schema", async () => {
    const source = new FakeSessionSource([sessionMessage(7, "2024-03-05T10:20:30Z")])
    const backend = new TelegramSessionBackend(opener(source).open)

    const batch = await backend.collect({ actor, targets: [alphaTarget], input })

    expect(batch.variant).toBe("telegram-session")
    expect(batch.job).toBeNull()
    expect(batch.items).toEqual([sessionMessage(7, "2024-03-05T10:20:30Z")])
  })

  it("opens the source once and disconnects it on close", async () => {
    const source = new FakeSessionSource([])
    const { open, opened } = opener(source)
    const backend = new TelegramSessionBackend(open)

    await backend.collect({ actor, targets: [alphaTarget], input })
    await backend.collect({ actor, targets: [{ ...alphaTarget, value: "beta" }], input })
    await backend.close()
    await backend.close()

    expect(opened()).toBe(1)
    expect(source.disconnected).toBe(1)
    expect(source.requests.map((request) => request.channel)).toEqual(["alpha", "beta"])
  })

  it("closes cleanly when the source never opened", async () => {
    const backend = new TelegramSessionBackend(() => Promise.reject(new SubmissionError("auth", "login refused")))

    await expect(backend.collect({ actor, targets: [alphaTarget], input })).rejects.toThrow("login refused")
    await expect(backend.close()).resolves.toBeUndefined()
  })

  it("takes one Telegram channel per batch", async () => {
    const backend = new TelegramSessionBackend(opener(new FakeSessionSource([])).open)

    expect(backend.acceptsMultipleTargets()).toBe(false)
    await expect(
      backend.collect({ actor, targets: [alphaTarget, { ...alphaTarget, value: "beta" }], input }),
    ).rejects.toThrow("The session backend reads one Telegram channel at a time")
    await expect(
      backend.collect({ actor, targets: [{ platform: "x", kind: "handle", value: "someone", limit: 5 }], input }),
    ).rejects.toBeInstanceOf(SubmissionError)
  })
})
