import { describe, expect, it } from "vitest"

import { ApifyBackend } from "../../../src/backends/apify/backend.js"
import { ApifyClient } from "../../../src/backends/apify/client.js"
import type { BatchStep } from "../../../src/backends/types.js"
import { JobFailedError } from "../../../src/errors.js"
import type { JobStatus } from "../../../src/jobs/types.js"
import { getActor } from "../../../src/platforms/registry.js"
import { CancellationError } from "../../../src/utils/cancel.js"
import type { FetchLike } from "../../../src/utils/http.js"
import { FakeClock } from "../../helpers/fake-clock.js"
import { FakeApify, type FakeRun, TEST_BASE_URL } from "../../helpers/fake-apify.js"
import { alphaTarget } from "../../helpers/jobs.js"

const input = { downloadMedia: false, sort: "Latest", lang: null } as const

const backendFor = (script: FakeRun[], attachLogTail = false) => {
  const server = new FakeApify(script)
  const clock = new FakeClock()
  const client = new ApifyClient({ token: "test-secret", baseUrl: TEST_BASE_URL, fetchImpl: server.fetch, clock })
  return {
    server,
    clock,
    backend: new ApifyBackend(client, { pollIntervalMs: 1000, waitTimeoutMs: 60_000, attachLogTail, clock }),
  }
}

describe("ApifyBackend", () => {
  it("submits, polls and fetches one batch", async () => {
    const { backend, clock } = backendFor([{ statuses: ["RUNNING", "SUCCEEDED"], items: [{ id: 1 }, { id: 2 }] }])
    const steps: BatchStep[] = []
    const statuses: JobStatus[] = []

    const batch = await backend.collect({
      actor: getActor("telegram", "media"),
      targets: [alphaTarget],
      input,
      hooks: {
        onStep: (step) => steps.push(step),
        onJob: (job) => statuses.push(job.status),
      },
    })

    expect(batch.items).toEqual([{ id: 1 }, { id: 2 }])
    expect(batch.variant).toBe("telegram-actor")
    expect(batch.job).toMatchObject({ id: "telegram:media:run-1", status: "succeeded", datasetId: "ds-1" })
    expect(statuses).toEqual(["queued", "running", "succeeded"])
    expect(steps).toEqual(["submit", "poll", "fetch", "fetch"])
    expect(clock.sleeps).toEqual([1000])
  })

  it("attaches the run log tail to failed runs", async () => {
    const { backend, server } = backendFor([{ statuses: ["FAILED"], items: [], log: "actor crashed" }], true)

    const collecting = backend.collect({ actor: getActor("telegram", "media"), targets: [alphaTarget], input })

    await expect(collecting).rejects.toBeInstanceOf(JobFailedError)
    await expect(collecting).rejects.toMatchObject({ status: "failed", logTail: "actor crashed" })
    expect(server.calls.map((call) => call.path)).toEqual(["/acts/f9ah2tzQwzhF8OyfK/runs", "/actor-runs/run-1", "/actor-runs/run-1/log"])
  })

  it("reports a cancellation during the log read as a cancellation", async () => {
    const server = new FakeApify([{ statuses: ["FAILED"], items: [], log: "actor crashed" }])
    const controller = new AbortController()
    const fetchImpl: FetchLike = (url, init) => {
      if (url.endsWith("/log")) {
        controller.abort()
        return Promise.reject(new DOMException("This operation was aborted", "AbortError"))
      }
      return server.fetch(url, init)
    }
    const clock = new FakeClock()
    const client = new ApifyClient({ token: "test-secret", baseUrl: TEST_BASE_URL, fetchImpl, clock })
    const backend = new ApifyBackend(client, { pollIntervalMs: 1000, waitTimeoutMs: 60_000, attachLogTail: true, clock })

    await expect(
      backend.collect({
        actor: getActor("telegram", "media"),
        targets: [alphaTarget],
        input,
        signal: controller.signal,
      }),
    ).rejects.toBeInstanceOf(CancellationError)
  })

  it("leaves the log alone unless asked", async () => {
    const { backend, server } = backendFor([{ statuses: ["ABORTED"], items: [], log: "actor crashed" }])

    await expect(
      backend.collect({ actor: getActor("telegram", "media"), targets: [alphaTarget], input }),
    ).rejects.toMatchObject({ logTail: null })
    expect(server.calls).toHaveLength(2)
  })

  it("follows the actor's multi-target flag", () => {
    const { backend } = backendFor([])
    expect(backend.acceptsMultipleTargets(getActor("telegram", "media"))).toBe(true)
    expect(backend.acceptsMultipleTargets(getActor("x", "ppr"))).toBe(false)
  })
})
