import { JobFailedError } from "../../errors.js"
import { fetchResults } from "../../jobs/fetch-results.js"
import { pollJob } from "../../jobs/poll.js"
import { submitJob } from "../../jobs/submit.js"
import type { Job } from "../../jobs/types.js"
import { isCancellationError } from "../../utils/cancel.js"
import type { Clock } from "../../utils/clock.js"
import type { RetryContext } from "../../utils/retry.js"
import { getErrorMessage } from "../../utils/sanitize.js"
import type { BatchRequest, RawBatch, ScrapeBackend } from "../types.js"
import type { ApifyClient } from "./client.js"

export interface ApifyBackendOptions {
  memoryMb?: number
  pollIntervalMs?: number
  waitTimeoutMs?: number
  pageSize?: number
  /** Fetch the run log tail into `JobFailedError.logTail` when a run fails. */
  attachLogTail?: boolean
  clock?: Clock
  onRetry?: (ctx: RetryContext) => void
}

/** submit → poll → fetch for one batch of targets. */
export class ApifyBackend implements ScrapeBackend {
  readonly name = "apify" as const

  constructor(
    private readonly client: ApifyClient,
    private readonly options: ApifyBackendOptions = {},
  ) {}

  acceptsMultipleTargets(actor: BatchRequest["actor"]): boolean {
    return actor.multiTarget
  }

  async collect(request: BatchRequest): Promise<RawBatch> {
    const { actor, targets, signal, hooks } = request
    hooks?.onStep?.("submit", `starting ${actor.actorName} for ${targets.length} target(s)`)
    const queued = await submitJob(this.client, actor, targets, {
      input: request.input,
      memoryMb: this.options.memoryMb,
      signal,
    })
    hooks?.onJob?.(queued)

    hooks?.onStep?.("poll", `waiting for run ${queued.remoteRunId}`)
    let finished: Job
    try {
      finished = await pollJob(queued, {
        statusSource: this.client,
        clock: this.options.clock,
        intervalMs: this.options.pollIntervalMs,
        timeoutMs: this.options.waitTimeoutMs,
        signal,
        onStatus: (job) => hooks?.onJob?.(job),
        onRetry: this.options.onRetry,
      })
    } catch (error) {
      if (error instanceof JobFailedError && this.options.attachLogTail) {
        error.logTail = await this.readLogTail(queued.remoteRunId, signal)
      }
      throw error
    }

    hooks?.onStep?.("fetch", `reading dataset ${finished.datasetId ?? "?"}`)
    const items = await fetchResults(finished, this.client, {
      pageSize: this.options.pageSize,
      clock: this.options.clock,
      signal,
      onRetry: this.options.onRetry,
      onPage: (page) =>
        hooks?.onStep?.("fetch", `read ${page.offset + page.count}${page.total === null ? "" : `/${page.total}`} items`),
    })
    return { items, variant: actor.variant, job: finished }
  }

  private async readLogTail(remoteRunId: string, signal?: AbortSignal): Promise<string> {
    try {
      return await this.client.getRunLogTail(remoteRunId, signal)
    } catch (error) {
      if (isCancellationError(error)) {
        throw error
      }
      return `(log unavailable: ${getErrorMessage(error)})`
    }
  }

  close(): Promise<void> {
    return Promise.resolve()
  }
}
