import { z } from "zod"

import type { DatasetSource, RemoteRunSnapshot, RunStarter, RunStatusSource } from "../../jobs/types.js"
import type { Clock } from "../../utils/clock.js"
import {
  type FetchLike,
  HttpError,
  type HttpRequest,
  httpRequestJson,
  httpRequestText,
  isTransientHttpError,
} from "../../utils/http.js"
import { retry, type RetryContext } from "../../utils/retry.js"
import { buildUrl, joinUrl, type QueryParams } from "../../utils/url.js"

export const DEFAULT_APIFY_BASE_URL = "https://api.apify.com/v2"
const DEFAULT_REQUEST_TIMEOUT_MS = 30_000
const DEFAULT_START_RETRIES = 2
const LOG_TAIL_CHARS = 500

const runSchema = z
  .object({
    id: z.string().min(1).optional(),
    status: z.string().min(1),
    statusMessage: z.string().nullish(),
    defaultDatasetId: z.string().nullish(),
  })
  .loose()

const runEnvelopeSchema = z.object({ data: runSchema }).loose()

const datasetEnvelopeSchema = z
  .object({
    data: z
      .object({
        itemCount: z.number().int().nonnegative().nullish(),
      })
      .loose(),
  })
  .loose()

export interface ApifyClientOptions {
  token: string
  baseUrl?: string
  timeoutMs?: number
  /** Extra attempts for starting a run after a transient failure. */
  startRetries?: number
  fetchImpl?: FetchLike
  clock?: Clock
  onRetry?: (ctx: RetryContext) => void
}

const parseEnvelope = <T>(schema: z.ZodType<T>, body: unknown, what: string): T => {
  const parsed = schema.safeParse(body)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    const path = issue?.path.length ? issue.path.join(".") : "$"
    throw new Error(`Unexpected ${what} response: ${issue?.message ?? "unknown error"} (path: ${path})`)
  }
  return parsed.data
}

/** Thin client over the Apify REST API v2 endpoints the pipeline needs. */
export class ApifyClient implements RunStarter, RunStatusSource, DatasetSource {
  private readonly token: string
  private readonly baseUrl: string
  private readonly timeoutMs: number
  private readonly startRetries: number
  private readonly fetchImpl?: FetchLike
  private readonly clock?: Clock
  private readonly onRetry?: (ctx: RetryContext) => void

  constructor(options: ApifyClientOptions) {
    this.token = options.token
    this.baseUrl = options.baseUrl ?? DEFAULT_APIFY_BASE_URL
    this.timeoutMs = options.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS
    this.startRetries = options.startRetries ?? DEFAULT_START_RETRIES
    this.fetchImpl = options.fetchImpl
    this.clock = options.clock
    this.onRetry = options.onRetry
  }

  private request(
    method: HttpRequest["method"],
    segments: string[],
    params: QueryParams,
    extra: { body?: unknown; signal?: AbortSignal },
  ): HttpRequest {
    return {
      method,
      url: buildUrl(joinUrl(this.baseUrl, ...segments), params),
      headers: { authorization: `Bearer ${this.token}` },
      body: extra.body,
      timeoutMs: this.timeoutMs,
      signal: extra.signal,
      fetchImpl: this.fetchImpl,
    }
  }

  async startRun(
    actorId: string,
    input: Record<string, unknown>,
    options: { memoryMb?: number; signal?: AbortSignal },
  ): Promise<{ remoteRunId: string | null; datasetId: string | null; remoteStatus: string | null }> {
    const request = this.request("POST", ["acts", actorId, "runs"], { memory: options.memoryMb }, {
      body: input,
      signal: options.signal,
    })
    const response = await retry(() => httpRequestJson(request), {
      retries: this.startRetries,
      minDelayMs: 1_000,
      maxDelayMs: 10_000,
      shouldRetry: (error) =>
        isTransientHttpError(error) ? { retry: true, delayMs: error instanceof HttpError ? error.retryAfterMs : undefined } : false,
      onRetry: this.onRetry,
      clock: this.clock,
      signal: options.signal,
    })
    const { data } = parseEnvelope(runEnvelopeSchema, response.body, "run start")
    return {
      remoteRunId: data.id ?? null,
      datasetId: data.defaultDatasetId ?? null,
      remoteStatus: data.status,
    }
  }

  async getRun(remoteRunId: string, signal?: AbortSignal): Promise<RemoteRunSnapshot> {
    const response = await httpRequestJson(this.request("GET", ["actor-runs", remoteRunId], {}, { signal }))
    const { data } = parseEnvelope(runEnvelopeSchema, response.body, "run status")
    return {
      remoteStatus: data.status,
      statusMessage: data.statusMessage ?? null,
      datasetId: data.defaultDatasetId ?? null,
    }
  }

  /** Last characters of the run log, for diagnosing failed runs. */
  async getRunLogTail(remoteRunId: string, signal?: AbortSignal): Promise<string> {
    const request = this.request("GET", ["actor-runs", remoteRunId, "log"], {}, { signal })
    const response = await httpRequestText({ ...request, headers: { ...request.headers, accept: "text/plain" } })
    return response.body.slice(-LOG_TAIL_CHARS)
  }

  async getDatasetItemCount(datasetId: string, signal?: AbortSignal): Promise<number | null> {
    const response = await httpRequestJson(this.request("GET", ["datasets", datasetId], {}, { signal }))
    const { data } = parseEnvelope(datasetEnvelopeSchema, response.body, "dataset")
    return data.itemCount ?? null
  }

  async listDatasetItems(datasetId: string, offset: number, limit: number, signal?: AbortSignal): Promise<unknown[]> {
    const response = await httpRequestJson(
      this.request("GET", ["datasets", datasetId, "items"], { offset, limit, clean: true, format: "json" }, { signal }),
    )
    if (!Array.isArray(response.body)) {
      throw new Error(`Unexpected dataset items response for ${datasetId}: expected a JSON array`)
    }
    return response.body
  }
}
