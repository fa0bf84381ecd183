import { isCancellationError, throwIfAborted } from "./cancel.js"
import { sanitizeForError } from "./sanitize.js"

export type HttpHeaders = Record<string, string>

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>

export interface HttpResponse<TBody> {
  status: number
  contentType: string
  headers: Headers
  body: TBody
}

export interface HttpRequest {
  method: "GET" | "POST"
  url: string
  headers?: HttpHeaders
  body?: unknown
  timeoutMs: number
  signal?: AbortSignal
  fetchImpl?: FetchLike
}

export class HttpError extends Error {
  readonly code = "HTTP_ERROR"
  /** `null` when no response was received (network failure or timeout). */
  readonly status: number | null
  readonly url: string
  readonly isTimeout: boolean
  readonly retryAfterMs?: number
  readonly bodySnippet: string

  constructor(args: {
    message: string
    status: number | null
    url: string
    isTimeout?: boolean
    retryAfterMs?: number
    bodySnippet?: string
    cause?: unknown
  }) {
    super(args.message, { cause: args.cause })
    this.name = "HttpError"
    this.status = args.status
    this.url = args.url
    this.isTimeout = args.isTimeout ?? false
    this.retryAfterMs = args.retryAfterMs
    this.bodySnippet = args.bodySnippet ?? ""
  }
}

/** Network failures, timeouts, 429 and 5xx are worth another attempt. */
export const isTransientHttpError = (error: unknown): boolean => {
  if (!(error instanceof HttpError)) {
    return false
  }
  if (error.isTimeout || error.status === null) {
    return true
  }
  return error.status === 429 || error.status >= 500
}

const withTimeoutSignal = (timeoutMs: number, signal?: AbortSignal): AbortSignal => {
  const timeoutSignal = AbortSignal.timeout(timeoutMs)
  return signal ? AbortSignal.any([timeoutSignal, signal]) : timeoutSignal
}

const parseRetryAfterMs = (headerValue: string | null): number | undefined => {
  if (headerValue && /^\d+$/.test(headerValue)) {
    return Number(headerValue) * 1000
  }
  return undefined
}

const snippetOf = (body: string): string => body.replaceAll(/\s+/g, " ").slice(0, 200)

export const httpRequestText = async (request: HttpRequest): Promise<HttpResponse<string>> => {
  throwIfAborted(request.signal)
  const fetchImpl = request.fetchImpl ?? fetch
  const safeUrl = sanitizeForError(request.url)
  const headers: HttpHeaders = { accept: "application/json", ...request.headers }
  const init: RequestInit = {
    method: request.method,
    headers,
    signal: withTimeoutSignal(request.timeoutMs, request.signal),
  }
  if (request.body !== undefined) {
    headers["content-type"] = "application/json"
    init.body = JSON.stringify(request.body)
  }

  // The body is read under the same try: a reset or timeout can land mid-body.
  let response: Response
  let body: string
  try {
    response = await fetchImpl(request.url, init)
    body = await response.text()
  } catch (error) {
    throwIfAborted(request.signal)
    if (isCancellationError(error) || (error instanceof Error && error.name === "TimeoutError")) {
      throw new HttpError({
        message: `${request.method} ${safeUrl} timed out after ${request.timeoutMs}ms`,
        status: null,
        url: safeUrl,
        isTimeout: true,
        cause: error,
      })
    }
    const reason = error instanceof Error ? error.message : String(error)
    throw new HttpError({
      message: `${request.method} ${safeUrl} failed: ${sanitizeForError(reason)}`,
      status: null,
      url: safeUrl,
      cause: error,
    })
  }

  if (!response.ok) {
    const snippet = snippetOf(body)
    throw new HttpError({
      message: `HTTP ${response.status} on ${request.method} ${safeUrl}: ${snippet}`,
      status: response.status,
      url: safeUrl,
      retryAfterMs: response.status === 429 ? parseRetryAfterMs(response.headers.get("retry-after")) : undefined,
      bodySnippet: snippet,
    })
  }
  return {
    status: response.status,
    contentType: response.headers.get("content-type") ?? "",
    headers: response.headers,
    body,
  }
}

export const httpRequestJson = async (request: HttpRequest): Promise<HttpResponse<unknown>> => {
  const textResp = await httpRequestText(request)
  let parsedBody: unknown
  try {
    parsedBody = JSON.parse(textResp.body)
  } catch {
    const contentType = textResp.contentType || "unknown"
    throw new Error(
      `Invalid JSON response from ${request.method} ${sanitizeForError(request.url)} (status=${textResp.status}, content-type=${contentType}): ${snippetOf(textResp.body)}`,
    )
  }
  return { ...textResp, body: parsedBody }
}
