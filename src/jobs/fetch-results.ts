import { FetchError } from "../errors.js"
import { isCancellationError } from "../utils/cancel.js"
import { type Clock, systemClock } from "../utils/clock.js"
import { isTransientHttpError } from "../utils/http.js"
import { paginateOffsets } from "../utils/paginate.js"
import { retry, type RetryContext } from "../utils/retry.js"
import { getErrorMessage, sanitizeForError } from "../utils/sanitize.js"
import type { DatasetSource, Job } from "./types.js"

export const DEFAULT_PAGE_SIZE = 1_000
export const DEFAULT_PAGE_RETRIES = 3

export interface FetchResultsOptions {
  pageSize?: number
  retries?: number
  clock?: Clock
  signal?: AbortSignal
  onPage?: (page: { offset: number; count: number; total: number | null }) => void
  onRetry?: (ctx: RetryContext) => void
}

/** Drains every page of the job's dataset into one array, in dataset order. */
export const fetchResults = async (
  job: Job,
  source: DatasetSource,
  options: FetchResultsOptions = {},
): Promise<unknown[]> => {
  if (job.status !== "succeeded") {
    throw new FetchError(`Run ${job.remoteRunId} is ${job.status}, results are only read from succeeded runs`)
  }
  const datasetId = job.datasetId
  if (!datasetId) {
    throw new FetchError(`Run ${job.remoteRunId} succeeded but has no dataset`)
  }

  const clock = options.clock ?? systemClock
  const withRetry = <T>(fn: () => Promise<T>): Promise<T> =>
    retry(fn, {
      retries: options.retries ?? DEFAULT_PAGE_RETRIES,
      minDelayMs: 1_000,
      maxDelayMs: 10_000,
      shouldRetry: (error) => !isCancellationError(error) && isTransientHttpError(error),
      onRetry: options.onRetry,
      clock,
      signal: options.signal,
    })

  let total: number | null
  try {
    total = await withRetry(() => source.getDatasetItemCount(datasetId, options.signal))
  } catch (error) {
    if (isCancellationError(error)) {
      throw error
    }
    throw new FetchError(`Could not read dataset ${datasetId}: ${sanitizeForError(getErrorMessage(error))}`, {
      cause: error,
    })
  }

  const items: unknown[] = []
  const pages = paginateOffsets({
    pageSize: options.pageSize ?? DEFAULT_PAGE_SIZE,
    signal: options.signal,
    fetchPage: async (offset, limit) => {
      try {
        return await withRetry(() => source.listDatasetItems(datasetId, offset, limit, options.signal))
      } catch (error) {
        if (isCancellationError(error)) {
          throw error
        }
        throw new FetchError(
          `Could not read dataset ${datasetId} at offset ${offset}: ${sanitizeForError(getErrorMessage(error))}`,
          { offset, cause: error },
        )
      }
    },
  })
  for await (const page of pages) {
    items.push(...page.items)
    options.onPage?.({ offset: page.offset, count: page.items.length, total })
  }

  if (items.length === 0 && total !== null && total > 0) {
    throw new FetchError(`Dataset ${datasetId} reports ${total} items but none could be read`)
  }
  return items
}
