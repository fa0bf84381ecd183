import { throwIfAborted } from "./cancel.js"

export interface PaginateOffsetsConfig<T> {
  fetchPage: (offset: number, limit: number) => Promise<T[]>
  pageSize: number
  /** Safety stop for sources that never return a short page. */
  maxPages?: number
  signal?: AbortSignal
}

/**
 * Async generator that walks an offset/limit listing and yields each page.
 * Stops after an empty page or a page shorter than `pageSize`.
 */
export async function* paginateOffsets<T>(
  config: PaginateOffsetsConfig<T>,
): AsyncGenerator<{ page: number; offset: number; items: T[] }, void, undefined> {
  const maxPages = config.maxPages ?? 10_000
  let offset = 0

  for (let page = 0; page < maxPages; page += 1) {
    throwIfAborted(config.signal)
    const items = await config.fetchPage(offset, config.pageSize)
    if (items.length === 0) {
      return
    }
    yield { page, offset, items }
    if (items.length < config.pageSize) {
      return
    }
    offset += items.length
  }
}
