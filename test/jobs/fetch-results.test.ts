import { describe, expect, it } from "vitest"

import { FetchError } from "../../src/errors.js"
import { fetchResults } from "../../src/jobs/fetch-results.js"
import type { DatasetSource } from "../../src/jobs/types.js"
import { HttpError } from "../../src/utils/http.js"
import { FakeClock } from "../helpers/fake-clock.js"
import { makeJob } from "../helpers/jobs.js"

class FakeDataset implements DatasetSource {
  readonly reads: Array<[number, number]> = []
  failAtOffset: number | null = null

  constructor(
    private readonly items: unknown[],
    private readonly reportedCount: number | null = items.length,
  ) {}

  getDatasetItemCount(): Promise<number | null> {
    return Promise.resolve(this.reportedCount)
  }

  listDatasetItems(_datasetId: string, offset: number, limit: number): Promise<unknown[]> {
    this.reads.push([offset, limit])
    if (offset === this.failAtOffset) {
      return Promise.reject(new HttpError({ message: "HTTP 502", status: 502, url: "https://h.test" }))
    }
    return Promise.resolve(this.items.slice(offset, offset + limit))
  }
}

const succeeded = makeJob({ status: "succeeded", remoteStatus: "SUCCEEDED" })
const items = (count: number) => Array.from({ length: count }, (_, index) => ({ id: index }))

describe("fetchResults", () => {
  it("drains every page in order", async () => {
    const dataset = new FakeDataset(items(2500))
    const pages: Array<{ offset: number; count: number; total: number | null }> = []

    const result = await fetchResults(succeeded, dataset, { onPage: (page) => pages.push(page) })

    expect(result).toHaveLength(2500)
    expect(result[2499]).toEqual({ id: 2499 })
    expect(pages).toEqual([
      { offset: 0, count: 1000, total: 2500 },
      { offset: 1000, count: 1000, total: 2500 },
      { offset: 2000, count: 500, total: 2500 },
    ])
  })

  it("reads one extra empty page when the last page is full", async () => {
    const dataset = new FakeDataset(items(4))
    await fetchResults(succeeded, dataset, { pageSize: 2 })
    expect(dataset.reads).toEqual([
      [0, 2],
      [2, 2],
      [4, 2],
    ])
  })

  it("returns an empty list for an empty dataset", async () => {
    await expect(fetchResults(succeeded, new FakeDataset([], null))).resolves.toEqual([])
    await expect(fetchResults(succeeded, new FakeDataset([], 0))).resolves.toEqual([])
  })

  it("only reads succeeded runs", async () => {
    await expect(fetchResults(makeJob({ status: "running" }), new FakeDataset([]))).rejects.toThrow(
      "Run run-1 is running, results are only read from succeeded runs",
    )
  })

  it("needs a dataset", async () => {
    await expect(fetchResults({ ...succeeded, datasetId: null }, new FakeDataset([]))).rejects.toThrow(
      "Run run-1 succeeded but has no dataset",
    )
  })

  it("names the offset of a page that keeps failing", async () => {
    const dataset = new FakeDataset(items(3))
    dataset.failAtOffset = 2
    const clock = new FakeClock()

    const fetching = fetchResults(succeeded, dataset, { pageSize: 2, retries: 1, clock })

    await expect(fetching).rejects.toBeInstanceOf(FetchError)
    await expect(fetching).rejects.toMatchObject({
      offset: 2,
      message: "Could not read dataset d1 at offset 2: HTTP 502",
    })
    expect(dataset.reads).toEqual([
      [0, 2],
      [2, 2],
      [2, 2],
    ])
    expect(clock.sleeps).toHaveLength(1)
  })

  it("fails when a non-empty dataset yields nothing", async () => {
    await expect(fetchResults(succeeded, new FakeDataset([], 5))).rejects.toThrow(
      "Dataset d1 reports 5 items but none could be read",
    )
  })
})
