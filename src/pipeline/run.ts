import pLimit from "p-limit"

import type { BatchStep, ScrapeBackend } from "../backends/types.js"
import type { RunStore } from "../db/store.js"
import { FetchError, JobFailedError, SubmissionError } from "../errors.js"
import { type ExportDestination, type ExportOutcome, exportCollection } from "../export/index.js"
import { planBatches } from "../jobs/submit.js"
import type { Job } from "../jobs/types.js"
import { normalizeItems } from "../normalize/registry.js"
import type { ActorDefinition, ActorInputOptions } from "../platforms/types.js"
import type { CanonicalRecord } from "../schema/canonical.js"
import { type Platform, type TargetDescriptor, describeTarget, targetKey, validateTarget } from "../schema/targets.js"
import { isCancellationError, throwIfAborted, toCancellationError } from "../utils/cancel.js"
import { getErrorMessage, sanitizeForError } from "../utils/sanitize.js"
import { applyFilters, buildOutputCollection, type RecordFilters } from "./collection.js"
import type { RunResult, TargetFailure, TargetOutcome, TargetStep } from "./types.js"

const MAX_INVALID_SAMPLES = 5

export interface ScrapePlan {
  runId: string
  platform: Platform
  actor: ActorDefinition
  targets: TargetDescriptor[]
  input: ActorInputOptions
  filters: RecordFilters
  exports: ExportDestination[]
  /** Batches in flight at once. */
  concurrency: number
}

export interface RunEvents {
  onBatchStart?: (label: string) => void
  onStep?: (label: string, step: BatchStep, detail: string) => void
  onJob?: (label: string, job: Job) => void
  onTargetDone?: (outcome: TargetOutcome) => void
  onExport?: (outcome: ExportOutcome) => void
}

export interface RunDeps {
  backend: ScrapeBackend
  /** Run history; outcomes and records are saved as each target finishes. */
  store?: RunStore | null
  /** Records of targets that already succeeded in the resumed run, keyed by `targetKey`. */
  resumed?: ReadonlyMap<string, readonly CanonicalRecord[]>
  signal?: AbortSignal
  events?: RunEvents
}

interface BatchResult {
  outcomes: TargetOutcome[]
  records: Map<string, CanonicalRecord[]>
  invalidMessages: string[]
  placeholders: number
}

const toFailure = (error: unknown, platform: Platform, target: string, lastStep: TargetStep): TargetFailure => {
  const message = sanitizeForError(getErrorMessage(error))
  if (error instanceof SubmissionError) {
    return { code: "SUBMISSION_FAILED", platform, step: "submit", target, message }
  }
  if (error instanceof JobFailedError) {
    return {
      code: "JOB_FAILED",
      platform,
      step: "poll",
      target,
      message,
      ...(error.logTail ? { logTail: error.logTail } : {}),
    }
  }
  if (error instanceof FetchError) {
    return { code: "FETCH_FAILED", platform, step: "fetch", target, message }
  }
  return { code: "UNEXPECTED", platform, step: lastStep, target, message }
}

const BY_NAME_KINDS = new Set(["channel", "handle", "profile"])

/**
 * Attributes each record of a batch to one of its targets: by source name for
 * channels, handles and profiles; otherwise to the batch's first search or URL
 * target, or its first target.
 */
export const assignRecordsToTargets = (
  targets: readonly TargetDescriptor[],
  records: readonly CanonicalRecord[],
): Map<string, CanonicalRecord[]> => {
  const assigned = new Map<string, CanonicalRecord[]>(targets.map((target) => [targetKey(target), []]))
  const byName = new Map<string, string>()
  for (const target of targets) {
    if (BY_NAME_KINDS.has(target.kind)) {
      byName.set(target.value.toLowerCase(), targetKey(target))
    }
  }
  const fallbackTarget = targets.find((target) => !BY_NAME_KINDS.has(target.kind)) ?? targets[0]
  const fallbackKey = targetKey(fallbackTarget)
  for (const record of records) {
    const key = byName.get(record.source.toLowerCase()) ?? fallbackKey
    assigned.get(key)?.push(record)
  }
  return assigned
}

const fallbackSourceFor = (targets: readonly TargetDescriptor[]): string | null =>
  targets.length === 1 && BY_NAME_KINDS.has(targets[0].kind) ? targets[0].value : null

const batchLabel = (targets: readonly TargetDescriptor[]): string => targets.map(describeTarget).join(", ")

const failedOutcome = (target: TargetDescriptor, jobId: string | null, failure: TargetFailure): TargetOutcome => ({
  key: targetKey(target),
  target,
  status: "failed",
  jobId,
  failure,
})

/**
 * Runs every batch lifecycle, isolating failures per batch, then dedups,
 * filters and exports. Cancellation rejects with `CancellationError` before
 * anything is exported.
 */
export const runScrape = async (plan: ScrapePlan, deps: RunDeps): Promise<RunResult> => {
  const { backend, signal, events } = deps
  const outcomes = new Map<string, TargetOutcome>()
  const recordsByTarget = new Map<string, readonly CanonicalRecord[]>()
  const invalidMessages: string[] = []
  let placeholders = 0

  const settle = (outcome: TargetOutcome, records: readonly CanonicalRecord[]) => {
    outcomes.set(outcome.key, outcome)
    recordsByTarget.set(outcome.key, records)
    if (!(outcome.status === "succeeded" && outcome.resumed)) {
      deps.store?.saveTargetOutcome(outcome, records)
    }
    events?.onTargetDone?.(outcome)
  }

  const targets = [...new Map(plan.targets.map((target) => [targetKey(target), target])).values()]
  const pending: TargetDescriptor[] = []
  for (const target of targets) {
    const key = targetKey(target)
    const resumedRecords = deps.resumed?.get(key)
    if (resumedRecords) {
      settle(
        { key, target, status: "succeeded", jobId: null, recordCount: resumedRecords.length, resumed: true },
        resumedRecords,
      )
      continue
    }
    try {
      validateTarget(target)
      pending.push(target)
    } catch (error) {
      settle(failedOutcome(target, null, toFailure(error, plan.platform, describeTarget(target), "submit")), [])
    }
  }

  const batches = planBatches(backend.acceptsMultipleTargets(plan.actor), pending)

  // Refused credentials stop every later batch with the same error.
  let authFailure: SubmissionError | null = null

  const runBatch = async (batch: TargetDescriptor[]): Promise<BatchResult> => {
    const label = batchLabel(batch)
    if (authFailure) {
      const failure = toFailure(authFailure, plan.platform, label, "submit")
      return {
        outcomes: batch.map((target) => failedOutcome(target, null, { ...failure, target: describeTarget(target) })),
        records: new Map(),
        invalidMessages: [],
        placeholders: 0,
      }
    }

    throwIfAborted(signal)
    events?.onBatchStart?.(label)
    let lastStep: TargetStep = "submit"
    let jobId: string | null = null
    try {
      const raw = await backend.collect({
        actor: plan.actor,
        targets: batch,
        input: plan.input,
        signal,
        hooks: {
          onStep: (step, detail) => {
            lastStep = step
            events?.onStep?.(label, step, detail)
          },
          onJob: (job) => {
            jobId = job.id
            events?.onJob?.(label, job)
          },
        },
      })
      lastStep = "normalize"
      const normalized = normalizeItems(raw.items, raw.variant, {
        platform: plan.platform,
        fallbackSource: fallbackSourceFor(batch),
      })
      const records = assignRecordsToTargets(batch, normalized.records)
      const finalJobId = raw.job?.id ?? jobId
      return {
        outcomes: batch.map((target) => ({
          key: targetKey(target),
          target,
          status: "succeeded",
          jobId: finalJobId,
          recordCount: records.get(targetKey(target))?.length ?? 0,
          resumed: false,
        })),
        records,
        invalidMessages: normalized.invalid.map((error) => error.message),
        placeholders: normalized.placeholders,
      }
    } catch (error) {
      if (isCancellationError(error)) {
        throw error
      }
      if (error instanceof SubmissionError && error.reason === "auth") {
        authFailure = error
      }
      return {
        outcomes: batch.map((target) =>
          failedOutcome(target, jobId, toFailure(error, plan.platform, describeTarget(target), lastStep)),
        ),
        records: new Map(),
        invalidMessages: [],
        placeholders: 0,
      }
    }
  }

  const limit = pLimit(Math.max(1, plan.concurrency))
  const settled = await Promise.allSettled(
    batches.map((batch) =>
      limit(async () => {
        const result = await runBatch(batch)
        for (const outcome of result.outcomes) {
          settle(outcome, result.records.get(outcome.key) ?? [])
        }
        invalidMessages.push(...result.invalidMessages)
        placeholders += result.placeholders
      }),
    ),
  )
  for (const result of settled) {
    if (result.status === "rejected") {
      throw result.reason
    }
  }
  if (signal?.aborted) {
    throw toCancellationError(signal)
  }

  const allRecords = targets.flatMap((target) => recordsByTarget.get(targetKey(target)) ?? [])
  const collection = buildOutputCollection(allRecords)
  const filtered = applyFilters(collection, plan.filters)

  const exports = await exportCollection(filtered, plan.exports, signal)
  for (const outcome of exports) {
    events?.onExport?.(outcome)
  }

  return {
    runId: plan.runId,
    platform: plan.platform,
    actorKey: plan.actor.key,
    backend: backend.name,
    collection: filtered,
    targets: targets.flatMap((target) => outcomes.get(targetKey(target)) ?? []),
    exports,
    skipped: {
      invalid: invalidMessages.length,
      placeholders,
      duplicates: allRecords.length - collection.length,
      filtered: collection.length - filtered.length,
    },
    invalidSamples: invalidMessages.slice(0, MAX_INVALID_SAMPLES),
  }
}

/** 0 when every target and every export succeeded, 1 otherwise. */
export const runExitCode = (result: Pick<RunResult, "targets" | "exports">): 0 | 1 =>
  result.targets.every((outcome) => outcome.status === "succeeded") &&
  result.exports.every((outcome) => outcome.status === "written")
    ? 0
    : 1
