import { type Clock, systemClock } from "./clock.js"

export type RetryDecision =
  | boolean
  | {
      retry: boolean
      delayMs?: number
    }

export interface RetryContext {
  attempt: number
  maxAttempts: number
  delayMs: number
  error: unknown
}

export interface RetryOptions {
  /** Extra attempts after the first one: 3 means up to 4 tries. */
  retries: number
  minDelayMs: number
  maxDelayMs: number
  shouldRetry: (error: unknown) => RetryDecision
  onRetry?: (ctx: RetryContext) => void
  onGiveUp?: (ctx: Omit<RetryContext, "delayMs">) => void
  /** Upper bound for the next wait, e.g. the time left before a deadline. */
  delayBudgetMs?: () => number
  randomFn?: () => number
  jitterRatio?: number
  clock?: Clock
  signal?: AbortSignal
}

const normalizeDecision = (decision: RetryDecision): { retry: boolean; delayMs?: number } =>
  typeof decision === "boolean" ? { retry: decision } : decision

export const computeBackoffMs = (
  attempt: number,
  opts: Pick<RetryOptions, "minDelayMs" | "maxDelayMs" | "randomFn" | "jitterRatio">,
  customDelayMs?: number,
): number => {
  const validCustomDelay =
    customDelayMs !== undefined && Number.isFinite(customDelayMs) && customDelayMs >= 0
      ? customDelayMs
      : undefined
  const backoff =
    validCustomDelay === undefined
      ? Math.min(opts.maxDelayMs, opts.minDelayMs * 2 ** attempt)
      : Math.min(opts.maxDelayMs, validCustomDelay)
  const jitterRatio = Math.min(1, Math.max(0, opts.jitterRatio ?? 0.2))
  const random = Math.min(1, Math.max(0, (opts.randomFn ?? Math.random)()))
  return backoff + Math.floor(backoff * jitterRatio * random)
}

export const retry = async <T>(fn: () => Promise<T>, opts: RetryOptions): Promise<T> => {
  const clock = opts.clock ?? systemClock
  const maxAttempts = opts.retries + 1
  let attempt = 0

  for (;;) {
    try {
      return await fn()
    } catch (error) {
      const decision = normalizeDecision(opts.shouldRetry(error))
      const budgetMs = opts.delayBudgetMs?.()
      const outOfBudget = budgetMs !== undefined && budgetMs <= 0
      if (attempt >= opts.retries || !decision.retry || outOfBudget) {
        opts.onGiveUp?.({ attempt: attempt + 1, maxAttempts, error })
        throw error
      }

      const backoffMs = computeBackoffMs(attempt, opts, decision.delayMs)
      const delayMs = budgetMs === undefined ? backoffMs : Math.min(backoffMs, budgetMs)
      opts.onRetry?.({ attempt: attempt + 1, maxAttempts, delayMs, error })
      await clock.sleep(delayMs, opts.signal)
      attempt += 1
    }
  }
}
