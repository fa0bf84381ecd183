import { z } from "zod"

import { SubmissionError } from "../errors.js"

export const ALL_PLATFORMS = ["telegram", "x", "linkedin"] as const
export type Platform = (typeof ALL_PLATFORMS)[number]

export const EXPORT_FORMATS = ["csv", "json", "xlsx"] as const
export type ExportFormat = (typeof EXPORT_FORMATS)[number]

export const TARGET_KINDS = ["channel", "handle", "search", "url", "profile"] as const
export type TargetKind = (typeof TARGET_KINDS)[number]

export interface DateRange {
  from?: Date
  to?: Date
}

export interface PostRange {
  from: number
  to: number
}

/** One thing to scrape, already reduced to its bare identifier. */
export interface TargetDescriptor {
  platform: Platform
  kind: TargetKind
  value: string
  limit: number
  dateRange?: DateRange
  /** Look-back window in days, for actors that take one instead of dates. */
  days?: number
  postRange?: PostRange
}

const targetDescriptorSchema = z
  .object({
    platform: z.enum(ALL_PLATFORMS),
    kind: z.enum(TARGET_KINDS),
    value: z.string().trim().min(1, "target value must not be empty"),
    limit: z.number().int().positive("limit must be a positive integer"),
    dateRange: z
      .object({
        from: z.date().optional(),
        to: z.date().optional(),
      })
      .optional()
      .refine((range) => !range?.from || !range.to || range.from.getTime() <= range.to.getTime(), {
        message: "date range start is after its end",
      }),
    days: z.number().int().positive("days must be a positive integer").optional(),
    postRange: z
      .object({
        from: z.number().int().positive(),
        to: z.number().int().positive(),
      })
      .optional()
      .refine((range) => !range || range.from <= range.to, {
        message: "post range start is after its end",
      }),
  })

/** Throws `SubmissionError("invalid-target")` naming the first violated constraint. */
export const validateTarget = (target: TargetDescriptor): TargetDescriptor => {
  const parsed = targetDescriptorSchema.safeParse(target)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    const path = issue?.path.length ? issue.path.join(".") : "$"
    throw new SubmissionError(
      "invalid-target",
      `Invalid target "${target.value}": ${issue?.message ?? "unknown error"} (path: ${path})`,
    )
  }
  return target
}

/** Stable identity of a target inside a run, used for outcomes and resume. */
export const targetKey = (target: Pick<TargetDescriptor, "platform" | "kind" | "value">): string =>
  `${target.platform}:${target.kind}:${target.value}`

export const describeTarget = (target: Pick<TargetDescriptor, "kind" | "value">): string =>
  target.kind === "search" ? `"${target.value}"` : target.value
