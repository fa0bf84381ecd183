import { join } from "node:path"

import { z } from "zod"

import { BACKEND_CHOICES, type BackendChoice } from "./backends/types.js"
import type { ExportDestination } from "./export/index.js"
import { parseDateOption } from "./normalize/dates.js"
import type { RecordFilters } from "./pipeline/collection.js"
import { getActor, getPlatformModule } from "./platforms/registry.js"
import type { ActorDefinition, ActorInputOptions } from "./platforms/types.js"
import type { ScrapeConfig } from "./scrape-config.js"
import {
  type DateRange,
  EXPORT_FORMATS,
  type ExportFormat,
  type Platform,
  type PostRange,
  type TargetDescriptor,
  type TargetKind,
} from "./schema/targets.js"

const DEFAULT_LIMITS: Record<Platform, number> = { telegram: 50, x: 20, linkedin: 20 }
const DEFAULT_DAYS = 7
const DEFAULT_OUTPUT_DIR = "output"
const DEFAULT_WAIT_TIMEOUT_SEC = 300
const DEFAULT_POLL_INTERVAL_SEC = 5

const intOption = (min: number, max: number) =>
  z
    .union([z.string(), z.number()])
    .transform((value) => Number(value))
    .pipe(z.number().int().min(min).max(max))
    .optional()

const listOption = z.array(z.string()).optional()

export const cliOptionsSchema = z.object({
  // Platform targets and actor settings
  channels: listOption,
  handles: listOption,
  search: listOption,
  urls: listOption,
  profiles: listOption,
  actor: z.string().optional(),
  backend: z.enum(BACKEND_CHOICES).optional(),
  maxPosts: intOption(1, 100_000),
  maxTweets: intOption(1, 100_000),
  days: intOption(1, 3650),
  postsFrom: intOption(1, Number.MAX_SAFE_INTEGER),
  postsTo: intOption(1, Number.MAX_SAFE_INTEGER),
  downloadMedia: z.boolean().optional(),
  sort: z.enum(["Top", "Latest"]).optional(),
  lang: z.string().min(2).optional(),

  // Common
  config: z.string().optional(),
  dateFrom: z.string().optional(),
  dateTo: z.string().optional(),
  formats: z.array(z.enum(EXPORT_FORMATS)).min(1).optional(),
  outputDir: z.string().min(1).optional(),
  out: z.string().min(1).optional(),
  outJson: z.string().min(1).optional(),
  outExcel: z.string().min(1).optional(),
  keywords: listOption,
  minViews: intOption(0, Number.MAX_SAFE_INTEGER),
  waitTimeout: intOption(1, 86_400),
  pollInterval: intOption(1, 3600),
  memoryMb: intOption(128, 32_768),
  concurrency: intOption(1, 20),
  runId: z.string().regex(/^[\w.-]+$/, "use letters, digits, dot, dash or underscore").optional(),
  resume: z.string().regex(/^[\w.-]+$/, "use letters, digits, dot, dash or underscore").optional(),
  db: z.string().min(1).optional(),
  history: z.boolean().default(true),
  plain: z.boolean().default(false),
  verbose: z.boolean().default(false),
})

export type CliOptions = z.infer<typeof cliOptionsSchema>

export const parseCliOptions = (raw: Record<string, unknown>): CliOptions => {
  const parsed = cliOptionsSchema.safeParse(raw)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    const path = issue.path.join(".")
    throw new Error(`Invalid option${path ? ` (${path})` : ""}: ${issue.message}`)
  }
  return parsed.data
}

export interface ScrapeSettings {
  platform: Platform
  runId: string
  resume: boolean
  actor: ActorDefinition
  backend: BackendChoice
  targets: TargetDescriptor[]
  input: ActorInputOptions
  filters: RecordFilters
  exports: ExportDestination[]
  waitTimeoutMs: number
  pollIntervalMs: number
  memoryMb: number | undefined
  concurrency: number
  /** `null` when run history is disabled. */
  history: { dbPath: string | undefined } | null
  plain: boolean
  verbose: boolean
}

/** `20260215_143022` in local time. */
export const nowRunId = (now: Date = new Date()): string => {
  const pad = (value: number): string => String(value).padStart(2, "0")
  return `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}_${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`
}

const parseDateValue = (value: string | null | undefined, name: string, endOfDay: boolean): Date | undefined => {
  if (value === null || value === undefined || value.trim() === "") {
    return undefined
  }
  const date = parseDateOption(value, { endOfDay })
  if (!date) {
    throw new Error(`Invalid option (${name}): unrecognized date "${value}"`)
  }
  return date
}

const resolveDateRange = (cli: CliOptions, config: ScrapeConfig): DateRange | undefined => {
  const from = parseDateValue(cli.dateFrom ?? config.filters?.dateFrom, "dateFrom", false)
  const to = parseDateValue(cli.dateTo ?? config.filters?.dateTo, "dateTo", true)
  if (from && to && from.getTime() > to.getTime()) {
    throw new Error("Invalid option (dateFrom): date range start is after its end")
  }
  return from || to ? { ...(from ? { from } : {}), ...(to ? { to } : {}) } : undefined
}

const resolvePostRange = (cli: CliOptions): PostRange | undefined => {
  if (cli.postsFrom === undefined && cli.postsTo === undefined) {
    return undefined
  }
  const from = cli.postsFrom ?? 1
  const to = cli.postsTo ?? from
  if (from > to) {
    throw new Error("Invalid option (postsFrom): post range start is after its end")
  }
  return { from, to }
}

interface RawTarget {
  kind: TargetKind
  value: string
}

const rawTargetsFor = (platform: Platform, cli: CliOptions, config: ScrapeConfig): RawTarget[] => {
  const tag = (kind: TargetKind, values: readonly string[] | undefined): RawTarget[] =>
    (values ?? []).map((value) => ({ kind, value }))

  if (platform === "telegram") {
    return tag("channel", cli.channels ?? config.telegram?.channels)
  }
  if (platform === "linkedin") {
    return tag("profile", cli.profiles ?? config.linkedin?.profiles)
  }
  // X targets from the command line replace the config lists as a whole.
  const fromCli = [...tag("handle", cli.handles), ...tag("search", cli.search), ...tag("url", cli.urls)]
  if (fromCli.length > 0) {
    return fromCli
  }
  return [
    ...tag("handle", config.x?.handles),
    ...tag("search", config.x?.searchTerms),
    ...tag("url", config.x?.urls),
  ]
}

const TARGET_FLAGS: Record<Platform, string> = {
  telegram: "--channels",
  x: "--handles, --search or --urls",
  linkedin: "--profiles",
}

const resolveLimit = (platform: Platform, cli: CliOptions, config: ScrapeConfig): number => {
  if (platform === "telegram") {
    return cli.maxPosts ?? config.telegram?.maxPosts ?? DEFAULT_LIMITS.telegram
  }
  if (platform === "x") {
    return cli.maxTweets ?? config.x?.maxTweets ?? DEFAULT_LIMITS.x
  }
  return cli.maxPosts ?? config.linkedin?.maxPosts ?? DEFAULT_LIMITS.linkedin
}

const resolveExports = (
  platform: Platform,
  runId: string,
  cli: CliOptions,
  config: ScrapeConfig,
): ExportDestination[] => {
  const outputDir = cli.outputDir ?? config.output?.dir ?? DEFAULT_OUTPUT_DIR
  const explicit: Partial<Record<ExportFormat, string>> = {
    csv: cli.out,
    json: cli.outJson,
    xlsx: cli.outExcel,
  }
  const requested = new Set<ExportFormat>(cli.formats ?? config.output?.formats ?? ["csv"])
  for (const format of EXPORT_FORMATS) {
    if (explicit[format]) {
      requested.add(format)
    }
  }
  return EXPORT_FORMATS.filter((format) => requested.has(format)).map((format) => ({
    format,
    path: explicit[format] ?? join(outputDir, `${platform}_${runId}.${format}`),
  }))
}

/**
 * Merges command-line options over the config file and built-in defaults.
 * Throws on unusable combinations before anything is submitted.
 */
export const resolveSettings = (
  platform: Platform,
  cli: CliOptions,
  config: ScrapeConfig,
  now: Date = new Date(),
): ScrapeSettings => {
  if (cli.resume && cli.runId && cli.resume !== cli.runId) {
    throw new Error("Invalid option (resume): --resume and --run-id name different runs")
  }
  if (cli.resume && !cli.history) {
    throw new Error("Invalid option (resume): --resume needs the run history; drop --no-history")
  }
  const runId = cli.resume ?? cli.runId ?? nowRunId(now)

  const platformModule = getPlatformModule(platform)
  const actor = getActor(platform, cli.actor ?? config[platform]?.actor)

  const rawTargets = rawTargetsFor(platform, cli, config)
  if (rawTargets.length === 0) {
    throw new Error(`No targets: pass ${TARGET_FLAGS[platform]} or list them in the config file`)
  }
  for (const raw of rawTargets) {
    if (!actor.targetKinds.includes(raw.kind)) {
      throw new Error(
        `The ${actor.key} actor does not take ${raw.kind} targets (accepts: ${actor.targetKinds.join(", ")})`,
      )
    }
  }

  const dateRange = resolveDateRange(cli, config)
  const postRange = platform === "telegram" ? resolvePostRange(cli) : undefined
  const days = platform === "telegram" ? (cli.days ?? config.telegram?.days ?? DEFAULT_DAYS) : undefined
  const limit = resolveLimit(platform, cli, config)

  const targets = rawTargets.map(
    (raw): TargetDescriptor => ({
      platform,
      kind: raw.kind,
      value: platformModule.normalizeTargetValue(raw.kind, raw.value),
      limit,
      ...(dateRange ? { dateRange } : {}),
      ...(days === undefined ? {} : { days }),
      ...(postRange ? { postRange } : {}),
    }),
  )

  const polling = config.polling
  return {
    platform,
    runId,
    resume: cli.resume !== undefined,
    actor,
    backend: cli.backend ?? (platform === "telegram" ? config.telegram?.backend : undefined) ?? "auto",
    targets,
    input: {
      downloadMedia: cli.downloadMedia ?? config.telegram?.downloadMedia ?? false,
      sort: cli.sort ?? config.x?.sort ?? "Latest",
      lang: cli.lang ?? config.x?.lang ?? null,
    },
    filters: {
      keywords: (cli.keywords ?? config.filters?.keywords ?? []).filter((keyword) => keyword.trim() !== ""),
      minViews: cli.minViews ?? config.filters?.minViews ?? 0,
      ...(dateRange ? { dateRange } : {}),
    },
    exports: resolveExports(platform, runId, cli, config),
    waitTimeoutMs: (cli.waitTimeout ?? polling?.waitTimeoutSec ?? DEFAULT_WAIT_TIMEOUT_SEC) * 1000,
    pollIntervalMs: (cli.pollInterval ?? polling?.pollIntervalSec ?? DEFAULT_POLL_INTERVAL_SEC) * 1000,
    memoryMb: cli.memoryMb ?? polling?.memoryMb ?? undefined,
    concurrency: cli.concurrency ?? polling?.concurrency ?? 1,
    history: cli.history ? { dbPath: cli.db } : null,
    plain: cli.plain,
    verbose: cli.verbose,
  }
}
