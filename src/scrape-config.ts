import { readFile, writeFile } from "node:fs/promises"

import yaml from "js-yaml"
import { z } from "zod"

import { BACKEND_CHOICES } from "./backends/types.js"
import { EXPORT_FORMATS } from "./schema/targets.js"

const positiveInt = z.number().int().positive()
const nameList = z.array(z.string().min(1))

const telegramSectionSchema = z.object({
  channels: nameList.optional(),
  actor: z.string().optional(),
  backend: z.enum(BACKEND_CHOICES).optional(),
  maxPosts: positiveInt.optional(),
  days: positiveInt.optional(),
  downloadMedia: z.boolean().optional(),
})

const xSectionSchema = z.object({
  handles: nameList.optional(),
  searchTerms: nameList.optional(),
  urls: nameList.optional(),
  actor: z.string().optional(),
  maxTweets: positiveInt.optional(),
  sort: z.enum(["Top", "Latest"]).optional(),
  lang: z.string().min(2).nullable().optional(),
})

const linkedinSectionSchema = z.object({
  profiles: nameList.optional(),
  actor: z.string().optional(),
  maxPosts: positiveInt.optional(),
})

/** Scrape defaults read from `--config`; command-line options override every field. */
export const scrapeConfigSchema = z
  .object({
    telegram: telegramSectionSchema.optional(),
    x: xSectionSchema.optional(),
    linkedin: linkedinSectionSchema.optional(),
    output: z
      .object({
        dir: z.string().min(1).optional(),
        formats: z.array(z.enum(EXPORT_FORMATS)).min(1).optional(),
      })
      .optional(),
    filters: z
      .object({
        keywords: z.array(z.string()).optional(),
        minViews: z.number().int().nonnegative().optional(),
        dateFrom: z.string().nullable().optional(),
        dateTo: z.string().nullable().optional(),
      })
      .optional(),
    polling: z
      .object({
        waitTimeoutSec: positiveInt.optional(),
        pollIntervalSec: positiveInt.optional(),
        memoryMb: positiveInt.nullable().optional(),
        concurrency: positiveInt.optional(),
      })
      .optional(),
  })
  .strict()

export type ScrapeConfig = z.infer<typeof scrapeConfigSchema>

export const parseScrapeConfig = (raw: unknown, origin: string): ScrapeConfig => {
  const parsed = scrapeConfigSchema.safeParse(raw ?? {})
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    const path = issue?.path.length ? issue.path.join(".") : "$"
    throw new Error(`Invalid config ${origin}: ${issue?.message ?? "unknown error"} (path: ${path})`)
  }
  return parsed.data
}

/**
 * Reads a YAML or JSON config file (JSON is valid YAML). The core schema keeps
 * `2024-01-01` a string instead of a timestamp.
 */
export const loadScrapeConfig = async (path: string): Promise<ScrapeConfig> => {
  const content = await readFile(path, "utf-8")
  let raw: unknown
  try {
    raw = yaml.load(content, { schema: yaml.CORE_SCHEMA })
  } catch (error) {
    const reason = error instanceof Error ? error.message.split("\n")[0] : String(error)
    throw new Error(`Invalid config ${path}: ${reason}`, { cause: error })
  }
  return parseScrapeConfig(raw, path)
}

export const SAMPLE_CONFIG = `# social-scrape configuration
# Every value here is a default; command-line options win.
# Credentials are read from the environment (.env), never from this file.

telegram:
  channels: []          # e.g. [durov, "https://t.me/telegram"]
  actor: media          # media | posts | messages | channel
  backend: auto         # auto | apify | session
  maxPosts: 50
  days: 7
  downloadMedia: false

x:
  handles: []           # e.g. [nasa, "@esa"]
  searchTerms: []
  urls: []
  actor: ppr            # ppr | search | full
  maxTweets: 20
  sort: Latest          # Top | Latest
  lang: null

linkedin:
  profiles: []          # usernames or https://www.linkedin.com/in/<name>/
  actor: profile_posts
  maxPosts: 20

output:
  dir: ./output
  formats: [csv]        # csv | json | xlsx

filters:
  keywords: []
  minViews: 0
  dateFrom: null        # e.g. 2024-01-01
  dateTo: null

polling:
  waitTimeoutSec: 300
  pollIntervalSec: 5
  memoryMb: null        # null = actor default
  concurrency: 1
`

/** Writes the sample; refuses to overwrite an existing file. */
export const writeSampleConfig = async (path: string): Promise<void> => {
  await writeFile(path, SAMPLE_CONFIG, { encoding: "utf-8", flag: "wx" })
}
