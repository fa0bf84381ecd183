#!/usr/bin/env node
import { Command } from "commander"

import { ApifyBackend } from "./backends/apify/backend.js"
import { ApifyClient } from "./backends/apify/client.js"
import { resolveBackend } from "./backends/select.js"
import { TelegramSessionBackend } from "./backends/telegram-session/backend.js"
import { openGramjsSource } from "./backends/telegram-session/gramjs.js"
import type { BackendName, ScrapeBackend } from "./backends/types.js"
import { type CliOptions, parseCliOptions, resolveSettings, type ScrapeSettings } from "./cli-options.js"
import { type EnvConfig, readEnvConfig } from "./config.js"
import { RunStore } from "./db/store.js"
import { SubmissionError } from "./errors.js"
import { runExitCode, runScrape } from "./pipeline/run.js"
import { createRenderer } from "./rendering/index.js"
import type { CliRenderer, ServiceStatus, SpinnerHandle, VerboseLog } from "./rendering/types.js"
import { loadScrapeConfig, type ScrapeConfig, writeSampleConfig } from "./scrape-config.js"
import type { CanonicalRecord } from "./schema/canonical.js"
import { describeTarget, type Platform } from "./schema/targets.js"
import { isCancellationError, setupSigintCancellation } from "./utils/cancel.js"
import type { RetryContext } from "./utils/retry.js"
import { getErrorMessage, sanitizeForError } from "./utils/sanitize.js"

const buildServiceStatusEntries = (env: EnvConfig, backend: BackendName): ServiceStatus[] => [
  { name: "Apify API", ready: Boolean(env.apifyToken), required: backend === "apify" },
  {
    name: "Telegram session",
    ready: env.telegramApiId !== null && env.telegramApiHash !== null,
    required: backend === "session",
  },
]

const retryLogger =
  (verboseLog: VerboseLog | undefined) =>
  (ctx: RetryContext): void => {
    verboseLog?.(
      "http",
      `attempt ${ctx.attempt}/${ctx.maxAttempts} failed (${sanitizeForError(getErrorMessage(ctx.error))}), retrying in ${ctx.delayMs}ms`,
    )
  }

const buildBackend = (
  name: BackendName,
  env: EnvConfig,
  settings: ScrapeSettings,
  renderer: CliRenderer,
  verboseLog: VerboseLog | undefined,
): ScrapeBackend => {
  if (name === "session") {
    const { telegramApiId: apiId, telegramApiHash: apiHash } = env
    if (apiId === null || apiHash === null) {
      throw new SubmissionError("auth", "Session backend needs TELEGRAM_API_ID and TELEGRAM_API_HASH")
    }
    return new TelegramSessionBackend(() =>
      openGramjsSource({
        apiId,
        apiHash,
        session: env.telegramSession,
        interactive: process.stdin.isTTY === true,
        onSessionCreated: (session) => {
          renderer.warn(`Logged in. Save this as TELEGRAM_SESSION in .env to skip the login next time:\n${session}`)
        },
      }),
    )
  }
  if (!env.apifyToken) {
    throw new SubmissionError("auth", "APIFY_API_TOKEN is not set")
  }
  const onRetry = retryLogger(verboseLog)
  const client = new ApifyClient({
    token: env.apifyToken,
    baseUrl: env.apifyBaseUrl ?? undefined,
    onRetry,
  })
  return new ApifyBackend(client, {
    memoryMb: settings.memoryMb,
    pollIntervalMs: settings.pollIntervalMs,
    waitTimeoutMs: settings.waitTimeoutMs,
    attachLogTail: settings.verbose,
    onRetry,
  })
}

/** Opens the run history; on `--resume` also loads the targets that already succeeded. */
const openHistory = async (
  settings: ScrapeSettings,
): Promise<{ store: RunStore | null; resumed: Map<string, CanonicalRecord[]> }> => {
  if (!settings.history) {
    return { store: null, resumed: new Map() }
  }
  const store = RunStore.open(settings.runId, settings.history.dbPath)
  if (!settings.resume) {
    return { store, resumed: new Map() }
  }
  try {
    const previous = await store.getRun()
    if (!previous) {
      throw new Error(`No run "${settings.runId}" in the history`)
    }
    if (previous.platform !== settings.platform) {
      throw new Error(`Run "${settings.runId}" scraped ${previous.platform}, not ${settings.platform}`)
    }
    return { store, resumed: await store.loadSucceededTargets() }
  } catch (error) {
    store.close()
    throw error
  }
}

const runPlatform = async (platform: Platform, rawOptions: Record<string, unknown>): Promise<number> => {
  const startedAt = Date.now()
  let options: CliOptions
  let settings: ScrapeSettings
  try {
    options = parseCliOptions(rawOptions)
    const config: ScrapeConfig = options.config ? await loadScrapeConfig(options.config) : {}
    settings = resolveSettings(platform, options, config)
  } catch (error) {
    console.error(getErrorMessage(error))
    return 1
  }
  const renderer = createRenderer({ plain: options.plain, isTTY: process.stdout.isTTY })
  const verboseLog: VerboseLog | undefined = options.verbose
    ? (scope, message) => {
        renderer.logVerbose(scope, message, (Date.now() - startedAt) / 1000)
      }
    : undefined

  const env = readEnvConfig()

  let backendName: BackendName
  let backend: ScrapeBackend
  try {
    backendName = resolveBackend(platform, settings.backend, env)
    backend = buildBackend(backendName, env, settings, renderer, verboseLog)
  } catch (error) {
    if (error instanceof SubmissionError) {
      renderer.error(error.message)
      return 1
    }
    throw error
  }

  let history: Awaited<ReturnType<typeof openHistory>>
  try {
    history = await openHistory(settings)
  } catch (error) {
    await backend.close()
    renderer.error(getErrorMessage(error))
    return 1
  }
  const { store, resumed } = history
  const { signal, dispose } = setupSigintCancellation({
    onFirst: () => renderer.warn("\nInterrupted (CTRL+C). Stopping; remote runs keep going on their side..."),
    onForce: () => renderer.error("Force exit requested."),
  })

  let spinner: SpinnerHandle | null = null
  try {
    renderer.header({
      runId: settings.runId,
      platform,
      actorName: settings.actor.actorName,
      backend: backendName,
      targetCount: settings.targets.length,
      outputs: settings.exports.map((destination) => destination.path),
      resumed: settings.resume,
    })
    renderer.envTable(buildServiceStatusEntries(env, backendName))
    if (resumed.size > 0) {
      renderer.warn(`Resuming: ${resumed.size} target(s) already done in run ${settings.runId}`)
    }
    await store?.startRun({ platform, actorKey: settings.actor.key, backend: backendName })

    const activeSpinner = renderer.createSpinner(`Scraping ${settings.targets.length} target(s)`)
    spinner = activeSpinner
    let done = 0
    const result = await runScrape(
      {
        runId: settings.runId,
        platform,
        actor: settings.actor,
        targets: settings.targets,
        input: settings.input,
        filters: settings.filters,
        exports: settings.exports,
        concurrency: settings.concurrency,
      },
      {
        backend,
        store,
        resumed,
        signal,
        events: {
          onBatchStart: (label) => verboseLog?.(platform, `batch started: ${label}`),
          onStep: (label, _step, detail) => {
            activeSpinner.update(`${label}: ${detail}`)
            verboseLog?.(platform, `${label}: ${detail}`)
          },
          onJob: (label, job) => {
            verboseLog?.(platform, `${label}: job ${job.id} ${job.status} (${job.remoteStatus ?? "n/a"})`)
          },
          onTargetDone: (outcome) => {
            done += 1
            activeSpinner.update(`${done}/${settings.targets.length} target(s) done`)
            verboseLog?.(
              platform,
              `${describeTarget(outcome.target)}: ${outcome.status === "failed" ? outcome.failure.message : `${outcome.recordCount} records`}`,
            )
          },
          onExport: (outcome) => verboseLog?.("export", `${outcome.format}: ${outcome.status}`),
        },
      },
    )
    spinner = null

    const exitCode = runExitCode(result)
    if (exitCode === 0) {
      activeSpinner.succeed(`Collected ${result.collection.length} records`)
    } else {
      activeSpinner.warn(`Collected ${result.collection.length} records with errors`)
    }
    for (const outcome of result.targets) {
      renderer.targetDone(outcome)
    }
    for (const outcome of result.exports) {
      renderer.exportDone(outcome)
    }
    renderer.runSummary(result, Math.round((Date.now() - startedAt) / 1000))
    await store?.finishRun(exitCode === 0 ? "completed" : "partial")
    return exitCode
  } catch (error) {
    spinner?.fail()
    if (isCancellationError(error)) {
      await store?.finishRun("cancelled")
      renderer.warn(`Run cancelled by user. Resume with --resume ${settings.runId}`)
      return 130
    }
    throw error
  } finally {
    dispose()
    await backend.close()
    store?.close()
  }
}

const addCommonOptions = (command: Command): Command =>
  command
    .option("--config <file>", "YAML or JSON file with default settings")
    .option("--date-from <date>", "Keep posts from this date (YYYY-MM-DD or ISO 8601)")
    .option("--date-to <date>", "Keep posts up to this date, inclusive")
    .option("--formats <formats...>", "Export formats: csv json xlsx")
    .option("--output-dir <dir>", "Directory for default export paths")
    .option("--out <file>", "CSV output path")
    .option("--out-json <file>", "JSON output path")
    .option("--out-excel <file>", "Excel output path")
    .option("--keywords <keywords...>", "Keep posts whose text contains any keyword")
    .option("--min-views <number>", "Keep posts with at least this many views")
    .option("--wait-timeout <seconds>", "Max wait for each remote run")
    .option("--poll-interval <seconds>", "Seconds between status checks")
    .option("--memory-mb <number>", "Memory for each remote run")
    .option("--concurrency <number>", "Remote runs in flight at once")
    .option("--run-id <id>", "Run id (default: current timestamp)")
    .option("--resume <runId>", "Resume a run, skipping targets that already succeeded")
    .option("--db <path>", "Run history database path")
    .option("--no-history", "Do not record the run")
    .option("--plain", "Plain line output, no colors or spinners", false)
    .option("--verbose", "Show detailed timing logs", false)

const createProgram = (onExitCode: (code: number) => void): Command => {
  const program = new Command()
  program
    .name("social-scrape")
    .description("Collect public posts from Telegram, X and LinkedIn and export them as CSV, JSON or Excel")

  addCommonOptions(
    program
      .command("telegram")
      .description("Scrape Telegram channels")
      .option("--channels <channels...>", "Channel names, @names or t.me links")
      .option("--backend <backend>", "auto | apify | session")
      .option("--actor <key>", "media | posts | messages | channel")
      .option("--max-posts <number>", "Max posts per channel")
      .option("--days <number>", "Look-back window in days")
      .option("--posts-from <number>", "First post number (posts actor)")
      .option("--posts-to <number>", "Last post number (posts actor)")
      .option("--download-media", "Ask the actor for media links"),
  ).action(async (opts: Record<string, unknown>) => {
    onExitCode(await runPlatform("telegram", opts))
  })

  addCommonOptions(
    program
      .command("x")
      .description("Scrape X (Twitter) accounts, searches or tweet URLs")
      .option("--handles <handles...>", "Account handles, @handles or profile URLs")
      .option("--search <terms...>", "Search terms")
      .option("--urls <urls...>", "Tweet, list or search URLs (full actor)")
      .option("--actor <key>", "ppr | search | full")
      .option("--max-tweets <number>", "Max tweets per target")
      .option("--sort <order>", "Top | Latest")
      .option("--lang <code>", "Tweet language (ISO 639-1)"),
  ).action(async (opts: Record<string, unknown>) => {
    onExitCode(await runPlatform("x", opts))
  })

  addCommonOptions(
    program
      .command("linkedin")
      .description("Scrape LinkedIn profile posts")
      .option("--profiles <profiles...>", "Usernames or profile URLs")
      .option("--actor <key>", "profile_posts")
      .option("--max-posts <number>", "Max posts per profile"),
  ).action(async (opts: Record<string, unknown>) => {
    onExitCode(await runPlatform("linkedin", opts))
  })

  program
    .command("init-config")
    .description("Write a commented sample config file")
    .argument("<path>", "Where to write the file")
    .action(async (path: string) => {
      try {
        await writeSampleConfig(path)
      } catch (error) {
        if (error instanceof Error && "code" in error && error.code === "EEXIST") {
          console.error(`${path} already exists; not overwriting it`)
          onExitCode(1)
          return
        }
        throw error
      }
      console.log(`Wrote ${path}`)
      onExitCode(0)
    })

  return program
}

const main = async (): Promise<number> => {
  let exitCode = 0
  const program = createProgram((code) => {
    exitCode = code
  })
  await program.parseAsync(process.argv)
  return exitCode
}

main()
  .then((code) => {
    process.exit(code)
  })
  .catch((error: unknown) => {
    if (isCancellationError(error)) {
      console.error("Run cancelled by user.")
      process.exit(130)
    }
    console.error(`Unexpected error: ${sanitizeForError(getErrorMessage(error))}`)
    process.exit(1)
  })
