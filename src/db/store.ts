import { mkdirSync } from "node:fs"
import { dirname, resolve } from "node:path"
import { homedir } from "node:os"

import Database from "better-sqlite3"
import { drizzle } from "drizzle-orm/better-sqlite3"
import type { BetterSQLite3Database } from "drizzle-orm/better-sqlite3"
import { and, asc, eq } from "drizzle-orm"

import * as schema from "./schema.js"
import type { BackendName } from "../backends/types.js"
import type { RunStatus, TargetOutcome } from "../pipeline/types.js"
import { type CanonicalRecord, parseCanonicalRecord } from "../schema/canonical.js"
import type { Platform } from "../schema/targets.js"

// ── Public types ────────────────────────────────────────────────────

export interface RunMeta {
  platform: Platform
  actorKey: string
  backend: BackendName
}

export interface StoredRun extends RunMeta {
  id: string
  status: string
  createdAt: string
  finishedAt: string | null
}

export interface StoredTargetResult {
  targetKey: string
  status: string
  jobId: string | null
  recordCount: number
  errorCode: string | null
  errorMessage: string | null
}

// ── RunStore ────────────────────────────────────────────────────────

export const DEFAULT_DB_PATH = () => resolve(homedir(), ".social-scrape", "runs.db")

export class RunStore {
  private db: BetterSQLite3Database<typeof schema>
  private sqlite: InstanceType<typeof Database>

  private constructor(
    db: BetterSQLite3Database<typeof schema>,
    sqlite: InstanceType<typeof Database>,
    readonly runId: string,
  ) {
    this.db = db
    this.sqlite = sqlite
  }

  /** Factory: opens (or creates) the DB file and its tables. */
  static open(runId: string, dbPath?: string): RunStore {
    const resolvedPath = dbPath ?? DEFAULT_DB_PATH()
    if (resolvedPath !== ":memory:") {
      mkdirSync(dirname(resolvedPath), { recursive: true })
    }
    const sqlite = new Database(resolvedPath)
    sqlite.pragma("journal_mode = WAL")
    sqlite.exec(schema.SCHEMA_SQL)
    const db = drizzle(sqlite, { schema })
    return new RunStore(db, sqlite, runId)
  }

  async getRun(): Promise<StoredRun | null> {
    const rows = await this.db.select().from(schema.runs).where(eq(schema.runs.id, this.runId))
    const row = rows.at(0)
    if (!row) {
      return null
    }
    return {
      id: row.id,
      platform: parsePlatform(row.platform),
      actorKey: row.actorKey,
      backend: row.backend === "session" ? "session" : "apify",
      status: row.status,
      createdAt: row.createdAt,
      finishedAt: row.finishedAt,
    }
  }

  /** Creates the run, or marks a resumed one as running again. */
  async startRun(meta: RunMeta): Promise<void> {
    await this.db
      .insert(schema.runs)
      .values({
        id: this.runId,
        platform: meta.platform,
        actorKey: meta.actorKey,
        backend: meta.backend,
        status: "running",
        createdAt: new Date().toISOString(),
      })
      .onConflictDoUpdate({
        target: schema.runs.id,
        set: { status: "running", backend: meta.backend, finishedAt: null },
      })
  }

  /** Stores one target's outcome and, when it succeeded, its records. Later writes replace earlier ones. */
  saveTargetOutcome(outcome: TargetOutcome, records: readonly CanonicalRecord[]): void {
    const now = new Date().toISOString()
    const values = {
      runId: this.runId,
      targetKey: outcome.key,
      status: outcome.status,
      jobId: outcome.jobId,
      recordCount: outcome.status === "succeeded" ? outcome.recordCount : 0,
      errorCode: outcome.status === "failed" ? outcome.failure.code : null,
      errorMessage: outcome.status === "failed" ? outcome.failure.message : null,
      updatedAt: now,
    }
    this.db.transaction((tx) => {
      tx.insert(schema.targetResults)
        .values(values)
        .onConflictDoUpdate({
          target: [schema.targetResults.runId, schema.targetResults.targetKey],
          set: {
            status: values.status,
            jobId: values.jobId,
            recordCount: values.recordCount,
            errorCode: values.errorCode,
            errorMessage: values.errorMessage,
            updatedAt: now,
          },
        })
        .run()
      for (const record of records) {
        tx.insert(schema.records)
          .values({
            runId: this.runId,
            targetKey: outcome.key,
            source: record.source,
            recordId: record.id,
            recordJson: JSON.stringify(record),
            createdAt: now,
          })
          .onConflictDoNothing()
          .run()
      }
    })
  }

  async getTargetResults(): Promise<StoredTargetResult[]> {
    return this.db
      .select({
        targetKey: schema.targetResults.targetKey,
        status: schema.targetResults.status,
        jobId: schema.targetResults.jobId,
        recordCount: schema.targetResults.recordCount,
        errorCode: schema.targetResults.errorCode,
        errorMessage: schema.targetResults.errorMessage,
      })
      .from(schema.targetResults)
      .where(eq(schema.targetResults.runId, this.runId))
      .orderBy(asc(schema.targetResults.id))
  }

  /** Records of every target that already succeeded in this run, keyed by target, in insertion order. */
  async loadSucceededTargets(): Promise<Map<string, CanonicalRecord[]>> {
    const succeeded = await this.db
      .select({ targetKey: schema.targetResults.targetKey })
      .from(schema.targetResults)
      .where(and(eq(schema.targetResults.runId, this.runId), eq(schema.targetResults.status, "succeeded")))

    const byTarget = new Map<string, CanonicalRecord[]>(succeeded.map((row) => [row.targetKey, []]))
    const rows = await this.db
      .select({ targetKey: schema.records.targetKey, recordJson: schema.records.recordJson })
      .from(schema.records)
      .where(eq(schema.records.runId, this.runId))
      .orderBy(asc(schema.records.id))
    for (const row of rows) {
      byTarget.get(row.targetKey)?.push(parseCanonicalRecord(JSON.parse(row.recordJson)))
    }
    return byTarget
  }

  async finishRun(status: RunStatus): Promise<void> {
    await this.db
      .update(schema.runs)
      .set({ status, finishedAt: new Date().toISOString() })
      .where(eq(schema.runs.id, this.runId))
  }

  close(): void {
    this.sqlite.close()
  }
}

const parsePlatform = (value: string): Platform => {
  if (value === "telegram" || value === "x" || value === "linkedin") {
    return value
  }
  throw new Error(`Run history holds an unknown platform: ${value}`)
}
