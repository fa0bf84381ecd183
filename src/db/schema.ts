import { sqliteTable, text, integer, uniqueIndex } from "drizzle-orm/sqlite-core"

export const runs = sqliteTable("runs", {
  id: text("id").primaryKey(), // = runId, e.g. "20260215_143022"
  platform: text("platform").notNull(),
  actorKey: text("actor_key").notNull(),
  backend: text("backend").notNull(),
  status: text("status").notNull(), // "running" | "completed" | "partial" | "cancelled"
  createdAt: text("created_at").notNull(), // ISO timestamp
  finishedAt: text("finished_at"),
})

export const targetResults = sqliteTable(
  "target_results",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    runId: text("run_id")
      .notNull()
      .references(() => runs.id),
    targetKey: text("target_key").notNull(),
    status: text("status").notNull(), // "succeeded" | "failed"
    jobId: text("job_id"),
    recordCount: integer("record_count").notNull(),
    errorCode: text("error_code"),
    errorMessage: text("error_message"),
    updatedAt: text("updated_at").notNull(),
  },
  (table) => [uniqueIndex("uq_run_target").on(table.runId, table.targetKey)],
)

export const records = sqliteTable(
  "records",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    runId: text("run_id")
      .notNull()
      .references(() => runs.id),
    targetKey: text("target_key").notNull(),
    source: text("source").notNull(),
    recordId: text("record_id").notNull(),
    recordJson: text("record_json").notNull(), // JSON-serialized CanonicalRecord
    createdAt: text("created_at").notNull(),
  },
  (table) => [uniqueIndex("uq_run_source_record").on(table.runId, table.source, table.recordId)],
)

/** DDL matching the tables above; applied with IF NOT EXISTS on every open. */
export const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS runs (
  id TEXT PRIMARY KEY NOT NULL,
  platform TEXT NOT NULL,
  actor_key TEXT NOT NULL,
  backend TEXT NOT NULL,
  status TEXT NOT NULL,
  created_at TEXT NOT NULL,
  finished_at TEXT
);
CREATE TABLE IF NOT EXISTS target_results (
  id INTEGER PRIMARY KEY AUTOINCREMENT NOT NULL,
  run_id TEXT NOT NULL REFERENCES runs(id),
  target_key TEXT NOT NULL,
  status TEXT NOT NULL,
  job_id TEXT,
  record_count INTEGER NOT NULL,
  error_code TEXT,
  error_message TEXT,
  updated_at TEXT NOT NULL
);
CREATE UNIQUE INDEX IF NOT EXISTS uq_run_target ON target_results (run_id, target_key);
CREATE TABLE IF NOT EXISTS records (
  id INTEGER PRIMARY KEY AUTOINCREMENT NOT NULL,
  run_id TEXT NOT NULL REFERENCES runs(id),
  target_key TEXT NOT NULL,
  source TEXT NOT NULL,
  record_id TEXT NOT NULL,
  record_json TEXT NOT NULL,
  created_at TEXT NOT NULL
);
CREATE UNIQUE INDEX IF NOT EXISTS uq_run_source_record ON records (run_id, source, record_id);
`
