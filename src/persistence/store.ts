import { createClient, type Client } from "@libsql/client";
import { mkdirSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";
import { z } from "zod";
import { STRATEGY_NAMES, TASK_TYPES } from "../planner/types.js";

const DEFAULT_DB_DIR = join(homedir(), ".tableqa");
const DEFAULT_DB_PATH = join(DEFAULT_DB_DIR, "runs.db");

export const RUN_STATUSES = ["planning", "executing", "answered", "partial", "invalid", "error", "cancelled"] as const;
export type RunStatus = (typeof RUN_STATUSES)[number];

const StoredTaskSchema = z.object({
  id: z.string(),
  description: z.string(),
  taskType: z.enum(TASK_TYPES),
  dependencies: z.array(z.string()),
  status: z.enum(["pending", "running", "succeeded", "failed", "skipped"]),
  output: z.string().optional(),
  error: z.string().optional(),
});

const StoredRunSchema = z.object({
  runId: z.string(),
  question: z.string(),
  status: z.enum(RUN_STATUSES),
  strategy: z.enum(STRATEGY_NAMES).optional(),
  answer: z.string().optional(),
  warning: z.boolean(),
  error: z.string().optional(),
  tasks: z.array(StoredTaskSchema),
  startedAt: z.number(),
  finishedAt: z.number().optional(),
});

/** Summary of a pipeline run as kept on disk. */
export type StoredRun = z.infer<typeof StoredRunSchema>;
export type StoredTask = z.infer<typeof StoredTaskSchema>;

const RunRowSchema = z.object({
  run_id: z.string(),
  question: z.string(),
  status: z.string(),
  strategy: z.string().nullable(),
  answer: z.string().nullable(),
  warning: z.number(),
  error: z.string().nullable(),
  tasks: z.string(),
  started_at: z.number(),
  finished_at: z.number().nullable(),
});

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS runs (
    run_id      TEXT PRIMARY KEY,
    question    TEXT NOT NULL,
    status      TEXT NOT NULL,
    strategy    TEXT,
    answer      TEXT,
    warning     INTEGER NOT NULL DEFAULT 0,
    error       TEXT,
    tasks       TEXT NOT NULL DEFAULT '[]',
    started_at  INTEGER NOT NULL,
    finished_at INTEGER
  );
  CREATE INDEX IF NOT EXISTS idx_runs_started ON runs(started_at DESC);
`;

export class RunStore {
  private constructor(private client: Client) {}

  /** Pass ":memory:" for a throwaway store. */
  static async open(dbPath?: string): Promise<RunStore> {
    if (!dbPath) {
      mkdirSync(DEFAULT_DB_DIR, { recursive: true });
    }
    const path = dbPath ?? DEFAULT_DB_PATH;
    const inMemory = path === ":memory:";
    const client = createClient({ url: inMemory ? ":memory:" : `file:${path}` });
    if (!inMemory) {
      await client.execute("PRAGMA journal_mode = WAL");
    }
    await client.executeMultiple(SCHEMA);
    return new RunStore(client);
  }

  /** Insert or replace a run. */
  async insert(run: StoredRun): Promise<void> {
    await this.client.execute({
      sql: `
        INSERT OR REPLACE INTO runs (run_id, question, status, strategy, answer, warning, error, tasks, started_at, finished_at)
        VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
      `,
      args: [
        run.runId,
        run.question,
        run.status,
        run.strategy ?? null,
        run.answer ?? null,
        run.warning ? 1 : 0,
        run.error ?? null,
        JSON.stringify(run.tasks),
        run.startedAt,
        run.finishedAt ?? null,
      ],
    });
  }

  async get(runId: string): Promise<StoredRun | undefined> {
    const { rows } = await this.client.execute({ sql: "SELECT * FROM runs WHERE run_id = ?", args: [runId] });
    return rows.length > 0 ? rowToRun(rows[0]) : undefined;
  }

  /** Most recent first. */
  async list(limit = 50): Promise<StoredRun[]> {
    const { rows } = await this.client.execute({ sql: "SELECT * FROM runs ORDER BY started_at DESC LIMIT ?", args: [limit] });
    return rows.map(rowToRun);
  }

  /** Returns true if a run was deleted. */
  async delete(runId: string): Promise<boolean> {
    const result = await this.client.execute({ sql: "DELETE FROM runs WHERE run_id = ?", args: [runId] });
    return result.rowsAffected > 0;
  }

  /** Returns the number of deleted runs. */
  async deleteAll(): Promise<number> {
    return (await this.client.execute("DELETE FROM runs")).rowsAffected;
  }

  async deleteOlderThan(timestamp: number): Promise<number> {
    const result = await this.client.execute({ sql: "DELETE FROM runs WHERE started_at < ?", args: [timestamp] });
    return result.rowsAffected;
  }

  close(): void {
    this.client.close();
  }
}

function rowToRun(raw: unknown): StoredRun {
  const row = RunRowSchema.parse(raw);
  const tasks: unknown = JSON.parse(row.tasks);
  return StoredRunSchema.parse({
    runId: row.run_id,
    question: row.question,
    status: row.status,
    strategy: row.strategy ?? undefined,
    answer: row.answer ?? undefined,
    warning: row.warning === 1,
    error: row.error ?? undefined,
    tasks,
    startedAt: row.started_at,
    finishedAt: row.finished_at ?? undefined,
  });
}
