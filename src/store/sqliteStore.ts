import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import { RunStatus } from "../types";
import { parseRunSummary } from "./summaryCodec";
import { RunFinish, RunRecord, RunStart, RunStats, RunStore } from "./types";

type RunRow = {
  runId: string;
  startedAt: string;
  finishedAt: string | null;
  status: string;
  destinationUri: string;
  dryRun: number;
  summaryJson: string | null;
  error: string | null;
};

function toRunStatus(value: string): RunStatus {
  return value === "completed" || value === "failed" ? value : "running";
}

function toRunRecord(row: RunRow): RunRecord {
  return {
    runId: row.runId,
    startedAt: row.startedAt,
    finishedAt: row.finishedAt ?? undefined,
    status: toRunStatus(row.status),
    destinationUri: row.destinationUri,
    dryRun: row.dryRun === 1,
    summary: parseRunSummary(row.summaryJson),
    error: row.error ?? undefined,
  };
}

export class SqliteStore implements RunStore {
  private readonly db: Database.Database;

  constructor(dbPath: string) {
    if (dbPath === ":memory:") {
      this.db = new Database(dbPath);
    } else {
      const absolutePath = path.resolve(dbPath);
      fs.mkdirSync(path.dirname(absolutePath), { recursive: true });
      this.db = new Database(absolutePath);
      this.db.pragma("journal_mode = WAL");
    }
    this.initializeSchema();
  }

  async startRun(run: RunStart): Promise<void> {
    this.db
      .prepare(
        `
        INSERT INTO runs (runId, startedAt, finishedAt, status, destinationUri, dryRun, summaryJson, error)
        VALUES (@runId, @startedAt, NULL, 'running', @destinationUri, @dryRun, NULL, NULL)
        ON CONFLICT(runId) DO UPDATE SET
          startedAt = excluded.startedAt,
          finishedAt = NULL,
          status = 'running',
          destinationUri = excluded.destinationUri,
          dryRun = excluded.dryRun,
          summaryJson = NULL,
          error = NULL
      `,
      )
      .run({
        runId: run.runId,
        startedAt: run.startedAt,
        destinationUri: run.destinationUri,
        dryRun: run.dryRun ? 1 : 0,
      });
  }

  async finishRun(runId: string, result: RunFinish): Promise<void> {
    this.db
      .prepare(
        `
        UPDATE runs
        SET
          status = @status,
          finishedAt = @finishedAt,
          summaryJson = @summaryJson,
          scanned = @scanned,
          matched = @matched,
          error = @error
        WHERE runId = @runId
      `,
      )
      .run({
        runId,
        status: result.status,
        finishedAt: result.finishedAt,
        summaryJson: result.summary ? JSON.stringify(result.summary) : null,
        scanned: result.summary?.scanned ?? null,
        matched: result.summary?.matched ?? null,
        error: result.error ?? null,
      });
  }

  async listRuns(limit: number): Promise<RunRecord[]> {
    const rows = this.db
      .prepare<[number], RunRow>(
        `
        SELECT runId, startedAt, finishedAt, status, destinationUri, dryRun, summaryJson, error
        FROM runs
        ORDER BY startedAt DESC, runId DESC
        LIMIT ?
      `,
      )
      .all(limit);
    return rows.map(toRunRecord);
  }

  async getStats(): Promise<RunStats> {
    const lastCompleted = this.db
      .prepare<[], { finishedAt: string | null }>(
        "SELECT MAX(finishedAt) as finishedAt FROM runs WHERE status = 'completed'",
      )
      .get();

    return {
      totalRuns: this.countWhere("1 = 1"),
      running: this.countWhere("status = 'running'"),
      completed: this.countWhere("status = 'completed'"),
      failed: this.countWhere("status = 'failed'"),
      lastCompletedAt: lastCompleted?.finishedAt ?? undefined,
    };
  }

  async close(): Promise<void> {
    this.db.close();
  }

  private countWhere(whereClause: string): number {
    const row = this.db.prepare<[], { count: number }>(`SELECT COUNT(*) as count FROM runs WHERE ${whereClause}`).get();
    return row?.count ?? 0;
  }

  private initializeSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS runs (
        runId TEXT PRIMARY KEY,
        startedAt TEXT NOT NULL,
        finishedAt TEXT NULL,
        status TEXT NOT NULL,
        destinationUri TEXT NOT NULL,
        dryRun INTEGER NOT NULL DEFAULT 0,
        scanned INTEGER NULL,
        matched INTEGER NULL,
        summaryJson TEXT NULL,
        error TEXT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_runs_status ON runs(status);
      CREATE INDEX IF NOT EXISTS idx_runs_started_at ON runs(startedAt);
    `);
  }
}
