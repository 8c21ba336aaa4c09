import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import { DownloadOutcome, Summary } from "../types";
import { HistoryStats, HistoryStore, RunRecord, RunStatus } from "./types";

const IN_MEMORY = ":memory:";

type RunRow = {
  runId: string;
  startedAt: string;
  finishedAt: string | null;
  status: RunStatus;
  submittedCount: number | null;
  succeededCount: number | null;
  totalBytes: number | null;
};

type TotalsRow = {
  downloadsOk: number | null;
  downloadsFailed: number | null;
  totalBytes: number | null;
};

function toRunRecord(row: RunRow): RunRecord {
  return {
    runId: row.runId,
    startedAt: row.startedAt,
    finishedAt: row.finishedAt ?? undefined,
    status: row.status,
    submittedCount: row.submittedCount ?? undefined,
    succeededCount: row.succeededCount ?? undefined,
    totalBytes: row.totalBytes ?? undefined,
  };
}

/** Download ledger; nothing here decides whether a file is fetched again. */
export class SqliteStore implements HistoryStore {
  private readonly db: Database.Database;

  constructor(dbPath: string) {
    if (dbPath === IN_MEMORY) {
      this.db = new Database(IN_MEMORY);
    } else {
      const absolutePath = path.resolve(dbPath);
      fs.mkdirSync(path.dirname(absolutePath), { recursive: true });
      this.db = new Database(absolutePath);
      this.db.pragma("journal_mode = WAL");
    }
    this.initializeSchema();
  }

  async startRun(runId: string, startedAt: string): Promise<void> {
    this.db
      .prepare(
        `
        INSERT INTO runs (runId, startedAt, finishedAt, status)
        VALUES (@runId, @startedAt, NULL, 'running')
        ON CONFLICT(runId) DO UPDATE SET
          startedAt = excluded.startedAt,
          finishedAt = NULL,
          status = 'running'
      `,
      )
      .run({ runId, startedAt });
  }

  async finishRun(runId: string, status: Exclude<RunStatus, "running">, finishedAt: string, summary?: Summary): Promise<void> {
    this.db
      .prepare(
        `
        UPDATE runs
        SET
          status = @status,
          finishedAt = @finishedAt,
          submittedCount = @submittedCount,
          succeededCount = @succeededCount,
          totalBytes = @totalBytes
        WHERE runId = @runId
      `,
      )
      .run({
        runId,
        status,
        finishedAt,
        submittedCount: summary?.submittedCount ?? null,
        succeededCount: summary?.succeededCount ?? null,
        totalBytes: summary?.totalBytes ?? null,
      });
  }

  async recordDownloads(runId: string, outcomes: readonly DownloadOutcome[], recordedAt: string): Promise<void> {
    const statement = this.db.prepare(`
      INSERT INTO downloads (
        runId, taskIndex, postId, kind, url, localPath, status, bytes, error, attempts, recordedAt
      )
      VALUES (
        @runId, @taskIndex, @postId, @kind, @url, @localPath, @status, @bytes, @error, @attempts, @recordedAt
      )
    `);

    const insertAll = this.db.transaction((items: readonly DownloadOutcome[]) => {
      for (const outcome of items) {
        const attachment = outcome.task.attachment;
        statement.run({
          runId,
          taskIndex: outcome.task.index,
          postId: attachment.postId,
          kind: attachment.kind,
          url: outcome.task.url,
          localPath: outcome.status === "succeeded" ? outcome.localPath : path.join(attachment.destinationFolder, attachment.localFilename),
          status: outcome.status === "succeeded" ? "downloaded_ok" : "download_failed",
          bytes: outcome.status === "succeeded" ? outcome.bytes : null,
          error: outcome.status === "failed" ? outcome.error : null,
          attempts: outcome.status === "failed" ? outcome.attempts : null,
          recordedAt,
        });
      }
    });
    insertAll(outcomes);
  }

  async getStats(): Promise<HistoryStats> {
    const runCount = this.db.prepare<[], { count: number }>(`SELECT COUNT(*) as count FROM runs`).get();
    const totals = this.db
      .prepare<[], TotalsRow>(
        `
        SELECT
          SUM(CASE WHEN status = 'downloaded_ok' THEN 1 ELSE 0 END) as downloadsOk,
          SUM(CASE WHEN status = 'download_failed' THEN 1 ELSE 0 END) as downloadsFailed,
          SUM(COALESCE(bytes, 0)) as totalBytes
        FROM downloads
      `,
      )
      .get();
    const lastRun = this.db
      .prepare<[], RunRow>(
        `
        SELECT runId, startedAt, finishedAt, status, submittedCount, succeededCount, totalBytes
        FROM runs
        ORDER BY startedAt DESC, rowid DESC
        LIMIT 1
      `,
      )
      .get();

    return {
      totalRuns: runCount?.count ?? 0,
      downloadsOk: totals?.downloadsOk ?? 0,
      downloadsFailed: totals?.downloadsFailed ?? 0,
      totalBytes: totals?.totalBytes ?? 0,
      lastRun: lastRun ? toRunRecord(lastRun) : undefined,
    };
  }

  async close(): Promise<void> {
    this.db.close();
  }

  private initializeSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS runs (
        runId TEXT PRIMARY KEY,
        startedAt TEXT NOT NULL,
        finishedAt TEXT NULL,
        status TEXT NOT NULL,
        submittedCount INTEGER NULL,
        succeededCount INTEGER NULL,
        totalBytes INTEGER NULL
      );

      CREATE TABLE IF NOT EXISTS downloads (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        runId TEXT NOT NULL,
        taskIndex INTEGER NOT NULL,
        postId TEXT NOT NULL,
        kind TEXT NOT NULL,
        url TEXT NOT NULL,
        localPath TEXT NOT NULL,
        status TEXT NOT NULL,
        bytes INTEGER NULL,
        error TEXT NULL,
        attempts INTEGER NULL,
        recordedAt TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_downloads_run ON downloads(runId);
      CREATE INDEX IF NOT EXISTS idx_downloads_status ON downloads(status);
    `);
  }
}
