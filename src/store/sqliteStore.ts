import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import { ArchiveEntry, ChunkOutcome, Dataset, DownloadRequest, Market } from "../types";
import { ArchiveEntryFilter, RunStatus, RunStore, StoreStats } from "./types";

type ArchiveEntryRow = {
  market: Market;
  dataset: Dataset;
  symbol: string;
  rangeStart: string;
  rangeEnd: string;
  path: string;
  bytes: number;
  archivedAt: string;
};

const IN_MEMORY = ":memory:";

export class SqliteStore implements RunStore {
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

  async startRun(runId: string, request: DownloadRequest, startedAt: string): Promise<void> {
    this.db
      .prepare(
        `
        INSERT INTO runs (runId, market, dataset, symbol, startDate, endDate, chunkDays, outBase, startedAt, finishedAt, status)
        VALUES (@runId, @market, @dataset, @symbol, @startDate, @endDate, @chunkDays, @outBase, @startedAt, NULL, 'running')
        ON CONFLICT(runId) DO UPDATE SET
          startedAt = excluded.startedAt,
          finishedAt = NULL,
          status = 'running'
      `,
      )
      .run({
        runId,
        market: request.market,
        dataset: request.dataset,
        symbol: request.symbol,
        startDate: request.startDate,
        endDate: request.endDate,
        chunkDays: request.chunkDays,
        outBase: request.outBase,
        startedAt,
      });
  }

  async finishRun(runId: string, status: RunStatus, finishedAt: string): Promise<void> {
    this.db
      .prepare(
        `
        UPDATE runs
        SET
          status = @status,
          finishedAt = @finishedAt
        WHERE runId = @runId
      `,
      )
      .run({
        runId,
        status,
        finishedAt,
      });
  }

  async recordChunkOutcome(runId: string, request: DownloadRequest, outcome: ChunkOutcome): Promise<void> {
    this.db
      .prepare(
        `
        INSERT INTO chunk_outcomes (
          runId, chunkIndex, market, dataset, symbol, rangeStart, rangeEnd,
          status, skipReason, error, attempts, resolvedPath, durationMs, finishedAt
        )
        VALUES (
          @runId, @chunkIndex, @market, @dataset, @symbol, @rangeStart, @rangeEnd,
          @status, @skipReason, @error, @attempts, @resolvedPath, @durationMs, @finishedAt
        )
      `,
      )
      .run({
        runId,
        chunkIndex: outcome.chunk.index,
        market: request.market,
        dataset: request.dataset,
        symbol: request.symbol,
        rangeStart: outcome.chunk.rangeStart,
        rangeEnd: outcome.chunk.rangeEnd,
        status: outcome.status,
        skipReason: outcome.skipReason ?? null,
        error: outcome.error ?? null,
        attempts: outcome.attempts,
        resolvedPath: outcome.resolvedPath ?? null,
        durationMs: outcome.durationMs,
        finishedAt: outcome.finishedAt,
      });
  }

  async appendArchiveEntry(entry: ArchiveEntry): Promise<void> {
    this.db
      .prepare(
        `
        INSERT INTO archive_entries (market, dataset, symbol, rangeStart, rangeEnd, path, bytes, archivedAt)
        VALUES (@market, @dataset, @symbol, @rangeStart, @rangeEnd, @path, @bytes, @archivedAt)
      `,
      )
      .run({ ...entry });
  }

  async listArchiveEntries(filter: ArchiveEntryFilter = {}): Promise<ArchiveEntry[]> {
    const rows = this.db
      .prepare(
        `
        SELECT market, dataset, symbol, rangeStart, rangeEnd, path, bytes, archivedAt
        FROM archive_entries
        WHERE (@market IS NULL OR market = @market)
          AND (@dataset IS NULL OR dataset = @dataset)
          AND (@symbol IS NULL OR symbol = @symbol)
        ORDER BY id ASC
      `,
      )
      .all({
        market: filter.market ?? null,
        dataset: filter.dataset ?? null,
        symbol: filter.symbol ?? null,
      }) as ArchiveEntryRow[];

    return rows.map((row) => ({ ...row }));
  }

  async getStats(): Promise<StoreStats> {
    return {
      totalRuns: this.count("runs", "1 = 1"),
      runsCompleted: this.count("runs", "status = 'completed'"),
      runsFailed: this.count("runs", "status = 'failed'"),
      runsCancelled: this.count("runs", "status = 'cancelled'"),
      chunksCompleted: this.count("chunk_outcomes", "status = 'completed'"),
      chunksSkipped: this.count("chunk_outcomes", "status = 'skipped'"),
      chunksFailed: this.count("chunk_outcomes", "status = 'failed'"),
      archiveEntries: this.count("archive_entries", "1 = 1"),
    };
  }

  async close(): Promise<void> {
    this.db.close();
  }

  private count(tableName: string, whereClause: string): number {
    const row = this.db.prepare(`SELECT COUNT(*) as count FROM ${tableName} WHERE ${whereClause}`).get() as {
      count: number;
    };
    return row.count;
  }

  private initializeSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS runs (
        runId TEXT PRIMARY KEY,
        market TEXT NOT NULL,
        dataset TEXT NOT NULL,
        symbol TEXT NOT NULL,
        startDate TEXT NOT NULL,
        endDate TEXT NOT NULL,
        chunkDays INTEGER NOT NULL,
        outBase TEXT NOT NULL,
        startedAt TEXT NOT NULL,
        finishedAt TEXT NULL,
        status TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS chunk_outcomes (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        runId TEXT NOT NULL,
        chunkIndex INTEGER NOT NULL,
        market TEXT NOT NULL,
        dataset TEXT NOT NULL,
        symbol TEXT NOT NULL,
        rangeStart TEXT NOT NULL,
        rangeEnd TEXT NOT NULL,
        status TEXT NOT NULL,
        skipReason TEXT NULL,
        error TEXT NULL,
        attempts INTEGER NOT NULL,
        resolvedPath TEXT NULL,
        durationMs INTEGER NOT NULL,
        finishedAt TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS archive_entries (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        market TEXT NOT NULL,
        dataset TEXT NOT NULL,
        symbol TEXT NOT NULL,
        rangeStart TEXT NOT NULL,
        rangeEnd TEXT NOT NULL,
        path TEXT NOT NULL,
        bytes INTEGER NOT NULL,
        archivedAt TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_chunk_outcomes_run ON chunk_outcomes(runId);
      CREATE INDEX IF NOT EXISTS idx_chunk_outcomes_status ON chunk_outcomes(status);
      CREATE INDEX IF NOT EXISTS idx_archive_entries_key ON archive_entries(market, dataset, symbol, rangeStart);
    `);
  }
}
