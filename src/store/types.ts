import { ArchiveEntry, ChunkOutcome, Dataset, DownloadRequest, Market } from "../types";

export type RunStatus = "completed" | "failed" | "cancelled";

export interface StoreStats {
  totalRuns: number;
  runsCompleted: number;
  runsFailed: number;
  runsCancelled: number;
  chunksCompleted: number;
  chunksSkipped: number;
  chunksFailed: number;
  archiveEntries: number;
}

export interface ArchiveEntryFilter {
  market?: Market;
  dataset?: Dataset;
  symbol?: string;
}

/**
 * Append-only ledger of runs, chunk outcomes and archived files. Resume decisions
 * never read from it: the archive directory is the source of truth.
 */
export interface RunStore {
  startRun(runId: string, request: DownloadRequest, startedAt: string): Promise<void>;
  finishRun(runId: string, status: RunStatus, finishedAt: string): Promise<void>;
  recordChunkOutcome(runId: string, request: DownloadRequest, outcome: ChunkOutcome): Promise<void>;
  appendArchiveEntry(entry: ArchiveEntry): Promise<void>;
  listArchiveEntries(filter?: ArchiveEntryFilter): Promise<ArchiveEntry[]>;
  getStats(): Promise<StoreStats>;
  close(): Promise<void>;
}
