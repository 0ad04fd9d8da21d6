import { ArchiveEntry, ChunkOutcome, DownloadRequest } from "../types";
import { ArchiveEntryFilter, RunStatus, RunStore, StoreStats } from "./types";

interface RunRecord {
  runId: string;
  request: DownloadRequest;
  startedAt: string;
  finishedAt?: string;
  status: RunStatus | "running";
}

export function matchesFilter(entry: ArchiveEntry, filter: ArchiveEntryFilter = {}): boolean {
  return (
    (filter.market === undefined || entry.market === filter.market) &&
    (filter.dataset === undefined || entry.dataset === filter.dataset) &&
    (filter.symbol === undefined || entry.symbol === filter.symbol)
  );
}

export class InMemoryStore implements RunStore {
  private readonly runs = new Map<string, RunRecord>();
  private readonly outcomes: Array<{ runId: string; outcome: ChunkOutcome }> = [];
  private readonly entries: ArchiveEntry[] = [];

  async startRun(runId: string, request: DownloadRequest, startedAt: string): Promise<void> {
    this.runs.set(runId, { runId, request, startedAt, status: "running" });
  }

  async finishRun(runId: string, status: RunStatus, finishedAt: string): Promise<void> {
    const run = this.runs.get(runId);
    if (run) {
      run.status = status;
      run.finishedAt = finishedAt;
    }
  }

  async recordChunkOutcome(runId: string, _request: DownloadRequest, outcome: ChunkOutcome): Promise<void> {
    this.outcomes.push({ runId, outcome });
  }

  async appendArchiveEntry(entry: ArchiveEntry): Promise<void> {
    this.entries.push({ ...entry });
  }

  async listArchiveEntries(filter?: ArchiveEntryFilter): Promise<ArchiveEntry[]> {
    return this.entries.filter((entry) => matchesFilter(entry, filter)).map((entry) => ({ ...entry }));
  }

  async getStats(): Promise<StoreStats> {
    const runs = [...this.runs.values()];
    const countOutcomes = (status: ChunkOutcome["status"]): number =>
      this.outcomes.filter((item) => item.outcome.status === status).length;

    return {
      totalRuns: runs.length,
      runsCompleted: runs.filter((run) => run.status === "completed").length,
      runsFailed: runs.filter((run) => run.status === "failed").length,
      runsCancelled: runs.filter((run) => run.status === "cancelled").length,
      chunksCompleted: countOutcomes("completed"),
      chunksSkipped: countOutcomes("skipped"),
      chunksFailed: countOutcomes("failed"),
      archiveEntries: this.entries.length,
    };
  }

  async close(): Promise<void> {
    return;
  }
}
