export type Market = "spot" | "contract";

export type Dataset = "trades" | "l2book";

export interface DownloadRequest {
  market: Market;
  dataset: Dataset;
  symbol: string;
  startDate: string;
  endDate: string;
  chunkDays: number;
  outBase: string;
}

export interface Chunk {
  readonly index: number;
  readonly rangeStart: string;
  readonly rangeEnd: string;
}

export type ChunkStatus = "completed" | "skipped" | "failed";

export type SkipReason = "already_archived" | "no_data";

export interface ChunkOutcome {
  chunk: Chunk;
  status: ChunkStatus;
  skipReason?: SkipReason;
  error?: string;
  attempts: number;
  resolvedPath?: string;
  durationMs: number;
  finishedAt: string;
}

export interface ArchiveEntry {
  market: Market;
  dataset: Dataset;
  symbol: string;
  rangeStart: string;
  rangeEnd: string;
  path: string;
  bytes: number;
  archivedAt: string;
}

export interface RunReport {
  runId: string;
  request: DownloadRequest;
  outcomes: ChunkOutcome[];
  completed: number;
  skipped: number;
  failed: number;
  cancelled: boolean;
  startedAt: string;
  finishedAt: string;
}
