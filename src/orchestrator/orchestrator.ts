import { ArchiveWriter, assertValidSymbol } from "../archive";
import { splitDateRange } from "../chunk/dateRangeChunker";
import { classifyFailure, errorMessage } from "../core/errors";
import { SessionManager } from "../download/sessionManager";
import { DownloadWorkflow } from "../download/workflow";
import { Logger, MetricsRegistry } from "../observability";
import { Sink } from "../sink";
import { RunStatus, RunStore } from "../store";
import { Chunk, ChunkOutcome, DownloadRequest, RunReport } from "../types";
import { buildRunReport } from "./report";

export interface OrchestratorDeps {
  runId: string;
  store: RunStore;
  sink: Sink;
  sessions: SessionManager;
  workflow: DownloadWorkflow;
  archive: ArchiveWriter;
  logger: Logger;
  metrics: MetricsRegistry;
  signal?: AbortSignal;
}

type OutcomeFields = Omit<ChunkOutcome, "chunk" | "durationMs" | "finishedAt">;

const CANCELLED = "cancelled";

function finishOutcome(chunk: Chunk, startedAt: number, fields: OutcomeFields): ChunkOutcome {
  return {
    chunk,
    ...fields,
    durationMs: Date.now() - startedAt,
    finishedAt: new Date().toISOString(),
  };
}

async function processChunk(request: DownloadRequest, chunk: Chunk, deps: OrchestratorDeps): Promise<OutcomeFields> {
  const existing = await deps.archive.findExisting(request, chunk);
  if (existing) {
    return { status: "skipped", skipReason: "already_archived", attempts: 0, resolvedPath: existing.path };
  }

  const session = await deps.sessions.acquire();
  const result = await deps.workflow.run(session, request, chunk);

  switch (result.state) {
    case "Resolved": {
      const committed = await deps.archive.commit(request, chunk, result.resolvedPaths);
      const resolvedPath = committed.entries[0]?.path;
      if (committed.status === "skipped") {
        return { status: "skipped", skipReason: "already_archived", attempts: result.attempts, resolvedPath };
      }
      return { status: "completed", attempts: result.attempts, resolvedPath };
    }
    case "NoData":
      return { status: "skipped", skipReason: "no_data", attempts: result.attempts };
    case "Failed":
      if (result.fatal) {
        await deps.sessions.invalidate(result.reason);
      }
      return { status: "failed", error: result.reason, attempts: result.attempts };
  }
}

async function recordOutcome(request: DownloadRequest, outcome: ChunkOutcome, deps: OrchestratorDeps): Promise<void> {
  await deps.store.recordChunkOutcome(deps.runId, request, outcome);
  await deps.sink.publishChunkOutcomes([outcome]);

  switch (outcome.status) {
    case "completed":
      deps.metrics.incrementCounter("chunks_completed");
      break;
    case "skipped":
      deps.metrics.incrementCounter("chunks_skipped");
      break;
    case "failed":
      deps.metrics.incrementCounter("chunks_failed");
      break;
  }

  const fields = {
    chunkIndex: outcome.chunk.index,
    rangeStart: outcome.chunk.rangeStart,
    rangeEnd: outcome.chunk.rangeEnd,
    status: outcome.status,
    skipReason: outcome.skipReason,
    attempts: outcome.attempts,
    durationMs: outcome.durationMs,
    error: outcome.error,
  };
  if (outcome.status === "failed") {
    deps.logger.warn("chunk_finished", fields);
  } else {
    deps.logger.info("chunk_finished", fields);
  }
}

/**
 * Runs every chunk of a request in order. A chunk that already has a file in the
 * archive is skipped without touching the browser; a failed chunk is recorded and
 * the run moves on. Only cancellation stops the loop early.
 */
export async function runOrchestrator(request: DownloadRequest, deps: OrchestratorDeps): Promise<RunReport> {
  const { runId, store, sink, sessions, logger, metrics, signal } = deps;
  assertValidSymbol(request.symbol);
  const chunks = splitDateRange(request.startDate, request.endDate, request.chunkDays);
  metrics.incrementCounter("chunks_planned", chunks.length);

  const startedAt = new Date().toISOString();
  await store.startRun(runId, request, startedAt);
  logger.info("run_start", {
    market: request.market,
    dataset: request.dataset,
    symbol: request.symbol,
    startDate: request.startDate,
    endDate: request.endDate,
    chunkDays: request.chunkDays,
    chunks: chunks.length,
  });

  const outcomes: ChunkOutcome[] = [];
  let cancelled = false;

  try {
    try {
      for (const chunk of chunks) {
        const chunkStartedAt = Date.now();
        if (!cancelled && signal?.aborted) {
          cancelled = true;
        }

        let fields: OutcomeFields;
        if (cancelled) {
          fields = { status: "failed", error: CANCELLED, attempts: 0 };
        } else {
          const stopTimer = metrics.startTimer("chunk_ms");
          try {
            fields = await processChunk(request, chunk, deps);
          } catch (error) {
            const kind = classifyFailure(error);
            if (kind === "cancelled") {
              cancelled = true;
              fields = { status: "failed", error: CANCELLED, attempts: 0 };
            } else {
              if (kind === "fatal") {
                await sessions.invalidate(errorMessage(error));
              }
              fields = { status: "failed", error: errorMessage(error), attempts: 0 };
            }
          } finally {
            stopTimer();
          }
        }

        const outcome = finishOutcome(chunk, chunkStartedAt, fields);
        outcomes.push(outcome);
        await recordOutcome(request, outcome, deps);
      }
    } finally {
      await sessions.shutdown();
    }
  } catch (error) {
    await store.finishRun(runId, "failed", new Date().toISOString());
    throw error;
  }

  const report = buildRunReport(runId, request, outcomes, cancelled, startedAt, new Date().toISOString());
  const status: RunStatus = cancelled ? "cancelled" : report.failed > 0 ? "failed" : "completed";
  await store.finishRun(runId, status, report.finishedAt);
  await sink.publishReport(report);

  logger.info("run_complete", {
    status,
    completed: report.completed,
    skipped: report.skipped,
    failed: report.failed,
    sessionsOpened: sessions.sessionsOpened,
  });
  return report;
}
