import { ChunkOutcome, DownloadRequest, RunReport } from "../types";

export const EXIT_OK = 0;
export const EXIT_CHUNK_FAILED = 1;
export const EXIT_INVALID_CONFIGURATION = 2;
export const EXIT_CANCELLED = 130;

export function buildRunReport(
  runId: string,
  request: DownloadRequest,
  outcomes: ChunkOutcome[],
  cancelled: boolean,
  startedAt: string,
  finishedAt: string,
): RunReport {
  return {
    runId,
    request,
    outcomes,
    completed: outcomes.filter((outcome) => outcome.status === "completed").length,
    skipped: outcomes.filter((outcome) => outcome.status === "skipped").length,
    failed: outcomes.filter((outcome) => outcome.status === "failed").length,
    cancelled,
    startedAt,
    finishedAt,
  };
}

export function exitCodeFor(report: RunReport): number {
  if (report.cancelled) {
    return EXIT_CANCELLED;
  }
  return report.failed > 0 ? EXIT_CHUNK_FAILED : EXIT_OK;
}

function describeOutcome(outcome: ChunkOutcome): string {
  const range = `${outcome.chunk.rangeStart}..${outcome.chunk.rangeEnd}`;
  switch (outcome.status) {
    case "completed":
      return `#${outcome.chunk.index} ${range} completed ${outcome.resolvedPath ?? ""}`.trimEnd();
    case "skipped":
      return `#${outcome.chunk.index} ${range} skipped (${outcome.skipReason ?? "unknown"})`;
    case "failed":
      return `#${outcome.chunk.index} ${range} failed: ${outcome.error ?? "unknown error"}`;
  }
}

/** Plain-text run summary for the terminal, one line per chunk. */
export function formatRunReport(report: RunReport): string {
  const { market, dataset, symbol, startDate, endDate } = report.request;
  const header = `${market} ${dataset} ${symbol} ${startDate}..${endDate}: ${report.completed} completed, ${report.skipped} skipped, ${report.failed} failed${report.cancelled ? " (cancelled)" : ""}`;
  return [header, ...report.outcomes.map(describeOutcome)].join("\n");
}
