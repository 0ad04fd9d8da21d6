import path from "node:path";
import { stagingPrefix } from "../archive/naming";
import { AppConfig } from "../config";
import { classifyFailure, DownloadTimeoutError, errorMessage, FatalSessionError, RunCancelledError } from "../core/errors";
import { backoffDelay, sleep, throwIfCancelled, withDeadline } from "../core/timing";
import { ActionResult, actionBudgetMs, describeAction, UiAction } from "../driver/types";
import { Logger, MetricsRegistry } from "../observability";
import { Chunk, DownloadRequest } from "../types";
import { CompletionWatcher } from "./completionWatcher";
import { Session } from "./sessionManager";

export type WorkflowState =
  | "Idle"
  | "MarketSelected"
  | "DatasetSelected"
  | "SymbolSelected"
  | "RangeSet"
  | "ExportTriggered"
  | "AwaitingFile"
  | "Resolved"
  | "NoData"
  | "Failed";

export type WorkflowResult =
  | { state: "Resolved"; attempts: number; resolvedPaths: string[] }
  | { state: "NoData"; attempts: number; reason: string }
  | { state: "Failed"; attempts: number; reason: string; fatal: boolean };

export type WorkflowConfig = Pick<
  AppConfig,
  | "actionTimeoutMs"
  | "navigationTimeoutMs"
  | "exportTimeoutMs"
  | "downloadCollectWindowMs"
  | "maxActionAttempts"
  | "maxExportAttempts"
  | "backoffBaseMs"
  | "backoffMaxMs"
  | "fileWaitTimeoutMs"
  | "filePollIntervalMs"
  | "stagingDir"
>;

export type TransitionListener = (chunk: Chunk, from: WorkflowState, to: WorkflowState) => void;

interface WorkflowDeps {
  config: WorkflowConfig;
  logger: Logger;
  metrics: MetricsRegistry;
  watcher: CompletionWatcher;
  signal?: AbortSignal;
  onTransition?: TransitionListener;
}

const ALLOWED_TRANSITIONS: Record<WorkflowState, readonly WorkflowState[]> = {
  Idle: ["MarketSelected"],
  MarketSelected: ["DatasetSelected", "Failed"],
  DatasetSelected: ["SymbolSelected", "Failed"],
  SymbolSelected: ["RangeSet", "NoData", "Failed"],
  RangeSet: ["ExportTriggered", "Failed"],
  ExportTriggered: ["AwaitingFile", "Failed"],
  AwaitingFile: ["Resolved", "RangeSet", "Failed"],
  Resolved: [],
  NoData: [],
  Failed: [],
};

interface UiStep {
  from: WorkflowState;
  to: WorkflowState;
  action(request: DownloadRequest, chunk: Chunk): UiAction;
}

// Steps up to RangeSet; the export/await leg has its own retry loop.
const SELECTION_STEPS: readonly UiStep[] = [
  { from: "Idle", to: "MarketSelected", action: (request) => ({ kind: "selectMarket", market: request.market }) },
  {
    from: "MarketSelected",
    to: "DatasetSelected",
    action: (request) => ({ kind: "selectDataset", dataset: request.dataset }),
  },
  {
    from: "DatasetSelected",
    to: "SymbolSelected",
    action: (request) => ({ kind: "selectSymbol", symbol: request.symbol }),
  },
  {
    from: "SymbolSelected",
    to: "RangeSet",
    action: (_request, chunk) => ({ kind: "setDateRange", start: chunk.rangeStart, end: chunk.rangeEnd }),
  },
];

// Staged files stamped slightly before the chunk started still belong to it.
const MTIME_TOLERANCE_MS = 2_000;

type StepOutcome =
  | { kind: "ok"; attempts: number }
  | { kind: "no_data"; attempts: number; reason: string }
  | { kind: "failed"; attempts: number; reason: string; fatal: boolean };

class ChunkRun {
  readonly request: DownloadRequest;
  readonly chunk: Chunk;
  readonly startedAt: number;
  state: WorkflowState = "Idle";
  maxAttempts = 1;

  constructor(request: DownloadRequest, chunk: Chunk, startedAt: number) {
    this.request = request;
    this.chunk = chunk;
    this.startedAt = startedAt;
  }

  noteAttempts(attempts: number): void {
    this.maxAttempts = Math.max(this.maxAttempts, attempts);
  }
}

/**
 * Walks one chunk through the export page: market, dataset, symbol, date range,
 * export, then waits for the staged file. Transient failures retry the same step
 * with exponential backoff; a fatal failure ends the chunk at once and is flagged
 * so the caller can replace the session.
 */
export class DownloadWorkflow {
  private readonly deps: WorkflowDeps;

  constructor(deps: WorkflowDeps) {
    this.deps = deps;
  }

  async run(session: Session, request: DownloadRequest, chunk: Chunk): Promise<WorkflowResult> {
    const run = new ChunkRun(request, chunk, Date.now());

    for (const step of SELECTION_STEPS) {
      if (run.state !== step.from) {
        throw new Error(`workflow expected state ${step.from}, found ${run.state}`);
      }
      const action = step.action(request, chunk);
      const outcome = await this.performWithRetry(session, run, action, this.deps.config.maxActionAttempts);
      run.noteAttempts(outcome.attempts);

      if (outcome.kind === "no_data" && step.to === "RangeSet") {
        this.transition(run, "NoData");
        return { state: "NoData", attempts: run.maxAttempts, reason: outcome.reason };
      }
      if (outcome.kind !== "ok") {
        if (run.state === "Idle") {
          // the chunk has left Idle once its first action was issued
          this.transition(run, step.to);
        }
        return outcome.kind === "failed"
          ? this.fail(run, outcome.reason, outcome.fatal)
          : this.fail(run, `unexpected no_data from ${step.to} step: ${outcome.reason}`, false);
      }
      this.transition(run, step.to);
    }

    return this.exportAndAwait(session, run);
  }

  private async exportAndAwait(session: Session, run: ChunkRun): Promise<WorkflowResult> {
    const { config, metrics, logger, watcher, signal } = this.deps;
    const prefix = stagingPrefix(run.request, run.chunk);
    const maxAttempts = config.maxExportAttempts;
    let lastReason = "export not attempted";

    for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
      run.noteAttempts(attempt);
      const result = await this.performOnce(session, { kind: "triggerExport", filePrefix: prefix });

      if (result.status === "fatal") {
        return this.fail(run, result.reason, true);
      }

      if (result.status === "ok") {
        this.transition(run, "ExportTriggered");
        this.transition(run, "AwaitingFile");
        const stopTimer = metrics.startTimer("file_wait_ms");
        try {
          const resolvedPaths = await watcher.waitForFiles({
            dir: path.resolve(config.stagingDir),
            prefix,
            count: Math.max(1, result.downloads ?? 1),
            timeoutMs: config.fileWaitTimeoutMs,
            pollIntervalMs: config.filePollIntervalMs,
            notBeforeMs: run.startedAt - MTIME_TOLERANCE_MS,
            signal,
          });
          stopTimer();
          this.transition(run, "Resolved");
          return { state: "Resolved", attempts: run.maxAttempts, resolvedPaths };
        } catch (error) {
          stopTimer();
          if (!(error instanceof DownloadTimeoutError)) {
            throw error;
          }
          metrics.incrementCounter("downloads_timed_out");
          lastReason = error.message;
          this.transition(run, "RangeSet");
        }
      } else {
        lastReason = result.reason;
      }

      if (attempt < maxAttempts) {
        metrics.incrementCounter("ui_action_retries");
        logger.warn("export_retry", { chunkIndex: run.chunk.index, attempt, reason: lastReason });
        await sleep(backoffDelay(attempt, config.backoffBaseMs, config.backoffMaxMs), signal);
      }
    }

    return this.fail(run, `export failed after ${maxAttempts} attempts: ${lastReason}`, false);
  }

  private async performWithRetry(
    session: Session,
    run: ChunkRun,
    action: UiAction,
    maxAttempts: number,
  ): Promise<StepOutcome> {
    const { config, metrics, logger, signal } = this.deps;
    let lastReason = "not attempted";

    for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
      const result = await this.performOnce(session, action);
      switch (result.status) {
        case "ok":
          return { kind: "ok", attempts: attempt };
        case "no_data":
          return { kind: "no_data", attempts: attempt, reason: result.reason };
        case "fatal":
          return { kind: "failed", attempts: attempt, reason: result.reason, fatal: true };
        case "transient":
          lastReason = result.reason;
          break;
      }

      if (attempt < maxAttempts) {
        metrics.incrementCounter("ui_action_retries");
        logger.warn("ui_action_retry", {
          chunkIndex: run.chunk.index,
          state: run.state,
          action: describeAction(action),
          attempt,
          reason: lastReason,
        });
        await sleep(backoffDelay(attempt, config.backoffBaseMs, config.backoffMaxMs), signal);
      }
    }

    return {
      kind: "failed",
      attempts: maxAttempts,
      reason: `${describeAction(action)} failed after ${maxAttempts} attempts: ${lastReason}`,
      fatal: false,
    };
  }

  /**
   * One driver call; thrown errors become results. The driver bounds its own
   * browser calls. Overrunning the action's budget means the page may still be
   * busy with it, so the result is fatal and nothing else runs on that session.
   */
  private async performOnce(session: Session, action: UiAction): Promise<ActionResult> {
    const { config, metrics, signal } = this.deps;
    throwIfCancelled(signal);
    const budgetMs = actionBudgetMs(action, config);
    const stopTimer = metrics.startTimer("ui_action_ms");
    try {
      return await withDeadline(
        session.driver.perform(action),
        budgetMs,
        () => {
          metrics.incrementCounter("ui_action_overruns");
          return new FatalSessionError(`${describeAction(action)} did not settle within ${budgetMs}ms`);
        },
        signal,
      );
    } catch (error) {
      const kind = classifyFailure(error);
      if (kind === "cancelled") {
        throw error instanceof RunCancelledError ? error : new RunCancelledError();
      }
      return { status: kind, reason: errorMessage(error) };
    } finally {
      stopTimer();
    }
  }

  private fail(run: ChunkRun, reason: string, fatal: boolean): WorkflowResult {
    this.transition(run, "Failed");
    this.deps.logger.error("workflow_failed", { chunkIndex: run.chunk.index, reason, fatal, attempts: run.maxAttempts });
    return { state: "Failed", attempts: run.maxAttempts, reason, fatal };
  }

  private transition(run: ChunkRun, to: WorkflowState): void {
    const from = run.state;
    if (!ALLOWED_TRANSITIONS[from].includes(to)) {
      throw new Error(`illegal workflow transition ${from} -> ${to}`);
    }
    run.state = to;
    this.deps.logger.debug("workflow_transition", { chunkIndex: run.chunk.index, from, state: to });
    this.deps.onTransition?.(run.chunk, from, to);
  }
}
