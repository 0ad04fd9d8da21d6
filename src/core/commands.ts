import { ArchiveWriter } from "../archive";
import { AppConfig } from "../config";
import { CompletionWatcher } from "../download/completionWatcher";
import { SessionManager, UiDriverFactory } from "../download/sessionManager";
import { DownloadWorkflow } from "../download/workflow";
import { createDriverFactory, SymbolLister, UiDriver } from "../driver";
import { Logger, MetricsRegistry } from "../observability";
import { runOrchestrator } from "../orchestrator";
import { Sink } from "../sink";
import { RunStore, StoreStats } from "../store";
import { DownloadRequest, Market, RunReport } from "../types";

export interface CommandContext {
  runId: string;
  config: AppConfig;
  store: RunStore;
  logger: Logger;
  metrics: MetricsRegistry;
  sink: Sink;
  signal?: AbortSignal;
  /** Replaces the Playwright driver, e.g. with an in-process fake. */
  createDriver?: () => UiDriver & SymbolLister;
}

function driverFactory(ctx: CommandContext): () => UiDriver & SymbolLister {
  return ctx.createDriver ?? createDriverFactory(ctx.config, ctx.logger.child("driver"));
}

export async function runDownload(ctx: CommandContext, request: DownloadRequest): Promise<RunReport> {
  const createDriver: UiDriverFactory = driverFactory(ctx);
  const sessions = new SessionManager({
    createDriver,
    logger: ctx.logger.child("session"),
    metrics: ctx.metrics,
  });
  const workflow = new DownloadWorkflow({
    config: ctx.config,
    logger: ctx.logger.child("workflow"),
    metrics: ctx.metrics,
    watcher: new CompletionWatcher(undefined, ctx.logger.child("watcher")),
    signal: ctx.signal,
  });
  const archive = new ArchiveWriter({
    store: ctx.store,
    logger: ctx.logger.child("archive"),
    decompress: ctx.config.decompress,
  });

  return runOrchestrator(request, {
    runId: ctx.runId,
    store: ctx.store,
    sink: ctx.sink,
    sessions,
    workflow,
    archive,
    logger: ctx.logger,
    metrics: ctx.metrics,
    signal: ctx.signal,
  });
}

export async function runSymbols(ctx: CommandContext, market: Market): Promise<string[]> {
  ctx.logger.info("symbols_start", { market });
  const driver = driverFactory(ctx)();
  await driver.open();
  try {
    const symbols = await driver.listSymbols(market);
    ctx.logger.info("symbols_complete", { market, count: symbols.length });
    return symbols;
  } finally {
    await driver.close();
  }
}

export async function runStatus(ctx: CommandContext): Promise<StoreStats> {
  ctx.logger.info("status_start");
  const stats = await ctx.store.getStats();
  ctx.logger.info("status_complete", { stats });
  return stats;
}
