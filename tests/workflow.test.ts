import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { AppConfig } from "../src/config";
import { RunCancelledError } from "../src/core/errors";
import { CompletionWatcher } from "../src/download/completionWatcher";
import { DownloadWorkflow, WorkflowState } from "../src/download/workflow";
import { actionBudgetMs } from "../src/driver/types";
import { MetricsRegistry } from "../src/observability";
import { Chunk } from "../src/types";
import { FakeUiDriver } from "./helpers/fakeDriver";
import { makeTempDir, quietLogger, removeDir, testConfig, testRequest } from "./helpers/fixtures";

const CHUNK: Chunk = { index: 0, rangeStart: "2024-01-01", rangeEnd: "2024-01-05" };
const PREFIX = "spot_BTCUSDT_trades_2024-01-01_2024-01-05__";

describe("DownloadWorkflow", () => {
  let root: string;
  let config: AppConfig;
  let metrics: MetricsRegistry;
  let transitions: string[];

  function createWorkflow(signal?: AbortSignal): DownloadWorkflow {
    return new DownloadWorkflow({
      config,
      logger: quietLogger(),
      metrics,
      watcher: new CompletionWatcher(),
      signal,
      onTransition: (_chunk, from: WorkflowState, to: WorkflowState) => transitions.push(`${from}>${to}`),
    });
  }

  beforeEach(() => {
    root = makeTempDir("workflow");
    config = testConfig(root);
    metrics = new MetricsRegistry();
    transitions = [];
  });

  afterEach(() => {
    removeDir(root);
  });

  it("walks every state and resolves the staged file", async () => {
    const driver = new FakeUiDriver({ stagingDir: config.stagingDir });

    const result = await createWorkflow().run({ id: 1, driver }, testRequest(root), CHUNK);

    expect(result).toEqual({
      state: "Resolved",
      attempts: 1,
      resolvedPaths: [path.join(config.stagingDir, `${PREFIX}data.csv`)],
    });
    expect(driver.actions).toEqual([
      { kind: "selectMarket", market: "spot" },
      { kind: "selectDataset", dataset: "trades" },
      { kind: "selectSymbol", symbol: "BTCUSDT" },
      { kind: "setDateRange", start: "2024-01-01", end: "2024-01-05" },
      { kind: "triggerExport", filePrefix: PREFIX },
    ]);
    expect(transitions).toEqual([
      "Idle>MarketSelected",
      "MarketSelected>DatasetSelected",
      "DatasetSelected>SymbolSelected",
      "SymbolSelected>RangeSet",
      "RangeSet>ExportTriggered",
      "ExportTriggered>AwaitingFile",
      "AwaitingFile>Resolved",
    ]);
  });

  it("retries the same action after transient failures", async () => {
    const driver = new FakeUiDriver({ stagingDir: config.stagingDir }).script(
      "selectSymbol",
      { status: "transient", reason: "dropdown not ready" },
      new Error("element is not attached to the DOM"),
    );

    const result = await createWorkflow().run({ id: 1, driver }, testRequest(root), CHUNK);

    expect(result.state).toBe("Resolved");
    expect(result.attempts).toBe(3);
    expect(driver.actionKinds.filter((kind) => kind === "selectSymbol")).toHaveLength(3);
    expect(driver.actionKinds.filter((kind) => kind === "selectMarket")).toHaveLength(1);
    expect(metrics.getCounter("ui_action_retries")).toBe(2);
  });

  it("fails after the action budget is spent", async () => {
    const driver = new FakeUiDriver({ stagingDir: config.stagingDir }).script(
      "selectSymbol",
      { status: "transient", reason: "flaky" },
      { status: "transient", reason: "flaky" },
      { status: "transient", reason: "flaky" },
    );

    const result = await createWorkflow().run({ id: 1, driver }, testRequest(root), CHUNK);

    expect(result).toEqual({
      state: "Failed",
      attempts: 3,
      reason: "selectSymbol(BTCUSDT) failed after 3 attempts: flaky",
      fatal: false,
    });
    expect(transitions[transitions.length - 1]).toBe("DatasetSelected>Failed");
  });

  it("aborts at once on a fatal result", async () => {
    const driver = new FakeUiDriver({ stagingDir: config.stagingDir }).script("setDateRange", {
      status: "fatal",
      reason: "page crashed",
    });

    const result = await createWorkflow().run({ id: 1, driver }, testRequest(root), CHUNK);

    expect(result).toEqual({ state: "Failed", attempts: 1, reason: "page crashed", fatal: true });
    expect(driver.actionKinds).not.toContain("triggerExport");
    expect(metrics.getCounter("ui_action_retries")).toBe(0);
  });

  it("classifies a closed browser as fatal", async () => {
    const driver = new FakeUiDriver().script("selectMarket", new Error("Target page, context or browser has been closed"));

    const result = await createWorkflow().run({ id: 1, driver }, testRequest(root), CHUNK);

    expect(result).toEqual({
      state: "Failed",
      attempts: 1,
      reason: "Target page, context or browser has been closed",
      fatal: true,
    });
    expect(transitions).toEqual(["Idle>MarketSelected", "MarketSelected>Failed"]);
  });

  it("runs one action at a time while a page load is slow", async () => {
    config = testConfig(root, { actionTimeoutMs: 50 });
    const driver = new FakeUiDriver({ stagingDir: config.stagingDir }).slow("selectMarket", 150);

    const result = await createWorkflow().run({ id: 1, driver }, testRequest(root), CHUNK);

    expect(result.state).toBe("Resolved");
    expect(driver.maxInFlight).toBe(1);
    expect(driver.actionKinds.filter((kind) => kind === "selectMarket")).toHaveLength(1);
  });

  it("gives up the session when an action overruns its budget", async () => {
    config = testConfig(root, { actionTimeoutMs: 10, navigationTimeoutMs: 20 });
    const driver = new FakeUiDriver({ stagingDir: config.stagingDir }).slow("selectMarket", 150);

    const result = await createWorkflow().run({ id: 1, driver }, testRequest(root), CHUNK);

    expect(result).toEqual({
      state: "Failed",
      attempts: 1,
      reason: "selectMarket(spot) did not settle within 40ms",
      fatal: true,
    });
    expect(driver.actions).toHaveLength(1);
    expect(driver.maxInFlight).toBe(1);
    expect(metrics.getCounter("ui_action_overruns")).toBe(1);
    expect(metrics.getCounter("ui_action_retries")).toBe(0);
  });

  it("sizes each action's budget from the timeouts its browser calls use", () => {
    const timeouts = {
      actionTimeoutMs: 1_000,
      navigationTimeoutMs: 5_000,
      exportTimeoutMs: 3_000,
      downloadCollectWindowMs: 1_200,
    };

    expect(actionBudgetMs({ kind: "selectMarket", market: "spot" }, timeouts)).toBe(10_000);
    expect(actionBudgetMs({ kind: "selectSymbol", symbol: "BTCUSDT" }, timeouts)).toBe(6_000);
    expect(actionBudgetMs({ kind: "setDateRange", start: "2024-01-01", end: "2024-01-05" }, timeouts)).toBe(14_000);
    expect(actionBudgetMs({ kind: "triggerExport", filePrefix: PREFIX }, timeouts)).toBe(7_200);
  });

  it("resolves every file of an export that produced several downloads", async () => {
    const driver = new FakeUiDriver({ stagingDir: config.stagingDir, downloadNames: ["part-b.csv", "part-a.csv"] });

    const result = await createWorkflow().run({ id: 1, driver }, testRequest(root), CHUNK);

    expect(result).toEqual({
      state: "Resolved",
      attempts: 1,
      resolvedPaths: [
        path.join(config.stagingDir, `${PREFIX}part-a.csv`),
        path.join(config.stagingDir, `${PREFIX}part-b.csv`),
      ],
    });
  });

  it("stops with NoData when the range has nothing to export", async () => {
    const driver = new FakeUiDriver().script("setDateRange", { status: "no_data", reason: "no data for range" });

    const result = await createWorkflow().run({ id: 1, driver }, testRequest(root), CHUNK);

    expect(result).toEqual({ state: "NoData", attempts: 1, reason: "no data for range" });
    expect(driver.actionKinds).not.toContain("triggerExport");
    expect(transitions[transitions.length - 1]).toBe("SymbolSelected>NoData");
  });

  it("re-triggers the export when the file never arrives", async () => {
    config = testConfig(root, { fileWaitTimeoutMs: 30 });
    const driver = new FakeUiDriver({ stagingDir: config.stagingDir, silentExports: 1 });

    const result = await createWorkflow().run({ id: 1, driver }, testRequest(root), CHUNK);

    expect(result.state).toBe("Resolved");
    expect(result.attempts).toBe(2);
    expect(driver.actionKinds.filter((kind) => kind === "triggerExport")).toHaveLength(2);
    expect(metrics.getCounter("downloads_timed_out")).toBe(1);
    expect(transitions).toContain("AwaitingFile>RangeSet");
  });

  it("fails when every export attempt is rejected", async () => {
    const driver = new FakeUiDriver().script(
      "triggerExport",
      { status: "transient", reason: "download did not start" },
      { status: "transient", reason: "download did not start" },
      { status: "transient", reason: "download did not start" },
    );

    const result = await createWorkflow().run({ id: 1, driver }, testRequest(root), CHUNK);

    expect(result).toEqual({
      state: "Failed",
      attempts: 3,
      reason: "export failed after 3 attempts: download did not start",
      fatal: false,
    });
  });

  it("propagates cancellation", async () => {
    const controller = new AbortController();
    controller.abort();
    const driver = new FakeUiDriver();

    await expect(createWorkflow(controller.signal).run({ id: 1, driver }, testRequest(root), CHUNK)).rejects.toBeInstanceOf(
      RunCancelledError,
    );
    expect(driver.actions).toHaveLength(0);
  });
});
