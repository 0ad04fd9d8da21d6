import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { AppConfig, DEFAULT_CONFIG } from "../../src/config";
import { Logger } from "../../src/observability";
import { Sink } from "../../src/sink";
import { ChunkOutcome, DownloadRequest, RunReport } from "../../src/types";

export function makeTempDir(label = "history"): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), `${label}-`));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

export function quietLogger(component = "test"): Logger {
  return new Logger({ component, runId: "test-run", level: "error" });
}

export function testConfig(root: string, overrides: Partial<AppConfig> = {}): AppConfig {
  return {
    ...DEFAULT_CONFIG,
    actionTimeoutMs: 1_000,
    maxActionAttempts: 3,
    maxExportAttempts: 3,
    backoffBaseMs: 1,
    backoffMaxMs: 2,
    fileWaitTimeoutMs: 100,
    filePollIntervalMs: 5,
    decompress: false,
    stagingDir: path.join(root, "staging"),
    manifestsDir: path.join(root, "manifests"),
    storeMode: "memory",
    logLevel: "error",
    ...overrides,
  };
}

export function testRequest(root: string, overrides: Partial<DownloadRequest> = {}): DownloadRequest {
  return {
    market: "spot",
    dataset: "trades",
    symbol: "BTCUSDT",
    startDate: "2024-01-01",
    endDate: "2024-01-10",
    chunkDays: 5,
    outBase: path.join(root, "out"),
    ...overrides,
  };
}

export class RecordingSink implements Sink {
  readonly outcomes: ChunkOutcome[] = [];
  readonly reports: RunReport[] = [];

  async publishChunkOutcomes(outcomes: ChunkOutcome[]): Promise<void> {
    this.outcomes.push(...outcomes);
  }

  async publishReport(report: RunReport): Promise<void> {
    this.reports.push(report);
  }
}
