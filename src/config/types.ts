import { LogLevel } from "../observability/types";

export type BrowserName = "chromium" | "firefox" | "webkit";

export type StoreMode = "sqlite" | "memory";

export interface AppConfig {
  baseUrl: string;
  browser: BrowserName;
  headless: boolean;
  navigationTimeoutMs: number;
  actionTimeoutMs: number;
  exportTimeoutMs: number;
  downloadCollectWindowMs: number;
  maxActionAttempts: number;
  maxExportAttempts: number;
  backoffBaseMs: number;
  backoffMaxMs: number;
  fileWaitTimeoutMs: number;
  filePollIntervalMs: number;
  decompress: boolean;
  defaultChunkDays: number;
  stagingDir: string;
  manifestsDir: string;
  storeMode: StoreMode;
  storePath: string;
  logLevel: LogLevel;
}

export type ConfigOverrides = Partial<AppConfig>;
