import fs from "node:fs";
import path from "node:path";
import { errorMessage, InvalidConfigurationError } from "../core/errors";
import { LogLevel } from "../observability/types";
import { AppConfig, BrowserName, ConfigOverrides, StoreMode } from "./types";

const DEFAULT_CONFIG: AppConfig = {
  baseUrl: "https://www.bybit.com/derivatives/en/history-data",
  browser: "firefox",
  headless: true,
  navigationTimeoutMs: 100_000,
  actionTimeoutMs: 30_000,
  exportTimeoutMs: 30_000,
  downloadCollectWindowMs: 1_200,
  maxActionAttempts: 3,
  maxExportAttempts: 3,
  backoffBaseMs: 1_000,
  backoffMaxMs: 10_000,
  fileWaitTimeoutMs: 120_000,
  filePollIntervalMs: 500,
  decompress: true,
  defaultChunkDays: 5,
  stagingDir: "data/staging",
  manifestsDir: "data/manifests",
  storeMode: "sqlite",
  storePath: "data/state.sqlite",
  logLevel: "info",
};

function readConfigFile(configPath?: string): ConfigOverrides {
  if (!configPath) {
    return {};
  }

  const absolutePath = path.resolve(configPath);
  if (!fs.existsSync(absolutePath)) {
    throw new InvalidConfigurationError(`Config file not found: ${absolutePath}`);
  }

  const raw = fs.readFileSync(absolutePath, "utf-8");
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new InvalidConfigurationError(`Config file is not valid JSON: ${absolutePath} (${errorMessage(error)})`);
  }
  if (parsed === null || typeof parsed !== "object" || Array.isArray(parsed)) {
    throw new InvalidConfigurationError(`Config file must contain a JSON object: ${absolutePath}`);
  }
  return parsed as ConfigOverrides;
}

function toInt(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }

  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function toBool(value: string | undefined, fallback: boolean): boolean {
  if (!value) {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (normalized === "1" || normalized === "true" || normalized === "yes") {
    return true;
  }
  if (normalized === "0" || normalized === "false" || normalized === "no") {
    return false;
  }
  return fallback;
}

export function parseBrowserName(value: string | undefined): BrowserName | undefined {
  return value === "chromium" || value === "firefox" || value === "webkit" ? value : undefined;
}

function parseStoreMode(value: string | undefined): StoreMode | undefined {
  return value === "sqlite" || value === "memory" ? value : undefined;
}

function parseLogLevel(value: string | undefined): LogLevel | undefined {
  return value === "debug" || value === "info" || value === "warn" || value === "error" ? value : undefined;
}

export function loadConfig(configPath?: string, env: NodeJS.ProcessEnv = process.env): AppConfig {
  const fileConfig = readConfigFile(configPath);
  const merged: AppConfig = { ...DEFAULT_CONFIG, ...fileConfig };

  return {
    ...merged,
    baseUrl: env.BASE_URL ?? merged.baseUrl,
    browser: parseBrowserName(env.BROWSER) ?? merged.browser,
    headless: toBool(env.HEADLESS, merged.headless),
    navigationTimeoutMs: toInt(env.NAVIGATION_TIMEOUT_MS, merged.navigationTimeoutMs),
    actionTimeoutMs: toInt(env.ACTION_TIMEOUT_MS, merged.actionTimeoutMs),
    exportTimeoutMs: toInt(env.EXPORT_TIMEOUT_MS, merged.exportTimeoutMs),
    downloadCollectWindowMs: toInt(env.DOWNLOAD_COLLECT_WINDOW_MS, merged.downloadCollectWindowMs),
    maxActionAttempts: toInt(env.MAX_ACTION_ATTEMPTS, merged.maxActionAttempts),
    maxExportAttempts: toInt(env.MAX_EXPORT_ATTEMPTS, merged.maxExportAttempts),
    backoffBaseMs: toInt(env.BACKOFF_BASE_MS, merged.backoffBaseMs),
    backoffMaxMs: toInt(env.BACKOFF_MAX_MS, merged.backoffMaxMs),
    fileWaitTimeoutMs: toInt(env.FILE_WAIT_TIMEOUT_MS, merged.fileWaitTimeoutMs),
    filePollIntervalMs: toInt(env.FILE_POLL_INTERVAL_MS, merged.filePollIntervalMs),
    decompress: toBool(env.DECOMPRESS, merged.decompress),
    defaultChunkDays: toInt(env.DEFAULT_CHUNK_DAYS, merged.defaultChunkDays),
    stagingDir: env.STAGING_DIR ?? merged.stagingDir,
    manifestsDir: env.MANIFESTS_DIR ?? merged.manifestsDir,
    storeMode: parseStoreMode(env.STORE_MODE) ?? merged.storeMode,
    storePath: env.STORE_PATH ?? merged.storePath,
    logLevel: parseLogLevel(env.LOG_LEVEL) ?? merged.logLevel,
  };
}

export { DEFAULT_CONFIG };
