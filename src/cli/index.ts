import { assertValidSymbol } from "../archive";
import { assertChunkDays, parseIsoDate, splitDateRange } from "../chunk/dateRangeChunker";
import { AppConfig, BrowserName, loadConfig, parseBrowserName } from "../config";
import { CommandContext, runDownload, runStatus, runSymbols } from "../core/commands";
import { errorMessage, InvalidConfigurationError, RunCancelledError } from "../core/errors";
import { SymbolLister, UiDriver } from "../driver";
import { createRunId, Logger, MetricsRegistry } from "../observability";
import { EXIT_CANCELLED, EXIT_INVALID_CONFIGURATION, EXIT_OK, exitCodeFor, formatRunReport } from "../orchestrator";
import { createSink } from "../sink";
import { createStore } from "../store";
import { Dataset, DownloadRequest, Market } from "../types";

export type CommandName = "download" | "symbols" | "status";

export interface GlobalOptions {
  configPath?: string;
  browser?: BrowserName;
  headless?: boolean;
}

export type ParsedCliArgs =
  | {
      command: "download";
      options: GlobalOptions;
      market: Market;
      dataset: Dataset;
      symbol: string;
      startDate: string;
      endDate: string;
      outBase: string;
      chunkDays?: number;
    }
  | { command: "symbols"; options: GlobalOptions; market: Market }
  | { command: "status"; options: GlobalOptions };

export interface CliDeps {
  env?: NodeJS.ProcessEnv;
  createDriver?: () => UiDriver & SymbolLister;
  /** Installs signal handlers for cancellation; defaults to SIGINT and SIGTERM on the process. */
  onSignal?: (handler: () => void) => () => void;
}

const HELP_TEXT = `
Usage:
  market-history <command> [options]

Commands:
  download <market> <dataset> --symbol <symbol> --start <YYYY-MM-DD> --end <YYYY-MM-DD> --out <dir> [--chunk-days <n>]
  symbols <market>
  status

Markets:   spot | contract (aliases: derivatives, perp, futures)
Datasets:  trades (alias: trade) | l2book (aliases: l2, orderbook, order_book)

Options:
  --config <path>      Optional path to JSON config file
  --browser <name>     chromium | firefox | webkit
  --headless           Run the browser without a window (default)
  --no-headless        Show the browser window
  --chunk-days <n>     Days per export, 1 to 5 (default from config)
  -h, --help           Show this help
`;

const VALUE_OPTIONS = new Set(["--config", "--browser", "--symbol", "--start", "--end", "--out", "--chunk-days"]);
const FLAG_OPTIONS = new Set(["--headless", "--no-headless", "-h", "--help"]);

const MARKET_ALIASES: Record<string, Market> = {
  spot: "spot",
  contract: "contract",
  derivatives: "contract",
  perp: "contract",
  futures: "contract",
};

const DATASET_ALIASES: Record<string, Dataset> = {
  trades: "trades",
  trade: "trades",
  l2book: "l2book",
  l2: "l2book",
  orderbook: "l2book",
  order_book: "l2book",
};

interface SplitArgs {
  positionals: string[];
  values: Map<string, string>;
  flags: Set<string>;
}

function splitArgs(argv: string[]): SplitArgs {
  const positionals: string[] = [];
  const values = new Map<string, string>();
  const flags = new Set<string>();

  for (let index = 0; index < argv.length; index += 1) {
    const token = argv[index];
    if (!token.startsWith("-")) {
      positionals.push(token);
      continue;
    }

    const equalsAt = token.indexOf("=");
    const name = equalsAt > 0 ? token.slice(0, equalsAt) : token;
    if (VALUE_OPTIONS.has(name)) {
      const value = equalsAt > 0 ? token.slice(equalsAt + 1) : argv[index + 1];
      if (value === undefined || value === "" || (equalsAt < 0 && value.startsWith("--"))) {
        throw new InvalidConfigurationError(`option ${name} requires a value`);
      }
      values.set(name, value);
      if (equalsAt < 0) {
        index += 1;
      }
      continue;
    }
    if (FLAG_OPTIONS.has(token)) {
      flags.add(token);
      continue;
    }
    throw new InvalidConfigurationError(`unknown option ${token}`);
  }

  return { positionals, values, flags };
}

export function normalizeMarket(raw: string): Market {
  const market = MARKET_ALIASES[raw.trim().toLowerCase()];
  if (!market) {
    throw new InvalidConfigurationError(`unknown market ${JSON.stringify(raw)} (expected spot or contract)`);
  }
  return market;
}

export function normalizeDataset(raw: string): Dataset {
  const dataset = DATASET_ALIASES[raw.trim().toLowerCase()];
  if (!dataset) {
    throw new InvalidConfigurationError(`unknown dataset ${JSON.stringify(raw)} (expected trades or l2book)`);
  }
  return dataset;
}

function requireValue(values: Map<string, string>, name: string): string {
  const value = values.get(name);
  if (value === undefined) {
    throw new InvalidConfigurationError(`download requires ${name}`);
  }
  return value;
}

function parseGlobalOptions(split: SplitArgs): GlobalOptions {
  const options: GlobalOptions = { configPath: split.values.get("--config") };

  const browserRaw = split.values.get("--browser");
  if (browserRaw !== undefined) {
    const browser = parseBrowserName(browserRaw);
    if (!browser) {
      throw new InvalidConfigurationError(`unknown browser ${JSON.stringify(browserRaw)}`);
    }
    options.browser = browser;
  }

  if (split.flags.has("--headless") && split.flags.has("--no-headless")) {
    throw new InvalidConfigurationError("--headless and --no-headless are mutually exclusive");
  }
  if (split.flags.has("--headless")) {
    options.headless = true;
  } else if (split.flags.has("--no-headless")) {
    options.headless = false;
  }
  return options;
}

/**
 * Parses argv (without the node and script entries). Returns "help" when asked for
 * it or when no command is given; malformed input raises InvalidConfigurationError.
 */
export function parseCliArgs(argv: string[]): ParsedCliArgs | "help" {
  const split = splitArgs(argv);
  if (split.flags.has("-h") || split.flags.has("--help") || split.positionals.length === 0) {
    return "help";
  }

  const options = parseGlobalOptions(split);
  const [command, ...rest] = split.positionals;

  switch (command) {
    case "download": {
      if (rest.length !== 2) {
        throw new InvalidConfigurationError("download takes exactly <market> <dataset>");
      }
      const startDate = requireValue(split.values, "--start");
      const endDate = requireValue(split.values, "--end");
      parseIsoDate(startDate, "start date");
      parseIsoDate(endDate, "end date");

      const chunkDaysRaw = split.values.get("--chunk-days");
      let chunkDays: number | undefined;
      if (chunkDaysRaw !== undefined) {
        chunkDays = Number(chunkDaysRaw);
        assertChunkDays(chunkDays);
      }

      const symbol = requireValue(split.values, "--symbol").trim();
      assertValidSymbol(symbol);

      return {
        command: "download",
        options,
        market: normalizeMarket(rest[0]),
        dataset: normalizeDataset(rest[1]),
        symbol,
        startDate,
        endDate,
        outBase: requireValue(split.values, "--out"),
        chunkDays,
      };
    }
    case "symbols":
      if (rest.length !== 1) {
        throw new InvalidConfigurationError("symbols takes exactly <market>");
      }
      return { command: "symbols", options, market: normalizeMarket(rest[0]) };
    case "status":
      if (rest.length !== 0) {
        throw new InvalidConfigurationError("status takes no arguments");
      }
      return { command: "status", options };
    default:
      throw new InvalidConfigurationError(`unknown command ${JSON.stringify(command)}`);
  }
}

function applyOverrides(config: AppConfig, options: GlobalOptions): AppConfig {
  return {
    ...config,
    browser: options.browser ?? config.browser,
    headless: options.headless ?? config.headless,
  };
}

function installProcessSignals(handler: () => void): () => void {
  process.once("SIGINT", handler);
  process.once("SIGTERM", handler);
  return () => {
    process.removeListener("SIGINT", handler);
    process.removeListener("SIGTERM", handler);
  };
}

interface PreparedCommand {
  parsed: ParsedCliArgs;
  config: AppConfig;
}

function prepareCommand(argv: string[], env?: NodeJS.ProcessEnv): PreparedCommand | "help" {
  const parsed = parseCliArgs(argv);
  if (parsed === "help") {
    return "help";
  }
  const config = applyOverrides(loadConfig(parsed.options.configPath, env), parsed.options);
  if (parsed.command === "download") {
    // fail before any store or browser is created
    splitDateRange(parsed.startDate, parsed.endDate, parsed.chunkDays ?? config.defaultChunkDays);
  }
  return { parsed, config };
}

export async function runCli(argv: string[], deps: CliDeps = {}): Promise<number> {
  let prepared: PreparedCommand | "help";
  try {
    prepared = prepareCommand(argv, deps.env);
  } catch (error) {
    if (error instanceof InvalidConfigurationError) {
      console.error(`error: ${error.message}`);
      console.error(HELP_TEXT.trim());
      return EXIT_INVALID_CONFIGURATION;
    }
    throw error;
  }
  if (prepared === "help") {
    console.log(HELP_TEXT.trim());
    return EXIT_OK;
  }

  const { parsed, config } = prepared;
  const runId = createRunId();
  const store = createStore(config);
  const sink = createSink(config, runId);
  const metrics = new MetricsRegistry();
  const logger = new Logger({ component: "cli", runId, level: config.logLevel });
  const controller = new AbortController();
  const removeSignals = (deps.onSignal ?? installProcessSignals)(() => {
    logger.warn("cancel_requested");
    controller.abort();
  });
  const context: CommandContext = {
    runId,
    config,
    store,
    sink,
    logger,
    metrics,
    signal: controller.signal,
    createDriver: deps.createDriver,
  };

  logger.info("command_start", { command: parsed.command, browser: config.browser, headless: config.headless });

  try {
    switch (parsed.command) {
      case "download": {
        const request: DownloadRequest = {
          market: parsed.market,
          dataset: parsed.dataset,
          symbol: parsed.symbol,
          startDate: parsed.startDate,
          endDate: parsed.endDate,
          chunkDays: parsed.chunkDays ?? config.defaultChunkDays,
          outBase: parsed.outBase,
        };
        const report = await runDownload({ ...context, logger: logger.child("download") }, request);
        console.log(formatRunReport(report));
        logger.info("command_complete", { command: parsed.command, failed: report.failed });
        return exitCodeFor(report);
      }
      case "symbols": {
        const symbols = await runSymbols({ ...context, logger: logger.child("symbols") }, parsed.market);
        console.log(symbols.join("\n"));
        break;
      }
      case "status": {
        const stats = await runStatus({ ...context, logger: logger.child("status") });
        console.log(JSON.stringify(stats, null, 2));
        break;
      }
    }

    logger.info("command_complete", { command: parsed.command });
    return EXIT_OK;
  } catch (error) {
    if (error instanceof RunCancelledError) {
      logger.warn("command_cancelled", { command: parsed.command });
      return EXIT_CANCELLED;
    }
    if (error instanceof InvalidConfigurationError) {
      console.error(`error: ${error.message}`);
      return EXIT_INVALID_CONFIGURATION;
    }
    logger.error("command_failed", { command: parsed.command, error: errorMessage(error) });
    throw error;
  } finally {
    removeSignals();
    await store.close();
    metrics.printSummary();
  }
}
