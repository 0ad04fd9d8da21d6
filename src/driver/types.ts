import { AppConfig } from "../config";
import { Dataset, Market } from "../types";

export type UiAction =
  | { kind: "selectMarket"; market: Market }
  | { kind: "selectDataset"; dataset: Dataset }
  | { kind: "selectSymbol"; symbol: string }
  | { kind: "setDateRange"; start: string; end: string }
  | { kind: "triggerExport"; filePrefix: string };

export type UiActionKind = UiAction["kind"];

export type ActionResult =
  | { status: "ok"; downloads?: number }
  | { status: "no_data"; reason: string }
  | { status: "transient"; reason: string }
  | { status: "fatal"; reason: string };

/**
 * A browser session able to walk the history-data page. `perform` reports
 * failures as results; a thrown error is classified by the caller. Every browser
 * call inside `perform` carries its own timeout, so a call settles within
 * `actionBudgetMs` of being issued. A successful `triggerExport` reports how many
 * files the click produced in `downloads`.
 */
export interface UiDriver {
  open(): Promise<void>;
  close(): Promise<void>;
  perform(action: UiAction): Promise<ActionResult>;
}

export interface SymbolLister {
  listSymbols(market: Market): Promise<string[]>;
}

export function describeAction(action: UiAction): string {
  switch (action.kind) {
    case "selectMarket":
      return `selectMarket(${action.market})`;
    case "selectDataset":
      return `selectDataset(${action.dataset})`;
    case "selectSymbol":
      return `selectSymbol(${action.symbol})`;
    case "setDateRange":
      return `setDateRange(${action.start}, ${action.end})`;
    case "triggerExport":
      return `triggerExport(${action.filePrefix})`;
  }
}

export type ActionTimeouts = Pick<
  AppConfig,
  "actionTimeoutMs" | "navigationTimeoutMs" | "exportTimeoutMs" | "downloadCollectWindowMs"
>;

// Upper bound on sequential browser calls each action makes, each bounded by actionTimeoutMs.
const CALLS_PER_ACTION: Record<UiActionKind, number> = {
  selectMarket: 0,
  selectDataset: 3,
  selectSymbol: 6,
  setDateRange: 10,
  triggerExport: 3,
};

// Fixed waits inside an action (hover settle, no-data check).
const FIXED_WAIT_MS: Record<UiActionKind, number> = {
  selectMarket: 0,
  selectDataset: 400,
  selectSymbol: 0,
  setDateRange: 4_000,
  triggerExport: 0,
};

/** Longest a well-behaved driver may take for `action`; past it the session is abandoned. */
export function actionBudgetMs(action: UiAction, timeouts: ActionTimeouts): number {
  let budget = CALLS_PER_ACTION[action.kind] * timeouts.actionTimeoutMs + FIXED_WAIT_MS[action.kind];
  if (action.kind === "selectMarket") {
    // goto, then networkidle
    budget += 2 * timeouts.navigationTimeoutMs;
  }
  if (action.kind === "triggerExport") {
    budget += timeouts.exportTimeoutMs + timeouts.downloadCollectWindowMs;
  }
  return budget;
}
