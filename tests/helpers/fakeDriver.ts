import fs from "node:fs";
import path from "node:path";
import { ActionResult, SymbolLister, UiAction, UiActionKind, UiDriver } from "../../src/driver/types";
import { Market } from "../../src/types";

export type ScriptedResult = ActionResult | Error;

export interface FakeUiDriverOptions {
  /** Where a successful triggerExport writes `<filePrefix><name>` for each of `downloadNames`. */
  stagingDir?: string;
  downloadNames?: string[];
  content?: string | Buffer;
  /** Number of successful exports that produce no file before one does. */
  silentExports?: number;
  symbols?: string[];
  openError?: Error;
  closeError?: Error;
  onPerform?: (action: UiAction) => void;
}

/** In-process stand-in for the browser: records actions and replays scripted results. */
export class FakeUiDriver implements UiDriver, SymbolLister {
  readonly actions: UiAction[] = [];
  openCalls = 0;
  closeCalls = 0;
  inFlight = 0;
  maxInFlight = 0;
  private readonly options: FakeUiDriverOptions;
  private readonly scripts = new Map<UiActionKind, ScriptedResult[]>();
  private readonly delays = new Map<UiActionKind, number[]>();
  private silentExportsLeft: number;

  constructor(options: FakeUiDriverOptions = {}) {
    this.options = options;
    this.silentExportsLeft = options.silentExports ?? 0;
  }

  script(kind: UiActionKind, ...results: ScriptedResult[]): this {
    this.scripts.set(kind, [...(this.scripts.get(kind) ?? []), ...results]);
    return this;
  }

  /** Makes the next calls of `kind` take the given times before they settle. */
  slow(kind: UiActionKind, ...delaysMs: number[]): this {
    this.delays.set(kind, [...(this.delays.get(kind) ?? []), ...delaysMs]);
    return this;
  }

  get actionKinds(): UiActionKind[] {
    return this.actions.map((action) => action.kind);
  }

  async open(): Promise<void> {
    this.openCalls += 1;
    if (this.options.openError) {
      throw this.options.openError;
    }
  }

  async close(): Promise<void> {
    this.closeCalls += 1;
    if (this.options.closeError) {
      throw this.options.closeError;
    }
  }

  async perform(action: UiAction): Promise<ActionResult> {
    this.actions.push(action);
    this.options.onPerform?.(action);
    this.inFlight += 1;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    try {
      const delayMs = this.delays.get(action.kind)?.shift();
      if (delayMs !== undefined) {
        await new Promise((resolve) => setTimeout(resolve, delayMs));
      }
      return this.settle(action);
    } finally {
      this.inFlight -= 1;
    }
  }

  private settle(action: UiAction): ActionResult {
    const next = this.scripts.get(action.kind)?.shift();
    if (next instanceof Error) {
      throw next;
    }
    const names = this.options.downloadNames ?? ["data.csv"];
    const result: ActionResult =
      next ?? (action.kind === "triggerExport" ? { status: "ok", downloads: names.length } : { status: "ok" });

    if (result.status === "ok" && action.kind === "triggerExport") {
      this.writeExport(action.filePrefix);
    }
    return result;
  }

  async listSymbols(_market: Market): Promise<string[]> {
    return this.options.symbols ?? [];
  }

  private writeExport(filePrefix: string): void {
    if (!this.options.stagingDir) {
      return;
    }
    if (this.silentExportsLeft > 0) {
      this.silentExportsLeft -= 1;
      return;
    }
    fs.mkdirSync(this.options.stagingDir, { recursive: true });
    for (const name of this.options.downloadNames ?? ["data.csv"]) {
      fs.writeFileSync(
        path.join(this.options.stagingDir, `${filePrefix}${name}`),
        this.options.content ?? "ts,price,size\n1,100,2\n",
      );
    }
  }
}
