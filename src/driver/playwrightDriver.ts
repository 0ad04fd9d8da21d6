import fs from "node:fs";
import path from "node:path";
import { chromium, errors, firefox, webkit } from "playwright-core";
import type { Browser, BrowserContext, BrowserType, Download, Locator, Page } from "playwright-core";
import { AppConfig, BrowserName } from "../config";
import { classifyFailure, errorMessage, TransientUiError } from "../core/errors";
import { Logger } from "../observability";
import { Dataset, Market } from "../types";
import { ActionResult, SymbolLister, UiAction, UiDriver } from "./types";

const MARKET_LABELS: Record<Market, string> = {
  spot: "Spot",
  contract: "Contract",
};

const DATASET_PANELS: Record<Dataset, string> = {
  trades: "Public Trading History",
  l2book: "OrderBook",
};

// Position of the market button among all elements carrying the market label,
// once the dataset panel is hovered open.
const MARKET_BUTTON_INDEX: Record<Dataset, Record<Market, number>> = {
  trades: { contract: 1, spot: 3 },
  l2book: { contract: 4, spot: 4 },
};

const SELECT_DROPDOWN = ".ant-select-dropdown:not(.ant-select-dropdown-hidden)";
const VIRTUAL_LIST_HOLDER = ".rc-virtual-list-holder";
const OPTION_CONTENT = ".ant-select-item-option-content";
const NO_DATA_PROBE_MS = 4_000;
const MAX_SCROLL_STEPS = 2_000;
const DOWNLOAD_POLL_MS = 100;

function browserTypeFor(name: BrowserName): BrowserType {
  switch (name) {
    case "chromium":
      return chromium;
    case "firefox":
      return firefox;
    case "webkit":
      return webkit;
  }
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

export class PlaywrightUiDriver implements UiDriver, SymbolLister {
  private readonly config: AppConfig;
  private readonly logger: Logger;
  private browser?: Browser;
  private context?: BrowserContext;
  private page?: Page;
  private market?: Market;
  private readonly pendingSaves = new Set<Promise<void>>();

  constructor(config: AppConfig, logger: Logger) {
    this.config = config;
    this.logger = logger;
  }

  async open(): Promise<void> {
    this.browser = await browserTypeFor(this.config.browser).launch({ headless: this.config.headless });
    this.context = await this.browser.newContext({ acceptDownloads: true });
    this.page = await this.context.newPage();
    this.page.setDefaultTimeout(this.config.actionTimeoutMs);
    this.logger.info("browser_opened", { browser: this.config.browser, headless: this.config.headless });
  }

  async close(): Promise<void> {
    await Promise.allSettled([...this.pendingSaves]);
    const context = this.context;
    const browser = this.browser;
    this.page = undefined;
    this.context = undefined;
    this.browser = undefined;
    try {
      await context?.close();
    } finally {
      await browser?.close();
    }
    this.logger.info("browser_closed");
  }

  async perform(action: UiAction): Promise<ActionResult> {
    const page = this.page;
    if (!page) {
      return { status: "fatal", reason: "session not open" };
    }

    try {
      switch (action.kind) {
        case "selectMarket":
          return await this.selectMarket(page, action.market);
        case "selectDataset":
          return await this.selectDataset(page, action.dataset);
        case "selectSymbol":
          return await this.selectSymbol(page, action.symbol);
        case "setDateRange":
          return await this.setDateRange(page, action.start, action.end);
        case "triggerExport":
          return await this.triggerExport(page, action.filePrefix);
      }
    } catch (error) {
      if (error instanceof errors.TimeoutError) {
        return { status: "transient", reason: error.message };
      }
      const kind = classifyFailure(error);
      return { status: kind === "fatal" ? "fatal" : "transient", reason: errorMessage(error) };
    }
  }

  async listSymbols(market: Market): Promise<string[]> {
    const page = this.page;
    if (!page) {
      throw new Error("session not open");
    }

    await this.gotoHistoryPage(page);
    await this.hover(page, DATASET_PANELS.trades);
    const marketButtons = page.locator(".history-data__item-btn", { hasText: MARKET_LABELS[market] });
    await this.clickFirstVisible(marketButtons);

    const selectRoot = page.locator(".ant-select").first();
    await selectRoot.waitFor({ state: "visible" });
    await selectRoot.click();
    const dropdown = page.locator(SELECT_DROPDOWN).first();
    await dropdown.locator(OPTION_CONTENT).first().waitFor({ state: "visible" });
    await dropdown.hover();

    return this.collectOptions(page, dropdown);
  }

  private async selectMarket(page: Page, market: Market): Promise<ActionResult> {
    await this.gotoHistoryPage(page);
    this.market = market;
    return { status: "ok" };
  }

  private async selectDataset(page: Page, dataset: Dataset): Promise<ActionResult> {
    const market = this.market;
    if (!market) {
      return { status: "transient", reason: "market not selected" };
    }

    await this.hover(page, DATASET_PANELS[dataset]);
    const button = page.getByText(MARKET_LABELS[market]).nth(MARKET_BUTTON_INDEX[dataset][market]);
    if (!(await button.isVisible())) {
      return { status: "transient", reason: `${MARKET_LABELS[market]} button not visible yet` };
    }
    await button.click();
    return { status: "ok" };
  }

  private async selectSymbol(page: Page, symbol: string): Promise<ActionResult> {
    const selector = page.locator(".ant-select-selection-overflow");
    await selector.waitFor({ state: "visible" });
    await selector.click();
    await page.locator("#rc_select_0").fill(symbol);

    const dropdown = page.locator(SELECT_DROPDOWN);
    await dropdown.waitFor({ state: "visible" });
    const holder = dropdown.locator(VIRTUAL_LIST_HOLDER);
    const option = dropdown
      .locator(OPTION_CONTENT)
      .filter({ hasText: new RegExp(`^${escapeRegExp(symbol)}$`) })
      .first();

    const scrollDeadline = Date.now() + this.config.actionTimeoutMs;
    let lastScrollTop: number | undefined;
    for (let step = 0; step < MAX_SCROLL_STEPS && Date.now() < scrollDeadline; step += 1) {
      if (await option.isVisible()) {
        await option.scrollIntoViewIfNeeded();
        await option.click();
        return { status: "ok" };
      }

      const scrollTop = await holder.evaluate((el) => el.scrollTop);
      if (lastScrollTop !== undefined && Math.abs(scrollTop - lastScrollTop) < 1) {
        return { status: "transient", reason: `symbol ${symbol} not found in selector` };
      }
      lastScrollTop = scrollTop;
      await holder.evaluate((el) => {
        el.scrollTop += 60;
      });
      await page.waitForTimeout(40);
    }
    return { status: "transient", reason: `symbol ${symbol} not reached in selector` };
  }

  private async setDateRange(page: Page, start: string, end: string): Promise<ActionResult> {
    await page.locator(".ant-select-selector > .ant-select-selection-item").click();
    await page.locator(".ant-select-dropdown:visible").getByText("Everyday", { exact: true }).click();

    const startInput = page.getByRole("textbox", { name: "Start date" });
    await startInput.click();
    await startInput.fill(start);
    await startInput.press("Enter");

    const endInput = page.getByRole("textbox", { name: "End date" });
    await endInput.click();
    await endInput.fill(end);
    await endInput.press("Enter");

    await page.getByText("Confirm").click();

    try {
      await page.getByText("Detail", { exact: true }).first().waitFor({ state: "visible", timeout: NO_DATA_PROBE_MS });
    } catch (error) {
      if (error instanceof errors.TimeoutError) {
        return { status: "no_data", reason: `no data listed for ${start} to ${end}` };
      }
      throw error;
    }
    return { status: "ok" };
  }

  /**
   * One click may fire several downloads. Everything that arrives until the page
   * has been quiet for `downloadCollectWindowMs` belongs to this export; each file
   * is saved as `<filePrefix><suggested name>`.
   */
  private async triggerExport(page: Page, filePrefix: string): Promise<ActionResult> {
    const button = page.getByText("Download", { exact: true });
    await button.waitFor({ state: "visible" });
    await button.scrollIntoViewIfNeeded();

    const downloads: Download[] = [];
    const onDownload = (download: Download): void => {
      downloads.push(download);
    };
    page.on("download", onDownload);
    try {
      await Promise.all([page.waitForEvent("download", { timeout: this.config.exportTimeoutMs }), button.click()]);

      let seen = downloads.length;
      let quietMs = 0;
      while (quietMs < this.config.downloadCollectWindowMs) {
        await page.waitForTimeout(DOWNLOAD_POLL_MS);
        if (downloads.length === seen) {
          quietMs += DOWNLOAD_POLL_MS;
        } else {
          seen = downloads.length;
          quietMs = 0;
        }
      }
    } finally {
      page.off("download", onDownload);
    }

    const stagingDir = path.resolve(this.config.stagingDir);
    fs.mkdirSync(stagingDir, { recursive: true });
    const usedNames = new Set<string>();
    downloads.forEach((download, index) => {
      let name = `${filePrefix}${download.suggestedFilename()}`;
      if (usedNames.has(name)) {
        name = `${filePrefix}${index + 1}_${download.suggestedFilename()}`;
      }
      usedNames.add(name);
      this.trackSave(download, path.join(stagingDir, name));
    });

    if (downloads.length > 1) {
      this.logger.info("export_multiple_downloads", { filePrefix, downloads: downloads.length });
    }
    return { status: "ok", downloads: downloads.length };
  }

  private trackSave(download: Download, target: string): void {
    const save: Promise<void> = download
      .saveAs(target)
      .then(
        () => {
          this.logger.debug("download_saved", { path: target });
        },
        (error: unknown) => {
          this.logger.warn("download_save_failed", { path: target, error: errorMessage(error) });
        },
      )
      .finally(() => {
        this.pendingSaves.delete(save);
      });
    this.pendingSaves.add(save);
  }

  private async gotoHistoryPage(page: Page): Promise<void> {
    await page.goto(this.config.baseUrl, {
      timeout: this.config.navigationTimeoutMs,
      waitUntil: "domcontentloaded",
    });
    await page.waitForLoadState("networkidle", { timeout: this.config.navigationTimeoutMs });
  }

  private async hover(page: Page, text: string): Promise<void> {
    const box = await page.getByText(text, { exact: true }).first().boundingBox();
    if (box) {
      await page.mouse.move(box.x + box.width / 2, box.y + box.height / 2);
    }
    await page.waitForTimeout(400);
  }

  private async clickFirstVisible(candidates: Locator): Promise<void> {
    const count = await candidates.count();
    for (let index = 0; index < count; index += 1) {
      const candidate = candidates.nth(index);
      if (await candidate.isVisible()) {
        await candidate.click();
        return;
      }
    }
    throw new TransientUiError("no visible market button");
  }

  private async collectOptions(page: Page, dropdown: Locator): Promise<string[]> {
    const holder = dropdown.locator(VIRTUAL_LIST_HOLDER).first();
    const scroller = (await holder.count()) > 0 ? holder : dropdown;
    const seen = new Set<string>();
    const collectVisible = async (): Promise<void> => {
      for (const text of await dropdown.locator(OPTION_CONTENT).allTextContents()) {
        const trimmed = text.trim();
        if (trimmed) {
          seen.add(trimmed);
        }
      }
    };

    for (let step = 0; step < MAX_SCROLL_STEPS; step += 1) {
      await collectVisible();

      const [beforeTop, scrollHeight, clientHeight] = await scroller.evaluate((el) => [
        el.scrollTop,
        el.scrollHeight,
        el.clientHeight,
      ]);
      await scroller.evaluate((el) => {
        el.scrollTop = el.scrollTop + el.clientHeight * 0.9;
      });
      await page.waitForTimeout(10);
      const afterTop = await scroller.evaluate((el) => el.scrollTop);

      if (afterTop >= scrollHeight - clientHeight - 2 || afterTop <= beforeTop) {
        await collectVisible();
        break;
      }
    }

    return [...seen].sort();
  }
}
