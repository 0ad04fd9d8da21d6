import { AppConfig } from "../config";
import { Logger } from "../observability";
import { PlaywrightUiDriver } from "./playwrightDriver";

export function createDriverFactory(config: AppConfig, logger: Logger): () => PlaywrightUiDriver {
  return () => new PlaywrightUiDriver(config, logger);
}

export * from "./playwrightDriver";
export * from "./types";
