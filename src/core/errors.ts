export type ErrorCode =
  | "INVALID_CONFIGURATION"
  | "TRANSIENT_UI_FAILURE"
  | "FATAL_SESSION_FAILURE"
  | "DOWNLOAD_TIMEOUT"
  | "RUN_CANCELLED";

export class HistoryDownloaderError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Bad chunk size, date range or CLI input. Raised before any browser work. */
export class InvalidConfigurationError extends HistoryDownloaderError {
  constructor(message: string) {
    super("INVALID_CONFIGURATION", message);
  }
}

export class TransientUiError extends HistoryDownloaderError {
  constructor(message: string) {
    super("TRANSIENT_UI_FAILURE", message);
  }
}

/** The browser session is unusable; the current chunk stops and the session is recreated. */
export class FatalSessionError extends HistoryDownloaderError {
  constructor(message: string) {
    super("FATAL_SESSION_FAILURE", message);
  }
}

export class DownloadTimeoutError extends HistoryDownloaderError {
  constructor(message: string) {
    super("DOWNLOAD_TIMEOUT", message);
  }
}

export class RunCancelledError extends HistoryDownloaderError {
  constructor(message = "cancelled") {
    super("RUN_CANCELLED", message);
  }
}

export type FailureKind = "transient" | "fatal" | "cancelled";

const FATAL_MESSAGE_PATTERN =
  /(target (page|context|browser)?.*closed|browser has been closed|browser closed|page crashed|crashed|disconnected|session not open)/i;

export function classifyFailure(error: unknown): FailureKind {
  if (error instanceof RunCancelledError) {
    return "cancelled";
  }
  if (error instanceof FatalSessionError) {
    return "fatal";
  }
  if (error instanceof TransientUiError || error instanceof DownloadTimeoutError) {
    return "transient";
  }
  if (error instanceof Error && error.name !== "TimeoutError" && FATAL_MESSAGE_PATTERN.test(error.message)) {
    return "fatal";
  }
  return "transient";
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
