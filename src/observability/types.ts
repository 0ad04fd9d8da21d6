export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogFields {
  chunkIndex?: number;
  state?: string;
  attempt?: number;
  sessionId?: number;
  [key: string]: unknown;
}

export type MetricCounterName =
  | "chunks_planned"
  | "chunks_completed"
  | "chunks_skipped"
  | "chunks_failed"
  | "ui_action_retries"
  | "downloads_timed_out"
  | "sessions_opened"
  | "session_restarts";

export type MetricTimerName = "chunk_ms" | "ui_action_ms" | "file_wait_ms";
