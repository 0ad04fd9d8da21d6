import { ChunkOutcome, RunReport } from "../types";

export interface Sink {
  publishChunkOutcomes(outcomes: ChunkOutcome[]): Promise<void>;
  publishReport(report: RunReport): Promise<void>;
}
