import fs from "node:fs";
import path from "node:path";
import { ChunkOutcome, RunReport } from "../types";
import { Sink } from "./types";

export class LocalJsonlSink implements Sink {
  private readonly chunksPath: string;
  private readonly reportsPath: string;
  private readonly runId: string;

  constructor(manifestsDir: string, runId: string) {
    const absoluteDir = path.resolve(manifestsDir);
    fs.mkdirSync(absoluteDir, { recursive: true });
    this.chunksPath = path.join(absoluteDir, "chunks.jsonl");
    this.reportsPath = path.join(absoluteDir, "reports.jsonl");
    this.runId = runId;
  }

  async publishChunkOutcomes(outcomes: ChunkOutcome[]): Promise<void> {
    await this.appendLines(
      this.chunksPath,
      outcomes.map((outcome) => ({
        runId: this.runId,
        ...outcome,
      })),
    );
  }

  async publishReport(report: RunReport): Promise<void> {
    // outcomes already went to chunks.jsonl one by one
    const { outcomes: _outcomes, ...summary } = report;
    await this.appendLines(this.reportsPath, [summary]);
  }

  private async appendLines(filePath: string, records: unknown[]): Promise<void> {
    if (records.length === 0) {
      return;
    }

    const content = records.map((record) => JSON.stringify(record)).join("\n") + "\n";
    await fs.promises.appendFile(filePath, content, "utf-8");
  }
}
