import fs from "node:fs";
import path from "node:path";
import { DownloadTimeoutError } from "../core/errors";
import { sleep, throwIfCancelled } from "../core/timing";
import { Logger } from "../observability";

export interface StagingEntry {
  name: string;
  size: number;
  mtimeMs: number;
}

export interface StagingReader {
  list(dir: string): Promise<StagingEntry[]>;
}

export interface WaitForFileOptions {
  dir: string;
  prefix: string;
  /** How many files one export produced; the newest `count` candidates are awaited. */
  count?: number;
  timeoutMs: number;
  pollIntervalMs: number;
  /** Files last modified before this instant belong to an earlier run and are ignored. */
  notBeforeMs?: number;
  signal?: AbortSignal;
}

const IN_PROGRESS_SUFFIXES = [".part", ".crdownload", ".tmp"];

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}

export const nodeStagingReader: StagingReader = {
  async list(dir: string): Promise<StagingEntry[]> {
    let dirents: fs.Dirent[];
    try {
      dirents = await fs.promises.readdir(dir, { withFileTypes: true });
    } catch (error) {
      if (isErrnoException(error) && error.code === "ENOENT") {
        return [];
      }
      throw error;
    }

    const entries: StagingEntry[] = [];
    for (const dirent of dirents) {
      if (!dirent.isFile()) {
        continue;
      }
      try {
        const stats = await fs.promises.stat(path.join(dir, dirent.name));
        entries.push({ name: dirent.name, size: stats.size, mtimeMs: stats.mtimeMs });
      } catch (error) {
        // removed between readdir and stat
        if (!isErrnoException(error) || error.code !== "ENOENT") {
          throw error;
        }
      }
    }
    return entries;
  },
};

export function isInProgressName(name: string): boolean {
  return IN_PROGRESS_SUFFIXES.some((suffix) => name.endsWith(suffix));
}

export function pickLatestCandidates(
  entries: StagingEntry[],
  prefix: string,
  count: number,
  notBeforeMs = 0,
): StagingEntry[] {
  return entries
    .filter((entry) => entry.name.startsWith(prefix) && !isInProgressName(entry.name) && entry.mtimeMs >= notBeforeMs)
    .sort((a, b) => b.mtimeMs - a.mtimeMs || a.name.localeCompare(b.name))
    .slice(0, count);
}

export function pickLatestCandidate(
  entries: StagingEntry[],
  prefix: string,
  notBeforeMs = 0,
): StagingEntry | undefined {
  return pickLatestCandidates(entries, prefix, 1, notBeforeMs)[0];
}

function sameSnapshot(current: StagingEntry[], previous: StagingEntry[]): boolean {
  return (
    current.length === previous.length &&
    current.every((entry, index) => entry.name === previous[index].name && entry.size === previous[index].size)
  );
}

/**
 * Polls a staging directory until an export for one chunk has landed. A file only
 * counts once the same candidate reports the same non-zero size on two polls in a
 * row; duplicated exports are resolved by taking the most recently modified one.
 * An export that produced several files resolves once the newest `count`
 * candidates are all stable, and returns them sorted by name.
 */
export class CompletionWatcher {
  private readonly reader: StagingReader;
  private readonly logger?: Logger;

  constructor(reader: StagingReader = nodeStagingReader, logger?: Logger) {
    this.reader = reader;
    this.logger = logger;
  }

  async waitForFile(options: WaitForFileOptions): Promise<string> {
    const [resolved] = await this.waitForFiles({ ...options, count: 1 });
    return resolved;
  }

  async waitForFiles(options: WaitForFileOptions): Promise<string[]> {
    const count = options.count ?? 1;
    const deadline = Date.now() + options.timeoutMs;
    let previous: StagingEntry[] = [];
    let polls = 0;

    while (true) {
      throwIfCancelled(options.signal);
      polls += 1;
      const candidates = pickLatestCandidates(
        await this.reader.list(options.dir),
        options.prefix,
        count,
        options.notBeforeMs,
      ).sort((a, b) => a.name.localeCompare(b.name));

      if (
        candidates.length === count &&
        candidates.every((candidate) => candidate.size > 0) &&
        sameSnapshot(candidates, previous)
      ) {
        this.logger?.debug("staging_files_stable", {
          files: candidates.map((candidate) => candidate.name),
          bytes: candidates.reduce((total, candidate) => total + candidate.size, 0),
          polls,
        });
        return candidates.map((candidate) => path.join(options.dir, candidate.name));
      }
      previous = candidates;

      if (Date.now() >= deadline) {
        const wanted = count === 1 ? "stable file" : `${count} stable files`;
        throw new DownloadTimeoutError(
          `no ${wanted} with prefix ${options.prefix} in ${options.dir} after ${options.timeoutMs}ms`,
        );
      }
      await sleep(options.pollIntervalMs, options.signal);
    }
  }
}
