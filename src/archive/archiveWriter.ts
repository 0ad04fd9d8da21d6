import fs from "node:fs";
import path from "node:path";
import zlib from "node:zlib";
import { pipeline } from "node:stream/promises";
import * as unzipper from "unzipper";
import { errorMessage } from "../core/errors";
import { isInProgressName } from "../download/completionWatcher";
import { Logger } from "../observability";
import { RunStore } from "../store";
import { ArchiveEntry, Chunk, DownloadRequest } from "../types";
import { archiveDir, archiveFileName, archiveStem, downloadExtension, isCommittedName, stagingPrefix } from "./naming";

interface ArchiveWriterDeps {
  store: RunStore;
  logger: Logger;
  decompress: boolean;
}

export interface CommitResult {
  status: "archived" | "skipped";
  /** Archived files in order; the first one marks the chunk as done. */
  entries: ArchiveEntry[];
}

// One file headed for the archive, written by `write` to a temporary path.
interface PendingFile {
  source: string;
  ext: string;
  write(tempPath: string): Promise<void>;
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}

async function moveFile(source: string, target: string): Promise<void> {
  try {
    await fs.promises.rename(source, target);
  } catch (error) {
    if (!isErrnoException(error) || error.code !== "EXDEV") {
      throw error;
    }
    await fs.promises.copyFile(source, target);
    await fs.promises.unlink(source);
  }
}

async function removeIfPresent(filePath: string): Promise<void> {
  await fs.promises.rm(filePath, { force: true });
}

function isGzipExtension(ext: string): boolean {
  return ext === "gz" || ext.endsWith(".gz");
}

function withoutGzip(ext: string): string {
  return ext.slice(0, -"gz".length).replace(/\.$/, "") || "bin";
}

/**
 * Commits staged downloads into `<outBase>/<dataset>/`. The final rename is the
 * commit point: once a chunk's file is in place it is never fetched again.
 * With `decompress` set, `.gz` files are gunzipped and `.zip` files are unpacked,
 * gunzipping any `.gz` members. A chunk that yields several files is archived as
 * numbered parts, and part 1 is renamed into place last.
 */
export class ArchiveWriter {
  private readonly deps: ArchiveWriterDeps;

  constructor(deps: ArchiveWriterDeps) {
    this.deps = deps;
  }

  async findExisting(request: DownloadRequest, chunk: Chunk): Promise<ArchiveEntry | undefined> {
    const dir = archiveDir(request);
    const stem = archiveStem(request, chunk);

    let names: string[];
    try {
      names = await fs.promises.readdir(dir);
    } catch (error) {
      if (isErrnoException(error) && error.code === "ENOENT") {
        return undefined;
      }
      throw error;
    }

    const match = names.find((name) => isCommittedName(stem, name) && !isInProgressName(name));
    if (!match) {
      return undefined;
    }

    const filePath = path.join(dir, match);
    const stats = await fs.promises.stat(filePath);
    return this.toEntry(request, chunk, filePath, stats.size, stats.mtime.toISOString());
  }

  async commit(request: DownloadRequest, chunk: Chunk, resolvedPaths: string[]): Promise<CommitResult> {
    if (resolvedPaths.length === 0) {
      throw new Error(`nothing staged for chunk ${chunk.index}`);
    }
    const stagingDir = path.dirname(resolvedPaths[0]);

    const existing = await this.findExisting(request, chunk);
    if (existing) {
      this.deps.logger.info("archive_skip_existing", { chunkIndex: chunk.index, path: existing.path });
      await this.removeStaged(request, chunk, stagingDir);
      return { status: "skipped", entries: [existing] };
    }

    const dir = archiveDir(request);
    await fs.promises.mkdir(dir, { recursive: true });

    const prefix = stagingPrefix(request, chunk);
    const pending: PendingFile[] = [];
    for (const stagedPath of [...resolvedPaths].sort()) {
      const stagedName = path.basename(stagedPath);
      const downloadedName = stagedName.startsWith(prefix) ? stagedName.slice(prefix.length) : stagedName;
      pending.push(...(await this.expand(stagedPath, downloadedName)));
    }

    const stem = archiveStem(request, chunk);
    const targets = pending.map((file, index) => path.join(dir, archiveFileName(stem, file.ext, index, pending.length)));

    try {
      for (const [index, file] of pending.entries()) {
        await file.write(`${targets[index]}.part`);
      }
      for (const target of [...targets].reverse()) {
        await fs.promises.rename(`${target}.part`, target);
      }
    } catch (error) {
      for (const target of targets) {
        await removeIfPresent(`${target}.part`);
      }
      throw error;
    }

    const archivedAt = new Date().toISOString();
    const entries: ArchiveEntry[] = [];
    for (const [index, target] of targets.entries()) {
      const stats = await fs.promises.stat(target);
      const entry = this.toEntry(request, chunk, target, stats.size, archivedAt);
      await this.deps.store.appendArchiveEntry(entry);
      entries.push(entry);
      this.deps.logger.info("archive_committed", {
        chunkIndex: chunk.index,
        path: target,
        source: pending[index].source,
        bytes: stats.size,
      });
    }

    await this.removeStaged(request, chunk, stagingDir);
    return { status: "archived", entries };
  }

  private async expand(stagedPath: string, downloadedName: string): Promise<PendingFile[]> {
    const ext = downloadExtension(downloadedName);
    if (!this.deps.decompress) {
      return [{ source: downloadedName, ext, write: (tempPath) => moveFile(stagedPath, tempPath) }];
    }

    if (ext === "zip") {
      const directory = await unzipper.Open.file(stagedPath);
      const members = directory.files
        .filter((member) => member.type === "File")
        .sort((a, b) => a.path.localeCompare(b.path));
      if (members.length === 0) {
        throw new Error(`zip ${downloadedName} contains no files`);
      }
      return members.map((member) => {
        const memberExt = downloadExtension(path.basename(member.path));
        if (isGzipExtension(memberExt)) {
          return {
            source: `${downloadedName}:${member.path}`,
            ext: withoutGzip(memberExt),
            write: (tempPath: string) => pipeline(member.stream(), zlib.createGunzip(), fs.createWriteStream(tempPath)),
          };
        }
        return {
          source: `${downloadedName}:${member.path}`,
          ext: memberExt,
          write: (tempPath: string) => pipeline(member.stream(), fs.createWriteStream(tempPath)),
        };
      });
    }

    if (isGzipExtension(ext)) {
      return [
        {
          source: downloadedName,
          ext: withoutGzip(ext),
          write: (tempPath) => pipeline(fs.createReadStream(stagedPath), zlib.createGunzip(), fs.createWriteStream(tempPath)),
        },
      ];
    }

    return [{ source: downloadedName, ext, write: (tempPath) => moveFile(stagedPath, tempPath) }];
  }

  /** Drops any other staged copies of the chunk left behind by repeated exports. */
  private async removeStaged(request: DownloadRequest, chunk: Chunk, stagingDir: string): Promise<void> {
    const prefix = stagingPrefix(request, chunk);
    let names: string[];
    try {
      names = await fs.promises.readdir(stagingDir);
    } catch (error) {
      this.deps.logger.warn("staging_cleanup_failed", { chunkIndex: chunk.index, error: errorMessage(error) });
      return;
    }

    for (const name of names.filter((candidate) => candidate.startsWith(prefix))) {
      try {
        await removeIfPresent(path.join(stagingDir, name));
        this.deps.logger.debug("staging_duplicate_removed", { chunkIndex: chunk.index, file: name });
      } catch (error) {
        this.deps.logger.warn("staging_cleanup_failed", { chunkIndex: chunk.index, file: name, error: errorMessage(error) });
      }
    }
  }

  private toEntry(request: DownloadRequest, chunk: Chunk, filePath: string, bytes: number, archivedAt: string): ArchiveEntry {
    return {
      market: request.market,
      dataset: request.dataset,
      symbol: request.symbol,
      rangeStart: chunk.rangeStart,
      rangeEnd: chunk.rangeEnd,
      path: filePath,
      bytes,
      archivedAt,
    };
  }
}
