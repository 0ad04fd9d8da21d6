import path from "node:path";
import { InvalidConfigurationError } from "../core/errors";
import { Chunk, DownloadRequest } from "../types";

type NamingKey = Pick<DownloadRequest, "market" | "dataset" | "symbol">;

const SYMBOL_PATTERN = /^[A-Za-z0-9._-]+$/;

/**
 * Symbols go into file names verbatim, so only characters that need no escaping
 * are accepted. Rewriting others would let two symbols share an archive stem.
 */
export function assertValidSymbol(symbol: string): void {
  if (!SYMBOL_PATTERN.test(symbol)) {
    throw new InvalidConfigurationError(
      `symbol ${JSON.stringify(symbol)} may only contain letters, digits, ".", "_" and "-"`,
    );
  }
}

/** `<market>_<symbol>_<dataset>_<start>_<end>`, identical for every rerun of the same request. */
export function archiveStem(key: NamingKey, chunk: Chunk): string {
  assertValidSymbol(key.symbol);
  return `${key.market}_${key.symbol}_${key.dataset}_${chunk.rangeStart}_${chunk.rangeEnd}`;
}

/**
 * `<stem>.<ext>` when a chunk produced one file; `<stem>.<n>.<ext>` (1-based)
 * when it produced several.
 */
export function archiveFileName(stem: string, ext: string, index: number, total: number): string {
  return total === 1 ? `${stem}.${ext}` : `${stem}.${index + 1}.${ext}`;
}

/**
 * Whether `name` proves the chunk is archived: the single file, or part 1 of a
 * multi-file chunk, which is renamed into place last.
 */
export function isCommittedName(stem: string, name: string): boolean {
  if (!name.startsWith(`${stem}.`)) {
    return false;
  }
  const part = /^(\d+)\./.exec(name.slice(stem.length + 1));
  return !part || part[1] === "1";
}

export function stagingPrefix(key: NamingKey, chunk: Chunk): string {
  return `${archiveStem(key, chunk)}__`;
}

export function archiveDir(request: Pick<DownloadRequest, "outBase" | "dataset">): string {
  return path.resolve(request.outBase, request.dataset);
}

/**
 * Extension of a downloaded file without the leading dot. Compressed CSVs keep
 * both parts (`csv.gz`); a name without extension maps to `bin`.
 */
export function downloadExtension(fileName: string): string {
  const ext = path.extname(fileName);
  if (!ext || ext === ".") {
    return "bin";
  }
  if (ext === ".gz") {
    const inner = path.extname(path.basename(fileName, ext));
    return inner && inner !== "." ? `${inner.slice(1)}.gz` : "gz";
  }
  return ext.slice(1);
}
