import { InvalidConfigurationError } from "../core/errors";
import { Chunk } from "../types";

/** The platform's date picker rejects ranges of six days or more. */
export const MAX_CHUNK_DAYS = 5;

const DAY_MS = 24 * 60 * 60 * 1000;
const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

export function parseIsoDate(value: string, label: string): number {
  const match = DATE_PATTERN.exec(value);
  if (!match) {
    throw new InvalidConfigurationError(`${label} must be YYYY-MM-DD (got ${JSON.stringify(value)})`);
  }

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const time = Date.UTC(year, month - 1, day);
  const check = new Date(time);
  if (check.getUTCFullYear() !== year || check.getUTCMonth() !== month - 1 || check.getUTCDate() !== day) {
    throw new InvalidConfigurationError(`${label} is not a valid calendar date: ${value}`);
  }
  return time;
}

export function formatIsoDate(time: number): string {
  return new Date(time).toISOString().slice(0, 10);
}

export function assertChunkDays(chunkDays: number): void {
  if (!Number.isInteger(chunkDays) || chunkDays < 1) {
    throw new InvalidConfigurationError(`chunk days must be a positive integer (got ${chunkDays})`);
  }
  if (chunkDays > MAX_CHUNK_DAYS) {
    throw new InvalidConfigurationError(`chunk days must be < ${MAX_CHUNK_DAYS + 1} (got ${chunkDays})`);
  }
}

/**
 * Splits the inclusive range `[startDate, endDate]` into consecutive chunks of at
 * most `chunkDays` calendar days. The same input always yields the same chunks,
 * so a rerun recomputes the indices of an earlier run.
 */
export function splitDateRange(startDate: string, endDate: string, chunkDays: number): Chunk[] {
  assertChunkDays(chunkDays);
  const start = parseIsoDate(startDate, "start date");
  const end = parseIsoDate(endDate, "end date");
  if (start > end) {
    throw new InvalidConfigurationError(`start date ${startDate} is after end date ${endDate}`);
  }

  const chunks: Chunk[] = [];
  for (let cursor = start; cursor <= end; ) {
    const chunkEnd = Math.min(cursor + (chunkDays - 1) * DAY_MS, end);
    chunks.push(
      Object.freeze({
        index: chunks.length,
        rangeStart: formatIsoDate(cursor),
        rangeEnd: formatIsoDate(chunkEnd),
      }),
    );
    cursor = chunkEnd + DAY_MS;
  }
  return chunks;
}

export function spanInDays(chunk: Chunk): number {
  return (parseIsoDate(chunk.rangeEnd, "range end") - parseIsoDate(chunk.rangeStart, "range start")) / DAY_MS + 1;
}
