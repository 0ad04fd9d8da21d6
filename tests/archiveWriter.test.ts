import fs from "node:fs";
import path from "node:path";
import zlib from "node:zlib";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ArchiveWriter } from "../src/archive/archiveWriter";
import {
  archiveDir,
  archiveFileName,
  archiveStem,
  assertValidSymbol,
  downloadExtension,
  isCommittedName,
  stagingPrefix,
} from "../src/archive/naming";
import { InvalidConfigurationError } from "../src/core/errors";
import { InMemoryStore } from "../src/store";
import { Chunk, DownloadRequest } from "../src/types";
import { makeTempDir, quietLogger, removeDir, testRequest } from "./helpers/fixtures";

const CHUNK: Chunk = { index: 0, rangeStart: "2024-01-01", rangeEnd: "2024-01-05" };
const STEM = "spot_BTCUSDT_trades_2024-01-01_2024-01-05";
const FIXTURES = path.join(__dirname, "fixtures");

describe("archive naming", () => {
  it("accepts only symbols that are safe in file names", () => {
    expect(() => assertValidSymbol("1000PEPE-PERP.v2")).not.toThrow();
    expect(() => assertValidSymbol("BTC_USDT")).not.toThrow();
    expect(() => assertValidSymbol("BTC/USDT")).toThrow(InvalidConfigurationError);
    expect(() => assertValidSymbol("ETH USDT")).toThrow(InvalidConfigurationError);
    expect(() => assertValidSymbol("")).toThrow(InvalidConfigurationError);
  });

  it("never gives two symbols the same stem", () => {
    const key = { market: "spot" as const, dataset: "trades" as const };
    expect(archiveStem({ ...key, symbol: "BTC_USDT" }, CHUNK)).toBe("spot_BTC_USDT_trades_2024-01-01_2024-01-05");
    expect(() => archiveStem({ ...key, symbol: "BTC/USDT" }, CHUNK)).toThrow(InvalidConfigurationError);
  });

  it("builds the stem and staging prefix", () => {
    const key = { market: "contract" as const, dataset: "l2book" as const, symbol: "ETHUSDT" };
    expect(archiveStem(key, CHUNK)).toBe("contract_ETHUSDT_l2book_2024-01-01_2024-01-05");
    expect(stagingPrefix(key, CHUNK)).toBe("contract_ETHUSDT_l2book_2024-01-01_2024-01-05__");
  });

  it("numbers the files of a multi-file chunk", () => {
    expect(archiveFileName(STEM, "csv", 0, 1)).toBe(`${STEM}.csv`);
    expect(archiveFileName(STEM, "csv", 0, 2)).toBe(`${STEM}.1.csv`);
    expect(archiveFileName(STEM, "data", 1, 2)).toBe(`${STEM}.2.data`);
  });

  it("treats only the single file or part 1 as proof of a commit", () => {
    expect(isCommittedName(STEM, `${STEM}.csv`)).toBe(true);
    expect(isCommittedName(STEM, `${STEM}.1.csv`)).toBe(true);
    expect(isCommittedName(STEM, `${STEM}.2.csv`)).toBe(false);
    expect(isCommittedName(STEM, `${STEM}_extra.csv`)).toBe(false);
  });

  it("derives the extension from the downloaded name", () => {
    expect(downloadExtension("BTCUSDT2024-01-01.csv.gz")).toBe("csv.gz");
    expect(downloadExtension("BTCUSDT-2024-01-01.zip")).toBe("zip");
    expect(downloadExtension("archive.gz")).toBe("gz");
    expect(downloadExtension("export")).toBe("bin");
  });
});

describe("ArchiveWriter", () => {
  let root: string;
  let stagingDir: string;
  let request: DownloadRequest;
  let store: InMemoryStore;

  function stage(name: string, content: string | Buffer): string {
    fs.mkdirSync(stagingDir, { recursive: true });
    const filePath = path.join(stagingDir, `${stagingPrefix(request, CHUNK)}${name}`);
    fs.writeFileSync(filePath, content);
    return filePath;
  }

  function writer(decompress = false): ArchiveWriter {
    return new ArchiveWriter({ store, logger: quietLogger(), decompress });
  }

  beforeEach(() => {
    root = makeTempDir("archive");
    stagingDir = path.join(root, "staging");
    request = testRequest(root);
    store = new InMemoryStore();
  });

  afterEach(() => {
    removeDir(root);
  });

  it("moves the staged file to its canonical name", async () => {
    const staged = stage("BTCUSDT2024-01-01.csv.gz", "abc");

    const result = await writer().commit(request, CHUNK, [staged]);

    const target = path.join(root, "out", "trades", "spot_BTCUSDT_trades_2024-01-01_2024-01-05.csv.gz");
    expect(result.status).toBe("archived");
    expect(result.entries).toHaveLength(1);
    expect(result.entries[0]).toMatchObject({
      market: "spot",
      dataset: "trades",
      symbol: "BTCUSDT",
      rangeStart: "2024-01-01",
      rangeEnd: "2024-01-05",
      path: target,
      bytes: 3,
    });
    expect(fs.readFileSync(target, "utf-8")).toBe("abc");
    expect(fs.existsSync(staged)).toBe(false);
    expect(fs.existsSync(`${target}.part`)).toBe(false);
    expect(await store.listArchiveEntries()).toHaveLength(1);
  });

  it("gunzips compressed downloads when asked to", async () => {
    const csv = "ts,price,size\n1,100,2\n";
    const staged = stage("BTCUSDT2024-01-01.csv.gz", zlib.gzipSync(csv));

    const result = await writer(true).commit(request, CHUNK, [staged]);

    const target = path.join(archiveDir(request), "spot_BTCUSDT_trades_2024-01-01_2024-01-05.csv");
    expect(result.entries.map((entry) => entry.path)).toEqual([target]);
    expect(result.entries[0].bytes).toBe(Buffer.byteLength(csv));
    expect(fs.readFileSync(target, "utf-8")).toBe(csv);
    expect(fs.existsSync(staged)).toBe(false);
  });

  it("keeps plain files untouched when decompressing", async () => {
    const staged = stage("BTCUSDT-2024-01-01.csv", "ts,price\n");

    const result = await writer(true).commit(request, CHUNK, [staged]);

    expect(path.basename(result.entries[0].path)).toBe(`${STEM}.csv`);
    expect(fs.readFileSync(result.entries[0].path, "utf-8")).toBe("ts,price\n");
  });

  it("archives a zip as-is when not decompressing", async () => {
    const staged = stage("BTCUSDT-2024-01-01.zip", fs.readFileSync(path.join(FIXTURES, "orderbook-single.zip")));

    const result = await writer().commit(request, CHUNK, [staged]);

    expect(path.basename(result.entries[0].path)).toBe(`${STEM}.zip`);
  });

  it("unpacks a zip and gunzips its member", async () => {
    const staged = stage("BTCUSDT-ob500.zip", fs.readFileSync(path.join(FIXTURES, "orderbook-single.zip")));

    const result = await writer(true).commit(request, CHUNK, [staged]);

    const target = path.join(archiveDir(request), `${STEM}.data`);
    expect(result.entries.map((entry) => entry.path)).toEqual([target]);
    expect(fs.readFileSync(target, "utf-8")).toBe('{"ts":1,"b":[["100","2"]]}\n');
    expect(fs.existsSync(staged)).toBe(false);
    expect(fs.readdirSync(archiveDir(request))).toEqual([`${STEM}.data`]);
  });

  it("archives every member of a multi-file zip as numbered parts", async () => {
    const staged = stage("BTCUSDT-ob500.zip", fs.readFileSync(path.join(FIXTURES, "orderbook-days.zip")));

    const result = await writer(true).commit(request, CHUNK, [staged]);

    const dir = archiveDir(request);
    expect(result.entries.map((entry) => path.basename(entry.path))).toEqual([
      `${STEM}.1.data`,
      `${STEM}.2.data`,
      `${STEM}.3.txt`,
    ]);
    expect(fs.readFileSync(path.join(dir, `${STEM}.1.data`), "utf-8")).toBe("day1\n");
    expect(fs.readFileSync(path.join(dir, `${STEM}.2.data`), "utf-8")).toBe("day2\n");
    expect(fs.readFileSync(path.join(dir, `${STEM}.3.txt`), "utf-8")).toBe("notes\n");
    expect(await store.listArchiveEntries()).toHaveLength(3);
    expect((await writer().findExisting(request, CHUNK))?.path).toBe(path.join(dir, `${STEM}.1.data`));
  });

  it("archives several downloads of one export as numbered parts", async () => {
    const first = stage("BTCUSDT-2024-01-01.csv", "day1\n");
    const second = stage("BTCUSDT-2024-01-02.csv", "day2\n");

    const result = await writer().commit(request, CHUNK, [second, first]);

    expect(result.entries.map((entry) => path.basename(entry.path))).toEqual([`${STEM}.1.csv`, `${STEM}.2.csv`]);
    expect(fs.readFileSync(result.entries[0].path, "utf-8")).toBe("day1\n");
    expect(fs.existsSync(first)).toBe(false);
    expect(fs.existsSync(second)).toBe(false);
  });

  it("fails on an unreadable zip and leaves nothing behind", async () => {
    const staged = stage("empty.zip", "not a zip archive");

    await expect(writer(true).commit(request, CHUNK, [staged])).rejects.toThrow();
    expect(fs.existsSync(archiveDir(request)) ? fs.readdirSync(archiveDir(request)) : []).toEqual([]);
  });

  it("skips a chunk that is already archived", async () => {
    const existing = path.join(archiveDir(request), "spot_BTCUSDT_trades_2024-01-01_2024-01-05.csv");
    fs.mkdirSync(path.dirname(existing), { recursive: true });
    fs.writeFileSync(existing, "kept");
    const staged = stage("BTCUSDT2024-01-01.csv.gz", "new");

    const result = await writer().commit(request, CHUNK, [staged]);

    expect(result.status).toBe("skipped");
    expect(result.entries.map((entry) => entry.path)).toEqual([existing]);
    expect(fs.readFileSync(existing, "utf-8")).toBe("kept");
    expect(fs.existsSync(staged)).toBe(false);
    expect(await store.listArchiveEntries()).toHaveLength(0);
  });

  it("removes other staged copies of the same chunk", async () => {
    const older = stage("BTCUSDT2024-01-01.csv.gz", "first");
    const newer = stage("BTCUSDT2024-01-01 (1).csv.gz", "second");
    const unrelated = path.join(stagingDir, "spot_BTCUSDT_trades_2024-01-06_2024-01-10__x.csv.gz");
    fs.writeFileSync(unrelated, "other chunk");

    await writer().commit(request, CHUNK, [newer]);

    expect(fs.existsSync(older)).toBe(false);
    expect(fs.existsSync(newer)).toBe(false);
    expect(fs.existsSync(unrelated)).toBe(true);
  });

  it("ignores partial files when looking for an existing archive", async () => {
    const dir = archiveDir(request);
    fs.mkdirSync(dir, { recursive: true });
    fs.writeFileSync(path.join(dir, `${archiveStem(request, CHUNK)}.csv.part`), "half");

    expect(await writer().findExisting(request, CHUNK)).toBeUndefined();

    fs.writeFileSync(path.join(dir, `${archiveStem(request, CHUNK)}.csv`), "full");
    const found = await writer().findExisting(request, CHUNK);
    expect(found?.bytes).toBe(4);
  });

  it("does not count a stray later part as an archived chunk", async () => {
    const dir = archiveDir(request);
    fs.mkdirSync(dir, { recursive: true });
    fs.writeFileSync(path.join(dir, `${STEM}.2.csv`), "second part");

    expect(await writer().findExisting(request, CHUNK)).toBeUndefined();
  });
});
