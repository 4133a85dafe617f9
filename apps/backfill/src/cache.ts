// apps/backfill/src/cache.ts
import fs from "node:fs/promises";
import path from "node:path";
import { parse } from "csv-parse/sync";
import { stringify } from "csv-stringify/sync";
import { z } from "zod";
import { CacheFormatError, EmptyHistory } from "./errors.js";
import type { KlineTransport } from "./exchange/http.js";
import { DEFAULT_INTERVAL, fetchCandles } from "./fetcher.js";
import { log } from "./logger.js";
import { fmtUtc, fmtUtcDay, parseDateToMs } from "./time.js";
import type { Candle, FetchError, FetchOptions, FetchRequest } from "./types.js";

const REQUIRED = ["timestamp", "open", "high", "low", "close"] as const;
type Column = (typeof REQUIRED)[number];

const ALIASES = new Map<string, Column>([
  ["timestamp", "timestamp"],
  ["time", "timestamp"],
  ["datetime", "timestamp"],
  ["date", "timestamp"],
  ["open", "open"],
  ["open_", "open"],
  ["high", "high"],
  ["high_", "high"],
  ["low", "low"],
  ["low_", "low"],
  ["close", "close"],
  ["close_", "close"]
]);

const DECIMAL_RE = /^-?\d+(\.\d+)?([eE][-+]?\d+)?$/;

const CsvRowsSchema = z.array(z.array(z.string()));

export function cacheFilePath(
  dir: string,
  symbol: string,
  interval: string,
  startMs: number,
  endMs: number
): string {
  const name = `${symbol.toUpperCase()}_${interval}_${fmtUtcDay(startMs)}_to_${fmtUtcDay(endMs - 1)}.csv`;
  return path.join(dir, name);
}

export async function writeCandleCsv(file: string, candles: readonly Candle[]): Promise<void> {
  await fs.mkdir(path.dirname(file), { recursive: true });
  const csv = stringify(
    candles.map((c) => ({
      timestamp: c.openTimeMs,
      open: c.open,
      high: c.high,
      low: c.low,
      close: c.close,
      datetime_utc: fmtUtc(c.openTimeMs)
    })),
    { header: true, bom: true, columns: [...REQUIRED, "datetime_utc"] }
  );
  await fs.writeFile(file, csv, "utf8");
}

/**
 * How numeric timestamps are read: "ms" as written by writeCandleCsv,
 * "auto" as seconds when their median is below 1e12.
 */
export type TimestampUnit = "ms" | "auto";

/**
 * Reads a candle CSV written by writeCandleCsv or by another tool.
 * Header names are matched loosely (Time, DATE, open_, ...).
 * Rows with an unreadable time or price are skipped.
 */
export async function readCandleCsv(
  file: string,
  opts: { timestampUnit?: TimestampUnit } = {}
): Promise<Candle[]> {
  const raw = await fs.readFile(file, "utf8");
  const rows = CsvRowsSchema.parse(
    parse(raw, { bom: true, skip_empty_lines: true, trim: true, relax_column_count: true })
  );
  if (rows.length === 0) throw new CacheFormatError(file, [...REQUIRED]);

  const index = new Map<Column, number>();
  rows[0].forEach((h, i) => {
    const col = ALIASES.get(h.toLowerCase());
    if (col && !index.has(col)) index.set(col, i);
  });
  const missing = REQUIRED.filter((c) => !index.has(c));
  if (missing.length > 0) throw new CacheFormatError(file, missing);

  const cell = (row: string[], col: Column) => row[index.get(col) ?? -1] ?? "";
  const body = rows.slice(1);

  const toMs = timestampReader(body.map((r) => cell(r, "timestamp")), opts.timestampUnit ?? "auto");

  const out: Candle[] = [];
  for (const r of body) {
    const openTimeMs = toMs(cell(r, "timestamp"));
    if (!Number.isFinite(openTimeMs)) continue;
    const [open, high, low, close] = [cell(r, "open"), cell(r, "high"), cell(r, "low"), cell(r, "close")];
    if (![open, high, low, close].every((v) => DECIMAL_RE.test(v))) continue;
    out.push(Object.freeze({ openTimeMs, open, high, low, close }));
  }
  return out.sort((a, b) => a.openTimeMs - b.openTimeMs);
}

function timestampReader(values: string[], unit: TimestampUnit): (v: string) => number {
  const nums = values.filter((v) => v !== "").map(Number);
  const numeric = nums.length > 0 && nums.every(Number.isFinite);
  if (!numeric) return (v) => parseDateToMs(v);
  if (unit === "ms") return (v) => (v === "" ? Number.NaN : Number(v));

  const sorted = [...nums].sort((a, b) => a - b);
  const mid = sorted.length >> 1;
  const median = sorted.length % 2 ? sorted[mid] : (sorted[mid - 1] + sorted[mid]) / 2;
  const scale = median > 1e12 ? 1 : 1000;
  return (v) => (v === "" ? Number.NaN : Math.round(Number(v) * scale));
}

export type CachedFetchOptions = FetchOptions & {
  cacheDir: string;
  useCache?: boolean;
};

export type CachedFetchResult =
  | { ok: true; candles: Candle[]; source: "cache" | "network"; file: string }
  | { ok: false; error: FetchError | EmptyHistory };

async function exists(file: string): Promise<boolean> {
  try {
    await fs.access(file);
    return true;
  } catch {
    return false;
  }
}

/**
 * Serves the range from the CSV cache when present, else fetches and stores it.
 * Cache files are named by UTC day, so a hit is cut down to [startMs, endMs).
 * A hit with nothing inside the window is treated as a miss.
 */
export async function fetchCandlesCached(
  transport: KlineTransport,
  req: FetchRequest,
  opts: CachedFetchOptions
): Promise<CachedFetchResult> {
  const { cacheDir, useCache = true, ...fetchOpts } = opts;
  const logger = opts.logger ?? log;
  const interval = req.interval ?? DEFAULT_INTERVAL;
  const file = cacheFilePath(cacheDir, req.symbol, interval, req.startMs, req.endMs);

  if (useCache && (await exists(file))) {
    const cached = await readCandleCsv(file, { timestampUnit: "ms" });
    const candles = cached.filter((c) => c.openTimeMs >= req.startMs && c.openTimeMs < req.endMs);
    if (candles.length > 0) {
      logger.info(`[cache] hit ${file} (${candles.length}/${cached.length} in range)`);
      return { ok: true, candles, source: "cache", file };
    }
    logger.info(`[cache] ${file} has nothing in range, refetching`);
  }

  const r = await fetchCandles(transport, { ...req, interval }, fetchOpts);
  if (!r.ok) return r;
  if (r.candles.length === 0) {
    return { ok: false, error: new EmptyHistory(req.symbol, req.startMs, req.endMs) };
  }

  if (useCache) {
    await writeCandleCsv(file, r.candles);
    logger.info(`[cache] stored ${r.candles.length} candles -> ${file}`);
  }
  return { ok: true, candles: r.candles, source: "network", file };
}
