// apps/backfill/src/fetcher.ts
import { FetchAborted, InvalidLimit, InvalidRange, MAX_PAGE_LIMIT, UpstreamError } from "./errors.js";
import { parseKlinePage } from "./exchange/klines.js";
import type { KlineTransport } from "./exchange/http.js";
import { log } from "./logger.js";
import { sleep as defaultSleep, withRetry } from "./retry.js";
import { estimateBars } from "./time.js";
import type {
  Candle,
  FetchOptions,
  FetchRequest,
  FetchResult,
  Interval,
  PageRequest,
  TimeWindow
} from "./types.js";

export type { Candle, FetchOptions, FetchRequest, FetchResult, PageRequest, TimeWindow } from "./types.js";
export type { KlineTransport } from "./exchange/http.js";

export const DEFAULT_INTERVAL: Interval = "30m";

export const FETCH_DEFAULTS = {
  limit: MAX_PAGE_LIMIT,
  timeoutMs: 15_000,
  maxAttempts: 8,
  pageDelayMs: 200
} as const;

export function assertLimit(limit: number): void {
  if (!Number.isInteger(limit) || limit < 1 || limit > MAX_PAGE_LIMIT) throw new InvalidLimit(limit);
}

export function buildPageRequest(
  symbol: string,
  interval: Interval,
  window: TimeWindow,
  limit: number
): PageRequest {
  if (!(window.startMs < window.endMs)) throw new InvalidRange(window.startMs, window.endMs);
  assertLimit(limit);
  return { symbol, interval, startMs: window.startMs, endMs: window.endMs, limit };
}

/**
 * Pages forward through [startMs, endMs) until the window is exhausted or the
 * upstream returns an empty page.
 *
 * All-or-nothing: a page that spends its retry budget fails the whole call
 * and whatever was collected is dropped. Resume by calling again with
 * startMs = last openTimeMs + 1.
 */
export async function fetchCandles(
  transport: KlineTransport,
  req: FetchRequest,
  opts: FetchOptions = {}
): Promise<FetchResult> {
  const interval = req.interval ?? DEFAULT_INTERVAL;
  const limit = opts.limit ?? FETCH_DEFAULTS.limit;
  const timeoutMs = opts.timeoutMs ?? FETCH_DEFAULTS.timeoutMs;
  const maxAttempts = opts.maxAttempts ?? FETCH_DEFAULTS.maxAttempts;
  const pageDelayMs = opts.pageDelayMs ?? FETCH_DEFAULTS.pageDelayMs;
  const sleep = opts.sleep ?? defaultSleep;
  const logger = opts.logger ?? log;
  const { signal } = opts;

  assertLimit(limit);
  if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
    throw new RangeError(`maxAttempts must be an integer >= 1, got ${maxAttempts}`);
  }

  if (!(req.startMs < req.endMs)) return { ok: true, candles: [] };

  const estimatedTotal = estimateBars(req.startMs, req.endMs, interval);
  const results: Candle[] = [];
  let cursor = req.startMs;
  let pages = 0;

  while (cursor < req.endMs) {
    if (signal?.aborted) return { ok: false, error: new FetchAborted(signal.reason) };

    const page = buildPageRequest(req.symbol, interval, { startMs: cursor, endMs: req.endMs }, limit);
    const label = `${page.symbol}:${page.interval}:${page.startMs}`;

    const r = await withRetry(
      async () => {
        const res = await transport.getKlines(page, { timeoutMs, signal });
        if (res.status !== 200) throw new UpstreamError(res.status, res.body);
        return parseKlinePage(res.body, page);
      },
      { label, maxAttempts, signal, sleep, logger }
    );
    if (!r.ok) return { ok: false, error: r.error };

    const candles = r.value;
    pages += 1;
    if (candles.length === 0) {
      logger.debug(`[fetch] ${label} empty page, done`, { pages, fetched: results.length });
      break;
    }

    results.push(...candles);
    cursor = candles[candles.length - 1].openTimeMs + 1;

    logger.debug(`[fetch] ${label} rows=${candles.length} attempts=${r.attempts} next=${cursor}`);
    opts.onProgress?.({
      pages,
      fetched: results.length,
      estimatedTotal,
      cursorMs: cursor,
      message: `${req.symbol} ${results.length} candles fetched`
    });

    if (cursor >= req.endMs) break;

    if (pageDelayMs > 0) {
      if (signal?.aborted) return { ok: false, error: new FetchAborted(signal.reason) };
      try {
        await sleep(pageDelayMs, signal);
      } catch (e) {
        if (signal?.aborted) return { ok: false, error: new FetchAborted(signal.reason) };
        throw e;
      }
    }
  }

  return { ok: true, candles: results };
}
