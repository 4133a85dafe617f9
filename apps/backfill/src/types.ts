// apps/backfill/src/types.ts
import type { FetchAborted, FetchFailed } from "./errors.js";
import type { Logger } from "./logger.js";

export type Interval =
  | "1m" | "3m" | "5m" | "15m" | "30m"
  | "1h" | "2h" | "4h" | "6h" | "8h" | "12h"
  | "1d" | "3d" | "1w";

// half-open [startMs, endMs)
export type TimeWindow = {
  startMs: number;
  endMs: number;
};

export type PageRequest = {
  symbol: string;
  interval: Interval;
  startMs: number; // inclusive
  endMs: number;   // exclusive
  limit: number;
};

/**
 * One OHLC bar keyed by its open time. Prices stay as the decimal strings
 * the exchange sent; nothing here rounds or re-formats them.
 */
export type Candle = Readonly<{
  openTimeMs: number;
  open: string;
  high: string;
  low: string;
  close: string;
}>;

export type FetchError = FetchFailed | FetchAborted;

export type FetchResult =
  | { ok: true; candles: Candle[] }
  | { ok: false; error: FetchError };

export type FetchProgress = {
  pages: number;
  fetched: number;
  estimatedTotal: number;
  cursorMs: number;
  message: string;
};

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export type FetchRequest = {
  symbol: string;
  interval?: Interval;
  startMs: number;
  endMs: number;
};

export type FetchOptions = {
  limit?: number;
  timeoutMs?: number;
  maxAttempts?: number;
  pageDelayMs?: number;
  signal?: AbortSignal;
  onProgress?: (p: FetchProgress) => void;
  logger?: Logger;
  sleep?: Sleep;
};
