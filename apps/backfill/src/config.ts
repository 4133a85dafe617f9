// apps/backfill/src/config.ts
import { ConfigError, InvalidRange } from "./errors.js";
import { BINANCE_REST_BASE } from "./exchange/http.js";
import { assertLimit, DEFAULT_INTERVAL, FETCH_DEFAULTS } from "./fetcher.js";
import { isLogLevel, type LogLevel } from "./logger.js";
import { isInterval, parseDateToMs } from "./time.js";
import type { Interval } from "./types.js";

export type Env = Record<string, string | undefined>;

export type BackfillConfig = {
  baseUrl: string;
  symbol: string;
  interval: Interval;
  startMs: number; // inclusive
  endMs: number;   // exclusive
  limit: number;
  timeoutMs: number;
  maxAttempts: number;
  pageDelayMs: number;
  cacheDir: string;
  useCache: boolean;
  outFile?: string;
  logLevel: LogLevel;
};

function req(env: Env, name: string): string {
  const v = env[name]?.trim();
  if (!v) throw new ConfigError(`Missing env: ${name}`);
  return v;
}

function opt(env: Env, name: string, def: string): string {
  const v = env[name]?.trim();
  return v ? v : def;
}

function int(env: Env, name: string, def: number, min: number): number {
  const raw = opt(env, name, String(def));
  const n = Number(raw);
  if (!Number.isInteger(n) || n < min) throw new ConfigError(`${name} must be an integer >= ${min}, got "${raw}"`);
  return n;
}

function bool(env: Env, name: string, def: boolean): boolean {
  const v = env[name]?.trim().toLowerCase();
  if (!v) return def;
  if (["1", "true", "yes", "y", "on"].includes(v)) return true;
  if (["0", "false", "no", "n", "off"].includes(v)) return false;
  throw new ConfigError(`${name} must be a boolean, got "${v}"`);
}

function date(env: Env, name: string, raw: string): number {
  const ms = parseDateToMs(raw);
  if (!Number.isFinite(ms)) throw new ConfigError(`${name}: bad date "${raw}"`);
  return ms;
}

/**
 * Builds the run configuration from environment variables.
 * `now` fills END_DATE when it is not set.
 */
export function loadConfig(env: Env = process.env, now: () => number = Date.now): BackfillConfig {
  const interval = opt(env, "INTERVAL", DEFAULT_INTERVAL);
  if (!isInterval(interval)) throw new ConfigError(`Unsupported INTERVAL: ${interval}`);

  const startMs = date(env, "START_DATE", req(env, "START_DATE"));
  const endRaw = env.END_DATE?.trim();
  const endMs = endRaw ? date(env, "END_DATE", endRaw) : now();
  if (!(startMs < endMs)) throw new InvalidRange(startMs, endMs);

  const limit = Number(opt(env, "PAGE_LIMIT", String(FETCH_DEFAULTS.limit)));
  assertLimit(limit);

  const logLevel = opt(env, "LOG_LEVEL", "info").toLowerCase();
  if (!isLogLevel(logLevel)) throw new ConfigError(`Invalid LOG_LEVEL: ${logLevel}`);

  return {
    baseUrl: opt(env, "BINANCE_REST_BASE", BINANCE_REST_BASE),
    symbol: opt(env, "SYMBOL", "BTCUSDT").toUpperCase(),
    interval,
    startMs,
    endMs,
    limit,
    timeoutMs: int(env, "REQUEST_TIMEOUT_MS", FETCH_DEFAULTS.timeoutMs, 1),
    maxAttempts: int(env, "MAX_ATTEMPTS", FETCH_DEFAULTS.maxAttempts, 1),
    pageDelayMs: int(env, "PAGE_DELAY_MS", FETCH_DEFAULTS.pageDelayMs, 0),
    cacheDir: opt(env, "CACHE_DIR", "./cache"),
    useCache: bool(env, "USE_CACHE", true),
    outFile: env.OUT_FILE?.trim() || undefined,
    logLevel
  };
}
