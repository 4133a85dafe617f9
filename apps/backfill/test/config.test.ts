import assert from "node:assert/strict";
import { test } from "node:test";
import { loadConfig } from "../src/config.js";
import { ConfigError, InvalidLimit, InvalidRange } from "../src/errors.js";

const JAN1 = Date.UTC(2026, 0, 1);
const now = () => JAN1 + 86_400_000;

test("defaults fill everything but START_DATE", () => {
  assert.deepStrictEqual(loadConfig({ START_DATE: "2026-01-01" }, now), {
    baseUrl: "https://api.binance.com",
    symbol: "BTCUSDT",
    interval: "30m",
    startMs: JAN1,
    endMs: JAN1 + 86_400_000,
    limit: 1000,
    timeoutMs: 15_000,
    maxAttempts: 8,
    pageDelayMs: 200,
    cacheDir: "./cache",
    useCache: true,
    outFile: undefined,
    logLevel: "info"
  });
});

test("environment overrides", () => {
  const cfg = loadConfig(
    {
      BINANCE_REST_BASE: "https://api.test",
      SYMBOL: "ethusdt",
      INTERVAL: "1h",
      START_DATE: "1767225600",
      END_DATE: "2026-01-03",
      PAGE_LIMIT: "500",
      REQUEST_TIMEOUT_MS: "5000",
      MAX_ATTEMPTS: "3",
      PAGE_DELAY_MS: "0",
      CACHE_DIR: "/tmp/c",
      USE_CACHE: "off",
      OUT_FILE: "out.csv",
      LOG_LEVEL: "DEBUG"
    },
    now
  );

  assert.deepStrictEqual(cfg, {
    baseUrl: "https://api.test",
    symbol: "ETHUSDT",
    interval: "1h",
    startMs: JAN1,
    endMs: Date.UTC(2026, 0, 3),
    limit: 500,
    timeoutMs: 5_000,
    maxAttempts: 3,
    pageDelayMs: 0,
    cacheDir: "/tmp/c",
    useCache: false,
    outFile: "out.csv",
    logLevel: "debug"
  });
});

test("rejects bad values", () => {
  assert.throws(() => loadConfig({}, now), ConfigError);
  assert.throws(() => loadConfig({ START_DATE: "someday" }, now), ConfigError);
  assert.throws(() => loadConfig({ START_DATE: "2026-01-02", END_DATE: "2026-01-01" }, now), InvalidRange);
  assert.throws(() => loadConfig({ START_DATE: "2026-01-01", PAGE_LIMIT: "1001" }, now), InvalidLimit);
  assert.throws(() => loadConfig({ START_DATE: "2026-01-01", PAGE_LIMIT: "many" }, now), InvalidLimit);
  assert.throws(() => loadConfig({ START_DATE: "2026-01-01", INTERVAL: "7m" }, now), ConfigError);
  assert.throws(() => loadConfig({ START_DATE: "2026-01-01", MAX_ATTEMPTS: "0" }, now), ConfigError);
  assert.throws(() => loadConfig({ START_DATE: "2026-01-01", USE_CACHE: "maybe" }, now), ConfigError);
  assert.throws(() => loadConfig({ START_DATE: "2026-01-01", LOG_LEVEL: "loud" }, now), ConfigError);
});
