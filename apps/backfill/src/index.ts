#!/usr/bin/env node
// apps/backfill/src/index.ts
import "dotenv/config";

import { fetchCandlesCached, writeCandleCsv } from "./cache.js";
import { loadConfig } from "./config.js";
import { describeError } from "./errors.js";
import { createUndiciTransport } from "./exchange/http.js";
import { createLogger } from "./logger.js";
import { fmtUtc } from "./time.js";

async function main() {
  const cfg = loadConfig();
  const log = createLogger(cfg.logLevel);
  const transport = createUndiciTransport({ baseUrl: cfg.baseUrl });

  const ac = new AbortController();
  const onSignal = (sig: string) => {
    log.warn(`[backfill] ${sig} received, aborting`);
    ac.abort(new Error(sig));
  };
  process.once("SIGINT", () => onSignal("SIGINT"));
  process.once("SIGTERM", () => onSignal("SIGTERM"));

  log.info(
    `[backfill] ${cfg.symbol} ${cfg.interval} ${fmtUtc(cfg.startMs)} -> ${fmtUtc(cfg.endMs)} limit=${cfg.limit} attempts=${cfg.maxAttempts}`
  );
  const started = Date.now();

  try {
    const r = await fetchCandlesCached(
      transport,
      { symbol: cfg.symbol, interval: cfg.interval, startMs: cfg.startMs, endMs: cfg.endMs },
      {
        limit: cfg.limit,
        timeoutMs: cfg.timeoutMs,
        maxAttempts: cfg.maxAttempts,
        pageDelayMs: cfg.pageDelayMs,
        cacheDir: cfg.cacheDir,
        useCache: cfg.useCache,
        signal: ac.signal,
        logger: log,
        onProgress: (p) => {
          const pct = Math.min(100, Math.floor((p.fetched / p.estimatedTotal) * 100));
          log.info(`[backfill] page=${p.pages} ${p.message} (~${pct}%)`);
        }
      }
    );

    if (!r.ok) {
      log.error(`[backfill] failed: ${describeError(r.error)}`, { code: r.error.code });
      process.exitCode = 1;
      return;
    }

    if (cfg.outFile) await writeCandleCsv(cfg.outFile, r.candles);

    const duration = ((Date.now() - started) / 1000).toFixed(1);
    const span =
      r.candles.length > 0
        ? ` first=${fmtUtc(r.candles[0].openTimeMs)} last=${fmtUtc(r.candles[r.candles.length - 1].openTimeMs)}`
        : "";
    log.info(
      `[backfill] done in ${duration}s candles=${r.candles.length} source=${r.source}${span} file=${cfg.outFile ?? r.file}`
    );
  } finally {
    await transport.close();
  }
}

main().catch((err) => {
  console.error("[backfill] fatal", describeError(err));
  process.exit(1);
});
