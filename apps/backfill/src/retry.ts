import { setTimeout as delay } from "node:timers/promises";
import { BackfillError, FetchAborted, FetchFailed, describeError } from "./errors.js";
import { log, type Logger } from "./logger.js";
import type { Sleep } from "./types.js";

export const BACKOFF_BASE_MS = 1_000;
export const BACKOFF_CAP_MS = 30_000;

/** Wait after failed attempt `attempt` (1-based): min(2^attempt s, 30 s). */
export function backoffMs(attempt: number): number {
  return Math.min(BACKOFF_CAP_MS, BACKOFF_BASE_MS * Math.pow(2, attempt));
}

export const sleep: Sleep = async (ms, signal) => {
  signal?.throwIfAborted();
  if (ms <= 0) return;
  await delay(ms, undefined, { signal });
};

export type RetryCtx = {
  label: string;
  maxAttempts: number;
  signal?: AbortSignal;
  sleep?: Sleep;
  logger?: Logger;
};

export type RetryResult<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; error: FetchFailed | FetchAborted };

/**
 * Runs `fn` until it resolves or the budget is spent. Only BackfillError
 * rejections (transport, upstream status, payload) are retried; anything
 * else is a bug and propagates.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  ctx: RetryCtx
): Promise<RetryResult<T>> {
  const wait = ctx.sleep ?? sleep;
  const logger = ctx.logger ?? log;
  const { signal, maxAttempts } = ctx;

  let last: BackfillError | undefined;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    if (signal?.aborted) return { ok: false, error: new FetchAborted(signal.reason) };

    try {
      return { ok: true, value: await fn(attempt), attempts: attempt };
    } catch (e) {
      if (signal?.aborted) return { ok: false, error: new FetchAborted(signal.reason) };
      if (!(e instanceof BackfillError)) throw e;
      last = e;
    }

    if (attempt === maxAttempts) break;

    const waitMs = backoffMs(attempt);
    logger.warn(`[retry] ${ctx.label} attempt=${attempt}/${maxAttempts} wait=${waitMs}ms reason=${describeError(last)}`);
    try {
      await wait(waitMs, signal);
    } catch (e) {
      if (signal?.aborted) return { ok: false, error: new FetchAborted(signal.reason) };
      throw e;
    }
  }

  if (!last) throw new RangeError(`maxAttempts must be >= 1, got ${maxAttempts}`);
  logger.error(`[retry] ${ctx.label} exhausted after ${maxAttempts} attempt(s)`, { reason: describeError(last) });
  return { ok: false, error: new FetchFailed(maxAttempts, last) };
}
