import assert from "node:assert/strict";
import { test } from "node:test";
import { FetchAborted, FetchFailed, TransportError, UpstreamError } from "../src/errors.js";
import { silentLogger } from "../src/logger.js";
import { backoffMs, sleep, withRetry } from "../src/retry.js";
import { recordingSleep } from "./helpers.js";

test("backoff doubles per attempt and caps at 30s", () => {
  assert.deepStrictEqual(
    [1, 2, 3, 4, 5, 6, 10].map(backoffMs),
    [2_000, 4_000, 8_000, 16_000, 30_000, 30_000, 30_000]
  );
});

test("succeeds on a later attempt", async () => {
  const { sleep: wait, sleeps } = recordingSleep();
  const seen: number[] = [];

  const r = await withRetry(
    async (attempt) => {
      seen.push(attempt);
      if (attempt < 3) throw new UpstreamError(429, "too many requests");
      return "ok";
    },
    { label: "t", maxAttempts: 5, sleep: wait, logger: silentLogger }
  );

  assert.deepStrictEqual(r, { ok: true, value: "ok", attempts: 3 });
  assert.deepStrictEqual(seen, [1, 2, 3]);
  assert.deepStrictEqual(sleeps, [2_000, 4_000]);
});

test("returns FetchFailed carrying the last cause", async () => {
  const { sleep: wait, sleeps } = recordingSleep();
  let calls = 0;

  const r = await withRetry(
    async () => {
      calls += 1;
      throw new TransportError(`refused #${calls}`);
    },
    { label: "t", maxAttempts: 3, sleep: wait, logger: silentLogger }
  );

  assert.strictEqual(r.ok, false);
  if (r.ok) return;
  assert.ok(r.error instanceof FetchFailed);
  assert.strictEqual(r.error.attempts, 3);
  assert.ok(r.error.cause instanceof TransportError);
  assert.strictEqual(r.error.cause.message, "refused #3");
  assert.strictEqual(calls, 3);
  assert.deepStrictEqual(sleeps, [2_000, 4_000]);
});

test("a single attempt never sleeps", async () => {
  const { sleep: wait, sleeps } = recordingSleep();

  const r = await withRetry(
    async () => {
      throw new UpstreamError(500, "");
    },
    { label: "t", maxAttempts: 1, sleep: wait, logger: silentLogger }
  );

  assert.strictEqual(r.ok, false);
  assert.deepStrictEqual(sleeps, []);
});

test("errors outside the taxonomy propagate", async () => {
  let calls = 0;
  await assert.rejects(
    withRetry(
      async () => {
        calls += 1;
        throw new TypeError("bug");
      },
      { label: "t", maxAttempts: 3, logger: silentLogger }
    ),
    TypeError
  );
  assert.strictEqual(calls, 1);
});

test("abort interrupts the backoff wait", async () => {
  const ac = new AbortController();
  setTimeout(() => ac.abort(new Error("shutdown")), 10);

  const started = Date.now();
  const r = await withRetry(
    async () => {
      throw new UpstreamError(418, "teapot");
    },
    { label: "t", maxAttempts: 3, signal: ac.signal, logger: silentLogger }
  );

  assert.strictEqual(r.ok, false);
  if (r.ok) return;
  assert.ok(r.error instanceof FetchAborted);
  assert.ok(Date.now() - started < 1_900);
});

test("sleep rejects at once on an aborted signal", async () => {
  const ac = new AbortController();
  ac.abort(new Error("gone"));
  await assert.rejects(sleep(5_000, ac.signal), /gone/);
  await sleep(0);
});
