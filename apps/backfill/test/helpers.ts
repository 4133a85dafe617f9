import type { KlineTransport, TransportResponse } from "../src/exchange/http.js";
import type { PageRequest, Sleep } from "../src/types.js";

export type Step = TransportResponse | Error;

export function row(t: number): unknown[] {
  return [t, "1.0", "2.0", "0.5", "1.5", "10", t + 1_799_999];
}

export function ok(rows: unknown[]): TransportResponse {
  return { status: 200, body: JSON.stringify(rows) };
}

export function status(code: number, body = "busy"): TransportResponse {
  return { status: code, body };
}

/** Replays `steps` in order, one per request; an extra request is a test bug. */
export function scriptedTransport(steps: Step[]): { transport: KlineTransport; calls: PageRequest[] } {
  const queue = [...steps];
  const calls: PageRequest[] = [];
  const transport: KlineTransport = {
    async getKlines(page) {
      calls.push(page);
      const next = queue.shift();
      if (!next) throw new Error(`unexpected request startMs=${page.startMs}`);
      if (next instanceof Error) throw next;
      return next;
    },
    async close() {}
  };
  return { transport, calls };
}

/**
 * Serves `times` the way the exchange does: rows with
 * startMs <= t <= endMs - 1, ascending, at most `limit` of them.
 */
export function exchangeTransport(times: number[]): { transport: KlineTransport; calls: PageRequest[] } {
  const calls: PageRequest[] = [];
  const sorted = [...times].sort((a, b) => a - b);
  const transport: KlineTransport = {
    async getKlines(page) {
      calls.push(page);
      const rows = sorted
        .filter((t) => t >= page.startMs && t <= page.endMs - 1)
        .slice(0, page.limit)
        .map(row);
      return ok(rows);
    },
    async close() {}
  };
  return { transport, calls };
}

export function recordingSleep(): { sleep: Sleep; sleeps: number[] } {
  const sleeps: number[] = [];
  return {
    sleeps,
    sleep: async (ms) => {
      sleeps.push(ms);
    }
  };
}
