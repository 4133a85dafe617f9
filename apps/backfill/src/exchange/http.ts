// apps/backfill/src/exchange/http.ts
import { Agent, request, type Dispatcher } from "undici";
import { TransportError, describeError } from "../errors.js";
import type { PageRequest } from "../types.js";

export const BINANCE_REST_BASE = "https://api.binance.com";
export const KLINES_PATH = "/api/v3/klines";

export type TransportResponse = { status: number; body: string };

export type RequestOpts = {
  timeoutMs: number;
  signal?: AbortSignal;
};

/** One GET per call. Rejects with TransportError; any HTTP status resolves. */
export type KlineTransport = {
  getKlines(page: PageRequest, opts: RequestOpts): Promise<TransportResponse>;
  close(): Promise<void>;
};

/**
 * Query for one page. The upstream endTime is inclusive,
 * so the exclusive window end is sent as endMs - 1.
 */
export function klinesQuery(page: PageRequest): Record<string, string> {
  return {
    symbol: page.symbol,
    interval: page.interval,
    startTime: String(page.startMs),
    endTime: String(page.endMs - 1),
    limit: String(page.limit)
  };
}

export function klinesUrl(baseUrl: string, page: PageRequest): string {
  const qs = new URLSearchParams(klinesQuery(page)).toString();
  return `${baseUrl.replace(/\/+$/, "")}${KLINES_PATH}?${qs}`;
}

export function createUndiciTransport(params: {
  baseUrl?: string;
  dispatcher?: Dispatcher;
} = {}): KlineTransport {
  const baseUrl = params.baseUrl ?? BINANCE_REST_BASE;

  // own agent unless one is injected; closed by close()
  const owned = params.dispatcher
    ? undefined
    : new Agent({
        connectTimeout: 7_000,
        keepAliveTimeout: 10_000,
        keepAliveMaxTimeout: 20_000
      });
  const dispatcher = params.dispatcher ?? owned;

  async function getKlines(page: PageRequest, opts: RequestOpts): Promise<TransportResponse> {
    const url = klinesUrl(baseUrl, page);

    const ac = new AbortController();
    const onAbort = () => ac.abort(opts.signal?.reason);
    if (opts.signal?.aborted) ac.abort(opts.signal.reason);
    else opts.signal?.addEventListener("abort", onAbort, { once: true });
    const t = setTimeout(() => ac.abort(new Error(`timeout after ${opts.timeoutMs}ms`)), opts.timeoutMs);

    try {
      const res = await request(url, {
        method: "GET",
        signal: ac.signal,
        headers: { accept: "application/json" },
        dispatcher
      });
      const body = await res.body.text();
      return { status: res.statusCode, body };
    } catch (e) {
      throw new TransportError(`GET ${url} failed: ${describeError(e)}`, { cause: e });
    } finally {
      clearTimeout(t);
      opts.signal?.removeEventListener("abort", onAbort);
    }
  }

  async function close() {
    await owned?.close();
  }

  return { getKlines, close };
}
