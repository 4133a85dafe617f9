// apps/backfill/src/errors.ts

export type ErrorCode =
  | "INVALID_RANGE"
  | "INVALID_LIMIT"
  | "TRANSPORT"
  | "UPSTREAM"
  | "PAYLOAD"
  | "FETCH_FAILED"
  | "FETCH_ABORTED"
  | "EMPTY_HISTORY"
  | "CACHE_FORMAT"
  | "CONFIG";

export class BackfillError extends Error {
  constructor(
    readonly code: ErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class InvalidRange extends BackfillError {
  constructor(readonly startMs: number, readonly endMs: number) {
    super("INVALID_RANGE", `Invalid range startMs=${startMs} endMs=${endMs}`);
  }
}

export const MAX_PAGE_LIMIT = 1000;

export class InvalidLimit extends BackfillError {
  constructor(readonly limit: number) {
    super("INVALID_LIMIT", `limit must be an integer in [1, ${MAX_PAGE_LIMIT}], got ${limit}`);
  }
}

export class TransportError extends BackfillError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("TRANSPORT", message, options);
  }
}

export class UpstreamError extends BackfillError {
  constructor(readonly status: number, readonly body: string) {
    super("UPSTREAM", `HTTP ${status}: ${body.slice(0, 200)}`);
  }
}

export class PayloadError extends BackfillError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("PAYLOAD", message, options);
  }
}

export class FetchFailed extends BackfillError {
  constructor(readonly attempts: number, cause: BackfillError) {
    super("FETCH_FAILED", `page failed after ${attempts} attempt(s): ${cause.message}`, { cause });
  }
}

export class FetchAborted extends BackfillError {
  constructor(reason?: unknown) {
    super("FETCH_ABORTED", `fetch aborted${reason === undefined ? "" : `: ${describeError(reason)}`}`, {
      cause: reason
    });
  }
}

export class EmptyHistory extends BackfillError {
  constructor(readonly symbol: string, readonly startMs: number, readonly endMs: number) {
    super("EMPTY_HISTORY", `no candles for ${symbol} in [${startMs}, ${endMs})`);
  }
}

export class CacheFormatError extends BackfillError {
  constructor(readonly file: string, readonly missing: string[]) {
    super("CACHE_FORMAT", `${file}: missing column(s) ${missing.join(", ")}`);
  }
}

export class ConfigError extends BackfillError {
  constructor(message: string) {
    super("CONFIG", message);
  }
}

export function describeError(e: unknown): string {
  if (e instanceof Error) return e.message;
  return String(e);
}
