// apps/backfill/src/exchange/klines.ts
import { z } from "zod";
import { PayloadError } from "../errors.js";
import type { Candle, TimeWindow } from "../types.js";

const DECIMAL_RE = /^-?\d+(\.\d+)?([eE][-+]?\d+)?$/;

/** 1e-7 -> "0.0000001", 1e+21 -> "1000000000000000000000". */
export function plainDecimal(n: number): string {
  const s = String(n);
  const m = /^(-?)(\d)(?:\.(\d+))?e([-+]\d+)$/.exec(s);
  if (!m) return s;
  const [, sign, lead, frac = "", expRaw] = m;
  const exp = Number(expRaw);
  const digits = lead + frac;
  if (exp < 0) return `${sign}0.${"0".repeat(-exp - 1)}${digits}`;
  if (digits.length <= exp + 1) return sign + digits.padEnd(exp + 1, "0");
  return `${sign}${digits.slice(0, exp + 1)}.${digits.slice(exp + 1)}`;
}

/**
 * Prices arrive either as JSON numbers or as numeric strings.
 * Strings pass through as sent; numbers are written out without an exponent.
 */
const DecimalSchema = z.union([
  z.string().regex(DECIMAL_RE, "not a decimal string"),
  z.number().finite().transform(plainDecimal)
]);

/**
 * [openTime, open, high, low, close, volume, closeTime, ...]
 * Only the first five matter here; the rest is ignored.
 */
export const KlineRowSchema = z
  .tuple([z.number().int().nonnegative(), DecimalSchema, DecimalSchema, DecimalSchema, DecimalSchema])
  .rest(z.unknown())
  .transform(([openTimeMs, open, high, low, close]): Candle =>
    Object.freeze({ openTimeMs, open, high, low, close })
  );

export const KlinePageSchema = z.array(KlineRowSchema);

/**
 * Parses one response body for the window [startMs, endMs).
 *
 * Rows must be strictly ascending and must not start before the window.
 * Rows at or past endMs are dropped: the upstream end bound is inclusive.
 */
export function parseKlinePage(body: string, window: TimeWindow): Candle[] {
  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch (e) {
    throw new PayloadError(`body is not JSON: ${body.slice(0, 120)}`, { cause: e });
  }

  const parsed = KlinePageSchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue ? issue.path.join(".") : "";
    throw new PayloadError(`bad kline payload at [${where}]: ${issue?.message ?? "unknown"}`, {
      cause: parsed.error
    });
  }

  const out: Candle[] = [];
  let prev = window.startMs - 1;
  for (const c of parsed.data) {
    if (c.openTimeMs <= prev) {
      throw new PayloadError(
        c.openTimeMs < window.startMs
          ? `row openTime=${c.openTimeMs} before window start=${window.startMs}`
          : `rows not strictly ascending at openTime=${c.openTimeMs}`
      );
    }
    prev = c.openTimeMs;
    if (c.openTimeMs >= window.endMs) break;
    out.push(c);
  }
  return out;
}
