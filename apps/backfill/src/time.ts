import dayjs from "dayjs";
import utc from "dayjs/plugin/utc.js";
import type { Interval } from "./types.js";

dayjs.extend(utc);

const MIN = 60_000;

export const INTERVAL_MS: Record<Interval, number> = {
  "1m": MIN,
  "3m": 3 * MIN,
  "5m": 5 * MIN,
  "15m": 15 * MIN,
  "30m": 30 * MIN,
  "1h": 60 * MIN,
  "2h": 120 * MIN,
  "4h": 240 * MIN,
  "6h": 360 * MIN,
  "8h": 480 * MIN,
  "12h": 720 * MIN,
  "1d": 1440 * MIN,
  "3d": 3 * 1440 * MIN,
  "1w": 7 * 1440 * MIN
};

export function isInterval(v: string): v is Interval {
  return Object.prototype.hasOwnProperty.call(INTERVAL_MS, v);
}

export function intervalToMs(interval: Interval): number {
  return INTERVAL_MS[interval];
}

/** Number of bars expected in [startMs, endMs); at least 1 for a non-empty window. */
export function estimateBars(startMs: number, endMs: number, interval: Interval): number {
  if (!(startMs < endMs)) return 0;
  return Math.max(1, Math.floor((endMs - startMs) / intervalToMs(interval)));
}

/**
 * Accepts epoch ms (13 digits), epoch seconds (10 digits),
 * "YYYY-MM-DD" (UTC midnight) or any ISO-8601 string.
 * Returns NaN when nothing matches.
 */
export function parseDateToMs(v: string): number {
  const s = v.trim();
  if (/^\d{13}$/.test(s)) return Number(s);
  if (/^\d{10}$/.test(s)) return Number(s) * 1000;

  const d = dayjs.utc(s);
  return d.isValid() ? d.valueOf() : Number.NaN;
}

export function fmtUtcDay(ms: number): string {
  return dayjs.utc(ms).format("YYYYMMDD");
}

export function fmtUtc(ms: number): string {
  return dayjs.utc(ms).format("YYYY-MM-DDTHH:mm:ss[Z]");
}
