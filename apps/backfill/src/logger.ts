export type LogLevel = "debug" | "info" | "warn" | "error";

export type Logger = Record<LogLevel, (msg: string, meta?: unknown) => void>;

const RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export function isLogLevel(v: string): v is LogLevel {
  return LOG_LEVELS.some((l) => l === v);
}

function ts(): string {
  return new Date().toISOString();
}

function noop(): void {}

export function createLogger(level: LogLevel = "info"): Logger {
  const on = (l: LogLevel) => RANK[l] >= RANK[level];
  return {
    debug: on("debug") ? (msg, meta) => console.log(`[${ts()}] [DEBUG] ${msg}`, meta ?? "") : noop,
    info: on("info") ? (msg, meta) => console.log(`[${ts()}] [INFO] ${msg}`, meta ?? "") : noop,
    warn: on("warn") ? (msg, meta) => console.warn(`[${ts()}] [WARN] ${msg}`, meta ?? "") : noop,
    error: on("error") ? (msg, meta) => console.error(`[${ts()}] [ERROR] ${msg}`, meta ?? "") : noop
  };
}

const envLevel = (process.env.LOG_LEVEL ?? "info").trim().toLowerCase();

export const log = createLogger(isLogLevel(envLevel) ? envLevel : "info");

export const silentLogger: Logger = { debug: noop, info: noop, warn: noop, error: noop };
