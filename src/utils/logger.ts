/**
 * Lightweight structured logger for the graph identity stores.
 *
 * Design constraints:
 *   - Host applications own stdout; ALL log output goes to stderr.
 *   - Zero runtime dependencies (no pino/winston).
 *   - Output: newline-delimited JSON so log aggregators can ingest directly.
 *   - Respects `GRAPH_IDENTITY_LOG_LEVEL` (default "info").
 *
 * Log levels (numeric priority, lower = more verbose):
 *   debug:0  info:1  warn:2  error:3
 *
 * Usage:
 *   import { logger } from "../utils/logger.js";
 *   logger.debug("Dispatching query", { paramKeys });
 *   logger.info("Driver created", { uri });
 */

import { GRAPH_IDENTITY_LOG_LEVEL } from "../env.js";

// ── Level priority map ────────────────────────────────────────────────────────

type LogLevel = "debug" | "info" | "warn" | "error";

/**
 * Accepted context types for logger methods.
 *
 * - `Record<string, unknown>`: structured key-value pairs (preferred)
 * - `Error`: mapped to `{ cause: err.message, stack: err.stack }`
 * - `string`: additional description, mapped to `{ detail: str }`
 */
export type LogContext = Record<string, unknown> | Error | string;

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_PRIORITY;
}

/** Resolves the configured minimum log level at startup. */
function resolveMinLevel(): LogLevel {
  // Unknown value → fall back to "info" silently (avoid recursive logging).
  return isLogLevel(GRAPH_IDENTITY_LOG_LEVEL) ? GRAPH_IDENTITY_LOG_LEVEL : "info";
}

const MIN_LEVEL_PRIORITY: number = LEVEL_PRIORITY[resolveMinLevel()];

// ── Core emitter ──────────────────────────────────────────────────────────────

function normalizeContext(ctx: LogContext | undefined): Record<string, unknown> | undefined {
  if (ctx === undefined) return undefined;
  if (ctx instanceof Error) {
    return { cause: ctx.message, stack: ctx.stack };
  }
  if (typeof ctx === "string") {
    return ctx.length > 0 ? { detail: ctx } : undefined;
  }
  return ctx;
}

/**
 * Writes a single structured log record to stderr.
 * A record that cannot be serialized (circular context) is dropped.
 */
function emit(level: LogLevel, message: string, context?: LogContext): void {
  if (LEVEL_PRIORITY[level] < MIN_LEVEL_PRIORITY) return;

  const record: Record<string, unknown> = {
    level,
    msg: message,
    ts: new Date().toISOString(),
  };

  const normalized = normalizeContext(context);
  if (normalized && Object.keys(normalized).length > 0) {
    Object.assign(record, normalized);
  }

  let line: string;
  try {
    line = JSON.stringify(record);
  } catch (error) {
    line = JSON.stringify({
      level,
      msg: message,
      ts: record.ts,
      logError: error instanceof Error ? error.message : String(error),
    });
  }
  process.stderr.write(line + "\n");
}

// ── Public logger interface ───────────────────────────────────────────────────

export const logger = {
  /**
   * Verbose diagnostic output: enabled only at GRAPH_IDENTITY_LOG_LEVEL=debug.
   */
  debug(message: string, context?: LogContext): void {
    emit("debug", message, context);
  },

  /**
   * Normal operational events (driver lifecycle).
   */
  info(message: string, context?: LogContext): void {
    emit("info", message, context);
  },

  warn(message: string, context?: LogContext): void {
    emit("warn", message, context);
  },

  error(message: string, context?: LogContext): void {
    emit("error", message, context);
  },
};
