/**
 * Structured logger.
 *
 * - level filtering, from the options or LOG_LEVEL (default info)
 * - text lines, or one JSON object per line with LOG_FORMAT=json
 * - run_id attached to every line once a run context is set
 * - child loggers share the parent's level, format, sink and context
 *
 * Lines go to stderr unless a sink is given; stdout carries only the report.
 */

import { performance } from "node:perf_hooks";

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogFormat = "text" | "json";

/** Receives one finished log line, without a trailing newline. */
export type LogSink = (line: string) => void;

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface LogContext {
  runId?: string;
  [key: string]: unknown;
}

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
  child(name: string): Logger;
  /** Merge fields into the context carried by every later line. */
  setContext(ctx: LogContext): void;
  /** Start a timer. The stop function logs the elapsed ms at debug level and returns it. */
  time(label: string): () => number;
}

export interface LoggerOptions {
  minLevel?: LogLevel;
  format?: LogFormat;
  /** Default: console.error */
  sink?: LogSink;
}

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  module: string;
  message: string;
  data?: Record<string, unknown>;
}

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_PRIORITY;
}

function resolveMinLevel(explicit?: LogLevel): LogLevel {
  if (explicit) return explicit;
  const env = (process.env.LOG_LEVEL ?? "").toLowerCase();
  return isLogLevel(env) ? env : "info";
}

function resolveFormat(explicit?: LogFormat): LogFormat {
  if (explicit) return explicit;
  return process.env.LOG_FORMAT?.toLowerCase() === "json" ? "json" : "text";
}

function formatJson(entry: LogEntry, context: LogContext): string {
  const { runId, ...rest } = context;
  return JSON.stringify({
    timestamp: entry.timestamp,
    level: entry.level,
    module: entry.module,
    message: entry.message,
    ...(runId ? { run_id: runId } : {}),
    ...rest,
    ...entry.data,
  });
}

function formatText(entry: LogEntry, context: LogContext): string {
  const line = `[${entry.timestamp}] [${entry.level.toUpperCase()}] [${entry.module}] ${entry.message}`;
  const extra: Record<string, unknown> = { ...entry.data };
  if (context.runId) extra.runId = context.runId;
  return Object.keys(extra).length > 0 ? `${line} ${JSON.stringify(extra)}` : line;
}

const consoleSink: LogSink = (line) => console.error(line);

export function createLogger(
  name: string,
  options: LoggerOptions = {},
  parentContext?: LogContext,
): Logger {
  const minLevel = resolveMinLevel(options.minLevel);
  const format = resolveFormat(options.format);
  const sink = options.sink ?? consoleSink;
  const render = format === "json" ? formatJson : formatText;
  let context: LogContext = { ...parentContext };

  function log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[minLevel]) return;
    sink(render({ timestamp: new Date().toISOString(), level, module: name, message, data }, context));
  }

  return {
    debug: (msg, data) => log("debug", msg, data),
    info: (msg, data) => log("info", msg, data),
    warn: (msg, data) => log("warn", msg, data),
    error: (msg, data) => log("error", msg, data),
    child: (childName) => createLogger(`${name}:${childName}`, { minLevel, format, sink }, context),
    setContext(ctx: LogContext): void {
      context = { ...context, ...ctx };
    },
    time(label: string): () => number {
      const start = performance.now();
      return () => {
        const durationMs = Math.round((performance.now() - start) * 100) / 100;
        log("debug", `${label} completed`, { label, durationMs });
        return durationMs;
      };
    },
  };
}
