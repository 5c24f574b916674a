/**
 * Structured logging for the memory service.
 * Logs session lifecycle, summarization, fact extraction, LLM calls and errors. JSON output for shipping.
 *
 * Env:
 *   LOG_LEVEL   - silent | debug | info | warn | error (default: info, silent under NODE_ENV=test)
 *   LOG_FILE    - If set, append all logs to this path (creates dirs if needed).
 */

import pino from "pino";

export type LogLevel = "silent" | "debug" | "info" | "warn" | "error";

const LOG_LEVELS: readonly LogLevel[] = ["silent", "debug", "info", "warn", "error"];

export interface LoggerConfig {
  level?: LogLevel;
  pretty?: boolean;
}

export function parseLogLevel(value: string | undefined, fallback: LogLevel): LogLevel {
  const v = value?.trim().toLowerCase();
  return LOG_LEVELS.find((l) => l === v) ?? fallback;
}

const isTest = process.env.NODE_ENV === "test";

const defaultConfig: LoggerConfig = {
  level: parseLogLevel(process.env.LOG_LEVEL, isTest ? "silent" : "info"),
  pretty: process.env.NODE_ENV !== "production" && !isTest,
};

export function createLogger(config: LoggerConfig = {}): pino.Logger {
  const opts: pino.LoggerOptions = {
    level: config.level ?? defaultConfig.level,
    base: undefined,
    timestamp: pino.stdTimeFunctions.isoTime,
  };
  const pretty = config.pretty ?? defaultConfig.pretty;
  const logFile = process.env.LOG_FILE?.trim();

  const streams: pino.StreamEntry[] = [];
  if (pretty) {
    streams.push({
      stream: pino.transport({ target: "pino-pretty", options: { colorize: true } }),
    });
  } else {
    streams.push({ stream: process.stdout });
  }
  if (logFile) {
    streams.push({
      stream: pino.destination({ dest: logFile, append: true, mkdir: true }),
    });
  }

  if (streams.length === 1) {
    return pino(opts, streams[0].stream);
  }
  return pino(opts, pino.multistream(streams));
}

export const logger = createLogger();

export type Logger = pino.Logger;

/** Log LLM request/response (summary only, never content). */
export function logLlmCall(
  log: pino.Logger,
  call: { purpose: string; provider: string; model: string; messageCount: number; responseLength: number; durationMs: number }
): void {
  log.info({ event: "LLM_CALL", ...call }, "LLM completed");
}

/** Log error. */
export function logError(log: pino.Logger, err: Error, context?: Record<string, unknown>): void {
  log.error({ err: err.message, stack: err.stack, ...context }, "Error");
}
