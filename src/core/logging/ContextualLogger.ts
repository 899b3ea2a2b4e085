/**
 * Contextual Logger with structured output.
 *
 * Every entry carries the run's correlation id, and where relevant the
 * orchestration step and the stage it belongs to. Values under credential-like
 * keys are redacted before they reach the sink, since stage outputs routinely
 * contain cluster tokens and certificates.
 *
 * @module
 */

import { ForgeError } from "../errors/errors.js";
import type { Step } from "./Step.js";

// =============================================================================
// Types
// =============================================================================

export type LogLevel = "debug" | "info" | "warn" | "error";

/**
 * A structured log entry.
 */
export interface LogEntry {
  /** ISO timestamp */
  ts: string;
  level: LogLevel;
  msg: string;
  correlationId?: string;
  step?: string;
  stage?: string;
  errorCode?: string;
  errorMessage?: string;
  /** Stack trace (debug mode only) */
  stack?: string;
  /** Error cause message (debug mode only) */
  cause?: string;
  [key: string]: unknown;
}

export interface LogSink {
  write(entry: LogEntry): void;
}

/**
 * Context that can be bound to a logger.
 */
export interface LogContext {
  correlationId?: string;
  step?: Step;
  stage?: string;
  [key: string]: unknown;
}

export interface CreateLoggerOptions {
  /** Output sink (default: JSON lines on stderr) */
  sink?: LogSink;

  /** Minimum log level (default: "info") */
  minLevel?: LogLevel;

  /** Include debug details (stack, cause) */
  debug?: boolean;

  context?: LogContext;
}

// =============================================================================
// Helpers
// =============================================================================

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const RESERVED_KEYS = new Set(["correlationId", "step", "stage"]);

const SENSITIVE_KEY = /token|password|secret|client_key|access_key/i;

export const REDACTED = "[redacted]";

function shouldLog(level: LogLevel, minLevel: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[minLevel];
}

/**
 * Replaces values under credential-like keys, recursing into plain objects.
 */
export function redact(value: unknown, key?: string): unknown {
  if (key !== undefined && SENSITIVE_KEY.test(key) && value !== null && value !== undefined) {
    return REDACTED;
  }
  if (Array.isArray(value)) {
    return value.map((item) => redact(item));
  }
  if (typeof value === "object" && value !== null && !(value instanceof Error)) {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) {
      out[k] = redact(v, k);
    }
    return out;
  }
  return value;
}

/**
 * Writes one JSON document per line. stderr keeps stdout free for command output.
 */
class StderrJsonSink implements LogSink {
  write(entry: LogEntry): void {
    process.stderr.write(JSON.stringify(entry) + "\n");
  }
}

// =============================================================================
// ContextualLogger Class
// =============================================================================

/**
 * Logger with bound context and structured output.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ minLevel: "info" });
 * const stageLogger = logger.withContext({ stage: "02-infrastructure" });
 * stageLogger.info("Applying stage", { provider: "aws" });
 * ```
 */
export class ContextualLogger {
  private readonly sink: LogSink;
  private readonly minLevel: LogLevel;
  private readonly debugMode: boolean;
  private readonly context: LogContext;

  constructor(options: CreateLoggerOptions = {}) {
    this.sink = options.sink ?? new StderrJsonSink();
    this.minLevel = options.minLevel ?? "info";
    this.debugMode = options.debug ?? false;
    this.context = options.context ?? {};
  }

  /**
   * Creates a child logger with additional context.
   */
  withContext(ctx: LogContext): ContextualLogger {
    return new ContextualLogger({
      sink: this.sink,
      minLevel: this.minLevel,
      debug: this.debugMode,
      context: { ...this.context, ...ctx },
    });
  }

  /**
   * Shorthand for a child logger bound to one stage.
   */
  forStage(stage: string): ContextualLogger {
    return this.withContext({ stage });
  }

  debug(msg: string, ctx?: Record<string, unknown>): void {
    this.log("debug", msg, ctx);
  }

  info(msg: string, ctx?: Record<string, unknown>): void {
    this.log("info", msg, ctx);
  }

  warn(msg: string, ctx?: Record<string, unknown>): void {
    this.log("warn", msg, ctx);
  }

  error(msg: string, ctx?: Record<string, unknown>): void {
    this.log("error", msg, ctx);
  }

  private log(level: LogLevel, msg: string, ctx?: Record<string, unknown>): void {
    if (!shouldLog(level, this.minLevel)) {
      return;
    }

    const entry: LogEntry = {
      ts: new Date().toISOString(),
      level,
      msg,
    };

    if (this.context.correlationId) entry.correlationId = this.context.correlationId;
    if (this.context.step) entry.step = this.context.step;
    if (this.context.stage) entry.stage = this.context.stage;

    for (const [key, value] of Object.entries(this.context)) {
      if (!RESERVED_KEYS.has(key) && value !== undefined) {
        entry[key] = redact(value, key);
      }
    }

    if (ctx) {
      for (const [key, value] of Object.entries(ctx)) {
        if (key === "error" && value instanceof Error) {
          this.enrichWithError(entry, value);
        } else if (value !== undefined) {
          entry[key] = redact(value, key);
        }
      }
    }

    this.sink.write(entry);
  }

  private enrichWithError(entry: LogEntry, error: Error): void {
    entry.errorMessage = error.message;

    if (error instanceof ForgeError) {
      entry.errorCode = error.code;
      if (this.debugMode && error.cause) {
        entry.cause = error.cause.message;
      }
    }

    if (this.debugMode && error.stack) {
      entry.stack = error.stack;
    }
  }
}

// =============================================================================
// Factory Function
// =============================================================================

export function createLogger(options: CreateLoggerOptions = {}): ContextualLogger {
  return new ContextualLogger(options);
}

/**
 * Logger that discards everything. Used where a caller supplies no logger.
 */
export function createSilentLogger(): ContextualLogger {
  return new ContextualLogger({ sink: { write: () => undefined } });
}
