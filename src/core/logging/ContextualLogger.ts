/**
 * Structured logger for the generation pipeline.
 *
 * Every entry is a flat JSON object: timestamp, level and message, then the
 * bound context (correlationId, phase, stepId), then call-site fields. An
 * Error passed as the `error` field is expanded into `errorCode` /
 * `errorMessage`, and in debug mode into `stack` / `cause`.
 *
 * Child loggers from {@link ContextualLogger.withContext} share the sink and
 * settings of their parent.
 *
 * @module
 */

import { ForgeError } from "../errors/errors.js";
import type { Phase } from "./Phase.js";

// =============================================================================
// Types
// =============================================================================

export type LogLevel = "debug" | "info" | "warn" | "error";

/** Levels from most to least verbose */
export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export interface LogEntry {
  /** ISO timestamp */
  ts: string;
  level: LogLevel;
  msg: string;
  correlationId?: string;
  phase?: string;
  /** Generation step the entry belongs to */
  stepId?: string;
  errorCode?: string;
  errorMessage?: string;
  /** Debug mode only */
  stack?: string;
  /** Debug mode only */
  cause?: string;
  [key: string]: unknown;
}

export interface LogSink {
  write(entry: LogEntry): void;
}

/** Fields bound to every entry of a logger */
export interface LogContext {
  correlationId?: string;
  phase?: Phase;
  stepId?: string;
  [key: string]: unknown;
}

export type LogFields = Record<string, unknown>;

export interface CreateLoggerOptions {
  /** Output sink (default: JSON lines on stderr) */
  sink?: LogSink;

  /** Minimum log level (default: "info") */
  minLevel?: LogLevel;

  /** Include stack and cause of logged errors */
  debug?: boolean;

  context?: LogContext;

  /** Timestamp source */
  now?: () => Date;
}

interface LoggerSettings {
  readonly sink: LogSink;
  readonly threshold: number;
  readonly debug: boolean;
  readonly now: () => Date;
}

// =============================================================================
// Levels
// =============================================================================

function rank(level: LogLevel): number {
  return LOG_LEVELS.indexOf(level);
}

/**
 * Parses a level name, e.g. from `APIFORGE_LOG_LEVEL`.
 */
export function parseLogLevelName(value: string | undefined): LogLevel | undefined {
  const normalized = value?.trim().toLowerCase();
  return LOG_LEVELS.find((level) => level === normalized);
}

// =============================================================================
// Sinks
// =============================================================================

/**
 * JSON lines on stderr; stdout stays free for command output.
 */
export const stderrJsonSink: LogSink = {
  write: (entry) => {
    process.stderr.write(`${JSON.stringify(entry)}\n`);
  },
};

export const nullLogSink: LogSink = {
  write: () => {},
};

// =============================================================================
// Entry Building
// =============================================================================

function assignDefined(entry: LogEntry, fields: LogFields): void {
  for (const [key, value] of Object.entries(fields)) {
    if (value !== undefined) {
      entry[key] = value;
    }
  }
}

function describeError(error: Error, debug: boolean): Partial<LogEntry> {
  const described: Partial<LogEntry> = {
    errorCode: error instanceof ForgeError ? error.code : undefined,
    errorMessage: error.message,
  };
  if (debug) {
    described.stack = error.stack;
    if (error.cause !== undefined) {
      described.cause = error.cause instanceof Error ? error.cause.message : String(error.cause);
    }
  }
  return described;
}

// =============================================================================
// ContextualLogger
// =============================================================================

/**
 * @example
 * ```typescript
 * const logger = createLogger({ minLevel: "debug" });
 * const stepLogger = logger.withContext({ correlationId: "abc", stepId: "app.main" });
 * stepLogger.info("Step started", { event: "step.start" });
 * ```
 */
export class ContextualLogger {
  private constructor(
    private readonly settings: LoggerSettings,
    private readonly context: LogContext,
  ) {}

  static create(options: CreateLoggerOptions = {}): ContextualLogger {
    return new ContextualLogger(
      {
        sink: options.sink ?? stderrJsonSink,
        threshold: rank(options.minLevel ?? "info"),
        debug: options.debug ?? false,
        now: options.now ?? (() => new Date()),
      },
      options.context ?? {},
    );
  }

  /**
   * Child logger with `ctx` merged over the bound context.
   */
  withContext(ctx: LogContext): ContextualLogger {
    return new ContextualLogger(this.settings, { ...this.context, ...ctx });
  }

  isLevelEnabled(level: LogLevel): boolean {
    return rank(level) >= this.settings.threshold;
  }

  debug(msg: string, fields?: LogFields): void {
    this.log("debug", msg, fields);
  }

  info(msg: string, fields?: LogFields): void {
    this.log("info", msg, fields);
  }

  warn(msg: string, fields?: LogFields): void {
    this.log("warn", msg, fields);
  }

  error(msg: string, fields?: LogFields): void {
    this.log("error", msg, fields);
  }

  private log(level: LogLevel, msg: string, fields: LogFields = {}): void {
    if (!this.isLevelEnabled(level)) {
      return;
    }

    const entry: LogEntry = { ts: this.settings.now().toISOString(), level, msg };
    assignDefined(entry, this.context);

    const { error, ...rest } = fields;
    assignDefined(entry, rest);
    if (error instanceof Error) {
      assignDefined(entry, describeError(error, this.settings.debug));
    } else if (error !== undefined) {
      entry.error = error;
    }

    this.settings.sink.write(entry);
  }
}

export function createLogger(options: CreateLoggerOptions = {}): ContextualLogger {
  return ContextualLogger.create(options);
}

/**
 * A logger that writes nothing. Default for library callers.
 */
export function createSilentLogger(): ContextualLogger {
  return ContextualLogger.create({ sink: nullLogSink, minLevel: "error" });
}
