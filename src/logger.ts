/**
 * Structured logging to stderr.
 * One JSON object per line: `ts`, `level`, `event`, then the event's fields.
 */
import { ShelfError } from "./errors.ts";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error", "silent"];

export interface LogEvent {
  ts: string;
  level: LogLevel;
  event: string;
  [key: string]: unknown;
}

export type LogFields = Record<string, unknown>;

/** Receives each formatted log line. */
export type LogSink = (line: string) => void;

export class Logger {
  #minLevel: LogLevel;
  #sink: LogSink;

  constructor(minLevel: LogLevel = "info", sink: LogSink = (line) => console.error(line)) {
    this.#minLevel = minLevel;
    this.#sink = sink;
  }

  get level(): LogLevel {
    return this.#minLevel;
  }

  isLevelEnabled(level: LogLevel): boolean {
    if (level === "silent" || this.#minLevel === "silent") {
      return false;
    }
    return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(this.#minLevel);
  }

  private log(level: LogLevel, event: string, data?: LogFields): void {
    if (!this.isLevelEnabled(level)) {
      return;
    }

    const logEvent: LogEvent = {
      ts: new Date().toISOString(),
      level,
      event,
      ...data,
    };

    this.#sink(JSON.stringify(logEvent));
  }

  debug(event: string, data?: LogFields): void {
    this.log("debug", event, data);
  }

  info(event: string, data?: LogFields): void {
    this.log("info", event, data);
  }

  warn(event: string, data?: LogFields): void {
    this.log("warn", event, data);
  }

  error(event: string, data?: LogFields): void {
    this.log("error", event, data);
  }

  /**
   * Log the outcome of one operation: `<op>.success` at debug, `<op>.error`
   * at the given level with the error's kind and message.
   */
  operation(
    op: string,
    duration_ms: number,
    err?: unknown,
    failureLevel: Exclude<LogLevel, "silent"> = "debug"
  ): void {
    if (err === undefined) {
      this.debug(`${op}.success`, { duration_ms });
      return;
    }
    this.log(failureLevel, `${op}.error`, {
      duration_ms,
      err_kind: err instanceof ShelfError ? err.kind : "UNKNOWN",
      err_message: err instanceof Error ? err.message : String(err),
    });
  }
}

/**
 * Logger that drops everything.
 */
export function createSilentLogger(): Logger {
  return new Logger("silent");
}
