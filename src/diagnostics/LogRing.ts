import { MPM_CONSTANTS } from "../constants";

/** Severity levels for log entries. */
export type LogLevel = "debug" | "info" | "warn" | "error";

/** A single structured log entry. */
export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  data?: Record<string, unknown>;
}

export type LogSink = (entry: LogEntry) => void;

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
}

export interface LogRingOptions {
  level?: LogLevel;
  maxEntries?: number;
  sink?: LogSink;
}

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

export function formatLogEntry(entry: LogEntry): string {
  const data = entry.data ? ` ${JSON.stringify(entry.data)}` : "";
  return `${entry.timestamp} ${entry.level.toUpperCase()} ${entry.message}${data}`;
}

/**
 * In-memory ring buffer logger that keeps the most recent entries at or above
 * its level, forwarding each one to an optional sink.
 *
 * Callers log paths, counts and error names. Cell plaintext and passphrases
 * are never passed in.
 *
 * @example
 * ```ts
 * const logger = new LogRing({ level: "debug", sink: (e) => process.stderr.write(formatLogEntry(e) + "\n") });
 * logger.info("Database loaded", { path: "vault.mpmdb", entries: 3 });
 * logger.getEntries(10);
 * ```
 */
export class LogRing implements Logger {
  private readonly entries: LogEntry[] = [];
  private readonly maxEntries: number;
  private readonly level: LogLevel;
  private readonly sink?: LogSink;
  private head = 0;

  constructor(opts?: LogRingOptions) {
    this.level = opts?.level ?? "info";
    this.maxEntries = Math.max(1, opts?.maxEntries ?? MPM_CONSTANTS.LOG.MAX_ENTRIES);
    this.sink = opts?.sink;
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.append("debug", message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.append("info", message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.append("warn", message, data);
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.append("error", message, data);
  }

  /**
   * Returns entries oldest first.
   *
   * @param limit - When given, only the newest `limit` entries.
   */
  getEntries(limit?: number): LogEntry[] {
    const ordered =
      this.entries.length < this.maxEntries
        ? this.entries.slice()
        : [...this.entries.slice(this.head), ...this.entries.slice(0, this.head)];
    return limit === undefined ? ordered : ordered.slice(Math.max(0, ordered.length - limit));
  }

  clear(): void {
    this.entries.length = 0;
    this.head = 0;
  }

  private append(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.level]) return;

    const entry: LogEntry = { level, message, timestamp: new Date().toISOString() };
    if (data !== undefined) entry.data = data;

    if (this.entries.length < this.maxEntries) {
      this.entries.push(entry);
    } else {
      this.entries[this.head] = entry;
      this.head = (this.head + 1) % this.maxEntries;
    }
    this.sink?.(entry);
  }
}
