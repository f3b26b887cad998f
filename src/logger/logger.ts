import { appendFile, mkdir } from "fs/promises";
import { dirname } from "path";
import { inspect } from "util";
import type { LogLevel } from "../config";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export type LogSink = (line: string) => Promise<void>;

export type LoggerOptions = {
  level?: LogLevel;
  /** Override the file sink (tests collect lines in memory) */
  sink?: LogSink;
};

/**
 * Append-only file sink, creates the directory on first write
 */
export function fileSink(filePath: string): LogSink {
  let ready: Promise<unknown> | null = null;
  return async (line: string) => {
    ready ??= mkdir(dirname(filePath), { recursive: true });
    await ready;
    await appendFile(filePath, line);
  };
}

function bigintAsText(_key: string, value: unknown): unknown {
  return typeof value === "bigint" ? `${value}n` : value;
}

/**
 * JSON for the extra fields; values JSON cannot hold (cycles) fall back to inspect
 */
export function formatExtra(extra: Record<string, unknown>): string {
  try {
    return JSON.stringify(extra, bigintAsText);
  } catch {
    return inspect(extra, { depth: 4, breakLength: Infinity });
  }
}

/**
 * Line logger: `<ISO timestamp> [LEVEL] message {extra}`
 * Writes are queued in order and never block the caller
 */
export class Logger {
  private readonly threshold: number;
  private readonly sink: LogSink;
  private pending: Promise<void> = Promise.resolve();

  constructor(filePath: string, options?: LoggerOptions) {
    this.threshold = LEVEL_ORDER[options?.level ?? "info"];
    this.sink = options?.sink ?? fileSink(filePath);
  }

  log(level: LogLevel, message: string, extra?: Record<string, unknown>): void {
    if (LEVEL_ORDER[level] < this.threshold) return;

    const timestamp = new Date().toISOString();
    const extraStr = extra ? ` ${formatExtra(extra)}` : "";
    const line = `${timestamp} [${level.toUpperCase()}] ${message}${extraStr}\n`;

    this.pending = this.pending
      .then(() => this.sink(line))
      .catch((error: unknown) => {
        process.stderr.write(`autods: failed to write log: ${error instanceof Error ? error.message : String(error)}\n`);
      });
  }

  debug(message: string, extra?: Record<string, unknown>): void {
    this.log("debug", message, extra);
  }

  info(message: string, extra?: Record<string, unknown>): void {
    this.log("info", message, extra);
  }

  warn(message: string, extra?: Record<string, unknown>): void {
    this.log("warn", message, extra);
  }

  error(message: string, extra?: Record<string, unknown>): void {
    this.log("error", message, extra);
  }

  /**
   * Wait for queued lines to reach the sink
   */
  flush(): Promise<void> {
    return this.pending;
  }
}

/**
 * Logger that drops everything (library use without a log file)
 */
export function silentLogger(): Logger {
  return new Logger("", { sink: async () => {} });
}
