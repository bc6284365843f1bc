import type { LogSink } from "./types.js";

type Level = "debug" | "info" | "warn" | "error";

export interface LoggerOptions {
  debugEnabled?: boolean;
  sink?: LogSink;
  now?: () => Date;
}

export class Logger {
  private readonly debugEnabled: boolean;
  private readonly sink: LogSink;
  private readonly now: () => Date;

  constructor(options: LoggerOptions = {}) {
    this.debugEnabled = options.debugEnabled ?? false;
    this.sink = options.sink ?? process.stderr;
    this.now = options.now ?? (() => new Date());
  }

  debug(message: string): void {
    if (!this.debugEnabled) {
      return;
    }
    this.print("debug", message);
  }

  info(message: string): void {
    this.print("info", message);
  }

  warn(message: string): void {
    this.print("warn", message);
  }

  error(message: string): void {
    this.print("error", message);
  }

  private print(level: Level, message: string): void {
    const ts = this.now().toISOString();
    // Unified, grep-friendly log format. Stdout is kept for the run summary.
    this.sink.write(`[${ts}] [${level.toUpperCase()}] ${message}\n`);
  }
}
