type Level = "debug" | "info" | "warn" | "error";

export type LogSink = (line: string) => void;

export interface LoggerOptions {
  debugEnabled?: boolean;
  sink?: LogSink;
}

export class Logger {
  private readonly debugEnabled: boolean;
  private readonly sink: LogSink;

  constructor(options: LoggerOptions = {}) {
    this.debugEnabled = options.debugEnabled ?? false;
    this.sink = options.sink ?? ((line) => process.stderr.write(line));
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
    const ts = new Date().toISOString();
    // Unified, grep-friendly log format.
    this.sink(`[${ts}] [${level.toUpperCase()}] ${message}\n`);
  }
}

export function createSilentLogger(): Logger {
  return new Logger({ debugEnabled: false, sink: () => undefined });
}
