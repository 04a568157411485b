import fs from "node:fs/promises";
import path from "node:path";

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  data?: Record<string, unknown>;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export class Logger {
  private logFile: string | null = null;
  private minLevel: LogLevel;
  private stderr: boolean;

  constructor(options?: {
    logFile?: string;
    minLevel?: LogLevel;
    stderr?: boolean;
  }) {
    this.logFile = options?.logFile ?? null;
    this.minLevel = options?.minLevel ?? "info";
    this.stderr = options?.stderr ?? false;
  }

  static async createFileLogger(
    logFile: string,
    minLevel: LogLevel = "debug",
  ): Promise<Logger> {
    await fs.mkdir(path.dirname(logFile), { recursive: true });
    return new Logger({ logFile, minLevel, stderr: false });
  }

  /** Logs go to stderr so a command's own output stays clean on stdout. */
  static createCliLogger(minLevel: LogLevel = "warn"): Logger {
    return new Logger({ minLevel, stderr: true });
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[this.minLevel];
  }

  private formatEntry(entry: LogEntry): string {
    return JSON.stringify(entry);
  }

  private async write(entry: LogEntry): Promise<void> {
    if (!this.shouldLog(entry.level)) return;

    const line = this.formatEntry(entry);

    if (this.stderr) {
      console.error(line);
    }

    if (this.logFile) {
      await fs.appendFile(this.logFile, line + "\n");
    }
  }

  private log(
    level: LogLevel,
    message: string,
    data?: Record<string, unknown>,
  ): void {
    this.write({
      timestamp: new Date().toISOString(),
      level,
      message,
      data,
    }).catch((err: unknown) => {
      console.error(
        `Failed to write log entry: ${err instanceof Error ? err.message : String(err)}`,
      );
    });
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.log("debug", message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log("info", message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log("warn", message, data);
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.log("error", message, data);
  }
}
