import { appendFileSync, existsSync, mkdirSync, renameSync, statSync } from "fs";
import * as path from "path";

/**
 * "info" writes operational events (sources read, batches, failures);
 * "debug" adds per-record delegate output.
 */
export type LogLevel = "info" | "debug";

export interface ILogger {
  /** Operational events: batch boundaries, skipped sources, delegate failures. Always written. */
  debug(message: string): void;
  /** Delegate output and other per-record detail. Written at "debug" only. */
  verbose(message: string): void;
}

export class InMemoryLogger implements ILogger {
  private entries: string[] = [];
  private verboseEntries: string[] = [];

  debug(message: string): void {
    this.entries.push(message);
  }

  verbose(message: string): void {
    this.verboseEntries.push(message);
  }

  getEntries(): string[] {
    return [...this.entries];
  }

  getVerboseEntries(): string[] {
    return [...this.verboseEntries];
  }
}

export interface FileLoggerOptions {
  filePath: string;
  logLevel?: LogLevel;
  /** Once the log reaches this size it is moved to `<name>.1.log` at startup. */
  maxSizeBytes?: number;
}

const DEFAULT_MAX_SIZE_BYTES = 512 * 1024;

export function formatLogLine(message: string, at: Date = new Date()): string {
  return `[${at.toISOString()}] ${message}\n`;
}

/** The previous log kept after rotation: run.log -> run.1.log. */
export function rotatedLogPath(filePath: string): string {
  const ext = path.extname(filePath);
  return path.join(path.dirname(filePath), `${path.basename(filePath, ext)}.1${ext}`);
}

/**
 * Appends one line per event to the run log. Each CLI invocation opens a new
 * section headed by the log level; a single previous log is kept on rotation.
 */
export class FileLogger implements ILogger {
  private readonly filePath: string;
  private readonly logLevel: LogLevel;

  constructor(options: FileLoggerOptions) {
    this.filePath = options.filePath;
    this.logLevel = options.logLevel ?? "info";
    mkdirSync(path.dirname(this.filePath), { recursive: true });
    this.rotate(options.maxSizeBytes ?? DEFAULT_MAX_SIZE_BYTES);
    const separator = existsSync(this.filePath) ? "\n" : "";
    appendFileSync(this.filePath, separator + formatLogLine(`=== paper-ledger run (level ${this.logLevel}) ===`));
  }

  debug(message: string): void {
    appendFileSync(this.filePath, formatLogLine(message));
  }

  verbose(message: string): void {
    if (this.logLevel === "debug") {
      appendFileSync(this.filePath, formatLogLine(message));
    }
  }

  private rotate(maxSizeBytes: number): void {
    if (existsSync(this.filePath) && statSync(this.filePath).size >= maxSizeBytes) {
      renameSync(this.filePath, rotatedLogPath(this.filePath));
    }
  }
}
