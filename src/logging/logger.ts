/**
 * Run Logger
 * Collects the log lines of one workflow run, echoing them to the console
 */

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/** Console threshold; `silent` keeps entries off the console entirely */
export type ConsoleLevel = LogLevel | "silent";

export interface LogEntry {
  level: LogLevel;
  message: string;
  nodeId?: string;
  timestamp: number;
}

export interface RunLoggerOptions {
  consoleLevel?: ConsoleLevel;
  /** Maximum retained entries (default: 1000) */
  maxLogs?: number;
  /** Receives every formatted line, regardless of console level */
  onLog?: (line: string, entry: LogEntry) => void;
}

const RANK: Record<ConsoleLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export const DEFAULT_MAX_LOGS = 1000;

export function formatLogEntry(entry: LogEntry): string {
  return entry.nodeId ? `[${entry.nodeId}] ${entry.message}` : entry.message;
}

export class RunLogger {
  private entries: LogEntry[] = [];
  private dropped = 0;
  private readonly consoleLevel: ConsoleLevel;
  private readonly maxLogs: number;
  private readonly onLog?: (line: string, entry: LogEntry) => void;

  constructor(options: RunLoggerOptions = {}) {
    this.consoleLevel = options.consoleLevel ?? "info";
    this.maxLogs = options.maxLogs ?? DEFAULT_MAX_LOGS;
    this.onLog = options.onLog;
  }

  log(level: LogLevel, message: string, nodeId?: string): void {
    const entry: LogEntry = { level, message, timestamp: Date.now() };
    if (nodeId !== undefined) entry.nodeId = nodeId;

    this.entries.push(entry);
    if (this.entries.length > this.maxLogs) {
      const excess = this.entries.length - this.maxLogs;
      this.entries.splice(0, excess);
      this.dropped += excess;
    }

    const line = formatLogEntry(entry);
    this.onLog?.(line, entry);

    if (RANK[level] >= RANK[this.consoleLevel]) {
      if (level === "error") console.error(line);
      else if (level === "warn") console.warn(line);
      else console.log(line);
    }
  }

  debug(message: string, nodeId?: string): void {
    this.log("debug", message, nodeId);
  }

  info(message: string, nodeId?: string): void {
    this.log("info", message, nodeId);
  }

  warn(message: string, nodeId?: string): void {
    this.log("warn", message, nodeId);
  }

  error(message: string, nodeId?: string): void {
    this.log("error", message, nodeId);
  }

  /** An info-level logger bound to one node */
  forNode(nodeId: string): (message: string) => void {
    return (message) => this.info(message, nodeId);
  }

  getEntries(): LogEntry[] {
    return [...this.entries];
  }

  /**
   * Formatted lines; a marker line leads when old entries were dropped
   */
  lines(): string[] {
    const lines = this.entries.map(formatLogEntry);
    if (this.dropped > 0) {
      lines.unshift(`[SYSTEM] Log truncated: removed ${this.dropped} old entries`);
    }
    return lines;
  }
}
