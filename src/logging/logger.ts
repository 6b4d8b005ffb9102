/**
 * Leveled logger for provisioning runs.
 * Writes `[timestamp] LEVEL: message` lines (or JSON lines) and keeps the
 * history of the run so the CLI can summarize it afterwards.
 */

export enum LogLevel {
  DEBUG = "DEBUG",
  INFO = "INFO",
  WARN = "WARN",
  ERROR = "ERROR",
}

export type LogLevelName = "debug" | "info" | "warn" | "error";
export type LogFormat = "text" | "json";

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: Date;
  context?: Record<string, unknown>;
}

export interface LoggerOptions {
  level?: LogLevelName;
  format?: LogFormat;
  /** Where formatted lines go; defaults to the console. */
  sink?: (line: string, level: LogLevel) => void;
  /** Fields added to every entry of this logger. */
  bindings?: Record<string, unknown>;
}

const SEVERITY: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 10,
  [LogLevel.INFO]: 20,
  [LogLevel.WARN]: 30,
  [LogLevel.ERROR]: 40,
};

function consoleSink(line: string, level: LogLevel): void {
  if (level === LogLevel.ERROR) {
    console.error(line);
  } else {
    console.log(line);
  }
}

export class Logger {
  private readonly threshold: number;
  private readonly format: LogFormat;
  private readonly sink: (line: string, level: LogLevel) => void;
  private readonly bindings: Record<string, unknown>;
  private readonly entries: LogEntry[];

  constructor(options: LoggerOptions = {}, entries: LogEntry[] = []) {
    this.threshold = SEVERITY[toLogLevel(options.level ?? "info")];
    this.format = options.format ?? "text";
    this.sink = options.sink ?? consoleSink;
    this.bindings = options.bindings ?? {};
    this.entries = entries;
  }

  /** A logger sharing this one's history and output, with extra fields bound. */
  child(bindings: Record<string, unknown>): Logger {
    return new Logger(
      {
        level: levelName(this.threshold),
        format: this.format,
        sink: this.sink,
        bindings: { ...this.bindings, ...bindings },
      },
      this.entries,
    );
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.DEBUG, message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.INFO, message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.WARN, message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.ERROR, message, context);
  }

  log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    const merged = { ...this.bindings, ...context };
    const entry: LogEntry = {
      level,
      message,
      timestamp: new Date(),
      context: Object.keys(merged).length > 0 ? merged : undefined,
    };
    this.entries.push(entry);
    if (SEVERITY[level] >= this.threshold) {
      this.sink(this.formatEntry(entry), level);
    }
  }

  getEntries(level?: LogLevel): LogEntry[] {
    if (level) {
      return this.entries.filter((entry) => entry.level === level);
    }
    return [...this.entries];
  }

  clear(): void {
    this.entries.length = 0;
  }

  private formatEntry(entry: LogEntry): string {
    if (this.format === "json") {
      return JSON.stringify({
        time: entry.timestamp.toISOString(),
        level: entry.level.toLowerCase(),
        msg: entry.message,
        ...entry.context,
      });
    }
    const scope = typeof entry.context?.resource === "string" ? ` [${entry.context.resource}]` : "";
    return `[${entry.timestamp.toISOString()}] ${entry.level}:${scope} ${entry.message}`;
  }
}

export function toLogLevel(name: LogLevelName): LogLevel {
  switch (name) {
    case "debug":
      return LogLevel.DEBUG;
    case "info":
      return LogLevel.INFO;
    case "warn":
      return LogLevel.WARN;
    case "error":
      return LogLevel.ERROR;
  }
}

function levelName(severity: number): LogLevelName {
  if (severity <= SEVERITY[LogLevel.DEBUG]) return "debug";
  if (severity <= SEVERITY[LogLevel.INFO]) return "info";
  if (severity <= SEVERITY[LogLevel.WARN]) return "warn";
  return "error";
}

/** Logger that records history but prints nothing. */
export function silentLogger(): Logger {
  return new Logger({ level: "debug", sink: () => undefined });
}
