/**
 * Structured JSON logger
 *
 * Each entry is one JSON line written to the console method of its level.
 * Context and meta cannot overwrite `timestamp`, `level` or `message`.
 */

export enum LogLevel {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
}

/**
 * Fields carried by every entry of a logger and its children
 */
export interface LogContext {
  runId?: string;
  region?: string;
  snapshotId?: string;
  adapter?: string;
  [key: string]: unknown;
}

export type LogMeta = Record<string, unknown>;

interface LogEntry extends LogContext {
  timestamp: string;
  level: LogLevel;
  message: string;
}

const SEVERITY: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 10,
  [LogLevel.INFO]: 20,
  [LogLevel.WARN]: 30,
  [LogLevel.ERROR]: 40,
};

const SINKS: Record<LogLevel, (line: string) => void> = {
  [LogLevel.DEBUG]: (line) => console.debug(line),
  [LogLevel.INFO]: (line) => console.info(line),
  [LogLevel.WARN]: (line) => console.warn(line),
  [LogLevel.ERROR]: (line) => console.error(line),
};

export class Logger {
  private readonly context: Readonly<LogContext>;
  private readonly level: LogLevel;

  constructor(context: LogContext = {}, level: LogLevel = LogLevel.INFO) {
    this.context = { ...context };
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  isLevelEnabled(level: LogLevel): boolean {
    return SEVERITY[level] >= SEVERITY[this.level];
  }

  debug(message: string, meta?: LogMeta): void {
    this.write(LogLevel.DEBUG, message, meta);
  }

  info(message: string, meta?: LogMeta): void {
    this.write(LogLevel.INFO, message, meta);
  }

  warn(message: string, meta?: LogMeta): void {
    this.write(LogLevel.WARN, message, meta);
  }

  error(message: string, meta?: LogMeta): void {
    this.write(LogLevel.ERROR, message, meta);
  }

  /**
   * Logger at the same level whose entries also carry `context`
   */
  child(context: LogContext): Logger {
    return new Logger({ ...this.context, ...context }, this.level);
  }

  private write(level: LogLevel, message: string, meta: LogMeta = {}): void {
    if (!this.isLevelEnabled(level)) {
      return;
    }

    const entry: LogEntry = {
      ...this.context,
      ...meta,
      timestamp: new Date().toISOString(),
      level,
      message,
    };
    SINKS[level](JSON.stringify(entry));
  }
}

export function createLogger(context?: LogContext, level?: LogLevel): Logger {
  return new Logger(context, level);
}
