/**
 * Diagnostics for zotclean.
 *
 * Log lines go to stderr so that stdout carries nothing but the report
 * (which may be JSON). Entries are also kept in a bounded in-memory ring.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  timestamp: Date;
  level: LogLevel;
  message: string;
  context?: string;
  data?: Record<string, unknown>;
  error?: Error;
}

export type LogSink = (line: string) => void;

export interface LoggerOptions {
  context?: string;
  level?: LogLevel;
  maxLogs?: number;
  sink?: LogSink;
  color?: boolean;
}

const LEVELS: LogLevel[] = ['debug', 'info', 'warn', 'error'];

const COLORS: Record<LogLevel, string> = {
  debug: '\x1b[36m',
  info: '\x1b[32m',
  warn: '\x1b[33m',
  error: '\x1b[31m',
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && (LEVELS as string[]).includes(value);
}

const stderrSink: LogSink = line => {
  process.stderr.write(`${line}\n`);
};

/**
 * `key=value` pairs; strings with spaces or quotes are JSON-quoted.
 */
export function formatFields(data: Record<string, unknown>): string {
  return Object.entries(data)
    .filter(([, value]) => value !== undefined)
    .map(([key, value]) => {
      if (typeof value === 'string') {
        return `${key}=${/[\s"=]/.test(value) || value === '' ? JSON.stringify(value) : value}`;
      }
      return `${key}=${JSON.stringify(value)}`;
    })
    .join(' ');
}

export class Logger {
  private logs: LogEntry[] = [];
  private maxLogs: number;
  private minLevel: LogLevel;
  private context?: string;
  private sink: LogSink;
  private color: boolean;

  constructor(options: LoggerOptions = {}) {
    this.minLevel = options.level ?? 'info';
    this.context = options.context;
    this.maxLogs = options.maxLogs ?? 1000;
    this.sink = options.sink ?? stderrSink;
    this.color = options.color ?? (options.sink === undefined && Boolean(process.stderr.isTTY));
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVELS.indexOf(level) >= LEVELS.indexOf(this.minLevel);
  }

  format(entry: LogEntry): string {
    const parts = [entry.timestamp.toISOString(), entry.level.toUpperCase().padEnd(5)];
    if (entry.context) parts.push(`[${entry.context}]`);
    parts.push(entry.message);
    if (entry.data) {
      const fields = formatFields(entry.data);
      if (fields) parts.push(fields);
    }

    let line = parts.join(' ');
    if (entry.error) {
      line += `: ${entry.error.message}`;
      // Stack traces only when debugging
      if (this.minLevel === 'debug' && entry.error.stack) {
        line += `\n${entry.error.stack}`;
      }
    }
    return line;
  }

  private log(entry: LogEntry): void {
    if (!this.shouldLog(entry.level)) return;

    this.logs.push(entry);
    if (this.logs.length > this.maxLogs) {
      this.logs = this.logs.slice(-this.maxLogs);
    }

    const line = this.format(entry);
    this.sink(this.color ? `${COLORS[entry.level]}${line}\x1b[0m` : line);
  }

  debug(message: string, data?: Record<string, unknown>, context?: string): void {
    this.log({ timestamp: new Date(), level: 'debug', message, data, context: context ?? this.context });
  }

  info(message: string, data?: Record<string, unknown>, context?: string): void {
    this.log({ timestamp: new Date(), level: 'info', message, data, context: context ?? this.context });
  }

  warn(message: string, data?: Record<string, unknown>, context?: string): void {
    this.log({ timestamp: new Date(), level: 'warn', message, data, context: context ?? this.context });
  }

  error(message: string, error?: Error, context?: string): void {
    this.log({ timestamp: new Date(), level: 'error', message, error, context: context ?? this.context });
  }

  getLogs(level?: LogLevel): LogEntry[] {
    return level ? this.logs.filter(log => log.level === level) : this.logs;
  }

  clear(): void {
    this.logs = [];
  }

  setMinLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  getMinLevel(): LogLevel {
    return this.minLevel;
  }
}

export const logger = new Logger({
  level: isLogLevel(process.env.LOG_LEVEL) ? process.env.LOG_LEVEL : 'info'
});

/**
 * Base error: a stable `code` for reports and exit codes, plus context
 */
export class AppError extends Error {
  constructor(
    message: string,
    public code: string = 'UNKNOWN_ERROR',
    public statusCode: number = 500,
    public context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AppError';
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Log anything thrown and return it as an AppError
 */
export function handleError(error: unknown, context?: string): AppError {
  if (error instanceof AppError) {
    logger.error('Command failed', error, context);
    return error;
  }

  if (error instanceof Error) {
    logger.error('Unexpected error', error, context);
    return new AppError(error.message, 'INTERNAL_ERROR', 500);
  }

  logger.error(`Unexpected value thrown: ${String(error)}`, undefined, context);
  return new AppError(String(error), 'UNKNOWN_ERROR', 500);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
