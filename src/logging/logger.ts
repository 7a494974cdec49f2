import { appendFile, stat, rename, unlink, mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';

/**
 * Log levels in order of severity (higher = more severe)
 */
export const LOG_LEVELS = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
} as const;

export type LogLevel = keyof typeof LOG_LEVELS;

/**
 * Context attached to a log entry
 */
export interface LogContext {
  sessionId?: string;
  operation?: string;
  toolName?: string;
  [key: string]: unknown;
}

/**
 * One JSON line in the log file
 */
export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: LogContext;
  errorCode?: string;
  stack?: string;
}

export interface LoggerConfig {
  level: LogLevel;
  path: string;
  maxSize: number;
  maxFiles: number;
}

export const DEFAULT_LOGGER_CONFIG: LoggerConfig = {
  level: 'info',
  path: 'es-mcp-agent.log',
  maxSize: 10 * 1024 * 1024, // 10MB
  maxFiles: 5,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

/**
 * Logger - structured JSON lines with level filtering and size-based rotation.
 *
 * Child loggers share the parent's file and add default context, so a
 * session's entries all carry its sessionId.
 */
export class Logger {
  private config: LoggerConfig;
  protected defaultContext: LogContext;

  constructor(config: Partial<LoggerConfig> = {}, defaultContext: LogContext = {}) {
    this.config = { ...DEFAULT_LOGGER_CONFIG, ...config };
    this.defaultContext = defaultContext;
  }

  get level(): LogLevel {
    return this.config.level;
  }

  set level(level: LogLevel) {
    this.config.level = level;
  }

  get path(): string {
    return this.config.path;
  }

  shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.config.level];
  }

  /**
   * Creates a logger writing to the same file with extra default context
   */
  child(context: LogContext): Logger {
    return new Logger(this.config, { ...this.defaultContext, ...context });
  }

  formatEntry(level: LogLevel, message: string, context?: LogContext, error?: Error): LogEntry {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
    };

    const mergedContext = { ...this.defaultContext, ...context };
    if (Object.keys(mergedContext).length > 0) {
      entry.context = mergedContext;
    }

    if (error) {
      const code: unknown = Reflect.get(error, 'code');
      if (typeof code === 'string') {
        entry.errorCode = code;
      }
      if (error.stack) {
        entry.stack = error.stack;
      }
    }

    return entry;
  }

  async write(entry: LogEntry): Promise<void> {
    const dir = dirname(this.config.path);
    if (dir && dir !== '.') {
      await mkdir(dir, { recursive: true });
    }

    await this.rotateIfNeeded();
    await appendFile(this.config.path, JSON.stringify(entry) + '\n', { encoding: 'utf-8' });
  }

  async debug(message: string, context?: LogContext): Promise<void> {
    if (!this.shouldLog('debug')) return;
    await this.emit(this.formatEntry('debug', message, context));
  }

  async info(message: string, context?: LogContext): Promise<void> {
    if (!this.shouldLog('info')) return;
    await this.emit(this.formatEntry('info', message, context));
  }

  async warn(message: string, context?: LogContext): Promise<void> {
    if (!this.shouldLog('warn')) return;
    await this.emit(this.formatEntry('warn', message, context));
  }

  /**
   * Logs an error; Error instances contribute their stack and code
   */
  async error(message: string, error?: unknown, context?: LogContext): Promise<void> {
    if (!this.shouldLog('error')) return;

    const err = error instanceof Error ? error : undefined;
    const entry = this.formatEntry('error', message, context, err);

    if (error !== undefined && !(error instanceof Error)) {
      entry.context = { ...entry.context, errorDetails: String(error) };
    }

    await this.emit(entry);
  }

  /**
   * Writes an entry and never rejects; a failed write is reported on stderr
   */
  private async emit(entry: LogEntry): Promise<void> {
    try {
      await this.write(entry);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      process.stderr.write(`Log write failed (${reason}): ${entry.level} ${entry.message}\n`);
    }
  }

  async rotateIfNeeded(): Promise<void> {
    let size: number;
    try {
      size = (await stat(this.config.path)).size;
    } catch (error) {
      if (isMissingFile(error)) return;
      throw error;
    }

    if (size >= this.config.maxSize) {
      await this.rotate();
    }
  }

  /**
   * Shifts log.N to log.N+1, dropping the oldest, then moves the live file to log.1
   */
  async rotate(): Promise<void> {
    const base = this.config.path;

    await ignoreMissing(unlink(`${base}.${this.config.maxFiles}`));
    for (let i = this.config.maxFiles - 1; i >= 1; i--) {
      await ignoreMissing(rename(`${base}.${i}`, `${base}.${i + 1}`));
    }
    await ignoreMissing(rename(base, `${base}.1`));
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && Reflect.get(error, 'code') === 'ENOENT';
}

async function ignoreMissing(operation: Promise<void>): Promise<void> {
  try {
    await operation;
  } catch (error) {
    if (!isMissingFile(error)) throw error;
  }
}
