/**
 * Structured logger with JSON output and run correlation
 */

export enum LogLevel {
  ERROR = 0,
  WARN = 1,
  INFO = 2,
  DEBUG = 3
}

export interface LogContext {
  runId?: string;
  service?: string;
  stage?: string;
  [key: string]: unknown;
}

export interface LogEntry {
  timestamp: string;
  level: string;
  message: string;
  runId?: string;
  context?: LogContext;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
  metadata?: Record<string, unknown>;
}

export type LogSink = (entry: LogEntry) => void;

const stdoutSink: LogSink = (entry) => console.log(JSON.stringify(entry));

export class Logger {
  private readonly logLevel: LogLevel;
  private readonly context: LogContext;
  private readonly outputStream: LogSink;

  constructor(logLevel: LogLevel = LogLevel.INFO, context: LogContext = {}, outputStream?: LogSink) {
    this.logLevel = logLevel;
    this.context = { ...context };
    this.outputStream = outputStream ?? stdoutSink;
  }

  /**
   * Create a child logger with additional context
   */
  child(context: LogContext): Logger {
    return new Logger(this.logLevel, { ...this.context, ...context }, this.outputStream);
  }

  /**
   * Create a logger bound to one pipeline run
   */
  forRun(runId: string): Logger {
    return this.child({ runId });
  }

  /**
   * Parse log level from string
   */
  static parseLogLevel(level?: string): LogLevel {
    switch (level?.toLowerCase()) {
      case 'error':
        return LogLevel.ERROR;
      case 'warn':
        return LogLevel.WARN;
      case 'info':
        return LogLevel.INFO;
      case 'debug':
        return LogLevel.DEBUG;
      default:
        return LogLevel.INFO;
    }
  }

  private formatEntry(
    level: string,
    message: string,
    metadata?: Record<string, unknown>,
    error?: Error
  ): LogEntry {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      context: this.context
    };

    if (this.context.runId) {
      entry.runId = this.context.runId;
    }

    if (metadata) {
      entry.metadata = metadata;
    }

    if (error) {
      entry.error = {
        name: error.name,
        message: error.message,
        stack: error.stack
      };
    }

    return entry;
  }

  private shouldLog(level: LogLevel): boolean {
    return level <= this.logLevel;
  }

  error(message: string, error?: Error, metadata?: Record<string, unknown>): void {
    if (this.shouldLog(LogLevel.ERROR)) {
      this.outputStream(this.formatEntry('ERROR', message, metadata, error));
    }
  }

  warn(message: string, metadata?: Record<string, unknown>): void {
    if (this.shouldLog(LogLevel.WARN)) {
      this.outputStream(this.formatEntry('WARN', message, metadata));
    }
  }

  info(message: string, metadata?: Record<string, unknown>): void {
    if (this.shouldLog(LogLevel.INFO)) {
      this.outputStream(this.formatEntry('INFO', message, metadata));
    }
  }

  debug(message: string, metadata?: Record<string, unknown>): void {
    if (this.shouldLog(LogLevel.DEBUG)) {
      this.outputStream(this.formatEntry('DEBUG', message, metadata));
    }
  }

  /**
   * Log an upstream API call
   */
  logApiCall(service: string, method: string, url: string, duration: number, status?: number): void {
    const metadata = { service, method, url, duration, status };

    if (status !== undefined && status >= 400) {
      this.warn(`API call returned error status: ${service}`, metadata);
    } else {
      this.debug(`API call completed: ${service}`, metadata);
    }
  }
}

/**
 * Create a root logger honouring LOG_LEVEL
 */
export function createLogger(context?: LogContext, level?: string): Logger {
  return new Logger(Logger.parseLogLevel(level ?? process.env.LOG_LEVEL), context);
}
