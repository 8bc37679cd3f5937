/**
 * Logging utility for the Plant Growth Analyzer
 * Provides structured logging with different levels and context
 */

export enum LogLevel {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
}

export interface LogContext {
  profileId?: string;
  analysisId?: string;
  parameter?: string;
  functionName?: string;
  requestId?: string;
  [key: string]: unknown;
}

const LEVEL_ORDER = [LogLevel.DEBUG, LogLevel.INFO, LogLevel.WARN, LogLevel.ERROR];

export class Logger {
  private context: LogContext;
  private logLevel: LogLevel;

  constructor(context: LogContext = {}, logLevel: LogLevel | string = process.env.LOG_LEVEL || LogLevel.INFO) {
    this.context = context;
    this.logLevel = Logger.parseLogLevel(logLevel);
  }

  static parseLogLevel(level: string): LogLevel {
    const upperLevel = level.toUpperCase();
    const match = LEVEL_ORDER.find(candidate => candidate === upperLevel);
    return match ?? LogLevel.INFO;
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVEL_ORDER.indexOf(level) >= LEVEL_ORDER.indexOf(this.logLevel);
  }

  private formatMessage(level: LogLevel, message: string, data?: unknown): string {
    const logEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      context: this.context,
      data,
    };

    return JSON.stringify(logEntry);
  }

  debug(message: string, data?: unknown): void {
    if (this.shouldLog(LogLevel.DEBUG)) {
      console.log(this.formatMessage(LogLevel.DEBUG, message, data));
    }
  }

  info(message: string, data?: unknown): void {
    if (this.shouldLog(LogLevel.INFO)) {
      console.log(this.formatMessage(LogLevel.INFO, message, data));
    }
  }

  warn(message: string, data?: unknown): void {
    if (this.shouldLog(LogLevel.WARN)) {
      console.warn(this.formatMessage(LogLevel.WARN, message, data));
    }
  }

  error(message: string, error?: unknown, data?: Record<string, unknown>): void {
    if (this.shouldLog(LogLevel.ERROR)) {
      const errorData = {
        ...data,
        error: error instanceof Error ? {
          name: error.name,
          message: error.message,
          stack: error.stack,
        } : error,
      };
      console.error(this.formatMessage(LogLevel.ERROR, message, errorData));
    }
  }

  /**
   * Create a child logger with additional context
   */
  child(additionalContext: LogContext): Logger {
    return new Logger({ ...this.context, ...additionalContext }, this.logLevel);
  }

  getLevel(): LogLevel {
    return this.logLevel;
  }

  /**
   * Log performance metrics
   */
  performance(operation: string, duration: number, data?: Record<string, unknown>): void {
    this.info(`Performance: ${operation}`, {
      operation,
      duration,
      unit: 'ms',
      ...data,
    });
  }
}

/**
 * Create a logger instance for an analysis component or handler
 */
export function createComponentLogger(functionName: string, requestId?: string): Logger {
  return new Logger({
    functionName,
    requestId: requestId || process.env.AWS_REQUEST_ID,
  });
}

/**
 * Time an async operation and report it through the logger
 */
export async function measurePerformance<T>(
  logger: Logger,
  operation: string,
  task: () => Promise<T>
): Promise<T> {
  const startTime = Date.now();
  try {
    const result = await task();
    logger.performance(operation, Date.now() - startTime);
    return result;
  } catch (error) {
    logger.performance(operation, Date.now() - startTime, { error: true });
    throw error;
  }
}
