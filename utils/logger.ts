/**
 * Environment-aware console logger.
 * Development builds log everything; production builds log warnings and errors
 * unless VITE_LOG_LEVEL says otherwise.
 */

export enum LogLevel {
  ERROR = 0,
  WARN = 1,
  INFO = 2,
  DEBUG = 3,
}

export interface LogContext {
  component?: string;
  action?: string;
  itemId?: string;
  [key: string]: unknown;
}

const parseLevel = (value: string | undefined): LogLevel | null => {
  switch (value?.trim().toUpperCase()) {
    case 'ERROR':
      return LogLevel.ERROR;
    case 'WARN':
      return LogLevel.WARN;
    case 'INFO':
      return LogLevel.INFO;
    case 'DEBUG':
      return LogLevel.DEBUG;
    default:
      return null;
  }
};

export class Logger {
  private logLevel: LogLevel;

  constructor(level?: LogLevel) {
    const isDevelopment = import.meta.env.DEV;
    this.logLevel = level
      ?? parseLevel(import.meta.env.VITE_LOG_LEVEL)
      ?? (isDevelopment ? LogLevel.DEBUG : LogLevel.WARN);
  }

  setLevel(level: LogLevel): void {
    this.logLevel = level;
  }

  private shouldLog(level: LogLevel): boolean {
    return level <= this.logLevel;
  }

  private formatMessage(level: string, message: string, context?: LogContext): string {
    const timestamp = new Date().toISOString();
    const prefix = `[${timestamp}] [${level}]`;

    if (context) {
      const contextStr = Object.entries(context)
        .filter(([, value]) => value !== undefined)
        .map(([key, value]) => `${key}=${String(value)}`)
        .join(' ');
      return `${prefix} ${message} | ${contextStr}`;
    }

    return `${prefix} ${message}`;
  }

  error(message: string, error?: unknown, context?: LogContext): void {
    if (!this.shouldLog(LogLevel.ERROR)) return;

    console.error(this.formatMessage('ERROR', message, context));
    if (error !== undefined) {
      console.error('Error details:', error);
    }
  }

  warn(message: string, context?: LogContext): void {
    if (!this.shouldLog(LogLevel.WARN)) return;
    console.warn(this.formatMessage('WARN', message, context));
  }

  info(message: string, context?: LogContext): void {
    if (!this.shouldLog(LogLevel.INFO)) return;
    console.info(this.formatMessage('INFO', message, context));
  }

  debug(message: string, data?: unknown, context?: LogContext): void {
    if (!this.shouldLog(LogLevel.DEBUG)) return;

    console.log(this.formatMessage('DEBUG', message, context));
    if (data !== undefined) {
      console.log('Debug data:', data);
    }
  }
}

export const logger = new Logger();
