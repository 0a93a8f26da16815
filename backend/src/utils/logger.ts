/**
 * Levelled console logger with timestamps and a per-module tag
 */

export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

const levelPriority: Record<LogLevel, number> = {
  DEBUG: 0,
  INFO: 1,
  WARN: 2,
  ERROR: 3,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(levelPriority, value);
}

const fromEnv = (process.env.LOG_LEVEL || '').toUpperCase();
let defaultLevel: LogLevel = isLogLevel(fromEnv) ? fromEnv : 'INFO';

// Applies to every logger created without an explicit level
export function setDefaultLogLevel(level: LogLevel): void {
  defaultLevel = level;
}

export class Logger {
  private name: string;
  private minLevel?: LogLevel;

  constructor(name: string, minLevel?: LogLevel) {
    this.name = name;
    this.minLevel = minLevel;
  }

  private shouldLog(level: LogLevel): boolean {
    return levelPriority[level] >= levelPriority[this.minLevel ?? defaultLevel];
  }

  format(level: LogLevel, message: string, context?: Record<string, unknown>): string {
    const timestamp = new Date().toISOString();
    const contextStr = context && Object.keys(context).length > 0 ? ` ${JSON.stringify(context)}` : '';
    return `[${timestamp}] [${level}] [${this.name}] ${message}${contextStr}`;
  }

  private log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    if (!this.shouldLog(level)) return;

    const formatted = this.format(level, message, context);

    switch (level) {
      case 'ERROR':
        console.error(formatted);
        break;
      case 'WARN':
        console.warn(formatted);
        break;
      case 'DEBUG':
        console.debug(formatted);
        break;
      default:
        console.log(formatted);
    }
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log('DEBUG', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log('INFO', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log('WARN', message, context);
  }

  error(message: string, error?: unknown, context?: Record<string, unknown>): void {
    const errorContext: Record<string, unknown> = { ...context };

    if (error instanceof Error) {
      errorContext.error = { name: error.name, message: error.message };
    } else if (error !== undefined) {
      errorContext.error = String(error);
    }

    this.log('ERROR', message, errorContext);
  }
}

export const createLogger = (name: string, minLevel?: LogLevel): Logger => new Logger(name, minLevel);
