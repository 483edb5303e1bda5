/**
 * Structured console logging shared by every service
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogContext = Record<string, unknown>;

export interface LoggerService {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

/**
 * Console-backed logger tagged with the emitting component
 */
export class ConsoleLogger implements LoggerService {
  private readonly component: string;
  private readonly level: LogLevel;

  constructor(component: string, level: LogLevel = 'info') {
    this.component = component;
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  /**
   * Derives a logger for a sub-component that shares this logger's level
   */
  child(component: string): ConsoleLogger {
    return new ConsoleLogger(`${this.component}:${component}`, this.level);
  }

  debug(message: string, context?: LogContext): void {
    this.write('debug', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.write('info', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.write('warn', message, context);
  }

  error(message: string, context?: LogContext): void {
    this.write('error', message, context);
  }

  private write(level: LogLevel, message: string, context?: LogContext): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.level]) {
      return;
    }

    const line = `${new Date().toISOString()} ${level.toUpperCase()} [${this.component}] ${message}`;
    const args: unknown[] = context && Object.keys(context).length > 0 ? [line, context] : [line];

    switch (level) {
      case 'debug':
        console.debug(...args);
        break;
      case 'info':
        console.info(...args);
        break;
      case 'warn':
        console.warn(...args);
        break;
      case 'error':
        console.error(...args);
        break;
    }
  }
}

/**
 * Logger that discards everything; used where a caller opts out of output
 */
export const silentLogger: LoggerService = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined
};
