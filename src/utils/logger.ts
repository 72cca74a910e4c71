// Utility: Structured logger
// One JSON line per entry, tagged by component

export interface LogContext {
  [key: string]: string | number | boolean | undefined;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

/**
 * Simple structured logger writing to the console
 */
export class ConsoleLogger implements Logger {
  private prefix: string;
  private tag: string;

  constructor(prefix: string, tag: string = prefix.toUpperCase()) {
    this.prefix = prefix;
    this.tag = tag;
  }

  private log(level: LogLevel, message: string, context?: LogContext): void {
    const timestamp = new Date().toISOString();
    const logEntry = {
      timestamp,
      level,
      component: this.prefix,
      message,
      ...context,
    };

    const formatted = JSON.stringify(logEntry);
    if (level === 'error') {
      console.error(`[${this.tag}] ${formatted}`);
    } else if (level === 'warn') {
      console.warn(`[${this.tag}] ${formatted}`);
    } else {
      console.log(`[${this.tag}] ${formatted}`);
    }
  }

  info(message: string, context?: LogContext): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log('warn', message, context);
  }

  error(message: string, context?: LogContext): void {
    this.log('error', message, context);
  }

  debug(message: string, context?: LogContext): void {
    if (process.env.NODE_ENV !== 'production' && process.env.COMBAT_DEBUG === '1') {
      this.log('debug', message, context);
    }
  }
}

/**
 * Discards everything. Default when an engine is built without a logger.
 */
export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

/**
 * Encounter engine logger instance
 */
export const engineLogger = new ConsoleLogger('EncounterEngine', 'COMBAT');

/**
 * HTTP driver logger instance
 */
export const apiLogger = new ConsoleLogger('EncounterApi', 'API');
