import { LogLevel } from '../../types/logger';
import { Serializable } from '../../types/utils';
import { LoggerAdapter } from './logger-adapter';

/**
 * Adapter for console logging with additional capabilities:
 * - storing log history in memory
 * - logging events with metadata
 * - measuring operation execution time
 */
export class ConsoleLoggerAdapter extends LoggerAdapter {
  private logStorage: string[] = [];
  private maxLogSize = 100;

  log(level: LogLevel, message: string, ...args: readonly unknown[]): void {
    if (!this.isLevelEnabled(level)) {
      return;
    }

    const timestamp = new Date().toISOString();
    const formattedMessage = `[${timestamp}] ${this.getLevelPrefix(level)}: ${message}`;

    /* eslint-disable no-console */
    switch (level) {
      case LogLevel.DEBUG:
        console.debug(formattedMessage, ...args);
        break;
      case LogLevel.INFO:
        console.info(formattedMessage, ...args);
        break;
      case LogLevel.WARN:
        console.warn(formattedMessage, ...args);
        break;
      case LogLevel.ERROR:
        console.error(formattedMessage, ...args);
        break;
      case LogLevel.FATAL:
        console.error(`FATAL ${formattedMessage}`, ...args);
        break;
      default:
        console.log(formattedMessage, ...args);
    }
    /* eslint-enable no-console */

    this.addToStorage(formattedMessage);
  }

  /**
   * Returns text prefix for logging level
   */
  private getLevelPrefix(level: LogLevel): string {
    switch (level) {
      case LogLevel.DEBUG:
        return 'DEBUG';
      case LogLevel.INFO:
        return 'INFO';
      case LogLevel.WARN:
        return 'WARN';
      case LogLevel.ERROR:
        return 'ERROR';
      case LogLevel.FATAL:
        return 'FATAL';
      default:
        return 'LOG';
    }
  }

  private addToStorage(message: string): void {
    this.logStorage.push(message);

    // Remove old entries if limit exceeded
    if (this.logStorage.length > this.maxLogSize) {
      this.logStorage.shift();
    }
  }

  /**
   * Sets maximum size of stored logs
   */
  setMaxLogSize(size: number): void {
    this.maxLogSize = size > 0 ? size : 100;
  }

  clear(): void {
    this.logStorage = [];
  }

  /**
   * Returns all log entries
   */
  getLogs(): string[] {
    return [...this.logStorage];
  }

  /**
   * Logs event with metadata
   * @param category Event category (e.g., 'evaluation', 'registry')
   * @param eventName Event name
   * @param metadata Additional metadata
   */
  logEvent(
    category: string,
    eventName: string,
    metadata?: Readonly<Record<string, Serializable>>
  ): void {
    if (!this.isLevelEnabled(LogLevel.INFO)) {
      return;
    }

    let message = `[EVENT][${category}][${eventName}]`;

    if (metadata) {
      try {
        message += ` ${JSON.stringify(metadata)}`;
      } catch (error) {
        message += ` (metadata serialization error: ${error instanceof Error ? error.message : String(error)})`;
      }
    }

    this.log(LogLevel.INFO, message);
  }

  /**
   * Measures operation execution time and logs result
   * @param category Operation category
   * @param operation Operation name
   * @param action Function to execute
   * @returns Function execution result
   */
  measureTime<T>(category: string, operation: string, action: () => T): T {
    const start = performance.now();
    try {
      const result = action();
      const duration = performance.now() - start;
      this.logEvent(category, operation, { duration: `${duration.toFixed(2)}ms` });
      return result;
    } catch (error) {
      const duration = performance.now() - start;
      this.logEvent(category, `${operation}:error`, {
        duration: `${duration.toFixed(2)}ms`,
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }
  }

  /**
   * Extended version of error method with error stack support
   */
  public override error(message: string, ...args: readonly unknown[]): void {
    const errorObj = args.find((arg): arg is Error => arg instanceof Error);
    const otherArgs = args.filter(arg => !(arg instanceof Error));

    const fullMessage = errorObj ? `${message}: ${errorObj.message}` : message;

    this.log(LogLevel.ERROR, fullMessage, ...otherArgs);

    // Additionally log stack if it exists
    if (errorObj?.stack) {
      this.log(LogLevel.DEBUG, `Stack: ${errorObj.stack}`);
    }
  }
}
