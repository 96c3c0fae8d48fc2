import type { ILogger } from '../../types/logger';
import type { Serializable } from '../../types/utils';

/**
 * Logger provider interface for the Build API.
 * Extends the core ILogger with the optional event and timing helpers
 * the interpreter uses when they are present.
 * @category Providers
 */
export interface ILoggerProvider extends ILogger {
  logEvent?(
    category: string,
    eventName: string,
    metadata?: Readonly<Record<string, Serializable>>
  ): void;
  measureTime?<T>(category: string, operation: string, action: () => T): T;
}
