/**
 * Providers - interfaces and in-memory implementations
 */
export type { ILoggerProvider } from './interfaces';
export { ConsoleLoggerProvider } from './memory';
