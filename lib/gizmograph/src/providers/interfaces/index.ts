export type { ILoggerProvider } from './logger';
