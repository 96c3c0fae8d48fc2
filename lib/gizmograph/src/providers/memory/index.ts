export { ConsoleLoggerProvider } from './logger';
