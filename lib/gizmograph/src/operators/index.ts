/**
 * Build API Operators
 */
export { withOperations } from './with-operations';
export { withOptions } from './with-options';

// IoC Provider operators (Inversion of Control)
export { withLoggerProvider } from './with-logger';
