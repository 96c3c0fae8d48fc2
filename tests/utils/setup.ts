/**
 * Configuration for test environment setup
 */
import { LoggerManager } from '../../lib/gizmograph/src/utils/logging';
import { LogLevel } from '../../lib/gizmograph/src/types/logger';
import { TestLoggerAdapter } from './test-logger-adapter';

// Default logger of every interpreter without a logger provider
const testLogger = new TestLoggerAdapter(LogLevel.OFF);
LoggerManager.getInstance().setLogger(testLogger);

process.env.NODE_ENV = 'test';

beforeEach(() => {
  testLogger.clear();
});
