import type { InterpreterOperator } from '../graph';
import type { ILoggerProvider } from '../providers/interfaces/logger';

/**
 * Registers a logger provider for the interpreter
 *
 * @param provider - Logger provider instance
 * @category Providers
 *
 * @example
 * ```typescript
 * const interpreter = createInterpreter(
 *   withLoggerProvider(new ConsoleLoggerProvider({ level: LogLevel.DEBUG })),
 *   withOperations(operations)
 * );
 * ```
 */
export function withLoggerProvider(provider: ILoggerProvider): InterpreterOperator {
  return definition => ({
    ...definition,
    providers: {
      ...definition.providers,
      logger: provider,
    },
  });
}
