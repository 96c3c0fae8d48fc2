import type { ILoggerProvider } from '../providers/interfaces/logger';
import type { IInterpreterOptions } from '../types/interpreter-options';
import type { IOperation } from '../types/operation';

/**
 * Provider registry for IoC pattern
 * Contains all registered providers for the interpreter
 * @category Providers
 */
export interface ProviderRegistry {
  readonly logger?: ILoggerProvider;
}

/**
 * Interpreter definition for Build API
 * Immutable configuration the operators build up
 */
export interface InterpreterDefinition {
  readonly operations: ReadonlyMap<string, IOperation>;
  readonly providers: ProviderRegistry;
  readonly options: IInterpreterOptions;
}

/**
 * Interpreter operator function
 * Transforms an interpreter definition, adding operations, providers or options
 */
export interface InterpreterOperator {
  (definition: InterpreterDefinition): InterpreterDefinition;
}
