import type { InterpreterOperator } from '../graph';
import type { IInterpreterOptions } from '../types/interpreter-options';

/**
 * Sets evaluation options; later calls override earlier ones field by field
 *
 * @param options - Interpreter options
 * @throws Error if options is empty or invalid
 *
 * @example
 * ```typescript
 * const interpreter = createInterpreter(
 *   withOperations(operations),
 *   withOptions({
 *     detectCycles: true,
 *     toRenderable: value => Mesh.from(value),
 *   })
 * );
 * ```
 */
export function withOptions(options: IInterpreterOptions): InterpreterOperator {
  if (!options || typeof options !== 'object') {
    throw new Error('withOptions: options must be an object');
  }

  if (
    options.detectCycles === undefined &&
    options.logLevel === undefined &&
    options.toRenderable === undefined
  ) {
    throw new Error(
      'withOptions: at least one of detectCycles, logLevel, or toRenderable must be provided'
    );
  }

  if (options.toRenderable !== undefined && typeof options.toRenderable !== 'function') {
    throw new Error('withOptions: toRenderable must be a function');
  }

  return definition => ({
    ...definition,
    options: {
      ...definition.options,
      ...options,
    },
  });
}
