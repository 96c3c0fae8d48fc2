import type { InterpreterOperator } from '../graph';
import type { IOperation } from '../types/operation';

/**
 * Registers operations nodes can refer to by name
 *
 * @param operations - Operations to register
 * @throws Error if the list is empty, an entry has no `call`, or a name is registered twice
 *
 * @example
 * ```typescript
 * const interpreter = createInterpreter(
 *   withOperations([
 *     { name: 'Add', call: ({ a, b }) => ({ sum: Number(a) + Number(b) }) },
 *   ])
 * );
 * ```
 */
export function withOperations(operations: readonly IOperation[]): InterpreterOperator {
  if (!Array.isArray(operations) || operations.length === 0) {
    throw new Error('withOperations: operations must be a non-empty array');
  }

  for (const operation of operations) {
    if (!operation.name) {
      throw new Error('withOperations: every operation must have a name');
    }
    if (typeof operation.call !== 'function') {
      throw new Error(`withOperations: operation '${operation.name}' must have a call function`);
    }
  }

  return definition => {
    const registered = new Map(definition.operations);
    for (const operation of operations) {
      if (registered.has(operation.name)) {
        throw new Error(`withOperations: operation '${operation.name}' is already registered`);
      }
      registered.set(operation.name, operation);
    }
    return {
      ...definition,
      operations: registered,
    };
  };
}
