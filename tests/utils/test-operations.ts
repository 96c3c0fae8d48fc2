import type { INodeDefinition, INodeInput } from '../../lib/gizmograph/src/types/graph-definition';
import type { IOperation } from '../../lib/gizmograph/src/types/operation';
import type { ValueMap } from '../../lib/gizmograph/src/types/utils';

/**
 * Shorthand for node definitions in tests
 */
export function node(
  id: string,
  opName: string,
  inputs: readonly INodeInput[] = [],
  returnValue?: string
): INodeDefinition {
  return returnValue === undefined ? { id, opName, inputs } : { id, opName, inputs, returnValue };
}

/**
 * Operation whose calls are recorded by a jest mock
 */
export function mockOperation<TGizmo = unknown>(
  name: string,
  implementation: (inputs: ValueMap) => ValueMap
): IOperation<TGizmo> & { call: jest.Mock<ValueMap, [ValueMap]> } {
  return { name, call: jest.fn(implementation) };
}

/**
 * Returns its inputs as outputs
 */
export function echoOperation<TGizmo = unknown>(
  name = 'Echo'
): IOperation<TGizmo> & { call: jest.Mock<ValueMap, [ValueMap]> } {
  return mockOperation<TGizmo>(name, inputs => ({ ...inputs }));
}

/**
 * Produces a fixed output map
 */
export function constantOperation(
  name: string,
  outputs: ValueMap
): IOperation & { call: jest.Mock<ValueMap, [ValueMap]> } {
  return mockOperation(name, () => outputs);
}

/**
 * Sums all numeric inputs into `sum`
 */
export function sumOperation(name = 'Sum'): IOperation & { call: jest.Mock<ValueMap, [ValueMap]> } {
  return mockOperation(name, inputs => ({
    sum: Object.values(inputs).reduce<number>(
      (total, value) => total + (typeof value === 'number' ? value : 0),
      0
    ),
  }));
}

/**
 * Passes a value of the wrong shape through a typed slot, as an untyped operation would
 */
export function malformed<T>(value: unknown): T {
  return value as T;
}
