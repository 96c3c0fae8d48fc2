/**
 * Utility types for gizmograph
 * Collection of reusable type utilities
 */

import { isObservable } from 'rxjs';

/**
 * Type for node values (opaque to the evaluator)
 */
export type NodeValue = unknown;

/**
 * Mapping of named values, used for both operation inputs and outputs
 */
export type ValueMap = Readonly<Record<string, NodeValue>>;

/**
 * JSON-compatible value (non-circular, serializable)
 */
export type SerializableValue = string | number | boolean | null | undefined;

/**
 * Serializable type (no functions, symbols, etc.)
 */
export type Serializable =
  | SerializableValue
  | readonly Serializable[]
  | { readonly [key: string]: Serializable };

/**
 * Type guard for checking if value is an object
 */
export function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Type guard for checking if value is a function
 */
export function isFunction(value: unknown): value is (...args: readonly unknown[]) => unknown {
  return typeof value === 'function';
}

/**
 * Type guard for arrays, keeping element types of readonly arrays
 */
export function isSequence(value: unknown): value is readonly unknown[] {
  return Array.isArray(value);
}

/**
 * Type guard for thenables
 */
export function isPromiseLike(value: unknown): value is PromiseLike<unknown> {
  return isObject(value) && isFunction(value['then']);
}

/**
 * Type guard for object literals and `Object.create(null)` objects
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (!isObject(value)) {
    return false;
  }
  const prototype: unknown = Object.getPrototypeOf(value);
  return prototype === null || prototype === Object.prototype;
}

/**
 * Checks that value can be used as a mapping of named values.
 *
 * Only plain objects qualify. Class instances such as `Map`, promises and
 * observables keep their entries out of reach of own-property lookup.
 */
export function isValueMap(value: unknown): value is ValueMap {
  return isPlainObject(value);
}

/**
 * Own-property lookup, so that names such as `toString` never resolve
 * through the prototype chain
 */
export function hasOwnValue(map: ValueMap, name: string): boolean {
  return Object.prototype.hasOwnProperty.call(map, name);
}

/**
 * Describes the shape of a value for diagnostics
 */
export function describeValue(value: unknown): string {
  if (value === null) {
    return 'null';
  }
  if (Array.isArray(value)) {
    return 'array';
  }
  if (isPromiseLike(value)) {
    return 'promise';
  }
  if (isObservable(value)) {
    return 'observable';
  }
  if (isObject(value) && !isPlainObject(value)) {
    return constructorName(value) ?? 'object';
  }
  return typeof value;
}

function constructorName(value: object): string | undefined {
  const prototype: unknown = Object.getPrototypeOf(value);
  if (!isObject(prototype)) {
    return undefined;
  }
  const constructor = prototype['constructor'];
  return isFunction(constructor) && constructor.name ? constructor.name : undefined;
}
