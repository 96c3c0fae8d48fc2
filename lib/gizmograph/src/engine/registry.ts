import type { IOperation, IOperationRegistry } from '../types/operation';

/**
 * Name-keyed table of operations, built once and read during evaluation
 */
export class OperationRegistry<TGizmo = unknown> implements IOperationRegistry<TGizmo> {
  private readonly operations = new Map<string, IOperation<TGizmo>>();

  constructor(operations: Iterable<IOperation<TGizmo>> = []) {
    for (const operation of operations) {
      this.register(operation);
    }
  }

  /**
   * Registers a new operation
   * @throws Error if an operation with the same name is already registered
   */
  register(operation: IOperation<TGizmo>): void {
    if (this.operations.has(operation.name)) {
      throw new Error(`Operation '${operation.name}' is already registered`);
    }
    this.operations.set(operation.name, operation);
  }

  /**
   * Gets operation by name, undefined when none is registered
   */
  get(name: string): IOperation<TGizmo> | undefined {
    return this.operations.get(name);
  }

  has(name: string): boolean {
    return this.operations.has(name);
  }

  getOperationNames(): IterableIterator<string> {
    return this.operations.keys();
  }

  public get size(): number {
    return this.operations.size;
  }

  clear(): void {
    this.operations.clear();
  }
}
