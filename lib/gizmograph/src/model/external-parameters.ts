import { NodeValue } from '../types/utils';

/**
 * Key of a user-set node input: the pair (node id, input name).
 * Two parameters are equal iff both fields match.
 */
export class ExternalParameter {
  constructor(
    public readonly nodeId: string,
    public readonly paramName: string
  ) {}

  /**
   * Stable string form used for hashing
   */
  get key(): string {
    return JSON.stringify([this.nodeId, this.paramName]);
  }

  equals(other: ExternalParameter): boolean {
    return this.nodeId === other.nodeId && this.paramName === other.paramName;
  }

  toString(): string {
    return `${this.nodeId}.${this.paramName}`;
  }
}

interface ParameterEntry {
  readonly parameter: ExternalParameter;
  readonly value: NodeValue;
}

/**
 * Values of all external parameters, keyed by value-equal ExternalParameter.
 *
 * An evaluation pass borrows the instance it is given and hands the same
 * instance back in its result, so values written by gizmo hooks are visible
 * to the caller.
 */
export class ExternalParameterValues {
  private readonly entries = new Map<string, ParameterEntry>();

  constructor(initial?: Iterable<readonly [ExternalParameter, NodeValue]>) {
    if (initial) {
      for (const [parameter, value] of initial) {
        this.set(parameter, value);
      }
    }
  }

  /**
   * Builds the values from a nested record: `{ [nodeId]: { [paramName]: value } }`
   */
  static fromRecord(
    record: Readonly<Record<string, Readonly<Record<string, NodeValue>>>>
  ): ExternalParameterValues {
    const values = new ExternalParameterValues();
    for (const [nodeId, params] of Object.entries(record)) {
      for (const [paramName, value] of Object.entries(params)) {
        values.set(new ExternalParameter(nodeId, paramName), value);
      }
    }
    return values;
  }

  get size(): number {
    return this.entries.size;
  }

  has(parameter: ExternalParameter): boolean {
    return this.entries.has(parameter.key);
  }

  get(parameter: ExternalParameter): NodeValue | undefined {
    return this.entries.get(parameter.key)?.value;
  }

  /**
   * Looks up a value, distinguishing a stored `undefined` from a missing entry
   */
  lookup(parameter: ExternalParameter): { readonly found: true; readonly value: NodeValue } | { readonly found: false } {
    const entry = this.entries.get(parameter.key);
    return entry ? { found: true, value: entry.value } : { found: false };
  }

  set(parameter: ExternalParameter, value: NodeValue): this {
    this.entries.set(parameter.key, { parameter, value });
    return this;
  }

  delete(parameter: ExternalParameter): boolean {
    return this.entries.delete(parameter.key);
  }

  /**
   * Shallow copy: parameters are shared, values are not cloned
   */
  clone(): ExternalParameterValues {
    const copy = new ExternalParameterValues();
    for (const { parameter, value } of this.entries.values()) {
      copy.set(parameter, value);
    }
    return copy;
  }

  *[Symbol.iterator](): IterableIterator<[ExternalParameter, NodeValue]> {
    for (const { parameter, value } of this.entries.values()) {
      yield [parameter, value];
    }
  }

  /**
   * Parameters belonging to one node
   */
  forNode(nodeId: string): Array<[ExternalParameter, NodeValue]> {
    return [...this].filter(([parameter]) => parameter.nodeId === nodeId);
  }
}
