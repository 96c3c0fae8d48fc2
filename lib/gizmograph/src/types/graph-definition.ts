import { Serializable } from './utils';

/**
 * Input fed by another node's output
 */
export interface ConnectionDependency {
  readonly kind: 'connection';
  /** Producer node id */
  readonly node: string;
  /** Name of the producer's output */
  readonly paramName: string;
}

/**
 * Input set by the user and stored in the external parameter values.
 * `promoted` marks inputs exposed upward for editing and does not affect evaluation.
 */
export interface ExternalDependency {
  readonly kind: 'external';
  readonly promoted: boolean;
}

/**
 * Where a node input takes its value from
 */
export type DependencyKind = ConnectionDependency | ExternalDependency;

/**
 * Named input of a node
 */
export interface INodeInput {
  readonly name: string;
  readonly kind: DependencyKind;
}

/**
 * Definition of a node in the computation graph
 */
export interface INodeDefinition {
  readonly id: string;
  /** Name resolved against the operation registry */
  readonly opName: string;
  readonly inputs: readonly INodeInput[];
  /**
   * Output returned as the graph's result when this node is the evaluation target
   */
  readonly returnValue?: string;
}

/**
 * Graph definition for serialization and export
 */
export interface IGraphDefinition {
  readonly nodes: readonly INodeDefinition[];
  readonly metadata?: {
    readonly version?: string;
    readonly description?: string;
    readonly [key: string]: Serializable;
  };
}

/**
 * Read-only view of a graph used during evaluation
 */
export interface IGraph {
  /**
   * @throws UnknownNodeError if no node has this id
   */
  getNode(nodeId: string): INodeDefinition;
  hasNode(nodeId: string): boolean;
}

/**
 * Creates a connection dependency
 */
export function connection(node: string, paramName: string): ConnectionDependency {
  return { kind: 'connection', node, paramName };
}

/**
 * Creates an external dependency
 */
export function external(promoted = false): ExternalDependency {
  return { kind: 'external', promoted };
}
