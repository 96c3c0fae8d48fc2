import type { IGraph, IGraphDefinition, INodeDefinition } from '../types/graph-definition';
import { UnknownNodeError } from '../utils/node-error';

/**
 * Indexed, read-only graph built from node definitions.
 *
 * Node ids must be unique. Acyclicity is not checked here; the evaluator
 * guards against cycles while it runs.
 */
export class GraphModel implements IGraph {
  private readonly nodes = new Map<string, INodeDefinition>();

  /**
   * @throws Error if two definitions share an id
   */
  constructor(nodes: Iterable<INodeDefinition>) {
    for (const node of nodes) {
      if (this.nodes.has(node.id)) {
        throw new Error(`Node with id '${node.id}' is already defined`);
      }
      this.nodes.set(node.id, node);
    }
  }

  static fromDefinition(definition: IGraphDefinition): GraphModel {
    return new GraphModel(definition.nodes);
  }

  getNode(nodeId: string): INodeDefinition {
    const node = this.nodes.get(nodeId);
    if (!node) {
      throw new UnknownNodeError(nodeId);
    }
    return node;
  }

  hasNode(nodeId: string): boolean {
    return this.nodes.has(nodeId);
  }

  getNodeIds(): IterableIterator<string> {
    return this.nodes.keys();
  }

  public get size(): number {
    return this.nodes.size;
  }

  toDefinition(): IGraphDefinition {
    return { nodes: [...this.nodes.values()] };
  }
}
