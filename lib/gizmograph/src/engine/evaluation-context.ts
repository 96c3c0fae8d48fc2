import type { ExternalParameterValues } from '../model/external-parameters';
import type { ILoggerProvider } from '../providers/interfaces/logger';
import { GizmoConfig } from '../types/gizmo-config';
import type { IOperation, IOperationRegistry } from '../types/operation';
import type { ValueMap } from '../types/utils';
import { CycleDetectedError } from '../utils/node-error';
import type { EvaluationHookManager } from './hook-manager';

export interface EvaluationContextInit<TGizmo> {
  readonly targetNode: string;
  readonly externalValues: ExternalParameterValues;
  readonly registry: IOperationRegistry<TGizmo>;
  readonly gizmoConfig: GizmoConfig<TGizmo>;
  readonly detectCycles: boolean;
  readonly logger: ILoggerProvider;
  readonly hooks?: EvaluationHookManager;
}

/**
 * Mutable state of one evaluation pass.
 *
 * Created by the graph runner and passed by reference through the recursive
 * node executor. The output cache and the gizmo accumulator live only as long
 * as the pass; the external parameter values are borrowed from the caller.
 */
export class EvaluationContext<TGizmo = unknown> {
  /** Node id → output map; entries are never replaced within a pass */
  public readonly outputsCache = new Map<string, ValueMap>();
  public readonly targetNode: string;
  public readonly externalValues: ExternalParameterValues;
  public readonly registry: IOperationRegistry<TGizmo>;
  public readonly gizmoConfig: GizmoConfig<TGizmo>;
  public readonly gizmosEnabled: boolean;
  public readonly logger: ILoggerProvider;
  public readonly hooks?: EvaluationHookManager;

  /** Gizmos produced by the target's post-hook */
  public gizmoOutputs: TGizmo[] = [];

  private readonly detectCycles: boolean;
  // Nodes whose inputs are being resolved, outermost first
  private readonly visiting: string[] = [];
  private executed = 0;

  constructor(init: EvaluationContextInit<TGizmo>) {
    this.targetNode = init.targetNode;
    this.externalValues = init.externalValues;
    this.registry = init.registry;
    this.gizmoConfig = init.gizmoConfig;
    this.gizmosEnabled = GizmoConfig.isEnabled(init.gizmoConfig);
    this.detectCycles = init.detectCycles;
    this.logger = init.logger;
    this.hooks = init.hooks;
  }

  /**
   * Number of operations executed so far in this pass
   */
  public get executedNodes(): number {
    return this.executed;
  }

  /**
   * Whether gizmo hooks apply to this node's operation
   */
  runsGizmosFor(nodeId: string, operation: IOperation<TGizmo>): boolean {
    return this.gizmosEnabled && nodeId === this.targetNode && operation.hasGizmo === true;
  }

  /**
   * Marks the node as having its dependencies resolved
   * @throws CycleDetectedError if the node is already being resolved
   */
  enter(nodeId: string): void {
    if (!this.detectCycles) {
      return;
    }
    const index = this.visiting.indexOf(nodeId);
    if (index !== -1) {
      throw new CycleDetectedError(nodeId, [...this.visiting.slice(index), nodeId]);
    }
    this.visiting.push(nodeId);
  }

  leave(nodeId: string): void {
    if (this.detectCycles && this.visiting[this.visiting.length - 1] === nodeId) {
      this.visiting.pop();
    }
  }

  recordOutputs(nodeId: string, outputs: ValueMap): void {
    this.outputsCache.set(nodeId, outputs);
    this.executed++;
  }
}
