import type { Observable } from 'rxjs';
import { EvaluationHookManager } from '../engine/hook-manager';
import { OperationRegistry } from '../engine/registry';
import { runGraph } from '../engine/graph-runner';
import { ExternalParameterValues } from '../model/external-parameters';
import { GraphModel } from '../model/graph-model';
import type { ILoggerProvider } from '../providers/interfaces/logger';
import { LoggerManager } from '../utils/logging';
import type {
  EvaluationEvent,
  EvaluationEventHandlers,
  UnsubscribeFn,
} from '../types/evaluation-hooks';
import { GizmoConfig } from '../types/gizmo-config';
import type { IGraph, IGraphDefinition } from '../types/graph-definition';
import type { ProgramResult } from '../types/program-result';
import type { InterpreterDefinition, InterpreterOperator } from './operator-types';

/**
 * Creates a new interpreter from operators
 *
 * @example
 * ```typescript
 * const interpreter = createInterpreter(
 *   withOperations([valueOp, addOp]),
 *   withLoggerProvider(new ConsoleLoggerProvider({ level: LogLevel.INFO }))
 * );
 *
 * const result = interpreter.run(graph, 'sum', values);
 * ```
 */
export function createInterpreter(...operators: readonly InterpreterOperator[]): GraphInterpreter {
  let definition: InterpreterDefinition = {
    operations: new Map(),
    providers: {},
    options: {},
  };

  for (const operator of operators) {
    definition = operator(definition);
  }

  return new GraphInterpreter(definition);
}

function isGraph(graph: IGraph | IGraphDefinition): graph is IGraph {
  return 'getNode' in graph && typeof graph.getNode === 'function';
}

/**
 * Evaluates graphs against a fixed set of operations and providers.
 * Every `run` is an independent pass; nothing is cached between runs.
 */
export class GraphInterpreter {
  private readonly registry: OperationRegistry;
  private readonly hooks = new EvaluationHookManager();
  private readonly logger: ILoggerProvider;
  private isDestroyed = false;

  constructor(private readonly definition: InterpreterDefinition) {
    this.registry = new OperationRegistry(definition.operations.values());
    // Without a provider, runs log through the LoggerManager default logger
    this.logger = definition.providers.logger ?? LoggerManager.getInstance().getLogger();
    if (definition.options.logLevel !== undefined) {
      this.logger.setLevel(definition.options.logLevel);
    }
  }

  public get destroyed(): boolean {
    return this.isDestroyed;
  }

  /**
   * Stream of evaluation events of all runs
   */
  public get events$(): Observable<EvaluationEvent> {
    return this.hooks.events$;
  }

  /**
   * Runs one evaluation pass
   *
   * @param graph - Graph, or a plain definition indexed on each call
   * @param targetNode - Node whose return output is computed
   * @param externalValues - Values of external inputs, handed back in the result
   * @param gizmoConfig - Gizmo handling, disabled by default
   * @throws NodeError subclasses describing the first failure
   */
  run(
    graph: IGraph | IGraphDefinition,
    targetNode: string,
    externalValues: ExternalParameterValues = new ExternalParameterValues(),
    gizmoConfig: GizmoConfig = GizmoConfig.ignore()
  ): ProgramResult {
    if (this.isDestroyed) {
      throw new Error('Interpreter has been destroyed');
    }

    const model = isGraph(graph) ? graph : GraphModel.fromDefinition(graph);
    const { detectCycles, toRenderable } = this.definition.options;

    return runGraph(model, targetNode, externalValues, this.registry, gizmoConfig, {
      detectCycles,
      toRenderable,
      logger: this.logger,
      hooks: this.hooks,
    });
  }

  /**
   * Subscribe to an evaluation event
   * @returns Function to unsubscribe
   */
  on<K extends keyof EvaluationEventHandlers>(
    eventType: K,
    handler: EvaluationEventHandlers[K]
  ): UnsubscribeFn {
    return this.hooks.on(eventType, handler);
  }

  hasOperation(name: string): boolean {
    return this.registry.has(name);
  }

  getOperationNames(): string[] {
    return [...this.registry.getOperationNames()];
  }

  /**
   * Completes the event stream and rejects further runs
   */
  destroy(): void {
    if (this.isDestroyed) {
      return;
    }
    this.hooks.destroy();
    this.isDestroyed = true;
  }
}
