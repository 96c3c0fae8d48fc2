import type { ExternalParameterValues } from '../model/external-parameters';
import type { ILoggerProvider } from '../providers/interfaces/logger';
import { EvaluationEventType } from '../types/evaluation-hooks';
import { GizmoConfig } from '../types/gizmo-config';
import type { IGraph } from '../types/graph-definition';
import {
  DEFAULT_INTERPRETER_OPTIONS,
  IInterpreterOptions,
  RenderableConverter,
} from '../types/interpreter-options';
import type { IOperationRegistry } from '../types/operation';
import type { ProgramResult } from '../types/program-result';
import { NodeValue, hasOwnValue } from '../types/utils';
import {
  InternalInvariantError,
  MissingReturnOutputError,
  RenderableConversionError,
  isNodeError,
  toError,
} from '../utils/node-error';
import { LoggerManager } from '../utils/logging';
import { EvaluationContext } from './evaluation-context';
import type { EvaluationHookManager } from './hook-manager';
import { runNode } from './node-executor';

/**
 * Options of a single `runGraph` call
 */
export interface RunGraphOptions<TRenderable = NodeValue> extends IInterpreterOptions<TRenderable> {
  /** Defaults to the LoggerManager logger */
  readonly logger?: ILoggerProvider;
  readonly hooks?: EvaluationHookManager;
}

/**
 * Evaluates the graph for one target node.
 *
 * Runs the target and every node it transitively depends on, each at most
 * once, then reads the target's `returnValue` output. The external parameter
 * values are handed back in the result, including any change made by gizmo hooks.
 *
 * @example
 * ```typescript
 * const result = runGraph(graph, 'mesh', values, registry, GizmoConfig.out());
 * result.renderable; // target's return output
 * result.updatedGizmos; // target's post-hook gizmos
 * ```
 */
export function runGraph<TGizmo = unknown>(
  graph: IGraph,
  targetNode: string,
  externalValues: ExternalParameterValues,
  registry: IOperationRegistry<TGizmo>,
  gizmoConfig: GizmoConfig<TGizmo>,
  options?: RunGraphOptions<NodeValue>
): ProgramResult<NodeValue, TGizmo>;
export function runGraph<TRenderable, TGizmo = unknown>(
  graph: IGraph,
  targetNode: string,
  externalValues: ExternalParameterValues,
  registry: IOperationRegistry<TGizmo>,
  gizmoConfig: GizmoConfig<TGizmo>,
  options: RunGraphOptions<TRenderable> & { readonly toRenderable: RenderableConverter<TRenderable> }
): ProgramResult<TRenderable, TGizmo>;
export function runGraph<TGizmo>(
  graph: IGraph,
  targetNode: string,
  externalValues: ExternalParameterValues,
  registry: IOperationRegistry<TGizmo>,
  gizmoConfig: GizmoConfig<TGizmo>,
  options: RunGraphOptions<NodeValue> = {}
): ProgramResult<NodeValue, TGizmo> {
  const logger: ILoggerProvider = options.logger ?? LoggerManager.getInstance().getLogger();
  const hooks = options.hooks;

  const ctx = new EvaluationContext<TGizmo>({
    targetNode,
    externalValues,
    registry,
    gizmoConfig,
    detectCycles: options.detectCycles ?? DEFAULT_INTERPRETER_OPTIONS.detectCycles,
    logger,
    hooks,
  });

  hooks?.emit(EvaluationEventType.EVALUATION_STARTED, targetNode);
  logger.debug(`Evaluating graph for target node ${targetNode}`);

  try {
    const evaluate = (): NodeValue | undefined =>
      evaluateTarget(graph, ctx, options.toRenderable);
    const renderable = logger.measureTime
      ? logger.measureTime('evaluation', 'run-graph', evaluate)
      : evaluate();

    hooks?.emit(EvaluationEventType.EVALUATION_COMPLETED, {
      targetNode,
      executedNodes: ctx.executedNodes,
      hasRenderable: renderable !== undefined,
    });
    logger.debug(`Evaluated ${ctx.executedNodes} node(s) for target node ${targetNode}`);

    return {
      renderable,
      updatedGizmos: ctx.gizmosEnabled ? ctx.gizmoOutputs : undefined,
      updatedValues: externalValues,
    };
  } catch (error) {
    const cause = toError(error);
    logger.error(
      isNodeError(cause)
        ? `Evaluation of target node ${targetNode} failed at node ${cause.nodeId}`
        : `Evaluation of target node ${targetNode} failed`,
      cause
    );
    hooks?.emit(EvaluationEventType.EVALUATION_FAILED, targetNode, cause);
    throw error;
  }
}

function evaluateTarget<TGizmo>(
  graph: IGraph,
  ctx: EvaluationContext<TGizmo>,
  toRenderable: RenderableConverter<NodeValue> | undefined
): NodeValue | undefined {
  const targetNode = ctx.targetNode;
  const target = graph.getNode(targetNode);

  runNode(graph, ctx, targetNode);

  const outputs = ctx.outputsCache.get(targetNode);
  if (!outputs) {
    throw new InternalInvariantError(targetNode, 'Final node should be in the outputs cache');
  }

  const returnValue = target.returnValue;
  if (returnValue === undefined) {
    return undefined;
  }
  if (!hasOwnValue(outputs, returnValue)) {
    throw new MissingReturnOutputError(targetNode, returnValue);
  }

  const value = outputs[returnValue];
  if (!toRenderable) {
    return value;
  }
  try {
    return toRenderable(value, targetNode);
  } catch (error) {
    throw new RenderableConversionError(targetNode, toError(error));
  }
}
