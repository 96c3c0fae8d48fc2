import { ExternalParameter } from '../model/external-parameters';
import { EvaluationEventType } from '../types/evaluation-hooks';
import type { IGraph, INodeDefinition } from '../types/graph-definition';
import type { IOperation } from '../types/operation';
import { NodeValue, ValueMap, describeValue, hasOwnValue, isSequence, isValueMap } from '../types/utils';
import {
  GizmoHookMissingError,
  MissingCachedOutputError,
  MissingExternalParameterError,
  OperationContractViolationError,
  OperationFailedError,
  UnknownNodeError,
  UnknownOperationError,
  isNodeError,
  toError,
} from '../utils/node-error';
import type { EvaluationContext } from './evaluation-context';

/**
 * Ensures the node's outputs are in the cache, running the node and
 * whatever it depends on that has not run yet in this pass.
 */
export function runNode<TGizmo>(graph: IGraph, ctx: EvaluationContext<TGizmo>, nodeId: string): void {
  if (ctx.outputsCache.has(nodeId)) {
    ctx.logger.debug(`Cache hit for node ${nodeId}`);
    ctx.hooks?.emit(EvaluationEventType.CACHE_HIT, nodeId);
    return;
  }

  const node = graph.getNode(nodeId);
  const operation = ctx.registry.get(node.opName);
  if (!operation) {
    throw new UnknownOperationError(nodeId, node.opName);
  }

  let inputs: ValueMap;
  ctx.enter(nodeId);
  try {
    inputs = resolveInputs(graph, ctx, node);
  } finally {
    ctx.leave(nodeId);
  }

  const gizmoConfig = ctx.gizmoConfig;
  const runGizmos = ctx.runsGizmosFor(nodeId, operation);

  if (runGizmos && gizmoConfig.kind === 'inOut') {
    const preGizmo = operation.preGizmo;
    if (!preGizmo) {
      throw new GizmoHookMissingError(nodeId, node.opName, 'preGizmo');
    }
    const gizmosIn = [...gizmoConfig.gizmos];
    const rewritten = invoke(node, 'preGizmo', () =>
      preGizmo.call(operation, inputs, gizmosIn, ctx.externalValues)
    );
    if (!isValueMap(rewritten)) {
      throw new OperationContractViolationError(
        nodeId,
        `A node's preGizmo hook should return an updated input map, got ${describeValue(rewritten)}`
      );
    }
    inputs = rewritten;
  }

  ctx.logger.debug(`Running node ${nodeId} (${node.opName})`);
  const outputs = invoke(node, 'op', () => operation.call(inputs));
  if (!isValueMap(outputs)) {
    throw new OperationContractViolationError(
      nodeId,
      `A node's op should always return an output map, got ${describeValue(outputs)}`
    );
  }

  ctx.recordOutputs(nodeId, outputs);
  ctx.hooks?.emit(EvaluationEventType.NODE_EXECUTED, nodeId, node.opName);

  if (runGizmos) {
    ctx.gizmoOutputs = runPostGizmo(ctx, node, operation, outputs);
    ctx.hooks?.emit(EvaluationEventType.GIZMOS_UPDATED, nodeId, ctx.gizmoOutputs.length);
  }
}

/**
 * Builds the input map in declared input order
 */
function resolveInputs<TGizmo>(
  graph: IGraph,
  ctx: EvaluationContext<TGizmo>,
  node: INodeDefinition
): ValueMap {
  const inputs: Record<string, NodeValue> = {};

  for (const input of node.inputs) {
    const dependency = input.kind;
    switch (dependency.kind) {
      case 'connection': {
        if (!graph.hasNode(dependency.node)) {
          throw new UnknownNodeError(dependency.node, node.id);
        }
        runNode(graph, ctx, dependency.node);

        const producerOutputs = ctx.outputsCache.get(dependency.node);
        if (!producerOutputs || !hasOwnValue(producerOutputs, dependency.paramName)) {
          throw new MissingCachedOutputError(node.id, dependency.node, dependency.paramName);
        }
        inputs[input.name] = producerOutputs[dependency.paramName];
        break;
      }
      case 'external': {
        const entry = ctx.externalValues.lookup(new ExternalParameter(node.id, input.name));
        if (!entry.found) {
          throw new MissingExternalParameterError(node.id, input.name);
        }
        inputs[input.name] = entry.value;
        break;
      }
    }
  }

  return inputs;
}

function runPostGizmo<TGizmo>(
  ctx: EvaluationContext<TGizmo>,
  node: INodeDefinition,
  operation: IOperation<TGizmo>,
  outputs: ValueMap
): TGizmo[] {
  const postGizmo = operation.postGizmo;
  if (!postGizmo) {
    throw new GizmoHookMissingError(node.id, node.opName, 'postGizmo');
  }

  const gizmos = invoke(node, 'postGizmo', () => postGizmo.call(operation, outputs));
  if (!isSequence(gizmos)) {
    throw new OperationContractViolationError(
      node.id,
      `A node's postGizmo hook should return a sequence of gizmos, got ${describeValue(gizmos)}`
    );
  }
  ctx.logger.debug(`Node ${node.id} produced ${gizmos.length} gizmo(s)`);
  return [...gizmos];
}

/**
 * Runs an operation callable, attributing anything it throws to the node
 */
function invoke<T>(node: INodeDefinition, stage: string, action: () => T): T {
  try {
    return action();
  } catch (error) {
    if (isNodeError(error)) {
      throw error;
    }
    throw new OperationFailedError(node.id, node.opName, stage, toError(error));
  }
}
