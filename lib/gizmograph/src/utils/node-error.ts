/**
 * Kinds of failures that abort an evaluation pass
 */
export enum EvaluationErrorKind {
  UNKNOWN_OPERATION = 'UNKNOWN_OPERATION',
  UNKNOWN_NODE = 'UNKNOWN_NODE',
  MISSING_EXTERNAL_PARAMETER = 'MISSING_EXTERNAL_PARAMETER',
  MISSING_CACHED_OUTPUT = 'MISSING_CACHED_OUTPUT',
  GIZMO_HOOK_MISSING = 'GIZMO_HOOK_MISSING',
  OPERATION_CONTRACT_VIOLATION = 'OPERATION_CONTRACT_VIOLATION',
  OPERATION_FAILED = 'OPERATION_FAILED',
  MISSING_RETURN_OUTPUT = 'MISSING_RETURN_OUTPUT',
  RENDERABLE_CONVERSION = 'RENDERABLE_CONVERSION',
  CYCLE_DETECTED = 'CYCLE_DETECTED',
  INTERNAL_INVARIANT = 'INTERNAL_INVARIANT',
}

/**
 * Error class for graph nodes
 *
 * Extends standard Error class, adding
 * information about the node being evaluated
 */
export class NodeError extends Error {
  /**
   * Identifier of node where error occurred
   */
  public readonly nodeId: string;

  /**
   * Failure kind
   */
  public readonly kind: EvaluationErrorKind;

  /**
   * Original error, if exists
   */
  public readonly originalError?: Error;

  /**
   * Creates new NodeError instance
   * @param message Error message
   * @param nodeId Node identifier
   * @param kind Failure kind
   * @param originalError Original error (optional)
   */
  constructor(message: string, nodeId: string, kind: EvaluationErrorKind, originalError?: Error) {
    super(message);

    this.name = 'NodeError';
    this.nodeId = nodeId;
    this.kind = kind;
    this.originalError = originalError;

    // Set up call stack
    if (originalError?.stack) {
      this.stack = `${this.stack}\nCaused by: ${originalError.stack}`;
    }

    // For ES5 compatibility
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Returns string representation of error
   */
  public override toString(): string {
    return `[${this.name} in ${this.nodeId}] ${this.message}`;
  }

  /**
   * Converts error to object for serialization
   */
  toJSON(): {
    readonly name: string;
    readonly kind: EvaluationErrorKind;
    readonly message: string;
    readonly nodeId: string;
    readonly originalError?: {
      readonly name: string;
      readonly message: string;
    };
  } {
    return {
      name: this.name,
      kind: this.kind,
      message: this.message,
      nodeId: this.nodeId,
      originalError: this.originalError
        ? {
            name: this.originalError.name,
            message: this.originalError.message,
          }
        : undefined,
    };
  }
}

/**
 * Node refers to an operation name the registry does not know
 */
export class UnknownOperationError extends NodeError {
  public readonly opName: string;

  constructor(nodeId: string, opName: string) {
    super(`Node definition not found for ${opName}`, nodeId, EvaluationErrorKind.UNKNOWN_OPERATION);
    this.name = 'UnknownOperationError';
    this.opName = opName;
  }
}

/**
 * Node id is not part of the graph
 */
export class UnknownNodeError extends NodeError {
  constructor(nodeId: string, referencedBy?: string) {
    super(
      referencedBy
        ? `Node ${referencedBy} depends on unknown node ${nodeId}`
        : `Unknown node: ${nodeId}`,
      nodeId,
      EvaluationErrorKind.UNKNOWN_NODE
    );
    this.name = 'UnknownNodeError';
  }
}

/**
 * External input has no value in the external parameter values
 */
export class MissingExternalParameterError extends NodeError {
  public readonly paramName: string;

  constructor(nodeId: string, paramName: string) {
    super(
      `Could not retrieve external parameter named '${paramName}' from node ${nodeId}`,
      nodeId,
      EvaluationErrorKind.MISSING_EXTERNAL_PARAMETER
    );
    this.name = 'MissingExternalParameterError';
    this.paramName = paramName;
  }
}

/**
 * Connection names an output its producer did not produce
 */
export class MissingCachedOutputError extends NodeError {
  public readonly producerId: string;
  public readonly paramName: string;

  constructor(nodeId: string, producerId: string, paramName: string) {
    super(
      `Node ${nodeId} expects output '${paramName}' from node ${producerId}, which did not produce it`,
      nodeId,
      EvaluationErrorKind.MISSING_CACHED_OUTPUT
    );
    this.name = 'MissingCachedOutputError';
    this.producerId = producerId;
    this.paramName = paramName;
  }
}

export type GizmoHookName = 'preGizmo' | 'postGizmo';

/**
 * Operation declares gizmo support without providing a hook
 */
export class GizmoHookMissingError extends NodeError {
  public readonly hook: GizmoHookName;

  constructor(nodeId: string, opName: string, hook: GizmoHookName) {
    super(
      `Operation ${opName} has gizmos and should have '${hook}'`,
      nodeId,
      EvaluationErrorKind.GIZMO_HOOK_MISSING
    );
    this.name = 'GizmoHookMissingError';
    this.hook = hook;
  }
}

/**
 * Operation or hook returned a value of the wrong shape
 */
export class OperationContractViolationError extends NodeError {
  constructor(nodeId: string, message: string) {
    super(message, nodeId, EvaluationErrorKind.OPERATION_CONTRACT_VIOLATION);
    this.name = 'OperationContractViolationError';
  }
}

/**
 * Operation or hook threw
 */
export class OperationFailedError extends NodeError {
  public readonly opName: string;

  constructor(nodeId: string, opName: string, stage: string, originalError: Error) {
    super(
      `Operation ${opName} failed in '${stage}': ${originalError.message}`,
      nodeId,
      EvaluationErrorKind.OPERATION_FAILED,
      originalError
    );
    this.name = 'OperationFailedError';
    this.opName = opName;
  }
}

/**
 * Target's declared return output is absent from its outputs
 */
export class MissingReturnOutputError extends NodeError {
  public readonly returnValue: string;

  constructor(nodeId: string, returnValue: string) {
    super(
      `Target node ${nodeId} did not produce its return output '${returnValue}'`,
      nodeId,
      EvaluationErrorKind.MISSING_RETURN_OUTPUT
    );
    this.name = 'MissingReturnOutputError';
    this.returnValue = returnValue;
  }
}

/**
 * Renderable converter rejected the target's return value
 */
export class RenderableConversionError extends NodeError {
  constructor(nodeId: string, originalError: Error) {
    super(
      `Could not convert the return value of node ${nodeId}: ${originalError.message}`,
      nodeId,
      EvaluationErrorKind.RENDERABLE_CONVERSION,
      originalError
    );
    this.name = 'RenderableConversionError';
  }
}

/**
 * Node was reached again while its own dependencies were being resolved
 */
export class CycleDetectedError extends NodeError {
  /** Node ids along the cycle, starting and ending with the repeated node */
  public readonly path: readonly string[];

  constructor(nodeId: string, path: readonly string[]) {
    super(`Cycle detected at node ${nodeId}: ${path.join(' -> ')}`, nodeId, EvaluationErrorKind.CYCLE_DETECTED);
    this.name = 'CycleDetectedError';
    this.path = path;
  }
}

/**
 * Evaluator reached a state its own bookkeeping rules out
 */
export class InternalInvariantError extends NodeError {
  constructor(nodeId: string, message: string) {
    super(message, nodeId, EvaluationErrorKind.INTERNAL_INVARIANT);
    this.name = 'InternalInvariantError';
  }
}

/**
 * Checks if object is NodeError instance
 * @param error Object to check
 */
export function isNodeError(error: unknown): error is NodeError {
  return error instanceof NodeError;
}

/**
 * Type guard for evaluation errors, optionally of one kind
 * @param error Value to check
 * @param kind Expected kind (optional)
 */
export function isEvaluationError(error: unknown, kind?: EvaluationErrorKind): error is NodeError {
  return isNodeError(error) && (kind === undefined || error.kind === kind);
}

/**
 * Type guard for standard Error
 */
export function isError(error: unknown): error is Error {
  return error instanceof Error;
}

/**
 * Wraps non-Error throwables so they can be chained as an original error
 */
export function toError(error: unknown): Error {
  return isError(error) ? error : new Error(getErrorMessage(error));
}

/**
 * Safely extracts error message from unknown error type
 * @param error Error of unknown type
 */
export function getErrorMessage(error: unknown): string {
  if (isError(error)) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  if (error && typeof error === 'object' && 'message' in error) {
    return String(error.message);
  }
  return String(error);
}
