// ============================================
// Build API
// ============================================
export { createInterpreter, GraphInterpreter } from './graph';
export type { InterpreterDefinition, InterpreterOperator, ProviderRegistry } from './graph';
export { withOperations, withOptions, withLoggerProvider } from './operators';
// ============================================
// Core evaluator
// ============================================
export {
  runGraph,
  runNode,
  OperationRegistry,
  EvaluationContext,
  EvaluationHookManager,
} from './engine';
export type { RunGraphOptions, EvaluationContextInit } from './engine';
export { ExternalParameter, ExternalParameterValues, GraphModel } from './model';
// ============================================
// Types
// ============================================
export type {
  ConnectionDependency,
  DependencyKind,
  ExternalDependency,
  IGraph,
  IGraphDefinition,
  INodeDefinition,
  INodeInput,
  IOperation,
  IOperationRegistry,
  ProgramResult,
  IInterpreterOptions,
  RenderableConverter,
  EvaluationEvent,
  EvaluationEventHandlers,
  UnsubscribeFn,
  ILogger,
  NodeValue,
  ValueMap,
} from './types';
export {
  connection,
  external,
  GizmoConfig,
  DEFAULT_INTERPRETER_OPTIONS,
  EvaluationEventType,
  LogLevel,
} from './types';
// ============================================
// Errors
// ============================================
export {
  NodeError,
  EvaluationErrorKind,
  UnknownOperationError,
  UnknownNodeError,
  MissingExternalParameterError,
  MissingCachedOutputError,
  GizmoHookMissingError,
  OperationContractViolationError,
  OperationFailedError,
  MissingReturnOutputError,
  RenderableConversionError,
  CycleDetectedError,
  InternalInvariantError,
  isNodeError,
  isEvaluationError,
  getErrorMessage,
} from './utils/node-error';
export type { GizmoHookName } from './utils/node-error';
// ============================================
// Providers and logging
// ============================================
export type { ILoggerProvider } from './providers';
export { ConsoleLoggerProvider } from './providers';
export { LoggerAdapter, ConsoleLoggerAdapter, LoggerManager } from './utils/logging';
