/**
 * Types - Core type definitions for gizmograph
 */

// Graph types
export type {
  ConnectionDependency,
  DependencyKind,
  ExternalDependency,
  IGraph,
  IGraphDefinition,
  INodeDefinition,
  INodeInput,
} from './graph-definition';
export { connection, external } from './graph-definition';

// Operation types
export type { IOperation, IOperationRegistry } from './operation';
export { GizmoConfig } from './gizmo-config';
export type { ProgramResult } from './program-result';

// Configuration
export type { IInterpreterOptions, RenderableConverter } from './interpreter-options';
export { DEFAULT_INTERPRETER_OPTIONS } from './interpreter-options';

// Events and logging
export { EvaluationEventType } from './evaluation-hooks';
export type {
  EvaluationEvent,
  EvaluationEventHandlers,
  IHookManager,
  UnsubscribeFn,
} from './evaluation-hooks';
export type { ILogger } from './logger';
export { LogLevel } from './logger';

export type { NodeValue, Serializable, ValueMap } from './utils';
