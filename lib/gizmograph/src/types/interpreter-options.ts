import { LogLevel } from './logger';
import { NodeValue } from './utils';

/**
 * Converts the target's raw return value into the externally visible result
 */
export type RenderableConverter<TRenderable = unknown> = (
  value: NodeValue,
  nodeId: string
) => TRenderable;

/**
 * Options of an evaluation pass
 */
export interface IInterpreterOptions<TRenderable = unknown> {
  /**
   * Fail with CycleDetectedError when a node is reached again while its own
   * dependencies are being resolved. When disabled the graph must be acyclic.
   * @default true
   */
  readonly detectCycles?: boolean;

  /**
   * Level applied to the logger provider of an interpreter
   */
  readonly logLevel?: LogLevel;

  /**
   * Conversion of the target's return output
   * @default identity
   */
  readonly toRenderable?: RenderableConverter<TRenderable>;
}

export const DEFAULT_INTERPRETER_OPTIONS = {
  detectCycles: true,
} as const;
