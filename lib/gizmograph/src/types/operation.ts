import type { ExternalParameterValues } from '../model/external-parameters';
import { ValueMap } from './utils';

/**
 * Operation interface
 *
 * This is the main interface for implementing node behavior.
 * An operation computes a mapping of named outputs from a mapping of named inputs.
 *
 * Contract: `call` is synchronous and must return a plain object.
 * Operations with `hasGizmo` must also provide `preGizmo` and `postGizmo`;
 * both are invoked only when the node is the evaluation target and gizmos are enabled.
 *
 * @template TGizmo - Type of gizmo state produced and consumed by the hooks
 * @category Operation Development
 */
export interface IOperation<TGizmo = unknown> {
  /** Name nodes refer to through their `opName` */
  readonly name: string;
  readonly hasGizmo?: boolean;

  call(inputs: ValueMap): ValueMap;

  /**
   * Rewrites the inputs before `call` using the gizmo state of the previous round.
   * The external parameter values of the pass are passed along so that
   * interactive edits can be written back.
   */
  preGizmo?(
    inputs: ValueMap,
    gizmos: readonly TGizmo[],
    externalValues: ExternalParameterValues
  ): ValueMap;

  /**
   * Derives the gizmo state from the outputs produced by `call`
   */
  postGizmo?(outputs: ValueMap): readonly TGizmo[];
}

/**
 * Name-keyed table of operations
 */
export interface IOperationRegistry<TGizmo = unknown> {
  register(operation: IOperation<TGizmo>): void;
  get(name: string): IOperation<TGizmo> | undefined;
  has(name: string): boolean;
  getOperationNames(): IterableIterator<string>;
}
