import type { ExternalParameterValues } from '../model/external-parameters';

/**
 * Result of one evaluation pass
 *
 * @template TRenderable - Type produced by the renderable converter
 * @template TGizmo - Type of gizmo state
 */
export interface ProgramResult<TRenderable = unknown, TGizmo = unknown> {
  /**
   * Converted return output of the target node.
   * Undefined when the target declares no return output.
   */
  readonly renderable: TRenderable | undefined;
  /**
   * Gizmos produced by the target's post-hook.
   * Present only when gizmos were enabled for the pass.
   */
  readonly updatedGizmos: TGizmo[] | undefined;
  /** External parameter values handed back after the pass */
  readonly updatedValues: ExternalParameterValues;
}
