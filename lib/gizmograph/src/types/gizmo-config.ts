/**
 * Gizmo handling for one evaluation pass
 *
 * - `ignore`: hooks never run and the result carries no gizmos
 * - `inOut`: the pre-hook receives `gizmos` and the post-hook produces new ones
 * - `out`: only the post-hook runs
 */
export type GizmoConfig<TGizmo = unknown> =
  | { readonly kind: 'ignore' }
  | { readonly kind: 'inOut'; readonly gizmos: readonly TGizmo[] }
  | { readonly kind: 'out' };

export const GizmoConfig = {
  ignore<TGizmo = unknown>(): GizmoConfig<TGizmo> {
    return { kind: 'ignore' };
  },

  inOut<TGizmo>(gizmos: readonly TGizmo[]): GizmoConfig<TGizmo> {
    return { kind: 'inOut', gizmos };
  },

  out<TGizmo = unknown>(): GizmoConfig<TGizmo> {
    return { kind: 'out' };
  },

  isEnabled<TGizmo>(config: GizmoConfig<TGizmo>): boolean {
    return config.kind !== 'ignore';
  },
} as const;
