/**
 * Types of all evaluation events
 */
export enum EvaluationEventType {
  EVALUATION_STARTED = 'evaluationStarted',
  NODE_EXECUTED = 'nodeExecuted',
  CACHE_HIT = 'cacheHit',
  GIZMOS_UPDATED = 'gizmosUpdated',
  EVALUATION_COMPLETED = 'evaluationCompleted',
  EVALUATION_FAILED = 'evaluationFailed',
}

/**
 * Handler type for each event
 */
export interface EvaluationEventHandlers {
  [EvaluationEventType.EVALUATION_STARTED]: (targetNode: string) => void;
  [EvaluationEventType.NODE_EXECUTED]: (nodeId: string, opName: string) => void;
  [EvaluationEventType.CACHE_HIT]: (nodeId: string) => void;
  [EvaluationEventType.GIZMOS_UPDATED]: (nodeId: string, gizmoCount: number) => void;
  [EvaluationEventType.EVALUATION_COMPLETED]: (data: {
    targetNode: string;
    executedNodes: number;
    hasRenderable: boolean;
  }) => void;
  [EvaluationEventType.EVALUATION_FAILED]: (targetNode: string, error: Error) => void;
}

/**
 * Event as published on the event stream
 */
export interface EvaluationEvent {
  readonly type: EvaluationEventType;
  readonly args: readonly unknown[];
}

/**
 * Function type for hook unregistration
 */
export type UnsubscribeFn = () => void;

/**
 * Interface for hook management
 */
export interface IHookManager {
  /**
   * Subscribe to event with cancellation capability
   * @returns Function to unsubscribe
   */
  on<K extends keyof EvaluationEventHandlers>(
    eventType: K,
    handler: EvaluationEventHandlers[K]
  ): UnsubscribeFn;

  /**
   * Call all handlers for specified event
   */
  emit<K extends keyof EvaluationEventHandlers>(
    eventType: K,
    ...args: Parameters<EvaluationEventHandlers[K]>
  ): void;

  /**
   * Cancel all subscriptions
   */
  clearAllEvents(): void;
}
