import { Observable, Subject, filter } from 'rxjs';
import {
  EvaluationEvent,
  EvaluationEventHandlers,
  IHookManager,
  UnsubscribeFn,
} from '../types/evaluation-hooks';
import { LoggerManager } from '../utils/logging';

/**
 * Hook manager for evaluation events.
 * Events are published on an rxjs Subject; `on` subscribes a typed handler to one event type.
 */
export class EvaluationHookManager implements IHookManager {
  private readonly events = new Subject<EvaluationEvent>();
  private readonly subscriptions = new Set<UnsubscribeFn>();

  /**
   * Stream of all events
   */
  public get events$(): Observable<EvaluationEvent> {
    return this.events.asObservable();
  }

  /**
   * Registers handler for specified event
   * @returns Function to cancel registration
   */
  public on<K extends keyof EvaluationEventHandlers>(
    eventType: K,
    handler: EvaluationEventHandlers[K]
  ): UnsubscribeFn {
    const subscription = this.events
      .pipe(filter(event => event.type === eventType))
      .subscribe(event => {
        try {
          Reflect.apply(handler, undefined, event.args);
        } catch (error) {
          LoggerManager.error(
            `Error in event handler ${eventType}: ${error instanceof Error ? error.message : String(error)}`,
            error instanceof Error ? error : undefined
          );
        }
      });

    const unsubscribe = (): void => {
      subscription.unsubscribe();
      this.subscriptions.delete(unsubscribe);
    };
    this.subscriptions.add(unsubscribe);
    return unsubscribe;
  }

  /**
   * Publishes an event to all handlers
   */
  public emit<K extends keyof EvaluationEventHandlers>(
    eventType: K,
    ...args: Parameters<EvaluationEventHandlers[K]>
  ): void {
    if (!this.events.observed) {
      return; // No handlers for any event
    }
    this.events.next({ type: eventType, args });
  }

  /**
   * Cancels all subscriptions made through `on`
   */
  public clearAllEvents(): void {
    for (const unsubscribe of [...this.subscriptions]) {
      unsubscribe();
    }
  }

  /**
   * Completes the event stream
   */
  public destroy(): void {
    this.clearAllEvents();
    this.events.complete();
  }
}
