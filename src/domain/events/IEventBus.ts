import { AnyDomainEvent, EventName, EventOf } from './DomainEvents';

/**
 * Event handler function type.
 */
export type EventHandler<K extends EventName = EventName> = (event: EventOf<K>) => void | Promise<void>;

/**
 * Handle returned by `subscribe`.
 */
export interface Subscription {
  readonly id: string;
  readonly eventTypes: readonly EventName[];

  /**
   * Stop accepting new events. Already queued events are still delivered.
   * Does not wait, so it is safe to call from inside the subscriber's own handler.
   */
  unsubscribe(): void;

  /**
   * Resolves once the subscriber's worker has exited.
   */
  readonly closed: Promise<void>;
}

/**
 * Interface for event bus implementations.
 * Every subscription is an independent actor: an ordered queue drained by
 * one worker, so a slow or failing handler never holds up the publisher or
 * another subscriber.
 */
export interface IEventBus {
  /**
   * Register a handler for one or more event types.
   * A subscriber observes its events in publish order.
   * @param name - Label used in logs (optional)
   */
  subscribe<K extends EventName>(types: K | readonly K[], handler: EventHandler<K>, name?: string): Subscription;

  /**
   * Enqueue an event for every current subscriber of its type.
   * Returns without running any handler.
   */
  publish(event: AnyDomainEvent): void;

  /**
   * Resolves when every subscriber queue is empty and no handler is running.
   */
  whenIdle(): Promise<void>;

  /**
   * Stop accepting events, let every worker finish its queue, wait for all of them to exit.
   */
  shutdown(): Promise<void>;

  /**
   * Get count of subscribers for an event.
   */
  subscriberCount(type: EventName): number;
}
