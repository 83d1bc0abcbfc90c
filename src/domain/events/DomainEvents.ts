import { EventSource } from '../../types';

/**
 * Type-safe domain event definitions.
 * Maps each event name to its payload shape. The catalogue is closed:
 * adding an event means adding a key here.
 */
export interface TypedEventMap {
  // Sound events
  'sound:uploaded': { id: number; name: string };
  'sound:renamed': { id: number; oldName: string; newName: string };
  'sound:deleted': { id: number; name: string };

  // Config events
  'config:interval_changed': { oldValue: number; newValue: number };
  'config:volume_changed': { oldValue: number; newValue: number };
  'config:notify_channel_changed': { oldValue: string | null; newValue: string | null };

  // System events
  'system:ready': { guildId: string };
  'system:shutdown': { reason: string };
}

/**
 * All valid event names.
 */
export type EventName = keyof TypedEventMap;

/**
 * Get the payload type for a specific event name.
 */
export type EventPayload<K extends EventName> = TypedEventMap[K];

/**
 * An immutable event as it travels through the bus.
 */
export interface DomainEvent<K extends EventName = EventName> {
  readonly type: K;
  readonly payload: Readonly<EventPayload<K>>;
  readonly source: EventSource;
  readonly timestamp: number;
}

/**
 * Discriminated union of the events whose name is in K.
 * `EventOf<'sound:uploaded' | 'sound:deleted'>` narrows on `event.type`.
 */
export type EventOf<K extends EventName> = { [P in K]: DomainEvent<P> }[K];

/**
 * Union type of all domain events.
 */
export type AnyDomainEvent = EventOf<EventName>;

export const SOUND_EVENTS = ['sound:uploaded', 'sound:renamed', 'sound:deleted'] as const;

export const CONFIG_EVENTS = [
  'config:interval_changed',
  'config:volume_changed',
  'config:notify_channel_changed'
] as const;

/**
 * Events describing a mutation of persisted state.
 */
export const MUTATION_EVENTS = [...SOUND_EVENTS, ...CONFIG_EVENTS] as const;

export type MutationEventName = typeof MUTATION_EVENTS[number];

export function createEvent<K extends EventName>(
  type: K,
  payload: EventPayload<K>,
  source: EventSource,
  timestamp: number = Date.now()
): DomainEvent<K> {
  return Object.freeze({
    type,
    payload: Object.freeze({ ...payload }),
    source,
    timestamp
  });
}
