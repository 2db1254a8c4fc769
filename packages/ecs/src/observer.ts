import type { Entity } from "./encoding.js";
import type { System } from "./system.js";
import type { World } from "./world.js";

// ============================================================================
// Observer Types
// ============================================================================

/**
 * Event payload type mapping.
 *
 * Maps event names to argument tuples for type-safe observer callbacks.
 */
export type EventPayloads = {
  entityCreated: [entity: Entity];
  entityAdded: [entity: Entity];
  entityRemoved: [entity: Entity];
  entityReleased: [entity: Entity];
  systemAdded: [system: System];
  systemRemoved: [system: System];
};

/**
 * Event type keys.
 */
export type EventType = keyof EventPayloads;

/**
 * Observer callback function.
 */
export type Observer<T extends EventType> = (...args: EventPayloads[T]) => void;

/**
 * Observer metadata for single event type.
 */
export type ObserverMeta<T extends EventType> = {
  callbacks: Observer<T>[];
};

/**
 * Per-world observer registry.
 */
export type ObserverRegistry = {
  [K in EventType]: ObserverMeta<K>;
};

export function createObserverRegistry(): ObserverRegistry {
  return {
    entityCreated: { callbacks: [] },
    entityAdded: { callbacks: [] },
    entityRemoved: { callbacks: [] },
    entityReleased: { callbacks: [] },
    systemAdded: { callbacks: [] },
    systemRemoved: { callbacks: [] },
  };
}

// ============================================================================
// Observer API
// ============================================================================

/**
 * Registers a callback for a lifecycle event.
 *
 * `entityAdded`/`entityRemoved` fire on real residency transitions during an
 * entity sync; `systemAdded`/`systemRemoved` during a system sync.
 *
 * @param world - The world instance containing observer state
 * @param eventType - The event type to listen for
 * @param callback - Function to invoke when the event fires
 *
 * @example
 * ```ts
 * registerObserverCallback(world, "entityAdded", (entity) => {
 *   console.log(`entity ${entity} is now resident`);
 * });
 * ```
 */
export function registerObserverCallback<T extends EventType>(world: World, eventType: T, callback: Observer<T>): void {
  world.observers[eventType].callbacks.push(callback);
}

/**
 * Removes a previously registered callback for the specified event type.
 *
 * @param world - The world instance containing observer state
 * @param eventType - The event type to stop listening for
 * @param callback - The exact callback reference to remove
 */
export function unregisterObserverCallback<T extends EventType>(
  world: World,
  eventType: T,
  callback: Observer<T>
): void {
  const meta = world.observers[eventType];
  const idx = meta.callbacks.indexOf(callback);

  if (idx !== -1) {
    meta.callbacks.splice(idx, 1);
  }
}

/**
 * Dispatches an event to all registered callbacks for the specified event type.
 */
export function fireObserverEvent<T extends EventType>(world: World, eventType: T, ...args: EventPayloads[T]): void {
  const meta = world.observers[eventType];

  // Reverse order so callbacks can unregister themselves during dispatch
  for (let i = meta.callbacks.length - 1; i >= 0; i--) {
    meta.callbacks[i]!(...args);
  }
}
