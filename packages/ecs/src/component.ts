import type { Entity } from "./encoding.js";
import { ensureEntity } from "./entity.js";
import { assert, InvalidArgument } from "./error.js";
import type { World } from "./world.js";

// ============================================================================
// Component Types
// ============================================================================

/**
 * Component type brand for nominal typing.
 */
declare const COMPONENT_BRAND: unique symbol;

/**
 * Component name. Aspects and presence checks work on names only.
 */
export type ComponentName = string;

/**
 * Typed component key (branded string).
 *
 * Still a `ComponentName` at runtime, so it can be used anywhere a name is
 * accepted. The brand carries the value type for `setComponent`/`getComponent`.
 */
export type ComponentType<T = unknown> = ComponentName & { readonly [COMPONENT_BRAND]: T };

/**
 * Anything that can answer "is component X present". `Map`, `Set` and entity
 * component slots all qualify.
 */
export type ComponentPresence = {
  has(name: ComponentName): boolean;
};

/**
 * Initial components of an entity, keyed by name. `undefined` values are skipped.
 */
export type ComponentRecord = Readonly<Record<ComponentName, unknown>>;

// ============================================================================
// Component Definition
// ============================================================================

/**
 * Defines a typed component key.
 *
 * @param name - Component name (non-empty)
 * @returns Branded component key
 * @throws {InvalidArgument} If name is empty
 *
 * @example
 * ```typescript
 * const Position = defineComponent<{ x: number; y: number }>("position");
 * setComponent(world, entity, Position, { x: 0, y: 0 });
 * const mover = createAspect([Position, "velocity"]);
 * ```
 */
export function defineComponent<T>(name: string): ComponentType<T> {
  assert(name.length > 0, InvalidArgument, { expected: "non-empty component name" });

  return name as ComponentType<T>;
}

// ============================================================================
// Component Operations (Public API)
// ============================================================================

export function setComponent<T>(world: World, entity: Entity, type: ComponentType<T>, value: T): void;
export function setComponent(world: World, entity: Entity, name: ComponentName, value: unknown): void;

/**
 * Sets a component value on an entity.
 *
 * Takes effect on the entity's data immediately. Aspect membership is only
 * re-evaluated when the entity is enqueued again.
 *
 * @param world - World instance
 * @param entity - Entity to modify
 * @param name - Component name or typed key
 * @param value - Component value
 * @throws {NotFound} If entity is not alive
 *
 * @example
 * ```typescript
 * setComponent(world, entity, Velocity, { dx: 1, dy: 0 });
 * enqueue(world, entity); // pick up new system memberships next frame
 * ```
 */
export function setComponent(world: World, entity: Entity, name: ComponentName, value: unknown): void {
  const meta = ensureEntity(world, entity);

  // Presence changes are what membership depends on
  if (!meta.components.has(name)) {
    meta.version++;
  }

  meta.components.set(name, value);
}

export function getComponent<T>(world: World, entity: Entity, type: ComponentType<T>): T | undefined;
export function getComponent(world: World, entity: Entity, name: ComponentName): unknown;

/**
 * Reads a component value.
 *
 * @param world - World instance
 * @param entity - Entity to read
 * @param name - Component name or typed key
 * @returns Component value, or undefined if absent
 * @throws {NotFound} If entity is not alive
 */
export function getComponent(world: World, entity: Entity, name: ComponentName): unknown {
  return ensureEntity(world, entity).components.get(name);
}

/**
 * Checks component presence on an entity.
 *
 * @throws {NotFound} If entity is not alive
 */
export function hasComponent(world: World, entity: Entity, name: ComponentName): boolean {
  return ensureEntity(world, entity).components.has(name);
}

/**
 * Removes a component from an entity. No-op if absent.
 *
 * @param world - World instance
 * @param entity - Entity to modify
 * @param name - Component name or typed key
 * @throws {NotFound} If entity is not alive
 *
 * @example
 * ```typescript
 * removeComponent(world, entity, Velocity);
 * enqueue(world, entity);
 * ```
 */
export function removeComponent(world: World, entity: Entity, name: ComponentName): void {
  const meta = ensureEntity(world, entity);

  if (meta.components.delete(name)) {
    meta.version++;
  }
}
