import type { Aspect } from "./aspect.js";
import { EMPTY_ASPECT } from "./aspect.js";
import type { Entity } from "./encoding.js";
import { assert, InvalidArgument } from "./error.js";
import type { World } from "./world.js";

// ============================================================================
// System Types
// ============================================================================

/**
 * Runs once per system update, before the per-entity hook.
 */
export type PreupdateHook = (dt: number, world: World) => void;

/**
 * Runs once per member entity on each system update.
 */
export type UpdateHook = (entity: Entity, dt: number, world: World) => void;

/**
 * Runs when an entity joins or leaves the system during an entity sync.
 */
export type TransitionHook = (entity: Entity, world: World) => void;

/**
 * Options for system definition.
 */
export type SystemOptions = {
  /**
   * System name, used in errors and diagnostics. Identity is the system object itself.
   */
  name: string;

  /**
   * Entity filter. Defaults to the empty aspect (no members).
   */
  aspect?: Aspect;

  preupdate?: PreupdateHook;
  update?: UpdateHook;

  /**
   * Fired when an enqueued entity starts matching. Not fired when the system
   * is first registered and populated from the resident entities.
   */
  onAdd?: TransitionHook;

  /**
   * Fired for every member when the system is removed, and for every dequeued
   * entity while the system is registered.
   */
  onRemove?: TransitionHook;
};

/**
 * Kind tag carried by every system.
 */
export const SYSTEM_KIND = "system" as const;

/**
 * Frozen system definition.
 */
export type System = Readonly<{
  kind: typeof SYSTEM_KIND;
  name: string;
  aspect: Aspect;
  preupdate?: PreupdateHook;
  update?: UpdateHook;
  onAdd?: TransitionHook;
  onRemove?: TransitionHook;
}>;

/**
 * Systems created through defineSystem(). Lets isSystem() reject look-alikes.
 */
const DEFINED_SYSTEMS = new WeakSet<object>();

// ============================================================================
// System Definition
// ============================================================================

/**
 * Defines a system.
 *
 * @param options - Name, aspect and hooks
 * @returns Frozen system
 * @throws {InvalidArgument} If name is empty
 *
 * @example
 * ```typescript
 * const movement = defineSystem({
 *   name: "movement",
 *   aspect: createAspect([Position, Velocity]),
 *   update(entity, dt, world) {
 *     const pos = getComponent(world, entity, Position)!;
 *     const vel = getComponent(world, entity, Velocity)!;
 *     pos.x += vel.dx * dt;
 *   },
 * });
 * ```
 */
export function defineSystem(options: SystemOptions): System {
  assert(options.name.length > 0, InvalidArgument, { expected: "non-empty system name" });

  const system: System = Object.freeze({
    kind: SYSTEM_KIND,
    name: options.name,
    aspect: options.aspect ?? EMPTY_ASPECT,
    preupdate: options.preupdate,
    update: options.update,
    onAdd: options.onAdd,
    onRemove: options.onRemove,
  });

  DEFINED_SYSTEMS.add(system);

  return system;
}

/**
 * Kind test used to route enqueued objects.
 */
export function isSystem(value: unknown): value is System {
  return typeof value === "object" && value !== null && DEFINED_SYSTEMS.has(value);
}
