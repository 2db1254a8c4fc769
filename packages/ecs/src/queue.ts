import { pushCommand, replaceSystemRemovals } from "./commands.js";
import type { Entity } from "./encoding.js";
import { isEntityHandle } from "./encoding.js";
import { ensureEntity } from "./entity.js";
import { assert, InvalidArgument, InvalidState } from "./error.js";
import type { System } from "./system.js";
import { isSystem } from "./system.js";
import type { World } from "./world.js";

/**
 * Anything that can be enqueued into or dequeued from a world.
 */
export type WorldObject = Entity | System;

function describeValue(value: unknown): string {
  return value === null ? "null" : typeof value;
}

// ============================================================================
// Typed Entry Points
// ============================================================================

/**
 * Marks an entity pending-add. At the next entity sync it becomes resident and
 * its memberships are re-evaluated against every registered system.
 *
 * Re-enqueue an entity after changing its components so systems pick up the
 * change. Overrides a pending remove.
 *
 * @throws {InvalidArgument} If the value is not an entity handle
 * @throws {NotFound} If the entity is not alive
 * @throws {InvalidState} If the entity is being destroyed
 */
export function enqueueEntity(world: World, entity: Entity): void {
  assert(isEntityHandle(entity), InvalidArgument, { expected: "entity handle", actual: describeValue(entity) });

  const meta = ensureEntity(world, entity);

  if (meta.destroying) {
    throw new InvalidState({ message: `Entity ${entity} is destroyed and cannot be enqueued` });
  }

  pushCommand(world.commands, { op: "add", target: "entity", entity });
}

/**
 * Marks an entity pending-remove. Overrides a pending add.
 *
 * @throws {InvalidArgument} If the value is not an entity handle
 * @throws {NotFound} If the entity is not alive
 */
export function dequeueEntity(world: World, entity: Entity): void {
  assert(isEntityHandle(entity), InvalidArgument, { expected: "entity handle", actual: describeValue(entity) });

  ensureEntity(world, entity);
  pushCommand(world.commands, { op: "remove", target: "entity", entity });
}

/**
 * Queues a system for registration at the next system sync.
 *
 * @throws {InvalidArgument} If the value was not created by defineSystem()
 */
export function enqueueSystem(world: World, system: System): void {
  assert(isSystem(system), InvalidArgument, { expected: "system", actual: describeValue(system) });

  pushCommand(world.commands, { op: "add", target: "system", system });
}

/**
 * Queues a system for removal at the next system sync. Removing a system that
 * is not registered by then is a no-op.
 *
 * @throws {InvalidArgument} If the value was not created by defineSystem()
 */
export function dequeueSystem(world: World, system: System): void {
  assert(isSystem(system), InvalidArgument, { expected: "system", actual: describeValue(system) });

  pushCommand(world.commands, { op: "remove", target: "system", system });
}

// ============================================================================
// Mixed Entry Points
// ============================================================================

/**
 * Adds entities and systems to the world. They take effect at the next update.
 *
 * @example
 * ```typescript
 * enqueue(world, physics, render, player, enemy);
 * update(world, dt);
 * ```
 */
export function enqueue(world: World, ...objects: WorldObject[]): void {
  for (const object of objects) {
    if (isSystem(object)) {
      enqueueSystem(world, object);
    } else {
      enqueueEntity(world, object);
    }
  }
}

/**
 * Removes entities and systems from the world at the next update.
 */
export function dequeue(world: World, ...objects: WorldObject[]): void {
  for (const object of objects) {
    if (isSystem(object)) {
      dequeueSystem(world, object);
    } else {
      dequeueEntity(world, object);
    }
  }
}

// ============================================================================
// Bulk Removal
// ============================================================================

/**
 * Marks every resident entity pending-remove. Entities that are pending-add
 * but not yet resident are left alone.
 */
export function clearEntities(world: World): void {
  for (const entity of world.entities.resident) {
    pushCommand(world.commands, { op: "remove", target: "entity", entity });
  }
}

/**
 * Replaces the pending system removals with every registered system.
 * Removals queued earlier in the frame are discarded.
 */
export function clearSystems(world: World): void {
  replaceSystemRemovals(world.commands, world.systems.list);
}
