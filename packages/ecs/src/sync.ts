import { matchesAspect } from "./aspect.js";
import { restoreEntityCommands, restoreSystemCommands, takeEntityCommands, takeSystemCommands } from "./commands.js";
import type { Entity } from "./encoding.js";
import { ensureEntity, releaseEntity } from "./entity.js";
import { InvalidState } from "./error.js";
import { fireObserverEvent } from "./observer.js";
import type { System } from "./system.js";
import type { World, WorldPhase } from "./world.js";

// ============================================================================
// Phase Guard
// ============================================================================

/**
 * Runs `fn` with the world in `phase`. Passes never nest: starting one while
 * another phase is active (e.g. from a hook) throws.
 *
 * @throws {InvalidState} If the world is not idle
 */
export function runInPhase<T>(world: World, phase: WorldPhase, fn: () => T): T {
  const current = world.execution.phase;

  if (current !== "idle") {
    throw new InvalidState({ message: `Cannot start ${phase} while world is ${current}` });
  }

  world.execution.phase = phase;

  try {
    return fn();
  } finally {
    world.execution.phase = "idle";
  }
}

// ============================================================================
// System Synchronization
// ============================================================================

/**
 * Unregisters a system. Indices of the systems after it are rewritten so
 * `indexOf` always mirrors `list`.
 *
 * Registration state is dropped before the onRemove hooks run; a hook that
 * throws skips the remaining members' hooks only.
 */
function removeSystem(world: World, system: System): void {
  const { list, indexOf, members, active } = world.systems;
  const index = indexOf.get(system);

  if (index === undefined) {
    return;
  }

  list.splice(index, 1);
  indexOf.delete(system);

  for (let i = index; i < list.length; i++) {
    indexOf.set(list[i]!, i);
  }

  const entities = members.get(system);
  members.delete(system);
  active.delete(system);

  try {
    if (system.onRemove && entities) {
      for (const entity of entities) {
        system.onRemove(entity, world);
      }
    }
  } finally {
    fireObserverEvent(world, "systemRemoved", system);
  }
}

/**
 * Registers a system and fills its membership from the resident entities.
 * onAdd hooks do not fire here: only entity syncs produce transitions.
 */
function addSystem(world: World, system: System): void {
  const { list, indexOf, members, active } = world.systems;

  if (indexOf.has(system)) {
    return;
  }

  const entities = new Set<Entity>();
  members.set(system, entities);
  list.push(system);
  indexOf.set(system, list.length - 1);
  active.set(system, true);

  for (const entity of world.entities.resident) {
    if (matchesAspect(system.aspect, ensureEntity(world, entity).components)) {
      entities.add(entity);
    }
  }

  fireObserverEvent(world, "systemAdded", system);
}

/**
 * Applies pending system removals, then pending additions, each in enqueue order.
 *
 * Runs at the start of every update(), before syncEntities(). Calling it
 * directly is only needed to register systems without running a frame.
 *
 * If a hook throws, the system being removed stays removed and the commands
 * after it go back to the buffer, ahead of any pushed during the pass.
 *
 * @param world - World instance
 * @throws {InvalidState} If called while another pass or an update is running
 *
 * @example
 * ```typescript
 * enqueue(world, physics);
 * syncSystems(world);
 * hasSystem(world, physics); // true
 * ```
 */
export function syncSystems(world: World): void {
  runInPhase(world, "syncing-systems", () => {
    const { removals, additions } = takeSystemCommands(world.commands);
    let removed = 0;
    let added = 0;

    try {
      while (removed < removals.length) {
        removeSystem(world, removals[removed++]!);
      }

      while (added < additions.length) {
        addSystem(world, additions[added++]!);
      }
    } catch (error) {
      restoreSystemCommands(world.commands, {
        removals: removals.slice(removed),
        additions: additions.slice(added),
      });
      throw error;
    }
  });
}

// ============================================================================
// Entity Synchronization
// ============================================================================

/**
 * Membership is recorded before onAdd runs. If a hook throws, the systems
 * evaluated so far keep their membership and the entity is not yet resident;
 * retrying the add picks up where it stopped without repeating a hook.
 */
function addEntity(world: World, entity: Entity): void {
  const meta = ensureEntity(world, entity);

  // Registration order: members is keyed in the same order as the system list
  for (const [system, entities] of world.systems.members) {
    const matches = matchesAspect(system.aspect, meta.components);

    if (matches) {
      if (!entities.has(entity)) {
        entities.add(entity);
        system.onAdd?.(entity, world);
      }
    } else {
      entities.delete(entity);
    }
  }

  meta.syncedVersion = meta.version;

  const wasResident = world.entities.resident.has(entity);
  world.entities.resident.add(entity);

  if (!wasResident) {
    fireObserverEvent(world, "entityAdded", entity);
  }
}

/**
 * A removal always completes: if a hook throws, the entity still leaves every
 * membership, and the hooks of the systems after the failing one are skipped.
 */
function removeEntity(world: World, entity: Entity): void {
  const wasResident = world.entities.resident.delete(entity);

  try {
    for (const [system, entities] of world.systems.members) {
      // Fires even if the entity never was a member
      system.onRemove?.(entity, world);
      entities.delete(entity);
    }
  } catch (error) {
    for (const entities of world.systems.members.values()) {
      entities.delete(entity);
    }
    throw error;
  } finally {
    if (wasResident) {
      fireObserverEvent(world, "entityRemoved", entity);
    }
  }
}

/**
 * Applies pending entity statuses in insertion order, then releases the
 * handles of destroyed entities.
 *
 * Pending-add: the entity becomes resident and its membership in every
 * registered system is set from the system's aspect. onAdd fires when an
 * entity enters a system's membership; leaving it because the entity no
 * longer matches is silent.
 *
 * Pending-remove: the entity leaves the resident set and every membership.
 * onRemove fires for every registered system.
 *
 * Commands pushed by hooks during the pass wait for the next pass.
 *
 * If a hook throws, the unprocessed statuses and the unreleased handles go
 * back to the world before the error propagates. An add whose hook threw is
 * among them; a removal is not, since it completes regardless.
 *
 * @param world - World instance
 * @throws {InvalidState} If called while another pass or an update is running
 */
export function syncEntities(world: World): void {
  runInPhase(world, "syncing-entities", () => {
    const commands = takeEntityCommands(world.commands);
    const released = world.entities.released;
    world.entities.released = new Set();

    try {
      for (const [entity, op] of commands) {
        if (op === "add") {
          addEntity(world, entity);
          commands.delete(entity);
        } else {
          commands.delete(entity);
          removeEntity(world, entity);
        }
      }

      for (const entity of released) {
        released.delete(entity);
        releaseEntity(world, entity);
      }
    } catch (error) {
      restoreEntityCommands(world.commands, commands);

      for (const entity of world.entities.released) {
        released.add(entity);
      }
      world.entities.released = released;
      throw error;
    }
  });
}
