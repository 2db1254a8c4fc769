import type { System } from "./system.js";
import { runInPhase, syncEntities, syncSystems } from "./sync.js";
import type { World } from "./world.js";

// ============================================================================
// Frame Execution
// ============================================================================

/**
 * Advances the world by one frame.
 *
 * 1. syncSystems() applies queued system additions/removals.
 * 2. syncEntities() applies queued entity statuses and fires onAdd/onRemove.
 * 3. Every active system is updated, in registration order.
 *
 * Entities and systems enqueued or dequeued from hooks during the frame take
 * effect at the next update.
 *
 * @param world - World instance
 * @param dt - Time step passed to preupdate/update hooks
 * @throws {InvalidState} If called from inside a hook while the world is busy
 *
 * @example
 * ```typescript
 * let last = performance.now();
 * setInterval(() => {
 *   const now = performance.now();
 *   update(world, (now - last) / 1000);
 *   last = now;
 * }, 16);
 * ```
 */
export function update(world: World, dt: number): void {
  syncSystems(world);
  syncEntities(world);

  world.execution.frame++;

  runInPhase(world, "updating", () => {
    // The list cannot change here: system syncs are rejected while updating
    for (const system of world.systems.list) {
      if (world.systems.active.get(system) === true) {
        updateSystem(world, system, dt);
      }
    }
  });
}

/**
 * Runs one system: preupdate once, then update for every member entity.
 *
 * Use it to drive inactive systems by hand. Member iteration order is
 * unspecified. A system that is not registered has no members, so only its
 * preupdate runs.
 *
 * @param world - World instance
 * @param system - System to run
 * @param dt - Time step
 *
 * @example
 * ```typescript
 * setSystemActive(world, debugOverlay, false);
 * // ...
 * if (showOverlay) updateSystem(world, debugOverlay, dt);
 * ```
 */
export function updateSystem(world: World, system: System, dt: number): void {
  system.preupdate?.(dt, world);

  const updateEntity = system.update;
  const members = world.systems.members.get(system);

  if (!updateEntity || !members) {
    return;
  }

  // Snapshot: a hook may run a sync pass when this is called outside update()
  for (const entity of Array.from(members)) {
    updateEntity(entity, dt, world);
  }
}

/**
 * Toggles whether update() runs a system. Membership keeps being maintained
 * either way. Ignored for systems that are not registered.
 *
 * @example
 * ```typescript
 * setSystemActive(world, physics, false); // paused
 * update(world, dt); // physics members still sync, physics.update does not run
 * ```
 */
export function setSystemActive(world: World, system: System, active: boolean): void {
  if (!world.systems.indexOf.has(system)) {
    return;
  }

  world.systems.active.set(system, active);
}
