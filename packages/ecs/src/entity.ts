import { pushCommand } from "./commands.js";
import type { ComponentName, ComponentRecord } from "./component.js";
import type { Entity } from "./encoding.js";
import { encodeEntity, extractGeneration, extractId, ID_MASK_8, ID_MASK_20 } from "./encoding.js";
import { assert, LimitExceeded, NotFound } from "./error.js";
import { fireObserverEvent } from "./observer.js";
import type { World } from "./world.js";

// ============================================================================
// Entity Metadata
// ============================================================================

/**
 * Arena slot of a live entity handle.
 */
export type EntityMeta = {
  /**
   * Component values by name. Presence drives aspect matching.
   */
  components: Map<ComponentName, unknown>;

  /**
   * Bumped whenever a component is added or removed.
   */
  version: number;

  /**
   * Value of `version` when the last entity sync evaluated this entity's memberships.
   */
  syncedVersion: number;

  /**
   * Set by destroyEntity(). The handle is released after the next entity sync.
   */
  destroying: boolean;
};

/**
 * Allocates entity ID, preferring recycled IDs from freelist.
 * Recycled IDs carry their bumped generation so old handles stay stale.
 */
function allocateEntityId(world: World): Entity {
  const rawId = world.entities.freeIds.pop();
  if (rawId !== undefined) {
    return encodeEntity(rawId, world.entities.generations.get(rawId) ?? 0);
  }

  const newRawId = world.entities.nextId++;

  assert(newRawId <= ID_MASK_20, LimitExceeded, { resource: "Entity", max: ID_MASK_20, id: newRawId });

  world.entities.generations.set(newRawId, 0);
  return encodeEntity(newRawId, 0);
}

// ============================================================================
// Entity Lifecycle
// ============================================================================

/**
 * Allocates a new entity handle with the given components.
 *
 * The entity is alive but not resident: enqueue it to have it join the world's
 * systems at the next update.
 *
 * @param world - World instance
 * @param components - Initial components by name (undefined values are skipped)
 * @returns Entity handle
 * @throws {LimitExceeded} If entity limit (1,048,575) exceeded
 *
 * @example
 * ```typescript
 * const player = createEntity(world, { position: { x: 0, y: 0 }, player: true });
 * enqueue(world, player);
 * ```
 */
export function createEntity(world: World, components?: ComponentRecord): Entity {
  const entity = allocateEntityId(world);
  const values = new Map<ComponentName, unknown>();

  if (components) {
    for (const [name, value] of Object.entries(components)) {
      if (value !== undefined) {
        values.set(name, value);
      }
    }
  }

  world.entities.byId.set(entity, {
    components: values,
    version: 0,
    syncedVersion: 0,
    destroying: false,
  });

  fireObserverEvent(world, "entityCreated", entity);

  return entity;
}

/**
 * Looks up the arena slot of a live handle.
 *
 * @throws {NotFound} If the handle was never allocated or has been released
 */
export function ensureEntity(world: World, entity: Entity): EntityMeta {
  const meta = world.entities.byId.get(entity);

  if (!meta) {
    throw new NotFound({ resource: "Entity", id: entity, context: "world" });
  }

  return meta;
}

/**
 * Checks if a handle refers to a live arena slot (allocated and not yet released).
 */
export function isEntityAlive(world: World, entity: Entity): boolean {
  return world.entities.byId.has(entity);
}

/**
 * Dequeues an entity and releases its handle after the next entity sync.
 *
 * Idempotent: destroying a dead or already destroying entity is a no-op.
 * Component data stays readable until the release, so onRemove hooks can
 * still inspect it.
 *
 * @example
 * ```typescript
 * destroyEntity(world, bullet);
 * update(world, dt);
 * isEntityAlive(world, bullet); // false
 * ```
 */
export function destroyEntity(world: World, entity: Entity): void {
  const meta = world.entities.byId.get(entity);

  if (!meta || meta.destroying) {
    return;
  }

  meta.destroying = true;
  pushCommand(world.commands, { op: "remove", target: "entity", entity });
  world.entities.released.add(entity);
}

/**
 * Frees the arena slot and recycles the raw ID with a new generation.
 * Called by syncEntities() once the entity has left every system.
 */
export function releaseEntity(world: World, entity: Entity): void {
  if (!world.entities.byId.delete(entity)) {
    return;
  }

  const rawId = extractId(entity);
  const newGeneration = (extractGeneration(entity) + 1) & ID_MASK_8;

  world.entities.generations.set(rawId, newGeneration);
  world.entities.freeIds.push(rawId);

  fireObserverEvent(world, "entityReleased", entity);
}

/**
 * Reports whether a resident entity's components changed since its memberships
 * were last evaluated. Such an entity keeps its old memberships until it is
 * enqueued again.
 *
 * @throws {NotFound} If entity is not alive
 *
 * @example
 * ```typescript
 * removeComponent(world, entity, Velocity);
 * isEntityStale(world, entity); // true
 * enqueue(world, entity);
 * update(world, dt);
 * isEntityStale(world, entity); // false
 * ```
 */
export function isEntityStale(world: World, entity: Entity): boolean {
  const meta = ensureEntity(world, entity);

  return world.entities.resident.has(entity) && meta.version !== meta.syncedVersion;
}
