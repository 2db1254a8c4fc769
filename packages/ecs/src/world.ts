import type { CommandBuffer } from "./commands.js";
import { createCommandBuffer } from "./commands.js";
import type { ComponentRecord } from "./component.js";
import type { Entity } from "./encoding.js";
import type { EntityMeta } from "./entity.js";
import { createEntity } from "./entity.js";
import type { ObserverRegistry } from "./observer.js";
import { createObserverRegistry } from "./observer.js";
import { enqueueEntity, enqueueSystem } from "./queue.js";
import type { System } from "./system.js";
import { isSystem } from "./system.js";
import { syncEntities, syncSystems } from "./sync.js";

// ============================================================================
// World Type
// ============================================================================

/**
 * What the world is doing. Sync passes and updates only start from "idle".
 */
export type WorldPhase = "idle" | "syncing-systems" | "syncing-entities" | "updating";

/**
 * World instance.
 *
 * Owns the entity arena, the resident entity set, the ordered system list with
 * per-system membership caches, and the pending command buffer.
 */
export type World = {
  /**
   * Entity arena and residency.
   */
  entities: {
    /**
     * Arena slot lookup (live handle -> metadata).
     */
    byId: Map<Entity, EntityMeta>;

    /**
     * Entities processed by an entity sync and not removed since.
     */
    resident: Set<Entity>;

    /**
     * Destroyed handles, released after the next entity sync.
     */
    released: Set<Entity>;

    /**
     * Freelist of released raw IDs for recycling.
     */
    freeIds: number[];

    /**
     * Next raw ID to allocate.
     */
    nextId: number;

    /**
     * Current generation per raw ID.
     */
    generations: Map<number, number>;
  };

  /**
   * System registry.
   */
  systems: {
    /**
     * Registered systems in registration order.
     */
    list: System[];

    /**
     * Position of each system in `list`.
     */
    indexOf: Map<System, number>;

    /**
     * Whether update() runs the system.
     */
    active: Map<System, boolean>;

    /**
     * Membership cache: entities currently matched by each system.
     */
    members: Map<System, Set<Entity>>;
  };

  /**
   * Pending additions and removals.
   */
  commands: CommandBuffer;

  /**
   * Lifecycle event callbacks.
   */
  observers: ObserverRegistry;

  /**
   * Current execution state.
   */
  execution: {
    phase: WorldPhase;

    /**
     * Number of update() calls that got past synchronization.
     */
    frame: number;
  };
};

/**
 * Object accepted by createWorld(): a system, or the components of a new entity.
 */
export type WorldInit = System | ComponentRecord;

const NO_MEMBERS: ReadonlySet<Entity> = new Set();

// ============================================================================
// World Creation
// ============================================================================

/**
 * Creates a world, registering the given systems and creating an entity for
 * every component record, in order. Both are synchronized before returning.
 *
 * @param objects - Systems and initial entity component records
 * @returns World instance
 *
 * @example
 * ```typescript
 * const world = createWorld(movement, render, { position: { x: 0, y: 0 } });
 * getEntityCount(world); // 1
 * ```
 */
export function createWorld(...objects: WorldInit[]): World {
  const world: World = {
    entities: {
      byId: new Map(),
      resident: new Set(),
      released: new Set(),
      freeIds: [],
      nextId: 1,
      generations: new Map(),
    },
    systems: {
      list: [],
      indexOf: new Map(),
      active: new Map(),
      members: new Map(),
    },
    commands: createCommandBuffer(),
    observers: createObserverRegistry(),
    execution: {
      phase: "idle",
      frame: 0,
    },
  };

  for (const object of objects) {
    if (isSystem(object)) {
      enqueueSystem(world, object);
    } else {
      enqueueEntity(world, createEntity(world, object));
    }
  }

  syncSystems(world);
  syncEntities(world);

  return world;
}

// ============================================================================
// World Queries
// ============================================================================

/**
 * Number of resident entities.
 */
export function getEntityCount(world: World): number {
  return world.entities.resident.size;
}

/**
 * Number of registered systems.
 */
export function getSystemCount(world: World): number {
  return world.systems.list.length;
}

/**
 * Resident entities. Live view; do not hold on to it across updates.
 */
export function getEntities(world: World): ReadonlySet<Entity> {
  return world.entities.resident;
}

export function isEntityResident(world: World, entity: Entity): boolean {
  return world.entities.resident.has(entity);
}

/**
 * Registered systems in registration (update) order.
 */
export function getSystems(world: World): readonly System[] {
  return world.systems.list;
}

export function hasSystem(world: World, system: System): boolean {
  return world.systems.indexOf.has(system);
}

/**
 * Whether update() runs the system. False for unregistered systems.
 */
export function isSystemActive(world: World, system: System): boolean {
  return world.systems.active.get(system) === true;
}

/**
 * Entities currently matched by a system. Empty for unregistered systems.
 *
 * @example
 * ```typescript
 * for (const entity of getSystemEntities(world, render)) {
 *   draw(getComponent(world, entity, Sprite));
 * }
 * ```
 */
export function getSystemEntities(world: World, system: System): ReadonlySet<Entity> {
  return world.systems.members.get(system) ?? NO_MEMBERS;
}
