// ============================================================================
// Errors
// ============================================================================

export { assert, InvalidArgument, InvalidState, LimitExceeded, LoomError, NotFound } from "./error.js";

// ============================================================================
// World Operations
// ============================================================================

export {
  createWorld,
  getEntities,
  getEntityCount,
  getSystemCount,
  getSystemEntities,
  getSystems,
  hasSystem,
  isEntityResident,
  isSystemActive,
} from "./world.js";

// ============================================================================
// Entity Operations
// ============================================================================

export { createEntity, destroyEntity, isEntityAlive, isEntityStale } from "./entity.js";
export { extractGeneration, extractId } from "./encoding.js";

// ============================================================================
// Component Operations
// ============================================================================

export { defineComponent, getComponent, hasComponent, removeComponent, setComponent } from "./component.js";

// ============================================================================
// Aspects
// ============================================================================

export { composeAspects, createAspect, EMPTY_ASPECT, matchesAspect } from "./aspect.js";

// ============================================================================
// Systems
// ============================================================================

export { defineSystem, isSystem } from "./system.js";

// ============================================================================
// Deferred Mutation
// ============================================================================

export {
  clearEntities,
  clearSystems,
  dequeue,
  dequeueEntity,
  dequeueSystem,
  enqueue,
  enqueueEntity,
  enqueueSystem,
} from "./queue.js";

// ============================================================================
// Synchronization and Frame Execution
// ============================================================================

export { syncEntities, syncSystems } from "./sync.js";
export { setSystemActive, update, updateSystem } from "./scheduler.js";

// ============================================================================
// Observers
// ============================================================================

export { registerObserverCallback, unregisterObserverCallback } from "./observer.js";

// ============================================================================
// Type Definitions
// ============================================================================

export type { Aspect, ComponentList } from "./aspect.js";
export type { Command, CommandOp } from "./commands.js";
export type { ComponentName, ComponentPresence, ComponentRecord, ComponentType } from "./component.js";
export type { Entity } from "./encoding.js";
export type { EventPayloads, EventType, Observer } from "./observer.js";
export type { WorldObject } from "./queue.js";
export type { PreupdateHook, System, SystemOptions, TransitionHook, UpdateHook } from "./system.js";
export type { World, WorldInit, WorldPhase } from "./world.js";
