import type { Entity } from "./encoding.js";
import type { System } from "./system.js";

// ============================================================================
// Command Types
// ============================================================================

/**
 * Add or remove.
 */
export type CommandOp = "add" | "remove";

/**
 * Deferred world mutation.
 */
export type Command =
  | { op: CommandOp; target: "entity"; entity: Entity }
  | { op: CommandOp; target: "system"; system: System };

/**
 * Pending commands, drained at two fixed points per frame: system commands by
 * syncSystems(), entity commands by syncEntities().
 */
export type CommandBuffer = {
  /**
   * Pending status per entity. Last write wins; first insertion fixes the order.
   */
  entities: Map<Entity, CommandOp>;

  /**
   * Systems to register, in enqueue order.
   */
  addSystems: System[];

  /**
   * Systems to unregister, in enqueue order.
   */
  removeSystems: System[];
};

/**
 * System commands detached from a buffer.
 */
export type SystemCommands = {
  removals: System[];
  additions: System[];
};

// ============================================================================
// Buffer Operations
// ============================================================================

export function createCommandBuffer(): CommandBuffer {
  return {
    entities: new Map(),
    addSystems: [],
    removeSystems: [],
  };
}

/**
 * Records a command.
 *
 * @example
 * ```typescript
 * pushCommand(world.commands, { op: "add", target: "entity", entity });
 * pushCommand(world.commands, { op: "remove", target: "system", system: physics });
 * ```
 */
export function pushCommand(buffer: CommandBuffer, command: Command): void {
  if (command.target === "entity") {
    buffer.entities.set(command.entity, command.op);
    return;
  }

  if (command.op === "add") {
    buffer.addSystems.push(command.system);
  } else {
    buffer.removeSystems.push(command.system);
  }
}

/**
 * Replaces the pending system removals (used by clearSystems).
 */
export function replaceSystemRemovals(buffer: CommandBuffer, systems: readonly System[]): void {
  buffer.removeSystems = systems.slice();
}

/**
 * Detaches pending system commands. Commands pushed afterwards (e.g. from hooks
 * during the sync pass) stay in the buffer for the next pass.
 */
export function takeSystemCommands(buffer: CommandBuffer): SystemCommands {
  const commands = { removals: buffer.removeSystems, additions: buffer.addSystems };
  buffer.removeSystems = [];
  buffer.addSystems = [];
  return commands;
}

/**
 * Detaches pending entity commands, like takeSystemCommands().
 */
export function takeEntityCommands(buffer: CommandBuffer): Map<Entity, CommandOp> {
  const commands = buffer.entities;
  buffer.entities = new Map();
  return commands;
}

/**
 * Puts system commands left over by an interrupted pass back in front of the
 * ones pushed since.
 */
export function restoreSystemCommands(buffer: CommandBuffer, commands: SystemCommands): void {
  buffer.removeSystems = [...commands.removals, ...buffer.removeSystems];
  buffer.addSystems = [...commands.additions, ...buffer.addSystems];
}

/**
 * Puts entity statuses left over by an interrupted pass back in front of the
 * ones pushed since. A status pushed since wins for the same entity.
 */
export function restoreEntityCommands(buffer: CommandBuffer, commands: Map<Entity, CommandOp>): void {
  for (const [entity, op] of buffer.entities) {
    commands.set(entity, op);
  }
  buffer.entities = commands;
}
