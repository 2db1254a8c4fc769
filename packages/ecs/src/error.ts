// ============================================================================
// Base Error
// ============================================================================

/**
 * Base class of the errors thrown by world operations. Errors thrown by host
 * hooks are not wrapped and reach the caller of update() as they are.
 *
 * @example
 * ```typescript
 * try {
 *   enqueue(world, releasedEntity);
 * } catch (error) {
 *   if (error instanceof NotFound) {
 *     console.log(error.resource, error.id);
 *   }
 * }
 * ```
 */
export class LoomError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

// ============================================================================
// Error Categories
// ============================================================================

/**
 * Thrown by createEntity() when every one of the 2^20 - 1 raw IDs is in use
 * and none has been released for recycling.
 */
export class LimitExceeded extends LoomError {
  readonly resource: string;
  readonly max: number;
  readonly id?: number;

  constructor(params: { resource: string; max: number; id?: number }) {
    const idInfo = params.id !== undefined ? ` (cannot allocate ID ${params.id})` : "";
    super(`${params.resource} limit exceeded: max ${params.max}${idInfo}`);
    this.resource = params.resource;
    this.max = params.max;
    this.id = params.id;
  }
}

/**
 * Thrown when a handle does not refer to a live item.
 *
 * @example
 * ```typescript
 * destroyEntity(world, entity);
 * update(world, 0);
 * setComponent(world, entity, Position, { x: 0, y: 0 }); // throws NotFound
 * ```
 */
export class NotFound extends LoomError {
  readonly resource: string;
  readonly id: string | number;
  readonly context?: string;

  constructor(params: { resource: string; id: string | number; context?: string }) {
    const ctx = params.context ? ` in ${params.context}` : "";
    super(`${params.resource} "${params.id}" not found${ctx}`);
    this.resource = params.resource;
    this.id = params.id;
    this.context = params.context;
  }
}

/**
 * Thrown when a value is not what a world operation takes.
 *
 * @example
 * ```typescript
 * defineSystem({ name: "" });     // expected non-empty system name
 * enqueueEntity(world, "player"); // expected entity handle, got string
 * ```
 */
export class InvalidArgument extends LoomError {
  readonly expected: string;
  readonly actual?: string;

  constructor(params: { expected: string; actual?: string }) {
    const act = params.actual !== undefined ? `, got ${params.actual}` : "";
    super(`Invalid argument: expected ${params.expected}${act}`);
    this.expected = params.expected;
    this.actual = params.actual;
  }
}

/**
 * Thrown when the world cannot take the operation right now.
 *
 * @example
 * ```typescript
 * // A pass started from a hook of another pass
 * defineSystem({ name: "spawner", onAdd: (_entity, w) => update(w, 0) });
 *
 * // An entity waiting for release
 * destroyEntity(world, entity);
 * enqueue(world, entity);
 * ```
 */
export class InvalidState extends LoomError {
  constructor(params: { message: string }) {
    super(params.message);
  }
}

// ============================================================================
// Assert Utility
// ============================================================================

/**
 * Assert a condition, throwing a typed error if false.
 *
 * The error is only constructed when the condition fails. `asserts condition`
 * narrows the type at call sites.
 *
 * @param condition - Value to check for truthiness
 * @param ErrorClass - Error class to instantiate on failure
 * @param params - Constructor parameters for the error class
 *
 * @example
 * ```typescript
 * assert(isSystem(system), InvalidArgument, { expected: "system", actual: describeValue(system) });
 * ```
 */
export function assert<P>(condition: unknown, ErrorClass: new (params: P) => LoomError, params: P): asserts condition {
  if (!condition) {
    throw new ErrorClass(params);
  }
}
