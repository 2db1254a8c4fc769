// ============================================================================
// ID Limits
// ============================================================================

/**
 * Maximum raw entity ID (20-bit).
 */
export const ID_MASK_20 = 0xfffff;

/**
 * Maximum generation (8-bit). Generations wrap around after this value.
 */
export const ID_MASK_8 = 0xff;

/**
 * Bit position of the generation field.
 */
export const GENERATION_SHIFT = 20;

// ============================================================================
// Branded Types
// ============================================================================

/**
 * Entity brand for nominal typing.
 */
declare const ENTITY_BRAND: unique symbol;

/**
 * Entity handle (branded type).
 *
 * Low 20 bits hold the raw arena ID, the next 8 bits the generation. A handle
 * whose generation no longer matches the arena slot is stale.
 */
export type Entity = number & { [ENTITY_BRAND]: true };

// ============================================================================
// Encoding
// ============================================================================

/**
 * Packs a raw ID and generation into an entity handle.
 *
 * @example
 * ```typescript
 * const entity = encodeEntity(5, 2);
 * extractId(entity); // 5
 * extractGeneration(entity); // 2
 * ```
 */
export function encodeEntity(rawId: number, generation: number): Entity {
  return (((generation & ID_MASK_8) << GENERATION_SHIFT) | (rawId & ID_MASK_20)) as Entity;
}

/**
 * Raw arena ID of a handle.
 */
export function extractId(entity: Entity): number {
  return entity & ID_MASK_20;
}

/**
 * Generation of a handle.
 */
export function extractGeneration(entity: Entity): number {
  return (entity >>> GENERATION_SHIFT) & ID_MASK_8;
}

/**
 * Largest value a handle can take (20-bit ID + 8-bit generation).
 */
const MAX_HANDLE = (ID_MASK_8 << GENERATION_SHIFT) | ID_MASK_20;

/**
 * Checks that a value is shaped like an entity handle. Says nothing about
 * whether the handle is alive.
 */
export function isEntityHandle(value: unknown): value is Entity {
  return typeof value === "number" && Number.isInteger(value) && value > 0 && value <= MAX_HANDLE;
}
