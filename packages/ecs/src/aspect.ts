import type { ComponentName, ComponentPresence } from "./component.js";

// ============================================================================
// Aspect Types
// ============================================================================

/**
 * Immutable entity filter.
 *
 * An entity matches when it has every `required` component, none of the
 * `excluded` ones, and at least one component of each `oneRequired` group.
 * The empty aspect (`isEmpty`) matches nothing.
 */
export type Aspect = {
  /**
   * Components that must all be present.
   */
  readonly required: ReadonlySet<ComponentName>;

  /**
   * Components that must all be absent.
   */
  readonly excluded: ReadonlySet<ComponentName>;

  /**
   * One-of groups. `createAspect` yields at most one group; composition
   * concatenates them. Groups are never empty.
   */
  readonly oneRequired: readonly ReadonlySet<ComponentName>[];

  /**
   * True for the aspect that matches no entity.
   */
  readonly isEmpty: boolean;
};

/**
 * Component name list accepted by `createAspect`. Missing lists count as empty.
 */
export type ComponentList = readonly ComponentName[] | ReadonlySet<ComponentName> | null | undefined;

/**
 * The aspect that matches nothing. Default for systems without an aspect.
 */
export const EMPTY_ASPECT: Aspect = Object.freeze({
  required: new Set<ComponentName>(),
  excluded: new Set<ComponentName>(),
  oneRequired: Object.freeze([]),
  isEmpty: true,
});

// ============================================================================
// Construction
// ============================================================================

function toArray(list: ComponentList): readonly ComponentName[] {
  if (!list) {
    return [];
  }
  return Array.from(list);
}

function freezeAspect(
  required: Set<ComponentName>,
  excluded: Set<ComponentName>,
  oneRequired: ReadonlySet<ComponentName>[]
): Aspect {
  return Object.freeze({
    required,
    excluded,
    oneRequired: Object.freeze(oneRequired),
    isEmpty: false,
  });
}

/**
 * Creates an aspect.
 *
 * Rules, in order:
 * 1. No required and no one-required names: the empty aspect.
 * 2. A name both required and excluded: the empty aspect.
 * 3. A one-required name that is also required makes the one-of group
 *    redundant, so it is dropped.
 * 4. Excluded names can never satisfy the one-of group and are left out of it.
 *
 * Duplicate names are harmless. Input lists are not mutated.
 *
 * @param required - Components that must be present
 * @param excluded - Components that must be absent
 * @param oneRequired - Components of which at least one must be present
 * @returns Frozen aspect
 *
 * @example
 * ```typescript
 * const movers = createAspect(["position", "velocity"], ["frozen"]);
 * const visible = createAspect(null, ["hidden"], ["sprite", "mesh"]);
 * ```
 */
export function createAspect(required?: ComponentList, excluded?: ComponentList, oneRequired?: ComponentList): Aspect {
  const requiredNames = toArray(required);
  const oneRequiredNames = toArray(oneRequired);

  if (requiredNames.length === 0 && oneRequiredNames.length === 0) {
    return EMPTY_ASPECT;
  }

  const excludedSet = new Set(toArray(excluded));
  const requiredSet = new Set<ComponentName>();

  for (const name of requiredNames) {
    if (excludedSet.has(name)) {
      return EMPTY_ASPECT;
    }
    requiredSet.add(name);
  }

  let group: Set<ComponentName> | null = new Set();

  for (const name of oneRequiredNames) {
    if (requiredSet.has(name)) {
      group = null;
      break;
    }
    if (!excludedSet.has(name)) {
      group.add(name);
    }
  }

  return freezeAspect(requiredSet, excludedSet, group && group.size > 0 ? [group] : []);
}

// ============================================================================
// Composition
// ============================================================================

/**
 * Composes aspects by conjunction: the result matches exactly the entities
 * that match every input.
 *
 * Required and excluded sets are unioned and one-of groups concatenated, then
 * the construction rules are applied to the union. A one-of group whose
 * members are all excluded by another input can no longer be satisfied and
 * collapses the result to the empty aspect.
 *
 * @returns Composed aspect (empty if any input is empty, or if there are no inputs)
 *
 * @example
 * ```typescript
 * const base = createAspect(["position"]);
 * const enemies = composeAspects(base, createAspect(["enemy"], ["dead"]));
 * ```
 */
export function composeAspects(...aspects: Aspect[]): Aspect {
  if (aspects.length === 0) {
    return EMPTY_ASPECT;
  }

  const required = new Set<ComponentName>();
  const excluded = new Set<ComponentName>();
  const groups: ReadonlySet<ComponentName>[] = [];

  for (const aspect of aspects) {
    // Conjunction with "matches nothing" matches nothing
    if (aspect.isEmpty) {
      return EMPTY_ASPECT;
    }

    for (const name of aspect.required) {
      required.add(name);
    }
    for (const name of aspect.excluded) {
      excluded.add(name);
    }
    groups.push(...aspect.oneRequired);
  }

  for (const name of required) {
    if (excluded.has(name)) {
      return EMPTY_ASPECT;
    }
  }

  const oneRequired: ReadonlySet<ComponentName>[] = [];

  for (const group of groups) {
    if (intersects(group, required)) {
      continue;
    }

    const remaining = new Set<ComponentName>();
    for (const name of group) {
      if (!excluded.has(name)) {
        remaining.add(name);
      }
    }

    if (remaining.size === 0) {
      return EMPTY_ASPECT;
    }
    oneRequired.push(remaining);
  }

  return freezeAspect(required, excluded, oneRequired);
}

function intersects(group: ReadonlySet<ComponentName>, names: ComponentPresence): boolean {
  for (const name of group) {
    if (names.has(name)) {
      return true;
    }
  }
  return false;
}

// ============================================================================
// Matching
// ============================================================================

/**
 * Tests an entity's components against an aspect.
 *
 * @param aspect - Aspect to test
 * @param components - Presence lookup for the entity's components
 * @returns True if the entity matches
 *
 * @example
 * ```typescript
 * matchesAspect(createAspect(["position"]), new Set(["position", "sprite"])); // true
 * ```
 */
export function matchesAspect(aspect: Aspect, components: ComponentPresence): boolean {
  if (aspect.isEmpty) {
    return false;
  }

  for (const name of aspect.required) {
    if (!components.has(name)) {
      return false;
    }
  }

  for (const name of aspect.excluded) {
    if (components.has(name)) {
      return false;
    }
  }

  for (const group of aspect.oneRequired) {
    if (!intersects(group, components)) {
      return false;
    }
  }

  return true;
}
