import { type Aspect, type ComponentName, createAspect, defineComponent } from "loom-ecs";
import type { Rng } from "loom-ecs/rng";

// ---------------------------------------------------------------------------
// Random helpers
// ---------------------------------------------------------------------------

export function pick<T>(rng: Rng, items: readonly T[]): T {
  const item = items[Math.floor(rng() * items.length)];

  if (item === undefined) {
    throw new Error("Cannot pick from an empty list");
  }

  return item;
}

// ---------------------------------------------------------------------------
// Named fixtures
// ---------------------------------------------------------------------------

export const Position = defineComponent<{ x: number; y: number }>("Bench_Position");
export const Velocity = defineComponent<{ vx: number; vy: number }>("Bench_Velocity");
export const Health = defineComponent<{ hp: number }>("Bench_Health");
export const Damage = defineComponent<{ amount: number }>("Bench_Damage");

// Marker components carry `true`
export const Player = defineComponent<true>("Bench_Player");
export const Enemy = defineComponent<true>("Bench_Enemy");
export const Active = defineComponent<true>("Bench_Active");
export const Visible = defineComponent<true>("Bench_Visible");

export const FIXTURE_COMPONENTS: readonly ComponentName[] = [
  Position,
  Velocity,
  Health,
  Damage,
  Player,
  Enemy,
  Active,
  Visible,
];

// ---------------------------------------------------------------------------
// Generated fixtures
// ---------------------------------------------------------------------------

export function generateComponentNames(n: number): ComponentName[] {
  const names: ComponentName[] = [];
  for (let i = 0; i < n; i++) {
    names.push(`BenchGen_Comp_${i}`);
  }
  return names;
}

/**
 * Random aspect over `pool`: 1-3 required names, an excluded name 20% of the
 * time and a one-of group of up to 3 names half of the time. Contradictory
 * draws collapse to the empty aspect like any other aspect would.
 */
export function randomAspect(rng: Rng, pool: readonly ComponentName[]): Aspect {
  const required: ComponentName[] = [];
  const requiredCount = 1 + Math.floor(rng() * 3);
  for (let i = 0; i < requiredCount; i++) {
    required.push(pick(rng, pool));
  }

  const excluded = rng() < 0.2 ? [pick(rng, pool)] : [];

  const oneRequired: ComponentName[] = [];
  if (rng() < 0.5) {
    const groupSize = 1 + Math.floor(rng() * 3);
    for (let i = 0; i < groupSize; i++) {
      oneRequired.push(pick(rng, pool));
    }
  }

  return createAspect(required, excluded, oneRequired);
}
