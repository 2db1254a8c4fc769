import {
  type ComponentName,
  type ComponentRecord,
  createEntity,
  createWorld,
  defineSystem,
  enqueue,
  update,
  type World,
} from "loom-ecs";
import { type Rng, splitmix32 } from "loom-ecs/rng";
import {
  Damage,
  FIXTURE_COMPONENTS,
  generateComponentNames,
  Health,
  pick,
  Position,
  randomAspect,
  Velocity,
} from "./fixtures.js";
import type { PresetFactory, PresetName } from "./types.js";

// ---------------------------------------------------------------------------
// Data factories for named fixture components
// ---------------------------------------------------------------------------

type DataFactory = (rng: Rng) => unknown;

const fixtureDataFactories = new Map<ComponentName, DataFactory>([
  [Position, (rng) => ({ x: rng(), y: rng() })],
  [Velocity, (rng) => ({ vx: rng(), vy: rng() })],
  [Health, (rng) => ({ hp: Math.floor(rng() * 100) })],
  [Damage, (rng) => ({ amount: Math.floor(rng() * 50) })],
]);

// ---------------------------------------------------------------------------
// Population helpers
// ---------------------------------------------------------------------------

/**
 * 2-6 components drawn from `pool`, so systems see entities of many shapes
 * rather than one set shared by every entity.
 */
function randomRecord(rng: Rng, pool: readonly ComponentName[]): ComponentRecord {
  const record: Record<ComponentName, unknown> = {};
  const count = 2 + Math.floor(rng() * 5);

  for (let i = 0; i < count; i++) {
    const name = pick(rng, pool);
    const factory = fixtureDataFactories.get(name);
    record[name] = factory ? factory(rng) : { v: rng() };
  }

  return record;
}

function populateEntities(world: World, count: number, pool: readonly ComponentName[], seed: number): void {
  const rng = splitmix32(seed);

  for (let i = 0; i < count; i++) {
    enqueue(world, createEntity(world, randomRecord(rng, pool)));
  }
}

/**
 * Registers hook-less systems with random aspects. They only add membership
 * bookkeeping to every sync, which is what the benchmarks should pay for.
 */
function registerSystems(world: World, count: number, pool: readonly ComponentName[], seed: number): void {
  const rng = splitmix32(seed);

  for (let i = 0; i < count; i++) {
    enqueue(world, defineSystem({ name: `BenchGen_System_${i}`, aspect: randomAspect(rng, pool) }));
  }
}

// ---------------------------------------------------------------------------
// Preset factories
// ---------------------------------------------------------------------------

/**
 * | Preset | Entities | Component names | Systems |
 * |--------|----------|-----------------|---------|
 * | empty  | 0        | 0               | 0       |
 * | small  | 1,000    | 24              | 16      |
 * | medium | 10,000   | 72              | 64      |
 * | large  | 100,000  | 136             | 128     |
 */
function createPopulatedPreset(entities: number, systems: number, generatedNames: number): World {
  const pool = [...generateComponentNames(generatedNames), ...FIXTURE_COMPONENTS];
  const world = createWorld();

  registerSystems(world, systems, pool, 123);
  populateEntities(world, entities, pool, 42);
  update(world, 0);

  return world;
}

export const presets: Record<PresetName, PresetFactory> = {
  empty: () => createWorld(),
  small: () => createPopulatedPreset(1_000, 16, 16),
  medium: () => createPopulatedPreset(10_000, 64, 64),
  large: () => createPopulatedPreset(100_000, 128, 128),
};
