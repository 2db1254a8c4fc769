import {
  type ComponentRecord,
  createEntity,
  destroyEntity,
  type Entity,
  enqueue,
  getEntities,
  syncEntities,
} from "loom-ecs";
import { Active, Enemy, Health, Player, Position, Velocity, Visible } from "../fixtures.js";
import type { BenchmarkDef, PresetName, Suite } from "../types.js";

// ---------------------------------------------------------------------------
// Component sets by size
// ---------------------------------------------------------------------------

type ComponentSet = {
  label: string;
  /** Fresh record per entity: hooks may mutate component values. */
  make: () => ComponentRecord;
};

const componentSets: ComponentSet[] = [
  { label: "empty entity", make: () => ({}) },
  {
    label: "entity + 2 comps",
    make: () => ({ [Position]: { x: 0, y: 0 }, [Player]: true }),
  },
  {
    label: "entity + 4 comps",
    make: () => ({ [Position]: { x: 0, y: 0 }, [Velocity]: { vx: 0, vy: 0 }, [Player]: true, [Enemy]: true }),
  },
  {
    label: "entity + 8 comps",
    make: () => ({
      [Position]: { x: 0, y: 0 },
      [Velocity]: { vx: 0, vy: 0 },
      [Health]: { hp: 100 },
      [Player]: true,
      [Enemy]: true,
      [Active]: true,
      [Visible]: true,
      BenchGen_Comp_0: { v: 0 },
    }),
  },
];

// ---------------------------------------------------------------------------
// Presets
// ---------------------------------------------------------------------------

const spawnPresets: PresetName[] = ["empty", "small", "medium"];
const despawnPresets: PresetName[] = ["small", "medium"];
const residentPresets: PresetName[] = ["small", "medium", "large"];

// ---------------------------------------------------------------------------
// Spawn benchmarks
// ---------------------------------------------------------------------------

/**
 * Each iteration creates, enqueues and syncs one entity, so the cost includes
 * matching it against every registered system.
 */
function spawnBenchmarks(): BenchmarkDef[] {
  return componentSets.map((set) => ({
    name: `spawn ${set.label}`,
    presets: spawnPresets,
    prepare(world) {
      return {
        run() {
          enqueue(world, createEntity(world, set.make()));
          syncEntities(world);
        },
        entities: 1,
      };
    },
  }));
}

// ---------------------------------------------------------------------------
// Despawn benchmarks
// ---------------------------------------------------------------------------

/**
 * Despawn benchmarks pre-create a pool of resident entities, then consume one
 * per iteration. The pool must be larger than warmupIterations + iterations
 * (currently 1,024 + 8,192 = 9,216) to avoid measuring no-ops.
 */
const DESPAWN_POOL_SIZE = 10_000;

function despawnBenchmarks(): BenchmarkDef[] {
  return componentSets.map((set) => ({
    name: `despawn ${set.label}`,
    presets: despawnPresets,
    prepare(world) {
      const pool: Entity[] = [];
      for (let i = 0; i < DESPAWN_POOL_SIZE; i++) {
        const entity = createEntity(world, set.make());
        enqueue(world, entity);
        pool.push(entity);
      }
      syncEntities(world);

      let idx = 0;

      return {
        run() {
          const entity = pool[idx];
          if (entity === undefined) return;
          destroyEntity(world, entity);
          syncEntities(world);
          idx++;
        },
        entities: 1,
      };
    },
  }));
}

// ---------------------------------------------------------------------------
// Re-sync benchmarks
// ---------------------------------------------------------------------------

/**
 * Re-enqueues resident entities in batches, the path a host takes after
 * changing components.
 */
function resyncBenchmarks(): BenchmarkDef[] {
  return [1, 100].map((batch) => ({
    name: `re-enqueue ${batch} resident`,
    presets: residentPresets,
    prepare(world) {
      const resident = Array.from(getEntities(world));
      let idx = 0;

      return {
        run() {
          for (let i = 0; i < batch; i++) {
            enqueue(world, resident[idx % resident.length]!);
            idx++;
          }
          syncEntities(world);
        },
        entities: batch,
      };
    },
  }));
}

// ---------------------------------------------------------------------------
// Suite export
// ---------------------------------------------------------------------------

export const suite: Suite = {
  name: "Entity",
  benchmarks: [...spawnBenchmarks(), ...despawnBenchmarks(), ...resyncBenchmarks()],
};
