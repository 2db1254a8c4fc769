import {
  createAspect,
  defineSystem,
  dequeue,
  enqueue,
  getComponent,
  getEntityCount,
  getSystemEntities,
  syncSystems,
  update,
} from "loom-ecs";
import { Position, Velocity } from "../fixtures.js";
import type { BenchmarkDef, PresetName, Suite } from "../types.js";

// ---------------------------------------------------------------------------
// Presets
// ---------------------------------------------------------------------------

const allPresets: PresetName[] = ["empty", "small", "medium", "large"];
const populatedPresets: PresetName[] = ["small", "medium", "large"];

const DT = 1 / 60;

// ---------------------------------------------------------------------------
// Systems
// ---------------------------------------------------------------------------

const movement = defineSystem({
  name: "Bench_Movement",
  aspect: createAspect([Position, Velocity]),
  update(entity, dt, world) {
    const position = getComponent(world, entity, Position);
    const velocity = getComponent(world, entity, Velocity);
    if (position && velocity) {
      position.x += velocity.vx * dt;
      position.y += velocity.vy * dt;
    }
  },
});

const probe = defineSystem({
  name: "Bench_Probe",
  aspect: createAspect([Position]),
});

// ---------------------------------------------------------------------------
// Benchmarks
// ---------------------------------------------------------------------------

function frameBenchmarks(): BenchmarkDef[] {
  return [
    {
      name: "frame (idle systems)",
      presets: allPresets,
      prepare(world) {
        return {
          run() {
            update(world, DT);
          },
        };
      },
    },
    {
      name: "frame (movement)",
      presets: populatedPresets,
      prepare(world) {
        enqueue(world, movement);
        syncSystems(world);

        return {
          run() {
            update(world, DT);
          },
          entities: getSystemEntities(world, movement).size,
        };
      },
    },
  ];
}

/**
 * Registering a system populates it from every resident entity; removing it
 * walks its members for onRemove.
 */
function systemChurnBenchmarks(): BenchmarkDef[] {
  return [
    {
      name: "system add + remove",
      presets: allPresets,
      prepare(world) {
        return {
          run() {
            enqueue(world, probe);
            syncSystems(world);
            dequeue(world, probe);
            syncSystems(world);
          },
          entities: getEntityCount(world),
        };
      },
    },
  ];
}

// ---------------------------------------------------------------------------
// Suite export
// ---------------------------------------------------------------------------

export const suite: Suite = {
  name: "Update",
  benchmarks: [...frameBenchmarks(), ...systemChurnBenchmarks()],
};
