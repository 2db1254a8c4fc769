import { type Aspect, type ComponentName, composeAspects, createAspect, matchesAspect } from "loom-ecs";
import { splitmix32 } from "loom-ecs/rng";
import {
  Active,
  Enemy,
  generateComponentNames,
  Health,
  Player,
  Position,
  randomAspect,
  Velocity,
  Visible,
} from "../fixtures.js";
import type { BenchmarkDef, PresetName, Suite } from "../types.js";

// ---------------------------------------------------------------------------
// Presets
// ---------------------------------------------------------------------------

// Aspects never touch the world
const presets: PresetName[] = ["empty"];

// ---------------------------------------------------------------------------
// Shared inputs
// ---------------------------------------------------------------------------

const POOL = [...generateComponentNames(24), Position, Velocity, Health, Player, Enemy, Active, Visible];

const MATCH_SAMPLES = 64;

/** Component sets of 2-8 names from POOL. */
function sampleComponentSets(seed: number): ReadonlySet<ComponentName>[] {
  const rng = splitmix32(seed);
  const sets: ReadonlySet<ComponentName>[] = [];
  for (let i = 0; i < MATCH_SAMPLES; i++) {
    const names = new Set<ComponentName>();
    const count = 2 + Math.floor(rng() * 7);
    for (let j = 0; j < count; j++) {
      names.add(POOL[Math.floor(rng() * POOL.length)]!);
    }
    sets.push(names);
  }
  return sets;
}

function sampleAspects(count: number, seed: number): Aspect[] {
  const rng = splitmix32(seed);
  return Array.from({ length: count }, () => randomAspect(rng, POOL));
}

// ---------------------------------------------------------------------------
// Construction
// ---------------------------------------------------------------------------

function constructionBenchmarks(): BenchmarkDef[] {
  return [
    {
      name: "create required",
      presets,
      prepare() {
        return {
          run() {
            createAspect([Position, Velocity]);
          },
        };
      },
    },
    {
      name: "create required + excluded + one-of",
      presets,
      prepare() {
        return {
          run() {
            createAspect([Position, Velocity], [Enemy], [Player, Active, Visible]);
          },
        };
      },
    },
    {
      name: "create contradictory",
      presets,
      prepare() {
        return {
          run() {
            createAspect([Position, Enemy], [Enemy]);
          },
        };
      },
    },
  ];
}

// ---------------------------------------------------------------------------
// Composition
// ---------------------------------------------------------------------------

function compositionBenchmarks(): BenchmarkDef[] {
  return [2, 4, 8].map((count) => ({
    name: `compose ${count} aspects`,
    presets,
    prepare() {
      const aspects = sampleAspects(count, 7);
      return {
        run() {
          composeAspects(...aspects);
        },
      };
    },
  }));
}

// ---------------------------------------------------------------------------
// Matching
// ---------------------------------------------------------------------------

function matchingBenchmarks(): BenchmarkDef[] {
  const shapes: { label: string; aspect: () => Aspect }[] = [
    { label: "required", aspect: () => createAspect([Position, Velocity]) },
    { label: "required + excluded", aspect: () => createAspect([Position], [Enemy]) },
    { label: "one-of", aspect: () => createAspect(null, null, [Player, Enemy, Health]) },
    { label: "composed", aspect: () => composeAspects(...sampleAspects(4, 11)) },
  ];

  return shapes.map((shape) => ({
    name: `match ${shape.label}`,
    presets,
    prepare() {
      const aspect = shape.aspect();
      const samples = sampleComponentSets(99);
      let sink = 0;

      return {
        run() {
          let matched = 0;
          for (let i = 0; i < samples.length; i++) {
            if (matchesAspect(aspect, samples[i]!)) matched++;
          }
          sink += matched;
        },
        entities: samples.length,
      };
    },
  }));
}

// ---------------------------------------------------------------------------
// Suite export
// ---------------------------------------------------------------------------

export const suite: Suite = {
  name: "Aspect",
  benchmarks: [...constructionBenchmarks(), ...compositionBenchmarks(), ...matchingBenchmarks()],
};
