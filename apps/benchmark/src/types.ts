import type { World } from "loom-ecs";

export type PresetName = "empty" | "small" | "medium" | "large";

export type PresetFactory = () => World;

/**
 * State prepared for one benchmark run on a fresh preset world.
 */
export type PreparedBenchmark = {
  /** The measured operation. */
  run: () => void;
  /** Entities touched per call, for throughput scaling. */
  entities?: number;
};

export type BenchmarkDef = {
  name: string;
  presets: PresetName[];
  prepare: (world: World) => PreparedBenchmark;
};

export type Suite = {
  name: string;
  benchmarks: BenchmarkDef[];
};

export type MemoryResult = {
  label: string;
  /** Mean of positive per-iteration deltas (average bytes allocated per op). */
  allocPerOp: number;
  allocMin: number;
  allocMax: number;
  allocP99: number;
  /** Number of iterations where GC fired (negative delta). */
  gcCycles: number;
  /** Net retained delta per op after a final GC (leak indicator). */
  retained: number;
  /** Positive deltas sorted ascending, for histogram rendering. */
  posDeltas: number[];
  iterations: number;
};
