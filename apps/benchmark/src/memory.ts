import type { MemoryResult } from "./types.js";

const WARMUP_CALLS = 2;

let didWarnAboutMissingGc = false;

/**
 * Worlds are plain objects, Maps and Sets, so `heapUsed` covers them.
 */
function heapUsed(): number {
  return process.memoryUsage().heapUsed;
}

type AllocationStats = Omit<MemoryResult, "label" | "retained" | "iterations">;

const NO_ALLOCATIONS: AllocationStats = {
  allocPerOp: 0,
  allocMin: 0,
  allocMax: 0,
  allocP99: 0,
  gcCycles: 0,
  posDeltas: [],
};

/**
 * Positive deltas are allocations. A negative delta means the collector ran
 * during the call; those only count towards `gcCycles`. With more than 12
 * positive samples the two smallest and two largest are trimmed.
 */
function summarizeDeltas(deltas: readonly number[]): AllocationStats {
  const positive = deltas.filter((d) => d > 0).sort((a, b) => a - b);
  const gcCycles = deltas.filter((d) => d < 0).length;

  const trimmed = positive.length > 12 ? positive.slice(2, -2) : positive;
  const first = trimmed[0];
  const last = trimmed[trimmed.length - 1];

  if (first === undefined || last === undefined) {
    return { ...NO_ALLOCATIONS, gcCycles };
  }

  const sum = trimmed.reduce((acc, d) => acc + d, 0);
  const p99Index = Math.min(Math.ceil(trimmed.length * 0.99) - 1, trimmed.length - 1);

  return {
    allocPerOp: sum / trimmed.length,
    allocMin: first,
    allocMax: last,
    allocP99: trimmed[p99Index] ?? last,
    gcCycles,
    posDeltas: trimmed,
  };
}

/**
 * Measures what one call of `fn` allocates and what it retains.
 *
 * The first pass samples the heap around every call. The second runs the same
 * number of calls between two forced collections, so whatever survives is
 * reported as `retained` per call.
 *
 * Needs `node --expose-gc`; without it every figure is zero and a warning is
 * printed once.
 */
export function measureMemory(label: string, iterations: number, fn: () => void): MemoryResult {
  const gc = globalThis.gc;

  if (!gc) {
    if (!didWarnAboutMissingGc) {
      didWarnAboutMissingGc = true;
      console.warn("GC not exposed. Run with --expose-gc for memory measurements");
    }
    return { label, ...NO_ALLOCATIONS, retained: 0, iterations };
  }

  for (let i = 0; i < WARMUP_CALLS; i++) {
    fn();
  }

  gc();
  const deltas: number[] = [];
  for (let i = 0; i < iterations; i++) {
    const before = heapUsed();
    fn();
    deltas.push(heapUsed() - before);
  }

  gc();
  const retainedBefore = heapUsed();
  for (let i = 0; i < iterations; i++) {
    fn();
  }
  gc();
  const retained = (heapUsed() - retainedBefore) / iterations;

  return { label, ...summarizeDeltas(deltas), retained, iterations };
}
