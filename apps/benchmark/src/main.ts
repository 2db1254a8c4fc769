import { Bench } from "tinybench";

import { measureMemory } from "./memory.js";
import { presets } from "./presets.js";
import { printMemoryReport, printThroughputReport } from "./report.js";
import { suite as aspectSuite } from "./suites/aspect.js";
import { suite as entitySuite } from "./suites/entity.js";
import { suite as updateSuite } from "./suites/update.js";
import type { BenchmarkDef, MemoryResult, PreparedBenchmark, PresetName, Suite } from "./types.js";

const allSuites: Suite[] = [entitySuite, aspectSuite, updateSuite];

// ---------------------------------------------------------------------------
// Benchmark runtime settings
// ---------------------------------------------------------------------------

/**
 * time/warmupTime are 0 so tinybench runs a fixed number of iterations instead
 * of filling a wall-clock budget. Spawn benchmarks accumulate entities, and a
 * time budget would make their world size depend on machine speed.
 */
const THROUGHPUT_CONFIG = {
  time: 0,
  warmupTime: 0,
  warmupIterations: 1024,
  iterations: 8192,
};

const MEMORY_ITERATIONS = 2048;

/**
 * Heap measurements are noisy: each benchmark is sampled on several fresh
 * worlds and the median is reported.
 */
const MEMORY_SAMPLES = 8;

// ---------------------------------------------------------------------------
// CLI argument parsing
// ---------------------------------------------------------------------------

const args = process.argv.slice(2);
const memoryMode = args.includes("--memory");

const presetFlagIdx = args.indexOf("--preset");
const presetFlag = presetFlagIdx !== -1 ? args[presetFlagIdx + 1] : undefined;
const presetFilter = parsePresetFlag(presetFlag);

const suiteFilter = args.find((a) => !a.startsWith("--") && a !== presetFlag);

function isPresetName(value: string): value is PresetName {
  return Object.hasOwn(presets, value);
}

function parsePresetFlag(flag: string | undefined): PresetName | undefined {
  if (flag === undefined) return undefined;
  if (!isPresetName(flag)) {
    console.error(`Unknown preset "${flag}". Available: ${Object.keys(presets).join(", ")}`);
    process.exit(1);
  }
  return flag;
}

// ---------------------------------------------------------------------------
// Runner
// ---------------------------------------------------------------------------

function groupBenchmarksByPreset(benchmarks: BenchmarkDef[]): Map<PresetName, BenchmarkDef[]> {
  const byPreset = new Map<PresetName, BenchmarkDef[]>();
  for (const bench of benchmarks) {
    for (const preset of bench.presets) {
      if (presetFilter !== undefined && preset !== presetFilter) continue;
      let list = byPreset.get(preset);
      if (!list) {
        list = [];
        byPreset.set(preset, list);
      }
      list.push(bench);
    }
  }
  return byPreset;
}

function pickMedianMemoryResult(samples: MemoryResult[]): MemoryResult {
  const sorted = [...samples].sort((a, b) => a.allocPerOp - b.allocPerOp);
  return sorted[Math.floor(sorted.length / 2)]!;
}

async function runThroughput(suite: Suite): Promise<void> {
  for (const [presetName, benchmarks] of groupBenchmarksByPreset(suite.benchmarks)) {
    const factory = presets[presetName];
    const bench = new Bench(THROUGHPUT_CONFIG);
    const entityCounts = new Map<string, number>();

    for (const def of benchmarks) {
      // One world per task, rebuilt before warmup and before the measured run.
      // Entities accumulate across iterations: a fresh world per iteration
      // would cost more than the operation being measured.
      let prepared: PreparedBenchmark | undefined;

      bench.add(
        def.name,
        () => {
          prepared?.run();
        },
        {
          beforeAll() {
            prepared = def.prepare(factory());
            if (prepared.entities !== undefined) {
              entityCounts.set(def.name, prepared.entities);
            }
          },
          afterAll() {
            prepared = undefined;
          },
        }
      );
    }

    await bench.warmup();
    await bench.run();
    printThroughputReport(suite.name, presetName, bench.tasks, entityCounts);
  }
}

function runMemory(suite: Suite): void {
  for (const [presetName, benchmarks] of groupBenchmarksByPreset(suite.benchmarks)) {
    const factory = presets[presetName];
    const results: MemoryResult[] = [];

    for (const def of benchmarks) {
      const samples: MemoryResult[] = [];

      for (let sample = 0; sample < MEMORY_SAMPLES; sample++) {
        const { run } = def.prepare(factory());
        samples.push(measureMemory(def.name, MEMORY_ITERATIONS, run));
      }

      results.push(pickMedianMemoryResult(samples));
    }

    printMemoryReport(suite.name, presetName, results);
  }
}

// ---------------------------------------------------------------------------
// Main
// ---------------------------------------------------------------------------

async function main(): Promise<void> {
  const suites = suiteFilter
    ? allSuites.filter((s) => s.name.toLowerCase() === suiteFilter.toLowerCase())
    : allSuites;

  if (suites.length === 0) {
    const names = allSuites.map((s) => s.name.toLowerCase()).join(", ");
    console.error(`No suite found matching "${suiteFilter}". Available: ${names}`);
    process.exitCode = 1;
    return;
  }

  const mode = memoryMode ? "memory" : "throughput";
  console.log(`Running ${suites.map((s) => s.name).join(", ")} in ${mode} mode\n`);

  for (const suite of suites) {
    if (memoryMode) {
      runMemory(suite);
    } else {
      await runThroughput(suite);
    }
  }
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
