import type { Task } from "tinybench";
import type { MemoryResult } from "./types.js";

// ============================================================================
// Formatting helpers
// ============================================================================

function padRight(str: string, len: number): string {
  return str + " ".repeat(Math.max(0, len - str.length));
}

function padLeft(str: string, len: number): string {
  return " ".repeat(Math.max(0, len - str.length)) + str;
}

function formatNumber(n: number): string {
  return n.toLocaleString("en-US", { maximumFractionDigits: 0 });
}

type Unit = { size: number; suffix: string; digits: number };

const BYTE_UNITS: Unit[] = [
  { size: 1024 * 1024, suffix: "MB", digits: 1 },
  { size: 1024, suffix: "KB", digits: 1 },
];

const TIME_UNITS: Unit[] = [
  { size: 1_000_000, suffix: "ms", digits: 2 },
  { size: 1_000, suffix: "µs", digits: 2 },
];

const COUNT_UNITS: Unit[] = [
  { size: 1_000_000_000, suffix: "B", digits: 1 },
  { size: 1_000_000, suffix: "M", digits: 1 },
  { size: 1_000, suffix: "K", digits: 1 },
];

/** Scales `n` to the largest unit it reaches; below every unit it is printed whole. */
function formatScaled(n: number, units: Unit[], baseSuffix: string): string {
  for (const unit of units) {
    if (n >= unit.size) return `${(n / unit.size).toFixed(unit.digits)} ${unit.suffix}`;
  }
  const whole = formatNumber(Math.round(n));
  return baseSuffix ? `${whole} ${baseSuffix}` : whole;
}

function formatBytes(n: number): string {
  return formatScaled(n, BYTE_UNITS, "B");
}

/** Signed byte delta. */
function formatDelta(n: number): string {
  return `${n < 0 ? "-" : "+"}${formatBytes(Math.abs(n))}`;
}

function formatTime(ns: number): string {
  return formatScaled(ns, TIME_UNITS, "ns");
}

function formatLargeNumber(n: number): string {
  return formatScaled(n, COUNT_UNITS, "");
}

/** tinybench reports latencies in milliseconds. */
function nsFromMs(ms: number): number {
  return ms * 1_000_000;
}

// ============================================================================
// Box-drawing table
// ============================================================================

function drawTable(headers: string[], rows: string[][], colWidths: number[], leftAlignCols?: Set<number>): string {
  const top = `┌${colWidths.map((w) => "─".repeat(w + 2)).join("┬")}┐`;
  const mid = `├${colWidths.map((w) => "─".repeat(w + 2)).join("┼")}┤`;
  const bot = `└${colWidths.map((w) => "─".repeat(w + 2)).join("┴")}┘`;

  const headerRow = `│${headers.map((h, i) => ` ${padRight(h, colWidths[i]!)} `).join("│")}│`;

  const dataRows = rows.map(
    (row) =>
      "│" +
      row
        .map((cell, i) => {
          // Left-align first column and any explicitly marked columns
          const left = i === 0 || leftAlignCols?.has(i);
          return left ? ` ${padRight(cell, colWidths[i]!)} ` : ` ${padLeft(cell, colWidths[i]!)} `;
        })
        .join("│") +
      "│"
  );

  return [top, headerRow, mid, ...dataRows, bot].join("\n");
}

// ============================================================================
// Throughput report
// ============================================================================

function columnWidths(headers: string[], rows: string[][]): number[] {
  return headers.map((h, i) => rows.reduce((max, row) => Math.max(max, row[i]?.length ?? 0), h.length));
}

/**
 * One row per task. Tasks that failed or never ran are shown with dashes.
 * The ent/sec and ent/frame columns appear when any task reported an entity count.
 */
export function printThroughputReport(
  suiteName: string,
  presetName: string,
  tasks: Task[],
  entityCounts: Map<string, number>
): void {
  const hasEntCols = entityCounts.size > 0;
  const headers = hasEntCols
    ? ["Benchmark", "ops/sec", "ops/frame", "ent/sec", "ent/frame", "avg", "P75", "P99"]
    : ["Benchmark", "ops/sec", "ops/frame", "avg", "P75", "P99"];
  const rows: string[][] = [];

  // Nanoseconds in one frame at 60 fps
  const nsPerFrame = 1_000_000_000 / 60;

  for (const task of tasks) {
    const result = task.result;
    if (!result || result.error !== undefined) {
      const row = headers.map(() => "-");
      row[0] = task.name;
      rows.push(row);
      continue;
    }

    const meanNs = nsFromMs(result.mean);
    const rawOpsPerSec = meanNs > 0 ? 1_000_000_000 / meanNs : 0;
    const rawOpsPerFrame = meanNs > 0 ? nsPerFrame / meanNs : 0;
    const opsPerSec = rawOpsPerSec > 0 ? formatNumber(Math.round(rawOpsPerSec)) : "-";
    const opsPerFrame = rawOpsPerFrame > 0 ? formatNumber(Math.round(rawOpsPerFrame)) : "-";
    const avg = meanNs > 0 ? formatTime(meanNs) : "-";
    const p75 = formatTime(nsFromMs(result.p75));
    const p99 = formatTime(nsFromMs(result.p99));

    if (hasEntCols) {
      const entCount = entityCounts.get(task.name);
      const entPerSec = entCount != null && rawOpsPerSec > 0 ? formatLargeNumber(rawOpsPerSec * entCount) : "-";
      const entPerFrame =
        entCount != null && rawOpsPerFrame > 0 ? formatNumber(Math.round(rawOpsPerFrame * entCount)) : "-";
      rows.push([task.name, opsPerSec, opsPerFrame, entPerSec, entPerFrame, avg, p75, p99]);
    } else {
      rows.push([task.name, opsPerSec, opsPerFrame, avg, p75, p99]);
    }
  }

  console.log(`\n${suiteName} / ${presetName} world`);
  console.log(drawTable(headers, rows, columnWidths(headers, rows)));
}

// ============================================================================
// ASCII histogram
// ============================================================================

const HIST_BLOCKS = " ▁▂▃▄▅▆▇█";
const HIST_WIDTH = 20;

/**
 * One character per bin over sorted positive deltas. The range stops at P99 so
 * a few outliers do not squash everything into the first bin; min/max columns
 * still show the full range.
 */
function renderHistogram(posDeltas: number[]): string {
  const min = posDeltas[0];
  const cap = posDeltas[Math.min(Math.ceil(posDeltas.length * 0.99) - 1, posDeltas.length - 1)];

  if (min === undefined || cap === undefined) return "";
  if (min === cap) return "█".repeat(Math.min(posDeltas.length, HIST_WIDTH));

  const bins = new Array<number>(HIST_WIDTH).fill(0);
  for (const delta of posDeltas) {
    const bin = Math.min(Math.floor(((delta - min) / (cap - min)) * HIST_WIDTH), HIST_WIDTH - 1);
    bins[bin] = (bins[bin] ?? 0) + 1;
  }

  const maxCount = Math.max(...bins);
  const levels = HIST_BLOCKS.length - 1;

  return bins
    .map((count) => HIST_BLOCKS[maxCount > 0 ? Math.round((count / maxCount) * levels) : 0] ?? " ")
    .join("")
    .trimEnd();
}

// ============================================================================
// Memory report
// ============================================================================

export function printMemoryReport(suiteName: string, presetName: string, results: MemoryResult[]): void {
  const headers = ["Benchmark", "alloc/op", "min", "max", "P99", "GCs", "retained", "distribution"];
  const rows = results.map((r) => [
    r.label,
    formatBytes(r.allocPerOp),
    formatBytes(r.allocMin),
    formatBytes(r.allocMax),
    formatBytes(r.allocP99),
    formatNumber(r.gcCycles),
    formatDelta(r.retained),
    renderHistogram(r.posDeltas),
  ]);

  const distCol = headers.indexOf("distribution");

  console.log(`\n${suiteName} / ${presetName} world (memory, ${results[0]?.iterations ?? 0} iterations)`);
  console.log(drawTable(headers, rows, columnWidths(headers, rows), new Set([distCol])));
}
