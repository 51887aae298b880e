// Performance benchmark for the solver
// Target: mean solve time per puzzle within TARGET_MEAN_MS for every scenario and mode

import { parsePuzzle } from "../src/puzzle/input";
import { solvePuzzle } from "../src/solver/index";

import type { Puzzle } from "../src/puzzle/types";
import type { SearchMode } from "../src/solver/types";

const WARMUP_RUNS = 5;
const MEASUREMENT_RUNS = 30;
const TARGET_MEAN_MS = 250;
const MODES: ReadonlyArray<SearchMode> = ["bfs", "astar"];

const BENCHMARK_SCENARIOS = [
  {
    capacity: 4,
    description: "Two colors, two empties",
    name: "Interleaved 2",
    tubes: [["red", "blue", "red", "blue"], ["blue", "red", "blue", "red"], [], []],
  },
  {
    capacity: 4,
    description: "Three colors rotated one step per tube",
    name: "Rotated 3",
    tubes: [
      ["amber", "teal", "violet", "amber"],
      ["teal", "violet", "amber", "teal"],
      ["violet", "amber", "teal", "violet"],
      [],
      [],
    ],
  },
  {
    capacity: 4,
    description: "Four colors, mixed evenly",
    name: "Mixed 4",
    tubes: [
      ["lime", "rose", "navy", "gold"],
      ["rose", "gold", "lime", "navy"],
      ["navy", "lime", "gold", "rose"],
      ["gold", "navy", "rose", "lime"],
      [],
      [],
    ],
  },
] as const;

type Scenario = (typeof BENCHMARK_SCENARIOS)[number];

type BenchResult = {
  name: string;
  mode: SearchMode;
  outcome: string;
  meanMs: number;
  medianMs: number;
  p95Ms: number;
  samples: number;
};

function loadScenario(scenario: Scenario): Puzzle {
  const parsed = parsePuzzle({
    capacity: scenario.capacity,
    totalTubes: scenario.tubes.length,
    tubes: scenario.tubes,
  });
  if (!parsed.ok) {
    throw new Error(`Bad benchmark puzzle ${scenario.name}`);
  }
  return parsed.puzzle;
}

function percentile(sorted: ReadonlyArray<number>, p: number): number {
  return sorted[Math.min(sorted.length - 1, Math.floor(sorted.length * p))] ?? 0;
}

function benchmarkScenario(scenario: Scenario, mode: SearchMode): BenchResult {
  const puzzle = loadScenario(scenario);

  console.log(`Benchmarking: ${scenario.name} (${mode})`);
  console.log(`Description: ${scenario.description}`);

  for (let i = 0; i < WARMUP_RUNS; i++) {
    solvePuzzle(puzzle, { mode });
  }

  const timings: Array<number> = [];
  let outcome = "";
  for (let i = 0; i < MEASUREMENT_RUNS; i++) {
    const start = performance.now();
    const result = solvePuzzle(puzzle, { mode });
    timings.push(performance.now() - start);
    outcome =
      result.kind === "solved"
        ? `solved in ${String(result.moves.length)}`
        : result.kind;
  }

  timings.sort((a, b) => a - b);
  return {
    meanMs: timings.reduce((sum, t) => sum + t, 0) / timings.length,
    medianMs: percentile(timings, 0.5),
    mode,
    name: scenario.name,
    outcome,
    p95Ms: percentile(timings, 0.95),
    samples: timings.length,
  };
}

function runAllBenchmarks(): void {
  console.log("=".repeat(60));
  console.log("Water-Sort Solver Performance Benchmark");
  console.log("=".repeat(60));
  console.log(`Target: Mean <= ${String(TARGET_MEAN_MS)}ms per solve`);
  console.log();

  const results = BENCHMARK_SCENARIOS.flatMap((scenario) =>
    MODES.map((mode) => benchmarkScenario(scenario, mode)),
  );

  console.log();
  console.log("Results Summary:");
  console.log("-".repeat(72));
  console.log(
    "Scenario".padEnd(16) +
      "Mode".padEnd(8) +
      "Outcome".padEnd(18) +
      "Mean(ms)".padEnd(10) +
      "P95(ms)".padEnd(10) +
      "Status",
  );
  console.log("-".repeat(72));

  let allPassed = true;
  for (const r of results) {
    const passed = r.meanMs <= TARGET_MEAN_MS;
    if (!passed) allPassed = false;
    console.log(
      r.name.padEnd(16) +
        r.mode.padEnd(8) +
        r.outcome.padEnd(18) +
        r.meanMs.toFixed(2).padEnd(10) +
        r.p95Ms.toFixed(2).padEnd(10) +
        (passed ? "PASS" : "FAIL"),
    );
  }
  console.log("-".repeat(72));
  console.log(`Samples per row: ${String(MEASUREMENT_RUNS)}`);

  if (!allPassed) {
    console.log("Some benchmarks FAILED");
    process.exit(1);
  }
  console.log("All benchmarks PASSED");
}

if (require.main === module) {
  runAllBenchmarks();
}
