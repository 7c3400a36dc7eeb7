import {
  type GridBenchmarkSample,
  runGridBenchmarkSample,
} from "../script-lib/benchmarking/runGridBenchmarkSample"
import {
  formatSummary,
  summarizeNumbers,
} from "../script-lib/benchmarking/summarizeNumbers"
import { getIntegerFlag } from "../script-lib/parseScriptArgs"
import type { SearchMode } from "../lib/types"

const args = process.argv.slice(2)

if (args.includes("--help") || args.includes("-h")) {
  console.log(`
Usage: tsx scripts/benchmark-grid-path-solver.ts [options]

Options:
  --samples=N     Random grids per mode (default: 200)
  --size=N        Grid side length (default: 64)
  --density=N     Obstacle percentage (default: 30)
  --help, -h      Show this help message
`)
  process.exit(0)
}

const SAMPLES = getIntegerFlag(args, "samples", 200)
const SIZE = getIntegerFlag(args, "size", 64)
const DENSITY = getIntegerFlag(args, "density", 30) / 100

const modes: SearchMode[] = ["strict", "relaxed"]

console.log(
  `Benchmarking ${SAMPLES} samples per mode on ${SIZE}x${SIZE} grids at ${Math.round(DENSITY * 100)}% obstacles\n`,
)

for (const mode of modes) {
  const samples: GridBenchmarkSample[] = []
  for (let seed = 1; seed <= SAMPLES; seed++) {
    samples.push(
      runGridBenchmarkSample({ size: SIZE, density: DENSITY, seed, mode }),
    )
  }

  const found = samples.filter((s) => s.found)
  const failed = samples.filter((s) => s.failed)
  console.log(`${mode}:`)
  console.log(
    `  found ${found.length}/${samples.length} (${((found.length / samples.length) * 100).toFixed(1)}%)`,
  )
  if (failed.length > 0) {
    console.error(
      `  ${failed.length} sample(s) ran out of iterations: seeds ${failed.map((s) => s.seed).join(", ")}`,
    )
  }
  console.log(
    `  iterations   ${formatSummary(summarizeNumbers(samples.map((s) => s.iterations)), 0)}`,
  )
  console.log(
    `  duration ms  ${formatSummary(summarizeNumbers(samples.map((s) => s.duration)), 2)}`,
  )
  console.log(
    `  reopened     ${formatSummary(summarizeNumbers(samples.map((s) => s.reopenedNodes)), 0)}`,
  )
  console.log(
    `  steps        ${formatSummary(summarizeNumbers(found.flatMap((s) => (s.steps === undefined ? [] : [s.steps]))), 0)}`,
  )
  if (mode === "relaxed") {
    console.log(
      `  obstacles    ${formatSummary(summarizeNumbers(found.flatMap((s) => (s.obstaclesCrossed === undefined ? [] : [s.obstaclesCrossed]))), 0)}`,
    )
  }
  console.log()
}
