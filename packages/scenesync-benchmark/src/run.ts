import { parseBenchCliArgs } from "./cli.js";
import type { BenchmarkResult } from "./index.js";
import { runBenchmark } from "./index.js";
import { writeResult } from "./node.js";
import { benchTiming } from "./timing.js";

async function main() {
  const args = parseBenchCliArgs();
  const { iterations, warmupIterations } = benchTiming();
  const results: BenchmarkResult[] = [];

  for (const workload of args.workloads) {
    for (const size of args.sizes) {
      const result = runBenchmark(workload, size, { iterations, warmupIterations, seed: args.seed });
      results.push(result);
      console.log(
        `${result.name}: ${result.moves} move(s), ` +
          `${result.durationMs.toFixed(2)}ms (p95 ${result.p95Ms.toFixed(2)}ms)` +
          (result.converged ? "" : " (NOT CONVERGED)")
      );
    }
  }

  if (args.outFile) {
    await writeResult(results, { outFile: args.outFile, run: { seed: args.seed, iterations, warmupIterations } });
    console.log(`wrote ${args.outFile}`);
  }
  if (results.some((r) => !r.converged)) process.exitCode = 1;
}

main().catch((err) => {
  console.error(err);
  process.exitCode = 1;
});
