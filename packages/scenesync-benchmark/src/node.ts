import { mkdir, writeFile } from "node:fs/promises";
import { cpus } from "node:os";
import { dirname } from "node:path";

import type { BenchmarkResult } from "./index.js";

export type BenchmarkRun = {
  seed: number;
  iterations: number;
  warmupIterations: number;
};

export type BenchmarkOutput = {
  createdAt: string;
  machine: { node: string; platform: string; cpu: string | undefined; cores: number };
  run: BenchmarkRun;
  /** Results that did not converge, by name. */
  failed: string[];
  results: BenchmarkResult[];
};

/** Writes `results` as pretty JSON, creating the directory of `outFile` when needed. */
export async function writeResult(
  results: BenchmarkResult[],
  opts: { outFile: string; run: BenchmarkRun }
): Promise<BenchmarkOutput> {
  const cores = cpus();
  const output: BenchmarkOutput = {
    createdAt: new Date().toISOString(),
    machine: {
      node: process.version,
      platform: `${process.platform}-${process.arch}`,
      cpu: cores[0]?.model,
      cores: cores.length,
    },
    run: opts.run,
    failed: results.filter((r) => !r.converged).map((r) => r.name),
    results,
  };
  await mkdir(dirname(opts.outFile), { recursive: true });
  await writeFile(opts.outFile, `${JSON.stringify(output, null, 2)}\n`, "utf8");
  return output;
}
