import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { afterEach, expect, test, vi } from "vitest";

import { WORKLOAD_NAMES, benchTiming, nativeOrder, parseBenchCliArgs, quantile, runBenchmark, summarizeDurations, writeResult } from "../src/index.js";

afterEach(() => {
  vi.unstubAllEnvs();
});

test("workloads lay out the native children", () => {
  expect(nativeOrder("reverse", 4)).toEqual([3, 2, 1, 0]);
  expect(nativeOrder("rotate", 4)).toEqual([3, 0, 1, 2]);
  expect(nativeOrder("insert-front", 4)).toEqual([1, 2, 3, 0]);
  expect(nativeOrder("rotate", 0)).toEqual([]);

  const shuffled = nativeOrder("shuffle", 30, 7);
  expect([...shuffled].sort((a, b) => a - b)).toEqual(Array.from({ length: 30 }, (_, i) => i));
  expect(nativeOrder("shuffle", 30, 7)).toEqual(shuffled);
  expect(() => nativeOrder("reverse", -1)).toThrow("invalid workload size: -1");
});

test("every workload converges", () => {
  for (const workload of WORKLOAD_NAMES) {
    const result = runBenchmark(workload, 40, { iterations: 2, warmupIterations: 1 });
    expect(result.name).toBe(`${workload}-40`);
    expect(result.converged).toBe(true);
    expect(result.moves).toBeGreaterThan(0);
    expect(result.moves).toBeLessThanOrEqual(40);
    expect(result.iterations).toBe(2);
  }
});

test("a rotated list is fixed with one move", () => {
  const result = runBenchmark("rotate", 3);
  expect(result.moves).toBe(1);
  expect(result.movesPerChild).toBeCloseTo(1 / 3);
});

test("cli args fall back to the defaults", () => {
  expect(parseBenchCliArgs({ argv: [] })).toEqual({
    sizes: [100, 1000, 5000],
    workloads: ["reverse", "rotate", "shuffle", "insert-front"],
    seed: 1,
    outFile: undefined,
  });
});

test("cli args pick sizes, workloads and the output file", () => {
  expect(parseBenchCliArgs({ argv: ["--count", "10", "--workload", "rotate", "--out", "out/bench.json"] })).toEqual({
    sizes: [10],
    workloads: ["rotate"],
    seed: 1,
    outFile: "out/bench.json",
  });
  expect(parseBenchCliArgs({ argv: ["--sizes", "5, 20", "--workloads", "shuffle,reverse,shuffle", "--seed", "9"] })).toEqual({
    sizes: [5, 20],
    workloads: ["shuffle", "reverse"],
    seed: 9,
    outFile: undefined,
  });
});

test("cli args refuse bad values", () => {
  expect(() => parseBenchCliArgs({ argv: ["--sizes", "0,3"] })).toThrow("invalid number(s): 0");
  expect(() => parseBenchCliArgs({ argv: ["--workload", "sort"] })).toThrow("invalid --workload value: sort");
  expect(() => parseBenchCliArgs({ argv: ["--seed", "1.5"] })).toThrow("invalid --seed value: 1.5");
});

test("timing comes from the environment", () => {
  vi.stubEnv("SCENESYNC_BENCH_ITERATIONS", "3");
  expect(benchTiming({ iterationsEnv: ["MISSING_ITERATIONS", "SCENESYNC_BENCH_ITERATIONS"], warmupEnv: "MISSING_WARMUP" })).toEqual({
    iterations: 3,
    warmupIterations: 1,
  });
  expect(benchTiming({ iterationsEnv: "MISSING_ITERATIONS", warmupEnv: "MISSING_WARMUP" })).toEqual({
    iterations: 1,
    warmupIterations: 0,
  });
});

test("quantiles interpolate between samples", () => {
  expect(quantile([4, 1, 3, 2], 0.5)).toBe(2.5);
  expect(quantile([5], 0.9)).toBe(5);
  expect(quantile([], 0.5)).toBeNaN();
  expect(() => quantile([1], 2)).toThrow("q must be in [0,1], got: 2");
  const summary = summarizeDurations([3, 1, 2]);
  expect(summary.medianMs).toBe(2);
  expect(summary.p95Ms).toBeCloseTo(2.9);
  expect(summary.minMs).toBe(1);
});

test("results are written as JSON with the failed runs listed", async () => {
  const dir = await mkdtemp(join(tmpdir(), "scenesync-bench-"));
  try {
    const ok = runBenchmark("reverse", 4);
    const outFile = join(dir, "nested", "bench.json");
    await writeResult([ok, { ...ok, name: "broken-4", converged: false }], {
      outFile,
      run: { seed: 1, iterations: 1, warmupIterations: 0 },
    });

    const written: unknown = JSON.parse(await readFile(outFile, "utf8"));
    expect(written).toMatchObject({
      run: { seed: 1, iterations: 1, warmupIterations: 0 },
      failed: ["broken-4"],
      results: [{ name: "reverse-4", converged: true }, { name: "broken-4" }],
    });
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
});
