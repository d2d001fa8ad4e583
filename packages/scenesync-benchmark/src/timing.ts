export type BenchTiming = { iterations: number; warmupIterations: number };

export type BenchTimingOptions = {
  /** Variables tried in order; the first finite one wins. */
  iterationsEnv?: string | readonly string[];
  warmupEnv?: string | readonly string[];
  defaultIterations?: number;
};

function readCount(names: string | readonly string[]): number | undefined {
  for (const name of typeof names === "string" ? [names] : names) {
    const raw = process.env[name]?.trim();
    if (!raw) continue;
    const n = Number(raw);
    if (Number.isFinite(n)) return Math.floor(n);
  }
  return undefined;
}

/**
 * Iteration counts for a reconciler run. One warmup pass is made whenever more than one
 * iteration is measured, unless the environment says otherwise.
 */
export function benchTiming(opts: BenchTimingOptions = {}): BenchTiming {
  const iterations = Math.max(1, readCount(opts.iterationsEnv ?? "BENCH_ITERATIONS") ?? opts.defaultIterations ?? 1);
  const warmup = readCount(opts.warmupEnv ?? "BENCH_WARMUP");
  return { iterations, warmupIterations: Math.max(0, warmup ?? (iterations > 1 ? 1 : 0)) };
}
