/** Linear interpolation between the two samples around rank `q`. NaN for no samples. */
export function quantile(samples: readonly number[], q: number): number {
  if (!(q >= 0 && q <= 1)) throw new Error(`q must be in [0,1], got: ${q}`);
  if (samples.length === 0) return NaN;
  const ordered = [...samples].sort((a, b) => a - b);
  const rank = (ordered.length - 1) * q;
  const below = ordered[Math.floor(rank)] ?? NaN;
  const above = ordered[Math.ceil(rank)] ?? NaN;
  const frac = rank - Math.floor(rank);
  return frac === 0 ? below : below + (above - below) * frac;
}

export type DurationSummary = {
  medianMs: number;
  p95Ms: number;
  minMs: number;
};

export function summarizeDurations(durations: readonly number[]): DurationSummary {
  return {
    medianMs: quantile(durations, 0.5),
    p95Ms: quantile(durations, 0.95),
    minMs: durations.length > 0 ? Math.min(...durations) : NaN,
  };
}
