export const WORKLOAD_NAMES = ['reverse', 'rotate', 'shuffle', 'insert-front'] as const;
export type WorkloadName = (typeof WORKLOAD_NAMES)[number];

export const DEFAULT_BENCH_SIZES = [100, 1000, 5000] as const;

export function isWorkloadName(value: string): value is WorkloadName {
  return WORKLOAD_NAMES.some((name) => name === value);
}

// mulberry32; the shuffle must be the same on every run.
function seededRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Native child order for a server order of `0..size-1`.
 *
 * - `reverse`: every child in the opposite order.
 * - `rotate`: the last child moved to the front.
 * - `shuffle`: a seeded random permutation.
 * - `insert-front`: the server inserted child 0 at the front, the native side appended it.
 */
export function nativeOrder(workload: WorkloadName, size: number, seed = 1): number[] {
  if (!Number.isInteger(size) || size < 0) throw new Error(`invalid workload size: ${size}`);
  const order = Array.from({ length: size }, (_, i) => i);
  switch (workload) {
    case 'reverse':
      return order.reverse();
    case 'rotate':
      return size === 0 ? order : [size - 1, ...order.slice(0, -1)];
    case 'shuffle': {
      const random = seededRandom(seed);
      for (let i = order.length - 1; i > 0; i--) {
        const j = Math.floor(random() * (i + 1));
        const tmp = order[i];
        order[i] = order[j];
        order[j] = tmp;
      }
      return order;
    }
    case 'insert-front':
      return size === 0 ? order : [...order.slice(1), 0];
    default: {
      const _exhaustive: never = workload;
      return _exhaustive;
    }
  }
}
