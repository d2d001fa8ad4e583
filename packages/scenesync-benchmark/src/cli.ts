import { Command, InvalidArgumentError } from 'commander';

import { DEFAULT_BENCH_SIZES, WORKLOAD_NAMES, isWorkloadName, type WorkloadName } from './workloads.js';

export type BenchCliArgs = {
  sizes: number[];
  workloads: WorkloadName[];
  /** Seed of the `shuffle` permutation. */
  seed: number;
  outFile?: string;
};

export type BenchCliOptions = {
  argv?: string[];
  defaultSizes?: readonly number[];
  defaultWorkloads?: readonly WorkloadName[];
};

const allowedWorkloads = `allowed: ${WORKLOAD_NAMES.join(', ')}`;

function splitList(raw: string, what: string): string[] {
  const items = raw
    .split(',')
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
  if (items.length === 0) throw new InvalidArgumentError(`expected a comma-separated list of ${what}`);
  return items;
}

function isPositiveInt(raw: string): boolean {
  const n = Number(raw);
  return Number.isInteger(n) && n > 0;
}

function childCounts(raw: string): number[] {
  const items = splitList(raw, 'positive integers');
  const bad = items.filter((item) => !isPositiveInt(item));
  if (bad.length > 0) throw new InvalidArgumentError(`invalid number(s): ${bad.join(', ')}`);
  return Array.from(new Set(items.map(Number)));
}

function workloadList(raw: string): WorkloadName[] {
  const items = splitList(raw, 'workloads');
  const bad = items.filter((item) => !isWorkloadName(item));
  if (bad.length > 0) throw new InvalidArgumentError(`invalid workload(s): ${bad.join(', ')} (${allowedWorkloads})`);
  return Array.from(new Set(items.filter(isWorkloadName)));
}

export function parseBenchCliArgs(opts: BenchCliOptions = {}): BenchCliArgs {
  const defaultSizes = Array.from(opts.defaultSizes ?? DEFAULT_BENCH_SIZES);

  const program = new Command()
    .name('scenesync-bench')
    .description('Measures how many native moves the hierarchy reconciler needs per child order.')
    .exitOverride()
    .allowExcessArguments(true)
    .option('--count <n>', 'a single child count, same as --sizes <n>', (val) => {
      if (!isPositiveInt(val)) throw new InvalidArgumentError(`invalid --count value: ${val}`);
      return Number(val);
    })
    .option('--sizes <n1,n2,...>', `child counts to run (default: ${defaultSizes.join(',')})`, childCounts)
    .option('--workload <name>', `a single workload (${allowedWorkloads})`, (val): WorkloadName => {
      if (!isWorkloadName(val)) {
        throw new InvalidArgumentError(`invalid --workload value: ${val} (${allowedWorkloads})`);
      }
      return val;
    })
    .option('--workloads <w1,w2,...>', 'workloads to run (default: all)', workloadList)
    .option('--seed <n>', 'seed of the shuffle workload', (val) => {
      const n = Number(val);
      if (!Number.isInteger(n)) throw new InvalidArgumentError(`invalid --seed value: ${val}`);
      return n;
    })
    .option('--out <file>', 'write the results as JSON');

  program.parse(opts.argv ?? process.argv.slice(2), { from: 'user' });
  const parsed = program.opts<{
    count?: number;
    sizes?: number[];
    workload?: WorkloadName;
    workloads?: WorkloadName[];
    seed?: number;
    out?: string;
  }>();

  const sizes = parsed.sizes ?? (parsed.count !== undefined ? [parsed.count] : defaultSizes);
  const defaultWorkloads = Array.from(opts.defaultWorkloads ?? WORKLOAD_NAMES);
  const workloads = parsed.workloads ?? (parsed.workload ? [parsed.workload] : defaultWorkloads);
  return { sizes, workloads, seed: parsed.seed ?? 1, outFile: parsed.out || undefined };
}
