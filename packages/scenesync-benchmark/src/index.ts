import { performance } from "node:perf_hooks";

import {
  HierarchyReconciler,
  MemorySceneEngine,
  ObjectRegistry,
  ObjectType,
  ReplicaObject,
  createLogger,
  makeReplicaId,
} from "@scenesync/core";
import type { MemoryNode } from "@scenesync/core";

import { summarizeDurations } from "./stats.js";
import type { WorkloadName } from "./workloads.js";
import { nativeOrder } from "./workloads.js";

export type BenchmarkResult = {
  name: string;
  size: number;
  /** Native moves the reconciler made. */
  moves: number;
  /** Median over the measured iterations. */
  durationMs: number;
  p95Ms: number;
  movesPerChild: number;
  /** The native order matched the server order afterwards. */
  converged: boolean;
  iterations: number;
};

export type BenchmarkOptions = {
  iterations?: number;
  warmupIterations?: number;
  seed?: number;
};

type Fixture = {
  reconciler: HierarchyReconciler;
  parent: ReplicaObject;
  nativeParent: MemoryNode;
  registry: ObjectRegistry;
  engine: MemorySceneEngine;
};

const BENCH_USER = 1;

/** A server parent with `size` node children, bound to native children laid out by `workload`. */
export function buildFixture(workload: WorkloadName, size: number, seed = 1): Fixture {
  const engine = new MemorySceneEngine();
  const registry = new ObjectRegistry();
  // Moves of the looked-at child are never preferred, so the counts are stable.
  const reconciler = new HierarchyReconciler({ engine, registry, log: createLogger(), preferMove: () => false });

  const scene = engine.createScene("bench");
  const nativeParent = engine.createNode(scene, 0, "parent");
  const parent = new ReplicaObject(makeReplicaId(BENCH_USER, 1), ObjectType.node);
  parent.status = "created";
  registry.bind(parent, nativeParent);

  const children = Array.from({ length: size }, (_, i) => {
    const obj = new ReplicaObject(makeReplicaId(BENCH_USER, i + 2), ObjectType.node);
    obj.status = "created";
    parent.attachChild(obj);
    return obj;
  });
  for (const i of nativeOrder(workload, size, seed)) {
    const child = children[i];
    if (!child) continue;
    const node = engine.createNode(nativeParent, size, `child-${i}`);
    registry.bind(child, node);
  }
  return { reconciler, parent, nativeParent, registry, engine };
}

function converged(fixture: Fixture): boolean {
  const native = fixture.engine.children(fixture.nativeParent);
  const server = fixture.parent.children;
  return native.length === server.length && native.every((node, i) => fixture.registry.getReplica(node) === server[i]);
}

/** Reconciles one freshly built fixture per iteration and reports the median duration. */
export function runBenchmark(workload: WorkloadName, size: number, opts: BenchmarkOptions = {}): BenchmarkResult {
  const iterations = Math.max(1, opts.iterations ?? 1);
  const warmupIterations = Math.max(0, opts.warmupIterations ?? 0);
  const durations: number[] = [];
  let moves = 0;
  let ok = true;

  for (let i = 0; i < warmupIterations + iterations; i++) {
    const fixture = buildFixture(workload, size, opts.seed);
    const start = performance.now();
    const made = fixture.reconciler.apply(fixture.parent);
    const end = performance.now();
    if (i < warmupIterations) continue;
    durations.push(end - start);
    moves = made;
    ok = ok && converged(fixture);
  }

  const { medianMs, p95Ms } = summarizeDurations(durations);
  return {
    name: `${workload}-${size}`,
    size,
    moves,
    durationMs: medianMs,
    p95Ms,
    movesPerChild: size > 0 ? moves / size : 0,
    converged: ok,
    iterations,
  };
}

export * from "./workloads.js";
export * from "./cli.js";
export * from "./timing.js";
export * from "./stats.js";
export * from "./node.js";
