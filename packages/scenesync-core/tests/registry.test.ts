import { expect, test } from "vitest";

import { MemorySceneEngine, ObjectRegistry, ReplicaObject, makeReplicaId } from "../src/index.js";

function setup() {
  const engine = new MemorySceneEngine();
  const scene = engine.createScene("Main");
  return { engine, scene, registry: new ObjectRegistry() };
}

test("getOrCreate twice with the same handle yields one consistent pair", () => {
  const { engine, scene, registry } = setup();
  const node = engine.createNode(scene, 0, "Cube");
  let created = 0;
  const make = () => {
    created += 1;
    return new ReplicaObject(makeReplicaId(1, created), "node");
  };

  const first = registry.getOrCreate(node, make);
  const second = registry.getOrCreate(node, make);
  expect(second).toBe(first);
  expect(created).toBe(1);
  expect(registry.getReplica(node)).toBe(first);
  expect(registry.getNative(first)).toBe(node);
  expect(registry.size).toBe(1);
});

test("getOrCreate points a rebound replica back at the handle", () => {
  const { engine, scene, registry } = setup();
  const a = engine.createNode(scene, 0, "A");
  const b = engine.createNode(scene, 1, "B");
  const obj = new ReplicaObject(makeReplicaId(1, 1), "node");
  registry.bind(obj, a);
  registry.bind(obj, b);
  // The old handle keeps its entry until unbound.
  expect(registry.getReplica(a)).toBe(obj);
  expect(registry.getNative(obj)).toBe(b);

  expect(registry.getOrCreate(a, () => new ReplicaObject(makeReplicaId(1, 2), "node"))).toBe(obj);
  expect(registry.getNative(obj)).toBe(a);
});

test("unbindNative keeps the replica side when it was rebound", () => {
  const { engine, scene, registry } = setup();
  const oldNode = engine.createNode(scene, 0, "Old");
  const newNode = engine.createNode(scene, 1, "New");
  const obj = new ReplicaObject(makeReplicaId(1, 1), "node");
  registry.bind(obj, oldNode);
  registry.bind(obj, newNode);

  expect(registry.unbindNative(oldNode)).toBe(obj);
  expect(registry.has(oldNode)).toBe(false);
  expect(registry.getNative(obj)).toBe(newNode);

  expect(registry.unbindReplica(obj)).toBe(newNode);
  expect(registry.getReplica(newNode)).toBeUndefined();
  expect(registry.size).toBe(0);
});

test("binding a handle to another replica retires the previous pair", () => {
  const { engine, scene, registry } = setup();
  const node = engine.createNode(scene, 0, "Cube");
  const first = new ReplicaObject(makeReplicaId(1, 1), "node");
  const second = new ReplicaObject(makeReplicaId(1, 2), "node");
  const seen: ReplicaObject[] = [];
  const off = registry.onBind((replica) => seen.push(replica));

  registry.bind(first, node);
  registry.bind(second, node);
  off();
  registry.bind(first, node);

  expect(seen).toEqual([first, second]);
  expect(registry.getReplica(node)).toBe(first);
  expect(registry.getNative(second)).toBeUndefined();
  expect(Array.from(registry)).toEqual([[first, node]]);
});
