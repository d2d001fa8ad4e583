import { expect, test } from "vitest";

import type { MemoryNode, MemoryScene } from "@scenesync/core";
import { FieldRef, MemorySceneEngine, SceneReplicator } from "@scenesync/core";

import type { InMemoryConnection } from "../src/index.js";
import { ReplicaHost, connectInMemory, createCborCodec } from "../src/index.js";

async function waitUntil(
  predicate: () => Promise<boolean> | boolean,
  opts: { timeoutMs?: number; intervalMs?: number; message?: string } = {}
): Promise<void> {
  const timeoutMs = opts.timeoutMs ?? 2_000;
  const intervalMs = opts.intervalMs ?? 5;
  const start = Date.now();
  // eslint-disable-next-line no-constant-condition
  while (true) {
    const ok = await predicate();
    if (ok) return;
    if (Date.now() - start > timeoutMs) {
      throw new Error(opts.message ?? `waitUntil timeout after ${timeoutMs}ms`);
    }
    await new Promise<void>((resolve) => setTimeout(resolve, intervalMs));
  }
}

type Editor = {
  engine: MemorySceneEngine;
  replicator: SceneReplicator;
  connection: InMemoryConnection;
  scene: () => MemoryScene;
  names: () => string[];
};

async function joinEditor(host: ReplicaHost, name: string, engine = new MemorySceneEngine()): Promise<Editor> {
  const replicator = new SceneReplicator(engine, { log: () => {} });
  const connection = await connectInMemory(host, { name, codec: createCborCodec(), log: () => {} });
  replicator.start(connection.client);
  const scene = () => {
    const found = engine.findScene("Main");
    if (!found) throw new Error(`${name} has no scene`);
    return found;
  };
  const names = () => engine.children(scene()).map((n) => engine.nodeName(n));
  return { engine, replicator, connection, scene, names };
}

async function setup() {
  const host = new ReplicaHost({ log: () => {} });
  const engine = new MemorySceneEngine();
  const scene = engine.createScene("Main");
  const cube = engine.createNode(scene, 0, "Cube");
  engine.writeField(cube, "size", 1);
  engine.writeField(engine.addComponent(cube, "body"), "mass", 2);

  const ana = await joinEditor(host, "ana", engine);
  await waitUntil(() => host.rootObjects().length === 1);
  const ben = await joinEditor(host, "ben");
  const tickAll = () => {
    ana.replicator.tick();
    ben.replicator.tick();
  };
  return { host, ana, ben, cube, tickAll };
}

function only(nodes: MemoryNode[]): MemoryNode {
  const [first] = nodes;
  if (!first || nodes.length !== 1) throw new Error(`expected one node, got ${nodes.length}`);
  return first;
}

test("a joining editor builds the shared scene", async () => {
  const { ben } = await setup();
  const cube = only(ben.engine.children(ben.scene()));
  expect(ben.engine.nodeName(cube)).toBe("Cube");
  expect(ben.engine.readFields(cube)).toEqual({ size: 1 });
  const body = ben.engine.components(cube)[0];
  expect(body && ben.engine.componentType(body)).toBe("body");
  expect(body && ben.engine.readFields(body)).toEqual({ mass: 2 });
});

test("field edits, new nodes and reorders reach the other editor", async () => {
  const { ana, ben, cube, tickAll } = await setup();
  const benCube = only(ben.engine.children(ben.scene()));

  ana.engine.edits.setField(cube, "size", 3);
  await waitUntil(() => ben.engine.readFields(benCube)["size"] === 3);

  ana.engine.edits.createNode(ana.scene(), "Lamp");
  await waitUntil(() => {
    tickAll();
    return ben.names().join() === "Cube,Lamp";
  });

  const benLamp = ben.engine.children(ben.scene())[1];
  if (!benLamp) throw new Error("lamp did not arrive");
  ben.engine.edits.move(benLamp, ben.scene(), 0);
  await waitUntil(() => {
    tickAll();
    return ana.names().join() === "Lamp,Cube";
  });
  expect(ben.names()).toEqual(["Lamp", "Cube"]);
});

test("a node locked by one editor is read-only for the other until the holder leaves", async () => {
  const { host, ana, ben, cube } = await setup();
  const benCube = only(ben.engine.children(ben.scene()));
  const cubeObj = ana.replicator.registry.getReplica(cube);
  if (!cubeObj) throw new Error("cube is not replicated");

  expect(ana.replicator.locks.requestLock(cubeObj)).toBe(true);
  await waitUntil(() => !ben.engine.isEditable(benCube));

  ben.engine.edits.setField(benCube, "size", 9);
  ben.replicator.tick();
  expect(ben.engine.readFields(benCube)).toEqual({ size: 1 });

  ana.connection.close();
  await waitUntil(() => ben.engine.isEditable(benCube));
  expect(host.getObject(cubeObj.id)?.lockOwner).toBeNull();
});

test("a deleted node that is restored keeps its id and the references to it", async () => {
  const { host, ana, ben, cube, tickAll } = await setup();
  const lamp = ana.engine.edits.createNode(ana.scene(), "Lamp");
  ana.replicator.tick();
  const light = ana.engine.edits.addComponent(lamp, "light");
  ana.engine.edits.setField(light, "target", new FieldRef(cube));
  const cubeObj = ana.replicator.registry.getReplica(cube);
  const lightObj = ana.replicator.registry.getReplica(light);
  if (!cubeObj || !lightObj) throw new Error("objects are not replicated");
  const cubeId = cubeObj.id;

  ana.engine.edits.destroy(cube);
  await waitUntil(() => {
    tickAll();
    return host.getObject(cubeId) === undefined && ben.names().join() === "Lamp";
  });

  ana.engine.edits.restore(cube, ana.scene(), 0);
  await waitUntil(() => {
    tickAll();
    return ben.names().join() === "Cube,Lamp";
  });

  expect(ana.replicator.registry.getReplica(cube)?.id).toBe(cubeId);
  expect(host.getObject(cubeId)?.type).toBe("node");
  const target = host.getObject(lightObj.id)?.properties.get("target");
  expect(target?.kind === "reference" ? target.targetId : null).toBe(cubeId);
  expect(ana.engine.readFields(light)).toEqual({ target: new FieldRef(cube) });
  const benCube = ben.engine.children(ben.scene())[0];
  expect(benCube && ben.engine.readFields(benCube)).toEqual({ size: 1 });
});
