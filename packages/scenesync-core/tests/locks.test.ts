import { expect, test } from "vitest";

import type { FieldOwner, LockIndicator, UserId } from "../src/index.js";
import { LockCoordinator, MemorySceneEngine, ObjectRegistry, ReplicaObject, createLogger, makeReplicaId } from "../src/index.js";
import { FakeSession } from "./fake-session.js";

class RecordingIndicator implements LockIndicator {
  readonly shown = new Map<FieldOwner, UserId>();

  show(handle: FieldOwner, owner: UserId): void {
    this.shown.set(handle, owner);
  }

  hide(handle: FieldOwner): void {
    this.shown.delete(handle);
  }
}

function setup() {
  const engine = new MemorySceneEngine();
  const registry = new ObjectRegistry();
  const indicator = new RecordingIndicator();
  const locks = new LockCoordinator({ engine, registry, indicator, log: createLogger() });
  const session = new FakeSession();
  locks.attach(session);

  const scene = engine.createScene("Main");
  const node = engine.createNode(scene, 0, "Crate");
  const body = engine.addComponent(node, "body");
  const obj = session.seed(new ReplicaObject(makeReplicaId(1, 1), "node"));
  registry.bind(obj, node);
  return { engine, registry, indicator, locks, session, node, body, obj };
}

test("requestLock only asks for unlocked syncing objects", () => {
  const { locks, session, obj } = setup();
  expect(locks.requestLock(obj)).toBe(true);
  expect(obj.lock).toEqual({ kind: "held" });
  expect(locks.requestLock(obj)).toBe(false);
  expect(locks.releaseLock(obj)).toBe(true);
  expect(locks.releaseLock(obj)).toBe(false);
  expect(session.calls.map((c) => c.op)).toEqual(["requestLock", "releaseLock"]);

  const detached = new ReplicaObject(makeReplicaId(1, 2), "node");
  expect(locks.requestLock(detached)).toBe(false);
});

test("tempLock releases only a lock it took", () => {
  const { locks, session, obj } = setup();
  const result = locks.withTempLock(obj, () => obj.lock.kind);
  expect(result).toBe("held");
  expect(obj.lock).toEqual({ kind: "unlocked" });

  locks.requestLock(obj);
  const release = locks.tempLock(obj);
  release();
  expect(obj.lock).toEqual({ kind: "held" });
  expect(session.calls.map((c) => c.op)).toEqual(["requestLock", "releaseLock", "requestLock"]);
});

test("a lock held by someone else makes the native read-only and shows the owner", () => {
  const { engine, indicator, locks, node, body, obj } = setup();
  obj.lock = { kind: "locked", owner: 4 };
  locks.onLock(obj);
  expect(engine.isEditable(node)).toBe(false);
  expect(engine.isEditable(body)).toBe(false);
  expect(indicator.shown.get(node)).toBe(4);

  obj.lock = { kind: "unlocked" };
  locks.onUnlock(obj);
  expect(engine.isEditable(node)).toBe(true);
  expect(engine.isEditable(body)).toBe(true);
  expect(indicator.shown.has(node)).toBe(false);
});

test("stale indicators are redrawn on update", () => {
  const { indicator, locks, node, obj } = setup();
  obj.lock = { kind: "locked", owner: 2 };
  locks.onLock(obj);
  obj.lock = { kind: "locked", owner: 3 };
  locks.onLockOwnerChange(obj);
  expect(indicator.shown.get(node)).toBe(2);

  locks.update();
  expect(indicator.shown.get(node)).toBe(3);
});

test("temporarily unlocked natives are relocked while the lock lasts", () => {
  const { engine, locks, node, obj } = setup();
  obj.lock = { kind: "locked", owner: 2 };
  locks.onLock(obj);

  locks.tempUnlock(node);
  expect(engine.isEditable(node)).toBe(true);
  locks.relockTemporarilyUnlocked();
  expect(engine.isEditable(node)).toBe(false);

  locks.tempUnlock(node);
  obj.lock = { kind: "unlocked" };
  locks.relockTemporarilyUnlocked();
  expect(engine.isEditable(node)).toBe(true);
});
