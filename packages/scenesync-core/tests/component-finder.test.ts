import { expect, test } from "vitest";

import type { NativeComponent } from "../src/index.js";
import { ComponentFinder, MemorySceneEngine, ReplicaObject, ValueProperty, makeReplicaId } from "../src/index.js";

function component(): NativeComponent {
  return { nativeKind: "component" };
}

test("matches by type in request order", () => {
  const body = component();
  const light = component();
  const finder = new ComponentFinder([
    { component: body, type: "body", sourceFileId: 0, fileId: 0 },
    { component: light, type: "light", sourceFileId: 0, fileId: 0 },
  ]);
  const destroyed: NativeComponent[] = [];

  expect(finder.find("body", 0, 0, (c) => destroyed.push(c))).toEqual({ component: body, fileIdMismatch: false });
  expect(finder.find("light", 0, 0, (c) => destroyed.push(c))).toEqual({ component: light, fileIdMismatch: false });
  expect(finder.inOrder).toBe(true);
  expect(finder.count).toBe(0);
  expect(destroyed).toEqual([]);
});

test("taking a later candidate first marks the match out of order", () => {
  const a = component();
  const b = component();
  const finder = new ComponentFinder([
    { component: a, type: "body", sourceFileId: 0, fileId: 0 },
    { component: b, type: "light", sourceFileId: 0, fileId: 0 },
  ]);
  expect(finder.find("light", 0, 0, () => {})?.component).toBe(b);
  expect(finder.inOrder).toBe(false);
  expect(finder.remaining()).toEqual([a]);
});

test("a file id hit of another type is destroyed and the type match is used", () => {
  const stale = component();
  const match = component();
  const finder = new ComponentFinder([
    { component: stale, type: "audio", sourceFileId: 0, fileId: 7 },
    { component: match, type: "light", sourceFileId: 0, fileId: 9 },
  ]);
  const destroyed: NativeComponent[] = [];

  expect(finder.find("light", 0, 7, (c) => destroyed.push(c))).toEqual({ component: match, fileIdMismatch: true });
  expect(destroyed).toEqual([stale]);
  expect(finder.count).toBe(0);
});

test("source file ids tell apart components of one type", () => {
  const first = component();
  const second = component();
  const finder = new ComponentFinder([
    { component: first, type: "collider", sourceFileId: 11, fileId: 0 },
    { component: second, type: "collider", sourceFileId: 12, fileId: 0 },
  ]);
  expect(finder.find("collider", 12, 0, () => {})?.component).toBe(second);
  expect(finder.find("collider", 13, 0, () => {})).toBeNull();
  expect(finder.inOrder).toBe(false);
});

test("forNode reads component identities from the engine", () => {
  const engine = new MemorySceneEngine();
  const scene = engine.createScene("Main");
  const template = engine.createTemplate("Assets/Lamp.tpl");
  engine.addComponent(template, "transform");
  engine.addComponent(template, "light");
  const instance = engine.instantiate(template, scene, 0);
  const [, instanceLight] = engine.components(instance);
  const [, templateLight] = engine.components(template);

  const obj = new ReplicaObject(makeReplicaId(1, 1), "component");
  obj.properties.set("#type", new ValueProperty("light"));
  obj.properties.set("#sourceFileId", new ValueProperty(templateLight ? engine.fileId(templateLight) : -1));

  const finder = ComponentFinder.forNode(engine, instance);
  expect(finder.count).toBe(2);
  expect(finder.findFor(obj, () => {})?.component).toBe(instanceLight);
});
