import { expect, test } from "vitest";

import type { NativeHandle } from "../src/index.js";
import {
  DictionaryProperty,
  FieldRef,
  ListProperty,
  MemorySceneEngine,
  ObjectRegistry,
  PropertySerializer,
  ReferenceProperty,
  ReplicaObject,
  ValueProperty,
  makeReplicaId,
  toPlainProperty,
} from "../src/index.js";

function setup() {
  const engine = new MemorySceneEngine({ componentDefaults: { light: { range: 10 } } });
  const registry = new ObjectRegistry();
  const objects = new Map<bigint, ReplicaObject>();
  const serializer = new PropertySerializer({ engine, registry, lookup: (id) => objects.get(id) });
  const scene = engine.createScene("Main");
  const target = engine.createNode(scene, 0, "Target");
  const targetObj = new ReplicaObject(makeReplicaId(1, 1), "node");
  registry.bind(targetObj, target);
  objects.set(targetObj.id, targetObj);
  const node = engine.createNode(scene, 1, "Lamp");
  const light = engine.addComponent(node, "light");
  return { engine, registry, serializer, target, targetObj, light };
}

test("native fields become properties", () => {
  const { engine, serializer, target, light } = setup();
  engine.writeField(light, "color", ["r", 1]);
  engine.writeField(light, "follow", new FieldRef(target));
  engine.writeField(light, "shadow", { soft: true, bias: 0.5 });

  const dict = new DictionaryProperty();
  serializer.createProperties(light, dict);
  expect(toPlainProperty(dict)).toEqual({
    d: [
      ["range", { v: 10 }],
      ["color", { l: [{ v: "r" }, { v: 1 }] }],
      ["follow", { r: makeReplicaId(1, 1) }],
      ["shadow", { d: [["soft", { v: true }], ["bias", { v: 0.5 }]] }],
    ],
  });
});

test("references resolve back to native handles", () => {
  const { serializer, target } = setup();
  const field = serializer.toField(new ReferenceProperty(makeReplicaId(1, 1)));
  expect(field).toBeInstanceOf(FieldRef);
  expect(field instanceof FieldRef ? field.target : undefined).toBe(target);
  expect(serializer.toField(new ReferenceProperty(makeReplicaId(1, 99)))).toEqual(new FieldRef(null));
  expect(serializer.toField(new ListProperty([new ValueProperty(2)]))).toEqual([2]);
});

test("references to unreplicated targets are reported", () => {
  const { engine, serializer } = setup();
  const loose = engine.createNode(engine.createScene("Other"), 0, "Loose");
  const unresolved: NativeHandle[] = [];
  const prop = serializer.toProperty(new FieldRef(loose), (t) => unresolved.push(t));
  expect(prop).toEqual(new ReferenceProperty(null));
  expect(unresolved).toEqual([loose]);
});

test("diff lists changed and removed top-level fields", () => {
  const { engine, serializer, light } = setup();
  const dict = new DictionaryProperty();
  serializer.createProperties(light, dict);
  dict.set("#type", new ValueProperty("light"));
  dict.set("stale", new ValueProperty(1));
  engine.writeField(light, "range", 12);

  const { changed, removed } = serializer.diff(light, dict);
  expect(changed.map(([name, p]) => [name, toPlainProperty(p)])).toEqual([["range", { v: 12 }]]);
  expect(removed).toEqual(["stale"]);
});

test("applyProperties writes server fields and resets the rest", () => {
  const { engine, serializer, light } = setup();
  engine.writeField(light, "range", 3);
  engine.writeField(light, "local", "x");
  const dict = new DictionaryProperty();
  dict.set("#type", new ValueProperty("light"));
  dict.set("intensity", new ValueProperty(2));

  serializer.applyProperties(light, dict);
  expect(engine.readFields(light)).toEqual({ range: 10, intensity: 2 });
});

test("asset references go through the resolver", () => {
  const { engine, serializer } = setup();
  const saved = engine.createAsset("Assets/Wood.mat");
  const unsaved = engine.createAsset("Assets/Draft.mat", false);
  serializer.setAssetResolver((asset) => (engine.isPersisted(asset) ? makeReplicaId(1, 5) : null));

  expect(serializer.toProperty(new FieldRef(saved))).toEqual(new ReferenceProperty(makeReplicaId(1, 5)));
  expect(serializer.toProperty(new FieldRef(unsaved))).toEqual(new ReferenceProperty(null));
});
