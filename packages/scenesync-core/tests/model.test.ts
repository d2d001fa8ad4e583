import { expect, test } from "vitest";

import {
  DictionaryProperty,
  ListProperty,
  ReferenceProperty,
  ReplicaObject,
  ValueProperty,
  collectReferences,
  decodeReplicaId,
  formatReplicaId,
  fromPlainProperty,
  makeReplicaId,
  parseReplicaId,
  propertiesEqual,
  propertyAt,
  replicaIdOwner,
  toPlainProperty,
} from "../src/index.js";

test("replica ids carry their owner in the high word", () => {
  const id = makeReplicaId(3, 7);
  expect(id).toBe((3n << 32n) | 7n);
  expect(replicaIdOwner(id)).toBe(3);
  expect(formatReplicaId(id)).toBe("0x0000000300000007");
  expect(parseReplicaId("0x0000000300000007")).toBe(id);
  expect(parseReplicaId("12884901895")).toBe(id);
  expect(decodeReplicaId(42)).toBe(42n);
});

test("invalid replica ids are rejected", () => {
  expect(() => parseReplicaId("0")).toThrow("invalid replica id: 0");
  expect(() => parseReplicaId("abc")).toThrow("invalid replica id: abc");
  expect(() => decodeReplicaId(-1)).toThrow("invalid replica id: -1");
  expect(() => makeReplicaId(0, 1)).toThrow("invalid user id: 0");
  expect(() => makeReplicaId(1, 0)).toThrow("invalid id counter: 0");
});

test("properties know their owner and path", () => {
  const obj = new ReplicaObject(makeReplicaId(1, 1), "component");
  const list = new ListProperty([new ValueProperty(1), new ValueProperty(2)]);
  const nested = new DictionaryProperty();
  nested.set("points", list);
  obj.properties.set("shape", nested);

  const second = list.at(1);
  expect(second?.owner).toBe(obj);
  expect(second?.path()).toEqual(["shape", "points", 1]);
  expect(propertyAt(obj.properties, ["shape", "points", 0])).toBe(list.at(0));
  expect(propertyAt(obj.properties, ["shape", 0])).toBeUndefined();
  expect(propertyAt(obj.properties, ["shape", "points", 5])).toBeUndefined();
  expect(propertyAt(obj.properties, ["shape", "missing", 0])).toBeUndefined();
  expect(propertyAt(obj.properties, [])).toBe(obj.properties);
});

test("a property can only sit in one container", () => {
  const value = new ValueProperty("x");
  const a = new DictionaryProperty();
  a.set("field", value);
  const b = new ListProperty();
  expect(() => b.insert(0, [value])).toThrow("property is already attached to a container");
  a.delete("field");
  b.insert(0, [value]);
  expect(value.path()).toEqual([0]);
});

test("plain properties keep field order and compare structurally", () => {
  const dict = new DictionaryProperty();
  dict.set("b", new ValueProperty(true));
  dict.set("a", new ListProperty([new ReferenceProperty(5n), new ValueProperty(null)]));
  const plain = toPlainProperty(dict);
  expect(plain).toEqual({ d: [["b", { v: true }], ["a", { l: [{ r: 5n }, { v: null }] }]] });

  const copy = fromPlainProperty(plain);
  expect(propertiesEqual(dict, copy)).toBe(true);
  expect(propertiesEqual(dict, new DictionaryProperty())).toBe(false);
  expect(collectReferences(copy, 5n)).toHaveLength(1);
  expect(collectReferences(copy, 6n)).toHaveLength(0);
});

test("attachChild refuses cycles and moveChild keeps the child count", () => {
  const root = new ReplicaObject(makeReplicaId(1, 1), "node");
  const a = new ReplicaObject(makeReplicaId(1, 2), "node");
  const b = new ReplicaObject(makeReplicaId(1, 3), "node");
  root.attachChild(a);
  root.attachChild(b);
  expect(() => a.attachChild(root)).toThrow(/under its own descendant/);

  root.moveChild(b, 0);
  expect(root.children).toEqual([b, a]);
  expect(a.indexInParent()).toBe(1);
  expect(() => root.moveChild(a, 2)).toThrow("child index out of range: 2");
});

test("partial locks come from locked ancestors", () => {
  const root = new ReplicaObject(makeReplicaId(1, 1), "node");
  const child = new ReplicaObject(makeReplicaId(1, 2), "node");
  root.attachChild(child);
  root.lock = { kind: "locked", owner: 2 };

  expect(root.isFullyLocked).toBe(true);
  expect(root.isLocked).toBe(true);
  expect(root.lockOwner).toBe(2);
  expect(child.isLocked).toBe(false);
  expect(child.isPartiallyLocked).toBe(true);

  root.lock = { kind: "held" };
  expect(root.isLocked).toBe(false);
  expect(child.isPartiallyLocked).toBe(false);
});

test("clear keeps the id but drops links and properties", () => {
  const root = new ReplicaObject(makeReplicaId(1, 1), "node");
  const child = new ReplicaObject(makeReplicaId(1, 2), "node");
  const grandchild = new ReplicaObject(makeReplicaId(1, 3), "node");
  root.attachChild(child);
  child.attachChild(grandchild);
  child.properties.set("#name", new ValueProperty("Child"));

  child.clear();
  expect(child.parent).toBeNull();
  expect(child.children).toEqual([]);
  expect(grandchild.parent).toBeNull();
  expect(child.properties.size).toBe(0);
  expect(child.properties.owner).toBe(child);
  expect(child.toString()).toBe("node:0x0000000100000002");
});
