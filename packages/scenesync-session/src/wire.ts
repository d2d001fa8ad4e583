import type { ListProperty, PlainProperty, Property, PropertyPath } from "@scenesync/core";
import { DictionaryProperty, ReplicaObject, fromPlainProperty, propertyAt, toPlainProperty } from "@scenesync/core";

import type { WireObject } from "./messages.js";

export function wireProperties(dict: DictionaryProperty): [string, PlainProperty][] {
  return dict.entries().map(([name, p]) => [name, toPlainProperty(p)]);
}

export function dictionaryFromWire(entries: readonly [string, PlainProperty][]): DictionaryProperty {
  const out = new DictionaryProperty();
  for (const [name, plain] of entries) out.set(name, fromPlainProperty(plain));
  return out;
}

export function toWireObject(obj: ReplicaObject): WireObject {
  return {
    id: obj.id,
    type: obj.type,
    properties: wireProperties(obj.properties),
    lockOwner: obj.lockOwner,
    children: obj.children.map(toWireObject),
  };
}

/** Builds a detached object tree. Lock state is taken from the wire. */
export function fromWireObject(wire: WireObject): ReplicaObject {
  const obj = new ReplicaObject(wire.id, wire.type, dictionaryFromWire(wire.properties));
  if (wire.lockOwner !== null) obj.lock = { kind: "locked", owner: wire.lockOwner };
  for (const child of wire.children) obj.attachChild(fromWireObject(child));
  return obj;
}

export function* walkWire(objects: readonly WireObject[]): Generator<WireObject> {
  for (const obj of objects) {
    yield obj;
    yield* walkWire(obj.children);
  }
}

/**
 * Stores `value` at `path`, replacing what was there. Returns `undefined` when the path does not
 * lead into an existing dictionary or list slot.
 */
export function setPropertyAt(root: DictionaryProperty, path: PropertyPath, value: Property): Property | undefined {
  if (path.length === 0) return undefined;
  const container = propertyAt(root, path.slice(0, -1));
  const key = path[path.length - 1];
  if (container?.kind === "dictionary" && typeof key === "string") {
    container.set(key, value);
    return value;
  }
  if (container?.kind === "list" && typeof key === "number" && key < container.length) {
    container.remove(key, 1);
    container.insert(key, [value]);
    return value;
  }
  return undefined;
}

export function dictionaryAt(root: DictionaryProperty, path: PropertyPath): DictionaryProperty | undefined {
  const p = propertyAt(root, path);
  return p?.kind === "dictionary" ? p : undefined;
}

export function listAt(root: DictionaryProperty, path: PropertyPath): ListProperty | undefined {
  const p = propertyAt(root, path);
  return p?.kind === "list" ? p : undefined;
}
