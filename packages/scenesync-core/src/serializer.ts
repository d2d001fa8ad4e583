import type { ReplicaId } from "./ids.js";
import type { FieldOwner, FieldRecord, FieldValue, NativeAsset, NativeHandle, SceneEngine } from "./native.js";
import { FieldRef, isAsset, isFieldRecord } from "./native.js";
import type { ReplicaObject } from "./object.js";
import type { Property } from "./properties.js";
import {
  DictionaryProperty,
  ListProperty,
  ReferenceProperty,
  ValueProperty,
  propertiesEqual,
} from "./properties.js";
import type { ObjectRegistry } from "./registry.js";

export type PropertySerializerOptions = {
  engine: SceneEngine;
  registry: ObjectRegistry;
  lookup: (id: ReplicaId) => ReplicaObject | undefined;
};

export type FieldDiff = {
  changed: [string, Property][];
  removed: string[];
};

/** Called for references whose target has no ReplicaObject yet. */
export type UnresolvedReference = (target: NativeHandle) => void;

export function isReservedField(name: string): boolean {
  return name.startsWith("#");
}

/**
 * Converts between native serialized fields and replicated properties.
 *
 * Scalars become value properties, arrays lists, records dictionaries, and `FieldRef`s references
 * to the target's ReplicaObject (assets go through the asset-path resolver).
 */
export class PropertySerializer {
  private assetResolver: ((asset: NativeAsset) => ReplicaId | null) | null = null;

  constructor(private readonly opts: PropertySerializerOptions) {}

  setAssetResolver(resolver: ((asset: NativeAsset) => ReplicaId | null) | null): void {
    this.assetResolver = resolver;
  }

  toProperty(value: FieldValue, onUnresolved?: UnresolvedReference): Property {
    if (value === null || typeof value !== "object") return new ValueProperty(value);
    if (value instanceof FieldRef) return new ReferenceProperty(this.referenceId(value.target, onUnresolved));
    if (isFieldRecord(value)) {
      const dict = new DictionaryProperty();
      for (const [name, item] of Object.entries(value)) dict.set(name, this.toProperty(item, onUnresolved));
      return dict;
    }
    return new ListProperty(value.map((item) => this.toProperty(item, onUnresolved)));
  }

  toField(prop: Property): FieldValue {
    switch (prop.kind) {
      case "value":
        return prop.value;
      case "reference": {
        if (prop.targetId === null) return new FieldRef(null);
        const target = this.opts.lookup(prop.targetId);
        return new FieldRef(this.opts.registry.getNative(target) ?? null);
      }
      case "list":
        return prop.values().map((item) => this.toField(item));
      case "dictionary": {
        const out: Record<string, FieldValue> = {};
        for (const [name, item] of prop.entries()) out[name] = this.toField(item);
        return out satisfies FieldRecord;
      }
    }
  }

  createProperties(owner: FieldOwner, dict: DictionaryProperty, onUnresolved?: UnresolvedReference): void {
    for (const [name, value] of Object.entries(this.opts.engine.readFields(owner))) {
      dict.set(name, this.toProperty(value, onUnresolved));
    }
  }

  /** Writes every non-reserved property to the native and resets native fields the server lacks. */
  applyProperties(owner: FieldOwner, dict: DictionaryProperty): void {
    const { engine } = this.opts;
    for (const [name, prop] of dict.entries()) {
      if (isReservedField(name)) continue;
      engine.writeField(owner, name, this.toField(prop));
    }
    for (const name of Object.keys(engine.readFields(owner))) {
      if (!dict.has(name)) engine.resetField(owner, name);
    }
  }

  applyField(owner: FieldOwner, dict: DictionaryProperty, name: string): void {
    const prop = dict.get(name);
    if (prop) this.opts.engine.writeField(owner, name, this.toField(prop));
    else this.opts.engine.resetField(owner, name);
  }

  /** Top-level fields whose native value differs from the replicated one. */
  diff(owner: FieldOwner, dict: DictionaryProperty, onUnresolved?: UnresolvedReference): FieldDiff {
    const fields = this.opts.engine.readFields(owner);
    const changed: [string, Property][] = [];
    for (const [name, value] of Object.entries(fields)) {
      const next = this.toProperty(value, onUnresolved);
      const current = dict.get(name);
      if (!current || !propertiesEqual(current, next)) changed.push([name, next]);
    }
    const removed = dict.keys().filter((name) => !isReservedField(name) && !(name in fields));
    return { changed, removed };
  }

  private referenceId(target: NativeHandle | null, onUnresolved?: UnresolvedReference): ReplicaId | null {
    if (!target) return null;
    if (isAsset(target)) {
      const id = this.assetResolver?.(target) ?? null;
      if (id === null) onUnresolved?.(target);
      return id;
    }
    const obj = this.opts.registry.getReplica(target);
    if (obj) return obj.id;
    onUnresolved?.(target);
    return null;
  }
}
