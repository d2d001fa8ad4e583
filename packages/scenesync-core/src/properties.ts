import type { ReplicaId } from "./ids.js";
import type { ReplicaObject } from "./object.js";

export type Scalar = string | number | boolean | null;
export type PathSegment = string | number;
export type PropertyPath = readonly PathSegment[];

export type Property = ValueProperty | ReferenceProperty | ListProperty | DictionaryProperty;
export type ContainerProperty = ListProperty | DictionaryProperty;

abstract class BaseProperty {
  parent: ContainerProperty | null = null;
  protected ownerObject: ReplicaObject | null = null;

  /** The ReplicaObject whose property tree this belongs to, if any. */
  get owner(): ReplicaObject | null {
    let node: BaseProperty = this;
    while (node.parent) node = node.parent;
    return node.ownerObject;
  }

  path(): PathSegment[] {
    const out: PathSegment[] = [];
    let node: BaseProperty = this;
    while (node.parent) {
      out.push(node.parent.keyOf(node));
      node = node.parent;
    }
    return out.reverse();
  }
}

function adopt(container: ContainerProperty, child: Property): void {
  if (child.parent) throw new Error("property is already attached to a container");
  if (child.kind === "dictionary" && child.owner) {
    throw new Error("cannot attach the root dictionary of an object");
  }
  child.parent = container;
}

export class ValueProperty extends BaseProperty {
  readonly kind = "value" as const;

  constructor(public value: Scalar) {
    super();
  }
}

export class ReferenceProperty extends BaseProperty {
  readonly kind = "reference" as const;

  constructor(public targetId: ReplicaId | null) {
    super();
  }
}

export class ListProperty extends BaseProperty {
  readonly kind = "list" as const;
  private readonly items: Property[] = [];

  constructor(items: Iterable<Property> = []) {
    super();
    this.insert(0, Array.from(items));
  }

  get length(): number {
    return this.items.length;
  }

  at(index: number): Property | undefined {
    return this.items[index];
  }

  values(): readonly Property[] {
    return this.items;
  }

  insert(index: number, props: readonly Property[]): void {
    if (!Number.isInteger(index) || index < 0 || index > this.items.length) {
      throw new Error(`list index out of range: ${index}`);
    }
    for (const p of props) adopt(this, p);
    this.items.splice(index, 0, ...props);
  }

  remove(index: number, count: number): Property[] {
    if (!Number.isInteger(index) || index < 0 || count < 0 || index + count > this.items.length) {
      throw new Error(`list range out of bounds: ${index}+${count}`);
    }
    const removed = this.items.splice(index, count);
    for (const p of removed) p.parent = null;
    return removed;
  }

  keyOf(child: BaseProperty): number {
    const idx = this.items.findIndex((p) => p === child);
    if (idx < 0) throw new Error("property is not an element of this list");
    return idx;
  }
}

export class DictionaryProperty extends BaseProperty {
  readonly kind = "dictionary" as const;
  private readonly fields = new Map<string, Property>();

  get size(): number {
    return this.fields.size;
  }

  get(name: string): Property | undefined {
    return this.fields.get(name);
  }

  has(name: string): boolean {
    return this.fields.has(name);
  }

  set(name: string, prop: Property): void {
    const current = this.fields.get(name);
    if (current === prop) return;
    adopt(this, prop);
    if (current) current.parent = null;
    this.fields.set(name, prop);
  }

  delete(name: string): boolean {
    const current = this.fields.get(name);
    if (!current) return false;
    current.parent = null;
    return this.fields.delete(name);
  }

  keys(): string[] {
    return Array.from(this.fields.keys());
  }

  entries(): [string, Property][] {
    return Array.from(this.fields.entries());
  }

  keyOf(child: BaseProperty): string {
    for (const [name, p] of this.fields) {
      if (p === child) return name;
    }
    throw new Error("property is not a field of this dictionary");
  }

  /** Marks this dictionary as the root property container of `obj`. */
  bindOwner(obj: ReplicaObject | null): void {
    if (this.parent) throw new Error("only a detached dictionary can be an object root");
    this.ownerObject = obj;
  }
}

export function propertyAt(root: DictionaryProperty, path: PropertyPath): Property | undefined {
  let node: Property = root;
  for (const seg of path) {
    if (node.kind === "dictionary" && typeof seg === "string") {
      const next: Property | undefined = node.get(seg);
      if (!next) return undefined;
      node = next;
    } else if (node.kind === "list" && typeof seg === "number") {
      const next: Property | undefined = node.at(seg);
      if (!next) return undefined;
      node = next;
    } else {
      return undefined;
    }
  }
  return node;
}

export function propertiesEqual(a: Property, b: Property): boolean {
  switch (a.kind) {
    case "value":
      return b.kind === "value" && Object.is(a.value, b.value);
    case "reference":
      return b.kind === "reference" && a.targetId === b.targetId;
    case "list": {
      if (b.kind !== "list" || a.length !== b.length) return false;
      const bv = b.values();
      return a.values().every((item, i) => {
        const other = bv[i];
        return other !== undefined && propertiesEqual(item, other);
      });
    }
    case "dictionary": {
      if (b.kind !== "dictionary" || a.size !== b.size) return false;
      for (const [name, item] of a.entries()) {
        const other = b.get(name);
        if (!other || !propertiesEqual(item, other)) return false;
      }
      return true;
    }
    default: {
      const _exhaustive: never = a;
      return _exhaustive;
    }
  }
}

export function cloneProperty(p: ValueProperty): ValueProperty;
export function cloneProperty(p: DictionaryProperty): DictionaryProperty;
export function cloneProperty(p: Property): Property;
export function cloneProperty(p: Property): Property {
  switch (p.kind) {
    case "value":
      return new ValueProperty(p.value);
    case "reference":
      return new ReferenceProperty(p.targetId);
    case "list":
      return new ListProperty(p.values().map((item) => cloneProperty(item)));
    case "dictionary": {
      const out = new DictionaryProperty();
      for (const [name, item] of p.entries()) out.set(name, cloneProperty(item));
      return out;
    }
  }
}

/** Invokes `visit` on `root` and every property below it, depth first. */
export function walkProperties(root: Property, visit: (p: Property) => void): void {
  visit(root);
  if (root.kind === "list") {
    for (const item of root.values()) walkProperties(item, visit);
  } else if (root.kind === "dictionary") {
    for (const [, item] of root.entries()) walkProperties(item, visit);
  }
}

export function collectReferences(root: Property, targetId?: ReplicaId): ReferenceProperty[] {
  const out: ReferenceProperty[] = [];
  walkProperties(root, (p) => {
    if (p.kind === "reference" && (targetId === undefined || p.targetId === targetId)) out.push(p);
  });
  return out;
}

/** Wire form of a property. Dictionaries keep their field order. */
export type PlainProperty =
  | { v: Scalar }
  | { r: ReplicaId | null }
  | { l: PlainProperty[] }
  | { d: [string, PlainProperty][] };

export function toPlainProperty(p: Property): PlainProperty {
  switch (p.kind) {
    case "value":
      return { v: p.value };
    case "reference":
      return { r: p.targetId };
    case "list":
      return { l: p.values().map(toPlainProperty) };
    case "dictionary":
      return { d: p.entries().map(([name, item]) => [name, toPlainProperty(item)]) };
  }
}

export function fromPlainProperty(plain: PlainProperty): Property {
  if ("v" in plain) return new ValueProperty(plain.v);
  if ("r" in plain) return new ReferenceProperty(plain.r);
  if ("l" in plain) return new ListProperty(plain.l.map(fromPlainProperty));
  const out = new DictionaryProperty();
  for (const [name, item] of plain.d) out.set(name, fromPlainProperty(item));
  return out;
}

export function readString(dict: DictionaryProperty, name: string): string | undefined {
  const p = dict.get(name);
  return p?.kind === "value" && typeof p.value === "string" ? p.value : undefined;
}

export function readNumber(dict: DictionaryProperty, name: string): number | undefined {
  const p = dict.get(name);
  return p?.kind === "value" && typeof p.value === "number" ? p.value : undefined;
}

export function readBoolean(dict: DictionaryProperty, name: string): boolean | undefined {
  const p = dict.get(name);
  return p?.kind === "value" && typeof p.value === "boolean" ? p.value : undefined;
}

export function readNumberList(dict: DictionaryProperty, name: string): number[] | undefined {
  const p = dict.get(name);
  if (p?.kind !== "list") return undefined;
  const out: number[] = [];
  for (const item of p.values()) {
    if (item.kind !== "value" || typeof item.value !== "number") return undefined;
    out.push(item.value);
  }
  return out;
}

export function numberList(values: readonly number[]): ListProperty {
  return new ListProperty(values.map((n) => new ValueProperty(n)));
}
