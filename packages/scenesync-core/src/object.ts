import type { ReplicaId, UserId } from "./ids.js";
import { formatReplicaId } from "./ids.js";
import { DictionaryProperty } from "./properties.js";

export const ObjectType = {
  scene: "scene",
  node: "node",
  component: "component",
  asset: "asset",
} as const;
export type ObjectType = (typeof ObjectType)[keyof typeof ObjectType];

/** Reserved property names. Serialized native fields never start with `#`. */
export const Prop = {
  name: "#name",
  type: "#type",
  path: "#path",
  template: "#template",
  sourceFileId: "#sourceFileId",
  fileId: "#fileId",
  revision: "#revision",
  instanceRevisions: "#instanceRevisions",
  noTemplate: "#noTemplate",
} as const;

export type LockState =
  | { kind: "unlocked" }
  | { kind: "requested" }
  | { kind: "held" }
  | { kind: "locked"; owner: UserId }
  | { kind: "releasing" };

export type ObjectStatus = "detached" | "creating" | "created" | "deleting";

/**
 * Session-side mirror of a replicated scene object.
 *
 * Structural methods here only maintain local links; changes that must reach the host go through
 * the session.
 */
export class ReplicaObject {
  private _properties: DictionaryProperty;
  private _parent: ReplicaObject | null = null;
  private readonly _children: ReplicaObject[] = [];

  lock: LockState = { kind: "unlocked" };
  status: ObjectStatus = "detached";

  constructor(
    readonly id: ReplicaId,
    readonly type: string,
    properties: DictionaryProperty = new DictionaryProperty()
  ) {
    this._properties = properties;
    properties.bindOwner(this);
  }

  get properties(): DictionaryProperty {
    return this._properties;
  }

  set properties(next: DictionaryProperty) {
    if (next === this._properties) return;
    this._properties.bindOwner(null);
    next.bindOwner(this);
    this._properties = next;
  }

  get parent(): ReplicaObject | null {
    return this._parent;
  }

  get children(): readonly ReplicaObject[] {
    return this._children;
  }

  get root(): ReplicaObject {
    let node: ReplicaObject = this;
    while (node._parent) node = node._parent;
    return node;
  }

  get isSyncing(): boolean {
    return this.status === "creating" || this.status === "created";
  }

  get isCreated(): boolean {
    return this.status === "created";
  }

  get isFullyLocked(): boolean {
    return this.lock.kind === "locked";
  }

  get isPartiallyLocked(): boolean {
    if (this.isFullyLocked) return false;
    for (let p = this._parent; p; p = p._parent) {
      if (p.isFullyLocked) return true;
    }
    return false;
  }

  get isLocked(): boolean {
    return this.isFullyLocked;
  }

  get isLockRequested(): boolean {
    return this.lock.kind === "requested";
  }

  get isLockPending(): boolean {
    return this.lock.kind === "requested" || this.lock.kind === "releasing";
  }

  get lockOwner(): UserId | null {
    return this.lock.kind === "locked" ? this.lock.owner : null;
  }

  indexInParent(): number {
    return this._parent ? this._parent._children.indexOf(this) : -1;
  }

  childrenOfType(type: string): ReplicaObject[] {
    return this._children.filter((c) => c.type === type);
  }

  *descendants(): Generator<ReplicaObject> {
    for (const child of this._children) {
      yield child;
      yield* child.descendants();
    }
  }

  isAncestorOf(obj: ReplicaObject): boolean {
    for (let p = obj._parent; p; p = p._parent) {
      if (p === this) return true;
    }
    return false;
  }

  attachChild(child: ReplicaObject, index: number = this._children.length): void {
    if (child === this || child.isAncestorOf(this)) {
      throw new Error(`cannot attach ${child.toString()} under its own descendant ${this.toString()}`);
    }
    if (child._parent) child._parent.detachChild(child);
    if (!Number.isInteger(index) || index < 0 || index > this._children.length) {
      throw new Error(`child index out of range: ${index}`);
    }
    this._children.splice(index, 0, child);
    child._parent = this;
  }

  detachChild(child: ReplicaObject): number {
    const idx = this._children.indexOf(child);
    if (idx < 0) return -1;
    this._children.splice(idx, 1);
    child._parent = null;
    return idx;
  }

  moveChild(child: ReplicaObject, index: number): void {
    if (child._parent !== this) throw new Error(`${child.toString()} is not a child of ${this.toString()}`);
    if (!Number.isInteger(index) || index < 0 || index >= this._children.length) {
      throw new Error(`child index out of range: ${index}`);
    }
    const from = this._children.indexOf(child);
    if (from === index) return;
    this._children.splice(from, 1);
    this._children.splice(index, 0, child);
  }

  /** Detaches from the parent and drops all children and properties. Keeps id and bindings. */
  clear(): void {
    this._parent?.detachChild(this);
    while (this._children.length > 0) {
      const child = this._children[this._children.length - 1];
      if (!child) break;
      this.detachChild(child);
    }
    this.properties = new DictionaryProperty();
  }

  toString(): string {
    return `${this.type}:${formatReplicaId(this.id)}`;
  }
}
