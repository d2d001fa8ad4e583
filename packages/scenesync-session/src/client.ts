import type {
  LockState,
  Logger,
  LoggerOptions,
  Property,
  PropertyPath,
  ReferenceProperty,
  ReplicaId,
  ReplicaSession,
  SessionEventName,
  SessionEvents,
  Unsubscribe,
  UserId,
} from "@scenesync/core";
import {
  ReplicaObject,
  SessionEventEmitter,
  collectReferences,
  createLogger,
  formatReplicaId,
  fromPlainProperty,
  makeReplicaId,
  toPlainProperty,
} from "@scenesync/core";

import type {
  ChildOrder,
  ClientCase,
  ClientPayload,
  ConfirmCreate,
  ConfirmDelete,
  Created,
  Deleted,
  FieldRemoved,
  ListAdded,
  ListRemoved,
  Locked,
  ParentChanged,
  PropertySet,
  Rejected,
  ServerPayload,
  SessionMessage,
  Welcome,
  WireObject,
} from "./messages.js";
import { clientMessage, isServerMessage } from "./messages.js";
import type { DuplexTransport } from "./transport.js";
import { dictionaryAt, dictionaryFromWire, listAt, setPropertyAt, toWireObject } from "./wire.js";

export type SessionClientOptions = {
  /** Display name sent with `hello`. */
  name?: string;
  debug?: boolean;
  log?: LoggerOptions["log"];
};

type Deferred<T> = {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (err: unknown) => void;
};

function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => {};
  let reject: (err: unknown) => void = () => {};
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

/** `null` keys the list of root objects. */
type ParentKey = ReplicaId | null;

type PendingWrite = { path: PropertyPath; count: number };

function pathKey(path: PropertyPath): string {
  return JSON.stringify(path);
}

function isPrefix(prefix: PropertyPath, path: PropertyPath): boolean {
  return prefix.length <= path.length && prefix.every((seg, i) => seg === path[i]);
}

/** Copies `value` when it already sits in a property tree. */
function detachedCopy(value: Property): Property {
  return value.parent || value.owner ? fromPlainProperty(toPlainProperty(value)) : value;
}

/**
 * Participant side of a session. Keeps a mirror of the host tree, applies local operations to it
 * right away and reconciles the mirror with the host's echoes.
 *
 * Structural echoes carry the final child order of the parents they touched. A parent with no
 * unanswered local request takes that order verbatim; otherwise remote changes are applied by
 * index until the local requests are answered. Property echoes of our own writes are skipped, and
 * remote writes to a path we are still writing are ignored.
 */
export class SessionClient implements ReplicaSession {
  private readonly log: Logger;
  private readonly events = new SessionEventEmitter();
  private readonly objects = new Map<ReplicaId, ReplicaObject>();
  private readonly roots: ReplicaObject[] = [];
  private readonly limits = new Map<string, number>();
  private readonly pendingWrites = new Map<ReplicaId, Map<string, PendingWrite>>();
  private readonly pendingParents = new Map<ParentKey, number>();
  // Parents touched by each structural request still waiting for its reply, oldest first.
  private readonly replies: ParentKey[][] = [];
  private readonly welcomed = deferred<void>();
  private readonly name: string;
  private user: UserId | null = null;
  private nextCounter = 1;
  private detach: Unsubscribe | null = null;

  constructor(
    private readonly transport: DuplexTransport<SessionMessage>,
    opts: SessionClientOptions = {}
  ) {
    this.name = opts.name ?? "";
    this.log = createLogger({ debug: opts.debug, log: opts.log }, "client");
  }

  get userId(): UserId {
    if (this.user === null) throw new Error("session is not connected");
    return this.user;
  }

  get isConnected(): boolean {
    return this.user !== null && this.detach !== null;
  }

  /** Says hello and resolves once the host's snapshot is in the mirror. */
  async connect(): Promise<void> {
    if (!this.detach) this.detach = this.transport.onMessage((msg) => this.receive(msg));
    await this.transport.send(clientMessage({ case: "hello", value: { name: this.name } }));
    await this.welcomed.promise;
  }

  close(): void {
    this.detach?.();
    this.detach = null;
  }

  on<E extends SessionEventName>(event: E, handler: SessionEvents[E]): Unsubscribe {
    return this.events.on(event, handler);
  }

  allocateId(): ReplicaId {
    const id = makeReplicaId(this.userId, this.nextCounter);
    this.nextCounter += 1;
    return id;
  }

  getObject(id: ReplicaId): ReplicaObject | undefined {
    return this.objects.get(id);
  }

  rootObjects(): readonly ReplicaObject[] {
    return this.roots;
  }

  getReferences(obj: ReplicaObject): ReferenceProperty[] {
    const out: ReferenceProperty[] = [];
    for (const o of this.objects.values()) out.push(...collectReferences(o.properties, obj.id));
    return out;
  }

  getObjectLimit(type: string): number {
    return this.limits.get(type) ?? Infinity;
  }

  getObjectCount(type: string): number {
    let count = 0;
    for (const obj of this.objects.values()) if (obj.type === type && obj.isSyncing) count += 1;
    return count;
  }

  create(objects: ReplicaObject | readonly ReplicaObject[], parent: ReplicaObject | null, index?: number): void {
    const list = objects instanceof ReplicaObject ? [objects] : objects;
    if (list.length === 0) return;
    if (parent && !this.objects.has(parent.id)) {
      throw new Error(`cannot create under ${parent.toString()}: parent is not in the session`);
    }
    const start = Math.max(0, Math.min(index ?? Infinity, this.childList(parent).length));
    list.forEach((obj, i) => {
      this.removeFromTree(obj);
      this.insert(obj, parent, start + i);
      for (const o of [obj, ...obj.descendants()]) {
        o.status = "creating";
        this.objects.set(o.id, o);
      }
    });
    this.expectReply([parent?.id ?? null]);
    this.send({
      case: "create",
      value: { parentId: parent?.id ?? null, index: index ?? null, objects: list.map(toWireObject) },
    });
  }

  delete(obj: ReplicaObject): void {
    if (!this.objects.has(obj.id) || obj.status === "deleting") return;
    this.removeFromTree(obj);
    for (const o of [obj, ...obj.descendants()]) o.status = "deleting";
    // Deleting objects are left out of applied child orders, so no parent is held back here.
    this.expectReply([]);
    this.send({ case: "delete", value: { id: obj.id } });
  }

  requestLock(obj: ReplicaObject): void {
    if (obj.lock.kind !== "unlocked") return;
    obj.lock = { kind: "requested" };
    this.send({ case: "requestLock", value: { id: obj.id } });
  }

  releaseLock(obj: ReplicaObject): void {
    if (obj.lock.kind !== "held" && obj.lock.kind !== "requested") return;
    obj.lock = { kind: "releasing" };
    this.send({ case: "releaseLock", value: { id: obj.id } });
  }

  setParent(obj: ReplicaObject, parent: ReplicaObject, index: number): void {
    const from = obj.parent;
    this.removeFromTree(obj);
    const at = this.insert(obj, parent, index);
    this.expectReply(from === parent ? [parent.id] : [from?.id ?? null, parent.id]);
    this.send({ case: "setParent", value: { id: obj.id, parentId: parent.id, index: at } });
  }

  setChildIndex(obj: ReplicaObject, index: number): void {
    const parent = obj.parent;
    this.removeFromTree(obj);
    const at = this.insert(obj, parent, index);
    this.expectReply([parent?.id ?? null]);
    this.send({ case: "setChildIndex", value: { id: obj.id, index: at } });
  }

  setProperty(obj: ReplicaObject, path: PropertyPath, value: Property): void {
    const local = detachedCopy(value);
    if (!setPropertyAt(obj.properties, path, local)) {
      this.log.warn(`cannot set ${obj.toString()}/${path.join(".")}: no such property`);
      return;
    }
    if (!this.objects.has(obj.id)) return;
    this.addPending(obj.id, path);
    this.send({ case: "setProperty", value: { id: obj.id, path: [...path], value: toPlainProperty(local) } });
  }

  removeField(obj: ReplicaObject, path: PropertyPath, name: string): void {
    const dict = dictionaryAt(obj.properties, path);
    if (!dict) {
      this.log.warn(`cannot remove ${name} from ${obj.toString()}/${path.join(".")}: not a dictionary`);
      return;
    }
    dict.delete(name);
    if (!this.objects.has(obj.id)) return;
    this.addPending(obj.id, [...path, name]);
    this.send({ case: "removeField", value: { id: obj.id, path: [...path], name } });
  }

  listAdd(obj: ReplicaObject, path: PropertyPath, index: number, items: readonly Property[]): void {
    const list = listAt(obj.properties, path);
    if (!list) {
      this.log.warn(`cannot add to ${obj.toString()}/${path.join(".")}: not a list`);
      return;
    }
    const local = items.map(detachedCopy);
    list.insert(index, local);
    if (!this.objects.has(obj.id)) return;
    this.addPending(obj.id, path);
    this.send({ case: "listAdd", value: { id: obj.id, path: [...path], index, items: local.map(toPlainProperty) } });
  }

  listRemove(obj: ReplicaObject, path: PropertyPath, index: number, count: number): void {
    const list = listAt(obj.properties, path);
    if (!list) {
      this.log.warn(`cannot remove from ${obj.toString()}/${path.join(".")}: not a list`);
      return;
    }
    list.remove(index, count);
    if (!this.objects.has(obj.id)) return;
    this.addPending(obj.id, path);
    this.send({ case: "listRemove", value: { id: obj.id, path: [...path], index, count } });
  }

  private send(payload: ClientPayload): void {
    void this.transport.send(clientMessage(payload)).catch((err: unknown) => {
      this.log.error(`send ${payload.case} failed`, err);
    });
  }

  private receive(msg: SessionMessage): void {
    if (!isServerMessage(msg)) {
      this.log.warn(`unexpected ${msg.payload.case} from host`);
      return;
    }
    try {
      this.handle(msg.payload);
    } catch (err) {
      this.log.error(`handling ${msg.payload.case} failed`, err);
    }
  }

  private handle(payload: ServerPayload): void {
    switch (payload.case) {
      case "welcome":
        return this.onWelcome(payload.value);
      case "created":
        return this.onCreated(payload.value);
      case "confirmCreate":
        return this.onConfirmCreate(payload.value);
      case "deleted":
        return this.onDeleted(payload.value);
      case "confirmDelete":
        return this.onConfirmDelete(payload.value);
      case "locked":
        return this.onLocked(payload.value);
      case "unlocked":
        return this.onUnlocked(payload.value.id);
      case "parentChanged":
        return this.onParentChanged(payload.value);
      case "propertySet":
        return this.onPropertySet(payload.value);
      case "fieldRemoved":
        return this.onFieldRemoved(payload.value);
      case "listAdded":
        return this.onListAdded(payload.value);
      case "listRemoved":
        return this.onListRemoved(payload.value);
      case "rejected":
        return this.onRejected(payload.value);
      default: {
        const _exhaustive: never = payload;
        return _exhaustive;
      }
    }
  }

  private onWelcome(welcome: Welcome): void {
    if (this.user !== null) {
      this.log.warn("ignoring repeated welcome");
      return;
    }
    this.user = welcome.userId;
    for (const [type, limit] of welcome.limits) this.limits.set(type, limit);
    for (const wire of welcome.objects) this.roots.push(this.adopt(wire));
    this.log.debug(`joined as user ${welcome.userId} with ${this.objects.size} object(s)`);
    this.welcomed.resolve();
  }

  private onCreated(created: Created): void {
    // Objects restored after a rejected delete answer our own request.
    if (created.by === 0) this.popReply();
    const parent = created.parentId === null ? null : this.objects.get(created.parentId);
    if (parent === undefined) {
      this.log.warn(`created under unknown parent ${String(created.parentId)}`);
      return;
    }
    const roots = created.objects.map((wire) => this.adopt(wire));
    roots.forEach((obj, i) => {
      this.removeFromTree(obj);
      this.insert(obj, parent, created.index + i);
    });
    const fresh = new Set(roots);
    const moved = this.applyOrders([{ parentId: created.parentId, order: created.parentOrder }]);
    this.emitParentChanges(moved.filter((o) => !fresh.has(o)));
    for (const obj of roots) {
      this.events.emit("create", (h) => h(obj, parent ? obj.indexInParent() : -1));
    }
  }

  private onConfirmCreate(confirm: ConfirmCreate): void {
    this.popReply();
    const roots: ReplicaObject[] = [];
    for (const id of confirm.ids) {
      const obj = this.objects.get(id);
      if (!obj) continue;
      for (const o of [obj, ...obj.descendants()]) if (o.status === "creating") o.status = "created";
      roots.push(obj);
    }
    this.emitParentChanges(this.applyOrders([{ parentId: confirm.parentId, order: confirm.parentOrder }]));
    for (const obj of roots) this.events.emit("confirmCreate", (h) => h(obj));
  }

  private onDeleted(deleted: Deleted): void {
    const obj = this.objects.get(deleted.id);
    if (obj) {
      this.removeFromTree(obj);
      this.forget(obj);
    }
    const moved = this.applyOrders(deleted.orders);
    if (obj) this.events.emit("delete", (h) => h(obj));
    this.emitParentChanges(moved);
  }

  private onConfirmDelete(confirm: ConfirmDelete): void {
    this.popReply();
    const obj = this.objects.get(confirm.id);
    if (obj) {
      this.removeFromTree(obj);
      this.forget(obj);
    }
    const moved = this.applyOrders(confirm.orders);
    if (obj) this.events.emit("confirmDelete", (h) => h(obj, confirm.unsubscribed));
    this.emitParentChanges(moved);
  }

  private onLocked(locked: Locked): void {
    const obj = this.objects.get(locked.id);
    if (!obj) return;
    const prev = obj.lock;
    if (locked.owner === this.user) {
      // A release already on its way wins over the grant.
      if (prev.kind !== "releasing") obj.lock = { kind: "held" };
      if (prev.kind === "locked") this.events.emit("unlock", (h) => h(obj));
      return;
    }
    obj.lock = { kind: "locked", owner: locked.owner };
    if (prev.kind !== "locked") this.events.emit("lock", (h) => h(obj));
    else if (prev.owner !== locked.owner) this.events.emit("lockOwnerChange", (h) => h(obj));
  }

  private onUnlocked(id: ReplicaId): void {
    const obj = this.objects.get(id);
    if (!obj) return;
    const prev = obj.lock;
    // Our own request is still in flight; its answer decides.
    if (prev.kind === "requested") return;
    obj.lock = { kind: "unlocked" };
    if (prev.kind === "locked") this.events.emit("unlock", (h) => h(obj));
  }

  private onParentChanged(changed: ParentChanged): void {
    const own = changed.by === this.user || changed.by === 0;
    if (own) this.popReply();
    const moved = new Set<ReplicaObject>();
    const obj = this.objects.get(changed.id);
    const parent = changed.parentId === null ? null : this.objects.get(changed.parentId);
    // Remote moves and host corrections are applied by index first.
    if (obj && parent !== undefined && obj.status !== "deleting" && (!own || changed.by === 0)) {
      if (parent && (parent === obj || obj.isAncestorOf(parent))) {
        this.log.warn(`ignoring move of ${obj.toString()} under its own descendant`);
      } else if (!this.isAt(obj, parent, changed.index)) {
        this.removeFromTree(obj);
        this.insert(obj, parent, changed.index);
        moved.add(obj);
      }
    }
    for (const o of this.applyOrders(changed.orders)) moved.add(o);
    this.emitParentChanges(Array.from(moved));
  }

  private onPropertySet(set: PropertySet): void {
    const obj = this.objects.get(set.id);
    if (!obj || !this.acceptWrite(obj.id, set.path, set.by)) return;
    const prop = setPropertyAt(obj.properties, set.path, fromPlainProperty(set.value));
    if (!prop) {
      this.log.warn(`cannot apply ${obj.toString()}/${set.path.join(".")}: no such property`);
      return;
    }
    this.events.emit("propertyChange", (h) => h(prop));
  }

  private onFieldRemoved(removed: FieldRemoved): void {
    const obj = this.objects.get(removed.id);
    if (!obj || !this.acceptWrite(obj.id, [...removed.path, removed.name], removed.by)) return;
    const dict = dictionaryAt(obj.properties, removed.path);
    if (!dict?.delete(removed.name)) return;
    this.events.emit("removeField", (h) => h(dict, removed.name));
  }

  private onListAdded(added: ListAdded): void {
    const obj = this.objects.get(added.id);
    if (!obj || !this.acceptWrite(obj.id, added.path, added.by)) return;
    const list = listAt(obj.properties, added.path);
    if (!list || added.index > list.length) {
      this.log.warn(`cannot apply list add to ${obj.toString()}/${added.path.join(".")}`);
      return;
    }
    list.insert(added.index, added.items.map(fromPlainProperty));
    this.events.emit("listAdd", (h) => h(list, added.index, added.items.length));
  }

  private onListRemoved(removed: ListRemoved): void {
    const obj = this.objects.get(removed.id);
    if (!obj || !this.acceptWrite(obj.id, removed.path, removed.by)) return;
    const list = listAt(obj.properties, removed.path);
    if (!list || removed.index + removed.count > list.length) {
      this.log.warn(`cannot apply list remove to ${obj.toString()}/${removed.path.join(".")}`);
      return;
    }
    list.remove(removed.index, removed.count);
    this.events.emit("listRemove", (h) => h(list, removed.index, removed.count));
  }

  private onRejected(rejected: Rejected): void {
    const request: ClientCase = rejected.request;
    this.log.warn(`${request} rejected: ${rejected.reason}`);
    const objs = rejected.ids.flatMap((id) => this.objects.get(id) ?? []);
    switch (request) {
      case "create":
        this.popReply();
        for (const obj of objs) {
          this.removeFromTree(obj);
          this.forget(obj);
          this.events.emit("confirmDelete", (h) => h(obj, true));
        }
        return;
      case "delete":
        // The host no longer has the object.
        this.popReply();
        for (const obj of objs) {
          this.removeFromTree(obj);
          this.forget(obj);
          this.events.emit("confirmDelete", (h) => h(obj, false));
        }
        return;
      case "setParent":
      case "setChildIndex":
        this.popReply();
        return;
      case "requestLock":
      case "releaseLock":
        for (const obj of objs) {
          if (obj.lock.kind === "requested" || obj.lock.kind === "releasing") obj.lock = { kind: "unlocked" };
        }
        return;
      case "setProperty":
      case "removeField":
      case "listAdd":
      case "listRemove":
        for (const id of rejected.ids) this.pendingWrites.delete(id);
        return;
      case "hello":
        return;
      default: {
        const _exhaustive: never = request;
        return _exhaustive;
      }
    }
  }

  /** Builds or refreshes the mirror object for `wire` and its subtree, all confirmed. */
  private adopt(wire: WireObject): ReplicaObject {
    let obj = this.objects.get(wire.id);
    if (obj && obj.type !== wire.type) {
      this.log.warn(`${obj.toString()} arrived as ${wire.type}, replacing it`);
      this.removeFromTree(obj);
      this.forget(obj);
      obj = undefined;
    }
    const target = obj ?? new ReplicaObject(wire.id, wire.type);
    target.properties = dictionaryFromWire(wire.properties);
    target.lock = this.lockFromWire(wire.lockOwner);
    target.status = "created";
    this.objects.set(target.id, target);
    for (const wireChild of wire.children) {
      const child = this.adopt(wireChild);
      this.removeFromTree(child);
      target.attachChild(child);
    }
    return target;
  }

  private lockFromWire(owner: UserId | null): LockState {
    if (owner === null) return { kind: "unlocked" };
    return owner === this.user ? { kind: "held" } : { kind: "locked", owner };
  }

  private forget(obj: ReplicaObject): void {
    for (const o of [obj, ...obj.descendants()]) {
      o.status = "detached";
      this.objects.delete(o.id);
      this.pendingWrites.delete(o.id);
    }
  }

  private childList(parent: ReplicaObject | null): readonly ReplicaObject[] {
    return parent ? parent.children : this.roots;
  }

  private insert(obj: ReplicaObject, parent: ReplicaObject | null, index: number): number {
    const at = Math.max(0, Math.min(index, this.childList(parent).length));
    if (parent) parent.attachChild(obj, at);
    else this.roots.splice(at, 0, obj);
    return at;
  }

  private removeFromTree(obj: ReplicaObject): void {
    if (obj.parent) {
      obj.parent.detachChild(obj);
      return;
    }
    const idx = this.roots.indexOf(obj);
    if (idx >= 0) this.roots.splice(idx, 1);
  }

  private isAt(obj: ReplicaObject, parent: ReplicaObject | null, index: number): boolean {
    return this.childList(parent)[index] === obj;
  }

  private expectReply(parents: ParentKey[]): void {
    this.replies.push(parents);
    for (const key of parents) this.pendingParents.set(key, (this.pendingParents.get(key) ?? 0) + 1);
  }

  private popReply(): void {
    const parents = this.replies.shift();
    if (!parents) {
      this.log.warn("reply without a pending request");
      return;
    }
    for (const key of parents) {
      const left = (this.pendingParents.get(key) ?? 0) - 1;
      if (left > 0) this.pendingParents.set(key, left);
      else this.pendingParents.delete(key);
    }
  }

  /** Takes the host order of every parent without unanswered local requests. Returns the moved children. */
  private applyOrders(orders: readonly ChildOrder[]): ReplicaObject[] {
    const moved: ReplicaObject[] = [];
    for (const order of orders) {
      if (this.pendingParents.has(order.parentId)) continue;
      moved.push(...this.applyOrder(order));
    }
    return moved;
  }

  private applyOrder(order: ChildOrder): ReplicaObject[] {
    const parent = order.parentId === null ? null : this.objects.get(order.parentId);
    if (parent === undefined || parent?.status === "deleting") return [];
    const before = this.childList(parent).slice();
    const desired: ReplicaObject[] = [];
    const seen = new Set<ReplicaObject>();
    for (const id of order.order) {
      const child = this.objects.get(id);
      if (!child || child.status === "deleting" || seen.has(child)) continue;
      if (parent && (child === parent || child.isAncestorOf(parent))) continue;
      seen.add(child);
      desired.push(child);
    }
    // Children the host does not list yet keep their relative order at the end.
    const next = [...desired, ...before.filter((c) => !seen.has(c))];
    if (next.length === before.length && next.every((c, i) => c === before[i])) return [];
    for (const child of next) this.removeFromTree(child);
    next.forEach((child, i) => this.insert(child, parent, i));
    return next.filter((c, i) => before[i] !== c);
  }

  private emitParentChanges(moved: readonly ReplicaObject[]): void {
    for (const obj of moved) {
      const index = obj.parent ? obj.indexInParent() : this.roots.indexOf(obj);
      this.events.emit("parentChange", (h) => h(obj, index));
    }
  }

  private addPending(id: ReplicaId, path: PropertyPath): void {
    let writes = this.pendingWrites.get(id);
    if (!writes) {
      writes = new Map();
      this.pendingWrites.set(id, writes);
    }
    const key = pathKey(path);
    const entry = writes.get(key);
    if (entry) entry.count += 1;
    else writes.set(key, { path: [...path], count: 1 });
  }

  /**
   * Settles pending writes for an incoming property event. False when the event must not be
   * applied: our own echo, or a remote write to a path we are still writing.
   */
  private acceptWrite(id: ReplicaId, path: PropertyPath, by: UserId | 0): boolean {
    const writes = this.pendingWrites.get(id);
    if (by === this.user) {
      const key = pathKey(path);
      const entry = writes?.get(key);
      if (entry) {
        entry.count -= 1;
        if (entry.count === 0) writes?.delete(key);
      }
      if (writes?.size === 0) this.pendingWrites.delete(id);
      return false;
    }
    if (!writes) return true;
    if (by === 0) {
      // Host correction: whatever we wrote below `path` was refused.
      for (const [key, entry] of writes) if (isPrefix(path, entry.path)) writes.delete(key);
      if (writes.size === 0) this.pendingWrites.delete(id);
      return true;
    }
    for (const entry of writes.values()) {
      if (isPrefix(entry.path, path)) {
        this.log.debug(`ignoring remote write to ${formatReplicaId(id)}/${path.join(".")} shadowed by a local one`);
        return false;
      }
    }
    return true;
  }
}
