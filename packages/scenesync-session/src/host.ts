import type { Logger, LoggerOptions, PropertyPath, ReplicaId, ReplicaObject, UserId } from "@scenesync/core";
import { createLogger, formatReplicaId, fromPlainProperty, replicaIdOwner, toPlainProperty } from "@scenesync/core";

import type {
  ChildOrder,
  ClientCase,
  ClientPayload,
  CreateRequest,
  IdRequest,
  ListAddRequest,
  ListRemoveRequest,
  RemoveFieldRequest,
  ServerPayload,
  SessionMessage,
  SetChildIndexRequest,
  SetParentRequest,
  SetPropertyRequest,
} from "./messages.js";
import { isClientMessage, serverMessage } from "./messages.js";
import type { DuplexTransport } from "./transport.js";
import { dictionaryAt, fromWireObject, listAt, setPropertyAt, toWireObject, walkWire } from "./wire.js";

export type ReplicaHostOptions = {
  /** Maximum number of live objects per object type. Types without an entry are unlimited. */
  objectLimits?: Record<string, number>;
  debug?: boolean;
  log?: LoggerOptions["log"];
};

type Peer = {
  userId: UserId | null;
  name: string;
  transport: DuplexTransport<SessionMessage>;
};

function describePeer(peer: Peer): string {
  return peer.userId === null ? "<anonymous>" : `${peer.name || "user"}#${peer.userId}`;
}

/**
 * Authoritative session state. Every change is ordered here: requests are validated against
 * locks, id ranges and object limits, applied to the host tree, and then echoed to all
 * participants. Rejected changes are answered with events that restore the host's state on the
 * requester.
 */
export class ReplicaHost {
  private readonly log: Logger;
  private readonly limits = new Map<string, number>();
  private readonly peers = new Map<UserId, Peer>();
  private readonly objects = new Map<ReplicaId, ReplicaObject>();
  private readonly roots: ReplicaObject[] = [];
  private readonly tombstones = new Set<ReplicaId>();
  private nextUserId = 1;

  constructor(opts: ReplicaHostOptions = {}) {
    this.log = createLogger({ debug: opts.debug, log: opts.log }, "host");
    for (const [type, limit] of Object.entries(opts.objectLimits ?? {})) {
      if (!Number.isSafeInteger(limit) || limit < 0) throw new Error(`invalid object limit for ${type}: ${limit}`);
      this.limits.set(type, limit);
    }
  }

  get userCount(): number {
    return this.peers.size;
  }

  getObject(id: ReplicaId): ReplicaObject | undefined {
    return this.objects.get(id);
  }

  rootObjects(): readonly ReplicaObject[] {
    return this.roots;
  }

  getObjectLimit(type: string): number {
    return this.limits.get(type) ?? Infinity;
  }

  getObjectCount(type: string): number {
    let count = 0;
    for (const obj of this.objects.values()) if (obj.type === type) count += 1;
    return count;
  }

  /** Serves a participant over `transport`. The returned function disconnects it. */
  attach(transport: DuplexTransport<SessionMessage>): () => void {
    const peer: Peer = { userId: null, name: "", transport };
    const off = transport.onMessage((msg) => this.receive(peer, msg));
    return () => {
      off();
      this.disconnect(peer);
    };
  }

  private receive(peer: Peer, msg: SessionMessage): void {
    if (!isClientMessage(msg)) {
      this.log.warn(`unexpected ${msg.payload.case} from ${describePeer(peer)}`);
      return;
    }
    try {
      this.handle(peer, msg.payload);
    } catch (err) {
      this.log.error(`${msg.payload.case} from ${describePeer(peer)} failed`, err);
    }
  }

  private handle(peer: Peer, payload: ClientPayload): void {
    if (payload.case === "hello") {
      this.hello(peer, payload.value.name);
      return;
    }
    const user = peer.userId;
    if (user === null) {
      this.log.warn(`${payload.case} before hello`);
      return;
    }
    switch (payload.case) {
      case "create":
        return this.create(user, payload.value);
      case "delete":
        return this.delete(user, payload.value);
      case "requestLock":
        return this.requestLock(user, payload.value);
      case "releaseLock":
        return this.releaseLock(user, payload.value);
      case "setParent":
        return this.setParent(user, payload.value);
      case "setChildIndex":
        return this.setChildIndex(user, payload.value);
      case "setProperty":
        return this.setProperty(user, payload.value);
      case "removeField":
        return this.removeField(user, payload.value);
      case "listAdd":
        return this.listAdd(user, payload.value);
      case "listRemove":
        return this.listRemove(user, payload.value);
      default: {
        const _exhaustive: never = payload;
        return _exhaustive;
      }
    }
  }

  private hello(peer: Peer, name: string): void {
    if (peer.userId !== null) {
      this.log.warn(`repeated hello from ${describePeer(peer)}`);
      return;
    }
    const userId = this.nextUserId;
    this.nextUserId += 1;
    peer.userId = userId;
    peer.name = name;
    this.peers.set(userId, peer);
    this.log.info(`${describePeer(peer)} joined`);
    this.send(userId, {
      case: "welcome",
      value: {
        userId,
        limits: Array.from(this.limits.entries()),
        objects: this.roots.map(toWireObject),
      },
    });
  }

  private disconnect(peer: Peer): void {
    const user = peer.userId;
    if (user === null || this.peers.get(user) !== peer) return;
    this.peers.delete(user);
    let released = 0;
    for (const obj of this.objects.values()) {
      if (obj.lockOwner !== user) continue;
      obj.lock = { kind: "unlocked" };
      released += 1;
      this.broadcast({ case: "unlocked", value: { id: obj.id } });
    }
    this.log.info(`${describePeer(peer)} left, released ${released} lock(s)`);
  }

  private send(user: UserId, payload: ServerPayload): void {
    const peer = this.peers.get(user);
    if (!peer) return;
    void peer.transport.send(serverMessage(payload)).catch((err: unknown) => {
      this.log.error(`send ${payload.case} to ${describePeer(peer)} failed`, err);
    });
  }

  private broadcast(payload: ServerPayload, except?: UserId): void {
    for (const user of Array.from(this.peers.keys())) {
      if (user !== except) this.send(user, payload);
    }
  }

  private reject(user: UserId, request: ClientCase, ids: ReplicaId[], reason: string): void {
    this.log.debug(`rejected ${request} from user ${user}: ${reason}`);
    this.send(user, { case: "rejected", value: { request, ids, reason } });
  }

  private childList(parent: ReplicaObject | null): readonly ReplicaObject[] {
    return parent ? parent.children : this.roots;
  }

  private order(parent: ReplicaObject | null): ChildOrder {
    return { parentId: parent?.id ?? null, order: this.childList(parent).map((c) => c.id) };
  }

  private insert(obj: ReplicaObject, parent: ReplicaObject | null, index: number): number {
    const at = Math.max(0, Math.min(index, this.childList(parent).length));
    if (parent) parent.attachChild(obj, at);
    else this.roots.splice(at, 0, obj);
    return at;
  }

  private remove(obj: ReplicaObject): void {
    if (obj.parent) {
      obj.parent.detachChild(obj);
      return;
    }
    const idx = this.roots.indexOf(obj);
    if (idx >= 0) this.roots.splice(idx, 1);
  }

  /** True if `obj` or one of its ancestors is locked by someone other than `user`. */
  private lockedByOther(obj: ReplicaObject, user: UserId): boolean {
    for (let o: ReplicaObject | null = obj; o; o = o.parent) {
      const owner = o.lockOwner;
      if (owner !== null && owner !== user) return true;
    }
    return false;
  }

  private subtreeLockedByOther(obj: ReplicaObject, user: UserId): boolean {
    if (this.lockedByOther(obj, user)) return true;
    for (const o of obj.descendants()) {
      const owner = o.lockOwner;
      if (owner !== null && owner !== user) return true;
    }
    return false;
  }

  private create(user: UserId, req: CreateRequest): void {
    const rootIds = req.objects.map((o) => o.id);
    const parent = req.parentId === null ? null : this.objects.get(req.parentId);
    if (parent === undefined) return this.reject(user, "create", rootIds, "unknown parent");
    if (parent && this.lockedByOther(parent, user)) return this.reject(user, "create", rootIds, "parent is locked");

    const seen = new Set<ReplicaId>();
    const added = new Map<string, number>();
    for (const wire of walkWire(req.objects)) {
      const label = formatReplicaId(wire.id);
      if (seen.has(wire.id) || this.objects.has(wire.id)) {
        return this.reject(user, "create", rootIds, `duplicate id ${label}`);
      }
      // Ids outside the sender's range are only accepted for objects that were deleted before.
      if (replicaIdOwner(wire.id) !== user && !this.tombstones.has(wire.id)) {
        return this.reject(user, "create", rootIds, `id ${label} is not owned by user ${user}`);
      }
      seen.add(wire.id);
      added.set(wire.type, (added.get(wire.type) ?? 0) + 1);
    }
    for (const [type, count] of added) {
      const limit = this.getObjectLimit(type);
      if (this.getObjectCount(type) + count > limit) {
        return this.reject(user, "create", rootIds, `object limit of ${limit} reached for ${type}`);
      }
    }

    const created = req.objects.map((wire) => {
      const obj = fromWireObject(wire);
      for (const o of [obj, ...obj.descendants()]) {
        o.status = "created";
        o.lock = { kind: "unlocked" };
        this.objects.set(o.id, o);
        this.tombstones.delete(o.id);
      }
      return obj;
    });
    const start = Math.max(0, Math.min(req.index ?? Infinity, this.childList(parent).length));
    created.forEach((obj, i) => this.insert(obj, parent, start + i));

    const parentId = parent?.id ?? null;
    const parentOrder = this.order(parent).order;
    this.send(user, { case: "confirmCreate", value: { ids: rootIds, parentId, parentOrder } });
    this.broadcast(
      { case: "created", value: { parentId, index: start, objects: created.map(toWireObject), parentOrder, by: user } },
      user
    );
  }

  private delete(user: UserId, req: IdRequest): void {
    const obj = this.objects.get(req.id);
    if (!obj) return this.reject(user, "delete", [req.id], "unknown object");
    const parent = obj.parent;

    if (this.subtreeLockedByOther(obj, user)) {
      const index = this.childList(parent).indexOf(obj);
      this.send(user, {
        case: "created",
        value: {
          parentId: parent?.id ?? null,
          index,
          objects: [toWireObject(obj)],
          parentOrder: this.order(parent).order,
          by: 0,
        },
      });
      return;
    }

    this.remove(obj);
    for (const o of [obj, ...obj.descendants()]) {
      this.objects.delete(o.id);
      this.tombstones.add(o.id);
      o.status = "detached";
      o.lock = { kind: "unlocked" };
    }
    const orders = [this.order(parent)];
    this.send(user, { case: "confirmDelete", value: { id: obj.id, unsubscribed: false, orders } });
    this.broadcast({ case: "deleted", value: { id: obj.id, orders } }, user);
  }

  private requestLock(user: UserId, req: IdRequest): void {
    const obj = this.objects.get(req.id);
    if (!obj) return this.reject(user, "requestLock", [req.id], "unknown object");
    const owner = obj.lockOwner;
    if (owner === user) {
      this.send(user, { case: "locked", value: { id: obj.id, owner } });
      return;
    }
    if (owner !== null) return this.reject(user, "requestLock", [obj.id], `locked by user ${owner}`);
    obj.lock = { kind: "locked", owner: user };
    this.broadcast({ case: "locked", value: { id: obj.id, owner: user } });
  }

  private releaseLock(user: UserId, req: IdRequest): void {
    const obj = this.objects.get(req.id);
    if (!obj) return this.reject(user, "releaseLock", [req.id], "unknown object");
    const owner = obj.lockOwner;
    if (owner === user) {
      obj.lock = { kind: "unlocked" };
      this.broadcast({ case: "unlocked", value: { id: obj.id } });
      return;
    }
    // Not ours to release: tell the requester what the lock state actually is.
    if (owner === null) this.send(user, { case: "unlocked", value: { id: obj.id } });
    else this.send(user, { case: "locked", value: { id: obj.id, owner } });
  }

  private setParent(user: UserId, req: SetParentRequest): void {
    const obj = this.objects.get(req.id);
    if (!obj) return this.reject(user, "setParent", [req.id], "unknown object");
    const parent = this.objects.get(req.parentId);
    if (!parent || parent === obj || obj.isAncestorOf(parent)) return this.correctPosition(user, obj, parent);
    if (this.lockedByOther(obj, user) || this.lockedByOther(parent, user)) {
      return this.correctPosition(user, obj, parent);
    }
    this.move(user, obj, parent, req.index);
  }

  private setChildIndex(user: UserId, req: SetChildIndexRequest): void {
    const obj = this.objects.get(req.id);
    if (!obj) return this.reject(user, "setChildIndex", [req.id], "unknown object");
    if (this.lockedByOther(obj, user)) return this.correctPosition(user, obj, obj.parent);
    this.move(user, obj, obj.parent, req.index);
  }

  private move(user: UserId, obj: ReplicaObject, parent: ReplicaObject | null, index: number): void {
    const from = obj.parent;
    this.remove(obj);
    const at = this.insert(obj, parent, index);
    const orders = from === parent ? [this.order(parent)] : [this.order(from), this.order(parent)];
    this.broadcast({
      case: "parentChanged",
      value: { id: obj.id, parentId: parent?.id ?? null, index: at, by: user, orders },
    });
  }

  /** Sends the requester the actual position of `obj`, plus the order of the parent it asked for. */
  private correctPosition(user: UserId, obj: ReplicaObject, requested: ReplicaObject | null | undefined): void {
    const parent = obj.parent;
    const orders = [this.order(parent)];
    if (requested !== undefined && requested !== parent) orders.push(this.order(requested));
    this.log.debug(`corrected position of ${obj.toString()} for user ${user}`);
    this.send(user, {
      case: "parentChanged",
      value: { id: obj.id, parentId: parent?.id ?? null, index: this.childList(parent).indexOf(obj), by: 0, orders },
    });
  }

  /** Sends the requester the host value of the top-level field `path` starts in. */
  private correctField(user: UserId, obj: ReplicaObject, path: PropertyPath): void {
    const field = path[0];
    if (typeof field !== "string") return;
    const current = obj.properties.get(field);
    this.log.debug(`corrected ${obj.toString()}/${field} for user ${user}`);
    if (current) {
      this.send(user, {
        case: "propertySet",
        value: { id: obj.id, path: [field], value: toPlainProperty(current), by: 0 },
      });
    } else {
      this.send(user, { case: "fieldRemoved", value: { id: obj.id, path: [], name: field, by: 0 } });
    }
  }

  private writable(user: UserId, request: ClientCase, id: ReplicaId, path: PropertyPath): ReplicaObject | undefined {
    const obj = this.objects.get(id);
    if (!obj) {
      this.reject(user, request, [id], "unknown object");
      return undefined;
    }
    if (this.lockedByOther(obj, user)) {
      this.correctField(user, obj, path);
      return undefined;
    }
    return obj;
  }

  private setProperty(user: UserId, req: SetPropertyRequest): void {
    const obj = this.writable(user, "setProperty", req.id, req.path);
    if (!obj) return;
    if (!setPropertyAt(obj.properties, req.path, fromPlainProperty(req.value))) {
      return this.correctField(user, obj, req.path);
    }
    this.broadcast({ case: "propertySet", value: { ...req, by: user } });
  }

  private removeField(user: UserId, req: RemoveFieldRequest): void {
    const fieldPath = [...req.path, req.name];
    const obj = this.writable(user, "removeField", req.id, fieldPath);
    if (!obj) return;
    const dict = dictionaryAt(obj.properties, req.path);
    if (!dict) return this.correctField(user, obj, fieldPath);
    dict.delete(req.name);
    this.broadcast({ case: "fieldRemoved", value: { ...req, by: user } });
  }

  private listAdd(user: UserId, req: ListAddRequest): void {
    const obj = this.writable(user, "listAdd", req.id, req.path);
    if (!obj) return;
    const list = listAt(obj.properties, req.path);
    if (!list || req.index > list.length) return this.correctField(user, obj, req.path);
    list.insert(req.index, req.items.map(fromPlainProperty));
    this.broadcast({ case: "listAdded", value: { ...req, by: user } });
  }

  private listRemove(user: UserId, req: ListRemoveRequest): void {
    const obj = this.writable(user, "listRemove", req.id, req.path);
    if (!obj) return;
    const list = listAt(obj.properties, req.path);
    if (!list || req.index + req.count > list.length) return this.correctField(user, obj, req.path);
    list.remove(req.index, req.count);
    this.broadcast({ case: "listRemoved", value: { ...req, by: user } });
  }
}
