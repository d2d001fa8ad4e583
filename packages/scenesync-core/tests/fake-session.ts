import type {
  LogLevel,
  PathSegment,
  Property,
  PropertyPath,
  ReferenceProperty,
  ReplicaId,
  ReplicaSession,
  SessionEventName,
  SessionEvents,
  TranslatorContext,
  Unsubscribe,
  UserId,
} from "../src/index.js";
import {
  HierarchyReconciler,
  LockCoordinator,
  MemorySceneEngine,
  ObjectRegistry,
  PropertySerializer,
  ReplicaObject,
  SessionEventEmitter,
  TemplateRevisions,
  collectReferences,
  createLogger,
  makeReplicaId,
  propertyAt,
} from "../src/index.js";

export type SessionCall =
  | { op: "create"; ids: ReplicaId[]; parentId: ReplicaId | null; index: number | undefined }
  | { op: "delete"; id: ReplicaId }
  | { op: "requestLock"; id: ReplicaId }
  | { op: "releaseLock"; id: ReplicaId }
  | { op: "setParent"; id: ReplicaId; parentId: ReplicaId; index: number }
  | { op: "setChildIndex"; id: ReplicaId; index: number }
  | { op: "setProperty"; id: ReplicaId; path: PathSegment[]; value: Property }
  | { op: "removeField"; id: ReplicaId; path: PathSegment[]; name: string }
  | { op: "listAdd"; id: ReplicaId; path: PathSegment[]; index: number; count: number }
  | { op: "listRemove"; id: ReplicaId; path: PathSegment[]; index: number; count: number };

/**
 * Session whose host accepts everything at once: requests are applied to the mirror, recorded in
 * `calls`, and never echoed. Locks are granted and released on request.
 */
export class FakeSession implements ReplicaSession {
  readonly userId: UserId = 1;
  readonly calls: SessionCall[] = [];
  readonly events = new SessionEventEmitter();
  readonly limits = new Map<string, number>();
  private readonly objects = new Map<ReplicaId, ReplicaObject>();
  private readonly roots: ReplicaObject[] = [];
  private counter = 1;

  on<E extends SessionEventName>(event: E, handler: SessionEvents[E]): Unsubscribe {
    return this.events.on(event, handler);
  }

  allocateId(): ReplicaId {
    const id = makeReplicaId(this.userId, this.counter);
    this.counter += 1;
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

  /** Adds `obj` and its subtree as confirmed objects without recording a call. */
  seed(obj: ReplicaObject, parent: ReplicaObject | null = null): ReplicaObject {
    this.place(obj, parent, Infinity);
    return obj;
  }

  create(objects: ReplicaObject | readonly ReplicaObject[], parent: ReplicaObject | null, index?: number): void {
    const list = objects instanceof ReplicaObject ? [objects] : objects;
    const start = Math.min(index ?? Infinity, this.childList(parent).length);
    list.forEach((obj, i) => this.place(obj, parent, start + i));
    this.calls.push({ op: "create", ids: list.map((o) => o.id), parentId: parent?.id ?? null, index });
  }

  delete(obj: ReplicaObject): void {
    this.remove(obj);
    for (const o of [obj, ...obj.descendants()]) {
      o.status = "detached";
      this.objects.delete(o.id);
    }
    this.calls.push({ op: "delete", id: obj.id });
  }

  requestLock(obj: ReplicaObject): void {
    obj.lock = { kind: "held" };
    this.calls.push({ op: "requestLock", id: obj.id });
  }

  releaseLock(obj: ReplicaObject): void {
    obj.lock = { kind: "unlocked" };
    this.calls.push({ op: "releaseLock", id: obj.id });
  }

  setParent(obj: ReplicaObject, parent: ReplicaObject, index: number): void {
    this.remove(obj);
    const at = this.insert(obj, parent, index);
    this.calls.push({ op: "setParent", id: obj.id, parentId: parent.id, index: at });
  }

  setChildIndex(obj: ReplicaObject, index: number): void {
    const parent = obj.parent;
    this.remove(obj);
    const at = this.insert(obj, parent, index);
    this.calls.push({ op: "setChildIndex", id: obj.id, index: at });
  }

  setProperty(obj: ReplicaObject, path: PropertyPath, value: Property): void {
    const container = propertyAt(obj.properties, path.slice(0, -1));
    const key = path[path.length - 1];
    if (container?.kind === "dictionary" && typeof key === "string") container.set(key, value);
    this.calls.push({ op: "setProperty", id: obj.id, path: [...path], value });
  }

  removeField(obj: ReplicaObject, path: PropertyPath, name: string): void {
    const container = propertyAt(obj.properties, path);
    if (container?.kind === "dictionary") container.delete(name);
    this.calls.push({ op: "removeField", id: obj.id, path: [...path], name });
  }

  listAdd(obj: ReplicaObject, path: PropertyPath, index: number, items: readonly Property[]): void {
    const list = propertyAt(obj.properties, path);
    if (list?.kind === "list") list.insert(index, items);
    this.calls.push({ op: "listAdd", id: obj.id, path: [...path], index, count: items.length });
  }

  listRemove(obj: ReplicaObject, path: PropertyPath, index: number, count: number): void {
    const list = propertyAt(obj.properties, path);
    if (list?.kind === "list") list.remove(index, count);
    this.calls.push({ op: "listRemove", id: obj.id, path: [...path], index, count });
  }

  getObjectLimit(type: string): number {
    return this.limits.get(type) ?? Infinity;
  }

  getObjectCount(type: string): number {
    let count = 0;
    for (const obj of this.objects.values()) if (obj.type === type) count += 1;
    return count;
  }

  callsOf<K extends SessionCall["op"]>(op: K): Extract<SessionCall, { op: K }>[] {
    const out: Extract<SessionCall, { op: K }>[] = [];
    for (const call of this.calls) if (isCall(call, op)) out.push(call);
    return out;
  }

  private place(obj: ReplicaObject, parent: ReplicaObject | null, index: number): void {
    this.remove(obj);
    this.insert(obj, parent, index);
    for (const o of [obj, ...obj.descendants()]) {
      o.status = "created";
      this.objects.set(o.id, o);
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

  private remove(obj: ReplicaObject): void {
    if (obj.parent) {
      obj.parent.detachChild(obj);
      return;
    }
    const idx = this.roots.indexOf(obj);
    if (idx >= 0) this.roots.splice(idx, 1);
  }
}

function isCall<K extends SessionCall["op"]>(call: SessionCall, op: K): call is Extract<SessionCall, { op: K }> {
  return call.op === op;
}

export type TestContext = {
  ctx: TranslatorContext;
  engine: MemorySceneEngine;
  lines: string[];
};

/** Wires the shared services of one replicator around a fresh in-memory engine. */
export function createTestContext(engine = new MemorySceneEngine()): TestContext {
  const lines: string[] = [];
  const log = createLogger({ debug: true, log: (line: string, level: LogLevel) => lines.push(`${level} ${line}`) });
  const registry = new ObjectRegistry();
  const ctx: TranslatorContext = {
    engine,
    registry,
    locks: new LockCoordinator({ engine, registry, log }),
    serializer: new PropertySerializer({ engine, registry, lookup: () => undefined }),
    hierarchy: new HierarchyReconciler({ engine, registry, log }),
    revisions: new TemplateRevisions({ engine, registry, log }),
    log,
  };
  return { ctx, engine, lines };
}
