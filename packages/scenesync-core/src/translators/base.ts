import type { HierarchyReconciler } from "../hierarchy.js";
import type { Logger } from "../logger.js";
import type { LockCoordinator } from "../locks.js";
import type { NativeHandle, SceneEngine } from "../native.js";
import type { ReplicaObject } from "../object.js";
import type { DictionaryProperty, ListProperty, Property } from "../properties.js";
import { ReferenceProperty } from "../properties.js";
import type { ObjectRegistry } from "../registry.js";
import type { PropertySerializer } from "../serializer.js";
import type { ReplicaSession } from "../session.js";
import type { TemplateRevisions } from "../template-revisions.js";

/** Services shared by every translator of one replicator. */
export type TranslatorContext = {
  engine: SceneEngine;
  registry: ObjectRegistry;
  locks: LockCoordinator;
  serializer: PropertySerializer;
  hierarchy: HierarchyReconciler;
  revisions: TemplateRevisions;
  log: Logger;
};

export type TryCreateResult = { handled: false } | { handled: true; obj: ReplicaObject | null };

/** Per-type replication policy. The dispatcher routes every event for its type here. */
export interface Translator {
  readonly name: string;

  initialize(): void;
  onSessionConnect(session: ReplicaSession): void;
  onSessionDisconnect(): void;

  /** Pre-phase of a tick: flush locally originated changes. */
  preUpdate(): void;
  /** Post-phase of a tick: apply server-originated changes. */
  update(): void;

  tryCreate(native: NativeHandle): TryCreateResult;
  getNative(obj: ReplicaObject): NativeHandle | undefined;

  onCreate(obj: ReplicaObject, childIndex: number): void;
  onConfirmCreate(obj: ReplicaObject): void;
  onDelete(obj: ReplicaObject): void;
  onConfirmDelete(obj: ReplicaObject, unsubscribed: boolean): void;

  onLock(obj: ReplicaObject): void;
  onUnlock(obj: ReplicaObject): void;
  onLockOwnerChange(obj: ReplicaObject): void;
  onParentChange(obj: ReplicaObject, childIndex: number): void;

  onPropertyChange(property: Property): void;
  onRemoveField(dictionary: DictionaryProperty, name: string): void;
  onListAdd(list: ListProperty, index: number, count: number): void;
  onListRemove(list: ListProperty, index: number, count: number): void;

  onReplace(obj: ReplicaObject, oldNative: NativeHandle, newNative: NativeHandle): void;

  onSelect(native: NativeHandle): void;
  onDeselect(native: NativeHandle): void;
}

export abstract class BaseTranslator implements Translator {
  abstract readonly name: string;
  protected session: ReplicaSession | null = null;

  constructor(protected readonly ctx: TranslatorContext) {}

  /** The connected session. Throws when called outside a session. */
  protected get connected(): ReplicaSession {
    if (!this.session) throw new Error(`${this.name}: not connected to a session`);
    return this.session;
  }

  initialize(): void {}

  onSessionConnect(session: ReplicaSession): void {
    this.session = session;
  }

  onSessionDisconnect(): void {
    this.session = null;
  }

  preUpdate(): void {}
  update(): void {}

  tryCreate(_native: NativeHandle): TryCreateResult {
    return { handled: false };
  }

  getNative(obj: ReplicaObject): NativeHandle | undefined {
    return this.ctx.registry.getNative(obj);
  }

  onCreate(_obj: ReplicaObject, _childIndex: number): void {}
  onConfirmCreate(_obj: ReplicaObject): void {}
  onDelete(_obj: ReplicaObject): void {}
  onConfirmDelete(_obj: ReplicaObject, _unsubscribed: boolean): void {}

  onLock(_obj: ReplicaObject): void {}
  onUnlock(_obj: ReplicaObject): void {}
  onLockOwnerChange(_obj: ReplicaObject): void {}
  onParentChange(_obj: ReplicaObject, _childIndex: number): void {}

  onPropertyChange(_property: Property): void {}
  onRemoveField(_dictionary: DictionaryProperty, _name: string): void {}
  onListAdd(_list: ListProperty, _index: number, _count: number): void {}
  onListRemove(_list: ListProperty, _index: number, _count: number): void {}

  onReplace(obj: ReplicaObject, oldNative: NativeHandle, newNative: NativeHandle): void {
    this.ctx.registry.unbindNative(oldNative);
    this.ctx.registry.bind(obj, newNative);
  }

  /** Points every reference to `from` at `to`. Used when a duplicate replica is retired. */
  protected retargetReferences(from: ReplicaObject, to: ReplicaObject): void {
    const session = this.connected;
    for (const reference of session.getReferences(from)) {
      const owner = reference.owner;
      if (!owner || !owner.isSyncing) continue;
      session.setProperty(owner, reference.path(), new ReferenceProperty(to.id));
    }
  }

  // Selecting something starts editing it, so we ask for its lock.
  onSelect(native: NativeHandle): void {
    const obj = this.ctx.registry.getReplica(native);
    if (obj) this.ctx.locks.requestLock(obj);
  }

  onDeselect(native: NativeHandle): void {
    const obj = this.ctx.registry.getReplica(native);
    if (obj) this.ctx.locks.releaseLock(obj);
  }
}
