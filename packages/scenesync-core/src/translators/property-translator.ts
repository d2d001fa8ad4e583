import type { FieldOwner, NativeHandle, Unsubscribe } from "../native.js";
import { isComponent, isNode } from "../native.js";
import { ReplicaObject } from "../object.js";
import type { DictionaryProperty, ListProperty, Property } from "../properties.js";
import type { UnresolvedReference } from "../serializer.js";
import { isReservedField } from "../serializer.js";
import type { TranslatorContext } from "./base.js";
import { BaseTranslator } from "./base.js";

/**
 * Custom handling for one top-level field. `property` is `null` when the field was removed.
 * Returning `true` skips the default apply.
 */
export type PropertyChangeHandler = (owner: FieldOwner, property: Property | null, field: string) => boolean;
export type PostPropertyChangeHandler = (owner: FieldOwner, property: Property | null, field: string) => void;

/** Handler key for node fields. Components are keyed by their component type. */
export const NODE_HANDLER_KEY = "node";

export function asFieldOwner(handle: NativeHandle | undefined): FieldOwner | undefined {
  return isNode(handle) || isComponent(handle) ? handle : undefined;
}

function topField(property: Property): string | undefined {
  const first = property.path()[0];
  return typeof first === "string" ? first : undefined;
}

/**
 * Default policy for objects whose state is a set of serialized native fields.
 *
 * Inbound changes rewrite the whole top-level field they touch. Outbound changes are found by
 * diffing the native fields against the replicated ones.
 */
export abstract class PropertyTranslator extends BaseTranslator {
  private readonly changeHandlers = new Map<string, PropertyChangeHandler[]>();
  private readonly postChangeHandlers = new Map<string, PostPropertyChangeHandler[]>();
  // Targets without a replica yet, and the objects whose fields point at them.
  private readonly pendingReferences = new Map<NativeHandle, Set<ReplicaObject>>();
  private readonly resolvedOwners = new Set<ReplicaObject>();
  private unsubscribeBind: Unsubscribe | null = null;

  constructor(ctx: TranslatorContext) {
    super(ctx);
  }

  override initialize(): void {
    this.unsubscribeBind?.();
    this.unsubscribeBind = this.ctx.registry.onBind((_replica, native) => {
      const owners = this.pendingReferences.get(native);
      if (!owners) return;
      this.pendingReferences.delete(native);
      for (const owner of owners) this.resolvedOwners.add(owner);
    });
  }

  override onSessionDisconnect(): void {
    super.onSessionDisconnect();
    this.pendingReferences.clear();
    this.resolvedOwners.clear();
  }

  addPropertyChangeHandler(key: string, field: string, handler: PropertyChangeHandler): void {
    const id = `${key}\u0000${field}`;
    const list = this.changeHandlers.get(id) ?? [];
    list.push(handler);
    this.changeHandlers.set(id, list);
  }

  addPostPropertyChangeHandler(key: string, field: string, handler: PostPropertyChangeHandler): void {
    const id = `${key}\u0000${field}`;
    const list = this.postChangeHandlers.get(id) ?? [];
    list.push(handler);
    this.postChangeHandlers.set(id, list);
  }

  protected handlerKey(owner: FieldOwner): string {
    return isComponent(owner) ? this.ctx.engine.componentType(owner) : NODE_HANDLER_KEY;
  }

  protected callPropertyChangeHandlers(owner: FieldOwner, property: Property | null, field: string): boolean {
    const handlers = this.changeHandlers.get(`${this.handlerKey(owner)}\u0000${field}`);
    return handlers?.some((handler) => handler(owner, property, field)) ?? false;
  }

  protected callPostPropertyChangeHandlers(owner: FieldOwner, property: Property | null, field: string): void {
    const handlers = this.postChangeHandlers.get(`${this.handlerKey(owner)}\u0000${field}`);
    for (const handler of handlers ?? []) handler(owner, property, field);
  }

  override onPropertyChange(property: Property): void {
    const field = topField(property);
    if (field === undefined) return;
    this.applyInboundField(property.owner, field, property);
  }

  override onRemoveField(dictionary: DictionaryProperty, name: string): void {
    if (dictionary.parent === null) {
      this.applyInboundField(dictionary.owner, name, null);
      return;
    }
    const field = topField(dictionary);
    if (field !== undefined) this.applyInboundField(dictionary.owner, field, dictionary);
  }

  override onListAdd(list: ListProperty): void {
    this.onListChange(list);
  }

  override onListRemove(list: ListProperty): void {
    this.onListChange(list);
  }

  private onListChange(list: ListProperty): void {
    const field = topField(list);
    if (field !== undefined) this.applyInboundField(list.owner, field, list);
  }

  private applyInboundField(obj: ReplicaObject | null, field: string, property: Property | null): void {
    if (!obj) return;
    const owner = asFieldOwner(this.ctx.registry.getNative(obj));
    if (!owner || this.ctx.engine.isDestroyed(owner)) return;
    if (this.callPropertyChangeHandlers(owner, property, field)) return;
    if (isReservedField(field)) return;
    this.ctx.serializer.applyField(owner, obj.properties, field);
    this.callPostPropertyChangeHandlers(owner, property, field);
  }

  /**
   * Returns the ReplicaObject bound to `native`, creating one with fresh properties when there is
   * none. An object that is already syncing has its field changes sent instead.
   */
  createObject(native: FieldOwner, type: string): ReplicaObject {
    const session = this.connected;
    const obj = this.ctx.registry.getOrCreate(native, () => new ReplicaObject(session.allocateId(), type));
    if (obj.isSyncing) {
      this.sendPropertyChanges(obj, native);
    } else {
      this.ctx.serializer.createProperties(native, obj.properties, this.trackPending(obj));
    }
    return obj;
  }

  /** Sends every top-level field that differs from the replicated value. True if any did. */
  sendPropertyChanges(obj: ReplicaObject, native: FieldOwner): boolean {
    const session = this.connected;
    const { changed, removed } = this.ctx.serializer.diff(native, obj.properties, this.trackPending(obj));
    for (const [name, prop] of changed) session.setProperty(obj, [name], prop);
    for (const name of removed) session.removeField(obj, [], name);
    return changed.length > 0 || removed.length > 0;
  }

  applyProperties(obj: ReplicaObject, native: FieldOwner): void {
    this.ctx.serializer.applyProperties(native, obj.properties);
  }

  /** Reverts a locked object to server state, or sends local changes of an unlocked one. */
  syncProperties(obj: ReplicaObject, native: FieldOwner): boolean {
    if (obj.isLocked) {
      this.applyProperties(obj, native);
      return false;
    }
    return this.sendPropertyChanges(obj, native);
  }

  override onReplace(obj: ReplicaObject, oldNative: NativeHandle, newNative: NativeHandle): void {
    super.onReplace(obj, oldNative, newNative);
    if (!this.session) return;
    for (const reference of this.session.getReferences(obj)) {
      const owner = reference.owner;
      const field = topField(reference);
      const ownerNative = asFieldOwner(this.ctx.registry.getNative(owner));
      if (!owner || !ownerNative || field === undefined) continue;
      this.ctx.serializer.applyField(ownerNative, owner.properties, field);
    }
  }

  /** Re-sends fields of objects whose reference targets have been bound since. Pre-phase. */
  resolvePendingReferences(): void {
    if (this.resolvedOwners.size === 0 || !this.session) return;
    const owners = Array.from(this.resolvedOwners);
    this.resolvedOwners.clear();
    for (const owner of owners) {
      const native = asFieldOwner(this.ctx.registry.getNative(owner));
      if (!native || !owner.isSyncing || this.ctx.engine.isDestroyed(native)) continue;
      if (owner.isLocked) continue;
      this.sendPropertyChanges(owner, native);
    }
  }

  get pendingReferenceCount(): number {
    let count = 0;
    for (const owners of this.pendingReferences.values()) count += owners.size;
    return count;
  }

  protected trackPending(obj: ReplicaObject): UnresolvedReference {
    return (target) => {
      const owners = this.pendingReferences.get(target) ?? new Set<ReplicaObject>();
      owners.add(obj);
      this.pendingReferences.set(target, owners);
    };
  }
}
