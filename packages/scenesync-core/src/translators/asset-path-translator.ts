import type { ReplicaId } from "../ids.js";
import type { NativeAsset } from "../native.js";
import { isComponent, isNode } from "../native.js";
import { ObjectType, Prop, ReplicaObject } from "../object.js";
import { ValueProperty, readString } from "../properties.js";
import type { ReplicaSession } from "../session.js";
import { BaseTranslator } from "./base.js";

/**
 * Asset references are replicated as references to one root replica per asset path, so peers
 * resolve them against their own copy of the asset. Unsaved assets have no stable path and are
 * sent as `null` until the engine reports them saved.
 */
export class AssetPathTranslator extends BaseTranslator {
  readonly name = "asset";
  private readonly pathObjects = new Map<string, ReplicaObject>();

  override initialize(): void {
    this.ctx.serializer.setAssetResolver((asset) => this.resolve(asset));
  }

  override onSessionConnect(session: ReplicaSession): void {
    super.onSessionConnect(session);
    for (const root of session.rootObjects()) {
      if (root.type === ObjectType.asset) this.onCreate(root);
    }
  }

  override onSessionDisconnect(): void {
    super.onSessionDisconnect();
    this.pathObjects.clear();
  }

  get size(): number {
    return this.pathObjects.size;
  }

  /** The replica standing for `path`, created and sent on first use. */
  getOrCreatePathObject(path: string): ReplicaObject {
    const existing = this.pathObjects.get(path);
    if (existing) {
      this.bindAsset(existing, path);
      return existing;
    }
    const session = this.connected;
    const obj = new ReplicaObject(session.allocateId(), ObjectType.asset);
    obj.properties.set(Prop.path, new ValueProperty(path));
    this.pathObjects.set(path, obj);
    session.create(obj, null);
    this.bindAsset(obj, path);
    return obj;
  }

  onAssetSaved(asset: NativeAsset): void {
    if (!this.session || !this.ctx.engine.isPersisted(asset)) return;
    this.getOrCreatePathObject(this.ctx.engine.assetPath(asset));
  }

  override onCreate(obj: ReplicaObject): void {
    const path = readString(obj.properties, Prop.path);
    if (path === undefined) {
      this.ctx.log.warn(`asset ${obj.toString()} has no path`);
      return;
    }
    const existing = this.pathObjects.get(path);
    if (existing && existing !== obj && existing.isSyncing) {
      const session = this.connected;
      if (existing.isCreated) {
        this.retargetReferences(obj, existing);
        session.delete(obj);
        return;
      }
      // Ours is not confirmed yet, so the host saw the other one first.
      this.retargetReferences(existing, obj);
      session.delete(existing);
      this.ctx.registry.unbindReplica(existing);
    }
    this.pathObjects.set(path, obj);
    this.bindAsset(obj, path);
    this.applyReferenceFields(obj);
  }

  override onDelete(obj: ReplicaObject): void {
    this.forget(obj);
  }

  override onConfirmDelete(obj: ReplicaObject): void {
    this.forget(obj);
  }

  private resolve(asset: NativeAsset): ReplicaId | null {
    if (!this.session || !this.ctx.engine.isPersisted(asset)) return null;
    return this.getOrCreatePathObject(this.ctx.engine.assetPath(asset)).id;
  }

  private bindAsset(obj: ReplicaObject, path: string): void {
    const { engine, registry } = this.ctx;
    if (registry.getNative(obj)) return;
    const asset = engine.loadAsset(path);
    if (asset) registry.bind(obj, asset);
  }

  private applyReferenceFields(obj: ReplicaObject): void {
    const { registry, serializer } = this.ctx;
    for (const reference of this.connected.getReferences(obj)) {
      const owner = reference.owner;
      const field = reference.path()[0];
      const native = registry.getNative(owner);
      if (!owner || typeof field !== "string") continue;
      if (isNode(native) || isComponent(native)) serializer.applyField(native, owner.properties, field);
    }
  }

  private forget(obj: ReplicaObject): void {
    const path = readString(obj.properties, Prop.path);
    if (path !== undefined && this.pathObjects.get(path) === obj) this.pathObjects.delete(path);
    this.ctx.registry.unbindReplica(obj);
  }
}
