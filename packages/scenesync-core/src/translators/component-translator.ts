import { ComponentFinder } from "../component-finder.js";
import type { NativeComponent, NativeHandle, NativeNode } from "../native.js";
import { isComponent, isNode } from "../native.js";
import type { ReplicaObject } from "../object.js";
import { ObjectType, Prop } from "../object.js";
import { ValueProperty, readString } from "../properties.js";
import type { TranslatorContext, TryCreateResult } from "./base.js";
import { PropertyTranslator } from "./property-translator.js";

export type ComponentTranslatorOptions = {
  /** Components that must never replicate. Defaults to all replicating. */
  isSyncable?: (component: NativeComponent) => boolean;
};

/**
 * Components are the leading children of their node's ReplicaObject, in native order. Locks are
 * taken on nodes, so a component follows its node's lock.
 */
export class ComponentTranslator extends PropertyTranslator {
  readonly name = "component";
  private readonly orderApplySet = new Set<ReplicaObject>();
  private readonly syncableFilter: (component: NativeComponent) => boolean;

  constructor(ctx: TranslatorContext, opts: ComponentTranslatorOptions = {}) {
    super(ctx);
    this.syncableFilter = opts.isSyncable ?? (() => true);
  }

  isSyncable(component: NativeComponent): boolean {
    return !this.ctx.engine.isDestroyed(component) && this.syncableFilter(component);
  }

  override onSessionDisconnect(): void {
    super.onSessionDisconnect();
    this.orderApplySet.clear();
  }

  override preUpdate(): void {
    this.resolvePendingReferences();
  }

  override update(): void {
    if (this.orderApplySet.size === 0) return;
    const nodes = Array.from(this.orderApplySet);
    this.orderApplySet.clear();
    for (const nodeObj of nodes) {
      const native = this.ctx.registry.getNative(nodeObj);
      if (isNode(native) && !this.ctx.engine.isDestroyed(native)) this.applyComponentOrder(native);
    }
  }

  override tryCreate(native: NativeHandle): TryCreateResult {
    if (!isComponent(native)) return { handled: false };
    const node = this.ctx.engine.componentNode(native);
    this.syncComponents(node);
    const obj = this.ctx.registry.getReplica(native);
    return { handled: true, obj: obj?.isSyncing ? obj : null };
  }

  /** Builds an unsent ReplicaObject for `component`. `null` when it is filtered out or already syncing. */
  createComponentObject(component: NativeComponent): ReplicaObject | null {
    if (!this.isSyncable(component)) return null;
    const existing = this.ctx.registry.getReplica(component);
    if (existing?.isSyncing) return null;

    const { engine } = this.ctx;
    const obj = this.createObject(component, ObjectType.component);
    const props = obj.properties;
    props.set(Prop.type, new ValueProperty(engine.componentType(component)));

    const node = engine.componentNode(component);
    const isInstance = engine.nodeSource(node) !== null;
    if (engine.isTemplateAssetPart(node) && !isInstance) {
      const fileId = engine.fileId(component);
      if (fileId !== 0) props.set(Prop.fileId, new ValueProperty(fileId));
    }
    if (isInstance && engine.components(node)[0] !== component) {
      const source = engine.componentSource(component);
      const sourceFileId = source ? engine.fileId(source) : 0;
      if (sourceFileId !== 0) props.set(Prop.sourceFileId, new ValueProperty(sourceFileId));
    }
    return obj;
  }

  /**
   * Sends added and removed components of `node`. A locked node is put back instead: removed
   * components are restored and added ones destroyed.
   */
  syncComponents(node: NativeNode): boolean {
    const { engine, registry } = this.ctx;
    const nodeObj = registry.getReplica(node);
    if (!nodeObj?.isSyncing) return false;
    const session = this.connected;
    const natives = engine.components(node).filter((c) => this.isSyncable(c));

    if (nodeObj.isLocked) {
      for (const component of natives) {
        if (!registry.getReplica(component)?.isSyncing) engine.destroyComponent(component);
      }
      for (const compObj of nodeObj.childrenOfType(ObjectType.component)) {
        const native = registry.getNative(compObj);
        if (!isComponent(native) || engine.isDestroyed(native)) this.restoreComponent(compObj, node);
      }
      this.applyComponentOrder(node);
      return false;
    }

    let changed = false;
    for (const compObj of nodeObj.childrenOfType(ObjectType.component)) {
      const native = registry.getNative(compObj);
      if (isComponent(native) && !engine.isDestroyed(native) && engine.componentNode(native) === node) continue;
      session.delete(compObj);
      registry.unbindReplica(compObj);
      changed = true;
    }

    let index = 0;
    for (const component of natives) {
      const current = registry.getReplica(component);
      if (current?.isSyncing) {
        index++;
        continue;
      }
      const obj = this.createComponentObject(component);
      if (!obj) continue;
      session.create(obj, nodeObj, index);
      index++;
      changed = true;
    }

    if (changed) this.ctx.revisions.increment(nodeObj);
    return changed;
  }

  /** Sends the native component order of `node`, or queues a revert when it is locked. */
  syncComponentOrder(node: NativeNode): boolean {
    const { engine, registry } = this.ctx;
    const nodeObj = registry.getReplica(node);
    if (!nodeObj?.isSyncing) return false;
    if (nodeObj.isLocked) {
      this.orderApplySet.add(nodeObj);
      return false;
    }
    const session = this.connected;
    const expected: ReplicaObject[] = [];
    for (const component of engine.components(node)) {
      const obj = registry.getReplica(component);
      if (obj?.isSyncing && obj.parent === nodeObj) expected.push(obj);
    }
    let changed = false;
    expected.forEach((obj, i) => {
      if (nodeObj.children[i] === obj) return;
      session.setChildIndex(obj, i);
      changed = true;
    });
    if (changed) this.ctx.revisions.increment(nodeObj);
    return changed;
  }

  /** Moves native components of `node` into the server order. */
  applyComponentOrder(node: NativeNode): void {
    const { engine, registry } = this.ctx;
    const nodeObj = registry.getReplica(node);
    if (!nodeObj) return;
    let target = 0;
    for (const compObj of nodeObj.childrenOfType(ObjectType.component)) {
      const native = registry.getNative(compObj);
      if (!isComponent(native) || engine.isDestroyed(native)) continue;
      if (engine.components(node).indexOf(native) !== target) engine.moveComponent(native, target);
      target++;
    }
  }

  /**
   * Binds the component children of `nodeObj` to native components of `node`, matching existing
   * ones first and adding the rest. Unmatched syncable natives are destroyed.
   */
  initializeComponents(nodeObj: ReplicaObject, node: NativeNode): void {
    const { engine, registry, log } = this.ctx;
    const finder = ComponentFinder.forNode(engine, node, (c) => this.isSyncable(c));
    let added = false;
    for (const compObj of nodeObj.childrenOfType(ObjectType.component)) {
      const bound = registry.getNative(compObj);
      let native: NativeComponent | undefined =
        isComponent(bound) && !engine.isDestroyed(bound) && engine.componentNode(bound) === node ? bound : undefined;
      if (!native) {
        const match = finder.findFor(compObj, (stale) => engine.destroyComponent(stale));
        if (match?.fileIdMismatch) log.debug(`matched ${compObj.toString()} by type only`);
        native = match?.component;
      }
      if (!native) {
        const type = readString(compObj.properties, Prop.type);
        if (type === undefined) {
          log.warn(`component ${compObj.toString()} has no type`);
          continue;
        }
        native = engine.addComponent(node, type);
        added = true;
      }
      registry.bind(compObj, native);
      this.applyProperties(compObj, native);
    }
    for (const leftover of finder.remaining()) {
      if (!registry.getReplica(leftover)?.isSyncing) engine.destroyComponent(leftover);
    }
    if (added || !finder.inOrder) this.applyComponentOrder(node);
  }

  /** Reverts the components of `node` to server state. */
  applyServerState(node: NativeNode): void {
    const { engine, registry } = this.ctx;
    const nodeObj = registry.getReplica(node);
    if (!nodeObj) return;
    for (const component of engine.components(node)) {
      if (!this.isSyncable(component)) continue;
      const obj = registry.getReplica(component);
      if (!obj?.isSyncing) {
        engine.destroyComponent(component);
        continue;
      }
      this.applyProperties(obj, component);
    }
    for (const compObj of nodeObj.childrenOfType(ObjectType.component)) {
      const native = registry.getNative(compObj);
      if (!isComponent(native) || engine.isDestroyed(native)) this.restoreComponent(compObj, node);
    }
    this.applyComponentOrder(node);
  }

  /** Sends field edits of a component, or reverts them when its node is locked. */
  onFieldsChanged(component: NativeComponent): void {
    const obj = this.ctx.registry.getReplica(component);
    if (!obj?.isSyncing) return;
    if (obj.parent?.isLocked) {
      this.applyProperties(obj, component);
      return;
    }
    if (this.sendPropertyChanges(obj, component)) this.ctx.revisions.increment(obj);
  }

  override onCreate(obj: ReplicaObject, childIndex: number): void {
    const nodeObj = obj.parent;
    const node = this.ctx.registry.getNative(nodeObj);
    // Without a native node the component is created along with it.
    if (!nodeObj || !isNode(node) || this.ctx.engine.isDestroyed(node)) return;
    const native = this.restoreComponent(obj, node);
    if (!native) return;
    if (nodeObj.isLocked) this.ctx.engine.setEditable(native, false);
    if (childIndex !== nodeObj.childrenOfType(ObjectType.component).length - 1) this.orderApplySet.add(nodeObj);
  }

  override onDelete(obj: ReplicaObject): void {
    const native = this.ctx.registry.unbindReplica(obj);
    if (isComponent(native) && !this.ctx.engine.isDestroyed(native)) this.ctx.engine.destroyComponent(native);
  }

  override onConfirmDelete(obj: ReplicaObject, unsubscribed: boolean): void {
    if (unsubscribed) {
      this.ctx.registry.unbindReplica(obj);
      return;
    }
    obj.clear();
  }

  override onParentChange(obj: ReplicaObject): void {
    if (obj.parent) this.orderApplySet.add(obj.parent);
  }

  private restoreComponent(obj: ReplicaObject, node: NativeNode): NativeComponent | undefined {
    const type = readString(obj.properties, Prop.type);
    if (type === undefined) {
      this.ctx.log.warn(`component ${obj.toString()} has no type`);
      return undefined;
    }
    const native = this.ctx.engine.addComponent(node, type);
    this.ctx.registry.bind(obj, native);
    this.applyProperties(obj, native);
    return native;
  }
}
