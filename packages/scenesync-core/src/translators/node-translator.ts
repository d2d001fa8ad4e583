import { DependencySorter } from "../dependency-sorter.js";
import type { FieldOwner, NativeChange, NativeHandle, NativeNode, NativeParent } from "../native.js";
import { isComponent, isNode, isScene } from "../native.js";
import type { ReplicaObject } from "../object.js";
import { ObjectType, Prop } from "../object.js";
import { ValueProperty, numberList, readBoolean, readNumber, readString } from "../properties.js";
import type { ReplicaSession } from "../session.js";
import type { TranslatorContext, TryCreateResult } from "./base.js";
import type { ComponentTranslator } from "./component-translator.js";
import { NODE_HANDLER_KEY, PropertyTranslator } from "./property-translator.js";

export type NodeTranslatorOptions = {
  /** Nodes that must never replicate, along with their subtrees. */
  isSyncable?: (node: NativeNode) => boolean;
  /** Called once per session when uploads stop because the host's object limit was hit. */
  onObjectLimit?: (type: string, limit: number) => void;
};

export type SyncAllOptions = {
  recursive?: boolean;
  /** Re-applies the editable flag and lock indicator from the replicated lock state. */
  fixLocks?: boolean;
  syncInstanceRevisions?: boolean;
  acquireTempLock?: boolean;
};

function countByType(obj: ReplicaObject, into = new Map<string, number>()): Map<string, number> {
  into.set(obj.type, (into.get(obj.type) ?? 0) + 1);
  for (const child of obj.children) countByType(child, into);
  return into;
}

/**
 * Replicates the node graph: scenes' root nodes, their descendants, template assets and template
 * instances. Local edits are staged from engine change notifications and flushed in `preUpdate`;
 * server edits are applied as they arrive, with hierarchy order and template variants settled in
 * `update`.
 */
export class NodeTranslator extends PropertyTranslator {
  readonly name = "node";

  private readonly recreate = new Set<ReplicaObject>();
  private readonly parentsWithNewChildren = new Set<NativeParent>();
  private readonly newTemplateRoots = new Set<NativeNode>();
  private readonly applyPropertiesSet = new Set<ReplicaObject>();
  private readonly templateSorter = new DependencySorter<ReplicaObject>();
  private readonly templateCreateMap = new Set<ReplicaObject>();
  private readonly syncableFilter: (node: NativeNode) => boolean;
  private handlersInstalled = false;
  private objectLimitReached = false;
  private objectLimitNotified = false;
  private limitType: string = ObjectType.node;

  constructor(
    ctx: TranslatorContext,
    private readonly components: ComponentTranslator,
    private readonly opts: NodeTranslatorOptions = {}
  ) {
    super(ctx);
    this.syncableFilter = opts.isSyncable ?? (() => true);
  }

  override initialize(): void {
    super.initialize();
    if (this.handlersInstalled) return;
    this.handlersInstalled = true;

    this.addPropertyChangeHandler(NODE_HANDLER_KEY, Prop.name, (owner, property) => {
      if (isNode(owner) && property?.kind === "value" && typeof property.value === "string") {
        this.ctx.engine.setNodeName(owner, property.value);
      }
      return true;
    });
    this.addPropertyChangeHandler(NODE_HANDLER_KEY, Prop.revision, (owner) => {
      const obj = this.ctx.registry.getReplica(owner);
      if (obj && obj.parent === null) this.ctx.revisions.onRevisionChange(obj);
      return true;
    });
  }

  override onSessionConnect(session: ReplicaSession): void {
    super.onSessionConnect(session);
    for (const root of session.rootObjects()) {
      if (root.type === ObjectType.node) this.onCreate(root, -1);
    }
    this.createDependentTemplates();
  }

  override onSessionDisconnect(): void {
    super.onSessionDisconnect();
    this.recreate.clear();
    this.parentsWithNewChildren.clear();
    this.newTemplateRoots.clear();
    this.applyPropertiesSet.clear();
    this.templateSorter.clear();
    this.templateCreateMap.clear();
    this.objectLimitReached = false;
    this.objectLimitNotified = false;
  }

  override preUpdate(): void {
    const session = this.session;
    if (!session) return;
    const { locks, revisions, hierarchy } = this.ctx;
    locks.relockTemporarilyUnlocked();
    revisions.processInstanceUpdates((instance) =>
      this.syncAll(instance, { recursive: true, syncInstanceRevisions: false })
    );
    this.recreateObjects();
    hierarchy.syncChanged(session);
    this.reapplyProperties();
    this.uploadNewChildren();
    this.resolvePendingReferences();
    revisions.propagateLocalRevisions();
    revisions.endPass();
  }

  override update(): void {
    if (!this.session) return;
    this.createDependentTemplates();
    this.ctx.hierarchy.applyChanged();
    this.checkObjectLimit();
  }

  isSyncable(node: NativeNode): boolean {
    const { engine } = this.ctx;
    if (engine.isDestroyed(node) || !this.syncableFilter(node)) return false;
    const parent = engine.parentOf(node);
    if (parent === null) return engine.templatePath(node) !== undefined;
    if (isScene(parent)) return true;
    return this.isSyncable(parent);
  }

  override tryCreate(native: NativeHandle): TryCreateResult {
    if (!isNode(native)) return { handled: false };
    const { engine, registry } = this.ctx;
    const parent = engine.parentOf(native);
    if (parent === null) {
      this.uploadTemplate(native);
      const obj = registry.getReplica(native);
      return { handled: true, obj: obj?.isSyncing ? obj : null };
    }
    const parentObj = registry.getReplica(parent);
    if (!parentObj?.isSyncing || parentObj.isFullyLocked) return { handled: true, obj: null };
    const obj = this.createNodeObject(native);
    if (!obj) return { handled: true, obj: null };
    this.connected.create(obj, parentObj, this.serverInsertIndex(parentObj, parent, native));
    this.ctx.revisions.increment(parentObj);
    return { handled: true, obj };
  }

  /**
   * Builds an unsent ReplicaObject subtree for `node`: its name, fields and template properties,
   * then component children, then child nodes. `null` when the node is not syncable or is
   * already replicated.
   */
  createNodeObject(node: NativeNode): ReplicaObject | null {
    if (!this.isSyncable(node)) return null;
    const { engine, registry, hierarchy } = this.ctx;
    if (registry.getReplica(node)?.isSyncing) return null;

    const obj = this.createObject(node, ObjectType.node);
    // A retained replica may still hold children from before it was deleted.
    for (const stale of [...obj.children]) obj.detachChild(stale);
    obj.properties.set(Prop.name, new ValueProperty(engine.nodeName(node)));
    this.setTemplateProperties(obj, node);

    for (const component of engine.components(node)) {
      const compObj = this.components.createComponentObject(component);
      if (compObj) obj.attachChild(compObj);
    }
    for (const child of engine.children(node)) {
      const childObj = this.createNodeObject(child);
      if (childObj) {
        obj.attachChild(childObj);
      } else if (registry.getReplica(child)?.isSyncing) {
        // Reparented under a new node: adopted once this one is on the server.
        hierarchy.markLocalChanged(obj);
      }
    }
    return obj;
  }

  private setTemplateProperties(obj: ReplicaObject, node: NativeNode): void {
    const { engine, revisions } = this.ctx;
    const props = obj.properties;
    const path = engine.templatePath(node);
    if (path !== undefined) props.set(Prop.path, new ValueProperty(path));

    const source = engine.nodeSource(node);
    if (source) {
      const sourcePath = engine.parentOf(source) === null ? engine.templatePath(source) : undefined;
      if (sourcePath !== undefined) {
        this.uploadTemplate(source);
        props.set(Prop.template, new ValueProperty(sourcePath));
        const revs = revisions.revisionsFor(source);
        if (revs) props.set(Prop.instanceRevisions, numberList(revs));
      } else {
        const sourceFileId = engine.fileId(source);
        if (sourceFileId !== 0) props.set(Prop.sourceFileId, new ValueProperty(sourceFileId));
      }
    } else if (engine.isTemplateAssetPart(node)) {
      const fileId = engine.fileId(node);
      if (fileId !== 0) props.set(Prop.fileId, new ValueProperty(fileId));
    }
  }

  /** Sends a template asset as a root replica, unless it is already replicated. */
  private uploadTemplate(root: NativeNode): void {
    if (this.ctx.registry.getReplica(root)?.isSyncing) return;
    const obj = this.createNodeObject(root);
    if (!obj) return;
    this.connected.create(obj, null);
    this.ctx.log.debug(`uploaded template ${readString(obj.properties, Prop.path) ?? obj.toString()}`);
  }

  override sendPropertyChanges(obj: ReplicaObject, native: FieldOwner): boolean {
    let changed = super.sendPropertyChanges(obj, native);
    if (isNode(native)) {
      const name = this.ctx.engine.nodeName(native);
      if (readString(obj.properties, Prop.name) !== name) {
        this.connected.setProperty(obj, [Prop.name], new ValueProperty(name));
        changed = true;
      }
    }
    return changed;
  }

  override applyProperties(obj: ReplicaObject, native: FieldOwner): void {
    super.applyProperties(obj, native);
    if (!isNode(native)) return;
    const name = readString(obj.properties, Prop.name);
    if (name !== undefined && name !== this.ctx.engine.nodeName(native)) this.ctx.engine.setNodeName(native, name);
  }

  /** Stages a local engine change. Selection, asset and scene changes are routed elsewhere. */
  onNativeChange(change: NativeChange): void {
    if (!this.session) return;
    switch (change.kind) {
      case "created":
        this.addParentToUploadSet(change.node);
        return;
      case "destroyed": {
        const obj = this.ctx.registry.getReplica(change.node);
        if (obj?.isSyncing) this.syncDeletedObject(obj);
        return;
      }
      case "moved":
        this.onNodeMoved(change.node);
        return;
      case "fields":
        this.onFieldsChanged(change.owner);
        return;
      case "components":
        this.components.syncComponents(change.node);
        return;
      case "componentOrder":
        this.components.syncComponentOrder(change.node);
        return;
      case "selection":
      case "assetSaved":
      case "sceneCreated":
        return;
      default: {
        const _exhaustive: never = change;
        return _exhaustive;
      }
    }
  }

  private onFieldsChanged(owner: FieldOwner): void {
    if (isComponent(owner)) {
      this.components.onFieldsChanged(owner);
      return;
    }
    const obj = this.ctx.registry.getReplica(owner);
    if (!obj?.isSyncing) return;
    if (obj.isLocked) {
      this.applyPropertiesSet.add(obj);
      return;
    }
    if (this.sendPropertyChanges(obj, owner)) this.ctx.revisions.increment(obj);
  }

  private onNodeMoved(node: NativeNode): void {
    const { engine, registry, hierarchy } = this.ctx;
    const obj = registry.getReplica(node);
    if (!obj?.isSyncing) {
      this.addParentToUploadSet(node);
      return;
    }
    const parent = engine.parentOf(node);
    const parentObj = registry.getReplica(parent);
    if (parentObj?.isSyncing) {
      hierarchy.markLocalChanged(parentObj);
      return;
    }
    // An unsynced but syncable parent adopts the node when it is uploaded.
    if (isNode(parent) && this.isSyncable(parent)) {
      this.addParentToUploadSet(parent);
      return;
    }
    this.syncDeletedObject(obj);
  }

  private addParentToUploadSet(node: NativeNode): void {
    const parent = this.ctx.engine.parentOf(node);
    if (parent) this.parentsWithNewChildren.add(parent);
    else if (this.ctx.engine.templatePath(node) !== undefined) this.newTemplateRoots.add(node);
  }

  /** Index in `parentObj.children` just after the closest preceding replicated sibling of `native`. */
  private serverInsertIndex(parentObj: ReplicaObject, nativeParent: NativeParent, native: NativeNode): number {
    const { engine, registry } = this.ctx;
    const siblings = engine.children(nativeParent);
    for (let i = siblings.indexOf(native) - 1; i >= 0; i--) {
      const obj = registry.getReplica(siblings[i]);
      if (obj?.isSyncing && obj.parent === parentObj) return parentObj.children.indexOf(obj) + 1;
    }
    return parentObj.childrenOfType(ObjectType.component).length;
  }

  /** Native index just after the closest preceding server sibling of `obj` living under `nativeParent`. */
  private nativeInsertIndex(obj: ReplicaObject, nativeParent: NativeParent): number {
    const { engine, registry } = this.ctx;
    const siblings = obj.parent?.children ?? [];
    for (let i = siblings.indexOf(obj) - 1; i >= 0; i--) {
      const native = registry.getNative(siblings[i]);
      if (isNode(native) && !engine.isDestroyed(native) && engine.parentOf(native) === nativeParent) {
        return engine.children(nativeParent).indexOf(native) + 1;
      }
    }
    return 0;
  }

  private uploadNewChildren(): void {
    this.objectLimitReached = false;
    if (this.newTemplateRoots.size > 0) {
      const roots = Array.from(this.newTemplateRoots);
      this.newTemplateRoots.clear();
      for (const root of roots) if (!this.ctx.engine.isDestroyed(root)) this.uploadTemplate(root);
    }
    if (this.parentsWithNewChildren.size === 0) return;
    const parents = Array.from(this.parentsWithNewChildren);
    this.parentsWithNewChildren.clear();
    for (const parent of parents) this.uploadChildrenOf(parent);
  }

  /** Sends contiguous runs of unsynced native children of `parent`, one create per run. */
  private uploadChildrenOf(parent: NativeParent): void {
    const { engine, registry, revisions } = this.ctx;
    if (isNode(parent) && engine.isDestroyed(parent)) return;
    const parentObj = registry.getReplica(parent);
    if (!parentObj?.isSyncing) return;
    const children = engine.children(parent);

    if (parentObj.isFullyLocked) {
      for (const child of children) {
        if (!registry.getReplica(child)?.isSyncing && this.isSyncable(child)) this.safeDestroy(child);
      }
      return;
    }

    const session = this.connected;
    let insertAt = parentObj.childrenOfType(ObjectType.component).length;
    let batch: ReplicaObject[] = [];
    let pending = new Map<string, number>();
    const flush = () => {
      if (batch.length === 0) return;
      session.create(batch, parentObj, insertAt);
      insertAt += batch.length;
      batch = [];
      pending = new Map();
      revisions.increment(parentObj);
    };

    for (const child of children) {
      const childObj = registry.getReplica(child);
      if (childObj?.isSyncing) {
        flush();
        if (childObj.parent === parentObj) insertAt = parentObj.children.indexOf(childObj) + 1;
        continue;
      }
      if (this.objectLimitReached) continue;
      const obj = this.createNodeObject(child);
      if (!obj) continue;
      if (!this.admit(obj, pending)) {
        this.objectLimitReached = true;
        continue;
      }
      batch.push(obj);
    }
    flush();
  }

  private admit(obj: ReplicaObject, pending: Map<string, number>): boolean {
    const session = this.connected;
    const counts = countByType(obj);
    for (const [type, n] of counts) {
      const limit = session.getObjectLimit(type);
      if (session.getObjectCount(type) + (pending.get(type) ?? 0) + n > limit) {
        this.limitType = type;
        return false;
      }
    }
    for (const [type, n] of counts) pending.set(type, (pending.get(type) ?? 0) + n);
    return true;
  }

  private checkObjectLimit(): void {
    if (!this.objectLimitReached || this.objectLimitNotified) return;
    this.objectLimitNotified = true;
    const limit = this.connected.getObjectLimit(this.limitType);
    this.ctx.log.warn(`object limit of ${limit} ${this.limitType} object(s) reached, new objects stay local`);
    this.opts.onObjectLimit?.(this.limitType, limit);
  }

  private reapplyProperties(): void {
    if (this.applyPropertiesSet.size === 0) return;
    for (const obj of this.applyPropertiesSet) {
      const native = this.ctx.registry.getNative(obj);
      if (isNode(native) && !this.ctx.engine.isDestroyed(native)) this.applyProperties(obj, native);
    }
    this.applyPropertiesSet.clear();
  }

  private recreateObjects(): void {
    if (this.recreate.size === 0) return;
    const objects = Array.from(this.recreate);
    this.recreate.clear();
    const { hierarchy, log } = this.ctx;
    for (const obj of objects) {
      const parent = obj.parent;
      if (!obj.isSyncing || !parent) continue;
      const nativeParent = hierarchy.nativeParentOf(parent);
      if (!nativeParent) continue;
      this.unbindSubtree(obj);
      this.initializeNode(obj, nativeParent, this.nativeInsertIndex(obj, nativeParent));
      hierarchy.markServerChanged(parent);
      log.debug(`recreated locked ${obj.toString()}`);
    }
  }

  override onCreate(obj: ReplicaObject, childIndex: number): void {
    const parent = obj.parent;
    if (!parent) {
      this.createTemplateRoot(obj);
      return;
    }
    const nativeParent = this.ctx.hierarchy.nativeParentOf(parent);
    // Without a native parent the node is created along with it.
    if (!nativeParent) return;
    this.initializeNode(obj, nativeParent, this.nativeInsertIndex(obj, nativeParent));
    if (childIndex !== parent.children.length - 1) this.ctx.hierarchy.markServerChanged(parent);
  }

  private createTemplateRoot(obj: ReplicaObject): void {
    const { engine, registry, log } = this.ctx;
    const path = readString(obj.properties, Prop.path);
    if (path === undefined) {
      log.warn(`root ${obj.toString()} has no template path`);
      return;
    }
    const existing = engine.findTemplate(path);
    if (existing) {
      const current = registry.getReplica(existing);
      if (current && current !== obj && current.isSyncing) {
        this.deleteDuplicate(current, obj, existing);
        return;
      }
      // A local template the server already knows: keep local-only parts and upload them.
      this.initializeExisting(obj, existing, false);
      return;
    }

    const basePath = readString(obj.properties, Prop.template);
    if (basePath === undefined) {
      this.materializeTemplate(obj, path, undefined);
      return;
    }
    const base = engine.findTemplate(basePath);
    if (base) {
      this.materializeTemplate(obj, path, base);
      return;
    }
    const baseObj = this.findTemplateObject(basePath);
    if (baseObj && this.templateSorter.add(obj, baseObj)) {
      this.templateCreateMap.add(obj);
      return;
    }
    log.warn(`base template ${basePath} of ${path} is not available, creating a placeholder`);
    this.materializeTemplate(obj, path, undefined);
  }

  private findTemplateObject(path: string): ReplicaObject | undefined {
    return this.connected
      .rootObjects()
      .find((root) => root.type === ObjectType.node && readString(root.properties, Prop.path) === path);
  }

  /** Creates deferred template variants, bases first. */
  private createDependentTemplates(): void {
    if (this.templateCreateMap.size === 0) return;
    const { engine, log } = this.ctx;
    for (const obj of this.templateSorter.sort()) {
      if (!this.templateCreateMap.has(obj) || !obj.isSyncing) continue;
      const path = readString(obj.properties, Prop.path);
      if (path === undefined || engine.findTemplate(path)) continue;
      const basePath = readString(obj.properties, Prop.template);
      const base = basePath === undefined ? undefined : engine.findTemplate(basePath);
      if (!base) log.warn(`base template ${basePath ?? "?"} of ${path} is not available, creating a placeholder`);
      this.materializeTemplate(obj, path, base);
    }
    this.templateSorter.clear();
    this.templateCreateMap.clear();
  }

  private materializeTemplate(obj: ReplicaObject, path: string, base: NativeNode | undefined): void {
    const node = this.ctx.engine.createTemplate(path, base);
    this.initializeExisting(obj, node);
  }

  /**
   * Resolves identity conflicts where `native` is claimed by two replicas. The one the host
   * confirmed first survives and references to the other are retargeted to it.
   */
  private deleteDuplicate(current: ReplicaObject, incoming: ReplicaObject, native: NativeNode): void {
    const session = this.connected;
    this.ctx.log.warn(`${incoming.toString()} duplicates ${current.toString()}`);
    if (current.isCreated) {
      this.retargetReferences(incoming, current);
      session.delete(incoming);
      return;
    }
    this.retargetReferences(current, incoming);
    session.delete(current);
    this.unbindSubtree(current);
    this.initializeExisting(incoming, native);
  }

  private initializeNode(obj: ReplicaObject, nativeParent: NativeParent, index: number): NativeNode {
    const { engine, registry } = this.ctx;
    const bound = registry.getNative(obj);
    let node: NativeNode;
    if (isNode(bound) && !engine.isDestroyed(bound)) {
      node = bound;
      if (engine.parentOf(node) !== nativeParent) engine.moveNode(node, nativeParent, index);
    } else {
      node = this.createNativeNode(obj, nativeParent, index);
    }
    this.initializeExisting(obj, node);
    return node;
  }

  private createNativeNode(obj: ReplicaObject, nativeParent: NativeParent, index: number): NativeNode {
    const { engine, log } = this.ctx;
    const path = readString(obj.properties, Prop.template);
    if (path !== undefined && readBoolean(obj.properties, Prop.noTemplate) !== true) {
      const template = engine.findTemplate(path);
      if (template) return engine.instantiate(template, nativeParent, index);
      log.warn(`template ${path} of ${obj.toString()} not found, creating a placeholder`);
    }
    return engine.createNode(nativeParent, index);
  }

  /** Binds `obj` to an existing native and brings the native subtree to server state. */
  private initializeExisting(obj: ReplicaObject, node: NativeNode, destroyUnmatched = true): void {
    this.ctx.registry.bind(obj, node);
    this.applyProperties(obj, node);
    this.components.initializeComponents(obj, node);
    this.initializeChildren(obj, node, destroyUnmatched);
    if (obj.isFullyLocked) this.ctx.locks.onLock(obj);
  }

  /**
   * Binds the node children of `obj` to native children of `nativeParent`, matching template
   * instance parts by `#sourceFileId` and creating the rest. Unmatched unsynced natives are
   * destroyed, or queued for upload when `destroyUnmatched` is false.
   */
  initializeChildren(obj: ReplicaObject, nativeParent: NativeParent, destroyUnmatched = true): void {
    const { engine, registry, hierarchy } = this.ctx;
    const free = new Set(engine.children(nativeParent).filter((c) => !registry.getReplica(c)?.isSyncing));

    for (const childObj of obj.childrenOfType(ObjectType.node)) {
      const bound = registry.getNative(childObj);
      if (isNode(bound) && !engine.isDestroyed(bound)) {
        free.delete(bound);
        this.initializeExisting(childObj, bound, destroyUnmatched);
        continue;
      }
      const match = this.matchChild(childObj, free);
      if (match) {
        free.delete(match);
        this.initializeExisting(childObj, match, destroyUnmatched);
        continue;
      }
      this.initializeNode(childObj, nativeParent, this.nativeInsertIndex(childObj, nativeParent));
    }

    for (const leftover of free) {
      if (!this.isSyncable(leftover)) continue;
      if (destroyUnmatched) this.safeDestroy(leftover);
      else this.parentsWithNewChildren.add(nativeParent);
    }
    hierarchy.markServerChanged(obj);
  }

  private matchChild(obj: ReplicaObject, candidates: ReadonlySet<NativeNode>): NativeNode | undefined {
    const sourceFileId = readNumber(obj.properties, Prop.sourceFileId);
    if (sourceFileId === undefined) return undefined;
    const { engine } = this.ctx;
    for (const candidate of candidates) {
      const source = engine.nodeSource(candidate);
      if (source && engine.fileId(source) === sourceFileId) return candidate;
    }
    return undefined;
  }

  override onDelete(obj: ReplicaObject): void {
    const { engine, registry, locks, log } = this.ctx;
    // Children moved out of the deleted node must be in place before it goes.
    this.ctx.hierarchy.applyChanged();
    const native = registry.getNative(obj);
    if (!isNode(native) || engine.isDestroyed(native)) {
      this.unbindSubtree(obj);
      return;
    }
    try {
      engine.destroyNode(native);
    } catch (err) {
      log.error(`could not destroy ${obj.toString()}, uploading it again`, err);
      for (const o of [obj, ...obj.descendants()]) if (o.type === ObjectType.node) locks.onUnlock(o);
      this.retainSubtree(obj);
      this.addParentToUploadSet(native);
      return;
    }
    this.unbindSubtree(obj);
  }

  override onConfirmDelete(obj: ReplicaObject, unsubscribed: boolean): void {
    if (unsubscribed) {
      this.unbindSubtree(obj);
      return;
    }
    const native = this.ctx.registry.getNative(obj);
    this.retainSubtree(obj);
    if (isNode(native) && !this.ctx.engine.isDestroyed(native)) this.addParentToUploadSet(native);
  }

  /** Deletes `obj` on the server after a local destroy, or reverts the destroy when `obj` is locked. */
  private syncDeletedObject(obj: ReplicaObject): void {
    const { engine, registry, hierarchy, revisions } = this.ctx;
    if (obj.isFullyLocked || obj.isPartiallyLocked) {
      const native = registry.getNative(obj);
      if (isNode(native) && !engine.isDestroyed(native)) hierarchy.markServerChanged(obj.parent);
      else this.recreate.add(obj);
      return;
    }
    revisions.increment(obj.parent ?? obj);
    this.connected.delete(obj);
  }

  // Keeps the ids and bindings of a deleted subtree so that re-creating it reuses them.
  private retainSubtree(obj: ReplicaObject): void {
    this.ctx.revisions.forget(obj);
    const all = [obj, ...obj.descendants()];
    for (const o of all) o.clear();
  }

  private unbindSubtree(obj: ReplicaObject): void {
    const { registry, revisions } = this.ctx;
    revisions.forget(obj);
    registry.unbindReplica(obj);
    for (const o of obj.descendants()) registry.unbindReplica(o);
  }

  private safeDestroy(node: NativeNode): void {
    try {
      this.ctx.engine.destroyNode(node);
    } catch (err) {
      this.ctx.log.error(`could not destroy ${this.ctx.engine.nodeName(node)}`, err);
    }
  }

  override onLock(obj: ReplicaObject): void {
    this.ctx.locks.onLock(obj);
  }

  override onUnlock(obj: ReplicaObject): void {
    this.ctx.locks.onUnlock(obj);
    this.ctx.revisions.onUnlock(obj);
  }

  override onLockOwnerChange(obj: ReplicaObject): void {
    this.ctx.locks.onLockOwnerChange(obj);
  }

  override onParentChange(obj: ReplicaObject): void {
    const parent = obj.parent;
    const { engine, registry, hierarchy } = this.ctx;
    hierarchy.markServerChanged(parent);
    const native = registry.getNative(obj);
    if (!parent || (isNode(native) && !engine.isDestroyed(native))) return;
    const nativeParent = hierarchy.nativeParentOf(parent);
    if (nativeParent) this.initializeNode(obj, nativeParent, this.nativeInsertIndex(obj, nativeParent));
  }

  /**
   * Sends the native state of `node` to the server, or reverts it where someone else holds the
   * lock. Takes a temporary lock on the way unless `acquireTempLock` is false.
   */
  syncAll(node: NativeNode, opts: SyncAllOptions = {}): void {
    const { engine, registry, locks, hierarchy, revisions } = this.ctx;
    if (engine.isDestroyed(node)) return;
    const obj = registry.getReplica(node);
    if (!obj?.isSyncing) {
      this.addParentToUploadSet(node);
      return;
    }
    const acquired = (opts.acquireTempLock ?? true) && locks.requestLock(obj);
    try {
      let changed = this.syncProperties(obj, node);
      changed = this.components.syncComponents(node) || changed;
      changed = this.components.syncComponentOrder(node) || changed;
      for (const component of engine.components(node)) this.components.onFieldsChanged(component);
      hierarchy.markLocalChanged(obj);

      if (opts.fixLocks) {
        if (obj.isFullyLocked) locks.onLock(obj);
        else locks.onUnlock(obj);
      }

      this.syncDestroyedChildren(obj, node);
      if (opts.recursive) {
        const childOpts = { ...opts, acquireTempLock: (opts.acquireTempLock ?? true) && !acquired };
        for (const child of engine.children(node)) this.syncAll(child, childOpts);
      }
      if (opts.syncInstanceRevisions ?? true) revisions.snapshot(obj, node);
      if (changed) revisions.increment(obj);
    } finally {
      if (acquired) locks.releaseLock(obj);
    }
  }

  private syncDestroyedChildren(obj: ReplicaObject, node: NativeNode): void {
    const { engine, registry } = this.ctx;
    for (const childObj of obj.childrenOfType(ObjectType.node)) {
      const native = registry.getNative(childObj);
      if (!isNode(native) || engine.isDestroyed(native)) this.syncDeletedObject(childObj);
    }
    for (const child of engine.children(node)) {
      if (!registry.getReplica(child)?.isSyncing) {
        this.parentsWithNewChildren.add(node);
        return;
      }
    }
  }

  /** Reverts `node` to server state: fields, components and children. */
  applyServerState(node: NativeNode, recursive = true): void {
    const { engine, registry, hierarchy } = this.ctx;
    if (engine.isDestroyed(node)) return;
    const obj = registry.getReplica(node);
    if (!obj?.isSyncing) {
      if (this.isSyncable(node)) this.safeDestroy(node);
      return;
    }
    this.applyProperties(obj, node);
    this.components.applyServerState(node);
    for (const child of engine.children(node)) {
      const childObj = registry.getReplica(child);
      if (!childObj?.isSyncing) {
        if (this.isSyncable(child)) this.safeDestroy(child);
        continue;
      }
      if (recursive) this.applyServerState(child, true);
    }
    for (const childObj of obj.childrenOfType(ObjectType.node)) {
      const native = registry.getNative(childObj);
      if (!isNode(native) || engine.isDestroyed(native)) this.recreate.add(childObj);
    }
    hierarchy.markServerChanged(obj);
  }
}
