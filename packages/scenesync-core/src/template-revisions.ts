import type { Logger } from "./logger.js";
import type { NativeNode, SceneEngine } from "./native.js";
import { isNode } from "./native.js";
import type { ReplicaObject } from "./object.js";
import { ObjectType, Prop } from "./object.js";
import { ValueProperty, numberList, readNumber, readNumberList } from "./properties.js";
import type { ObjectRegistry } from "./registry.js";
import type { ReplicaSession } from "./session.js";

export type TemplateRevisionsOptions = {
  engine: SceneEngine;
  registry: ObjectRegistry;
  log: Logger;
};

function sameRevisions(a: readonly number[] | null, b: readonly number[] | null): boolean {
  if (a === null || b === null) return a === b;
  return a.length === b.length && a.every((n, i) => n === b[i]);
}

/**
 * Template revision counters and per-instance revision snapshots.
 *
 * A template asset root carries `#revision`, bumped at most once per pass for any synced change
 * inside it. An instance root carries `#instanceRevisions`, one entry per nesting level (inner-most
 * first), recorded when it last pulled its template's state. An instance whose snapshot no longer
 * matches is re-sent from the native side, or parked until unlock when someone else holds it.
 */
export class TemplateRevisions {
  private session: ReplicaSession | null = null;
  private readonly revised = new Set<ReplicaObject>();
  private readonly bumped = new Set<ReplicaObject>();
  private readonly pendingInstances = new Set<NativeNode>();
  private readonly lockedWithUpdates = new Set<ReplicaObject>();

  constructor(private readonly opts: TemplateRevisionsOptions) {}

  attach(session: ReplicaSession): void {
    this.session = session;
  }

  detach(): void {
    this.session = null;
    this.revised.clear();
    this.bumped.clear();
    this.pendingInstances.clear();
    this.lockedWithUpdates.clear();
  }

  /** Bumps the revision of the template asset owning `obj`, once per pass. True if it was bumped. */
  increment(obj: ReplicaObject | null | undefined): boolean {
    if (!obj || !obj.isSyncing || !this.session) return false;
    const root = obj.root;
    if (root.type !== ObjectType.node || !root.properties.has(Prop.path)) return false;
    if (this.revised.has(root)) return false;
    this.revised.add(root);
    this.bumped.add(root);
    const next = (readNumber(root.properties, Prop.revision) ?? 0) + 1;
    this.session.setProperty(root, [Prop.revision], new ValueProperty(next));
    return true;
  }

  /** Suppresses the bump for `root` in this pass, e.g. a variant refreshed from its base. */
  markRevised(root: ReplicaObject): void {
    this.revised.add(root);
  }

  wasRevised(root: ReplicaObject): boolean {
    return this.revised.has(root);
  }

  /** Refreshes and queues local instances of every template bumped since the last call. */
  propagateLocalRevisions(): void {
    if (this.bumped.size === 0) return;
    const roots = Array.from(this.bumped);
    this.bumped.clear();
    for (const root of roots) this.onRevisionChange(root);
  }

  endPass(): void {
    this.revised.clear();
  }

  /**
   * Revision numbers of `template` and the templates it derives from, inner-most first. Stops at
   * the first template root that is not synced. `null` when there are none or all are zero.
   */
  revisionsFor(template: NativeNode | null): number[] | null {
    const { engine, registry } = this.opts;
    const revisions: number[] = [];
    let allZero = true;
    for (let node = template; node; node = engine.nodeSource(node)) {
      if (engine.parentOf(node) !== null) continue;
      const obj = registry.getReplica(node);
      if (!obj?.isSyncing) break;
      const revision = readNumber(obj.properties, Prop.revision) ?? 0;
      if (revision !== 0) allZero = false;
      revisions.push(revision);
    }
    return allZero ? null : revisions;
  }

  /** Revisions of the template `instance` was instantiated from. */
  sourceRevisions(instance: NativeNode): number[] | null {
    return this.revisionsFor(this.opts.engine.nodeSource(instance));
  }

  isStale(instance: NativeNode): boolean {
    const obj = this.opts.registry.getReplica(instance);
    if (!obj || this.opts.engine.nodeSource(instance) === null) return false;
    const snapshot = readNumberList(obj.properties, Prop.instanceRevisions) ?? null;
    return !sameRevisions(snapshot, this.sourceRevisions(instance));
  }

  /** Records the current source revisions on `obj`'s instance snapshot. */
  snapshot(obj: ReplicaObject, instance: NativeNode): void {
    const revisions = this.sourceRevisions(instance);
    if (!revisions || !this.session) return;
    const current = readNumberList(obj.properties, Prop.instanceRevisions) ?? null;
    if (sameRevisions(current, revisions)) return;
    this.session.setProperty(obj, [Prop.instanceRevisions], numberList(revisions));
  }

  queueInstanceUpdate(instance: NativeNode): void {
    this.pendingInstances.add(instance);
  }

  get pendingCount(): number {
    return this.pendingInstances.size;
  }

  /** Locked instances holding back a template update until they are unlocked. */
  get parkedCount(): number {
    return this.lockedWithUpdates.size;
  }

  /** Drops parked updates of `obj` and its descendants once they are deleted. */
  forget(obj: ReplicaObject): void {
    this.lockedWithUpdates.delete(obj);
    for (const o of obj.descendants()) this.lockedWithUpdates.delete(o);
  }

  /**
   * Re-sends stale instances through `syncAll`. Instances whose source template is not replicated
   * are always re-sent. Runs in the pre-phase.
   */
  processInstanceUpdates(syncAll: (instance: NativeNode) => void): void {
    if (this.pendingInstances.size === 0) return;
    const pending = Array.from(this.pendingInstances);
    this.pendingInstances.clear();
    for (const instance of pending) {
      if (this.opts.engine.isDestroyed(instance)) continue;
      this.updateInstanceTree(instance, syncAll);
    }
  }

  /** Re-queues an instance that was parked while locked. */
  onUnlock(obj: ReplicaObject): void {
    if (!this.lockedWithUpdates.delete(obj)) return;
    const native = this.opts.registry.getNative(obj);
    if (isNode(native)) this.pendingInstances.add(native);
  }

  /** A template root's revision changed on the server: refresh local instances and queue them. */
  onRevisionChange(templateRoot: ReplicaObject): void {
    const native = this.opts.registry.getNative(templateRoot);
    if (!isNode(native)) return;
    this.opts.engine.refreshInstances(native);
    this.queueInstancesOf(native, new Set());
  }

  private queueInstancesOf(template: NativeNode, seen: Set<NativeNode>): void {
    if (seen.has(template)) return;
    seen.add(template);
    for (const instance of this.opts.engine.instancesOf(template)) {
      this.pendingInstances.add(instance);
      // Variants are templates too.
      if (this.opts.engine.templatePath(instance) !== undefined) this.queueInstancesOf(instance, seen);
    }
  }

  private updateInstanceTree(node: NativeNode, syncAll: (instance: NativeNode) => void): void {
    if (this.updateInstance(node, syncAll)) return;
    for (const child of this.opts.engine.children(node)) this.updateInstanceTree(child, syncAll);
  }

  /** True when `node` and its subtree were re-sent. */
  private updateInstance(node: NativeNode, syncAll: (instance: NativeNode) => void): boolean {
    const { engine, registry, log } = this.opts;
    const obj = registry.getReplica(node);
    if (!obj?.isSyncing) return false;
    const source = engine.nodeSource(node);
    if (!source) return false;

    if (!registry.has(source)) {
      syncAll(node);
      return true;
    }
    const snapshot = readNumberList(obj.properties, Prop.instanceRevisions) ?? null;
    const revisions = this.revisionsFor(source);
    if (sameRevisions(snapshot, revisions)) return false;

    if (obj.isLocked) {
      log.debug(`deferring template update of locked ${obj.toString()}`);
      this.lockedWithUpdates.add(obj);
      return false;
    }
    // A variant updated from its base does not count as an edit of the variant.
    const root = obj.root;
    if (root.type === ObjectType.node) this.revised.add(root);
    syncAll(node);
    if (revisions && this.session && !obj.isLocked) {
      this.session.setProperty(obj, [Prop.instanceRevisions], numberList(revisions));
    }
    return true;
  }
}
