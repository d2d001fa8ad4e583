import type { Logger } from "./logger.js";
import type { NativeNode, NativeParent, SceneEngine } from "./native.js";
import { isNode, isScene } from "./native.js";
import type { ReplicaObject } from "./object.js";
import { ObjectType } from "./object.js";
import type { ObjectRegistry } from "./registry.js";
import type { ReplicaSession } from "./session.js";

/** Decides whether a mismatched native child is moved on the server rather than the ones around it. */
export type PreferMove = (obj: ReplicaObject, native: NativeNode) => boolean;

export type HierarchyReconcilerOptions = {
  engine: SceneEngine;
  registry: ObjectRegistry;
  log: Logger;
  /** Defaults to the engine's selection. */
  preferMove?: PreferMove;
  /** Called after `sync` changed the server order under `parent`. */
  onStructuralChange?: (parent: ReplicaObject) => void;
};

/**
 * Keeps the native child order of scenes and nodes consistent with the server order, in both
 * directions, using as few single-element moves as it can.
 *
 * Only node children take part. Component children are ordered by the component translator.
 */
export class HierarchyReconciler {
  private readonly serverChanged = new Set<ReplicaObject>();
  private readonly localChanged = new Set<ReplicaObject>();
  private readonly applying = new Set<ReplicaObject>();
  private readonly preferMove: PreferMove;

  constructor(private readonly opts: HierarchyReconcilerOptions) {
    this.preferMove = opts.preferMove ?? ((_obj, native) => opts.engine.isSelected(native));
  }

  markServerChanged(parent: ReplicaObject | null | undefined): void {
    if (parent) this.serverChanged.add(parent);
  }

  markLocalChanged(parent: ReplicaObject | null | undefined): void {
    if (parent) this.localChanged.add(parent);
  }

  isServerChanged(parent: ReplicaObject): boolean {
    return this.serverChanged.has(parent);
  }

  clear(): void {
    this.serverChanged.clear();
    this.localChanged.clear();
  }

  /** Pre-phase: sends the local order of every parent marked with `markLocalChanged`. */
  syncChanged(session: ReplicaSession): void {
    for (const parent of this.localChanged) this.sync(parent, session);
    this.localChanged.clear();
  }

  /** Post-phase: applies the server order to every parent marked with `markServerChanged`. */
  applyChanged(): number {
    let moves = 0;
    for (const parent of this.serverChanged) moves += this.apply(parent);
    this.serverChanged.clear();
    return moves;
  }

  /**
   * Moves native children of `parent` into the server order and returns the number of moves.
   *
   * Walks both lists in parallel. When the next server child is not where the native list has
   * it, either it is moved left (`serverDelta` places) or the native child in its way is skipped
   * and moved once the server list reaches it (`localDelta` places), whichever gets closer to
   * the server order.
   */
  apply(parent: ReplicaObject): number {
    if (this.applying.has(parent)) return 0;
    const nativeParent = this.nativeParentOf(parent);
    if (!nativeParent) return 0;
    const { engine, registry } = this.opts;

    this.applying.add(parent);
    try {
      const localChildren = engine.children(nativeParent);
      const serverChildren = parent.childrenOfType(ObjectType.node);
      let childIndexes: Map<ReplicaObject, number> | null = null;
      let skipped: Set<NativeNode> | null = null;
      let moves = 0;
      let serverIndex = -1;
      let localIndex = 0;
      let childIndex = 0;

      for (const serverObj of serverChildren) {
        serverIndex++;
        const serverNative = registry.getNative(serverObj);
        if (!isNode(serverNative) || engine.isDestroyed(serverNative)) continue;

        if (engine.parentOf(serverNative) !== nativeParent) {
          engine.moveNode(serverNative, nativeParent, childIndex);
          moves++;
          childIndex++;
          continue;
        }

        if (skipped?.delete(serverNative)) {
          // Its current index is lower than childIndex, so removing it shifts the target left by one.
          engine.moveNode(serverNative, nativeParent, childIndex - 1);
          moves++;
          continue;
        }

        let serverDelta = -1;
        while (localIndex < localChildren.length) {
          const localNative = localChildren[localIndex];
          if (!localNative) break;
          if (localNative === serverNative) {
            localIndex++;
            childIndex++;
            break;
          }

          const localObj = registry.getReplica(localNative);
          if (!localObj || localObj.parent !== parent) {
            // Unsynced, or reparented on the server: it leaves when its new parent is applied.
            if (localObj?.parent && !this.serverChanged.has(localObj.parent)) {
              moves += this.apply(localObj.parent);
            }
            localIndex++;
            childIndex++;
            continue;
          }

          if (!childIndexes) {
            childIndexes = new Map(serverChildren.map((child, i) => [child, i]));
          }
          const localDelta = (childIndexes.get(localObj) ?? serverIndex) - serverIndex;
          if (serverDelta < 0) {
            for (let i = localIndex + 1; i < localChildren.length; i++) {
              if (localChildren[i] === serverNative) {
                serverDelta = i - localIndex;
                break;
              }
            }
          } else {
            serverDelta--;
          }

          if (serverDelta > localDelta) {
            engine.moveNode(serverNative, nativeParent, childIndex);
            moves++;
            childIndex++;
            localChildren.splice(localIndex + serverDelta, 1);
            break;
          }
          if (!skipped) skipped = new Set();
          skipped.add(localNative);
          localIndex++;
          childIndex++;
        }
      }

      for (; localIndex < localChildren.length; localIndex++) {
        const localObj = registry.getReplica(localChildren[localIndex]);
        const oldParent = localObj?.isSyncing ? localObj.parent : null;
        if (oldParent && oldParent !== parent && !this.serverChanged.has(oldParent)) {
          moves += this.apply(oldParent);
        }
      }

      if (moves > 0) this.opts.log.debug(`applied server order under ${parent.toString()} with ${moves} move(s)`);
      return moves;
    } finally {
      this.applying.delete(parent);
    }
  }

  /**
   * Sends the native child order of `parent` to the server. Locked children are not sent; their
   * server parent is queued for `apply` instead, which reverts the native move.
   */
  sync(parent: ReplicaObject, session: ReplicaSession): boolean {
    if (!parent.isSyncing) return false;
    if (parent.isFullyLocked) {
      this.serverChanged.add(parent);
      return false;
    }
    const nativeParent = this.nativeParentOf(parent);
    if (!nativeParent) return false;
    const { engine, registry } = this.opts;

    let changed = false;
    // Cursor into the live child list; optimistic session calls reorder it under us.
    let serverIndex = 0;
    for (const localNative of engine.children(nativeParent)) {
      const localObj = registry.getReplica(localNative);
      if (!localObj || !localObj.isSyncing) continue;

      let moved = true;
      while (serverIndex < parent.children.length) {
        const serverObj = parent.children[serverIndex];
        if (serverObj === localObj) {
          moved = false;
          serverIndex++;
          break;
        }
        const serverNative = registry.getNative(serverObj);
        if (!isNode(serverNative) || engine.parentOf(serverNative) !== nativeParent) {
          // Components, and children whose move is sent by their new parent.
          serverIndex++;
          continue;
        }
        // Either localObj moved here or the children in front of it moved away. Moving
        // localObj is the one choice when its server parent differs.
        if (localObj.parent !== parent || this.preferMove(localObj, localNative)) break;
        serverIndex++;
      }
      if (!moved) continue;

      if (localObj.isLocked) {
        this.markServerChanged(localObj.parent);
        continue;
      }
      if (localObj.parent !== parent) {
        session.setParent(localObj, parent, serverIndex);
        serverIndex++;
      } else {
        const oldIndex = parent.children.indexOf(localObj);
        if (oldIndex < serverIndex) serverIndex--;
        session.setChildIndex(localObj, serverIndex);
        serverIndex++;
      }
      changed = true;
    }

    if (changed) this.opts.onStructuralChange?.(parent);
    return changed;
  }

  /** The native scene or node whose children mirror `parent`'s node children. */
  nativeParentOf(parent: ReplicaObject): NativeParent | undefined {
    const native = this.opts.registry.getNative(parent);
    if (isScene(native)) return native;
    if (isNode(native) && !this.opts.engine.isDestroyed(native)) return native;
    return undefined;
  }
}
