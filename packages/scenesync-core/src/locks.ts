import type { UserId } from "./ids.js";
import type { Logger } from "./logger.js";
import type { FieldOwner, NativeHandle, SceneEngine } from "./native.js";
import { isComponent, isNode } from "./native.js";
import type { ReplicaObject } from "./object.js";
import type { ObjectRegistry } from "./registry.js";
import type { ReplicaSession } from "./session.js";

/** Renders the "locked by someone else" marker next to a native object. */
export interface LockIndicator {
  show(handle: FieldOwner, owner: UserId): void;
  hide(handle: FieldOwner): void;
}

export type LockCoordinatorOptions = {
  engine: SceneEngine;
  registry: ObjectRegistry;
  indicator?: LockIndicator;
  log: Logger;
};

function asFieldOwner(handle: NativeHandle | undefined): FieldOwner | undefined {
  return isNode(handle) || isComponent(handle) ? handle : undefined;
}

/**
 * Drives the per-object lock protocol: unlocked → requested → held → unlocked for our own locks,
 * unlocked → locked(owner) → unlocked for everybody else's. Keeps the native editable flag and
 * the lock indicator in step with the replicated state.
 */
export class LockCoordinator {
  private session: ReplicaSession | null = null;
  private readonly staleIndicators = new Set<ReplicaObject>();
  private readonly tempUnlocked = new Set<FieldOwner>();

  constructor(private readonly opts: LockCoordinatorOptions) {}

  attach(session: ReplicaSession): void {
    this.session = session;
  }

  detach(): void {
    this.session = null;
    this.staleIndicators.clear();
    this.tempUnlocked.clear();
  }

  requestLock(obj: ReplicaObject): boolean {
    if (!this.session || !obj.isSyncing || obj.lock.kind !== "unlocked") return false;
    this.session.requestLock(obj);
    return true;
  }

  releaseLock(obj: ReplicaObject): boolean {
    if (!this.session || (obj.lock.kind !== "held" && obj.lock.kind !== "requested")) return false;
    this.session.releaseLock(obj);
    return true;
  }

  /**
   * Takes a lock for the duration of a multi-step local change. The returned function releases
   * it, and does nothing when the lock was already held or requested beforehand.
   */
  tempLock(obj: ReplicaObject): () => void {
    if (!this.requestLock(obj)) return () => {};
    return () => {
      this.releaseLock(obj);
    };
  }

  withTempLock<T>(obj: ReplicaObject, fn: () => T): T {
    const release = this.tempLock(obj);
    try {
      return fn();
    } finally {
      release();
    }
  }

  onLock(obj: ReplicaObject): void {
    const owner = obj.lockOwner;
    const handle = asFieldOwner(this.opts.registry.getNative(obj));
    if (owner === null || !handle) return;
    this.setEditable(handle, false);
    this.opts.indicator?.show(handle, owner);
  }

  onUnlock(obj: ReplicaObject): void {
    const handle = asFieldOwner(this.opts.registry.getNative(obj));
    if (!handle) return;
    this.tempUnlocked.delete(handle);
    this.setEditable(handle, true);
    this.opts.indicator?.hide(handle);
  }

  onLockOwnerChange(obj: ReplicaObject): void {
    this.staleIndicators.add(obj);
  }

  markIndicatorStale(obj: ReplicaObject): void {
    this.staleIndicators.add(obj);
  }

  /** Re-renders stale lock indicators. Runs once per tick. */
  update(): void {
    if (this.staleIndicators.size === 0) return;
    for (const obj of this.staleIndicators) {
      if (obj.isFullyLocked) this.onLock(obj);
      else this.onUnlock(obj);
    }
    this.staleIndicators.clear();
  }

  /** Makes a locked native editable until the next pre-phase. */
  tempUnlock(handle: FieldOwner): void {
    if (this.opts.engine.isEditable(handle)) return;
    this.opts.engine.setEditable(handle, true);
    this.tempUnlocked.add(handle);
  }

  relockTemporarilyUnlocked(): void {
    if (this.tempUnlocked.size === 0) return;
    for (const handle of this.tempUnlocked) {
      if (this.opts.engine.isDestroyed(handle)) continue;
      const obj = this.opts.registry.getReplica(handle);
      if (obj?.isFullyLocked) this.setEditable(handle, false);
    }
    this.opts.log.debug(`relocked ${this.tempUnlocked.size} temporarily unlocked object(s)`);
    this.tempUnlocked.clear();
  }

  private setEditable(handle: FieldOwner, editable: boolean): void {
    const { engine } = this.opts;
    if (engine.isDestroyed(handle)) return;
    engine.setEditable(handle, editable);
    if (isNode(handle)) {
      for (const component of engine.components(handle)) engine.setEditable(component, editable);
    }
  }
}
