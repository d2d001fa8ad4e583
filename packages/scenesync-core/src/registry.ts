import type { NativeHandle, Unsubscribe } from "./native.js";
import type { ReplicaObject } from "./object.js";

/**
 * Two-way map between native handles and ReplicaObjects. The only place that answers "is this
 * native object replicated, and by which ReplicaObject".
 */
export class ObjectRegistry implements Iterable<[ReplicaObject, NativeHandle]> {
  private readonly byNative = new Map<NativeHandle, ReplicaObject>();
  private readonly byReplica = new Map<ReplicaObject, NativeHandle>();
  private readonly bindListeners = new Set<(replica: ReplicaObject, native: NativeHandle) => void>();

  get size(): number {
    return this.byReplica.size;
  }

  /**
   * Binds `replica` and `native` to each other. A handle the replica was bound to before keeps
   * its entry until it is unbound, which is the replace window between retiring an old handle and
   * adopting its successor.
   */
  bind(replica: ReplicaObject, native: NativeHandle): void {
    const oldReplica = this.byNative.get(native);
    if (oldReplica !== undefined && oldReplica !== replica && this.byReplica.get(oldReplica) === native) {
      this.byReplica.delete(oldReplica);
    }
    this.byNative.set(native, replica);
    this.byReplica.set(replica, native);
    for (const listener of Array.from(this.bindListeners)) listener(replica, native);
  }

  getReplica(native: NativeHandle | null | undefined): ReplicaObject | undefined {
    return native ? this.byNative.get(native) : undefined;
  }

  getNative(replica: ReplicaObject | null | undefined): NativeHandle | undefined {
    return replica ? this.byReplica.get(replica) : undefined;
  }

  has(native: NativeHandle): boolean {
    return this.byNative.has(native);
  }

  /**
   * Returns the replica bound to `native`, creating and binding one with `create` if there is
   * none. If the replica has meanwhile been pointed at another handle, it is pointed back at
   * `native` instead of minting a duplicate.
   */
  getOrCreate(native: NativeHandle, create: () => ReplicaObject): ReplicaObject {
    const existing = this.byNative.get(native);
    if (!existing) {
      const obj = create();
      this.bind(obj, native);
      return obj;
    }
    if (this.byReplica.get(existing) !== native) this.bind(existing, native);
    return existing;
  }

  /**
   * Drops the native-side entry. The replica-side entry survives when the replica has since been
   * rebound to a different handle.
   */
  unbindNative(native: NativeHandle): ReplicaObject | undefined {
    const replica = this.byNative.get(native);
    if (!replica) return undefined;
    this.byNative.delete(native);
    if (this.byReplica.get(replica) === native) this.byReplica.delete(replica);
    return replica;
  }

  unbindReplica(replica: ReplicaObject): NativeHandle | undefined {
    const native = this.byReplica.get(replica);
    this.byReplica.delete(replica);
    if (native !== undefined && this.byNative.get(native) === replica) this.byNative.delete(native);
    return native;
  }

  onBind(listener: (replica: ReplicaObject, native: NativeHandle) => void): Unsubscribe {
    this.bindListeners.add(listener);
    return () => this.bindListeners.delete(listener);
  }

  clear(): void {
    this.byNative.clear();
    this.byReplica.clear();
  }

  [Symbol.iterator](): Iterator<[ReplicaObject, NativeHandle]> {
    return this.byReplica.entries();
  }
}
