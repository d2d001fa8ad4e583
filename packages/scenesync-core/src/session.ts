import type { ReplicaId, UserId } from "./ids.js";
import type { Unsubscribe } from "./native.js";
import type { ReplicaObject } from "./object.js";
import type {
  DictionaryProperty,
  ListProperty,
  Property,
  PropertyPath,
  ReferenceProperty,
} from "./properties.js";

/** Inbound replication events, already applied to the session's object mirror when raised. */
export type SessionEvents = {
  /** A subtree arrived; `obj`'s descendants are attached already. `childIndex` is -1 for roots. */
  create: (obj: ReplicaObject, childIndex: number) => void;
  confirmCreate: (obj: ReplicaObject) => void;
  delete: (obj: ReplicaObject) => void;
  confirmDelete: (obj: ReplicaObject, unsubscribed: boolean) => void;
  lock: (obj: ReplicaObject) => void;
  unlock: (obj: ReplicaObject) => void;
  lockOwnerChange: (obj: ReplicaObject) => void;
  parentChange: (obj: ReplicaObject, childIndex: number) => void;
  propertyChange: (property: Property) => void;
  removeField: (dictionary: DictionaryProperty, name: string) => void;
  listAdd: (list: ListProperty, index: number, count: number) => void;
  listRemove: (list: ListProperty, index: number, count: number) => void;
};

export type SessionEventName = keyof SessionEvents;

export const SESSION_EVENT_NAMES = [
  "create",
  "confirmCreate",
  "delete",
  "confirmDelete",
  "lock",
  "unlock",
  "lockOwnerChange",
  "parentChange",
  "propertyChange",
  "removeField",
  "listAdd",
  "listRemove",
] as const satisfies readonly SessionEventName[];

/**
 * Connection to the authoritative replica host.
 *
 * Outbound structural and property operations apply to the local mirror right away and are then
 * confirmed or corrected by the host.
 */
export interface ReplicaSession {
  readonly userId: UserId;

  on<E extends SessionEventName>(event: E, handler: SessionEvents[E]): Unsubscribe;

  allocateId(): ReplicaId;
  getObject(id: ReplicaId): ReplicaObject | undefined;
  rootObjects(): readonly ReplicaObject[];
  /** Reference properties, anywhere in the session, that point at `obj`. */
  getReferences(obj: ReplicaObject): ReferenceProperty[];

  create(objects: ReplicaObject | readonly ReplicaObject[], parent: ReplicaObject | null, index?: number): void;
  delete(obj: ReplicaObject): void;

  requestLock(obj: ReplicaObject): void;
  releaseLock(obj: ReplicaObject): void;

  setParent(obj: ReplicaObject, parent: ReplicaObject, index: number): void;
  setChildIndex(obj: ReplicaObject, index: number): void;

  setProperty(obj: ReplicaObject, path: PropertyPath, value: Property): void;
  removeField(obj: ReplicaObject, path: PropertyPath, name: string): void;
  listAdd(obj: ReplicaObject, path: PropertyPath, index: number, items: readonly Property[]): void;
  listRemove(obj: ReplicaObject, path: PropertyPath, index: number, count: number): void;

  getObjectLimit(type: string): number;
  getObjectCount(type: string): number;
}

/** Typed handler registry shared by session implementations. */
export class SessionEventEmitter {
  private readonly handlers: { [E in SessionEventName]: Set<SessionEvents[E]> } = {
    create: new Set(),
    confirmCreate: new Set(),
    delete: new Set(),
    confirmDelete: new Set(),
    lock: new Set(),
    unlock: new Set(),
    lockOwnerChange: new Set(),
    parentChange: new Set(),
    propertyChange: new Set(),
    removeField: new Set(),
    listAdd: new Set(),
    listRemove: new Set(),
  };

  on<E extends SessionEventName>(event: E, handler: SessionEvents[E]): Unsubscribe {
    const set: Set<SessionEvents[E]> = this.handlers[event];
    set.add(handler);
    return () => {
      set.delete(handler);
    };
  }

  /** Runs `invoke` for every handler of `event`, in subscription order. */
  emit<E extends SessionEventName>(event: E, invoke: (handler: SessionEvents[E]) => void): void {
    const set: Set<SessionEvents[E]> = this.handlers[event];
    for (const handler of Array.from(set)) invoke(handler);
  }
}
