import type { PathSegment, PlainProperty, ReplicaId, UserId } from "@scenesync/core";

/** A replicated object with its subtree, as sent over the wire. */
export type WireObject = {
  id: ReplicaId;
  type: string;
  properties: [string, PlainProperty][];
  /** Holder of the lock, `null` when unlocked. */
  lockOwner: UserId | null;
  children: WireObject[];
};

/** Final child order of a parent after a structural change. `parentId` is `null` for the root list. */
export type ChildOrder = {
  parentId: ReplicaId | null;
  order: ReplicaId[];
};

export type Hello = { name: string };

export type CreateRequest = {
  parentId: ReplicaId | null;
  index: number | null;
  objects: WireObject[];
};

export type IdRequest = { id: ReplicaId };

export type SetParentRequest = { id: ReplicaId; parentId: ReplicaId; index: number };
export type SetChildIndexRequest = { id: ReplicaId; index: number };
export type SetPropertyRequest = { id: ReplicaId; path: PathSegment[]; value: PlainProperty };
export type RemoveFieldRequest = { id: ReplicaId; path: PathSegment[]; name: string };
export type ListAddRequest = { id: ReplicaId; path: PathSegment[]; index: number; items: PlainProperty[] };
export type ListRemoveRequest = { id: ReplicaId; path: PathSegment[]; index: number; count: number };

export type ClientPayload =
  | { case: "hello"; value: Hello }
  | { case: "create"; value: CreateRequest }
  | { case: "delete"; value: IdRequest }
  | { case: "requestLock"; value: IdRequest }
  | { case: "releaseLock"; value: IdRequest }
  | { case: "setParent"; value: SetParentRequest }
  | { case: "setChildIndex"; value: SetChildIndexRequest }
  | { case: "setProperty"; value: SetPropertyRequest }
  | { case: "removeField"; value: RemoveFieldRequest }
  | { case: "listAdd"; value: ListAddRequest }
  | { case: "listRemove"; value: ListRemoveRequest };

export type ClientCase = ClientPayload["case"];

export type Welcome = {
  userId: UserId;
  limits: [string, number][];
  objects: WireObject[];
};

export type Created = {
  parentId: ReplicaId | null;
  index: number;
  objects: WireObject[];
  parentOrder: ReplicaId[];
  /** The creating user; 0 when the host restores objects whose deletion it rejected. */
  by: UserId | 0;
};

export type ConfirmCreate = {
  ids: ReplicaId[];
  parentId: ReplicaId | null;
  parentOrder: ReplicaId[];
};

export type Deleted = { id: ReplicaId; orders: ChildOrder[] };
export type ConfirmDelete = { id: ReplicaId; unsubscribed: boolean; orders: ChildOrder[] };
export type Locked = { id: ReplicaId; owner: UserId };
export type Unlocked = { id: ReplicaId };

export type ParentChanged = {
  id: ReplicaId;
  /** `null` when the object is a root. */
  parentId: ReplicaId | null;
  index: number;
  /** The user whose request caused the change; 0 for corrections sent by the host. */
  by: UserId | 0;
  orders: ChildOrder[];
};

export type PropertySet = { id: ReplicaId; path: PathSegment[]; value: PlainProperty; by: UserId | 0 };
export type FieldRemoved = { id: ReplicaId; path: PathSegment[]; name: string; by: UserId | 0 };
export type ListAdded = { id: ReplicaId; path: PathSegment[]; index: number; items: PlainProperty[]; by: UserId | 0 };
export type ListRemoved = { id: ReplicaId; path: PathSegment[]; index: number; count: number; by: UserId | 0 };

export type Rejected = {
  request: ClientCase;
  /** Objects the rejected request was about. */
  ids: ReplicaId[];
  reason: string;
};

export type ServerPayload =
  | { case: "welcome"; value: Welcome }
  | { case: "created"; value: Created }
  | { case: "confirmCreate"; value: ConfirmCreate }
  | { case: "deleted"; value: Deleted }
  | { case: "confirmDelete"; value: ConfirmDelete }
  | { case: "locked"; value: Locked }
  | { case: "unlocked"; value: Unlocked }
  | { case: "parentChanged"; value: ParentChanged }
  | { case: "propertySet"; value: PropertySet }
  | { case: "fieldRemoved"; value: FieldRemoved }
  | { case: "listAdded"; value: ListAdded }
  | { case: "listRemoved"; value: ListRemoved }
  | { case: "rejected"; value: Rejected };

export type ServerCase = ServerPayload["case"];

export type ClientMessage = { v: 0; payload: ClientPayload };
export type ServerMessage = { v: 0; payload: ServerPayload };
export type SessionMessage = ClientMessage | ServerMessage;

export const CLIENT_CASES = [
  "hello",
  "create",
  "delete",
  "requestLock",
  "releaseLock",
  "setParent",
  "setChildIndex",
  "setProperty",
  "removeField",
  "listAdd",
  "listRemove",
] as const satisfies readonly ClientCase[];

export const SERVER_CASES = [
  "welcome",
  "created",
  "confirmCreate",
  "deleted",
  "confirmDelete",
  "locked",
  "unlocked",
  "parentChanged",
  "propertySet",
  "fieldRemoved",
  "listAdded",
  "listRemoved",
  "rejected",
] as const satisfies readonly ServerCase[];

export function isClientMessage(msg: SessionMessage): msg is ClientMessage {
  return CLIENT_CASES.some((c) => c === msg.payload.case);
}

export function isServerMessage(msg: SessionMessage): msg is ServerMessage {
  return SERVER_CASES.some((c) => c === msg.payload.case);
}

export function clientMessage(payload: ClientPayload): ClientMessage {
  return { v: 0, payload };
}

export function serverMessage(payload: ServerPayload): ServerMessage {
  return { v: 0, payload };
}
