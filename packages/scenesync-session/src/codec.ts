import { decode as cborDecode, encode as cborEncode, rfc8949EncodeOptions } from "cborg";

import type { PathSegment, PlainProperty, ReplicaId, Scalar, UserId } from "@scenesync/core";
import { decodeReplicaId, isUserId } from "@scenesync/core";

import type { ChildOrder, ClientCase, ClientPayload, ServerPayload, SessionMessage, WireObject } from "./messages.js";
import { CLIENT_CASES } from "./messages.js";
import type { WireCodec } from "./transport.js";

function assertMap(val: unknown, ctx: string): Map<unknown, unknown> {
  if (!(val instanceof Map)) throw new Error(`${ctx} must be a CBOR map`);
  return val;
}

function get(map: Map<unknown, unknown>, key: string): unknown {
  return map.has(key) ? map.get(key) : undefined;
}

function assertString(val: unknown, field: string): string {
  if (typeof val !== "string") throw new Error(`${field} must be a string`);
  return val;
}

function assertBoolean(val: unknown, field: string): boolean {
  if (typeof val !== "boolean") throw new Error(`${field} must be a boolean`);
  return val;
}

function assertIndex(val: unknown, field: string): number {
  if (typeof val !== "number" || !Number.isSafeInteger(val) || val < 0) {
    throw new Error(`${field} must be a non-negative integer`);
  }
  return val;
}

function assertArray(val: unknown, field: string): unknown[] {
  if (!Array.isArray(val)) throw new Error(`${field} must be an array`);
  return val;
}

function assertUserId(val: unknown, field: string): UserId {
  if (!isUserId(val)) throw new Error(`${field} must be a user id`);
  return val;
}

function assertActor(val: unknown, field: string): UserId | 0 {
  return val === 0 ? 0 : assertUserId(val, field);
}

function assertId(val: unknown, field: string): ReplicaId {
  try {
    return decodeReplicaId(val);
  } catch {
    throw new Error(`${field} must be a replica id`);
  }
}

function assertIdOrNull(val: unknown, field: string): ReplicaId | null {
  return val === null ? null : assertId(val, field);
}

function assertScalar(val: unknown, field: string): Scalar {
  if (val === null || typeof val === "string" || typeof val === "boolean") return val;
  if (typeof val === "number") return val;
  throw new Error(`${field} must be a scalar`);
}

function assertPath(val: unknown, field: string): PathSegment[] {
  return assertArray(val, field).map((seg, i) => {
    if (typeof seg === "string") return seg;
    return assertIndex(seg, `${field}[${i}]`);
  });
}

function assertPlainProperty(val: unknown, field: string): PlainProperty {
  const map = assertMap(val, field);
  if (map.size !== 1) throw new Error(`${field} must have exactly one variant`);
  if (map.has("v")) return { v: assertScalar(get(map, "v"), `${field}.v`) };
  if (map.has("r")) return { r: assertIdOrNull(get(map, "r"), `${field}.r`) };
  if (map.has("l")) {
    const items = assertArray(get(map, "l"), `${field}.l`);
    return { l: items.map((item, i) => assertPlainProperty(item, `${field}.l[${i}]`)) };
  }
  if (map.has("d")) return { d: assertEntries(get(map, "d"), `${field}.d`) };
  throw new Error(`${field} has an unknown property variant`);
}

function assertEntries(val: unknown, field: string): [string, PlainProperty][] {
  return assertArray(val, field).map((entry, i) => {
    const pair = assertArray(entry, `${field}[${i}]`);
    if (pair.length !== 2) throw new Error(`${field}[${i}] must be a [name, property] pair`);
    return [assertString(pair[0], `${field}[${i}][0]`), assertPlainProperty(pair[1], `${field}[${i}][1]`)];
  });
}

function assertWireObject(val: unknown, field: string): WireObject {
  const map = assertMap(val, field);
  const lockOwner = get(map, "lockOwner");
  return {
    id: assertId(get(map, "id"), `${field}.id`),
    type: assertString(get(map, "type"), `${field}.type`),
    properties: assertEntries(get(map, "properties"), `${field}.properties`),
    lockOwner: lockOwner === null ? null : assertUserId(lockOwner, `${field}.lockOwner`),
    children: assertArray(get(map, "children"), `${field}.children`).map((c, i) =>
      assertWireObject(c, `${field}.children[${i}]`)
    ),
  };
}

function assertIds(val: unknown, field: string): ReplicaId[] {
  return assertArray(val, field).map((id, i) => assertId(id, `${field}[${i}]`));
}

function assertOrders(val: unknown, field: string): ChildOrder[] {
  return assertArray(val, field).map((item, i) => {
    const map = assertMap(item, `${field}[${i}]`);
    return {
      parentId: assertIdOrNull(get(map, "parentId"), `${field}[${i}].parentId`),
      order: assertIds(get(map, "order"), `${field}[${i}].order`),
    };
  });
}

function assertClientCase(val: unknown, field: string): ClientCase {
  const found = CLIENT_CASES.find((c) => c === val);
  if (found === undefined) throw new Error(`${field} must name a request`);
  return found;
}

function decodeClientPayload(kind: string, v: Map<unknown, unknown>): ClientPayload | undefined {
  switch (kind) {
    case "hello":
      return { case: "hello", value: { name: assertString(get(v, "name"), "hello.name") } };
    case "create": {
      const index = get(v, "index");
      return {
        case: "create",
        value: {
          parentId: assertIdOrNull(get(v, "parentId"), "create.parentId"),
          index: index === null ? null : assertIndex(index, "create.index"),
          objects: assertArray(get(v, "objects"), "create.objects").map((o, i) =>
            assertWireObject(o, `create.objects[${i}]`)
          ),
        },
      };
    }
    case "delete":
    case "requestLock":
    case "releaseLock":
      return { case: kind, value: { id: assertId(get(v, "id"), `${kind}.id`) } };
    case "setParent":
      return {
        case: "setParent",
        value: {
          id: assertId(get(v, "id"), "setParent.id"),
          parentId: assertId(get(v, "parentId"), "setParent.parentId"),
          index: assertIndex(get(v, "index"), "setParent.index"),
        },
      };
    case "setChildIndex":
      return {
        case: "setChildIndex",
        value: {
          id: assertId(get(v, "id"), "setChildIndex.id"),
          index: assertIndex(get(v, "index"), "setChildIndex.index"),
        },
      };
    case "setProperty":
      return {
        case: "setProperty",
        value: {
          id: assertId(get(v, "id"), "setProperty.id"),
          path: assertPath(get(v, "path"), "setProperty.path"),
          value: assertPlainProperty(get(v, "value"), "setProperty.value"),
        },
      };
    case "removeField":
      return {
        case: "removeField",
        value: {
          id: assertId(get(v, "id"), "removeField.id"),
          path: assertPath(get(v, "path"), "removeField.path"),
          name: assertString(get(v, "name"), "removeField.name"),
        },
      };
    case "listAdd":
      return {
        case: "listAdd",
        value: {
          id: assertId(get(v, "id"), "listAdd.id"),
          path: assertPath(get(v, "path"), "listAdd.path"),
          index: assertIndex(get(v, "index"), "listAdd.index"),
          items: assertArray(get(v, "items"), "listAdd.items").map((p, i) =>
            assertPlainProperty(p, `listAdd.items[${i}]`)
          ),
        },
      };
    case "listRemove":
      return {
        case: "listRemove",
        value: {
          id: assertId(get(v, "id"), "listRemove.id"),
          path: assertPath(get(v, "path"), "listRemove.path"),
          index: assertIndex(get(v, "index"), "listRemove.index"),
          count: assertIndex(get(v, "count"), "listRemove.count"),
        },
      };
    default:
      return undefined;
  }
}

function decodeServerPayload(kind: string, v: Map<unknown, unknown>): ServerPayload | undefined {
  switch (kind) {
    case "welcome":
      return {
        case: "welcome",
        value: {
          userId: assertUserId(get(v, "userId"), "welcome.userId"),
          limits: assertArray(get(v, "limits"), "welcome.limits").map((entry, i) => {
            const pair = assertArray(entry, `welcome.limits[${i}]`);
            return [assertString(pair[0], `welcome.limits[${i}][0]`), assertIndex(pair[1], `welcome.limits[${i}][1]`)];
          }),
          objects: assertArray(get(v, "objects"), "welcome.objects").map((o, i) =>
            assertWireObject(o, `welcome.objects[${i}]`)
          ),
        },
      };
    case "created":
      return {
        case: "created",
        value: {
          parentId: assertIdOrNull(get(v, "parentId"), "created.parentId"),
          index: assertIndex(get(v, "index"), "created.index"),
          objects: assertArray(get(v, "objects"), "created.objects").map((o, i) =>
            assertWireObject(o, `created.objects[${i}]`)
          ),
          parentOrder: assertIds(get(v, "parentOrder"), "created.parentOrder"),
          by: assertActor(get(v, "by"), "created.by"),
        },
      };
    case "confirmCreate":
      return {
        case: "confirmCreate",
        value: {
          ids: assertIds(get(v, "ids"), "confirmCreate.ids"),
          parentId: assertIdOrNull(get(v, "parentId"), "confirmCreate.parentId"),
          parentOrder: assertIds(get(v, "parentOrder"), "confirmCreate.parentOrder"),
        },
      };
    case "deleted":
      return {
        case: "deleted",
        value: { id: assertId(get(v, "id"), "deleted.id"), orders: assertOrders(get(v, "orders"), "deleted.orders") },
      };
    case "confirmDelete":
      return {
        case: "confirmDelete",
        value: {
          id: assertId(get(v, "id"), "confirmDelete.id"),
          unsubscribed: assertBoolean(get(v, "unsubscribed"), "confirmDelete.unsubscribed"),
          orders: assertOrders(get(v, "orders"), "confirmDelete.orders"),
        },
      };
    case "locked":
      return {
        case: "locked",
        value: { id: assertId(get(v, "id"), "locked.id"), owner: assertUserId(get(v, "owner"), "locked.owner") },
      };
    case "unlocked":
      return { case: "unlocked", value: { id: assertId(get(v, "id"), "unlocked.id") } };
    case "parentChanged":
      return {
        case: "parentChanged",
        value: {
          id: assertId(get(v, "id"), "parentChanged.id"),
          parentId: assertIdOrNull(get(v, "parentId"), "parentChanged.parentId"),
          index: assertIndex(get(v, "index"), "parentChanged.index"),
          by: assertActor(get(v, "by"), "parentChanged.by"),
          orders: assertOrders(get(v, "orders"), "parentChanged.orders"),
        },
      };
    case "propertySet":
      return {
        case: "propertySet",
        value: {
          id: assertId(get(v, "id"), "propertySet.id"),
          path: assertPath(get(v, "path"), "propertySet.path"),
          value: assertPlainProperty(get(v, "value"), "propertySet.value"),
          by: assertActor(get(v, "by"), "propertySet.by"),
        },
      };
    case "fieldRemoved":
      return {
        case: "fieldRemoved",
        value: {
          id: assertId(get(v, "id"), "fieldRemoved.id"),
          path: assertPath(get(v, "path"), "fieldRemoved.path"),
          name: assertString(get(v, "name"), "fieldRemoved.name"),
          by: assertActor(get(v, "by"), "fieldRemoved.by"),
        },
      };
    case "listAdded":
      return {
        case: "listAdded",
        value: {
          id: assertId(get(v, "id"), "listAdded.id"),
          path: assertPath(get(v, "path"), "listAdded.path"),
          index: assertIndex(get(v, "index"), "listAdded.index"),
          items: assertArray(get(v, "items"), "listAdded.items").map((p, i) =>
            assertPlainProperty(p, `listAdded.items[${i}]`)
          ),
          by: assertActor(get(v, "by"), "listAdded.by"),
        },
      };
    case "listRemoved":
      return {
        case: "listRemoved",
        value: {
          id: assertId(get(v, "id"), "listRemoved.id"),
          path: assertPath(get(v, "path"), "listRemoved.path"),
          index: assertIndex(get(v, "index"), "listRemoved.index"),
          count: assertIndex(get(v, "count"), "listRemoved.count"),
          by: assertActor(get(v, "by"), "listRemoved.by"),
        },
      };
    case "rejected":
      return {
        case: "rejected",
        value: {
          request: assertClientCase(get(v, "request"), "rejected.request"),
          ids: assertIds(get(v, "ids"), "rejected.ids"),
          reason: assertString(get(v, "reason"), "rejected.reason"),
        },
      };
    default:
      return undefined;
  }
}

/** Validates a decoded CBOR value and rebuilds the typed message. Throws on malformed input. */
export function decodeSessionMessage(val: unknown): SessionMessage {
  const map = assertMap(val, "message");
  if (get(map, "v") !== 0) throw new Error(`unsupported message version: ${String(get(map, "v"))}`);
  const payload = assertMap(get(map, "payload"), "payload");
  const kind = assertString(get(payload, "case"), "payload.case");
  const value = assertMap(get(payload, "value"), `${kind}`);

  const client = decodeClientPayload(kind, value);
  if (client) return { v: 0, payload: client };
  const server = decodeServerPayload(kind, value);
  if (server) return { v: 0, payload: server };
  throw new Error(`unknown message case: ${kind}`);
}

export function encodeSessionMessage(msg: SessionMessage): Uint8Array {
  return cborEncode(msg, rfc8949EncodeOptions);
}

export function createCborCodec(): WireCodec<SessionMessage, Uint8Array> {
  return {
    encode: encodeSessionMessage,
    decode: (bytes) => decodeSessionMessage(cborDecode(bytes, { useMaps: true })),
  };
}
