import { encode } from "cborg";
import { expect, test } from "vitest";

import { makeReplicaId } from "@scenesync/core";

import type { SessionMessage } from "../src/index.js";
import {
  clientMessage,
  createCborCodec,
  decodeSessionMessage,
  isClientMessage,
  isServerMessage,
  serverMessage,
} from "../src/index.js";

const codec = createCborCodec();

test("client requests survive the wire with 64-bit ids", () => {
  const msg = clientMessage({
    case: "setProperty",
    value: {
      id: makeReplicaId(3, 7),
      path: ["color", 1],
      value: { d: [["soft", { v: true }], ["bias", { v: 0.5 }], ["target", { r: makeReplicaId(1, 2) }]] },
    },
  });
  const decoded = codec.decode(codec.encode(msg));
  expect(decoded).toEqual(msg);
  expect(isClientMessage(decoded)).toBe(true);
  expect(isServerMessage(decoded)).toBe(false);
});

test("server events keep null parents and host actors", () => {
  const msg = serverMessage({
    case: "parentChanged",
    value: {
      id: makeReplicaId(1, 1),
      parentId: null,
      index: 2,
      by: 0,
      orders: [{ parentId: null, order: [makeReplicaId(1, 4), makeReplicaId(2, 1), makeReplicaId(1, 1)] }],
    },
  });
  expect(codec.decode(codec.encode(msg))).toEqual(msg);
});

test("created events carry whole subtrees", () => {
  const msg: SessionMessage = serverMessage({
    case: "created",
    value: {
      parentId: makeReplicaId(1, 1),
      index: 0,
      objects: [
        {
          id: makeReplicaId(1, 2),
          type: "node",
          properties: [["#name", { v: "Cube" }]],
          lockOwner: 2,
          children: [{ id: makeReplicaId(1, 3), type: "component", properties: [], lockOwner: null, children: [] }],
        },
      ],
      parentOrder: [makeReplicaId(1, 2)],
      by: 1,
    },
  });
  expect(codec.decode(codec.encode(msg))).toEqual(msg);
});

test("malformed messages are refused with the offending field", () => {
  const id = makeReplicaId(1, 1);
  expect(() => codec.decode(encode([1, 2]))).toThrow("message must be a CBOR map");
  expect(() => codec.decode(encode({ v: 1, payload: { case: "hello", value: { name: "a" } } }))).toThrow(
    "unsupported message version: 1"
  );
  expect(() => codec.decode(encode({ v: 0, payload: { case: "teleport", value: {} } }))).toThrow(
    "unknown message case: teleport"
  );
  expect(() =>
    codec.decode(encode({ v: 0, payload: { case: "setParent", value: { id: "nope", parentId: id, index: 0 } } }))
  ).toThrow("setParent.id must be a replica id");
  expect(() => codec.decode(encode({ v: 0, payload: { case: "setChildIndex", value: { id, index: -1 } } }))).toThrow(
    "setChildIndex.index must be a non-negative integer"
  );
  expect(() =>
    codec.decode(
      encode({ v: 0, payload: { case: "setProperty", value: { id, path: ["a"], value: { v: 1, r: null } } } })
    )
  ).toThrow("setProperty.value must have exactly one variant");
  expect(() =>
    codec.decode(
      encode({
        v: 0,
        payload: {
          case: "welcome",
          value: {
            userId: 1,
            limits: [],
            objects: [{ id, type: "node", properties: [], lockOwner: "me", children: [] }],
          },
        },
      })
    )
  ).toThrow("welcome.objects[0].lockOwner must be a user id");
});

test("only decoded CBOR maps are accepted", () => {
  expect(() => decodeSessionMessage({ v: 0, payload: { case: "hello", value: { name: "a" } } })).toThrow(
    "message must be a CBOR map"
  );
});
