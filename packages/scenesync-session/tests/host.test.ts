import { expect, test } from "vitest";

import type { PlainProperty, ReplicaId } from "@scenesync/core";
import { makeReplicaId, readNumber } from "@scenesync/core";

import type { ClientPayload, ServerPayload, SessionMessage, WireObject } from "../src/index.js";
import { ReplicaHost, clientMessage, createInMemoryDuplex, isServerMessage } from "../src/index.js";

const settle = () => new Promise<void>((resolve) => setTimeout(resolve, 0));

function wire(id: ReplicaId, properties: [string, PlainProperty][] = [], children: WireObject[] = []): WireObject {
  return { id, type: "node", properties, lockOwner: null, children };
}

async function join(host: ReplicaHost, name: string) {
  const [hostSide, peerSide] = createInMemoryDuplex<SessionMessage>();
  const leave = host.attach(hostSide);
  const inbox: ServerPayload[] = [];
  peerSide.onMessage((msg) => {
    if (isServerMessage(msg)) inbox.push(msg.payload);
  });
  const send = async (payload: ClientPayload) => {
    await peerSide.send(clientMessage(payload));
    await settle();
  };
  await send({ case: "hello", value: { name } });
  return { inbox, send, leave, last: () => inbox[inbox.length - 1] };
}

function setup(opts: { objectLimits?: Record<string, number> } = {}) {
  const lines: string[] = [];
  const host = new ReplicaHost({ ...opts, debug: true, log: (line) => lines.push(line) });
  return { host, lines };
}

const A = makeReplicaId(1, 1);
const B = makeReplicaId(1, 2);
const C = makeReplicaId(1, 3);

test("hello is answered with a user id, the limits and the snapshot", async () => {
  const { host } = setup({ objectLimits: { node: 5 } });
  const first = await join(host, "ana");
  await first.send({ case: "create", value: { parentId: null, index: null, objects: [wire(A)] } });
  const second = await join(host, "ben");

  expect(second.inbox[0]).toEqual({
    case: "welcome",
    value: { userId: 2, limits: [["node", 5]], objects: [wire(A)] },
  });
  expect(host.userCount).toBe(2);
});

test("requests before hello are ignored", async () => {
  const { host, lines } = setup();
  const [hostSide, peerSide] = createInMemoryDuplex<SessionMessage>();
  host.attach(hostSide);
  await peerSide.send(clientMessage({ case: "delete", value: { id: A } }));
  await settle();
  expect(lines).toContain("[host] delete before hello");
});

test("creates are confirmed to the sender and broadcast to the rest", async () => {
  const { host } = setup();
  const ana = await join(host, "ana");
  const ben = await join(host, "ben");
  await ana.send({ case: "create", value: { parentId: null, index: null, objects: [wire(A, [], [wire(B)])] } });
  await ana.send({ case: "create", value: { parentId: A, index: 0, objects: [wire(C)] } });

  expect(ana.last()).toEqual({ case: "confirmCreate", value: { ids: [C], parentId: A, parentOrder: [C, B] } });
  expect(ben.last()).toEqual({
    case: "created",
    value: { parentId: A, index: 0, objects: [wire(C)], parentOrder: [C, B], by: 1 },
  });
  expect(host.getObject(B)?.parent).toBe(host.getObject(A));
});

test("creates with ids from another user's range are refused", async () => {
  const { host } = setup();
  const ana = await join(host, "ana");
  await ana.send({ case: "create", value: { parentId: null, index: null, objects: [wire(makeReplicaId(2, 1))] } });

  expect(ana.last()).toEqual({
    case: "rejected",
    value: { request: "create", ids: [makeReplicaId(2, 1)], reason: "id 0x0000000200000001 is not owned by user 1" },
  });
  expect(host.rootObjects()).toEqual([]);
});

test("ids of deleted objects can be re-created by anyone", async () => {
  const { host } = setup();
  const ana = await join(host, "ana");
  const ben = await join(host, "ben");
  await ana.send({ case: "create", value: { parentId: null, index: null, objects: [wire(A)] } });
  await ana.send({ case: "delete", value: { id: A } });
  expect(ana.last()).toEqual({ case: "confirmDelete", value: { id: A, unsubscribed: false, orders: [{ parentId: null, order: [] }] } });

  await ben.send({ case: "create", value: { parentId: null, index: null, objects: [wire(A)] } });
  expect(ben.last()).toEqual({ case: "confirmCreate", value: { ids: [A], parentId: null, parentOrder: [A] } });

  await ben.send({ case: "create", value: { parentId: null, index: null, objects: [wire(makeReplicaId(1, 9))] } });
  expect(ben.last()?.case).toBe("rejected");
});

test("object limits refuse the whole request", async () => {
  const { host } = setup({ objectLimits: { node: 2 } });
  const ana = await join(host, "ana");
  await ana.send({ case: "create", value: { parentId: null, index: null, objects: [wire(A)] } });
  await ana.send({ case: "create", value: { parentId: null, index: null, objects: [wire(B), wire(C)] } });

  expect(ana.last()).toEqual({
    case: "rejected",
    value: { request: "create", ids: [B, C], reason: "object limit of 2 reached for node" },
  });
  expect(host.getObjectCount("node")).toBe(1);
});

test("writes to an object locked by someone else are corrected", async () => {
  const { host } = setup();
  const ana = await join(host, "ana");
  const ben = await join(host, "ben");
  await ana.send({ case: "create", value: { parentId: null, index: null, objects: [wire(A, [["size", { v: 1 }]])] } });
  await ana.send({ case: "requestLock", value: { id: A } });
  expect(ben.last()).toEqual({ case: "locked", value: { id: A, owner: 1 } });

  await ben.send({ case: "setProperty", value: { id: A, path: ["size"], value: { v: 5 } } });
  expect(ben.last()).toEqual({ case: "propertySet", value: { id: A, path: ["size"], value: { v: 1 }, by: 0 } });

  await ben.send({ case: "requestLock", value: { id: A } });
  expect(ben.last()).toEqual({ case: "rejected", value: { request: "requestLock", ids: [A], reason: "locked by user 1" } });

  await ana.send({ case: "setProperty", value: { id: A, path: ["size"], value: { v: 7 } } });
  expect(ben.last()).toEqual({ case: "propertySet", value: { id: A, path: ["size"], value: { v: 7 }, by: 1 } });
  const obj = host.getObject(A);
  expect(obj && readNumber(obj.properties, "size")).toBe(7);
});

test("deleting a subtree with a locked descendant restores it for the requester", async () => {
  const { host } = setup();
  const ana = await join(host, "ana");
  const ben = await join(host, "ben");
  await ana.send({ case: "create", value: { parentId: null, index: null, objects: [wire(A, [], [wire(B)])] } });
  await ana.send({ case: "requestLock", value: { id: B } });

  await ben.send({ case: "delete", value: { id: A } });
  expect(ben.last()).toEqual({
    case: "created",
    value: {
      parentId: null,
      index: 0,
      objects: [{ ...wire(A), children: [{ ...wire(B), lockOwner: 1 }] }],
      parentOrder: [A],
      by: 0,
    },
  });
  expect(host.getObject(A)).toBeDefined();
});

test("moves are broadcast with the final order and refused moves are corrected", async () => {
  const { host } = setup();
  const ana = await join(host, "ana");
  const ben = await join(host, "ben");
  await ana.send({ case: "create", value: { parentId: null, index: null, objects: [wire(A, [], [wire(B), wire(C)])] } });

  await ben.send({ case: "setChildIndex", value: { id: C, index: 0 } });
  const moved = { case: "parentChanged", value: { id: C, parentId: A, index: 0, by: 2, orders: [{ parentId: A, order: [C, B] }] } };
  expect(ana.last()).toEqual(moved);
  expect(ben.last()).toEqual(moved);

  await ben.send({ case: "setParent", value: { id: A, parentId: B, index: 0 } });
  expect(ben.last()).toEqual({
    case: "parentChanged",
    value: { id: A, parentId: null, index: 0, by: 0, orders: [{ parentId: null, order: [A] }, { parentId: B, order: [] }] },
  });
});

test("leaving releases every lock the user held", async () => {
  const { host, lines } = setup();
  const ana = await join(host, "ana");
  const ben = await join(host, "ben");
  await ana.send({ case: "create", value: { parentId: null, index: null, objects: [wire(A), wire(B)] } });
  await ana.send({ case: "requestLock", value: { id: A } });
  await ana.send({ case: "requestLock", value: { id: B } });

  ana.leave();
  await settle();
  expect(ben.inbox.slice(-2)).toEqual([
    { case: "unlocked", value: { id: A } },
    { case: "unlocked", value: { id: B } },
  ]);
  expect(host.getObject(A)?.lockOwner).toBeNull();
  expect(host.userCount).toBe(1);
  expect(lines).toContain("[host] ana#1 left, released 2 lock(s)");
});
