import type { RawData } from "ws";
import { expect, test } from "vitest";

import type { SessionMessage, WebSocketLike } from "../src/index.js";
import {
  clientMessage,
  createCborCodec,
  createInMemoryDuplex,
  createWebSocketTransport,
  parseObjectLimits,
  readServerConfig,
  toUint8Array,
  wrapDuplexTransportWithCodec,
} from "../src/index.js";

class FakeSocket implements WebSocketLike {
  readonly sent: Uint8Array[] = [];
  failWith: Error | null = null;
  private readonly listeners = new Set<(data: RawData) => void>();

  send(data: Uint8Array, _opts: { binary: boolean }, cb: (err?: Error) => void): void {
    if (this.failWith) {
      cb(this.failWith);
      return;
    }
    this.sent.push(data);
    cb();
  }

  on(_event: "message", listener: (data: RawData) => void): this {
    this.listeners.add(listener);
    return this;
  }

  off(_event: "message", listener: (data: RawData) => void): this {
    this.listeners.delete(listener);
    return this;
  }

  deliver(data: RawData): void {
    for (const listener of this.listeners) listener(data);
  }

  get listenerCount(): number {
    return this.listeners.size;
  }
}

test("websocket frames are sent as binary and received as bytes", async () => {
  const socket = new FakeSocket();
  const transport = createWebSocketTransport(socket);
  const received: number[][] = [];
  const off = transport.onMessage((bytes) => received.push(Array.from(bytes)));

  await transport.send(new Uint8Array([1, 2, 3]));
  socket.deliver(Buffer.from([4, 5]));
  socket.deliver([Buffer.from([6]), Buffer.from([7])]);
  off();
  socket.deliver(Buffer.from([8]));

  expect(socket.sent.map((b) => Array.from(b))).toEqual([[1, 2, 3]]);
  expect(received).toEqual([
    [4, 5],
    [6, 7],
  ]);
  expect(socket.listenerCount).toBe(0);
});

test("socket send errors reject the send", async () => {
  const socket = new FakeSocket();
  socket.failWith = new Error("socket closed");
  await expect(createWebSocketTransport(socket).send(new Uint8Array([1]))).rejects.toThrow("socket closed");
});

test("raw data of every shape becomes a Uint8Array", () => {
  expect(Array.from(toUint8Array(new Uint8Array([1, 2]).buffer))).toEqual([1, 2]);
  expect(Array.from(toUint8Array("hi"))).toEqual([104, 105]);
});

test("codec-wrapped duplexes report undecodable frames", async () => {
  const [a, b] = createInMemoryDuplex<Uint8Array>();
  const codec = createCborCodec();
  const errors: string[] = [];
  const typed = wrapDuplexTransportWithCodec(b, codec, {
    onDecodeError: (err) => errors.push(err instanceof Error ? err.message : String(err)),
  });
  const received: SessionMessage[] = [];
  typed.onMessage((msg) => received.push(msg));

  const hello = clientMessage({ case: "hello", value: { name: "ana" } });
  await a.send(codec.encode(hello));
  await a.send(new Uint8Array([0x01]));
  await new Promise<void>((resolve) => setTimeout(resolve, 0));

  expect(received).toEqual([hello]);
  expect(errors).toEqual(["message must be a CBOR map"]);
});

test("object limits are parsed from type=limit pairs", () => {
  expect(parseObjectLimits(undefined)).toEqual({});
  expect(parseObjectLimits(" ")).toEqual({});
  expect(parseObjectLimits("node=500, component = 2000")).toEqual({ node: 500, component: 2000 });
  expect(() => parseObjectLimits("node=-1")).toThrow("invalid SCENESYNC_OBJECT_LIMITS entry: node=-1");
  expect(() => parseObjectLimits("node")).toThrow("invalid SCENESYNC_OBJECT_LIMITS entry: node");
});

test("server config comes from the environment", () => {
  expect(readServerConfig({})).toEqual({
    host: "0.0.0.0",
    port: 8787,
    maxPayloadBytes: 10 * 1024 * 1024,
    objectLimits: {},
    debug: false,
  });
  expect(
    readServerConfig({ HOST: "127.0.0.1", PORT: "9000", SCENESYNC_OBJECT_LIMITS: "node=10", SCENESYNC_DEBUG: "1" })
  ).toMatchObject({ host: "127.0.0.1", port: 9000, objectLimits: { node: 10 }, debug: true });
  expect(() => readServerConfig({ PORT: "80.5" })).toThrow("invalid PORT: 80.5");
  expect(() => readServerConfig({ SCENESYNC_MAX_PAYLOAD_BYTES: "0" })).toThrow("invalid SCENESYNC_MAX_PAYLOAD_BYTES: 0");
});
