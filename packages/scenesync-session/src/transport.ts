import type { RawData } from "ws";

export type Unsubscribe = () => void;

/** A bidirectional message pipe. `send` settles once the message has left this end. */
export interface DuplexTransport<M> {
  send(msg: M): Promise<void>;
  onMessage(handler: (msg: M) => void): Unsubscribe;
}

export type WireCodec<Message, Wire> = {
  encode(message: Message): Wire;
  /** Throws on input that is not a valid message. */
  decode(wire: Wire): Message;
};

export type CodecTransportOptions = {
  /** Receives frames that fail to decode. Without it the decode error is thrown to the sender. */
  onDecodeError?: (err: unknown) => void;
};

/** The part of a `ws` socket the transport uses. */
export type WebSocketLike = {
  send(data: Uint8Array, opts: { binary: boolean }, cb: (err?: Error) => void): void;
  on(event: "message", listener: (data: RawData) => void): unknown;
  off(event: "message", listener: (data: RawData) => void): unknown;
};

/** Session messages over a byte pipe: `codec` encodes on send and decodes every received frame. */
export function wrapDuplexTransportWithCodec<Wire, Message>(
  inner: DuplexTransport<Wire>,
  codec: WireCodec<Message, Wire>,
  opts: CodecTransportOptions = {}
): DuplexTransport<Message> {
  const decodeOrReport = (wire: Wire): { ok: true; msg: Message } | { ok: false } => {
    if (!opts.onDecodeError) return { ok: true, msg: codec.decode(wire) };
    try {
      return { ok: true, msg: codec.decode(wire) };
    } catch (err) {
      opts.onDecodeError(err);
      return { ok: false };
    }
  };

  return {
    send(msg) {
      return inner.send(codec.encode(msg));
    },
    onMessage(handler) {
      return inner.onMessage((wire) => {
        const decoded = decodeOrReport(wire);
        if (decoded.ok) handler(decoded.msg);
      });
    },
  };
}

class InMemoryEnd<M> implements DuplexTransport<M> {
  readonly handlers = new Set<(msg: M) => void>();
  peer: InMemoryEnd<M> | null = null;

  async send(msg: M): Promise<void> {
    const target = this.peer;
    if (!target) throw new Error("in-memory transport has no peer");
    // Delivery is always asynchronous, as over a socket.
    queueMicrotask(() => {
      for (const handler of Array.from(target.handlers)) handler(msg);
    });
  }

  onMessage(handler: (msg: M) => void): Unsubscribe {
    this.handlers.add(handler);
    return () => {
      this.handlers.delete(handler);
    };
  }
}

/** Two connected ends; what one sends the other receives on a later microtask. */
export function createInMemoryDuplex<M>(): [DuplexTransport<M>, DuplexTransport<M>] {
  const left = new InMemoryEnd<M>();
  const right = new InMemoryEnd<M>();
  left.peer = right;
  right.peer = left;
  return [left, right];
}

/** Normalises the payload shapes `ws` hands to message listeners. */
export function toUint8Array(data: RawData | string): Uint8Array {
  if (typeof data === "string") return new TextEncoder().encode(data);
  if (Array.isArray(data)) return Buffer.concat(data);
  return data instanceof ArrayBuffer ? new Uint8Array(data) : data;
}

/** Binary frames over a `ws` socket. A failed send rejects with the socket's error. */
export function createWebSocketTransport(socket: WebSocketLike): DuplexTransport<Uint8Array> {
  const send = (bytes: Uint8Array) =>
    new Promise<void>((resolve, reject) => {
      const done = (err?: Error) => {
        if (err) reject(err);
        else resolve();
      };
      try {
        socket.send(bytes, { binary: true }, done);
      } catch (err) {
        done(err instanceof Error ? err : new Error(String(err)));
      }
    });

  const onMessage = (handler: (bytes: Uint8Array) => void): Unsubscribe => {
    const listener = (data: RawData) => handler(toUint8Array(data));
    socket.on("message", listener);
    return () => {
      socket.off("message", listener);
    };
  };

  return { send, onMessage };
}
