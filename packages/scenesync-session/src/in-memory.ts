import type { SessionClientOptions } from "./client.js";
import { SessionClient } from "./client.js";
import type { ReplicaHost } from "./host.js";
import type { SessionMessage } from "./messages.js";
import type { DuplexTransport, WireCodec } from "./transport.js";
import { createInMemoryDuplex, wrapDuplexTransportWithCodec } from "./transport.js";

export type InMemoryConnection = {
  client: SessionClient;
  /** Detaches the client and tells the host it left. */
  close: () => void;
};

export type ConnectInMemoryOptions = SessionClientOptions & {
  /** Round-trips every message through `codec` on both ends. */
  codec?: WireCodec<SessionMessage, Uint8Array>;
};

/** Connects a new client to `host` over an in-process duplex and waits for its welcome. */
export async function connectInMemory(
  host: ReplicaHost,
  opts: ConnectInMemoryOptions = {}
): Promise<InMemoryConnection> {
  const { codec, ...clientOpts } = opts;
  let hostSide: DuplexTransport<SessionMessage>;
  let clientSide: DuplexTransport<SessionMessage>;
  if (codec) {
    const [a, b] = createInMemoryDuplex<Uint8Array>();
    hostSide = wrapDuplexTransportWithCodec(a, codec);
    clientSide = wrapDuplexTransportWithCodec(b, codec);
  } else {
    [hostSide, clientSide] = createInMemoryDuplex<SessionMessage>();
  }

  const detachHost = host.attach(hostSide);
  const client = new SessionClient(clientSide, clientOpts);
  await client.connect();
  return {
    client,
    close: () => {
      client.close();
      detachHost();
    },
  };
}
