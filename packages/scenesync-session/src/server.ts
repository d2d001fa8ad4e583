import http from "node:http";
import type { Duplex } from "node:stream";

import type { Logger, LoggerOptions } from "@scenesync/core";
import { createLogger } from "@scenesync/core";
import type WebSocket from "ws";
import { WebSocketServer } from "ws";

import { createCborCodec } from "./codec.js";
import type { ReplicaHostOptions } from "./host.js";
import { ReplicaHost } from "./host.js";
import { createWebSocketTransport, wrapDuplexTransportWithCodec } from "./transport.js";

export type ReplicaServerOptions = {
  host?: string;
  port?: number;
  sessionPath?: string;
  healthPath?: string;
  maxPayloadBytes?: number;
  /** Per-type object limits applied to every room. */
  objectLimits?: Record<string, number>;
  debug?: boolean;
  log?: LoggerOptions["log"];
};

export type ReplicaServerHandle = {
  host: string;
  port: number;
  /** The host of `room`, if anyone has joined it. */
  room: (name: string) => ReplicaHost | undefined;
  close: () => Promise<void>;
};

const DEFAULT_MAX_PAYLOAD = 10 * 1024 * 1024;

/** Rooms are created on first join and live as long as the server. */
class Rooms {
  private readonly hosts = new Map<string, ReplicaHost>();

  constructor(private readonly hostOpts: ReplicaHostOptions) {}

  get(name: string): ReplicaHost | undefined {
    return this.hosts.get(name);
  }

  join(name: string): ReplicaHost {
    const existing = this.hosts.get(name);
    if (existing) return existing;
    const created = new ReplicaHost(this.hostOpts);
    this.hosts.set(name, created);
    return created;
  }

  /** Users and objects per room, for the health endpoint. */
  summary(): Record<string, { users: number; roots: number }> {
    const out: Record<string, { users: number; roots: number }> = {};
    for (const [name, host] of this.hosts) out[name] = { users: host.userCount, roots: host.rootObjects().length };
    return out;
  }
}

function requestUrl(req: http.IncomingMessage): URL {
  return new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);
}

function checkPath(name: string, value: string): string {
  if (!value.startsWith("/")) throw new Error(`${name} must start with "/": ${value}`);
  return value;
}

function serveSocket(ws: WebSocket, room: string, host: ReplicaHost, log: Logger): void {
  const transport = wrapDuplexTransportWithCodec(createWebSocketTransport(ws), createCborCodec(), {
    onDecodeError: (err) => {
      log.error(`malformed message in room ${room}`, err);
      ws.close(1007, "malformed message");
    },
  });
  let detach: (() => void) | null = host.attach(transport);
  const leave = () => {
    detach?.();
    detach = null;
  };
  ws.once("close", leave);
  ws.once("error", (err) => {
    log.warn(`socket error in room ${room}: ${err.message}`);
    leave();
  });
}

/**
 * Serves session rooms over WebSocket. Clients connect to `<sessionPath>?room=<name>`, and each
 * room is its own {@link ReplicaHost}. `healthPath` answers with the open rooms as JSON.
 */
export async function startReplicaServer(opts: ReplicaServerOptions = {}): Promise<ReplicaServerHandle> {
  const bindHost = opts.host ?? "0.0.0.0";
  const port = opts.port ?? 8787;
  const maxPayload = opts.maxPayloadBytes ?? DEFAULT_MAX_PAYLOAD;
  const sessionPath = checkPath("sessionPath", opts.sessionPath ?? "/session");
  const healthPath = checkPath("healthPath", opts.healthPath ?? "/health");
  if (!Number.isInteger(port) || port < 0) throw new Error(`invalid port: ${port}`);
  if (!Number.isFinite(maxPayload) || maxPayload <= 0) throw new Error(`invalid maxPayloadBytes: ${maxPayload}`);

  const log = createLogger({ debug: opts.debug, log: opts.log }, "server");
  const rooms = new Rooms({ objectLimits: opts.objectLimits, debug: opts.debug, log: opts.log });
  const wss = new WebSocketServer({ noServer: true, maxPayload });

  const server = http.createServer((req, res) => {
    if (requestUrl(req).pathname !== healthPath) {
      res.writeHead(404, { "content-type": "text/plain" });
      res.end("not found");
      return;
    }
    res.writeHead(200, { "content-type": "application/json" });
    res.end(JSON.stringify({ ok: true, rooms: rooms.summary() }));
  });

  server.on("upgrade", (req: http.IncomingMessage, socket: Duplex, head: Buffer) => {
    const url = requestUrl(req);
    const room = url.searchParams.get("room");
    if (url.pathname !== sessionPath || !room) {
      log.debug(`refused upgrade for ${url.pathname}`);
      socket.destroy();
      return;
    }
    wss.handleUpgrade(req, socket, head, (ws) => serveSocket(ws, room, rooms.join(room), log));
  });

  await new Promise<void>((resolve, reject) => {
    server.once("error", reject);
    server.listen(port, bindHost, () => {
      server.off("error", reject);
      resolve();
    });
  });
  const address = server.address();
  const boundPort = address !== null && typeof address === "object" ? address.port : port;
  log.info(`listening on ${bindHost}:${boundPort}`);

  return {
    host: bindHost,
    port: boundPort,
    room: (name) => rooms.get(name),
    close: async () => {
      for (const client of wss.clients) client.close(1001, "server closing");
      await new Promise<void>((resolve) => wss.close(() => resolve()));
      await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
    },
  };
}
