import { createLogger } from "@scenesync/core";

import { readServerConfig } from "./config.js";
import { startReplicaServer } from "./server.js";

const log = createLogger({}, "cli");

async function main() {
  const config = readServerConfig();
  const server = await startReplicaServer(config);
  const base = `${server.host}:${server.port}`;
  log.info(`health: http://${base}/health`);
  log.info(`sessions: ws://${base}/session?room=<name>`);

  let stopping = false;
  const stop = (signal: string) => {
    if (stopping) return;
    stopping = true;
    log.info(`${signal}, closing`);
    void server.close().then(
      () => process.exit(0),
      (err: unknown) => {
        log.error("close failed", err);
        process.exit(1);
      }
    );
  };
  process.once("SIGINT", () => stop("SIGINT"));
  process.once("SIGTERM", () => stop("SIGTERM"));
}

main().catch((err: unknown) => {
  log.error("server failed to start", err);
  process.exitCode = 1;
});
