import type { ReplicaServerOptions } from "./server.js";

export type ServerConfig = Required<
  Pick<ReplicaServerOptions, "host" | "port" | "maxPayloadBytes" | "objectLimits" | "debug">
>;

type Env = Readonly<Record<string, string | undefined>>;

/** Parses `type=n,type=n`. */
export function parseObjectLimits(text: string | undefined): Record<string, number> {
  const limits: Record<string, number> = {};
  if (!text || text.trim().length === 0) return limits;
  for (const entry of text.split(",")) {
    const [type, raw, ...rest] = entry.split("=").map((s) => s.trim());
    const limit = Number(raw);
    if (!type || !raw || rest.length > 0 || !Number.isSafeInteger(limit) || limit < 0) {
      throw new Error(`invalid SCENESYNC_OBJECT_LIMITS entry: ${entry}`);
    }
    limits[type] = limit;
  }
  return limits;
}

function positiveInt(env: Env, name: string, fallback: number): number {
  const raw = env[name]?.trim();
  if (!raw) return fallback;
  const n = Number(raw);
  if (!Number.isSafeInteger(n) || n <= 0) throw new Error(`invalid ${name}: ${raw}`);
  return n;
}

/** Server settings from `HOST`, `PORT` and the `SCENESYNC_*` variables. */
export function readServerConfig(env: Env = process.env): ServerConfig {
  return {
    host: env["HOST"]?.trim() || "0.0.0.0",
    port: positiveInt(env, "PORT", 8787),
    maxPayloadBytes: positiveInt(env, "SCENESYNC_MAX_PAYLOAD_BYTES", 10 * 1024 * 1024),
    objectLimits: parseObjectLimits(env["SCENESYNC_OBJECT_LIMITS"]),
    debug: env["SCENESYNC_DEBUG"] === "1",
  };
}
