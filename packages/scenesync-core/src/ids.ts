/** Stable 64-bit identifier of a ReplicaObject. */
export type ReplicaId = bigint;

/** Participant id handed out by the session host. */
export type UserId = number;

const MAX_U64 = (1n << 64n) - 1n;
const MAX_USER_ID = 0xffff_ffff;

function stripHexPrefix(hex: string): string {
  return hex.startsWith("0x") || hex.startsWith("0X") ? hex.slice(2) : hex;
}

export function isReplicaId(val: unknown): val is ReplicaId {
  return typeof val === "bigint" && val > 0n && val <= MAX_U64;
}

export function isUserId(val: unknown): val is UserId {
  return typeof val === "number" && Number.isInteger(val) && val > 0 && val <= MAX_USER_ID;
}

/** Canonical `0x`-prefixed 16-digit hex form. */
export function formatReplicaId(id: ReplicaId): string {
  if (!isReplicaId(id)) throw new Error(`invalid replica id: ${String(id)}`);
  return `0x${id.toString(16).padStart(16, "0")}`;
}

/**
 * Parses a replica id.
 *
 * Accepts:
 * - `0x`-prefixed hex (up to 16 digits)
 * - decimal u64 strings
 */
export function parseReplicaId(text: string): ReplicaId {
  const raw = text.trim();
  let value: bigint;
  if (/^0[xX][0-9a-fA-F]{1,16}$/.test(raw)) {
    value = BigInt(`0x${stripHexPrefix(raw)}`);
  } else if (/^\d+$/.test(raw)) {
    value = BigInt(raw);
  } else {
    throw new Error(`invalid replica id: ${text}`);
  }
  if (!isReplicaId(value)) throw new Error(`invalid replica id: ${text}`);
  return value;
}

/**
 * Lenient decoding for values coming back from a wire codec, which may hand small integers back as
 * numbers.
 */
export function decodeReplicaId(val: unknown): ReplicaId {
  if (typeof val === "bigint" && isReplicaId(val)) return val;
  if (typeof val === "number" && Number.isSafeInteger(val) && val > 0) return BigInt(val);
  if (typeof val === "string") return parseReplicaId(val);
  throw new Error(`invalid replica id: ${String(val)}`);
}

/** Ids minted by a participant live in the range owned by its user id. */
export function replicaIdOwner(id: ReplicaId): UserId {
  return Number(id >> 32n);
}

export function makeReplicaId(owner: UserId, counter: number): ReplicaId {
  if (!isUserId(owner)) throw new Error(`invalid user id: ${owner}`);
  if (!Number.isInteger(counter) || counter <= 0 || counter > MAX_USER_ID) {
    throw new Error(`invalid id counter: ${counter}`);
  }
  return (BigInt(owner) << 32n) | BigInt(counter);
}
