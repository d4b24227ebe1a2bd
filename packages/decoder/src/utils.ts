import { getAddress } from "ethers";

const ADDRESS_PATTERN = /^0x[0-9a-fA-F]{40}$/;

/**
 * Checksummed form of a 20-byte hex address, or null when `value` is not one.
 * Checksum casing is not enforced on input.
 */
export function normalizeAddress(value: string): string | null {
  const trimmed = value.trim();
  if (!ADDRESS_PATTERN.test(trimmed)) return null;
  return getAddress(trimmed.toLowerCase());
}

export async function sleep(ms: number) {
  return new Promise((res) => setTimeout(res, ms));
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Deep copy with bigints turned into decimal strings, for JSON output */
export function serializeBigInts(value: unknown): unknown {
  if (typeof value === "bigint") return value.toString();
  if (Array.isArray(value)) return value.map(serializeBigInts);
  if (isRecord(value)) {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) {
      out[k] = serializeBigInts(v);
    }
    return out;
  }
  return value;
}

/** Freeze an object graph; config and context objects are shared read-only */
export function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}
