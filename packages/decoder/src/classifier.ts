import { getBytes, toUtf8String, Utf8ErrorFuncs } from "ethers";

/**
 * Decode path for a raw `input` field:
 * - already-json: the source handed us JSON text directly
 * - hex-encoded-text: hex whose bytes are UTF-8 JSON (legacy deployments)
 * - abi-binary: anything else; `bytes` is null when the input is not even hex
 */
export type Classification =
  | { kind: "already-json"; text: string }
  | { kind: "hex-encoded-text"; text: string }
  | { kind: "abi-binary"; bytes: Uint8Array | null };

/** Hex string (with or without 0x) to bytes, or null */
export function hexToBytes(raw: string): Uint8Array | null {
  const body = raw.startsWith("0x") ? raw.slice(2) : raw;
  try {
    return getBytes(`0x${body}`);
  } catch {
    return null;
  }
}

export function classifyPayload(raw: string): Classification {
  const trimmed = raw.trim();
  if (trimmed.startsWith("{")) {
    return { kind: "already-json", text: trimmed };
  }

  const bytes = hexToBytes(trimmed);
  if (!bytes) {
    return { kind: "abi-binary", bytes: null };
  }

  const text = toUtf8String(bytes, Utf8ErrorFuncs.replace).trim();
  if (text.startsWith("{")) {
    return { kind: "hex-encoded-text", text };
  }
  return { kind: "abi-binary", bytes };
}
