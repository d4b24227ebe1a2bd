import type { ParamType } from "ethers";

/** Any value `JSON.parse` can produce */
export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

/**
 * The single function the engine decodes against. Built once at startup from
 * the configured ABI and never mutated afterwards.
 */
export type FunctionInterface = Readonly<{
  name: string; // e.g. "deployToken"
  selector: string; // 0x + 4 bytes
  signature: string; // canonical, e.g. "deployToken(((string,...),...))"
  inputs: readonly ParamType[];
  /**
   * When false the decoder runs in single-function mode: the 4-byte selector
   * is recorded but not compared against `selector`.
   */
  checkSelector: boolean;
}>;

/* --------------------------------- values -------------------------------- */

export type StringValue = { kind: "string"; value: string };
export type IntValue = { kind: "int"; value: bigint; type: string }; // type: "uint256", "int24", ...
export type BoolValue = { kind: "bool"; value: boolean };
export type AddressValue = { kind: "address"; value: string }; // checksummed
export type BytesValue = { kind: "bytes"; value: string }; // 0x hex

export type ScalarValue = StringValue | IntValue | BoolValue | AddressValue | BytesValue;

/** Tuple members keyed by component name (or position when unnamed) */
export type StructValue = { kind: "struct"; fields: Readonly<Record<string, Value>> };
export type ListValue = { kind: "list"; items: readonly Value[] };

export type Value = ScalarValue | StructValue | ListValue;

/**
 * Which historical schema produced a call:
 * - "named": ABI call data, tuples keyed by the ABI's component names
 * - "positional": legacy JSON payload, values lifted out of fixed slots
 */
export type CallSchema = "named" | "positional";

export type DecodedCall = {
  schema: CallSchema;
  /** Absent when the payload does not say which function it targets */
  functionName?: string;
  selector?: string;
  args: Readonly<Record<string, Value>>;
};

/* ----------------------------- deployment record ----------------------------- */

/**
 * Outcome of parsing a JSON-in-a-string field. A failed parse keeps the
 * text it was given.
 */
export type ParsedOrRaw =
  | { kind: "parsed"; value: JsonValue }
  | { kind: "raw"; raw: string; failed: true; reason: string };

export type TokenDetails = {
  name: string;
  symbol: string;
  /** null when the contract version carries no image slot */
  imageUrl: string | null;
  /** null when the contract version predates cross-chain deployments */
  originatingChainId: bigint | null;
  metadata: ParsedOrRaw;
  context: ParsedOrRaw;
  /** `id` member of the parsed context; null when unavailable, never "" */
  contextId: string | null;
};

export type RewardsDetails = {
  creatorRewardRecipient: string;
};

export type SenderInfo = {
  address: string;
  label: string | null;
};

/** Canonical output of the engine, whatever encoding the call data arrived in */
export type DeploymentRecord = {
  schema: CallSchema;
  token: TokenDetails;
  rewards: RewardsDetails;
  sender: SenderInfo | null;
};
