import { err, ok, type Result } from "neverthrow";
import { shapeMismatch, type ShapeMismatch } from "./errors.js";
import type { DecodedCall, StructValue, Value } from "./types.js";
import { deepFreeze, isRecord, normalizeAddress } from "./utils.js";

/**
 * Slot positions of the legacy JSON payload:
 *
 *   { "method"?: string, "params": [ mainTuple, ... ] }
 *   mainTuple[tokenConfig]   = [name, symbol, salt, image, metadata, context, chainId]
 *   mainTuple[rewardsConfig] = [creatorReward, creatorRewardRecipient, ...]
 *
 * The positions were recovered from historical transactions rather than from a
 * declared interface, so they are configurable.
 */
export type LegacyLayout = {
  mainTuple: {
    tokenConfig: number;
    rewardsConfig: number;
  };
  tokenConfig: {
    name: number;
    symbol: number;
    imageUrl: number;
    metadata: number;
    context: number;
    originatingChainId: number;
  };
  rewardsConfig: {
    creatorRewardRecipient: number;
  };
};

export const DEFAULT_LEGACY_LAYOUT: LegacyLayout = deepFreeze({
  mainTuple: { tokenConfig: 0, rewardsConfig: 4 },
  tokenConfig: {
    name: 0,
    symbol: 1,
    imageUrl: 3,
    metadata: 4,
    context: 5,
    originatingChainId: 6,
  },
  rewardsConfig: { creatorRewardRecipient: 1 },
});

type SlotKind = "text" | "address" | "integer";

const TOKEN_SLOTS: ReadonlyArray<readonly [keyof LegacyLayout["tokenConfig"], SlotKind]> = [
  ["name", "text"],
  ["symbol", "text"],
  ["imageUrl", "text"],
  ["metadata", "text"],
  ["context", "text"],
  ["originatingChainId", "integer"],
];

const REWARDS_SLOTS: ReadonlyArray<readonly [keyof LegacyLayout["rewardsConfig"], SlotKind]> = [
  ["creatorRewardRecipient", "address"],
];

function present(value: Value): Result<Value | undefined, ShapeMismatch> {
  return ok(value);
}

/**
 * A single leaf slot. Missing and null slots yield undefined; the normalizer
 * decides whether the field was required.
 */
function readSlot(raw: unknown, kind: SlotKind, path: string): Result<Value | undefined, ShapeMismatch> {
  if (raw === undefined || raw === null) return ok(undefined);

  switch (kind) {
    case "text":
      if (typeof raw === "string") return present({ kind: "string", value: raw });
      return err(shapeMismatch(path, "a string"));

    case "address": {
      const address = typeof raw === "string" ? normalizeAddress(raw) : null;
      if (address) return present({ kind: "address", value: address });
      return err(shapeMismatch(path, "an address"));
    }

    case "integer":
      if (typeof raw === "number" && Number.isSafeInteger(raw) && raw >= 0) {
        return present({ kind: "int", value: BigInt(raw), type: "uint256" });
      }
      if (typeof raw === "string" && /^\d+$/.test(raw)) {
        return present({ kind: "int", value: BigInt(raw), type: "uint256" });
      }
      return err(shapeMismatch(path, "a non-negative integer"));
  }
}

function readSlots<K extends string>(
  container: unknown[],
  path: string,
  slots: ReadonlyArray<readonly [K, SlotKind]>,
  positions: Record<K, number>
): Result<StructValue, ShapeMismatch> {
  const fields: Record<string, Value> = {};
  for (const [name, kind] of slots) {
    const index = positions[name];
    const slot = readSlot(container[index], kind, `${path}[${index}]`);
    if (slot.isErr()) return err(slot.error);
    if (slot.value !== undefined) fields[name] = slot.value;
  }
  const struct: StructValue = { kind: "struct", fields };
  return ok(struct);
}

function subArray(container: unknown[], index: number, path: string, what: string): Result<unknown[], ShapeMismatch> {
  const value = container[index];
  return Array.isArray(value) ? ok(value) : err(shapeMismatch(path, `an array (${what})`));
}

/**
 * Decode a legacy JSON payload whose arguments are identified by position.
 * Produces the canonical field names under `token` and `rewards`.
 */
export function decodeLegacyCall(
  json: unknown,
  layout: LegacyLayout = DEFAULT_LEGACY_LAYOUT
): Result<DecodedCall, ShapeMismatch> {
  if (!isRecord(json)) {
    return err(shapeMismatch("$", "an object"));
  }

  const method = json.method;
  if (method !== undefined && typeof method !== "string") {
    return err(shapeMismatch("method", "a string"));
  }

  const params = json.params;
  if (!Array.isArray(params)) {
    return err(shapeMismatch("params", "an array"));
  }

  const tokenPath = `params[0][${layout.mainTuple.tokenConfig}]`;
  const rewardsPath = `params[0][${layout.mainTuple.rewardsConfig}]`;

  return subArray(params, 0, "params[0]", "main tuple").andThen((mainTuple) =>
    subArray(mainTuple, layout.mainTuple.tokenConfig, tokenPath, "token config").andThen((tokenConfig) =>
      subArray(mainTuple, layout.mainTuple.rewardsConfig, rewardsPath, "rewards config").andThen((rewardsConfig) =>
        readSlots(tokenConfig, tokenPath, TOKEN_SLOTS, layout.tokenConfig).andThen((token) =>
          readSlots(rewardsConfig, rewardsPath, REWARDS_SLOTS, layout.rewardsConfig).map(
            (rewards): DecodedCall => ({
              schema: "positional",
              ...(method !== undefined ? { functionName: method } : {}),
              args: { token, rewards },
            })
          )
        )
      )
    )
  );
}
